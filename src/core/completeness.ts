import { ENTITY_TYPES, EntityType, ExtractedIntelligence, isEntityType } from "../utils/types";

export const DEFAULT_HIGH_VALUE_TYPES: readonly EntityType[] = [
  "bankAccounts",
  "upiIds",
  "phoneNumbers",
  "beneficiaryNames"
];

export type CompletenessReport = {
  complete: boolean;
  missing: EntityType[];
};

export function checkCompleteness(
  record: ExtractedIntelligence,
  highValueTypes: readonly EntityType[] = DEFAULT_HIGH_VALUE_TYPES
): CompletenessReport {
  const missing = highValueTypes.filter((type) => record[type].length === 0);
  return { complete: missing.length === 0, missing };
}

export function hasIntelligence(record: ExtractedIntelligence): boolean {
  return ENTITY_TYPES.some((type) => record[type].length > 0) || record.other_critical_info.length > 0;
}

export function intelligenceCounts(record: ExtractedIntelligence): Record<EntityType, number> & { other: number } {
  const counts = {
    bankAccounts: record.bankAccounts.length,
    upiIds: record.upiIds.length,
    phoneNumbers: record.phoneNumbers.length,
    phishingLinks: record.phishingLinks.length,
    emails: record.emails.length,
    beneficiaryNames: record.beneficiaryNames.length,
    bankNames: record.bankNames.length,
    ifscCodes: record.ifscCodes.length,
    whatsappNumbers: record.whatsappNumbers.length,
    other: record.other_critical_info.length
  };
  return counts;
}

/** Parses a comma list of record keys; unknown keys are ignored, empty input gives the defaults. */
export function parseHighValueTypes(raw: string | undefined): EntityType[] {
  const parsed = (raw || "")
    .split(",")
    .map((s) => s.trim())
    .filter(isEntityType);
  const unique = Array.from(new Set(parsed));
  return unique.length > 0 ? unique : [...DEFAULT_HIGH_VALUE_TYPES];
}
