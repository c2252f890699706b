export const ENTITY_TYPES = [
  "bankAccounts",
  "upiIds",
  "phoneNumbers",
  "phishingLinks",
  "emails",
  "beneficiaryNames",
  "bankNames",
  "ifscCodes",
  "whatsappNumbers"
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export type OtherCriticalItem = {
  label: string;
  value: string;
};

export type ExtractedIntelligence = Record<EntityType, string[]> & {
  other_critical_info: OtherCriticalItem[];
};

export type CandidateOrigin = "pattern" | "model" | "prior";

/** One pattern hit before normalization; `start`/`end` index into the scanned text. */
export type RawCandidate = {
  type: EntityType;
  value: string;
  start: number;
  end: number;
  pattern: string;
};

export type ValidatedEntity = {
  type: EntityType;
  value: string;
  origin: CandidateOrigin;
};

/** Model candidate map after coercion: every field present, every list entry a string. */
export type ModelCandidateMap = Record<EntityType, string[]> & {
  other_critical_info: OtherCriticalItem[];
};

export function isEntityType(value: unknown): value is EntityType {
  return ENTITY_TYPES.some((type) => type === value);
}

export function emptyIntelligence(): ExtractedIntelligence {
  return {
    bankAccounts: [],
    upiIds: [],
    phoneNumbers: [],
    phishingLinks: [],
    emails: [],
    beneficiaryNames: [],
    bankNames: [],
    ifscCodes: [],
    whatsappNumbers: [],
    other_critical_info: []
  };
}
