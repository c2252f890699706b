import { defaultCatalog, ExtractionCatalog } from "./catalog";
import { DropTally } from "./dropTally";
import {
  normalizeBankName,
  normalizeHandle,
  normalizeLink,
  normalizeName,
  normalizePhone,
  normalizeValue
} from "./normalizer";
import { isUpiProviderDomain, validateEntity, validatePhone, ValidationResult } from "./validator";
import {
  CandidateOrigin,
  emptyIntelligence,
  ENTITY_TYPES,
  EntityType,
  ExtractedIntelligence,
  ModelCandidateMap,
  OtherCriticalItem,
  ValidatedEntity
} from "../utils/types";

/** Keys a producer may use for each field; the record key always comes first. */
const FIELD_ALIASES: Record<EntityType, string[]> = {
  bankAccounts: ["bankAccounts", "bank_accounts", "bank_account_digits"],
  upiIds: ["upiIds", "upi_ids"],
  phoneNumbers: ["phoneNumbers", "phone_numbers"],
  phishingLinks: ["phishingLinks", "phishing_links", "urls", "links"],
  emails: ["emails"],
  beneficiaryNames: ["beneficiaryNames", "beneficiary_names"],
  bankNames: ["bankNames", "bank_names"],
  ifscCodes: ["ifscCodes", "ifsc_codes"],
  whatsappNumbers: ["whatsappNumbers", "whatsapp_numbers"]
};

const OTHER_ALIASES = ["other_critical_info", "otherCriticalInfo"];

type LightCheck = (value: string, catalog: ExtractionCatalog) => { value: string; verdict: ValidationResult };

const OK: ValidationResult = { ok: true };

function verdict(ok: boolean, reason: string): ValidationResult {
  return ok ? OK : { ok: false, reason };
}

const LIGHT_CHECKS: Record<EntityType, LightCheck> = {
  phoneNumbers: (raw, catalog) => {
    const value = normalizePhone(raw, catalog);
    return { value, verdict: validatePhone(value) };
  },
  whatsappNumbers: (raw, catalog) => {
    const value = normalizePhone(raw, catalog);
    return { value, verdict: validatePhone(value) };
  },
  emails: (raw, catalog) => {
    const value = normalizeHandle(raw);
    const shaped = /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(value);
    if (!shaped) return { value, verdict: verdict(false, "shape") };
    const domain = value.slice(value.indexOf("@") + 1);
    return { value, verdict: verdict(!isUpiProviderDomain(domain, catalog), "upi_provider_domain") };
  },
  phishingLinks: (raw) => {
    const value = normalizeLink(raw);
    return { value, verdict: verdict(value.length > 0 && !/\s/.test(value), "shape") };
  },
  beneficiaryNames: (raw) => {
    const value = normalizeName(raw);
    return { value, verdict: verdict(/[a-z]/i.test(value) && value.length <= 50, "shape") };
  },
  bankNames: (raw, catalog) => {
    const value = normalizeBankName(raw, catalog);
    return { value, verdict: verdict(value.length > 0, "empty") };
  },
  // accounts, UPI ids and IFSC codes get the full pattern-side rule
  bankAccounts: (raw, catalog) => strictCheck("bankAccounts", raw, catalog),
  upiIds: (raw, catalog) => strictCheck("upiIds", raw, catalog),
  ifscCodes: (raw, catalog) => strictCheck("ifscCodes", raw, catalog)
};

function strictCheck(type: EntityType, raw: string, catalog: ExtractionCatalog) {
  const value = normalizeValue(type, raw, catalog);
  return { value, verdict: validateEntity(type, value, catalog) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

type CoerceOptions = {
  tally?: DropTally;
  origin?: CandidateOrigin;
};

/** Digit values only survive as numbers while they are exact; larger ones were already rounded by the JSON parser. */
function normalizeArray(type: EntityType, values: unknown, options: CoerceOptions): string[] {
  const list = Array.isArray(values) ? values : typeof values === "string" ? [values] : [];
  const out: string[] = [];
  for (const v of list) {
    if (typeof v === "number" && !Number.isSafeInteger(v)) {
      options.tally?.record(type, options.origin ?? "model", "unsafe_number");
      continue;
    }
    if (typeof v === "string" || typeof v === "number") {
      const s = String(v).trim();
      if (s) out.push(s);
    }
  }
  return out;
}

function toText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}

function normalizeOtherItems(values: unknown): OtherCriticalItem[] {
  if (!Array.isArray(values)) return [];
  const out: OtherCriticalItem[] = [];
  for (const item of values) {
    if (!isRecord(item)) continue;
    out.push({ label: toText(item.label), value: toText(item.value) });
  }
  return out;
}

function firstPresent(raw: Record<string, unknown>, keys: string[]): unknown {
  for (const key of keys) {
    if (raw[key] !== undefined && raw[key] !== null) return raw[key];
  }
  return undefined;
}

/**
 * Turns whatever shape a producer returned into a typed map. Missing keys and
 * wrong types become empty lists; `null` means there was no map at all.
 */
export function coerceModelCandidates(raw: unknown, options: CoerceOptions = {}): ModelCandidateMap | null {
  if (!isRecord(raw)) return null;
  const map = emptyIntelligence();
  for (const type of ENTITY_TYPES) {
    map[type] = normalizeArray(type, firstPresent(raw, FIELD_ALIASES[type]), options);
  }
  map.other_critical_info = normalizeOtherItems(firstPresent(raw, OTHER_ALIASES));
  return map;
}

export type AdaptOptions = {
  catalog?: ExtractionCatalog;
  tally?: DropTally;
  origin?: CandidateOrigin;
};

export function adaptModelEntities(map: ModelCandidateMap | null, options: AdaptOptions = {}): ValidatedEntity[] {
  if (!map) return [];
  const catalog = options.catalog ?? defaultCatalog;
  const origin = options.origin ?? "model";
  const entities: ValidatedEntity[] = [];
  for (const type of ENTITY_TYPES) {
    for (const raw of map[type]) {
      const { value, verdict: result } = LIGHT_CHECKS[type](raw, catalog);
      if (!result.ok) {
        options.tally?.record(type, origin, result.reason || "invalid");
        continue;
      }
      entities.push({ type, value, origin });
    }
  }
  return entities;
}

/** Model-bag: the validated contribution of a candidate map, or an empty record when there is none. */
export function adaptModelCandidates(map: ModelCandidateMap | null, options: AdaptOptions = {}): ExtractedIntelligence {
  const bag = emptyIntelligence();
  for (const entity of adaptModelEntities(map, options)) {
    if (!bag[entity.type].includes(entity.value)) bag[entity.type].push(entity.value);
  }
  if (!map) return bag;

  const seen = new Set<string>();
  for (const item of map.other_critical_info) {
    if (!item.label || !item.value) continue;
    const key = JSON.stringify([item.label, item.value]);
    if (seen.has(key)) continue;
    seen.add(key);
    bag.other_critical_info.push(item);
  }
  return bag;
}
