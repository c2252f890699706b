import { defaultCatalog, ExtractionCatalog } from "./catalog";
import { EntityType } from "../utils/types";

const TRAILING_LINK_PUNCTUATION = /[.,;:!?)\]}'"]+$/;

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** Replaces spelled-out digit words with numerals, leaving everything else untouched. */
export function spelledDigitsToNumerals(value: string, catalog: ExtractionCatalog = defaultCatalog): string {
  return value.replace(/[a-z]+/gi, (word) => catalog.digitWords.get(word.toLowerCase()) ?? word);
}

export function normalizeDigits(value: string, catalog: ExtractionCatalog = defaultCatalog): string {
  return spelledDigitsToNumerals(value, catalog).replace(/\D/g, "");
}

export function normalizePhone(value: string, catalog: ExtractionCatalog = defaultCatalog): string {
  const digits = normalizeDigits(value, catalog);
  if (digits.length === 12 && digits.startsWith("91")) return digits.slice(2);
  if (digits.length === 11 && digits.startsWith("0")) return digits.slice(1);
  return digits;
}

export function normalizeHandle(value: string): string {
  return value.trim().replace(/^[<("']+|[>)"',.;:!?]+$/g, "").toLowerCase();
}

/**
 * Folds an IFSC run to its 11-character candidate: tokens are joined until at
 * least 11 characters are collected, so trailing words after the code are
 * never glued on.
 */
export function normalizeIfsc(value: string, catalog: ExtractionCatalog = defaultCatalog): string {
  const tokens = value.trim().split(/[\s-]+/).filter(Boolean);
  let out = "";
  for (const token of tokens) {
    out += catalog.digitWords.get(token.toLowerCase()) ?? token;
    if (out.length >= 11) break;
  }
  return out.toUpperCase();
}

export function normalizeLink(value: string): string {
  const trimmed = value.trim().replace(TRAILING_LINK_PUNCTUATION, "");
  const match = /^([a-z][a-z0-9+.-]*:\/\/)?([^/?#]*)(.*)$/i.exec(trimmed);
  if (!match) return trimmed;
  const [, scheme = "", host, rest] = match;
  return `${scheme.toLowerCase()}${host.toLowerCase()}${rest}`;
}

export function titleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[\s.'-])([a-z])/g, (_m, sep: string, ch: string) => sep + ch.toUpperCase());
}

export function normalizeName(value: string): string {
  const cleaned = collapseWhitespace(value.replace(/["“”]/g, " "))
    .replace(/^['.\-\s]+|['.\-\s]+$/g, "");
  return titleCase(cleaned);
}

export function normalizeBankName(value: string, catalog: ExtractionCatalog = defaultCatalog): string {
  const cleaned = collapseWhitespace(value);
  return catalog.banks.get(cleaned.toLowerCase()) ?? titleCase(cleaned);
}

/** Canonical form used for equality within one entity type. */
export function normalizeValue(
  type: EntityType,
  value: string,
  catalog: ExtractionCatalog = defaultCatalog
): string {
  switch (type) {
    case "phoneNumbers":
    case "whatsappNumbers":
      return normalizePhone(value, catalog);
    case "bankAccounts":
      return normalizeDigits(value, catalog);
    case "upiIds":
    case "emails":
      return normalizeHandle(value);
    case "ifscCodes":
      return normalizeIfsc(value, catalog);
    case "phishingLinks":
      return normalizeLink(value);
    case "beneficiaryNames":
      return normalizeName(value);
    case "bankNames":
      return normalizeBankName(value, catalog);
  }
}
