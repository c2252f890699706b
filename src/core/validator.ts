import { defaultCatalog, ExtractionCatalog } from "./catalog";
import { EntityType } from "../utils/types";

export type ValidationResult = { ok: boolean; reason?: string };

const OK: ValidationResult = { ok: true };

function reject(reason: string): ValidationResult {
  return { ok: false, reason };
}

/** True for numbers that read as an Indian mobile, bare or with a 0, 91 or 091 style prefix. */
export function looksLikePhone(digits: string): boolean {
  if (!/^\d+$/.test(digits)) return false;
  if (digits.length === 10) return /^[6-9]/.test(digits);
  if (digits.length === 11) return /^0[6-9]/.test(digits) || /^91[6-9]/.test(digits);
  if (digits.length === 12) return /^91[6-9]/.test(digits);
  return false;
}

export function validatePhone(value: string): ValidationResult {
  let digits = value.replace(/^\+/, "");
  if (digits.length === 12 && digits.startsWith("91")) digits = digits.slice(2);
  if (!/^\d+$/.test(digits)) return reject("not_digits");
  if (digits.length !== 10) return reject("length");
  if (!/^[6-9]/.test(digits)) return reject("prefix");
  return OK;
}

export function validateBankAccount(value: string): ValidationResult {
  if (!/^\d+$/.test(value)) return reject("not_digits");
  if (value.length < 9 || value.length > 18) return reject("length");
  if (/^(\d)\1*$/.test(value)) return reject("repeated_digit");
  if (looksLikePhone(value)) return reject("phone_shaped");
  return OK;
}

export function validateUpiId(value: string, catalog: ExtractionCatalog = defaultCatalog): ValidationResult {
  const match = /^([a-z0-9._-]{2,})@([a-z][a-z0-9]*)$/.exec(value);
  if (!match) return reject("shape");
  if (!catalog.upiProviders.has(match[2])) return reject("unknown_provider");
  return OK;
}

export function validateIfsc(value: string): ValidationResult {
  if (value.length !== 11) return reject("length");
  if (!/^[A-Za-z]{4}$/.test(value.slice(0, 4))) return reject("bank_code");
  if (value[4] !== "0") return reject("fifth_char");
  if (!/^[A-Za-z0-9]{6}$/.test(value.slice(5))) return reject("branch_code");
  return OK;
}

/**
 * `x@ybl.com` is a UPI handle with a stray suffix, `x@sbi.co.in` is a bank's
 * mailbox: only handle codes no bank mails from count here.
 */
export function isUpiProviderDomain(domain: string, catalog: ExtractionCatalog = defaultCatalog): boolean {
  const firstLabel = domain.split(".")[0].toLowerCase();
  return catalog.upiOnlyHandles.has(firstLabel);
}

export function validateEmail(value: string, catalog: ExtractionCatalog = defaultCatalog): ValidationResult {
  const match = /^[a-z0-9._%+-]+@([a-z0-9-]+(?:\.[a-z0-9-]+)*\.[a-z]{2,})$/i.exec(value);
  if (!match) return reject("shape");
  if (isUpiProviderDomain(match[1], catalog)) return reject("upi_provider_domain");
  return OK;
}

export function isBareLink(value: string): boolean {
  return !/^[a-z][a-z0-9+.-]*:\/\//i.test(value);
}

export function validatePhishingLink(value: string, catalog: ExtractionCatalog = defaultCatalog): ValidationResult {
  if (/\s/.test(value)) return reject("whitespace");
  if (/^upi:\/\/pay\?./i.test(value)) return OK;
  if (!isBareLink(value)) {
    return /^https?:\/\/[^/?#\s]+/i.test(value) ? OK : reject("shape");
  }

  const slash = value.indexOf("/");
  const host = slash === -1 ? value : value.slice(0, slash);
  const path = slash === -1 ? "" : value.slice(slash + 1);
  const tld = host.replace(/:\d+$/, "").split(".").pop() || "";

  if (/^v?\d+(?:\.\d+)+/i.test(host)) return reject("version_number");
  if (catalog.fileExtensions.includes(tld.toLowerCase())) return reject("file_extension");

  const bareHost = host.replace(/:\d+$/, "").toLowerCase();
  if (
    path.length === 0 &&
    !catalog.commonTlds.has(tld.toLowerCase()) &&
    !bareHost.includes("-") &&
    !bareHost.startsWith("www.")
  ) {
    return reject("unknown_tld");
  }

  const lower = value.toLowerCase();
  const hasKeyword = catalog.linkKeywords.some((kw) => lower.includes(kw));
  if (path.length === 0 && !hasKeyword) return reject("no_path_or_keyword");
  return OK;
}

export function isKnownBank(value: string, catalog: ExtractionCatalog = defaultCatalog): boolean {
  return catalog.banks.has(value.trim().toLowerCase());
}

export function validateBeneficiaryName(
  value: string,
  catalog: ExtractionCatalog = defaultCatalog
): ValidationResult {
  if (value.length < 2 || value.length > 50) return reject("length");
  if (!/^[A-Za-z][A-Za-z.'\- ]+$/.test(value)) return reject("characters");
  const lower = value.toLowerCase();
  if (catalog.nameStopwords.has(lower)) return reject("blocklisted");
  const tokens = lower.split(/\s+/).map((t) => t.replace(/[.'-]+$/g, ""));
  if (tokens.every((t) => catalog.nameStopwords.has(t))) return reject("blocklisted");
  if (isKnownBank(value, catalog)) return reject("bank_name");
  return OK;
}

export function validateBankName(value: string, catalog: ExtractionCatalog = defaultCatalog): ValidationResult {
  return isKnownBank(value, catalog) ? OK : reject("not_in_gazetteer");
}

/** Strict per-type rule, applied to an already normalized value. */
export function validateEntity(
  type: EntityType,
  value: string,
  catalog: ExtractionCatalog = defaultCatalog
): ValidationResult {
  if (!value) return reject("empty");
  switch (type) {
    case "phoneNumbers":
    case "whatsappNumbers":
      return validatePhone(value);
    case "bankAccounts":
      return validateBankAccount(value);
    case "upiIds":
      return validateUpiId(value, catalog);
    case "ifscCodes":
      return validateIfsc(value);
    case "emails":
      return validateEmail(value, catalog);
    case "phishingLinks":
      return validatePhishingLink(value, catalog);
    case "beneficiaryNames":
      return validateBeneficiaryName(value, catalog);
    case "bankNames":
      return validateBankName(value, catalog);
  }
}
