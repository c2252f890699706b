import { defaultCatalog, ExtractionCatalog } from "./catalog";
import { checkAccountCollision, checkLinkCollision, CollisionVerdict } from "./collision";
import { DropTally } from "./dropTally";
import { normalizeValue } from "./normalizer";
import { scanType } from "./scanner";
import { validateEntity } from "./validator";
import { emptyIntelligence, EntityType, ExtractedIntelligence, RawCandidate } from "../utils/types";

export type ExtractOptions = {
  catalog?: ExtractionCatalog;
  tally?: DropTally;
};

/** Joins message texts the same way for every caller so that spans never run across messages. */
export function joinMessages(texts: string[]): string {
  return texts.filter((t) => typeof t === "string" && t.trim().length > 0).join(" \n ");
}

function collect(
  text: string,
  type: EntityType,
  catalog: ExtractionCatalog,
  tally: DropTally | undefined,
  guard?: (value: string, candidate: RawCandidate) => CollisionVerdict
): string[] {
  const accepted = new Set<string>();
  for (const candidate of scanType(text, type, catalog)) {
    const value = normalizeValue(type, candidate.value, catalog);
    const verdict = validateEntity(type, value, catalog);
    if (!verdict.ok) {
      tally?.record(type, "pattern", verdict.reason || "invalid");
      continue;
    }
    const collision = guard ? guard(value, candidate) : undefined;
    if (collision?.collides) {
      tally?.record(type, "pattern", collision.reason || "collision");
      continue;
    }
    accepted.add(value);
  }
  return Array.from(accepted);
}

/**
 * Pattern-derived intelligence for one block of adversary text.
 * Phones are taken before bank accounts; the account pass excludes them.
 */
export function extractIntelligence(
  input: string | string[],
  options: ExtractOptions = {}
): ExtractedIntelligence {
  const result = emptyIntelligence();
  const text = Array.isArray(input) ? joinMessages(input) : typeof input === "string" ? input : "";
  if (text.trim().length === 0) return result;

  const catalog = options.catalog ?? defaultCatalog;
  const tally = options.tally;

  result.phoneNumbers = collect(text, "phoneNumbers", catalog, tally);
  const phones = new Set(result.phoneNumbers);

  result.bankAccounts = collect(text, "bankAccounts", catalog, tally, (value) =>
    checkAccountCollision(value, phones)
  );
  result.upiIds = collect(text, "upiIds", catalog, tally);
  result.phishingLinks = collect(text, "phishingLinks", catalog, tally, (_value, candidate) =>
    checkLinkCollision(text, candidate)
  );
  result.emails = collect(text, "emails", catalog, tally);
  result.beneficiaryNames = collect(text, "beneficiaryNames", catalog, tally);
  result.bankNames = collect(text, "bankNames", catalog, tally);
  result.ifscCodes = collect(text, "ifscCodes", catalog, tally);
  result.whatsappNumbers = collect(text, "whatsappNumbers", catalog, tally);

  return result;
}
