import { defaultCatalog, ExtractionCatalog } from "./catalog";
import { normalizeValue } from "./normalizer";
import {
  emptyIntelligence,
  ENTITY_TYPES,
  EntityType,
  ExtractedIntelligence,
  OtherCriticalItem
} from "../utils/types";

function uniqueMerge(
  type: EntityType,
  base: string[],
  next: string[],
  catalog: ExtractionCatalog
): string[] {
  const set = new Set<string>();
  for (const item of [...base, ...next]) {
    const value = normalizeValue(type, item, catalog);
    if (value) set.add(value);
  }
  return Array.from(set);
}

function otherKey(item: OtherCriticalItem): string {
  return JSON.stringify([item.label, item.value]);
}

export function mergeOtherItems(base: OtherCriticalItem[], next: OtherCriticalItem[]): OtherCriticalItem[] {
  const seen = new Set<string>();
  const out: OtherCriticalItem[] = [];
  for (const item of [...base, ...next]) {
    const key = otherKey(item);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push({ label: item.label, value: item.value });
  }
  return out;
}

/**
 * Union of two records. Nothing is ever removed, so re-merging accumulated
 * intelligence turn after turn cannot lose an earlier finding.
 */
export function mergeIntelligence(
  existing: ExtractedIntelligence,
  incoming: ExtractedIntelligence,
  catalog: ExtractionCatalog = defaultCatalog
): ExtractedIntelligence {
  const merged = emptyIntelligence();
  for (const type of ENTITY_TYPES) {
    merged[type] = uniqueMerge(type, existing[type], incoming[type], catalog);
  }
  merged.other_critical_info = mergeOtherItems(existing.other_critical_info, incoming.other_critical_info);
  return merged;
}

export function mergeAll(
  records: Array<ExtractedIntelligence | null | undefined>,
  catalog: ExtractionCatalog = defaultCatalog
): ExtractedIntelligence {
  let merged = emptyIntelligence();
  for (const record of records) {
    if (record) merged = mergeIntelligence(merged, record, catalog);
  }
  return merged;
}

/** Set equality per fixed type and over other items; list order is ignored. */
export function sameIntelligence(a: ExtractedIntelligence, b: ExtractedIntelligence): boolean {
  const sameSet = (x: string[], y: string[]) => {
    const sx = new Set(x);
    const sy = new Set(y);
    return sx.size === sy.size && Array.from(sx).every((v) => sy.has(v));
  };
  if (!ENTITY_TYPES.every((type) => sameSet(a[type], b[type]))) return false;
  return sameSet(a.other_critical_info.map(otherKey), b.other_critical_info.map(otherKey));
}

/** Values present in `next` but not in `prior`, per fixed type. */
export function newFindings(prior: ExtractedIntelligence, next: ExtractedIntelligence): Partial<Record<EntityType, string[]>> {
  const out: Partial<Record<EntityType, string[]>> = {};
  for (const type of ENTITY_TYPES) {
    const known = new Set(prior[type]);
    const fresh = next[type].filter((v) => !known.has(v));
    if (fresh.length > 0) out[type] = fresh;
  }
  return out;
}
