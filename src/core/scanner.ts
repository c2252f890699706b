import { defaultCatalog, ExtractionCatalog, PatternDef } from "./catalog";
import { EntityType, RawCandidate } from "../utils/types";

type Span = { start: number; end: number };

function blankSpans(text: string, spans: Span[]): string {
  if (spans.length === 0) return text;
  const chars = text.split("");
  for (const span of spans) {
    for (let i = span.start; i < span.end; i += 1) chars[i] = " ";
  }
  return chars.join("");
}

/** A whitespace-delimited token around the span that carries `@`, `/` or an inner dot. */
export function insideHandleOrLink(text: string, start: number, end: number): boolean {
  let s = start;
  while (s > 0 && !/\s/.test(text[s - 1])) s -= 1;
  let e = end;
  while (e < text.length && !/\s/.test(text[e])) e += 1;
  return /@|\/|\.[a-z0-9]/i.test(text.slice(s, e));
}

export function refineName(raw: string, def: PatternDef, catalog: ExtractionCatalog = defaultCatalog): string {
  const kept: string[] = [];
  for (const token of raw.trim().split(/\s+/)) {
    const bare = token.replace(/^['.-]+|['.-]+$/g, "");
    if (!bare) break;
    if (kept.length === 0 && catalog.honorifics.has(bare.toLowerCase())) continue;
    if (catalog.nameStopwords.has(bare.toLowerCase())) break;
    if (def.capitalizedOnly && !/^[A-Z]/.test(bare)) break;
    kept.push(bare);
    // "Rahul." closes the sentence; "K." is an initial
    if (token.endsWith(".") && bare.length > 1) break;
  }
  return kept.join(" ");
}

function applyPattern(
  text: string,
  source: string,
  type: EntityType,
  def: PatternDef,
  catalog: ExtractionCatalog
): RawCandidate[] {
  const out: RawCandidate[] = [];
  for (const m of source.matchAll(def.regex)) {
    const raw = def.group ? m[def.group] : m[0];
    if (!raw || m.index === undefined) continue;
    const span = def.group ? m.indices?.[def.group] : undefined;
    const start = span ? span[0] : m.index;
    const end = span ? span[1] : m.index + raw.length;

    let value = raw;
    if (type === "beneficiaryNames") {
      if (text[end] === "@") continue;
      value = refineName(raw, def, catalog);
      if (!value) continue;
    } else if (type === "bankNames" && insideHandleOrLink(text, start, end)) {
      continue;
    }

    out.push({ type, value, start, end, pattern: def.name });
  }
  return out;
}

/** Runs every pattern of one type over the whole text and unions the hits. */
export function scanType(
  text: string,
  type: EntityType,
  catalog: ExtractionCatalog = defaultCatalog
): RawCandidate[] {
  const defs = catalog.patterns[type];
  const direct: RawCandidate[] = [];
  const deferred: PatternDef[] = [];
  for (const def of defs) {
    if (def.skipInsideLinks) {
      deferred.push(def);
      continue;
    }
    direct.push(...applyPattern(text, text, type, def, catalog));
  }
  if (deferred.length === 0) return direct;

  const masked = blankSpans(text, direct);
  const rest = deferred.flatMap((def) => applyPattern(text, masked, type, def, catalog));
  return [...direct, ...rest];
}
