import { defaultCatalog, ExtractionCatalog } from "./catalog";
import { DropTally } from "./dropTally";
import { extractIntelligence } from "./extractor";
import { mergeAll } from "./merge";
import { adaptModelCandidates, coerceModelCandidates } from "./modelAdapter";
import { ExtractedIntelligence } from "../utils/types";

export type PipelineInput = {
  text: unknown;
  modelCandidates?: unknown;
  prior?: unknown;
  catalog?: ExtractionCatalog;
  tally?: DropTally;
};

/**
 * prior + pattern-bag + model-bag, merged. The prior record passes through the
 * model adapter too, with origin `prior`.
 */
export function runPipeline(input: PipelineInput): ExtractedIntelligence {
  const catalog = input.catalog ?? defaultCatalog;
  const tally = input.tally;
  const text = typeof input.text === "string" ? input.text : "";

  const prior = coerceModelCandidates(input.prior, { tally, origin: "prior" });
  const priorBag = adaptModelCandidates(prior, { catalog, tally, origin: "prior" });
  const patternBag = extractIntelligence(text, { catalog, tally });
  const model = coerceModelCandidates(input.modelCandidates, { tally, origin: "model" });
  const modelBag = adaptModelCandidates(model, { catalog, tally, origin: "model" });

  return mergeAll([priorBag, patternBag, modelBag], catalog);
}
