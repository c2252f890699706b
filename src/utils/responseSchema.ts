import { CompletenessReport } from "../core/completeness";
import { DropCounts } from "../core/dropTally";
import { emptyIntelligence, EntityType, ExtractedIntelligence } from "./types";

export type ExtractionResponse = {
  status: "success";
  sessionId: string;
  extractedIntelligence: ExtractedIntelligence;
  completeness: CompletenessReport;
  droppedCandidates: DropCounts;
};

export type SessionResponse = {
  status: "success";
  sessionId: string;
  extractedIntelligence: ExtractedIntelligence;
  callbackSent: boolean;
  updatedAt: string;
};

export type ErrorResponse = {
  status: "error";
  error: string;
};

export function nowIso(): string {
  return new Date().toISOString();
}

export function makeExtractionResponse(args: Partial<ExtractionResponse> & { sessionId: string }): ExtractionResponse {
  const missing: EntityType[] = [];
  return {
    status: "success",
    extractedIntelligence: emptyIntelligence(),
    completeness: { complete: false, missing },
    droppedCandidates: {},
    ...args
  };
}

export function makeErrorResponse(error: string): ErrorResponse {
  return { status: "error", error };
}
