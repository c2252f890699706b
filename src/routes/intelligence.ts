import { Router, Request, Response, NextFunction } from "express";
import { ExtractionCatalog, defaultCatalog } from "../core/catalog";
import { CallbackResult, FinalCallbackPayload } from "../core/callback";
import {
  checkCompleteness,
  DEFAULT_HIGH_VALUE_TYPES,
  hasIntelligence,
  intelligenceCounts
} from "../core/completeness";
import { DropTally } from "../core/dropTally";
import { KeyedQueue } from "../core/keyedQueue";
import { extractIntelligence, joinMessages } from "../core/extractor";
import { mergeAll, newFindings } from "../core/merge";
import { coerceModelCandidates } from "../core/modelAdapter";
import { runPipeline } from "../core/pipeline";
import { IntelligenceStore, SessionEntry } from "../core/sessionStore";
import { logDrops, logExtraction, logTagged, sanitizeHeaders } from "../utils/logging";
import {
  ErrorResponse,
  ExtractionResponse,
  makeErrorResponse,
  makeExtractionResponse,
  nowIso,
  SessionResponse
} from "../utils/responseSchema";
import { EntityType, ExtractedIntelligence } from "../utils/types";

export type ExtractionDeps = {
  store: IntelligenceStore;
  catalog?: ExtractionCatalog;
  highValueTypes?: readonly EntityType[];
  callbackUrl?: string;
  produceCandidates?: (text: string) => Promise<unknown>;
  sendCallback?: (url: string, payload: FinalCallbackPayload) => Promise<CallbackResult>;
};

export type HandlerResult<T> = {
  status: number;
  body: T;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Scammer-authored texts: history entries from `scammer`, then the current message unless another party sent it. */
export function collectScammerTexts(body: Record<string, unknown>): string[] {
  const texts: string[] = [];
  const history = Array.isArray(body.conversationHistory) ? body.conversationHistory : [];
  for (const item of history) {
    if (isRecord(item) && item.sender === "scammer" && typeof item.text === "string") {
      texts.push(item.text);
    }
  }

  const message = body.message;
  if (typeof message === "string") {
    texts.push(message);
  } else if (isRecord(message)) {
    const fromScammer = message.sender === undefined || message.sender === "scammer";
    if (fromScammer && typeof message.text === "string") texts.push(message.text);
  } else if (typeof body.text === "string") {
    texts.push(body.text);
  }
  return texts;
}

export function describeIntelligence(record: ExtractedIntelligence): string {
  const parts = Object.entries(intelligenceCounts(record))
    .filter(([, count]) => count > 0)
    .map(([key, count]) => `${key}=${count}`);
  return parts.length > 0 ? parts.join(", ") : "none";
}

async function readStored(store: IntelligenceStore, sessionId: string): Promise<SessionEntry | null> {
  try {
    return await store.get(sessionId);
  } catch (err) {
    logTagged("STORE", `read failed for ${sessionId}: ${errorMessage(err)}`);
    return null;
  }
}

async function writeStored(store: IntelligenceStore, entry: SessionEntry): Promise<void> {
  try {
    await store.save(entry);
  } catch (err) {
    logTagged("STORE", `write failed for ${entry.sessionId}: ${errorMessage(err)}`);
  }
}

async function produceCandidates(deps: ExtractionDeps, text: string): Promise<unknown> {
  if (!deps.produceCandidates || !text) return null;
  try {
    return await deps.produceCandidates(text);
  } catch (err) {
    logTagged("MODEL", `producer failed: ${errorMessage(err)}`);
    return null;
  }
}

const sessionQueues = new WeakMap<IntelligenceStore, KeyedQueue>();

/** Turns of one session are applied one after another against the same store. */
function queueFor(store: IntelligenceStore): KeyedQueue {
  let queue = sessionQueues.get(store);
  if (!queue) {
    queue = new KeyedQueue();
    sessionQueues.set(store, queue);
  }
  return queue;
}

export async function handleExtraction(
  body: unknown,
  deps: ExtractionDeps
): Promise<HandlerResult<ExtractionResponse | ErrorResponse>> {
  if (!isRecord(body)) {
    return { status: 400, body: makeErrorResponse("Request body must be a JSON object") };
  }

  const sessionId =
    typeof body.sessionId === "string" && body.sessionId.trim() ? body.sessionId.trim() : `sess-${Date.now()}`;
  return queueFor(deps.store).run(sessionId, () => extractTurn(sessionId, body, deps));
}

async function extractTurn(
  sessionId: string,
  body: Record<string, unknown>,
  deps: ExtractionDeps
): Promise<HandlerResult<ExtractionResponse>> {
  const catalog = deps.catalog ?? defaultCatalog;
  const highValueTypes = deps.highValueTypes ?? DEFAULT_HIGH_VALUE_TYPES;
  const text = joinMessages(collectScammerTexts(body));
  const tally = new DropTally();

  const stored = await readStored(deps.store, sessionId);
  const supplied = coerceModelCandidates(body.priorIntelligence, { tally, origin: "prior" });
  const prior = mergeAll([stored?.intelligence, supplied], catalog);
  const modelCandidates =
    body.modelCandidates !== undefined ? body.modelCandidates : await produceCandidates(deps, text);

  let record: ExtractedIntelligence;
  try {
    record = runPipeline({ text, modelCandidates, prior, catalog, tally });
  } catch (err) {
    logTagged("EXTRACT", `${sessionId} pipeline failed, pattern-only fallback: ${errorMessage(err)}`);
    record = extractIntelligence(text, { catalog });
  }
  if (hasIntelligence(record)) {
    logExtraction(sessionId, record);
    const fresh = newFindings(prior, record);
    if (Object.keys(fresh).length > 0) logTagged("EXTRACT", `${sessionId} new:`, fresh, 1000);
  } else {
    logTagged("EXTRACT", `${sessionId} nothing found`);
  }
  logDrops(sessionId, tally.snapshot(), tally.total());

  const completeness = checkCompleteness(record, highValueTypes);
  let callbackSent = stored?.callbackSent ?? false;
  if (completeness.complete && !callbackSent && deps.callbackUrl && deps.sendCallback) {
    const result = await deps.sendCallback(deps.callbackUrl, {
      sessionId,
      extractedIntelligence: record,
      agentNotes: `complete: ${describeIntelligence(record)}`
    });
    callbackSent = result.ok;
  }

  await writeStored(deps.store, { sessionId, intelligence: record, callbackSent, updatedAt: nowIso() });

  return {
    status: 200,
    body: makeExtractionResponse({
      sessionId,
      extractedIntelligence: record,
      completeness,
      droppedCandidates: tally.snapshot()
    })
  };
}

export async function handleSessionLookup(
  sessionId: string,
  store: IntelligenceStore
): Promise<HandlerResult<SessionResponse | ErrorResponse>> {
  const entry = await store.get(sessionId);
  if (!entry) {
    return { status: 404, body: makeErrorResponse("Session not found") };
  }
  return {
    status: 200,
    body: {
      status: "success",
      sessionId: entry.sessionId,
      extractedIntelligence: entry.intelligence,
      callbackSent: entry.callbackSent,
      updatedAt: entry.updatedAt
    }
  };
}

function logOutgoing(status: number, responseJson: unknown) {
  logTagged("OUTGOING", `status: ${status} response_json:`, responseJson, 5000);
}

export function requireApiKey(expectedKey: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const apiKey = req.header("x-api-key");
    if (expectedKey && (!apiKey || apiKey !== expectedKey)) {
      const responseJson = makeErrorResponse("Invalid API key");
      logOutgoing(401, responseJson);
      return res.status(401).json(responseJson);
    }
    return next();
  };
}

export function createIntelligenceRouter(deps: ExtractionDeps, apiKey: string = ""): Router {
  const router = Router();
  router.use("/intelligence", requireApiKey(apiKey));

  router.post("/intelligence", async (req: Request, res: Response) => {
    const body: unknown = req.body;
    logTagged("INCOMING", "headers:", sanitizeHeaders(req.headers));
    logTagged("INCOMING", "body:", body);
    try {
      const result = await handleExtraction(body, deps);
      logOutgoing(result.status, result.body);
      return res.status(result.status).json(result.body);
    } catch (err) {
      logTagged("OUTGOING", `extraction failed: ${errorMessage(err)}`);
      const responseJson = makeErrorResponse("Extraction failed");
      return res.status(500).json(responseJson);
    }
  });

  router.get("/intelligence/:sessionId", async (req: Request, res: Response) => {
    try {
      const result = await handleSessionLookup(req.params.sessionId, deps.store);
      logOutgoing(result.status, result.body);
      return res.status(result.status).json(result.body);
    } catch (err) {
      logTagged("STORE", `lookup failed: ${errorMessage(err)}`);
      return res.status(500).json(makeErrorResponse("Session lookup failed"));
    }
  });

  return router;
}
