import type { IncomingHttpHeaders } from "http";
import { intelligenceCounts } from "../core/completeness";
import { DropCounts } from "../core/dropTally";
import { ExtractedIntelligence } from "./types";

export type LogTag = "INCOMING" | "OUTGOING" | "EXTRACT" | "DROPPED" | "MODEL" | "CALLBACK" | "STORE" | "SERVER";

const MASK = "*";
const SECRET_HEADERS = new Set(["x-api-key", "authorization"]);

/** Account and phone numbers never reach the console whole: runs of 3+ digits keep their last two. */
export function maskDigits(input: string): string {
  return input.replace(/\d{3,}/g, (run) => run.slice(-2).padStart(run.length, MASK));
}

export function maskApiKey(value?: string): string {
  if (!value) return "missing";
  if (value.length <= 4) return MASK.repeat(value.length);
  return value.slice(-4).padStart(value.length, MASK);
}

export function sanitizeHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const output: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const key = name.toLowerCase();
    const joined = Array.isArray(value) ? value.join(",") : value;
    output[key] = SECRET_HEADERS.has(key) ? maskApiKey(joined) : joined;
  }
  return output;
}

function toLogText(value: unknown): string {
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // cyclic or BigInt-bearing values
    return String(value);
  }
}

export function safeStringify(value: unknown, maxLen: number): string {
  const text = maskDigits(toLogText(value));
  return text.length > maxLen ? `${text.slice(0, maxLen)}...(truncated)` : text;
}

export function safeLog(message: string): void {
  try {
    console.info(message);
  } catch {
    // a closed stdout must not fail the request
  }
}

/** `[TAG] message detail`, the detail digit-masked and truncated. */
export function logTagged(tag: LogTag, message: string, detail?: unknown, maxLen = 2000): void {
  const suffix = detail === undefined ? "" : ` ${safeStringify(detail, maxLen)}`;
  safeLog(`[${tag}] ${message}${suffix}`);
}

export function logExtraction(sessionId: string, record: ExtractedIntelligence): void {
  logTagged("EXTRACT", `${sessionId} counts:`, intelligenceCounts(record), 500);
}

export function logDrops(sessionId: string, drops: DropCounts, total: number): void {
  if (total === 0) return;
  logTagged("DROPPED", `${sessionId} total=${total}`, drops, 1000);
}
