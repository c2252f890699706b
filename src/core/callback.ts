import axios from "axios";
import { logTagged } from "../utils/logging";
import { ExtractedIntelligence } from "../utils/types";

export type FinalCallbackPayload = {
  sessionId: string;
  extractedIntelligence: ExtractedIntelligence;
  agentNotes: string;
};

export type CallbackResult = { ok: boolean; status?: number; attempts: number };

export type CallbackOptions = {
  attempts?: number;
  timeoutMs?: number;
};

function statusOf(err: unknown): number | undefined {
  return axios.isAxiosError(err) ? err.response?.status : undefined;
}

export async function sendFinalCallback(
  url: string,
  payload: FinalCallbackPayload,
  options: CallbackOptions = {}
): Promise<CallbackResult> {
  const maxAttempts = options.attempts ?? 3;
  const timeout = options.timeoutMs ?? 5000;
  let attempts = 0;
  let lastStatus: number | undefined;
  while (attempts < maxAttempts) {
    attempts += 1;
    try {
      const response = await axios.post(url, payload, { timeout });
      logTagged("CALLBACK", `${payload.sessionId} delivered status=${response.status} attempt=${attempts}`);
      return { ok: true, status: response.status, attempts };
    } catch (err) {
      lastStatus = statusOf(err);
      logTagged(
        "CALLBACK",
        `${payload.sessionId} attempt=${attempts} failed: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }
  return { ok: false, status: lastStatus, attempts };
}
