import { GoogleGenerativeAI } from "@google/generative-ai";
import { logTagged } from "../../utils/logging";

export type ModelProducerOptions = {
  apiKey: string;
  model?: string;
  fallbackModel?: string;
  timeoutMs?: number;
};

const DEFAULT_GEMINI_MODEL = "gemini-2.0-flash";
const FALLBACK_GEMINI_MODEL = "gemini-1.5-flash";
const DEFAULT_TIMEOUT_MS = 4000;

export function buildExtractionPrompt(text: string): string {
  return [
    "You read messages written by a suspected fraudster and list the identifiers they reveal.",
    "Only list values that literally appear in the messages. Do not invent or complete values.",
    "Return JSON only with these keys, each a list of strings:",
    "bankAccounts, upiIds, phoneNumbers, phishingLinks, emails, beneficiaryNames, bankNames, ifscCodes, whatsappNumbers.",
    "Anything else worth reporting goes in other_critical_info as [{\"label\":\"...\",\"value\":\"...\"}].",
    "Use empty lists when nothing is present.",
    `messages:\n${text}`
  ].join("\n");
}

/** First `{` to last `}` of a reply, parsed; anything unparseable is `null`. */
export function extractJson(text: string): unknown {
  if (!text) return null;
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end === -1 || end <= start) return null;
  const slice = text.slice(start, end + 1);
  try {
    const parsed: unknown = JSON.parse(slice);
    return parsed;
  } catch {
    return null;
  }
}

async function callModel(client: GoogleGenerativeAI, modelName: string, text: string): Promise<unknown> {
  const model = client.getGenerativeModel({
    model: modelName,
    generationConfig: { responseMimeType: "application/json", temperature: 0 }
  });
  const result = await model.generateContent(buildExtractionPrompt(text));
  return extractJson(result.response.text());
}

function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error("Gemini timeout")), timeoutMs);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Asks Gemini for a candidate map, primary model first then the fallback.
 * Resolves to the parsed object, or `null` when there is no key or every model failed.
 */
export async function fetchModelCandidates(text: string, options: ModelProducerOptions): Promise<unknown> {
  if (!options.apiKey || !text.trim()) return null;
  const primary = options.model || DEFAULT_GEMINI_MODEL;
  const fallback = options.fallbackModel || FALLBACK_GEMINI_MODEL;
  const models = [primary, fallback].filter((m, idx, arr) => arr.indexOf(m) === idx);
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const client = new GoogleGenerativeAI(options.apiKey);
  for (const model of models) {
    try {
      const parsed = await withTimeout(callModel(client, model, text), timeoutMs);
      if (parsed !== null) return parsed;
      logTagged("MODEL", `${model} returned no JSON`);
    } catch (err) {
      logTagged("MODEL", `${model} failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  return null;
}
