import { parseHighValueTypes } from "../core/completeness";
import { EntityType } from "./types";

export type AppConfig = Readonly<{
  port: number;
  apiKey: string;
  sessionPersist: boolean;
  sessionsFile: string;
  supabaseUrl: string;
  supabaseKey: string;
  supabaseTable: string;
  geminiApiKey: string;
  geminiModel: string;
  geminiFallbackModel: string;
  modelTimeoutMs: number;
  callbackUrl: string;
  highValueTypes: readonly EntityType[];
  extraUpiProviders: readonly string[];
}>;

const DEFAULT_PORT = 3000;
const DEFAULT_MODEL_TIMEOUT_MS = 4000;

function toNumber(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  return raw && Number.isFinite(value) && value > 0 ? value : fallback;
}

function toList(raw: string | undefined): string[] {
  return (raw || "")
    .split(",")
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean);
}

/** Reads settings from the environment; call after `dotenv.config()`. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return Object.freeze({
    port: toNumber(env.PORT, DEFAULT_PORT),
    apiKey: env.API_KEY || "",
    sessionPersist: env.SESSION_PERSIST === "true",
    sessionsFile: env.SESSIONS_FILE || "sessions.json",
    supabaseUrl: env.SUPABASE_URL || "",
    supabaseKey: env.SUPABASE_SERVICE_ROLE_KEY || "",
    supabaseTable: env.SUPABASE_TABLE || "intelligence_sessions",
    geminiApiKey: env.GEMINI_API_KEY || env.GOOGLE_API_KEY || "",
    geminiModel: env.GEMINI_MODEL || "gemini-2.0-flash",
    geminiFallbackModel: env.GEMINI_FALLBACK_MODEL || "gemini-1.5-flash",
    modelTimeoutMs: toNumber(env.MODEL_TIMEOUT_MS, DEFAULT_MODEL_TIMEOUT_MS),
    callbackUrl: env.CALLBACK_URL || "",
    highValueTypes: Object.freeze(parseHighValueTypes(env.HIGH_VALUE_TYPES)),
    extraUpiProviders: Object.freeze(toList(env.EXTRA_UPI_PROVIDERS))
  });
}
