import express, { Express } from "express";
import dotenv from "dotenv";
import cors from "cors";
import { buildCatalog } from "./core/catalog";
import { sendFinalCallback } from "./core/callback";
import { fetchModelCandidates } from "./core/providers/geminiClient";
import { IntelligenceStore, MemoryIntelligenceStore } from "./core/sessionStore";
import { createSupabaseClient, SupabaseIntelligenceStore } from "./core/supabase";
import { createIntelligenceRouter, ExtractionDeps } from "./routes/intelligence";
import { AppConfig, loadConfig } from "./utils/config";
import { logTagged } from "./utils/logging";

export function createStore(config: AppConfig): IntelligenceStore {
  const client = createSupabaseClient(config.supabaseUrl, config.supabaseKey);
  if (client) {
    logTagged("STORE", `using Supabase table ${config.supabaseTable}`);
    return new SupabaseIntelligenceStore(client, config.supabaseTable);
  }
  logTagged("STORE", `using in-memory store${config.sessionPersist ? ` persisted to ${config.sessionsFile}` : ""}`);
  return new MemoryIntelligenceStore({ persistFile: config.sessionPersist ? config.sessionsFile : null });
}

export function buildDeps(config: AppConfig): ExtractionDeps {
  return {
    store: createStore(config),
    catalog: buildCatalog({ extraUpiProviders: config.extraUpiProviders }),
    highValueTypes: config.highValueTypes,
    callbackUrl: config.callbackUrl,
    produceCandidates: config.geminiApiKey
      ? (text) =>
          fetchModelCandidates(text, {
            apiKey: config.geminiApiKey,
            model: config.geminiModel,
            fallbackModel: config.geminiFallbackModel,
            timeoutMs: config.modelTimeoutMs
          })
      : undefined,
    sendCallback: (url, payload) => sendFinalCallback(url, payload)
  };
}

export function createApp(config: AppConfig, deps: ExtractionDeps = buildDeps(config)): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ type: "*/*", limit: "2mb" }));

  app.get("/health", (_req, res) => {
    return res.json({ ok: true });
  });

  app.use("/api", createIntelligenceRouter(deps, config.apiKey));
  return app;
}

if (require.main === module) {
  dotenv.config();
  const config = loadConfig();
  const app = createApp(config);
  app.listen(config.port, () => {
    logTagged("SERVER", `listening on port ${config.port}`);
  });
}
