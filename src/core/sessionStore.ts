import fs from "fs";
import path from "path";
import { coerceModelCandidates } from "./modelAdapter";
import { emptyIntelligence, ExtractedIntelligence } from "../utils/types";

export type SessionEntry = {
  sessionId: string;
  intelligence: ExtractedIntelligence;
  callbackSent: boolean;
  updatedAt: string;
};

export interface IntelligenceStore {
  get(sessionId: string): Promise<SessionEntry | null>;
  save(entry: SessionEntry): Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Rebuilds an entry from stored JSON; missing or malformed fields fall back to defaults. */
export function hydrateEntry(raw: unknown): SessionEntry | null {
  if (!isRecord(raw)) return null;
  const sessionId = typeof raw.sessionId === "string" ? raw.sessionId : "";
  if (!sessionId) return null;
  return {
    sessionId,
    intelligence: coerceModelCandidates(raw.intelligence) ?? emptyIntelligence(),
    callbackSent: raw.callbackSent === true,
    updatedAt: typeof raw.updatedAt === "string" ? raw.updatedAt : new Date(0).toISOString()
  };
}

export type MemoryStoreOptions = {
  persistFile?: string | null;
};

export class MemoryIntelligenceStore implements IntelligenceStore {
  private sessions = new Map<string, SessionEntry>();
  private persistFile: string | null;

  constructor(options: MemoryStoreOptions = {}) {
    this.persistFile = options.persistFile ? path.resolve(options.persistFile) : null;
    if (this.persistFile) {
      this.loadFromFile();
    }
  }

  private loadFromFile(): void {
    if (!this.persistFile) return;
    if (!fs.existsSync(this.persistFile)) return;
    const raw = fs.readFileSync(this.persistFile, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) return;
    for (const item of parsed) {
      const entry = hydrateEntry(item);
      if (entry) this.sessions.set(entry.sessionId, entry);
    }
  }

  private saveToFile(): void {
    if (!this.persistFile) return;
    const payload = Array.from(this.sessions.values());
    fs.writeFileSync(this.persistFile, JSON.stringify(payload, null, 2));
  }

  async get(sessionId: string): Promise<SessionEntry | null> {
    return this.sessions.get(sessionId) ?? null;
  }

  async save(entry: SessionEntry): Promise<void> {
    this.sessions.set(entry.sessionId, entry);
    this.saveToFile();
  }

  size(): number {
    return this.sessions.size;
  }
}
