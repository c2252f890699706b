import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { hydrateEntry, IntelligenceStore, SessionEntry } from "./sessionStore";

type SessionRow = {
  session_id: string;
  intelligence: unknown;
  callback_sent: boolean | null;
  updated_at: string | null;
};

export function createSupabaseClient(url: string, key: string): SupabaseClient | null {
  if (!url || !key) return null;
  return createClient(url, key, { auth: { persistSession: false } });
}

/** One row per session, upserted on `session_id`. */
export class SupabaseIntelligenceStore implements IntelligenceStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string = "intelligence_sessions"
  ) {}

  async get(sessionId: string): Promise<SessionEntry | null> {
    const { data, error } = await this.client
      .from(this.table)
      .select("session_id, intelligence, callback_sent, updated_at")
      .eq("session_id", sessionId)
      .maybeSingle<SessionRow>();
    if (error) {
      throw new Error(`Supabase read failed: ${error.message}`);
    }
    if (!data) return null;
    return hydrateEntry({
      sessionId: data.session_id,
      intelligence: data.intelligence,
      callbackSent: data.callback_sent,
      updatedAt: data.updated_at
    });
  }

  async save(entry: SessionEntry): Promise<void> {
    const { error } = await this.client.from(this.table).upsert(
      {
        session_id: entry.sessionId,
        intelligence: entry.intelligence,
        callback_sent: entry.callbackSent,
        updated_at: entry.updatedAt
      },
      { onConflict: "session_id" }
    );
    if (error) {
      throw new Error(`Supabase write failed: ${error.message}`);
    }
  }
}
