/**
 * Database module exports
 */
import { createSupabaseActivityLog } from "./activityLog";
import { createSupabaseClassificationStore } from "./classifications";
import { createInMemoryStores } from "./client";
import { createSupabaseLeadStore } from "./leads";
import { createSupabaseNotificationStore } from "./notifications";
import { createSupabaseScoringConfigStore } from "./scoringConfigs";
import { createSupabaseStageHistoryStore } from "./stageHistory";
import { getSupabase } from "./supabase";
import { OutcomeStores } from "./types";

export { getSupabase, isSupabaseConfigured } from "./supabase";
export { InMemoryDatabase, createInMemoryStores } from "./client";
export * from "./types";

/**
 * Supabase-backed stores, or the in-memory client when Supabase is not configured
 */
export function createStores(): OutcomeStores {
  const supabase = getSupabase();

  if (!supabase) {
    console.warn("[db] Supabase not configured, using in-memory store");
    return createInMemoryStores();
  }

  return {
    leads: createSupabaseLeadStore(supabase),
    stageHistory: createSupabaseStageHistoryStore(supabase),
    classifications: createSupabaseClassificationStore(supabase),
    scoringConfigs: createSupabaseScoringConfigStore(supabase),
    activityLog: createSupabaseActivityLog(supabase),
    notifications: createSupabaseNotificationStore(supabase),
  };
}
