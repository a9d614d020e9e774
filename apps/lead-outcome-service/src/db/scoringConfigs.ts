import { SupabaseClient } from "@supabase/supabase-js";
import { scoringConfigRowSchema } from "./rows";
import { ScoringConfigStore } from "./types";

const TABLE = "scoring_configs";

/**
 * Append-only: every config change is a new row, the newest row is active.
 */
export function createSupabaseScoringConfigStore(supabase: SupabaseClient): ScoringConfigStore {
  return {
    async create(insert) {
      const { data, error } = await supabase
        .from(TABLE)
        .insert(insert)
        .select()
        .single();

      if (error) {
        console.error("[scoringConfigs] Insert error:", error.message);
        throw new Error(`Failed to create scoring config: ${error.message}`);
      }

      return scoringConfigRowSchema.parse(data);
    },

    async getLatest() {
      const { data, error } = await supabase
        .from(TABLE)
        .select("*")
        .order("updated_at", { ascending: false })
        .limit(1)
        .maybeSingle();

      if (error) {
        throw new Error(`Failed to get scoring config: ${error.message}`);
      }

      return data ? scoringConfigRowSchema.parse(data) : null;
    },

    async listRecent(limit: number = 20) {
      const { data, error } = await supabase
        .from(TABLE)
        .select("*")
        .order("updated_at", { ascending: false })
        .limit(limit);

      if (error) {
        throw new Error(`Failed to list scoring configs: ${error.message}`);
      }

      return scoringConfigRowSchema.array().parse(data ?? []);
    },
  };
}
