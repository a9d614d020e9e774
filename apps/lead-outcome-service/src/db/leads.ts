import { SupabaseClient } from "@supabase/supabase-js";
import { OutcomeStage } from "../types/outcomes";
import { LEAD_COLUMNS, leadRowSchema } from "./rows";
import { NO_ROWS } from "./supabase";
import { LeadStore } from "./types";

const TABLE = "leads";

/**
 * Read-side access to the CRM's leads table.
 * Stage fields are written only by transition_outcome_stage (see stageHistory.ts).
 */
export function createSupabaseLeadStore(supabase: SupabaseClient): LeadStore {
  return {
    async getById(leadId) {
      const { data, error } = await supabase
        .from(TABLE)
        .select(LEAD_COLUMNS)
        .eq("id", leadId)
        .single();

      if (error) {
        if (error.code === NO_ROWS) return null; // Not found
        throw new Error(`Failed to get lead: ${error.message}`);
      }

      return leadRowSchema.parse(data);
    },

    async findByEmail(email) {
      // ilike gives case-insensitive equality once its wildcards are escaped
      const pattern = email.replace(/[\\%_]/g, "\\$&");

      const { data, error } = await supabase
        .from(TABLE)
        .select(LEAD_COLUMNS)
        .ilike("email", pattern)
        .limit(1)
        .maybeSingle();

      if (error) {
        throw new Error(`Failed to find lead by email: ${error.message}`);
      }

      return data ? leadRowSchema.parse(data) : null;
    },

    async findStaleInStage(stage: OutcomeStage, enteredBefore: string) {
      const { data, error } = await supabase
        .from(TABLE)
        .select(LEAD_COLUMNS)
        .eq("current_outcome_stage", stage)
        .lte("outcome_stage_entered_at", enteredBefore)
        .order("outcome_stage_entered_at", { ascending: true });

      if (error) {
        throw new Error(`Failed to list stale leads: ${error.message}`);
      }

      return leadRowSchema.array().parse(data ?? []);
    },
  };
}
