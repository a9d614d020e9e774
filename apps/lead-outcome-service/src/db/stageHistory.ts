import { SupabaseClient } from "@supabase/supabase-js";
import { NotFoundError, StageConflictError } from "../errors";
import { outcomeStageSchema, stageHistoryRowSchema } from "./rows";
import { StageHistoryStore } from "./types";

const TABLE = "lead_outcome_stages";

// Postgres error codes raised by transition_outcome_stage()
const LEAD_NOT_FOUND = "P0002";
const STAGE_CONFLICT = "40001";

export function createSupabaseStageHistoryStore(supabase: SupabaseClient): StageHistoryStore {
  return {
    /**
     * Runs as one transaction inside Postgres: the lead row is locked
     * (SELECT ... FOR UPDATE) before the expected stage is checked, so two
     * writers for the same lead cannot both close the same open record.
     */
    async applyTransition(write) {
      const { data, error } = await supabase.rpc("transition_outcome_stage", {
        p_lead_id: write.leadId,
        p_expected_stage: write.expectedStage,
        p_new_stage: write.newStage,
        p_reason: write.reason,
        p_triggered_by: write.triggeredBy,
        p_notes: write.notes,
        p_metadata: write.metadata,
        p_at: write.at,
      });

      if (error) {
        if (error.code === LEAD_NOT_FOUND) {
          throw new NotFoundError("Lead", write.leadId);
        }
        if (error.code === STAGE_CONFLICT) {
          // The function reports the stage it found in the hint
          const actual = outcomeStageSchema.nullable().catch(null).parse(error.hint || null);
          throw new StageConflictError(write.leadId, write.expectedStage, actual);
        }
        console.error("[stageHistory] Transition error:", error.message);
        throw new Error(`Failed to transition stage: ${error.message}`);
      }

      return stageHistoryRowSchema.parse(data);
    },

    async getOpenRecord(leadId) {
      const { data, error } = await supabase
        .from(TABLE)
        .select("*")
        .eq("lead_id", leadId)
        .is("exited_at", null)
        .maybeSingle();

      if (error) {
        throw new Error(`Failed to get open stage record: ${error.message}`);
      }

      return data ? stageHistoryRowSchema.parse(data) : null;
    },

    async listForLead(leadId) {
      const { data, error } = await supabase
        .from(TABLE)
        .select("*")
        .eq("lead_id", leadId)
        .order("entered_at", { ascending: true });

      if (error) {
        throw new Error(`Failed to get stage history: ${error.message}`);
      }

      return stageHistoryRowSchema.array().parse(data ?? []);
    },
  };
}
