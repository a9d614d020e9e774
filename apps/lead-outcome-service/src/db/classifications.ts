import { SupabaseClient } from "@supabase/supabase-js";
import { classificationRowSchema } from "./rows";
import { NO_ROWS } from "./supabase";
import { ClassificationStore } from "./types";

const TABLE = "reply_classifications";

export function createSupabaseClassificationStore(supabase: SupabaseClient): ClassificationStore {
  return {
    async create(insert) {
      const { data, error } = await supabase
        .from(TABLE)
        .insert(insert)
        .select()
        .single();

      if (error) {
        console.error("[classifications] Insert error:", error.message);
        throw new Error(`Failed to record classification: ${error.message}`);
      }

      return classificationRowSchema.parse(data);
    },

    async getById(classificationId) {
      const { data, error } = await supabase
        .from(TABLE)
        .select("*")
        .eq("id", classificationId)
        .single();

      if (error) {
        if (error.code === NO_ROWS) return null;
        throw new Error(`Failed to get classification: ${error.message}`);
      }

      return classificationRowSchema.parse(data);
    },

    async listForLead(leadId) {
      const { data, error } = await supabase
        .from(TABLE)
        .select("*")
        .eq("lead_id", leadId)
        .order("created_at", { ascending: false });

      if (error) {
        throw new Error(`Failed to list classifications: ${error.message}`);
      }

      return classificationRowSchema.array().parse(data ?? []);
    },

    async applyOverride(classificationId, override) {
      const { data, error } = await supabase
        .from(TABLE)
        .update(override)
        .eq("id", classificationId)
        .select()
        .maybeSingle();

      if (error) {
        throw new Error(`Failed to override classification: ${error.message}`);
      }

      return data ? classificationRowSchema.parse(data) : null;
    },
  };
}
