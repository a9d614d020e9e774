import { SupabaseClient } from "@supabase/supabase-js";
import { ActivityLog } from "./types";

const TABLE_NAME = "activity_logs";

/**
 * Audit sink for lead activity (replies, stage changes, overrides, bookings)
 */
export function createSupabaseActivityLog(supabase: SupabaseClient): ActivityLog {
  return {
    async logActivity(leadId, type, payload) {
      const { error } = await supabase
        .from(TABLE_NAME)
        .insert({ lead_id: leadId, type, payload });

      if (error) {
        console.error("[activityLog] Insert error:", error.message);
        throw new Error(`Failed to log activity: ${error.message}`);
      }
    },
  };
}
