import { SupabaseClient } from "@supabase/supabase-js";
import { notificationRowSchema } from "./rows";
import { NotificationStore } from "./types";

const TABLE = "notifications";

export function createSupabaseNotificationStore(supabase: SupabaseClient): NotificationStore {
  return {
    async create(insert) {
      const { data, error } = await supabase
        .from(TABLE)
        .insert(insert)
        .select()
        .single();

      if (error) {
        throw new Error(`Failed to create notification: ${error.message}`);
      }

      return notificationRowSchema.parse(data);
    },
  };
}
