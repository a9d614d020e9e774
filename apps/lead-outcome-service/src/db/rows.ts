import { z } from "zod";
import {
  NOTIFICATION_TYPES,
  OUTCOME_STAGES,
  REPLY_CLASSIFICATIONS,
  STAGE_CHANGE_REASONS,
} from "../types/outcomes";

/**
 * Row schemas for data read back from Supabase.
 * Unknown columns are stripped; a row that does not match is a schema drift
 * and fails loudly.
 */

export const outcomeStageSchema = z.enum(OUTCOME_STAGES);
export const replyClassificationSchema = z.enum(REPLY_CLASSIFICATIONS);

const jsonObject = z.record(z.unknown());

export const LEAD_COLUMNS =
  "id, first_name, last_name, email, company_name, industry, score_value, current_outcome_stage, outcome_stage_entered_at";

export const leadRowSchema = z.object({
  id: z.string(),
  first_name: z.string().nullable(),
  last_name: z.string().nullable(),
  email: z.string().nullable(),
  company_name: z.string().nullable(),
  industry: z.string().nullable(),
  score_value: z.number().nullable(),
  current_outcome_stage: outcomeStageSchema.nullable(),
  outcome_stage_entered_at: z.string().nullable(),
});

export const stageHistoryRowSchema = z.object({
  id: z.string(),
  lead_id: z.string(),
  stage: outcomeStageSchema,
  previous_stage: outcomeStageSchema.nullable(),
  reason: z.enum(STAGE_CHANGE_REASONS),
  triggered_by: z.string().nullable(),
  notes: z.string().nullable(),
  metadata: jsonObject.nullable(),
  entered_at: z.string(),
  exited_at: z.string().nullable(),
});

export const classificationRowSchema = z.object({
  id: z.string(),
  lead_id: z.string(),
  reply_body: z.string(),
  classification: replyClassificationSchema,
  confidence: z.number(),
  reasoning: z.string(),
  extracted_dates: z.array(z.string()),
  is_auto_reply: z.boolean(),
  overridden_by: z.string().nullable(),
  overridden_classification: replyClassificationSchema.nullable(),
  overridden_at: z.string().nullable(),
  created_at: z.string(),
});

export const scoringConfigRowSchema = z.object({
  id: z.string(),
  weights: z.record(z.number()),
  thresholds: z.object({ hot: z.number(), warm: z.number() }),
  updated_by: z.string(),
  updated_at: z.string(),
});

export const notificationRowSchema = z.object({
  id: z.string(),
  lead_id: z.string(),
  type: z.enum(NOTIFICATION_TYPES),
  title: z.string(),
  body: z.string(),
  metadata: jsonObject,
  is_read: z.boolean(),
  created_at: z.string(),
});
