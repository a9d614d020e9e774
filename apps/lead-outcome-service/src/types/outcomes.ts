/**
 * Lead Outcome Types
 * Matches the Supabase/Postgres schema in supabase/migrations
 */

// ============================================================================
// ENUMS (match Postgres check constraints)
// ============================================================================

export const OUTCOME_STAGES = [
  "EMAIL_SENT",
  "RESPONDED",
  "NO_RESPONSE",
  "BOOKED_DEMO",
  "CLOSED_WON",
  "CLOSED_LOST",
  "DISQUALIFIED",
] as const;
export type OutcomeStage = (typeof OUTCOME_STAGES)[number];

export const STAGE_CHANGE_REASONS = ["MANUAL", "AUTOMATIC", "SYSTEM"] as const;
export type StageChangeReason = (typeof STAGE_CHANGE_REASONS)[number];

export const REPLY_CLASSIFICATIONS = [
  "INTERESTED_BOOK_DEMO",
  "NOT_INTERESTED",
  "QUESTION",
  "OUT_OF_OFFICE",
  "UNSUBSCRIBE",
  "UNCLEAR",
] as const;
export type ReplyClassification = (typeof REPLY_CLASSIFICATIONS)[number];

export const ACTIVITY_TYPES = [
  "EMAIL_REPLIED",
  "STATUS_CHANGED",
  "REPLY_CLASSIFIED",
  "CLASSIFICATION_OVERRIDDEN",
  "CALENDLY_LINK_SENT",
  "DEMO_BOOKED",
] as const;
export type ActivityType = (typeof ACTIVITY_TYPES)[number];

export const NOTIFICATION_TYPES = ["reply_classified", "demo_requested"] as const;
export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

// ============================================================================
// DATABASE RECORD TYPES
// ============================================================================

/**
 * Lead aggregate. Owned by the CRM side; this service only writes the two
 * outcome stage fields.
 */
export interface Lead {
  id: string;
  first_name: string | null;
  last_name: string | null;
  email: string | null;
  company_name: string | null;
  industry: string | null;

  /** 0-100, null until the lead has been scored */
  score_value: number | null;

  // Denormalized from the open lead_outcome_stages row
  current_outcome_stage: OutcomeStage | null;
  outcome_stage_entered_at: string | null;
}

export interface StageHistoryRecord {
  id: string;
  lead_id: string;
  stage: OutcomeStage;
  previous_stage: OutcomeStage | null;
  reason: StageChangeReason;
  triggered_by: string | null;
  notes: string | null;
  metadata: Record<string, unknown> | null;
  entered_at: string;
  /** null while this is the lead's current stage */
  exited_at: string | null;
}

export interface ClassificationRecord {
  id: string;
  lead_id: string;
  reply_body: string;
  classification: ReplyClassification;
  confidence: number;
  reasoning: string;
  extracted_dates: string[];
  is_auto_reply: boolean;

  // Human override (original machine output stays in `classification`)
  overridden_by: string | null;
  overridden_classification: ReplyClassification | null;
  overridden_at: string | null;

  created_at: string;
}

export interface ScoringThresholds {
  hot: number;
  warm: number;
}

/**
 * Versioned scoring configuration. Rows are never updated; the most recent
 * row is the active config.
 */
export interface ScoringConfig {
  id: string;
  weights: Record<string, number>;
  thresholds: ScoringThresholds;
  updated_by: string;
  updated_at: string;
}

export interface ActivityLogEntry {
  id: string;
  lead_id: string;
  type: ActivityType;
  payload: Record<string, unknown>;
  created_at: string;
}

export interface Notification {
  id: string;
  lead_id: string;
  type: NotificationType;
  title: string;
  body: string;
  metadata: Record<string, unknown>;
  is_read: boolean;
  created_at: string;
}

// ============================================================================
// INSERT TYPES (for database operations)
// ============================================================================

export type ClassificationInsert = Omit<
  ClassificationRecord,
  "id" | "created_at" | "overridden_by" | "overridden_classification" | "overridden_at"
>;

export interface ClassificationOverride {
  overridden_by: string;
  overridden_classification: ReplyClassification;
  overridden_at: string;
}

export type ScoringConfigInsert = Omit<ScoringConfig, "id" | "updated_at">;

export type NotificationInsert = Omit<Notification, "id" | "is_read" | "created_at">;

/**
 * A single stage change, applied atomically by the history store.
 * `expectedStage` is the stage the caller validated against; the store
 * rejects the write with a StageConflictError if the lead has moved since.
 */
export interface StageTransitionWrite {
  leadId: string;
  expectedStage: OutcomeStage | null;
  newStage: OutcomeStage;
  reason: StageChangeReason;
  triggeredBy: string | null;
  notes: string | null;
  metadata: Record<string, unknown> | null;
  at: string;
}

// ============================================================================
// API CONTRACT TYPES
// ============================================================================

export interface ValidNextStages {
  current_stage: OutcomeStage | null;
  valid_next_stages: OutcomeStage[];
}

export interface InboundReplyResult {
  stage_record: StageHistoryRecord | null;
  classification_id: string;
  classification: ReplyClassification;
  confidence: number;
  reasoning: string;
  extracted_dates: string[];
  /** Human-readable description of what the router did, null if nothing */
  auto_action_taken: string | null;
}
