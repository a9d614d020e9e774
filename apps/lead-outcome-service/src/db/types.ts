import {
  ActivityType,
  ClassificationInsert,
  ClassificationOverride,
  ClassificationRecord,
  Lead,
  Notification,
  NotificationInsert,
  OutcomeStage,
  ScoringConfig,
  ScoringConfigInsert,
  StageHistoryRecord,
  StageTransitionWrite,
} from "../types/outcomes";

/**
 * Storage contracts the outcome services depend on.
 * Implemented by the Supabase stores and by the in-memory client.
 */

export interface LeadStore {
  getById(leadId: string): Promise<Lead | null>;
  /** Case-insensitive email lookup */
  findByEmail(email: string): Promise<Lead | null>;
  /** Leads currently in `stage` that entered it at or before `enteredBefore` */
  findStaleInStage(stage: OutcomeStage, enteredBefore: string): Promise<Lead[]>;
}

export interface StageHistoryStore {
  /**
   * Close the open record, insert the new one and update the lead, as one
   * unit. Throws StageConflictError when the lead's stage is no longer
   * `write.expectedStage`, NotFoundError when the lead does not exist.
   */
  applyTransition(write: StageTransitionWrite): Promise<StageHistoryRecord>;
  getOpenRecord(leadId: string): Promise<StageHistoryRecord | null>;
  /** Oldest first */
  listForLead(leadId: string): Promise<StageHistoryRecord[]>;
}

export interface ClassificationStore {
  create(insert: ClassificationInsert): Promise<ClassificationRecord>;
  getById(classificationId: string): Promise<ClassificationRecord | null>;
  /** Newest first */
  listForLead(leadId: string): Promise<ClassificationRecord[]>;
  /** Returns null when the record does not exist */
  applyOverride(
    classificationId: string,
    override: ClassificationOverride
  ): Promise<ClassificationRecord | null>;
}

export interface ScoringConfigStore {
  create(insert: ScoringConfigInsert): Promise<ScoringConfig>;
  getLatest(): Promise<ScoringConfig | null>;
  /** Newest first */
  listRecent(limit: number): Promise<ScoringConfig[]>;
}

export interface ActivityLog {
  logActivity(leadId: string, type: ActivityType, payload: Record<string, unknown>): Promise<void>;
}

export interface NotificationStore {
  create(insert: NotificationInsert): Promise<Notification>;
}

export interface OutcomeStores {
  leads: LeadStore;
  stageHistory: StageHistoryStore;
  classifications: ClassificationStore;
  scoringConfigs: ScoringConfigStore;
  activityLog: ActivityLog;
  notifications: NotificationStore;
}
