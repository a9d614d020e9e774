import { ActivityLog, LeadStore, StageHistoryStore } from "../db/types";
import { errorMessage, InvalidTransitionError, NotFoundError, StageConflictError } from "../errors";
import {
  Lead,
  OutcomeStage,
  StageChangeReason,
  StageHistoryRecord,
  ValidNextStages,
} from "../types/outcomes";

// ============================================================================
// TRANSITION TABLE
// ============================================================================

export const VALID_TRANSITIONS: Readonly<Record<OutcomeStage, readonly OutcomeStage[]>> = {
  EMAIL_SENT: ["RESPONDED", "NO_RESPONSE", "DISQUALIFIED", "CLOSED_LOST"],
  RESPONDED: ["BOOKED_DEMO", "CLOSED_LOST", "DISQUALIFIED"],
  BOOKED_DEMO: ["CLOSED_WON", "CLOSED_LOST"],
  NO_RESPONSE: ["RESPONDED"],
  CLOSED_WON: [], // terminal
  CLOSED_LOST: ["RESPONDED"], // re-engagement
  DISQUALIFIED: ["RESPONDED"], // re-engagement
};

/**
 * Stages whose entry is fed back into the scoring weights, keyed to the
 * outcome names the weight tuner understands
 */
export const FEEDBACK_OUTCOMES: Partial<Record<OutcomeStage, string>> = {
  CLOSED_WON: "closed_won",
  CLOSED_LOST: "closed_lost",
  DISQUALIFIED: "disqualified",
};

const MAX_CONFLICT_ATTEMPTS = 3;
const DAY_MS = 24 * 60 * 60 * 1000;

export function allowedNextStages(stage: OutcomeStage): OutcomeStage[] {
  return [...VALID_TRANSITIONS[stage]].sort();
}

export function canTransition(from: OutcomeStage, to: OutcomeStage): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

// ============================================================================
// ENGINE
// ============================================================================

/** Receives terminal outcomes; implemented by AdaptiveWeightTuner */
export interface OutcomeFeedbackSink {
  updateFromFeedback(outcome: string, leadScore: number): Promise<unknown>;
}

export interface TransitionOptions {
  reason?: StageChangeReason;
  triggeredBy?: string;
  notes?: string | null;
  metadata?: Record<string, unknown> | null;
  /** Only move the lead if its fresh stage is one of these */
  allowedFrom?: readonly OutcomeStage[];
}

export interface StageTransitionEngineDeps {
  leads: LeadStore;
  stageHistory: StageHistoryStore;
  activityLog: ActivityLog;
  feedback?: OutcomeFeedbackSink | null;
  now?: () => Date;
}

export class StageTransitionEngine {
  private readonly now: () => Date;

  constructor(private readonly deps: StageTransitionEngineDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Validate and execute a stage transition.
   *
   * The stage is validated against a fresh read of the lead and written with
   * that stage as the expected value. If another writer moved the lead in
   * between, the lead is re-read and the transition re-validated.
   */
  async transition(
    leadId: string,
    newStage: OutcomeStage,
    options: TransitionOptions = {}
  ): Promise<StageHistoryRecord> {
    const reason = options.reason ?? "MANUAL";
    const triggeredBy = options.triggeredBy ?? "user";

    for (let attempt = 1; ; attempt++) {
      const lead = await this.requireLead(leadId);
      const current = lead.current_outcome_stage;

      if (current === null) {
        throw new InvalidTransitionError(leadId, null, newStage, []);
      }
      if (!canTransition(current, newStage)) {
        throw new InvalidTransitionError(leadId, current, newStage, allowedNextStages(current));
      }
      if (options.allowedFrom && !options.allowedFrom.includes(current)) {
        throw new InvalidTransitionError(
          leadId,
          current,
          newStage,
          allowedNextStages(current),
          options.allowedFrom
        );
      }

      let record: StageHistoryRecord;
      try {
        record = await this.deps.stageHistory.applyTransition({
          leadId,
          expectedStage: current,
          newStage,
          reason,
          triggeredBy,
          notes: options.notes ?? null,
          metadata: options.metadata ?? null,
          at: this.now().toISOString(),
        });
      } catch (error) {
        if (error instanceof StageConflictError && attempt < MAX_CONFLICT_ATTEMPTS) {
          console.warn(`[stageTransitions] Conflict on lead ${leadId}, retrying`, {
            attempt,
            expected: error.expectedStage,
            actual: error.actualStage,
          });
          continue;
        }
        throw error;
      }

      console.log(`[stageTransitions] Transitioned outcome stage`, {
        lead_id: leadId,
        from_stage: current,
        to_stage: newStage,
        reason,
        triggered_by: triggeredBy,
      });

      try {
        await this.deps.activityLog.logActivity(leadId, "STATUS_CHANGED", {
          outcome_stage_from: current,
          outcome_stage_to: newStage,
          triggered_by: triggeredBy,
          reason,
        });
      } catch (error) {
        console.error(`[stageTransitions] Failed to log stage change`, {
          lead_id: leadId,
          to_stage: newStage,
          error: errorMessage(error),
        });
      }

      await this.feedTerminalOutcome(lead, newStage);

      return record;
    }
  }

  /**
   * Set EMAIL_SENT as the first stage. A lead that already has a stage is
   * left alone and its open record returned.
   */
  async initializeStage(leadId: string): Promise<StageHistoryRecord> {
    const lead = await this.requireLead(leadId);

    if (lead.current_outcome_stage === null) {
      try {
        const record = await this.deps.stageHistory.applyTransition({
          leadId,
          expectedStage: null,
          newStage: "EMAIL_SENT",
          reason: "SYSTEM",
          triggeredBy: "system",
          notes: null,
          metadata: null,
          at: this.now().toISOString(),
        });
        console.log(`[stageTransitions] EMAIL_SENT stage set`, { lead_id: leadId });
        return record;
      } catch (error) {
        // Someone else initialized it first; fall through to their record
        if (!(error instanceof StageConflictError)) throw error;
      }
    } else {
      console.log(`[stageTransitions] Lead already has outcome stage, skipping EMAIL_SENT`, {
        lead_id: leadId,
        current_stage: lead.current_outcome_stage,
      });
    }

    const open = await this.deps.stageHistory.getOpenRecord(leadId);
    if (!open) {
      throw new NotFoundError("Open stage record for lead", leadId);
    }
    return open;
  }

  /**
   * Move leads that sat in EMAIL_SENT for `cutoffDays` or longer to
   * NO_RESPONSE. A lead that fails is logged and skipped.
   */
  async staleSweep(cutoffDays: number): Promise<StageHistoryRecord[]> {
    const cutoff = new Date(this.now().getTime() - cutoffDays * DAY_MS).toISOString();
    const staleLeads = await this.deps.leads.findStaleInStage("EMAIL_SENT", cutoff);
    const results: StageHistoryRecord[] = [];

    for (const lead of staleLeads) {
      try {
        const record = await this.transition(lead.id, "NO_RESPONSE", {
          reason: "AUTOMATIC",
          triggeredBy: "system",
          notes: `Auto-transitioned after ${cutoffDays} days with no response`,
          metadata: { cutoff_days: cutoffDays },
        });
        results.push(record);
      } catch (error) {
        console.error(`[stageTransitions] Failed auto NO_RESPONSE`, {
          lead_id: lead.id,
          error: errorMessage(error),
        });
      }
    }

    console.log(`[stageTransitions] NO_RESPONSE sweep completed`, {
      candidates: staleLeads.length,
      transitioned: results.length,
    });

    return results;
  }

  /**
   * Full stage timeline for a lead, oldest first
   */
  async history(leadId: string): Promise<StageHistoryRecord[]> {
    await this.requireLead(leadId);
    return this.deps.stageHistory.listForLead(leadId);
  }

  async validNextStages(leadId: string): Promise<ValidNextStages> {
    const lead = await this.requireLead(leadId);
    const current = lead.current_outcome_stage;

    return {
      current_stage: current,
      valid_next_stages: current === null ? [] : allowedNextStages(current),
    };
  }

  private async requireLead(leadId: string): Promise<Lead> {
    const lead = await this.deps.leads.getById(leadId);
    if (!lead) {
      throw new NotFoundError("Lead", leadId);
    }
    return lead;
  }

  private async feedTerminalOutcome(lead: Lead, stage: OutcomeStage): Promise<void> {
    const outcome = FEEDBACK_OUTCOMES[stage];
    if (!outcome || lead.score_value === null || !this.deps.feedback) return;

    // Transition is already committed
    try {
      await this.deps.feedback.updateFromFeedback(outcome, lead.score_value);
      console.log(`[stageTransitions] Learning weights updated from stage transition`, {
        lead_id: lead.id,
        stage,
      });
    } catch (error) {
      console.error(`[stageTransitions] Weight feedback failed`, {
        lead_id: lead.id,
        stage,
        error: errorMessage(error),
      });
    }
  }
}
