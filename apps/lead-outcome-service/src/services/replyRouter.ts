import { ActivityLog, LeadStore } from "../db/types";
import { errorMessage, InvalidTransitionError, NotFoundError, StageConflictError } from "../errors";
import {
  InboundReplyResult,
  Lead,
  OutcomeStage,
  ReplyClassification,
  StageHistoryRecord,
} from "../types/outcomes";
import { CalendarService } from "./calendar";
import { NotificationService } from "./notifications";
import { ReplyClassificationService } from "./replyClassification";
import { StageTransitionEngine } from "./stageTransitions";

// ============================================================================
// ROUTING TABLE
// ============================================================================

interface ReplyRoute {
  /** null = never transition */
  target: OutcomeStage | null;
  /** Current stages from which the transition is attempted */
  from: readonly OutcomeStage[];
  /** Prefix for the history record's notes */
  label: string;
  /** auto_action_taken when the transition happens */
  action: string;
}

const FIRST_REPLY_STAGES: readonly OutcomeStage[] = ["EMAIL_SENT", "NO_RESPONSE"];
const OPT_OUT_STAGES: readonly OutcomeStage[] = ["EMAIL_SENT", "NO_RESPONSE", "RESPONDED"];

export const REPLY_ROUTES: Readonly<Record<ReplyClassification, ReplyRoute>> = {
  OUT_OF_OFFICE: {
    target: null,
    from: [],
    label: "Out of office",
    action: "No stage transition (out-of-office detected)",
  },
  UNSUBSCRIBE: {
    target: "DISQUALIFIED",
    from: OPT_OUT_STAGES,
    label: "Unsubscribe request",
    action: "Auto-transitioned to Disqualified",
  },
  NOT_INTERESTED: {
    target: "CLOSED_LOST",
    from: OPT_OUT_STAGES,
    label: "Not interested",
    action: "Auto-transitioned to Closed Lost",
  },
  INTERESTED_BOOK_DEMO: {
    target: "RESPONDED",
    from: FIRST_REPLY_STAGES,
    label: "Interested reply",
    action: "Transitioned to Responded",
  },
  QUESTION: {
    target: "RESPONDED",
    from: FIRST_REPLY_STAGES,
    label: "Question reply",
    action: "Transitioned to Responded (question received)",
  },
  UNCLEAR: {
    target: "RESPONDED",
    from: FIRST_REPLY_STAGES,
    label: "Unclear reply",
    action: "Transitioned to Responded (needs review)",
  },
};

const REPLY_PREVIEW_LENGTH = 500;
const NOTES_PREVIEW_LENGTH = 100;

function leadDisplayName(lead: Lead): string {
  return `${lead.first_name ?? ""} ${lead.last_name ?? ""}`.trim();
}

// ============================================================================
// ROUTER
// ============================================================================

export interface ReplyRouterDeps {
  leads: LeadStore;
  activityLog: ActivityLog;
  classification: ReplyClassificationService;
  engine: StageTransitionEngine;
  calendar: CalendarService;
  notifications: NotificationService;
}

/**
 * Turns an inbound reply into a classification, a stage change where the
 * routing table allows one, and a notification for the sales team
 */
export class ReplyRouter {
  constructor(private readonly deps: ReplyRouterDeps) {}

  async handleInboundReply(
    leadId: string,
    replyBody: string,
    senderEmail: string | null = null
  ): Promise<InboundReplyResult> {
    const lead = await this.deps.leads.getById(leadId);
    if (!lead) {
      throw new NotFoundError("Lead", leadId);
    }

    const current = lead.current_outcome_stage;
    const preview = replyBody.slice(0, REPLY_PREVIEW_LENGTH);
    const leadName = leadDisplayName(lead);

    // 1. Audit the reply itself
    await this.deps.activityLog.logActivity(leadId, "EMAIL_REPLIED", {
      reply_body: preview,
      sender_email: senderEmail,
    });

    // 2. Classify
    const record = await this.deps.classification.classify(leadId, replyBody, senderEmail);
    const route = REPLY_ROUTES[record.classification];

    // 3. Route
    let stageRecord: StageHistoryRecord | null = null;
    if (route.target && current !== null && route.from.includes(current)) {
      stageRecord = await this.tryTransition(leadId, route.target, {
        notes: `${route.label}: ${preview.slice(0, NOTES_PREVIEW_LENGTH)}`,
        classificationId: record.id,
        allowedFrom: route.from,
      });
    }

    let autoAction: string | null = stageRecord || route.target === null ? route.action : null;

    if (record.classification === "INTERESTED_BOOK_DEMO") {
      const schedulingLink = await this.isolate("scheduling link", leadId, () =>
        this.deps.calendar.getBookingLink(leadId)
      );
      if (schedulingLink) {
        autoAction = autoAction ? `${autoAction}, scheduling link generated` : "Scheduling link generated";
      }

      await this.isolate("demo notification", leadId, () =>
        this.deps.notifications.notifyDemoRequested({
          leadId,
          schedulingLink,
          extractedDates: record.extracted_dates,
          leadName,
        })
      );
    } else {
      await this.isolate("reply notification", leadId, () =>
        this.deps.notifications.notifyReplyClassified({
          leadId,
          classification: record.classification,
          replyPreview: preview,
          leadName,
        })
      );
    }

    console.log("[replyRouter] Inbound reply processed", {
      lead_id: leadId,
      classification: record.classification,
      auto_action: autoAction,
    });

    return {
      stage_record: stageRecord,
      classification_id: record.id,
      classification: record.classification,
      confidence: record.confidence,
      reasoning: record.reasoning,
      extracted_dates: record.extracted_dates,
      auto_action_taken: autoAction,
    };
  }

  /**
   * Outbound email went out; start the lead's outcome tracking
   */
  async handleEmailSent(leadId: string): Promise<StageHistoryRecord> {
    return this.deps.engine.initializeStage(leadId);
  }

  /**
   * A rejected transition means the lead moved while the reply was being
   * classified; the reply is still recorded and notified.
   */
  private async tryTransition(
    leadId: string,
    target: OutcomeStage,
    context: { notes: string; classificationId: string; allowedFrom: readonly OutcomeStage[] }
  ): Promise<StageHistoryRecord | null> {
    try {
      return await this.deps.engine.transition(leadId, target, {
        reason: "AUTOMATIC",
        triggeredBy: "reply_agent",
        notes: context.notes,
        metadata: { classification_id: context.classificationId },
        allowedFrom: context.allowedFrom,
      });
    } catch (error) {
      if (error instanceof InvalidTransitionError || error instanceof StageConflictError) {
        console.warn("[replyRouter] Auto transition skipped", {
          lead_id: leadId,
          target,
          error: error.message,
        });
        return null;
      }
      throw error;
    }
  }

  private async isolate<T>(what: string, leadId: string, fn: () => Promise<T>): Promise<T | null> {
    try {
      return await fn();
    } catch (error) {
      console.error(`[replyRouter] Failed to create ${what}`, {
        lead_id: leadId,
        error: errorMessage(error),
      });
      return null;
    }
  }
}
