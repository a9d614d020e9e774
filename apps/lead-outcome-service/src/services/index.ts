import { OutcomeStores } from "../db/types";
import { CalendarProvider, CalendarService, MockCalendarProvider } from "./calendar";
import { NotificationService } from "./notifications";
import { ReplyClassificationService } from "./replyClassification";
import { createClassifier, LlmReplyBackend } from "./replyClassifier";
import { ReplyRouter } from "./replyRouter";
import { StageTransitionEngine } from "./stageTransitions";
import { AdaptiveWeightTuner } from "./weightTuner";

export interface OutcomeServiceOptions {
  llmBackend?: LlmReplyBackend | null;
  llmTimeoutMs?: number;
  calendarProvider?: CalendarProvider;
  calendlyWebhookSecret?: string;
  now?: () => Date;
}

export interface OutcomeServices {
  engine: StageTransitionEngine;
  classification: ReplyClassificationService;
  router: ReplyRouter;
  tuner: AdaptiveWeightTuner;
  calendar: CalendarService;
  notifications: NotificationService;
}

/**
 * Wire the outcome services over one set of stores
 */
export function createOutcomeServices(
  stores: OutcomeStores,
  options: OutcomeServiceOptions = {}
): OutcomeServices {
  const tuner = new AdaptiveWeightTuner(stores.scoringConfigs);

  const engine = new StageTransitionEngine({
    leads: stores.leads,
    stageHistory: stores.stageHistory,
    activityLog: stores.activityLog,
    feedback: tuner,
    now: options.now,
  });

  const classification = new ReplyClassificationService({
    leads: stores.leads,
    classifications: stores.classifications,
    activityLog: stores.activityLog,
    classifier: createClassifier(
      options.llmBackend,
      options.llmTimeoutMs === undefined ? undefined : { timeoutMs: options.llmTimeoutMs }
    ),
    now: options.now,
  });

  const calendar = new CalendarService({
    provider: options.calendarProvider ?? new MockCalendarProvider(),
    leads: stores.leads,
    activityLog: stores.activityLog,
    engine,
    webhookSecret: options.calendlyWebhookSecret,
  });

  const notifications = new NotificationService(stores.notifications);

  const router = new ReplyRouter({
    leads: stores.leads,
    activityLog: stores.activityLog,
    classification,
    engine,
    calendar,
    notifications,
  });

  return { engine, classification, router, tuner, calendar, notifications };
}

export * from "./stageTransitions";
export * from "./replyClassifier";
export * from "./replyClassification";
export * from "./replyRouter";
export * from "./weightTuner";
export * from "./calendar";
export * from "./notifications";
