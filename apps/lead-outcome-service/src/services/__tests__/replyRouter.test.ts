import { NotFoundError } from "../../errors";
import { OutcomeServiceOptions } from "../index";
import { LEAD_ID, makeLead, setup } from "./fixtures";

const BOOKING_LINK = "https://calendly.com/test-rep/30min";

function setupWithCalendar(options: OutcomeServiceOptions = {}) {
  const calendarProvider = { getSchedulingLink: jest.fn().mockResolvedValue(BOOKING_LINK) };
  const ctx = setup({ calendarProvider, ...options });
  return { ...ctx, calendarProvider };
}

describe("ReplyRouter", () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  // ============================================================================
  // ROUTING TABLE
  // ============================================================================

  describe("handleInboundReply", () => {
    it("should move an interested lead to RESPONDED and request a link once", async () => {
      const { db, services, calendarProvider } = setupWithCalendar();
      db.putLead(makeLead());
      await services.router.handleEmailSent(LEAD_ID);

      const result = await services.router.handleInboundReply(
        LEAD_ID,
        "I'd love to schedule a demo next week!"
      );

      expect(result.classification).toBe("INTERESTED_BOOK_DEMO");
      expect(result.extracted_dates).toEqual(["next week"]);
      expect(result.auto_action_taken).toBe("Transitioned to Responded, scheduling link generated");
      expect(result.stage_record?.stage).toBe("RESPONDED");
      expect(result.stage_record?.reason).toBe("AUTOMATIC");
      expect(result.stage_record?.triggered_by).toBe("reply_agent");
      expect(result.stage_record?.notes).toBe("Interested reply: I'd love to schedule a demo next week!");
      expect(result.stage_record?.metadata).toEqual({ classification_id: result.classification_id });
      expect(calendarProvider.getSchedulingLink).toHaveBeenCalledTimes(1);
      expect(db.leads.get(LEAD_ID)?.current_outcome_stage).toBe("RESPONDED");

      expect(db.activities.map((a) => a.type)).toEqual([
        "EMAIL_REPLIED",
        "REPLY_CLASSIFIED",
        "STATUS_CHANGED",
        "CALENDLY_LINK_SENT",
      ]);

      expect(db.notifications).toHaveLength(1);
      expect(db.notifications[0].type).toBe("demo_requested");
      expect(db.notifications[0].title).toBe("Demo requested by Dana Reyes");
      expect(db.notifications[0].body).toBe(
        `Lead Dana Reyes wants to book a demo. Suggested dates: next week Scheduling link: ${BOOKING_LINK}`
      );
    });

    it("should disqualify a responded lead that unsubscribes", async () => {
      const { db, services } = setupWithCalendar();
      db.putLead(makeLead());
      await services.router.handleEmailSent(LEAD_ID);
      await services.engine.transition(LEAD_ID, "RESPONDED");

      const result = await services.router.handleInboundReply(LEAD_ID, "Please remove me from your list");

      expect(result.classification).toBe("UNSUBSCRIBE");
      expect(result.stage_record?.stage).toBe("DISQUALIFIED");
      expect(result.stage_record?.notes).toBe("Unsubscribe request: Please remove me from your list");
      expect(result.auto_action_taken).toBe("Auto-transitioned to Disqualified");
      expect(db.leads.get(LEAD_ID)?.current_outcome_stage).toBe("DISQUALIFIED");

      expect(db.notifications).toHaveLength(1);
      expect(db.notifications[0].title).toBe("Reply classified: UNSUBSCRIBE");
      expect(db.notifications[0].body).toBe(
        "Lead Dana Reyes replied. Classification: UNSUBSCRIBE. Preview: Please remove me from your list"
      );
    });

    it("should close a lead that is not interested", async () => {
      const { db, services } = setupWithCalendar();
      db.putLead(makeLead());
      await services.router.handleEmailSent(LEAD_ID);

      const result = await services.router.handleInboundReply(LEAD_ID, "No thanks, not interested.");

      expect(result.classification).toBe("NOT_INTERESTED");
      expect(result.auto_action_taken).toBe("Auto-transitioned to Closed Lost");
      expect(db.leads.get(LEAD_ID)?.current_outcome_stage).toBe("CLOSED_LOST");
    });

    it("should not transition on an out-of-office reply", async () => {
      const { db, services } = setupWithCalendar();
      db.putLead(makeLead());
      await services.router.handleEmailSent(LEAD_ID);

      const result = await services.router.handleInboundReply(
        LEAD_ID,
        "Automatic reply: I am on vacation until Friday."
      );

      expect(result.classification).toBe("OUT_OF_OFFICE");
      expect(result.stage_record).toBeNull();
      expect(result.auto_action_taken).toBe("No stage transition (out-of-office detected)");
      expect(result.extracted_dates).toEqual(["friday"]);
      expect(db.leads.get(LEAD_ID)?.current_outcome_stage).toBe("EMAIL_SENT");
      expect(db.notifications).toHaveLength(1);
    });

    it("should classify and notify without moving a lead outside the eligible stages", async () => {
      const { db, services } = setupWithCalendar();
      db.putLead(makeLead());
      await services.router.handleEmailSent(LEAD_ID);
      await services.engine.transition(LEAD_ID, "RESPONDED");

      const result = await services.router.handleInboundReply(LEAD_ID, "Can you send pricing details?");

      expect(result.classification).toBe("QUESTION");
      expect(result.stage_record).toBeNull();
      expect(result.auto_action_taken).toBeNull();
      expect(db.leads.get(LEAD_ID)?.current_outcome_stage).toBe("RESPONDED");
      expect(db.classifications).toHaveLength(1);
      expect(db.notifications[0].type).toBe("reply_classified");
    });

    it("should not re-engage a lead that was closed while its reply was being classified", async () => {
      const warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
      let closeLead: () => Promise<unknown> = async () => undefined;
      const llmBackend = {
        complete: jest.fn(async () => {
          await closeLead();
          return { classification: "UNCLEAR", confidence: 0.4, reasoning: "No clear intent" };
        }),
      };
      const { db, services } = setupWithCalendar({ llmBackend });
      closeLead = () => services.engine.transition(LEAD_ID, "CLOSED_LOST");
      db.putLead(makeLead());
      await services.router.handleEmailSent(LEAD_ID);

      const result = await services.router.handleInboundReply(LEAD_ID, "asdf qwerty");

      expect(result.classification).toBe("UNCLEAR");
      expect(result.stage_record).toBeNull();
      expect(result.auto_action_taken).toBeNull();
      expect(db.leads.get(LEAD_ID)?.current_outcome_stage).toBe("CLOSED_LOST");
      expect(db.stageHistory.map((r) => r.stage)).toEqual(["EMAIL_SENT", "CLOSED_LOST"]);
      expect(db.notifications[0].type).toBe("reply_classified");

      warnSpy.mockRestore();
    });

    it("should mark an unclear reply for review", async () => {
      const { db, services } = setupWithCalendar();
      db.putLead(makeLead());
      await services.router.handleEmailSent(LEAD_ID);

      const result = await services.router.handleInboundReply(LEAD_ID, "xyzzy plugh frobnicate");

      expect(result.auto_action_taken).toBe("Transitioned to Responded (needs review)");
      expect(result.stage_record?.notes).toBe("Unclear reply: xyzzy plugh frobnicate");
    });

    it("should still request a link for a lead with no stage", async () => {
      const { db, services, calendarProvider } = setupWithCalendar();
      db.putLead(makeLead());

      const result = await services.router.handleInboundReply(LEAD_ID, "Sounds great, let's set up a call");

      expect(result.stage_record).toBeNull();
      expect(result.auto_action_taken).toBe("Scheduling link generated");
      expect(calendarProvider.getSchedulingLink).toHaveBeenCalledTimes(1);
      expect(db.leads.get(LEAD_ID)?.current_outcome_stage).toBeNull();
    });

    it("should cap the notes preview at 100 characters", async () => {
      const { services, db } = setupWithCalendar();
      db.putLead(makeLead());
      await services.router.handleEmailSent(LEAD_ID);
      const reply = `xyzzy ${"q".repeat(200)}`;

      const result = await services.router.handleInboundReply(LEAD_ID, reply);

      expect(result.stage_record?.notes).toBe(`Unclear reply: ${reply.slice(0, 100)}`);
    });

    it("should throw NotFoundError for an unknown lead without writing anything", async () => {
      const { db, services } = setupWithCalendar();

      await expect(services.router.handleInboundReply("missing", "hello")).rejects.toBeInstanceOf(
        NotFoundError
      );
      expect(db.activities).toHaveLength(0);
      expect(db.classifications).toHaveLength(0);
    });
  });

  // ============================================================================
  // COLLABORATOR FAILURES
  // ============================================================================

  describe("collaborator failures", () => {
    it("should finish the reply when the scheduling link cannot be fetched", async () => {
      const calendarProvider = { getSchedulingLink: jest.fn().mockRejectedValue(new Error("calendar down")) };
      const { db, services } = setup({ calendarProvider });
      db.putLead(makeLead());
      await services.router.handleEmailSent(LEAD_ID);

      const result = await services.router.handleInboundReply(
        LEAD_ID,
        "I'd love to schedule a demo next week!"
      );

      expect(result.stage_record?.stage).toBe("RESPONDED");
      expect(result.auto_action_taken).toBe("Transitioned to Responded");
      expect(db.notifications[0].body).toBe("Lead Dana Reyes wants to book a demo. Suggested dates: next week");
      expect(db.notifications[0].metadata).toEqual({
        scheduling_link: null,
        extracted_dates: ["next week"],
        priority: "high",
      });
      expect(errorSpy).toHaveBeenCalledWith("[replyRouter] Failed to create scheduling link", {
        lead_id: LEAD_ID,
        error: "calendar down",
      });
    });

    it("should finish the reply when the notification store fails", async () => {
      const { db, services } = setup({}, (stores) => ({
        ...stores,
        notifications: { create: jest.fn().mockRejectedValue(new Error("insert failed")) },
      }));
      db.putLead(makeLead());
      await services.router.handleEmailSent(LEAD_ID);

      const result = await services.router.handleInboundReply(LEAD_ID, "Please remove me from your list");

      expect(result.stage_record?.stage).toBe("DISQUALIFIED");
      expect(errorSpy).toHaveBeenCalledWith("[replyRouter] Failed to create reply notification", {
        lead_id: LEAD_ID,
        error: "insert failed",
      });
    });

    it("should propagate a persistence failure in classification", async () => {
      const { db, services } = setup({}, (stores) => ({
        ...stores,
        classifications: {
          ...stores.classifications,
          create: jest.fn().mockRejectedValue(new Error("Failed to create classification: timeout")),
        },
      }));
      db.putLead(makeLead());
      await services.router.handleEmailSent(LEAD_ID);

      await expect(services.router.handleInboundReply(LEAD_ID, "hello")).rejects.toThrow(
        "Failed to create classification: timeout"
      );
      expect(db.leads.get(LEAD_ID)?.current_outcome_stage).toBe("EMAIL_SENT");
    });
  });

  describe("handleEmailSent", () => {
    it("should start tracking at EMAIL_SENT", async () => {
      const { db, services } = setupWithCalendar();
      db.putLead(makeLead());

      const record = await services.router.handleEmailSent(LEAD_ID);

      expect(record.stage).toBe("EMAIL_SENT");
      expect(db.leads.get(LEAD_ID)?.current_outcome_stage).toBe("EMAIL_SENT");
    });
  });
});
