import { createHmac, timingSafeEqual } from "crypto";
import { z } from "zod";
import { ActivityLog, LeadStore } from "../db/types";
import { errorMessage, InvalidTransitionError, StageConflictError } from "../errors";
import { StageTransitionEngine } from "./stageTransitions";

// ============================================================================
// PROVIDERS
// ============================================================================

export interface CalendarProvider {
  getSchedulingLink(): Promise<string>;
}

const CALENDLY_API = "https://api.calendly.com";

const schedulingLinkResponseSchema = z.object({
  resource: z.object({ booking_url: z.string().url() }),
});

export interface CalendlyProviderOptions {
  apiKey: string;
  userUri: string;
  fetchImpl?: typeof fetch;
}

export class CalendlyProvider implements CalendarProvider {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: CalendlyProviderOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Single-use scheduling link from the Calendly API, or the owner's public
   * page when the API call fails
   */
  async getSchedulingLink(): Promise<string> {
    try {
      const url = new URL(`${CALENDLY_API}/scheduling_links`);
      url.searchParams.set("owner", this.options.userUri);
      url.searchParams.set("max_event_count", "1");

      const response = await this.fetchImpl(url.toString(), {
        headers: { Authorization: `Bearer ${this.options.apiKey}` },
      });
      if (!response.ok) {
        throw new Error(`Calendly API returned ${response.status}`);
      }

      const body = schedulingLinkResponseSchema.parse(await response.json());
      return body.resource.booking_url;
    } catch (error) {
      console.warn("[calendar] Calendly API call failed", { error: errorMessage(error) });
    }

    return `https://calendly.com/${this.ownerSlug()}`;
  }

  private ownerSlug(): string {
    const slug = this.options.userUri.split("/").pop();
    return slug || "user";
  }
}

export class MockCalendarProvider implements CalendarProvider {
  async getSchedulingLink(): Promise<string> {
    return "https://calendly.com/mock-user/30min";
  }
}

export function createCalendarProvider(apiKey: string, userUri: string): CalendarProvider {
  if (!apiKey) {
    return new MockCalendarProvider();
  }
  return new CalendlyProvider({ apiKey, userUri });
}

// ============================================================================
// WEBHOOK
// ============================================================================

/** Calendly invitee.created payload; only the fields used here */
export const bookingWebhookSchema = z.object({
  event: z.string().optional(),
  payload: z
    .object({
      email: z.string().default(""),
      event: z.string().default(""),
    })
    .default({}),
});

export type BookingWebhookPayload = z.infer<typeof bookingWebhookSchema>;

export type BookingWebhookResult =
  | { status: "booked"; lead_id: string }
  | { status: "ignored"; reason: string };

// ============================================================================
// SERVICE
// ============================================================================

export interface CalendarServiceDeps {
  provider: CalendarProvider;
  leads: LeadStore;
  activityLog: ActivityLog;
  engine: StageTransitionEngine;
  webhookSecret?: string;
}

export class CalendarService {
  constructor(private readonly deps: CalendarServiceDeps) {}

  async getBookingLink(leadId: string): Promise<string> {
    const link = await this.deps.provider.getSchedulingLink();

    await this.deps.activityLog.logActivity(leadId, "CALENDLY_LINK_SENT", {
      scheduling_link: link,
    });

    console.log("[calendar] Scheduling link generated", { lead_id: leadId, link });
    return link;
  }

  /**
   * Move the invitee's lead to BOOKED_DEMO, passing through RESPONDED when
   * the lead has not replied yet
   */
  async handleBookingWebhook(payload: BookingWebhookPayload): Promise<BookingWebhookResult> {
    const email = payload.payload.email.toLowerCase();
    const eventUri = payload.payload.event;

    if (!email) {
      console.warn("[calendar] Webhook missing invitee email");
      return { status: "ignored", reason: "no email" };
    }

    const lead = await this.deps.leads.findByEmail(email);
    if (!lead) {
      console.log("[calendar] Webhook email not matched to lead", { email });
      return { status: "ignored", reason: "no matching lead" };
    }

    const current = lead.current_outcome_stage;
    if (current !== "EMAIL_SENT" && current !== "RESPONDED") {
      console.log("[calendar] Lead not in bookable stage", { lead_id: lead.id, current_stage: current });
      return { status: "ignored", reason: `lead in stage ${current}` };
    }

    try {
      if (current === "EMAIL_SENT") {
        await this.deps.engine.transition(lead.id, "RESPONDED", {
          reason: "AUTOMATIC",
          triggeredBy: "calendly_webhook",
          notes: "Auto-transitioned on demo booking",
          allowedFrom: ["EMAIL_SENT"],
        });
      }

      await this.deps.engine.transition(lead.id, "BOOKED_DEMO", {
        reason: "AUTOMATIC",
        triggeredBy: "calendly_webhook",
        notes: `Demo booked via Calendly. Event: ${eventUri}`,
        allowedFrom: ["RESPONDED"],
      });
    } catch (error) {
      if (error instanceof InvalidTransitionError || error instanceof StageConflictError) {
        console.warn("[calendar] Booking transition rejected", {
          lead_id: lead.id,
          error: error.message,
        });
        return { status: "ignored", reason: error.message };
      }
      throw error;
    }

    await this.deps.activityLog.logActivity(lead.id, "DEMO_BOOKED", {
      event_uri: eventUri,
      invitee_email: email,
      source: "calendly",
    });

    console.log("[calendar] Demo booked via webhook", { lead_id: lead.id });
    return { status: "booked", lead_id: lead.id };
  }

  /**
   * HMAC-SHA256 (hex) of the raw request body. Always passes when no
   * secret is configured.
   */
  verifyWebhookSignature(rawBody: Buffer | string, signature: string | undefined): boolean {
    const secret = this.deps.webhookSecret;
    if (!secret) return true;
    if (!signature) return false;

    const expected = Buffer.from(createHmac("sha256", secret).update(rawBody).digest("hex"));
    const given = Buffer.from(signature);

    return expected.length === given.length && timingSafeEqual(expected, given);
  }
}
