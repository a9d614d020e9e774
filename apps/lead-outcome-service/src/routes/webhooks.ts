import express, { Router } from "express";
import { BookingWebhookPayload, bookingWebhookSchema, CalendarService } from "../services";
import { route } from "./http";

export const CALENDLY_SIGNATURE_HEADER = "calendly-webhook-signature";

/**
 * Parse the raw webhook body. Returns null for a body that is not JSON.
 */
export function parseBookingWebhook(rawBody: Buffer): BookingWebhookPayload | null {
  let json: unknown;
  try {
    json = JSON.parse(rawBody.toString("utf8"));
  } catch {
    return null;
  }
  return bookingWebhookSchema.parse(json);
}

export function createWebhooksRouter(calendar: CalendarService): Router {
  const router = Router();

  /**
   * POST /webhooks/calendly
   * invitee.created → BOOKED_DEMO. Signature is computed over the raw body.
   */
  router.post(
    "/calendly",
    express.raw({ type: "application/json" }),
    route("webhooks", async (req, res) => {
      const rawBody: unknown = req.body;
      if (!Buffer.isBuffer(rawBody)) {
        return res.status(400).json({ error: "Expected application/json body" });
      }

      const signature = req.header(CALENDLY_SIGNATURE_HEADER);
      if (!calendar.verifyWebhookSignature(rawBody, signature)) {
        console.warn("[webhooks] Calendly signature mismatch");
        return res.status(401).json({ error: "Invalid signature" });
      }

      const payload = parseBookingWebhook(rawBody);
      if (!payload) {
        return res.status(400).json({ error: "Malformed JSON body" });
      }

      res.json(await calendar.handleBookingWebhook(payload));
    })
  );

  return router;
}
