import { Router } from "express";
import { OutcomeServices } from "../services";
import {
  overrideBodySchema,
  replyBodySchema,
  route,
  staleSweepBodySchema,
  transitionBodySchema,
} from "./http";

/**
 * Outcome stage, reply and classification endpoints
 */
export function createOutcomesRouter(services: OutcomeServices, defaultSweepDays: number): Router {
  const router = Router();

  /**
   * POST /leads/:leadId/email-sent
   * Start outcome tracking (idempotent)
   */
  router.post(
    "/leads/:leadId/email-sent",
    route("outcomes", async (req, res) => {
      const record = await services.router.handleEmailSent(req.params.leadId);
      res.json(record);
    })
  );

  /**
   * POST /leads/:leadId/transition
   * Manual stage change
   */
  router.post(
    "/leads/:leadId/transition",
    route("outcomes", async (req, res) => {
      const body = transitionBodySchema.parse(req.body);
      const record = await services.engine.transition(req.params.leadId, body.stage, {
        reason: "MANUAL",
        triggeredBy: body.triggered_by,
        notes: body.notes ?? null,
      });
      res.json(record);
    })
  );

  router.get(
    "/leads/:leadId/stages",
    route("outcomes", async (req, res) => {
      res.json(await services.engine.history(req.params.leadId));
    })
  );

  router.get(
    "/leads/:leadId/next-stages",
    route("outcomes", async (req, res) => {
      res.json(await services.engine.validNextStages(req.params.leadId));
    })
  );

  /**
   * POST /leads/:leadId/replies
   * Inbound reply: classify, auto-route and notify
   */
  router.post(
    "/leads/:leadId/replies",
    route("outcomes", async (req, res) => {
      const body = replyBodySchema.parse(req.body);
      const result = await services.router.handleInboundReply(
        req.params.leadId,
        body.reply_body,
        body.sender_email ?? null
      );
      res.json(result);
    })
  );

  /**
   * POST /leads/:leadId/classify
   * Classification only, no routing
   */
  router.post(
    "/leads/:leadId/classify",
    route("outcomes", async (req, res) => {
      const body = replyBodySchema.parse(req.body);
      const record = await services.classification.classify(
        req.params.leadId,
        body.reply_body,
        body.sender_email ?? null
      );
      res.json(record);
    })
  );

  router.get(
    "/leads/:leadId/classifications",
    route("outcomes", async (req, res) => {
      res.json(await services.classification.listForLead(req.params.leadId));
    })
  );

  router.get(
    "/leads/:leadId/classifications/latest",
    route("outcomes", async (req, res) => {
      const latest = await services.classification.latestForLead(req.params.leadId);
      if (!latest) {
        return res.status(404).json({ error: "No classification for lead" });
      }
      res.json(latest);
    })
  );

  router.post(
    "/classifications/:classificationId/override",
    route("outcomes", async (req, res) => {
      const body = overrideBodySchema.parse(req.body);
      const record = await services.classification.override(
        req.params.classificationId,
        body.classification,
        body.overridden_by
      );
      res.json(record);
    })
  );

  /**
   * POST /outcomes/stale-sweep
   * Run the no-response sweep now
   */
  router.post(
    "/outcomes/stale-sweep",
    route("outcomes", async (req, res) => {
      const body = staleSweepBodySchema.parse(req.body ?? {});
      const days = body.days ?? defaultSweepDays;
      const records = await services.engine.staleSweep(days);
      res.json({ days, transitioned: records.length, records });
    })
  );

  return router;
}
