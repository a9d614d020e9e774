import { Router } from "express";
import { AdaptiveWeightTuner } from "../services";
import { feedbackBodySchema, historyQuerySchema, route, scoringConfigUpdateSchema } from "./http";

export function createScoringConfigRouter(tuner: AdaptiveWeightTuner): Router {
  const router = Router();

  router.get(
    "/",
    route("scoringConfig", async (_req, res) => {
      res.json(await tuner.getConfig());
    })
  );

  router.put(
    "/",
    route("scoringConfig", async (req, res) => {
      const body = scoringConfigUpdateSchema.parse(req.body);
      const updated = await tuner.updateConfig(
        { weights: body.weights, thresholds: body.thresholds },
        body.updated_by
      );
      res.json(updated);
    })
  );

  router.get(
    "/history",
    route("scoringConfig", async (req, res) => {
      const { limit } = historyQuerySchema.parse(req.query);
      res.json(await tuner.history(limit));
    })
  );

  /**
   * POST /scoring-config/feedback
   * Outcome feedback from outside the stage engine (e.g. booked demos)
   */
  router.post(
    "/feedback",
    route("scoringConfig", async (req, res) => {
      const body = feedbackBodySchema.parse(req.body);
      res.json(await tuner.updateFromFeedback(body.outcome, body.lead_score));
    })
  );

  return router;
}
