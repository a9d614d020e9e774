import express, { Express } from "express";
import cors from "cors";
import { apiKeyAuth } from "./middleware/apiKeyAuth";
import { createOutcomesRouter } from "./routes/outcomes";
import { createScoringConfigRouter } from "./routes/scoringConfig";
import { createWebhooksRouter } from "./routes/webhooks";
import { OutcomeServices } from "./services";

export interface AppOptions {
  apiKey: string;
  staleSweepDays: number;
}

export function createApp(services: OutcomeServices, options: AppOptions): Express {
  const app = express();

  app.use(cors());

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // Webhooks verify their own signatures over the raw body, so they are
  // mounted before the JSON parser and outside API key auth
  app.use("/webhooks", createWebhooksRouter(services.calendar));

  app.use(express.json());
  app.use(apiKeyAuth(options.apiKey));

  // Mount routes
  app.use("/scoring-config", createScoringConfigRouter(services.tuner));
  app.use("/", createOutcomesRouter(services, options.staleSweepDays));

  return app;
}
