import { createApp } from "./app";
import { config } from "./config";
import { createStores, isSupabaseConfigured } from "./db";
import { scheduleStaleSweep } from "./jobs/staleSweep";
import { createCalendarProvider, createOutcomeServices } from "./services";

const services = createOutcomeServices(createStores(), {
  // No LLM backend is wired here; replies are classified by the rule engine
  llmBackend: null,
  llmTimeoutMs: config.llmTimeoutMs,
  calendarProvider: createCalendarProvider(config.calendlyApiKey, config.calendlyUserUri),
  calendlyWebhookSecret: config.calendlyWebhookSecret,
});

const app = createApp(services, {
  apiKey: config.apiKey,
  staleSweepDays: config.staleSweepDays,
});

scheduleStaleSweep(services.engine, {
  cutoffDays: config.staleSweepDays,
  intervalMinutes: config.staleSweepIntervalMinutes,
});

// Start server
app.listen(config.port, () => {
  console.log(`[server] Lead Outcome Service started`);
  console.log(`[server] Port: ${config.port}`);
  console.log(`[server] Environment: ${config.nodeEnv}`);
  console.log(`[server] Database: ${isSupabaseConfigured() ? "supabase" : "in-memory"}`);
  console.log(`[server] Calendar: ${config.calendlyApiKey ? "calendly" : "mock"}`);
  console.log(`[server] API key auth: ${config.apiKey ? "enabled" : "disabled"}`);
});

export default app;
