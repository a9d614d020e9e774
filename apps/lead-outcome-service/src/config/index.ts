/**
 * Environment configuration
 */
export const config = {
  port: parseInt(process.env.PORT || "3000", 10),

  // Supabase (in-memory store when either is missing)
  supabaseUrl: process.env.SUPABASE_URL || "",
  supabaseServiceKey: process.env.SUPABASE_SERVICE_KEY || "",

  // Shared API key for the HTTP surface; auth is skipped when empty
  apiKey: process.env.API_KEY || "",

  // Reply classification
  llmTimeoutMs: parseInt(process.env.LLM_TIMEOUT_MS || "10000", 10),

  // No-response sweep
  staleSweepDays: parseInt(process.env.STALE_SWEEP_DAYS || "14", 10),
  staleSweepIntervalMinutes: parseInt(process.env.STALE_SWEEP_INTERVAL_MINUTES || "60", 10),

  // Calendly (mock scheduling links when the key is missing)
  calendlyApiKey: process.env.CALENDLY_API_KEY || "",
  calendlyUserUri: process.env.CALENDLY_USER_URI || "",
  calendlyWebhookSecret: process.env.CALENDLY_WEBHOOK_SECRET || "",

  nodeEnv: process.env.NODE_ENV || "development"
};
