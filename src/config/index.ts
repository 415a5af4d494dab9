/**
 * Environment Configuration
 *
 * Centralizes all environment variables into a typed configuration object.
 * All modules import config from here instead of reading process.env directly.
 *
 * Groups:
 * - Server: Express monitoring API settings
 * - Source: the event listing page and how it is fetched
 * - Storage: where per-scope snapshot files live
 * - Scheduler: which scopes are checked and how often
 * - Notifications: optional webhook delivery
 * - Auth: bearer secret for protected API routes
 */
import dotenv from "dotenv";

dotenv.config();

const config = {
  // --- Server ---
  env: process.env.NODE_ENV || "development",
  port: parseInt(process.env.PORT || "4000", 10),
  logLevel: process.env.LOG_LEVEL || "info",

  // --- Source page ---
  sourceUrl: process.env.SOURCE_URL || "https://vgagolf.org/state-events/",
  userAgent: process.env.USER_AGENT || "state-events-watch/1.0",
  fetchTimeoutMs: parseInt(process.env.FETCH_TIMEOUT_MS || "30000", 10),
  fetchMaxAttempts: parseInt(process.env.FETCH_MAX_ATTEMPTS || "3", 10),
  fetchRetryDelayMs: parseInt(process.env.FETCH_RETRY_DELAY_MS || "2000", 10),

  // --- Snapshot storage ---
  dataDir: process.env.DATA_DIR || "./data",

  // --- Scheduler ---
  // Comma-separated scopes: "ALL" and/or two-letter state codes
  checkScopes: (process.env.CHECK_SCOPES || "ALL")
    .split(",")
    .map((scope) => scope.trim())
    .filter((scope) => scope !== ""),
  checkCron: process.env.CHECK_CRON || "0 */6 * * *",
  timezone: process.env.TIMEZONE || "America/Los_Angeles",

  // --- Notifications ---
  notifyWebhookUrl: process.env.NOTIFY_WEBHOOK_URL || "",

  // --- Service Authentication ---
  serviceSecret: process.env.SERVICE_SECRET || "change-this-to-a-strong-secret",
};

export default config;
