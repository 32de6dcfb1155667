/**
 * RUNTIME SETTINGS
 *
 * Everything here comes from the environment (a `.env` file is loaded by the
 * server and the scripts before this module is read). Defaults suit a local
 * Redis and a single developer machine.
 */

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export interface Settings {
  port: number;
  redisHost: string;
  redisPort: number;
  redisPassword: string;
  geocoderUrl: string;
  geocoderUserAgent: string;
  geocoderTimeoutMs: number;
  /** Where notification digests are POSTed; unset means digests are skipped */
  notifyWebhookUrl: string | null;
  internalWebhookSecret: string;
  /** Attempts and spacing when waiting for a saved search's notification lock */
  searchLockRetries: number;
  searchLockRetryDelayMs: number;
  pageSize: number;
  corsOrigin: string;
}

export function loadSettings(): Settings {
  return {
    port: intFromEnv("PORT", 8787),
    redisHost: process.env.REDIS_HOST || "127.0.0.1",
    redisPort: intFromEnv("REDIS_PORT", 6379),
    redisPassword: process.env.REDIS_PASSWORD || "",
    geocoderUrl: process.env.GEOCODER_URL || "https://nominatim.openstreetmap.org/search",
    geocoderUserAgent: process.env.GEOCODER_USER_AGENT || "recruit-board/1.0",
    geocoderTimeoutMs: intFromEnv("GEOCODER_TIMEOUT_MS", 6000),
    notifyWebhookUrl: process.env.NOTIFY_WEBHOOK_URL || null,
    internalWebhookSecret: process.env.INTERNAL_WEBHOOK_SECRET || "",
    searchLockRetries: intFromEnv("SEARCH_LOCK_RETRIES", 50),
    searchLockRetryDelayMs: intFromEnv("SEARCH_LOCK_RETRY_DELAY_MS", 100),
    pageSize: intFromEnv("PAGE_SIZE", 10),
    corsOrigin: process.env.CORS_ORIGIN || "*",
  };
}
