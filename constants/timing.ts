/**
 * Timing and capacity constants for the monitoring loop.
 */

export const Config = {
  // Periodic tasks
  SESSION_TICK_MS: 1_000,
  WATCHDOG_INTERVAL_MS: 1_000,
  STALE_DATA_TIMEOUT_MS: 6_000,

  // Auto-reconnect
  RECONNECT_BASE_DELAY_MS: 3_000,
  RECONNECT_MAX_DELAY_MS: 30_000,

  // Session accounting
  BAD_POSTURE_ALERT_DELAY_MS: 5_000,
  BREAK_REMINDER_AFTER_MS: 60 * 60 * 1_000,
  MIN_SAVED_SESSION_MS: 5_000,

  // User-visible notices
  NOTICE_RATE_LIMIT_MS: 10_000,

  // Offline buffer
  OFFLINE_BUFFER_CAPACITY: 500,
  OFFLINE_DRAIN_BATCH: 20,

  // Remote store: an offline database never settles its write promises
  REMOTE_WRITE_TIMEOUT_MS: 5_000,

  // History queries
  HISTORY_LIMIT: 50,
  STATISTICS_SAMPLE: 100,
} as const;
