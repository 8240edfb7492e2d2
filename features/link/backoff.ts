import { Config } from "@/constants/timing";

/**
 * Wait before the next reconnect attempt after `failures` consecutive
 * failures: 0 before the first attempt, then base doubling up to the cap.
 */
export function nextBackoffDelay(
  failures: number,
  baseDelayMs: number = Config.RECONNECT_BASE_DELAY_MS,
  maxDelayMs: number = Config.RECONNECT_MAX_DELAY_MS,
): number {
  if (failures <= 0) return 0;
  return Math.min(baseDelayMs * Math.pow(2, failures - 1), maxDelayMs);
}
