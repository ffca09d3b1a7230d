/**
 * Waiting helpers shared by the request and pagination loops
 */

export type SleepFn = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

/**
 * Linear backoff: `baseSeconds × attempt`, in milliseconds
 */
export function linearBackoffMs(baseSeconds: number, attempt: number): number {
  return Math.max(0, baseSeconds * attempt * 1000);
}
