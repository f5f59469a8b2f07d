/**
 * Bounded polling with an injectable sleep
 */

import { setTimeout as delay } from "node:timers/promises";
import type { PollingPolicy } from "../types";

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export interface PollResult {
  ready: boolean;
  attempts: number;
}

/**
 * Call check up to policy.maxAttempts times, sleeping intervalMs between
 * attempts (not after the last one). A throwing check counts as not ready.
 */
export async function pollUntil(
  check: () => Promise<boolean>,
  policy: PollingPolicy,
  sleep: Sleep = defaultSleep,
  onAttempt?: (attempt: number) => void,
): Promise<PollResult> {
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    onAttempt?.(attempt);

    let ready = false;
    try {
      ready = await check();
    } catch {
      ready = false;
    }

    if (ready) {
      return { ready: true, attempts: attempt };
    }

    if (attempt < policy.maxAttempts) {
      await sleep(policy.intervalMs);
    }
  }

  return { ready: false, attempts: policy.maxAttempts };
}
