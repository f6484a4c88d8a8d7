import type { DeliveryFailure } from "@/types/delivery";
import type { Notification } from "@/types/notification";

export interface BackoffPolicy {
  baseMs: number;
  factor: number;
  maxMs: number;
}

/** Delay before the next try after `attempts` failed attempts. */
export function computeBackoffDelay(attempts: number, policy: BackoffPolicy): number {
  if (attempts <= 0) {
    return 0;
  }

  const delay = policy.baseMs * Math.pow(policy.factor, attempts - 1);
  return Math.min(Math.round(delay), policy.maxMs);
}

/**
 * State after one more transient failure. The platform's retry-after hint
 * wins when it asks for a longer wait than the backoff curve.
 */
export function applyTransientFailure(
  notification: Notification,
  failure: Pick<DeliveryFailure, "retryAfterMs">,
  policy: BackoffPolicy,
  now: number,
): Notification {
  const attempts = notification.attempts + 1;
  const delay = Math.max(computeBackoffDelay(attempts, policy), failure.retryAfterMs ?? 0);

  return {
    ...notification,
    attempts,
    nextEligibleAt: Math.max(notification.nextEligibleAt, now + delay),
  };
}
