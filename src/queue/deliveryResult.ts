import type { DeliveryResult } from "@/types/delivery";

export function delivered(): DeliveryResult {
  return { ok: true };
}

export function transientFailure(detail: string, retryAfterMs?: number): DeliveryResult {
  return {
    ok: false,
    failure: retryAfterMs === undefined ? { kind: "transient", detail } : { kind: "transient", detail, retryAfterMs },
  };
}

export function permanentFailure(detail: string): DeliveryResult {
  return { ok: false, failure: { kind: "permanent", detail } };
}
