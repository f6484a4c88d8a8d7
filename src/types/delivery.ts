export type FailureKind = "transient" | "permanent";

export interface DeliveryFailure {
  kind: FailureKind;
  detail: string;
  /** Minimum wait requested by the chat platform (rate limits). */
  retryAfterMs?: number;
}

export type DeliveryResult = { ok: true } | { ok: false; failure: DeliveryFailure };

export type DropReason = "exhausted" | "permanent" | "cancelled";
