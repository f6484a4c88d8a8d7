import type { DeliveryResult } from "@/types/delivery";
import type { NotificationPayload } from "@/types/notification";

/**
 * Sends one notification to a chat platform. Implementations classify every
 * failure as transient or permanent instead of throwing; a thrown error is
 * treated as transient by the worker.
 */
export interface NotificationTransport {
  readonly name: string;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** `signal` aborts when the worker's per-call timeout expires. */
  send(payload: NotificationPayload, signal: AbortSignal): Promise<DeliveryResult>;
}

export function truncate(value: string, limit: number): string {
  if (value.length <= limit) {
    return value;
  }
  return `${value.slice(0, Math.max(0, limit - 1))}…`;
}
