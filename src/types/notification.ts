export type NotificationSeverity = "info" | "success" | "warning";

export interface NotificationField {
  name: string;
  value: string;
  inline?: boolean;
}

/**
 * Transport-neutral announcement content. Built by producers, rendered by the
 * chat transports; the delivery queue never looks inside.
 */
export interface NotificationPayload {
  title: string;
  body: string;
  url?: string;
  /** 24-bit RGB colour, e.g. `0xe74c3c`. */
  color?: number;
  severity?: NotificationSeverity;
  footer?: string;
  /** ISO-8601 time of the upstream event. */
  timestamp?: string;
  fields?: NotificationField[];
}

export interface Notification {
  readonly id: string;
  readonly payload: NotificationPayload;
  /** Epoch milliseconds. */
  readonly createdAt: number;
  readonly attempts: number;
  /** Epoch milliseconds before which the item is not retried. */
  readonly nextEligibleAt: number;
}
