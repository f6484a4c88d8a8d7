import { randomUUID } from "node:crypto";
import { z } from "zod";

import type { Notification, NotificationPayload } from "@/types/notification";

export const notificationPayloadSchema = z.object({
  title: z.string(),
  body: z.string(),
  url: z.string().optional(),
  color: z.number().int().min(0).max(0xffffff).optional(),
  severity: z.enum(["info", "success", "warning"]).optional(),
  footer: z.string().optional(),
  timestamp: z.string().optional(),
  fields: z
    .array(
      z.object({
        name: z.string(),
        value: z.string(),
        inline: z.boolean().optional(),
      }),
    )
    .optional(),
});

export const notificationSchema = z.object({
  id: z.string().min(1),
  payload: notificationPayloadSchema,
  createdAt: z.number().int().nonnegative(),
  attempts: z.number().int().nonnegative(),
  nextEligibleAt: z.number().int().nonnegative(),
});

export function createNotification(payload: NotificationPayload, now = Date.now()): Notification {
  return {
    id: randomUUID(),
    payload,
    createdAt: now,
    attempts: 0,
    nextEligibleAt: now,
  };
}
