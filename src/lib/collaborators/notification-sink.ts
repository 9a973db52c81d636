// src/lib/collaborators/notification-sink.ts
// Fire-and-forget outbound notifications.

import { log, errorMeta } from "@/lib/observability/logger";

export type NotificationTemplate =
  | "claim_status_changed"
  | "claim_submitted"
  | "batch_completed"
  | "customer_approval_requested";

export interface NotificationSink {
  notify(
    recipient: string,
    templateId: NotificationTemplate,
    payload: Record<string, unknown>,
  ): Promise<void>;
}

export class LoggingNotificationSink implements NotificationSink {
  async notify(
    recipient: string,
    templateId: NotificationTemplate,
    payload: Record<string, unknown>,
  ) {
    log("INFO", "NOTIFICATION_DISPATCHED", { recipient, templateId, payload });
  }
}

export class WebhookNotificationSink implements NotificationSink {
  constructor(
    private readonly url: string,
    private readonly timeoutMs = 5000,
  ) {}

  async notify(
    recipient: string,
    templateId: NotificationTemplate,
    payload: Record<string, unknown>,
  ) {
    const res = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ recipient, templateId, payload }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      throw new Error(`Notification webhook responded ${res.status}`);
    }
  }
}

/**
 * Dispatches without awaiting delivery. Failures are logged and never
 * propagate to the committed operation that triggered them.
 */
export function dispatchNotification(
  sink: NotificationSink,
  recipient: string,
  templateId: NotificationTemplate,
  payload: Record<string, unknown>,
): Promise<void> {
  return sink.notify(recipient, templateId, payload).catch((err: unknown) => {
    log("WARN", "NOTIFICATION_DELIVERY_FAILED", {
      recipient,
      templateId,
      ...errorMeta(err),
    });
  });
}
