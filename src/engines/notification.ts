import { AuditedEngine } from "./auditedEngine.js";
import type { EngineOptions } from "./auditedEngine.js";

export type NotificationKind = "appointment_reminder" | "birthday" | "follow_up";

export type ScheduledNotification = {
  id: string;
  kind: NotificationKind;
  recipientID: string;
  sendAt: Date;
};

export class NotificationEngine extends AuditedEngine {
  private scheduled = new Map<string, ScheduledNotification>();

  constructor(opts: EngineOptions = {}) {
    super("NotificationEngine", 30, opts);
  }

  /** The audit event is recorded before the notification is stored. */
  schedule(notification: ScheduledNotification) {
    this.log("notification_scheduled", {
      notificationID: notification.id,
      kind: notification.kind,
      sendAt: notification.sendAt
    });
    this.scheduled.set(notification.id, { ...notification });
  }

  cancel(notificationId: string): boolean {
    const known = this.scheduled.has(notificationId);
    this.log(known ? "notification_cancelled" : "notification_unknown", { notificationID: notificationId });
    if (known) this.scheduled.delete(notificationId);
    return known;
  }

  /** Soonest first. */
  pending(): ScheduledNotification[] {
    return Array.from(this.scheduled.values(), n => ({ ...n }))
      .sort((a, b) => a.sendAt.getTime() - b.sendAt.getTime());
  }

  statusMessage() {
    return "Notification engine is operational.";
  }
}
