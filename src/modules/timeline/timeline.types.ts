// src/modules/timeline/timeline.types.ts

import type { ActorType } from "@/lib/auth/actor";

export const TimelineEventType = {
  SUBMITTED: "submitted",
  VALIDATED: "validated",
  REJECTED: "rejected",
  ASSIGNED: "assigned",
  REPAIR_STARTED: "repair_started",
  REPAIR_COMPLETED: "repair_completed",
  QUALITY_APPROVED: "quality_approved",
  CUSTOMER_APPROVED: "customer_approved",
  COMPLETED: "completed",
  NOTE_ADDED: "note_added",
  ATTACHMENT_UPLOADED: "attachment_uploaded",
  STATUS_UPDATED: "status_updated",
} as const;

export type TimelineEventType =
  (typeof TimelineEventType)[keyof typeof TimelineEventType];

export type TimelineEvent = {
  id: string;
  claimId: string;
  sequence: number;
  eventType: TimelineEventType;
  description: string;
  actorId: string;
  actorType: ActorType;
  occurredAt: Date;
  visibleToCustomer: boolean;
  metadata: Record<string, unknown>;
};

export type TimelineAppend = Omit<TimelineEvent, "id" | "sequence" | "occurredAt">;
