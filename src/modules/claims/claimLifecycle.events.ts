// src/modules/claims/claimLifecycle.events.ts
// Purpose: Closed mapping between claim states and the timeline event written on entry.

import { TimelineEventType } from "@/modules/timeline/timeline.types";
import { ClaimStatus } from "./claim.types";

////////////////////////////////////////////////////////////////
// Status → Timeline Event Mapping
////////////////////////////////////////////////////////////////

/**
 * Every claim state maps to exactly one timeline event type.
 * States without a dedicated event use STATUS_UPDATED.
 */
export const CLAIM_STATUS_TIMELINE_EVENTS: Record<ClaimStatus, TimelineEventType> = {
  [ClaimStatus.PENDING]: TimelineEventType.SUBMITTED,
  [ClaimStatus.VALIDATED]: TimelineEventType.VALIDATED,
  [ClaimStatus.REJECTED]: TimelineEventType.REJECTED,
  [ClaimStatus.ASSIGNED]: TimelineEventType.ASSIGNED,
  [ClaimStatus.IN_REPAIR]: TimelineEventType.REPAIR_STARTED,
  [ClaimStatus.REPAIRED]: TimelineEventType.STATUS_UPDATED,
  [ClaimStatus.REPLACED]: TimelineEventType.STATUS_UPDATED,
  [ClaimStatus.SHIPPED]: TimelineEventType.STATUS_UPDATED,
  [ClaimStatus.DELIVERED]: TimelineEventType.STATUS_UPDATED,
  [ClaimStatus.COMPLETED]: TimelineEventType.COMPLETED,
  [ClaimStatus.CANCELLED]: TimelineEventType.STATUS_UPDATED,
  [ClaimStatus.DISPUTED]: TimelineEventType.STATUS_UPDATED,
};

export const CLAIM_STATUS_LABELS: Record<ClaimStatus, string> = {
  [ClaimStatus.PENDING]: "Pending Review",
  [ClaimStatus.VALIDATED]: "Validated",
  [ClaimStatus.REJECTED]: "Rejected",
  [ClaimStatus.ASSIGNED]: "Technician Assigned",
  [ClaimStatus.IN_REPAIR]: "In Repair",
  [ClaimStatus.REPAIRED]: "Repaired",
  [ClaimStatus.REPLACED]: "Replaced",
  [ClaimStatus.SHIPPED]: "Shipped",
  [ClaimStatus.DELIVERED]: "Delivered",
  [ClaimStatus.COMPLETED]: "Completed",
  [ClaimStatus.CANCELLED]: "Cancelled",
  [ClaimStatus.DISPUTED]: "Under Dispute",
};
