// src/modules/timeline/commitTimelineEvent.ts
// Canonical append entry point for the claim timeline.
// Always runs inside the transaction that made the change it records.

import type { Actor } from "@/lib/auth/actor";
import type { StoreTx } from "@/lib/store/store.types";
import type { TimelineEvent, TimelineEventType } from "./timeline.types";

export type CommitTimelineEventParams = {
  claimId: string;
  eventType: TimelineEventType;
  description: string;
  actor: Actor;
  visibleToCustomer?: boolean;
  metadata?: Record<string, unknown>;
};

export async function commitTimelineEvent(
  tx: StoreTx,
  input: CommitTimelineEventParams,
  at: Date,
): Promise<TimelineEvent> {
  return tx.timeline.append(
    {
      claimId: input.claimId,
      eventType: input.eventType,
      description: input.description,
      actorId: input.actor.actorId,
      actorType: input.actor.actorType,
      visibleToCustomer: input.visibleToCustomer ?? true,
      metadata: input.metadata ?? {},
    },
    at,
  );
}
