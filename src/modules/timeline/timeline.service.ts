// src/modules/timeline/timeline.service.ts

/**
 * TIMELINE READ SERVICE
 *
 * Reads the append-only claim timeline for a viewer.
 *
 * - This service never writes; appends go through commitTimelineEvent
 *   inside the transaction that changed the claim.
 * - Customers only see events flagged visible_to_customer.
 * - Staff see every event, in sequence order.
 */

import { isStaff, type Actor } from "@/lib/auth/actor";
import type { TimelineRepository } from "@/lib/store/store.types";
import type { TimelineEvent } from "./timeline.types";

export type TimelineEntry = Pick<
  TimelineEvent,
  "sequence" | "eventType" | "description" | "occurredAt" | "actorType"
> & {
  actorId: string | null;
  visibleToCustomer?: boolean;
  metadata?: Record<string, unknown>;
};

export class TimelineService {
  constructor(private readonly timeline: TimelineRepository) {}

  async listForViewer(viewer: Actor, claimId: string): Promise<TimelineEntry[]> {
    if (isStaff(viewer)) {
      const events = await this.timeline.listByClaim(claimId);
      return events.map((event) => ({
        sequence: event.sequence,
        eventType: event.eventType,
        description: event.description,
        occurredAt: event.occurredAt,
        actorType: event.actorType,
        actorId: event.actorId,
        visibleToCustomer: event.visibleToCustomer,
        metadata: event.metadata,
      }));
    }

    const visible = await this.timeline.listByClaim(claimId, {
      customerVisibleOnly: true,
    });

    // staff identities and internal metadata stay server-side
    return visible.map((event) => ({
      sequence: event.sequence,
      eventType: event.eventType,
      description: event.description,
      occurredAt: event.occurredAt,
      actorType: event.actorType,
      actorId: event.actorId === viewer.actorId ? event.actorId : null,
    }));
  }
}
