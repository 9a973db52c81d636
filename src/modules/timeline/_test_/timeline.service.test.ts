// src/modules/timeline/_test_/timeline.service.test.ts

import { beforeEach, describe, expect, it } from "vitest";
import { MemoryWarrantyStore } from "@/lib/store/memory.store";
import { agentActor, customerActor } from "@/testing/fixtures";
import { commitTimelineEvent } from "../commitTimelineEvent";
import { TimelineService } from "../timeline.service";
import { TimelineEventType } from "../timeline.types";

const AT = new Date("2024-03-01T09:00:00.000Z");

describe("Claim timeline", () => {
  let store: MemoryWarrantyStore;
  let service: TimelineService;

  beforeEach(() => {
    store = new MemoryWarrantyStore();
    service = new TimelineService(store.timeline);
  });

  it("should number events per claim and keep timestamps increasing", async () => {
    await store.transaction(async (tx) => {
      await commitTimelineEvent(
        tx,
        { claimId: "claim-a", eventType: TimelineEventType.SUBMITTED, description: "one", actor: customerActor },
        AT,
      );
      await commitTimelineEvent(
        tx,
        { claimId: "claim-a", eventType: TimelineEventType.VALIDATED, description: "two", actor: agentActor },
        AT,
      );
      await commitTimelineEvent(
        tx,
        { claimId: "claim-b", eventType: TimelineEventType.SUBMITTED, description: "other", actor: customerActor },
        AT,
      );
    });

    const events = await store.timeline.listByClaim("claim-a");
    expect(events.map((e) => e.sequence)).toEqual([1, 2]);
    expect(events.map((e) => e.occurredAt.toISOString())).toEqual([
      "2024-03-01T09:00:00.000Z",
      "2024-03-01T09:00:00.001Z",
    ]);

    const other = await store.timeline.listByClaim("claim-b");
    expect(other[0]?.sequence).toBe(1);
  });

  it("should discard events appended by a failed transaction", async () => {
    await expect(
      store.transaction(async (tx) => {
        await commitTimelineEvent(
          tx,
          { claimId: "claim-a", eventType: TimelineEventType.NOTE_ADDED, description: "lost", actor: agentActor },
          AT,
        );
        throw new Error("abort");
      }),
    ).rejects.toThrow("abort");

    expect(await store.timeline.listByClaim("claim-a")).toEqual([]);
  });

  it("should hide internal events and staff identities from customers", async () => {
    await store.transaction(async (tx) => {
      await commitTimelineEvent(
        tx,
        { claimId: "claim-a", eventType: TimelineEventType.SUBMITTED, description: "submitted", actor: customerActor },
        AT,
      );
      await commitTimelineEvent(
        tx,
        {
          claimId: "claim-a",
          eventType: TimelineEventType.NOTE_ADDED,
          description: "internal",
          actor: agentActor,
          visibleToCustomer: false,
        },
        AT,
      );
      await commitTimelineEvent(
        tx,
        {
          claimId: "claim-a",
          eventType: TimelineEventType.VALIDATED,
          description: "validated",
          actor: agentActor,
          metadata: { reviewer: "queue-3" },
        },
        AT,
      );
    });

    const customer = await service.listForViewer(customerActor, "claim-a");
    expect(customer).toEqual([
      {
        sequence: 1,
        eventType: TimelineEventType.SUBMITTED,
        description: "submitted",
        occurredAt: new Date("2024-03-01T09:00:00.000Z"),
        actorType: "customer",
        actorId: customerActor.actorId,
      },
      {
        sequence: 3,
        eventType: TimelineEventType.VALIDATED,
        description: "validated",
        occurredAt: new Date("2024-03-01T09:00:00.002Z"),
        actorType: "agent",
        actorId: null,
      },
    ]);

    const staff = await service.listForViewer(agentActor, "claim-a");
    expect(staff).toHaveLength(3);
    expect(staff[2]?.metadata).toEqual({ reviewer: "queue-3" });
  });
});
