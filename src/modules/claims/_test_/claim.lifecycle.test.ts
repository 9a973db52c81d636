// src/modules/claims/_test_/claim.lifecycle.test.ts
// Claim state machine end to end: submission, review, repair and closure.

import { beforeEach, describe, expect, it } from "vitest";
import { buildTestContainer, type TestHarness } from "@/testing/testContainer";
import {
  agentActor,
  customerActor,
  otherCustomerActor,
  technicianActor,
  TEST_CUSTOMER,
} from "@/testing/fixtures";
import {
  activatedBarcode,
  driveToInRepair,
  finishRepair,
  HOUR,
  submitClaim,
} from "@/testing/claimFlow";
import { TimelineEventType } from "@/modules/timeline/timeline.types";
import { ClaimPriority, ClaimStatus, ResolutionType } from "../claim.types";

const CODE = "WB-2024-00000001";

describe("Claim lifecycle", () => {
  let h: TestHarness;

  beforeEach(async () => {
    h = buildTestContainer({ now: "2024-01-10T10:00:00.000Z" });
    await activatedBarcode(h, CODE);
    h.clock.set("2024-03-01T09:00:00.000Z");
  });

  it("should carry a repaired claim from submission to completion", async () => {
    const submitted = await submitClaim(h, CODE);
    expect(submitted.claimNumber).toBe("WAR-2024-000001");
    expect(submitted.status).toBe(ClaimStatus.PENDING);
    expect(submitted.contact.email).toBe(TEST_CUSTOMER.email);

    const ticket = await driveToInRepair(h, submitted.id);
    expect(ticket.ticketNumber).toBe("RPR-2024-000001");

    await finishRepair(h, ticket, { laborCost: 80, partsCost: 20 });

    h.clock.advance(HOUR);
    await h.container.claims.transition(agentActor, submitted.id, { action: "repair" });
    h.clock.advance(HOUR);
    await h.container.claims.transition(agentActor, submitted.id, {
      action: "ship",
      shippingProvider: "Test Courier",
      trackingNumber: "TRK-0001",
    });
    h.clock.advance(HOUR);
    await h.container.claims.transition(agentActor, submitted.id, { action: "deliver" });
    h.clock.advance(HOUR);
    const completed = await h.container.claims.complete(agentActor, submitted.id, {
      resolutionType: ResolutionType.REPAIR,
      resolutionNotes: "Display panel replaced",
    });

    expect(completed.status).toBe(ClaimStatus.COMPLETED);
    expect(completed.repairCost).toBe(100);
    expect(completed.totalCost).toBe(100);
    expect(completed.resolutionType).toBe(ResolutionType.REPAIR);
    expect(completed.trackingNumber).toBe("TRK-0001");
    expect(completed.completedAt?.toISOString()).toBe("2024-03-01T18:00:00.000Z");

    const timeline = await h.container.claims.timeline(agentActor, submitted.id);
    expect(timeline.map((e) => e.eventType)).toEqual([
      TimelineEventType.SUBMITTED,
      TimelineEventType.VALIDATED,
      TimelineEventType.ASSIGNED,
      TimelineEventType.REPAIR_STARTED,
      TimelineEventType.REPAIR_COMPLETED,
      TimelineEventType.QUALITY_APPROVED,
      TimelineEventType.STATUS_UPDATED,
      TimelineEventType.STATUS_UPDATED,
      TimelineEventType.STATUS_UPDATED,
      TimelineEventType.COMPLETED,
    ]);
    expect(timeline.map((e) => e.sequence)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    for (let i = 1; i < timeline.length; i++) {
      expect(timeline[i].occurredAt.getTime()).toBeGreaterThan(
        timeline[i - 1].occurredAt.getTime(),
      );
    }

    h.clock.advance(HOUR);
    await expect(
      h.container.claims.complete(agentActor, submitted.id, {
        resolutionType: ResolutionType.REPAIR,
        resolutionNotes: "again",
      }),
    ).rejects.toMatchObject({ kind: "invalid_transition" });

    const reread = await h.container.claims.get(agentActor, submitted.id);
    expect(reread.completedAt?.toISOString()).toBe("2024-03-01T18:00:00.000Z");
  });

  it("should reject an action the current state does not allow", async () => {
    const claim = await submitClaim(h, CODE);

    await expect(
      h.container.claims.transition(agentActor, claim.id, { action: "ship" }),
    ).rejects.toMatchObject({
      kind: "invalid_transition",
      code: "CLAIM_TRANSITION_ILLEGAL",
      currentState: ClaimStatus.PENDING,
      attemptedAction: "ship",
      allowedActions: ["validate", "reject", "cancel", "dispute"],
    });

    const unchanged = await h.container.claims.get(agentActor, claim.id);
    expect(unchanged.status).toBe(ClaimStatus.PENDING);
    expect(unchanged.version).toBe(1);
  });

  it("should refuse a claim on an expired warranty", async () => {
    const expired = buildTestContainer({ now: "2023-01-10T10:00:00.000Z" });
    await activatedBarcode(expired, "WB-2023-00000009", { periodMonths: 1 });
    expired.clock.set("2023-06-01T09:00:00.000Z");

    await expect(
      submitClaim(expired, "WB-2023-00000009", { issueDate: "2023-05-30" }),
    ).rejects.toMatchObject({
      kind: "precondition_failed",
      reason: "warranty_expired",
      code: "WARRANTY_EXPIRED",
    });
  });

  it("should allow one open claim per barcode", async () => {
    await submitClaim(h, CODE);

    await expect(submitClaim(h, CODE)).rejects.toMatchObject({
      kind: "conflict",
      code: "CLAIM_ALREADY_OPEN",
    });
  });

  it("should accept a new claim once the previous one is cancelled", async () => {
    const first = await submitClaim(h, CODE);
    const cancelled = await h.container.claims.transition(customerActor, first.id, {
      action: "cancel",
      notes: "Fixed itself",
    });
    expect(cancelled.status).toBe(ClaimStatus.CANCELLED);
    expect(cancelled.customerNotes).toBe("Fixed itself");
    expect("adminNotes" in cancelled).toBe(false);

    const second = await submitClaim(h, CODE);
    expect(second.claimNumber).toBe("WAR-2024-000002");
  });

  it("should keep customers to cancel and dispute", async () => {
    const claim = await submitClaim(h, CODE);

    await expect(
      h.container.claims.transition(customerActor, claim.id, { action: "validate" }),
    ).rejects.toMatchObject({ kind: "forbidden" });
    await expect(
      h.container.claims.transition(otherCustomerActor, claim.id, { action: "cancel" }),
    ).rejects.toMatchObject({ kind: "not_found" });
    await expect(h.container.claims.submit(agentActor, {
      barcode: CODE,
      issueCategory: "hardware",
      issueDescription: "Agents cannot file claims",
      issueDate: "2024-02-28",
      severity: "low",
    })).rejects.toMatchObject({ kind: "forbidden" });
  });

  it("should guard writes with the expected version", async () => {
    const claim = await submitClaim(h, CODE);

    await expect(
      h.container.claims.validate(agentActor, claim.id, { expectedVersion: 2 }),
    ).rejects.toMatchObject({ kind: "conflict", code: "CLAIM_VERSION_CONFLICT" });

    const validated = await h.container.claims.validate(agentActor, claim.id, {
      expectedVersion: 1,
    });
    expect(validated.version).toBe(2);
    expect(validated.priority).toBe(ClaimPriority.NORMAL);
    expect(validated.validatedBy).toBe(agentActor.actorId);
  });

  it("should raise priority for critical issues on validation", async () => {
    const claim = await submitClaim(h, CODE, { severity: "critical" });
    const validated = await h.container.claims.validate(agentActor, claim.id);
    expect(validated.priority).toBe(ClaimPriority.HIGH);
  });

  it("should block resolution until quality check passes", async () => {
    const claim = await submitClaim(h, CODE);
    const ticket = await driveToInRepair(h, claim.id);
    await h.container.repairs.complete(technicianActor, ticket.id, {
      actualHours: 2,
      laborCost: 80,
      partsCost: 20,
    });

    await expect(
      h.container.claims.transition(agentActor, claim.id, { action: "repair" }),
    ).rejects.toMatchObject({
      kind: "precondition_failed",
      code: "REPAIR_GATE_NOT_MET",
      reason: "quality_check_pending",
    });

    const current = await h.container.claims.get(agentActor, claim.id);
    expect(current.status).toBe(ClaimStatus.IN_REPAIR);
  });

  it("should return a disputed claim to where it was", async () => {
    const claim = await submitClaim(h, CODE);
    await h.container.claims.validate(agentActor, claim.id);

    const disputed = await h.container.claims.transition(customerActor, claim.id, {
      action: "dispute",
      reason: "Waited too long",
    });
    expect(disputed.status).toBe(ClaimStatus.DISPUTED);
    expect(disputed.previousStatus).toBe(ClaimStatus.VALIDATED);

    const resolved = await h.container.claims.transition(agentActor, claim.id, {
      action: "resolve",
    });
    expect(resolved.status).toBe(ClaimStatus.VALIDATED);
  });

  it("should record the information request without moving the claim", async () => {
    const claim = await submitClaim(h, CODE);

    const updated = await h.container.claims.requestInfo(agentActor, claim.id, {
      message: "Please send a photo of the receipt",
    });
    expect(updated.status).toBe(ClaimStatus.PENDING);
    expect(updated.version).toBe(2);

    const timeline = await h.container.claims.timeline(customerActor, claim.id);
    expect(timeline.map((e) => e.description)).toEqual([
      "Claim WAR-2024-000001 submitted",
      "Additional information requested: Please send a photo of the receipt",
    ]);
    expect(timeline[0].actorId).toBe(customerActor.actorId);
    expect(timeline[1].actorId).toBeNull();
  });

  it("should hide internal notes from the customer timeline", async () => {
    const claim = await submitClaim(h, CODE);
    await h.container.claims.addNote(agentActor, claim.id, {
      note: "Customer called twice",
      visibleToCustomer: false,
    });
    await h.container.claims.addNote(customerActor, claim.id, { note: "Any update?" });

    const staff = await h.container.claims.timeline(agentActor, claim.id);
    const customer = await h.container.claims.timeline(customerActor, claim.id);
    expect(staff).toHaveLength(3);
    expect(customer.map((e) => e.description)).toEqual([
      "Claim WAR-2024-000001 submitted",
      "Any update?",
    ]);
  });

  it("should report bulk updates per claim", async () => {
    await activatedBarcode(h, "WB-2024-00000002");
    const a = await submitClaim(h, CODE);
    const b = await submitClaim(h, "WB-2024-00000002");

    const result = await h.container.claims.bulkStatus(agentActor, {
      claimIds: [a.id, b.id, "missing-claim"],
      action: "validate",
    });

    expect(result).toMatchObject({ total: 3, succeeded: 2, failed: 1 });
    expect(result.results[0]).toEqual({
      claimId: a.id,
      ok: true,
      status: ClaimStatus.VALIDATED,
      version: 2,
    });
    expect(result.results[2]).toMatchObject({
      claimId: "missing-claim",
      ok: false,
      error: { code: "CLAIM_NOT_FOUND", kind: "not_found" },
    });
  });

  it("should accept feedback once on a completed claim", async () => {
    const claim = await submitClaim(h, CODE);

    await expect(
      h.container.claims.feedback(customerActor, claim.id, { rating: 4 }),
    ).rejects.toMatchObject({ kind: "invalid_state" });

    const ticket = await driveToInRepair(h, claim.id);
    await finishRepair(h, ticket, { laborCost: 10, partsCost: 0 });
    await h.container.claims.transition(agentActor, claim.id, { action: "repair" });
    await h.container.claims.transition(agentActor, claim.id, { action: "ship" });
    await h.container.claims.transition(agentActor, claim.id, { action: "deliver" });
    await h.container.claims.complete(agentActor, claim.id, {
      resolutionType: ResolutionType.REPAIR,
      resolutionNotes: "Cable reseated",
    });

    const rated = await h.container.claims.feedback(customerActor, claim.id, {
      rating: 5,
      feedback: "Quick turnaround",
    });
    expect(rated.satisfactionRating).toBe(5);

    await expect(
      h.container.claims.feedback(customerActor, claim.id, { rating: 1 }),
    ).rejects.toMatchObject({ code: "FEEDBACK_ALREADY_SUBMITTED" });
  });

  it("should notify the customer on submission and status changes", async () => {
    const claim = await submitClaim(h, CODE);
    await h.container.claims.validate(agentActor, claim.id);

    expect(h.notifications.ofTemplate("claim_submitted")).toEqual([
      {
        recipient: TEST_CUSTOMER.email,
        templateId: "claim_submitted",
        payload: { claimId: claim.id, claimNumber: "WAR-2024-000001", barcode: CODE },
      },
    ]);
    expect(h.notifications.ofTemplate("claim_status_changed")[0]?.payload).toMatchObject({
      from: ClaimStatus.PENDING,
      to: ClaimStatus.VALIDATED,
      displayStatus: "Validated",
    });
  });
});
