// src/modules/repairs/_test_/repairTicket.service.test.ts

import { beforeEach, describe, expect, it } from "vitest";
import { ActorType, type Actor } from "@/lib/auth/actor";
import { buildTestContainer, type TestHarness } from "@/testing/testContainer";
import {
  agentActor,
  customerActor,
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
import { BarcodeStatus } from "@/modules/barcodes/barcode.types";
import { ClaimStatus, ResolutionType } from "@/modules/claims/claim.types";
import {
  CustomerApprovalStatus,
  QualityCheckStatus,
  TicketStatus,
} from "../repairTicket.types";

const CODE = "WB-2024-00000001";

const strangerTechnician: Actor = {
  actorId: "tech-99",
  actorType: ActorType.TECHNICIAN,
  roles: [],
};

describe("RepairTicketService", () => {
  let h: TestHarness;

  beforeEach(async () => {
    h = buildTestContainer({ now: "2024-01-10T10:00:00.000Z" });
    await activatedBarcode(h, CODE);
    h.clock.set("2024-03-01T09:00:00.000Z");
  });

  it("should open a ticket for an assigned claim and refuse a second one", async () => {
    const claim = await submitClaim(h, CODE);
    await h.container.claims.validate(agentActor, claim.id);
    await h.container.claims.assignTechnician(agentActor, claim.id, {
      technicianId: technicianActor.actorId,
    });

    const ticket = await h.container.repairs.create(agentActor, claim.id, {
      estimatedHours: 2,
      description: "Replace the display assembly",
      requiredParts: ["display-panel"],
    });
    expect(ticket).toMatchObject({
      ticketNumber: "RPR-2024-000001",
      status: TicketStatus.ASSIGNED,
      assignedTechnicianId: technicianActor.actorId,
      customerApprovalStatus: CustomerApprovalStatus.NOT_REQUIRED,
      reworkCount: 0,
    });

    await expect(
      h.container.repairs.create(agentActor, claim.id, {
        estimatedHours: 1,
        description: "A duplicate work order",
      }),
    ).rejects.toMatchObject({ kind: "conflict", code: "TICKET_ALREADY_OPEN" });

    const started = await h.container.repairs.start(technicianActor, ticket.id);
    expect(started.status).toBe(TicketStatus.IN_PROGRESS);
    const parent = await h.container.claims.get(agentActor, claim.id);
    expect(parent.status).toBe(ClaimStatus.IN_REPAIR);
  });

  it("should refuse a ticket on a claim that is not yet assigned", async () => {
    const claim = await submitClaim(h, CODE);

    await expect(
      h.container.repairs.create(agentActor, claim.id, {
        estimatedHours: 1,
        description: "Too early for a work order",
      }),
    ).rejects.toMatchObject({ kind: "invalid_state", code: "CLAIM_INVALID_STATE" });
  });

  it("should only let the assigned technician work the ticket", async () => {
    const claim = await submitClaim(h, CODE);
    const ticket = await driveToInRepair(h, claim.id);

    await expect(
      h.container.repairs.complete(strangerTechnician, ticket.id, {
        actualHours: 1,
        laborCost: 10,
      }),
    ).rejects.toMatchObject({ kind: "forbidden" });

    await expect(h.container.repairs.get(strangerTechnician, ticket.id)).rejects.toMatchObject({
      kind: "not_found",
    });
  });

  it("should roll ticket costs up to the claim", async () => {
    const claim = await submitClaim(h, CODE);
    const ticket = await driveToInRepair(h, claim.id);

    const completed = await h.container.repairs.complete(technicianActor, ticket.id, {
      actualHours: 2,
      laborCost: 60,
      usedParts: [
        { partNumber: "P-100", partName: "Ribbon cable", quantity: 2, unitCost: 7.5 },
      ],
    });
    expect(completed.usedParts[0]?.totalCost).toBe(15);
    expect(completed.partsCost).toBe(15);
    expect(completed.totalCost).toBe(75);

    const parent = await h.container.claims.get(agentActor, claim.id);
    expect(parent.repairCost).toBe(75);
    expect(parent.totalCost).toBe(75);
  });

  it("should reopen work on a failed quality check and keep the first costs", async () => {
    const claim = await submitClaim(h, CODE);
    const ticket = await driveToInRepair(h, claim.id);
    await h.container.repairs.complete(technicianActor, ticket.id, {
      actualHours: 1,
      laborCost: 80,
      partsCost: 20,
    });

    const reopened = await h.container.repairs.qualityCheck(agentActor, ticket.id, {
      approved: false,
      notes: "Backlight still flickers",
    });
    expect(reopened.status).toBe(TicketStatus.IN_PROGRESS);
    expect(reopened.reworkCount).toBe(1);
    expect(reopened).toMatchObject({
      qualityCheckStatus: QualityCheckStatus.REJECTED,
      qualityCheckedBy: agentActor.actorId,
      qualityCheckNotes: "Backlight still flickers",
      actualCompletionDate: null,
    });

    await expect(
      h.container.claims.transition(agentActor, claim.id, { action: "repair" }),
    ).rejects.toMatchObject({ reason: "repair_not_completed" });

    h.clock.advance(HOUR);
    const redone = await h.container.repairs.complete(technicianActor, ticket.id, {
      actualHours: 3,
      laborCost: 999,
      partsCost: 1,
    });
    expect(redone.laborCost).toBe(80);
    expect(redone.totalCost).toBe(100);
    expect(redone.qualityCheckStatus).toBe(QualityCheckStatus.PENDING);

    const approved = await h.container.repairs.qualityCheck(agentActor, ticket.id, {
      approved: true,
    });
    expect(approved.qualityCheckStatus).toBe(QualityCheckStatus.APPROVED);

    const repaired = await h.container.claims.transition(agentActor, claim.id, {
      action: "repair",
    });
    expect(repaired.status).toBe(ClaimStatus.REPAIRED);

    const customerView = await h.container.claims.timeline(customerActor, claim.id);
    expect(customerView.map((e) => e.description)).not.toContain(
      "Quality check failed; repair reopened",
    );
  });

  it("should hold resolution for customer approval above the cost threshold", async () => {
    const claim = await submitClaim(h, CODE);
    const ticket = await driveToInRepair(h, claim.id);

    const completed = await h.container.repairs.complete(technicianActor, ticket.id, {
      actualHours: 4,
      laborCost: 400,
      partsCost: 200,
    });
    expect(completed.customerApprovalRequired).toBe(true);
    expect(completed.customerApprovalStatus).toBe(CustomerApprovalStatus.PENDING);
    expect(h.notifications.ofTemplate("customer_approval_requested")).toEqual([
      {
        recipient: TEST_CUSTOMER.email,
        templateId: "customer_approval_requested",
        payload: {
          claimId: claim.id,
          claimNumber: "WAR-2024-000001",
          ticketNumber: "RPR-2024-000001",
          totalCost: 600,
        },
      },
    ]);

    await h.container.repairs.qualityCheck(agentActor, ticket.id, { approved: true });
    await expect(
      h.container.claims.transition(agentActor, claim.id, { action: "repair" }),
    ).rejects.toMatchObject({
      code: "REPAIR_GATE_NOT_MET",
      reason: "customer_approval_pending",
    });

    await expect(
      h.container.repairs.customerApproval(agentActor, ticket.id, { approved: true }),
    ).rejects.toMatchObject({ kind: "forbidden" });

    const decided = await h.container.repairs.customerApproval(customerActor, ticket.id, {
      approved: true,
      notes: "Go ahead",
    });
    expect(decided.customerApprovalStatus).toBe(CustomerApprovalStatus.APPROVED);

    const repaired = await h.container.claims.transition(agentActor, claim.id, {
      action: "repair",
    });
    expect(repaired.status).toBe(ClaimStatus.REPAIRED);
  });

  it("should consume the warranty when a claim completes by replacement", async () => {
    const claim = await submitClaim(h, CODE);
    const ticket = await driveToInRepair(h, claim.id);
    await finishRepair(h, ticket, { laborCost: 30, partsCost: 0 });

    const replaced = await h.container.claims.transition(agentActor, claim.id, {
      action: "replace",
      replacementProductId: "prod-test-phone",
      replacementCost: 250,
    });
    expect(replaced.status).toBe(ClaimStatus.REPLACED);
    expect(replaced.totalCost).toBe(280);

    await h.container.claims.transition(agentActor, claim.id, { action: "ship" });
    await h.container.claims.transition(agentActor, claim.id, { action: "deliver" });

    await expect(
      h.container.claims.complete(agentActor, claim.id, {
        resolutionType: ResolutionType.REPAIR,
        resolutionNotes: "Wrong resolution",
      }),
    ).rejects.toMatchObject({ kind: "invalid_argument" });

    await h.container.claims.complete(agentActor, claim.id, {
      resolutionType: ResolutionType.REPLACE,
      resolutionNotes: "Unit swapped",
    });

    const barcode = await h.store.barcodes.findByCode(CODE);
    expect(barcode?.status).toBe(BarcodeStatus.CLAIMED);

    await expect(submitClaim(h, CODE)).rejects.toMatchObject({
      kind: "precondition_failed",
      reason: "warranty_claimed",
    });
  });

  it("should cancel a live ticket and record it for staff only", async () => {
    const claim = await submitClaim(h, CODE);
    const ticket = await driveToInRepair(h, claim.id);

    const cancelled = await h.container.repairs.cancel(agentActor, ticket.id, {
      reason: "Part unavailable",
    });
    expect(cancelled.status).toBe(TicketStatus.CANCELLED);
    expect(cancelled.cancellationReason).toBe("Part unavailable");

    await expect(
      h.container.claims.transition(agentActor, claim.id, { action: "repair" }),
    ).rejects.toMatchObject({ reason: "no_repair_ticket" });

    const staff = await h.container.claims.timeline(agentActor, claim.id);
    expect(staff[staff.length - 1]).toMatchObject({
      description: "Repair ticket RPR-2024-000001 cancelled",
      visibleToCustomer: false,
    });
  });
});
