// src/testing/claimFlow.ts
// Steps shared by claim, repair and attachment tests.

import type { Actor } from "@/lib/auth/actor";
import type { CustomerClaimView } from "@/modules/claims/claim.view";
import type { SubmitClaimInput } from "@/modules/claims/claim.schemas";
import type { RepairTicket } from "@/modules/repairs/repairTicket.types";
import { agentActor, customerActor, technicianActor } from "./fixtures";
import type { TestHarness } from "./testContainer";

export const HOUR = 60 * 60 * 1000;

/** Seeds a barcode and activates it for the customer at the current clock time. */
export async function activatedBarcode(
  h: TestHarness,
  code: string,
  opts: { periodMonths?: number; owner?: Actor } = {},
) {
  await h.seedBarcode(code, opts.periodMonths ?? 24);
  return h.container.barcodes.activate(opts.owner ?? customerActor, code, {
    purchaseDate: h.clock.now().toISOString().slice(0, 10),
  });
}

export function claimInput(code: string, overrides: Partial<SubmitClaimInput> = {}): SubmitClaimInput {
  return {
    barcode: code,
    issueCategory: "hardware",
    issueDescription: "Screen flickers shortly after boot",
    issueDate: "2024-02-28",
    severity: "medium",
    ...overrides,
  };
}

export async function submitClaim(
  h: TestHarness,
  code: string,
  overrides: Partial<SubmitClaimInput> = {},
): Promise<CustomerClaimView> {
  return h.container.claims.submit(customerActor, claimInput(code, overrides));
}

/** pending -> validated -> assigned -> in_repair. Advances the clock an hour per step. */
export async function driveToInRepair(h: TestHarness, claimId: string): Promise<RepairTicket> {
  h.clock.advance(HOUR);
  await h.container.claims.validate(agentActor, claimId);
  h.clock.advance(HOUR);
  await h.container.claims.assignTechnician(agentActor, claimId, {
    technicianId: technicianActor.actorId,
  });
  h.clock.advance(HOUR);
  await h.container.claims.transition(technicianActor, claimId, { action: "start" });

  const [ticket] = await h.container.repairs.listByClaim(agentActor, claimId);
  if (!ticket) throw new Error(`no repair ticket opened for ${claimId}`);
  return ticket;
}

/** Completes the live ticket and approves it at quality check. */
export async function finishRepair(
  h: TestHarness,
  ticket: RepairTicket,
  costs: { laborCost: number; partsCost: number },
): Promise<RepairTicket> {
  h.clock.advance(HOUR);
  await h.container.repairs.complete(technicianActor, ticket.id, {
    actualHours: 1.5,
    laborCost: costs.laborCost,
    partsCost: costs.partsCost,
    testResults: [{ testName: "Display burn-in", result: "passed" }],
  });
  h.clock.advance(HOUR);
  return h.container.repairs.qualityCheck(agentActor, ticket.id, { approved: true });
}

