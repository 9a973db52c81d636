// src/modules/claims/claim.view.ts
// Read projections of a claim. Derived fields are computed here and never stored.

import { differenceInMinutes } from "date-fns";
import { ActorType, isStaff, type Actor } from "@/lib/auth/actor";
import type { Claim, ClaimAction } from "./claim.types";
import { allowedClaimActions } from "./claimLifecycle.transitions";
import { CLAIM_STATUS_LABELS } from "./claimLifecycle.events";

export type ClaimView = Claim & {
  displayStatus: string;
  nextActions: ClaimAction[];
  processingTimeHours: number;
};

export type CustomerClaimView = Omit<ClaimView, "adminNotes" | "assignedTechnicianId">;

const CUSTOMER_ACTIONS: readonly ClaimAction[] = ["cancel", "dispute"];

export function processingTimeHours(claim: Claim, now: Date): number {
  const end = claim.completedAt ?? now;
  const minutes = Math.max(0, differenceInMinutes(end, claim.claimDate));
  return Math.round((minutes / 60) * 10) / 10;
}

export function toClaimView(claim: Claim, now: Date): ClaimView {
  return {
    ...claim,
    displayStatus: CLAIM_STATUS_LABELS[claim.status],
    nextActions: allowedClaimActions(claim),
    processingTimeHours: processingTimeHours(claim, now),
  };
}

export function toCustomerClaimView(claim: Claim, now: Date): CustomerClaimView {
  const { adminNotes: _adminNotes, assignedTechnicianId: _technician, ...rest } =
    toClaimView(claim, now);
  return {
    ...rest,
    nextActions: rest.nextActions.filter((action) => CUSTOMER_ACTIONS.includes(action)),
  };
}

export function isClaimOwner(actor: Actor, claim: Pick<Claim, "customerId">): boolean {
  return actor.actorType === ActorType.CUSTOMER && actor.actorId === claim.customerId;
}

/** Staff, the owning customer, and the technician on the claim may read it. */
export function canViewClaim(
  actor: Actor,
  claim: Pick<Claim, "customerId" | "assignedTechnicianId">,
): boolean {
  if (isStaff(actor) || isClaimOwner(actor, claim)) return true;
  return (
    actor.actorType === ActorType.TECHNICIAN &&
    claim.assignedTechnicianId === actor.actorId
  );
}

export function viewClaimFor(
  actor: Actor,
  claim: Claim,
  now: Date,
): ClaimView | CustomerClaimView {
  return isClaimOwner(actor, claim)
    ? toCustomerClaimView(claim, now)
    : toClaimView(claim, now);
}
