// src/modules/claims/claimTransition.ts
// Purpose: The one write path for claim rows. Status changes go through
// applyClaimTransition so the table check, the version guard and the
// timeline append always happen in the same transaction.

import type { Actor } from "@/lib/auth/actor";
import type { StoreTx } from "@/lib/store/store.types";
import { log } from "@/lib/observability/logger";
import { sumMoney } from "@/utils/money";
import { commitTimelineEvent } from "@/modules/timeline/commitTimelineEvent";
import type { Claim, ClaimAction, ClaimPatch, ClaimStatus } from "./claim.types";
import {
  allowedClaimActions,
  claimActionTarget,
  type ResolveTarget,
} from "./claimLifecycle.transitions";
import { CLAIM_STATUS_LABELS, CLAIM_STATUS_TIMELINE_EVENTS } from "./claimLifecycle.events";
import { ClaimVersionConflictError, IllegalClaimTransitionError } from "./claim.errors";

export type ClaimTransitionResult = {
  claim: Claim;
  from: ClaimStatus;
  to: ClaimStatus;
};

export type ApplyClaimTransitionParams = {
  actor: Actor;
  claim: Claim;
  action: ClaimAction;
  at: Date;
  patch?: ClaimPatch;
  resolveTo?: ResolveTarget;
  description?: string;
  visibleToCustomer?: boolean;
  metadata?: Record<string, unknown>;
};

/** total = repair + shipping + replacement, recomputed whenever a cost is written. */
export function withCostTotals(claim: Claim, patch: ClaimPatch): ClaimPatch {
  const touchesCost =
    patch.repairCost !== undefined ||
    patch.shippingCost !== undefined ||
    patch.replacementCost !== undefined;
  if (!touchesCost) return patch;

  return {
    ...patch,
    totalCost: sumMoney(
      patch.repairCost ?? claim.repairCost,
      patch.shippingCost ?? claim.shippingCost,
      patch.replacementCost ?? claim.replacementCost,
    ),
  };
}

export function assertExpectedVersion(claim: Claim, expectedVersion?: number) {
  if (expectedVersion !== undefined && expectedVersion !== claim.version) {
    throw new ClaimVersionConflictError(claim.id);
  }
}

/** Version-guarded write without a status change. */
export async function updateClaim(
  tx: StoreTx,
  claim: Claim,
  patch: ClaimPatch,
  at: Date,
): Promise<Claim> {
  const updated = await tx.claims.update(claim.id, claim.version, {
    ...withCostTotals(claim, patch),
    updatedAt: at,
  });
  if (!updated) throw new ClaimVersionConflictError(claim.id);
  return updated;
}

export async function applyClaimTransition(
  tx: StoreTx,
  params: ApplyClaimTransitionParams,
): Promise<ClaimTransitionResult> {
  const { actor, claim, action, at } = params;

  const to = claimActionTarget(claim, action, params.resolveTo);
  if (to === null) {
    throw new IllegalClaimTransitionError(
      claim.id,
      claim.status,
      action,
      allowedClaimActions(claim),
    );
  }

  const updated = await updateClaim(
    tx,
    claim,
    {
      ...params.patch,
      status: to,
      previousStatus: claim.status,
      statusUpdatedAt: at,
      statusUpdatedBy: actor.actorId,
    },
    at,
  );

  await commitTimelineEvent(
    tx,
    {
      claimId: claim.id,
      eventType: CLAIM_STATUS_TIMELINE_EVENTS[to],
      description:
        params.description ??
        `Status changed from ${CLAIM_STATUS_LABELS[claim.status]} to ${CLAIM_STATUS_LABELS[to]}`,
      actor,
      visibleToCustomer: params.visibleToCustomer ?? true,
      metadata: { action, from: claim.status, to, ...params.metadata },
    },
    at,
  );

  log("INFO", "CLAIM_TRANSITION", {
    claimId: claim.id,
    claimNumber: claim.claimNumber,
    action,
    from: claim.status,
    to,
    actorId: actor.actorId,
  });

  return { claim: updated, from: claim.status, to };
}
