// src/modules/claims/claimLifecycle.transitions.ts
// Purpose: Closed transition law for warranty claims.

import { ClaimAction, ClaimStatus, type Claim } from "./claim.types";

/**
 * If it is not declared here, it does not exist.
 * Terminal states map to [].
 */
export const CLAIM_TRANSITIONS: Record<ClaimStatus, readonly ClaimStatus[]> = {
  [ClaimStatus.PENDING]: [
    ClaimStatus.VALIDATED,
    ClaimStatus.REJECTED,
    ClaimStatus.CANCELLED,
    ClaimStatus.DISPUTED,
  ],

  [ClaimStatus.VALIDATED]: [
    ClaimStatus.ASSIGNED,
    ClaimStatus.CANCELLED,
    ClaimStatus.DISPUTED,
  ],

  [ClaimStatus.ASSIGNED]: [ClaimStatus.IN_REPAIR, ClaimStatus.DISPUTED],

  [ClaimStatus.IN_REPAIR]: [
    ClaimStatus.REPAIRED,
    ClaimStatus.REPLACED,
    ClaimStatus.DISPUTED,
  ],

  [ClaimStatus.REPAIRED]: [ClaimStatus.SHIPPED, ClaimStatus.DISPUTED],

  [ClaimStatus.REPLACED]: [ClaimStatus.SHIPPED, ClaimStatus.DISPUTED],

  [ClaimStatus.SHIPPED]: [ClaimStatus.DELIVERED, ClaimStatus.DISPUTED],

  [ClaimStatus.DELIVERED]: [ClaimStatus.COMPLETED, ClaimStatus.DISPUTED],

  // resolve returns to the prior state or closes the claim
  [ClaimStatus.DISPUTED]: [
    ClaimStatus.PENDING,
    ClaimStatus.VALIDATED,
    ClaimStatus.ASSIGNED,
    ClaimStatus.IN_REPAIR,
    ClaimStatus.REPAIRED,
    ClaimStatus.REPLACED,
    ClaimStatus.SHIPPED,
    ClaimStatus.DELIVERED,
    ClaimStatus.COMPLETED,
  ],

  // Terminal states

  [ClaimStatus.REJECTED]: [],

  [ClaimStatus.COMPLETED]: [],

  [ClaimStatus.CANCELLED]: [],
};

export const CLAIM_ACTIONS = [
  ClaimAction.VALIDATE,
  ClaimAction.REJECT,
  ClaimAction.CANCEL,
  ClaimAction.ASSIGN,
  ClaimAction.START,
  ClaimAction.REPAIR,
  ClaimAction.REPLACE,
  ClaimAction.SHIP,
  ClaimAction.DELIVER,
  ClaimAction.COMPLETE,
  ClaimAction.DISPUTE,
  ClaimAction.RESOLVE,
] as const;

type ActionRule = {
  from: readonly ClaimStatus[];
  to: ClaimStatus;
};

/** Every action names the states it may fire from and the state it lands in. */
export const CLAIM_ACTION_RULES: Record<
  Exclude<ClaimAction, "resolve">,
  ActionRule
> = {
  [ClaimAction.VALIDATE]: { from: [ClaimStatus.PENDING], to: ClaimStatus.VALIDATED },
  [ClaimAction.REJECT]: { from: [ClaimStatus.PENDING], to: ClaimStatus.REJECTED },
  [ClaimAction.CANCEL]: {
    from: [ClaimStatus.PENDING, ClaimStatus.VALIDATED],
    to: ClaimStatus.CANCELLED,
  },
  [ClaimAction.ASSIGN]: { from: [ClaimStatus.VALIDATED], to: ClaimStatus.ASSIGNED },
  [ClaimAction.START]: { from: [ClaimStatus.ASSIGNED], to: ClaimStatus.IN_REPAIR },
  [ClaimAction.REPAIR]: { from: [ClaimStatus.IN_REPAIR], to: ClaimStatus.REPAIRED },
  [ClaimAction.REPLACE]: { from: [ClaimStatus.IN_REPAIR], to: ClaimStatus.REPLACED },
  [ClaimAction.SHIP]: {
    from: [ClaimStatus.REPAIRED, ClaimStatus.REPLACED],
    to: ClaimStatus.SHIPPED,
  },
  [ClaimAction.DELIVER]: { from: [ClaimStatus.SHIPPED], to: ClaimStatus.DELIVERED },
  [ClaimAction.COMPLETE]: { from: [ClaimStatus.DELIVERED], to: ClaimStatus.COMPLETED },
  [ClaimAction.DISPUTE]: {
    from: [
      ClaimStatus.PENDING,
      ClaimStatus.VALIDATED,
      ClaimStatus.ASSIGNED,
      ClaimStatus.IN_REPAIR,
      ClaimStatus.REPAIRED,
      ClaimStatus.REPLACED,
      ClaimStatus.SHIPPED,
      ClaimStatus.DELIVERED,
    ],
    to: ClaimStatus.DISPUTED,
  },
};

export type ResolveTarget = "previous" | "completed";

export function isTerminalClaimStatus(status: ClaimStatus): boolean {
  return CLAIM_TRANSITIONS[status].length === 0;
}

export function canTransitionClaim(from: ClaimStatus, to: ClaimStatus): boolean {
  return CLAIM_TRANSITIONS[from].includes(to);
}

/**
 * Landing state for `action` on `claim`, or null when the action is not
 * legal from the claim's current state.
 */
export function claimActionTarget(
  claim: Pick<Claim, "status" | "previousStatus">,
  action: ClaimAction,
  resolveTo: ResolveTarget = "previous",
): ClaimStatus | null {
  if (action === ClaimAction.RESOLVE) {
    if (claim.status !== ClaimStatus.DISPUTED) return null;
    const prior = claim.previousStatus;
    if (resolveTo === "completed" || prior === null || prior === ClaimStatus.DISPUTED) {
      return ClaimStatus.COMPLETED;
    }
    return canTransitionClaim(claim.status, prior) ? prior : null;
  }

  const rule = CLAIM_ACTION_RULES[action];
  if (!rule.from.includes(claim.status)) return null;
  return canTransitionClaim(claim.status, rule.to) ? rule.to : null;
}

export function allowedClaimActions(
  claim: Pick<Claim, "status" | "previousStatus">,
): ClaimAction[] {
  return CLAIM_ACTIONS.filter((action) => claimActionTarget(claim, action) !== null);
}
