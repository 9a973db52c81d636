// src/modules/claims/claim.errors.ts

import {
  ConflictError,
  InvalidStateError,
  InvalidTransitionError,
  NotFoundError,
  PreconditionFailedError,
} from "@/lib/errors/errors";
import type { ClaimAction, ClaimStatus } from "./claim.types";

export class ClaimNotFoundError extends NotFoundError {
  constructor(public readonly claimId: string) {
    super(`Claim ${claimId} not found`, "CLAIM_NOT_FOUND");
  }
}

export class IllegalClaimTransitionError extends InvalidTransitionError {
  constructor(
    claimId: string,
    from: ClaimStatus,
    action: string,
    allowed: readonly ClaimAction[],
  ) {
    super(
      `Cannot ${action} claim ${claimId} while it is ${from}`,
      from,
      action,
      allowed,
      "CLAIM_TRANSITION_ILLEGAL",
    );
  }
}

export class ClaimStateError extends InvalidStateError {
  constructor(
    claimId: string,
    status: ClaimStatus,
    attempted: string,
    allowed: readonly ClaimAction[],
  ) {
    super(
      `Cannot ${attempted} claim ${claimId} while it is ${status}`,
      status,
      allowed,
      "CLAIM_INVALID_STATE",
    );
  }
}

export class ClaimVersionConflictError extends ConflictError {
  constructor(claimId: string) {
    super(
      `Claim ${claimId} was modified concurrently; reload and retry`,
      "CLAIM_VERSION_CONFLICT",
    );
  }
}

export class ClaimAlreadyOpenError extends ConflictError {
  constructor(barcode: string) {
    super(`An open claim already exists for ${barcode}`, "CLAIM_ALREADY_OPEN");
  }
}

export type WarrantyIneligibility =
  | "warranty_expired"
  | "warranty_inactive"
  | "warranty_claimed";

const INELIGIBILITY_CODES: Record<WarrantyIneligibility, string> = {
  warranty_expired: "WARRANTY_EXPIRED",
  warranty_inactive: "WARRANTY_INACTIVE",
  warranty_claimed: "WARRANTY_CLAIMED",
};

export class WarrantyNotClaimableError extends PreconditionFailedError {
  constructor(barcode: string, reason: WarrantyIneligibility) {
    super(
      `Warranty ${barcode} cannot be claimed (${reason})`,
      reason,
      INELIGIBILITY_CODES[reason],
    );
  }
}

export class RepairGateError extends PreconditionFailedError {
  constructor(claimId: string, reason: string) {
    super(`Claim ${claimId} is not ready for resolution (${reason})`, reason, "REPAIR_GATE_NOT_MET");
  }
}
