// src/modules/claims/claim.notifications.ts
// Post-commit customer notifications. Never awaited by the operation that triggers them.

import {
  dispatchNotification,
  type NotificationSink,
} from "@/lib/collaborators/notification-sink";
import type { Claim } from "./claim.types";
import type { ClaimTransitionResult } from "./claimTransition";
import { CLAIM_STATUS_LABELS } from "./claimLifecycle.events";

export function notifyClaimSubmitted(sink: NotificationSink, claim: Claim) {
  void dispatchNotification(sink, claim.contact.email, "claim_submitted", {
    claimId: claim.id,
    claimNumber: claim.claimNumber,
    barcode: claim.barcode,
  });
}

export function notifyClaimStatusChanged(
  sink: NotificationSink,
  result: ClaimTransitionResult,
) {
  void dispatchNotification(sink, result.claim.contact.email, "claim_status_changed", {
    claimId: result.claim.id,
    claimNumber: result.claim.claimNumber,
    from: result.from,
    to: result.to,
    displayStatus: CLAIM_STATUS_LABELS[result.to],
  });
}
