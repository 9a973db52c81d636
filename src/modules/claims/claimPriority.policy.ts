// src/modules/claims/claimPriority.policy.ts

import {
  ClaimPriority,
  IssueCategory,
  Severity,
} from "./claim.types";

const ESCALATING_CATEGORIES: readonly IssueCategory[] = [
  IssueCategory.DEFECT,
  IssueCategory.MALFUNCTION,
];

/**
 * Default priority assigned on validation.
 * Medium severity lands on the "normal" tier; there is no "medium" priority.
 */
export function defaultClaimPriority(
  severity: Severity,
  category: IssueCategory,
): ClaimPriority {
  if (severity === Severity.CRITICAL) return ClaimPriority.HIGH;
  if (severity === Severity.HIGH && ESCALATING_CATEGORIES.includes(category)) {
    return ClaimPriority.HIGH;
  }
  if (severity === Severity.MEDIUM) return ClaimPriority.NORMAL;
  return ClaimPriority.LOW;
}
