// src/constants/system.constants.ts
// Purpose: Centralized infrastructure-level constants (advisory lock keys, limits).

export const SYSTEM_CONSTANTS = {
  /** First key of the two-key advisory lock taken per batch during chunk commits. */
  BATCH_ADVISORY_LOCK_NAMESPACE: 937421,
  MAX_BATCH_QUANTITY: 100_000,
  MAX_BULK_CLAIM_UPDATE: 100,
  PUBLIC_LOOKUP_LIMIT: 50,
  IDEMPOTENCY_SCOPE_HTTP: "http",
  JSON_BODY_LIMIT: "1mb",
} as const;
