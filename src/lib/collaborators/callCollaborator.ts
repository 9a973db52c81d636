// src/lib/collaborators/callCollaborator.ts

import { DomainError } from "@/lib/errors/domain-error";
import { DependencyFailureError } from "@/lib/errors/errors";
import { errorMeta, log } from "@/lib/observability/logger";

/**
 * Runs a collaborator call the operation cannot proceed without.
 * Unexpected failures surface as dependency_failure.
 */
export async function callCollaborator<T>(
  dependency: string,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof DomainError) throw err;

    log("WARN", "COLLABORATOR_CALL_FAILED", { dependency, ...errorMeta(err) });
    throw new DependencyFailureError(`${dependency} is unavailable`, dependency);
  }
}
