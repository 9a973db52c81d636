// src/modules/batches/batch.errors.ts

import { InvalidStateError, NotFoundError } from "@/lib/errors/errors";
import type { BatchStatus } from "./batch.types";
import { allowedBatchActions } from "./batchLifecycle.transitions";

export class BatchNotFoundError extends NotFoundError {
  constructor(public readonly batchId: string) {
    super(`Batch ${batchId} not found`, "BATCH_NOT_FOUND");
  }
}

export class BatchStateError extends InvalidStateError {
  constructor(batchId: string, status: BatchStatus, attempted: string) {
    super(
      `Cannot ${attempted} batch ${batchId} while it is ${status}`,
      status,
      allowedBatchActions(status),
      "BATCH_INVALID_STATE",
    );
  }
}
