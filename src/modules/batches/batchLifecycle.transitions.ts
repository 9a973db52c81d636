// src/modules/batches/batchLifecycle.transitions.ts
// Closed transition law for batches. Terminal states map to [].

import { BatchStatus } from "./batch.types";

export const BATCH_TRANSITIONS: Record<BatchStatus, readonly BatchStatus[]> = {
  [BatchStatus.PENDING]: [BatchStatus.IN_PROGRESS, BatchStatus.CANCELLED],

  [BatchStatus.IN_PROGRESS]: [
    BatchStatus.COMPLETED,
    BatchStatus.CANCELLED,
    BatchStatus.FAILED,
  ],

  [BatchStatus.COMPLETED]: [],

  [BatchStatus.CANCELLED]: [],

  [BatchStatus.FAILED]: [],
};

export const BATCH_ACTIONS = ["start", "cancel"] as const;

export type BatchAction = (typeof BATCH_ACTIONS)[number];

const ACTION_TARGET: Record<BatchAction, BatchStatus> = {
  start: BatchStatus.IN_PROGRESS,
  cancel: BatchStatus.CANCELLED,
};

export function isTerminalBatchStatus(status: BatchStatus): boolean {
  return BATCH_TRANSITIONS[status].length === 0;
}

export function canTransitionBatch(from: BatchStatus, to: BatchStatus): boolean {
  return BATCH_TRANSITIONS[from].includes(to);
}

export function allowedBatchActions(status: BatchStatus): BatchAction[] {
  return BATCH_ACTIONS.filter((action) =>
    canTransitionBatch(status, ACTION_TARGET[action]),
  );
}
