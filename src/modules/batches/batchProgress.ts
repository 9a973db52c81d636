// src/modules/batches/batchProgress.ts
// Purpose: Progress projection for batches. Rates come from commit samples fed by the runner;
// everything else is derived from the stored row on read.

import { addMilliseconds } from "date-fns";
import {
  BatchStatus,
  type Batch,
  type BatchProgressSnapshot,
  type BatchStatistics,
  type RecommendedAction,
  type SecurityScore,
} from "./batch.types";

const RATE_WINDOW = 10;

type RateSample = { at: number; generated: number };

/**
 * Sliding window of (time, generated) samples for one run.
 * The rate stays 0 until committed work spans measurable time.
 */
export class GenerationRateWindow {
  private readonly samples: RateSample[] = [];

  constructor(private readonly windowSize = RATE_WINDOW) {}

  record(at: Date, generated: number) {
    this.samples.push({ at: at.getTime(), generated });
    if (this.samples.length > this.windowSize) this.samples.shift();
  }

  clone(): GenerationRateWindow {
    const copy = new GenerationRateWindow(this.windowSize);
    copy.samples.push(...this.samples);
    return copy;
  }

  /** Items per second across the window. */
  rate(): number {
    if (this.samples.length < 2) return 0;

    const first = this.samples[0];
    const last = this.samples[this.samples.length - 1];
    const elapsedMs = last.at - first.at;
    const produced = last.generated - first.generated;

    if (produced <= 0 || elapsedMs <= 0) return 0;
    return Math.round((produced * 1000 * 100) / elapsedMs) / 100;
  }
}

////////////////////////////////////////////////////////////////
// Derived fields
////////////////////////////////////////////////////////////////

export function progressPercent(batch: Batch): number {
  if (batch.status === BatchStatus.COMPLETED) return 100;
  if (batch.requestedQuantity <= 0) return 0;
  const raw = (batch.generatedCount / batch.requestedQuantity) * 100;
  return Math.min(100, Math.floor(raw * 100) / 100);
}

function scoreFor(collisionRate: number): {
  securityScore: SecurityScore;
  recommendedAction: RecommendedAction;
} {
  if (collisionRate < 0.01) {
    return { securityScore: "EXCELLENT", recommendedAction: "continue" };
  }
  if (collisionRate < 0.1) {
    return { securityScore: "GOOD", recommendedAction: "monitor" };
  }
  return { securityScore: "POOR", recommendedAction: "review_algorithm" };
}

export function batchStatistics(batch: Batch): BatchStatistics {
  const denominator = Math.max(1, batch.generatedCount);
  const collisionRate = batch.collisionCount / denominator;
  const successRate = batch.successfulCount / denominator;

  return {
    collisionRate: Math.round(collisionRate * 10_000) / 10_000,
    successRate: Math.round(successRate * 10_000) / 10_000,
    ...scoreFor(collisionRate),
  };
}

/** Linear extrapolation from the last stored rate; null when there is nothing to extrapolate. */
export function estimateCompletion(batch: Batch): Date | null {
  if (batch.status !== BatchStatus.IN_PROGRESS) return null;
  if (batch.generationRate === null || batch.generationRate <= 0) return null;

  const remaining = batch.requestedQuantity - batch.generatedCount;
  if (remaining <= 0) return batch.lastUpdatedAt;

  return addMilliseconds(
    batch.lastUpdatedAt,
    Math.ceil((remaining / batch.generationRate) * 1000),
  );
}

export function toProgressSnapshot(batch: Batch): BatchProgressSnapshot {
  return {
    batchId: batch.id,
    batchNumber: batch.batchNumber,
    status: batch.status,
    progress: progressPercent(batch),
    currentStep: batch.currentStep,
    requested: batch.requestedQuantity,
    processed: batch.generatedCount,
    remaining: Math.max(0, batch.requestedQuantity - batch.generatedCount),
    successful: batch.successfulCount,
    failed: batch.failedCount,
    errorCount: batch.errorCount,
    collisionCount: batch.collisionCount,
    retryCount: batch.retryCount,
    generationRate: batch.generationRate ?? 0,
    lastUpdated: batch.lastUpdatedAt,
    estimatedCompletion: estimateCompletion(batch),
    lastError: batch.lastError,
    statistics: batchStatistics(batch),
  };
}
