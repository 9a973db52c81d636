// src/modules/batches/batchRunner.ts
// Purpose: Executes in_progress batches in-process.
// A fixed pool of workers pulls slots from a shared cursor and stages accepted candidates;
// a single serialised flush commits chunks so counters only ever move forward.

import { setImmediate as yieldToLoop, setTimeout as sleep } from "node:timers/promises";
import type { Clock } from "@/lib/clock";
import type { BatchConfig } from "@/config/app.config";
import type { StoreTx, WarrantyStore } from "@/lib/store/store.types";
import { TransientStoreError } from "@/lib/store/store.errors";
import {
  dispatchNotification,
  type NotificationSink,
} from "@/lib/collaborators/notification-sink";
import { withRequestContext } from "@/lib/observability/request-context";
import { errorMeta, log } from "@/lib/observability/logger";
import { newId } from "@/utils/uuid";
import {
  createSeededCandidateSource,
  newEntropy,
  type BarcodeCandidateSource,
} from "@/modules/barcodes/barcodeIdentifier";
import type { NewBarcode } from "@/modules/barcodes/barcode.types";
import {
  BatchStatus,
  BatchStep,
  CollisionType,
  type Batch,
  type CollisionRecord,
} from "./batch.types";
import { CollisionDetector, type SlotDraw, type TakenCheck } from "./collisionDetector";
import { GenerationRateWindow } from "./batchProgress";

export type CandidateSourceFactory = (
  batch: Batch,
  year: number,
) => BarcodeCandidateSource;

export const seededCandidateSource: CandidateSourceFactory = (batch, year) =>
  createSeededCandidateSource({
    prefix: batch.prefix,
    year,
    entropy: newEntropy(),
  });

export type BatchRunnerDeps = {
  store: WarrantyStore;
  clock: Clock;
  config: BatchConfig;
  notifications: NotificationSink;
  candidateSourceFor?: CandidateSourceFactory;
};

export type CancelRequest = {
  actorId: string;
  reason: string | null;
  force: boolean;
};

type StagedSlot = { slot: number; candidate: string; attempt: number };
type FailedSlot = { slot: number; error: string };

type ChunkBuffer = {
  staged: StagedSlot[];
  failed: FailedSlot[];
  collisions: CollisionRecord[];
};

function emptyBuffer(): ChunkBuffer {
  return { staged: [], failed: [], collisions: [] };
}

function bufferedSlots(buffer: ChunkBuffer): number {
  return buffer.staged.length + buffer.failed.length;
}

/** The batch left in_progress under us (cancelled elsewhere); the chunk is rolled back. */
class RunInterrupted extends Error {
  constructor(public readonly batchId: string) {
    super(`Batch ${batchId} is no longer in progress`);
    this.name = "RunInterrupted";
  }
}

////////////////////////////////////////////////////////////////
// Single run
////////////////////////////////////////////////////////////////

class BatchRun {
  private nextSlot: number;
  private readonly lastSlot: number;
  private buffer: ChunkBuffer = emptyBuffer();
  private readonly seen = new Set<string>();
  private flushChain: Promise<void> = Promise.resolve();
  private readonly rates = new GenerationRateWindow();
  private readonly detector: CollisionDetector;
  private lastKnown: Batch;

  private cancelRequest: CancelRequest | null = null;
  private pausing = false;
  private thresholdExceeded = false;
  private broken = false;

  constructor(
    batch: Batch,
    private readonly deps: BatchRunnerDeps,
  ) {
    this.lastKnown = batch;
    this.nextSlot = batch.generatedCount + 1;
    this.lastSlot = batch.requestedQuantity;

    const sourceFor = deps.candidateSourceFor ?? seededCandidateSource;
    this.detector = new CollisionDetector(
      batch.id,
      sourceFor(batch, batch.createdAt.getUTCFullYear()),
      batch.maxRetries,
      deps.clock,
    );
  }

  get batchId() {
    return this.lastKnown.id;
  }

  requestCancel(request: CancelRequest) {
    if (this.cancelRequest) return;
    this.cancelRequest = request;
    // staged but uncommitted slots are discarded on force; an in-flight flush still completes
    if (request.force) this.buffer = emptyBuffer();
  }

  requestPause() {
    this.pausing = true;
  }

  async execute(): Promise<Batch> {
    const { config } = this.deps;
    this.rates.record(this.deps.clock.now(), this.lastKnown.generatedCount);

    log("INFO", "BATCH_RUN_STARTED", {
      batchId: this.batchId,
      fromSlot: this.nextSlot,
      toSlot: this.lastSlot,
      workers: config.workerCount,
    });

    try {
      const remaining = Math.max(1, this.lastSlot - this.nextSlot + 1);
      const workers = Array.from(
        { length: Math.min(config.workerCount, remaining) },
        () => this.worker(),
      );
      await Promise.all(workers);

      if (this.cancelRequest?.force) {
        this.buffer = emptyBuffer();
      } else {
        await this.enqueueFlush();
      }

      return await this.finish();
    } catch (err) {
      return this.abort(err);
    }
  }

  ////////////////////////////////////////////////////////////////
  // Workers
  ////////////////////////////////////////////////////////////////

  private shouldStop(): boolean {
    return (
      this.cancelRequest !== null ||
      this.pausing ||
      this.thresholdExceeded ||
      this.broken
    );
  }

  private takeSlot(): number | null {
    if (this.nextSlot > this.lastSlot) return null;
    return this.nextSlot++;
  }

  private async worker(): Promise<void> {
    for (;;) {
      if (this.shouldStop()) return;

      const slot = this.takeSlot();
      if (slot === null) return;

      const draw = this.detector.draw(slot, this.inBatchCheck);
      this.absorb(draw, this.buffer);

      if (bufferedSlots(this.buffer) >= this.deps.config.chunkSize) {
        await this.enqueueFlush();
      } else {
        // cancellation is observed between slots
        await yieldToLoop();
      }
    }
  }

  private readonly inBatchCheck: TakenCheck = (candidate) =>
    this.seen.has(candidate) ? CollisionType.DUPLICATE_IN_BATCH : null;

  private absorb(draw: SlotDraw, into: ChunkBuffer) {
    into.collisions.push(...draw.collisions);

    if (draw.accepted) {
      this.seen.add(draw.candidate);
      into.staged.push({
        slot: draw.slot,
        candidate: draw.candidate,
        attempt: draw.attempt,
      });
      return;
    }

    const error = `Slot ${draw.slot} exhausted ${draw.attempts} attempts (last candidate ${draw.lastCandidate})`;
    into.failed.push({ slot: draw.slot, error });
    log("WARN", "BATCH_SLOT_EXHAUSTED", {
      batchId: this.batchId,
      slot: draw.slot,
      attempts: draw.attempts,
    });
  }

  ////////////////////////////////////////////////////////////////
  // Chunk commits
  ////////////////////////////////////////////////////////////////

  private enqueueFlush(): Promise<void> {
    this.flushChain = this.flushChain.then(() => this.flush());
    return this.flushChain;
  }

  private async flush(): Promise<void> {
    const chunk = this.buffer;
    this.buffer = emptyBuffer();
    if (bufferedSlots(chunk) === 0) return;

    try {
      await this.prescreen(chunk);
      const committed = await this.commitWithRetry(chunk);
      this.lastKnown = committed;
      this.rates.record(committed.lastUpdatedAt, committed.generatedCount);

      log("DEBUG", "BATCH_CHUNK_COMMITTED", {
        batchId: this.batchId,
        committed: chunk.staged.length,
        failed: chunk.failed.length,
        generated: committed.generatedCount,
        requested: committed.requestedQuantity,
      });

      const limit = committed.requestedQuantity * this.deps.config.failureThreshold;
      if (committed.failedCount > limit) this.thresholdExceeded = true;
    } catch (err) {
      this.broken = true;
      throw err;
    }
  }

  /** Screens staged candidates against persisted barcodes before taking the chunk lock. */
  private async prescreen(chunk: ChunkBuffer) {
    for (;;) {
      const taken = await this.deps.store.barcodes.existing(
        chunk.staged.map((s) => s.candidate),
      );
      if (taken.size === 0) return;

      const kept: StagedSlot[] = [];
      const redrawn = emptyBuffer();

      for (const staged of [...chunk.staged].sort((a, b) => a.slot - b.slot)) {
        if (!taken.has(staged.candidate)) {
          kept.push(staged);
          continue;
        }
        this.absorb(
          this.detector.redraw(
            staged.slot,
            staged,
            CollisionType.DUPLICATE_IN_STORE,
            this.inBatchCheck,
          ),
          redrawn,
        );
      }

      chunk.staged = [...kept, ...redrawn.staged];
      chunk.failed.push(...redrawn.failed);
      chunk.collisions.push(...redrawn.collisions);
    }
  }

  private async commitWithRetry(chunk: ChunkBuffer): Promise<Batch> {
    const maxRetries = this.lastKnown.maxRetries;
    let retries = 0;

    for (;;) {
      try {
        return await this.deps.store.transaction((tx) =>
          this.commit(tx, chunk, retries),
        );
      } catch (err) {
        if (!(err instanceof TransientStoreError) || retries >= maxRetries) {
          throw err;
        }
        retries++;
        const delay = this.deps.config.retryBackoffMs * 2 ** (retries - 1);
        log("WARN", "BATCH_COMMIT_RETRY", {
          batchId: this.batchId,
          attempt: retries,
          delayMs: delay,
          ...errorMeta(err),
        });
        await sleep(delay);
      }
    }
  }

  private async commit(
    tx: StoreTx,
    chunk: ChunkBuffer,
    retries: number,
  ): Promise<Batch> {
    const batchId = this.batchId;
    await tx.batches.lockForChunk(batchId);

    const at = this.deps.clock.now();
    const inserted: StagedSlot[] = [];
    let pending = chunk.staged;

    // a concurrent writer may win the unique index between prescreen and insert
    while (pending.length > 0) {
      const result = await tx.barcodes.insertMany(
        pending.map((s) => this.toNewBarcode(s, at)),
      );
      const duplicates = new Set(result.duplicates);
      const redrawn = emptyBuffer();

      for (const staged of pending) {
        if (!duplicates.has(staged.candidate)) {
          inserted.push(staged);
          continue;
        }
        this.absorb(
          this.detector.redraw(
            staged.slot,
            staged,
            CollisionType.DUPLICATE_IN_STORE,
            this.inBatchCheck,
          ),
          redrawn,
        );
      }

      chunk.failed.push(...redrawn.failed);
      chunk.collisions.push(...redrawn.collisions);
      pending = redrawn.staged;
    }

    chunk.staged = inserted;

    const successful = inserted.length;
    const failed = chunk.failed.length;
    const generatedAfter = this.lastKnown.generatedCount + successful + failed;

    const updated = await tx.batches.applyChunk(batchId, {
      generated: successful + failed,
      successful,
      failed,
      errors: failed,
      collisions: chunk.collisions.length,
      retries,
      lastError: failed > 0 ? (chunk.failed.at(-1)?.error ?? null) : undefined,
      generationRate: this.previewRate(at, generatedAfter),
      currentStep:
        generatedAfter < this.lastKnown.requestedQuantity
          ? BatchStep.GENERATING
          : BatchStep.FINALIZING,
      at,
    });

    if (!updated) throw new RunInterrupted(batchId);

    await tx.batches.insertCollisions(chunk.collisions);
    return updated;
  }

  private previewRate(at: Date, generated: number): number {
    const preview = this.rates.clone();
    preview.record(at, generated);
    return preview.rate();
  }

  private toNewBarcode(staged: StagedSlot, at: Date): NewBarcode {
    return {
      id: newId(),
      barcode: staged.candidate,
      productId: this.lastKnown.productId,
      storefrontId: this.lastKnown.storefrontId,
      batchId: this.batchId,
      warrantyPeriodMonths: this.lastKnown.expiryMonths,
      createdAt: at,
    };
  }

  ////////////////////////////////////////////////////////////////
  // Finalisation
  ////////////////////////////////////////////////////////////////

  private async finish(): Promise<Batch> {
    if (this.thresholdExceeded) {
      const { failedCount, requestedQuantity } = this.lastKnown;
      return this.markFailed(
        `Failure threshold exceeded: ${failedCount} of ${requestedQuantity} slots failed`,
      );
    }

    if (this.cancelRequest) return this.markCancelled(this.cancelRequest);

    if (this.pausing) {
      log("INFO", "BATCH_RUN_PAUSED", {
        batchId: this.batchId,
        generated: this.lastKnown.generatedCount,
      });
      return this.lastKnown;
    }

    return this.markCompleted();
  }

  private async finalize(
    patch: Partial<Batch> & { status: BatchStatus },
  ): Promise<Batch> {
    const at = this.deps.clock.now();
    const updated = await this.deps.store.transaction((tx) =>
      tx.batches.updateStatus(this.batchId, [BatchStatus.IN_PROGRESS], {
        ...patch,
        currentStep: BatchStep.DONE,
        lastUpdatedAt: at,
      }),
    );
    return updated ?? (await this.reload());
  }

  private async markCompleted(): Promise<Batch> {
    const batch = await this.finalize({
      status: BatchStatus.COMPLETED,
      completedAt: this.deps.clock.now(),
    });

    log("INFO", "BATCH_COMPLETED", {
      batchId: batch.id,
      successful: batch.successfulCount,
      failed: batch.failedCount,
      collisions: batch.collisionCount,
    });

    this.notifyFinished(batch);
    return batch;
  }

  private async markCancelled(request: CancelRequest): Promise<Batch> {
    const batch = await this.finalize({
      status: BatchStatus.CANCELLED,
      cancelledAt: this.deps.clock.now(),
      cancelledBy: request.actorId,
      cancellationReason: request.reason,
    });

    log("INFO", "BATCH_CANCELLED", {
      batchId: batch.id,
      force: request.force,
      generated: batch.generatedCount,
    });
    return batch;
  }

  private async markFailed(message: string): Promise<Batch> {
    const batch = await this.finalize({
      status: BatchStatus.FAILED,
      lastError: message,
    });

    log("ERROR", "BATCH_FAILED", { batchId: batch.id, lastError: message });
    this.notifyFinished(batch);
    return batch;
  }

  private async abort(err: unknown): Promise<Batch> {
    if (err instanceof RunInterrupted) {
      log("INFO", "BATCH_RUN_INTERRUPTED", { batchId: this.batchId });
      return this.reload();
    }

    log("ERROR", "BATCH_RUN_FAILED", { batchId: this.batchId, ...errorMeta(err) });
    return this.markFailed(err instanceof Error ? err.message : String(err));
  }

  private async reload(): Promise<Batch> {
    const current = await this.deps.store.batches.findById(this.batchId);
    if (!current) throw new Error(`Batch ${this.batchId} disappeared during its run`);
    this.lastKnown = current;
    return current;
  }

  private notifyFinished(batch: Batch) {
    if (!batch.notifyOnComplete) return;
    if (
      batch.status !== BatchStatus.COMPLETED &&
      batch.status !== BatchStatus.FAILED
    ) {
      return;
    }

    void dispatchNotification(
      this.deps.notifications,
      batch.createdBy,
      "batch_completed",
      {
        batchId: batch.id,
        batchNumber: batch.batchNumber,
        status: batch.status,
        successful: batch.successfulCount,
        failed: batch.failedCount,
      },
    );
  }
}

////////////////////////////////////////////////////////////////
// Runner (process-wide registry of active runs)
////////////////////////////////////////////////////////////////

type ActiveRun = {
  run: BatchRun;
  settled: Promise<Batch | null>;
};

export class BatchRunner {
  private readonly runs = new Map<string, ActiveRun>();

  constructor(private readonly deps: BatchRunnerDeps) {}

  isRunning(batchId: string): boolean {
    return this.runs.has(batchId);
  }

  /** Starts a run for an in_progress batch unless one is already active here. */
  launch(batch: Batch): void {
    if (this.runs.has(batch.id)) return;

    const run = new BatchRun(batch, this.deps);

    // detached from the caller's request deadline
    const settled = withRequestContext(() => run.execute(), { requestId: `batch-run:${batch.id}` })
      .catch((err: unknown) => {
        log("ERROR", "BATCH_RUN_CRASHED", { batchId: batch.id, ...errorMeta(err) });
        return null;
      })
      .finally(() => {
        this.runs.delete(batch.id);
      });

    this.runs.set(batch.id, { run, settled });
  }

  /**
   * Asks the local run to cancel and waits for its in-flight chunk.
   * Returns undefined when no run for the batch is active in this process.
   */
  async cancel(batchId: string, request: CancelRequest): Promise<Batch | null | undefined> {
    const active = this.runs.get(batchId);
    if (!active) return undefined;

    active.run.requestCancel(request);
    return active.settled;
  }

  async whenSettled(batchId: string): Promise<void> {
    await this.runs.get(batchId)?.settled;
  }

  /** Stops every run after its staged slots are committed. Batches stay in_progress for resume. */
  async shutdown(): Promise<void> {
    const active = [...this.runs.values()];
    for (const { run } of active) run.requestPause();
    await Promise.all(active.map(({ settled }) => settled));
  }
}
