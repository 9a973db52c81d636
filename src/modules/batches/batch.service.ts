// src/modules/batches/batch.service.ts
// Purpose: Batch issuance commands and queries. Generation itself runs in BatchRunner.

import type { Clock } from "@/lib/clock";
import type { BatchConfig } from "@/config/app.config";
import { requireActorType, requireAdmin, ActorType, type Actor } from "@/lib/auth/actor";
import { InvalidArgumentError } from "@/lib/errors/errors";
import { callCollaborator } from "@/lib/collaborators/callCollaborator";
import type { ProductCatalog } from "@/lib/collaborators/product-catalog";
import type { WarrantyStore } from "@/lib/store/store.types";
import { log } from "@/lib/observability/logger";
import { parseInput } from "@/lib/validation/parseInput";
import { formatSequenceNumber } from "@/utils/sequenceNumber";
import type { Page, PageRequest } from "@/utils/pagination";
import { newId } from "@/utils/uuid";
import type { WarrantyBarcode } from "@/modules/barcodes/barcode.types";
import {
  BatchStatus,
  BatchStep,
  type Batch,
  type BatchFilter,
  type BatchProgressSnapshot,
  type CollisionFilter,
  type CollisionRecord,
} from "./batch.types";
import {
  CancelBatchSchema,
  CreateBatchSchema,
  type CancelBatchInput,
  type CreateBatchInput,
} from "./batch.schemas";
import { BatchNotFoundError, BatchStateError } from "./batch.errors";
import { toProgressSnapshot } from "./batchProgress";
import type { BatchRunner } from "./batchRunner";

export type BatchServiceDeps = {
  store: WarrantyStore;
  clock: Clock;
  config: BatchConfig;
  products: ProductCatalog;
  runner: BatchRunner;
};

function requireBatchReader(actor: Actor) {
  requireActorType(actor, ActorType.AGENT, ActorType.SYSTEM);
}

export class BatchService {
  constructor(private readonly deps: BatchServiceDeps) {}

  ////////////////////////////////////////////////////////////////
  // Commands
  ////////////////////////////////////////////////////////////////

  async create(actor: Actor, input: CreateBatchInput): Promise<Batch> {
    requireAdmin(actor);
    const data = parseInput(CreateBatchSchema, input, "Invalid batch request");

    const product = await callCollaborator("product_catalog", () =>
      this.deps.products.lookupProduct(data.productId),
    );
    if (!product) {
      throw new InvalidArgumentError(
        "Unknown product",
        [{ field: "productId", message: "Product does not exist", value: data.productId }],
        "PRODUCT_NOT_FOUND",
      );
    }

    const now = this.deps.clock.now();
    const year = now.getUTCFullYear();

    const batch = await this.deps.store.transaction(async (tx) => {
      const sequence = await tx.sequences.next("batch", year);

      return tx.batches.insert({
        id: newId(),
        batchNumber: formatSequenceNumber("BATCH", year, sequence),
        productId: product.id,
        storefrontId: data.storefrontId,
        requestedQuantity: data.quantity,
        maxRetries: data.maxRetries ?? this.deps.config.defaultMaxRetries,
        prefix: data.prefix,
        description: data.description ?? null,
        expiryMonths: data.expiryMonths,
        priority: data.priority,
        tags: data.tags,
        notes: data.notes ?? null,
        notifyOnComplete: data.notifyOnComplete,
        lastUpdatedAt: now,
        createdBy: actor.actorId,
        createdAt: now,
      });
    });

    log("INFO", "BATCH_CREATED", {
      batchId: batch.id,
      batchNumber: batch.batchNumber,
      quantity: batch.requestedQuantity,
    });

    return batch;
  }

  /**
   * pending -> in_progress. Calling it again returns the current state; an
   * in_progress batch with no local run (e.g. after a restart) is resumed.
   */
  async start(actor: Actor, batchId: string): Promise<Batch> {
    requireAdmin(actor);
    const batch = await this.get(actor, batchId);

    switch (batch.status) {
      case BatchStatus.PENDING: {
        const now = this.deps.clock.now();
        const started = await this.moveStatus(
          batchId,
          [BatchStatus.PENDING],
          {
            status: BatchStatus.IN_PROGRESS,
            startedAt: now,
            currentStep: BatchStep.GENERATING,
            lastUpdatedAt: now,
          },
        );

        // lost the race to another start or a cancel
        if (!started) return this.start(actor, batchId);

        log("INFO", "BATCH_STARTED", { batchId, quantity: started.requestedQuantity });
        this.deps.runner.launch(started);
        return started;
      }

      case BatchStatus.IN_PROGRESS:
        if (!this.deps.runner.isRunning(batchId)) {
          log("INFO", "BATCH_RESUMED", { batchId, generated: batch.generatedCount });
          this.deps.runner.launch(batch);
        }
        return batch;

      case BatchStatus.COMPLETED:
        return batch;

      case BatchStatus.CANCELLED:
      case BatchStatus.FAILED:
        throw new BatchStateError(batchId, batch.status, "start");
    }
  }

  async cancel(actor: Actor, batchId: string, input: CancelBatchInput = {}): Promise<Batch> {
    requireAdmin(actor);
    const data = parseInput(CancelBatchSchema, input, "Invalid cancel request");
    const batch = await this.get(actor, batchId);
    const now = this.deps.clock.now();

    const cancelledPatch = {
      status: BatchStatus.CANCELLED,
      cancelledAt: now,
      cancelledBy: actor.actorId,
      cancellationReason: data.reason ?? null,
      currentStep: BatchStep.DONE,
      lastUpdatedAt: now,
    };

    if (batch.status === BatchStatus.PENDING) {
      const cancelled = await this.moveStatus(
        batchId,
        [BatchStatus.PENDING],
        cancelledPatch,
      );
      if (!cancelled) return this.cancel(actor, batchId, input);

      log("INFO", "BATCH_CANCELLED", { batchId, force: data.force, generated: 0 });
      return cancelled;
    }

    if (batch.status !== BatchStatus.IN_PROGRESS) {
      throw new BatchStateError(batchId, batch.status, "cancel");
    }

    const fromRun = await this.deps.runner.cancel(batchId, {
      actorId: actor.actorId,
      reason: data.reason ?? null,
      force: data.force,
    });

    const result =
      fromRun === undefined
        ? await this.moveStatus(
            batchId,
            [BatchStatus.IN_PROGRESS],
            cancelledPatch,
          )
        : fromRun;

    const current = result ?? (await this.get(actor, batchId));
    if (current.status !== BatchStatus.CANCELLED) {
      throw new BatchStateError(batchId, current.status, "cancel");
    }

    if (fromRun === undefined) {
      log("INFO", "BATCH_CANCELLED", {
        batchId,
        force: data.force,
        generated: current.generatedCount,
      });
    }
    return current;
  }

  private moveStatus(
    batchId: string,
    from: readonly BatchStatus[],
    patch: Partial<Batch> & { status: BatchStatus },
  ) {
    return this.deps.store.transaction((tx) => tx.batches.updateStatus(batchId, from, patch));
  }

  /** Relaunches batches left in_progress by a previous process. Returns how many were resumed. */
  async resumeInterrupted(): Promise<number> {
    let resumed = 0;
    for (let page = 1; ; page += 1) {
      const batches = await this.deps.store.batches.list(
        { status: BatchStatus.IN_PROGRESS },
        { page, pageSize: 100 },
      );
      for (const batch of batches.items) {
        if (this.deps.runner.isRunning(batch.id)) continue;
        log("INFO", "BATCH_RESUMED", { batchId: batch.id, generated: batch.generatedCount });
        this.deps.runner.launch(batch);
        resumed += 1;
      }
      if (page >= batches.totalPages) return resumed;
    }
  }

  ////////////////////////////////////////////////////////////////
  // Queries
  ////////////////////////////////////////////////////////////////

  async get(actor: Actor, batchId: string): Promise<Batch> {
    requireBatchReader(actor);
    const batch = await this.deps.store.batches.findById(batchId);
    if (!batch) throw new BatchNotFoundError(batchId);
    return batch;
  }

  async progress(actor: Actor, batchId: string): Promise<BatchProgressSnapshot> {
    return toProgressSnapshot(await this.get(actor, batchId));
  }

  async list(actor: Actor, filter: BatchFilter, page: PageRequest): Promise<Page<Batch>> {
    requireBatchReader(actor);
    return this.deps.store.batches.list(filter, page);
  }

  async listCollisions(
    actor: Actor,
    batchId: string,
    filter: CollisionFilter,
    page: PageRequest,
  ): Promise<Page<CollisionRecord>> {
    await this.get(actor, batchId);
    return this.deps.store.batches.listCollisions(batchId, filter, page);
  }

  async listBarcodes(
    actor: Actor,
    batchId: string,
    page: PageRequest,
  ): Promise<Page<WarrantyBarcode>> {
    await this.get(actor, batchId);
    return this.deps.store.barcodes.listByBatch(batchId, page);
  }
}
