// src/modules/batches/_test_/batch.service.test.ts
// Batch issuance end to end against the in-memory store.

import { describe, expect, it } from "vitest";
import { buildTestContainer, type TestHarness } from "@/testing/testContainer";
import {
  adminActor,
  agentActor,
  customerActor,
  TEST_PRODUCT,
  TEST_STOREFRONT_ID,
} from "@/testing/fixtures";
import {
  constantCandidateSource,
  FlakyWarrantyStore,
  scriptedCandidateSource,
} from "@/testing/fakes";
import { createSeededCandidateSource } from "@/modules/barcodes/barcodeIdentifier";
import { BarcodeStatus } from "@/modules/barcodes/barcode.types";
import type { CreateBatchInput } from "../batch.schemas";
import type { CandidateSourceFactory } from "../batchRunner";
import { BatchStatus, CollisionResolution, CollisionType } from "../batch.types";

const NOW = "2024-03-01T09:00:00.000Z";

function batchInput(overrides: Partial<CreateBatchInput> = {}): CreateBatchInput {
  return {
    productId: TEST_PRODUCT.id,
    storefrontId: TEST_STOREFRONT_ID,
    quantity: 20,
    prefix: "WB",
    expiryMonths: 24,
    priority: "normal",
    ...overrides,
  };
}

async function runToEnd(h: TestHarness, input: CreateBatchInput) {
  const created = await h.container.batches.create(adminActor, input);
  await h.container.batches.start(adminActor, created.id);
  await h.container.runner.whenSettled(created.id);
  return h.container.batches.get(adminActor, created.id);
}

const fixedSource =
  (script: Partial<Record<string, string>> = {}): CandidateSourceFactory =>
  (batch, year) =>
    scriptedCandidateSource(
      script,
      createSeededCandidateSource({
        prefix: batch.prefix,
        year,
        entropy: Buffer.from("batch-test-entropy"),
      }),
    );

describe("BatchService", () => {
  describe("create", () => {
    it("should number batches per year and start them pending", async () => {
      const h = buildTestContainer({ now: NOW });

      const first = await h.container.batches.create(adminActor, batchInput({ prefix: " wb " }));
      const second = await h.container.batches.create(adminActor, batchInput());

      expect(first.batchNumber).toBe("BATCH-2024-000001");
      expect(second.batchNumber).toBe("BATCH-2024-000002");
      expect(first.status).toBe(BatchStatus.PENDING);
      expect(first.prefix).toBe("WB");
      expect(first.maxRetries).toBe(3);
      expect(first.createdBy).toBe(adminActor.actorId);
    });

    it("should enforce quantity and prefix bounds", async () => {
      const h = buildTestContainer({ now: NOW });
      const { batches } = h.container;

      for (const bad of [
        batchInput({ quantity: 0 }),
        batchInput({ quantity: 100001 }),
        batchInput({ prefix: "W" }),
        batchInput({ prefix: "ABCDEFGHIJK" }),
        batchInput({ prefix: "W1" }),
        batchInput({ expiryMonths: 0 }),
      ]) {
        await expect(batches.create(adminActor, bad)).rejects.toMatchObject({
          kind: "invalid_argument",
        });
      }

      const widest = await batches.create(
        adminActor,
        batchInput({ quantity: 100000, prefix: "ABCDEFGHIJ" }),
      );
      expect(widest.requestedQuantity).toBe(100000);
    });

    it("should require an admin and a known product", async () => {
      const h = buildTestContainer({ now: NOW });

      await expect(h.container.batches.create(agentActor, batchInput())).rejects.toMatchObject({
        kind: "forbidden",
      });
      await expect(h.container.batches.create(customerActor, batchInput())).rejects.toMatchObject({
        kind: "forbidden",
      });
      await expect(
        h.container.batches.create(adminActor, batchInput({ productId: "prod-missing" })),
      ).rejects.toMatchObject({ kind: "invalid_argument", code: "PRODUCT_NOT_FOUND" });
    });
  });

  describe("generation", () => {
    it("should issue every requested barcode on the happy path", async () => {
      const h = buildTestContainer({ now: NOW });

      const batch = await runToEnd(h, batchInput({ quantity: 100 }));

      expect(batch.status).toBe(BatchStatus.COMPLETED);
      expect(batch.successfulCount).toBe(100);
      expect(batch.generatedCount).toBe(100);
      expect(batch.failedCount).toBe(0);
      expect(batch.errorCount).toBe(0);
      expect(batch.collisionCount).toBeGreaterThanOrEqual(0);
      expect(batch.completedAt?.toISOString()).toBe(NOW);

      const progress = await h.container.batches.progress(agentActor, batch.id);
      expect(progress.progress).toBe(100);
      expect(progress.remaining).toBe(0);
      expect(progress.statistics.successRate).toBe(1);
      // every chunk commits at the same instant on the manual clock
      expect(progress.generationRate).toBe(0);

      const page = await h.container.batches.listBarcodes(adminActor, batch.id, {
        page: 1,
        pageSize: 100,
      });
      expect(page.total).toBe(100);
      const codes = page.items.map((b) => b.barcode);
      expect(new Set(codes).size).toBe(100);
      for (const item of page.items) {
        expect(item.barcode).toMatch(/^WB-\d{4}-[0-9A-Z]{8,16}$/);
        expect(item.status).toBe(BarcodeStatus.GENERATED);
        expect(item.batchId).toBe(batch.id);
        expect(item.warrantyPeriodMonths).toBe(24);
      }
    });

    it("should regenerate a slot whose candidate already exists in the store", async () => {
      const h = buildTestContainer({
        now: NOW,
        overrides: { candidateSourceFor: fixedSource({ "7:0": "WB-2024-COLLIDE01" }) },
      });
      await h.seedBarcode("WB-2024-COLLIDE01");

      const batch = await runToEnd(h, batchInput({ quantity: 20 }));

      expect(batch.status).toBe(BatchStatus.COMPLETED);
      expect(batch.successfulCount).toBe(20);
      expect(batch.collisionCount).toBe(1);

      const collisions = await h.container.batches.listCollisions(
        adminActor,
        batch.id,
        {},
        { page: 1, pageSize: 20 },
      );
      expect(collisions.items).toHaveLength(1);
      expect(collisions.items[0]).toMatchObject({
        slot: 7,
        candidate: "WB-2024-COLLIDE01",
        collisionType: CollisionType.DUPLICATE_IN_STORE,
        resolution: CollisionResolution.REGENERATED,
      });

      const preexisting = await h.store.barcodes.findByCode("WB-2024-COLLIDE01");
      expect(preexisting?.batchId).toBeNull();
    });

    it("should fail the batch once failures pass the threshold", async () => {
      const h = buildTestContainer({
        now: NOW,
        overrides: { candidateSourceFor: () => constantCandidateSource("WB-2024-SAMESAME") },
      });

      const batch = await runToEnd(h, batchInput({ quantity: 10, maxRetries: 0 }));

      expect(batch.status).toBe(BatchStatus.FAILED);
      expect(batch.successfulCount).toBe(1);
      expect(batch.failedCount).toBe(9);
      expect(batch.generatedCount).toBe(10);
      expect(batch.lastError).toBe("Failure threshold exceeded: 9 of 10 slots failed");

      const collisions = await h.container.batches.listCollisions(
        adminActor,
        batch.id,
        { collisionType: CollisionType.DUPLICATE_IN_BATCH },
        { page: 1, pageSize: 50 },
      );
      expect(collisions.total).toBe(9);
      expect(collisions.items.every((c) => c.resolution === CollisionResolution.DROPPED)).toBe(
        true,
      );
    });

    it("should retry a chunk commit after a transient store failure", async () => {
      const store = new FlakyWarrantyStore();
      const h = buildTestContainer({ now: NOW, store });

      const created = await h.container.batches.create(adminActor, batchInput({ quantity: 10 }));
      store.failNextTransactions(1);
      await h.container.batches.start(adminActor, created.id);
      await h.container.runner.whenSettled(created.id);
      const batch = await h.container.batches.get(adminActor, created.id);

      expect(store.failedTransactions).toBe(1);
      expect(batch.status).toBe(BatchStatus.COMPLETED);
      expect(batch.retryCount).toBe(1);
      expect(batch.successfulCount).toBe(10);
    });

    it("should fail the batch when commit retries run out", async () => {
      const store = new FlakyWarrantyStore();
      const h = buildTestContainer({ now: NOW, store });

      const created = await h.container.batches.create(
        adminActor,
        batchInput({ quantity: 10, maxRetries: 2 }),
      );
      store.failNextTransactions(3);
      await h.container.batches.start(adminActor, created.id);
      await h.container.runner.whenSettled(created.id);
      const batch = await h.container.batches.get(adminActor, created.id);

      expect(store.failedTransactions).toBe(3);
      expect(batch.status).toBe(BatchStatus.FAILED);
      expect(batch.lastError).toBe("could not serialize access");
      expect(batch.generatedCount).toBe(0);
    });

    it("should notify the creator when asked to", async () => {
      const h = buildTestContainer({ now: NOW });

      const batch = await runToEnd(h, batchInput({ quantity: 5, notifyOnComplete: true }));

      const sent = h.notifications.ofTemplate("batch_completed");
      expect(sent).toHaveLength(1);
      expect(sent[0]).toMatchObject({
        recipient: adminActor.actorId,
        payload: { batchId: batch.id, status: BatchStatus.COMPLETED, successful: 5 },
      });
    });
  });

  describe("start and cancel", () => {
    it("should treat repeated starts as no-ops", async () => {
      const h = buildTestContainer({ now: NOW });
      const created = await h.container.batches.create(adminActor, batchInput({ quantity: 10 }));

      const started = await h.container.batches.start(adminActor, created.id);
      const again = await h.container.batches.start(adminActor, created.id);
      expect(started.status).toBe(BatchStatus.IN_PROGRESS);
      expect(again.status).toBe(BatchStatus.IN_PROGRESS);
      expect(again.startedAt?.toISOString()).toBe(NOW);

      await h.container.runner.whenSettled(created.id);
      const done = await h.container.batches.start(adminActor, created.id);
      expect(done.status).toBe(BatchStatus.COMPLETED);
      expect(done.successfulCount).toBe(10);
    });

    it("should cancel a pending batch and refuse to start it", async () => {
      const h = buildTestContainer({ now: NOW });
      const created = await h.container.batches.create(adminActor, batchInput());

      const cancelled = await h.container.batches.cancel(adminActor, created.id, {
        reason: "Wrong product",
      });
      expect(cancelled.status).toBe(BatchStatus.CANCELLED);
      expect(cancelled.cancelledBy).toBe(adminActor.actorId);
      expect(cancelled.cancellationReason).toBe("Wrong product");
      expect(cancelled.generatedCount).toBe(0);

      await expect(h.container.batches.start(adminActor, created.id)).rejects.toMatchObject({
        kind: "invalid_state",
        code: "BATCH_INVALID_STATE",
      });
      await expect(h.container.batches.cancel(adminActor, created.id)).rejects.toMatchObject({
        kind: "invalid_state",
      });
    });

    it("should discard staged work on a forced cancel", async () => {
      const h = buildTestContainer({ now: NOW, env: { BATCH_CHUNK_SIZE: "1000" } });
      const created = await h.container.batches.create(adminActor, batchInput({ quantity: 100 }));

      await h.container.batches.start(adminActor, created.id);
      const cancelled = await h.container.batches.cancel(adminActor, created.id, {
        force: true,
        reason: "Stop now",
      });

      expect(cancelled.status).toBe(BatchStatus.CANCELLED);
      expect(cancelled.generatedCount).toBe(0);
      expect(cancelled.cancellationReason).toBe("Stop now");

      const page = await h.container.batches.listBarcodes(adminActor, created.id, {
        page: 1,
        pageSize: 10,
      });
      expect(page.total).toBe(0);
    });

    it("should keep committed barcodes on a graceful cancel", async () => {
      const h = buildTestContainer({ now: NOW, env: { BATCH_CHUNK_SIZE: "1000" } });
      const created = await h.container.batches.create(adminActor, batchInput({ quantity: 100 }));

      await h.container.batches.start(adminActor, created.id);
      const cancelled = await h.container.batches.cancel(adminActor, created.id);

      expect(cancelled.status).toBe(BatchStatus.CANCELLED);
      expect(cancelled.generatedCount).toBeLessThan(100);

      const page = await h.container.batches.listBarcodes(adminActor, created.id, {
        page: 1,
        pageSize: 100,
      });
      expect(page.total).toBe(cancelled.successfulCount);
      expect(cancelled.generatedCount).toBe(cancelled.successfulCount + cancelled.failedCount);
    });
  });

  describe("queries", () => {
    it("should filter batches by status", async () => {
      const h = buildTestContainer({ now: NOW });
      const keep = await h.container.batches.create(adminActor, batchInput());
      const drop = await h.container.batches.create(adminActor, batchInput());
      await h.container.batches.cancel(adminActor, drop.id);

      const pending = await h.container.batches.list(
        agentActor,
        { status: BatchStatus.PENDING },
        { page: 1, pageSize: 20 },
      );
      expect(pending.items.map((b) => b.id)).toEqual([keep.id]);

      await expect(
        h.container.batches.list(customerActor, {}, { page: 1, pageSize: 20 }),
      ).rejects.toMatchObject({ kind: "forbidden" });
      await expect(h.container.batches.get(agentActor, "missing")).rejects.toMatchObject({
        kind: "not_found",
        code: "BATCH_NOT_FOUND",
      });
    });
  });
});
