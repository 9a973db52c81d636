// src/lib/store/_test_/memory.store.test.ts
// Isolation between a running transaction and everything else touching the store.

import { describe, expect, it } from "vitest";
import { buildTestContainer } from "@/testing/testContainer";
import { adminActor, TEST_PRODUCT, TEST_STOREFRONT_ID } from "@/testing/fixtures";
import { BatchStatus } from "@/modules/batches/batch.types";
import { MemoryWarrantyStore } from "../memory.store";
import type { StoreTx } from "../store.types";

function gate() {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

async function pendingBatch() {
  const h = buildTestContainer({ now: "2024-03-01T09:00:00.000Z" });
  const batch = await h.container.batches.create(adminActor, {
    productId: TEST_PRODUCT.id,
    storefrontId: TEST_STOREFRONT_ID,
    quantity: 10,
    prefix: "WB",
    expiryMonths: 12,
    priority: "normal",
  });
  return { h, batch };
}

describe("MemoryWarrantyStore", () => {
  it("should keep a cancel issued while another transaction is rolling back", async () => {
    const { h, batch } = await pendingBatch();
    const held = gate();

    const failing = h.store.transaction(async (tx) => {
      await tx.batches.updateStatus(batch.id, [BatchStatus.PENDING], {
        status: BatchStatus.PENDING,
        lastError: "uncommitted",
      });
      await held.opened;
      throw new Error("boom");
    });
    const cancelling = h.container.batches.cancel(adminActor, batch.id, {
      reason: "Wrong storefront",
    });

    held.open();
    await expect(failing).rejects.toThrow("boom");

    const cancelled = await cancelling;
    expect(cancelled.status).toBe(BatchStatus.CANCELLED);

    const stored = await h.container.batches.get(adminActor, batch.id);
    expect(stored.status).toBe(BatchStatus.CANCELLED);
    expect(stored.cancellationReason).toBe("Wrong storefront");
    expect(stored.lastError).toBeNull();
  });

  it("should not expose writes of a transaction that has not committed", async () => {
    const { h, batch } = await pendingBatch();
    const held = gate();

    const failing = h.store.transaction(async (tx) => {
      await tx.batches.updateStatus(batch.id, [BatchStatus.PENDING], {
        status: BatchStatus.PENDING,
        lastError: "uncommitted",
      });
      await held.opened;
      throw new Error("boom");
    });
    const read = h.store.batches.findById(batch.id);

    held.open();
    await expect(failing).rejects.toThrow("boom");
    expect((await read)?.lastError).toBeNull();
  });

  it("should apply outside writes after a committed transaction", async () => {
    const { h, batch } = await pendingBatch();
    const held = gate();

    const committing = h.store.transaction(async (tx) => {
      await held.opened;
      return tx.batches.updateStatus(batch.id, [BatchStatus.PENDING], {
        status: BatchStatus.PENDING,
        lastError: "committed",
      });
    });
    const outside = h.store.batches.updateStatus(batch.id, [BatchStatus.PENDING], {
      status: BatchStatus.CANCELLED,
    });

    held.open();
    expect((await committing)?.lastError).toBe("committed");
    expect(await outside).toMatchObject({
      status: BatchStatus.CANCELLED,
      lastError: "committed",
    });
  });

  it("should refuse a transaction view used after the transaction ended", async () => {
    const store = new MemoryWarrantyStore();
    const views: StoreTx[] = [];

    await store.transaction(async (tx) => {
      views.push(tx);
    });

    const [view] = views;
    await expect(view.batches.findById("batch-1")).rejects.toThrow(
      "Transaction is already finished",
    );
  });
});
