// src/modules/barcodes/_test_/barcode.service.test.ts

import { beforeEach, describe, expect, it } from "vitest";
import { buildTestContainer, type TestHarness } from "@/testing/testContainer";
import {
  adminActor,
  agentActor,
  customerActor,
  otherCustomerActor,
  technicianActor,
  TEST_CUSTOMER,
} from "@/testing/fixtures";
import { BarcodeStatus } from "../barcode.types";

const CODE = "WB-2024-00000001";

describe("BarcodeService", () => {
  let h: TestHarness;

  beforeEach(async () => {
    h = buildTestContainer({ now: "2024-01-10T10:00:00.000Z" });
    await h.seedBarcode(CODE, 24);
  });

  it("should bind the warranty to the activating customer", async () => {
    const view = await h.container.barcodes.activate(customerActor, CODE, {
      purchaseDate: "2024-01-10",
      retailer: "Corner Shop",
    });

    expect(view.status).toBe(BarcodeStatus.ACTIVE);
    expect(view.customerId).toBe(TEST_CUSTOMER.id);
    expect(view.activatedAt?.toISOString()).toBe("2024-01-10T10:00:00.000Z");
    expect(view.expiresAt?.toISOString()).toBe("2026-01-10T10:00:00.000Z");
    expect(view.daysRemaining).toBe(731);
    expect(view.canClaim).toBe(true);
    expect(view.warrantyPeriod).toBe("24 months");
    expect(view.purchase.retailer).toBe("Corner Shop");
  });

  it("should reject a second activation as a conflict", async () => {
    await h.container.barcodes.activate(customerActor, CODE, { purchaseDate: "2024-01-10" });

    await expect(
      h.container.barcodes.activate(otherCustomerActor, CODE, { purchaseDate: "2024-01-10" }),
    ).rejects.toMatchObject({ kind: "conflict", code: "BARCODE_ALREADY_ACTIVATED" });

    const row = await h.store.barcodes.findByCode(CODE);
    expect(row?.customerId).toBe(TEST_CUSTOMER.id);
  });

  it("should require customerId when an agent registers for a customer", async () => {
    await expect(
      h.container.barcodes.activate(agentActor, CODE, { purchaseDate: "2024-01-10" }),
    ).rejects.toMatchObject({ kind: "invalid_argument" });

    const view = await h.container.barcodes.activate(agentActor, CODE, {
      purchaseDate: "2024-01-10",
      customerId: TEST_CUSTOMER.id,
    });
    expect(view.customerId).toBe(TEST_CUSTOMER.id);
  });

  it("should refuse technicians and future purchase dates", async () => {
    await expect(
      h.container.barcodes.activate(technicianActor, CODE, { purchaseDate: "2024-01-10" }),
    ).rejects.toMatchObject({ kind: "forbidden" });

    await expect(
      h.container.barcodes.activate(customerActor, CODE, { purchaseDate: "2024-01-11" }),
    ).rejects.toMatchObject({ kind: "invalid_argument" });
  });

  it("should answer unknown and malformed barcodes distinctly", async () => {
    await expect(
      h.container.barcodes.activate(customerActor, "WB-2024-99999999", {
        purchaseDate: "2024-01-10",
      }),
    ).rejects.toMatchObject({ kind: "not_found", code: "BARCODE_NOT_FOUND" });

    await expect(
      h.container.barcodes.activate(customerActor, "not-a-barcode", {
        purchaseDate: "2024-01-10",
      }),
    ).rejects.toMatchObject({ kind: "invalid_argument" });
  });

  it("should revoke once and block activation afterwards", async () => {
    const revoked = await h.container.barcodes.revoke(adminActor, CODE, { reason: "Stolen stock" });
    expect(revoked.status).toBe(BarcodeStatus.REVOKED);
    expect(revoked.revocationReason).toBe("Stolen stock");

    await expect(
      h.container.barcodes.revoke(adminActor, CODE, { reason: "again" }),
    ).rejects.toMatchObject({ code: "BARCODE_REVOKED" });

    await expect(
      h.container.barcodes.activate(customerActor, CODE, { purchaseDate: "2024-01-10" }),
    ).rejects.toMatchObject({ code: "BARCODE_REVOKED" });

    await expect(
      h.container.barcodes.revoke(agentActor, CODE, { reason: "no role" }),
    ).rejects.toMatchObject({ kind: "forbidden" });
  });

  it("should show the audit log to staff only", async () => {
    await h.container.barcodes.activate(customerActor, CODE, { purchaseDate: "2024-01-10" });

    const staff = await h.container.barcodes.get(agentActor, CODE);
    expect(staff.events.map((e) => e.eventType)).toEqual(["activated"]);

    const owner = await h.container.barcodes.get(customerActor, CODE);
    expect(owner.events).toEqual([]);
    expect(owner.warranty.barcode).toBe(CODE);

    await expect(h.container.barcodes.get(otherCustomerActor, CODE)).rejects.toMatchObject({
      kind: "not_found",
    });
  });

  it("should project expiry from the clock without rewriting the row", async () => {
    await h.container.barcodes.activate(customerActor, CODE, { purchaseDate: "2024-01-10" });
    h.clock.set("2026-02-01T00:00:00.000Z");

    const { warranty } = await h.container.barcodes.get(agentActor, CODE);
    expect(warranty.status).toBe(BarcodeStatus.ACTIVE);
    expect(warranty.effectiveStatus).toBe(BarcodeStatus.EXPIRED);
    expect(warranty.isExpired).toBe(true);
    expect(warranty.daysRemaining).toBe(0);
    expect(warranty.canClaim).toBe(false);
  });
});
