// src/modules/public/_test_/publicWarranty.integration.test.ts

import request from "supertest";
import type { Express } from "express";
import { beforeEach, describe, expect, it } from "vitest";
import { createApp } from "@/app";
import { buildTestContainer, type TestHarness } from "@/testing/testContainer";
import { customerActor } from "@/testing/fixtures";

const CODE = "WB-2024-00000001";

describe("Public warranty HTTP", () => {
  let h: TestHarness;
  let app: Express;

  beforeEach(async () => {
    h = buildTestContainer({ now: "2024-01-10T10:00:00.000Z" });
    await h.seedBarcode(CODE, 12);
    app = createApp(h.container);
  });

  it("should report service health without a token", async () => {
    const res = await request(app).get("/api/health");

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      ok: true,
      status: "online",
      mode: "MOCK",
      store: "up",
      checkedAt: "2024-01-10T10:00:00.000Z",
    });
  });

  it("should answer unknown routes with the not-found envelope", async () => {
    const res = await request(app).get("/api/no-such-route");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      ok: false,
      error: "Route not found",
      code: "ROUTE_NOT_FOUND",
      kind: "not_found",
    });
  });

  it("should validate an activated barcode anonymously", async () => {
    await h.container.barcodes.activate(customerActor, CODE, { purchaseDate: "2024-01-10" });

    const res = await request(app).post("/api/public/warranty/validate").send({ barcode: CODE });

    expect(res.status).toBe(200);
    expect(res.body.data).toMatchObject({
      valid: true,
      status: "active",
      message: "Warranty is valid and active",
      warranty: {
        barcode: CODE,
        expiresAt: "2025-01-10T10:00:00.000Z",
        warrantyPeriod: "12 months",
      },
    });
  });

  it("should answer an unknown barcode with 200 and valid=false", async () => {
    const res = await request(app)
      .post("/api/public/warranty/validate")
      .send({ barcode: "WB-2024-99999999" });

    expect(res.status).toBe(200);
    expect(res.body.data).toMatchObject({
      valid: false,
      status: "not_found",
      product: null,
      warranty: null,
      coverage: null,
    });
  });

  it("should answer coverage on an unknown barcode with 404", async () => {
    const res = await request(app)
      .post("/api/public/warranty/coverage")
      .send({ barcode: "WB-2024-99999999", issueType: "screen" });

    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ ok: false, code: "WARRANTY_NOT_FOUND" });
  });

  it("should reject a malformed JSON body", async () => {
    const res = await request(app)
      .post("/api/public/warranty/validate")
      .set("Content-Type", "application/json")
      .send('{"barcode":');

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ ok: false, kind: "invalid_argument" });
  });
});
