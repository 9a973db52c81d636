// src/modules/claims/_test_/claim.integration.test.ts
// HTTP surface for claims: bearer auth, envelopes, idempotent replay, scanner callback.

import request from "supertest";
import type { Express } from "express";
import { beforeEach, describe, expect, it } from "vitest";
import { createApp } from "@/app";
import { buildTestContainer, type TestHarness } from "@/testing/testContainer";
import { SilentScanner } from "@/testing/fakes";
import {
  agentActor,
  customerActor,
  otherCustomerActor,
  TEST_INTERNAL_KEY,
  tokenFor,
} from "@/testing/fixtures";
import { activatedBarcode, claimInput } from "@/testing/claimFlow";

const CODE = "WB-2024-00000001";

describe("Claims HTTP", () => {
  let h: TestHarness;
  let app: Express;

  beforeEach(async () => {
    h = buildTestContainer({
      now: "2024-03-01T09:00:00.000Z",
      overrides: { scanner: new SilentScanner() },
    });
    await activatedBarcode(h, CODE);
    app = createApp(h.container);
  });

  it("should require a valid bearer token", async () => {
    const missing = await request(app).post("/api/claims").send(claimInput(CODE));
    expect(missing.status).toBe(403);
    expect(missing.body).toEqual({
      ok: false,
      error: "A valid bearer token is required",
      code: "FORBIDDEN",
      kind: "forbidden",
    });

    const forged = await request(app)
      .post("/api/claims")
      .set("Authorization", `Bearer ${tokenFor(customerActor, "another-secret")}`)
      .send(claimInput(CODE));
    expect(forged.status).toBe(403);
  });

  it("should submit a claim and wrap it in the success envelope", async () => {
    const res = await request(app)
      .post("/api/claims")
      .set("Authorization", `Bearer ${tokenFor(customerActor)}`)
      .send(claimInput(CODE));

    expect(res.status).toBe(201);
    expect(res.body.ok).toBe(true);
    expect(res.body.data).toMatchObject({
      claimNumber: "WAR-2024-000001",
      status: "pending",
      displayStatus: "Pending Review",
      nextActions: ["cancel", "dispute"],
    });
    expect(res.body.data).not.toHaveProperty("adminNotes");
    expect(res.headers["cache-control"]).toBe("no-store");
  });

  it("should replay a repeated Idempotency-Key and refuse a changed payload", async () => {
    const token = tokenFor(customerActor);
    const first = await request(app)
      .post("/api/claims")
      .set("Authorization", `Bearer ${token}`)
      .set("Idempotency-Key", "submit-0001")
      .send(claimInput(CODE));
    expect(first.status).toBe(201);

    const replay = await request(app)
      .post("/api/claims")
      .set("Authorization", `Bearer ${token}`)
      .set("Idempotency-Key", "submit-0001")
      .send(claimInput(CODE));
    expect(replay.status).toBe(201);
    expect(replay.headers["idempotent-replayed"]).toBe("true");
    expect(replay.body.data.id).toBe(first.body.data.id);

    const changed = await request(app)
      .post("/api/claims")
      .set("Authorization", `Bearer ${token}`)
      .set("Idempotency-Key", "submit-0001")
      .send(claimInput(CODE, { severity: "high" }));
    expect(changed.status).toBe(409);
    expect(changed.body.code).toBe("IDEMPOTENCY_KEY_REUSED");

    const mine = await h.store.claims.list(
      { customerId: customerActor.actorId },
      { page: 1, pageSize: 20 },
    );
    expect(mine.total).toBe(1);
  });

  it("should scope idempotency keys to the caller", async () => {
    await request(app)
      .post("/api/claims")
      .set("Authorization", `Bearer ${tokenFor(customerActor)}`)
      .set("Idempotency-Key", "shared-key")
      .send(claimInput(CODE));

    const other = await request(app)
      .post("/api/claims")
      .set("Authorization", `Bearer ${tokenFor(otherCustomerActor)}`)
      .set("Idempotency-Key", "shared-key")
      .send(claimInput(CODE));

    expect(other.headers["idempotent-replayed"]).toBeUndefined();
    expect(other.status).toBe(403);
  });

  it("should explain an illegal transition in the error envelope", async () => {
    const submitted = await request(app)
      .post("/api/claims")
      .set("Authorization", `Bearer ${tokenFor(customerActor)}`)
      .send(claimInput(CODE));
    const claimId: string = submitted.body.data.id;

    const res = await request(app)
      .post(`/api/claims/${claimId}/transition`)
      .set("Authorization", `Bearer ${tokenFor(agentActor)}`)
      .send({ action: "ship" });

    expect(res.status).toBe(409);
    expect(res.body).toMatchObject({
      ok: false,
      code: "CLAIM_TRANSITION_ILLEGAL",
      kind: "invalid_transition",
      details: {
        currentState: "pending",
        attemptedAction: "ship",
        allowedActions: ["validate", "reject", "cancel", "dispute"],
      },
    });
  });

  it("should list field violations for an invalid body", async () => {
    const res = await request(app)
      .post("/api/claims")
      .set("Authorization", `Bearer ${tokenFor(customerActor)}`)
      .send({ ...claimInput(CODE), issueDescription: "short" });

    expect(res.status).toBe(400);
    expect(res.body.kind).toBe("invalid_argument");
    expect(res.body.details.fields).toContainEqual(
      expect.objectContaining({ field: "issueDescription" }),
    );
  });

  it("should accept scanner verdicts only with the internal key", async () => {
    const submitted = await request(app)
      .post("/api/claims")
      .set("Authorization", `Bearer ${tokenFor(customerActor)}`)
      .send(
        claimInput(CODE, {
          attachments: [
            {
              filename: "receipt.pdf",
              storageRef: "uploads/test/receipt.pdf",
              sizeBytes: 1024,
              mimeType: "application/pdf",
              attachmentType: "receipt",
            },
          ],
        }),
      );
    await h.container.attachments.drainScans();
    const [attachment] = await h.container.attachments.list(agentActor, submitted.body.data.id);

    const denied = await request(app)
      .post(`/api/internal/attachments/${attachment.id}/scan-result`)
      .send({ status: "passed" });
    expect(denied.status).toBe(403);

    const accepted = await request(app)
      .post(`/api/internal/attachments/${attachment.id}/scan-result`)
      .set("x-internal-key", TEST_INTERNAL_KEY)
      .send({ status: "passed" });
    expect(accepted.status).toBe(200);
    expect(accepted.body.data.scanStatus).toBe("passed");

    const customerList = await request(app)
      .get(`/api/claims/${submitted.body.data.id}/attachments`)
      .set("Authorization", `Bearer ${tokenFor(customerActor)}`);
    expect(customerList.body.data).toHaveLength(1);
  });
});
