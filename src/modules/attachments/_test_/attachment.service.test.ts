// src/modules/attachments/_test_/attachment.service.test.ts

import { describe, expect, it } from "vitest";
import { SYSTEM_ACTOR } from "@/lib/auth/actor";
import { buildTestContainer } from "@/testing/testContainer";
import { FixedVerdictScanner, SilentScanner } from "@/testing/fakes";
import { agentActor, customerActor } from "@/testing/fixtures";
import { activatedBarcode, submitClaim } from "@/testing/claimFlow";
import type { AttachmentUploadInput } from "../attachment.schemas";
import { ScanStatus } from "../attachment.types";

const CODE = "WB-2024-00000001";

const receipt: AttachmentUploadInput = {
  filename: "receipt.pdf",
  storageRef: "uploads/test/receipt.pdf",
  sizeBytes: 20_000,
  mimeType: "application/pdf",
  attachmentType: "receipt",
};

const photo: AttachmentUploadInput = {
  filename: "screen.jpg",
  storageRef: "uploads/test/screen.jpg",
  sizeBytes: 300_000,
  mimeType: "image/jpeg",
  attachmentType: "photo",
};

async function harnessWith(scanner: SilentScanner | FixedVerdictScanner) {
  const h = buildTestContainer({
    now: "2024-03-01T09:00:00.000Z",
    overrides: { scanner },
  });
  await activatedBarcode(h, CODE);
  return h;
}

describe("AttachmentService", () => {
  it("should show customers only attachments that passed scanning", async () => {
    const h = await harnessWith(new SilentScanner());
    const claim = await submitClaim(h, CODE, { attachments: [receipt, photo] });
    await h.container.attachments.drainScans();

    const staffBefore = await h.container.attachments.list(agentActor, claim.id);
    expect(staffBefore.map((a) => a.scanStatus)).toEqual([
      ScanStatus.PENDING,
      ScanStatus.PENDING,
    ]);
    expect(await h.container.attachments.list(customerActor, claim.id)).toEqual([]);

    const [first, second] = staffBefore;
    await h.container.attachments.recordScanResult(SYSTEM_ACTOR, first.id, {
      status: "passed",
    });
    await h.container.attachments.recordScanResult(SYSTEM_ACTOR, second.id, {
      status: "failed",
      detail: "signature match",
    });

    const customer = await h.container.attachments.list(customerActor, claim.id);
    expect(customer.map((a) => a.filename)).toEqual(["receipt.pdf"]);

    const staff = await h.container.attachments.list(agentActor, claim.id);
    expect(staff.map((a) => a.scanStatus)).toEqual([ScanStatus.PASSED, ScanStatus.FAILED]);
  });

  it("should keep the first scan verdict", async () => {
    const h = await harnessWith(new SilentScanner());
    const claim = await submitClaim(h, CODE);
    const stored = await h.container.attachments.upload(customerActor, claim.id, receipt);
    await h.container.attachments.drainScans();

    await h.container.attachments.recordScanResult(SYSTEM_ACTOR, stored.id, { status: "passed" });
    const again = await h.container.attachments.recordScanResult(SYSTEM_ACTOR, stored.id, {
      status: "failed",
    });
    expect(again.scanStatus).toBe(ScanStatus.PASSED);

    await expect(
      h.container.attachments.recordScanResult(SYSTEM_ACTOR, "missing-attachment", {
        status: "passed",
      }),
    ).rejects.toMatchObject({ code: "ATTACHMENT_NOT_FOUND" });
  });

  it("should hand uploads to the scanner in the background", async () => {
    const scanner = new FixedVerdictScanner({ status: "passed", detail: null });
    const h = await harnessWith(scanner);
    const claim = await submitClaim(h, CODE);

    await h.container.attachments.upload(customerActor, claim.id, photo);
    await h.container.attachments.drainScans();

    expect(scanner.scanned).toEqual(["uploads/test/screen.jpg"]);
    const listed = await h.container.attachments.list(customerActor, claim.id);
    expect(listed).toHaveLength(1);
    expect(listed[0].scannedAt?.toISOString()).toBe("2024-03-01T09:00:00.000Z");

    const timeline = await h.container.claims.timeline(customerActor, claim.id);
    expect(timeline[timeline.length - 1].description).toBe("Attachment uploaded: screen.jpg");
  });

  it("should enforce type and size rules", async () => {
    const h = await harnessWith(new SilentScanner());
    const claim = await submitClaim(h, CODE);

    await expect(
      h.container.attachments.upload(customerActor, claim.id, {
        ...photo,
        sizeBytes: 6 * 1024 * 1024,
      }),
    ).rejects.toMatchObject({ kind: "payload_too_large", limitBytes: 5 * 1024 * 1024 });

    await expect(
      h.container.attachments.upload(customerActor, claim.id, {
        ...receipt,
        mimeType: "application/zip",
      }),
    ).rejects.toMatchObject({ kind: "invalid_argument" });

    await expect(
      h.container.attachments.upload(customerActor, claim.id, {
        ...photo,
        mimeType: "application/pdf",
      }),
    ).rejects.toMatchObject({ kind: "invalid_argument" });

    const stored = await h.container.attachments.upload(customerActor, claim.id, {
      ...receipt,
      filename: "../../private/receipt.pdf",
    });
    expect(stored.filename).toBe("receipt.pdf");
  });

  it("should reject an oversized upload before the claim is written", async () => {
    const h = await harnessWith(new SilentScanner());

    await expect(
      submitClaim(h, CODE, {
        attachments: [{ ...receipt, sizeBytes: 11 * 1024 * 1024 }],
      }),
    ).rejects.toMatchObject({ kind: "payload_too_large" });

    const open = await h.store.claims.list({ customerId: customerActor.actorId }, {
      page: 1,
      pageSize: 20,
    });
    expect(open.items).toEqual([]);
  });

  it("should refuse attachments on a closed claim", async () => {
    const h = await harnessWith(new SilentScanner());
    const claim = await submitClaim(h, CODE);
    await h.container.claims.transition(customerActor, claim.id, { action: "cancel" });

    await expect(
      h.container.attachments.upload(customerActor, claim.id, receipt),
    ).rejects.toMatchObject({ kind: "invalid_state" });
  });
});
