// src/modules/attachments/attachment.service.ts
// Purpose: Attachment custody. Records metadata, hands payloads to the scanner
// in the background, and filters reads by scan outcome for customers.

import type { AttachmentConfig } from "@/config/app.config";
import type { Clock } from "@/lib/clock";
import { SYSTEM_ACTOR, isStaff, type Actor } from "@/lib/auth/actor";
import type { AttachmentScanner } from "@/lib/collaborators/attachment-scanner";
import { NotFoundError } from "@/lib/errors/errors";
import type { StoreTx, WarrantyStore } from "@/lib/store/store.types";
import { withRequestContext } from "@/lib/observability/request-context";
import { errorMeta, log } from "@/lib/observability/logger";
import { parseInput } from "@/lib/validation/parseInput";
import { newId } from "@/utils/uuid";
import { commitTimelineEvent } from "@/modules/timeline/commitTimelineEvent";
import { TimelineEventType } from "@/modules/timeline/timeline.types";
import { ClaimNotFoundError, ClaimStateError } from "@/modules/claims/claim.errors";
import { allowedClaimActions, isTerminalClaimStatus } from "@/modules/claims/claimLifecycle.transitions";
import { canViewClaim } from "@/modules/claims/claim.view";
import type { Claim } from "@/modules/claims/claim.types";
import { ScanStatus, type ClaimAttachment } from "./attachment.types";
import {
  AttachmentUploadSchema,
  ScanResultSchema,
  type AttachmentUploadInput,
  type ScanResultInput,
} from "./attachment.schemas";
import { acceptAttachment } from "./attachment.policy";

export type AttachmentServiceDeps = {
  store: WarrantyStore;
  clock: Clock;
  config: AttachmentConfig;
  scanner: AttachmentScanner;
};

export class AttachmentNotFoundError extends NotFoundError {
  constructor(attachmentId: string) {
    super(`Attachment ${attachmentId} not found`, "ATTACHMENT_NOT_FOUND");
  }
}

export class AttachmentService {
  private readonly pendingScans = new Set<Promise<void>>();

  constructor(private readonly deps: AttachmentServiceDeps) {}

  ////////////////////////////////////////////////////////////////
  // Upload
  ////////////////////////////////////////////////////////////////

  /** Validates uploads up front so a claim submission can fail before anything is written. */
  prepare(
    uploadedBy: Actor,
    claimId: string,
    inputs: readonly AttachmentUploadInput[],
    at: Date,
  ): ClaimAttachment[] {
    return inputs.map((input) => {
      const upload = acceptAttachment(
        parseInput(AttachmentUploadSchema, input, "Invalid attachment"),
        this.deps.config,
      );

      return {
        id: newId(),
        claimId,
        filename: upload.filename,
        storageRef: upload.storageRef,
        sizeBytes: upload.sizeBytes,
        mimeType: upload.mimeType,
        attachmentType: upload.attachmentType,
        description: upload.description ?? null,
        scanStatus: ScanStatus.PENDING,
        scanDetail: null,
        scannedAt: null,
        uploadedBy: uploadedBy.actorId,
        uploadedAt: at,
      };
    });
  }

  /** Inserts prepared rows inside the caller's transaction. */
  async record(
    tx: StoreTx,
    actor: Actor,
    rows: readonly ClaimAttachment[],
    at: Date,
  ): Promise<ClaimAttachment[]> {
    const stored: ClaimAttachment[] = [];
    for (const row of rows) {
      stored.push(await tx.attachments.insert(row));
      await commitTimelineEvent(
        tx,
        {
          claimId: row.claimId,
          eventType: TimelineEventType.ATTACHMENT_UPLOADED,
          description: `Attachment uploaded: ${row.filename}`,
          actor,
          metadata: { attachmentId: row.id, attachmentType: row.attachmentType },
        },
        at,
      );
    }
    return stored;
  }

  async upload(
    actor: Actor,
    claimId: string,
    input: AttachmentUploadInput,
  ): Promise<ClaimAttachment> {
    const claim = await this.loadVisibleClaim(actor, claimId);
    if (isTerminalClaimStatus(claim.status)) {
      throw new ClaimStateError(
        claimId,
        claim.status,
        "attach files to",
        allowedClaimActions(claim),
      );
    }

    const now = this.deps.clock.now();
    const [prepared] = this.prepare(actor, claimId, [input], now);

    const [stored] = await this.deps.store.transaction((tx) =>
      this.record(tx, actor, [prepared], now),
    );

    log("INFO", "ATTACHMENT_UPLOADED", {
      claimId,
      attachmentId: stored.id,
      sizeBytes: stored.sizeBytes,
      mimeType: stored.mimeType,
    });

    this.queueScans([stored]);
    return stored;
  }

  ////////////////////////////////////////////////////////////////
  // Scanning
  ////////////////////////////////////////////////////////////////

  queueScans(rows: readonly ClaimAttachment[]) {
    for (const row of rows) {
      const task = withRequestContext(() => this.scan(row), { requestId: `attachment-scan:${row.id}` })
        .finally(() => {
          this.pendingScans.delete(task);
        });
      this.pendingScans.add(task);
    }
  }

  /** Resolves once every queued scan has settled. */
  async drainScans(): Promise<void> {
    while (this.pendingScans.size > 0) {
      await Promise.allSettled([...this.pendingScans]);
    }
  }

  private async scan(row: ClaimAttachment): Promise<void> {
    try {
      const verdict = await this.deps.scanner.scan(row.storageRef);
      await this.recordScanResult(SYSTEM_ACTOR, row.id, verdict);
    } catch (err) {
      // left pending; the scanner may still report through the internal route
      log("WARN", "ATTACHMENT_SCAN_FAILED", { attachmentId: row.id, ...errorMeta(err) });
    }
  }

  /** First verdict wins; later reports return the stored outcome unchanged. */
  async recordScanResult(
    actor: Actor,
    attachmentId: string,
    input: ScanResultInput,
  ): Promise<ClaimAttachment> {
    const verdict = parseInput(ScanResultSchema, input, "Invalid scan result");
    const now = this.deps.clock.now();

    const updated = await this.deps.store.transaction((tx) =>
      tx.attachments.recordScan(attachmentId, verdict.status, verdict.detail ?? null, now),
    );

    if (updated) {
      log(verdict.status === ScanStatus.FAILED ? "WARN" : "INFO", "ATTACHMENT_SCANNED", {
        attachmentId,
        claimId: updated.claimId,
        scanStatus: updated.scanStatus,
        reportedBy: actor.actorId,
      });
      return updated;
    }

    const current = await this.deps.store.attachments.findById(attachmentId);
    if (!current) throw new AttachmentNotFoundError(attachmentId);
    return current;
  }

  ////////////////////////////////////////////////////////////////
  // Reads
  ////////////////////////////////////////////////////////////////

  async list(actor: Actor, claimId: string): Promise<ClaimAttachment[]> {
    await this.loadVisibleClaim(actor, claimId);

    if (isStaff(actor)) {
      return this.deps.store.attachments.listByClaim(claimId);
    }
    return this.deps.store.attachments.listByClaim(claimId, {
      scanStatus: ScanStatus.PASSED,
    });
  }

  private async loadVisibleClaim(actor: Actor, claimId: string): Promise<Claim> {
    const claim = await this.deps.store.claims.findById(claimId);
    if (!claim || !canViewClaim(actor, claim)) throw new ClaimNotFoundError(claimId);
    return claim;
  }
}
