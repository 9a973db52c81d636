// src/lib/store/postgres/attachments.pg.ts

import type { Queryable } from "@/lib/db";
import type {
  AttachmentType,
  ClaimAttachment,
  ScanStatus,
} from "@/modules/attachments/attachment.types";
import type { AttachmentRepository } from "../store.types";
import { toNumberOr } from "./sql";

type AttachmentRow = {
  id: string;
  claim_id: string;
  filename: string;
  storage_ref: string;
  size_bytes: string;
  mime_type: string;
  attachment_type: AttachmentType;
  description: string | null;
  scan_status: ScanStatus;
  scan_detail: string | null;
  scanned_at: Date | null;
  uploaded_by: string;
  uploaded_at: Date;
};

function toAttachment(row: AttachmentRow): ClaimAttachment {
  return {
    id: row.id,
    claimId: row.claim_id,
    filename: row.filename,
    storageRef: row.storage_ref,
    sizeBytes: toNumberOr(row.size_bytes, 0),
    mimeType: row.mime_type,
    attachmentType: row.attachment_type,
    description: row.description,
    scanStatus: row.scan_status,
    scanDetail: row.scan_detail,
    scannedAt: row.scanned_at,
    uploadedBy: row.uploaded_by,
    uploadedAt: row.uploaded_at,
  };
}

export function createPgAttachmentRepository(db: Queryable): AttachmentRepository {
  return {
    async insert(row) {
      const result = await db.query<AttachmentRow>(
        `INSERT INTO claim_attachments
           (id, claim_id, filename, storage_ref, size_bytes, mime_type,
            attachment_type, description, scan_status, uploaded_by, uploaded_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
         RETURNING *`,
        [
          row.id,
          row.claimId,
          row.filename,
          row.storageRef,
          row.sizeBytes,
          row.mimeType,
          row.attachmentType,
          row.description,
          row.scanStatus,
          row.uploadedBy,
          row.uploadedAt,
        ],
      );
      return toAttachment(result.rows[0]);
    },

    async findById(id) {
      const result = await db.query<AttachmentRow>(
        `SELECT * FROM claim_attachments WHERE id = $1`,
        [id],
      );
      return result.rows[0] ? toAttachment(result.rows[0]) : null;
    },

    async listByClaim(claimId, opts) {
      const result = await db.query<AttachmentRow>(
        `SELECT * FROM claim_attachments
          WHERE claim_id = $1 AND ($2::text IS NULL OR scan_status = $2)
          ORDER BY uploaded_at`,
        [claimId, opts?.scanStatus ?? null],
      );
      return result.rows.map(toAttachment);
    },

    async recordScan(id, status, detail, at) {
      const result = await db.query<AttachmentRow>(
        `UPDATE claim_attachments
            SET scan_status = $2, scan_detail = $3, scanned_at = $4
          WHERE id = $1 AND scan_status = 'pending'
          RETURNING *`,
        [id, status, detail, at],
      );
      return result.rows[0] ? toAttachment(result.rows[0]) : null;
    },
  };
}
