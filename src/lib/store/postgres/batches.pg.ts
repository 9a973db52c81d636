// src/lib/store/postgres/batches.pg.ts

import type { Queryable } from "@/lib/db";
import { SYSTEM_CONSTANTS } from "@/constants/system.constants";
import type {
  Batch,
  BatchPriority,
  BatchStatus,
  BatchStep,
  CollisionRecord,
  CollisionResolution,
  CollisionType,
} from "@/modules/batches/batch.types";
import { buildPage, offsetOf } from "@/utils/pagination";
import type { BatchRepository } from "../store.types";
import { WhereBuilder, buildSetClause, type ColumnSpec } from "./sql";

type BatchRow = {
  id: string;
  batch_number: string;
  product_id: string;
  storefront_id: string;
  requested_quantity: number;
  generated_count: number;
  successful_count: number;
  failed_count: number;
  error_count: number;
  collision_count: number;
  retry_count: number;
  max_retries: number;
  prefix: string;
  description: string | null;
  expiry_months: number;
  priority: BatchPriority;
  status: BatchStatus;
  current_step: BatchStep;
  tags: string[];
  notes: string | null;
  notify_on_complete: boolean;
  generation_rate: number | null;
  last_error: string | null;
  last_updated_at: Date;
  created_by: string;
  created_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
  cancelled_at: Date | null;
  cancelled_by: string | null;
  cancellation_reason: string | null;
};

type CollisionRow = {
  id: string;
  batch_id: string;
  slot: number;
  candidate: string;
  collision_type: CollisionType;
  resolution: CollisionResolution;
  detected_at: Date;
  resolved_at: Date | null;
};

const BATCH_COLUMNS: Record<string, ColumnSpec> = {
  status: { column: "status" },
  currentStep: { column: "current_step" },
  startedAt: { column: "started_at" },
  completedAt: { column: "completed_at" },
  cancelledAt: { column: "cancelled_at" },
  cancelledBy: { column: "cancelled_by" },
  cancellationReason: { column: "cancellation_reason" },
  lastError: { column: "last_error" },
  lastUpdatedAt: { column: "last_updated_at" },
  generationRate: { column: "generation_rate" },
};

function toBatch(row: BatchRow): Batch {
  return {
    id: row.id,
    batchNumber: row.batch_number,
    productId: row.product_id,
    storefrontId: row.storefront_id,
    requestedQuantity: row.requested_quantity,
    generatedCount: row.generated_count,
    successfulCount: row.successful_count,
    failedCount: row.failed_count,
    errorCount: row.error_count,
    collisionCount: row.collision_count,
    retryCount: row.retry_count,
    maxRetries: row.max_retries,
    prefix: row.prefix,
    description: row.description,
    expiryMonths: row.expiry_months,
    priority: row.priority,
    status: row.status,
    currentStep: row.current_step,
    tags: row.tags,
    notes: row.notes,
    notifyOnComplete: row.notify_on_complete,
    generationRate: row.generation_rate,
    lastError: row.last_error,
    lastUpdatedAt: row.last_updated_at,
    createdBy: row.created_by,
    createdAt: row.created_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    cancelledAt: row.cancelled_at,
    cancelledBy: row.cancelled_by,
    cancellationReason: row.cancellation_reason,
  };
}

function toCollision(row: CollisionRow): CollisionRecord {
  return {
    id: row.id,
    batchId: row.batch_id,
    slot: row.slot,
    candidate: row.candidate,
    collisionType: row.collision_type,
    resolution: row.resolution,
    detectedAt: row.detected_at,
    resolvedAt: row.resolved_at,
  };
}

export function createPgBatchRepository(db: Queryable): BatchRepository {
  return {
    async insert(row) {
      const result = await db.query<BatchRow>(
        `INSERT INTO barcode_batches
           (id, batch_number, product_id, storefront_id, requested_quantity,
            max_retries, prefix, description, expiry_months, priority, tags,
            notes, notify_on_complete, last_updated_at, created_by, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16)
         RETURNING *`,
        [
          row.id,
          row.batchNumber,
          row.productId,
          row.storefrontId,
          row.requestedQuantity,
          row.maxRetries,
          row.prefix,
          row.description,
          row.expiryMonths,
          row.priority,
          row.tags,
          row.notes,
          row.notifyOnComplete,
          row.lastUpdatedAt,
          row.createdBy,
          row.createdAt,
        ],
      );
      return toBatch(result.rows[0]);
    },

    async findById(id) {
      const result = await db.query<BatchRow>(
        `SELECT * FROM barcode_batches WHERE id = $1`,
        [id],
      );
      return result.rows[0] ? toBatch(result.rows[0]) : null;
    },

    async list(filter, page) {
      const where = new WhereBuilder()
        .add((p) => `status = ${p}`, filter.status)
        .add((p) => `priority = ${p}`, filter.priority)
        .add((p) => `product_id = ${p}`, filter.productId)
        .add((p) => `storefront_id = ${p}`, filter.storefrontId)
        .add((p) => `created_by = ${p}`, filter.createdBy)
        .add((p) => `created_at >= ${p}`, filter.createdFrom)
        .add((p) => `created_at <= ${p}`, filter.createdTo);

      const count = await db.query<{ total: string }>(
        `SELECT count(*) AS total FROM barcode_batches ${where.sql()}`,
        where.values,
      );

      const limit = where.next(page.pageSize);
      const offset = where.next(offsetOf(page));

      const rows = await db.query<BatchRow>(
        `SELECT * FROM barcode_batches ${where.sql()}
          ORDER BY created_at DESC
          LIMIT ${limit} OFFSET ${offset}`,
        where.values,
      );

      return buildPage(rows.rows.map(toBatch), Number(count.rows[0].total), page);
    },

    async updateStatus(id, from, patch) {
      const { fragments, values } = buildSetClause(patch, BATCH_COLUMNS, 3);

      const result = await db.query<BatchRow>(
        `UPDATE barcode_batches SET ${fragments.join(", ")}
          WHERE id = $1 AND status = ANY($2::text[])
          RETURNING *`,
        [id, [...from], ...values],
      );
      return result.rows[0] ? toBatch(result.rows[0]) : null;
    },

    async applyChunk(id, delta) {
      const result = await db.query<BatchRow>(
        `UPDATE barcode_batches
            SET generated_count  = generated_count + $2,
                successful_count = successful_count + $3,
                failed_count     = failed_count + $4,
                error_count      = error_count + $5,
                collision_count  = collision_count + $6,
                retry_count      = retry_count + $7,
                last_error       = CASE WHEN $8::boolean THEN $9::text ELSE last_error END,
                generation_rate  = COALESCE($10::double precision, generation_rate),
                current_step     = $11,
                last_updated_at  = $12
          WHERE id = $1 AND status = 'in_progress'
          RETURNING *`,
        [
          id,
          delta.generated,
          delta.successful,
          delta.failed,
          delta.errors,
          delta.collisions,
          delta.retries,
          delta.lastError !== undefined,
          delta.lastError ?? null,
          delta.generationRate,
          delta.currentStep,
          delta.at,
        ],
      );
      return result.rows[0] ? toBatch(result.rows[0]) : null;
    },

    async lockForChunk(id) {
      await db.query(`SELECT pg_advisory_xact_lock($1, hashtext($2))`, [
        SYSTEM_CONSTANTS.BATCH_ADVISORY_LOCK_NAMESPACE,
        id,
      ]);
    },

    async insertCollisions(rows) {
      if (rows.length === 0) return;
      await db.query(
        `INSERT INTO batch_collisions
           (id, batch_id, slot, candidate, collision_type, resolution, detected_at, resolved_at)
         SELECT * FROM unnest($1::uuid[], $2::uuid[], $3::int[], $4::text[],
                              $5::text[], $6::text[], $7::timestamptz[], $8::timestamptz[])`,
        [
          rows.map((r) => r.id),
          rows.map((r) => r.batchId),
          rows.map((r) => r.slot),
          rows.map((r) => r.candidate),
          rows.map((r) => r.collisionType),
          rows.map((r) => r.resolution),
          rows.map((r) => r.detectedAt),
          rows.map((r) => r.resolvedAt),
        ],
      );
    },

    async listCollisions(batchId, filter, page) {
      const where = new WhereBuilder()
        .add((p) => `batch_id = ${p}`, batchId)
        .add((p) => `collision_type = ${p}`, filter.collisionType);

      const count = await db.query<{ total: string }>(
        `SELECT count(*) AS total FROM batch_collisions ${where.sql()}`,
        where.values,
      );

      const limit = where.next(page.pageSize);
      const offset = where.next(offsetOf(page));

      const rows = await db.query<CollisionRow>(
        `SELECT * FROM batch_collisions ${where.sql()}
          ORDER BY detected_at, slot
          LIMIT ${limit} OFFSET ${offset}`,
        where.values,
      );

      return buildPage(rows.rows.map(toCollision), Number(count.rows[0].total), page);
    },
  };
}
