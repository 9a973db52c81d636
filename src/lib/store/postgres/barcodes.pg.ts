// src/lib/store/postgres/barcodes.pg.ts

import type { Queryable } from "@/lib/db";
import type {
  BarcodeEvent,
  BarcodeEventType,
  BarcodeStatus,
  WarrantyBarcode,
} from "@/modules/barcodes/barcode.types";
import { buildPage, offsetOf } from "@/utils/pagination";
import type { BarcodeRepository } from "../store.types";
import { WhereBuilder, toNumber } from "./sql";

type BarcodeRow = {
  id: string;
  barcode: string;
  product_id: string;
  storefront_id: string | null;
  batch_id: string | null;
  status: BarcodeStatus;
  warranty_period_months: number;
  activated_at: Date | null;
  expires_at: Date | null;
  customer_id: string | null;
  retailer: string | null;
  invoice_number: string | null;
  serial_number: string | null;
  purchase_date: string | null;
  purchase_price: string | null;
  revoked_at: Date | null;
  revocation_reason: string | null;
  created_at: Date;
  updated_at: Date;
};

type BarcodeEventRow = {
  id: string;
  barcode_id: string;
  event_type: BarcodeEventType;
  actor_id: string;
  occurred_at: Date;
  metadata: Record<string, unknown>;
};

const COLUMNS = `
  id, barcode, product_id, storefront_id, batch_id, status,
  warranty_period_months, activated_at, expires_at, customer_id,
  retailer, invoice_number, serial_number,
  to_char(purchase_date, 'YYYY-MM-DD') AS purchase_date, purchase_price,
  revoked_at, revocation_reason, created_at, updated_at`;

function toBarcode(row: BarcodeRow): WarrantyBarcode {
  return {
    id: row.id,
    barcode: row.barcode,
    productId: row.product_id,
    storefrontId: row.storefront_id,
    batchId: row.batch_id,
    status: row.status,
    warrantyPeriodMonths: row.warranty_period_months,
    activatedAt: row.activated_at,
    expiresAt: row.expires_at,
    customerId: row.customer_id,
    purchase: {
      retailer: row.retailer,
      invoiceNumber: row.invoice_number,
      serialNumber: row.serial_number,
      purchaseDate: row.purchase_date,
      purchasePrice: toNumber(row.purchase_price),
    },
    revokedAt: row.revoked_at,
    revocationReason: row.revocation_reason,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function createPgBarcodeRepository(db: Queryable): BarcodeRepository {
  return {
    async insert(row) {
      const result = await db.query<BarcodeRow>(
        `INSERT INTO warranty_barcodes
           (id, barcode, product_id, storefront_id, batch_id, status,
            warranty_period_months, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, 'generated', $6, $7, $7)
         RETURNING ${COLUMNS}`,
        [
          row.id,
          row.barcode,
          row.productId,
          row.storefrontId,
          row.batchId,
          row.warrantyPeriodMonths,
          row.createdAt,
        ],
      );
      return toBarcode(result.rows[0]);
    },

    async insertMany(rows) {
      if (rows.length === 0) return { inserted: [], duplicates: [] };

      // unnest keeps this a single statement regardless of chunk size
      const result = await db.query<BarcodeRow>(
        `INSERT INTO warranty_barcodes
           (id, barcode, product_id, storefront_id, batch_id, status,
            warranty_period_months, created_at, updated_at)
         SELECT id, barcode, product_id, storefront_id, batch_id, 'generated',
                months, created_at, created_at
           FROM unnest($1::uuid[], $2::text[], $3::uuid[], $4::text[],
                       $5::uuid[], $6::int[], $7::timestamptz[])
             AS t(id, barcode, product_id, storefront_id, batch_id, months, created_at)
         ON CONFLICT (barcode) DO NOTHING
         RETURNING ${COLUMNS}`,
        [
          rows.map((r) => r.id),
          rows.map((r) => r.barcode),
          rows.map((r) => r.productId),
          rows.map((r) => r.storefrontId),
          rows.map((r) => r.batchId),
          rows.map((r) => r.warrantyPeriodMonths),
          rows.map((r) => r.createdAt),
        ],
      );

      const inserted = result.rows.map(toBarcode);
      const accepted = new Set(inserted.map((b) => b.barcode));

      return {
        inserted,
        duplicates: rows.map((r) => r.barcode).filter((b) => !accepted.has(b)),
      };
    },

    async findById(id) {
      const result = await db.query<BarcodeRow>(
        `SELECT ${COLUMNS} FROM warranty_barcodes WHERE id = $1`,
        [id],
      );
      return result.rows[0] ? toBarcode(result.rows[0]) : null;
    },

    async findByCode(barcode) {
      const result = await db.query<BarcodeRow>(
        `SELECT ${COLUMNS} FROM warranty_barcodes WHERE barcode = $1`,
        [barcode],
      );
      return result.rows[0] ? toBarcode(result.rows[0]) : null;
    },

    async existing(barcodes) {
      if (barcodes.length === 0) return new Set<string>();
      const result = await db.query<{ barcode: string }>(
        `SELECT barcode FROM warranty_barcodes WHERE barcode = ANY($1::text[])`,
        [[...barcodes]],
      );
      return new Set(result.rows.map((r) => r.barcode));
    },

    async listByBatch(batchId, page) {
      const [rows, count] = await Promise.all([
        db.query<BarcodeRow>(
          `SELECT ${COLUMNS} FROM warranty_barcodes
            WHERE batch_id = $1
            ORDER BY created_at, barcode
            LIMIT $2 OFFSET $3`,
          [batchId, page.pageSize, offsetOf(page)],
        ),
        db.query<{ total: string }>(
          `SELECT count(*) AS total FROM warranty_barcodes WHERE batch_id = $1`,
          [batchId],
        ),
      ]);
      return buildPage(rows.rows.map(toBarcode), Number(count.rows[0].total), page);
    },

    async listForProduct(filter) {
      const where = new WhereBuilder()
        .add((p) => `product_id = ${p}`, filter.productId)
        .add((p) => `status = ANY(${p}::text[])`, [...filter.statuses])
        .add((p) => `customer_id = ${p}`, filter.customerId)
        .add((p) => `serial_number = ${p}`, filter.serialNumber)
        .add((p) => `purchase_date = ${p}::date`, filter.purchaseDate);

      const limit = where.next(filter.limit);

      const result = await db.query<BarcodeRow>(
        `SELECT ${COLUMNS} FROM warranty_barcodes ${where.sql()}
          ORDER BY activated_at DESC NULLS LAST
          LIMIT ${limit}`,
        where.values,
      );
      return result.rows.map(toBarcode);
    },

    async activate(id, args) {
      const result = await db.query<BarcodeRow>(
        `UPDATE warranty_barcodes
            SET status = 'active', customer_id = $2, activated_at = $3,
                expires_at = $4, retailer = $5, invoice_number = $6,
                serial_number = $7, purchase_date = $8::date,
                purchase_price = $9, updated_at = $3
          WHERE id = $1 AND status = 'generated'
          RETURNING ${COLUMNS}`,
        [
          id,
          args.customerId,
          args.activatedAt,
          args.expiresAt,
          args.purchase.retailer,
          args.purchase.invoiceNumber,
          args.purchase.serialNumber,
          args.purchase.purchaseDate,
          args.purchase.purchasePrice,
        ],
      );
      return result.rows[0] ? toBarcode(result.rows[0]) : null;
    },

    async updateStatus(id, from, to, at, extra) {
      const result = await db.query<BarcodeRow>(
        `UPDATE warranty_barcodes
            SET status = $3::text, updated_at = $4::timestamptz,
                revoked_at = CASE WHEN $3::text = 'revoked' THEN $4::timestamptz ELSE revoked_at END,
                revocation_reason = CASE WHEN $3::text = 'revoked' THEN $5::text ELSE revocation_reason END
          WHERE id = $1 AND status = ANY($2::text[])
          RETURNING ${COLUMNS}`,
        [id, [...from], to, at, extra?.revocationReason ?? null],
      );
      return result.rows[0] ? toBarcode(result.rows[0]) : null;
    },

    async appendEvent(event) {
      await db.query(
        `INSERT INTO barcode_events (id, barcode_id, event_type, actor_id, occurred_at, metadata)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [
          event.id,
          event.barcodeId,
          event.eventType,
          event.actorId,
          event.occurredAt,
          JSON.stringify(event.metadata),
        ],
      );
    },

    async listEvents(barcodeId) {
      const result = await db.query<BarcodeEventRow>(
        `SELECT id, barcode_id, event_type, actor_id, occurred_at, metadata
           FROM barcode_events WHERE barcode_id = $1 ORDER BY occurred_at`,
        [barcodeId],
      );
      return result.rows.map(
        (row): BarcodeEvent => ({
          id: row.id,
          barcodeId: row.barcode_id,
          eventType: row.event_type,
          actorId: row.actor_id,
          occurredAt: row.occurred_at,
          metadata: row.metadata,
        }),
      );
    },
  };
}
