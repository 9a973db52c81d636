// src/lib/store/postgres/claims.pg.ts

import type { Queryable } from "@/lib/db";
import type {
  Claim,
  ClaimPriority,
  ClaimStatus,
  IssueCategory,
  ResolutionType,
  Severity,
} from "@/modules/claims/claim.types";
import { buildPage, offsetOf } from "@/utils/pagination";
import type { ClaimRepository } from "../store.types";
import { WhereBuilder, buildSetClause, toNumberOr, type ColumnSpec } from "./sql";

type ClaimRow = {
  id: string;
  claim_number: string;
  barcode_id: string;
  barcode: string;
  customer_id: string;
  product_id: string;
  storefront_id: string | null;
  issue_category: IssueCategory;
  issue_description: string;
  issue_date: string;
  severity: Severity;
  priority: ClaimPriority;
  status: ClaimStatus;
  previous_status: ClaimStatus | null;
  status_updated_at: Date;
  status_updated_by: string;
  claim_date: Date;
  validated_at: Date | null;
  validated_by: string | null;
  completed_at: Date | null;
  estimated_completion_date: Date | null;
  actual_completion_date: Date | null;
  resolution_type: ResolutionType | null;
  resolution_notes: string | null;
  repair_cost: string;
  shipping_cost: string;
  replacement_cost: string;
  total_cost: string;
  contact_name: string;
  contact_email: string;
  contact_phone: string | null;
  pickup_address: string | null;
  customer_notes: string | null;
  admin_notes: string | null;
  repair_notes: string | null;
  rejection_reason: string | null;
  assigned_technician_id: string | null;
  replacement_product_id: string | null;
  shipping_provider: string | null;
  tracking_number: string | null;
  satisfaction_rating: number | null;
  customer_feedback: string | null;
  tags: string[];
  version: number;
  created_at: Date;
  updated_at: Date;
};

const COLUMNS = `*, to_char(issue_date, 'YYYY-MM-DD') AS issue_date`;

const PATCH_COLUMNS: Record<string, ColumnSpec> = {
  storefrontId: { column: "storefront_id" },
  issueCategory: { column: "issue_category" },
  issueDescription: { column: "issue_description" },
  issueDate: { column: "issue_date" },
  severity: { column: "severity" },
  priority: { column: "priority" },
  status: { column: "status" },
  previousStatus: { column: "previous_status" },
  statusUpdatedAt: { column: "status_updated_at" },
  statusUpdatedBy: { column: "status_updated_by" },
  validatedAt: { column: "validated_at" },
  validatedBy: { column: "validated_by" },
  completedAt: { column: "completed_at" },
  estimatedCompletionDate: { column: "estimated_completion_date" },
  actualCompletionDate: { column: "actual_completion_date" },
  resolutionType: { column: "resolution_type" },
  resolutionNotes: { column: "resolution_notes" },
  repairCost: { column: "repair_cost" },
  shippingCost: { column: "shipping_cost" },
  replacementCost: { column: "replacement_cost" },
  totalCost: { column: "total_cost" },
  customerNotes: { column: "customer_notes" },
  adminNotes: { column: "admin_notes" },
  repairNotes: { column: "repair_notes" },
  rejectionReason: { column: "rejection_reason" },
  assignedTechnicianId: { column: "assigned_technician_id" },
  replacementProductId: { column: "replacement_product_id" },
  shippingProvider: { column: "shipping_provider" },
  trackingNumber: { column: "tracking_number" },
  satisfactionRating: { column: "satisfaction_rating" },
  customerFeedback: { column: "customer_feedback" },
  tags: { column: "tags" },
  updatedAt: { column: "updated_at" },
};

function toClaim(row: ClaimRow): Claim {
  return {
    id: row.id,
    claimNumber: row.claim_number,
    barcodeId: row.barcode_id,
    barcode: row.barcode,
    customerId: row.customer_id,
    productId: row.product_id,
    storefrontId: row.storefront_id,
    issueCategory: row.issue_category,
    issueDescription: row.issue_description,
    issueDate: row.issue_date,
    severity: row.severity,
    priority: row.priority,
    status: row.status,
    previousStatus: row.previous_status,
    statusUpdatedAt: row.status_updated_at,
    statusUpdatedBy: row.status_updated_by,
    claimDate: row.claim_date,
    validatedAt: row.validated_at,
    validatedBy: row.validated_by,
    completedAt: row.completed_at,
    estimatedCompletionDate: row.estimated_completion_date,
    actualCompletionDate: row.actual_completion_date,
    resolutionType: row.resolution_type,
    resolutionNotes: row.resolution_notes,
    repairCost: toNumberOr(row.repair_cost, 0),
    shippingCost: toNumberOr(row.shipping_cost, 0),
    replacementCost: toNumberOr(row.replacement_cost, 0),
    totalCost: toNumberOr(row.total_cost, 0),
    contact: {
      name: row.contact_name,
      email: row.contact_email,
      phone: row.contact_phone,
      pickupAddress: row.pickup_address,
    },
    customerNotes: row.customer_notes,
    adminNotes: row.admin_notes,
    repairNotes: row.repair_notes,
    rejectionReason: row.rejection_reason,
    assignedTechnicianId: row.assigned_technician_id,
    replacementProductId: row.replacement_product_id,
    shippingProvider: row.shipping_provider,
    trackingNumber: row.tracking_number,
    satisfactionRating: row.satisfaction_rating,
    customerFeedback: row.customer_feedback,
    tags: row.tags,
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function createPgClaimRepository(db: Queryable): ClaimRepository {
  return {
    async insert(row) {
      const result = await db.query<ClaimRow>(
        `INSERT INTO warranty_claims
           (id, claim_number, barcode_id, barcode, customer_id, product_id,
            storefront_id, issue_category, issue_description, issue_date,
            severity, priority, status, previous_status, status_updated_at,
            status_updated_by, claim_date, repair_cost, shipping_cost,
            replacement_cost, total_cost, contact_name, contact_email,
            contact_phone, pickup_address, customer_notes, tags,
            version, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10::date, $11, $12, $13,
                 $14, $15, $16, $17, $18, $19, $20, $21, $22, $23, $24, $25,
                 $26, $27, 1, $28, $28)
         RETURNING ${COLUMNS}`,
        [
          row.id,
          row.claimNumber,
          row.barcodeId,
          row.barcode,
          row.customerId,
          row.productId,
          row.storefrontId,
          row.issueCategory,
          row.issueDescription,
          row.issueDate,
          row.severity,
          row.priority,
          row.status,
          row.previousStatus,
          row.statusUpdatedAt,
          row.statusUpdatedBy,
          row.claimDate,
          row.repairCost,
          row.shippingCost,
          row.replacementCost,
          row.totalCost,
          row.contact.name,
          row.contact.email,
          row.contact.phone,
          row.contact.pickupAddress,
          row.customerNotes,
          row.tags,
          row.createdAt,
        ],
      );
      return toClaim(result.rows[0]);
    },

    async findById(id) {
      const result = await db.query<ClaimRow>(
        `SELECT ${COLUMNS} FROM warranty_claims WHERE id = $1`,
        [id],
      );
      return result.rows[0] ? toClaim(result.rows[0]) : null;
    },

    async findOpenByBarcode(barcodeId) {
      const result = await db.query<ClaimRow>(
        `SELECT ${COLUMNS} FROM warranty_claims
          WHERE barcode_id = $1
            AND status NOT IN ('rejected', 'completed', 'cancelled')
          LIMIT 1`,
        [barcodeId],
      );
      return result.rows[0] ? toClaim(result.rows[0]) : null;
    },

    async list(filter, page) {
      const where = new WhereBuilder()
        .add((p) => `status = ${p}`, filter.status)
        .add((p) => `priority = ${p}`, filter.priority)
        .add((p) => `severity = ${p}`, filter.severity)
        .add((p) => `storefront_id = ${p}`, filter.storefrontId)
        .add((p) => `assigned_technician_id = ${p}`, filter.technicianId)
        .add((p) => `customer_id = ${p}`, filter.customerId)
        .add((p) => `claim_date >= ${p}`, filter.claimDateFrom)
        .add((p) => `claim_date <= ${p}`, filter.claimDateTo);

      const count = await db.query<{ total: string }>(
        `SELECT count(*) AS total FROM warranty_claims ${where.sql()}`,
        where.values,
      );

      const limit = where.next(page.pageSize);
      const offset = where.next(offsetOf(page));

      const rows = await db.query<ClaimRow>(
        `SELECT ${COLUMNS} FROM warranty_claims ${where.sql()}
          ORDER BY claim_date DESC
          LIMIT ${limit} OFFSET ${offset}`,
        where.values,
      );

      return buildPage(rows.rows.map(toClaim), Number(count.rows[0].total), page);
    },

    async update(id, expectedVersion, patch) {
      const { contact, ...rest } = patch;
      const { fragments, values } = buildSetClause(rest, PATCH_COLUMNS, 3);

      if (contact) {
        values.push(contact.name, contact.email, contact.phone, contact.pickupAddress);
        const base = 3 + values.length - 4;
        fragments.push(
          `contact_name = $${base}`,
          `contact_email = $${base + 1}`,
          `contact_phone = $${base + 2}`,
          `pickup_address = $${base + 3}`,
        );
      }

      fragments.push("version = version + 1");

      const result = await db.query<ClaimRow>(
        `UPDATE warranty_claims SET ${fragments.join(", ")}
          WHERE id = $1 AND version = $2
          RETURNING ${COLUMNS}`,
        [id, expectedVersion, ...values],
      );
      return result.rows[0] ? toClaim(result.rows[0]) : null;
    },
  };
}
