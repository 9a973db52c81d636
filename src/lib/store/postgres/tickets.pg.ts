// src/lib/store/postgres/tickets.pg.ts

import type { Queryable } from "@/lib/db";
import type { ClaimPriority } from "@/modules/claims/claim.types";
import type {
  CustomerApprovalStatus,
  PartUsage,
  QualityCheckStatus,
  RepairTicket,
  TestResult,
  TicketStatus,
} from "@/modules/repairs/repairTicket.types";
import { buildPage, offsetOf } from "@/utils/pagination";
import type { RepairTicketRepository } from "../store.types";
import { buildSetClause, toNumber, toNumberOr, type ColumnSpec } from "./sql";

type StoredTestResult = Omit<TestResult, "testedAt"> & { testedAt: string };

type TicketRow = {
  id: string;
  ticket_number: string;
  claim_id: string;
  status: TicketStatus;
  priority: ClaimPriority;
  assigned_technician_id: string | null;
  assigned_at: Date | null;
  estimated_hours: string;
  actual_hours: string | null;
  estimated_completion_date: Date | null;
  actual_completion_date: Date | null;
  description: string;
  special_instructions: string | null;
  required_parts: string[];
  used_parts: PartUsage[];
  repair_notes: string | null;
  test_results: StoredTestResult[];
  labor_cost: string | null;
  parts_cost: string | null;
  total_cost: string | null;
  quality_check_status: QualityCheckStatus;
  quality_checked_by: string | null;
  quality_checked_at: Date | null;
  quality_check_notes: string | null;
  rework_count: number;
  customer_approval_required: boolean;
  customer_approval_status: CustomerApprovalStatus;
  customer_approved_at: Date | null;
  customer_approval_notes: string | null;
  started_at: Date | null;
  cancelled_at: Date | null;
  cancellation_reason: string | null;
  created_by: string;
  version: number;
  created_at: Date;
  updated_at: Date;
};

const PATCH_COLUMNS: Record<string, ColumnSpec> = {
  status: { column: "status" },
  priority: { column: "priority" },
  assignedTechnicianId: { column: "assigned_technician_id" },
  assignedAt: { column: "assigned_at" },
  estimatedHours: { column: "estimated_hours" },
  actualHours: { column: "actual_hours" },
  estimatedCompletionDate: { column: "estimated_completion_date" },
  actualCompletionDate: { column: "actual_completion_date" },
  description: { column: "description" },
  specialInstructions: { column: "special_instructions" },
  requiredParts: { column: "required_parts", json: true },
  usedParts: { column: "used_parts", json: true },
  repairNotes: { column: "repair_notes" },
  testResults: { column: "test_results", json: true },
  laborCost: { column: "labor_cost" },
  partsCost: { column: "parts_cost" },
  totalCost: { column: "total_cost" },
  qualityCheckStatus: { column: "quality_check_status" },
  qualityCheckedBy: { column: "quality_checked_by" },
  qualityCheckedAt: { column: "quality_checked_at" },
  qualityCheckNotes: { column: "quality_check_notes" },
  reworkCount: { column: "rework_count" },
  customerApprovalRequired: { column: "customer_approval_required" },
  customerApprovalStatus: { column: "customer_approval_status" },
  customerApprovedAt: { column: "customer_approved_at" },
  customerApprovalNotes: { column: "customer_approval_notes" },
  startedAt: { column: "started_at" },
  cancelledAt: { column: "cancelled_at" },
  cancellationReason: { column: "cancellation_reason" },
  updatedAt: { column: "updated_at" },
};

function toTicket(row: TicketRow): RepairTicket {
  return {
    id: row.id,
    ticketNumber: row.ticket_number,
    claimId: row.claim_id,
    status: row.status,
    priority: row.priority,
    assignedTechnicianId: row.assigned_technician_id,
    assignedAt: row.assigned_at,
    estimatedHours: toNumberOr(row.estimated_hours, 0),
    actualHours: toNumber(row.actual_hours),
    estimatedCompletionDate: row.estimated_completion_date,
    actualCompletionDate: row.actual_completion_date,
    description: row.description,
    specialInstructions: row.special_instructions,
    requiredParts: row.required_parts,
    usedParts: row.used_parts,
    repairNotes: row.repair_notes,
    testResults: row.test_results.map((t) => ({
      ...t,
      testedAt: new Date(t.testedAt),
    })),
    laborCost: toNumber(row.labor_cost),
    partsCost: toNumber(row.parts_cost),
    totalCost: toNumber(row.total_cost),
    qualityCheckStatus: row.quality_check_status,
    qualityCheckedBy: row.quality_checked_by,
    qualityCheckedAt: row.quality_checked_at,
    qualityCheckNotes: row.quality_check_notes,
    reworkCount: row.rework_count,
    customerApprovalRequired: row.customer_approval_required,
    customerApprovalStatus: row.customer_approval_status,
    customerApprovedAt: row.customer_approved_at,
    customerApprovalNotes: row.customer_approval_notes,
    startedAt: row.started_at,
    cancelledAt: row.cancelled_at,
    cancellationReason: row.cancellation_reason,
    createdBy: row.created_by,
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function createPgTicketRepository(db: Queryable): RepairTicketRepository {
  return {
    async insert(row) {
      const result = await db.query<TicketRow>(
        `INSERT INTO repair_tickets
           (id, ticket_number, claim_id, status, priority, assigned_technician_id,
            assigned_at, estimated_hours, estimated_completion_date, description,
            special_instructions, required_parts, quality_check_status,
            customer_approval_required, customer_approval_status, created_by,
            version, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14,
                 $15, $16, 1, $17, $17)
         RETURNING *`,
        [
          row.id,
          row.ticketNumber,
          row.claimId,
          row.status,
          row.priority,
          row.assignedTechnicianId,
          row.assignedAt,
          row.estimatedHours,
          row.estimatedCompletionDate,
          row.description,
          row.specialInstructions,
          JSON.stringify(row.requiredParts),
          row.qualityCheckStatus,
          row.customerApprovalRequired,
          row.customerApprovalStatus,
          row.createdBy,
          row.createdAt,
        ],
      );
      return toTicket(result.rows[0]);
    },

    async findById(id) {
      const result = await db.query<TicketRow>(
        `SELECT * FROM repair_tickets WHERE id = $1`,
        [id],
      );
      return result.rows[0] ? toTicket(result.rows[0]) : null;
    },

    async findLiveByClaim(claimId) {
      const result = await db.query<TicketRow>(
        `SELECT * FROM repair_tickets
          WHERE claim_id = $1 AND status <> 'cancelled'
          LIMIT 1`,
        [claimId],
      );
      return result.rows[0] ? toTicket(result.rows[0]) : null;
    },

    async listByClaim(claimId) {
      const result = await db.query<TicketRow>(
        `SELECT * FROM repair_tickets WHERE claim_id = $1 ORDER BY created_at`,
        [claimId],
      );
      return result.rows.map(toTicket);
    },

    async listByTechnician(technicianId, page) {
      const [rows, count] = await Promise.all([
        db.query<TicketRow>(
          `SELECT * FROM repair_tickets
            WHERE assigned_technician_id = $1
            ORDER BY created_at DESC
            LIMIT $2 OFFSET $3`,
          [technicianId, page.pageSize, offsetOf(page)],
        ),
        db.query<{ total: string }>(
          `SELECT count(*) AS total FROM repair_tickets WHERE assigned_technician_id = $1`,
          [technicianId],
        ),
      ]);
      return buildPage(rows.rows.map(toTicket), Number(count.rows[0].total), page);
    },

    async update(id, expectedVersion, patch) {
      const { fragments, values } = buildSetClause(patch, PATCH_COLUMNS, 3);
      fragments.push("version = version + 1");

      const result = await db.query<TicketRow>(
        `UPDATE repair_tickets SET ${fragments.join(", ")}
          WHERE id = $1 AND version = $2
          RETURNING *`,
        [id, expectedVersion, ...values],
      );
      return result.rows[0] ? toTicket(result.rows[0]) : null;
    },
  };
}
