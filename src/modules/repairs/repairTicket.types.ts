// src/modules/repairs/repairTicket.types.ts

import type { ClaimPriority } from "@/modules/claims/claim.types";

export const TicketStatus = {
  PENDING: "pending",
  ASSIGNED: "assigned",
  IN_PROGRESS: "in_progress",
  COMPLETED: "completed",
  CANCELLED: "cancelled",
} as const;

export type TicketStatus = (typeof TicketStatus)[keyof typeof TicketStatus];

export const QualityCheckStatus = {
  PENDING: "pending",
  APPROVED: "approved",
  REJECTED: "rejected",
} as const;

export type QualityCheckStatus =
  (typeof QualityCheckStatus)[keyof typeof QualityCheckStatus];

export const CustomerApprovalStatus = {
  NOT_REQUIRED: "not_required",
  PENDING: "pending",
  APPROVED: "approved",
  REJECTED: "rejected",
} as const;

export type CustomerApprovalStatus =
  (typeof CustomerApprovalStatus)[keyof typeof CustomerApprovalStatus];

export type PartUsage = {
  partNumber: string;
  partName: string;
  quantity: number;
  unitCost: number;
  totalCost: number;
};

export type TestResult = {
  testName: string;
  result: "passed" | "failed" | "warning";
  description: string | null;
  testedAt: Date;
  testedBy: string;
};

export type RepairTicket = {
  id: string;
  ticketNumber: string;
  claimId: string;
  status: TicketStatus;
  priority: ClaimPriority;
  assignedTechnicianId: string | null;
  assignedAt: Date | null;
  estimatedHours: number;
  actualHours: number | null;
  estimatedCompletionDate: Date | null;
  actualCompletionDate: Date | null;
  description: string;
  specialInstructions: string | null;
  requiredParts: string[];
  usedParts: PartUsage[];
  repairNotes: string | null;
  testResults: TestResult[];
  laborCost: number | null;
  partsCost: number | null;
  totalCost: number | null;
  qualityCheckStatus: QualityCheckStatus;
  qualityCheckedBy: string | null;
  qualityCheckedAt: Date | null;
  qualityCheckNotes: string | null;
  reworkCount: number;
  customerApprovalRequired: boolean;
  customerApprovalStatus: CustomerApprovalStatus;
  customerApprovedAt: Date | null;
  customerApprovalNotes: string | null;
  startedAt: Date | null;
  cancelledAt: Date | null;
  cancellationReason: string | null;
  createdBy: string;
  version: number;
  createdAt: Date;
  updatedAt: Date;
};

export type NewRepairTicket = Omit<RepairTicket, "version" | "updatedAt">;

export type RepairTicketPatch = Partial<
  Omit<
    RepairTicket,
    "id" | "ticketNumber" | "claimId" | "createdAt" | "createdBy" | "version"
  >
>;
