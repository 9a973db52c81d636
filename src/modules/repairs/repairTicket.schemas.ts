// src/modules/repairs/repairTicket.schemas.ts

import { z } from "zod";
import { ClaimPriority } from "@/modules/claims/claim.types";

const VersionGuard = {
  expectedVersion: z.number().int().min(1).optional(),
};

export const CreateTicketSchema = z.object({
  priority: z.nativeEnum(ClaimPriority).optional(),
  estimatedHours: z.number().min(0.1).max(1000),
  description: z
    .string()
    .trim()
    .min(10, "description must be at least 10 characters")
    .max(2000),
  requiredParts: z.array(z.string().trim().min(1).max(100)).max(50).default([]),
  specialInstructions: z.string().trim().max(1000).optional(),
  customerApprovalRequired: z.boolean().default(false),
  technicianId: z.string().trim().min(1).optional(),
  estimatedCompletionDate: z.coerce.date().optional(),
});

export type CreateTicketInput = z.input<typeof CreateTicketSchema>;

export const AssignTicketSchema = z.object({
  technicianId: z.string().trim().min(1),
  estimatedCompletionDate: z.coerce.date().optional(),
  ...VersionGuard,
});

export type AssignTicketInput = z.input<typeof AssignTicketSchema>;

export const StartTicketSchema = z.object({ ...VersionGuard });

export type StartTicketInput = z.input<typeof StartTicketSchema>;

export const PartUsageSchema = z.object({
  partNumber: z.string().trim().min(1).max(100),
  partName: z.string().trim().min(1).max(200),
  quantity: z.number().int().min(1).max(1000),
  unitCost: z.number().min(0),
});

export const TestResultSchema = z.object({
  testName: z.string().trim().min(1).max(200),
  result: z.enum(["passed", "failed", "warning"]),
  description: z.string().trim().max(1000).optional(),
});

export const CompleteTicketSchema = z.object({
  actualHours: z.number().min(0.1).max(1000),
  usedParts: z.array(PartUsageSchema).max(100).default([]),
  repairNotes: z.string().trim().min(1).max(4000).optional(),
  laborCost: z.number().min(0),
  /** Defaults to the sum of the used parts. */
  partsCost: z.number().min(0).optional(),
  testResults: z.array(TestResultSchema).max(100).default([]),
  ...VersionGuard,
});

export type CompleteTicketInput = z.input<typeof CompleteTicketSchema>;

export const QualityCheckSchema = z.object({
  approved: z.boolean(),
  notes: z.string().trim().max(2000).optional(),
  ...VersionGuard,
});

export type QualityCheckInput = z.input<typeof QualityCheckSchema>;

export const CustomerApprovalSchema = z.object({
  approved: z.boolean(),
  notes: z.string().trim().max(2000).optional(),
});

export type CustomerApprovalInput = z.input<typeof CustomerApprovalSchema>;

export const CancelTicketSchema = z.object({
  reason: z.string().trim().min(1, "reason is required").max(1000),
  ...VersionGuard,
});

export type CancelTicketInput = z.input<typeof CancelTicketSchema>;

export const TicketListQuerySchema = z.object({
  technicianId: z.string().trim().min(1),
});
