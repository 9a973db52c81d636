// src/modules/claims/claim.schemas.ts

import { z } from "zod";
import { SYSTEM_CONSTANTS } from "@/constants/system.constants";
import { BARCODE_PATTERN } from "@/modules/barcodes/barcode.derive";
import { IsoDateSchema } from "@/modules/barcodes/barcode.schemas";
import { AttachmentUploadSchema } from "@/modules/attachments/attachment.schemas";
import {
  ClaimAction,
  ClaimPriority,
  ClaimStatus,
  IssueCategory,
  ResolutionType,
  Severity,
} from "./claim.types";

const Notes = z.string().trim().min(1).max(2000);

/** Optimistic concurrency guard accepted on every claim command. */
const VersionGuard = {
  expectedVersion: z.number().int().min(1).optional(),
};

////////////////////////////////////////////////////////////////
// Submission
////////////////////////////////////////////////////////////////

export const ContactSchema = z.object({
  name: z.string().trim().min(1).max(200).optional(),
  email: z.string().trim().toLowerCase().email().optional(),
  phone: z.string().trim().min(3).max(40).optional(),
  pickupAddress: z.string().trim().min(1).max(500).optional(),
});

export const SubmitClaimSchema = z.object({
  barcode: z
    .string()
    .trim()
    .toUpperCase()
    .regex(BARCODE_PATTERN, "Malformed barcode"),
  issueCategory: z.nativeEnum(IssueCategory),
  issueDescription: z
    .string()
    .trim()
    .min(10, "issueDescription must be at least 10 characters")
    .max(2000),
  issueDate: IsoDateSchema,
  severity: z.nativeEnum(Severity),
  storefrontId: z.string().trim().min(1).optional(),
  contact: ContactSchema.default({}),
  customerNotes: Notes.optional(),
  attachments: z.array(AttachmentUploadSchema).max(10).default([]),
});

export type SubmitClaimInput = z.input<typeof SubmitClaimSchema>;

////////////////////////////////////////////////////////////////
// Agent commands
////////////////////////////////////////////////////////////////

export const ValidateClaimSchema = z.object({
  priority: z.nativeEnum(ClaimPriority).optional(),
  notes: Notes.optional(),
  ...VersionGuard,
});

export type ValidateClaimInput = z.input<typeof ValidateClaimSchema>;

export const RejectClaimSchema = z.object({
  reason: z.string().trim().min(1, "reason is required").max(1000),
  ...VersionGuard,
});

export type RejectClaimInput = z.input<typeof RejectClaimSchema>;

export const RequestInfoSchema = z.object({
  message: z.string().trim().min(1, "message is required").max(2000),
  ...VersionGuard,
});

export type RequestInfoInput = z.input<typeof RequestInfoSchema>;

export const AssignTechnicianSchema = z.object({
  technicianId: z.string().trim().min(1),
  estimatedCompletionDate: z.coerce.date().optional(),
  priority: z.nativeEnum(ClaimPriority).optional(),
  notes: Notes.optional(),
  ...VersionGuard,
});

export type AssignTechnicianInput = z.input<typeof AssignTechnicianSchema>;

export const TransitionClaimSchema = z.object({
  action: z.nativeEnum(ClaimAction),
  notes: Notes.optional(),
  repairNotes: Notes.optional(),
  technicianId: z.string().trim().min(1).optional(),
  estimatedCompletionDate: z.coerce.date().optional(),
  priority: z.nativeEnum(ClaimPriority).optional(),
  reason: z.string().trim().min(1).max(1000).optional(),
  resolveTo: z.enum(["previous", "completed"]).optional(),
  shippingProvider: z.string().trim().min(1).max(100).optional(),
  trackingNumber: z.string().trim().min(1).max(100).optional(),
  shippingCost: z.number().min(0).optional(),
  replacementProductId: z.string().trim().min(1).optional(),
  replacementCost: z.number().min(0).optional(),
  resolutionType: z.nativeEnum(ResolutionType).optional(),
  resolutionNotes: Notes.optional(),
  ...VersionGuard,
});

export type TransitionClaimInput = z.input<typeof TransitionClaimSchema>;

export const CompleteClaimSchema = z.object({
  resolutionType: z.nativeEnum(ResolutionType),
  resolutionNotes: z.string().trim().min(1, "resolutionNotes is required").max(2000),
  ...VersionGuard,
});

export type CompleteClaimInput = z.input<typeof CompleteClaimSchema>;

export const BulkStatusSchema = z.object({
  claimIds: z
    .array(z.string().trim().min(1))
    .min(1, "at least one claim is required")
    .max(
      SYSTEM_CONSTANTS.MAX_BULK_CLAIM_UPDATE,
      `at most ${SYSTEM_CONSTANTS.MAX_BULK_CLAIM_UPDATE} claims per request`,
    ),
  action: z.nativeEnum(ClaimAction),
  notes: Notes.optional(),
  reason: z.string().trim().min(1).max(1000).optional(),
});

export type BulkStatusInput = z.input<typeof BulkStatusSchema>;

export const AddNoteSchema = z.object({
  note: z.string().trim().min(1, "note is required").max(2000),
  visibleToCustomer: z.boolean().default(true),
});

export type AddNoteInput = z.input<typeof AddNoteSchema>;

export const FeedbackSchema = z.object({
  rating: z.number().int().min(1).max(5),
  feedback: z.string().trim().max(2000).optional(),
});

export type FeedbackInput = z.input<typeof FeedbackSchema>;

export const ClaimListQuerySchema = z.object({
  status: z.nativeEnum(ClaimStatus).optional(),
  priority: z.nativeEnum(ClaimPriority).optional(),
  severity: z.nativeEnum(Severity).optional(),
  storefrontId: z.string().min(1).optional(),
  technicianId: z.string().min(1).optional(),
  claimDateFrom: z.coerce.date().optional(),
  claimDateTo: z.coerce.date().optional(),
});
