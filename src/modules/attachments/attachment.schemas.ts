// src/modules/attachments/attachment.schemas.ts

import { z } from "zod";
import { AttachmentType, ScanStatus } from "./attachment.types";

/** Metadata for a payload already placed in file storage. */
export const AttachmentUploadSchema = z.object({
  filename: z.string().trim().min(1, "filename is required").max(255),
  storageRef: z.string().trim().min(1, "storageRef is required").max(1024),
  sizeBytes: z.number().int().positive(),
  mimeType: z.string().trim().toLowerCase().min(3).max(100),
  attachmentType: z.nativeEnum(AttachmentType),
  description: z.string().trim().max(500).optional(),
});

export type AttachmentUploadInput = z.input<typeof AttachmentUploadSchema>;
export type AttachmentUpload = z.output<typeof AttachmentUploadSchema>;

export const ScanResultSchema = z.object({
  status: z.enum([ScanStatus.PASSED, ScanStatus.FAILED]),
  detail: z.string().trim().max(1000).nullish(),
});

export type ScanResultInput = z.input<typeof ScanResultSchema>;
