// src/modules/attachments/attachment.types.ts

export const AttachmentType = {
  RECEIPT: "receipt",
  PHOTO: "photo",
  VIDEO: "video",
  DOCUMENT: "document",
  OTHER: "other",
} as const;

export type AttachmentType =
  (typeof AttachmentType)[keyof typeof AttachmentType];

export const ScanStatus = {
  PENDING: "pending",
  PASSED: "passed",
  FAILED: "failed",
} as const;

export type ScanStatus = (typeof ScanStatus)[keyof typeof ScanStatus];

export type ClaimAttachment = {
  id: string;
  claimId: string;
  filename: string;
  storageRef: string;
  sizeBytes: number;
  mimeType: string;
  attachmentType: AttachmentType;
  description: string | null;
  scanStatus: ScanStatus;
  scanDetail: string | null;
  scannedAt: Date | null;
  uploadedBy: string;
  uploadedAt: Date;
};
