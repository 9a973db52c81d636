// src/modules/attachments/attachment.policy.ts
// Size, type and filename rules applied before an attachment is recorded.

import { posix } from "path";
import type { AttachmentConfig } from "@/config/app.config";
import { InvalidArgumentError, PayloadTooLargeError } from "@/lib/errors/errors";
import { AttachmentType } from "./attachment.types";
import type { AttachmentUpload } from "./attachment.schemas";

const MiB = 1024 * 1024;

export const ATTACHMENT_TYPE_LIMITS: Record<AttachmentType, number> = {
  [AttachmentType.PHOTO]: 5 * MiB,
  [AttachmentType.RECEIPT]: 10 * MiB,
  [AttachmentType.DOCUMENT]: 10 * MiB,
  [AttachmentType.OTHER]: 10 * MiB,
  [AttachmentType.VIDEO]: 50 * MiB,
};

/** Media kinds must agree with the declared mime family. */
const REQUIRED_MIME_FAMILY: Partial<Record<AttachmentType, string>> = {
  [AttachmentType.PHOTO]: "image/",
  [AttachmentType.VIDEO]: "video/",
};

export function attachmentSizeLimit(
  type: AttachmentType,
  config: AttachmentConfig,
): number {
  return Math.min(ATTACHMENT_TYPE_LIMITS[type], config.maxBytes);
}

export function sanitizeFilename(raw: string): string {
  return posix.basename(raw.replace(/\\/g, "/")).trim();
}

export type AcceptedAttachment = AttachmentUpload & { filename: string };

export function acceptAttachment(
  upload: AttachmentUpload,
  config: AttachmentConfig,
): AcceptedAttachment {
  const filename = sanitizeFilename(upload.filename);
  if (!filename || filename === "." || filename === "..") {
    throw InvalidArgumentError.field("filename", "filename is empty", upload.filename);
  }

  if (!config.mimeTypes.includes(upload.mimeType)) {
    throw InvalidArgumentError.field(
      "mimeType",
      `mime type ${upload.mimeType} is not allowed`,
      upload.mimeType,
    );
  }

  const family = REQUIRED_MIME_FAMILY[upload.attachmentType];
  if (family && !upload.mimeType.startsWith(family)) {
    throw InvalidArgumentError.field(
      "mimeType",
      `${upload.attachmentType} attachments must be ${family}*`,
      upload.mimeType,
    );
  }

  const limit = attachmentSizeLimit(upload.attachmentType, config);
  if (upload.sizeBytes > limit) {
    throw new PayloadTooLargeError(
      `${upload.attachmentType} attachments are limited to ${limit} bytes`,
      limit,
    );
  }

  return { ...upload, filename };
}
