// src/modules/batches/batch.schemas.ts

import { z } from "zod";
import { SYSTEM_CONSTANTS } from "@/constants/system.constants";
import { BatchPriority, BatchStatus, CollisionType } from "./batch.types";

export const CreateBatchSchema = z.object({
  productId: z.string().trim().min(1),
  storefrontId: z.string().trim().min(1),
  quantity: z
    .number()
    .int()
    .min(1, "quantity must be at least 1")
    .max(
      SYSTEM_CONSTANTS.MAX_BATCH_QUANTITY,
      `quantity must not exceed ${SYSTEM_CONSTANTS.MAX_BATCH_QUANTITY}`,
    ),
  prefix: z
    .string()
    .trim()
    .toUpperCase()
    .regex(/^[A-Z]{2,10}$/, "prefix must be 2 to 10 letters"),
  expiryMonths: z.number().int().min(1).max(120),
  priority: z.nativeEnum(BatchPriority).default(BatchPriority.NORMAL),
  maxRetries: z.number().int().min(0).max(10).optional(),
  description: z.string().trim().max(500).optional(),
  tags: z.array(z.string().trim().min(1).max(50)).max(20).default([]),
  notes: z.string().trim().max(2000).optional(),
  notifyOnComplete: z.boolean().default(false),
});

export type CreateBatchInput = z.input<typeof CreateBatchSchema>;

export const CancelBatchSchema = z.object({
  reason: z.string().trim().min(1).max(500).optional(),
  force: z.boolean().default(false),
});

export type CancelBatchInput = z.input<typeof CancelBatchSchema>;

export const BatchListQuerySchema = z.object({
  status: z.nativeEnum(BatchStatus).optional(),
  priority: z.nativeEnum(BatchPriority).optional(),
  productId: z.string().min(1).optional(),
  storefrontId: z.string().min(1).optional(),
  createdBy: z.string().min(1).optional(),
  createdFrom: z.coerce.date().optional(),
  createdTo: z.coerce.date().optional(),
});

export const CollisionQuerySchema = z.object({
  collisionType: z.nativeEnum(CollisionType).optional(),
});
