// src/modules/barcodes/barcode.schemas.ts

import { isValid, parseISO } from "date-fns";
import { z } from "zod";

export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
  .refine((value) => isValid(parseISO(value)), "not a calendar date");

export const PurchaseMetadataSchema = z.object({
  retailer: z.string().trim().min(1).max(200).optional(),
  invoiceNumber: z.string().trim().min(1).max(100).optional(),
  serialNumber: z.string().trim().min(1).max(100).optional(),
  purchaseDate: IsoDateSchema,
  purchasePrice: z.number().min(0).optional(),
});

export const ActivateBarcodeSchema = PurchaseMetadataSchema.extend({
  /** Agents register on behalf of a customer; customers always bind themselves. */
  customerId: z.string().trim().min(1).optional(),
});

export type ActivateBarcodeInput = z.input<typeof ActivateBarcodeSchema>;

export const RevokeBarcodeSchema = z.object({
  reason: z.string().trim().min(1, "reason is required").max(500),
});

export type RevokeBarcodeInput = z.input<typeof RevokeBarcodeSchema>;
