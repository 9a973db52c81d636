// src/modules/public/publicWarranty.schemas.ts

import { z } from "zod";
import { IsoDateSchema } from "@/modules/barcodes/barcode.schemas";
import { BarcodeStatus } from "@/modules/barcodes/barcode.types";

const BarcodeInput = z.string().trim().toUpperCase().min(1, "barcode is required").max(64);
const Sku = z.string().trim().min(1).max(100);

export const ValidateWarrantySchema = z.object({
  barcode: BarcodeInput,
  sku: Sku.optional(),
});

export type ValidateWarrantyInput = z.input<typeof ValidateWarrantySchema>;

export const LookupWarrantySchema = z
  .object({
    sku: Sku,
    serialNumber: z.string().trim().min(1).max(100).optional(),
    purchaseDate: IsoDateSchema.optional(),
    customerEmail: z.string().trim().toLowerCase().email().optional(),
  })
  .refine(
    (input) =>
      input.serialNumber !== undefined ||
      input.purchaseDate !== undefined ||
      input.customerEmail !== undefined,
    {
      message: "one of serialNumber, purchaseDate or customerEmail is required",
      path: ["serialNumber"],
    },
  );

export type LookupWarrantyInput = z.input<typeof LookupWarrantySchema>;

export const CoverageCheckSchema = z.object({
  barcode: BarcodeInput,
  issueType: z.string().trim().min(1, "issueType is required").max(100),
  issueCategory: z.string().trim().max(100).optional(),
  description: z.string().trim().max(500).optional(),
});

export type CoverageCheckInput = z.input<typeof CoverageCheckSchema>;

/** Shape kept in the validation cache. Re-parsed on read; derived fields are recomputed. */
export const CachedWarrantySchema = z.object({
  barcode: z.string(),
  status: z.nativeEnum(BarcodeStatus),
  warrantyPeriodMonths: z.number().int(),
  activatedAt: z.coerce.date().nullable(),
  expiresAt: z.coerce.date().nullable(),
  product: z
    .object({
      name: z.string(),
      sku: z.string(),
      brand: z.string().nullable(),
      category: z.string(),
      imageUrl: z.string().nullable(),
    })
    .nullable(),
});

export type CachedWarranty = z.infer<typeof CachedWarrantySchema>;
