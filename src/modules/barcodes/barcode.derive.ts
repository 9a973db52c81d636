// src/modules/barcodes/barcode.derive.ts
// Read-side projection of a barcode row against the clock.

import { addMonths, differenceInDays } from "date-fns";
import {
  BarcodeStatus,
  type WarrantyBarcode,
  type WarrantyDerived,
  type WarrantyView,
} from "./barcode.types";

export const BARCODE_PATTERN = /^[A-Z]{2,10}-\d{4}-[0-9A-Z]{8,16}$/;

export function computeExpiry(activatedAt: Date, periodMonths: number): Date {
  return addMonths(activatedAt, periodMonths);
}

export function formatWarrantyPeriod(periodMonths: number): string {
  return periodMonths === 1 ? "1 month" : `${periodMonths} months`;
}

export type DerivableWarranty = Pick<
  WarrantyBarcode,
  "status" | "expiresAt" | "warrantyPeriodMonths"
>;

export function deriveWarranty(
  barcode: DerivableWarranty,
  now: Date,
): WarrantyDerived {
  const isExpired =
    barcode.expiresAt !== null && barcode.expiresAt.getTime() < now.getTime();

  const daysRemaining =
    barcode.expiresAt === null
      ? 0
      : Math.max(0, differenceInDays(barcode.expiresAt, now));

  // expired is projected, the stored status is never rewritten on clock tick
  const effectiveStatus =
    barcode.status === BarcodeStatus.ACTIVE && isExpired
      ? BarcodeStatus.EXPIRED
      : barcode.status;

  return {
    effectiveStatus,
    isExpired,
    daysRemaining,
    canClaim: barcode.status === BarcodeStatus.ACTIVE && !isExpired,
    warrantyPeriod: formatWarrantyPeriod(barcode.warrantyPeriodMonths),
  };
}

export function toWarrantyView(
  barcode: WarrantyBarcode,
  now: Date,
): WarrantyView {
  return { ...barcode, ...deriveWarranty(barcode, now) };
}
