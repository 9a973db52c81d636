// src/modules/public/publicWarranty.cache.ts

import type { ValidationCache } from "@/lib/collaborators/validation-cache";
import { errorMeta, log } from "@/lib/observability/logger";

export function warrantyCacheKey(barcode: string): string {
  return `validate:${barcode}`;
}

/** Called after a committed barcode status change. Failures leave the entry to expire. */
export async function invalidateWarrantyCache(
  cache: ValidationCache,
  barcode: string,
): Promise<void> {
  try {
    await cache.invalidate(warrantyCacheKey(barcode));
  } catch (err) {
    log("WARN", "VALIDATION_CACHE_INVALIDATE_FAILED", { barcode, ...errorMeta(err) });
  }
}
