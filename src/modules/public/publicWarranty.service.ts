// src/modules/public/publicWarranty.service.ts
// Purpose: Read-only warranty answers for unauthenticated callers.
// Unknown, revoked and SKU-mismatched barcodes all look the same from outside.

import type { Clock } from "@/lib/clock";
import { NotFoundError } from "@/lib/errors/errors";
import { callCollaborator } from "@/lib/collaborators/callCollaborator";
import type { CustomerDirectory } from "@/lib/collaborators/customer-directory";
import type { ProductCatalog, ProductSummary } from "@/lib/collaborators/product-catalog";
import type { ValidationCache } from "@/lib/collaborators/validation-cache";
import type { WarrantyStore } from "@/lib/store/store.types";
import { errorMeta, log } from "@/lib/observability/logger";
import { parseInput } from "@/lib/validation/parseInput";
import { SYSTEM_CONSTANTS } from "@/constants/system.constants";
import { BARCODE_PATTERN, deriveWarranty } from "@/modules/barcodes/barcode.derive";
import { BarcodeStatus } from "@/modules/barcodes/barcode.types";
import type { CoveragePolicy } from "./coverage.policy";
import { warrantyCacheKey } from "./publicWarranty.cache";
import {
  CachedWarrantySchema,
  CoverageCheckSchema,
  LookupWarrantySchema,
  ValidateWarrantySchema,
  type CachedWarranty,
  type CoverageCheckInput,
  type LookupWarrantyInput,
  type ValidateWarrantyInput,
} from "./publicWarranty.schemas";
import type {
  PublicCoverageResponse,
  PublicLookupResponse,
  PublicProductInfo,
  PublicValidationResponse,
  PublicWarrantyInfo,
} from "./publicWarranty.types";

export type PublicWarrantyServiceDeps = {
  store: WarrantyStore;
  clock: Clock;
  products: ProductCatalog;
  customers: CustomerDirectory;
  cache: ValidationCache;
  cacheTtlSeconds: number;
  coverage: CoveragePolicy;
};

export const PUBLIC_MESSAGES = {
  VALID: "Warranty is valid and active",
  EXPIRED: "Warranty has expired",
  NOT_ACTIVATED: "Warranty is not yet activated",
  CLAIMED: "Warranty has already been claimed",
  NOT_FOUND: "Warranty not found or not valid",
  LOOKUP_EMPTY: "No warranties found for the specified criteria",
} as const;

/** Statuses a public caller may learn about. Revoked rows are answered as not found. */
const PUBLIC_STATUSES: readonly BarcodeStatus[] = [
  BarcodeStatus.GENERATED,
  BarcodeStatus.ACTIVE,
  BarcodeStatus.CLAIMED,
];

const LOOKUP_STATUSES: readonly BarcodeStatus[] = [BarcodeStatus.ACTIVE, BarcodeStatus.CLAIMED];

export class PublicWarrantyNotFoundError extends NotFoundError {
  constructor() {
    super(PUBLIC_MESSAGES.NOT_FOUND, "WARRANTY_NOT_FOUND");
  }
}

////////////////////////////////////////////////////////////////
// Projections
////////////////////////////////////////////////////////////////

export function toPublicProduct(product: ProductSummary): PublicProductInfo {
  return {
    name: product.name,
    sku: product.sku,
    brand: product.brand,
    category: product.category ?? "General",
    imageUrl: product.imageUrl,
  };
}

function toPublicWarranty(
  row: Pick<CachedWarranty, "barcode" | "status" | "warrantyPeriodMonths" | "activatedAt" | "expiresAt">,
  now: Date,
): PublicWarrantyInfo {
  const derived = deriveWarranty(row, now);
  return {
    barcode: row.barcode,
    status: derived.effectiveStatus,
    activatedAt: row.activatedAt,
    expiresAt: row.expiresAt,
    daysRemaining: derived.daysRemaining,
    isExpired: derived.isExpired,
    canClaim: derived.canClaim,
    warrantyPeriod: derived.warrantyPeriod,
  };
}

function validationMessage(warranty: PublicWarrantyInfo): string {
  if (warranty.canClaim) return PUBLIC_MESSAGES.VALID;
  switch (warranty.status) {
    case BarcodeStatus.GENERATED:
      return PUBLIC_MESSAGES.NOT_ACTIVATED;
    case BarcodeStatus.CLAIMED:
      return PUBLIC_MESSAGES.CLAIMED;
    default:
      return PUBLIC_MESSAGES.EXPIRED;
  }
}

export function lookupMessage(count: number): string {
  if (count === 0) return PUBLIC_MESSAGES.LOOKUP_EMPTY;
  return count === 1
    ? "Found 1 warranty for this product"
    : `Found ${count} warranties for this product`;
}

export class PublicWarrantyService {
  constructor(private readonly deps: PublicWarrantyServiceDeps) {}

  ////////////////////////////////////////////////////////////////
  // Validate
  ////////////////////////////////////////////////////////////////

  async validate(input: ValidateWarrantyInput): Promise<PublicValidationResponse> {
    const data = parseInput(ValidateWarrantySchema, input, "Invalid validation request");
    const now = this.deps.clock.now();

    const snapshot = await this.findPublic(data.barcode);
    if (!snapshot || (data.sku !== undefined && snapshot.product?.sku !== data.sku)) {
      return {
        valid: false,
        barcode: data.barcode,
        status: "not_found",
        message: PUBLIC_MESSAGES.NOT_FOUND,
        product: null,
        warranty: null,
        coverage: null,
        validatedAt: now,
      };
    }

    const warranty = toPublicWarranty(snapshot, now);
    return {
      valid: warranty.canClaim,
      barcode: snapshot.barcode,
      status: warranty.status,
      message: validationMessage(warranty),
      product: snapshot.product,
      warranty,
      coverage: this.deps.coverage.terms,
      validatedAt: now,
    };
  }

  ////////////////////////////////////////////////////////////////
  // Lookup by product
  ////////////////////////////////////////////////////////////////

  async lookup(input: LookupWarrantyInput): Promise<PublicLookupResponse> {
    const data = parseInput(LookupWarrantySchema, input, "Invalid lookup request");
    const now = this.deps.clock.now();
    const empty: PublicLookupResponse = {
      found: false,
      product: null,
      warranties: [],
      message: PUBLIC_MESSAGES.LOOKUP_EMPTY,
      searchedAt: now,
    };

    const product = await callCollaborator("product_catalog", () =>
      this.deps.products.lookupProductBySku(data.sku),
    );
    if (!product) return empty;

    let customerId: string | undefined;
    if (data.customerEmail !== undefined) {
      const email = data.customerEmail;
      const found = await callCollaborator("customer_directory", () =>
        this.deps.customers.lookupCustomerByEmail(email),
      );
      if (!found) return { ...empty, product: toPublicProduct(product) };
      customerId = found;
    }

    const rows = await this.deps.store.barcodes.listForProduct({
      productId: product.id,
      statuses: LOOKUP_STATUSES,
      customerId,
      serialNumber: data.serialNumber,
      purchaseDate: data.purchaseDate,
      limit: SYSTEM_CONSTANTS.PUBLIC_LOOKUP_LIMIT,
    });

    const warranties = rows.map((row) => toPublicWarranty(row, now));
    return {
      found: warranties.length > 0,
      product: toPublicProduct(product),
      warranties,
      message: lookupMessage(warranties.length),
      searchedAt: now,
    };
  }

  ////////////////////////////////////////////////////////////////
  // Coverage check
  ////////////////////////////////////////////////////////////////

  async coverage(input: CoverageCheckInput): Promise<PublicCoverageResponse> {
    const data = parseInput(CoverageCheckSchema, input, "Invalid coverage request");
    const now = this.deps.clock.now();

    const snapshot = await this.findPublic(data.barcode);
    if (!snapshot) throw new PublicWarrantyNotFoundError();

    const warranty = toPublicWarranty(snapshot, now);
    const assessment = warranty.canClaim
      ? this.deps.coverage.assess(data.issueType)
      : {
          ...this.deps.coverage.assess(data.issueType),
          covered: false,
          coverageType: "not_covered" as const,
          message: validationMessage(warranty),
        };

    return {
      ...assessment,
      barcode: snapshot.barcode,
      issueType: data.issueType,
      coverage: this.deps.coverage.terms,
      checkedAt: now,
    };
  }

  ////////////////////////////////////////////////////////////////
  // Read-through cache
  ////////////////////////////////////////////////////////////////

  /** The barcode as a public caller may see it, or null. */
  private async findPublic(barcode: string): Promise<CachedWarranty | null> {
    if (!BARCODE_PATTERN.test(barcode)) return null;

    const snapshot = (await this.readCache(barcode)) ?? (await this.loadSnapshot(barcode));
    if (!snapshot || !PUBLIC_STATUSES.includes(snapshot.status)) return null;
    return snapshot;
  }

  private async loadSnapshot(barcode: string): Promise<CachedWarranty | null> {
    const row = await this.deps.store.barcodes.findByCode(barcode);
    if (!row) return null;

    const snapshot: CachedWarranty = {
      barcode: row.barcode,
      status: row.status,
      warrantyPeriodMonths: row.warrantyPeriodMonths,
      activatedAt: row.activatedAt,
      expiresAt: row.expiresAt,
      product: await this.loadProduct(row.productId),
    };

    await this.writeCache(snapshot);
    return snapshot;
  }

  /** The answer does not depend on product details, so a catalog outage degrades to null. */
  private async loadProduct(productId: string): Promise<PublicProductInfo | null> {
    try {
      const product = await this.deps.products.lookupProduct(productId);
      return product ? toPublicProduct(product) : null;
    } catch (err) {
      log("WARN", "PRODUCT_LOOKUP_FAILED", { productId, ...errorMeta(err) });
      return null;
    }
  }

  private async readCache(barcode: string): Promise<CachedWarranty | null> {
    let raw: string | null;
    try {
      raw = await this.deps.cache.get(warrantyCacheKey(barcode));
    } catch (err) {
      log("WARN", "VALIDATION_CACHE_READ_FAILED", { barcode, ...errorMeta(err) });
      return null;
    }
    if (raw === null) return null;

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      log("WARN", "VALIDATION_CACHE_ENTRY_INVALID", { barcode, ...errorMeta(err) });
      return null;
    }

    const parsed = CachedWarrantySchema.safeParse(decoded);
    if (!parsed.success) {
      log("WARN", "VALIDATION_CACHE_ENTRY_INVALID", { barcode });
      return null;
    }
    return parsed.data;
  }

  private async writeCache(snapshot: CachedWarranty): Promise<void> {
    try {
      await this.deps.cache.set(
        warrantyCacheKey(snapshot.barcode),
        JSON.stringify(snapshot),
        this.deps.cacheTtlSeconds,
      );
    } catch (err) {
      log("WARN", "VALIDATION_CACHE_WRITE_FAILED", {
        barcode: snapshot.barcode,
        ...errorMeta(err),
      });
    }
  }
}
