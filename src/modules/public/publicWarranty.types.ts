// src/modules/public/publicWarranty.types.ts
// Response shapes of the unauthenticated warranty API. Nothing here may carry
// customer identity or purchase metadata.

import type { BarcodeStatus } from "@/modules/barcodes/barcode.types";

export type PublicWarrantyStatus = BarcodeStatus | "not_found";

export type PublicProductInfo = {
  name: string;
  sku: string;
  brand: string | null;
  category: string;
  imageUrl: string | null;
};

export type PublicWarrantyInfo = {
  barcode: string;
  status: BarcodeStatus;
  activatedAt: Date | null;
  expiresAt: Date | null;
  daysRemaining: number;
  isExpired: boolean;
  canClaim: boolean;
  warrantyPeriod: string;
};

export type CoverageTerms = {
  coverageType: string;
  coveredComponents: readonly string[];
  excludedComponents: readonly string[];
  repairCoverage: boolean;
  replacementCoverage: boolean;
  laborCoverage: boolean;
  partsCoverage: boolean;
  terms: readonly string[];
};

export type CoverageAssessment = {
  covered: boolean;
  coverageType: "full" | "not_covered";
  estimatedCost: number;
  message: string;
  recommendations: readonly string[];
  nextSteps: readonly string[];
};

export type PublicValidationResponse = {
  valid: boolean;
  barcode: string;
  status: PublicWarrantyStatus;
  message: string;
  product: PublicProductInfo | null;
  warranty: PublicWarrantyInfo | null;
  coverage: CoverageTerms | null;
  validatedAt: Date;
};

export type PublicLookupResponse = {
  found: boolean;
  product: PublicProductInfo | null;
  warranties: PublicWarrantyInfo[];
  message: string;
  searchedAt: Date;
};

export type PublicCoverageResponse = CoverageAssessment & {
  barcode: string;
  issueType: string;
  coverage: CoverageTerms;
  checkedAt: Date;
};
