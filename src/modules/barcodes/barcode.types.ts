// src/modules/barcodes/barcode.types.ts

export const BarcodeStatus = {
  GENERATED: "generated",
  ACTIVE: "active",
  CLAIMED: "claimed",
  EXPIRED: "expired",
  REVOKED: "revoked",
} as const;

export type BarcodeStatus = (typeof BarcodeStatus)[keyof typeof BarcodeStatus];

export type PurchaseMetadata = {
  retailer: string | null;
  invoiceNumber: string | null;
  serialNumber: string | null;
  purchaseDate: string | null;
  purchasePrice: number | null;
};

export type WarrantyBarcode = {
  id: string;
  barcode: string;
  productId: string;
  storefrontId: string | null;
  batchId: string | null;
  status: BarcodeStatus;
  warrantyPeriodMonths: number;
  activatedAt: Date | null;
  expiresAt: Date | null;
  customerId: string | null;
  purchase: PurchaseMetadata;
  revokedAt: Date | null;
  revocationReason: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type NewBarcode = {
  id: string;
  barcode: string;
  productId: string;
  storefrontId: string | null;
  batchId: string | null;
  warrantyPeriodMonths: number;
  createdAt: Date;
};

export const BarcodeEventType = {
  GENERATED: "generated",
  ACTIVATED: "activated",
  REVOKED: "revoked",
  CLAIMED: "claimed",
} as const;

export type BarcodeEventType =
  (typeof BarcodeEventType)[keyof typeof BarcodeEventType];

export type BarcodeEvent = {
  id: string;
  barcodeId: string;
  eventType: BarcodeEventType;
  actorId: string;
  occurredAt: Date;
  metadata: Record<string, unknown>;
};

/** Values computed from (row, clock). Never persisted. */
export type WarrantyDerived = {
  effectiveStatus: BarcodeStatus;
  isExpired: boolean;
  daysRemaining: number;
  canClaim: boolean;
  warrantyPeriod: string;
};

export type WarrantyView = WarrantyBarcode & WarrantyDerived;
