// src/lib/store/store.types.ts
// Purpose: Persistence contract shared by the Postgres store and the in-process store.

import type {
  BarcodeEvent,
  BarcodeStatus,
  NewBarcode,
  PurchaseMetadata,
  WarrantyBarcode,
} from "@/modules/barcodes/barcode.types";
import type {
  Batch,
  BatchChunkDelta,
  BatchFilter,
  BatchStatus,
  CollisionFilter,
  CollisionRecord,
  NewBatch,
} from "@/modules/batches/batch.types";
import type {
  Claim,
  ClaimFilter,
  ClaimPatch,
  NewClaim,
} from "@/modules/claims/claim.types";
import type {
  NewRepairTicket,
  RepairTicket,
  RepairTicketPatch,
} from "@/modules/repairs/repairTicket.types";
import type {
  ClaimAttachment,
  ScanStatus,
} from "@/modules/attachments/attachment.types";
import type {
  TimelineAppend,
  TimelineEvent,
} from "@/modules/timeline/timeline.types";
import type { Page, PageRequest } from "@/utils/pagination";

////////////////////////////////////////////////////////////////
// Barcodes
////////////////////////////////////////////////////////////////

export type BulkInsertResult = {
  inserted: WarrantyBarcode[];
  /** Barcode strings rejected by the unique index. */
  duplicates: string[];
};

export type ProductWarrantyFilter = {
  productId: string;
  statuses: readonly BarcodeStatus[];
  customerId?: string;
  serialNumber?: string;
  purchaseDate?: string;
  limit: number;
};

export interface BarcodeRepository {
  /** Throws DuplicateKeyError when the barcode string already exists. */
  insert(row: NewBarcode): Promise<WarrantyBarcode>;
  /** All-or-nothing except for unique-index rejections, which are reported. */
  insertMany(rows: NewBarcode[]): Promise<BulkInsertResult>;
  findById(id: string): Promise<WarrantyBarcode | null>;
  findByCode(barcode: string): Promise<WarrantyBarcode | null>;
  /** Returns the subset of the given strings that already exist. */
  existing(barcodes: readonly string[]): Promise<Set<string>>;
  listByBatch(batchId: string, page: PageRequest): Promise<Page<WarrantyBarcode>>;
  listForProduct(filter: ProductWarrantyFilter): Promise<WarrantyBarcode[]>;
  /** Compare-and-set on status = generated. Returns null if the guard failed. */
  activate(
    id: string,
    args: {
      customerId: string;
      activatedAt: Date;
      expiresAt: Date;
      purchase: PurchaseMetadata;
    },
  ): Promise<WarrantyBarcode | null>;
  /** Compare-and-set from any of `from`. Returns null if the guard failed. */
  updateStatus(
    id: string,
    from: readonly BarcodeStatus[],
    to: BarcodeStatus,
    at: Date,
    extra?: { revocationReason?: string },
  ): Promise<WarrantyBarcode | null>;
  appendEvent(event: BarcodeEvent): Promise<void>;
  listEvents(barcodeId: string): Promise<BarcodeEvent[]>;
}

////////////////////////////////////////////////////////////////
// Batches
////////////////////////////////////////////////////////////////

export interface BatchRepository {
  insert(row: NewBatch): Promise<Batch>;
  findById(id: string): Promise<Batch | null>;
  list(filter: BatchFilter, page: PageRequest): Promise<Page<Batch>>;
  /** Compare-and-set on status. Returns null if the batch is not in one of `from`. */
  updateStatus(
    id: string,
    from: readonly BatchStatus[],
    patch: Partial<Batch> & { status: BatchStatus },
  ): Promise<Batch | null>;
  /** Atomic counter increments; only applies while the batch is in_progress. */
  applyChunk(id: string, delta: BatchChunkDelta): Promise<Batch | null>;
  /** Serialises chunk application per batch for the rest of the transaction. */
  lockForChunk(id: string): Promise<void>;
  insertCollisions(rows: CollisionRecord[]): Promise<void>;
  listCollisions(
    batchId: string,
    filter: CollisionFilter,
    page: PageRequest,
  ): Promise<Page<CollisionRecord>>;
}

////////////////////////////////////////////////////////////////
// Claims, tickets, attachments, timeline
////////////////////////////////////////////////////////////////

export interface ClaimRepository {
  insert(row: NewClaim): Promise<Claim>;
  findById(id: string): Promise<Claim | null>;
  findOpenByBarcode(barcodeId: string): Promise<Claim | null>;
  list(filter: ClaimFilter, page: PageRequest): Promise<Page<Claim>>;
  /** Optimistic update guarded by version. Returns null on a lost race. */
  update(id: string, expectedVersion: number, patch: ClaimPatch): Promise<Claim | null>;
}

export interface RepairTicketRepository {
  insert(row: NewRepairTicket): Promise<RepairTicket>;
  findById(id: string): Promise<RepairTicket | null>;
  /** The ticket for the claim that is not cancelled, if any. */
  findLiveByClaim(claimId: string): Promise<RepairTicket | null>;
  listByClaim(claimId: string): Promise<RepairTicket[]>;
  listByTechnician(technicianId: string, page: PageRequest): Promise<Page<RepairTicket>>;
  update(
    id: string,
    expectedVersion: number,
    patch: RepairTicketPatch,
  ): Promise<RepairTicket | null>;
}

export interface AttachmentRepository {
  insert(row: ClaimAttachment): Promise<ClaimAttachment>;
  findById(id: string): Promise<ClaimAttachment | null>;
  listByClaim(
    claimId: string,
    opts?: { scanStatus?: ScanStatus },
  ): Promise<ClaimAttachment[]>;
  /** Compare-and-set from pending. Returns null when already resolved. */
  recordScan(
    id: string,
    status: ScanStatus,
    detail: string | null,
    at: Date,
  ): Promise<ClaimAttachment | null>;
}

export interface TimelineRepository {
  /** Appends with the next sequence; timestamps never go backwards per claim. */
  append(event: TimelineAppend, at: Date): Promise<TimelineEvent>;
  listByClaim(
    claimId: string,
    opts?: { customerVisibleOnly?: boolean },
  ): Promise<TimelineEvent[]>;
}

export type SequenceName = "claim" | "ticket" | "batch";

export interface SequenceRepository {
  next(name: SequenceName, year: number): Promise<number>;
}

export type IdempotencyRecord = {
  scope: string;
  key: string;
  requestHash: string;
  status: number;
  response: unknown;
  createdAt: Date;
};

export interface IdempotencyRepository {
  find(scope: string, key: string): Promise<IdempotencyRecord | null>;
  /** First writer wins; returns false when a record already existed. */
  save(record: IdempotencyRecord): Promise<boolean>;
}

////////////////////////////////////////////////////////////////
// Store
////////////////////////////////////////////////////////////////

export interface StoreTx {
  barcodes: BarcodeRepository;
  batches: BatchRepository;
  claims: ClaimRepository;
  tickets: RepairTicketRepository;
  attachments: AttachmentRepository;
  timeline: TimelineRepository;
  sequences: SequenceRepository;
  idempotency: IdempotencyRepository;
}

export interface WarrantyStore extends StoreTx {
  /** Runs `fn` atomically; any thrown error rolls every write back. */
  transaction<T>(fn: (tx: StoreTx) => Promise<T>): Promise<T>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}
