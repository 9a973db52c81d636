// src/lib/store/memory.store.ts
// Purpose: In-process implementation of the store contract (MOCK mode and tests).
// Every access is serialised behind one lock. A transaction gets its own view and
// undo journal; calls on the store-level repositories commit one at a time.

import type {
  BarcodeEvent,
  WarrantyBarcode,
} from "@/modules/barcodes/barcode.types";
import { BarcodeStatus } from "@/modules/barcodes/barcode.types";
import {
  BatchStatus,
  type Batch,
  type CollisionRecord,
} from "@/modules/batches/batch.types";
import { ClaimStatus, type Claim } from "@/modules/claims/claim.types";
import {
  TicketStatus,
  type RepairTicket,
} from "@/modules/repairs/repairTicket.types";
import {
  ScanStatus,
  type ClaimAttachment,
} from "@/modules/attachments/attachment.types";
import type { TimelineEvent } from "@/modules/timeline/timeline.types";
import { DeadlineExceededError } from "@/lib/errors/errors";
import { getRemainingTimeMs } from "@/lib/observability/request-context";
import { newId } from "@/utils/uuid";
import { paginate } from "@/utils/pagination";
import { DuplicateKeyError } from "./store.errors";
import type {
  AttachmentRepository,
  BarcodeRepository,
  BatchRepository,
  ClaimRepository,
  IdempotencyRecord,
  IdempotencyRepository,
  RepairTicketRepository,
  SequenceRepository,
  StoreTx,
  TimelineRepository,
  WarrantyStore,
} from "./store.types";

type Undo = () => void;
type Recorder = (undo: Undo) => void;

/** How a repository view reaches the tables: inside a transaction or auto-committed. */
interface Scope {
  run<T>(op: (record: Recorder) => T): Promise<T>;
}

const TERMINAL_CLAIM_STATUSES: readonly string[] = [
  ClaimStatus.REJECTED,
  ClaimStatus.COMPLETED,
  ClaimStatus.CANCELLED,
];

function copy<T>(value: T): T {
  return structuredClone(value);
}

function byTime<T>(pick: (row: T) => Date, direction: "asc" | "desc" = "asc") {
  return (a: T, b: T) => {
    const diff = pick(a).getTime() - pick(b).getTime();
    return direction === "asc" ? diff : -diff;
  };
}

function put<K, V>(map: Map<K, V>, key: K, value: V, record: Recorder) {
  const had = map.has(key);
  const before = map.get(key);
  map.set(key, value);
  record(() => {
    if (had && before !== undefined) map.set(key, before);
    else map.delete(key);
  });
}

function push<V>(list: V[], value: V, record: Recorder) {
  list.push(value);
  record(() => {
    const at = list.lastIndexOf(value);
    if (at >= 0) list.splice(at, 1);
  });
}

function rollback(journal: Undo[]) {
  for (const undo of [...journal].reverse()) undo();
}

function within(value: Date, from?: Date, to?: Date): boolean {
  if (from && value.getTime() < from.getTime()) return false;
  if (to && value.getTime() > to.getTime()) return false;
  return true;
}

export class MemoryWarrantyStore implements WarrantyStore {
  private readonly barcodeRows = new Map<string, WarrantyBarcode>();
  private readonly barcodeIndex = new Map<string, string>();
  private readonly barcodeEvents: BarcodeEvent[] = [];
  private readonly batchRows = new Map<string, Batch>();
  private readonly collisionRows: CollisionRecord[] = [];
  private readonly claimRows = new Map<string, Claim>();
  private readonly ticketRows = new Map<string, RepairTicket>();
  private readonly attachmentRows = new Map<string, ClaimAttachment>();
  private readonly timelineRows: TimelineEvent[] = [];
  private readonly sequenceRows = new Map<string, number>();
  private readonly idempotencyRows = new Map<string, IdempotencyRecord>();

  private tail: Promise<void> = Promise.resolve();

  readonly barcodes: BarcodeRepository;
  readonly batches: BatchRepository;
  readonly claims: ClaimRepository;
  readonly tickets: RepairTicketRepository;
  readonly attachments: AttachmentRepository;
  readonly timeline: TimelineRepository;
  readonly sequences: SequenceRepository;
  readonly idempotency: IdempotencyRepository;

  constructor() {
    const autocommit: Scope = { run: (op) => this.autocommit(op) };
    const view = this.view(autocommit);
    this.barcodes = view.barcodes;
    this.batches = view.batches;
    this.claims = view.claims;
    this.tickets = view.tickets;
    this.attachments = view.attachments;
    this.timeline = view.timeline;
    this.sequences = view.sequences;
    this.idempotency = view.idempotency;
  }

  ////////////////////////////////////////////////////////////////
  // Transactions
  ////////////////////////////////////////////////////////////////

  async transaction<T>(fn: (tx: StoreTx) => Promise<T>): Promise<T> {
    const release = await this.acquire();
    const journal: Undo[] = [];
    let open = true;

    const scope: Scope = {
      run: async (op) => {
        if (!open) throw new Error("Transaction is already finished");
        return op((undo) => journal.push(undo));
      },
    };

    try {
      this.assertWithinDeadline();
      return await fn(this.view(scope));
    } catch (err) {
      rollback(journal);
      throw err;
    } finally {
      open = false;
      release();
    }
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    await this.tail;
  }

  private view(scope: Scope): StoreTx {
    return {
      barcodes: this.createBarcodeRepository(scope),
      batches: this.createBatchRepository(scope),
      claims: this.createClaimRepository(scope),
      tickets: this.createTicketRepository(scope),
      attachments: this.createAttachmentRepository(scope),
      timeline: this.createTimelineRepository(scope),
      sequences: this.createSequenceRepository(scope),
      idempotency: this.createIdempotencyRepository(scope),
    };
  }

  private async autocommit<T>(op: (record: Recorder) => T): Promise<T> {
    const release = await this.acquire();
    const journal: Undo[] = [];
    try {
      return op((undo) => journal.push(undo));
    } catch (err) {
      rollback(journal);
      throw err;
    } finally {
      release();
    }
  }

  private async acquire(): Promise<() => void> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);
    await previous;
    return release;
  }

  private assertWithinDeadline() {
    const remaining = getRemainingTimeMs();
    if (remaining !== undefined && remaining <= 0) {
      throw new DeadlineExceededError();
    }
  }

  ////////////////////////////////////////////////////////////////
  // Barcodes
  ////////////////////////////////////////////////////////////////

  private createBarcodeRepository(scope: Scope): BarcodeRepository {
    const toRow = (row: Parameters<BarcodeRepository["insert"]>[0]): WarrantyBarcode => ({
      ...row,
      status: BarcodeStatus.GENERATED,
      activatedAt: null,
      expiresAt: null,
      customerId: null,
      purchase: {
        retailer: null,
        invoiceNumber: null,
        serialNumber: null,
        purchaseDate: null,
        purchasePrice: null,
      },
      revokedAt: null,
      revocationReason: null,
      updatedAt: row.createdAt,
    });

    const insertOne = (
      row: Parameters<BarcodeRepository["insert"]>[0],
      record: Recorder,
    ) => {
      if (this.barcodeIndex.has(row.barcode)) {
        throw new DuplicateKeyError("warranty_barcodes_barcode_key", row.barcode);
      }
      const stored = toRow(row);
      put(this.barcodeRows, stored.id, stored, record);
      put(this.barcodeIndex, stored.barcode, stored.id, record);
      return copy(stored);
    };

    const update = (id: string, patch: Partial<WarrantyBarcode>, record: Recorder) => {
      const current = this.barcodeRows.get(id);
      if (!current) return null;
      const next = { ...current, ...patch };
      put(this.barcodeRows, id, next, record);
      return copy(next);
    };

    return {
      insert: (row) => scope.run((record) => insertOne(row, record)),

      insertMany: (rows) =>
        scope.run((record) => {
          const inserted: WarrantyBarcode[] = [];
          const duplicates: string[] = [];
          for (const row of rows) {
            if (this.barcodeIndex.has(row.barcode)) {
              duplicates.push(row.barcode);
              continue;
            }
            inserted.push(insertOne(row, record));
          }
          return { inserted, duplicates };
        }),

      findById: (id) =>
        scope.run(() => {
          const row = this.barcodeRows.get(id);
          return row ? copy(row) : null;
        }),

      findByCode: (barcode) =>
        scope.run(() => {
          const id = this.barcodeIndex.get(barcode);
          const row = id ? this.barcodeRows.get(id) : undefined;
          return row ? copy(row) : null;
        }),

      existing: (barcodes) =>
        scope.run(() => new Set(barcodes.filter((b) => this.barcodeIndex.has(b)))),

      listByBatch: (batchId, page) =>
        scope.run(() =>
          paginate(
            [...this.barcodeRows.values()]
              .filter((b) => b.batchId === batchId)
              .sort(byTime((b) => b.createdAt))
              .map(copy),
            page,
          ),
        ),

      listForProduct: (filter) =>
        scope.run(() =>
          [...this.barcodeRows.values()]
            .filter(
              (b) =>
                b.productId === filter.productId &&
                filter.statuses.includes(b.status) &&
                (filter.customerId === undefined ||
                  b.customerId === filter.customerId) &&
                (filter.serialNumber === undefined ||
                  b.purchase.serialNumber === filter.serialNumber) &&
                (filter.purchaseDate === undefined ||
                  b.purchase.purchaseDate === filter.purchaseDate),
            )
            .sort(byTime((b) => b.activatedAt ?? b.createdAt, "desc"))
            .slice(0, filter.limit)
            .map(copy),
        ),

      activate: (id, args) =>
        scope.run((record) => {
          const current = this.barcodeRows.get(id);
          if (!current || current.status !== BarcodeStatus.GENERATED) return null;
          return update(
            id,
            {
              status: BarcodeStatus.ACTIVE,
              customerId: args.customerId,
              activatedAt: args.activatedAt,
              expiresAt: args.expiresAt,
              purchase: { ...args.purchase },
              updatedAt: args.activatedAt,
            },
            record,
          );
        }),

      updateStatus: (id, from, to, at, extra) =>
        scope.run((record) => {
          const current = this.barcodeRows.get(id);
          if (!current || !from.includes(current.status)) return null;
          return update(
            id,
            {
              status: to,
              updatedAt: at,
              ...(to === BarcodeStatus.REVOKED
                ? { revokedAt: at, revocationReason: extra?.revocationReason ?? null }
                : {}),
            },
            record,
          );
        }),

      appendEvent: (event) =>
        scope.run((record) => {
          push(this.barcodeEvents, copy(event), record);
        }),

      listEvents: (barcodeId) =>
        scope.run(() =>
          this.barcodeEvents
            .filter((e) => e.barcodeId === barcodeId)
            .sort(byTime((e) => e.occurredAt))
            .map(copy),
        ),
    };
  }

  ////////////////////////////////////////////////////////////////
  // Batches
  ////////////////////////////////////////////////////////////////

  private createBatchRepository(scope: Scope): BatchRepository {
    return {
      insert: (row) =>
        scope.run((record) => {
          const stored: Batch = {
            ...row,
            generatedCount: 0,
            successfulCount: 0,
            failedCount: 0,
            errorCount: 0,
            collisionCount: 0,
            retryCount: 0,
            status: BatchStatus.PENDING,
            currentStep: "queued",
            generationRate: null,
            lastError: null,
            startedAt: null,
            completedAt: null,
            cancelledAt: null,
            cancelledBy: null,
            cancellationReason: null,
          };
          put(this.batchRows, stored.id, stored, record);
          return copy(stored);
        }),

      findById: (id) =>
        scope.run(() => {
          const row = this.batchRows.get(id);
          return row ? copy(row) : null;
        }),

      list: (filter, page) =>
        scope.run(() =>
          paginate(
            [...this.batchRows.values()]
              .filter(
                (b) =>
                  (!filter.status || b.status === filter.status) &&
                  (!filter.priority || b.priority === filter.priority) &&
                  (!filter.productId || b.productId === filter.productId) &&
                  (!filter.storefrontId ||
                    b.storefrontId === filter.storefrontId) &&
                  (!filter.createdBy || b.createdBy === filter.createdBy) &&
                  within(b.createdAt, filter.createdFrom, filter.createdTo),
              )
              .sort(byTime((b) => b.createdAt, "desc"))
              .map(copy),
            page,
          ),
        ),

      updateStatus: (id, from, patch) =>
        scope.run((record) => {
          const current = this.batchRows.get(id);
          if (!current || !from.includes(current.status)) return null;
          const next = { ...current, ...patch };
          put(this.batchRows, id, next, record);
          return copy(next);
        }),

      applyChunk: (id, delta) =>
        scope.run((record) => {
          const current = this.batchRows.get(id);
          if (!current || current.status !== BatchStatus.IN_PROGRESS) return null;
          const next: Batch = {
            ...current,
            generatedCount: current.generatedCount + delta.generated,
            successfulCount: current.successfulCount + delta.successful,
            failedCount: current.failedCount + delta.failed,
            errorCount: current.errorCount + delta.errors,
            collisionCount: current.collisionCount + delta.collisions,
            retryCount: current.retryCount + delta.retries,
            lastError:
              delta.lastError === undefined ? current.lastError : delta.lastError,
            generationRate: delta.generationRate ?? current.generationRate,
            currentStep: delta.currentStep,
            lastUpdatedAt: delta.at,
          };
          put(this.batchRows, id, next, record);
          return copy(next);
        }),

      // the store lock already serialises chunk commits
      lockForChunk: () => scope.run(() => undefined),

      insertCollisions: (rows) =>
        scope.run((record) => {
          for (const row of rows) push(this.collisionRows, copy(row), record);
        }),

      listCollisions: (batchId, filter, page) =>
        scope.run(() =>
          paginate(
            this.collisionRows
              .filter(
                (c) =>
                  c.batchId === batchId &&
                  (!filter.collisionType ||
                    c.collisionType === filter.collisionType),
              )
              .sort(byTime((c) => c.detectedAt))
              .map(copy),
            page,
          ),
        ),
    };
  }

  ////////////////////////////////////////////////////////////////
  // Claims
  ////////////////////////////////////////////////////////////////

  private createClaimRepository(scope: Scope): ClaimRepository {
    return {
      insert: (row) =>
        scope.run((record) => {
          const stored: Claim = { ...row, version: 1, updatedAt: row.createdAt };
          put(this.claimRows, stored.id, stored, record);
          return copy(stored);
        }),

      findById: (id) =>
        scope.run(() => {
          const row = this.claimRows.get(id);
          return row ? copy(row) : null;
        }),

      findOpenByBarcode: (barcodeId) =>
        scope.run(() => {
          const row = [...this.claimRows.values()].find(
            (c) =>
              c.barcodeId === barcodeId &&
              !TERMINAL_CLAIM_STATUSES.includes(c.status),
          );
          return row ? copy(row) : null;
        }),

      list: (filter, page) =>
        scope.run(() =>
          paginate(
            [...this.claimRows.values()]
              .filter(
                (c) =>
                  (!filter.status || c.status === filter.status) &&
                  (!filter.priority || c.priority === filter.priority) &&
                  (!filter.severity || c.severity === filter.severity) &&
                  (!filter.storefrontId ||
                    c.storefrontId === filter.storefrontId) &&
                  (!filter.technicianId ||
                    c.assignedTechnicianId === filter.technicianId) &&
                  (!filter.customerId || c.customerId === filter.customerId) &&
                  within(c.claimDate, filter.claimDateFrom, filter.claimDateTo),
              )
              .sort(byTime((c) => c.claimDate, "desc"))
              .map(copy),
            page,
          ),
        ),

      update: (id, expectedVersion, patch) =>
        scope.run((record) => {
          const current = this.claimRows.get(id);
          if (!current || current.version !== expectedVersion) return null;
          const next: Claim = {
            ...current,
            ...patch,
            version: current.version + 1,
          };
          put(this.claimRows, id, next, record);
          return copy(next);
        }),
    };
  }

  ////////////////////////////////////////////////////////////////
  // Repair tickets
  ////////////////////////////////////////////////////////////////

  private createTicketRepository(scope: Scope): RepairTicketRepository {
    return {
      insert: (row) =>
        scope.run((record) => {
          const stored: RepairTicket = {
            ...row,
            version: 1,
            updatedAt: row.createdAt,
          };
          put(this.ticketRows, stored.id, stored, record);
          return copy(stored);
        }),

      findById: (id) =>
        scope.run(() => {
          const row = this.ticketRows.get(id);
          return row ? copy(row) : null;
        }),

      findLiveByClaim: (claimId) =>
        scope.run(() => {
          const row = [...this.ticketRows.values()].find(
            (t) => t.claimId === claimId && t.status !== TicketStatus.CANCELLED,
          );
          return row ? copy(row) : null;
        }),

      listByClaim: (claimId) =>
        scope.run(() =>
          [...this.ticketRows.values()]
            .filter((t) => t.claimId === claimId)
            .sort(byTime((t) => t.createdAt))
            .map(copy),
        ),

      listByTechnician: (technicianId, page) =>
        scope.run(() =>
          paginate(
            [...this.ticketRows.values()]
              .filter((t) => t.assignedTechnicianId === technicianId)
              .sort(byTime((t) => t.createdAt, "desc"))
              .map(copy),
            page,
          ),
        ),

      update: (id, expectedVersion, patch) =>
        scope.run((record) => {
          const current = this.ticketRows.get(id);
          if (!current || current.version !== expectedVersion) return null;
          const next: RepairTicket = {
            ...current,
            ...patch,
            version: current.version + 1,
          };
          put(this.ticketRows, id, next, record);
          return copy(next);
        }),
    };
  }

  ////////////////////////////////////////////////////////////////
  // Attachments
  ////////////////////////////////////////////////////////////////

  private createAttachmentRepository(scope: Scope): AttachmentRepository {
    return {
      insert: (row) =>
        scope.run((record) => {
          put(this.attachmentRows, row.id, copy(row), record);
          return copy(row);
        }),

      findById: (id) =>
        scope.run(() => {
          const row = this.attachmentRows.get(id);
          return row ? copy(row) : null;
        }),

      listByClaim: (claimId, opts) =>
        scope.run(() =>
          [...this.attachmentRows.values()]
            .filter(
              (a) =>
                a.claimId === claimId &&
                (!opts?.scanStatus || a.scanStatus === opts.scanStatus),
            )
            .sort(byTime((a) => a.uploadedAt))
            .map(copy),
        ),

      recordScan: (id, status, detail, at) =>
        scope.run((record) => {
          const current = this.attachmentRows.get(id);
          if (!current || current.scanStatus !== ScanStatus.PENDING) return null;
          const next: ClaimAttachment = {
            ...current,
            scanStatus: status,
            scanDetail: detail,
            scannedAt: at,
          };
          put(this.attachmentRows, id, next, record);
          return copy(next);
        }),
    };
  }

  ////////////////////////////////////////////////////////////////
  // Timeline
  ////////////////////////////////////////////////////////////////

  private createTimelineRepository(scope: Scope): TimelineRepository {
    return {
      append: (event, at) =>
        scope.run((record) => {
          const previous = this.timelineRows
            .filter((e) => e.claimId === event.claimId)
            .at(-1);

          const occurredAt =
            previous && previous.occurredAt.getTime() >= at.getTime()
              ? new Date(previous.occurredAt.getTime() + 1)
              : at;

          const stored: TimelineEvent = {
            ...copy(event),
            id: newId(),
            sequence: (previous?.sequence ?? 0) + 1,
            occurredAt,
          };
          push(this.timelineRows, stored, record);
          return copy(stored);
        }),

      listByClaim: (claimId, opts) =>
        scope.run(() =>
          this.timelineRows
            .filter(
              (e) =>
                e.claimId === claimId &&
                (!opts?.customerVisibleOnly || e.visibleToCustomer),
            )
            .map(copy),
        ),
    };
  }

  ////////////////////////////////////////////////////////////////
  // Sequences + idempotency
  ////////////////////////////////////////////////////////////////

  private createSequenceRepository(scope: Scope): SequenceRepository {
    return {
      next: (name, year) =>
        scope.run((record) => {
          const key = `${name}:${year}`;
          const value = (this.sequenceRows.get(key) ?? 0) + 1;
          put(this.sequenceRows, key, value, record);
          return value;
        }),
    };
  }

  private createIdempotencyRepository(scope: Scope): IdempotencyRepository {
    return {
      find: (scopeName, key) =>
        scope.run(() => {
          const row = this.idempotencyRows.get(`${scopeName}:${key}`);
          return row ? copy(row) : null;
        }),

      save: (entry) =>
        scope.run((record) => {
          const id = `${entry.scope}:${entry.key}`;
          if (this.idempotencyRows.has(id)) return false;
          put(this.idempotencyRows, id, copy(entry), record);
          return true;
        }),
    };
  }
}
