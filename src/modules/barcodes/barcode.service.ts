// src/modules/barcodes/barcode.service.ts
// Purpose: Warranty activation, revocation and barcode reads.

import type { Clock } from "@/lib/clock";
import {
  ActorType,
  isStaff,
  requireActorType,
  requireAdmin,
  type Actor,
} from "@/lib/auth/actor";
import { InvalidArgumentError } from "@/lib/errors/errors";
import type { ValidationCache } from "@/lib/collaborators/validation-cache";
import type { StoreTx, WarrantyStore } from "@/lib/store/store.types";
import { log } from "@/lib/observability/logger";
import { parseInput } from "@/lib/validation/parseInput";
import { newId } from "@/utils/uuid";
import { invalidateWarrantyCache } from "@/modules/public/publicWarranty.cache";
import {
  BarcodeEventType,
  BarcodeStatus,
  type BarcodeEvent,
  type WarrantyBarcode,
  type WarrantyView,
} from "./barcode.types";
import { BARCODE_PATTERN, computeExpiry, toWarrantyView } from "./barcode.derive";
import {
  BarcodeAlreadyActivatedError,
  BarcodeNotFoundError,
  BarcodeRevokedError,
  BarcodeStateError,
} from "./barcode.errors";
import {
  ActivateBarcodeSchema,
  RevokeBarcodeSchema,
  type ActivateBarcodeInput,
  type RevokeBarcodeInput,
} from "./barcode.schemas";

export type BarcodeServiceDeps = {
  store: WarrantyStore;
  clock: Clock;
  cache: ValidationCache;
};

export type BarcodeDetail = {
  warranty: WarrantyView;
  events: BarcodeEvent[];
};

export function assertBarcodeFormat(barcode: string) {
  if (!BARCODE_PATTERN.test(barcode)) {
    throw InvalidArgumentError.field("barcode", "Malformed barcode", barcode);
  }
}

/** Replacement resolution consumes the entitlement: active -> claimed. */
export async function recordBarcodeClaimed(
  tx: StoreTx,
  args: { barcodeId: string; actorId: string; claimId: string; at: Date },
): Promise<WarrantyBarcode | null> {
  const claimed = await tx.barcodes.updateStatus(
    args.barcodeId,
    [BarcodeStatus.ACTIVE],
    BarcodeStatus.CLAIMED,
    args.at,
  );
  if (!claimed) return null;

  await tx.barcodes.appendEvent({
    id: newId(),
    barcodeId: args.barcodeId,
    eventType: BarcodeEventType.CLAIMED,
    actorId: args.actorId,
    occurredAt: args.at,
    metadata: { claimId: args.claimId },
  });
  return claimed;
}

export class BarcodeService {
  constructor(private readonly deps: BarcodeServiceDeps) {}

  async activate(
    actor: Actor,
    barcode: string,
    input: ActivateBarcodeInput,
  ): Promise<WarrantyView> {
    requireActorType(actor, ActorType.CUSTOMER, ActorType.AGENT);
    assertBarcodeFormat(barcode);
    const data = parseInput(ActivateBarcodeSchema, input, "Invalid purchase metadata");

    const now = this.deps.clock.now();
    if (data.purchaseDate > now.toISOString().slice(0, 10)) {
      throw InvalidArgumentError.field(
        "purchaseDate",
        "purchaseDate cannot be in the future",
        data.purchaseDate,
      );
    }

    const customerId = this.resolveCustomer(actor, data.customerId);

    const existing = await this.deps.store.barcodes.findByCode(barcode);
    if (!existing) throw new BarcodeNotFoundError(barcode);
    this.assertActivatable(existing);

    const activated = await this.deps.store.transaction(async (tx) => {
      // compare-and-set on status = generated; a concurrent activation loses here
      const row = await tx.barcodes.activate(existing.id, {
        customerId,
        activatedAt: now,
        expiresAt: computeExpiry(now, existing.warrantyPeriodMonths),
        purchase: {
          retailer: data.retailer ?? null,
          invoiceNumber: data.invoiceNumber ?? null,
          serialNumber: data.serialNumber ?? null,
          purchaseDate: data.purchaseDate,
          purchasePrice: data.purchasePrice ?? null,
        },
      });

      if (!row) {
        const current = await tx.barcodes.findById(existing.id);
        this.assertActivatable(current ?? existing);
        throw new BarcodeAlreadyActivatedError(barcode);
      }

      await tx.barcodes.appendEvent({
        id: newId(),
        barcodeId: row.id,
        eventType: BarcodeEventType.ACTIVATED,
        actorId: actor.actorId,
        occurredAt: now,
        metadata: { customerId, retailer: row.purchase.retailer },
      });

      return row;
    });

    log("INFO", "WARRANTY_ACTIVATED", {
      barcodeId: activated.id,
      customerId,
      expiresAt: activated.expiresAt?.toISOString(),
    });

    await invalidateWarrantyCache(this.deps.cache, barcode);
    return toWarrantyView(activated, now);
  }

  async revoke(
    actor: Actor,
    barcode: string,
    input: RevokeBarcodeInput,
  ): Promise<WarrantyView> {
    requireAdmin(actor);
    assertBarcodeFormat(barcode);
    const data = parseInput(RevokeBarcodeSchema, input, "Invalid revocation request");

    const existing = await this.deps.store.barcodes.findByCode(barcode);
    if (!existing) throw new BarcodeNotFoundError(barcode);

    const now = this.deps.clock.now();

    const revoked = await this.deps.store.transaction(async (tx) => {
      const row = await tx.barcodes.updateStatus(
        existing.id,
        [BarcodeStatus.GENERATED, BarcodeStatus.ACTIVE],
        BarcodeStatus.REVOKED,
        now,
        { revocationReason: data.reason },
      );

      if (!row) {
        const current = (await tx.barcodes.findById(existing.id)) ?? existing;
        if (current.status === BarcodeStatus.REVOKED) {
          throw new BarcodeRevokedError(barcode);
        }
        throw new BarcodeStateError(barcode, current.status, "revoke");
      }

      await tx.barcodes.appendEvent({
        id: newId(),
        barcodeId: row.id,
        eventType: BarcodeEventType.REVOKED,
        actorId: actor.actorId,
        occurredAt: now,
        metadata: { reason: data.reason, previousStatus: existing.status },
      });

      return row;
    });

    log("INFO", "WARRANTY_REVOKED", { barcodeId: revoked.id, reason: data.reason });

    await invalidateWarrantyCache(this.deps.cache, barcode);
    return toWarrantyView(revoked, now);
  }

  /** Staff see the audit log; the bound customer sees the warranty only. */
  async get(actor: Actor, barcode: string): Promise<BarcodeDetail> {
    assertBarcodeFormat(barcode);
    const row = await this.deps.store.barcodes.findByCode(barcode);

    const visible =
      row !== null &&
      (isStaff(actor) ||
        (actor.actorType === ActorType.CUSTOMER && row.customerId === actor.actorId));
    if (!row || !visible) throw new BarcodeNotFoundError(barcode);

    const warranty = toWarrantyView(row, this.deps.clock.now());
    const events = isStaff(actor)
      ? await this.deps.store.barcodes.listEvents(row.id)
      : [];

    return { warranty, events };
  }

  private resolveCustomer(actor: Actor, requested: string | undefined): string {
    if (actor.actorType === ActorType.CUSTOMER) {
      if (requested !== undefined && requested !== actor.actorId) {
        throw InvalidArgumentError.field(
          "customerId",
          "Customers can only register warranties for themselves",
          requested,
        );
      }
      return actor.actorId;
    }

    if (!requested) {
      throw InvalidArgumentError.field(
        "customerId",
        "customerId is required when registering on behalf of a customer",
      );
    }
    return requested;
  }

  private assertActivatable(row: WarrantyBarcode) {
    if (row.status === BarcodeStatus.REVOKED) {
      throw new BarcodeRevokedError(row.barcode);
    }
    if (row.status !== BarcodeStatus.GENERATED || row.activatedAt !== null) {
      throw new BarcodeAlreadyActivatedError(row.barcode);
    }
  }
}
