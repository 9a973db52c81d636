// src/modules/claims/claim.service.ts
// Purpose: Warranty claim commands and queries. Every status change goes
// through applyClaimTransition inside one store transaction; notifications
// and cache invalidation run after commit and never undo it.

import type { Clock } from "@/lib/clock";
import {
  ActorType,
  isStaff,
  requireActorType,
  type Actor,
} from "@/lib/auth/actor";
import { DomainError } from "@/lib/errors/domain-error";
import {
  ConflictError,
  ForbiddenError,
  InvalidArgumentError,
} from "@/lib/errors/errors";
import { callCollaborator } from "@/lib/collaborators/callCollaborator";
import type { CustomerDirectory } from "@/lib/collaborators/customer-directory";
import {
  dispatchNotification,
  type NotificationSink,
} from "@/lib/collaborators/notification-sink";
import type { ValidationCache } from "@/lib/collaborators/validation-cache";
import { DuplicateKeyError } from "@/lib/store/store.errors";
import type { StoreTx, WarrantyStore } from "@/lib/store/store.types";
import { errorMeta, log } from "@/lib/observability/logger";
import { parseInput } from "@/lib/validation/parseInput";
import type { Page, PageRequest } from "@/utils/pagination";
import { formatSequenceNumber } from "@/utils/sequenceNumber";
import { newId } from "@/utils/uuid";
import { BarcodeStatus } from "@/modules/barcodes/barcode.types";
import { deriveWarranty } from "@/modules/barcodes/barcode.derive";
import { BarcodeNotFoundError } from "@/modules/barcodes/barcode.errors";
import { recordBarcodeClaimed } from "@/modules/barcodes/barcode.service";
import { invalidateWarrantyCache } from "@/modules/public/publicWarranty.cache";
import type { AttachmentService } from "@/modules/attachments/attachment.service";
import { commitTimelineEvent } from "@/modules/timeline/commitTimelineEvent";
import type { TimelineEntry, TimelineService } from "@/modules/timeline/timeline.service";
import { TimelineEventType, type TimelineEvent } from "@/modules/timeline/timeline.types";
import type { RepairTicketService } from "@/modules/repairs/repairTicket.service";
import { resolutionBlocker } from "@/modules/repairs/repairTicket.transitions";
import {
  ClaimAction,
  ClaimPriority,
  ClaimStatus,
  ResolutionType,
  type Claim,
  type ClaimFilter,
  type ClaimPatch,
} from "./claim.types";
import {
  allowedClaimActions,
  claimActionTarget,
  type ResolveTarget,
} from "./claimLifecycle.transitions";
import { defaultClaimPriority } from "./claimPriority.policy";
import {
  ClaimAlreadyOpenError,
  ClaimNotFoundError,
  ClaimStateError,
  IllegalClaimTransitionError,
  RepairGateError,
  WarrantyNotClaimableError,
} from "./claim.errors";
import {
  applyClaimTransition,
  assertExpectedVersion,
  updateClaim,
  type ClaimTransitionResult,
} from "./claimTransition";
import { notifyClaimStatusChanged, notifyClaimSubmitted } from "./claim.notifications";
import {
  canViewClaim,
  isClaimOwner,
  toClaimView,
  toCustomerClaimView,
  viewClaimFor,
  type ClaimView,
  type CustomerClaimView,
} from "./claim.view";
import {
  AddNoteSchema,
  AssignTechnicianSchema,
  BulkStatusSchema,
  CompleteClaimSchema,
  FeedbackSchema,
  RejectClaimSchema,
  RequestInfoSchema,
  SubmitClaimSchema,
  TransitionClaimSchema,
  ValidateClaimSchema,
  type AddNoteInput,
  type AssignTechnicianInput,
  type BulkStatusInput,
  type CompleteClaimInput,
  type FeedbackInput,
  type RejectClaimInput,
  type RequestInfoInput,
  type SubmitClaimInput,
  type TransitionClaimInput,
  type ValidateClaimInput,
} from "./claim.schemas";

export type ClaimServiceDeps = {
  store: WarrantyStore;
  clock: Clock;
  customers: CustomerDirectory;
  notifications: NotificationSink;
  cache: ValidationCache;
  attachments: AttachmentService;
  repairs: RepairTicketService;
  timeline: TimelineService;
};

export type AnyClaimView = ClaimView | CustomerClaimView;

export type BulkItemResult =
  | { claimId: string; ok: true; status: ClaimStatus; version: number }
  | {
      claimId: string;
      ok: false;
      error: { code: string; kind: string; message: string };
    };

export type BulkStatusResult = {
  total: number;
  succeeded: number;
  failed: number;
  results: BulkItemResult[];
};

/** Extra writes a transition carries beyond the status change itself. */
type TransitionPlan = {
  patch?: ClaimPatch;
  description?: string;
  visibleToCustomer?: boolean;
  metadata?: Record<string, unknown>;
};

type Resolution = {
  resolutionType: ResolutionType;
  resolutionNotes: string;
};

const OPEN_CLAIM_CONSTRAINT = "warranty_claims_open_barcode_key";
const CUSTOMER_ACTIONS: readonly ClaimAction[] = [ClaimAction.CANCEL, ClaimAction.DISPUTE];

////////////////////////////////////////////////////////////////
// Helpers
////////////////////////////////////////////////////////////////

function todayOf(now: Date): string {
  return now.toISOString().slice(0, 10);
}

function assertActionLegal(claim: Claim, action: ClaimAction, resolveTo?: ResolveTarget) {
  if (claimActionTarget(claim, action, resolveTo) === null) {
    throw new IllegalClaimTransitionError(
      claim.id,
      claim.status,
      action,
      allowedClaimActions(claim),
    );
  }
}

function assertMayTransition(actor: Actor, claim: Claim, action: ClaimAction) {
  if (isStaff(actor)) return;
  if (isClaimOwner(actor, claim) && CUSTOMER_ACTIONS.includes(action)) return;
  throw new ForbiddenError(`Caller may not ${action} this claim`);
}

/** Resolution fields are written once, and must agree with how the claim was fulfilled. */
function completionPatch(claim: Claim, resolution: Resolution, now: Date): ClaimPatch {
  if (claim.resolutionType !== null || claim.completedAt !== null) {
    throw new ClaimStateError(claim.id, claim.status, "complete", allowedClaimActions(claim));
  }

  const allowed: readonly ResolutionType[] =
    claim.replacementProductId !== null
      ? [ResolutionType.REPLACE, ResolutionType.REFUND]
      : [ResolutionType.REPAIR, ResolutionType.REFUND];

  if (!allowed.includes(resolution.resolutionType)) {
    throw InvalidArgumentError.field(
      "resolutionType",
      `resolutionType must be one of: ${allowed.join(", ")}`,
      resolution.resolutionType,
    );
  }

  return {
    resolutionType: resolution.resolutionType,
    resolutionNotes: resolution.resolutionNotes,
    completedAt: now,
    actualCompletionDate: now,
  };
}

function requireResolution(
  resolutionType: ResolutionType | undefined,
  resolutionNotes: string | undefined,
): Resolution {
  if (!resolutionType || !resolutionNotes) {
    throw new InvalidArgumentError("Completing a claim requires a resolution", [
      ...(resolutionType
        ? []
        : [{ field: "resolutionType", message: "resolutionType is required" }]),
      ...(resolutionNotes
        ? []
        : [{ field: "resolutionNotes", message: "resolutionNotes is required" }]),
    ]);
  }
  return { resolutionType, resolutionNotes };
}

export class ClaimService {
  constructor(private readonly deps: ClaimServiceDeps) {}

  ////////////////////////////////////////////////////////////////
  // Submission
  ////////////////////////////////////////////////////////////////

  async submit(actor: Actor, input: SubmitClaimInput): Promise<CustomerClaimView> {
    requireActorType(actor, ActorType.CUSTOMER);
    const data = parseInput(SubmitClaimSchema, input, "Invalid claim");
    const now = this.deps.clock.now();

    if (data.issueDate > todayOf(now)) {
      throw InvalidArgumentError.field(
        "issueDate",
        "issueDate cannot be in the future",
        data.issueDate,
      );
    }

    const barcode = await this.deps.store.barcodes.findByCode(data.barcode);
    if (!barcode) throw new BarcodeNotFoundError(data.barcode);

    if (barcode.customerId !== null && barcode.customerId !== actor.actorId) {
      throw new ForbiddenError("Warranty is registered to another customer");
    }

    const warranty = deriveWarranty(barcode, now);
    if (barcode.status === BarcodeStatus.CLAIMED) {
      throw new WarrantyNotClaimableError(barcode.barcode, "warranty_claimed");
    }
    if (barcode.status !== BarcodeStatus.ACTIVE) {
      throw new WarrantyNotClaimableError(barcode.barcode, "warranty_inactive");
    }
    if (warranty.isExpired) {
      throw new WarrantyNotClaimableError(barcode.barcode, "warranty_expired");
    }

    const open = await this.deps.store.claims.findOpenByBarcode(barcode.id);
    if (open) throw new ClaimAlreadyOpenError(barcode.barcode);

    const profile = await callCollaborator("customer_directory", () =>
      this.deps.customers.getCustomer(actor.actorId),
    );
    const name = data.contact.name ?? profile?.name;
    const email = data.contact.email ?? profile?.email;
    if (!name || !email) {
      throw new InvalidArgumentError("Contact details are incomplete", [
        ...(name ? [] : [{ field: "contact.name", message: "contact name is required" }]),
        ...(email ? [] : [{ field: "contact.email", message: "contact email is required" }]),
      ]);
    }

    const claimId = newId();
    const attachments = this.deps.attachments.prepare(actor, claimId, data.attachments, now);
    const year = now.getUTCFullYear();

    const { claim, stored } = await this.withOpenClaimGuard(barcode.barcode, () =>
      this.deps.store.transaction(async (tx) => {
        if (await tx.claims.findOpenByBarcode(barcode.id)) {
          throw new ClaimAlreadyOpenError(barcode.barcode);
        }

        const sequence = await tx.sequences.next("claim", year);
        const inserted = await tx.claims.insert({
          id: claimId,
          claimNumber: formatSequenceNumber("WAR", year, sequence),
          barcodeId: barcode.id,
          barcode: barcode.barcode,
          customerId: actor.actorId,
          productId: barcode.productId,
          storefrontId: data.storefrontId ?? barcode.storefrontId,
          issueCategory: data.issueCategory,
          issueDescription: data.issueDescription,
          issueDate: data.issueDate,
          severity: data.severity,
          priority: ClaimPriority.NORMAL,
          status: ClaimStatus.PENDING,
          previousStatus: null,
          statusUpdatedAt: now,
          statusUpdatedBy: actor.actorId,
          claimDate: now,
          validatedAt: null,
          validatedBy: null,
          completedAt: null,
          estimatedCompletionDate: null,
          actualCompletionDate: null,
          resolutionType: null,
          resolutionNotes: null,
          contact: {
            name,
            email,
            phone: data.contact.phone ?? profile?.phone ?? null,
            pickupAddress: data.contact.pickupAddress ?? null,
          },
          customerNotes: data.customerNotes ?? null,
          adminNotes: null,
          repairNotes: null,
          rejectionReason: null,
          assignedTechnicianId: null,
          replacementProductId: null,
          shippingProvider: null,
          trackingNumber: null,
          satisfactionRating: null,
          customerFeedback: null,
          tags: [],
          repairCost: 0,
          shippingCost: 0,
          replacementCost: 0,
          totalCost: 0,
          createdAt: now,
        });

        await commitTimelineEvent(
          tx,
          {
            claimId,
            eventType: TimelineEventType.SUBMITTED,
            description: `Claim ${inserted.claimNumber} submitted`,
            actor,
            metadata: {
              issueCategory: inserted.issueCategory,
              severity: inserted.severity,
            },
          },
          now,
        );

        const storedAttachments = await this.deps.attachments.record(
          tx,
          actor,
          attachments,
          now,
        );

        return { claim: inserted, stored: storedAttachments };
      }),
    );

    log("INFO", "CLAIM_SUBMITTED", {
      claimId: claim.id,
      claimNumber: claim.claimNumber,
      barcodeId: barcode.id,
      attachments: stored.length,
    });

    notifyClaimSubmitted(this.deps.notifications, claim);
    this.deps.attachments.queueScans(stored);

    return toCustomerClaimView(claim, now);
  }

  ////////////////////////////////////////////////////////////////
  // Agent review
  ////////////////////////////////////////////////////////////////

  async validate(actor: Actor, claimId: string, input: ValidateClaimInput = {}): Promise<ClaimView> {
    requireActorType(actor, ActorType.AGENT);
    const data = parseInput(ValidateClaimSchema, input, "Invalid validation");

    const result = await this.commitTransition(
      actor,
      claimId,
      ClaimAction.VALIDATE,
      { expectedVersion: data.expectedVersion },
      async (_tx, claim, now) => ({
        patch: {
          validatedAt: now,
          validatedBy: actor.actorId,
          priority:
            data.priority ?? defaultClaimPriority(claim.severity, claim.issueCategory),
          adminNotes: data.notes ?? claim.adminNotes,
        },
        description: "Claim validated",
      }),
    );
    return toClaimView(result.claim, this.deps.clock.now());
  }

  async reject(actor: Actor, claimId: string, input: RejectClaimInput): Promise<ClaimView> {
    requireActorType(actor, ActorType.AGENT);
    const data = parseInput(RejectClaimSchema, input, "Invalid rejection");

    const result = await this.commitTransition(
      actor,
      claimId,
      ClaimAction.REJECT,
      { expectedVersion: data.expectedVersion },
      async () => ({
        patch: { rejectionReason: data.reason },
        description: `Claim rejected: ${data.reason}`,
      }),
    );
    return toClaimView(result.claim, this.deps.clock.now());
  }

  /** Stays pending; the request is recorded on the timeline and sent to the customer. */
  async requestInfo(actor: Actor, claimId: string, input: RequestInfoInput): Promise<ClaimView> {
    requireActorType(actor, ActorType.AGENT);
    const data = parseInput(RequestInfoSchema, input, "Invalid information request");
    const now = this.deps.clock.now();

    const claim = await this.deps.store.transaction(async (tx) => {
      const current = await this.loadVisible(tx, actor, claimId);
      assertExpectedVersion(current, data.expectedVersion);
      if (current.status !== ClaimStatus.PENDING) {
        throw new ClaimStateError(
          claimId,
          current.status,
          "request information on",
          allowedClaimActions(current),
        );
      }

      const updated = await updateClaim(
        tx,
        current,
        { statusUpdatedBy: actor.actorId, statusUpdatedAt: now },
        now,
      );
      await commitTimelineEvent(
        tx,
        {
          claimId,
          eventType: TimelineEventType.STATUS_UPDATED,
          description: `Additional information requested: ${data.message}`,
          actor,
          metadata: { infoRequested: true },
        },
        now,
      );
      return updated;
    });

    log("INFO", "CLAIM_INFO_REQUESTED", { claimId });
    void dispatchNotification(
      this.deps.notifications,
      claim.contact.email,
      "claim_status_changed",
      {
        claimId,
        claimNumber: claim.claimNumber,
        from: claim.status,
        to: claim.status,
        infoRequested: data.message,
      },
    );

    return toClaimView(claim, now);
  }

  async assignTechnician(
    actor: Actor,
    claimId: string,
    input: AssignTechnicianInput,
  ): Promise<ClaimView> {
    requireActorType(actor, ActorType.AGENT);
    const data = parseInput(AssignTechnicianSchema, input, "Invalid assignment");

    const result = await this.commitTransition(
      actor,
      claimId,
      ClaimAction.ASSIGN,
      { expectedVersion: data.expectedVersion },
      async (_tx, claim) => ({
        patch: {
          assignedTechnicianId: data.technicianId,
          estimatedCompletionDate:
            data.estimatedCompletionDate ?? claim.estimatedCompletionDate,
          priority: data.priority ?? claim.priority,
          adminNotes: data.notes ?? claim.adminNotes,
        },
        description: "Technician assigned",
        metadata: { technicianId: data.technicianId },
      }),
    );
    return toClaimView(result.claim, this.deps.clock.now());
  }

  ////////////////////////////////////////////////////////////////
  // Generic transitions
  ////////////////////////////////////////////////////////////////

  async transition(
    actor: Actor,
    claimId: string,
    input: TransitionClaimInput,
  ): Promise<AnyClaimView> {
    const data = parseInput(TransitionClaimSchema, input, "Invalid transition");
    const { expectedVersion } = data;

    switch (data.action) {
      case ClaimAction.VALIDATE:
        return this.validate(actor, claimId, {
          priority: data.priority,
          notes: data.notes,
          expectedVersion,
        });

      case ClaimAction.REJECT:
        return this.reject(actor, claimId, {
          reason: data.reason ?? data.notes ?? "",
          expectedVersion,
        });

      case ClaimAction.ASSIGN:
        return this.assignTechnician(actor, claimId, {
          technicianId: data.technicianId ?? "",
          estimatedCompletionDate: data.estimatedCompletionDate,
          priority: data.priority,
          notes: data.notes,
          expectedVersion,
        });

      case ClaimAction.START: {
        const started = await this.deps.repairs.startForClaim(actor, claimId, expectedVersion);
        return toClaimView(started.claim, this.deps.clock.now());
      }

      case ClaimAction.COMPLETE:
        return this.complete(actor, claimId, {
          resolutionType: data.resolutionType ?? ResolutionType.REPAIR,
          resolutionNotes: data.resolutionNotes ?? "",
          expectedVersion,
        });

      default:
        break;
    }

    const action = data.action;
    const result = await this.commitTransition(
      actor,
      claimId,
      action,
      { expectedVersion, resolveTo: data.resolveTo },
      async (tx, claim, now) => {
        const notesPatch: ClaimPatch = {
          ...(data.notes && isStaff(actor) ? { adminNotes: data.notes } : {}),
          ...(data.notes && !isStaff(actor) ? { customerNotes: data.notes } : {}),
          ...(data.repairNotes ? { repairNotes: data.repairNotes } : {}),
        };
        const metadata = { reason: data.reason ?? null };

        switch (action) {
          case ClaimAction.REPAIR:
          case ClaimAction.REPLACE: {
            const blocker = resolutionBlocker(await tx.tickets.findLiveByClaim(claim.id));
            if (blocker) throw new RepairGateError(claim.id, blocker);

            if (action === ClaimAction.REPAIR) return { patch: notesPatch, metadata };

            if (!data.replacementProductId) {
              throw InvalidArgumentError.field(
                "replacementProductId",
                "replacementProductId is required to replace",
              );
            }
            return {
              patch: {
                ...notesPatch,
                replacementProductId: data.replacementProductId,
                ...(data.replacementCost !== undefined
                  ? { replacementCost: data.replacementCost }
                  : {}),
              },
              metadata: { ...metadata, replacementProductId: data.replacementProductId },
            };
          }

          case ClaimAction.SHIP:
            return {
              patch: {
                ...notesPatch,
                shippingProvider: data.shippingProvider ?? claim.shippingProvider,
                trackingNumber: data.trackingNumber ?? claim.trackingNumber,
                ...(data.shippingCost !== undefined ? { shippingCost: data.shippingCost } : {}),
              },
              metadata: { ...metadata, trackingNumber: data.trackingNumber ?? null },
            };

          case ClaimAction.RESOLVE: {
            const target = claimActionTarget(claim, action, data.resolveTo);
            if (target !== ClaimStatus.COMPLETED) return { patch: notesPatch, metadata };
            return {
              patch: {
                ...notesPatch,
                ...completionPatch(
                  claim,
                  requireResolution(data.resolutionType, data.resolutionNotes),
                  now,
                ),
              },
              metadata,
            };
          }

          default:
            return { patch: notesPatch, metadata };
        }
      },
    );

    return viewClaimFor(actor, result.claim, this.deps.clock.now());
  }

  async complete(actor: Actor, claimId: string, input: CompleteClaimInput): Promise<ClaimView> {
    requireActorType(actor, ActorType.AGENT);
    const data = parseInput(CompleteClaimSchema, input, "Invalid completion");

    const result = await this.commitTransition(
      actor,
      claimId,
      ClaimAction.COMPLETE,
      { expectedVersion: data.expectedVersion },
      async (_tx, claim, now) => ({
        patch: completionPatch(claim, data, now),
        description: `Claim completed (${data.resolutionType})`,
        metadata: { resolutionType: data.resolutionType },
      }),
    );
    return toClaimView(result.claim, this.deps.clock.now());
  }

  /** Each claim transitions in its own transaction; failures are reported per item. */
  async bulkStatus(actor: Actor, input: BulkStatusInput): Promise<BulkStatusResult> {
    requireActorType(actor, ActorType.AGENT);
    const data = parseInput(BulkStatusSchema, input, "Invalid bulk update");
    const claimIds = [...new Set(data.claimIds)];
    const results: BulkItemResult[] = [];

    for (const claimId of claimIds) {
      try {
        const claim = await this.transition(actor, claimId, {
          action: data.action,
          notes: data.notes,
          reason: data.reason,
        });
        results.push({ claimId, ok: true, status: claim.status, version: claim.version });
      } catch (err) {
        if (!(err instanceof DomainError)) {
          log("ERROR", "CLAIM_BULK_ITEM_FAILED", { claimId, ...errorMeta(err) });
        }
        results.push({
          claimId,
          ok: false,
          error:
            err instanceof DomainError
              ? { code: err.code, kind: err.kind, message: err.message }
              : { code: "INTERNAL", kind: "internal", message: "Unexpected error" },
        });
      }
    }

    const succeeded = results.filter((r) => r.ok).length;
    log("INFO", "CLAIM_BULK_STATUS", {
      action: data.action,
      total: results.length,
      succeeded,
    });

    return {
      total: results.length,
      succeeded,
      failed: results.length - succeeded,
      results,
    };
  }

  ////////////////////////////////////////////////////////////////
  // Notes + feedback
  ////////////////////////////////////////////////////////////////

  async addNote(actor: Actor, claimId: string, input: AddNoteInput): Promise<TimelineEvent> {
    const data = parseInput(AddNoteSchema, input, "Invalid note");
    const now = this.deps.clock.now();

    return this.deps.store.transaction(async (tx) => {
      await this.loadVisible(tx, actor, claimId);
      return commitTimelineEvent(
        tx,
        {
          claimId,
          eventType: TimelineEventType.NOTE_ADDED,
          description: data.note,
          actor,
          // customers cannot write notes they would not see
          visibleToCustomer: isStaff(actor) ? data.visibleToCustomer : true,
        },
        now,
      );
    });
  }

  async feedback(actor: Actor, claimId: string, input: FeedbackInput): Promise<CustomerClaimView> {
    requireActorType(actor, ActorType.CUSTOMER);
    const data = parseInput(FeedbackSchema, input, "Invalid feedback");
    const now = this.deps.clock.now();

    const claim = await this.deps.store.transaction(async (tx) => {
      const current = await this.loadVisible(tx, actor, claimId);
      if (current.status !== ClaimStatus.COMPLETED) {
        throw new ClaimStateError(
          claimId,
          current.status,
          "leave feedback on",
          allowedClaimActions(current),
        );
      }
      if (current.satisfactionRating !== null) {
        throw new ConflictError("Feedback was already submitted", "FEEDBACK_ALREADY_SUBMITTED");
      }

      const updated = await updateClaim(
        tx,
        current,
        { satisfactionRating: data.rating, customerFeedback: data.feedback ?? null },
        now,
      );
      await commitTimelineEvent(
        tx,
        {
          claimId,
          eventType: TimelineEventType.NOTE_ADDED,
          description: `Customer feedback: ${data.rating}/5`,
          actor,
          metadata: { rating: data.rating },
        },
        now,
      );
      return updated;
    });

    log("INFO", "CLAIM_FEEDBACK_RECEIVED", { claimId, rating: data.rating });
    return toCustomerClaimView(claim, now);
  }

  ////////////////////////////////////////////////////////////////
  // Queries
  ////////////////////////////////////////////////////////////////

  async get(actor: Actor, claimId: string): Promise<AnyClaimView> {
    const claim = await this.deps.store.claims.findById(claimId);
    if (!claim || !canViewClaim(actor, claim)) throw new ClaimNotFoundError(claimId);
    return viewClaimFor(actor, claim, this.deps.clock.now());
  }

  async timeline(actor: Actor, claimId: string): Promise<TimelineEntry[]> {
    await this.get(actor, claimId);
    return this.deps.timeline.listForViewer(actor, claimId);
  }

  async list(actor: Actor, filter: ClaimFilter, page: PageRequest): Promise<Page<ClaimView>> {
    requireActorType(actor, ActorType.AGENT, ActorType.SYSTEM, ActorType.TECHNICIAN);
    const scoped =
      actor.actorType === ActorType.TECHNICIAN
        ? { ...filter, technicianId: actor.actorId }
        : filter;

    const result = await this.deps.store.claims.list(scoped, page);
    const now = this.deps.clock.now();
    return { ...result, items: result.items.map((claim) => toClaimView(claim, now)) };
  }

  async mine(actor: Actor, page: PageRequest): Promise<Page<CustomerClaimView>> {
    requireActorType(actor, ActorType.CUSTOMER);
    const result = await this.deps.store.claims.list({ customerId: actor.actorId }, page);
    const now = this.deps.clock.now();
    return {
      ...result,
      items: result.items.map((claim) => toCustomerClaimView(claim, now)),
    };
  }

  ////////////////////////////////////////////////////////////////
  // Internals
  ////////////////////////////////////////////////////////////////

  private async loadVisible(tx: StoreTx, actor: Actor, claimId: string): Promise<Claim> {
    const claim = await tx.claims.findById(claimId);
    if (!claim || !canViewClaim(actor, claim)) throw new ClaimNotFoundError(claimId);
    return claim;
  }

  /**
   * Loads the claim, checks caller, version and table legality, then applies
   * the plan's extra writes with the status change. Post-commit effects run last.
   */
  private async commitTransition(
    actor: Actor,
    claimId: string,
    action: ClaimAction,
    opts: { expectedVersion?: number; resolveTo?: ResolveTarget },
    plan: (tx: StoreTx, claim: Claim, now: Date) => Promise<TransitionPlan>,
  ): Promise<ClaimTransitionResult> {
    const now = this.deps.clock.now();

    const { result, claimedBarcode } = await this.deps.store.transaction(async (tx) => {
      const claim = await this.loadVisible(tx, actor, claimId);
      assertMayTransition(actor, claim, action);
      assertExpectedVersion(claim, opts.expectedVersion);
      assertActionLegal(claim, action, opts.resolveTo);

      const steps = await plan(tx, claim, now);
      const applied = await applyClaimTransition(tx, {
        actor,
        claim,
        action,
        at: now,
        resolveTo: opts.resolveTo,
        ...steps,
      });

      // a replacement consumes the warranty entitlement
      let barcode: string | null = null;
      if (
        applied.to === ClaimStatus.COMPLETED &&
        applied.claim.resolutionType === ResolutionType.REPLACE
      ) {
        const marked = await recordBarcodeClaimed(tx, {
          barcodeId: claim.barcodeId,
          actorId: actor.actorId,
          claimId: claim.id,
          at: now,
        });
        barcode = marked?.barcode ?? null;
      }

      return { result: applied, claimedBarcode: barcode };
    });

    notifyClaimStatusChanged(this.deps.notifications, result);
    if (claimedBarcode) await invalidateWarrantyCache(this.deps.cache, claimedBarcode);

    return result;
  }

  /** The open-claim index decides when two submissions race. */
  private async withOpenClaimGuard<T>(barcode: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof DuplicateKeyError && err.constraint === OPEN_CLAIM_CONSTRAINT) {
        throw new ClaimAlreadyOpenError(barcode);
      }
      throw err;
    }
  }
}
