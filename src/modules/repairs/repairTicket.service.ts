// src/modules/repairs/repairTicket.service.ts
// Purpose: Repair ticket lifecycle. Tickets are the technician-owned child
// workflow of a claim; starting one drives the claim into in_repair, and
// quality approval is the gate a claim checks before it can be resolved.

import type { Clock } from "@/lib/clock";
import { ActorType, isStaff, requireActorType, type Actor } from "@/lib/auth/actor";
import { ForbiddenError } from "@/lib/errors/errors";
import {
  dispatchNotification,
  type NotificationSink,
} from "@/lib/collaborators/notification-sink";
import { DuplicateKeyError } from "@/lib/store/store.errors";
import type { StoreTx, WarrantyStore } from "@/lib/store/store.types";
import { log } from "@/lib/observability/logger";
import { parseInput } from "@/lib/validation/parseInput";
import { roundMoney, sumMoney } from "@/utils/money";
import type { Page, PageRequest } from "@/utils/pagination";
import { formatSequenceNumber } from "@/utils/sequenceNumber";
import { newId } from "@/utils/uuid";
import { commitTimelineEvent } from "@/modules/timeline/commitTimelineEvent";
import { TimelineEventType } from "@/modules/timeline/timeline.types";
import { ClaimAction, ClaimStatus, type Claim } from "@/modules/claims/claim.types";
import {
  ClaimNotFoundError,
  ClaimStateError,
  IllegalClaimTransitionError,
} from "@/modules/claims/claim.errors";
import { allowedClaimActions } from "@/modules/claims/claimLifecycle.transitions";
import {
  applyClaimTransition,
  assertExpectedVersion,
  updateClaim,
  type ClaimTransitionResult,
} from "@/modules/claims/claimTransition";
import { notifyClaimStatusChanged } from "@/modules/claims/claim.notifications";
import { isClaimOwner } from "@/modules/claims/claim.view";
import {
  CustomerApprovalStatus,
  QualityCheckStatus,
  TicketStatus,
  type RepairTicket,
  type RepairTicketPatch,
} from "./repairTicket.types";
import { canApplyTicketAction, type TicketAction } from "./repairTicket.transitions";
import {
  LiveTicketExistsError,
  TicketNotFoundError,
  TicketStateError,
  TicketVersionConflictError,
} from "./repairTicket.errors";
import {
  AssignTicketSchema,
  CancelTicketSchema,
  CompleteTicketSchema,
  CreateTicketSchema,
  CustomerApprovalSchema,
  QualityCheckSchema,
  StartTicketSchema,
  type AssignTicketInput,
  type CancelTicketInput,
  type CompleteTicketInput,
  type CreateTicketInput,
  type CustomerApprovalInput,
  type QualityCheckInput,
  type StartTicketInput,
} from "./repairTicket.schemas";

export type RepairTicketServiceDeps = {
  store: WarrantyStore;
  clock: Clock;
  notifications: NotificationSink;
  /** Ticket total above which the customer must approve the cost. */
  approvalCostThreshold: number;
};

type TicketDraft = {
  priority: Claim["priority"];
  estimatedHours: number;
  description: string;
  requiredParts: string[];
  specialInstructions: string | null;
  customerApprovalRequired: boolean;
  technicianId: string | null;
  estimatedCompletionDate: Date | null;
};

const LIVE_TICKET_CONSTRAINT = "repair_tickets_live_claim_key";

////////////////////////////////////////////////////////////////
// Helpers
////////////////////////////////////////////////////////////////

function assertTicketAction(ticket: RepairTicket, action: TicketAction, verb: string) {
  if (!canApplyTicketAction(ticket.status, action)) {
    throw new TicketStateError(ticket.id, ticket.status, verb);
  }
}

function assertTicketVersion(ticket: RepairTicket, expectedVersion?: number) {
  if (expectedVersion !== undefined && expectedVersion !== ticket.version) {
    throw new TicketVersionConflictError(ticket.id);
  }
}

/** Agents, or the technician the ticket is assigned to. */
function requireTicketWorker(actor: Actor, ticket: RepairTicket) {
  if (actor.actorType === ActorType.AGENT) return;
  if (
    actor.actorType === ActorType.TECHNICIAN &&
    ticket.assignedTechnicianId === actor.actorId
  ) {
    return;
  }
  throw new ForbiddenError("Only the assigned technician or an agent may work this ticket");
}

async function updateTicket(
  tx: StoreTx,
  ticket: RepairTicket,
  patch: RepairTicketPatch,
  at: Date,
): Promise<RepairTicket> {
  const updated = await tx.tickets.update(ticket.id, ticket.version, {
    ...patch,
    updatedAt: at,
  });
  if (!updated) throw new TicketVersionConflictError(ticket.id);
  return updated;
}

async function loadTicket(tx: StoreTx, ticketId: string): Promise<RepairTicket> {
  const ticket = await tx.tickets.findById(ticketId);
  if (!ticket) throw new TicketNotFoundError(ticketId);
  return ticket;
}

async function loadClaim(tx: StoreTx, claimId: string): Promise<Claim> {
  const claim = await tx.claims.findById(claimId);
  if (!claim) throw new ClaimNotFoundError(claimId);
  return claim;
}

export class RepairTicketService {
  constructor(private readonly deps: RepairTicketServiceDeps) {}

  ////////////////////////////////////////////////////////////////
  // Create / assign
  ////////////////////////////////////////////////////////////////

  async create(actor: Actor, claimId: string, input: CreateTicketInput): Promise<RepairTicket> {
    requireActorType(actor, ActorType.AGENT);
    const data = parseInput(CreateTicketSchema, input, "Invalid repair ticket");
    const now = this.deps.clock.now();

    const ticket = await this.withLiveTicketGuard(claimId, () =>
      this.deps.store.transaction(async (tx) => {
        const claim = await loadClaim(tx, claimId);

        const openable =
          claim.status === ClaimStatus.ASSIGNED || claim.status === ClaimStatus.IN_REPAIR;
        if (!openable) {
          throw new ClaimStateError(
            claimId,
            claim.status,
            "open a repair ticket for",
            allowedClaimActions(claim),
          );
        }

        const live = await tx.tickets.findLiveByClaim(claimId);
        if (live) throw new LiveTicketExistsError(claimId, live.ticketNumber);

        const technicianId = data.technicianId ?? claim.assignedTechnicianId;
        if (technicianId && technicianId !== claim.assignedTechnicianId) {
          await updateClaim(tx, claim, { assignedTechnicianId: technicianId }, now);
        }

        return this.insertTicket(
          tx,
          actor,
          claim,
          {
            priority: data.priority ?? claim.priority,
            estimatedHours: data.estimatedHours,
            description: data.description,
            requiredParts: data.requiredParts,
            specialInstructions: data.specialInstructions ?? null,
            customerApprovalRequired: data.customerApprovalRequired,
            technicianId,
            estimatedCompletionDate:
              data.estimatedCompletionDate ?? claim.estimatedCompletionDate,
          },
          now,
        );
      }),
    );

    log("INFO", "REPAIR_TICKET_CREATED", {
      ticketId: ticket.id,
      ticketNumber: ticket.ticketNumber,
      claimId,
      status: ticket.status,
    });
    return ticket;
  }

  async assign(actor: Actor, ticketId: string, input: AssignTicketInput): Promise<RepairTicket> {
    requireActorType(actor, ActorType.AGENT);
    const data = parseInput(AssignTicketSchema, input, "Invalid assignment");
    const now = this.deps.clock.now();

    const ticket = await this.deps.store.transaction(async (tx) => {
      const current = await loadTicket(tx, ticketId);
      assertTicketVersion(current, data.expectedVersion);
      assertTicketAction(current, "assign", "assign");

      const updated = await updateTicket(
        tx,
        current,
        {
          status:
            current.status === TicketStatus.PENDING ? TicketStatus.ASSIGNED : current.status,
          assignedTechnicianId: data.technicianId,
          assignedAt: now,
          estimatedCompletionDate:
            data.estimatedCompletionDate ?? current.estimatedCompletionDate,
        },
        now,
      );

      const claim = await loadClaim(tx, current.claimId);
      await updateClaim(
        tx,
        claim,
        {
          assignedTechnicianId: data.technicianId,
          estimatedCompletionDate:
            data.estimatedCompletionDate ?? claim.estimatedCompletionDate,
        },
        now,
      );

      await commitTimelineEvent(
        tx,
        {
          claimId: claim.id,
          eventType: TimelineEventType.ASSIGNED,
          description: `Repair ticket ${current.ticketNumber} assigned to a technician`,
          actor,
          visibleToCustomer: false,
          metadata: {
            ticketId: current.id,
            technicianId: data.technicianId,
            previousTechnicianId: current.assignedTechnicianId,
          },
        },
        now,
      );

      return updated;
    });

    log("INFO", "REPAIR_TICKET_ASSIGNED", { ticketId, technicianId: data.technicianId });
    return ticket;
  }

  ////////////////////////////////////////////////////////////////
  // Work
  ////////////////////////////////////////////////////////////////

  /** assigned -> in_progress; an assigned claim moves to in_repair in the same transaction. */
  async start(actor: Actor, ticketId: string, input: StartTicketInput = {}): Promise<RepairTicket> {
    const data = parseInput(StartTicketSchema, input, "Invalid start request");
    const now = this.deps.clock.now();

    const { ticket, transition } = await this.deps.store.transaction(async (tx) => {
      const current = await loadTicket(tx, ticketId);
      requireTicketWorker(actor, current);
      assertTicketVersion(current, data.expectedVersion);
      return this.startInTx(tx, actor, current, now);
    });

    if (transition) notifyClaimStatusChanged(this.deps.notifications, transition);
    return ticket;
  }

  /**
   * The claim-side `start` action. Starts the claim's live ticket, opening a
   * minimal one first when none exists.
   */
  async startForClaim(
    actor: Actor,
    claimId: string,
    expectedVersion?: number,
  ): Promise<ClaimTransitionResult> {
    requireActorType(actor, ActorType.AGENT, ActorType.TECHNICIAN);
    const now = this.deps.clock.now();

    const result = await this.withLiveTicketGuard(claimId, () =>
      this.deps.store.transaction(async (tx) => {
        const claim = await loadClaim(tx, claimId);
        assertExpectedVersion(claim, expectedVersion);

        if (claim.status !== ClaimStatus.ASSIGNED) {
          throw new IllegalClaimTransitionError(
            claimId,
            claim.status,
            ClaimAction.START,
            allowedClaimActions(claim),
          );
        }

        let ticket =
          (await tx.tickets.findLiveByClaim(claimId)) ??
          (await this.insertTicket(
            tx,
            actor,
            claim,
            {
              priority: claim.priority,
              estimatedHours: 1,
              description: `Repair for claim ${claim.claimNumber}`,
              requiredParts: [],
              specialInstructions: null,
              customerApprovalRequired: false,
              technicianId: claim.assignedTechnicianId,
              estimatedCompletionDate: claim.estimatedCompletionDate,
            },
            now,
          ));

        if (ticket.status === TicketStatus.PENDING && claim.assignedTechnicianId) {
          ticket = await updateTicket(
            tx,
            ticket,
            {
              status: TicketStatus.ASSIGNED,
              assignedTechnicianId: claim.assignedTechnicianId,
              assignedAt: now,
            },
            now,
          );
        }

        requireTicketWorker(actor, ticket);
        const started = await this.markStarted(tx, ticket, now);
        return this.driveClaimIntoRepair(tx, actor, claim, started, now);
      }),
    );

    notifyClaimStatusChanged(this.deps.notifications, result);
    return result;
  }

  async complete(
    actor: Actor,
    ticketId: string,
    input: CompleteTicketInput,
  ): Promise<RepairTicket> {
    const data = parseInput(CompleteTicketSchema, input, "Invalid completion");
    const now = this.deps.clock.now();

    const { ticket, claim, approvalRequested } = await this.deps.store.transaction(
      async (tx) => {
        const current = await loadTicket(tx, ticketId);
        requireTicketWorker(actor, current);
        assertTicketVersion(current, data.expectedVersion);
        assertTicketAction(current, "complete", "complete");

        const usedParts = data.usedParts.map((part) => ({
          ...part,
          unitCost: roundMoney(part.unitCost),
          totalCost: roundMoney(part.quantity * part.unitCost),
        }));

        // costs are written once; reworked tickets keep the original figures
        const firstCompletion = current.totalCost === null;
        const laborCost = firstCompletion ? roundMoney(data.laborCost) : current.laborCost;
        const partsCost = firstCompletion
          ? roundMoney(data.partsCost ?? sumMoney(...usedParts.map((p) => p.totalCost)))
          : current.partsCost;
        const totalCost = firstCompletion
          ? sumMoney(laborCost ?? 0, partsCost ?? 0)
          : (current.totalCost ?? 0);

        const overThreshold = totalCost > this.deps.approvalCostThreshold;
        const approvalRequired = current.customerApprovalRequired || overThreshold;
        const approvalStatus =
          approvalRequired &&
          current.customerApprovalStatus === CustomerApprovalStatus.NOT_REQUIRED
            ? CustomerApprovalStatus.PENDING
            : current.customerApprovalStatus;

        const updated = await updateTicket(
          tx,
          current,
          {
            status: TicketStatus.COMPLETED,
            actualHours: data.actualHours,
            usedParts,
            repairNotes: data.repairNotes ?? current.repairNotes,
            testResults: data.testResults.map((test) => ({
              testName: test.testName,
              result: test.result,
              description: test.description ?? null,
              testedAt: now,
              testedBy: actor.actorId,
            })),
            laborCost,
            partsCost,
            totalCost,
            actualCompletionDate: now,
            qualityCheckStatus: QualityCheckStatus.PENDING,
            customerApprovalRequired: approvalRequired,
            customerApprovalStatus: approvalStatus,
          },
          now,
        );

        const parent = await loadClaim(tx, current.claimId);
        const claimAfter = await updateClaim(
          tx,
          parent,
          {
            repairCost: totalCost,
            repairNotes: data.repairNotes ?? parent.repairNotes,
          },
          now,
        );

        await commitTimelineEvent(
          tx,
          {
            claimId: parent.id,
            eventType: TimelineEventType.REPAIR_COMPLETED,
            description: `Repair work completed (${current.ticketNumber})`,
            actor,
            metadata: { ticketId: current.id, totalCost, reworkCount: current.reworkCount },
          },
          now,
        );

        return {
          ticket: updated,
          claim: claimAfter,
          approvalRequested: approvalStatus === CustomerApprovalStatus.PENDING,
        };
      },
    );

    log("INFO", "REPAIR_TICKET_COMPLETED", {
      ticketId,
      claimId: ticket.claimId,
      totalCost: ticket.totalCost,
      customerApproval: ticket.customerApprovalStatus,
    });

    if (approvalRequested) {
      void dispatchNotification(
        this.deps.notifications,
        claim.contact.email,
        "customer_approval_requested",
        {
          claimId: claim.id,
          claimNumber: claim.claimNumber,
          ticketNumber: ticket.ticketNumber,
          totalCost: ticket.totalCost,
        },
      );
    }

    return ticket;
  }

  ////////////////////////////////////////////////////////////////
  // Gates
  ////////////////////////////////////////////////////////////////

  /** Approve, or reject and reopen the work (completed -> in_progress). */
  async qualityCheck(
    actor: Actor,
    ticketId: string,
    input: QualityCheckInput,
  ): Promise<RepairTicket> {
    requireActorType(actor, ActorType.AGENT);
    const data = parseInput(QualityCheckSchema, input, "Invalid quality check");
    const now = this.deps.clock.now();

    const ticket = await this.deps.store.transaction(async (tx) => {
      const current = await loadTicket(tx, ticketId);
      assertTicketVersion(current, data.expectedVersion);
      assertTicketAction(current, "quality_check", "quality check");
      if (current.qualityCheckStatus !== QualityCheckStatus.PENDING) {
        throw new TicketStateError(ticketId, current.status, "quality check");
      }

      const checked = {
        qualityCheckedBy: actor.actorId,
        qualityCheckedAt: now,
        qualityCheckNotes: data.notes ?? null,
      };

      if (data.approved) {
        const updated = await updateTicket(
          tx,
          current,
          { ...checked, qualityCheckStatus: QualityCheckStatus.APPROVED },
          now,
        );
        await commitTimelineEvent(
          tx,
          {
            claimId: current.claimId,
            eventType: TimelineEventType.QUALITY_APPROVED,
            description: "Quality check approved",
            actor,
            metadata: { ticketId: current.id },
          },
          now,
        );
        return updated;
      }

      const reopened = await updateTicket(
        tx,
        current,
        {
          ...checked,
          status: TicketStatus.IN_PROGRESS,
          qualityCheckStatus: QualityCheckStatus.REJECTED,
          actualCompletionDate: null,
          reworkCount: current.reworkCount + 1,
        },
        now,
      );
      await commitTimelineEvent(
        tx,
        {
          claimId: current.claimId,
          eventType: TimelineEventType.STATUS_UPDATED,
          description: "Quality check failed; repair reopened",
          actor,
          visibleToCustomer: false,
          metadata: { ticketId: current.id, reworkCount: reopened.reworkCount, notes: data.notes },
        },
        now,
      );
      return reopened;
    });

    log(data.approved ? "INFO" : "WARN", "REPAIR_TICKET_QUALITY_CHECKED", {
      ticketId,
      approved: data.approved,
      reworkCount: ticket.reworkCount,
    });
    return ticket;
  }

  async customerApproval(
    actor: Actor,
    ticketId: string,
    input: CustomerApprovalInput,
  ): Promise<RepairTicket> {
    requireActorType(actor, ActorType.CUSTOMER);
    const data = parseInput(CustomerApprovalSchema, input, "Invalid approval");
    const now = this.deps.clock.now();

    const ticket = await this.deps.store.transaction(async (tx) => {
      const current = await loadTicket(tx, ticketId);
      const claim = await loadClaim(tx, current.claimId);
      if (!isClaimOwner(actor, claim)) throw new TicketNotFoundError(ticketId);

      assertTicketAction(current, "customer_approval", "record customer approval for");
      const awaiting =
        current.customerApprovalRequired &&
        current.customerApprovalStatus === CustomerApprovalStatus.PENDING;
      if (!awaiting) {
        throw new TicketStateError(ticketId, current.status, "record customer approval for");
      }

      const updated = await updateTicket(
        tx,
        current,
        {
          customerApprovalStatus: data.approved
            ? CustomerApprovalStatus.APPROVED
            : CustomerApprovalStatus.REJECTED,
          customerApprovedAt: now,
          customerApprovalNotes: data.notes ?? null,
        },
        now,
      );

      await commitTimelineEvent(
        tx,
        {
          claimId: claim.id,
          eventType: data.approved
            ? TimelineEventType.CUSTOMER_APPROVED
            : TimelineEventType.STATUS_UPDATED,
          description: data.approved
            ? "Customer approved the repair cost"
            : "Customer declined the repair cost",
          actor,
          metadata: { ticketId: current.id, totalCost: current.totalCost },
        },
        now,
      );

      return updated;
    });

    log("INFO", "REPAIR_TICKET_CUSTOMER_DECISION", {
      ticketId,
      approved: data.approved,
    });
    return ticket;
  }

  async cancel(actor: Actor, ticketId: string, input: CancelTicketInput): Promise<RepairTicket> {
    requireActorType(actor, ActorType.AGENT);
    const data = parseInput(CancelTicketSchema, input, "Invalid cancellation");
    const now = this.deps.clock.now();

    const ticket = await this.deps.store.transaction(async (tx) => {
      const current = await loadTicket(tx, ticketId);
      assertTicketVersion(current, data.expectedVersion);
      assertTicketAction(current, "cancel", "cancel");

      const updated = await updateTicket(
        tx,
        current,
        {
          status: TicketStatus.CANCELLED,
          cancelledAt: now,
          cancellationReason: data.reason,
        },
        now,
      );

      await commitTimelineEvent(
        tx,
        {
          claimId: current.claimId,
          eventType: TimelineEventType.STATUS_UPDATED,
          description: `Repair ticket ${current.ticketNumber} cancelled`,
          actor,
          visibleToCustomer: false,
          metadata: { ticketId: current.id, reason: data.reason },
        },
        now,
      );

      return updated;
    });

    log("INFO", "REPAIR_TICKET_CANCELLED", { ticketId, reason: data.reason });
    return ticket;
  }

  ////////////////////////////////////////////////////////////////
  // Queries
  ////////////////////////////////////////////////////////////////

  async get(actor: Actor, ticketId: string): Promise<RepairTicket> {
    const ticket = await this.deps.store.tickets.findById(ticketId);
    if (!ticket) throw new TicketNotFoundError(ticketId);
    if (isStaff(actor) || ticket.assignedTechnicianId === actor.actorId) return ticket;

    const claim = await this.deps.store.claims.findById(ticket.claimId);
    if (claim && isClaimOwner(actor, claim)) return ticket;
    throw new TicketNotFoundError(ticketId);
  }

  async listByClaim(actor: Actor, claimId: string): Promise<RepairTicket[]> {
    const claim = await this.deps.store.claims.findById(claimId);
    const visible =
      claim !== null &&
      (isStaff(actor) ||
        isClaimOwner(actor, claim) ||
        claim.assignedTechnicianId === actor.actorId);
    if (!visible) throw new ClaimNotFoundError(claimId);
    return this.deps.store.tickets.listByClaim(claimId);
  }

  async listByTechnician(
    actor: Actor,
    technicianId: string,
    page: PageRequest,
  ): Promise<Page<RepairTicket>> {
    const self = actor.actorType === ActorType.TECHNICIAN && actor.actorId === technicianId;
    if (!self && actor.actorType !== ActorType.AGENT) {
      throw new ForbiddenError("Technicians may only list their own tickets");
    }
    return this.deps.store.tickets.listByTechnician(technicianId, page);
  }

  ////////////////////////////////////////////////////////////////
  // Internals
  ////////////////////////////////////////////////////////////////

  private async insertTicket(
    tx: StoreTx,
    actor: Actor,
    claim: Claim,
    draft: TicketDraft,
    now: Date,
  ): Promise<RepairTicket> {
    const year = now.getUTCFullYear();
    const sequence = await tx.sequences.next("ticket", year);

    return tx.tickets.insert({
      id: newId(),
      ticketNumber: formatSequenceNumber("RPR", year, sequence),
      claimId: claim.id,
      status: draft.technicianId ? TicketStatus.ASSIGNED : TicketStatus.PENDING,
      priority: draft.priority,
      assignedTechnicianId: draft.technicianId,
      assignedAt: draft.technicianId ? now : null,
      estimatedHours: draft.estimatedHours,
      actualHours: null,
      estimatedCompletionDate: draft.estimatedCompletionDate,
      actualCompletionDate: null,
      description: draft.description,
      specialInstructions: draft.specialInstructions,
      requiredParts: draft.requiredParts,
      usedParts: [],
      repairNotes: null,
      testResults: [],
      laborCost: null,
      partsCost: null,
      totalCost: null,
      qualityCheckStatus: QualityCheckStatus.PENDING,
      qualityCheckedBy: null,
      qualityCheckedAt: null,
      qualityCheckNotes: null,
      reworkCount: 0,
      customerApprovalRequired: draft.customerApprovalRequired,
      customerApprovalStatus: draft.customerApprovalRequired
        ? CustomerApprovalStatus.PENDING
        : CustomerApprovalStatus.NOT_REQUIRED,
      customerApprovedAt: null,
      customerApprovalNotes: null,
      startedAt: null,
      cancelledAt: null,
      cancellationReason: null,
      createdBy: actor.actorId,
      createdAt: now,
    });
  }

  private async startInTx(
    tx: StoreTx,
    actor: Actor,
    ticket: RepairTicket,
    now: Date,
  ): Promise<{ ticket: RepairTicket; transition: ClaimTransitionResult | null }> {
    const started = await this.markStarted(tx, ticket, now);
    const claim = await loadClaim(tx, ticket.claimId);

    // a replacement ticket on a claim already in repair
    if (claim.status === ClaimStatus.IN_REPAIR) {
      return { ticket: started, transition: null };
    }

    const transition = await this.driveClaimIntoRepair(tx, actor, claim, started, now);
    return { ticket: started, transition };
  }

  private async markStarted(
    tx: StoreTx,
    ticket: RepairTicket,
    now: Date,
  ): Promise<RepairTicket> {
    assertTicketAction(ticket, "start", "start");
    return updateTicket(
      tx,
      ticket,
      { status: TicketStatus.IN_PROGRESS, startedAt: ticket.startedAt ?? now },
      now,
    );
  }

  private async driveClaimIntoRepair(
    tx: StoreTx,
    actor: Actor,
    claim: Claim,
    ticket: RepairTicket,
    now: Date,
  ): Promise<ClaimTransitionResult> {
    const transition = await applyClaimTransition(tx, {
      actor,
      claim,
      action: ClaimAction.START,
      at: now,
      description: `Repair started (${ticket.ticketNumber})`,
      metadata: { ticketId: ticket.id },
    });

    log("INFO", "REPAIR_TICKET_STARTED", { ticketId: ticket.id, claimId: claim.id });
    return transition;
  }

  /** The live-ticket index is the arbiter when two creators race. */
  private async withLiveTicketGuard<T>(claimId: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof DuplicateKeyError && err.constraint === LIVE_TICKET_CONSTRAINT) {
        const live = await this.deps.store.tickets.findLiveByClaim(claimId);
        throw new LiveTicketExistsError(claimId, live?.ticketNumber ?? "unknown");
      }
      throw err;
    }
  }
}
