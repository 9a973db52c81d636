// src/modules/repairs/repairTicket.transitions.ts
// Closed transition law for repair tickets and the resolution gate a claim checks.

import {
  CustomerApprovalStatus,
  QualityCheckStatus,
  TicketStatus,
  type RepairTicket,
} from "./repairTicket.types";

export const TICKET_TRANSITIONS: Record<TicketStatus, readonly TicketStatus[]> = {
  [TicketStatus.PENDING]: [TicketStatus.ASSIGNED, TicketStatus.CANCELLED],

  // reassignment keeps the ticket in assigned
  [TicketStatus.ASSIGNED]: [
    TicketStatus.ASSIGNED,
    TicketStatus.IN_PROGRESS,
    TicketStatus.CANCELLED,
  ],

  [TicketStatus.IN_PROGRESS]: [TicketStatus.COMPLETED, TicketStatus.CANCELLED],

  // quality rejection reopens the work
  [TicketStatus.COMPLETED]: [TicketStatus.IN_PROGRESS],

  [TicketStatus.CANCELLED]: [],
};

export const TICKET_ACTIONS = [
  "assign",
  "start",
  "complete",
  "quality_check",
  "customer_approval",
  "cancel",
] as const;

export type TicketAction = (typeof TICKET_ACTIONS)[number];

const ACTION_FROM: Record<TicketAction, readonly TicketStatus[]> = {
  assign: [TicketStatus.PENDING, TicketStatus.ASSIGNED, TicketStatus.IN_PROGRESS],
  start: [TicketStatus.ASSIGNED],
  complete: [TicketStatus.IN_PROGRESS],
  quality_check: [TicketStatus.COMPLETED],
  customer_approval: [TicketStatus.COMPLETED],
  cancel: [TicketStatus.PENDING, TicketStatus.ASSIGNED, TicketStatus.IN_PROGRESS],
};

export function canTransitionTicket(from: TicketStatus, to: TicketStatus): boolean {
  return TICKET_TRANSITIONS[from].includes(to);
}

export function canApplyTicketAction(status: TicketStatus, action: TicketAction): boolean {
  return ACTION_FROM[action].includes(status);
}

export function allowedTicketActions(status: TicketStatus): TicketAction[] {
  return TICKET_ACTIONS.filter((action) => canApplyTicketAction(status, action));
}

const APPROVAL_SATISFIED: readonly CustomerApprovalStatus[] = [
  CustomerApprovalStatus.NOT_REQUIRED,
  CustomerApprovalStatus.APPROVED,
];

/**
 * Why the ticket does not yet allow its claim to reach repaired/replaced,
 * or null when it does.
 */
export function resolutionBlocker(ticket: RepairTicket | null): string | null {
  if (!ticket) return "no_repair_ticket";
  if (ticket.status !== TicketStatus.COMPLETED) return "repair_not_completed";
  if (ticket.qualityCheckStatus !== QualityCheckStatus.APPROVED) {
    return "quality_check_pending";
  }
  if (!APPROVAL_SATISFIED.includes(ticket.customerApprovalStatus)) {
    return "customer_approval_pending";
  }
  return null;
}
