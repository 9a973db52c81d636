// src/modules/repairs/repairTicket.errors.ts

import { ConflictError, InvalidStateError, NotFoundError } from "@/lib/errors/errors";
import type { TicketStatus } from "./repairTicket.types";
import { allowedTicketActions } from "./repairTicket.transitions";

export class TicketNotFoundError extends NotFoundError {
  constructor(public readonly ticketId: string) {
    super(`Repair ticket ${ticketId} not found`, "TICKET_NOT_FOUND");
  }
}

export class TicketStateError extends InvalidStateError {
  constructor(ticketId: string, status: TicketStatus, attempted: string) {
    super(
      `Cannot ${attempted} repair ticket ${ticketId} while it is ${status}`,
      status,
      allowedTicketActions(status),
      "TICKET_INVALID_STATE",
    );
  }
}

export class TicketVersionConflictError extends ConflictError {
  constructor(ticketId: string) {
    super(
      `Repair ticket ${ticketId} was modified concurrently; reload and retry`,
      "TICKET_VERSION_CONFLICT",
    );
  }
}

export class LiveTicketExistsError extends ConflictError {
  constructor(claimId: string, ticketNumber: string) {
    super(
      `Claim ${claimId} already has an open repair ticket (${ticketNumber})`,
      "TICKET_ALREADY_OPEN",
    );
  }
}
