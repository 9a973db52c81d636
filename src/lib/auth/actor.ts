// src/lib/auth/actor.ts
// Caller identity as received from the upstream auth service.

import { ForbiddenError } from "@/lib/errors/errors";

export const ActorType = {
  CUSTOMER: "customer",
  AGENT: "agent",
  TECHNICIAN: "technician",
  SYSTEM: "system",
} as const;

export type ActorType = (typeof ActorType)[keyof typeof ActorType];

export const ADMIN_ROLE = "admin";

export type Actor = {
  actorId: string;
  actorType: ActorType;
  roles: readonly string[];
};

export const SYSTEM_ACTOR: Actor = {
  actorId: "system",
  actorType: ActorType.SYSTEM,
  roles: [],
};

export function isAdmin(actor: Actor): boolean {
  return actor.actorType === ActorType.AGENT && actor.roles.includes(ADMIN_ROLE);
}

export function requireActorType(actor: Actor, ...allowed: ActorType[]) {
  if (!allowed.includes(actor.actorType)) {
    throw new ForbiddenError(
      `Operation requires one of: ${allowed.join(", ")}`,
    );
  }
}

export function requireAdmin(actor: Actor) {
  if (!isAdmin(actor)) {
    throw new ForbiddenError("Operation requires the admin role");
  }
}

export function isStaff(actor: Actor): boolean {
  return (
    actor.actorType === ActorType.AGENT || actor.actorType === ActorType.SYSTEM
  );
}
