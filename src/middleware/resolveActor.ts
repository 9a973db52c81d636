// src/middleware/resolveActor.ts
// Verifies the caller's Bearer token and attaches the Actor to the request.
// Tokens are issued by the upstream auth service; this service only verifies them.

import type { NextFunction, Request, Response } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { ActorType, type Actor } from "@/lib/auth/actor";
import { ForbiddenError } from "@/lib/errors/errors";
import { setContextActor } from "@/lib/observability/request-context";

declare global {
  namespace Express {
    interface Request {
      actor?: Actor;
    }
  }
}

const TokenPayloadSchema = z.object({
  sub: z.string().min(1),
  actorType: z.nativeEnum(ActorType),
  roles: z.array(z.string()).default([]),
});

function bearerToken(req: Request): string | null {
  const header = req.header("authorization");
  if (!header) return null;
  const [scheme, token] = header.split(" ");
  return scheme?.toLowerCase() === "bearer" && token ? token.trim() : null;
}

export function verifyActorToken(token: string, secret: string): Actor | null {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret);
  } catch {
    return null;
  }

  const parsed = TokenPayloadSchema.safeParse(decoded);
  if (!parsed.success) return null;

  return {
    actorId: parsed.data.sub,
    actorType: parsed.data.actorType,
    roles: parsed.data.roles,
  };
}

/** Every route behind this middleware requires a valid token. */
export function resolveActor(secret: string) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    const actor = token ? verifyActorToken(token, secret) : null;

    if (!actor) {
      return next(new ForbiddenError("A valid bearer token is required"));
    }

    req.actor = actor;
    setContextActor(actor.actorId);
    return next();
  };
}

export function requestActor(req: Request): Actor {
  if (!req.actor) throw new ForbiddenError("A valid bearer token is required");
  return req.actor;
}
