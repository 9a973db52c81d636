// src/middleware/requireInternalAccess.ts
// Guards /api/internal/* (scanner callbacks) with a shared key in x-internal-key.

import { timingSafeEqual } from "crypto";
import type { NextFunction, Request, Response } from "express";
import { ForbiddenError } from "@/lib/errors/errors";

function sameKey(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function requireInternalAccess(internalKey: string) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const provided = req.header("x-internal-key");

    if (!provided || !sameKey(provided, internalKey)) {
      return next(new ForbiddenError("Internal access key missing or invalid"));
    }

    return next();
  };
}
