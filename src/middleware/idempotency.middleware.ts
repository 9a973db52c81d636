// src/middleware/idempotency.middleware.ts

import type { NextFunction, Request, Response } from "express";
import type { IdempotencyRepository } from "@/lib/store/store.types";
import { ConflictError } from "@/lib/errors/errors";
import { errorMeta, log } from "@/lib/observability/logger";
import { SYSTEM_CONSTANTS } from "@/constants/system.constants";
import { sha256Hex, stableStringify } from "@/utils/sha256";

type IdempotencyMeta = {
  repository: IdempotencyRepository;
  scope: string;
  key: string;
  requestHash: string;
};

const pending = new WeakMap<Response, IdempotencyMeta>();

function requiresIdempotency(method: string) {
  return ["POST", "PUT", "PATCH", "DELETE"].includes(method.toUpperCase());
}

function idempotencyKey(req: Request): string {
  return (req.header("Idempotency-Key") ?? req.header("x-request-key") ?? "").trim();
}

/**
 * Durable request replay keyed on Idempotency-Key.
 * - Requests without a key pass through untouched.
 * - A key seen before with the same method, url and body replays the stored response.
 * - A key reused with a different payload is a conflict.
 * Keys are scoped per caller, so one caller's key never replays another's response.
 */
export function idempotencyGuard(repository: IdempotencyRepository) {
  return async (req: Request, res: Response, next: NextFunction) => {
    if (!requiresIdempotency(req.method)) return next();

    const key = idempotencyKey(req);
    if (!key) return next();

    try {
      const scope = `${SYSTEM_CONSTANTS.IDEMPOTENCY_SCOPE_HTTP}:${req.actor?.actorId ?? "anonymous"}`;
      const requestHash = sha256Hex(
        stableStringify({
          method: req.method,
          url: req.originalUrl,
          body: req.body ?? null,
        }),
      );

      const existing = await repository.find(scope, key);

      if (existing) {
        if (existing.requestHash !== requestHash) {
          throw new ConflictError(
            "Idempotency key reused with different payload",
            "IDEMPOTENCY_KEY_REUSED",
          );
        }

        log("INFO", "IDEMPOTENT_REPLAY", { key, path: req.originalUrl });
        res.setHeader("Idempotent-Replayed", "true");
        return res.status(existing.status).json(existing.response);
      }

      pending.set(res, { repository, scope, key, requestHash });
      return next();
    } catch (err) {
      return next(err);
    }
  };
}

/**
 * Controllers call this AFTER successful processing to store the replayable response.
 * The operation has committed by then, so a failed save is logged, not surfaced.
 */
export async function commitIdempotencyResponse(
  res: Response,
  payload: unknown,
  status: number,
  now: Date = new Date(),
) {
  const meta = pending.get(res);
  if (!meta) return;
  pending.delete(res);

  try {
    await meta.repository.save({
      scope: meta.scope,
      key: meta.key,
      requestHash: meta.requestHash,
      status,
      response: payload,
      createdAt: now,
    });
  } catch (err) {
    log("WARN", "IDEMPOTENCY_SAVE_FAILED", { key: meta.key, ...errorMeta(err) });
  }
}
