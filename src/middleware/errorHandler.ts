// src/middleware/errorHandler.ts
// Global error handler (must be last). DomainErrors become the error envelope;
// anything else is logged and answered as internal with a correlation id.

import type { NextFunction, Request, Response } from "express";
import { DomainError } from "@/lib/errors/domain-error";
import { InvalidArgumentError, PayloadTooLargeError } from "@/lib/errors/errors";
import { getRequestId } from "@/lib/observability/request-context";
import { log } from "@/lib/observability/logger";

export type ErrorEnvelope = {
  ok: false;
  error: string;
  code: string;
  kind: string;
  details?: Record<string, unknown>;
  correlationId?: string;
};

/** body-parser failures carry a `type` tag and, for size limits, the limit. */
function bodyParserFailure(err: unknown): DomainError | null {
  if (typeof err !== "object" || err === null || !("type" in err)) return null;

  if (err.type === "entity.parse.failed") {
    return new InvalidArgumentError("Malformed JSON body", [
      { field: "(body)", message: "body is not valid JSON" },
    ]);
  }
  if (err.type === "entity.too.large") {
    const limit = "limit" in err && typeof err.limit === "number" ? err.limit : 0;
    return new PayloadTooLargeError("Request body too large", limit);
  }
  return null;
}

export function toErrorEnvelope(err: DomainError): ErrorEnvelope {
  const details = err.details();
  return {
    ok: false,
    error: err.message,
    code: err.code,
    kind: err.kind,
    ...(details ? { details } : {}),
  };
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
) {
  const domain = err instanceof DomainError ? err : bodyParserFailure(err);

  if (domain) {
    if (domain.status >= 500) {
      log("WARN", "HTTP_REQUEST_DEGRADED", {
        path: req.originalUrl,
        code: domain.code,
        message: domain.message,
      });
    }
    return res.status(domain.status).json(toErrorEnvelope(domain));
  }

  const correlationId = getRequestId() ?? "unknown";
  const error = err instanceof Error ? err : new Error(String(err));

  log("ERROR", "HTTP_REQUEST_FAILED", {
    path: req.originalUrl,
    message: error.message,
    stack: error.stack,
  });

  const body: ErrorEnvelope = {
    ok: false,
    error: "Internal Server Error",
    code: "INTERNAL",
    kind: "internal",
    correlationId,
  };
  return res.status(500).json(body);
}
