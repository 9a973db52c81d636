// src/app.ts: Express application with request correlation and structured logging

import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from "express";

import cors from "cors";
import { randomUUID } from "crypto";

import type { Container } from "./container";
import { createHealthRoutes } from "./modules/health/health.controller";
import { createBatchRoutes } from "./modules/batches/batch.routes";
import { createBarcodeRoutes } from "./modules/barcodes/barcode.routes";
import { createClaimRoutes } from "./modules/claims/claim.routes";
import { createRepairTicketRoutes } from "./modules/repairs/repairTicket.routes";
import { createPublicWarrantyRoutes } from "./modules/public/publicWarranty.routes";
import { createAttachmentController } from "./modules/attachments/attachment.controller";

import { withRequestContext } from "@/lib/observability/request-context";
import { log } from "@/lib/observability/logger";
import { errorHandler, type ErrorEnvelope } from "@/middleware/errorHandler";
import { resolveActor } from "@/middleware/resolveActor";
import { idempotencyGuard } from "@/middleware/idempotency.middleware";
import { requireInternalAccess } from "@/middleware/requireInternalAccess";
import { SYSTEM_CONSTANTS } from "@/constants/system.constants";

export function createApp(container: Container): Express {
  const { config } = container;
  const app: Express = express();

  // dynamic data; no 304 revalidation
  app.set("etag", false);

  ////////////////////////////////////////////////////////////////
  // Core middleware
  ////////////////////////////////////////////////////////////////

  app.use(express.json({ limit: SYSTEM_CONSTANTS.JSON_BODY_LIMIT }));

  app.use(
    cors({
      origin: config.corsOrigin,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: [
        "Content-Type",
        "Authorization",
        "Idempotency-Key",
        "X-Request-Id",
      ],
    }),
  );

  app.use("/api", (_req, res, next) => {
    res.setHeader("Cache-Control", "no-store");
    next();
  });

  ////////////////////////////////////////////////////////////////
  // Correlation + structured logging middleware
  ////////////////////////////////////////////////////////////////

  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.header("x-request-id") ?? randomUUID();
    res.setHeader("x-request-id", requestId);

    const start = Date.now();
    const deadline = start + config.requestTimeoutMs;

    void withRequestContext(async () => {
      log("INFO", "HTTP_REQUEST_STARTED", {
        method: req.method,
        path: req.originalUrl,
      });

      res.on("finish", () => {
        log("INFO", "HTTP_REQUEST_COMPLETED", {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          durationMs: Date.now() - start,
        });
      });

      next();
    }, { requestId, deadline });
  });

  ////////////////////////////////////////////////////////////////
  // Unauthenticated routes
  ////////////////////////////////////////////////////////////////

  app.use(
    "/api",
    createHealthRoutes({ store: container.store, clock: container.clock, mode: config.mode }),
  );
  app.use("/api/public/warranty", createPublicWarrantyRoutes(container.publicWarranty));

  const internalAttachments = createAttachmentController(container.attachments);
  app.post(
    "/api/internal/attachments/:id/scan-result",
    requireInternalAccess(config.internalApiKey),
    internalAttachments.scanResult,
  );

  ////////////////////////////////////////////////////////////////
  // Authenticated routes
  ////////////////////////////////////////////////////////////////

  const authenticated = resolveActor(config.jwtSecret);
  const idempotent = idempotencyGuard(container.store.idempotency);

  app.use("/api/batches", authenticated, createBatchRoutes(container.batches, idempotent));
  app.use("/api/barcodes", authenticated, createBarcodeRoutes(container.barcodes, idempotent));
  app.use(
    "/api/claims",
    authenticated,
    createClaimRoutes(
      {
        claims: container.claims,
        attachments: container.attachments,
        repairs: container.repairs,
      },
      idempotent,
    ),
  );
  app.use("/api/tickets", authenticated, createRepairTicketRoutes(container.repairs, idempotent));

  ////////////////////////////////////////////////////////////////
  // 404 fallback
  ////////////////////////////////////////////////////////////////

  app.use((_req: Request, res: Response) => {
    const body: ErrorEnvelope = {
      ok: false,
      error: "Route not found",
      code: "ROUTE_NOT_FOUND",
      kind: "not_found",
    };
    res.status(404).json(body);
  });

  ////////////////////////////////////////////////////////////////
  // Global error handler (must be last)
  ////////////////////////////////////////////////////////////////

  app.use(errorHandler);

  return app;
}
