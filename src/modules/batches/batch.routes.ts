// src/modules/batches/batch.routes.ts

import { Router, type RequestHandler, type Router as ExpressRouter } from "express";
import type { BatchService } from "./batch.service";
import { createBatchController } from "./batch.controller";

export function createBatchRoutes(
  batches: BatchService,
  idempotent: RequestHandler,
): ExpressRouter {
  const router: ExpressRouter = Router();
  const controller = createBatchController(batches);

  router.post("/", idempotent, controller.create);
  router.get("/", controller.list);
  router.get("/:id", controller.get);
  router.post("/:id/start", idempotent, controller.start);
  router.post("/:id/cancel", idempotent, controller.cancel);
  router.get("/:id/progress", controller.progress);
  router.get("/:id/collisions", controller.collisions);
  router.get("/:id/barcodes", controller.barcodes);

  return router;
}
