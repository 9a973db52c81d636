// src/modules/barcodes/barcode.routes.ts

import { Router, type RequestHandler, type Router as ExpressRouter } from "express";
import type { BarcodeService } from "./barcode.service";
import { createBarcodeController } from "./barcode.controller";

export function createBarcodeRoutes(
  barcodes: BarcodeService,
  idempotent: RequestHandler,
): ExpressRouter {
  const router: ExpressRouter = Router();
  const controller = createBarcodeController(barcodes);

  router.get("/:barcode", controller.get);
  router.post("/:barcode/activate", idempotent, controller.activate);
  router.post("/:barcode/revoke", idempotent, controller.revoke);

  return router;
}
