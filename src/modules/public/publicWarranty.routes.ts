// src/modules/public/publicWarranty.routes.ts

import { Router, type Router as ExpressRouter } from "express";
import type { PublicWarrantyService } from "./publicWarranty.service";
import { createPublicWarrantyController } from "./publicWarranty.controller";

export function createPublicWarrantyRoutes(service: PublicWarrantyService): ExpressRouter {
  const router: ExpressRouter = Router();
  const controller = createPublicWarrantyController(service);

  router.post("/validate", controller.validate);
  router.post("/lookup", controller.lookup);
  router.post("/coverage", controller.coverage);

  return router;
}
