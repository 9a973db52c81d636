// src/modules/repairs/repairTicket.routes.ts

import { Router, type RequestHandler, type Router as ExpressRouter } from "express";
import type { RepairTicketService } from "./repairTicket.service";
import { createRepairTicketController } from "./repairTicket.controller";

export function createRepairTicketRoutes(
  repairs: RepairTicketService,
  idempotent: RequestHandler,
): ExpressRouter {
  const router: ExpressRouter = Router();
  const controller = createRepairTicketController(repairs);

  router.get("/", controller.listByTechnician);
  router.get("/:id", controller.get);
  router.post("/:id/assign", idempotent, controller.assign);
  router.post("/:id/start", idempotent, controller.start);
  router.post("/:id/complete", idempotent, controller.complete);
  router.post("/:id/quality-check", idempotent, controller.qualityCheck);
  router.post("/:id/customer-approval", idempotent, controller.customerApproval);
  router.post("/:id/cancel", idempotent, controller.cancel);

  return router;
}
