// src/modules/claims/claim.routes.ts
// Claim endpoints, plus the claim-scoped attachment and repair ticket collections.

import { Router, type RequestHandler, type Router as ExpressRouter } from "express";
import type { AttachmentService } from "@/modules/attachments/attachment.service";
import { createAttachmentController } from "@/modules/attachments/attachment.controller";
import type { RepairTicketService } from "@/modules/repairs/repairTicket.service";
import { createRepairTicketController } from "@/modules/repairs/repairTicket.controller";
import type { ClaimService } from "./claim.service";
import { createClaimController } from "./claim.controller";

export type ClaimRouteServices = {
  claims: ClaimService;
  attachments: AttachmentService;
  repairs: RepairTicketService;
};

export function createClaimRoutes(
  services: ClaimRouteServices,
  idempotent: RequestHandler,
): ExpressRouter {
  const router: ExpressRouter = Router();
  const claims = createClaimController(services.claims);
  const attachments = createAttachmentController(services.attachments);
  const tickets = createRepairTicketController(services.repairs);

  // literal paths before /:id
  router.post("/", idempotent, claims.submit);
  router.get("/", claims.list);
  router.get("/mine", claims.mine);
  router.post("/bulk-status", idempotent, claims.bulkStatus);

  router.get("/:id", claims.get);
  router.get("/:id/timeline", claims.timeline);
  router.post("/:id/validate", idempotent, claims.validate);
  router.post("/:id/reject", idempotent, claims.reject);
  router.post("/:id/request-info", idempotent, claims.requestInfo);
  router.post("/:id/assign", idempotent, claims.assign);
  router.post("/:id/transition", idempotent, claims.transition);
  router.post("/:id/complete", idempotent, claims.complete);
  router.post("/:id/notes", idempotent, claims.addNote);
  router.post("/:id/feedback", idempotent, claims.feedback);

  router.post("/:id/attachments", idempotent, attachments.upload);
  router.get("/:id/attachments", attachments.list);

  router.post("/:id/tickets", idempotent, tickets.create);
  router.get("/:id/tickets", tickets.listByClaim);

  return router;
}
