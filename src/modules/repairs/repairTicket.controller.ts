// src/modules/repairs/repairTicket.controller.ts

import type { NextFunction, Request, Response } from "express";
import { requestActor } from "@/middleware/resolveActor";
import { respond } from "@/lib/http/respond";
import { parseInput } from "@/lib/validation/parseInput";
import { PageQuerySchema } from "@/utils/pagination";
import type { RepairTicketService } from "./repairTicket.service";
import { TicketListQuerySchema } from "./repairTicket.schemas";

const ListQuery = TicketListQuerySchema.merge(PageQuerySchema);

export function createRepairTicketController(repairs: RepairTicketService) {
  return {
    async create(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(res, 201, await repairs.create(requestActor(req), req.params.id, req.body));
      } catch (err) {
        next(err);
      }
    },

    async listByClaim(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(res, 200, await repairs.listByClaim(requestActor(req), req.params.id));
      } catch (err) {
        next(err);
      }
    },

    async listByTechnician(req: Request, res: Response, next: NextFunction) {
      try {
        const { technicianId, page, pageSize } = parseInput(ListQuery, req.query, "Invalid query");
        await respond(
          res,
          200,
          await repairs.listByTechnician(requestActor(req), technicianId, { page, pageSize }),
        );
      } catch (err) {
        next(err);
      }
    },

    async get(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(res, 200, await repairs.get(requestActor(req), req.params.id));
      } catch (err) {
        next(err);
      }
    },

    async assign(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(res, 200, await repairs.assign(requestActor(req), req.params.id, req.body));
      } catch (err) {
        next(err);
      }
    },

    async start(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(
          res,
          200,
          await repairs.start(requestActor(req), req.params.id, req.body ?? {}),
        );
      } catch (err) {
        next(err);
      }
    },

    async complete(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(res, 200, await repairs.complete(requestActor(req), req.params.id, req.body));
      } catch (err) {
        next(err);
      }
    },

    async qualityCheck(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(
          res,
          200,
          await repairs.qualityCheck(requestActor(req), req.params.id, req.body),
        );
      } catch (err) {
        next(err);
      }
    },

    async customerApproval(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(
          res,
          200,
          await repairs.customerApproval(requestActor(req), req.params.id, req.body),
        );
      } catch (err) {
        next(err);
      }
    },

    async cancel(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(res, 200, await repairs.cancel(requestActor(req), req.params.id, req.body));
      } catch (err) {
        next(err);
      }
    },
  };
}
