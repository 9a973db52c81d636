// src/modules/batches/batch.controller.ts

import type { NextFunction, Request, Response } from "express";
import { requestActor } from "@/middleware/resolveActor";
import { respond } from "@/lib/http/respond";
import { parseInput } from "@/lib/validation/parseInput";
import { PageQuerySchema } from "@/utils/pagination";
import type { BatchService } from "./batch.service";
import { BatchListQuerySchema, CollisionQuerySchema } from "./batch.schemas";

const ListQuery = BatchListQuerySchema.merge(PageQuerySchema);
const CollisionQuery = CollisionQuerySchema.merge(PageQuerySchema);

export function createBatchController(batches: BatchService) {
  return {
    async create(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(res, 201, await batches.create(requestActor(req), req.body));
      } catch (err) {
        next(err);
      }
    },

    async list(req: Request, res: Response, next: NextFunction) {
      try {
        const { page, pageSize, ...filter } = parseInput(ListQuery, req.query, "Invalid query");
        await respond(res, 200, await batches.list(requestActor(req), filter, { page, pageSize }));
      } catch (err) {
        next(err);
      }
    },

    async get(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(res, 200, await batches.get(requestActor(req), req.params.id));
      } catch (err) {
        next(err);
      }
    },

    async start(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(res, 200, await batches.start(requestActor(req), req.params.id));
      } catch (err) {
        next(err);
      }
    },

    async cancel(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(
          res,
          200,
          await batches.cancel(requestActor(req), req.params.id, req.body ?? {}),
        );
      } catch (err) {
        next(err);
      }
    },

    async progress(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(res, 200, await batches.progress(requestActor(req), req.params.id));
      } catch (err) {
        next(err);
      }
    },

    async collisions(req: Request, res: Response, next: NextFunction) {
      try {
        const { page, pageSize, ...filter } = parseInput(
          CollisionQuery,
          req.query,
          "Invalid query",
        );
        await respond(
          res,
          200,
          await batches.listCollisions(requestActor(req), req.params.id, filter, {
            page,
            pageSize,
          }),
        );
      } catch (err) {
        next(err);
      }
    },

    async barcodes(req: Request, res: Response, next: NextFunction) {
      try {
        const page = parseInput(PageQuerySchema, req.query, "Invalid query");
        await respond(
          res,
          200,
          await batches.listBarcodes(requestActor(req), req.params.id, page),
        );
      } catch (err) {
        next(err);
      }
    },
  };
}
