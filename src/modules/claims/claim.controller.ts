// src/modules/claims/claim.controller.ts

import type { NextFunction, Request, Response } from "express";
import { requestActor } from "@/middleware/resolveActor";
import { respond } from "@/lib/http/respond";
import { parseInput } from "@/lib/validation/parseInput";
import { PageQuerySchema } from "@/utils/pagination";
import type { ClaimService } from "./claim.service";
import { ClaimListQuerySchema } from "./claim.schemas";

const ListQuery = ClaimListQuerySchema.merge(PageQuerySchema);

type Handler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/** Wraps a `(actor, claimId, body)` service call as a POST handler. */
function claimAction<T>(
  status: number,
  run: (req: Request) => Promise<T>,
): Handler {
  return async (req, res, next) => {
    try {
      await respond(res, status, await run(req));
    } catch (err) {
      next(err);
    }
  };
}

export function createClaimController(claims: ClaimService) {
  return {
    submit: claimAction(201, (req) => claims.submit(requestActor(req), req.body)),

    bulkStatus: claimAction(200, (req) => claims.bulkStatus(requestActor(req), req.body)),

    async list(req: Request, res: Response, next: NextFunction) {
      try {
        const { page, pageSize, ...filter } = parseInput(ListQuery, req.query, "Invalid query");
        await respond(res, 200, await claims.list(requestActor(req), filter, { page, pageSize }));
      } catch (err) {
        next(err);
      }
    },

    async mine(req: Request, res: Response, next: NextFunction) {
      try {
        const page = parseInput(PageQuerySchema, req.query, "Invalid query");
        await respond(res, 200, await claims.mine(requestActor(req), page));
      } catch (err) {
        next(err);
      }
    },

    get: claimAction(200, (req) => claims.get(requestActor(req), req.params.id)),

    timeline: claimAction(200, (req) => claims.timeline(requestActor(req), req.params.id)),

    validate: claimAction(200, (req) =>
      claims.validate(requestActor(req), req.params.id, req.body ?? {}),
    ),

    reject: claimAction(200, (req) => claims.reject(requestActor(req), req.params.id, req.body)),

    requestInfo: claimAction(200, (req) =>
      claims.requestInfo(requestActor(req), req.params.id, req.body),
    ),

    assign: claimAction(200, (req) =>
      claims.assignTechnician(requestActor(req), req.params.id, req.body),
    ),

    transition: claimAction(200, (req) =>
      claims.transition(requestActor(req), req.params.id, req.body),
    ),

    complete: claimAction(200, (req) =>
      claims.complete(requestActor(req), req.params.id, req.body),
    ),

    addNote: claimAction(201, (req) => claims.addNote(requestActor(req), req.params.id, req.body)),

    feedback: claimAction(200, (req) =>
      claims.feedback(requestActor(req), req.params.id, req.body),
    ),
  };
}
