// src/modules/attachments/attachment.controller.ts

import type { NextFunction, Request, Response } from "express";
import { SYSTEM_ACTOR } from "@/lib/auth/actor";
import { requestActor } from "@/middleware/resolveActor";
import { respond } from "@/lib/http/respond";
import type { AttachmentService } from "./attachment.service";

export function createAttachmentController(attachments: AttachmentService) {
  return {
    async upload(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(
          res,
          201,
          await attachments.upload(requestActor(req), req.params.id, req.body),
        );
      } catch (err) {
        next(err);
      }
    },

    async list(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(res, 200, await attachments.list(requestActor(req), req.params.id));
      } catch (err) {
        next(err);
      }
    },

    /** Scanner callback; the caller is authenticated by the internal key, not a token. */
    async scanResult(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(
          res,
          200,
          await attachments.recordScanResult(SYSTEM_ACTOR, req.params.id, req.body),
        );
      } catch (err) {
        next(err);
      }
    },
  };
}
