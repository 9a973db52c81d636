// src/modules/public/publicWarranty.controller.ts
// Unauthenticated handlers. Not-found validations are answered 200 with valid=false.

import type { NextFunction, Request, Response } from "express";
import { respond } from "@/lib/http/respond";
import type { PublicWarrantyService } from "./publicWarranty.service";

export function createPublicWarrantyController(service: PublicWarrantyService) {
  return {
    async validate(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(res, 200, await service.validate(req.body));
      } catch (err) {
        next(err);
      }
    },

    async lookup(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(res, 200, await service.lookup(req.body));
      } catch (err) {
        next(err);
      }
    },

    async coverage(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(res, 200, await service.coverage(req.body));
      } catch (err) {
        next(err);
      }
    },
  };
}
