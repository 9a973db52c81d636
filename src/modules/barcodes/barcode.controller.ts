// src/modules/barcodes/barcode.controller.ts

import type { NextFunction, Request, Response } from "express";
import { requestActor } from "@/middleware/resolveActor";
import { respond } from "@/lib/http/respond";
import type { BarcodeService } from "./barcode.service";

/** Barcodes travel in the path; they are matched in upper case. */
function barcodeParam(req: Request): string {
  return req.params.barcode.trim().toUpperCase();
}

export function createBarcodeController(barcodes: BarcodeService) {
  return {
    async get(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(res, 200, await barcodes.get(requestActor(req), barcodeParam(req)));
      } catch (err) {
        next(err);
      }
    },

    async activate(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(
          res,
          200,
          await barcodes.activate(requestActor(req), barcodeParam(req), req.body ?? {}),
        );
      } catch (err) {
        next(err);
      }
    },

    async revoke(req: Request, res: Response, next: NextFunction) {
      try {
        await respond(
          res,
          200,
          await barcodes.revoke(requestActor(req), barcodeParam(req), req.body ?? {}),
        );
      } catch (err) {
        next(err);
      }
    },
  };
}
