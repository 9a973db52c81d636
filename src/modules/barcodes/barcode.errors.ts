// src/modules/barcodes/barcode.errors.ts

import {
  ConflictError,
  InvalidStateError,
  NotFoundError,
} from "@/lib/errors/errors";
import type { BarcodeStatus } from "./barcode.types";

export class BarcodeNotFoundError extends NotFoundError {
  constructor(public readonly barcode: string) {
    super(`Barcode ${barcode} not found`, "BARCODE_NOT_FOUND");
  }
}

export class BarcodeAlreadyActivatedError extends ConflictError {
  constructor(barcode: string) {
    super(`Barcode ${barcode} has already been activated`, "BARCODE_ALREADY_ACTIVATED");
  }
}

export class BarcodeRevokedError extends ConflictError {
  constructor(barcode: string) {
    super(`Barcode ${barcode} has been revoked`, "BARCODE_REVOKED");
  }
}

export class BarcodeStateError extends InvalidStateError {
  constructor(barcode: string, status: BarcodeStatus, attempted: string) {
    super(
      `Cannot ${attempted} barcode ${barcode} while it is ${status}`,
      status,
      [],
      "BARCODE_INVALID_STATE",
    );
  }
}
