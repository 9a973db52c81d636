// src/utils/uuid.ts
import { v4 as uuidv4 } from "uuid";

/** Primary keys for every stored row (barcodes, batches, claims, tickets, events). */
export function newId(): string {
  return uuidv4();
}
