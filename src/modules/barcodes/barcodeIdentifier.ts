// src/modules/barcodes/barcodeIdentifier.ts
// Purpose: Stateless barcode string derivation. Collisions are handled by the batch collision detector.

import crypto from "node:crypto";

const PAYLOAD_BYTES = 6; // 48-bit payload
const PAYLOAD_WIDTH = 10; // base36 digits needed for 2^48 - 1

/** Upper bound of attempts a single slot may consume inside one counter space. */
export const ATTEMPTS_PER_SLOT = 64;

export type BarcodeIdentifierInput = {
  prefix: string;
  year: number;
  /** Secret material unique to the generating worker or batch. */
  entropy: Buffer;
  counter: number;
};

/**
 * The payload is HMAC(entropy, counter), so two generators that share the
 * counter space but hold different entropy never derive the same string.
 */
export function derivePayload(entropy: Buffer, counter: number): bigint {
  const message = Buffer.alloc(8);
  message.writeBigUInt64BE(BigInt(counter));

  const digest = crypto.createHmac("sha256", entropy).update(message).digest();

  return BigInt(digest.readUIntBE(0, PAYLOAD_BYTES));
}

export function encodePayload(payload: bigint): string {
  return payload.toString(36).toUpperCase().padStart(PAYLOAD_WIDTH, "0");
}

export function formatBarcode(
  prefix: string,
  year: number,
  body: string,
): string {
  return `${prefix}-${String(year).padStart(4, "0")}-${body}`;
}

export function generateBarcode(input: BarcodeIdentifierInput): string {
  return formatBarcode(
    input.prefix,
    input.year,
    encodePayload(derivePayload(input.entropy, input.counter)),
  );
}

/** Counter for a given slot and attempt; slots are 1-based. */
export function slotCounter(slot: number, attempt: number): number {
  return (slot - 1) * ATTEMPTS_PER_SLOT + attempt;
}

export function newEntropy(): Buffer {
  return crypto.randomBytes(32);
}

////////////////////////////////////////////////////////////////
// Candidate sources
////////////////////////////////////////////////////////////////

export interface BarcodeCandidateSource {
  candidate(slot: number, attempt: number): string;
}

export function createSeededCandidateSource(args: {
  prefix: string;
  year: number;
  entropy: Buffer;
}): BarcodeCandidateSource {
  return {
    candidate(slot, attempt) {
      return generateBarcode({
        prefix: args.prefix,
        year: args.year,
        entropy: args.entropy,
        counter: slotCounter(slot, attempt),
      });
    },
  };
}
