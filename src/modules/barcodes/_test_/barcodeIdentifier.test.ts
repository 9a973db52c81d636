// src/modules/barcodes/_test_/barcodeIdentifier.test.ts

import { describe, expect, it } from "vitest";
import {
  createSeededCandidateSource,
  encodePayload,
  formatBarcode,
  generateBarcode,
  slotCounter,
} from "../barcodeIdentifier";
import { BARCODE_PATTERN } from "../barcode.derive";

const entropy = Buffer.from("test-entropy-a");

describe("barcode identifier", () => {
  it("should format prefix, zero-padded year and a 10-digit base36 body", () => {
    const code = generateBarcode({ prefix: "WB", year: 2024, entropy, counter: 0 });

    expect(code).toMatch(/^WB-2024-[0-9A-Z]{10}$/);
    expect(BARCODE_PATTERN.test(code)).toBe(true);
    expect(formatBarcode("AB", 24, "X")).toBe("AB-0024-X");
  });

  it("should left-pad the encoded payload", () => {
    expect(encodePayload(0n)).toBe("0000000000");
    expect(encodePayload(35n)).toBe("000000000Z");
    expect(encodePayload(2n ** 48n - 1n)).toHaveLength(10);
  });

  it("should derive the same string for the same entropy and counter", () => {
    const a = generateBarcode({ prefix: "WB", year: 2024, entropy, counter: 42 });
    const b = generateBarcode({ prefix: "WB", year: 2024, entropy, counter: 42 });
    expect(a).toBe(b);
  });

  it("should diverge when entropy differs", () => {
    const a = generateBarcode({ prefix: "WB", year: 2024, entropy, counter: 7 });
    const b = generateBarcode({
      prefix: "WB",
      year: 2024,
      entropy: Buffer.from("test-entropy-b"),
      counter: 7,
    });
    expect(a).not.toBe(b);
  });

  it("should give every slot its own counter range", () => {
    expect(slotCounter(1, 0)).toBe(0);
    expect(slotCounter(1, 3)).toBe(3);
    expect(slotCounter(2, 0)).toBe(64);
    expect(slotCounter(2, 3)).toBe(67);
  });

  it("should draw seeded candidates from the slot counter", () => {
    const source = createSeededCandidateSource({ prefix: "WB", year: 2024, entropy });

    expect(source.candidate(3, 1)).toBe(
      generateBarcode({ prefix: "WB", year: 2024, entropy, counter: slotCounter(3, 1) }),
    );

    const drawn = new Set<string>();
    for (let slot = 1; slot <= 1000; slot++) drawn.add(source.candidate(slot, 0));
    expect(drawn.size).toBe(1000);
  });
});
