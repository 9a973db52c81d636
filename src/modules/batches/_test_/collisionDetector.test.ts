// src/modules/batches/_test_/collisionDetector.test.ts

import { describe, expect, it } from "vitest";
import { ManualClock } from "@/lib/clock";
import { constantCandidateSource, scriptedCandidateSource } from "@/testing/fakes";
import { createSeededCandidateSource } from "@/modules/barcodes/barcodeIdentifier";
import { CollisionDetector, type TakenCheck } from "../collisionDetector";
import { CollisionResolution, CollisionType } from "../batch.types";

const clock = new ManualClock("2024-03-01T09:00:00.000Z");
const seeded = createSeededCandidateSource({
  prefix: "WB",
  year: 2024,
  entropy: Buffer.from("detector-entropy"),
});

function takenFrom(codes: string[]): TakenCheck {
  const taken = new Set(codes);
  return (candidate) => (taken.has(candidate) ? CollisionType.DUPLICATE_IN_BATCH : null);
}

describe("CollisionDetector", () => {
  it("should accept the first free candidate without collisions", () => {
    const detector = new CollisionDetector("batch-1", seeded, 3, clock);
    const draw = detector.draw(1, takenFrom([]));

    expect(draw).toMatchObject({ accepted: true, slot: 1, attempt: 0, collisions: [] });
    expect(detector.attemptBudget).toBe(4);
  });

  it("should regenerate after a taken candidate and record it", () => {
    const source = scriptedCandidateSource({ "4:0": "WB-2024-TAKEN001" }, seeded);
    const detector = new CollisionDetector("batch-1", source, 3, clock);

    const draw = detector.draw(4, takenFrom(["WB-2024-TAKEN001"]));

    expect(draw.accepted).toBe(true);
    if (!draw.accepted) return;
    expect(draw.attempt).toBe(1);
    expect(draw.candidate).toBe(seeded.candidate(4, 1));
    expect(draw.collisions).toHaveLength(1);
    expect(draw.collisions[0]).toMatchObject({
      batchId: "batch-1",
      slot: 4,
      candidate: "WB-2024-TAKEN001",
      collisionType: CollisionType.DUPLICATE_IN_BATCH,
      resolution: CollisionResolution.REGENERATED,
    });
  });

  it("should drop the slot once the retry budget is spent", () => {
    const detector = new CollisionDetector(
      "batch-1",
      constantCandidateSource("WB-2024-SAMESAME"),
      2,
      clock,
    );

    const draw = detector.draw(9, takenFrom(["WB-2024-SAMESAME"]));

    expect(draw.accepted).toBe(false);
    if (draw.accepted) return;
    expect(draw.attempts).toBe(3);
    expect(draw.lastCandidate).toBe("WB-2024-SAMESAME");
    expect(draw.collisions.map((c) => c.resolution)).toEqual([
      CollisionResolution.REGENERATED,
      CollisionResolution.REGENERATED,
      CollisionResolution.DROPPED,
    ]);
  });

  it("should continue a rejected slot from its next attempt", () => {
    const detector = new CollisionDetector("batch-1", seeded, 3, clock);

    const draw = detector.redraw(
      2,
      { candidate: seeded.candidate(2, 0), attempt: 0 },
      CollisionType.DUPLICATE_IN_STORE,
      takenFrom([]),
    );

    expect(draw).toMatchObject({ accepted: true, attempt: 1, candidate: seeded.candidate(2, 1) });
    expect(draw.collisions).toHaveLength(1);
    expect(draw.collisions[0]).toMatchObject({
      collisionType: CollisionType.DUPLICATE_IN_STORE,
      resolution: CollisionResolution.REGENERATED,
    });
  });

  it("should fail a slot rejected on its last attempt", () => {
    const detector = new CollisionDetector("batch-1", seeded, 2, clock);

    const draw = detector.redraw(
      5,
      { candidate: "WB-2024-LASTTRY1", attempt: 2 },
      CollisionType.DUPLICATE_IN_STORE,
      takenFrom([]),
    );

    expect(draw).toMatchObject({ accepted: false, attempts: 3, lastCandidate: "WB-2024-LASTTRY1" });
    expect(draw.collisions[0]?.resolution).toBe(CollisionResolution.DROPPED);
  });
});
