// src/modules/batches/collisionDetector.ts
// Purpose: Draws a candidate per slot and regenerates on collision within the slot's retry budget.
// The unique index stays the source of truth; in-batch checks only avoid wasted round trips.

import type { Clock } from "@/lib/clock";
import { newId } from "@/utils/uuid";
import type { BarcodeCandidateSource } from "@/modules/barcodes/barcodeIdentifier";
import {
  CollisionResolution,
  type CollisionRecord,
  type CollisionType,
} from "./batch.types";

/** Returns the collision type when the candidate is already taken, else null. */
export type TakenCheck = (candidate: string) => CollisionType | null;

export type SlotDraw =
  | {
      accepted: true;
      slot: number;
      candidate: string;
      attempt: number;
      collisions: CollisionRecord[];
    }
  | {
      accepted: false;
      slot: number;
      lastCandidate: string;
      attempts: number;
      collisions: CollisionRecord[];
    };

export class CollisionDetector {
  constructor(
    private readonly batchId: string,
    private readonly source: BarcodeCandidateSource,
    private readonly maxRetries: number,
    private readonly clock: Clock,
  ) {}

  /** Total attempts a slot may consume, first draw included. */
  get attemptBudget(): number {
    return this.maxRetries + 1;
  }

  draw(slot: number, isTaken: TakenCheck): SlotDraw {
    return this.drawFrom(slot, 0, isTaken, []);
  }

  /**
   * A staged candidate was rejected after the fact (store pre-screen or a
   * concurrent writer winning the unique index). Records the collision and
   * continues the slot from its next attempt.
   */
  redraw(
    slot: number,
    rejected: { candidate: string; attempt: number },
    type: CollisionType,
    isTaken: TakenCheck,
  ): SlotDraw {
    const collisions = [this.collision(slot, rejected.candidate, type, rejected.attempt)];
    return this.drawFrom(slot, rejected.attempt + 1, isTaken, collisions);
  }

  private drawFrom(
    slot: number,
    firstAttempt: number,
    isTaken: TakenCheck,
    collisions: CollisionRecord[],
  ): SlotDraw {
    let lastCandidate = "";

    for (let attempt = firstAttempt; attempt <= this.maxRetries; attempt++) {
      const candidate = this.source.candidate(slot, attempt);
      lastCandidate = candidate;

      const taken = isTaken(candidate);
      if (taken === null) {
        return { accepted: true, slot, candidate, attempt, collisions };
      }

      collisions.push(this.collision(slot, candidate, taken, attempt));
    }

    return {
      accepted: false,
      slot,
      lastCandidate: lastCandidate || (collisions.at(-1)?.candidate ?? ""),
      attempts: this.attemptBudget,
      collisions,
    };
  }

  private collision(
    slot: number,
    candidate: string,
    collisionType: CollisionType,
    attempt: number,
  ): CollisionRecord {
    const at = this.clock.now();
    return {
      id: newId(),
      batchId: this.batchId,
      slot,
      candidate,
      collisionType,
      // the last attempt of a slot has no successor
      resolution:
        attempt < this.maxRetries
          ? CollisionResolution.REGENERATED
          : CollisionResolution.DROPPED,
      detectedAt: at,
      resolvedAt: at,
    };
  }
}
