// src/lib/store/postgres.store.ts
// Postgres-backed store. Every repository call outside `transaction` auto-commits.

import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from "pg";
import { withTransaction, type Queryable } from "@/lib/db";
import { DeadlineExceededError } from "@/lib/errors/errors";
import { getRemainingTimeMs } from "@/lib/observability/request-context";
import type { StoreTx, WarrantyStore } from "./store.types";
import { translatePgError } from "./postgres/sql";
import { createPgBarcodeRepository } from "./postgres/barcodes.pg";
import { createPgBatchRepository } from "./postgres/batches.pg";
import { createPgClaimRepository } from "./postgres/claims.pg";
import { createPgTicketRepository } from "./postgres/tickets.pg";
import { createPgAttachmentRepository } from "./postgres/attachments.pg";
import { createPgTimelineRepository } from "./postgres/timeline.pg";
import {
  createPgIdempotencyRepository,
  createPgSequenceRepository,
} from "./postgres/sequences.pg";

function translating(db: Pool | PoolClient): Queryable {
  return {
    async query<R extends QueryResultRow = QueryResultRow>(
      text: string,
      values?: unknown[],
    ): Promise<QueryResult<R>> {
      try {
        return db instanceof Pool
          ? await db.query<R>(text, values)
          : await db.query<R>(text, values);
      } catch (err) {
        throw translatePgError(err);
      }
    },
  };
}

function repositories(db: Queryable): StoreTx {
  return {
    barcodes: createPgBarcodeRepository(db),
    batches: createPgBatchRepository(db),
    claims: createPgClaimRepository(db),
    tickets: createPgTicketRepository(db),
    attachments: createPgAttachmentRepository(db),
    timeline: createPgTimelineRepository(db),
    sequences: createPgSequenceRepository(db),
    idempotency: createPgIdempotencyRepository(db),
  };
}

export class PostgresWarrantyStore implements WarrantyStore {
  readonly barcodes: StoreTx["barcodes"];
  readonly batches: StoreTx["batches"];
  readonly claims: StoreTx["claims"];
  readonly tickets: StoreTx["tickets"];
  readonly attachments: StoreTx["attachments"];
  readonly timeline: StoreTx["timeline"];
  readonly sequences: StoreTx["sequences"];
  readonly idempotency: StoreTx["idempotency"];

  constructor(private readonly pool: Pool) {
    const repos = repositories(translating(pool));
    this.barcodes = repos.barcodes;
    this.batches = repos.batches;
    this.claims = repos.claims;
    this.tickets = repos.tickets;
    this.attachments = repos.attachments;
    this.timeline = repos.timeline;
    this.sequences = repos.sequences;
    this.idempotency = repos.idempotency;
  }

  async transaction<T>(fn: (tx: StoreTx) => Promise<T>): Promise<T> {
    const remaining = getRemainingTimeMs();
    if (remaining !== undefined && remaining <= 0) {
      throw new DeadlineExceededError();
    }

    try {
      return await withTransaction(
        this.pool,
        (client) => fn(repositories(translating(client))),
        remaining,
      );
    } catch (err) {
      throw translatePgError(err);
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query("SELECT 1");
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
