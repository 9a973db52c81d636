// src/lib/store/postgres/sequences.pg.ts

import type { Queryable } from "@/lib/db";
import type {
  IdempotencyRecord,
  IdempotencyRepository,
  SequenceRepository,
} from "../store.types";

export function createPgSequenceRepository(db: Queryable): SequenceRepository {
  return {
    async next(name, year) {
      const result = await db.query<{ value: number }>(
        `INSERT INTO number_sequences (name, year, value)
         VALUES ($1, $2, 1)
         ON CONFLICT (name, year)
         DO UPDATE SET value = number_sequences.value + 1
         RETURNING value`,
        [name, year],
      );
      return result.rows[0].value;
    },
  };
}

type IdempotencyRow = {
  scope: string;
  key: string;
  request_hash: string;
  status: number;
  response: unknown;
  created_at: Date;
};

export function createPgIdempotencyRepository(db: Queryable): IdempotencyRepository {
  return {
    async find(scope, key) {
      const result = await db.query<IdempotencyRow>(
        `SELECT * FROM idempotency_keys WHERE scope = $1 AND key = $2`,
        [scope, key],
      );
      const row = result.rows[0];
      if (!row) return null;
      const record: IdempotencyRecord = {
        scope: row.scope,
        key: row.key,
        requestHash: row.request_hash,
        status: row.status,
        response: row.response,
        createdAt: row.created_at,
      };
      return record;
    },

    async save(record) {
      const result = await db.query(
        `INSERT INTO idempotency_keys (scope, key, request_hash, status, response, created_at)
         VALUES ($1, $2, $3, $4, $5, $6)
         ON CONFLICT (scope, key) DO NOTHING`,
        [
          record.scope,
          record.key,
          record.requestHash,
          record.status,
          JSON.stringify(record.response),
          record.createdAt,
        ],
      );
      return (result.rowCount ?? 0) === 1;
    },
  };
}
