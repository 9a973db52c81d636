// src/lib/store/postgres/sql.ts
// Shared helpers for the Postgres repositories.

import { DatabaseError } from "pg";
import { DeadlineExceededError } from "@/lib/errors/errors";
import { DuplicateKeyError, TransientStoreError } from "../store.errors";

const TRANSIENT_SQL_STATES = new Set([
  "40001", // serialization_failure
  "40P01", // deadlock_detected
  "55P03", // lock_not_available
  "57P01", // admin_shutdown
  "08000",
  "08003",
  "08006",
]);

const TRANSIENT_NODE_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EPIPE"]);

/** Translates driver errors into the store error vocabulary. */
export function translatePgError(err: unknown): unknown {
  if (err instanceof DatabaseError) {
    if (err.code === "23505") {
      return new DuplicateKeyError(err.constraint ?? "unique", err.detail);
    }
    if (err.code === "57014") {
      return new DeadlineExceededError();
    }
    if (err.code && TRANSIENT_SQL_STATES.has(err.code)) {
      return new TransientStoreError(err.message, err.code);
    }
    return err;
  }

  if (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    TRANSIENT_NODE_CODES.has(err.code)
  ) {
    return new TransientStoreError(err.message, err.code);
  }

  return err;
}

export function toNumber(value: string | number | null): number | null {
  if (value === null) return null;
  return typeof value === "number" ? value : Number(value);
}

export function toNumberOr(value: string | number | null, fallback: number): number {
  return toNumber(value) ?? fallback;
}

////////////////////////////////////////////////////////////////
// Dynamic SET clauses
////////////////////////////////////////////////////////////////

export type ColumnSpec = {
  column: string;
  json?: boolean;
};

/**
 * Builds `col = $n` fragments for every defined key of `patch` that has a
 * column mapping. `startIndex` is the first placeholder number to use.
 */
export function buildSetClause(
  patch: object,
  columns: Record<string, ColumnSpec>,
  startIndex: number,
): { fragments: string[]; values: unknown[] } {
  const fragments: string[] = [];
  const values: unknown[] = [];

  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const columnSpec = columns[key];
    if (!columnSpec) continue;

    values.push(columnSpec.json ? JSON.stringify(value) : value);
    fragments.push(`${columnSpec.column} = $${startIndex + values.length - 1}`);
  }

  return { fragments, values };
}

/** Appends `cond` with a fresh placeholder bound to `value`. */
export class WhereBuilder {
  private readonly conditions: string[] = [];
  readonly values: unknown[] = [];

  constructor(seed: unknown[] = []) {
    this.values.push(...seed);
  }

  add(condition: (placeholder: string) => string, value: unknown) {
    if (value === undefined) return this;
    this.values.push(value);
    this.conditions.push(condition(`$${this.values.length}`));
    return this;
  }

  raw(condition: string) {
    this.conditions.push(condition);
    return this;
  }

  sql(): string {
    return this.conditions.length ? `WHERE ${this.conditions.join(" AND ")}` : "";
  }

  next(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}
