// scripts/migrate.ts
// Purpose: Applies db/migrations/*.sql in name order, once each, recording
// applied files in schema_migrations. Each file runs in its own transaction.

import fs from "fs";
import path from "path";
import { closePool, getPool, withTransaction } from "@/lib/db";
import { errorMeta, log } from "@/lib/observability/logger";

const MIGRATIONS_DIR = path.resolve(__dirname, "../db/migrations");

async function main() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) throw new Error("DATABASE_URL is required to run migrations");

  const pool = getPool(databaseUrl);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name        TEXT PRIMARY KEY,
      applied_at  TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `);

  const applied = new Set(
    (await pool.query<{ name: string }>("SELECT name FROM schema_migrations")).rows.map(
      (row) => row.name,
    ),
  );

  const files = fs
    .readdirSync(MIGRATIONS_DIR)
    .filter((file) => file.endsWith(".sql"))
    .sort();

  for (const file of files) {
    if (applied.has(file)) continue;

    const sql = fs.readFileSync(path.join(MIGRATIONS_DIR, file), "utf8");
    await withTransaction(pool, async (client) => {
      await client.query(sql);
      await client.query("INSERT INTO schema_migrations (name) VALUES ($1)", [file]);
    });

    log("INFO", "MIGRATION_APPLIED", { file });
  }
}

main()
  .then(() => closePool())
  .catch(async (err: unknown) => {
    log("ERROR", "MIGRATION_FAILED", errorMeta(err));
    await closePool();
    process.exit(1);
  });
