import { promises as fs } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { closePool, getPool } from "../db.js";

const migrationsDir = fileURLToPath(new URL("../../migrations/", import.meta.url));

async function main(): Promise<void> {
  const files = (await fs.readdir(migrationsDir))
    .filter((file) => file.endsWith(".sql"))
    .sort((a, b) => a.localeCompare(b));

  const pool = getPool();
  await pool.query(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
       version TEXT PRIMARY KEY,
       applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`
  );

  const client = await pool.connect();
  try {
    for (const file of files) {
      const already = await client.query<{ version: string }>(
        `SELECT version FROM schema_migrations WHERE version = $1`,
        [file]
      );
      if (already.rowCount && already.rowCount > 0) {
        continue;
      }
      const sql = await fs.readFile(path.join(migrationsDir, file), "utf8");
      await client.query("BEGIN");
      try {
        await client.query(sql);
        await client.query(`INSERT INTO schema_migrations (version) VALUES ($1)`, [file]);
        await client.query("COMMIT");
        console.log(`Applied migration: ${file}`);
      } catch (error) {
        await client.query("ROLLBACK");
        throw error;
      }
    }
  } finally {
    client.release();
  }

  await closePool();
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
