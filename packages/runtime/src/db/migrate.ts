/**
 * Applies pending SQL migrations from runtime/migrations, one transaction
 * per file, recording each in schema_migrations.
 */

import { readdir, readFile } from "node:fs/promises"
import { join } from "node:path"
import { fileURLToPath } from "node:url"

import { type Logger, TracingLogger } from "@mnemos/engine"
import { z } from "zod"

const __dirname = fileURLToPath(new URL(".", import.meta.url))
export const MIGRATIONS_DIR = join(__dirname, "../../migrations")

/** The part of pg.PoolClient the runner uses. */
export interface MigrationClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>
  release(): void
}

/** The part of pg.Pool the runner uses. */
export interface MigrationPool {
  connect(): Promise<MigrationClient>
}

export interface MigrationFile {
  version: number
  name: string
  filename: string
}

const AppliedRowsSchema = z.array(z.object({ version: z.number().int() }))

/** Up migrations in `files`, ascending by version. */
export function pendingMigrations(files: readonly string[], applied: ReadonlySet<number>): MigrationFile[] {
  const pending: MigrationFile[] = []
  for (const file of files) {
    const match = /^(\d+)_(.+)\.up\.sql$/.exec(file)
    const [, digits, name] = match ?? []
    if (!digits || !name) continue
    const version = parseInt(digits, 10)
    if (applied.has(version)) continue
    pending.push({ version, name, filename: file })
  }
  return pending.sort((a, b) => a.version - b.version)
}

export async function runMigrations(
  pool: MigrationPool,
  options: { logger?: Logger; dir?: string } = {},
): Promise<MigrationFile[]> {
  const logger = options.logger ?? new TracingLogger()
  const dir = options.dir ?? MIGRATIONS_DIR
  const client = await pool.connect()

  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `)

    const applied = await client.query("SELECT version FROM schema_migrations ORDER BY version")
    const appliedSet = new Set(AppliedRowsSchema.parse(applied.rows).map((r) => r.version))
    const pending = pendingMigrations(await readdir(dir), appliedSet)

    if (pending.length === 0) {
      logger.info("No pending migrations")
      return []
    }

    for (const migration of pending) {
      const sql = await readFile(join(dir, migration.filename), "utf-8")
      logger.info("Applying migration", { version: migration.version, name: migration.name })

      await client.query("BEGIN")
      try {
        await client.query(sql)
        await client.query("INSERT INTO schema_migrations (version, name) VALUES ($1, $2)", [
          migration.version,
          migration.name,
        ])
        await client.query("COMMIT")
      } catch (err) {
        await client.query("ROLLBACK")
        throw err
      }
    }

    logger.info("Migrations applied", { count: pending.length })
    return pending
  } finally {
    client.release()
  }
}
