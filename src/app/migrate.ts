import { readdir, readFile, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { logger } from "../logger";
import { AuctionsError, MigrationError } from "../errors";
import { MigrationStore } from "./store";

export const MigrationsDir = resolve(__dirname, "../../migrations");

export interface MigrationResult {
  readonly applied: string[];
  readonly skipped: string[];
  readonly total: number;
}

async function listMigrationFiles(dir: string): Promise<string[]> {
  return (await readdir(dir)).filter((f) => f.endsWith(".sql")).sort();
}

/**
 * Applies pending SQL migrations in filename order. Each file runs in its own
 * transaction together with its schema_migrations record.
 */
export async function runMigrations(
  store: MigrationStore,
  dir: string = MigrationsDir,
): Promise<MigrationResult> {
  const files = await listMigrationFiles(dir);
  await store.ensureMigrationsTable();
  const alreadyApplied = await store.appliedMigrations();

  const applied: string[] = [];
  const skipped: string[] = [];
  for (const file of files) {
    if (alreadyApplied.has(file)) {
      skipped.push(file);
      continue;
    }
    const sql = await readFile(join(dir, file), "utf-8");
    logger.info({ migration: file }, "Applying migration");
    try {
      await store.applyMigration(file, sql);
    } catch (error) {
      throw new MigrationError(file, error);
    }
    applied.push(file);
  }

  logger.info(
    { applied: applied.length, skipped: skipped.length },
    applied.length > 0 ? "Migrations applied" : "No migrations to apply",
  );
  return { applied, skipped, total: files.length };
}

function timestamp(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return [
    now.getUTCFullYear(),
    pad(now.getUTCMonth() + 1),
    pad(now.getUTCDate()),
    pad(now.getUTCHours()),
    pad(now.getUTCMinutes()),
    pad(now.getUTCSeconds()),
  ].join("");
}

/**
 * Writes an empty migration named YYYYMMDDHHMMSS_<name>.sql
 * @returns Path of the new file
 */
export async function makeMigration(
  name: string,
  dir: string = MigrationsDir,
  now: Date = new Date(),
): Promise<string> {
  const slug = name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  if (slug === "") {
    throw new AuctionsError(`Invalid migration name: "${name}"`);
  }
  const path = join(dir, `${timestamp(now)}_${slug}.sql`);
  await writeFile(path, `-- ${slug}\n`, { flag: "wx" });
  logger.info({ path }, "Created migration");
  return path;
}
