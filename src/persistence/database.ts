import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

const DEFAULT_DB_DIR = join(homedir(), ".orchestration-core");
export const DEFAULT_DB_PATH = join(DEFAULT_DB_DIR, "orchestrator.db");

/** Open (creating the default directory when needed) a WAL-mode database. `:memory:` works. */
export function openDatabase(dbPath?: string): Database.Database {
  const path = dbPath ?? DEFAULT_DB_PATH;
  if (!dbPath) {
    mkdirSync(DEFAULT_DB_DIR, { recursive: true });
  }
  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  return db;
}

/** Parse a JSON column, falling back when the stored text is corrupt or of the wrong shape. */
export function parseJsonColumn<T>(schema: z.ZodType<T>, text: string | null, fallback: T): T {
  if (text === null) return fallback;
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return fallback;
  }
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : fallback;
}
