import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";
import { getLogger } from "./logger.js";

const log = getLogger("db");

/** Open (or create) the database and make sure the schema exists. `:memory:` works for tests. */
export async function openDatabase(filename: string): Promise<Database> {
  const db = await open({ filename, driver: sqlite3.Database });
  await db.exec("PRAGMA foreign_keys = ON");

  await db.exec(`
    CREATE TABLE IF NOT EXISTS plans (
      id TEXT PRIMARY KEY,
      goal TEXT NOT NULL,
      timeframe TEXT,
      start_date TEXT,
      tasks_json TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  await db.exec(`
    CREATE TABLE IF NOT EXISTS generation_logs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      plan_id TEXT NOT NULL,
      prompt TEXT NOT NULL,
      response TEXT NOT NULL,
      tokens_used INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      FOREIGN KEY (plan_id) REFERENCES plans(id) ON DELETE CASCADE
    )
  `);

  await db.exec("CREATE INDEX IF NOT EXISTS idx_plans_created_at ON plans(created_at)");
  await db.exec("CREATE INDEX IF NOT EXISTS idx_logs_plan_id ON generation_logs(plan_id)");

  log.info({ filename }, "database ready");
  return db;
}
