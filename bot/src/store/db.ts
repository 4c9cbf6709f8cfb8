import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { dirname } from "path";
import { mkdirSync } from "fs";
import * as schema from "./schema.js";

export type SessionDb = BetterSQLite3Database<typeof schema>;

export interface OpenedDatabase {
  db: SessionDb;
  close(): void;
}

/** Open (or create) the session database. Pass ":memory:" for a throwaway one. */
export function openDatabase(dbPath: string): OpenedDatabase {
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma("journal_mode = WAL");

  // Auto-create tables on first open
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      session_name TEXT PRIMARY KEY,
      proxy TEXT,
      user_agent TEXT NOT NULL,
      farm_json TEXT NOT NULL,
      priorities_json TEXT NOT NULL,
      constellation_last_index INTEGER,
      constellation_auto_advance INTEGER NOT NULL DEFAULT 0,
      tracked_constellation_index INTEGER,
      gems_safe_balance INTEGER NOT NULL,
      buy_gacha_packs INTEGER NOT NULL DEFAULT 0,
      spend_gachas INTEGER NOT NULL DEFAULT 0,
      process_missions INTEGER NOT NULL DEFAULT 0,
      upgrade_cards INTEGER NOT NULL DEFAULT 1,
      created_at INTEGER,
      updated_at INTEGER
    );
  `);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
