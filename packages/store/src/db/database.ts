/**
 * SQLite connection setup for the artifact index.
 *
 * File databases run in WAL mode so a reader (a second CLI invocation)
 * never blocks on a writer.
 */

import Database from "better-sqlite3";
import type BetterSqlite3 from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { getPlaysmithHome } from "@playsmith/core";

export type SqliteDatabase = BetterSqlite3.Database;

/** In-process database, gone on close. */
export const MEMORY_DATABASE = ":memory:";

/** Pragmas applied to every database on open. */
const DEFAULT_PRAGMAS: Record<string, string | number> = {
	journal_mode: "WAL",
	synchronous: "NORMAL",
	busy_timeout: 5000, // ms to wait on lock contention
	temp_store: "MEMORY",
};

/** `$PLAYSMITH_HOME/artifacts.db` */
export function defaultDatabasePath(): string {
	return path.join(getPlaysmithHome(), "artifacts.db");
}

/**
 * Open a database file (creating its directory) and apply pragmas.
 * Pass {@link MEMORY_DATABASE} for a throwaway in-memory database.
 */
export function openDatabase(dbPath: string = defaultDatabasePath()): SqliteDatabase {
	if (dbPath !== MEMORY_DATABASE) {
		fs.mkdirSync(path.dirname(dbPath), { recursive: true });
	}
	const db = new Database(dbPath);
	for (const [key, value] of Object.entries(DEFAULT_PRAGMAS)) {
		db.pragma(`${key} = ${value}`);
	}
	return db;
}

/** Result of `PRAGMA integrity_check`: "ok" for a healthy file. */
export function integrityCheck(db: SqliteDatabase): string {
	const row = db.prepare<[], { integrity_check: string }>("PRAGMA integrity_check").get();
	return row?.integrity_check ?? "unknown";
}
