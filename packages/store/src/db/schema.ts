/**
 * Schema — DDL for the artifact index.
 *
 * Tables are created idempotently (IF NOT EXISTS). The applied version is
 * recorded in `_schema_versions` so later changes can migrate forward.
 */

import type { SqliteDatabase } from "./database.js";

// Bump when adding a migration
export const ARTIFACT_SCHEMA_VERSION = 1;

const SCHEMA_NAME = "artifacts";

/**
 * Create or migrate the artifact tables. Safe to call on every open.
 */
export function initArtifactSchema(db: SqliteDatabase): void {
	const current = getSchemaVersion(db, SCHEMA_NAME);
	if (current >= ARTIFACT_SCHEMA_VERSION) return;

	db.exec(`
		CREATE TABLE IF NOT EXISTS artifacts (
			location_ref  TEXT PRIMARY KEY,  -- usually a playbook path
			intent_name   TEXT NOT NULL,
			os_target     TEXT NOT NULL,
			params        TEXT NOT NULL,     -- JSON object of strings
			created_at    INTEGER NOT NULL   -- Unix epoch ms
		);

		CREATE INDEX IF NOT EXISTS idx_artifacts_intent ON artifacts(intent_name);
		CREATE INDEX IF NOT EXISTS idx_artifacts_created ON artifacts(created_at DESC);
	`);

	setSchemaVersion(db, SCHEMA_NAME, ARTIFACT_SCHEMA_VERSION);
}

// ─── Schema Version Tracking ────────────────────────────────────────────────

function ensureVersionTable(db: SqliteDatabase): void {
	db.exec(`
		CREATE TABLE IF NOT EXISTS _schema_versions (
			name    TEXT PRIMARY KEY,
			version INTEGER NOT NULL DEFAULT 0
		)
	`);
}

export function getSchemaVersion(db: SqliteDatabase, name: string): number {
	ensureVersionTable(db);
	const row = db
		.prepare<[string], { version: number }>("SELECT version FROM _schema_versions WHERE name = ?")
		.get(name);
	return row?.version ?? 0;
}

function setSchemaVersion(db: SqliteDatabase, name: string, version: number): void {
	ensureVersionTable(db);
	db.prepare("INSERT OR REPLACE INTO _schema_versions (name, version) VALUES (?, ?)").run(name, version);
}
