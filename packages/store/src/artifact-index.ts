/**
 * ArtifactIndex — the record of every playbook generated so far.
 *
 * The files themselves live wherever the generator wrote them; the index
 * keeps what the matcher needs (intent, parameters, OS target, creation
 * time) keyed by location. `snapshot()` is the read accessor the decision
 * engine consumes: take it once per session and reuse it.
 */

import { StoreError, createLogger, v, type Logger } from "@playsmith/core";
import type { ArtifactRecord, ArtifactSource, OsTarget } from "@playsmith/intent";
import { MEMORY_DATABASE, openDatabase, type SqliteDatabase } from "./db/database.js";
import { initArtifactSchema } from "./db/schema.js";

interface ArtifactRow {
	location_ref: string;
	intent_name: string;
	os_target: string;
	params: string;
	created_at: number;
}

const osTargetV = v.enum<OsTarget>("debian-family", "redhat-family", "fedora", "all", "unspecified").validate;
const paramsV = v.record(v.string().validate).validate;

function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}

export interface ArtifactIndexOptions {
	/** Database file, or `":memory:"`. Defaults to `$PLAYSMITH_HOME/artifacts.db`. */
	dbPath?: string;
	logger?: Logger;
}

export class ArtifactIndex implements ArtifactSource {
	private db: SqliteDatabase | null;
	private readonly log: Logger;
	readonly dbPath: string;

	private constructor(db: SqliteDatabase, dbPath: string, log: Logger) {
		this.db = db;
		this.dbPath = dbPath;
		this.log = log;
	}

	/**
	 * Open (or create) an index and bring its schema up to date.
	 *
	 * @throws {StoreError} when the database cannot be opened.
	 */
	static open(options: ArtifactIndexOptions = {}): ArtifactIndex {
		const log = options.logger ?? createLogger("store");
		let db: SqliteDatabase | undefined;
		try {
			db = openDatabase(options.dbPath);
			initArtifactSchema(db);
		} catch (err) {
			db?.close();
			throw new StoreError(`Cannot open artifact index ${options.dbPath ?? "(default)"}: ${toError(err).message}`, toError(err));
		}
		log.debug("artifact index opened", { dbPath: db.name });
		return new ArtifactIndex(db, db.name, log);
	}

	/** A throwaway index for tests and dry runs. */
	static inMemory(): ArtifactIndex {
		return ArtifactIndex.open({ dbPath: MEMORY_DATABASE });
	}

	/**
	 * Store an artifact, replacing any earlier record at the same location.
	 */
	record(artifact: ArtifactRecord): ArtifactRecord {
		const db = this.ensureOpen();
		const stored: ArtifactRecord = Object.freeze({
			intentName: artifact.intentName,
			params: Object.freeze({ ...artifact.params }),
			osTarget: artifact.osTarget,
			createdAt: artifact.createdAt,
			locationRef: artifact.locationRef,
		});
		this.run("record", () =>
			db
				.prepare(
					`INSERT OR REPLACE INTO artifacts (location_ref, intent_name, os_target, params, created_at)
					 VALUES (?, ?, ?, ?, ?)`,
				)
				.run(stored.locationRef, stored.intentName, stored.osTarget, JSON.stringify(stored.params), stored.createdAt),
		);
		this.log.info("artifact recorded", { intent: stored.intentName, locationRef: stored.locationRef });
		return stored;
	}

	get(locationRef: string): ArtifactRecord | undefined {
		const db = this.ensureOpen();
		const row = this.run("get", () =>
			db.prepare<[string], ArtifactRow>("SELECT * FROM artifacts WHERE location_ref = ?").get(locationRef),
		);
		return row ? this.fromRow(row) : undefined;
	}

	/**
	 * All artifacts, newest first (ties by location), optionally of one intent.
	 */
	list(intentName?: string): ArtifactRecord[] {
		const db = this.ensureOpen();
		const rows = this.run("list", () =>
			intentName === undefined
				? db.prepare<[], ArtifactRow>("SELECT * FROM artifacts ORDER BY created_at DESC, location_ref ASC").all()
				: db
						.prepare<[string], ArtifactRow>(
							"SELECT * FROM artifacts WHERE intent_name = ? ORDER BY created_at DESC, location_ref ASC",
						)
						.all(intentName),
		);
		return rows.map((row) => this.fromRow(row));
	}

	/** Forget an artifact. Returns whether anything was removed. The file is left alone. */
	remove(locationRef: string): boolean {
		const db = this.ensureOpen();
		const result = this.run("remove", () =>
			db.prepare("DELETE FROM artifacts WHERE location_ref = ?").run(locationRef),
		);
		if (result.changes > 0) this.log.info("artifact removed", { locationRef });
		return result.changes > 0;
	}

	count(): number {
		const db = this.ensureOpen();
		const row = this.run("count", () => db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM artifacts").get());
		return row?.n ?? 0;
	}

	/**
	 * A frozen copy of every record. Later writes, here or by another
	 * process, do not show up in a snapshot already taken.
	 */
	snapshot(): readonly ArtifactRecord[] {
		return Object.freeze(this.list());
	}

	close(): void {
		if (this.db) {
			this.db.close();
			this.db = null;
		}
	}

	get isOpen(): boolean {
		return this.db !== null;
	}

	// ─── Internals ──────────────────────────────────────────────────────

	private ensureOpen(): SqliteDatabase {
		if (!this.db) throw new StoreError("Artifact index is closed");
		return this.db;
	}

	private run<T>(operation: string, fn: () => T): T {
		try {
			return fn();
		} catch (err) {
			if (err instanceof StoreError) throw err;
			throw new StoreError(`Artifact index ${operation} failed: ${toError(err).message}`, toError(err));
		}
	}

	private fromRow(row: ArtifactRow): ArtifactRecord {
		let rawParams: unknown;
		try {
			rawParams = JSON.parse(row.params);
		} catch (err) {
			throw new StoreError(`Corrupt artifact row ${row.location_ref}: params is not JSON`, toError(err));
		}
		const params = paramsV(rawParams);
		if (!params.valid) {
			throw new StoreError(`Corrupt artifact row ${row.location_ref}: params ${params.error}`);
		}
		const osTarget = osTargetV(row.os_target);
		if (!osTarget.valid) {
			throw new StoreError(`Corrupt artifact row ${row.location_ref}: os_target ${osTarget.error}`);
		}
		return Object.freeze({
			intentName: row.intent_name,
			params: Object.freeze(params.value),
			osTarget: osTarget.value,
			createdAt: row.created_at,
			locationRef: row.location_ref,
		});
	}
}
