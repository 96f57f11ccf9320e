/**
 * Tests for the artifact index (ArtifactIndex + schema).
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { StoreError } from "@playsmith/core";
import type { ArtifactRecord } from "@playsmith/intent";
import { ArtifactIndex } from "../src/artifact-index.js";
import { openDatabase, integrityCheck } from "../src/db/database.js";
import { initArtifactSchema, getSchemaVersion, ARTIFACT_SCHEMA_VERSION } from "../src/db/schema.js";

function artifact(overrides: Partial<ArtifactRecord> = {}): ArtifactRecord {
	return {
		intentName: "install_package",
		params: { package: "nginx" },
		osTarget: "debian-family",
		createdAt: 1_700_000_000_000,
		locationRef: "output/install_package_debian-family_20231114_221320.yml",
		...overrides,
	};
}

describe("ArtifactIndex", () => {
	let index: ArtifactIndex;

	beforeEach(() => {
		index = ArtifactIndex.inMemory();
	});

	afterEach(() => {
		index.close();
	});

	describe("record / get", () => {
		it("round-trips every field", () => {
			index.record(artifact({ params: { package: "nginx", service_state: "started" } }));
			expect(index.get("output/install_package_debian-family_20231114_221320.yml")).toEqual({
				intentName: "install_package",
				params: { package: "nginx", service_state: "started" },
				osTarget: "debian-family",
				createdAt: 1_700_000_000_000,
				locationRef: "output/install_package_debian-family_20231114_221320.yml",
			});
		});

		it("returns frozen records", () => {
			const stored = index.record(artifact());
			expect(Object.isFrozen(stored)).toBe(true);
			expect(Object.isFrozen(index.get(stored.locationRef)?.params)).toBe(true);
		});

		it("replaces a record at the same location", () => {
			index.record(artifact());
			index.record(artifact({ params: { package: "apache2" } }));
			expect(index.count()).toBe(1);
			expect(index.get(artifact().locationRef)?.params).toEqual({ package: "apache2" });
		});

		it("returns undefined for an unknown location", () => {
			expect(index.get("nowhere.yml")).toBeUndefined();
		});
	});

	describe("list", () => {
		beforeEach(() => {
			index.record(artifact({ locationRef: "b.yml", createdAt: 100 }));
			index.record(artifact({ locationRef: "a.yml", createdAt: 100 }));
			index.record(artifact({ locationRef: "c.yml", createdAt: 300 }));
			index.record(artifact({ locationRef: "u.yml", createdAt: 200, intentName: "create_user", params: { username: "alice" } }));
		});

		it("orders newest first, then by location", () => {
			expect(index.list().map((a) => a.locationRef)).toEqual(["c.yml", "u.yml", "a.yml", "b.yml"]);
		});

		it("filters by intent", () => {
			expect(index.list("create_user").map((a) => a.locationRef)).toEqual(["u.yml"]);
			expect(index.list("schedule_job")).toEqual([]);
		});
	});

	describe("remove", () => {
		it("reports whether a record was removed", () => {
			index.record(artifact());
			expect(index.remove(artifact().locationRef)).toBe(true);
			expect(index.remove(artifact().locationRef)).toBe(false);
			expect(index.count()).toBe(0);
		});
	});

	describe("snapshot", () => {
		it("is not affected by later writes", () => {
			index.record(artifact({ locationRef: "first.yml" }));
			const snapshot = index.snapshot();
			index.record(artifact({ locationRef: "second.yml" }));
			index.remove("first.yml");

			expect(snapshot.map((a) => a.locationRef)).toEqual(["first.yml"]);
			expect(Object.isFrozen(snapshot)).toBe(true);
			expect(index.snapshot().map((a) => a.locationRef)).toEqual(["second.yml"]);
		});
	});

	describe("close", () => {
		it("throws StoreError once closed", () => {
			index.close();
			expect(index.isOpen).toBe(false);
			expect(() => index.list()).toThrow(StoreError);
			expect(() => index.list()).toThrow("Artifact index is closed");
		});

		it("can be closed twice", () => {
			index.close();
			expect(() => index.close()).not.toThrow();
		});
	});
});

describe("ArtifactIndex (file-backed)", () => {
	let tmpDir: string;

	beforeEach(() => {
		tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "playsmith-store-test-"));
	});

	afterEach(() => {
		fs.rmSync(tmpDir, { recursive: true, force: true });
	});

	it("creates the file and its directory", () => {
		const dbPath = path.join(tmpDir, "nested", "artifacts.db");
		const index = ArtifactIndex.open({ dbPath });
		index.close();
		expect(fs.existsSync(dbPath)).toBe(true);
	});

	it("persists across opens", () => {
		const dbPath = path.join(tmpDir, "artifacts.db");
		const writer = ArtifactIndex.open({ dbPath });
		writer.record(artifact());
		writer.close();

		const reader = ArtifactIndex.open({ dbPath });
		expect(reader.list()).toHaveLength(1);
		reader.close();
	});

	it("defaults to the playsmith home", () => {
		const previous = process.env.PLAYSMITH_HOME;
		process.env.PLAYSMITH_HOME = tmpDir;
		try {
			const index = ArtifactIndex.open();
			expect(index.dbPath).toBe(path.join(tmpDir, "artifacts.db"));
			index.close();
		} finally {
			process.env.PLAYSMITH_HOME = previous;
		}
	});

	it("reports a corrupt row as a StoreError", () => {
		const dbPath = path.join(tmpDir, "artifacts.db");
		const db = openDatabase(dbPath);
		initArtifactSchema(db);
		db.prepare("INSERT INTO artifacts VALUES (?, ?, ?, ?, ?)").run("bad.yml", "install_package", "solaris", "{}", 1);
		db.close();

		const index = ArtifactIndex.open({ dbPath });
		expect(() => index.get("bad.yml")).toThrow(/Corrupt artifact row bad.yml: os_target Expected one of/);
		index.close();
	});

	it("wraps open failures in StoreError", () => {
		const blocker = path.join(tmpDir, "file");
		fs.writeFileSync(blocker, "");
		expect(() => ArtifactIndex.open({ dbPath: path.join(blocker, "artifacts.db") })).toThrow(StoreError);
	});
});

describe("schema", () => {
	it("records its version and is idempotent", () => {
		const db = openDatabase(":memory:");
		initArtifactSchema(db);
		initArtifactSchema(db);
		expect(getSchemaVersion(db, "artifacts")).toBe(ARTIFACT_SCHEMA_VERSION);
		expect(integrityCheck(db)).toBe("ok");
		db.close();
	});
});
