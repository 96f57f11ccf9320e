import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { CatalogError } from "@playsmith/core";
import { loadCatalog, parseCatalog, findIntent, intentNames } from "../src/catalog.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function doc(intents: unknown[], extra: Record<string, unknown> = {}): Record<string, unknown> {
	return {
		version: 1,
		parameters: [{ name: "port", recognizer: { kind: "port" } }, { name: "host" }],
		osVocabulary: [{ phrase: "ubuntu", target: "debian-family" }],
		lookups: { hostPorts: { web: "80" } },
		intents,
		...extra,
	};
}

function intent(overrides: Record<string, unknown> = {}): Record<string, unknown> {
	return {
		name: "open_port",
		triggerPatterns: [{ forms: ["open"] }, { forms: ["port"] }],
		requiredParams: ["port"],
		generationPath: "deterministic",
		...overrides,
	};
}

function issuesOf(raw: unknown): readonly string[] {
	try {
		parseCatalog(raw);
	} catch (err) {
		if (err instanceof CatalogError) return err.issues;
		throw err;
	}
	throw new Error("expected parseCatalog to fail");
}

// ─── Default Catalog ────────────────────────────────────────────────────────

describe("loadCatalog (packaged)", () => {
	const catalog = loadCatalog();

	it("lists the eight intents in order", () => {
		expect(intentNames(catalog)).toEqual([
			"install_package",
			"configure_firewall",
			"create_user",
			"deploy_docker",
			"restart_service",
			"update_config",
			"configure_load_balancer",
			"schedule_job",
		]);
	});

	it("normalizes multi-word forms into token phrases", () => {
		const install = findIntent(catalog, "install_package");
		expect(install?.triggerPatterns[0].forms).toContainEqual(["set", "up"]);
		expect(install?.triggerPatterns[0].capture).toBe("package");
	});

	it("marks the load balancer and scheduling intents as fallback only", () => {
		expect(findIntent(catalog, "configure_load_balancer")?.generationPath).toBe("fallback");
		expect(findIntent(catalog, "schedule_job")?.generationPath).toBe("fallback");
		expect(findIntent(catalog, "deploy_docker")?.template).toBe("deploy_docker.yml");
	});

	it("is frozen", () => {
		expect(Object.isFrozen(catalog)).toBe(true);
		expect(Object.isFrozen(catalog.intents[0])).toBe(true);
		expect(Object.isFrozen(catalog.intents[0].triggerPatterns[0].forms)).toBe(true);
	});

	it("returns undefined for names it does not have", () => {
		expect(findIntent(catalog, "unknown")).toBeUndefined();
	});
});

describe("loadCatalog (files)", () => {
	it("reports an unreadable file", () => {
		const missing = path.join(os.tmpdir(), "playsmith-no-such-catalog.json");
		expect(() => loadCatalog(missing)).toThrow(CatalogError);
		expect(() => loadCatalog(missing)).toThrow(/cannot read file/);
	});

	it("reports invalid JSON with the file path", () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "playsmith-catalog-"));
		const file = path.join(dir, "intents.json");
		fs.writeFileSync(file, "{ not json");
		expect(() => loadCatalog(file)).toThrow(`Invalid intent catalog (${file}): not valid JSON`);
		fs.rmSync(dir, { recursive: true, force: true });
	});
});

// ─── Validation ─────────────────────────────────────────────────────────────

describe("parseCatalog", () => {
	it("accepts a minimal catalog", () => {
		const catalog = parseCatalog(doc([intent()]));
		expect(catalog.intents[0].optionalParams).toEqual([]);
		expect(catalog.intents[0].derive).toEqual([]);
		expect(catalog.fillerWords).toEqual([]);
	});

	it("reads the required flag of a trigger pattern", () => {
		const catalog = parseCatalog(doc([intent({ triggerPatterns: [{ forms: ["open"] }, { forms: ["port"], required: true }] })]));
		expect(catalog.intents[0].triggerPatterns.map((p) => p.required)).toEqual([false, true]);
		expect(issuesOf(doc([intent({ triggerPatterns: [{ forms: ["open"], required: "yes" }] })]))).toEqual([
			"intents[0]: triggerPatterns: [0]: required: Expected boolean, received string",
		]);
	});

	it("rejects a catalog with no intents", () => {
		expect(() => parseCatalog(doc([]))).toThrow("Invalid intent catalog: intents: the catalog declares no intents");
	});

	it("rejects a non-array intent list", () => {
		expect(issuesOf({ ...doc([]), intents: {} })).toEqual(["intents: Expected array, received object"]);
	});

	it("rejects an intent with zero trigger patterns", () => {
		expect(issuesOf(doc([intent({ triggerPatterns: [] })]))).toEqual(["intent 'open_port': has no trigger patterns"]);
	});

	it("rejects a pattern with zero surface forms", () => {
		const issues = issuesOf(doc([intent({ triggerPatterns: [{ forms: [] }] })]));
		expect(issues).toEqual(["intent 'open_port' pattern 0: has no surface forms"]);
	});

	it("rejects a form that normalizes to nothing", () => {
		const issues = issuesOf(doc([intent({ triggerPatterns: [{ forms: ["!!"] }] })]));
		expect(issues).toEqual(["intent 'open_port' pattern 0: phrase \"!!\" is empty after normalization"]);
	});

	it("rejects duplicate intent names", () => {
		expect(issuesOf(doc([intent(), intent()]))).toEqual(["intents[1]: duplicate intent name 'open_port'"]);
	});

	it("reserves the unknown sentinel", () => {
		expect(issuesOf(doc([intent({ name: "unknown" })]))).toEqual(["intents[0]: 'unknown' is reserved"]);
	});

	it("rejects parameters missing from the parameter table", () => {
		const issues = issuesOf(doc([intent({ requiredParams: ["username"] })]));
		expect(issues).toEqual(["intent 'open_port': parameter 'username' is not in the parameter table"]);
	});

	it("rejects a capture of an undeclared parameter", () => {
		const issues = issuesOf(doc([intent({ triggerPatterns: [{ forms: ["open"], capture: "host" }] })]));
		expect(issues).toEqual(["intent 'open_port' pattern 0: captures undeclared parameter 'host'"]);
	});

	it("rejects an unknown generation path", () => {
		expect(issuesOf(doc([intent({ generationPath: "magic" })]))).toEqual([
			"intent 'open_port': unknown generation path \"magic\"",
		]);
	});

	it("rejects an unknown recognizer kind", () => {
		const raw = doc([intent()], { parameters: [{ name: "port", recognizer: { kind: "regex" } }] });
		expect(() => parseCatalog(raw)).toThrow(/recognizer: kind: Expected one of after, port, choice, flag, path, list/);
	});

	it("rejects a derivation naming an undefined lookup", () => {
		const raw = doc([
			intent({
				optionalParams: ["host"],
				derive: [{ param: "port", from: "host", lookup: "nope" }],
			}),
		]);
		expect(issuesOf(raw)).toEqual(["intent 'open_port': derivation of 'port' names unknown lookup 'nope'"]);
	});

	it("reports every bad intent at once", () => {
		const issues = issuesOf(doc([intent({ name: "unknown" }), intent({ name: "x", triggerPatterns: [] })]));
		expect(issues).toEqual(["intents[0]: 'unknown' is reserved", "intent 'x': has no trigger patterns"]);
	});

	it("names the source in the message", () => {
		expect(() => parseCatalog(doc([]), "custom.json")).toThrow("Invalid intent catalog (custom.json):");
	});
});
