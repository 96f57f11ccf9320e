import { describe, it, expect } from "vitest";
import { loadCatalog } from "../src/catalog.js";
import { decide } from "../src/decision.js";
import type { ArtifactRecord, ParsedRequest } from "../src/types.js";

const catalog = loadCatalog();
const options = { reuseThreshold: 0.8 };

function request(overrides: Partial<ParsedRequest> = {}): ParsedRequest {
	return {
		rawText: "Install nginx on Ubuntu",
		intentName: "install_package",
		confidence: 0.5,
		params: { package: "nginx" },
		osTarget: "debian-family",
		...overrides,
	};
}

function artifact(overrides: Partial<ArtifactRecord> = {}): ArtifactRecord {
	return {
		intentName: "install_package",
		params: { package: "nginx" },
		osTarget: "debian-family",
		createdAt: 1_700_000_000_000,
		locationRef: "output/nginx.yml",
		...overrides,
	};
}

describe("decide", () => {
	it("asks to restate when the intent is unknown", () => {
		const decision = decide(request({ intentName: "unknown", confidence: 0, params: {} }), [artifact()], catalog, options);
		expect(decision).toEqual({
			kind: "clarify",
			reason: "unclassified",
			intents: catalog.intents.map((i) => i.name),
		});
	});

	it("reuses an identical artifact", () => {
		const decision = decide(request(), [artifact()], catalog, options);
		expect(decision.kind).toBe("reuse");
		if (decision.kind !== "reuse") return;
		expect(decision.score).toBe(1);
		expect(decision.locationRef).toBe("output/nginx.yml");
		expect(decision.candidates).toEqual([]);
	});

	it("reuses at exactly the threshold", () => {
		const decision = decide(request(), [artifact({ osTarget: "redhat-family" })], catalog, options);
		expect(decision).toMatchObject({ kind: "reuse", score: 0.8, locationRef: "output/nginx.yml" });
	});

	it("generates when the top score is just under the threshold", () => {
		const decision = decide(request(), [artifact({ osTarget: "redhat-family" })], catalog, { reuseThreshold: 0.81 });
		expect(decision.kind).toBe("generate-deterministic");
		if (decision.kind !== "generate-deterministic") return;
		expect(decision.template).toBe("install_package.yml");
		expect(decision.params).toEqual({ package: "nginx" });
		expect(decision.candidates.map((c) => c.score)).toEqual([0.8]);
	});

	it("keeps the runners-up on a reuse decision", () => {
		const best = artifact({ locationRef: "best.yml", createdAt: 2 });
		const runnerUp = artifact({ locationRef: "other.yml", createdAt: 1, params: { package: "nginx-full" } });
		const decision = decide(request(), [runnerUp, best], catalog, options);
		expect(decision).toMatchObject({ kind: "reuse", locationRef: "best.yml" });
		if (decision.kind !== "reuse") return;
		expect(decision.candidates.map((c) => c.artifact.locationRef)).toEqual(["other.yml"]);
	});

	it("asks for missing required parameters", () => {
		const decision = decide(request({ params: {} }), [], catalog, options);
		expect(decision).toEqual({
			kind: "clarify",
			reason: "missing-params",
			intentName: "install_package",
			missing: ["package"],
			candidates: [],
		});
	});

	it("prefers reuse over asking for parameters", () => {
		const decision = decide(request({ params: {} }), [artifact({ params: {} })], catalog, options);
		expect(decision.kind).toBe("reuse");
	});

	it("routes fallback-only intents to the fallback generator", () => {
		const parsed = request({
			rawText: "Setup HAProxy load balancer",
			intentName: "configure_load_balancer",
			params: {},
			osTarget: "unspecified",
		});
		expect(decide(parsed, [], catalog, options)).toEqual({
			kind: "generate-fallback",
			intentName: "configure_load_balancer",
			rawText: "Setup HAProxy load balancer",
			params: {},
			osTarget: "unspecified",
			candidates: [],
		});
	});

	it("never reuses across intents", () => {
		const decision = decide(request(), [artifact({ intentName: "deploy_docker" })], catalog, options);
		expect(decision.kind).toBe("generate-deterministic");
	});
});
