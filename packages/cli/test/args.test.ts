import { describe, it, expect } from "vitest";
import { parseArgs, UsageError } from "../src/args.js";

describe("parseArgs", () => {
	it("returns only empty params and rest for no arguments", () => {
		expect(parseArgs([])).toEqual({ params: {}, rest: [] });
	});

	it("takes the first positional as the command and the rest as text", () => {
		const args = parseArgs(["plan", "Install", "nginx", "on", "Ubuntu"]);
		expect(args.command).toBe("plan");
		expect(args.subcommand).toBeUndefined();
		expect(args.rest).toEqual(["Install", "nginx", "on", "Ubuntu"]);
	});

	it("takes a subcommand for artifacts", () => {
		const args = parseArgs(["artifacts", "record", "site.yml", "Install nginx"]);
		expect(args.command).toBe("artifacts");
		expect(args.subcommand).toBe("record");
		expect(args.rest).toEqual(["site.yml", "Install nginx"]);
	});

	it("parses boolean flags anywhere", () => {
		const args = parseArgs(["plan", "--write", "Install nginx", "--json"]);
		expect(args.write).toBe(true);
		expect(args.json).toBe(true);
		expect(args.rest).toEqual(["Install nginx"]);
	});

	it("parses -h and -v", () => {
		expect(parseArgs(["-h"]).help).toBe(true);
		expect(parseArgs(["--version"]).version).toBe(true);
	});

	it("collects repeated --param pairs", () => {
		const args = parseArgs(["plan", "--param", "package=nginx", "--param", "replace_line=Listen 8080=ok"]);
		expect(args.params).toEqual({ package: "nginx", replace_line: "Listen 8080=ok" });
	});

	it("parses --catalog, --store and --os", () => {
		const args = parseArgs(["intents", "--catalog", "c.json", "--store", "s.db", "--os", "fedora"]);
		expect(args).toMatchObject({ command: "intents", catalog: "c.json", store: "s.db", os: "fedora" });
	});

	it("rejects an unknown OS target", () => {
		expect(() => parseArgs(["--os", "windows"])).toThrow(
			'--os must be one of debian-family, redhat-family, fedora, all, unspecified, got "windows"',
		);
	});

	it("rejects a flag without its value", () => {
		expect(() => parseArgs(["--catalog"])).toThrow(UsageError);
		expect(() => parseArgs(["--store", "--json"])).toThrow("--store requires a value");
	});

	it("rejects a malformed --param", () => {
		expect(() => parseArgs(["--param", "package"])).toThrow('--param expects key=value, got "package"');
		expect(() => parseArgs(["--param", "=nginx"])).toThrow(UsageError);
	});

	it("rejects unknown options", () => {
		expect(() => parseArgs(["plan", "--force"])).toThrow("Unknown option --force");
	});
});
