import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { StoreError } from "@playsmith/core";
import { ArtifactIndex } from "@playsmith/store";
import { savePlaybook, type SaveTarget } from "../src/commands/plan.js";

describe("savePlaybook", () => {
	let outputDir: string;
	let index: ArtifactIndex;

	const target = (): SaveTarget => ({
		outputDir,
		intentName: "install_package",
		params: { package: "nginx" },
		osTarget: "debian-family",
		now: new Date(2024, 0, 5, 9, 3, 7),
	});

	beforeEach(() => {
		outputDir = fs.mkdtempSync(path.join(os.tmpdir(), "playsmith-save-test-"));
		index = ArtifactIndex.inMemory();
	});

	afterEach(() => {
		index.close();
		fs.rmSync(outputDir, { recursive: true, force: true });
	});

	it("writes the playbook and records it", () => {
		const filePath = savePlaybook(index, "- hosts: all\n", target());
		expect(filePath).toBe(path.join(outputDir, "install_package_debian-family_20240105_090307.yml"));
		expect(fs.readFileSync(filePath, "utf-8")).toBe("- hosts: all\n");
		expect(index.get(filePath)).toEqual({
			intentName: "install_package",
			params: { package: "nginx" },
			osTarget: "debian-family",
			createdAt: target().now.getTime(),
			locationRef: filePath,
		});
	});

	it("deletes the written file when recording fails", () => {
		index.close();
		expect(() => savePlaybook(index, "- hosts: all\n", target())).toThrow(StoreError);
		expect(fs.readdirSync(outputDir)).toEqual([]);
	});
});
