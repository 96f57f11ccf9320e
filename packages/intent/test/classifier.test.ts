import { describe, it, expect } from "vitest";
import { loadCatalog } from "../src/catalog.js";
import { classifyIntent } from "../src/classifier.js";

const catalog = loadCatalog();

describe("classifyIntent", () => {
	it("scores by the fraction of trigger patterns present", () => {
		const result = classifyIntent("Open port 8080 on RHEL", catalog, 0.34);
		expect(result.intentName).toBe("configure_firewall");
		expect(result.confidence).toBe(2 / 3);
	});

	it("reports full confidence when every pattern matches", () => {
		expect(classifyIntent("Deploy redis container on Fedora", catalog, 0.34)).toMatchObject({
			intentName: "deploy_docker",
			confidence: 1,
		});
	});

	it("breaks exact ties by catalog order", () => {
		// install_package, restart_service and configure_load_balancer all score 0.5
		const result = classifyIntent("Install MySQL, start it, enable on boot", catalog, 0.34);
		const halves = result.scores.filter((s) => s.score === 0.5).map((s) => s.intentName);
		expect(halves).toEqual(["install_package", "restart_service", "configure_load_balancer"]);
		expect(result.intentName).toBe("install_package");
	});

	it("returns unknown with zero confidence when nothing matches", () => {
		const result = classifyIntent("do the thing", catalog, 0.34);
		expect(result.intentName).toBe("unknown");
		expect(result.confidence).toBe(0);
		expect(result.scores.every((s) => s.matched === 0)).toBe(true);
	});

	it("returns unknown when the best score is below the minimum", () => {
		// "enable" alone is one of three firewall patterns
		const result = classifyIntent("enable", catalog, 0.34);
		expect(result.scores[1]).toEqual({ intentName: "configure_firewall", matched: 1, total: 3, score: 1 / 3 });
		expect(result.intentName).toBe("unknown");
		expect(result.confidence).toBe(0);
	});

	it("lets a higher threshold reject partial matches", () => {
		expect(classifyIntent("Install nginx", catalog, 0.6).intentName).toBe("unknown");
		expect(classifyIntent("Install the nginx package", catalog, 0.6).intentName).toBe("install_package");
	});

	it("ignores case and surrounding punctuation", () => {
		expect(classifyIntent("RESTART Apache Service!!", catalog, 0.34).intentName).toBe("restart_service");
	});

	it("needs a container word before choosing deploy_docker", () => {
		const result = classifyIntent("Start the nginx service", catalog, 0.34);
		expect(result.scores[3]).toEqual({ intentName: "deploy_docker", matched: 1, total: 2, score: 0 });
		expect(result.intentName).toBe("restart_service");
		expect(result.confidence).toBe(1);
	});

	it("does not read a generic run verb as a container", () => {
		expect(classifyIntent("Run the backup script nightly", catalog, 0.34)).toMatchObject({
			intentName: "schedule_job",
			confidence: 0.5,
		});
		expect(classifyIntent("Run redis in docker", catalog, 0.34).intentName).toBe("deploy_docker");
	});

	it("reads set up user as creating a user", () => {
		expect(classifyIntent("Set up user bob", catalog, 0.34)).toMatchObject({ intentName: "create_user", confidence: 1 });
	});
});
