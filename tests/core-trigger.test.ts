import { describe, expect, it } from "vitest";
import { describeTriggers, matchesBranch, matchesTrigger, resolveTriggerEvent } from "../src/core/trigger.js";
import { makeWorkflow } from "./support/fixtures.js";

const workflow = makeWorkflow([], {
	events: ["push", "pull_request"],
	triggers: [
		{ event: "push", branches: ["main", "release/**"], branchesIgnore: ["release/legacy/**"] },
		{ event: "pull_request", branches: [], branchesIgnore: [] },
	],
});

describe("trigger matching", () => {
	it("matches glob branch patterns", () => {
		expect(matchesBranch("release/**", "release/1.2/hotfix")).toBe(true);
		expect(matchesBranch("feature/*", "feature/a/b")).toBe(false);
		expect(matchesBranch("feature/*", "feature/login")).toBe(true);
		expect(matchesBranch("v?", "v1")).toBe(true);
		expect(matchesBranch("v1.0", "v1x0")).toBe(false);
	});

	it("applies branch filters and ignores per event", () => {
		expect(matchesTrigger(workflow, resolveTriggerEvent("push", "main"))).toBe(true);
		expect(matchesTrigger(workflow, resolveTriggerEvent("push", "release/2.0"))).toBe(true);
		expect(matchesTrigger(workflow, resolveTriggerEvent("push", "release/legacy/1.0"))).toBe(false);
		expect(matchesTrigger(workflow, resolveTriggerEvent("push", "feature/x"))).toBe(false);
		expect(matchesTrigger(workflow, resolveTriggerEvent("pull_request", "feature/x"))).toBe(true);
		expect(matchesTrigger(workflow, resolveTriggerEvent("workflow_dispatch", "main"))).toBe(false);
	});

	it("creates an immutable event with a short branch name", () => {
		const event = resolveTriggerEvent("push", "refs/heads/main", "/tmp/payload.json");
		expect(event).toEqual({ name: "push", branch: "main", payloadPath: "/tmp/payload.json" });
		expect(Object.isFrozen(event)).toBe(true);
	});

	it("describes triggers for messages", () => {
		expect(describeTriggers(workflow)).toBe("push [main, release/**], pull_request");
		expect(describeTriggers(makeWorkflow([], { triggers: [] }))).toBe("no triggers");
	});
});
