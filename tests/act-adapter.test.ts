import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import type { StepProgress } from "../src/core/engine.js";
import { expandMatrix } from "../src/core/matrix.js";
import type { Job } from "../src/core/types.js";
import {
	ActAdapter,
	buildActArgs,
	buildEventPayload,
	ensureEventPayload,
	formatActCommand,
} from "../src/engines/act/act-adapter.js";
import { type FakeHandler, FakeCommandRunner } from "./support/fake-runner.js";
import { makeContext, makeJob, makeStep, makeTmpDir } from "./support/fixtures.js";

describe("act arguments", () => {
	it("builds the act invocation for a matrix leg", () => {
		const context = makeContext("/repo", {
			workflowsPath: "/repo/.github/workflows",
			containerArchitecture: "arm64",
			platformMap: { "ubuntu-latest": "catthehacker/ubuntu:act-latest" },
			envFile: "/repo/.env",
		});

		expect(
			buildActArgs(context, {
				jobId: "build",
				matrix: { toolchain: "1.79.0" },
				eventPath: "/repo/.legwork/event-push.json",
				env: { RUST_LOG: "info" },
			}),
		).toEqual([
			"act",
			"push",
			"--workflows",
			"/repo/.github/workflows",
			"--job",
			"build",
			"--rm",
			"--eventpath",
			"/repo/.legwork/event-push.json",
			"--matrix",
			"toolchain:1.79.0",
			"--env",
			"RUST_LOG=info",
			"--container-architecture",
			"linux/arm64",
			"--platform",
			"ubuntu-latest=catthehacker/ubuntu:act-latest",
			"--env-file",
			"/repo/.env",
		]);
	});

	it("keeps a fully qualified container architecture", () => {
		const context = makeContext("/repo", { containerArchitecture: "linux/amd64" });
		expect(buildActArgs(context, { jobId: "lint", matrix: null })).toEqual([
			"act",
			"push",
			"--workflows",
			path.join("/repo", ".github", "workflows"),
			"--job",
			"lint",
			"--rm",
			"--container-architecture",
			"linux/amd64",
		]);
	});

	it("redacts env values and quotes arguments with spaces in the printed command", () => {
		expect(formatActCommand(["act", "push", "--env", "TOKEN=test-secret", "--job", "my job"])).toBe(
			'act push --env TOKEN=<redacted> --job "my job"',
		);
	});
});

describe("event payloads", () => {
	it("describes push and pull_request events", () => {
		const repository = { full_name: "local/local", name: "local", owner: { login: "local" } };
		expect(buildEventPayload({ name: "push", branch: "main" })).toEqual({ ref: "refs/heads/main", repository });
		expect(buildEventPayload({ name: "pull_request", branch: "release/1.x" })).toEqual({
			action: "opened",
			number: 1,
			repository,
			pull_request: { number: 1, head: { ref: "local" }, base: { ref: "release/1.x" } },
		});
	});

	it("writes a payload once and prefers a provided one", () => {
		const runDir = path.join(makeTmpDir("act-event"), "run");
		const written = ensureEventPayload({ name: "push", branch: "main" }, runDir);

		expect(written).toBe(path.join(runDir, "event-push.json"));
		expect(JSON.parse(fs.readFileSync(written, "utf-8"))).toMatchObject({ ref: "refs/heads/main" });
		expect(ensureEventPayload({ name: "push", branch: "main", payloadPath: written }, "/elsewhere")).toBe(written);
	});
});

describe("act adapter", () => {
	const job: Job = makeJob("build", {
		runsOn: "ubuntu-latest",
		steps: [
			makeStep("build", 0, { uses: "actions/checkout@v4" }),
			makeStep("build", 1, { name: "Build", run: "cargo build" }),
			makeStep("build", 2, { name: "Test", run: "cargo test" }),
		],
	});

	async function runAct(handler: FakeHandler) {
		const repoRoot = makeTmpDir("act");
		const runner = new FakeCommandRunner(handler);
		const adapter = new ActAdapter({ runner });
		const context = makeContext(repoRoot);
		const progress: StepProgress[] = [];
		const output: string[] = [];
		const logPath = path.join(context.logsDir, "build.log");
		const [leg] = expandMatrix(job);
		if (!leg) {
			throw new Error("missing leg");
		}
		const result = await adapter.runLeg(
			{
				leg,
				job,
				environment: { CI: "true", GITHUB_EVENT_NAME: "push", RUST_LOG: "info" },
				logPath,
				signal: new AbortController().signal,
				onStep: (item) => progress.push(item),
			},
			{ ...context, onOutput: (chunk) => output.push(chunk) },
		);
		return { result, runner, progress, output: output.join(""), log: fs.readFileSync(logPath, "utf-8"), context };
	}

	const actOutput = [
		"[CI/build] ⭐ Run Main actions/checkout@v4",
		"[CI/build]   ✅  Success - Main actions/checkout@v4",
		"[CI/build] ⭐ Run Main Build",
		"[CI/build]   | Compiling app v0.1.0",
		"[CI/build]   ✅  Success - Main Build [2.1s]",
		"[CI/build] ⭐ Run Main Test",
		"[CI/build]   | test result: FAILED",
		"[CI/build]   ❌  Failure - Main Test [0.4s]",
		"",
	].join("\n");

	it("maps act step markers to the job's steps and classifies the failure", async () => {
		const { result, runner, progress } = await runAct(() => ({ exitCode: 1, stdout: actOutput }));

		expect(result).toMatchObject({ status: "failed", failureKind: "test", reason: "Test: act exited with 1" });
		expect(result.steps.map((step) => [step.name, step.status])).toEqual([
			["actions/checkout@v4", "success"],
			["Build", "success"],
			["Test", "failed"],
		]);
		expect(progress.filter((item) => item.type === "step-started")).toHaveLength(3);
		expect(runner.requests[0]?.command).toBe("act");
		expect(runner.requests[0]?.args).toEqual(
			expect.arrayContaining(["--job", "build", "--env", "RUST_LOG=info"]),
		);
		expect(runner.requests[0]?.args).not.toContain("CI=true");
	});

	it("reformats act output for the terminal and keeps the raw log", async () => {
		const { output, log } = await runAct(() => ({ exitCode: 1, stdout: actOutput }));

		expect(output).toContain("▾ Main Build\nCompiling app v0.1.0\n✓ Main Build [2.1s]\n");
		expect(output).toContain("✗ Main Test [0.4s]\n");
		expect(log).toContain("[CI/build]   | Compiling app v0.1.0\n");
		expect(log).toMatch(/^\$ act push --workflows \S+ --job build --rm --eventpath \S+event-push\.json --env RUST_LOG=<redacted>/);
	});

	it("succeeds when act exits cleanly", async () => {
		const { result } = await runAct(() => ({ exitCode: 0, stdout: actOutput.replace("❌  Failure", "✅  Success") }));
		expect(result.status).toBe("success");
		expect(result.steps.map((step) => step.status)).toEqual(["success", "success", "success"]);
	});

	it("reports a missing act binary as a provisioning error", async () => {
		const { result } = await runAct(() => ({ exitCode: 127, error: "command not found: act" }));
		expect(result).toMatchObject({ status: "failed", failureKind: "provisioning", reason: "command not found: act" });
	});

	it("falls back to a command failure when no step is identified", async () => {
		const { result } = await runAct(() => ({ exitCode: 2, stdout: "Error: workflow is not valid\n" }));
		expect(result).toMatchObject({ status: "failed", failureKind: "command", reason: "act exited with 2" });
		expect(result.steps.every((step) => step.status === "skipped")).toBe(true);
	});

	it("returns canceled when the run is aborted", async () => {
		const { result } = await runAct(() => ({ exitCode: 130, aborted: true }));
		expect(result).toMatchObject({ status: "canceled", reason: "canceled" });
	});

	it("only hosts Linux runners unless a platform is mapped", () => {
		const adapter = new ActAdapter({ runner: new FakeCommandRunner() });
		const context = makeContext("/repo");
		const leg = { legId: "win", jobId: "win", name: "win", matrix: null, runsOn: "windows-latest" };

		expect(adapter.checkRunner({ ...leg, runsOn: "ubuntu-22.04" }, context)).toEqual({ ok: true });
		expect(adapter.checkRunner(leg, context)).toEqual({
			ok: false,
			reason: "act only runs Linux containers; map windows-latest with runtime.platformMap to run it",
		});
		expect(adapter.checkRunner(leg, { ...context, platformMap: { "windows-latest": "img" } })).toEqual({ ok: true });
	});
});
