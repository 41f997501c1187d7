import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import type { RunRecord } from "../src/core/types.js";
import { createRunEventPersister, getLegLogFileName, openLegLog, RunStore } from "../src/store/run-store.js";
import { makeTmpDir } from "./support/fixtures.js";

function readRecord(baseDir: string, runId: string): RunRecord {
	return JSON.parse(fs.readFileSync(path.join(baseDir, runId, "run.json"), "utf-8"));
}

describe("run store", () => {
	it("names leg log files after the leg id", () => {
		expect(getLegLogFileName("build (ubuntu-latest, 1.79.0)")).toMatch(/^build-ubuntu-latest-1.79.0-[0-9a-f]{8}\.log$/);
		expect(getLegLogFileName("Build")).not.toBe(getLegLogFileName("build"));
	});

	it("appends to leg logs and creates their directory", async () => {
		const logPath = path.join(makeTmpDir("store-log"), "logs", "leg.log");
		const messages: string[] = [];

		for (const line of ["one\n", "two\n"]) {
			const stream = openLegLog(logPath, (message) => messages.push(message));
			stream.write(line);
			await new Promise<void>((resolve) => stream.end(() => resolve()));
		}

		expect(fs.readFileSync(logPath, "utf-8")).toBe("one\ntwo\n");
		expect(messages).toEqual([]);
	});

	it("reports a leg log that cannot be written once", async () => {
		const logPath = path.join(makeTmpDir("store-log"), "leg.log");
		fs.mkdirSync(logPath);
		const messages: string[] = [];

		const stream = openLegLog(logPath, (message) => messages.push(message));
		stream.write("one\n");
		stream.write("two\n");
		await new Promise<void>((resolve) => stream.end(() => resolve()));
		await new Promise<void>((resolve) => setImmediate(() => resolve()));

		expect(messages).toHaveLength(1);
		expect(messages[0]).toMatch(/^warning: leg log .*leg\.log could not be written: EISDIR/);
	});

	it("keeps run ids inside the runs directory", () => {
		const store = new RunStore(path.join(makeTmpDir("store"), "runs"));
		expect(() => store.createRunDir("../escape")).toThrow("Invalid run id: path escapes base directory");
	});

	it("persists runtime events into run.json", () => {
		const baseDir = path.join(makeTmpDir("store"), "runs");
		const persist = createRunEventPersister(new RunStore(baseDir));

		persist({
			type: "run-started",
			runId: "run-1",
			workflowId: "ci",
			event: { name: "push", branch: "main" },
			jobs: [
				{
					jobId: "build",
					legs: [
						{ legId: "build (a)", name: "build (a)", matrix: { os: "a" } },
						{ legId: "build (b)", name: "build (b)", matrix: { os: "b" } },
					],
				},
			],
			logDir: "/logs",
			createdAt: "2026-01-01T00:00:00.000Z",
		});
		expect(readRecord(baseDir, "run-1")).toMatchObject({
			schemaVersion: 1,
			id: "run-1",
			status: "running",
			jobs: [{ jobId: "build", status: "pending" }],
		});

		persist({ type: "job-started", runId: "run-1", jobId: "build" });
		persist({
			type: "leg-started",
			runId: "run-1",
			legId: "build (a)",
			startedAt: "2026-01-01T00:00:01.000Z",
			logPath: "/logs/a.log",
		});
		persist({
			type: "step-finished",
			runId: "run-1",
			legId: "build (a)",
			step: { stepId: "build-step-1", name: "Test", status: "failed", failureKind: "test" },
		});
		let record = readRecord(baseDir, "run-1");
		expect(record.legs[0]).toMatchObject({ status: "running", logPath: "/logs/a.log" });
		expect(record.legs[0]?.steps).toEqual([
			{ stepId: "build-step-1", name: "Test", status: "failed", failureKind: "test" },
		]);

		persist({
			type: "leg-finished",
			runId: "run-1",
			leg: {
				legId: "build (a)",
				jobId: "build",
				name: "build (a)",
				matrix: { os: "a" },
				status: "failed",
				failureKind: "test",
				steps: [{ stepId: "build-step-1", name: "Test", status: "failed", failureKind: "test" }],
			},
		});
		persist({ type: "legs-canceled", runId: "run-1", legIds: ["build (b)"] });
		persist({ type: "job-finished", runId: "run-1", jobId: "build", status: "failed" });
		persist({ type: "run-finished", runId: "run-1", status: "failed", finishedAt: "2026-01-01T00:00:05.000Z" });
		persist({ type: "job-started", runId: "other-run", jobId: "build" });

		record = readRecord(baseDir, "run-1");
		expect(record.status).toBe("failed");
		expect(record.finishedAt).toBe("2026-01-01T00:00:05.000Z");
		expect(record.jobs).toEqual([{ jobId: "build", status: "failed" }]);
		expect(record.legs.map((leg) => [leg.legId, leg.status, leg.failureKind])).toEqual([
			["build (a)", "failed", "test"],
			["build (b)", "canceled", undefined],
		]);
		expect(fs.existsSync(path.join(baseDir, "other-run"))).toBe(false);
	});
});
