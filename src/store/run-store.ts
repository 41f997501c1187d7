import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { EngineRuntimeEvent } from "../core/engine.js";
import type { LegRun, RunRecord } from "../core/types.js";
import { ensureWithinBase, sanitizePathSegment } from "../utils/path-safety.js";

export const RUN_RECORD_SCHEMA_VERSION = 1;

export class RunStore {
	constructor(private readonly baseDir: string) {}

	ensureBaseDir(): void {
		fs.mkdirSync(this.baseDir, { recursive: true });
	}

	createRunDir(runId: string): string {
		this.ensureBaseDir();
		const runDir = ensureWithinBase(this.baseDir, runId, "run id");
		fs.mkdirSync(runDir, { recursive: true });
		return runDir;
	}

	createLogsDir(runId: string): string {
		const runDir = this.createRunDir(runId);
		const logsDir = path.join(runDir, "logs");
		fs.mkdirSync(logsDir, { recursive: true });
		return logsDir;
	}

	createLogFile(runId: string, legId: string): string {
		const logsDir = this.createLogsDir(runId);
		return ensureWithinBase(logsDir, getLegLogFileName(legId), "leg log file");
	}

	writeRun(run: RunRecord): void {
		const runDir = this.createRunDir(run.id);
		const recordPath = path.join(runDir, "run.json");
		fs.writeFileSync(recordPath, JSON.stringify(run, null, 2));
	}
}

/**
 * Opens a leg log for appending. A write failure is reported once through
 * `report`; the leg keeps running without its log.
 */
export function openLegLog(logPath: string, report: (message: string) => void): fs.WriteStream {
	fs.mkdirSync(path.dirname(logPath), { recursive: true });
	const stream = fs.createWriteStream(logPath, { flags: "a" });
	let reported = false;
	stream.on("error", (error) => {
		if (!reported) {
			reported = true;
			report(`warning: leg log ${logPath} could not be written: ${error.message}\n`);
		}
	});
	return stream;
}

export function getLegLogFileName(legId: string): string {
	const normalized = sanitizePathSegment(legId.toLowerCase(), "leg");
	const hash = crypto.createHash("sha1").update(legId).digest("hex").slice(0, 8);
	return `${normalized}-${hash}.log`;
}

export function createRunEventPersister(runStore: RunStore): (event: EngineRuntimeEvent) => void {
	let run: RunRecord | null = null;

	const findLeg = (legId: string): LegRun | undefined =>
		run?.legs.find((item) => item.legId === legId);

	return (event) => {
		if (event.type === "run-started") {
			run = {
				schemaVersion: RUN_RECORD_SCHEMA_VERSION,
				id: event.runId,
				workflowId: event.workflowId,
				event: event.event,
				status: "running",
				createdAt: event.createdAt,
				jobs: event.jobs.map((job) => ({ jobId: job.jobId, status: "pending" })),
				legs: event.jobs.flatMap((job) =>
					job.legs.map((leg) => ({
						legId: leg.legId,
						jobId: job.jobId,
						name: leg.name,
						matrix: leg.matrix,
						runsOn: leg.runsOn,
						status: "pending" as const,
						steps: [],
					})),
				),
				logDir: event.logDir,
			};
			runStore.writeRun(run);
			return;
		}
		if (!run || run.id !== event.runId) {
			return;
		}

		switch (event.type) {
			case "job-started":
			case "job-finished": {
				const job = run.jobs.find((item) => item.jobId === event.jobId);
				if (!job) {
					return;
				}
				job.status = event.type === "job-started" ? "running" : event.status;
				if (event.type === "job-finished") {
					job.reason = event.reason;
				}
				break;
			}
			case "leg-started": {
				const leg = findLeg(event.legId);
				if (!leg) {
					return;
				}
				leg.status = "running";
				leg.startedAt = event.startedAt;
				leg.logPath = event.logPath;
				break;
			}
			case "step-started":
				// Step progress is folded in when the leg finishes.
				return;
			case "step-finished": {
				const leg = findLeg(event.legId);
				if (!leg) {
					return;
				}
				const index = leg.steps.findIndex((item) => item.stepId === event.step.stepId);
				if (index === -1) {
					leg.steps.push(event.step);
				} else {
					leg.steps[index] = event.step;
				}
				break;
			}
			case "leg-finished": {
				const index = run.legs.findIndex((item) => item.legId === event.leg.legId);
				if (index === -1) {
					return;
				}
				run.legs[index] = { ...event.leg, steps: [...event.leg.steps] };
				break;
			}
			case "legs-canceled":
				for (const legId of event.legIds) {
					const leg = findLeg(legId);
					if (leg?.status === "pending") {
						leg.status = "canceled";
					}
				}
				break;
			case "run-finished":
				run.status = event.status;
				run.finishedAt = event.finishedAt;
				break;
		}
		runStore.writeRun(run);
	};
}
