import path from "node:path";
import { getLegLogFileName } from "../store/run-store.js";
import { createLimiter, type Limiter } from "../utils/limiter.js";
import type {
	CancelPolicy,
	EngineAdapter,
	EngineContext,
	EngineRuntimeEvent,
	LegResult,
	StepProgress,
} from "./engine.js";
import { createRunEnvironment } from "./environment.js";
import { assertValidPlan } from "./plan.js";
import type {
	JobRun,
	LegRun,
	MatrixLeg,
	PlannedJob,
	RunPlan,
	RunStatus,
	TerminalStatus,
} from "./types.js";

export type PipelineOptions = {
	configEnv?: Record<string, string>;
	cancelPolicy?: CancelPolicy;
	maxParallel?: number;
	signal?: AbortSignal;
	logPathFor?: (legId: string) => string;
	onEvent?: (event: EngineRuntimeEvent) => void;
};

export type PipelineStatus = Extract<RunStatus, "success" | "failed" | "canceled">;

export type PipelineResult = {
	runId: string;
	status: PipelineStatus;
	exitCode: number;
	/** Set when the run failed only because some legs never ran. */
	reason?: string;
	jobs: JobRun[];
	legs: LegRun[];
};

export async function runPipeline(
	plan: RunPlan,
	adapter: EngineAdapter,
	context: EngineContext,
	options: PipelineOptions = {},
): Promise<PipelineResult> {
	assertValidPlan(plan);

	const emit = (event: EngineRuntimeEvent): void => options.onEvent?.(event);
	const runSignal = options.signal ?? new AbortController().signal;
	const cancelPolicy = options.cancelPolicy ?? "terminate";
	const runLimit = createLimiter(options.maxParallel);
	const jobModels = new Map(plan.workflow.jobs.map((job) => [job.id, job]));
	const plannedJobs = new Map(plan.jobs.map((job) => [job.jobId, job]));
	const legRuns = new Map<string, LegRun>();
	const jobRuns = new Map<string, JobRun>();
	const jobStatuses = new Map<string, Promise<TerminalStatus>>();

	for (const planned of plan.jobs) {
		jobRuns.set(planned.jobId, { jobId: planned.jobId, status: "pending" });
		for (const leg of planned.legs) {
			legRuns.set(leg.legId, {
				legId: leg.legId,
				jobId: leg.jobId,
				name: leg.name,
				matrix: leg.matrix,
				runsOn: leg.runsOn,
				status: "pending",
				steps: [],
			});
		}
	}

	emit({
		type: "run-started",
		runId: plan.runId,
		workflowId: plan.workflow.id,
		event: plan.event,
		jobs: plan.jobs.map((job) => ({
			jobId: job.jobId,
			legs: job.legs.map((leg) => ({
				legId: leg.legId,
				name: leg.name,
				matrix: leg.matrix,
				runsOn: leg.runsOn,
			})),
		})),
		logDir: context.logsDir,
		createdAt: new Date().toISOString(),
	});

	const cancelLegs = (legs: MatrixLeg[]): void => {
		const canceled: string[] = [];
		for (const leg of legs) {
			const legRun = legRuns.get(leg.legId);
			if (legRun?.status === "pending") {
				legRun.status = "canceled";
				canceled.push(leg.legId);
			}
		}
		if (canceled.length > 0) {
			emit({ type: "legs-canceled", runId: plan.runId, legIds: canceled });
		}
	};

	const finishJob = (jobId: string, status: TerminalStatus, reason?: string): TerminalStatus => {
		jobRuns.set(jobId, { jobId, status, reason });
		emit({ type: "job-finished", runId: plan.runId, jobId, status, reason });
		return status;
	};

	const skipJob = (planned: PlannedJob, reason: string): TerminalStatus => {
		for (const leg of planned.legs) {
			const legRun = legRuns.get(leg.legId);
			if (!legRun) {
				continue;
			}
			legRun.status = "skipped";
			legRun.reason = reason;
			emit({ type: "leg-finished", runId: plan.runId, leg: { ...legRun } });
		}
		return finishJob(planned.jobId, "skipped", reason);
	};

	const runLeg = async (
		planned: PlannedJob,
		leg: MatrixLeg,
		jobController: AbortController,
	): Promise<TerminalStatus> => {
		const legRun = legRuns.get(leg.legId);
		const job = jobModels.get(leg.jobId);
		if (!legRun || !job) {
			return "failed";
		}
		if (runSignal.aborted || jobController.signal.aborted) {
			cancelLegs([leg]);
			return "canceled";
		}

		const runner = adapter.checkRunner(leg, context);
		if (!runner.ok) {
			legRun.status = "skipped";
			legRun.reason = runner.reason;
			emit({ type: "leg-finished", runId: plan.runId, leg: { ...legRun } });
			return "skipped";
		}
		if (runner.note) {
			context.onOutput?.(`${runner.note}\n`, "stderr", leg.legId);
		}

		const environment = createRunEnvironment({
			configEnv: options.configEnv ?? {},
			workflow: plan.workflow,
			job,
			leg,
			event: plan.event,
		});
		const logPath =
			options.logPathFor?.(leg.legId) ?? path.join(context.logsDir, getLegLogFileName(leg.legId));
		// Fail-fast aborts always reach in-flight legs; a run cancellation only does under "terminate".
		const signal =
			cancelPolicy === "terminate"
				? AbortSignal.any([runSignal, jobController.signal])
				: jobController.signal;

		const startedAt = new Date();
		legRun.status = "running";
		legRun.startedAt = startedAt.toISOString();
		legRun.logPath = logPath;
		emit({
			type: "leg-started",
			runId: plan.runId,
			legId: leg.legId,
			startedAt: legRun.startedAt,
			logPath,
		});

		const onStep = (progress: StepProgress): void => {
			if (progress.type === "step-started") {
				upsertStep(legRun, {
					stepId: progress.stepId,
					name: progress.name,
					status: "running",
				});
				emit({
					type: "step-started",
					runId: plan.runId,
					legId: leg.legId,
					stepId: progress.stepId,
					name: progress.name,
				});
				return;
			}
			upsertStep(legRun, progress.step);
			emit({ type: "step-finished", runId: plan.runId, legId: leg.legId, step: progress.step });
		};

		let result: LegResult;
		try {
			result = await adapter.runLeg({ leg, job, environment, logPath, signal, onStep }, context);
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			context.onOutput?.(`${leg.legId}: ${message}\n`, "stderr", leg.legId);
			result = { status: "failed", steps: legRun.steps, reason: message };
		}

		const finishedAt = new Date();
		legRun.status = result.status;
		legRun.steps = result.steps;
		legRun.failureKind = result.failureKind;
		legRun.reason = result.reason;
		legRun.finishedAt = finishedAt.toISOString();
		legRun.durationMs = finishedAt.getTime() - startedAt.getTime();
		emit({ type: "leg-finished", runId: plan.runId, leg: { ...legRun } });

		if (result.status === "failed" && planned.failFast && !jobController.signal.aborted) {
			jobController.abort();
		}
		return result.status;
	};

	const runJob = (jobId: string): Promise<TerminalStatus> => {
		const existing = jobStatuses.get(jobId);
		if (existing) {
			return existing;
		}
		const promise = executeJob(jobId);
		jobStatuses.set(jobId, promise);
		return promise;
	};

	const executeJob = async (jobId: string): Promise<TerminalStatus> => {
		const planned = plannedJobs.get(jobId);
		if (!planned) {
			return "skipped";
		}
		const needStatuses = await Promise.all(planned.needs.map((need) => runJob(need)));
		const blocking = planned.needs.filter((_, index) => needStatuses[index] !== "success");
		if (blocking.length > 0) {
			return skipJob(planned, `depends on unsuccessful job(s): ${blocking.join(", ")}`);
		}
		if (runSignal.aborted) {
			cancelLegs(planned.legs);
			return finishJob(jobId, "canceled");
		}

		jobRuns.set(jobId, { jobId, status: "running" });
		emit({ type: "job-started", runId: plan.runId, jobId });

		const jobController = new AbortController();
		const jobLimit: Limiter = createLimiter(planned.maxParallel);
		const statuses = await Promise.all(
			planned.legs.map((leg) =>
				jobLimit(() => runLimit(() => runLeg(planned, leg, jobController))),
			),
		);
		const status = aggregateStatuses(statuses);
		const skipped = statuses.filter((item) => item === "skipped").length;
		return finishJob(
			jobId,
			status,
			status === "skipped" ? `${skipped} of ${statuses.length} leg(s) skipped` : undefined,
		);
	};

	const statuses = await Promise.all(plan.jobs.map((job) => runJob(job.jobId)));
	const status = resolvePipelineStatus(statuses);
	const legs = Array.from(legRuns.values());
	const skippedLegs = legs.filter((leg) => leg.status === "skipped").length;
	const reason =
		status === "failed" && !statuses.includes("failed") && skippedLegs > 0
			? `${skippedLegs} leg(s) did not run`
			: undefined;

	emit({
		type: "run-finished",
		runId: plan.runId,
		status,
		finishedAt: new Date().toISOString(),
	});

	return {
		runId: plan.runId,
		status,
		exitCode: exitCodeForStatus(status),
		reason,
		jobs: plan.jobs.map(
			(job) => jobRuns.get(job.jobId) ?? { jobId: job.jobId, status: "pending" },
		),
		legs,
	};
}

/** A job succeeds only when every one of its legs ran and succeeded. */
export function aggregateStatuses(statuses: TerminalStatus[]): TerminalStatus {
	if (statuses.includes("failed")) {
		return "failed";
	}
	if (statuses.includes("canceled")) {
		return "canceled";
	}
	if (statuses.includes("skipped")) {
		return "skipped";
	}
	return "success";
}

/**
 * Legs left out with `--matrix` or `--job` never enter the plan, so any
 * skipped job here is work the run was asked to do and did not.
 */
export function resolvePipelineStatus(statuses: TerminalStatus[]): PipelineStatus {
	const aggregated = aggregateStatuses(statuses);
	return aggregated === "skipped" ? "failed" : aggregated;
}

export function exitCodeForStatus(status: PipelineStatus): number {
	switch (status) {
		case "success":
			return 0;
		case "canceled":
			return 130;
		default:
			return 1;
	}
}

function upsertStep(legRun: LegRun, step: LegRun["steps"][number]): void {
	const index = legRun.steps.findIndex((item) => item.stepId === step.stepId);
	if (index === -1) {
		legRun.steps.push(step);
		return;
	}
	legRun.steps[index] = step;
}
