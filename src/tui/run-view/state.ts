import type { EngineRuntimeEvent } from "../../core/engine.js";
import type { FailureKind, MatrixValues, RunStatus, StepRun } from "../../core/types.js";
import { stripAnsi } from "../../engines/act/act-output.js";

export type StepView = {
	stepId: string;
	name: string;
	status: RunStatus;
	durationMs?: number;
	failureKind?: FailureKind;
};

export type LegView = {
	legId: string;
	name: string;
	matrix: MatrixValues | null;
	runsOn?: string;
	status: RunStatus;
	startedAt?: string;
	durationMs?: number;
	failureKind?: FailureKind;
	reason?: string;
	steps: StepView[];
	output: string[];
};

export type JobView = {
	jobId: string;
	status: RunStatus;
	reason?: string;
	legs: LegView[];
};

export type RunViewState = {
	runId?: string;
	status: RunStatus;
	jobs: JobView[];
};

export const initialRunViewState: RunViewState = { status: "pending", jobs: [] };

export function applyRunEvent(state: RunViewState, event: EngineRuntimeEvent): RunViewState {
	switch (event.type) {
		case "run-started":
			return {
				runId: event.runId,
				status: "running",
				jobs: event.jobs.map((job) => ({
					jobId: job.jobId,
					status: "pending",
					legs: job.legs.map((leg) => ({
						legId: leg.legId,
						name: leg.name,
						matrix: leg.matrix,
						runsOn: leg.runsOn,
						status: "pending",
						steps: [],
						output: [],
					})),
				})),
			};
		case "job-started":
			return updateJob(state, event.jobId, (job) => ({ ...job, status: "running" }));
		case "job-finished":
			return updateJob(state, event.jobId, (job) => ({ ...job, status: event.status, reason: event.reason }));
		case "leg-started":
			return updateLeg(state, event.legId, (leg) => ({ ...leg, status: "running", startedAt: event.startedAt }));
		case "step-started":
			return updateLeg(state, event.legId, (leg) =>
				upsertStep(leg, { stepId: event.stepId, name: event.name, status: "running" }),
			);
		case "step-finished":
			return updateLeg(state, event.legId, (leg) => upsertStep(leg, toStepView(event.step)));
		case "leg-finished":
			return updateLeg(state, event.leg.legId, (leg) => ({
				...leg,
				status: event.leg.status,
				startedAt: event.leg.startedAt,
				durationMs: event.leg.durationMs,
				failureKind: event.leg.failureKind,
				reason: event.leg.reason,
				steps: event.leg.steps.length > 0 ? event.leg.steps.map(toStepView) : leg.steps,
			}));
		case "legs-canceled": {
			const canceled = new Set(event.legIds);
			return mapLegs(state, (leg) =>
				canceled.has(leg.legId) && leg.status === "pending" ? { ...leg, status: "canceled" } : leg,
			);
		}
		case "run-finished":
			return { ...state, status: event.status };
	}
}

export function appendLegOutput(
	state: RunViewState,
	legId: string,
	chunk: string,
	maxLines: number,
): RunViewState {
	const lines = stripAnsi(chunk)
		.split(/\r?\n/)
		.map((line) => line.trimEnd())
		.filter((line) => line.length > 0);
	if (lines.length === 0) {
		return state;
	}
	return updateLeg(state, legId, (leg) => ({ ...leg, output: [...leg.output, ...lines].slice(-maxLines) }));
}

function toStepView(step: StepRun): StepView {
	return {
		stepId: step.stepId,
		name: step.name,
		status: step.status,
		durationMs: step.durationMs,
		failureKind: step.failureKind,
	};
}

function upsertStep(leg: LegView, step: StepView): LegView {
	const index = leg.steps.findIndex((item) => item.stepId === step.stepId);
	if (index === -1) {
		return { ...leg, steps: [...leg.steps, step] };
	}
	const steps = [...leg.steps];
	steps[index] = step;
	return { ...leg, steps };
}

function updateJob(state: RunViewState, jobId: string, update: (job: JobView) => JobView): RunViewState {
	return {
		...state,
		jobs: state.jobs.map((job) => (job.jobId === jobId ? update(job) : job)),
	};
}

function updateLeg(state: RunViewState, legId: string, update: (leg: LegView) => LegView): RunViewState {
	return mapLegs(state, (leg) => (leg.legId === legId ? update(leg) : leg));
}

function mapLegs(state: RunViewState, update: (leg: LegView) => LegView): RunViewState {
	return {
		...state,
		jobs: state.jobs.map((job) => ({ ...job, legs: job.legs.map(update) })),
	};
}
