import type { ExpressionContext } from "./expressions.js";
import { interpolateRecord } from "./expressions.js";
import type { Job, MatrixLeg, TriggerEvent, Workflow } from "./types.js";

/**
 * Variables a leg starts with. Built once per leg and handed to the engine,
 * never written into `process.env`.
 */
export type RunEnvironment = Readonly<Record<string, string>>;

export type RunEnvironmentInput = {
	configEnv: Record<string, string>;
	workflow: Workflow;
	job: Job;
	leg: MatrixLeg;
	event: TriggerEvent;
};

export function createRunEnvironment({
	configEnv,
	workflow,
	job,
	leg,
	event,
}: RunEnvironmentInput): RunEnvironment {
	const base = { ...configEnv, ...workflow.env };
	const context = createExpressionContext(leg, event, base);
	const jobEnv = interpolateRecord(job.env, context);
	return Object.freeze({
		...base,
		...jobEnv,
		CI: "true",
		GITHUB_EVENT_NAME: event.name,
		GITHUB_REF_NAME: event.branch,
		RUNNER_OS: runnerOsName(leg.runsOn),
	});
}

export function createExpressionContext(
	leg: MatrixLeg,
	event: TriggerEvent,
	env: Record<string, string>,
): ExpressionContext {
	return {
		matrix: leg.matrix,
		env,
		github: {
			event_name: event.name,
			ref_name: event.branch,
		},
		runner: {
			os: runnerOsName(leg.runsOn),
		},
	};
}

export function runnerOsName(runsOn: string | undefined): string {
	const label = (runsOn ?? "").toLowerCase();
	if (label.includes("windows")) {
		return "Windows";
	}
	if (label.includes("macos")) {
		return "macOS";
	}
	return "Linux";
}
