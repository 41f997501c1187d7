import type { RunEnvironment } from "./environment.js";
import type {
	FailureKind,
	Job,
	LegRun,
	MatrixLeg,
	MatrixValues,
	RunStatus,
	StepRun,
	TerminalStatus,
	TriggerEvent,
} from "./types.js";

export type OutputSource = "stdout" | "stderr";

export type OutputListener = (chunk: string, source: OutputSource, legId?: string) => void;

export type CancelPolicy = "terminate" | "drain";

export type ForeignRunnerPolicy = "skip" | "host";

export type EngineContext = {
	repoRoot: string;
	runDir: string;
	logsDir: string;
	workflowsPath: string;
	event: TriggerEvent;
	cacheDir?: string;
	allowFloatingToolchains?: boolean;
	foreignRunners?: ForeignRunnerPolicy;
	shell?: string;
	containerEngine?: "docker" | "podman";
	containerArchitecture?: string;
	platformMap?: Record<string, string>;
	envFile?: string;
	onOutput?: OutputListener;
};

export type RunnerCheck = { ok: true; note?: string } | { ok: false; reason: string };

export type StepProgress =
	| { type: "step-started"; stepId: string; name: string }
	| { type: "step-finished"; step: StepRun };

export type LegExecution = {
	leg: MatrixLeg;
	job: Job;
	environment: RunEnvironment;
	logPath: string;
	signal: AbortSignal;
	onStep: (progress: StepProgress) => void;
};

export type LegResult = {
	status: Exclude<TerminalStatus, "skipped">;
	steps: StepRun[];
	failureKind?: FailureKind;
	reason?: string;
};

export type EngineRuntimeEvent =
	| {
			type: "run-started";
			runId: string;
			workflowId: string;
			event: TriggerEvent;
			jobs: { jobId: string; legs: { legId: string; name: string; matrix: MatrixValues | null; runsOn?: string }[] }[];
			logDir?: string;
			createdAt: string;
	  }
	| {
			type: "job-started";
			runId: string;
			jobId: string;
	  }
	| {
			type: "leg-started";
			runId: string;
			legId: string;
			startedAt: string;
			logPath?: string;
	  }
	| {
			type: "step-started";
			runId: string;
			legId: string;
			stepId: string;
			name: string;
	  }
	| {
			type: "step-finished";
			runId: string;
			legId: string;
			step: StepRun;
	  }
	| {
			type: "leg-finished";
			runId: string;
			leg: LegRun;
	  }
	| {
			type: "legs-canceled";
			runId: string;
			legIds: string[];
	  }
	| {
			type: "job-finished";
			runId: string;
			jobId: string;
			status: TerminalStatus;
			reason?: string;
	  }
	| {
			type: "run-finished";
			runId: string;
			status: Extract<RunStatus, "success" | "failed" | "canceled">;
			finishedAt: string;
	  };

export interface EngineAdapter {
	readonly id: string;
	checkRunner(leg: MatrixLeg, context: EngineContext): RunnerCheck;
	runLeg(execution: LegExecution, context: EngineContext): Promise<LegResult>;
}
