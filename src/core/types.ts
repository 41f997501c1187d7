export type TriggerFilter = {
	event: string;
	branches: string[];
	branchesIgnore: string[];
};

export type Workflow = {
	id: string;
	name: string;
	path: string;
	events: string[];
	triggers: TriggerFilter[];
	env: Record<string, string>;
	jobs: Job[];
};

export type Job = {
	id: string;
	name: string;
	needs: string[];
	runsOn?: string;
	steps: Step[];
	if?: string;
	strategy?: MatrixStrategy;
	env?: Record<string, string>;
};

export type Step = {
	id: string;
	name: string;
	uses?: string;
	run?: string;
	with?: Record<string, string>;
	if?: string;
	env?: Record<string, string>;
	continueOnError?: boolean;
};

export type MatrixStrategy = {
	matrix: Record<string, unknown>;
	failFast: boolean;
	maxParallel?: number;
};

export type TriggerEvent = {
	readonly name: "push" | "pull_request" | string;
	readonly branch: string;
	readonly payloadPath?: string;
};

export type MatrixValues = Record<string, string>;

export type MatrixLeg = {
	legId: string;
	jobId: string;
	name: string;
	matrix: MatrixValues | null;
	runsOn?: string;
};

export type PlannedJob = {
	jobId: string;
	needs: string[];
	failFast: boolean;
	maxParallel?: number;
	legs: MatrixLeg[];
};

export type RunPlan = {
	runId: string;
	workflow: Workflow;
	event: TriggerEvent;
	jobs: PlannedJob[];
};

export type RunStatus = "pending" | "running" | "success" | "failed" | "canceled" | "skipped";

export type TerminalStatus = Exclude<RunStatus, "pending" | "running">;

export type FailureKind =
	| "provisioning"
	| "gate"
	| "lock"
	| "build"
	| "test"
	| "command"
	| "action";

export type StepRun = {
	stepId: string;
	name: string;
	status: RunStatus;
	exitCode?: number;
	failureKind?: FailureKind;
	message?: string;
	durationMs?: number;
};

export type LegRun = {
	legId: string;
	jobId: string;
	name: string;
	matrix: MatrixValues | null;
	runsOn?: string;
	status: RunStatus;
	startedAt?: string;
	finishedAt?: string;
	durationMs?: number;
	failureKind?: FailureKind;
	reason?: string;
	steps: StepRun[];
	logPath?: string;
};

export type JobRun = {
	jobId: string;
	status: RunStatus;
	reason?: string;
};

export type RunRecord = {
	schemaVersion: number;
	id: string;
	workflowId: string;
	event: TriggerEvent;
	status: RunStatus;
	createdAt: string;
	finishedAt?: string;
	jobs: JobRun[];
	legs: LegRun[];
	logDir?: string;
};
