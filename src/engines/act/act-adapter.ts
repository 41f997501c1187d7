import fs from "node:fs";
import path from "node:path";
import type {
	EngineAdapter,
	EngineContext,
	LegExecution,
	LegResult,
	OutputSource,
	RunnerCheck,
} from "../../core/engine.js";
import { classifyStep } from "../../core/failure.js";
import type { MatrixLeg, MatrixValues, TriggerEvent } from "../../core/types.js";
import { openLegLog } from "../../store/run-store.js";
import { isToolchainAction } from "../../toolchain/provisioner.js";
import { COMMAND_NOT_FOUND_EXIT_CODE, type CommandRunner, SpawnCommandRunner } from "../../utils/command-runner.js";
import { redactArgs } from "../../utils/redact.js";
import { parseRunsOnLabels, resolveRunnerPlatform } from "../local/runner-platform.js";
import {
	createActOutputFormatter,
	createActStepTracker,
	looksLikeDockerStorageError,
} from "./act-output.js";

export type ActArgsInput = {
	jobId: string;
	matrix: MatrixValues | null;
	eventPath?: string;
	env?: Record<string, string>;
};

export type ActAdapterOptions = {
	runner?: CommandRunner;
};

// Head ref of the synthesized pull request; the event branch is its base.
const LOCAL_HEAD_REF = "local";

// Set by act itself inside the container.
const ACT_MANAGED_ENV = new Set(["CI", "GITHUB_EVENT_NAME", "GITHUB_REF_NAME", "RUNNER_OS"]);

/** Runs each leg as one `act` invocation in a Linux container. */
export class ActAdapter implements EngineAdapter {
	readonly id = "act";
	private readonly runner: CommandRunner;

	constructor(options: ActAdapterOptions = {}) {
		this.runner = options.runner ?? new SpawnCommandRunner();
	}

	checkRunner(leg: MatrixLeg, context: EngineContext): RunnerCheck {
		const labels = parseRunsOnLabels(leg.runsOn);
		if (labels.some((label) => context.platformMap?.[label] !== undefined)) {
			return { ok: true };
		}
		const platform = resolveRunnerPlatform(leg.runsOn);
		if (platform === "linux" || platform === "any") {
			return { ok: true };
		}
		return {
			ok: false,
			reason: `act only runs Linux containers; map ${leg.runsOn ?? "this runner"} with runtime.platformMap to run it`,
		};
	}

	async runLeg(execution: LegExecution, context: EngineContext): Promise<LegResult> {
		const { leg, job, logPath, signal, onStep } = execution;
		const write = (chunk: string, source: OutputSource = "stdout"): void => {
			context.onOutput?.(chunk, source, leg.legId);
		};
		const logStream = openLegLog(logPath, (message) => write(message, "stderr"));

		const eventPath = ensureEventPayload(context.event, context.runDir);
		const args = buildActArgs(context, {
			jobId: leg.jobId,
			matrix: leg.matrix,
			eventPath,
			env: forwardedEnv(execution.environment),
		});
		const [command, ...commandArgs] = args;
		const commandLine = `$ ${formatActCommand(args)}\n`;
		logStream.write(commandLine);
		write(commandLine);

		const formatter = createActOutputFormatter();
		const tracker = createActStepTracker(job.steps);
		let dockerHinted = false;

		const result = await this.runner.run(
			{ command, args: commandArgs, cwd: context.repoRoot, env: {}, signal },
			(chunk, source) => {
				logStream.write(chunk);
				if (!dockerHinted && looksLikeDockerStorageError(chunk)) {
					dockerHinted = true;
					const hint = "note: Docker reported a storage I/O error. Restart Docker and check free disk space.\n";
					logStream.write(hint);
					write(hint, "stderr");
				}
				const formatted = formatter.push(chunk);
				if (formatted.length > 0) {
					write(formatted, source);
				}
				tracker.push(chunk).forEach(onStep);
			},
		);
		const remaining = formatter.flush();
		if (remaining.length > 0) {
			write(remaining);
		}
		tracker.flush().forEach(onStep);
		await new Promise<void>((resolve) => logStream.end(resolve));

		if (result.aborted) {
			return { status: "canceled", steps: tracker.finish("canceled"), reason: "canceled" };
		}
		if (result.exitCode === 0) {
			return { status: "success", steps: tracker.finish("success") };
		}

		const steps = tracker.finish("failed");
		if (result.exitCode === COMMAND_NOT_FOUND_EXIT_CODE && result.error) {
			return { status: "failed", steps, failureKind: "provisioning", reason: result.error };
		}
		const failed = tracker.firstFailedStep();
		if (!failed) {
			return {
				status: "failed",
				steps,
				failureKind: "command",
				reason: result.error ?? `act exited with ${result.exitCode}`,
			};
		}
		return {
			status: "failed",
			steps,
			failureKind: classifyStep(failed, isToolchainAction),
			reason: `${failed.name}: act exited with ${result.exitCode}`,
		};
	}
}

export function buildActArgs(context: EngineContext, input: ActArgsInput): string[] {
	const args = ["act", context.event.name, "--workflows", context.workflowsPath, "--job", input.jobId, "--rm"];

	if (input.eventPath) {
		args.push("--eventpath", input.eventPath);
	}

	for (const [key, value] of Object.entries(input.matrix ?? {})) {
		args.push("--matrix", `${key}:${value}`);
	}

	for (const [key, value] of Object.entries(input.env ?? {})) {
		args.push("--env", `${key}=${value}`);
	}

	if (context.containerArchitecture) {
		const arch = context.containerArchitecture.includes("/")
			? context.containerArchitecture
			: `linux/${context.containerArchitecture}`;
		args.push("--container-architecture", arch);
	}

	for (const [key, value] of Object.entries(context.platformMap ?? {})) {
		args.push("--platform", `${key}=${value}`);
	}

	if (context.envFile) {
		args.push("--env-file", context.envFile);
	}

	return args;
}

export function ensureEventPayload(event: TriggerEvent, runDir: string): string {
	if (event.payloadPath && fs.existsSync(event.payloadPath)) {
		return event.payloadPath;
	}

	const outPath = path.join(runDir, `event-${event.name}.json`);
	if (!fs.existsSync(outPath)) {
		fs.mkdirSync(runDir, { recursive: true });
		fs.writeFileSync(outPath, JSON.stringify(buildEventPayload(event), null, 2));
	}
	return outPath;
}

export function buildEventPayload(event: TriggerEvent): Record<string, unknown> {
	const repo = { full_name: "local/local", name: "local", owner: { login: "local" } };
	switch (event.name) {
		case "pull_request":
			return {
				action: "opened",
				number: 1,
				repository: repo,
				pull_request: {
					number: 1,
					head: { ref: LOCAL_HEAD_REF },
					base: { ref: event.branch },
				},
			};
		default:
			return { ref: `refs/heads/${event.branch}`, repository: repo };
	}
}

export function formatActCommand(args: string[]): string {
	return redactArgs(args).map(quoteArg).join(" ");
}

function forwardedEnv(environment: Readonly<Record<string, string>>): Record<string, string> {
	return Object.fromEntries(Object.entries(environment).filter(([key]) => !ACT_MANAGED_ENV.has(key)));
}

function quoteArg(value: string): string {
	if (/[\s"'\\]/.test(value)) {
		return JSON.stringify(value);
	}
	return value;
}
