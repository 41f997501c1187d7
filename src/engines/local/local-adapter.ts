import os from "node:os";
import { CacheConfigError, isCacheAction, planCache, type CachePlan } from "../../cache/cache-action.js";
import { CacheStore, type CacheRestoreResult } from "../../cache/cache-store.js";
import type {
	EngineAdapter,
	EngineContext,
	LegExecution,
	LegResult,
	OutputSource,
	RunnerCheck,
} from "../../core/engine.js";
import { createExpressionContext } from "../../core/environment.js";
import { evaluateCondition, interpolate, interpolateRecord } from "../../core/expressions.js";
import { classifyStep } from "../../core/failure.js";
import type { FailureKind, Job, MatrixLeg, Step, StepRun } from "../../core/types.js";
import { openLegLog } from "../../store/run-store.js";
import {
	describeToolchain,
	isToolchainAction,
	provisionToolchain,
	readToolchainRequest,
	RustupInstaller,
	type ToolchainInstaller,
} from "../../toolchain/provisioner.js";
import { type CommandRunner, SpawnCommandRunner } from "../../utils/command-runner.js";
import { resolveWorkspacePath } from "../../utils/path-safety.js";
import { checkHostRunner } from "./runner-platform.js";
import { resolveShell, type ShellInvocation } from "./shell.js";

export type LocalAdapterOptions = {
	runner?: CommandRunner;
	installer?: ToolchainInstaller;
	platform?: string;
	homeDir?: string;
};

type StepOutcome = {
	ok: boolean;
	canceled?: boolean;
	exitCode?: number;
	message?: string;
};

type PostStep = {
	name: string;
	runOnFailure: boolean;
	run: () => void;
};

type LegState = {
	env: Record<string, string>;
	failed: boolean;
	canceled: boolean;
	failureKind?: FailureKind;
	reason?: string;
	postSteps: PostStep[];
};

type Write = (chunk: string, source?: OutputSource) => void;

/**
 * Runs legs directly on this machine: steps execute in order through the
 * configured shell, toolchain actions go through rustup and cache actions
 * are served from the local cache directory.
 */
export class LocalAdapter implements EngineAdapter {
	readonly id = "local";
	private readonly runner: CommandRunner;
	private readonly installer: ToolchainInstaller;
	private readonly platform: string;
	private readonly homeDir: string;

	constructor(options: LocalAdapterOptions = {}) {
		this.runner = options.runner ?? new SpawnCommandRunner();
		this.installer = options.installer ?? new RustupInstaller(this.runner);
		this.platform = options.platform ?? process.platform;
		this.homeDir = options.homeDir ?? os.homedir();
	}

	checkRunner(leg: MatrixLeg, context: EngineContext): RunnerCheck {
		return checkHostRunner(leg, this.platform, context.foreignRunners);
	}

	async runLeg(execution: LegExecution, context: EngineContext): Promise<LegResult> {
		const { leg, job, logPath, signal, onStep } = execution;
		const logStream = openLegLog(logPath, (message) => context.onOutput?.(message, "stderr", leg.legId));
		const write: Write = (chunk, source = "stdout") => {
			logStream.write(chunk);
			context.onOutput?.(chunk, source, leg.legId);
		};

		const state: LegState = {
			env: { ...execution.environment },
			failed: false,
			canceled: false,
			postSteps: [],
		};
		const steps: StepRun[] = [];

		try {
			for (const step of job.steps) {
				if (signal.aborted) {
					state.canceled = true;
				}
				const expressions = createExpressionContext(leg, context.event, state.env);
				let shouldRun: boolean;
				try {
					shouldRun = evaluateCondition(step.if, expressions, {
						failed: state.failed,
						canceled: state.canceled,
					});
				} catch (error) {
					const message = error instanceof Error ? error.message : String(error);
					const run: StepRun = { stepId: step.id, name: step.name, status: "failed", failureKind: "command", message };
					steps.push(run);
					onStep({ type: "step-finished", step: run });
					this.recordFailure(state, step, "command", message);
					continue;
				}

				if (!shouldRun) {
					const run: StepRun = { stepId: step.id, name: step.name, status: "skipped" };
					steps.push(run);
					onStep({ type: "step-finished", step: run });
					continue;
				}

				onStep({ type: "step-started", stepId: step.id, name: step.name });
				write(`▾ ${step.name}\n`);
				const startedAt = Date.now();
				const outcome = await this.executeStep(step, execution, context, state, write);
				const kind = classifyStep(step, isToolchainAction);
				const run: StepRun = {
					stepId: step.id,
					name: step.name,
					status: outcome.canceled ? "canceled" : outcome.ok ? "success" : "failed",
					exitCode: outcome.exitCode,
					failureKind: outcome.ok || outcome.canceled ? undefined : kind,
					message: outcome.message,
					durationMs: Date.now() - startedAt,
				};
				steps.push(run);
				onStep({ type: "step-finished", step: run });

				if (outcome.canceled) {
					state.canceled = true;
				} else if (!outcome.ok) {
					if (step.continueOnError) {
						write(`${step.name} failed; continuing (continue-on-error)\n`, "stderr");
					} else {
						this.recordFailure(state, step, kind, outcome.message ?? `exited with ${outcome.exitCode ?? 1}`);
					}
				}
			}

			for (const post of state.postSteps) {
				if (state.canceled || (state.failed && !post.runOnFailure)) {
					continue;
				}
				write(`▾ Post ${post.name}\n`);
				post.run();
			}
		} finally {
			await new Promise<void>((resolve) => logStream.end(resolve));
		}

		if (state.failed) {
			return { status: "failed", steps, failureKind: state.failureKind, reason: state.reason };
		}
		if (state.canceled) {
			return { status: "canceled", steps, reason: "canceled" };
		}
		return { status: "success", steps };
	}

	private recordFailure(state: LegState, step: Step, kind: FailureKind, message: string): void {
		state.failed = true;
		if (!state.failureKind) {
			state.failureKind = kind;
			state.reason = `${step.name}: ${message}`;
		}
	}

	private async executeStep(
		step: Step,
		execution: LegExecution,
		context: EngineContext,
		state: LegState,
		write: Write,
	): Promise<StepOutcome> {
		const expressions = createExpressionContext(execution.leg, context.event, state.env);

		if (step.uses) {
			const inputs = interpolateRecord(step.with, expressions);
			if (step.uses.trim().toLowerCase().startsWith("actions/checkout")) {
				write(`Using the local workspace at ${context.repoRoot}\n`);
				return { ok: true };
			}
			if (isToolchainAction(step.uses)) {
				return this.provision(step.uses, inputs, execution, context, state, write);
			}
			if (isCacheAction(step.uses)) {
				return this.restoreCache(step, inputs, execution, context, state, write);
			}
			return { ok: false, message: `unsupported action ${step.uses}` };
		}

		const script = interpolate(step.run ?? "", expressions);
		const env = { ...state.env, ...interpolateRecord(step.env, expressions) };
		let shell: ShellInvocation;
		try {
			shell = resolveShell(script, this.platform, context.shell);
		} catch (error) {
			return { ok: false, message: error instanceof Error ? error.message : String(error) };
		}
		write(`$ ${script}\n`);
		const result = await this.runner.run(
			{ command: shell.command, args: shell.args, cwd: context.repoRoot, env, signal: execution.signal },
			write,
		);
		if (result.aborted) {
			return { ok: false, canceled: true, exitCode: result.exitCode, message: "canceled" };
		}
		if (result.exitCode !== 0) {
			return {
				ok: false,
				exitCode: result.exitCode,
				message: result.error ?? `exited with ${result.exitCode}`,
			};
		}
		return { ok: true, exitCode: 0 };
	}

	private async provision(
		uses: string,
		inputs: Record<string, string>,
		execution: LegExecution,
		context: EngineContext,
		state: LegState,
		write: Write,
	): Promise<StepOutcome> {
		const request = readToolchainRequest(uses, inputs);
		write(`Provisioning Rust toolchain ${describeToolchain(request)}\n`);
		const result = await provisionToolchain(request, {
			installer: this.installer,
			allowFloating: context.allowFloatingToolchains,
			cwd: context.repoRoot,
			env: state.env,
			signal: execution.signal,
			onOutput: write,
		});
		if (!result.ok) {
			if (execution.signal.aborted) {
				return { ok: false, canceled: true, message: result.error };
			}
			write(`${result.error}\n`, "stderr");
			return { ok: false, message: result.error };
		}
		Object.assign(state.env, result.env);
		return { ok: true };
	}

	private restoreCache(
		step: Step,
		inputs: Record<string, string>,
		execution: LegExecution,
		context: EngineContext,
		state: LegState,
		write: Write,
	): StepOutcome {
		if (!context.cacheDir) {
			write("Caching is disabled; skipping restore\n");
			return { ok: true };
		}
		const uses = step.uses ?? "";
		let plan: CachePlan;
		try {
			plan = planCache({
				uses,
				inputs,
				repoRoot: context.repoRoot,
				jobId: execution.job.id,
				runner: execution.leg.runsOn ?? "local",
				toolchain: findJobToolchain(execution.job, execution.leg, context, state.env),
				env: state.env,
			});
		} catch (error) {
			if (error instanceof CacheConfigError) {
				return { ok: false, message: error.message };
			}
			const message = error instanceof Error ? error.message : String(error);
			write(`warning: cache key could not be computed, skipping cache: ${message}\n`, "stderr");
			return { ok: true };
		}

		const store = new CacheStore(context.cacheDir);
		const resolvePath = (source: string) => resolveWorkspacePath(source, context.repoRoot, this.homeDir);
		const restored = store.restore(plan.key, plan.restoreKeys, resolvePath);
		for (const warning of restored.warnings) {
			write(`warning: ${warning}\n`, "stderr");
		}
		write(`${describeRestore(restored, plan.key)}\n`);

		state.postSteps.push({
			name: step.name,
			runOnFailure: plan.saveOnFailure,
			run: () => {
				if (restored.status === "hit") {
					write(`Cache hit on ${plan.key}; not saving\n`);
					return;
				}
				const saved = store.save(plan.key, plan.paths, resolvePath);
				if (saved.ok) {
					write(`Saved cache ${saved.key}\n`);
				} else {
					write(`warning: cache ${plan.key} was not saved: ${saved.error}\n`, "stderr");
				}
			},
		});
		return { ok: true };
	}
}

/**
 * Cache keys carry the toolchain the job provisions, even when the cache
 * step runs before the toolchain step.
 */
export function findJobToolchain(
	job: Job,
	leg: MatrixLeg,
	context: EngineContext,
	env: Record<string, string>,
): string | undefined {
	const expressions = createExpressionContext(leg, context.event, env);
	for (const step of job.steps) {
		if (step.uses && isToolchainAction(step.uses)) {
			return readToolchainRequest(step.uses, interpolateRecord(step.with, expressions)).toolchain;
		}
	}
	return env.RUSTUP_TOOLCHAIN;
}

function describeRestore(result: CacheRestoreResult, key: string): string {
	switch (result.status) {
		case "hit":
			return `Cache restored from ${key}`;
		case "partial":
			return `Cache partially restored from ${result.key ?? "a previous entry"}`;
		case "miss":
			return `No cache found for ${key}`;
	}
}
