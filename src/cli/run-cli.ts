import path from "node:path";
import process from "node:process";
import { intro, outro } from "@clack/prompts";
import { CacheStore } from "../cache/cache-store.js";
import { loadConfig } from "../config/load-config.js";
import type { LegworkConfig } from "../config/schema.js";
import { discoverWorkflows } from "../core/discovery.js";
import type { EngineAdapter, EngineContext } from "../core/engine.js";
import { parseMatrixOverride } from "../core/matrix.js";
import {
	buildRunPlan,
	expandJobIdsWithNeeds,
	filterJobsForEvent,
	sortJobsByNeeds,
	validatePlan,
} from "../core/plan.js";
import { describeTriggers, matchesTrigger, resolveTriggerEvent } from "../core/trigger.js";
import type { MatrixValues, Workflow } from "../core/types.js";
import { createEngineAdapter } from "../engines/factory.js";
import { createRunEventPersister, RunStore } from "../store/run-store.js";
import type { CliOptions } from "./args.js";
import { parseArgs, printHelp, readPackageVersion } from "./args.js";
import { resolveCacheDir, runCacheCommand } from "./cache-command.js";
import { executeRun } from "./execute-run.js";
import { detectGitBranch } from "./git.js";
import { runInit, STATE_DIR } from "./init.js";
import { buildJsonSummary, formatRunReport } from "./output.js";
import { runPreflightChecks } from "./preflight.js";
import {
	promptMatrix,
	resolveSupportedEvents,
	resolveWorkflow,
	selectEvent,
	selectJobs,
	selectWorkflow,
	SUPPORTED_EVENTS,
} from "./select.js";

const USAGE_EXIT_CODE = 2;

export async function runCli(argv: string[] = process.argv.slice(2)): Promise<void> {
	const args = parseArgs(argv);
	if (args.help) {
		printHelp();
		return;
	}
	if (args.version) {
		process.stdout.write(`legwork ${readPackageVersion()}\n`);
		return;
	}
	if (args.unknown?.length) {
		process.stderr.write(`Unknown option(s): ${args.unknown.join(", ")}\n`);
		process.stderr.write("Run `legwork --help` for usage.\n");
		process.exitCode = USAGE_EXIT_CODE;
		return;
	}
	if (args.errors?.length) {
		for (const error of args.errors) {
			process.stderr.write(`${error}\n`);
		}
		process.exitCode = USAGE_EXIT_CODE;
		return;
	}

	const repoRoot = process.cwd();
	if (args.command === "init") {
		runInit(repoRoot);
		return;
	}

	const { config } = loadConfig(repoRoot);
	if (args.command === "cache") {
		const store = new CacheStore(resolveCacheDir(repoRoot, config));
		runCacheCommand(args.cacheCommand ?? "list", store, Boolean(args.json));
		return;
	}

	await runWorkflow(args, repoRoot, config);
}

async function runWorkflow(args: CliOptions, repoRoot: string, config: LegworkConfig): Promise<void> {
	const { workflows, errors } = discoverWorkflows(repoRoot);
	for (const error of errors) {
		process.stderr.write(`Workflow parse error in ${error.path}: ${error.message}\n`);
	}
	if (workflows.length === 0) {
		if (errors.length === 0) {
			process.stderr.write("No workflows found in .github/workflows.\n");
		}
		process.exitCode = 1;
		return;
	}

	const interactive = Boolean(process.stdout.isTTY && process.stdin.isTTY) && !args.json;

	const workflow = await chooseWorkflow(workflows, args.workflow, interactive);
	if (!workflow) {
		return;
	}

	let eventName = args.event ?? "push";
	if (args.event && !SUPPORTED_EVENTS.includes(args.event)) {
		process.stderr.write(`Unsupported event "${args.event}". Use one of: ${SUPPORTED_EVENTS.join(", ")}.\n`);
		process.exitCode = USAGE_EXIT_CODE;
		return;
	}
	if (!args.event && interactive) {
		const selected = await selectEvent(eventName, resolveSupportedEvents(workflow));
		if (!selected) {
			process.exitCode = 130;
			return;
		}
		eventName = selected;
	}

	const branch = args.branch ?? detectGitBranch(repoRoot);
	const event = resolveTriggerEvent(
		eventName,
		branch,
		args.eventPath ? path.resolve(repoRoot, args.eventPath) : undefined,
	);
	if (!matchesTrigger(workflow, event)) {
		if (args.json) {
			process.stdout.write(
				`${JSON.stringify({ status: "not-triggered", workflow: workflow.id, event: { name: event.name, branch: event.branch } })}\n`,
			);
		} else {
			process.stdout.write(
				`${workflow.name} is not triggered by ${event.name} on ${event.branch} (triggers: ${describeTriggers(workflow)}).\n`,
			);
		}
		return;
	}

	const availableJobs = filterJobsForEvent(workflow.jobs, event.name);
	let selectedJobs = args.jobs;
	const unknownJobs = (selectedJobs ?? []).filter((jobId) => !workflow.jobs.some((job) => job.id === jobId));
	if (unknownJobs.length > 0) {
		process.stderr.write(`Unknown job(s): ${unknownJobs.join(", ")}\n`);
		process.exitCode = USAGE_EXIT_CODE;
		return;
	}
	let matrixItems = args.matrix;
	if (!selectedJobs && interactive) {
		const chosen = await selectJobs(
			availableJobs,
			availableJobs.map((job) => job.id),
		);
		if (!chosen) {
			process.exitCode = 130;
			return;
		}
		selectedJobs = chosen;
		if (!matrixItems) {
			const matrixChoice = await promptMatrix(workflow, expandJobIdsWithNeeds(workflow, chosen));
			if (matrixChoice === null) {
				process.exitCode = 130;
				return;
			}
			matrixItems = matrixChoice;
		}
	}
	const ordered = sortJobsByNeeds(
		workflow,
		expandJobIdsWithNeeds(workflow, selectedJobs ?? availableJobs.map((job) => job.id)),
	);

	let matrixOverride: MatrixValues | undefined;
	try {
		matrixOverride = parseMatrixOverride(matrixItems);
	} catch (error) {
		process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
		process.exitCode = USAGE_EXIT_CODE;
		return;
	}

	const plan = buildRunPlan({
		workflow,
		jobIds: ordered,
		event,
		matrixOverride,
		failFastOverride: args.failFast,
	});
	const problems = validatePlan(plan);
	if (problems.length > 0) {
		for (const problem of problems) {
			process.stderr.write(`Plan error: ${problem}\n`);
		}
		process.exitCode = 1;
		return;
	}

	let adapter: EngineAdapter;
	try {
		adapter = createEngineAdapter(args.engine ?? config.engine);
	} catch (error) {
		process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
		process.exitCode = USAGE_EXIT_CODE;
		return;
	}
	if (adapter.id === "act" && !(await runPreflightChecks(config.runtime.container, interactive))) {
		process.exitCode = 1;
		return;
	}

	const runStore = new RunStore(path.join(repoRoot, STATE_DIR, "runs"));
	const runDir = runStore.createRunDir(plan.runId);
	const logsDir = runStore.createLogsDir(plan.runId);
	const context: EngineContext = {
		repoRoot,
		runDir,
		logsDir,
		workflowsPath: path.dirname(workflow.path),
		event,
		cacheDir: config.cache.enabled ? resolveCacheDir(repoRoot, config) : undefined,
		allowFloatingToolchains: config.toolchain.allowFloating,
		foreignRunners: config.runtime.foreignRunners,
		shell: config.runtime.shell,
		containerEngine: config.runtime.container,
		containerArchitecture: config.runtime.architecture,
		platformMap: config.runtime.platformMap,
		envFile: config.envFile ? path.resolve(repoRoot, config.envFile) : undefined,
	};
	const cancelPolicy = args.cancelPolicy ?? config.runtime.cancelPolicy;

	const controller = new AbortController();
	const onSigint = (): void => {
		if (controller.signal.aborted) {
			process.exit(130);
		}
		process.stderr.write(`\nCanceling run (${cancelPolicy}); press Ctrl-C again to quit.\n`);
		controller.abort();
	};
	process.on("SIGINT", onSigint);

	try {
		const result = await executeRun({
			plan,
			adapter,
			context,
			options: {
				configEnv: config.env,
				cancelPolicy,
				maxParallel: args.maxParallel ?? config.runtime.maxParallel,
				logPathFor: (legId) => runStore.createLogFile(plan.runId, legId),
			},
			controller,
			persist: createRunEventPersister(runStore),
			interactive,
			json: Boolean(args.json),
		});

		if (args.json) {
			process.stdout.write(`${JSON.stringify(buildJsonSummary(plan, result, logsDir))}\n`);
		} else {
			process.stdout.write(`\n${formatRunReport(plan, result)}`);
			if (interactive) {
				outro(`Logs: ${logsDir}`);
			} else {
				process.stdout.write(`Logs: ${logsDir}\n`);
			}
		}
		process.exitCode = result.exitCode;
	} finally {
		process.off("SIGINT", onSigint);
	}
}

async function chooseWorkflow(
	workflows: Workflow[],
	selector: string | undefined,
	interactive: boolean,
): Promise<Workflow | undefined> {
	const resolved = resolveWorkflow(workflows, selector);
	if (resolved) {
		return resolved;
	}
	if (selector) {
		process.stderr.write(`Workflow "${selector}" not found.\n`);
		process.exitCode = USAGE_EXIT_CODE;
		return undefined;
	}
	if (!interactive) {
		process.stderr.write("Several workflows found. Use --workflow.\n");
		process.exitCode = USAGE_EXIT_CODE;
		return undefined;
	}
	intro("legwork");
	const selected = await selectWorkflow(workflows);
	if (!selected) {
		process.exitCode = 130;
		return undefined;
	}
	return selected;
}
