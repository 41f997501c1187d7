import fs from "node:fs";
import { z } from "zod";
import type { CancelPolicy } from "../core/engine.js";

export type CliCommand = "run" | "init" | "cache";

export type CacheSubcommand = "list" | "clear";

export type CliOptions = {
	command: CliCommand;
	cacheCommand?: CacheSubcommand;
	workflow?: string;
	jobs?: string[];
	json?: boolean;
	event?: string;
	branch?: string;
	eventPath?: string;
	matrix?: string[];
	failFast?: boolean;
	cancelPolicy?: CancelPolicy;
	maxParallel?: number;
	engine?: string;
	help?: boolean;
	version?: boolean;
	unknown?: string[];
	errors?: string[];
};

const COMMANDS: CliCommand[] = ["run", "init", "cache"];

export function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = { command: "run", unknown: [], errors: [] };
	const args = [...argv];
	if (args[0] && !args[0].startsWith("-")) {
		const command = args.shift() ?? "run";
		const known = COMMANDS.find((item) => item === command);
		if (known) {
			options.command = known;
		} else {
			options.errors?.push(`Unknown command: ${command}`);
		}
	}
	if (options.command === "cache") {
		const sub = args[0] && !args[0].startsWith("-") ? args.shift() : undefined;
		if (sub === "list" || sub === "clear") {
			options.cacheCommand = sub;
		} else {
			options.errors?.push(`Expected \`cache list\` or \`cache clear\`${sub ? `, got \`cache ${sub}\`` : ""}`);
		}
	}

	while (args.length) {
		const arg = args.shift();
		switch (arg) {
			case "--help":
			case "-h":
				options.help = true;
				break;
			case "--version":
			case "-v":
				options.version = true;
				break;
			case "--workflow":
				options.workflow = takeValue("--workflow", args, options);
				break;
			case "--job":
				{
					const value = takeValue("--job", args, options);
					if (value) {
						options.jobs = value.split(",").map((item) => item.trim()).filter(Boolean);
					}
				}
				break;
			case "--event":
				options.event = takeValue("--event", args, options);
				break;
			case "--branch":
				options.branch = takeValue("--branch", args, options);
				break;
			case "--event-path":
				options.eventPath = takeValue("--event-path", args, options);
				break;
			case "--matrix":
				{
					const value = takeValue("--matrix", args, options);
					if (value) {
						options.matrix = [...(options.matrix ?? []), value];
					}
				}
				break;
			case "--json":
				options.json = true;
				break;
			case "--fail-fast":
				options.failFast = true;
				break;
			case "--no-fail-fast":
				options.failFast = false;
				break;
			case "--cancel-policy":
				{
					const value = takeValue("--cancel-policy", args, options);
					if (value === "terminate" || value === "drain") {
						options.cancelPolicy = value;
					} else if (value) {
						options.errors?.push(`Invalid value for --cancel-policy: ${value} (expected terminate|drain)`);
					}
				}
				break;
			case "--max-parallel":
				{
					const value = takeValue("--max-parallel", args, options);
					const parsed = Number(value);
					if (value && Number.isInteger(parsed) && parsed > 0) {
						options.maxParallel = parsed;
					} else if (value) {
						options.errors?.push(`Invalid value for --max-parallel: ${value} (expected a positive integer)`);
					}
				}
				break;
			case "--engine":
				options.engine = takeValue("--engine", args, options);
				break;
			default:
				if (arg) {
					options.unknown?.push(arg);
				}
				break;
		}
	}

	return options;
}

export function printHelp(): void {
	process.stdout.write(`legwork <command> [options]\n\n`);
	process.stdout.write(`Commands:\n`);
	process.stdout.write(`  run                     Run a workflow locally (default)\n`);
	process.stdout.write(`  init                    Add .legwork to .gitignore\n`);
	process.stdout.write(`  cache list|clear        Inspect or empty the dependency cache\n\n`);
	process.stdout.write(`Options:\n`);
	process.stdout.write(`  --workflow <file>        Workflow file name or id\n`);
	process.stdout.write(`  --job <ids>              Comma-separated job ids (needs are added)\n`);
	process.stdout.write(`  --event <name>           Trigger event (push, pull_request)\n`);
	process.stdout.write(`  --branch <name>          Branch the event targets (default: current branch)\n`);
	process.stdout.write(`  --event-path <file>      JSON event payload (act engine)\n`);
	process.stdout.write(`  --matrix <k:v>           Restrict matrix legs (repeatable)\n`);
	process.stdout.write(`  --fail-fast              Cancel sibling legs after the first failure\n`);
	process.stdout.write(`  --no-fail-fast           Let sibling legs finish after a failure\n`);
	process.stdout.write(`  --cancel-policy <p>      On Ctrl-C: terminate|drain in-flight legs\n`);
	process.stdout.write(`  --max-parallel <n>       Upper bound on concurrently running legs\n`);
	process.stdout.write(`  --engine <id>            Execution engine: local|act\n`);
	process.stdout.write(`  --json                   Print JSON summary\n`);
	process.stdout.write(`  -h, --help               Show help\n`);
	process.stdout.write(`  -v, --version            Show version\n`);
}

const PackageJsonSchema = z.object({ version: z.string().optional() });

export function readPackageVersion(): string {
	const pkgUrl = new URL("../../package.json", import.meta.url);
	const raw = fs.readFileSync(pkgUrl, "utf-8");
	const parsed = PackageJsonSchema.safeParse(JSON.parse(raw));
	return parsed.success ? (parsed.data.version ?? "0.0.0") : "0.0.0";
}

function takeValue(flag: string, args: string[], options: CliOptions): string | undefined {
	const value = args.shift();
	if (!value || value.startsWith("-")) {
		options.errors?.push(`Missing value for ${flag}`);
		if (value) {
			args.unshift(value);
		}
		return undefined;
	}
	return value;
}
