import {
	COMMAND_NOT_FOUND_EXIT_CODE,
	type CommandOutput,
	type CommandResult,
	type CommandRunner,
	SpawnCommandRunner,
} from "../utils/command-runner.js";

const TOOLCHAIN_ACTIONS = new Set([
	"hecrj/setup-rust-action",
	"dtolnay/rust-toolchain",
	"actions-rs/toolchain",
]);

const PINNED_TOOLCHAIN =
	/^(?:\d+\.\d+\.\d+|(?:stable|beta|nightly)-\d{4}-\d{2}-\d{2})(?:-[a-z0-9_]+)*$/;

export type ToolchainRequest = {
	action: string;
	toolchain: string;
	profile: string;
	components: string[];
	targets: string[];
};

export type InstallOptions = {
	cwd: string;
	env: Record<string, string>;
	signal?: AbortSignal;
	onOutput: CommandOutput;
};

export interface ToolchainInstaller {
	readonly tool: string;
	install(request: ToolchainRequest, options: InstallOptions): Promise<CommandResult>;
	activate(request: ToolchainRequest): Record<string, string>;
}

export type ProvisionResult =
	| { ok: true; toolchain: string; env: Record<string, string> }
	| { ok: false; error: string };

export type ProvisionOptions = InstallOptions & {
	installer: ToolchainInstaller;
	allowFloating?: boolean;
};

export function actionName(uses: string): string {
	const at = uses.indexOf("@");
	return (at === -1 ? uses : uses.slice(0, at)).trim().toLowerCase();
}

export function actionRef(uses: string): string | undefined {
	const at = uses.indexOf("@");
	return at === -1 ? undefined : uses.slice(at + 1).trim();
}

export function isToolchainAction(uses: string): boolean {
	return TOOLCHAIN_ACTIONS.has(actionName(uses));
}

export function isPinnedToolchain(toolchain: string): boolean {
	return PINNED_TOOLCHAIN.test(toolchain.trim());
}

export function readToolchainRequest(
	uses: string,
	inputs: Record<string, string> = {},
): ToolchainRequest {
	const action = actionName(uses);
	const profile = inputs.profile?.trim() || "default";

	switch (action) {
		case "dtolnay/rust-toolchain": {
			// The action ref doubles as the toolchain selector unless it names a branch.
			const ref = actionRef(uses);
			const fromRef = ref && ref !== "master" && ref !== "v1" ? ref : undefined;
			return {
				action,
				toolchain: inputs.toolchain?.trim() || fromRef || "stable",
				profile,
				components: splitList(inputs.components),
				targets: splitList(inputs.targets),
			};
		}
		case "actions-rs/toolchain":
			return {
				action,
				toolchain: inputs.toolchain?.trim() || "stable",
				profile,
				components: splitList(inputs.components),
				targets: splitList(inputs.target),
			};
		default:
			return {
				action,
				toolchain: inputs["rust-version"]?.trim() || "stable",
				profile,
				components: splitList(inputs.components),
				targets: splitList(inputs.targets),
			};
	}
}

export async function provisionToolchain(
	request: ToolchainRequest,
	options: ProvisionOptions,
): Promise<ProvisionResult> {
	if (!options.allowFloating && !isPinnedToolchain(request.toolchain)) {
		return {
			ok: false,
			error: `toolchain "${request.toolchain}" is not pinned; use an exact version (1.79.0) or a dated channel (nightly-2024-06-25)`,
		};
	}

	const { installer } = options;
	const result = await installer.install(request, options);
	if (result.aborted) {
		return { ok: false, error: "toolchain installation canceled" };
	}
	if (result.exitCode === COMMAND_NOT_FOUND_EXIT_CODE && result.error) {
		return { ok: false, error: `${installer.tool} is not available: ${result.error}` };
	}
	if (result.exitCode !== 0) {
		return {
			ok: false,
			error: `toolchain ${request.toolchain} is unavailable for this environment (${installer.tool} exited with ${result.exitCode})`,
		};
	}

	return { ok: true, toolchain: request.toolchain, env: installer.activate(request) };
}

export function buildRustupArgs(request: ToolchainRequest): string[] {
	const args = ["toolchain", "install", request.toolchain, "--profile", request.profile, "--no-self-update"];
	if (request.components.length > 0) {
		args.push("--component", request.components.join(","));
	}
	if (request.targets.length > 0) {
		args.push("--target", request.targets.join(","));
	}
	return args;
}

export class RustupInstaller implements ToolchainInstaller {
	readonly tool = "rustup";

	constructor(private readonly runner: CommandRunner = new SpawnCommandRunner()) {}

	install(request: ToolchainRequest, options: InstallOptions): Promise<CommandResult> {
		const args = buildRustupArgs(request);
		options.onOutput(`$ rustup ${args.join(" ")}\n`, "stdout");
		return this.runner.run(
			{
				command: "rustup",
				args,
				cwd: options.cwd,
				env: options.env,
				signal: options.signal,
			},
			options.onOutput,
		);
	}

	activate(request: ToolchainRequest): Record<string, string> {
		return { RUSTUP_TOOLCHAIN: request.toolchain };
	}
}

export function describeToolchain(request: ToolchainRequest): string {
	const extras = [...request.components, ...request.targets];
	return extras.length > 0 ? `${request.toolchain} (${extras.join(", ")})` : request.toolchain;
}

function splitList(value: string | undefined): string[] {
	return (value ?? "")
		.split(/[,\s]+/)
		.map((item) => item.trim())
		.filter(Boolean);
}
