import { actionName } from "../toolchain/provisioner.js";
import { buildCacheKey, computeLockFingerprint, RUST_DEPENDENCY_FILES } from "./fingerprint.js";

const CACHE_ACTIONS = new Set(["swatinem/rust-cache", "actions/cache"]);

/** The cache step's inputs cannot describe a cache entry. */
export class CacheConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "CacheConfigError";
	}
}

export type CachePlan = {
	action: string;
	key: string;
	restoreKeys: string[];
	paths: string[];
	saveOnFailure: boolean;
};

export type CachePlanInput = {
	uses: string;
	inputs: Record<string, string>;
	repoRoot: string;
	jobId: string;
	runner: string;
	toolchain?: string;
	env: Record<string, string>;
};

export function isCacheAction(uses: string): boolean {
	return CACHE_ACTIONS.has(actionName(uses));
}

export function planCache(input: CachePlanInput): CachePlan {
	if (actionName(input.uses) === "actions/cache") {
		return planGenericCache(input);
	}
	return planRustCache(input);
}

function planRustCache({ inputs, repoRoot, jobId, runner, toolchain, env }: CachePlanInput): CachePlan {
	const cargoHome = env.CARGO_HOME?.trim() || "~/.cargo";
	const targets = parseWorkspaces(inputs.workspaces).map((workspace) =>
		joinRelative(workspace.root, workspace.target),
	);
	const { key, restoreKeys } = buildCacheKey({
		prefix: inputs["prefix-key"]?.trim() || "v0-rust",
		scope: inputs["shared-key"]?.trim() || jobId,
		runner,
		toolchain,
		extra: inputs.key?.trim(),
		lockHash: computeLockFingerprint(repoRoot, RUST_DEPENDENCY_FILES),
	});

	return {
		action: "Swatinem/rust-cache",
		key,
		restoreKeys,
		paths: [`${cargoHome}/registry`, `${cargoHome}/git`, ...targets],
		saveOnFailure: inputs["cache-on-failure"]?.trim().toLowerCase() === "true",
	};
}

function planGenericCache({ inputs, runner }: CachePlanInput): CachePlan {
	const key = inputs.key?.trim();
	if (!key) {
		throw new CacheConfigError("actions/cache requires a `key` input");
	}
	const paths = splitLines(inputs.path);
	if (paths.length === 0) {
		throw new CacheConfigError("actions/cache requires a `path` input");
	}
	return {
		action: "actions/cache",
		key: `${runner}-${key}`,
		restoreKeys: splitLines(inputs["restore-keys"]).map((prefix) => `${runner}-${prefix}`),
		paths,
		saveOnFailure: false,
	};
}

function parseWorkspaces(value: string | undefined): { root: string; target: string }[] {
	const lines = splitLines(value);
	if (lines.length === 0) {
		return [{ root: ".", target: "target" }];
	}
	return lines.map((line) => {
		const [root, target] = line.split("->").map((part) => part.trim());
		return { root: root || ".", target: target || "target" };
	});
}

function joinRelative(root: string, target: string): string {
	if (root === "." || root === "./") {
		return target;
	}
	return `${root.replace(/\/+$/, "")}/${target}`;
}

function splitLines(value: string | undefined): string[] {
	return (value ?? "")
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter(Boolean);
}
