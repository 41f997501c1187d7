import type { ForeignRunnerPolicy, RunnerCheck } from "../../core/engine.js";
import type { MatrixLeg } from "../../core/types.js";

export type RunnerPlatform = "linux" | "win32" | "darwin";

const PLATFORM_LABELS: Record<RunnerPlatform, string> = {
	linux: "Linux",
	win32: "Windows",
	darwin: "macOS",
};

export function parseRunsOnLabels(runsOn: string | undefined): string[] {
	return (runsOn ?? "")
		.split(",")
		.map((value) => value.trim())
		.filter(Boolean);
}

/**
 * Maps `runs-on` labels to the platform they need. `any` means the labels
 * (or their absence) do not pin a platform; `undefined` means no label was
 * recognised.
 */
export function resolveRunnerPlatform(runsOn: string | undefined): RunnerPlatform | "any" | undefined {
	const labels = parseRunsOnLabels(runsOn).map((label) => label.toLowerCase());
	if (labels.length === 0) {
		return "any";
	}
	let selfHosted = false;
	for (const label of labels) {
		if (label === "linux" || label === "ubuntu" || label.startsWith("ubuntu-")) {
			return "linux";
		}
		if (label === "windows" || label.startsWith("windows-")) {
			return "win32";
		}
		if (label === "macos" || label.startsWith("macos-") || label === "osx") {
			return "darwin";
		}
		if (label === "self-hosted" || label === "local") {
			selfHosted = true;
		}
	}
	return selfHosted ? "any" : undefined;
}

export function checkHostRunner(
	leg: MatrixLeg,
	hostPlatform: string,
	policy: ForeignRunnerPolicy = "skip",
): RunnerCheck {
	const target = resolveRunnerPlatform(leg.runsOn);
	if (target === "any" || target === hostPlatform) {
		return { ok: true };
	}
	const host = platformLabel(hostPlatform);
	if (policy === "host") {
		return {
			ok: true,
			note: `${leg.legId}: ${leg.runsOn ?? "runner"} is emulated on the ${host} host`,
		};
	}
	if (!target) {
		return { ok: false, reason: `unsupported runner labels: ${leg.runsOn ?? ""}` };
	}
	return {
		ok: false,
		reason: `${leg.runsOn ?? "runner"} needs a ${PLATFORM_LABELS[target]} host; this host is ${host}`,
	};
}

function isRunnerPlatform(platform: string): platform is RunnerPlatform {
	return platform === "linux" || platform === "win32" || platform === "darwin";
}

function platformLabel(platform: string): string {
	return isRunnerPlatform(platform) ? PLATFORM_LABELS[platform] : platform;
}
