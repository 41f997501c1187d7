import type { FailureKind, Step } from "./types.js";

type CommandRule = {
	pattern: RegExp;
	kind: FailureKind;
};

const COMMAND_RULES: CommandRule[] = [
	{ pattern: /\bcargo\s+(?:\+\S+\s+)?(?:fmt|clippy)\b/, kind: "gate" },
	{ pattern: /\b(?:eslint|prettier\s+--check|biome\s+(?:check|lint|format)|rustfmt\s+--check)\b/, kind: "gate" },
	{ pattern: /\bcargo\s+(?:\+\S+\s+)?(?:check|fetch|tree)\b.*--(?:locked|frozen)\b/, kind: "lock" },
	{ pattern: /\bnpm\s+ci\b/, kind: "lock" },
	{ pattern: /\bcargo\s+(?:\+\S+\s+)?(?:check|build)\b/, kind: "build" },
	{ pattern: /\b(?:tsc|npm\s+run\s+build)\b/, kind: "build" },
	{ pattern: /\bcargo\s+(?:\+\S+\s+)?(?:test|nextest)\b/, kind: "test" },
	{ pattern: /\b(?:npm\s+(?:run\s+)?test|vitest|jest)\b/, kind: "test" },
];

export const FAILURE_LABELS: Record<FailureKind, string> = {
	provisioning: "provisioning error",
	gate: "gate violation",
	lock: "dependency-lock inconsistency",
	build: "build failure",
	test: "test failure",
	command: "command failure",
	action: "action failure",
};

export function classifyCommand(command: string): FailureKind {
	const normalized = command.replace(/\s+/g, " ").trim();
	for (const rule of COMMAND_RULES) {
		if (rule.pattern.test(normalized)) {
			return rule.kind;
		}
	}
	return "command";
}

export function classifyStep(step: Step, isToolchainAction: (uses: string) => boolean): FailureKind {
	if (step.uses) {
		return isToolchainAction(step.uses) ? "provisioning" : "action";
	}
	return classifyCommand(step.run ?? "");
}
