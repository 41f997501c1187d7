import type { TriggerEvent, TriggerFilter, Workflow } from "./types.js";

export function resolveTriggerEvent(
	name: string,
	branch: string,
	payloadPath?: string,
): TriggerEvent {
	return Object.freeze({ name, branch: normalizeBranch(branch), payloadPath });
}

export function matchesTrigger(workflow: Workflow, event: TriggerEvent): boolean {
	return workflow.triggers.some((filter) => matchesFilter(filter, event));
}

export function matchesFilter(filter: TriggerFilter, event: TriggerEvent): boolean {
	if (filter.event !== event.name) {
		return false;
	}
	const branch = normalizeBranch(event.branch);
	if (filter.branches.length > 0 && !filter.branches.some((pattern) => matchesBranch(pattern, branch))) {
		return false;
	}
	return !filter.branchesIgnore.some((pattern) => matchesBranch(pattern, branch));
}

export function describeTriggers(workflow: Workflow): string {
	if (workflow.triggers.length === 0) {
		return "no triggers";
	}
	return workflow.triggers
		.map((filter) =>
			filter.branches.length > 0 ? `${filter.event} [${filter.branches.join(", ")}]` : filter.event,
		)
		.join(", ");
}

export function matchesBranch(pattern: string, branch: string): boolean {
	return branchPatternToRegExp(pattern).test(branch);
}

function branchPatternToRegExp(pattern: string): RegExp {
	let source = "";
	for (let i = 0; i < pattern.length; i += 1) {
		const char = pattern[i];
		if (char === "*") {
			if (pattern[i + 1] === "*") {
				source += ".*";
				i += 1;
			} else {
				source += "[^/]*";
			}
			continue;
		}
		if (char === "?") {
			source += ".";
			continue;
		}
		source += char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
	}
	return new RegExp(`^${source}$`);
}

function normalizeBranch(branch: string): string {
	return branch.replace(/^refs\/heads\//, "");
}
