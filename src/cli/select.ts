import { cancel, isCancel, multiselect, select, text } from "@clack/prompts";
import { collectMatrixKeys } from "../core/matrix.js";
import type { Workflow } from "../core/types.js";

export const SUPPORTED_EVENTS = ["push", "pull_request"];

export function resolveWorkflow(workflows: Workflow[], selector?: string): Workflow | undefined {
	if (!selector) {
		return workflows.length === 1 ? workflows[0] : undefined;
	}
	return workflows.find(
		(wf) => wf.id === selector || wf.id.endsWith(selector) || wf.path.endsWith(selector) || wf.name === selector,
	);
}

export function resolveSupportedEvents(workflow: Workflow): string[] {
	const declared = workflow.events.filter((event) => SUPPORTED_EVENTS.includes(event));
	return declared.length > 0 ? declared : SUPPORTED_EVENTS;
}

export async function selectWorkflow(workflows: Workflow[]): Promise<Workflow | null> {
	const selection = await select({
		message: "Select a workflow",
		options: workflows.map((wf) => ({ value: wf.id, label: wf.name, hint: wf.path })),
	});
	if (isCancel(selection)) {
		cancel("Canceled.");
		return null;
	}
	return workflows.find((wf) => wf.id === selection) ?? null;
}

export async function selectEvent(defaultEvent: string, events: string[]): Promise<string | null> {
	const selection = await select({
		message: "Select an event",
		initialValue: events.includes(defaultEvent) ? defaultEvent : events[0],
		options: events.map((event) => ({ value: event, label: event })),
	});
	if (isCancel(selection)) {
		cancel("Canceled.");
		return null;
	}
	return selection;
}

export async function selectJobs(
	jobs: { id: string; name: string }[],
	initial: string[],
): Promise<string[] | null> {
	const selection = await multiselect({
		message: "Select jobs to run (needs are added automatically)",
		options: jobs.map((job) => ({
			value: job.id,
			label: job.name,
		})),
		initialValues: initial,
	});
	if (isCancel(selection)) {
		cancel("Canceled.");
		return null;
	}
	return selection;
}

export async function promptMatrix(workflow: Workflow, jobIds: string[]): Promise<string[] | undefined | null> {
	const keys = collectWorkflowMatrixKeys(workflow, jobIds);
	if (keys.length === 0) {
		return undefined;
	}
	const selection = await text({
		message: `Matrix filter (optional, key:value,key:value) [keys: ${keys.join(", ")}]`,
		placeholder: keys.map((key) => `${key}:<value>`).join(","),
	});
	if (isCancel(selection)) {
		cancel("Canceled.");
		return null;
	}
	if (!selection) {
		return undefined;
	}
	const items = selection
		.split(",")
		.map((item) => item.trim())
		.filter(Boolean);
	return items.length > 0 ? items : undefined;
}

export function collectWorkflowMatrixKeys(workflow: Workflow, jobIds: string[]): string[] {
	const keys = new Set<string>();
	for (const job of workflow.jobs) {
		if (jobIds.includes(job.id)) {
			collectMatrixKeys(job).forEach((key) => keys.add(key));
		}
	}
	return Array.from(keys);
}
