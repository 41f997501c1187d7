import { FAILURE_LABELS } from "../core/failure.js";
import type { PipelineResult } from "../core/orchestrator.js";
import type { LegRun, RunPlan, RunStatus } from "../core/types.js";
import { formatDuration } from "../tui/run-view/format.js";

export type JsonSummary = {
	runId: string;
	status: PipelineResult["status"];
	exitCode: number;
	reason?: string;
	workflow: { id: string; name: string; path: string };
	event: { name: string; branch: string };
	jobs: {
		jobId: string;
		status: RunStatus;
		reason?: string;
		legs: {
			legId: string;
			status: RunStatus;
			runsOn?: string;
			durationMs?: number;
			failureKind?: string;
			failedStep?: string;
			reason?: string;
			logPath?: string;
		}[];
	}[];
	logsDir?: string;
};

export function buildJsonSummary(plan: RunPlan, result: PipelineResult, logsDir?: string): JsonSummary {
	return {
		runId: result.runId,
		status: result.status,
		exitCode: result.exitCode,
		reason: result.reason,
		workflow: {
			id: plan.workflow.id,
			name: plan.workflow.name,
			path: plan.workflow.path,
		},
		event: { name: plan.event.name, branch: plan.event.branch },
		jobs: plan.jobs.map((planned) => {
			const job = result.jobs.find((item) => item.jobId === planned.jobId);
			return {
				jobId: planned.jobId,
				status: job?.status ?? "pending",
				reason: job?.reason,
				legs: result.legs
					.filter((leg) => leg.jobId === planned.jobId)
					.map((leg) => ({
						legId: leg.legId,
						status: leg.status,
						runsOn: leg.runsOn,
						durationMs: leg.durationMs,
						failureKind: leg.failureKind,
						failedStep: findFailedStep(leg),
						reason: leg.reason,
						logPath: leg.logPath,
					})),
			};
		}),
		logsDir,
	};
}

const REPORT_GLYPHS: Record<RunStatus, string> = {
	pending: "○",
	running: "…",
	success: "✓",
	failed: "✗",
	canceled: "◌",
	skipped: "-",
};

/** Plain-text report printed after a run. Failed legs name the failing step and its failure kind. */
export function formatRunReport(plan: RunPlan, result: PipelineResult): string {
	const lines: string[] = [];
	for (const planned of plan.jobs) {
		const job = result.jobs.find((item) => item.jobId === planned.jobId);
		const status = job?.status ?? "pending";
		lines.push(`${REPORT_GLYPHS[status]} ${planned.jobId} ${status}${job?.reason ? ` (${job.reason})` : ""}`);
		for (const leg of result.legs.filter((item) => item.jobId === planned.jobId)) {
			lines.push(`    ${formatLegLine(leg)}`);
		}
	}
	lines.push("");
	lines.push(`Run ${result.runId}: ${result.status}${result.reason ? ` (${result.reason})` : ""}`);
	return `${lines.join("\n")}\n`;
}

function formatLegLine(leg: LegRun): string {
	const duration = leg.durationMs !== undefined ? ` ${formatDuration(leg.durationMs)}` : "";
	const head = `${REPORT_GLYPHS[leg.status]} ${leg.name}${duration}`;
	if (leg.status === "failed") {
		const kind = leg.failureKind ? FAILURE_LABELS[leg.failureKind] : "failure";
		const step = findFailedStep(leg);
		return `${head}: ${kind}${step ? ` in "${step}"` : ""}`;
	}
	if (leg.status === "skipped" || leg.status === "canceled") {
		return leg.reason ? `${head}: ${leg.reason}` : head;
	}
	return head;
}

function findFailedStep(leg: LegRun): string | undefined {
	return leg.steps.find((step) => step.status === "failed" && step.failureKind !== undefined)?.name;
}
