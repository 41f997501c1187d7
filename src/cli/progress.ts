import type { EngineRuntimeEvent, OutputSource } from "../core/engine.js";
import { FAILURE_LABELS } from "../core/failure.js";
import { formatDuration } from "../tui/run-view/format.js";

export type ProgressWriter = (text: string, source: OutputSource) => void;

export type PlainProgress = {
	event: (event: EngineRuntimeEvent) => void;
	output: (chunk: string, source: OutputSource, legId?: string) => void;
	flush: () => void;
};

const defaultWriter: ProgressWriter = (text, source) => {
	(source === "stderr" ? process.stderr : process.stdout).write(text);
};

/**
 * Line-oriented progress for non-interactive runs. Concurrent legs share the
 * terminal, so every output line is prefixed with its leg id.
 */
export function createPlainProgress(write: ProgressWriter = defaultWriter): PlainProgress {
	const partial = new Map<string, string>();

	const emitLines = (legId: string, text: string, source: OutputSource): void => {
		for (const line of text.split("\n")) {
			write(`[${legId}] ${line}\n`, source);
		}
	};

	return {
		event: (event) => {
			switch (event.type) {
				case "run-started":
					write(`Run ${event.runId}: ${event.jobs.length} job(s)\n`, "stdout");
					return;
				case "job-started":
					write(`▶ ${event.jobId}\n`, "stdout");
					return;
				case "leg-finished": {
					const { leg } = event;
					const duration = leg.durationMs !== undefined ? ` in ${formatDuration(leg.durationMs)}` : "";
					const detail =
						leg.status === "failed" && leg.failureKind
							? ` (${FAILURE_LABELS[leg.failureKind]}${leg.reason ? `: ${leg.reason}` : ""})`
							: leg.reason
								? ` (${leg.reason})`
								: "";
					write(`  ${leg.legId} ${leg.status}${duration}${detail}\n`, "stdout");
					return;
				}
				case "job-finished":
					write(`■ ${event.jobId} ${event.status}${event.reason ? ` (${event.reason})` : ""}\n`, "stdout");
					return;
				default:
					return;
			}
		},
		output: (chunk, source, legId) => {
			if (!legId) {
				write(chunk, source);
				return;
			}
			const key = `${legId}\0${source}`;
			const text = (partial.get(key) ?? "") + chunk;
			const cut = text.lastIndexOf("\n");
			if (cut === -1) {
				partial.set(key, text);
				return;
			}
			partial.set(key, text.slice(cut + 1));
			emitLines(legId, text.slice(0, cut), source);
		},
		flush: () => {
			for (const [key, text] of partial) {
				if (text.length > 0) {
					const [legId, source] = key.split("\0");
					emitLines(legId, text, source === "stderr" ? "stderr" : "stdout");
				}
			}
			partial.clear();
		},
	};
}
