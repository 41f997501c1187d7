import type { StepProgress } from "../../core/engine.js";
import type { RunStatus, Step, StepRun } from "../../core/types.js";

export type ActLegStatus = "success" | "failed" | "canceled";

export type ActStepTracker = {
	push: (chunk: string) => StepProgress[];
	flush: () => StepProgress[];
	finish: (status: ActLegStatus) => StepRun[];
	firstFailedStep: () => Step | undefined;
};

type TrackedStep = {
	status: RunStatus;
	startedAt?: number;
	durationMs?: number;
};

/**
 * Follows act's step markers (`⭐ Run`, `✅ Success`, `❌ Failure`) and maps
 * them back onto the job's steps by name. Pre and post phases are ignored.
 */
export function createActStepTracker(steps: Step[], now: () => number = Date.now): ActStepTracker {
	const nameToIndices = new Map<string, number[]>();
	steps.forEach((step, index) => {
		const key = normalizeStepName(step.name);
		const list = nameToIndices.get(key) ?? [];
		list.push(index);
		nameToIndices.set(key, list);
	});
	const nameToCursor = new Map<string, number>();
	const lastIndexForName = new Map<string, number>();
	const tracked = new Map<number, TrackedStep>();
	let buffer = "";

	const resolveIndex = (key: string): number | undefined => {
		const indices = nameToIndices.get(key);
		if (!indices || indices.length === 0) {
			return undefined;
		}
		const cursor = nameToCursor.get(key) ?? 0;
		const index = indices[cursor];
		if (index === undefined) {
			return lastIndexForName.get(key);
		}
		nameToCursor.set(key, cursor + 1);
		lastIndexForName.set(key, index);
		return index;
	};

	const finishStep = (index: number, status: "success" | "failed"): StepProgress => {
		const step = steps[index];
		const entry: TrackedStep = tracked.get(index) ?? { status };
		entry.status = status;
		entry.durationMs = entry.startedAt === undefined ? undefined : now() - entry.startedAt;
		tracked.set(index, entry);
		return { type: "step-finished", step: toStepRun(step, entry) };
	};

	const parseLine = (raw: string): StepProgress | undefined => {
		const line = stripAnsi(raw).replace(/\r/g, "");
		const startMatch = line.match(/⭐\s+Run\s+(.+)$/);
		if (startMatch) {
			const phase = splitPhase(startMatch[1]);
			if (phase.skip) {
				return undefined;
			}
			const index = resolveIndex(phase.key);
			if (index === undefined) {
				return undefined;
			}
			tracked.set(index, { status: "running", startedAt: now() });
			return { type: "step-started", stepId: steps[index].id, name: steps[index].name };
		}

		const resultMatch = line.match(/(✅\s+Success|❌\s+Failure)\s+-\s+(.+)$/);
		if (resultMatch) {
			const phase = splitPhase(resultMatch[2]);
			if (phase.skip) {
				return undefined;
			}
			const index = lastIndexForName.get(phase.key) ?? resolveIndex(phase.key);
			if (index === undefined) {
				return undefined;
			}
			return finishStep(index, resultMatch[1].startsWith("✅") ? "success" : "failed");
		}
		return undefined;
	};

	const collect = (input: string, flushRemainder: boolean): StepProgress[] => {
		buffer += input;
		const lines = buffer.split("\n");
		const remainder = lines.pop() ?? "";
		buffer = flushRemainder ? "" : remainder;
		if (flushRemainder && remainder.length > 0) {
			lines.push(remainder);
		}
		const progress: StepProgress[] = [];
		for (const line of lines) {
			const item = parseLine(line);
			if (item) {
				progress.push(item);
			}
		}
		return progress;
	};

	return {
		push: (chunk) => collect(chunk, false),
		flush: () => collect("", true),
		finish: (status) =>
			steps.map((step, index): StepRun => {
				const entry = tracked.get(index);
				if (!entry) {
					return { stepId: step.id, name: step.name, status: "skipped" };
				}
				if (entry.status === "running") {
					entry.status = status;
				}
				return toStepRun(step, entry);
			}),
		firstFailedStep: () => {
			for (const [index, entry] of [...tracked.entries()].sort((a, b) => a[0] - b[0])) {
				if (entry.status === "failed") {
					return steps[index];
				}
			}
			return undefined;
		},
	};
}

export type ActOutputFormatter = {
	push: (chunk: string) => string;
	flush: () => string;
};

/** Rewrites act's console output into the grouped layout the run view prints. */
export function createActOutputFormatter(): ActOutputFormatter {
	let buffer = "";
	let inGroup = false;

	const formatLine = (input: string): string | null => {
		const line = stripAnsi(input).replace(/\r/g, "");
		const body = stripActJobPrefix(line).trimStart();
		if (body.length === 0) {
			return null;
		}
		if (body.includes("::endgroup::")) {
			inGroup = false;
			return null;
		}
		const groupMatch = body.match(/^(?:❓\s+)?::group::\s*(.+)$/);
		if (groupMatch) {
			inGroup = true;
			return `▾ ${groupMatch[1].trim()}`;
		}
		if (shouldSuppressActLine(body)) {
			return null;
		}

		const pipeMatch = body.match(/^\|\s?(.*)$/);
		let content = pipeMatch ? pipeMatch[1] : body.replace(/^❓\s+/, "");
		const runMatch = content.match(/^⭐\s+Run\s+(.+)$/);
		if (runMatch) {
			inGroup = false;
			content = `▾ ${runMatch[1].trim()}`;
		}
		const successMatch = content.match(/^✅\s+Success\s+-\s+(.+)$/);
		if (successMatch) {
			content = `✓ ${successMatch[1].trim()}`;
		}
		const failureMatch = content.match(/^❌\s+Failure\s+-\s+(.+)$/);
		if (failureMatch) {
			content = `✗ ${failureMatch[1].trim()}`;
		}
		return inGroup ? `   ${content}` : content;
	};

	const collect = (input: string, flushRemainder: boolean): string => {
		buffer += input;
		const lines = buffer.split("\n");
		const remainder = lines.pop() ?? "";
		buffer = flushRemainder ? "" : remainder;
		if (flushRemainder && remainder.length > 0) {
			lines.push(remainder);
		}
		const formatted = lines.map(formatLine).filter((value): value is string => Boolean(value));
		return formatted.length === 0 ? "" : `${formatted.join("\n")}\n`;
	};

	return {
		push: (chunk) => collect(chunk, false),
		flush: () => collect("", true),
	};
}

export function looksLikeDockerStorageError(text: string): boolean {
	return (
		text.includes("Error response from daemon") &&
		(text.includes("input/output error") || text.includes("I/O error"))
	);
}

function toStepRun(step: Step, entry: TrackedStep): StepRun {
	return {
		stepId: step.id,
		name: step.name,
		status: entry.status,
		durationMs: entry.durationMs,
	};
}

function splitPhase(label: string): { key: string; skip: boolean } {
	const cleaned = label.replace(/\s*\[[^\]]+]\s*$/g, "").trim();
	const phase = cleaned.match(/^(main|pre|post)\s+/i);
	const skip = phase !== null && phase[1].toLowerCase() !== "main";
	return { key: normalizeStepName(cleaned), skip };
}

function normalizeStepName(name: string): string {
	return name
		.replace(/^(main|pre|post)\s+/i, "")
		.trim()
		.toLowerCase();
}

function shouldSuppressActLine(line: string): boolean {
	return (
		line.startsWith("🐳") ||
		/\bdocker\s+(cp|exec|run|pull)\b/.test(line) ||
		/^(?:❓\s+)?(?:add|remove)-matcher\s+/i.test(line)
	);
}

function stripActJobPrefix(line: string): string {
	return line.replace(/^\[[^\]]+\]\s+/, "");
}

const ESCAPE = String.fromCharCode(27);
const ANSI_PATTERN = new RegExp(`${ESCAPE}\\[[0-9;]*m`, "g");

export function stripAnsi(input: string): string {
	return input.replace(ANSI_PATTERN, "");
}
