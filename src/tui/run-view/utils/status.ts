import type { RunStatus } from "../../../core/types.js";
import { SPINNER_FRAMES } from "../constants.js";

export const STATUS_LABELS: Record<RunStatus, string> = {
	pending: "queued",
	running: "running",
	success: "success",
	failed: "failed",
	canceled: "canceled",
	skipped: "skipped",
};

export type StatusColor = "green" | "red" | "yellow" | "gray" | undefined;

export function renderStatusGlyph(status: RunStatus, spinnerIndex: number): string {
	switch (status) {
		case "success":
			return "●";
		case "failed":
			return "✕";
		case "running":
			return SPINNER_FRAMES[spinnerIndex % SPINNER_FRAMES.length] ?? "⠋";
		case "canceled":
			return "◌";
		case "skipped":
			return "⊘";
		default:
			return "○";
	}
}

export function colorForStatus(status: RunStatus): StatusColor {
	switch (status) {
		case "success":
			return "green";
		case "failed":
			return "red";
		case "running":
			return "yellow";
		case "canceled":
		case "skipped":
			return "gray";
		default:
			return undefined;
	}
}
