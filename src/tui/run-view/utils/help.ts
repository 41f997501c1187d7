import type { RunStatus } from "../../../core/types.js";

export type HelpTextInput = {
	status: RunStatus;
	cancelRequested: boolean;
	showSteps: boolean;
};

export function formatHelpText({ status, cancelRequested, showSteps }: HelpTextInput): string {
	const stepsHint = showSteps ? "S: hide steps" : "S: show steps";
	if (status !== "running" && status !== "pending") {
		return stepsHint;
	}
	if (cancelRequested) {
		return `Canceling… · ${stepsHint}`;
	}
	return `${stepsHint} · Q/Ctrl-C: cancel run`;
}
