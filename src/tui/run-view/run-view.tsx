import { Box, Text, useInput } from "ink";
import { useEffect, useRef, useState } from "react";
import { FAILURE_LABELS } from "../../core/failure.js";
import { OUTPUT_TAIL_LINES, SPINNER_FRAMES, SPINNER_INTERVAL_MS } from "./constants.js";
import type { RunEventHub } from "./event-hub.js";
import { formatDuration, formatElapsed } from "./format.js";
import { appendLegOutput, applyRunEvent, initialRunViewState, type LegView, type RunViewState } from "./state.js";
import { formatHelpText } from "./utils/help.js";
import { colorForStatus, renderStatusGlyph, STATUS_LABELS } from "./utils/status.js";

export type RunViewProps = {
	title: string;
	hub: RunEventHub;
	onCancel: () => void;
};

export function RunView({ title, hub, onCancel }: RunViewProps): JSX.Element {
	const [state, setState] = useState<RunViewState>(initialRunViewState);
	const [spinnerIndex, setSpinnerIndex] = useState(0);
	const [showSteps, setShowSteps] = useState(true);
	const [cancelRequested, setCancelRequested] = useState(false);
	const [now, setNow] = useState(Date.now());
	const cancelSent = useRef(false);

	useEffect(
		() =>
			hub.subscribe({
				onEvent: (event) => setState((prev) => applyRunEvent(prev, event)),
				onOutput: (chunk, _source, legId) => {
					if (legId) {
						setState((prev) => appendLegOutput(prev, legId, chunk, OUTPUT_TAIL_LINES));
					}
				},
			}),
		[hub],
	);

	useEffect(() => {
		const interval = setInterval(() => {
			setSpinnerIndex((prev) => (prev + 1) % SPINNER_FRAMES.length);
			setNow(Date.now());
		}, SPINNER_INTERVAL_MS);
		return () => clearInterval(interval);
	}, []);

	useInput((input, key) => {
		if (input === "s") {
			setShowSteps((prev) => !prev);
			return;
		}
		if ((input === "q" || (key.ctrl && input === "c")) && !cancelSent.current) {
			if (state.status === "running" || state.status === "pending") {
				cancelSent.current = true;
				setCancelRequested(true);
				onCancel();
			}
		}
	});

	return (
		<Box flexDirection="column" paddingX={1}>
			<Box marginBottom={1}>
				<Text>
					{title}
					{state.runId ? ` · ${state.runId}` : ""}
				</Text>
				<Text color={colorForStatus(state.status)}>
					{"  "}
					{renderStatusGlyph(state.status, spinnerIndex)} {STATUS_LABELS[state.status]}
				</Text>
			</Box>

			{state.jobs.map((job) => (
				<Box key={job.jobId} flexDirection="column">
					<Text color={colorForStatus(job.status)} bold>
						{renderStatusGlyph(job.status, spinnerIndex)} {job.jobId}
						{job.reason ? <Text dimColor> · {job.reason}</Text> : null}
					</Text>
					{job.legs.map((leg) => (
						<LegRow key={leg.legId} leg={leg} spinnerIndex={spinnerIndex} showSteps={showSteps} now={now} />
					))}
				</Box>
			))}

			<Box marginTop={1}>
				<Text dimColor>{formatHelpText({ status: state.status, cancelRequested, showSteps })}</Text>
			</Box>
		</Box>
	);
}

type LegRowProps = {
	leg: LegView;
	spinnerIndex: number;
	showSteps: boolean;
	now: number;
};

function LegRow({ leg, spinnerIndex, showSteps, now }: LegRowProps): JSX.Element {
	const duration =
		leg.durationMs !== undefined
			? formatDuration(leg.durationMs)
			: leg.status === "running"
				? formatElapsed(leg.startedAt, now)
				: undefined;
	const detail =
		leg.status === "failed" && leg.failureKind
			? FAILURE_LABELS[leg.failureKind]
			: leg.status === "skipped" || leg.status === "canceled"
				? leg.reason
				: undefined;

	return (
		<Box flexDirection="column" paddingLeft={2}>
			<Text color={colorForStatus(leg.status)}>
				{renderStatusGlyph(leg.status, spinnerIndex)} {leg.name}
				{duration ? <Text dimColor> {duration}</Text> : null}
				{detail ? <Text dimColor> · {detail}</Text> : null}
			</Text>
			{showSteps
				? leg.steps.map((step) => (
						<Box key={step.stepId} paddingLeft={2}>
							<Text color={colorForStatus(step.status)} dimColor={step.status === "skipped"}>
								{renderStatusGlyph(step.status, spinnerIndex)} {step.name}
								{step.durationMs !== undefined ? ` ${formatDuration(step.durationMs)}` : ""}
							</Text>
						</Box>
					))
				: null}
			{leg.status === "running"
				? leg.output.map((line, index) => (
						<Box key={`${leg.legId}-${index}`} paddingLeft={4}>
							<Text dimColor wrap="truncate-end">
								{line}
							</Text>
						</Box>
					))
				: null}
		</Box>
	);
}
