import React from "react";
import { render } from "ink";
import type { EngineAdapter, EngineContext, EngineRuntimeEvent } from "../core/engine.js";
import { type PipelineOptions, type PipelineResult, runPipeline } from "../core/orchestrator.js";
import type { RunPlan } from "../core/types.js";
import { SPINNER_INTERVAL_MS } from "../tui/run-view/constants.js";
import { createRunEventHub } from "../tui/run-view/event-hub.js";
import { RunView } from "../tui/run-view/run-view.js";
import { createPlainProgress } from "./progress.js";

export type ExecuteRunInput = {
	plan: RunPlan;
	adapter: EngineAdapter;
	context: EngineContext;
	options: Omit<PipelineOptions, "onEvent" | "signal">;
	controller: AbortController;
	persist: (event: EngineRuntimeEvent) => void;
	interactive: boolean;
	json: boolean;
};

export async function executeRun(input: ExecuteRunInput): Promise<PipelineResult> {
	const { plan, adapter, context, options, controller, persist } = input;

	if (input.interactive && !input.json) {
		const hub = createRunEventHub();
		const instance = render(
			React.createElement(RunView, {
				title: `${plan.workflow.name} · ${plan.event.name} on ${plan.event.branch} · ${adapter.id}`,
				hub,
				onCancel: () => controller.abort(),
			}),
			{ exitOnCtrlC: false },
		);
		try {
			return await runPipeline(
				plan,
				adapter,
				{ ...context, onOutput: hub.output },
				{
					...options,
					signal: controller.signal,
					onEvent: (event) => {
						persist(event);
						hub.emit(event);
					},
				},
			);
		} finally {
			// Let the last state update paint before tearing the view down.
			await new Promise((resolve) => setTimeout(resolve, SPINNER_INTERVAL_MS * 2));
			instance.unmount();
		}
	}

	const progress = input.json ? undefined : createPlainProgress();
	try {
		return await runPipeline(
			plan,
			adapter,
			{ ...context, onOutput: progress?.output },
			{
				...options,
				signal: controller.signal,
				onEvent: (event) => {
					persist(event);
					progress?.event(event);
				},
			},
		);
	} finally {
		progress?.flush();
	}
}
