import type { EngineRuntimeEvent, OutputSource } from "../../core/engine.js";

export type RunViewListener = {
	onEvent: (event: EngineRuntimeEvent) => void;
	onOutput: (chunk: string, source: OutputSource, legId?: string) => void;
};

export type RunEventHub = {
	emit: (event: EngineRuntimeEvent) => void;
	output: (chunk: string, source: OutputSource, legId?: string) => void;
	subscribe: (listener: RunViewListener) => () => void;
};

/**
 * Fans orchestrator callbacks out to the view. Runtime events are replayed
 * to late subscribers, since the view mounts after the run may have started;
 * output is only live.
 */
export function createRunEventHub(): RunEventHub {
	const history: EngineRuntimeEvent[] = [];
	const listeners = new Set<RunViewListener>();

	return {
		emit: (event) => {
			history.push(event);
			for (const listener of listeners) {
				listener.onEvent(event);
			}
		},
		output: (chunk, source, legId) => {
			for (const listener of listeners) {
				listener.onOutput(chunk, source, legId);
			}
		},
		subscribe: (listener) => {
			for (const event of history) {
				listener.onEvent(event);
			}
			listeners.add(listener);
			return () => {
				listeners.delete(listener);
			};
		},
	};
}
