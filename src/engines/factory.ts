import type { EngineAdapter } from "../core/engine.js";
import { ActAdapter } from "./act/act-adapter.js";
import { LocalAdapter } from "./local/local-adapter.js";

type EngineAdapterConstructor = new () => EngineAdapter;

const ENGINE_REGISTRY: Record<string, EngineAdapterConstructor> = {
	local: LocalAdapter,
	act: ActAdapter,
};

export const DEFAULT_ENGINE = "local";

export function createEngineAdapter(engineId: string = DEFAULT_ENGINE): EngineAdapter {
	const normalized = engineId.trim().toLowerCase();
	const ctor = ENGINE_REGISTRY[normalized];
	if (!ctor) {
		throw new Error(
			`Unsupported engine "${engineId}". Available engines: ${listRegisteredEngines().join(", ")}`,
		);
	}
	return new ctor();
}

export function listRegisteredEngines(): string[] {
	return Object.keys(ENGINE_REGISTRY);
}
