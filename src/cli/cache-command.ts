import path from "node:path";
import { CacheStore } from "../cache/cache-store.js";
import type { LegworkConfig } from "../config/schema.js";
import type { CacheSubcommand } from "./args.js";

export function resolveCacheDir(repoRoot: string, config: LegworkConfig): string {
	return path.resolve(repoRoot, config.cache.dir);
}

export function runCacheCommand(command: CacheSubcommand, store: CacheStore, json: boolean): void {
	if (command === "clear") {
		const removed = store.clear();
		if (json) {
			process.stdout.write(`${JSON.stringify({ removed })}\n`);
		} else {
			process.stdout.write(`Removed ${removed} cache entr${removed === 1 ? "y" : "ies"} from ${store.dir}.\n`);
		}
		return;
	}

	const entries = store.list();
	if (json) {
		process.stdout.write(`${JSON.stringify({ dir: store.dir, entries })}\n`);
		return;
	}
	if (entries.length === 0) {
		process.stdout.write(`No cache entries in ${store.dir}.\n`);
		return;
	}
	for (const entry of entries) {
		process.stdout.write(`${entry.key}  ${entry.createdAt}  ${entry.paths.join(", ")}\n`);
	}
}
