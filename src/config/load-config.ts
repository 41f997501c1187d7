import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigSchema, type LegworkConfig } from "./schema.js";

export type ConfigLoadResult = {
	config: LegworkConfig;
	path?: string;
};

export const DEFAULT_CONFIG_PATH = ".legwork.yml";

export class ConfigError extends Error {
	constructor(
		readonly configPath: string,
		readonly issues: string[],
	) {
		super(`${configPath}: ${issues.join("; ")}`);
		this.name = "ConfigError";
	}
}

export function loadConfig(repoRoot: string): ConfigLoadResult {
	const configPath = path.join(repoRoot, DEFAULT_CONFIG_PATH);
	if (!fs.existsSync(configPath)) {
		return { config: ConfigSchema.parse({}), path: undefined };
	}

	const raw = fs.readFileSync(configPath, "utf-8");
	let parsed: unknown;
	try {
		parsed = YAML.parse(raw);
	} catch (error) {
		throw new ConfigError(configPath, [error instanceof Error ? error.message : String(error)]);
	}
	const result = ConfigSchema.safeParse(parsed ?? {});
	if (!result.success) {
		throw new ConfigError(
			configPath,
			result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
		);
	}
	return { config: result.data, path: configPath };
}
