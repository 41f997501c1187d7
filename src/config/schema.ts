import { z } from "zod";
import { SUPPORTED_SHELLS } from "../engines/local/shell.js";

export const RuntimeSchema = z.object({
	container: z.enum(["docker", "podman"]).default("docker"),
	architecture: z.string().default("amd64"),
	platformMap: z.record(z.string()).default({}),
	maxParallel: z.number().int().positive().optional(),
	cancelPolicy: z.enum(["terminate", "drain"]).default("terminate"),
	foreignRunners: z.enum(["skip", "host"]).default("skip"),
	shell: z.enum(SUPPORTED_SHELLS).optional(),
});

export const CacheConfigSchema = z.object({
	enabled: z.boolean().default(true),
	dir: z.string().default(".legwork/cache"),
});

export const ToolchainConfigSchema = z.object({
	allowFloating: z.boolean().default(false),
});

export const ConfigSchema = z.object({
	engine: z.enum(["local", "act"]).default("local"),
	runtime: RuntimeSchema.default({}),
	env: z.record(z.coerce.string()).default({}),
	cache: CacheConfigSchema.default({}),
	toolchain: ToolchainConfigSchema.default({}),
	envFile: z.string().optional(),
});

export type LegworkConfig = z.infer<typeof ConfigSchema>;
