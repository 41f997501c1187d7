import { spawn } from "node:child_process";
import type { OutputSource } from "../core/engine.js";

export type CommandRequest = {
	command: string;
	args: string[];
	cwd: string;
	env: Record<string, string>;
	signal?: AbortSignal;
};

export type CommandResult = {
	exitCode: number;
	error?: string;
	aborted?: boolean;
};

export type CommandOutput = (chunk: string, source: OutputSource) => void;

export interface CommandRunner {
	run(request: CommandRequest, onOutput: CommandOutput): Promise<CommandResult>;
}

export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

export class SpawnCommandRunner implements CommandRunner {
	run(request: CommandRequest, onOutput: CommandOutput): Promise<CommandResult> {
		return new Promise((resolve) => {
			let settled = false;
			const settle = (result: CommandResult): void => {
				if (settled) {
					return;
				}
				settled = true;
				resolve(result);
			};

			if (request.signal?.aborted) {
				settle({ exitCode: 130, aborted: true, error: "canceled before start" });
				return;
			}

			const child = spawn(request.command, request.args, {
				cwd: request.cwd,
				env: { ...process.env, ...request.env },
				signal: request.signal,
				windowsHide: true,
			});

			// Decoded per stream so a character split across chunks stays whole.
			child.stdout.setEncoding("utf8");
			child.stderr.setEncoding("utf8");
			child.stdout.on("data", (chunk: string) => onOutput(chunk, "stdout"));
			child.stderr.on("data", (chunk: string) => onOutput(chunk, "stderr"));

			child.on("error", (error: NodeJS.ErrnoException) => {
				if (error.name === "AbortError") {
					settle({ exitCode: 130, aborted: true, error: "canceled" });
					return;
				}
				if (error.code === "ENOENT") {
					settle({
						exitCode: COMMAND_NOT_FOUND_EXIT_CODE,
						error: `command not found: ${request.command}`,
					});
					return;
				}
				settle({ exitCode: 1, error: error.message });
			});

			child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
				if (request.signal?.aborted) {
					settle({ exitCode: 130, aborted: true, error: "canceled" });
					return;
				}
				if (code === null) {
					settle({ exitCode: 1, error: `terminated by ${signal ?? "signal"}` });
					return;
				}
				settle({ exitCode: code });
			});
		});
	}
}
