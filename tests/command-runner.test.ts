import os from "node:os";
import { describe, expect, it } from "vitest";
import type { OutputSource } from "../src/core/engine.js";
import { COMMAND_NOT_FOUND_EXIT_CODE, SpawnCommandRunner } from "../src/utils/command-runner.js";

function collect() {
	const chunks: { chunk: string; source: OutputSource }[] = [];
	return {
		onOutput: (chunk: string, source: OutputSource) => chunks.push({ chunk, source }),
		text: (source: OutputSource) =>
			chunks
				.filter((item) => item.source === source)
				.map((item) => item.chunk)
				.join(""),
	};
}

describe("spawn command runner", () => {
	it("keeps multibyte characters whole when they arrive split", async () => {
		const script = [
			"process.stdout.write(Buffer.from([0xe2, 0x96]));",
			"setTimeout(() => process.stdout.write(Buffer.from([0xbe, 0x0a])), 50);",
		].join(" ");
		const output = collect();

		const result = await new SpawnCommandRunner().run(
			{ command: process.execPath, args: ["-e", script], cwd: os.tmpdir(), env: {} },
			output.onOutput,
		);

		expect(result).toEqual({ exitCode: 0 });
		expect(output.text("stdout")).toBe("▾\n");
	});

	it("streams stderr and reports the exit code", async () => {
		const output = collect();

		const result = await new SpawnCommandRunner().run(
			{
				command: process.execPath,
				args: ["-e", "process.stderr.write('broken\\n'); process.exit(3);"],
				cwd: os.tmpdir(),
				env: {},
			},
			output.onOutput,
		);

		expect(result).toEqual({ exitCode: 3 });
		expect(output.text("stderr")).toBe("broken\n");
		expect(output.text("stdout")).toBe("");
	});

	it("reports a missing command", async () => {
		const result = await new SpawnCommandRunner().run(
			{ command: "legwork-no-such-command", args: [], cwd: os.tmpdir(), env: {} },
			collect().onOutput,
		);

		expect(result).toEqual({
			exitCode: COMMAND_NOT_FOUND_EXIT_CODE,
			error: "command not found: legwork-no-such-command",
		});
	});
});
