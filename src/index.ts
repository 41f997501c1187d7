#!/usr/bin/env node
import { runCli } from "./cli/run-cli.js";

runCli().catch((error: unknown) => {
	const label = error instanceof Error && error.name !== "Error" ? error.name : "legwork";
	const message = error instanceof Error ? error.message : String(error);
	process.stderr.write(`${label}: ${message}\n`);
	process.exitCode = 1;
});
