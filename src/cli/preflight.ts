import { spawnSync } from "node:child_process";
import process from "node:process";
import { cancel, confirm, isCancel } from "@clack/prompts";

export type ContainerEngine = "docker" | "podman";

export type CommandCheck = (command: string, args: string[]) => boolean;

export type PreflightResult = { ok: true } | { ok: false; problems: string[] };

const ENGINE_START_ATTEMPTS = 8;

export const commandSucceeds: CommandCheck = (command, args) =>
	spawnSync(command, args, { stdio: "ignore" }).status === 0;

/** Checks the tools the act engine shells out to. */
export function checkActPrerequisites(
	engine: ContainerEngine,
	check: CommandCheck = commandSucceeds,
): PreflightResult {
	const problems: string[] = [];
	if (!check("act", ["--version"])) {
		problems.push("act is not installed; see https://nektosact.com/installation/");
	}
	if (!check(engine, ["--version"])) {
		problems.push(`${engine} is not installed`);
	} else if (!check(engine, ["info"])) {
		problems.push(`${engine} is not running`);
	}
	return problems.length === 0 ? { ok: true } : { ok: false, problems };
}

export async function runPreflightChecks(engine: ContainerEngine, interactive: boolean): Promise<boolean> {
	const result = checkActPrerequisites(engine);
	if (result.ok) {
		return true;
	}
	const onlyStopped = result.problems.length === 1 && result.problems[0] === `${engine} is not running`;
	if (!onlyStopped || !interactive) {
		for (const problem of result.problems) {
			process.stderr.write(`${problem}\n`);
		}
		return false;
	}

	const shouldStart = await confirm({
		message: `${engine} is not running. Start it now?`,
		initialValue: true,
	});
	if (isCancel(shouldStart) || !shouldStart) {
		cancel("Canceled.");
		return false;
	}
	if (!startContainerEngine(engine) || !(await waitForEngine(engine))) {
		process.stderr.write(`${engine} is still not running. Start it and retry.\n`);
		return false;
	}
	return true;
}

function startContainerEngine(engine: ContainerEngine): boolean {
	if (engine === "podman") {
		return spawnSync("podman", ["machine", "start"], { stdio: "inherit" }).status === 0;
	}
	switch (process.platform) {
		case "darwin":
			return spawnSync("open", ["-g", "-a", "Docker"], { stdio: "ignore" }).status === 0;
		case "linux":
			return spawnSync("sudo", ["systemctl", "start", "docker"], { stdio: "inherit" }).status === 0;
		case "win32":
			return (
				spawnSync("powershell.exe", ["-NoProfile", "-Command", "Start-Service com.docker.service"], {
					stdio: "ignore",
				}).status === 0
			);
		default:
			return false;
	}
}

async function waitForEngine(engine: ContainerEngine): Promise<boolean> {
	for (let attempt = 0; attempt < ENGINE_START_ATTEMPTS; attempt += 1) {
		if (commandSucceeds(engine, ["info"])) {
			return true;
		}
		await new Promise((resolve) => setTimeout(resolve, 1000));
	}
	return false;
}
