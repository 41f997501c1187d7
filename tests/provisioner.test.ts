import { describe, expect, it } from "vitest";
import {
	buildRustupArgs,
	isPinnedToolchain,
	isToolchainAction,
	provisionToolchain,
	readToolchainRequest,
	RustupInstaller,
	type ToolchainInstaller,
	type ToolchainRequest,
} from "../src/toolchain/provisioner.js";
import type { CommandResult } from "../src/utils/command-runner.js";
import { FakeCommandRunner } from "./support/fake-runner.js";

const pinned: ToolchainRequest = {
	action: "dtolnay/rust-toolchain",
	toolchain: "1.79.0",
	profile: "minimal",
	components: ["clippy"],
	targets: [],
};

function fakeInstaller(result: CommandResult): ToolchainInstaller & { installed: string[] } {
	const installed: string[] = [];
	return {
		tool: "rustup",
		installed,
		install: async (request) => {
			installed.push(request.toolchain);
			return result;
		},
		activate: (request) => ({ RUSTUP_TOOLCHAIN: request.toolchain }),
	};
}

const installOptions = { cwd: "/repo", env: {}, onOutput: () => undefined };

describe("toolchain requests", () => {
	it("recognizes toolchain actions", () => {
		expect(isToolchainAction("dtolnay/rust-toolchain@stable")).toBe(true);
		expect(isToolchainAction("actions-rs/toolchain@v1")).toBe(true);
		expect(isToolchainAction("hecrj/setup-rust-action@v2")).toBe(true);
		expect(isToolchainAction("actions/setup-node@v4")).toBe(false);
	});

	it("reads the toolchain from the action ref", () => {
		expect(readToolchainRequest("dtolnay/rust-toolchain@1.79.0")).toEqual({
			action: "dtolnay/rust-toolchain",
			toolchain: "1.79.0",
			profile: "default",
			components: [],
			targets: [],
		});
		expect(readToolchainRequest("dtolnay/rust-toolchain@master").toolchain).toBe("stable");
	});

	it("prefers explicit inputs", () => {
		expect(
			readToolchainRequest("dtolnay/rust-toolchain@master", {
				toolchain: "nightly-2024-06-25",
				components: "clippy, rustfmt",
				targets: "wasm32-unknown-unknown",
			}),
		).toEqual({
			action: "dtolnay/rust-toolchain",
			toolchain: "nightly-2024-06-25",
			profile: "default",
			components: ["clippy", "rustfmt"],
			targets: ["wasm32-unknown-unknown"],
		});
		expect(readToolchainRequest("actions-rs/toolchain@v1", { toolchain: "1.80.0", target: "x86_64-pc-windows-gnu" }))
			.toMatchObject({ toolchain: "1.80.0", targets: ["x86_64-pc-windows-gnu"] });
		expect(readToolchainRequest("hecrj/setup-rust-action@v2", { "rust-version": "1.78.0", profile: "minimal" }))
			.toMatchObject({ toolchain: "1.78.0", profile: "minimal" });
	});

	it("tells pinned toolchains from floating channels", () => {
		expect(isPinnedToolchain("1.79.0")).toBe(true);
		expect(isPinnedToolchain("nightly-2024-06-25")).toBe(true);
		expect(isPinnedToolchain("1.79.0-x86_64-unknown-linux-gnu")).toBe(true);
		expect(isPinnedToolchain("stable")).toBe(false);
		expect(isPinnedToolchain("1.79")).toBe(false);
	});

	it("builds rustup arguments", () => {
		expect(buildRustupArgs({ ...pinned, targets: ["wasm32-unknown-unknown"] })).toEqual([
			"toolchain",
			"install",
			"1.79.0",
			"--profile",
			"minimal",
			"--no-self-update",
			"--component",
			"clippy",
			"--target",
			"wasm32-unknown-unknown",
		]);
	});
});

describe("toolchain provisioning", () => {
	it("installs a pinned toolchain and returns its activation env", async () => {
		const installer = fakeInstaller({ exitCode: 0 });
		const result = await provisionToolchain(pinned, { ...installOptions, installer });

		expect(result).toEqual({ ok: true, toolchain: "1.79.0", env: { RUSTUP_TOOLCHAIN: "1.79.0" } });
		expect(installer.installed).toEqual(["1.79.0"]);
	});

	it("rejects floating channels before installing anything", async () => {
		const installer = fakeInstaller({ exitCode: 0 });
		const result = await provisionToolchain({ ...pinned, toolchain: "stable" }, { ...installOptions, installer });

		expect(result).toEqual({
			ok: false,
			error: 'toolchain "stable" is not pinned; use an exact version (1.79.0) or a dated channel (nightly-2024-06-25)',
		});
		expect(installer.installed).toEqual([]);
	});

	it("accepts floating channels when allowed", async () => {
		const installer = fakeInstaller({ exitCode: 0 });
		const result = await provisionToolchain(
			{ ...pinned, toolchain: "stable" },
			{ ...installOptions, installer, allowFloating: true },
		);
		expect(result.ok).toBe(true);
	});

	it("reports unavailable toolchains and a missing installer", async () => {
		expect(await provisionToolchain(pinned, { ...installOptions, installer: fakeInstaller({ exitCode: 1 }) })).toEqual({
			ok: false,
			error: "toolchain 1.79.0 is unavailable for this environment (rustup exited with 1)",
		});
		expect(
			await provisionToolchain(pinned, {
				...installOptions,
				installer: fakeInstaller({ exitCode: 127, error: "command not found: rustup" }),
			}),
		).toEqual({ ok: false, error: "rustup is not available: command not found: rustup" });
		expect(
			await provisionToolchain(pinned, {
				...installOptions,
				installer: fakeInstaller({ exitCode: 130, aborted: true }),
			}),
		).toEqual({ ok: false, error: "toolchain installation canceled" });
	});

	it("runs rustup through the command runner", async () => {
		const runner = new FakeCommandRunner(() => ({ exitCode: 0, stdout: "installed\n" }));
		const output: string[] = [];
		const installer = new RustupInstaller(runner);

		await installer.install(pinned, { cwd: "/repo", env: { PATH: "/bin" }, onOutput: (chunk) => output.push(chunk) });

		expect(runner.requests).toEqual([
			{
				command: "rustup",
				args: ["toolchain", "install", "1.79.0", "--profile", "minimal", "--no-self-update", "--component", "clippy"],
				cwd: "/repo",
				env: { PATH: "/bin" },
				signal: undefined,
			},
		]);
		expect(output).toEqual(["$ rustup toolchain install 1.79.0 --profile minimal --no-self-update --component clippy\n", "installed\n"]);
		expect(installer.activate(pinned)).toEqual({ RUSTUP_TOOLCHAIN: "1.79.0" });
	});
});
