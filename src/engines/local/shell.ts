export const SUPPORTED_SHELLS = ["bash", "sh", "pwsh", "powershell", "cmd"] as const;

export type ShellName = (typeof SUPPORTED_SHELLS)[number];

export type ShellInvocation = {
	command: string;
	args: string[];
};

export function defaultShell(platform: string): ShellName {
	return platform === "win32" ? "cmd" : "bash";
}

export function isShellName(value: string): value is ShellName {
	return SUPPORTED_SHELLS.some((shell) => shell === value);
}

export function resolveShell(script: string, platform: string, shell?: string): ShellInvocation {
	const name = shell?.trim() || defaultShell(platform);
	if (!isShellName(name)) {
		throw new Error(`unsupported shell "${name}" (expected ${SUPPORTED_SHELLS.join(", ")})`);
	}
	switch (name) {
		case "bash":
			return { command: "bash", args: ["--noprofile", "--norc", "-eo", "pipefail", "-c", script] };
		case "sh":
			return { command: "sh", args: ["-e", "-c", script] };
		case "pwsh":
		case "powershell":
			return { command: name, args: ["-NoLogo", "-NoProfile", "-NonInteractive", "-Command", script] };
		case "cmd":
			return { command: "cmd.exe", args: ["/d", "/s", "/c", script] };
	}
}
