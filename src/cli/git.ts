import { spawnSync } from "node:child_process";

export const FALLBACK_BRANCH = "main";

export function detectGitBranch(repoRoot: string): string {
	const result = spawnSync("git", ["rev-parse", "--abbrev-ref", "HEAD"], {
		cwd: repoRoot,
		encoding: "utf-8",
		stdio: ["ignore", "pipe", "ignore"],
	});
	const branch = result.status === 0 ? result.stdout.trim() : "";
	// Detached HEAD reports "HEAD".
	return branch.length > 0 && branch !== "HEAD" ? branch : FALLBACK_BRANCH;
}
