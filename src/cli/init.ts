import fs from "node:fs";
import path from "node:path";

export const STATE_DIR = ".legwork";

export type GitignoreResult = "added" | "present" | "skipped";

export function ensureGitignore(repoRoot: string): GitignoreResult {
	if (!fs.existsSync(path.join(repoRoot, ".git"))) {
		return "skipped";
	}

	const ignorePath = path.join(repoRoot, ".gitignore");
	const current = fs.existsSync(ignorePath) ? fs.readFileSync(ignorePath, "utf-8") : "";
	const hasEntry = current.split(/\r?\n/).some((line) => normalizeIgnoreLine(line) === STATE_DIR);
	if (hasEntry) {
		return "present";
	}

	const prefix = current.trim().length === 0 ? "" : current.endsWith("\n") ? current : `${current}\n`;
	fs.writeFileSync(ignorePath, `${prefix}${STATE_DIR}\n`);
	return "added";
}

export function runInit(repoRoot: string): void {
	switch (ensureGitignore(repoRoot)) {
		case "added":
			process.stdout.write(`Added '${STATE_DIR}' to .gitignore.\n`);
			return;
		case "present":
			process.stdout.write(`'${STATE_DIR}' is already in .gitignore.\n`);
			return;
		case "skipped":
			process.stdout.write("Skipped: not a git repository.\n");
	}
}

function normalizeIgnoreLine(line: string): string {
	return line.trim().replace(/^\/+/, "").replace(/\/+$/, "");
}
