import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

export const RUST_DEPENDENCY_FILES = [
	"Cargo.lock",
	"Cargo.toml",
	"rust-toolchain",
	"rust-toolchain.toml",
];

const IGNORED_DIRS = new Set([".git", "target", "node_modules", ".legwork"]);
const MAX_DEPTH = 6;
const NO_LOCKFILE_MARKER = "no-dependency-files";

export type CacheKeyInput = {
	prefix: string;
	scope: string;
	runner: string;
	toolchain?: string;
	lockHash: string;
	extra?: string;
};

export type CacheKey = {
	key: string;
	restoreKeys: string[];
};

export function findDependencyFiles(repoRoot: string, fileNames: string[] = RUST_DEPENDENCY_FILES): string[] {
	const wanted = new Set(fileNames);
	const found: string[] = [];

	const walk = (dir: string, depth: number): void => {
		if (depth > MAX_DEPTH || !fs.existsSync(dir)) {
			return;
		}
		const entries = fs.readdirSync(dir, { withFileTypes: true });
		for (const entry of entries) {
			if (entry.isDirectory()) {
				if (!IGNORED_DIRS.has(entry.name)) {
					walk(path.join(dir, entry.name), depth + 1);
				}
				continue;
			}
			if (entry.isFile() && wanted.has(entry.name)) {
				found.push(path.relative(repoRoot, path.join(dir, entry.name)).split(path.sep).join("/"));
			}
		}
	};

	walk(repoRoot, 0);
	return found.sort();
}

export function hashDependencyFiles(repoRoot: string, files: string[]): string {
	const hash = crypto.createHash("sha256");
	if (files.length === 0) {
		hash.update(NO_LOCKFILE_MARKER);
	}
	for (const file of files) {
		hash.update(file);
		hash.update("\0");
		hash.update(fs.readFileSync(path.join(repoRoot, file)));
		hash.update("\0");
	}
	return hash.digest("hex");
}

export function computeLockFingerprint(
	repoRoot: string,
	fileNames: string[] = RUST_DEPENDENCY_FILES,
): string {
	return hashDependencyFiles(repoRoot, findDependencyFiles(repoRoot, fileNames));
}

/**
 * Keys are scoped by runner so legs on different environments never share
 * an entry. The environment hash covers the toolchain; the tail covers the
 * dependency-lock state. Restore keys drop the tail for partial hits.
 */
export function buildCacheKey(input: CacheKeyInput): CacheKey {
	const envHash = crypto
		.createHash("sha256")
		.update(`${input.runner}\0${input.toolchain ?? "host"}\0${input.extra ?? ""}`)
		.digest("hex")
		.slice(0, 8);
	const base = [input.prefix, input.scope, input.runner, envHash].map(keySegment).join("-");
	return {
		key: `${base}-${input.lockHash.slice(0, 20)}`,
		restoreKeys: [`${base}-`],
	};
}

function keySegment(value: string): string {
	const cleaned = value.trim().replace(/[^A-Za-z0-9._]+/g, "_");
	return cleaned.length > 0 ? cleaned : "_";
}
