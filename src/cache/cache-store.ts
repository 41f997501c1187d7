import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ensureWithinBase } from "../utils/path-safety.js";

const MANIFEST_FILE = "manifest.json";
const FILES_DIR = "files";

export const CacheManifestSchema = z.object({
	version: z.literal(1),
	key: z.string().min(1),
	paths: z.array(
		z.object({
			source: z.string(),
			stored: z.string(),
		}),
	),
	createdAt: z.string(),
});

export type CacheManifest = z.infer<typeof CacheManifestSchema>;

export type CacheRestoreStatus = "hit" | "partial" | "miss";

export type CacheRestoreResult = {
	status: CacheRestoreStatus;
	key?: string;
	warnings: string[];
};

export type CacheSaveResult = { ok: true; key: string } | { ok: false; error: string };

export type CacheEntrySummary = {
	key: string;
	createdAt: string;
	paths: string[];
};

export type PathResolver = (source: string) => string;

export class CacheStore {
	constructor(readonly dir: string) {}

	restore(key: string, restoreKeys: string[], resolvePath: PathResolver): CacheRestoreResult {
		const warnings: string[] = [];
		let manifest: CacheManifest | undefined;
		try {
			manifest = this.readManifest(key, warnings) ?? this.findByPrefix(restoreKeys, warnings);
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			warnings.push(`cache directory ${this.dir} could not be read: ${message}`);
			return { status: "miss", warnings: unique(warnings) };
		}
		if (!manifest) {
			return { status: "miss", warnings: unique(warnings) };
		}

		try {
			const entryDir = this.entryDir(manifest.key);
			for (const item of manifest.paths) {
				const stored = ensureWithinBase(path.join(entryDir, FILES_DIR), item.stored, "cache entry");
				if (!fs.existsSync(stored)) {
					continue;
				}
				const target = resolvePath(item.source);
				fs.mkdirSync(path.dirname(target), { recursive: true });
				fs.cpSync(stored, target, { recursive: true, force: true });
			}
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			warnings.push(`cache entry ${manifest.key} could not be restored: ${message}`);
			return { status: "miss", warnings: unique(warnings) };
		}

		return {
			status: manifest.key === key ? "hit" : "partial",
			key: manifest.key,
			warnings: unique(warnings),
		};
	}

	save(key: string, sources: string[], resolvePath: PathResolver): CacheSaveResult {
		const staging = path.join(this.dir, `.staging-${crypto.randomBytes(4).toString("hex")}`);
		try {
			fs.mkdirSync(this.dir, { recursive: true });
			const filesDir = path.join(staging, FILES_DIR);
			fs.mkdirSync(filesDir, { recursive: true });
			const paths: CacheManifest["paths"] = [];
			sources.forEach((source, index) => {
				const absolute = resolvePath(source);
				if (!fs.existsSync(absolute)) {
					return;
				}
				const stored = String(index);
				fs.cpSync(absolute, path.join(filesDir, stored), { recursive: true });
				paths.push({ source, stored });
			});
			const manifest: CacheManifest = {
				version: 1,
				key,
				paths,
				createdAt: new Date().toISOString(),
			};
			fs.writeFileSync(path.join(staging, MANIFEST_FILE), JSON.stringify(manifest, null, 2));

			const entryDir = this.entryDir(key);
			fs.rmSync(entryDir, { recursive: true, force: true });
			fs.renameSync(staging, entryDir);
			return { ok: true, key };
		} catch (error) {
			if (fs.existsSync(staging)) {
				fs.rmSync(staging, { recursive: true, force: true });
			}
			const message = error instanceof Error ? error.message : String(error);
			return { ok: false, error: message };
		}
	}

	list(): CacheEntrySummary[] {
		return this.readAll([])
			.map((manifest) => ({
				key: manifest.key,
				createdAt: manifest.createdAt,
				paths: manifest.paths.map((item) => item.source),
			}))
			.sort((a, b) => a.key.localeCompare(b.key));
	}

	clear(): number {
		if (!fs.existsSync(this.dir)) {
			return 0;
		}
		const entries = fs.readdirSync(this.dir);
		for (const entry of entries) {
			fs.rmSync(path.join(this.dir, entry), { recursive: true, force: true });
		}
		return entries.filter((entry) => !entry.startsWith(".staging-")).length;
	}

	entryDir(key: string): string {
		return ensureWithinBase(this.dir, entryDirName(key), "cache key");
	}

	private findByPrefix(restoreKeys: string[], warnings: string[]): CacheManifest | undefined {
		if (restoreKeys.length === 0) {
			return undefined;
		}
		const manifests = this.readAll(warnings);
		for (const prefix of restoreKeys) {
			const newest = manifests
				.filter((manifest) => manifest.key.startsWith(prefix))
				.sort((a, b) => b.createdAt.localeCompare(a.createdAt))[0];
			if (newest) {
				return newest;
			}
		}
		return undefined;
	}

	private readAll(warnings: string[]): CacheManifest[] {
		if (!fs.existsSync(this.dir)) {
			return [];
		}
		const manifests: CacheManifest[] = [];
		for (const entry of fs.readdirSync(this.dir, { withFileTypes: true })) {
			if (!entry.isDirectory() || entry.name.startsWith(".staging-")) {
				continue;
			}
			const manifest = this.readManifestAt(path.join(this.dir, entry.name), warnings);
			if (manifest) {
				manifests.push(manifest);
			}
		}
		return manifests;
	}

	private readManifest(key: string, warnings: string[]): CacheManifest | undefined {
		const manifest = this.readManifestAt(this.entryDir(key), warnings);
		return manifest?.key === key ? manifest : undefined;
	}

	private readManifestAt(entryDir: string, warnings: string[]): CacheManifest | undefined {
		const manifestPath = path.join(entryDir, MANIFEST_FILE);
		if (!fs.existsSync(entryDir)) {
			return undefined;
		}
		if (!fs.existsSync(manifestPath)) {
			warnings.push(`ignoring corrupt cache entry ${path.basename(entryDir)}: missing manifest`);
			return undefined;
		}
		try {
			const raw: unknown = JSON.parse(fs.readFileSync(manifestPath, "utf-8"));
			const parsed = CacheManifestSchema.safeParse(raw);
			if (!parsed.success) {
				warnings.push(`ignoring corrupt cache entry ${path.basename(entryDir)}: invalid manifest`);
				return undefined;
			}
			return parsed.data;
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			warnings.push(`ignoring corrupt cache entry ${path.basename(entryDir)}: ${message}`);
			return undefined;
		}
	}
}

export function entryDirName(key: string): string {
	const cleaned = key.replace(/[^A-Za-z0-9._-]+/g, "_").replace(/^\.+/, "_");
	if (cleaned.length <= 120) {
		return cleaned;
	}
	const hash = crypto.createHash("sha1").update(key).digest("hex").slice(0, 12);
	return `${cleaned.slice(0, 100)}-${hash}`;
}

function unique(values: string[]): string[] {
	return Array.from(new Set(values));
}
