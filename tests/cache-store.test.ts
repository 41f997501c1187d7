import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { CacheStore, entryDirName } from "../src/cache/cache-store.js";
import { makeTmpDir } from "./support/fixtures.js";

function setup(): { repoRoot: string; store: CacheStore; resolve: (source: string) => string } {
	const repoRoot = makeTmpDir("cache");
	const store = new CacheStore(path.join(repoRoot, ".legwork", "cache"));
	return { repoRoot, store, resolve: (source) => path.resolve(repoRoot, source) };
}

function writeFile(filePath: string, content: string): void {
	fs.mkdirSync(path.dirname(filePath), { recursive: true });
	fs.writeFileSync(filePath, content);
}

describe("cache store", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("restores an exact entry as a hit", () => {
		const { repoRoot, store, resolve } = setup();
		writeFile(path.join(repoRoot, "target", "debug", "app.d"), "deps");

		expect(store.save("v0-build-aaaa", ["target", "missing-dir"], resolve)).toEqual({
			ok: true,
			key: "v0-build-aaaa",
		});
		fs.rmSync(path.join(repoRoot, "target"), { recursive: true });

		const restored = store.restore("v0-build-aaaa", ["v0-build-"], resolve);

		expect(restored).toEqual({ status: "hit", key: "v0-build-aaaa", warnings: [] });
		expect(fs.readFileSync(path.join(repoRoot, "target", "debug", "app.d"), "utf-8")).toBe("deps");
	});

	it("falls back to the newest entry sharing a restore prefix", () => {
		const { repoRoot, store, resolve } = setup();
		writeFile(path.join(repoRoot, "target", "a.txt"), "old");
		store.save("v0-build-aaaa", ["target"], resolve);

		const restored = store.restore("v0-build-bbbb", ["v0-build-"], resolve);

		expect(restored).toEqual({ status: "partial", key: "v0-build-aaaa", warnings: [] });
	});

	it("misses when nothing matches", () => {
		const { store, resolve } = setup();
		expect(store.restore("v0-build-aaaa", ["v0-build-"], resolve)).toEqual({ status: "miss", warnings: [] });
	});

	it("treats corrupt entries as misses with a warning", () => {
		const { store, resolve } = setup();
		fs.mkdirSync(path.join(store.dir, "v0-build-aaaa"), { recursive: true });
		writeFile(path.join(store.dir, "v0-build-bbbb", "manifest.json"), JSON.stringify({ version: 2 }));

		const restored = store.restore("v0-build-aaaa", ["v0-build-"], resolve);

		expect(restored).toEqual({
			status: "miss",
			warnings: [
				"ignoring corrupt cache entry v0-build-aaaa: missing manifest",
				"ignoring corrupt cache entry v0-build-bbbb: invalid manifest",
			],
		});
	});

	it("misses with a warning when the cache directory cannot be read", () => {
		const { repoRoot, store, resolve } = setup();
		writeFile(path.join(repoRoot, "target", "a.txt"), "old");
		store.save("v0-build-aaaa", ["target"], resolve);
		vi.spyOn(fs, "readdirSync").mockImplementationOnce(() => {
			throw new Error("EACCES: permission denied, scandir");
		});

		expect(store.restore("v0-build-bbbb", ["v0-build-"], resolve)).toEqual({
			status: "miss",
			warnings: [`cache directory ${store.dir} could not be read: EACCES: permission denied, scandir`],
		});
	});

	it("reports a save into an unusable cache directory without throwing", () => {
		const { repoRoot, resolve } = setup();
		const blocked = path.join(repoRoot, "blocked");
		writeFile(blocked, "not a directory");
		writeFile(path.join(repoRoot, "target", "a.txt"), "new");

		const saved = new CacheStore(blocked).save("v0-build-aaaa", ["target"], resolve);

		expect(saved.ok).toBe(false);
		expect(fs.readFileSync(blocked, "utf-8")).toBe("not a directory");
	});

	it("replaces an existing entry on save", () => {
		const { repoRoot, store, resolve } = setup();
		writeFile(path.join(repoRoot, "target", "a.txt"), "first");
		store.save("v0-build-aaaa", ["target"], resolve);
		writeFile(path.join(repoRoot, "target", "a.txt"), "second");
		store.save("v0-build-aaaa", ["target"], resolve);
		fs.rmSync(path.join(repoRoot, "target"), { recursive: true });

		store.restore("v0-build-aaaa", [], resolve);

		expect(fs.readFileSync(path.join(repoRoot, "target", "a.txt"), "utf-8")).toBe("second");
		expect(fs.readdirSync(store.dir)).toEqual(["v0-build-aaaa"]);
	});

	it("lists and clears entries", () => {
		const { repoRoot, store, resolve } = setup();
		writeFile(path.join(repoRoot, "target", "a.txt"), "x");
		store.save("v0-test-bbbb", ["target"], resolve);
		store.save("v0-build-aaaa", ["target"], resolve);

		expect(store.list().map((entry) => [entry.key, entry.paths])).toEqual([
			["v0-build-aaaa", ["target"]],
			["v0-test-bbbb", ["target"]],
		]);
		expect(store.clear()).toBe(2);
		expect(store.list()).toEqual([]);
	});

	it("returns zero when clearing a missing cache directory", () => {
		expect(new CacheStore(path.join(makeTmpDir("cache-none"), "absent")).clear()).toBe(0);
	});

	it("derives safe directory names from keys", () => {
		expect(entryDirName("linux/deps key")).toBe("linux_deps_key");
		expect(entryDirName("..hidden")).toBe("_hidden");
		expect(entryDirName("k".repeat(130))).toMatch(/^k{100}-[0-9a-f]{12}$/);
	});
});
