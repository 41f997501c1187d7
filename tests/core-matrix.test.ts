import { describe, expect, it } from "vitest";
import { collectMatrixKeys, expandMatrix, formatLegId, parseMatrixOverride } from "../src/core/matrix.js";
import { makeJob } from "./support/fixtures.js";

const build = makeJob("build", {
	name: "Build",
	runsOn: "${{ matrix.os }}",
	strategy: {
		failFast: false,
		matrix: {
			os: ["ubuntu-latest", "windows-latest"],
			toolchain: ["1.79.0"],
			exclude: [{ os: "windows-latest" }],
			include: [
				{ os: "macos-latest", toolchain: "1.80.0" },
				{ os: "ubuntu-latest", experimental: true },
			],
		},
	},
});

describe("matrix expansion", () => {
	it("expands axes, applies exclude and include", () => {
		expect(expandMatrix(build)).toEqual([
			{
				legId: "build(ubuntu-latest, 1.79.0, true)",
				jobId: "build",
				name: "Build (ubuntu-latest, 1.79.0, true)",
				matrix: { os: "ubuntu-latest", toolchain: "1.79.0", experimental: "true" },
				runsOn: "ubuntu-latest",
			},
			{
				legId: "build(macos-latest, 1.80.0)",
				jobId: "build",
				name: "Build (macos-latest, 1.80.0)",
				matrix: { os: "macos-latest", toolchain: "1.80.0" },
				runsOn: "macos-latest",
			},
		]);
	});

	it("produces the full cartesian product", () => {
		const job = makeJob("test", {
			strategy: { failFast: false, matrix: { os: ["a", "b"], rust: [1, 2] } },
		});
		expect(expandMatrix(job).map((leg) => leg.legId)).toEqual([
			"test(a, 1)",
			"test(a, 2)",
			"test(b, 1)",
			"test(b, 2)",
		]);
	});

	it("does not extend combinations created by an earlier include", () => {
		const job = makeJob("test", {
			strategy: {
				failFast: false,
				matrix: { fruit: ["apple"], include: [{ fruit: "banana" }, { fruit: "banana", animal: "cat" }] },
			},
		});
		expect(expandMatrix(job).map((leg) => leg.matrix)).toEqual([
			{ fruit: "apple" },
			{ fruit: "banana" },
			{ fruit: "banana", animal: "cat" },
		]);
	});

	it("keeps a single leg for jobs without a matrix", () => {
		expect(expandMatrix(makeJob("lint", { runsOn: "ubuntu-latest" }))).toEqual([
			{ legId: "lint", jobId: "lint", name: "lint", matrix: null, runsOn: "ubuntu-latest" },
		]);
	});

	it("interpolates matrix values in the job name instead of suffixing them", () => {
		const job = makeJob("test", {
			name: "Test on ${{ matrix.os }}",
			strategy: { failFast: false, matrix: { os: ["ubuntu-latest"] } },
		});
		expect(expandMatrix(job)[0]?.name).toBe("Test on ubuntu-latest");
	});

	it("restricts legs to an override", () => {
		expect(expandMatrix(build, { os: "macos-latest" }).map((leg) => leg.legId)).toEqual([
			"build(macos-latest, 1.80.0)",
		]);
		expect(expandMatrix(build, { os: "freebsd" })).toEqual([]);
	});

	it("lists matrix keys without include and exclude", () => {
		expect(collectMatrixKeys(build)).toEqual(["os", "toolchain"]);
		expect(collectMatrixKeys(makeJob("lint"))).toEqual([]);
	});
});

describe("matrix overrides", () => {
	it("parses key:value items", () => {
		expect(parseMatrixOverride(["os:ubuntu-latest", "toolchain: 1.79.0"])).toEqual({
			os: "ubuntu-latest",
			toolchain: "1.79.0",
		});
		expect(parseMatrixOverride(undefined)).toBeUndefined();
		expect(parseMatrixOverride([])).toBeUndefined();
	});

	it("rejects items without a key", () => {
		expect(() => parseMatrixOverride(["ubuntu"])).toThrow('Invalid matrix override "ubuntu" (expected key:value)');
		expect(() => parseMatrixOverride([":x"])).toThrow('Invalid matrix override ":x" (expected key:value)');
	});

	it("formats leg ids from matrix values", () => {
		expect(formatLegId("build", null)).toBe("build");
		expect(formatLegId("build", {})).toBe("build");
		expect(formatLegId("build", { os: "linux", rust: "1.79.0" })).toBe("build(linux, 1.79.0)");
	});
});
