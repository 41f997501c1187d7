import { interpolate } from "./expressions.js";
import type { Job, MatrixLeg, MatrixValues } from "./types.js";

const RESERVED_KEYS = new Set(["include", "exclude"]);

export function expandMatrix(job: Job, override?: MatrixValues): MatrixLeg[] {
	const matrix = job.strategy?.matrix;
	if (!matrix) {
		return [buildLeg(job, null)];
	}

	const combinations = applyIncludes(
		cartesian(collectAxes(matrix)).filter((combo) => !isExcluded(combo, matrix.exclude)),
		matrix.include,
	);
	const selected = override
		? combinations.filter((combo) => matchesPartial(combo, override))
		: combinations;

	return selected.map((combo) => buildLeg(job, combo));
}

export function collectMatrixKeys(job: Job): string[] {
	const matrix = job.strategy?.matrix;
	if (!matrix) {
		return [];
	}
	return Object.keys(matrix).filter((key) => !RESERVED_KEYS.has(key));
}

export function parseMatrixOverride(items: string[] | undefined): MatrixValues | undefined {
	if (!items?.length) {
		return undefined;
	}
	const values: MatrixValues = {};
	for (const item of items) {
		const separator = item.indexOf(":");
		if (separator <= 0) {
			throw new Error(`Invalid matrix override "${item}" (expected key:value)`);
		}
		values[item.slice(0, separator).trim()] = item.slice(separator + 1).trim();
	}
	return values;
}

export function formatLegId(jobId: string, matrix: MatrixValues | null): string {
	if (!matrix || Object.keys(matrix).length === 0) {
		return jobId;
	}
	return `${jobId}(${Object.values(matrix).join(", ")})`;
}

function buildLeg(job: Job, matrix: MatrixValues | null): MatrixLeg {
	const context = {
		matrix,
		env: job.env ?? {},
		github: { event_name: "", ref_name: "" },
	};
	const runsOn = job.runsOn ? interpolate(job.runsOn, context) : undefined;
	const baseName = interpolate(job.name, context);
	const name =
		matrix && baseName === job.name && Object.keys(matrix).length > 0
			? `${baseName} (${Object.values(matrix).join(", ")})`
			: baseName;

	return {
		legId: formatLegId(job.id, matrix),
		jobId: job.id,
		name,
		matrix,
		runsOn,
	};
}

function collectAxes(matrix: Record<string, unknown>): [string, string[]][] {
	return Object.entries(matrix)
		.filter(([key]) => !RESERVED_KEYS.has(key))
		.map(([key, values]) => [key, toValueList(values)]);
}

function cartesian(axes: [string, string[]][]): MatrixValues[] {
	if (axes.length === 0) {
		return [];
	}
	return axes.reduce<MatrixValues[]>(
		(combos, [key, values]) =>
			combos.flatMap((combo) => values.map((value) => ({ ...combo, [key]: value }))),
		[{}],
	);
}

function isExcluded(combo: MatrixValues, exclude: unknown): boolean {
	return toEntryList(exclude).some((entry) => matchesPartial(combo, entry));
}

function applyIncludes(combos: MatrixValues[], include: unknown): MatrixValues[] {
	const result = combos.map((combo) => ({ ...combo }));
	const originals = combos.map((combo) => ({ ...combo }));

	// Combinations created by an include are never extended by later includes.
	for (const entry of toEntryList(include)) {
		let extended = false;
		originals.forEach((original, index) => {
			const overwritesOriginal = Object.entries(entry).some(
				([key, value]) => key in original && original[key] !== value,
			);
			if (overwritesOriginal) {
				return;
			}
			Object.assign(result[index], entry);
			extended = true;
		});
		if (!extended) {
			result.push({ ...entry });
		}
	}

	return result;
}

function matchesPartial(combo: MatrixValues, partial: MatrixValues): boolean {
	return Object.entries(partial).every(([key, value]) => combo[key] === value);
}

function toEntryList(value: unknown): MatrixValues[] {
	if (!Array.isArray(value)) {
		return [];
	}
	return value
		.filter((entry): entry is Record<string, unknown> => typeof entry === "object" && entry !== null)
		.map((entry) =>
			Object.fromEntries(Object.entries(entry).map(([key, item]) => [key, stringifyValue(item)])),
		);
}

function toValueList(values: unknown): string[] {
	if (Array.isArray(values)) {
		return values.map(stringifyValue);
	}
	return [stringifyValue(values)];
}

function stringifyValue(value: unknown): string {
	if (typeof value === "object" && value !== null) {
		return JSON.stringify(value);
	}
	return String(value);
}
