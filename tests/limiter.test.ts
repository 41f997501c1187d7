import { describe, expect, it } from "vitest";
import { createLimiter } from "../src/utils/limiter.js";

function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

async function measureConcurrency(limit: number | undefined, tasks: number): Promise<number> {
	const limiter = createLimiter(limit);
	let active = 0;
	let peak = 0;
	await Promise.all(
		Array.from({ length: tasks }, () =>
			limiter(async () => {
				active += 1;
				peak = Math.max(peak, active);
				await delay(5);
				active -= 1;
			}),
		),
	);
	return peak;
}

describe("limiter", () => {
	it("bounds concurrent tasks", async () => {
		expect(await measureConcurrency(2, 5)).toBe(2);
		expect(await measureConcurrency(1, 3)).toBe(1);
	});

	it("runs everything at once without a limit", async () => {
		expect(await measureConcurrency(undefined, 4)).toBe(4);
		expect(await measureConcurrency(0, 3)).toBe(3);
	});

	it("releases the slot when a task throws", async () => {
		const limiter = createLimiter(1);
		await expect(limiter(() => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
		await expect(limiter(async () => "next")).resolves.toBe("next");
	});
});
