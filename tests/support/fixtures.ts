import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { EngineContext } from "../../src/core/engine.js";
import type { Job, Step, Workflow } from "../../src/core/types.js";

export function makeTmpDir(prefix: string): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), `legwork-${prefix}-`));
}

export function makeStep(jobId: string, index: number, fields: Partial<Step>): Step {
	const fallback = fields.uses ?? fields.run ?? `Step ${index + 1}`;
	return { id: `${jobId}-step-${index + 1}`, name: fallback, ...fields };
}

export function makeJob(id: string, fields: Partial<Job> = {}): Job {
	return { id, name: id, needs: [], steps: [], ...fields };
}

export function makeWorkflow(jobs: Job[], fields: Partial<Workflow> = {}): Workflow {
	return {
		id: ".github/workflows/ci.yml",
		name: "CI",
		path: ".github/workflows/ci.yml",
		events: ["push"],
		triggers: [{ event: "push", branches: [], branchesIgnore: [] }],
		env: {},
		jobs,
		...fields,
	};
}

export function makeContext(repoRoot: string, fields: Partial<EngineContext> = {}): EngineContext {
	const runDir = path.join(repoRoot, ".legwork", "runs", "run-1");
	return {
		repoRoot,
		runDir,
		logsDir: path.join(runDir, "logs"),
		workflowsPath: path.join(repoRoot, ".github", "workflows"),
		event: { name: "push", branch: "main" },
		...fields,
	};
}
