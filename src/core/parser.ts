import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { Job, MatrixStrategy, Step, TriggerFilter, Workflow } from "./types.js";

type WorkflowYaml = {
  name?: string;
  on?: string | string[] | Record<string, TriggerYaml | null>;
  env?: Record<string, unknown>;
  jobs?: Record<string, JobYaml>;
};

type TriggerYaml = {
  branches?: string | string[];
  "branches-ignore"?: string | string[];
};

type JobYaml = {
  name?: string;
  needs?: string | string[];
  "runs-on"?: string | string[];
  steps?: StepYaml[];
  if?: string;
  env?: Record<string, unknown>;
  strategy?: {
    "fail-fast"?: boolean | string;
    "max-parallel"?: number | string;
    matrix?: Record<string, unknown>;
  };
};

type StepYaml = {
  name?: string;
  uses?: string;
  run?: string;
  with?: Record<string, unknown>;
  if?: string;
  env?: Record<string, unknown>;
  "continue-on-error"?: boolean | string;
};

export function parseWorkflow(workflowPath: string): Workflow {
  const raw = fs.readFileSync(workflowPath, "utf-8");
  return parseWorkflowSource(raw, workflowPath);
}

export function parseWorkflowSource(raw: string, workflowPath: string): Workflow {
  const doc = YAML.parseDocument(raw);
  if (doc.errors.length > 0) {
    const error = doc.errors[0];
    const line = error.linePos?.[0]?.line ?? 0;
    const col = error.linePos?.[0]?.col ?? 0;
    throw new Error(`${workflowPath}:${line}:${col} ${error.message}`);
  }

  const parsed = (doc.toJSON() ?? {}) as WorkflowYaml;

  const jobs = Object.entries(parsed.jobs ?? {}).map(([jobId, job]) =>
    parseJob(jobId, job ?? {})
  );
  const triggers = parseTriggers(parsed.on);

  return {
    id: workflowPath,
    name: String(parsed.name ?? path.basename(workflowPath)),
    path: workflowPath,
    events: triggers.map((trigger) => trigger.event),
    triggers,
    env: normalizeEnv(parsed.env) ?? {},
    jobs
  };
}

function parseJob(jobId: string, job: JobYaml): Job {
  const steps = (job.steps ?? []).map((step, index) =>
    parseStep(jobId, step ?? {}, index)
  );

  return {
    id: jobId,
    name: job.name ?? jobId,
    needs: normalizeList(job.needs),
    runsOn: normalizeRunsOn(job["runs-on"]),
    steps,
    if: job.if,
    strategy: parseStrategy(job.strategy),
    env: normalizeEnv(job.env)
  };
}

function parseStrategy(strategy: JobYaml["strategy"]): MatrixStrategy | undefined {
  if (!strategy?.matrix) {
    return undefined;
  }
  const maxParallel = strategy["max-parallel"];
  return {
    matrix: strategy.matrix,
    // Legs are isolated unless the workflow asks for fail-fast explicitly.
    failFast: parseBoolean(strategy["fail-fast"], false),
    maxParallel: maxParallel === undefined ? undefined : Number(maxParallel)
  };
}

function parseStep(jobId: string, step: StepYaml, index: number): Step {
  const fallbackName = step.uses ?? step.run ?? `Step ${index + 1}`;
  return {
    id: `${jobId}-step-${index + 1}`,
    name: step.name ?? fallbackName.trim(),
    uses: step.uses,
    run: step.run,
    with: normalizeEnv(step.with),
    if: step.if,
    env: normalizeEnv(step.env),
    continueOnError: parseBoolean(step["continue-on-error"], false)
  };
}

function parseTriggers(trigger: WorkflowYaml["on"]): TriggerFilter[] {
  if (!trigger) {
    return [];
  }
  if (typeof trigger === "string") {
    return [emptyFilter(trigger)];
  }
  if (Array.isArray(trigger)) {
    return trigger.map((value) => emptyFilter(String(value)));
  }
  return Object.entries(trigger).map(([event, filter]) => ({
    event,
    branches: normalizeList(filter?.branches),
    branchesIgnore: normalizeList(filter?.["branches-ignore"])
  }));
}

function emptyFilter(event: string): TriggerFilter {
  return { event, branches: [], branchesIgnore: [] };
}

function normalizeList(value?: string | string[]): string[] {
  if (!value) {
    return [];
  }
  return Array.isArray(value) ? value.map(String) : [String(value)];
}

function normalizeRunsOn(runsOn?: string | string[]): string | undefined {
  if (!runsOn) {
    return undefined;
  }
  return Array.isArray(runsOn) ? runsOn.join(", ") : runsOn;
}

function normalizeEnv(
  values?: Record<string, unknown>
): Record<string, string> | undefined {
  if (!values) {
    return undefined;
  }
  return Object.fromEntries(
    Object.entries(values).map(([key, value]) => [key, value === null ? "" : String(value)])
  );
}

function parseBoolean(value: boolean | string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value === "boolean") {
    return value;
  }
  return value.trim().toLowerCase() === "true";
}
