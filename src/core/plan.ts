import crypto from "node:crypto";
import { collectMatrixKeys, expandMatrix } from "./matrix.js";
import type { Job, MatrixValues, PlannedJob, RunPlan, TriggerEvent, Workflow } from "./types.js";

export type PlanInput = {
  workflow: Workflow;
  jobIds: string[];
  event: TriggerEvent;
  matrixOverride?: MatrixValues;
  failFastOverride?: boolean;
  runId?: string;
};

export class PlanError extends Error {
  constructor(readonly problems: string[]) {
    super(problems.join("; "));
    this.name = "PlanError";
  }
}

export function buildRunPlan(input: PlanInput): RunPlan {
  const runId = input.runId ?? createRunId();
  const jobMap = new Map(input.workflow.jobs.map((job) => [job.id, job]));
  const selected = new Set(input.jobIds);

  const jobs: PlannedJob[] = [];
  for (const jobId of input.jobIds) {
    const job = jobMap.get(jobId);
    if (!job) {
      continue;
    }
    jobs.push({
      jobId,
      needs: job.needs.filter((need) => selected.has(need)),
      failFast: input.failFastOverride ?? job.strategy?.failFast ?? false,
      maxParallel: job.strategy?.maxParallel,
      legs: expandMatrix(job, scopeOverride(job, input.matrixOverride))
    });
  }

  return {
    runId,
    workflow: input.workflow,
    event: input.event,
    jobs
  };
}

export function validatePlan(plan: RunPlan): string[] {
  const problems: string[] = [];
  const jobMap = new Map(plan.workflow.jobs.map((job) => [job.id, job]));

  for (const planned of plan.jobs) {
    const job = jobMap.get(planned.jobId);
    for (const need of job?.needs ?? []) {
      if (!jobMap.has(need)) {
        problems.push(`job "${planned.jobId}" needs unknown job "${need}"`);
      }
    }
    if (planned.legs.length === 0) {
      problems.push(`job "${planned.jobId}" has no matrix combinations to run`);
    }
  }

  const cyclic = findCyclicJobs(
    plan.workflow,
    plan.jobs.map((job) => job.jobId)
  );
  if (cyclic.length > 0) {
    problems.push(`dependency cycle between jobs: ${cyclic.join(", ")}`);
  }

  return problems;
}

export function assertValidPlan(plan: RunPlan): RunPlan {
  const problems = validatePlan(plan);
  if (problems.length > 0) {
    throw new PlanError(problems);
  }
  return plan;
}

export function expandJobIdsWithNeeds(workflow: Workflow, selected: string[]): string[] {
  const jobMap = new Map(workflow.jobs.map((job) => [job.id, job]));
  const expanded = new Set<string>();
  const visiting = new Set<string>();

  const visit = (jobId: string): void => {
    if (expanded.has(jobId) || visiting.has(jobId)) {
      return;
    }
    const job = jobMap.get(jobId);
    if (!job) {
      return;
    }
    visiting.add(jobId);
    job.needs.forEach(visit);
    visiting.delete(jobId);
    expanded.add(jobId);
  };

  selected.forEach(visit);
  return Array.from(expanded);
}

export function sortJobsByNeeds(workflow: Workflow, jobIds: string[]): string[] {
  const jobMap = new Map(workflow.jobs.map((job) => [job.id, job]));
  const inDegree = new Map<string, number>();
  const edges = new Map<string, Set<string>>();

  jobIds.forEach((jobId) => {
    inDegree.set(jobId, 0);
    edges.set(jobId, new Set());
  });

  jobIds.forEach((jobId) => {
    const job = jobMap.get(jobId);
    if (!job) {
      return;
    }
    job.needs.forEach((need) => {
      if (!inDegree.has(need)) {
        return;
      }
      inDegree.set(jobId, (inDegree.get(jobId) ?? 0) + 1);
      edges.get(need)?.add(jobId);
    });
  });

  const queue: string[] = [];
  for (const [jobId, degree] of inDegree.entries()) {
    if (degree === 0) {
      queue.push(jobId);
    }
  }

  const ordered: string[] = [];
  while (queue.length > 0) {
    const jobId = queue.shift();
    if (!jobId) {
      continue;
    }
    ordered.push(jobId);
    for (const next of edges.get(jobId) ?? []) {
      const degree = (inDegree.get(next) ?? 0) - 1;
      inDegree.set(next, degree);
      if (degree === 0) {
        queue.push(next);
      }
    }
  }

  const missing = jobIds.filter((jobId) => !ordered.includes(jobId));
  return ordered.concat(missing);
}

export function filterJobsForEvent(jobs: Job[], eventName: string): Job[] {
  if (eventName === "pull_request") {
    return jobs;
  }
  return jobs.filter((job) => !isPullRequestOnly(job));
}

function isPullRequestOnly(job: Job): boolean {
  if (!job.if) {
    return false;
  }
  return job.if.includes("pull_request");
}

function findCyclicJobs(workflow: Workflow, jobIds: string[]): string[] {
  const jobMap = new Map(workflow.jobs.map((job) => [job.id, job]));

  const reaches = (from: string, target: string, seen: Set<string>): boolean => {
    for (const need of jobMap.get(from)?.needs ?? []) {
      if (need === target) {
        return true;
      }
      if (seen.has(need)) {
        continue;
      }
      seen.add(need);
      if (reaches(need, target, seen)) {
        return true;
      }
    }
    return false;
  };

  return jobIds.filter((jobId) => reaches(jobId, jobId, new Set()));
}

function scopeOverride(job: Job, override?: MatrixValues): MatrixValues | undefined {
  if (!override) {
    return undefined;
  }
  const keys = new Set(collectMatrixKeys(job));
  const scoped = Object.fromEntries(
    Object.entries(override).filter(([key]) => keys.has(key))
  );
  return Object.keys(scoped).length > 0 ? scoped : undefined;
}

function createRunId(): string {
  const now = new Date();
  const stamp = now.toISOString().replace(/[-:]/g, "").split(".")[0];
  const random = crypto.randomBytes(3).toString("hex");
  return `${stamp}-${random}`;
}
