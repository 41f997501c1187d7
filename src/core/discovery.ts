import fs from "node:fs";
import path from "node:path";
import { parseWorkflow } from "./parser.js";
import type { Workflow } from "./types.js";

export const WORKFLOWS_DIR = path.join(".github", "workflows");

export type WorkflowLoadError = {
  path: string;
  message: string;
};

export type DiscoveryResult = {
  workflows: Workflow[];
  errors: WorkflowLoadError[];
};

export function findWorkflowFiles(repoRoot: string): string[] {
  const workflowsDir = path.join(repoRoot, WORKFLOWS_DIR);
  if (!fs.existsSync(workflowsDir)) {
    return [];
  }

  return fs
    .readdirSync(workflowsDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && /\.ya?ml$/.test(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(workflowsDir, name));
}

/**
 * Parses every workflow file. A file that fails to parse is reported in
 * `errors` and does not hide the others.
 */
export function discoverWorkflows(repoRoot: string): DiscoveryResult {
  const result: DiscoveryResult = { workflows: [], errors: [] };
  for (const workflowPath of findWorkflowFiles(repoRoot)) {
    try {
      result.workflows.push(parseWorkflow(workflowPath));
    } catch (error) {
      result.errors.push({
        path: path.relative(repoRoot, workflowPath),
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return result;
}
