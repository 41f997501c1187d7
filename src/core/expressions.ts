import type { MatrixValues } from "./types.js";

export type ExpressionContext = {
	matrix: MatrixValues | null;
	env: Record<string, string>;
	github: {
		event_name: string;
		ref_name: string;
	};
	runner?: {
		os: string;
	};
};

export type JobStatusContext = {
	failed: boolean;
	canceled: boolean;
};

export class ExpressionError extends Error {
	constructor(
		readonly expression: string,
		message: string,
	) {
		super(`Unsupported expression "${expression}": ${message}`);
		this.name = "ExpressionError";
	}
}

const TEMPLATE_PATTERN = /\$\{\{\s*(.+?)\s*\}\}/g;
const REFERENCE_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*(?:\.[A-Za-z0-9_-]+)*$/;
const STATUS_FUNCTIONS = ["success()", "failure()", "always()", "cancelled()"];

export function interpolate(template: string, context: ExpressionContext): string {
	return template.replace(TEMPLATE_PATTERN, (_match, expression: string) => {
		const value = resolveReference(expression.trim(), context);
		return value ?? "";
	});
}

export function interpolateRecord(
	values: Record<string, string> | undefined,
	context: ExpressionContext,
): Record<string, string> {
	return Object.fromEntries(
		Object.entries(values ?? {}).map(([key, value]) => [key, interpolate(value, context)]),
	);
}

export function resolveReference(reference: string, context: ExpressionContext): string | undefined {
	if (!REFERENCE_PATTERN.test(reference)) {
		return undefined;
	}
	const [scope, ...rest] = reference.split(".");
	const key = rest.join(".");
	switch (scope) {
		case "matrix":
			return context.matrix?.[key];
		case "env":
			return context.env[key];
		case "github":
			if (key === "event_name" || key === "ref_name") {
				return context.github[key];
			}
			return undefined;
		case "runner":
			return key === "os" ? context.runner?.os : undefined;
		default:
			return undefined;
	}
}

export function evaluateCondition(
	condition: string | undefined,
	context: ExpressionContext,
	status: JobStatusContext,
): boolean {
	if (condition === undefined || condition.trim().length === 0) {
		return !status.failed && !status.canceled;
	}
	const expression = unwrap(condition);
	const result = evaluateOr(expression, context, status);
	if (STATUS_FUNCTIONS.some((fn) => expression.includes(fn))) {
		return result;
	}
	// Conditions without a status function only run while the job is healthy.
	return result && !status.failed && !status.canceled;
}

function unwrap(condition: string): string {
	const trimmed = condition.trim();
	const match = trimmed.match(/^\$\{\{\s*(.+?)\s*\}\}$/);
	return match ? match[1] : trimmed;
}

function evaluateOr(expression: string, context: ExpressionContext, status: JobStatusContext): boolean {
	return splitOutsideQuotes(expression, "||").some((part) =>
		splitOutsideQuotes(part, "&&").every((term) => evaluateTerm(term.trim(), expression, context, status)),
	);
}

function evaluateTerm(
	term: string,
	expression: string,
	context: ExpressionContext,
	status: JobStatusContext,
): boolean {
	if (term.length === 0) {
		throw new ExpressionError(expression, "empty operand");
	}
	if (term.startsWith("!") && !term.startsWith("!=")) {
		return !evaluateTerm(term.slice(1).trim(), expression, context, status);
	}
	switch (term) {
		case "success()":
			return !status.failed && !status.canceled;
		case "failure()":
			return status.failed;
		case "always()":
			return true;
		case "cancelled()":
			return status.canceled;
		case "true":
			return true;
		case "false":
			return false;
	}

	const comparison = term.match(/^(.+?)\s*(==|!=)\s*(.+)$/);
	if (comparison) {
		const left = evaluateOperand(comparison[1].trim(), expression, context);
		const right = evaluateOperand(comparison[3].trim(), expression, context);
		const equal = left.toLowerCase() === right.toLowerCase();
		return comparison[2] === "==" ? equal : !equal;
	}

	return evaluateOperand(term, expression, context).length > 0;
}

function evaluateOperand(operand: string, expression: string, context: ExpressionContext): string {
	const literal = operand.match(/^'((?:[^']|'')*)'$/);
	if (literal) {
		return literal[1].replace(/''/g, "'");
	}
	if (/^-?\d+(?:\.\d+)?$/.test(operand)) {
		return operand;
	}
	if (!REFERENCE_PATTERN.test(operand)) {
		throw new ExpressionError(expression, `cannot evaluate "${operand}"`);
	}
	return resolveReference(operand, context) ?? "";
}

function splitOutsideQuotes(input: string, separator: string): string[] {
	const parts: string[] = [];
	let current = "";
	let quoted = false;
	for (let i = 0; i < input.length; i += 1) {
		const char = input[i];
		if (char === "'") {
			quoted = !quoted;
		}
		if (!quoted && input.startsWith(separator, i)) {
			parts.push(current);
			current = "";
			i += separator.length - 1;
			continue;
		}
		current += char;
	}
	parts.push(current);
	return parts;
}
