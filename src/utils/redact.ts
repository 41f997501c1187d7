/**
 * `next` hides the argument following the flag; `value` keeps the variable
 * name of a `KEY=VALUE` argument and hides the value.
 */
export type RedactRule = {
	flag: string;
	mode: "next" | "value";
};

export const REDACTED = "<redacted>";

const DEFAULT_RULES: RedactRule[] = [
	{ flag: "--secret-file", mode: "next" },
	{ flag: "--env-file", mode: "next" },
	{ flag: "--var-file", mode: "next" },
	{ flag: "--env", mode: "value" },
	{ flag: "--secret", mode: "value" },
];

export function redactArgs(args: string[], rules: RedactRule[] = DEFAULT_RULES): string[] {
	const redacted = [...args];
	const byFlag = new Map(rules.map((rule) => [rule.flag, rule]));

	for (let i = 0; i < redacted.length; i += 1) {
		const current = redacted[i];
		const rule = byFlag.get(current);
		if (rule && i + 1 < redacted.length) {
			redacted[i + 1] = rule.mode === "next" ? REDACTED : redactAssignment(redacted[i + 1]);
			i += 1;
			continue;
		}
		for (const candidate of rules) {
			if (current.startsWith(`${candidate.flag}=`)) {
				const value = current.slice(candidate.flag.length + 1);
				redacted[i] =
					candidate.mode === "next"
						? `${candidate.flag}=${REDACTED}`
						: `${candidate.flag}=${redactAssignment(value)}`;
				break;
			}
		}
	}

	return redacted;
}

function redactAssignment(value: string): string {
	const eq = value.indexOf("=");
	return eq === -1 ? REDACTED : `${value.slice(0, eq)}=${REDACTED}`;
}
