import type { EnvMap } from '../dotenv/EnvMap';

const NEEDS_QUOTING = /[ \t\n\r"'\\#$]/;
const CONTROL_CHARACTER = /[\u0000-\u001f\u007f]/;

export function needsQuoting(value: string): boolean {
	return NEEDS_QUOTING.test(value);
}

/**
 * Double-quoted form with `\\`, `\"`, `\n`, `\t` and `\r` escaped. Values with
 * `$` and no single quote or control character are single-quoted instead, so
 * reading them back does not expand anything.
 */
export function quoteValue(value: string): string {
	if (
		value.includes('$') &&
		!value.includes("'") &&
		!CONTROL_CHARACTER.test(value)
	) {
		return `'${value}'`;
	}

	const escaped = value
		.replace(/\\/g, '\\\\')
		.replace(/"/g, '\\"')
		.replace(/\n/g, '\\n')
		.replace(/\t/g, '\\t')
		.replace(/\r/g, '\\r');
	return `"${escaped}"`;
}

/** One `KEY=value` line per entry, keys sorted, trailing newline. */
export function serializeEnv(env: EnvMap): string {
	const lines = Object.keys(env)
		.sort()
		.map((key) => {
			const value = env[key];
			return `${key}=${needsQuoting(value) ? quoteValue(value) : value}`;
		});

	return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}
