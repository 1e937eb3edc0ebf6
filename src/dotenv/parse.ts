import type { DotenvParseError } from './DotenvParseError';
import type { EnvMap } from './EnvMap';
import { expandVariables } from './expandVariables';
import { parseLine } from './parseLine';
import { err, ok, type Result } from './Result';
import { Scanner } from './Scanner';

/**
 * Parses a whole .env document. Stops at the first malformed line; no partial
 * mapping is returned in that case.
 */
export function safeParse(text: string): Result<EnvMap, DotenvParseError> {
	const scanner = new Scanner(text);
	const env = new Map<string, string>();

	while (!scanner.atEnd) {
		const line = parseLine(scanner);
		if (line.error) {
			return err(line.error);
		}
		if (!line.key) {
			continue;
		}

		// Only keys from earlier lines are visible to the expansion
		const value =
			line.allowExpansion && line.value.includes('$')
				? expandVariables(line.value, env)
				: line.value;
		env.set(line.key, value);
	}

	return ok(Object.fromEntries(env));
}

/** Throwing form of {@link safeParse}. */
export function parse(text: string): EnvMap {
	const result = safeParse(text);
	if (!result.ok) {
		throw result.error;
	}
	return result.value;
}
