const BRACED_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;
const BARE_REFERENCE = /\$([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Substitutes `${NAME}` and then `$NAME` with values from `lookup`.
 * Unknown names are left as written, substituted text is not rescanned by
 * the same pass.
 */
export function expandVariables(
	value: string,
	lookup: ReadonlyMap<string, string>
): string {
	const substitute = (match: string, name: string): string =>
		lookup.get(name) ?? match;

	return value
		.replace(BRACED_REFERENCE, substitute)
		.replace(BARE_REFERENCE, substitute);
}
