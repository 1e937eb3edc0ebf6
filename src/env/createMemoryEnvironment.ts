import type { EnvironmentAccessor } from './EnvironmentAccessor';
import { validateEnvName } from './validateEnvName';

/**
 * In-memory environment, seeded from a mapping such as a parse result or a
 * copy of `process.env`. `toRecord` snapshots the current contents.
 */
export function createMemoryEnvironment(
	initial: Record<string, string | undefined> = {}
): EnvironmentAccessor & { toRecord(): Record<string, string> } {
	const values = new Map<string, string>();
	for (const [key, value] of Object.entries(initial)) {
		if (value !== undefined) {
			values.set(key, value);
		}
	}

	return {
		get(key) {
			return values.get(key);
		},
		set(key, value) {
			validateEnvName(key);
			values.set(key, value);
		},
		unset(key) {
			values.delete(key);
		},
		has(key) {
			return values.has(key);
		},
		keys() {
			return [...values.keys()];
		},
		toRecord() {
			return Object.fromEntries(values);
		},
	};
}
