import type { EnvMap } from '../dotenv/EnvMap';

import { EnvAccessError } from './EnvAccessError';
import type { EnvironmentAccessor } from './EnvironmentAccessor';
import { processEnvironment } from './processEnvironment';

export interface ApplyOptions {
	/** Replace variables that are already set (default: true). */
	override?: boolean;
}

/**
 * Sets every pair of `env` on `target`. The first failure is rethrown naming
 * the key; pairs set before it stay set. Returns the keys actually written.
 */
export function applyEnv(
	env: EnvMap,
	target: EnvironmentAccessor = processEnvironment,
	options: ApplyOptions = {}
): string[] {
	const override = options.override ?? true;
	const applied: string[] = [];

	for (const [key, value] of Object.entries(env)) {
		if (!override && target.has(key)) {
			continue;
		}
		try {
			target.set(key, value);
		} catch (error) {
			throw new EnvAccessError(
				`Failed to set environment variable ${key}`,
				key,
				error
			);
		}
		applied.push(key);
	}

	return applied;
}
