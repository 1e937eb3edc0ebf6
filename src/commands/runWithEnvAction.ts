import { spawnSync, type SpawnSyncOptions } from 'child_process';

import { applyEnv } from '../env/applyEnv';
import { createMemoryEnvironment } from '../env/createMemoryEnvironment';
import { loadEnvFile } from '../env/loadEnvFile';
import { createLogger } from '../logs/createLogger';

import type { RunOptions } from './CommandOptions';

export type SpawnFn = (
	command: string,
	args: readonly string[],
	options: SpawnSyncOptions
) => { status: number | null; error?: Error };

export interface RunDependencies {
	spawn?: SpawnFn;
	baseEnv?: Record<string, string | undefined>;
}

/**
 * Runs `command` with the variables of `filePath` laid over the current
 * environment. Returns the child's exit status.
 */
export function runWithEnvAction(
	filePath: string,
	command: string,
	args: string[],
	options: RunOptions,
	deps: RunDependencies = {}
): number {
	const log = createLogger({
		silent: options.silent,
		verbose: options.verbose,
	});
	const spawn: SpawnFn = deps.spawn ?? spawnSync;

	const env = loadEnvFile(filePath);
	const childEnv = createMemoryEnvironment(deps.baseEnv ?? process.env);
	const applied = applyEnv(env, childEnv, {
		override: options.override ?? true,
	});
	log.verbose(
		`Applied ${applied.length} of ${Object.keys(env).length} variables from ${filePath}`
	);

	log.verbose(`Running: ${[command, ...args].join(' ')}`);
	const result = spawn(command, args, {
		stdio: 'inherit',
		env: childEnv.toRecord(),
	});

	if (result.error) {
		throw new Error(`Failed to run ${command}: ${result.error.message}`);
	}
	return result.status ?? 1;
}
