import path from 'path';

import type { RunOptions } from './CommandOptions';
import { reportFailure } from './reportFailure';
import { runWithEnvAction } from './runWithEnvAction';

export function runCommand(
	file: string,
	command: string,
	args: string[],
	opts: RunOptions
) {
	try {
		const status = runWithEnvAction(path.resolve(file), command, args, opts);
		process.exit(status);
	} catch (error) {
		reportFailure(error);
	}
}
