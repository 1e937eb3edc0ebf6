import path from 'path';

import { checkEnvAction } from './checkEnvAction';
import type { CheckOptions } from './CommandOptions';
import { reportFailure } from './reportFailure';

export function checkCommand(files: string[], opts: CheckOptions) {
	try {
		const valid = checkEnvAction(
			files.map((file) => path.resolve(file)),
			opts
		);
		if (!valid) {
			process.exitCode = 1;
		}
	} catch (error) {
		reportFailure(error);
	}
}
