import path from 'path';

import type { ParseOptions } from './CommandOptions';
import { parseEnvAction } from './parseEnvAction';
import { reportFailure } from './reportFailure';

export function parseCommand(file: string, opts: ParseOptions) {
	try {
		parseEnvAction(path.resolve(file), opts);
	} catch (error) {
		reportFailure(error);
	}
}
