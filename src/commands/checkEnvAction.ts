import chalk from 'chalk';

import { DotenvParseError } from '../dotenv/DotenvParseError';
import { EnvLoadError } from '../env/EnvLoadError';
import { loadEnvFile } from '../env/loadEnvFile';
import { createLogger, type LoggerOptions } from '../logs/createLogger';

import type { CheckOptions } from './CommandOptions';

/** Parses every file; returns true when all of them are valid. */
export function checkEnvAction(
	filePaths: string[],
	options: CheckOptions,
	write?: LoggerOptions['write']
): boolean {
	const log = createLogger({
		silent: options.silent,
		verbose: options.verbose,
		write,
	});
	let allValid = true;

	for (const filePath of filePaths) {
		log.verbose(`Checking: ${filePath}`);
		try {
			const env = loadEnvFile(filePath);
			log.normal(
				chalk.green('OK'),
				`${filePath} (${Object.keys(env).length} variables)`
			);
		} catch (error) {
			allValid = false;
			if (error instanceof DotenvParseError) {
				log.normal(chalk.red(`${filePath}:${error.line}:`), error.message);
			} else if (error instanceof EnvLoadError) {
				log.error(error.message);
			} else {
				throw error;
			}
		}
	}

	return allValid;
}
