import chalk from 'chalk';
import { format } from 'util';

export interface LoggerOptions {
	silent?: boolean;
	verbose?: boolean;
	/** Receives each formatted line; defaults to `console.log`. */
	write?: (line: string) => void;
}

export function createLogger(options: LoggerOptions) {
	const isSilent = !!options.silent;
	const isVerbose = !!options.verbose && !isSilent;
	const write = options.write ?? ((line: string) => console.log(line));

	return {
		normal(...args: unknown[]) {
			if (!isSilent) {
				write(format(...args));
			}
		},
		verbose(...args: unknown[]) {
			if (isVerbose) {
				write(format(...args));
			}
		},
		warn(...args: unknown[]) {
			if (!isSilent) {
				write(format(chalk.yellow('Warning:'), ...args));
			}
		},
		error(...args: unknown[]) {
			if (!isSilent) {
				write(format(chalk.red('Error:'), ...args));
			}
		},
	};
}

export type Logger = ReturnType<typeof createLogger>;
