import chalk from 'chalk';

export function reportFailure(error: unknown): never {
	const message = error instanceof Error ? error.message : String(error);
	console.error(chalk.red('Error:'), message);
	process.exit(1);
}
