import type { EnvMap } from '../dotenv/EnvMap';
import { loadEnvFile } from '../env/loadEnvFile';
import { serializeEnv } from '../env/serializeEnv';
import { createLogger } from '../logs/createLogger';

import type { OutputFormat, ParseOptions } from './CommandOptions';

function toOutputFormat(raw: string | undefined): OutputFormat {
	const format = raw ?? 'env';
	if (format !== 'env' && format !== 'json') {
		throw new Error(`Unknown format "${format}". Must be env or json`);
	}
	return format;
}

function sortedJson(env: EnvMap): string {
	const sorted = Object.fromEntries(
		Object.keys(env)
			.sort()
			.map((key) => [key, env[key]])
	);
	return `${JSON.stringify(sorted, null, 2)}\n`;
}

/** Parses `filePath` and prints the resulting mapping. */
export function parseEnvAction(
	filePath: string,
	options: ParseOptions,
	print: (text: string) => void = (text) => process.stdout.write(text)
): EnvMap {
	const log = createLogger({
		silent: options.silent,
		verbose: options.verbose,
		write: (line) => console.error(line),
	});
	const format = toOutputFormat(options.format);

	log.verbose(`Reading: ${filePath}`);
	const env = loadEnvFile(filePath);
	log.verbose(`Parsed ${Object.keys(env).length} variables`);

	print(format === 'json' ? sortedJson(env) : serializeEnv(env));
	return env;
}
