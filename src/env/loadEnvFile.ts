import fs from 'fs';
import type { Readable } from 'stream';

import type { EnvMap } from '../dotenv/EnvMap';
import { parse } from '../dotenv/parse';

import { applyEnv, type ApplyOptions } from './applyEnv';
import type { EnvironmentAccessor } from './EnvironmentAccessor';
import { EnvLoadError } from './EnvLoadError';
import { processEnvironment } from './processEnvironment';

export function loadEnvFile(filePath: string): EnvMap {
	let content: string;
	try {
		content = fs.readFileSync(filePath, 'utf-8');
	} catch (error) {
		throw new EnvLoadError(`Failed to read file ${filePath}`, filePath, error);
	}
	return parse(content);
}

export async function loadEnvFromStream(stream: Readable): Promise<EnvMap> {
	const chunks: Buffer[] = [];
	try {
		for await (const chunk of stream) {
			chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
		}
	} catch (error) {
		throw new EnvLoadError('Failed to read data', undefined, error);
	}
	return parse(Buffer.concat(chunks).toString('utf-8'));
}

/** Loads `filePath` and applies it; returns the keys that were set. */
export function loadAndApply(
	filePath: string,
	target: EnvironmentAccessor = processEnvironment,
	options: ApplyOptions = {}
): string[] {
	return applyEnv(loadEnvFile(filePath), target, options);
}
