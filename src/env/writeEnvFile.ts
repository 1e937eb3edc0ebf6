import fs from 'fs';

import type { EnvMap } from '../dotenv/EnvMap';

import { type BindOptions, marshalEnv } from './bindEnv';
import type { EnvSchema, InferEnv } from './EnvField';
import { serializeEnv } from './serializeEnv';

export function writeEnvFile(filePath: string, env: EnvMap): void {
	fs.writeFileSync(filePath, serializeEnv(env), 'utf-8');
}

export function marshalToFile<S extends EnvSchema>(
	filePath: string,
	schema: S,
	values: Partial<InferEnv<S>>,
	options: BindOptions = {}
): void {
	writeEnvFile(filePath, marshalEnv(schema, values, options));
}
