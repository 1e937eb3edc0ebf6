import type { EnvMap } from '../dotenv/EnvMap';

import { EnvBindError } from './EnvBindError';
import type { EnvSchema, InferEnv } from './EnvField';
import type { EnvironmentAccessor } from './EnvironmentAccessor';
import { processEnvironment } from './processEnvironment';

export interface BindOptions {
	/** Prepended to every field's key, e.g. `APP_`. */
	prefix?: string;
}

/**
 * Reads each field of `schema` from `source` and converts it. Missing
 * optional fields without a default come back as `undefined`.
 *
 * @example
 * ```typescript
 * const schema = {
 *   port: envField.int('PORT').default('8080'),
 *   hosts: envField.list('HOSTS').required(),
 * };
 * const config = bindEnv(schema);
 * ```
 */
export function bindEnv<S extends EnvSchema>(
	schema: S,
	source?: EnvironmentAccessor,
	options?: BindOptions
): InferEnv<S>;
export function bindEnv(
	schema: EnvSchema,
	source: EnvironmentAccessor = processEnvironment,
	options: BindOptions = {}
): Record<string, unknown> {
	const prefix = options.prefix ?? '';
	const record: Record<string, unknown> = {};

	for (const [name, field] of Object.entries(schema)) {
		const key = prefix + field.key;

		let raw = source.get(key);
		if (raw === undefined) {
			if (field.isRequired) {
				throw EnvBindError.requiredMissing(key);
			}
			raw = field.defaultValue;
		}
		if (raw === undefined) {
			record[name] = undefined;
			continue;
		}

		const result = field.codec.parse(raw);
		if (!result.ok) {
			throw EnvBindError.conversionFailed(key, field.codec.type, result.error);
		}
		record[name] = result.value;
	}

	return record;
}

/**
 * Reverse of {@link bindEnv}: formats each defined field. Fields that are
 * `undefined` or format to an empty string are left out.
 */
export function marshalEnv<S extends EnvSchema>(
	schema: S,
	values: Partial<InferEnv<S>>,
	options?: BindOptions
): EnvMap;
export function marshalEnv(
	schema: EnvSchema,
	values: Readonly<Record<string, unknown>>,
	options: BindOptions = {}
): EnvMap {
	const prefix = options.prefix ?? '';
	const env: EnvMap = {};

	for (const [name, field] of Object.entries(schema)) {
		const value = values[name];
		if (value === undefined) {
			continue;
		}
		const text = field.codec.format(value);
		if (text !== '') {
			env[prefix + field.key] = text;
		}
	}

	return env;
}
