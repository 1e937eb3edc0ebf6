import { codecs } from './codecs';
import type { EnvCodec } from './EnvCodec';

/**
 * Declares how one record field maps to an environment variable. `Optional`
 * is true until the field is made `required()` or given a `default()`.
 */
export class EnvField<T, Optional extends boolean = true> {
	public constructor(
		public readonly key: string,
		public readonly codec: EnvCodec<T>,
		public readonly optional: Optional,
		public readonly isRequired: boolean = false,
		public readonly defaultValue?: string
	) {}

	public required(): EnvField<T, false> {
		return new EnvField(this.key, this.codec, false, true, this.defaultValue);
	}

	/** Raw text used when the variable is missing; converted like a real value. */
	public default(raw: string): EnvField<T, false> {
		return new EnvField(this.key, this.codec, false, this.isRequired, raw);
	}
}

function field<T>(codec: EnvCodec<T>) {
	return (key: string): EnvField<T> => new EnvField(key, codec, true);
}

export const envField = {
	string: field(codecs.string),
	int: field(codecs.int),
	int8: field(codecs.int8),
	int16: field(codecs.int16),
	int32: field(codecs.int32),
	int64: field(codecs.int64),
	uint: field(codecs.uint),
	uint8: field(codecs.uint8),
	uint16: field(codecs.uint16),
	uint32: field(codecs.uint32),
	uint64: field(codecs.uint64),
	float32: field(codecs.float32),
	float64: field(codecs.float64),
	bool: field(codecs.bool),
	duration: field(codecs.duration),
	list: field(codecs.list),
	custom: <T>(key: string, codec: EnvCodec<T>): EnvField<T> =>
		new EnvField(key, codec, true),
};

export type EnvSchema = Record<string, EnvField<unknown, boolean>>;

export type InferEnv<S extends EnvSchema> = {
	[K in keyof S]: S[K] extends EnvField<infer T, infer Optional>
		? Optional extends true
			? T | undefined
			: T
		: never;
};
