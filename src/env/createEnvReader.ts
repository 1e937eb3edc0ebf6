import { codecs } from './codecs';
import type { EnvCodec } from './EnvCodec';
import type { EnvironmentAccessor } from './EnvironmentAccessor';
import { processEnvironment } from './processEnvironment';

/**
 * `read(key)` is `undefined` when the variable is missing or does not convert;
 * `read(key, fallback)` returns the fallback in both cases.
 */
export interface TypedAccessor<T> {
	(key: string): T | undefined;
	(key: string, fallback: T): T;
}

type Readers = {
	[K in keyof typeof codecs]: TypedAccessor<
		(typeof codecs)[K] extends EnvCodec<infer T> ? T : never
	>;
};

export type EnvReader = Readers & {
	has(key: string): boolean;
};

function typedAccessor<T>(
	source: EnvironmentAccessor,
	codec: EnvCodec<T>
): TypedAccessor<T> {
	function read(key: string): T | undefined;
	function read(key: string, fallback: T): T;
	function read(key: string, fallback?: T): T | undefined {
		const raw = source.get(key);
		if (raw === undefined) {
			return fallback;
		}
		const result = codec.parse(raw);
		return result.ok ? result.value : fallback;
	}
	return read;
}

export function createEnvReader(
	source: EnvironmentAccessor = processEnvironment
): EnvReader {
	return {
		has: (key) => source.has(key),
		string: typedAccessor(source, codecs.string),
		int: typedAccessor(source, codecs.int),
		int8: typedAccessor(source, codecs.int8),
		int16: typedAccessor(source, codecs.int16),
		int32: typedAccessor(source, codecs.int32),
		int64: typedAccessor(source, codecs.int64),
		uint: typedAccessor(source, codecs.uint),
		uint8: typedAccessor(source, codecs.uint8),
		uint16: typedAccessor(source, codecs.uint16),
		uint32: typedAccessor(source, codecs.uint32),
		uint64: typedAccessor(source, codecs.uint64),
		float32: typedAccessor(source, codecs.float32),
		float64: typedAccessor(source, codecs.float64),
		bool: typedAccessor(source, codecs.bool),
		duration: typedAccessor(source, codecs.duration),
		list: typedAccessor(source, codecs.list),
	};
}

export function setEnv(
	key: string,
	value: string,
	target: EnvironmentAccessor = processEnvironment
): void {
	target.set(key, value);
}

export function unsetEnv(
	key: string,
	target: EnvironmentAccessor = processEnvironment
): void {
	target.unset(key);
}

export function hasEnv(
	key: string,
	source: EnvironmentAccessor = processEnvironment
): boolean {
	return source.has(key);
}
