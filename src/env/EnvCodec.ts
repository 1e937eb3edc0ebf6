import type { Result } from '../dotenv/Result';

/** Converts between the text form of a variable and a typed value. */
export interface EnvCodec<T> {
	readonly type: string;
	parse(raw: string): Result<T, string>;
	format(value: T): string;
}
