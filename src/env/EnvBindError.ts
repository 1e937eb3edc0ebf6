export type EnvBindErrorCode = 'required_missing' | 'conversion_failed';

/** A field could not be bound or marshalled; `key` is the variable name. */
export class EnvBindError extends Error {
	public readonly code: EnvBindErrorCode;
	public readonly key: string;

	public constructor(message: string, code: EnvBindErrorCode, key: string) {
		super(message);
		this.name = 'EnvBindError';
		this.code = code;
		this.key = key;

		Object.setPrototypeOf(this, EnvBindError.prototype);
	}

	public static requiredMissing(key: string): EnvBindError {
		return new EnvBindError(
			`Required environment variable ${key} is not set`,
			'required_missing',
			key
		);
	}

	public static conversionFailed(
		key: string,
		type: string,
		reason: string
	): EnvBindError {
		return new EnvBindError(
			`Failed to parse ${type} for ${key}: ${reason}`,
			'conversion_failed',
			key
		);
	}
}
