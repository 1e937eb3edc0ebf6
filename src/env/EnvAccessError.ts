export class EnvAccessError extends Error {
	public readonly key: string;

	public constructor(message: string, key: string, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = 'EnvAccessError';
		this.key = key;

		Object.setPrototypeOf(this, EnvAccessError.prototype);
	}
}
