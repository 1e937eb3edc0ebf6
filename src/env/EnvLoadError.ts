export class EnvLoadError extends Error {
	public readonly filePath?: string;

	public constructor(message: string, filePath?: string, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = 'EnvLoadError';
		this.filePath = filePath;

		Object.setPrototypeOf(this, EnvLoadError.prototype);
	}
}
