import { EnvAccessError } from './EnvAccessError';

/** Names the operating system refuses: empty, or containing `=` or NUL. */
export function validateEnvName(key: string): void {
	if (!key || key.includes('=') || key.includes('\0')) {
		throw new EnvAccessError(
			`Invalid environment variable name "${key}"`,
			key
		);
	}
}
