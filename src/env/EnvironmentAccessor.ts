/**
 * Narrow view of an environment. The parser never touches one; the appliers,
 * readers and binder only go through this interface.
 */
export interface EnvironmentAccessor {
	get(key: string): string | undefined;
	set(key: string, value: string): void;
	unset(key: string): void;
	has(key: string): boolean;
	keys(): string[];
}
