export interface LogOptions {
	silent?: boolean;
	verbose?: boolean;
}

export type OutputFormat = 'env' | 'json';

export interface ParseOptions extends LogOptions {
	format?: string;
}

export type CheckOptions = LogOptions;

/**
 * - override: replace variables already present in the environment
 *   (`--no-override` sets it to false)
 */
export interface RunOptions extends LogOptions {
	override?: boolean;
}
