import type { DotenvParseError } from './DotenvParseError';
import type { QuoteContext } from './QuoteContext';

/**
 * Result of parsing one logical line.
 *
 * An empty `key` without `error` is a blank line or a full-line comment.
 */
export interface ParsedLine {
	key: string;
	value: string;
	allowExpansion: boolean;
	quote: QuoteContext;
	error?: DotenvParseError;
}
