import { DotenvParseError } from './DotenvParseError';
import type { ParsedLine } from './ParsedLine';
import { Scanner } from './Scanner';

const EXPORT_PREFIX = 'export ';

const EMPTY_LINE: ParsedLine = {
	key: '',
	value: '',
	allowExpansion: false,
	quote: 'unquoted',
};

function failed(error: unknown): ParsedLine {
	if (error instanceof DotenvParseError) {
		return { ...EMPTY_LINE, error };
	}
	throw error;
}

/**
 * Parses one logical line, leaving the scanner at the start of the next one
 * (or at the line break that ends a quoted value).
 */
export function parseLine(scanner: Scanner): ParsedLine {
	scanner.skipWhitespace();

	// Blank line or full-line comment
	const first = scanner.peek();
	if (scanner.atEnd || first === '\n' || first === '\r' || first === '#') {
		scanner.skipToNextLine();
		return { ...EMPTY_LINE };
	}

	if (scanner.startsWith(EXPORT_PREFIX)) {
		for (let i = 0; i < EXPORT_PREFIX.length; i++) {
			scanner.advance();
		}
		scanner.skipWhitespace();
	}

	const keyLine = scanner.line;
	const keyColumn = scanner.column;
	let key: string;
	try {
		key = scanner.parseKey();
	} catch (error) {
		return failed(error);
	}
	if (!key) {
		return failed(DotenvParseError.missingVariableName(keyLine, keyColumn));
	}

	scanner.skipWhitespace();
	if (scanner.peek() !== '=') {
		return failed(
			DotenvParseError.missingAssignment(scanner.line, scanner.column)
		);
	}
	scanner.advance();
	scanner.skipWhitespace();

	const next = scanner.peek();
	if (next === '"' || next === "'") {
		let value: string;
		try {
			value = scanner.parseQuotedValue(next);
		} catch (error) {
			return failed(error);
		}

		// Only a comment may follow the closing quote on the same line
		scanner.skipWhitespace();
		if (scanner.peek() === '#') {
			scanner.skipToNextLine();
		}

		return {
			key,
			value,
			allowExpansion: next === '"',
			quote: next === '"' ? 'double' : 'single',
		};
	}

	const { value, hadComment } = scanner.parseUnquotedValue();
	if (hadComment) {
		scanner.skipToNextLine();
	}
	return { key, value, allowExpansion: true, quote: 'unquoted' };
}
