import { DotenvParseError } from './DotenvParseError';

/** Returned by `peek`, `peekNext` and `advance` past the end of input. */
export const END_OF_INPUT = '';

/** Escapes recognised inside double quotes. Anything else is kept as `\x`. */
const DOUBLE_QUOTE_ESCAPES: Record<string, string> = {
	n: '\n',
	t: '\t',
	r: '\r',
	'\\': '\\',
	'"': '"',
	"'": "'",
};

export function isKeyStartChar(ch: string): boolean {
	return (
		(ch >= 'A' && ch <= 'Z') || (ch >= 'a' && ch <= 'z') || ch === '_'
	);
}

export function isKeyChar(ch: string): boolean {
	return isKeyStartChar(ch) || (ch >= '0' && ch <= '9');
}

function isBlank(ch: string): boolean {
	return ch === ' ' || ch === '\t';
}

/**
 * Cursor over .env text. Knows character classes and the small sub-scans the
 * line parser needs, nothing about whole lines.
 *
 * `line` and `column` always describe the next unread character.
 */
export class Scanner {
	private pos = 0;
	private currentLine = 1;
	private currentColumn = 1;

	public constructor(private readonly content: string) {}

	public get position(): number {
		return this.pos;
	}

	public get line(): number {
		return this.currentLine;
	}

	public get column(): number {
		return this.currentColumn;
	}

	public get atEnd(): boolean {
		return this.pos >= this.content.length;
	}

	public peek(): string {
		return this.atEnd ? END_OF_INPUT : this.content[this.pos];
	}

	public peekNext(): string {
		return this.pos + 1 >= this.content.length
			? END_OF_INPUT
			: this.content[this.pos + 1];
	}

	public advance(): string {
		if (this.atEnd) {
			return END_OF_INPUT;
		}
		const ch = this.content[this.pos];
		this.pos++;
		if (ch === '\n') {
			this.currentLine++;
			this.currentColumn = 1;
		} else {
			this.currentColumn++;
		}
		return ch;
	}

	public startsWith(prefix: string): boolean {
		return this.content.startsWith(prefix, this.pos);
	}

	/** Spaces and tabs only; newlines are significant. */
	public skipWhitespace(): void {
		while (isBlank(this.peek())) {
			this.advance();
		}
	}

	/** Consumes through the next line feed, or to the end of input. */
	public skipToNextLine(): void {
		while (!this.atEnd && this.peek() !== '\n') {
			this.advance();
		}
		this.advance();
	}

	public parseKey(): string {
		if (!isKeyStartChar(this.peek())) {
			throw DotenvParseError.invalidKey(this.line, this.column);
		}

		const start = this.pos;
		while (isKeyChar(this.peek())) {
			this.advance();
		}
		return this.content.slice(start, this.pos);
	}

	/**
	 * Reads up to a line break or `#` (left unconsumed). Trailing blanks are
	 * trimmed; `hadComment` is true when the value stopped at `#`.
	 */
	public parseUnquotedValue(): { value: string; hadComment: boolean } {
		const start = this.pos;
		let hadComment = false;

		while (!this.atEnd) {
			const ch = this.peek();
			if (ch === '\n' || ch === '\r') {
				break;
			}
			if (ch === '#') {
				hadComment = true;
				break;
			}
			this.advance();
		}

		let end = this.pos;
		while (end > start && isBlank(this.content[end - 1])) {
			end--;
		}
		return { value: this.content.slice(start, end), hadComment };
	}

	/**
	 * Reads a value enclosed in `quote`, starting at the opening quote.
	 * Backslash escapes are only interpreted inside double quotes.
	 */
	public parseQuotedValue(quote: '"' | "'"): string {
		const startLine = this.line;
		const startColumn = this.column;
		let result = '';

		this.advance();

		while (!this.atEnd) {
			const ch = this.advance();

			if (ch === quote) {
				return result;
			}

			if (ch === '\\' && quote === '"') {
				if (this.atEnd) {
					break;
				}
				const escaped = this.advance();
				result += DOUBLE_QUOTE_ESCAPES[escaped] ?? `\\${escaped}`;
				continue;
			}

			result += ch;
		}

		throw DotenvParseError.unterminatedString(quote, startLine, startColumn);
	}
}
