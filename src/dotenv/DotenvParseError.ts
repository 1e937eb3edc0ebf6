export enum ParseErrorCode {
	InvalidKey = 'invalid_key',
	MissingVariableName = 'missing_variable_name',
	MissingAssignment = 'missing_assignment',
	UnterminatedString = 'unterminated_string',
}

/**
 * Raised for the first malformed line of a document. `line` and `column` are
 * 1-based and point at where the offending construct began.
 */
export class DotenvParseError extends Error {
	public readonly code: ParseErrorCode;
	public readonly line: number;
	public readonly column: number;

	public constructor(
		message: string,
		code: ParseErrorCode,
		line: number,
		column: number = 1
	) {
		super(`${message} at line ${line}`);
		this.name = 'DotenvParseError';
		this.code = code;
		this.line = line;
		this.column = column;

		Object.setPrototypeOf(this, DotenvParseError.prototype);
	}

	public toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			line: this.line,
			column: this.column,
		};
	}

	public static invalidKey(line: number, column: number): DotenvParseError {
		return new DotenvParseError(
			'Invalid key name: keys must start with a letter or underscore',
			ParseErrorCode.InvalidKey,
			line,
			column
		);
	}

	public static missingVariableName(
		line: number,
		column: number
	): DotenvParseError {
		return new DotenvParseError(
			'Expected variable name',
			ParseErrorCode.MissingVariableName,
			line,
			column
		);
	}

	public static missingAssignment(
		line: number,
		column: number
	): DotenvParseError {
		return new DotenvParseError(
			"Expected '=' after variable name",
			ParseErrorCode.MissingAssignment,
			line,
			column
		);
	}

	public static unterminatedString(
		quote: string,
		line: number,
		column: number
	): DotenvParseError {
		return new DotenvParseError(
			`Unterminated ${quote === '"' ? 'double' : 'single'}-quoted value`,
			ParseErrorCode.UnterminatedString,
			line,
			column
		);
	}
}
