import { describe, expect, it } from 'vitest';

import { DotenvParseError, ParseErrorCode } from '../DotenvParseError';
import { parse, safeParse } from '../parse';

function errorOf(text: string): DotenvParseError {
	const result = safeParse(text);
	if (result.ok) {
		throw new Error(`expected "${text}" to fail`);
	}
	return result.error;
}

describe('parse', () => {
	it('parses basic assignments', () => {
		expect(parse('KEY1=value1\nKEY2=value2\nKEY3=')).toEqual({
			KEY1: 'value1',
			KEY2: 'value2',
			KEY3: '',
		});
	});

	it('returns an empty mapping for empty input', () => {
		expect(parse('')).toEqual({});
		expect(parse('\n\n# only comments\n')).toEqual({});
	});

	it('accepts the export prefix', () => {
		expect(
			parse('export KEY1=value1\nexport KEY2="value2"\nKEY3=value3')
		).toEqual({ KEY1: 'value1', KEY2: 'value2', KEY3: 'value3' });
	});

	it('handles whitespace around unquoted values', () => {
		const env = parse(
			[
				'KEY1=some value with spaces',
				'KEY2=value with trailing spaces   ',
				'KEY3=    value with leading spaces',
				'KEY4=   ',
			].join('\n')
		);

		expect(env).toEqual({
			KEY1: 'some value with spaces',
			KEY2: 'value with trailing spaces',
			KEY3: 'value with leading spaces',
			KEY4: '',
		});
	});

	it('handles quoted values', () => {
		const env = parse(
			[
				'DOUBLE="value with spaces"',
				"SINGLE='value with spaces'",
				'DOUBLE_ESCAPES="line1\\nline2\\ttab"',
				"SINGLE_ESCAPES='line1\\nline2'",
				'EMPTY_DOUBLE=""',
				"EMPTY_SINGLE=''",
			].join('\n')
		);

		expect(env).toEqual({
			DOUBLE: 'value with spaces',
			SINGLE: 'value with spaces',
			DOUBLE_ESCAPES: 'line1\nline2\ttab',
			SINGLE_ESCAPES: 'line1\\nline2',
			EMPTY_DOUBLE: '',
			EMPTY_SINGLE: '',
		});
	});

	it('strips inline comments outside quotes only', () => {
		const env = parse(
			[
				'KEY1=value # this is a comment',
				'KEY2="quoted value" # also a comment',
				"KEY3='single quoted' # comment",
				'KEY4="string with # hash inside"',
				'# Full line comment',
				'KEY5=v#tight',
			].join('\n')
		);

		expect(env).toEqual({
			KEY1: 'value',
			KEY2: 'quoted value',
			KEY3: 'single quoted',
			KEY4: 'string with # hash inside',
			KEY5: 'v',
		});
	});

	it('accepts CRLF line endings', () => {
		expect(parse('A=1\r\nB="two"\r\n\r\n# c\r\nC=3')).toEqual({
			A: '1',
			B: 'two',
			C: '3',
		});
	});

	it('lets a later definition win', () => {
		expect(parse('KEY=first\nKEY=second')).toEqual({ KEY: 'second' });
	});

	describe('variable expansion', () => {
		it('expands references to earlier keys', () => {
			const env = parse(
				[
					'BASE_DIR=/app',
					'HOME_DIR=/home/user',
					'PATH_ORIG=/usr/bin',
					'PATH="${HOME_DIR}/bin:${PATH_ORIG}"',
					'NESTED="${PATH}:${BASE_DIR}/bin"',
					'BARE=$HOME_DIR/config',
					"NO_EXPAND='$HOME_DIR/literal'",
				].join('\n')
			);

			expect(env.PATH).toBe('/home/user/bin:/usr/bin');
			expect(env.NESTED).toBe('/home/user/bin:/usr/bin:/app/bin');
			expect(env.BARE).toBe('/home/user/config');
			expect(env.NO_EXPAND).toBe('$HOME_DIR/literal');
		});

		it('blocks expansion in single quotes', () => {
			expect(parse("B=x\nA='$B literal'")).toEqual({
				B: 'x',
				A: '$B literal',
			});
			expect(parse('B=x\nA="$B literal"')).toEqual({
				B: 'x',
				A: 'x literal',
			});
		});

		it('does not resolve forward references', () => {
			expect(parse('A="${B}"\nB=val')).toEqual({ A: '${B}', B: 'val' });
		});

		it('does not see the key being defined', () => {
			expect(parse('SELF=$SELF')).toEqual({ SELF: '$SELF' });
		});

		it('uses the previous value when a key refers to itself', () => {
			expect(parse('PATH=/bin\nPATH=$PATH:/usr/bin')).toEqual({
				PATH: '/bin:/usr/bin',
			});
		});

		it('does not rescan expanded values', () => {
			expect(parse("A='$B'\nB=b\nC=$A")).toEqual({
				A: '$B',
				B: 'b',
				C: '$B',
			});
		});
	});

	it('stores keys that collide with object properties as own keys', () => {
		const env = parse('__proto__=x\nconstructor=y\nREF=$constructor');

		expect(Object.keys(env)).toEqual(['__proto__', 'constructor', 'REF']);
		expect(env.constructor).toBe('y');
		expect(env.REF).toBe('y');
	});

	it('throws the first error', () => {
		expect(() => parse('OK=1\nBROKEN\nALSO BROKEN')).toThrow(
			"Expected '=' after variable name at line 2"
		);
	});
});

describe('safeParse', () => {
	it('wraps the mapping on success', () => {
		expect(safeParse('A=1')).toEqual({ ok: true, value: { A: '1' } });
	});

	it('reports a missing assignment', () => {
		const error = errorOf('KEY_WITHOUT_EQUALS');

		expect(error.code).toBe(ParseErrorCode.MissingAssignment);
		expect(error.line).toBe(1);
	});

	it('reports an unterminated double-quoted value', () => {
		const error = errorOf('KEY="unterminated');

		expect(error.code).toBe(ParseErrorCode.UnterminatedString);
		expect(error.line).toBe(1);
	});

	it('reports an unterminated value at the line it started on', () => {
		const error = errorOf("A=1\nKEY='spans\nlines");

		expect(error.code).toBe(ParseErrorCode.UnterminatedString);
		expect(error.line).toBe(2);
	});

	it('reports a key starting with a digit', () => {
		const error = errorOf('123INVALID=value');

		expect(error.code).toBe(ParseErrorCode.InvalidKey);
		expect(error.line).toBe(1);
	});

	it('reports a key with invalid characters', () => {
		const error = errorOf('# header\nMY-KEY=value');

		expect(error.code).toBe(ParseErrorCode.MissingAssignment);
		expect(error.line).toBe(2);
	});

	it('reports trailing text after a quoted value', () => {
		const error = errorOf('KEY="value" extra');

		expect(error.code).toBe(ParseErrorCode.MissingAssignment);
		expect(error.line).toBe(1);
	});

	it('serializes errors for logging', () => {
		expect(errorOf('=value').toJSON()).toEqual({
			name: 'DotenvParseError',
			message:
				'Invalid key name: keys must start with a letter or underscore at line 1',
			code: ParseErrorCode.InvalidKey,
			line: 1,
			column: 1,
		});
	});
});
