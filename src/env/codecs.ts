import { err, ok } from '../dotenv/Result';

import { formatDuration, parseDuration } from './duration';
import type { EnvCodec } from './EnvCodec';

const SIGNED_INTEGER = /^[+-]?\d+$/;
const UNSIGNED_INTEGER = /^\d+$/;
const DECIMAL_FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOAT = /^([+-]?)(inf|infinity|nan)$/i;

const FLOAT32_MAX = 3.4028234663852886e38;

const TRUE_WORDS = ['true', '1', 'yes', 'on'];
const FALSE_WORDS = ['false', '0', 'no', 'off'];

function integerCodec(
	type: string,
	min: number,
	max: number,
	unsigned: boolean
): EnvCodec<number> {
	const pattern = unsigned ? UNSIGNED_INTEGER : SIGNED_INTEGER;
	return {
		type,
		parse(raw) {
			if (!pattern.test(raw)) {
				return err(`invalid ${type} "${raw}"`);
			}
			const value = Number(raw);
			if (value < min || value > max) {
				return err(`${type} value "${raw}" out of range`);
			}
			return ok(value);
		},
		format(value) {
			return String(value);
		},
	};
}

function bigIntegerCodec(
	type: string,
	min: bigint,
	max: bigint,
	unsigned: boolean
): EnvCodec<bigint> {
	const pattern = unsigned ? UNSIGNED_INTEGER : SIGNED_INTEGER;
	return {
		type,
		parse(raw) {
			if (!pattern.test(raw)) {
				return err(`invalid ${type} "${raw}"`);
			}
			const value = BigInt(raw);
			if (value < min || value > max) {
				return err(`${type} value "${raw}" out of range`);
			}
			return ok(value);
		},
		format(value) {
			return value.toString();
		},
	};
}

function parseFloatText(raw: string): number | undefined {
	if (DECIMAL_FLOAT.test(raw)) {
		return Number(raw);
	}
	const special = SPECIAL_FLOAT.exec(raw);
	if (!special) {
		return undefined;
	}
	if (special[2].toLowerCase() === 'nan') {
		return NaN;
	}
	return special[1] === '-' ? -Infinity : Infinity;
}

function floatCodec(type: string, single: boolean): EnvCodec<number> {
	return {
		type,
		parse(raw) {
			const value = parseFloatText(raw);
			if (value === undefined) {
				return err(`invalid ${type} "${raw}"`);
			}
			if (!single) {
				return ok(value);
			}
			if (Number.isFinite(value) && Math.abs(value) > FLOAT32_MAX) {
				return err(`${type} value "${raw}" out of range`);
			}
			return ok(Math.fround(value));
		},
		format(value) {
			return String(value);
		},
	};
}

const stringCodec: EnvCodec<string> = {
	type: 'string',
	parse: (raw) => ok(raw),
	format: (value) => value,
};

const boolCodec: EnvCodec<boolean> = {
	type: 'bool',
	parse(raw) {
		const word = raw.toLowerCase();
		if (TRUE_WORDS.includes(word)) {
			return ok(true);
		}
		if (FALSE_WORDS.includes(word)) {
			return ok(false);
		}
		return err(`invalid bool "${raw}"`);
	},
	format: (value) => String(value),
};

const durationCodec: EnvCodec<number> = {
	type: 'duration',
	parse: parseDuration,
	format: formatDuration,
};

const stringListCodec: EnvCodec<string[]> = {
	type: 'stringList',
	parse: (raw) => ok(raw.split(',').map((item) => item.trim())),
	format: (value) => value.join(','),
};

export const codecs = {
	string: stringCodec,
	int: integerCodec(
		'int',
		Number.MIN_SAFE_INTEGER,
		Number.MAX_SAFE_INTEGER,
		false
	),
	int8: integerCodec('int8', -128, 127, false),
	int16: integerCodec('int16', -32768, 32767, false),
	int32: integerCodec('int32', -2147483648, 2147483647, false),
	int64: bigIntegerCodec(
		'int64',
		-(BigInt(2) ** BigInt(63)),
		BigInt(2) ** BigInt(63) - BigInt(1),
		false
	),
	uint: integerCodec('uint', 0, Number.MAX_SAFE_INTEGER, true),
	uint8: integerCodec('uint8', 0, 255, true),
	uint16: integerCodec('uint16', 0, 65535, true),
	uint32: integerCodec('uint32', 0, 4294967295, true),
	uint64: bigIntegerCodec(
		'uint64',
		BigInt(0),
		BigInt(2) ** BigInt(64) - BigInt(1),
		true
	),
	float32: floatCodec('float32', true),
	float64: floatCodec('float64', false),
	bool: boolCodec,
	duration: durationCodec,
	list: stringListCodec,
} as const;

export type CodecName = keyof typeof codecs;
