import { err, ok, type Result } from '../dotenv/Result';

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;

/** Milliseconds per unit. */
const UNIT_MS = new Map<string, number>([
	['ns', 1e-6],
	['us', 1e-3],
	['µs', 1e-3],
	['μs', 1e-3],
	['ms', 1],
	['s', SECOND],
	['m', MINUTE],
	['h', HOUR],
]);

const SEGMENT = /(\d+\.?\d*|\.\d+)([a-zµμ]+)/y;

/**
 * Parses compound durations such as `1h30m`, `1.5s`, `-250ms` or `0` into
 * milliseconds.
 */
export function parseDuration(raw: string): Result<number, string> {
	let text = raw;
	let sign = 1;
	if (text.startsWith('-') || text.startsWith('+')) {
		sign = text.startsWith('-') ? -1 : 1;
		text = text.slice(1);
	}

	if (text === '0') {
		return ok(0);
	}
	if (!text) {
		return err(`invalid duration "${raw}"`);
	}

	let total = 0;
	SEGMENT.lastIndex = 0;
	while (SEGMENT.lastIndex < text.length) {
		const match = SEGMENT.exec(text);
		if (!match) {
			return err(`invalid duration "${raw}"`);
		}
		const unit = UNIT_MS.get(match[2]);
		if (unit === undefined) {
			return err(`unknown unit "${match[2]}" in duration "${raw}"`);
		}
		total += parseFloat(match[1]) * unit;
	}

	return ok(sign * total);
}

const NS_PER_MS = 1e6;
const NS_PER_SECOND = 1e9;
const NS_PER_MINUTE = 60 * NS_PER_SECOND;
const NS_PER_HOUR = 60 * NS_PER_MINUTE;

/** Whole seconds plus up to nine fractional digits, without trailing zeros. */
function formatSeconds(ns: number): string {
	const whole = Math.floor(ns / NS_PER_SECOND);
	const fraction = ns % NS_PER_SECOND;
	if (fraction === 0) {
		return `${whole}s`;
	}
	const digits = String(fraction).padStart(9, '0').replace(/0+$/, '');
	return `${whole}.${digits}s`;
}

/**
 * Formats milliseconds as `1h2m3.5s`, `250ms`, `1.5us` or `0s`, rounded to
 * whole nanoseconds.
 */
export function formatDuration(ms: number): string {
	const ns = Math.round(Math.abs(ms) * NS_PER_MS);
	if (ns === 0) {
		return '0s';
	}
	const sign = ms < 0 ? '-' : '';

	if (ns < 1000) {
		return `${sign}${ns}ns`;
	}
	if (ns < NS_PER_MS) {
		return `${sign}${ns / 1000}us`;
	}
	if (ns < NS_PER_SECOND) {
		return `${sign}${ns / NS_PER_MS}ms`;
	}

	const hours = Math.floor(ns / NS_PER_HOUR);
	const minutes = Math.floor((ns % NS_PER_HOUR) / NS_PER_MINUTE);

	let out = sign;
	if (hours > 0) {
		out += `${hours}h`;
	}
	if (hours > 0 || minutes > 0) {
		out += `${minutes}m`;
	}
	return out + formatSeconds(ns % NS_PER_MINUTE);
}
