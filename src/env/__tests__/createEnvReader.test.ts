import { describe, expect, it } from 'vitest';

import { createEnvReader, hasEnv, setEnv, unsetEnv } from '../createEnvReader';
import { createMemoryEnvironment } from '../createMemoryEnvironment';

describe('createEnvReader', () => {
	const env = createMemoryEnvironment({
		NAME: 'service',
		PORT: '8080',
		BAD_PORT: 'eighty',
		DEBUG: 'yes',
		RATIO: '0.25',
		TIMEOUT: '1m30s',
		HOSTS: 'a.local,b.local',
		SMALL: '300',
	});
	const read = createEnvReader(env);

	it('returns values converted to their type', () => {
		expect(read.string('NAME')).toBe('service');
		expect(read.int('PORT')).toBe(8080);
		expect(read.bool('DEBUG')).toBe(true);
		expect(read.float64('RATIO')).toBe(0.25);
		expect(read.duration('TIMEOUT')).toBe(90_000);
		expect(read.list('HOSTS')).toEqual(['a.local', 'b.local']);
	});

	it('returns undefined for missing or unconvertible values', () => {
		expect(read.int('MISSING')).toBeUndefined();
		expect(read.int('BAD_PORT')).toBeUndefined();
		expect(read.uint8('SMALL')).toBeUndefined();
	});

	it('returns the fallback for missing or unconvertible values', () => {
		expect(read.string('MISSING', 'default')).toBe('default');
		expect(read.int('BAD_PORT', 3000)).toBe(3000);
		expect(read.bool('MISSING', false)).toBe(false);
		expect(read.int('PORT', 3000)).toBe(8080);
	});

	it('reports presence', () => {
		expect(read.has('NAME')).toBe(true);
		expect(read.has('MISSING')).toBe(false);
	});
});

describe('setEnv / unsetEnv / hasEnv', () => {
	it('go through the given accessor', () => {
		const env = createMemoryEnvironment();

		setEnv('TOKEN', 'test-secret', env);
		expect(hasEnv('TOKEN', env)).toBe(true);
		expect(env.get('TOKEN')).toBe('test-secret');

		unsetEnv('TOKEN', env);
		expect(hasEnv('TOKEN', env)).toBe(false);
	});

	it('reject names the environment cannot hold', () => {
		const env = createMemoryEnvironment();

		expect(() => setEnv('A=B', 'x', env)).toThrow(
			'Invalid environment variable name "A=B"'
		);
		expect(() => setEnv('', 'x', env)).toThrow(
			'Invalid environment variable name ""'
		);
	});
});
