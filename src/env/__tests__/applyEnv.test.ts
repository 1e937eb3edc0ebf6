import { describe, expect, it } from 'vitest';

import { applyEnv } from '../applyEnv';
import { createMemoryEnvironment } from '../createMemoryEnvironment';
import { EnvAccessError } from '../EnvAccessError';

describe('applyEnv', () => {
	it('sets every pair and returns the keys', () => {
		const target = createMemoryEnvironment({ EXISTING: 'old' });

		const applied = applyEnv({ A: '1', EXISTING: 'new' }, target);

		expect(applied).toEqual(['A', 'EXISTING']);
		expect(target.toRecord()).toEqual({ EXISTING: 'new', A: '1' });
	});

	it('keeps existing variables without override', () => {
		const target = createMemoryEnvironment({ EXISTING: 'old' });

		const applied = applyEnv({ A: '1', EXISTING: 'new' }, target, {
			override: false,
		});

		expect(applied).toEqual(['A']);
		expect(target.get('EXISTING')).toBe('old');
	});

	it('stops at the first failure without rolling back', () => {
		const target = createMemoryEnvironment();

		let caught: unknown;
		try {
			applyEnv({ GOOD: '1', 'BAD=NAME': '2', LATER: '3' }, target);
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(EnvAccessError);
		if (caught instanceof EnvAccessError) {
			expect(caught.key).toBe('BAD=NAME');
			expect(caught.message).toBe(
				'Failed to set environment variable BAD=NAME'
			);
		}
		expect(target.toRecord()).toEqual({ GOOD: '1' });
	});
});
