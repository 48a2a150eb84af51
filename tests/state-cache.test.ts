import { describe, expect, it } from 'vitest';

import { StateCache } from '../src/bestway/state-cache.js';

describe('StateCache', () => {
	describe('reconcile', () => {
		it('ignores a zero server timestamp', () => {
			const cache = new StateCache();

			expect(cache.reconcile('d1', 0, { power: 1 })).toBe('no-data');
			expect(cache.has('d1')).toBe(false);
		});

		it('keeps the cached entry on a zero timestamp', () => {
			const cache = new StateCache();
			cache.reconcile('d1', 100, { power: 1 });

			expect(cache.reconcile('d1', 0, {})).toBe('no-data');
			expect(cache.get('d1')).toEqual({ timestamp: 100, attrs: { power: 1 } });
		});

		it('creates an entry on the first positive timestamp', () => {
			const cache = new StateCache();

			expect(cache.reconcile('d1', 100, { power: 1, temp_now: 30 })).toBe('updated');
			expect(cache.get('d1')).toEqual({ timestamp: 100, attrs: { power: 1, temp_now: 30 } });
		});

		it('discards a server read older than the cached entry', () => {
			const cache = new StateCache();
			cache.reconcile('d1', 200, { power: 1 });

			expect(cache.reconcile('d1', 150, { power: 0 })).toBe('stale');
			expect(cache.get('d1')).toEqual({ timestamp: 200, attrs: { power: 1 } });
		});

		it('lets an equal timestamp replace the entry', () => {
			const cache = new StateCache();
			cache.reconcile('d1', 200, { power: 1 });

			expect(cache.reconcile('d1', 200, { power: 0 })).toBe('updated');
			expect(cache.get('d1')?.attrs).toEqual({ power: 0 });
		});

		it('replaces the whole attribute bag', () => {
			const cache = new StateCache();
			cache.reconcile('d1', 100, { power: 1, heat_power: 1 });

			cache.reconcile('d1', 101, { power: 0 });

			expect(cache.get('d1')?.attrs).toEqual({ power: 0 });
		});

		it('never shares the caller\'s attribute object', () => {
			const cache = new StateCache();
			const attrs: Record<string, number> = { power: 1 };
			cache.reconcile('d1', 100, attrs);

			attrs.power = 0;

			expect(cache.get('d1')?.attrs).toEqual({ power: 1 });
			expect(Object.isFrozen(cache.get('d1'))).toBe(true);
		});
	});

	describe('applyOptimistic', () => {
		it('does nothing without an entry', () => {
			const cache = new StateCache();

			expect(cache.applyOptimistic('d1', { power: 1 }, 500)).toBeUndefined();
			expect(cache.has('d1')).toBe(false);
		});

		it('stamps the entry with the local time and merges the patch', () => {
			const cache = new StateCache();
			cache.reconcile('d1', 100, { power: 0, temp_now: 25 });

			const next = cache.applyOptimistic('d1', { power: 1 }, 500);

			expect(next).toEqual({ timestamp: 500, attrs: { power: 1, temp_now: 25 } });
			expect(cache.get('d1')).toBe(next);
		});

		it('never moves the timestamp backwards', () => {
			const cache = new StateCache();
			cache.reconcile('d1', 900, { power: 0 });

			expect(cache.applyOptimistic('d1', { power: 1 }, 500)?.timestamp).toBe(900);
		});

		it('leaves the previous snapshot untouched', () => {
			const cache = new StateCache();
			cache.reconcile('d1', 100, { power: 0 });
			const before = cache.get('d1');

			cache.applyOptimistic('d1', { power: 1 }, 500);

			expect(before).toEqual({ timestamp: 100, attrs: { power: 0 } });
		});

		it('shields an optimistic write from a lagging server read', () => {
			const cache = new StateCache();
			cache.reconcile('d1', 100, { power: 0 });
			cache.applyOptimistic('d1', { power: 1 }, 500);

			expect(cache.reconcile('d1', 400, { power: 0 })).toBe('stale');
			expect(cache.get('d1')?.attrs).toEqual({ power: 1 });

			expect(cache.reconcile('d1', 501, { power: 1, temp_now: 26 })).toBe('updated');
			expect(cache.get('d1')).toEqual({ timestamp: 501, attrs: { power: 1, temp_now: 26 } });
		});
	});

	it('lists and clears entries', () => {
		const cache = new StateCache();
		cache.reconcile('d1', 100, {});
		cache.reconcile('d2', 100, {});

		expect(cache.deviceIds()).toEqual(['d1', 'd2']);
		expect([...cache.snapshot().keys()]).toEqual(['d1', 'd2']);

		cache.clear();

		expect(cache.deviceIds()).toEqual([]);
	});

	it('retains only the given devices', () => {
		const cache = new StateCache();
		cache.reconcile('d1', 100, { power: 1 });
		cache.reconcile('d2', 100, { power: 0 });
		cache.reconcile('d3', 100, {});

		expect(cache.retain(['d2', 'd4'])).toEqual(['d1', 'd3']);
		expect(cache.deviceIds()).toEqual(['d2']);
		expect(cache.retain(['d2'])).toEqual([]);
	});
});
