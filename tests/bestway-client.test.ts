import { describe, expect, it, vi } from 'vitest';

import { readFlag } from '../src/bestway/attributes.js';
import { BestwayClient, parseLatestStatus } from '../src/bestway/bestway-client.js';
import {
	DeviceNotRecognizedError,
	DeviceOfflineError,
	MalformedResponseError,
	UnsupportedCommandError,
} from '../src/bestway/errors.js';
import { BubblesLevel, DeviceType } from '../src/bestway/model.js';
import { FakeGizwits, binding, createApiClient, createTestLogger, type FakeResponse } from './helpers/fake-gizwits.js';

const LOCAL_NOW = 2000;

function setup(devices: Record<string, unknown>[], statuses: Record<string, FakeResponse[]> = {}) {
	const server = new FakeGizwits()
		.on('GET', '/app/bindings', { body: { devices } })
		.on('POST', '/app/control/spa-1', { body: {} });
	for (const [deviceId, responses] of Object.entries(statuses)) {
		server.on('GET', `/app/devdata/${deviceId}/latest`, responses);
	}
	const api = createApiClient(server);
	api.setUserToken('test-token');
	const log = createTestLogger();
	const client = new BestwayClient(api, { logger: log, now: () => LOCAL_NOW });
	return { server, client, log };
}

const airjet = binding({ did: 'spa-1', productName: 'Airjet', alias: 'Garden spa' });

describe('BestwayClient', () => {
	it('reconciles optimistic writes against lagging server reads', async () => {
		const { server, client } = setup([airjet], {
			'spa-1': [
				{ body: { updated_at: 1000, attr: { power: 1, heat_power: 0, filter_power: 1 } } },
				{ body: { updated_at: 999, attr: { heat_power: 0 } } },
				{ body: { updated_at: 2001, attr: { power: 1, heat_power: 1, filter_power: 1, temp_now: 30 } } },
			],
		});

		await client.refreshBindings();
		expect(await client.fetchStatuses()).toEqual(new Map([['spa-1', 'updated']]));

		const first = client.getStatus('spa-1');
		expect(first && readFlag(DeviceType.Airjet, first, 'power')).toBe(true);
		expect(first && readFlag(DeviceType.Airjet, first, 'heat')).toBe(false);

		await expect(client.setHeat('spa-1', true)).resolves.toEqual({
			timestamp: LOCAL_NOW,
			attrs: { power: 1, heat_power: 1, filter_power: 1 },
		});
		expect(server.requestsTo('POST', '/app/control/spa-1').map((req) => req.body)).toEqual([
			{ attrs: { heat_power: 1 } },
		]);

		const device = client.getDevice('spa-1');
		if (!device) {
			throw new Error('device missing');
		}

		await expect(client.fetchStatus(device)).resolves.toBe('stale');
		expect(client.getStatus('spa-1')?.attrs).toEqual({ power: 1, heat_power: 1, filter_power: 1 });

		await expect(client.fetchStatus(device)).resolves.toBe('updated');
		expect(client.getStatus('spa-1')).toEqual({
			timestamp: 2001,
			attrs: { power: 1, heat_power: 1, filter_power: 1, temp_now: 30 },
		});
	});

	it('refuses commands before the first status and sends nothing', async () => {
		const { server, client } = setup([airjet]);
		await client.refreshBindings();

		await expect(client.setPower('spa-1', true)).rejects.toBeInstanceOf(DeviceNotRecognizedError);
		expect(server.requestsTo('POST', '/app/control/spa-1')).toHaveLength(0);
	});

	it('refuses commands for devices no longer bound', async () => {
		const { server, client } = setup([airjet], {
			'spa-1': [{ body: { updated_at: 1000, attr: { power: 1 } } }],
		});
		await client.refreshBindings();
		await client.fetchStatuses();

		server.on('GET', '/app/bindings', { body: { devices: [] } });
		await client.refreshBindings();

		await expect(client.setPower('spa-1', false)).rejects.toBeInstanceOf(DeviceNotRecognizedError);
		expect(server.requestsTo('POST', '/app/control/spa-1')).toHaveLength(0);
	});

	it('turns filter, heat and bubbles off with the power', async () => {
		const { server, client } = setup([airjet], {
			'spa-1': [
				{ body: { updated_at: 1000, attr: { power: 1, filter_power: 1, heat_power: 1, wave_power: 1, temp_now: 37 } } },
			],
		});
		await client.refreshBindings();
		await client.fetchStatuses();

		const next = await client.setPower('spa-1', false);

		expect(server.requestsTo('POST', '/app/control/spa-1').map((req) => req.body)).toEqual([
			{ attrs: { power: 0 } },
		]);
		expect(next).toBe(client.getStatus('spa-1'));
		expect(next.timestamp).toBeGreaterThanOrEqual(LOCAL_NOW);
		expect(next.attrs).toEqual({ power: 0, filter_power: 0, heat_power: 0, wave_power: 0, temp_now: 37 });
		expect(readFlag(DeviceType.Airjet, next, 'filter')).toBe(false);
		expect(readFlag(DeviceType.Airjet, next, 'heat')).toBe(false);
		expect(readFlag(DeviceType.Airjet, next, 'bubbles')).toBe(false);
	});

	it('drops cached statuses of devices no longer bound', async () => {
		const second = binding({ did: 'spa-2', productName: 'Hydrojet' });
		const { server, client } = setup([airjet, second], {
			'spa-1': [{ body: { updated_at: 1000, attr: { power: 1 } } }],
			'spa-2': [{ body: { updated_at: 1000, attr: { power: 0 } } }],
		});
		await client.refreshBindings();
		await client.fetchStatuses();
		expect([...client.getStatuses().keys()]).toEqual(['spa-1', 'spa-2']);

		server.on('GET', '/app/bindings', { body: { devices: [second] } });
		await client.refreshBindings();

		expect([...client.getStatuses().keys()]).toEqual(['spa-2']);
		expect(client.getStatus('spa-1')).toBeUndefined();
	});

	it('keeps cached statuses when the device list cannot be fetched', async () => {
		const { server, client } = setup([airjet], {
			'spa-1': [{ body: { updated_at: 1000, attr: { power: 1 } } }],
		});
		await client.refreshBindings();
		await client.fetchStatuses();

		server.on('GET', '/app/bindings', { status: 503, text: '' });
		await expect(client.refreshBindings()).rejects.toThrow();

		expect(client.getStatus('spa-1')).toEqual({ timestamp: 1000, attrs: { power: 1 } });
	});

	it('leaves the cache alone when the POST fails', async () => {
		const { server, client } = setup([airjet], {
			'spa-1': [{ body: { updated_at: 1000, attr: { power: 1, heat_power: 0 } } }],
		});
		server.on('POST', '/app/control/spa-1', { status: 400, body: { error_code: 9042 } });
		await client.refreshBindings();
		await client.fetchStatuses();

		await expect(client.setHeat('spa-1', true)).rejects.toBeInstanceOf(DeviceOfflineError);
		expect(client.getStatus('spa-1')).toEqual({ timestamp: 1000, attrs: { power: 1, heat_power: 0 } });
	});

	it('rejects commands the device type does not support before sending', async () => {
		const { server, client } = setup([airjet], {
			'spa-1': [{ body: { updated_at: 1000, attr: { power: 1 } } }],
		});
		await client.refreshBindings();
		await client.fetchStatuses();

		await expect(client.setBubblesLevel('spa-1', BubblesLevel.Max)).rejects.toBeInstanceOf(UnsupportedCommandError);
		await expect(client.setJets('spa-1', true)).rejects.toBeInstanceOf(UnsupportedCommandError);
		expect(server.requestsTo('POST', '/app/control/spa-1')).toHaveLength(0);
	});

	it('applies side effects for multi-level bubbles', async () => {
		const v01 = binding({ did: 'spa-1', productName: 'Airjet_V01' });
		const { server, client } = setup([v01], {
			'spa-1': [{ body: { updated_at: 1000, attr: { power: 0, wave: 0, Tnow: 30 } } }],
		});
		await client.refreshBindings();
		await client.fetchStatuses();

		const next = await client.setBubblesLevel('spa-1', BubblesLevel.Medium);

		expect(server.requestsTo('POST', '/app/control/spa-1')[0].body).toEqual({ attrs: { wave: 50 } });
		expect(next.attrs).toEqual({ power: 1, wave: 50, Tnow: 30 });
	});

	it('notifies listeners on updates and commands only', async () => {
		const { client } = setup([airjet], {
			'spa-1': [
				{ body: { updated_at: 1000, attr: { power: 1 } } },
				{ body: { updated_at: 0, attr: {} } },
			],
		});
		const listener = vi.fn();
		client.onStatusUpdate(listener);
		await client.refreshBindings();

		await client.fetchStatuses();
		await client.fetchStatuses();
		await client.setLocked('spa-1', true);

		expect(listener.mock.calls).toEqual([
			['spa-1', { timestamp: 1000, attrs: { power: 1 } }],
			['spa-1', { timestamp: LOCAL_NOW, attrs: { power: 1, locked: 1 } }],
		]);
	});

	it('keeps polling after a listener throws', async () => {
		const { client, log } = setup([airjet], {
			'spa-1': [{ body: { updated_at: 1000, attr: { power: 1 } } }],
		});
		client.onStatusUpdate(() => {
			throw new Error('boom');
		});
		await client.refreshBindings();

		await expect(client.fetchStatuses()).resolves.toEqual(new Map([['spa-1', 'updated']]));
		expect(log.error).toHaveBeenCalledWith('Bestway: status listener failed for %s: %s', 'spa-1', 'Error: boom');
	});

	it('reports no-data without touching the cache', async () => {
		const { client } = setup([airjet], {
			'spa-1': [{ body: { updated_at: 0, attr: {} } }],
		});
		await client.refreshBindings();

		await expect(client.fetchStatuses()).resolves.toEqual(new Map([['spa-1', 'no-data']]));
		expect(client.getStatus('spa-1')).toBeUndefined();
		expect(client.getStatuses().size).toBe(0);
	});

	it('logs the full status of unknown device types at warn level', async () => {
		const mystery = binding({ did: 'spa-1', productName: 'Mystery' });
		const { client, log } = setup([mystery], {
			'spa-1': [{ body: { updated_at: 1000, attr: { foo: 1 } } }],
		});
		await client.refreshBindings();
		await client.fetchStatuses();

		expect(log.warn).toHaveBeenCalledWith(
			'Bestway: status for unknown device type "%s" returned: %s',
			'Mystery',
			'{"foo":1}',
		);
		expect(client.getStatus('spa-1')?.attrs).toEqual({ foo: 1 });
	});

	it('aborts the cycle on the first failing device', async () => {
		const second = binding({ did: 'spa-2', productName: 'Hydrojet' });
		const { client } = setup([airjet, second], {
			'spa-1': [{ body: { updated_at: 1000, attr: { power: 1 } } }],
			'spa-2': [{ status: 500, text: 'oops' }],
		});
		await client.refreshBindings();

		await expect(client.fetchStatuses()).rejects.toThrow('Bestway API returned HTTP 500');
		expect(client.getStatus('spa-1')?.timestamp).toBe(1000);
	});
});

describe('parseLatestStatus', () => {
	it('keeps scalar attributes and drops nested values', () => {
		expect(
			parseLatestStatus({ did: 'x', updated_at: 1000, attr: { power: 1, name: 'spa', on: true, n: null, nested: { a: 1 }, list: [1] } }),
		).toEqual({ timestamp: 1000, attrs: { power: 1, name: 'spa', on: true, n: null } });
	});

	it('returns an empty bag for a zero timestamp', () => {
		expect(parseLatestStatus({ updated_at: 0 })).toEqual({ timestamp: 0, attrs: {} });
	});

	it('rejects missing or invalid timestamps', () => {
		expect(() => parseLatestStatus({ attr: {} })).toThrow(MalformedResponseError);
		expect(() => parseLatestStatus({ updated_at: -1, attr: {} })).toThrow(MalformedResponseError);
		expect(() => parseLatestStatus({ updated_at: '1000', attr: {} })).toThrow(MalformedResponseError);
		expect(() => parseLatestStatus(null)).toThrow(MalformedResponseError);
	});

	it('rejects a positive timestamp without attributes', () => {
		expect(() => parseLatestStatus({ updated_at: 1000 })).toThrow(MalformedResponseError);
	});
});
