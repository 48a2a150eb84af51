import { describe, expect, it } from 'vitest';

import { DeviceRegistry, parseBindings, sanitizeBindings } from '../src/bestway/device-registry.js';
import { MalformedResponseError } from '../src/bestway/errors.js';
import { DeviceType } from '../src/bestway/model.js';
import { FakeGizwits, binding, createApiClient, createTestLogger } from './helpers/fake-gizwits.js';

describe('parseBindings', () => {
	it('maps bindings to devices', () => {
		const [device] = parseBindings({ devices: [binding({ did: 'did-1', productName: 'Airjet', alias: 'Garden spa' })] });

		expect(device).toEqual({
			deviceId: 'did-1',
			protocolVersion: 3,
			productName: 'Airjet',
			deviceType: DeviceType.Airjet,
			alias: 'Garden spa',
			mcuSoftVersion: 'mcu-1.0',
			mcuHardVersion: 'hw-1.0',
			wifiSoftVersion: 'wifi-2.0',
			wifiHardVersion: 'wifi-hw',
			isOnline: true,
		});
	});

	it('fills absent optional fields with defaults', () => {
		const [device] = parseBindings({ devices: [{ did: 'did-2' }] });

		expect(device).toMatchObject({
			deviceId: 'did-2',
			protocolVersion: 0,
			productName: '',
			deviceType: DeviceType.Unknown,
			alias: '',
			isOnline: false,
		});
	});

	it('rejects a response without a devices array', () => {
		expect(() => parseBindings({})).toThrow(MalformedResponseError);
		expect(() => parseBindings([])).toThrow(MalformedResponseError);
	});

	it('rejects an entry without a device id', () => {
		expect(() => parseBindings({ devices: [{ product_name: 'Airjet' }] })).toThrow(
			'Bestway bindings entry #0 has no device id',
		);
	});
});

describe('sanitizeBindings', () => {
	it('masks identifying fields and keeps the rest', () => {
		const sanitized = sanitizeBindings({ devices: [binding({ did: 'abc123', productName: 'Hydrojet' })] });

		expect(sanitized).toEqual({
			devices: [
				expect.objectContaining({
					did: '******',
					passcode: '********',
					product_key: '***********',
					mac: '************',
					product_name: 'Hydrojet',
				}),
			],
		});
	});

	it('returns unexpected shapes unchanged', () => {
		expect(sanitizeBindings('nope')).toBe('nope');
	});
});

describe('DeviceRegistry', () => {
	it('replaces the whole mapping on refresh', async () => {
		const server = new FakeGizwits().on('GET', '/app/bindings', [
			{ body: { devices: [binding({ did: 'a', productName: 'Airjet' }), binding({ did: 'b', productName: 'Hydrojet' })] } },
			{ body: { devices: [binding({ did: 'b', productName: 'Hydrojet' })] } },
		]);
		const api = createApiClient(server);
		api.setUserToken('test-token');
		const log = createTestLogger();
		const registry = new DeviceRegistry(api, log);

		await registry.refresh();
		expect(registry.size).toBe(2);
		expect(log.info).toHaveBeenCalledWith('Bestway: %d device(s) bound to account', 2);

		await registry.refresh();
		expect(registry.list().map((device) => device.deviceId)).toEqual(['b']);
		expect(registry.get('a')).toBeUndefined();
	});

	it('keeps the previous mapping when a refresh fails', async () => {
		const server = new FakeGizwits().on('GET', '/app/bindings', [
			{ body: { devices: [binding({ did: 'a', productName: 'Airjet' })] } },
			{ body: { devices: [{ product_name: 'Airjet' }] } },
		]);
		const api = createApiClient(server);
		api.setUserToken('test-token');
		const registry = new DeviceRegistry(api, createTestLogger());

		await registry.refresh();
		await expect(registry.refresh()).rejects.toBeInstanceOf(MalformedResponseError);

		expect(registry.get('a')?.deviceType).toBe(DeviceType.Airjet);
	});

	it('warns about unrecognised product names', async () => {
		const server = new FakeGizwits().on('GET', '/app/bindings', {
			body: { devices: [binding({ did: 'x', productName: 'Mystery', alias: 'Shed' })] },
		});
		const api = createApiClient(server);
		api.setUserToken('test-token');
		const log = createTestLogger();
		const registry = new DeviceRegistry(api, log);

		await registry.refresh();

		expect(registry.get('x')?.deviceType).toBe(DeviceType.Unknown);
		expect(log.warn).toHaveBeenCalledWith(
			'Bestway: device %s has unrecognised product name "%s"; it will be listed without controls.',
			'Shed',
			'Mystery',
		);
	});

	it('never logs raw device identifiers', async () => {
		const server = new FakeGizwits().on('GET', '/app/bindings', {
			body: { devices: [binding({ did: 'secret-did', productName: 'Airjet' })] },
		});
		const api = createApiClient(server);
		api.setUserToken('test-token');
		const log = createTestLogger();

		await new DeviceRegistry(api, log).refresh();

		const dumpCall = log.debug.mock.calls.find((call) => call[0] === 'Bestway: device list refreshed: %s');
		expect(dumpCall?.[1]).toContain('"did":"**********"');
		expect(dumpCall?.[1]).not.toContain('secret-did');
	});
});
