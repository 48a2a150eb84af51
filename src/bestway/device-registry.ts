// src/bestway/device-registry.ts

import { isRecord, type ApiClient, type BestwayLogger } from './api-client.js';
import { deviceTypeFromProductName } from './device-catalog.js';
import { MalformedResponseError } from './errors.js';
import { DeviceType, type Device } from './model.js';

const SENSITIVE_BINDING_FIELDS = ['did', 'passcode', 'product_key', 'mac'] as const;

/**
 * Devices bound to the account. Each refresh replaces the whole mapping.
 */
export class DeviceRegistry {
	private devices: ReadonlyMap<string, Device> = new Map();

	public constructor(
		private readonly api: ApiClient,
		private readonly log: BestwayLogger,
	) {}

	public get size(): number {
		return this.devices.size;
	}

	public get(deviceId: string): Device | undefined {
		return this.devices.get(deviceId);
	}

	public list(): Device[] {
		return [...this.devices.values()];
	}

	public snapshot(): ReadonlyMap<string, Device> {
		return this.devices;
	}

	/**
	 * Fetch the bindings list and swap it in. On failure the previous mapping is kept.
	 */
	public async refresh(): Promise<ReadonlyMap<string, Device>> {
		const json = await this.api.get('/app/bindings');

		this.log.debug('Bestway: device list refreshed: %s', JSON.stringify(sanitizeBindings(json)));

		const next = new Map<string, Device>();
		for (const device of parseBindings(json)) {
			next.set(device.deviceId, device);

			if (device.deviceType === DeviceType.Unknown) {
				this.log.warn(
					'Bestway: device %s has unrecognised product name "%s"; it will be listed without controls.',
					device.alias || device.deviceId,
					device.productName,
				);
			}
		}

		this.devices = next;
		this.log.info('Bestway: %d device(s) bound to account', next.size);
		return next;
	}
}

export function parseBindings(json: unknown): Device[] {
	if (!isRecord(json) || !Array.isArray(json.devices)) {
		throw new MalformedResponseError('Bestway bindings response has no devices array');
	}

	return json.devices.map((raw: unknown, index: number): Device => {
		if (!isRecord(raw) || typeof raw.did !== 'string' || raw.did.length === 0) {
			throw new MalformedResponseError(`Bestway bindings entry #${index} has no device id`);
		}

		const productName = str(raw.product_name);

		return {
			deviceId: raw.did,
			protocolVersion: typeof raw.protoc === 'number' ? raw.protoc : Number(raw.protoc ?? 0) || 0,
			productName,
			deviceType: deviceTypeFromProductName(productName),
			alias: str(raw.dev_alias),
			mcuSoftVersion: str(raw.mcu_soft_version),
			mcuHardVersion: str(raw.mcu_hard_version),
			wifiSoftVersion: str(raw.wifi_soft_version),
			wifiHardVersion: str(raw.wifi_hard_version),
			isOnline: raw.is_online === true,
		};
	});
}

function str(value: unknown): string {
	return typeof value === 'string' ? value : '';
}

/**
 * Copy of a bindings response with identifying fields masked, for logging.
 * People paste debug logs into public forums.
 */
export function sanitizeBindings(json: unknown): unknown {
	if (!isRecord(json) || !Array.isArray(json.devices)) {
		return json;
	}

	return {
		...json,
		devices: json.devices.map((raw: unknown) => {
			if (!isRecord(raw)) {
				return raw;
			}
			const copy: Record<string, unknown> = { ...raw };
			for (const field of SENSITIVE_BINDING_FIELDS) {
				const value = copy[field];
				if (typeof value === 'string') {
					copy[field] = '*'.repeat(value.length);
				}
			}
			return copy;
		}),
	};
}
