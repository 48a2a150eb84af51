// src/bestway/bestway-client.ts
import {
	createConsoleLogger,
	isRecord,
	type ApiClient,
	type BestwayLogger,
} from './api-client.js';
import {
	buildCommand,
	describeCommand,
	type CommandRequest,
} from './commands.js';
import { DeviceRegistry } from './device-registry.js';
import {
	DeviceNotRecognizedError,
	MalformedResponseError,
} from './errors.js';
import {
	DeviceType,
	epochSeconds,
	type AttributeValue,
	type BubblesLevel,
	type Device,
	type DeviceStatus,
} from './model.js';
import { StateCache, type ReconcileOutcome } from './state-cache.js';

export type StatusListener = (deviceId: string, status: DeviceStatus) => void;

export interface BestwayClientOptions {
	logger?: BestwayLogger;
	/** Epoch seconds; injectable for tests. */
	now?: () => number;
}

export interface LatestStatus {
	timestamp: number;
	attrs: Record<string, AttributeValue>;
}

/**
 * Reconciling client for one account: owns the device registry and the
 * status cache, and is the only writer to either.
 */
export class BestwayClient {
	public readonly registry: DeviceRegistry;
	private readonly cache = new StateCache();
	private readonly log: BestwayLogger;
	private readonly now: () => number;
	private readonly statusListeners: StatusListener[] = [];

	public constructor(
		private readonly api: ApiClient,
		options: BestwayClientOptions = {},
	) {
		this.log = options.logger ?? createConsoleLogger('[bestway-client]');
		this.now = options.now ?? epochSeconds;
		this.registry = new DeviceRegistry(api, this.log);
	}

	// ----- Read side -----

	public getDevice(deviceId: string): Device | undefined {
		return this.registry.get(deviceId);
	}

	public listDevices(): Device[] {
		return this.registry.list();
	}

	public getStatus(deviceId: string): DeviceStatus | undefined {
		return this.cache.get(deviceId);
	}

	public getStatuses(): ReadonlyMap<string, DeviceStatus> {
		return this.cache.snapshot();
	}

	/** Called whenever a cache entry is replaced, by a poll or by a command. */
	public onStatusUpdate(listener: StatusListener): void {
		this.statusListeners.push(listener);
	}

	// ----- Polling -----

	/** Refresh the device list and forget the status of devices no longer bound. */
	public async refreshBindings(): Promise<Device[]> {
		await this.registry.refresh();
		const devices = this.registry.list();
		for (const deviceId of this.cache.retain(devices.map((device) => device.deviceId))) {
			this.log.debug('Bestway: dropping cached status for unbound device %s', deviceId);
		}
		return devices;
	}

	/**
	 * Fetch and reconcile the latest status of every bound device, one at a
	 * time to stay gentle on the rate-limited API. The first failure aborts the cycle.
	 */
	public async fetchStatuses(): Promise<Map<string, ReconcileOutcome>> {
		const outcomes = new Map<string, ReconcileOutcome>();
		for (const device of this.registry.list()) {
			outcomes.set(device.deviceId, await this.fetchStatus(device));
		}
		return outcomes;
	}

	public async fetchStatus(device: Device): Promise<ReconcileOutcome> {
		const json = await this.api.get(`/app/devdata/${encodeURIComponent(device.deviceId)}/latest`);
		const latest = parseLatestStatus(json);

		const outcome = this.cache.reconcile(device.deviceId, latest.timestamp, latest.attrs);

		switch (outcome) {
		case 'no-data':
			// Seen after a device was offline for months; attrs were empty.
			this.log.debug('Bestway: no data available for device %s', device.deviceId);
			break;
		case 'stale':
			this.log.debug(
				'Bestway: ignoring update for device %s as local data is newer (server=%d local=%d)',
				device.deviceId,
				latest.timestamp,
				this.cache.get(device.deviceId)?.timestamp ?? 0,
			);
			break;
		case 'updated': {
			const dump = JSON.stringify(latest.attrs);
			if (device.deviceType === DeviceType.Unknown) {
				this.log.warn('Bestway: status for unknown device type "%s" returned: %s', device.productName, dump);
			} else {
				this.log.debug('Bestway: status for device type "%s" returned: %s', device.productName, dump);
			}
			this.emitStatus(device.deviceId);
			break;
		}
		}

		return outcome;
	}

	// ----- Commands -----

	/**
	 * Send one logical command and, once the POST has succeeded, apply the
	 * optimistic update (including side effects) to the cache.
	 */
	public async execute(deviceId: string, request: CommandRequest): Promise<DeviceStatus> {
		if (!this.cache.has(deviceId)) {
			throw new DeviceNotRecognizedError(deviceId);
		}
		const device = this.registry.get(deviceId);
		if (!device) {
			throw new DeviceNotRecognizedError(deviceId);
		}

		const { payload, patch } = buildCommand(device.deviceType, request);

		this.log.debug('Bestway: setting %s on %s', describeCommand(request), deviceId);
		await this.api.post(`/app/control/${encodeURIComponent(deviceId)}`, { attrs: payload });

		// Read the entry again: a poll may have replaced it while the POST was in flight.
		const next = this.cache.applyOptimistic(deviceId, patch, this.now());
		if (!next) {
			throw new DeviceNotRecognizedError(deviceId);
		}

		this.emitStatus(deviceId);
		return next;
	}

	public setPower(deviceId: string, on: boolean): Promise<DeviceStatus> {
		return this.execute(deviceId, { command: 'power', value: on });
	}

	public setFilter(deviceId: string, on: boolean): Promise<DeviceStatus> {
		return this.execute(deviceId, { command: 'filter', value: on });
	}

	/** Turning the heater on also turns on the filter pump. */
	public setHeat(deviceId: string, on: boolean): Promise<DeviceStatus> {
		return this.execute(deviceId, { command: 'heat', value: on });
	}

	public setTargetTemperature(deviceId: string, temperature: number): Promise<DeviceStatus> {
		return this.execute(deviceId, { command: 'targetTemperature', value: temperature });
	}

	/** Lock or unlock the physical control panel. */
	public setLocked(deviceId: string, locked: boolean): Promise<DeviceStatus> {
		return this.execute(deviceId, { command: 'locked', value: locked });
	}

	public setBubbles(deviceId: string, on: boolean): Promise<DeviceStatus> {
		return this.execute(deviceId, { command: 'bubbles', value: on });
	}

	public setBubblesLevel(deviceId: string, level: BubblesLevel): Promise<DeviceStatus> {
		return this.execute(deviceId, { command: 'bubblesLevel', value: level });
	}

	public setJets(deviceId: string, on: boolean): Promise<DeviceStatus> {
		return this.execute(deviceId, { command: 'jets', value: on });
	}

	public setFilterTimerHours(deviceId: string, hours: number): Promise<DeviceStatus> {
		return this.execute(deviceId, { command: 'filterTimerHours', value: hours });
	}

	private emitStatus(deviceId: string): void {
		const status = this.cache.get(deviceId);
		if (!status) {
			return;
		}
		for (const listener of this.statusListeners) {
			try {
				listener(deviceId, status);
			} catch (err) {
				this.log.error('Bestway: status listener failed for %s: %s', deviceId, String(err));
			}
		}
	}
}

/**
 * Decode `/app/devdata/{id}/latest`. Values that are not scalars are dropped
 * from the attribute bag.
 */
export function parseLatestStatus(json: unknown): LatestStatus {
	if (!isRecord(json)) {
		throw new MalformedResponseError('Bestway status response is not an object');
	}

	const timestamp = json.updated_at;
	if (typeof timestamp !== 'number' || !Number.isInteger(timestamp) || timestamp < 0) {
		throw new MalformedResponseError('Bestway status response has no valid updated_at');
	}

	const attrs: Record<string, AttributeValue> = {};
	if (timestamp === 0) {
		return { timestamp, attrs };
	}

	if (!isRecord(json.attr)) {
		throw new MalformedResponseError('Bestway status response has no attr object');
	}

	for (const [key, value] of Object.entries(json.attr)) {
		if (
			value === null ||
			typeof value === 'number' ||
			typeof value === 'boolean' ||
			typeof value === 'string'
		) {
			attrs[key] = value;
		}
	}

	return { timestamp, attrs };
}
