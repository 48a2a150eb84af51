// src/platform.ts
import type {
	API,
	DynamicPlatformPlugin,
	Logger,
	PlatformAccessory,
	PlatformConfig,
} from 'homebridge';

import { PLATFORM_NAME, PLUGIN_NAME, parsePlatformConfig } from './settings.js';
import { ApiClient, type BestwayLogger } from './bestway/api-client.js';
import { BestwayClient } from './bestway/bestway-client.js';
import { BestwayPoller, type PollResult } from './bestway/poller.js';
import { BestwaySession } from './bestway/session.js';
import { TokenStore } from './bestway/token-store.js';
import { readActiveErrors } from './bestway/attributes.js';
import {
	deviceDisplayName,
	deviceHealth,
	type BestwayAccessoryContext,
	type BestwayAccessoryEnv,
} from './bestway/accessory-helpers.js';
import {
	configureBestwayAccessory,
	updateBestwayAccessory,
	updateBestwayHealth,
} from './bestway/spa-accessory.js';
import { epochSeconds, type Device, type DeviceStatus } from './bestway/model.js';

type BestwayAccessory = PlatformAccessory<BestwayAccessoryContext>;

const toBestwayLogger = (log: Logger): BestwayLogger => ({
	debug: log.debug.bind(log),
	info: log.info.bind(log),
	warn: log.warn.bind(log),
	error: log.error.bind(log),
});

interface PlatformRuntime {
	client: BestwayClient;
	poller: BestwayPoller;
	env: BestwayAccessoryEnv;
}

export class BestwayPlatform implements DynamicPlatformPlugin {
	public readonly accessories: BestwayAccessory[] = [];
	public configureAccessory(accessory: BestwayAccessory): void {
		this.log.info('Restoring cached accessory', accessory.displayName);
		this.accessories.push(accessory);
	}
	private readonly log: Logger;
	private readonly api: API;
	private readonly runtime: PlatformRuntime | null = null;

	// deviceId -> device type the accessory was last configured for
	private readonly configured = new Map<string, string>();
	// deviceId -> active error codes, joined
	private readonly lastErrors = new Map<string, string>();

	constructor(log: Logger, config: PlatformConfig, api: API) {
		this.log = log;
		this.api = api;

		const parsed = parsePlatformConfig(config);
		if (!parsed.ok) {
			for (const problem of parsed.problems) {
				this.log.error('Bestway: %s in config.json; plugin disabled.', problem);
			}
			return;
		}
		for (const warning of parsed.warnings) {
			this.log.warn('Bestway: %s', warning);
		}
		const settings = parsed.config;

		const bestwayLogger = toBestwayLogger(this.log);
		const apiClient = new ApiClient({ apiRoot: settings.apiRoot, logger: bestwayLogger });
		const session = new BestwaySession(
			apiClient,
			new TokenStore(this.api.user.storagePath(), bestwayLogger),
			{ username: settings.username, password: settings.password },
			bestwayLogger,
		);
		const client = new BestwayClient(apiClient, { logger: bestwayLogger });
		const poller = new BestwayPoller(client, session, bestwayLogger, {
			statusIntervalMs: settings.statusIntervalSeconds * 1000,
			bindingsIntervalMs: settings.bindingsIntervalMinutes * 60_000,
		});

		this.runtime = {
			client,
			poller,
			env: { log: this.log, api: this.api, client },
		};

		client.onStatusUpdate((deviceId, status) => {
			this.handleStatusUpdate(deviceId, status);
		});
		poller.onPoll((result) => {
			this.handlePoll(result);
		});

		this.log.info(settings.name, 'initialized');

		this.api.on('didFinishLaunching', () => {
			this.log.info(PLATFORM_NAME, 'didFinishLaunching');
			poller.start();
		});
		this.api.on('shutdown', () => {
			poller.stop();
		});
	}

	private uuidFor(deviceId: string): string {
		return this.api.hap.uuid.generate(`bestway-${deviceId}`);
	}

	private findAccessory(deviceId: string): BestwayAccessory | undefined {
		const uuid = this.uuidFor(deviceId);
		return this.accessories.find((acc) => acc.UUID === uuid);
	}

	private handlePoll(result: PollResult): void {
		const runtime = this.runtime;
		if (!runtime) {
			return;
		}
		if (result.bindingsRefreshed) {
			this.syncAccessories(runtime);
		}

		const nowSeconds = epochSeconds();
		for (const device of runtime.client.listDevices()) {
			const accessory = this.findAccessory(device.deviceId);
			if (accessory && this.configured.has(device.deviceId)) {
				const status = runtime.client.getStatus(device.deviceId);
				updateBestwayHealth(runtime.env, accessory, deviceHealth(device.deviceType, status, nowSeconds));
			}
		}
	}

	/**
	 * Register accessories for newly bound devices and drop the ones the
	 * account no longer has.
	 */
	private syncAccessories(runtime: PlatformRuntime): void {
		const devices = runtime.client.listDevices();
		const keep = new Set<string>();

		for (const device of devices) {
			const uuid = this.uuidFor(device.deviceId);
			keep.add(uuid);

			let accessory = this.accessories.find((acc) => acc.UUID === uuid);
			const deviceName = deviceDisplayName(device);

			if (accessory) {
				if (this.configured.get(device.deviceId) === device.deviceType) {
					continue;
				}
				this.log.info('Bestway: using cached accessory for %s (deviceId=%s)', deviceName, device.deviceId);
			} else {
				this.log.info('Bestway: registering new accessory for %s (deviceId=%s)', deviceName, device.deviceId);
				accessory = new this.api.platformAccessory<BestwayAccessoryContext>(deviceName, uuid);
				this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
				this.accessories.push(accessory);
			}

			this.configure(runtime, accessory, device);
		}

		const stale = this.accessories.filter((acc) => !keep.has(acc.UUID));
		if (stale.length > 0) {
			for (const accessory of stale) {
				this.log.info('Bestway: removing accessory %s; device is no longer bound', accessory.displayName);
				const deviceId = accessory.context.bestway?.deviceId;
				if (deviceId) {
					this.configured.delete(deviceId);
					this.lastErrors.delete(deviceId);
				}
			}
			this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, stale);
			for (const accessory of stale) {
				this.accessories.splice(this.accessories.indexOf(accessory), 1);
			}
		}
	}

	private configure(runtime: PlatformRuntime, accessory: BestwayAccessory, device: Device): void {
		this.log.info(
			'Bestway: configuring %s as %s (deviceId=%s)',
			accessory.displayName,
			device.deviceType,
			device.deviceId,
		);
		configureBestwayAccessory(runtime.env, accessory, device);
		this.configured.set(device.deviceId, device.deviceType);

		const status = runtime.client.getStatus(device.deviceId);
		if (status) {
			updateBestwayAccessory(runtime.env, accessory, device, status);
		}
	}

	private handleStatusUpdate(deviceId: string, status: DeviceStatus): void {
		const runtime = this.runtime;
		const device = runtime?.client.getDevice(deviceId);
		if (!runtime || !device) {
			return;
		}

		this.logErrorChanges(device, status);

		const accessory = this.findAccessory(deviceId);
		if (!accessory || !this.configured.has(deviceId)) {
			this.log.debug('Bestway: status update for deviceId=%s; no accessory yet', deviceId);
			return;
		}
		updateBestwayAccessory(runtime.env, accessory, device, status);
	}

	private logErrorChanges(device: Device, status: DeviceStatus): void {
		const codes = readActiveErrors(device.deviceType, status).join(', ');
		const previous = this.lastErrors.get(device.deviceId) ?? '';
		if (codes === previous) {
			return;
		}
		this.lastErrors.set(device.deviceId, codes);

		if (codes) {
			this.log.warn('Bestway: %s reports error(s) %s', deviceDisplayName(device), codes);
		} else {
			this.log.info('Bestway: %s errors cleared', deviceDisplayName(device));
		}
	}
}
