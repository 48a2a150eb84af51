// src/bestway/spa-accessory.ts
import type {
	CharacteristicValue,
	PlatformAccessory,
	Service,
} from 'homebridge';

import {
	SWITCH_LABELS,
	applyAccessoryInformation,
	bubblesLevelToRotationSpeed,
	deviceDisplayName,
	deviceHealth,
	fromHomeKitTemperature,
	planServices,
	rotationSpeedToBubblesLevel,
	targetTemperatureBounds,
	thermostatView,
	type BestwayAccessoryContext,
	type BestwayAccessoryEnv,
	type DeviceHealth,
	type ThermostatView,
} from './accessory-helpers.js';
import {
	readBubblesLevel,
	readFilterChangeRequired,
	readFlag,
	readTemperatureUnit,
} from './attributes.js';
import {
	BubblesLevel,
	epochSeconds,
	isStatusOnline,
	type Device,
	type DeviceStatus,
} from './model.js';

const THERMOSTAT_SUBTYPE = 'heater';
const BUBBLES_FAN_SUBTYPE = 'bubbles-level';
const FILTER_MAINTENANCE_SUBTYPE = 'filter-maintenance';
const STATUS_SUBTYPE = 'status';

function asBoolean(value: CharacteristicValue): boolean {
	return value === true || value === 1;
}

function asNumber(value: CharacteristicValue): number {
	return typeof value === 'number' ? value : Number(value);
}

/**
 * Build (or rebuild, for a cached accessory) the services for one device and
 * wire their handlers to the client.
 */
export function configureBestwayAccessory(
	env: BestwayAccessoryEnv,
	accessory: PlatformAccessory<BestwayAccessoryContext>,
	device: Device,
): void {
	const { Service, Characteristic } = env.api.hap;
	const deviceName = deviceDisplayName(device);
	const deviceId = device.deviceId;
	const plan = planServices(device.deviceType);

	accessory.context.bestway = {
		deviceId,
		deviceType: device.deviceType,
		productName: device.productName,
	};

	applyAccessoryInformation(env.api, accessory, device);

	// Drop services left over from a previous device type
	const wanted = new Set<string>([
		...plan.switches.map((capability) => `${Service.Switch.UUID}/${capability}`),
		...(plan.thermostat ? [`${Service.Thermostat.UUID}/${THERMOSTAT_SUBTYPE}`] : []),
		...(plan.bubblesFan ? [`${Service.Fan.UUID}/${BUBBLES_FAN_SUBTYPE}`] : []),
		...(plan.filterMaintenance ? [`${Service.FilterMaintenance.UUID}/${FILTER_MAINTENANCE_SUBTYPE}`] : []),
		...(plan.statusSensor ? [`${Service.ContactSensor.UUID}/${STATUS_SUBTYPE}`] : []),
	]);
	for (const service of [...accessory.services]) {
		if (service.UUID === Service.AccessoryInformation.UUID) {
			continue;
		}
		if (!wanted.has(`${service.UUID}/${service.subtype ?? ''}`)) {
			env.log.info(
				'Bestway: removing stale %s service from %s (deviceId=%s)',
				service.displayName,
				deviceName,
				deviceId,
			);
			accessory.removeService(service);
		}
	}

	const status = (): DeviceStatus | undefined => {
		const current = env.client.getStatus(deviceId);
		if (current && !isStatusOnline(current, epochSeconds())) {
			env.log.debug(
				'Bestway: %s has not reported for a while; returning cached state (deviceId=%s)',
				deviceName,
				deviceId,
			);
		}
		return current;
	};

	const send = async (label: string, action: () => Promise<unknown>): Promise<void> => {
		env.log.info('Bestway: %s for %s (deviceId=%s)', label, deviceName, deviceId);
		try {
			await action();
		} catch (err) {
			env.log.warn(
				'Bestway: %s failed for %s (deviceId=%s): %s',
				label,
				deviceName,
				deviceId,
				err instanceof Error ? err.message : String(err),
			);
			throw new env.api.hap.HapStatusError(env.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
		}
	};

	// ----- Switches -----
	for (const capability of plan.switches) {
		const service =
			accessory.getServiceById(Service.Switch, capability) ||
			accessory.addService(Service.Switch, `${deviceName} ${SWITCH_LABELS[capability]}`, capability);

		service
			.getCharacteristic(Characteristic.On)
			.onGet(() => {
				const current = status();
				return current ? readFlag(device.deviceType, current, capability) ?? false : false;
			})
			.onSet(async (value) => {
				const on = asBoolean(value);
				await send(`${capability}=${on ? 'ON' : 'OFF'}`, () =>
					env.client.execute(deviceId, { command: capability, value: on }),
				);
			});
	}

	// ----- Heater and target temperature -----
	if (plan.thermostat) {
		const service =
			accessory.getServiceById(Service.Thermostat, THERMOSTAT_SUBTYPE) ||
			accessory.addService(Service.Thermostat, `${deviceName} Heater`, THERMOSTAT_SUBTYPE);

		const bounds = targetTemperatureBounds(device.deviceType);
		const heatingStates = [
			Characteristic.TargetHeatingCoolingState.OFF,
			Characteristic.TargetHeatingCoolingState.HEAT,
		];

		service
			.getCharacteristic(Characteristic.CurrentHeatingCoolingState)
			.setProps({ validValues: heatingStates })
			.onGet(() => {
				const current = status();
				return current && thermostatView(device.deviceType, current).heating
					? Characteristic.CurrentHeatingCoolingState.HEAT
					: Characteristic.CurrentHeatingCoolingState.OFF;
			});

		service
			.getCharacteristic(Characteristic.TargetHeatingCoolingState)
			.setProps({ validValues: heatingStates })
			.onGet(() => {
				const current = status();
				return current && thermostatView(device.deviceType, current).heatOn
					? Characteristic.TargetHeatingCoolingState.HEAT
					: Characteristic.TargetHeatingCoolingState.OFF;
			})
			.onSet(async (value) => {
				const on = asNumber(value) === Characteristic.TargetHeatingCoolingState.HEAT;
				await send(`heat=${on ? 'ON' : 'OFF'}`, () => env.client.setHeat(deviceId, on));
			});

		service
			.getCharacteristic(Characteristic.CurrentTemperature)
			.onGet(() => {
				const current = status();
				return (current && thermostatView(device.deviceType, current).currentTemperature) ?? 0;
			});

		service
			.getCharacteristic(Characteristic.TargetTemperature)
			.setProps({ minValue: bounds.min, maxValue: bounds.max, minStep: 0.5 })
			.onGet(() => {
				const current = status();
				return (current && thermostatView(device.deviceType, current).targetTemperature) ?? bounds.min;
			})
			.onSet(async (value) => {
				const unit = readTemperatureUnit(device.deviceType, env.client.getStatus(deviceId));
				const target = fromHomeKitTemperature(asNumber(value), unit);
				await send(`targetTemperature=${target}`, () => env.client.setTargetTemperature(deviceId, target));
			});

		service
			.getCharacteristic(Characteristic.TemperatureDisplayUnits)
			.onGet(() =>
				readTemperatureUnit(device.deviceType, status()) === 'celsius'
					? Characteristic.TemperatureDisplayUnits.CELSIUS
					: Characteristic.TemperatureDisplayUnits.FAHRENHEIT,
			);
	}

	// ----- Multi-level bubbles -----
	if (plan.bubblesFan) {
		const service =
			accessory.getServiceById(Service.Fan, BUBBLES_FAN_SUBTYPE) ||
			accessory.addService(Service.Fan, `${deviceName} Bubbles`, BUBBLES_FAN_SUBTYPE);

		const currentLevel = (): BubblesLevel => {
			const current = status();
			if (!current) {
				return BubblesLevel.Off;
			}
			return readBubblesLevel(device.deviceType, current, (raw) => {
				env.log.debug('Bestway: unexpected bubbles value %d on %s; showing OFF', raw, deviceName);
			}) ?? BubblesLevel.Off;
		};

		service
			.getCharacteristic(Characteristic.On)
			.onGet(() => currentLevel() !== BubblesLevel.Off)
			.onSet(async (value) => {
				const on = asBoolean(value);
				// A slider move sends On=true as well; keep the level it picked.
				if (on && currentLevel() !== BubblesLevel.Off) {
					return;
				}
				const level = on ? BubblesLevel.Medium : BubblesLevel.Off;
				await send(`bubbles=${level}`, () => env.client.setBubblesLevel(deviceId, level));
			});

		service
			.getCharacteristic(Characteristic.RotationSpeed)
			.setProps({ minValue: 0, maxValue: 100, minStep: 50 })
			.onGet(() => bubblesLevelToRotationSpeed(currentLevel()))
			.onSet(async (value) => {
				const level = rotationSpeedToBubblesLevel(asNumber(value));
				await send(`bubbles=${level}`, () => env.client.setBubblesLevel(deviceId, level));
			});
	}

	// ----- Pool filter cartridge -----
	if (plan.filterMaintenance) {
		const service =
			accessory.getServiceById(Service.FilterMaintenance, FILTER_MAINTENANCE_SUBTYPE) ||
			accessory.addService(Service.FilterMaintenance, `${deviceName} Cartridge`, FILTER_MAINTENANCE_SUBTYPE);

		service
			.getCharacteristic(Characteristic.FilterChangeIndication)
			.onGet(() => {
				const current = status();
				return current && readFilterChangeRequired(device.deviceType, current)
					? Characteristic.FilterChangeIndication.CHANGE_FILTER
					: Characteristic.FilterChangeIndication.FILTER_OK;
			});
	}

	// ----- Connectivity and error codes -----
	// Contact open while the device reports an error code.
	if (plan.statusSensor) {
		const service =
			accessory.getServiceById(Service.ContactSensor, STATUS_SUBTYPE) ||
			accessory.addService(Service.ContactSensor, `${deviceName} Fault`, STATUS_SUBTYPE);

		const health = (): DeviceHealth => deviceHealth(device.deviceType, env.client.getStatus(deviceId), epochSeconds());

		service
			.getCharacteristic(Characteristic.ContactSensorState)
			.onGet(() => health().faults.length > 0
				? Characteristic.ContactSensorState.CONTACT_NOT_DETECTED
				: Characteristic.ContactSensorState.CONTACT_DETECTED);

		service
			.getCharacteristic(Characteristic.StatusFault)
			.onGet(() => health().faults.length > 0
				? Characteristic.StatusFault.GENERAL_FAULT
				: Characteristic.StatusFault.NO_FAULT);

		service
			.getCharacteristic(Characteristic.StatusActive)
			.onGet(() => health().online);
	}
}

/**
 * Push connectivity and fault state. Called on every status update and after
 * every poll, so a device that stopped reporting goes inactive.
 */
export function updateBestwayHealth(
	env: BestwayAccessoryEnv,
	accessory: PlatformAccessory<BestwayAccessoryContext>,
	health: DeviceHealth,
): void {
	const { Service, Characteristic } = env.api.hap;
	const service = accessory.getServiceById(Service.ContactSensor, STATUS_SUBTYPE);
	if (!service) {
		return;
	}

	const faulted = health.faults.length > 0;
	service.updateCharacteristic(
		Characteristic.ContactSensorState,
		faulted ? Characteristic.ContactSensorState.CONTACT_NOT_DETECTED : Characteristic.ContactSensorState.CONTACT_DETECTED,
	);
	service.updateCharacteristic(
		Characteristic.StatusFault,
		faulted ? Characteristic.StatusFault.GENERAL_FAULT : Characteristic.StatusFault.NO_FAULT,
	);
	service.updateCharacteristic(Characteristic.StatusActive, health.online);
}

/**
 * Push a fresh cache entry to HomeKit without waiting for a get.
 */
export function updateBestwayAccessory(
	env: BestwayAccessoryEnv,
	accessory: PlatformAccessory<BestwayAccessoryContext>,
	device: Device,
	status: DeviceStatus,
): void {
	const { Service, Characteristic } = env.api.hap;
	const plan = planServices(device.deviceType);

	for (const capability of plan.switches) {
		const on = readFlag(device.deviceType, status, capability);
		const service = accessory.getServiceById(Service.Switch, capability);
		if (service && on !== undefined) {
			service.updateCharacteristic(Characteristic.On, on);
		}
	}

	const thermostat = plan.thermostat
		? accessory.getServiceById(Service.Thermostat, THERMOSTAT_SUBTYPE)
		: undefined;
	if (thermostat) {
		updateThermostat(env, thermostat, thermostatView(device.deviceType, status));
	}

	const fan = plan.bubblesFan ? accessory.getServiceById(Service.Fan, BUBBLES_FAN_SUBTYPE) : undefined;
	const level = readBubblesLevel(device.deviceType, status);
	if (fan && level !== undefined) {
		fan.updateCharacteristic(Characteristic.On, level !== BubblesLevel.Off);
		fan.updateCharacteristic(Characteristic.RotationSpeed, bubblesLevelToRotationSpeed(level));
	}

	const cartridge = plan.filterMaintenance
		? accessory.getServiceById(Service.FilterMaintenance, FILTER_MAINTENANCE_SUBTYPE)
		: undefined;
	const changeRequired = readFilterChangeRequired(device.deviceType, status);
	if (cartridge && changeRequired !== undefined) {
		cartridge.updateCharacteristic(
			Characteristic.FilterChangeIndication,
			changeRequired
				? Characteristic.FilterChangeIndication.CHANGE_FILTER
				: Characteristic.FilterChangeIndication.FILTER_OK,
		);
	}

	updateBestwayHealth(env, accessory, deviceHealth(device.deviceType, status, epochSeconds()));
}

function updateThermostat(
	env: BestwayAccessoryEnv,
	service: Service,
	view: ThermostatView,
): void {
	const Characteristic = env.api.hap.Characteristic;

	service.updateCharacteristic(
		Characteristic.TargetHeatingCoolingState,
		view.heatOn ? Characteristic.TargetHeatingCoolingState.HEAT : Characteristic.TargetHeatingCoolingState.OFF,
	);
	service.updateCharacteristic(
		Characteristic.CurrentHeatingCoolingState,
		view.heating ? Characteristic.CurrentHeatingCoolingState.HEAT : Characteristic.CurrentHeatingCoolingState.OFF,
	);
	service.updateCharacteristic(
		Characteristic.TemperatureDisplayUnits,
		view.unit === 'celsius'
			? Characteristic.TemperatureDisplayUnits.CELSIUS
			: Characteristic.TemperatureDisplayUnits.FAHRENHEIT,
	);
	if (view.currentTemperature !== undefined) {
		service.updateCharacteristic(Characteristic.CurrentTemperature, view.currentTemperature);
	}
	if (view.targetTemperature !== undefined) {
		service.updateCharacteristic(Characteristic.TargetTemperature, view.targetTemperature);
	}
}
