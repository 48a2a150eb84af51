// src/bestway/accessory-helpers.ts
import type {
	API,
	Logger,
	PlatformAccessory,
} from 'homebridge';

import {
	readActiveErrors,
	readCurrentTemperature,
	readFlag,
	readHeatTargetReached,
	readNumber,
	readTemperatureUnit,
	type FlagCapability,
	type TemperatureUnit,
} from './attributes.js';
import type { BestwayClient } from './bestway-client.js';
import { capabilitiesOf, lookupDeviceModel } from './device-catalog.js';
import {
	BubblesLevel,
	isStatusOnline,
	type Device,
	type DeviceStatus,
	type DeviceType,
} from './model.js';

// Context stored on the accessory
export interface BestwayAccessoryContext {
	bestway?: {
		deviceId: string;
		deviceType: DeviceType;
		productName: string;
	};
	[key: string]: unknown;
}

// Minimal runtime “env” that accessory modules need from the platform
export interface BestwayAccessoryEnv {
	log: Logger;
	api: API;
	client: BestwayClient;
}

export const SWITCH_LABELS: Record<Exclude<FlagCapability, 'heat'>, string> = {
	power: 'Power',
	filter: 'Filter',
	bubbles: 'Bubbles',
	jets: 'Jets',
	locked: 'Lock',
};

export type SwitchCapability = keyof typeof SWITCH_LABELS;

export interface ServicePlan {
	switches: SwitchCapability[];
	thermostat: boolean;
	bubblesFan: boolean;
	filterMaintenance: boolean;
	/** Contact sensor carrying StatusActive and StatusFault. */
	statusSensor: boolean;
}

function isSwitchCapability(capability: string): capability is SwitchCapability {
	return Object.prototype.hasOwnProperty.call(SWITCH_LABELS, capability);
}

export function deviceDisplayName(device: Device): string {
	return device.alias.trim() || `${lookupDeviceModel(device.deviceType).modelName} ${device.deviceId}`;
}

/**
 * Which HomeKit services a device type gets, from its capability list.
 */
export function planServices(deviceType: DeviceType): ServicePlan {
	const capabilities = capabilitiesOf(deviceType);
	return {
		switches: capabilities.filter(isSwitchCapability),
		thermostat: capabilities.includes('heat') && capabilities.includes('targetTemperature'),
		bubblesFan: capabilities.includes('bubblesLevel'),
		filterMaintenance: lookupDeviceModel(deviceType).readings.filterChangeRequired !== undefined,
		statusSensor: capabilities.length > 0,
	};
}

export interface DeviceHealth {
	/** The device reported within the offline threshold. */
	online: boolean;
	/** Active error codes, e.g. E02 or GCF. */
	faults: string[];
}

export function deviceHealth(
	deviceType: DeviceType,
	status: DeviceStatus | undefined,
	nowSeconds: number,
): DeviceHealth {
	if (!status) {
		return { online: false, faults: [] };
	}
	return {
		online: isStatusOnline(status, nowSeconds),
		faults: readActiveErrors(deviceType, status),
	};
}

// ----- Temperatures: HomeKit always talks Celsius -----

export function toHomeKitTemperature(value: number, unit: TemperatureUnit): number {
	if (unit === 'celsius') {
		return value;
	}
	return Math.round(((value - 32) * 5) / 9 * 10) / 10;
}

export function fromHomeKitTemperature(celsius: number, unit: TemperatureUnit): number {
	if (unit === 'celsius') {
		return Math.round(celsius);
	}
	return Math.round((celsius * 9) / 5 + 32);
}

export interface ThermostatView {
	heatOn: boolean;
	/** Heater on and target not reached yet. */
	heating: boolean;
	unit: TemperatureUnit;
	/** Celsius. */
	currentTemperature?: number;
	/** Celsius. */
	targetTemperature?: number;
}

export function thermostatView(deviceType: DeviceType, status: DeviceStatus): ThermostatView {
	const unit = readTemperatureUnit(deviceType, status);
	const heatOn = readFlag(deviceType, status, 'heat') ?? false;
	const reached = readHeatTargetReached(deviceType, status) ?? false;
	const current = readCurrentTemperature(deviceType, status);
	const target = readNumber(deviceType, status, 'targetTemperature');

	return {
		heatOn,
		heating: heatOn && !reached,
		unit,
		currentTemperature: current === undefined ? undefined : toHomeKitTemperature(current, unit),
		targetTemperature: target === undefined ? undefined : toHomeKitTemperature(target, unit),
	};
}

/** Celsius bounds for the TargetTemperature characteristic. */
export function targetTemperatureBounds(deviceType: DeviceType): { min: number; max: number } {
	const range = lookupDeviceModel(deviceType).temperatureRange?.celsius;
	return range ? { min: range.min, max: range.max } : { min: 10, max: 40 };
}

// ----- Bubbles levels as fan speed: 0 / 50 / 100 -----

export function bubblesLevelToRotationSpeed(level: BubblesLevel): number {
	switch (level) {
	case BubblesLevel.Max:
		return 100;
	case BubblesLevel.Medium:
		return 50;
	default:
		return 0;
	}
}

export function rotationSpeedToBubblesLevel(speed: number): BubblesLevel {
	if (speed <= 0) {
		return BubblesLevel.Off;
	}
	return speed <= 75 ? BubblesLevel.Medium : BubblesLevel.Max;
}

/**
 * Populate the standard Accessory Information service with Bestway metadata.
 */
export function applyAccessoryInformation(
	api: API,
	accessory: PlatformAccessory,
	device: Device,
): void {
	const infoService = accessory.getService(api.hap.Service.AccessoryInformation);
	if (!infoService) {
		return;
	}

	const Characteristic = api.hap.Characteristic;
	const model = lookupDeviceModel(device.deviceType);

	infoService.updateCharacteristic(Characteristic.Name, accessory.displayName);
	infoService.updateCharacteristic(Characteristic.Manufacturer, 'Bestway');
	infoService.updateCharacteristic(
		Characteristic.Model,
		device.deviceType === 'UNKNOWN' && device.productName ? device.productName : model.modelName,
	);
	infoService.updateCharacteristic(Characteristic.SerialNumber, device.deviceId);

	if (device.mcuSoftVersion) {
		infoService.updateCharacteristic(Characteristic.FirmwareRevision, device.mcuSoftVersion);
	}
	if (device.mcuHardVersion) {
		infoService.updateCharacteristic(Characteristic.HardwareRevision, device.mcuHardVersion);
	}
	if (device.wifiSoftVersion) {
		infoService.updateCharacteristic(Characteristic.SoftwareRevision, device.wifiSoftVersion);
	}
}
