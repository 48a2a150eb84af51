// src/bestway/attributes.ts
// Typed access to the open attribute bag. Known keys come from the device
// catalog; raw() stays available for attributes nobody has mapped yet.

import {
	lookupDeviceModel,
	type FlagControl,
} from './device-catalog.js';
import {
	BubblesLevel,
	type AttributeBag,
	type AttributeValue,
	type DeviceStatus,
	type DeviceType,
} from './model.js';

export type FlagCapability = 'power' | 'filter' | 'heat' | 'locked' | 'bubbles' | 'jets';
export type NumberCapability = 'targetTemperature' | 'filterTimerHours';

export type TemperatureUnit = 'celsius' | 'fahrenheit';

export class DeviceAttributes {
	public constructor(private readonly bag: AttributeBag) {}

	public has(key: string): boolean {
		return Object.prototype.hasOwnProperty.call(this.bag, key);
	}

	public raw(key: string): AttributeValue | undefined {
		return this.has(key) ? this.bag[key] : undefined;
	}

	/** Numbers as-is, booleans as 0/1, numeric strings parsed. */
	public number(key: string): number | undefined {
		const value = this.raw(key);
		if (typeof value === 'number') {
			return Number.isFinite(value) ? value : undefined;
		}
		if (typeof value === 'boolean') {
			return value ? 1 : 0;
		}
		if (typeof value === 'string' && value.trim() !== '') {
			const parsed = Number(value);
			return Number.isFinite(parsed) ? parsed : undefined;
		}
		return undefined;
	}

	/**
	 * With onValue 1 any non-zero value counts as on; otherwise the value must equal onValue.
	 */
	public flag(key: string, onValue = 1): boolean | undefined {
		const n = this.number(key);
		if (n === undefined) {
			return undefined;
		}
		return onValue === 1 ? n !== 0 : n === onValue;
	}

	public string(key: string): string | undefined {
		const value = this.raw(key);
		return typeof value === 'string' ? value : undefined;
	}
}

export function readFlagControl(control: FlagControl, attrs: DeviceAttributes): boolean | undefined {
	return attrs.flag(control.key, control.on);
}

export function readFlag(
	deviceType: DeviceType,
	status: DeviceStatus,
	capability: FlagCapability,
): boolean | undefined {
	const control = lookupDeviceModel(deviceType).controls[capability];
	return control ? readFlagControl(control, new DeviceAttributes(status.attrs)) : undefined;
}

export function readNumber(
	deviceType: DeviceType,
	status: DeviceStatus,
	capability: NumberCapability,
): number | undefined {
	const control = lookupDeviceModel(deviceType).controls[capability];
	return control ? new DeviceAttributes(status.attrs).number(control.key) : undefined;
}

/**
 * Current bubbles level. Values outside the mapping are reported as OFF;
 * `onUnexpected` lets the caller log them.
 */
export function readBubblesLevel(
	deviceType: DeviceType,
	status: DeviceStatus,
	onUnexpected?: (value: number) => void,
): BubblesLevel | undefined {
	const control = lookupDeviceModel(deviceType).controls.bubblesLevel;
	if (!control) {
		return undefined;
	}
	const value = new DeviceAttributes(status.attrs).number(control.key);
	if (value === undefined) {
		return undefined;
	}
	const level = control.mapping.fromApiValue(value);
	if (level === undefined) {
		onUnexpected?.(value);
		return BubblesLevel.Off;
	}
	return level;
}

export function readCurrentTemperature(deviceType: DeviceType, status: DeviceStatus): number | undefined {
	const key = lookupDeviceModel(deviceType).readings.currentTemperature;
	return key ? new DeviceAttributes(status.attrs).number(key) : undefined;
}

/** Celsius unless the device reports otherwise. */
export function readTemperatureUnit(deviceType: DeviceType, status: DeviceStatus | undefined): TemperatureUnit {
	const unit = lookupDeviceModel(deviceType).readings.temperatureUnit;
	if (!unit || !status) {
		return 'celsius';
	}
	const value = new DeviceAttributes(status.attrs).raw(unit.key);
	if (value === undefined) {
		return 'celsius';
	}
	return unit.celsius.includes(value) ? 'celsius' : 'fahrenheit';
}

export function readHeatTargetReached(deviceType: DeviceType, status: DeviceStatus): boolean | undefined {
	const reading = lookupDeviceModel(deviceType).readings.heatTargetReached;
	return reading ? new DeviceAttributes(status.attrs).flag(reading.key, reading.on) : undefined;
}

/** Manual codes of every error flag currently raised. */
export function readActiveErrors(deviceType: DeviceType, status: DeviceStatus): string[] {
	const errors = lookupDeviceModel(deviceType).readings.errors ?? [];
	const attrs = new DeviceAttributes(status.attrs);
	return errors
		.filter((error) => attrs.flag(error.key) === true)
		.map((error) => error.code);
}

export function readFilterChangeRequired(deviceType: DeviceType, status: DeviceStatus): boolean | undefined {
	const key = lookupDeviceModel(deviceType).readings.filterChangeRequired;
	return key ? new DeviceAttributes(status.attrs).flag(key) : undefined;
}
