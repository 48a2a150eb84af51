// src/bestway/device-catalog.ts

import {
	AIRJET_V01_BUBBLES,
	HYDROJET_BUBBLES,
	DeviceType,
	type AttributeValue,
	type BubblesMapping,
} from './model.js';

/** On/off attribute; `on`/`off` are the integers the API uses for it. */
export interface FlagControl {
	readonly kind: 'flag';
	readonly key: string;
	readonly on: number;
	readonly off: number;
}

/** Multi-level bubbles attribute. */
export interface LevelControl {
	readonly kind: 'level';
	readonly key: string;
	readonly mapping: BubblesMapping;
}

export interface NumberControl {
	readonly kind: 'number';
	readonly key: string;
	readonly min?: number;
	readonly max?: number;
}

/**
 * Writable attributes per logical capability. A missing entry means the
 * device type does not expose that capability.
 */
export interface DeviceControls {
	readonly power?: FlagControl;
	readonly filter?: FlagControl;
	readonly heat?: FlagControl;
	readonly targetTemperature?: NumberControl;
	readonly locked?: FlagControl;
	readonly bubbles?: FlagControl;
	readonly bubblesLevel?: LevelControl;
	readonly jets?: FlagControl;
	readonly filterTimerHours?: NumberControl;
}

export type Capability = keyof DeviceControls;

export const CAPABILITIES: readonly Capability[] = [
	'power',
	'filter',
	'heat',
	'targetTemperature',
	'locked',
	'bubbles',
	'bubblesLevel',
	'jets',
	'filterTimerHours',
];

export interface ErrorFlag {
	readonly key: string;
	/** Code as printed in the device manual, e.g. E01. */
	readonly code: string;
}

/** Read-only attributes. */
export interface DeviceReadings {
	readonly currentTemperature?: string;
	readonly temperatureUnit?: {
		readonly key: string;
		/** Values meaning Celsius; anything else is Fahrenheit. */
		readonly celsius: readonly AttributeValue[];
	};
	readonly heatTargetReached?: { readonly key: string; readonly on: number };
	readonly errors?: readonly ErrorFlag[];
	readonly filterChangeRequired?: string;
}

export interface TemperatureRange {
	readonly min: number;
	readonly max: number;
}

export interface BestwayDeviceModel {
	readonly deviceType: DeviceType;

	/** Exact `product_name` values from the bindings call. */
	readonly productNames: readonly string[];

	/** Name shown to the user. */
	readonly modelName: string;

	readonly controls: DeviceControls;
	readonly readings: DeviceReadings;

	readonly temperatureRange?: {
		readonly celsius: TemperatureRange;
		readonly fahrenheit: TemperatureRange;
	};
}

const flag = (key: string, on = 1, off = 0): FlagControl => ({ kind: 'flag', key, on, off });

const SPA_TEMPERATURE_RANGE = {
	celsius: { min: 20, max: 40 },
	fahrenheit: { min: 68, max: 104 },
} as const;

const EARTH_FAULT: ErrorFlag = { key: 'earth', code: 'GCF' };

const AIRJET_ERRORS: readonly ErrorFlag[] = [
	...[1, 2, 3, 4, 5, 6, 7, 8, 9].map((n) => ({
		key: `system_err${n}`,
		code: `E${String(n).padStart(2, '0')}`,
	})),
	EARTH_FAULT,
];

// Only the codes listed in the Hydrojet manual.
const HYDROJET_ERRORS: readonly ErrorFlag[] = [
	...[1, 2, 3, 4, 5, 8, 9, 12, 13].map((n) => {
		const code = `E${String(n).padStart(2, '0')}`;
		return { key: code, code };
	}),
	EARTH_FAULT,
];

const HYDROJET_CONTROLS: DeviceControls = {
	power: flag('power'),
	filter: flag('filter', 2),
	heat: flag('heat', 3),
	targetTemperature: { kind: 'number', key: 'Tset' },
	bubblesLevel: { kind: 'level', key: 'wave', mapping: HYDROJET_BUBBLES },
	jets: flag('jet'),
};

const HYDROJET_READINGS: DeviceReadings = {
	currentTemperature: 'Tnow',
	temperatureUnit: { key: 'Tunit', celsius: [1, true] },
	heatTargetReached: { key: 'word3', on: 1 },
	errors: HYDROJET_ERRORS,
};

/**
 * Device catalog keyed by DeviceType.
 */
export const DEVICE_CATALOG: Record<DeviceType, BestwayDeviceModel> = {
	[DeviceType.Airjet]: {
		deviceType: DeviceType.Airjet,
		productNames: ['Airjet'],
		modelName: 'Lay-Z-Spa Airjet',
		controls: {
			power: flag('power'),
			filter: flag('filter_power'),
			heat: flag('heat_power'),
			targetTemperature: { kind: 'number', key: 'temp_set' },
			locked: flag('locked'),
			bubbles: flag('wave_power'),
		},
		readings: {
			currentTemperature: 'temp_now',
			temperatureUnit: { key: 'temp_set_unit', celsius: ['摄氏'] },
			heatTargetReached: { key: 'heat_temp_reach', on: 1 },
			errors: AIRJET_ERRORS,
		},
		temperatureRange: SPA_TEMPERATURE_RANGE,
	},
	[DeviceType.AirjetV01]: {
		deviceType: DeviceType.AirjetV01,
		productNames: ['Airjet_V01'],
		modelName: 'Lay-Z-Spa Airjet V01',
		controls: {
			power: flag('power'),
			filter: flag('filter', 2),
			heat: flag('heat', 3),
			targetTemperature: { kind: 'number', key: 'Tset' },
			bubblesLevel: { kind: 'level', key: 'wave', mapping: AIRJET_V01_BUBBLES },
		},
		readings: {
			currentTemperature: 'Tnow',
			temperatureUnit: { key: 'Tunit', celsius: [1, true] },
			heatTargetReached: { key: 'word3', on: 1 },
		},
		temperatureRange: SPA_TEMPERATURE_RANGE,
	},
	[DeviceType.Hydrojet]: {
		deviceType: DeviceType.Hydrojet,
		productNames: ['Hydrojet'],
		modelName: 'Lay-Z-Spa Hydrojet',
		controls: HYDROJET_CONTROLS,
		readings: HYDROJET_READINGS,
		temperatureRange: SPA_TEMPERATURE_RANGE,
	},
	[DeviceType.HydrojetPro]: {
		deviceType: DeviceType.HydrojetPro,
		productNames: ['Hydrojet_Pro'],
		modelName: 'Lay-Z-Spa Hydrojet Pro',
		controls: HYDROJET_CONTROLS,
		readings: HYDROJET_READINGS,
		temperatureRange: SPA_TEMPERATURE_RANGE,
	},
	[DeviceType.PoolFilter]: {
		deviceType: DeviceType.PoolFilter,
		// Chinese for "pool filter"
		productNames: ['泳池过滤器'],
		modelName: 'Flowclear Pool Filter',
		controls: {
			power: flag('power'),
			filterTimerHours: { kind: 'number', key: 'time', min: 0, max: 24 },
		},
		readings: {
			errors: [{ key: 'error', code: 'ERROR' }],
			filterChangeRequired: 'filter',
		},
	},
	[DeviceType.Unknown]: {
		deviceType: DeviceType.Unknown,
		productNames: [],
		modelName: 'Bestway Device',
		controls: {},
		readings: {},
	},
};

const PRODUCT_NAME_TO_TYPE = new Map<string, DeviceType>(
	Object.values(DEVICE_CATALOG).flatMap((model) =>
		model.productNames.map((name): [string, DeviceType] => [name, model.deviceType]),
	),
);

/**
 * Classify a device by its `product_name`. Exact match only; unrecognised names are UNKNOWN.
 */
export function deviceTypeFromProductName(productName: string): DeviceType {
	return PRODUCT_NAME_TO_TYPE.get(productName) ?? DeviceType.Unknown;
}

export function lookupDeviceModel(deviceType: DeviceType): BestwayDeviceModel {
	return DEVICE_CATALOG[deviceType];
}

/** Logical capabilities a device type exposes, in CAPABILITIES order. */
export function capabilitiesOf(deviceType: DeviceType): Capability[] {
	const { controls } = DEVICE_CATALOG[deviceType];
	return CAPABILITIES.filter((capability) => controls[capability] !== undefined);
}
