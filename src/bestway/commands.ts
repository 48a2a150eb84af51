// src/bestway/commands.ts
// Logical commands and the single dispatch that turns one into a vendor
// payload plus the optimistic local patch.

import {
	lookupDeviceModel,
	type DeviceControls,
	type FlagControl,
	type NumberControl,
} from './device-catalog.js';
import {
	InvalidCommandValueError,
	UnsupportedCommandError,
} from './errors.js';
import {
	BubblesLevel,
	type AttributeValue,
	type DeviceType,
} from './model.js';

export interface CommandValueMap {
	power: boolean;
	filter: boolean;
	heat: boolean;
	targetTemperature: number;
	locked: boolean;
	bubbles: boolean;
	bubblesLevel: BubblesLevel;
	jets: boolean;
	filterTimerHours: number;
}

export type Command = keyof CommandValueMap;

export type CommandRequest = {
	[C in Command]: { readonly command: C; readonly value: CommandValueMap[C] };
}[Command];

export type AttributePatch = Record<string, AttributeValue>;

export interface BuiltCommand {
	/** Attributes POSTed to /app/control: the primary change only. */
	readonly payload: AttributePatch;
	/** Local update: the primary change plus the side effects the device applies itself. */
	readonly patch: AttributePatch;
}

/**
 * States the firmware switches implicitly. `bubbles: false` covers both the
 * on/off and the multi-level bubbles attributes.
 */
interface ImpliedState {
	power?: true;
	filter?: boolean;
	heat?: false;
	bubbles?: false;
}

function impliedBy(request: CommandRequest): ImpliedState {
	switch (request.command) {
	case 'heat':
		return request.value ? { power: true, filter: true } : {};
	case 'power':
		return request.value ? {} : { filter: false, heat: false, bubbles: false };
	case 'filter':
		return request.value ? { power: true } : { heat: false, bubbles: false };
	case 'bubbles':
	case 'jets':
		return request.value ? { power: true } : {};
	case 'bubblesLevel':
		return request.value !== BubblesLevel.Off ? { power: true } : {};
	default:
		return {};
	}
}

const encodeFlag = (control: FlagControl, on: boolean): number => (on ? control.on : control.off);

function encodeNumber(deviceType: DeviceType, command: Command, control: NumberControl, value: number): number {
	if (!Number.isFinite(value)) {
		throw new InvalidCommandValueError(`${command} for ${deviceType} must be a finite number, got ${value}`);
	}
	const n = Math.trunc(value);
	if ((control.min !== undefined && n < control.min) || (control.max !== undefined && n > control.max)) {
		throw new InvalidCommandValueError(
			`${command} for ${deviceType} must be between ${control.min ?? '-∞'} and ${control.max ?? '∞'}, got ${n}`,
		);
	}
	return n;
}

function primaryPatch(deviceType: DeviceType, controls: DeviceControls, request: CommandRequest): AttributePatch {
	const unsupported = () => new UnsupportedCommandError(deviceType, request.command);

	switch (request.command) {
	case 'power':
	case 'filter':
	case 'heat':
	case 'locked':
	case 'bubbles':
	case 'jets': {
		const control = controls[request.command];
		if (!control) {
			throw unsupported();
		}
		return { [control.key]: encodeFlag(control, request.value) };
	}
	case 'bubblesLevel': {
		const control = controls.bubblesLevel;
		if (!control) {
			throw unsupported();
		}
		return { [control.key]: control.mapping.toApiValue(request.value) };
	}
	case 'targetTemperature':
	case 'filterTimerHours': {
		const control = controls[request.command];
		if (!control) {
			throw unsupported();
		}
		return { [control.key]: encodeNumber(deviceType, request.command, control, request.value) };
	}
	}
}

function sideEffectPatch(controls: DeviceControls, implied: ImpliedState): AttributePatch {
	const patch: AttributePatch = {};

	if (implied.power !== undefined && controls.power) {
		patch[controls.power.key] = encodeFlag(controls.power, implied.power);
	}
	if (implied.filter !== undefined && controls.filter) {
		patch[controls.filter.key] = encodeFlag(controls.filter, implied.filter);
	}
	if (implied.heat !== undefined && controls.heat) {
		patch[controls.heat.key] = encodeFlag(controls.heat, implied.heat);
	}
	if (implied.bubbles !== undefined) {
		if (controls.bubbles) {
			patch[controls.bubbles.key] = encodeFlag(controls.bubbles, implied.bubbles);
		}
		if (controls.bubblesLevel) {
			patch[controls.bubblesLevel.key] = controls.bubblesLevel.mapping.toApiValue(BubblesLevel.Off);
		}
	}

	return patch;
}

/**
 * Build the payload and optimistic patch for one logical command.
 *
 * Throws UnsupportedCommandError when the device type has no attribute for
 * the command, InvalidCommandValueError for out-of-range numbers.
 */
export function buildCommand(deviceType: DeviceType, request: CommandRequest): BuiltCommand {
	const { controls } = lookupDeviceModel(deviceType);
	const payload = primaryPatch(deviceType, controls, request);

	// The primary attribute wins over any side effect that names the same key.
	const patch = { ...sideEffectPatch(controls, impliedBy(request)), ...payload };

	return { payload, patch };
}

/** Human-readable form for logs. */
export function describeCommand(request: CommandRequest): string {
	const value = typeof request.value === 'boolean' ? (request.value ? 'ON' : 'OFF') : String(request.value);
	return `${request.command}=${value}`;
}
