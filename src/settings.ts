// src/settings.ts
import { API_ROOT_EU, API_ROOT_US } from './bestway/api-client.js';

/**
 * Name used to register the platform with Homebridge; must match config.schema.json.
 */
export const PLATFORM_NAME = 'BestwaySpa';

/**
 * Must match the name in package.json.
 */
export const PLUGIN_NAME = 'homebridge-bestway';

export const API_ROOTS = [API_ROOT_EU, API_ROOT_US] as const;

export interface BestwayPlatformConfig {
	name: string;
	username: string;
	password: string;
	apiRoot: string;
	statusIntervalSeconds: number;
	bindingsIntervalMinutes: number;
}

export const CONFIG_DEFAULTS = {
	name: 'Bestway',
	apiRoot: API_ROOT_EU,
	statusIntervalSeconds: 30,
	bindingsIntervalMinutes: 10,
} as const;

const MIN_STATUS_INTERVAL_SECONDS = 10;
const MIN_BINDINGS_INTERVAL_MINUTES = 1;

export type ConfigParseResult =
	| { ok: true; config: BestwayPlatformConfig; warnings: string[] }
	| { ok: false; problems: string[] };

/**
 * Read the platform block from config.json. Unknown keys are ignored; bad
 * optional values fall back to defaults with a warning; missing credentials fail.
 */
export function parsePlatformConfig(raw: Record<string, unknown>): ConfigParseResult {
	const problems: string[] = [];
	const warnings: string[] = [];

	// Canonical keys are username/password; "email" is accepted as an alias.
	const username =
		typeof raw.username === 'string'
			? raw.username.trim()
			: typeof raw.email === 'string'
				? raw.email.trim()
				: '';

	const password = typeof raw.password === 'string' ? raw.password : '';

	if (!username) {
		problems.push('username is required');
	}
	if (!password) {
		problems.push('password is required');
	}

	let apiRoot: string = CONFIG_DEFAULTS.apiRoot;
	if (raw.apiRoot !== undefined) {
		const candidate = typeof raw.apiRoot === 'string' ? raw.apiRoot.replace(/\/+$/, '') : '';
		if (API_ROOTS.some((root) => root === candidate)) {
			apiRoot = candidate;
		} else {
			warnings.push(`apiRoot ${String(raw.apiRoot)} is not a known region; using ${CONFIG_DEFAULTS.apiRoot}`);
		}
	}

	const statusIntervalSeconds = readInteger(
		raw.statusIntervalSeconds,
		'statusIntervalSeconds',
		CONFIG_DEFAULTS.statusIntervalSeconds,
		MIN_STATUS_INTERVAL_SECONDS,
		warnings,
	);
	const bindingsIntervalMinutes = readInteger(
		raw.bindingsIntervalMinutes,
		'bindingsIntervalMinutes',
		CONFIG_DEFAULTS.bindingsIntervalMinutes,
		MIN_BINDINGS_INTERVAL_MINUTES,
		warnings,
	);

	if (problems.length > 0) {
		return { ok: false, problems };
	}

	return {
		ok: true,
		warnings,
		config: {
			name: typeof raw.name === 'string' && raw.name.trim() ? raw.name.trim() : CONFIG_DEFAULTS.name,
			username,
			password,
			apiRoot,
			statusIntervalSeconds,
			bindingsIntervalMinutes,
		},
	};
}

function readInteger(value: unknown, key: string, fallback: number, min: number, warnings: string[]): number {
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== 'number' || !Number.isInteger(value)) {
		warnings.push(`${key} must be an integer; using ${fallback}`);
		return fallback;
	}
	if (value < min) {
		warnings.push(`${key} must be at least ${min}; using ${min}`);
		return min;
	}
	return value;
}
