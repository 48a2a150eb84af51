// src/bestway/api-client.ts
// Bestway (Gizwits) cloud transport.
// Fixed headers, a per-call timeout and vendor error decoding. Stateless apart
// from the current user token; BestwaySession decides when that changes.

import {
	ApiError,
	MalformedResponseError,
	RequestTimeoutError,
	TransportError,
	errorForGizwitsCode,
} from './errors.js';

export const API_ROOT_EU = 'https://euapi.gizwits.com';
export const API_ROOT_US = 'https://usapi.gizwits.com';

const APPLICATION_ID = '98754e684ec045528b073876c34c7348';
const DEFAULT_TIMEOUT_MS = 10_000;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Very small logger interface so we can accept either the Homebridge log
 * object or console.* functions in tests.
 */
export interface BestwayLogger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export function createConsoleLogger(prefix: string): BestwayLogger {
	return {
		debug: (...args: unknown[]) => console.debug(prefix, ...args),
		info: (...args: unknown[]) => console.info(prefix, ...args),
		warn: (...args: unknown[]) => console.warn(prefix, ...args),
		error: (...args: unknown[]) => console.error(prefix, ...args),
	};
}

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface ApiClientOptions {
	apiRoot: string;
	timeoutMs?: number;
	fetch?: FetchLike;
	logger?: BestwayLogger;
}

export interface RequestOptions {
	/** Send the X-Gizwits-User-token header. Defaults to true. */
	authenticated?: boolean;
}

export class ApiClient {
	public readonly apiRoot: string;
	private readonly timeoutMs: number;
	private readonly fetchImpl: FetchLike;
	private readonly log: BestwayLogger;

	private userToken: string | null = null;

	public constructor(options: ApiClientOptions) {
		this.apiRoot = options.apiRoot.replace(/\/+$/, '');
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
		this.log = options.logger ?? createConsoleLogger('[bestway-api]');
	}

	public setUserToken(token: string | null): void {
		this.userToken = token;
	}

	public hasUserToken(): boolean {
		return this.userToken !== null;
	}

	public async get(path: string, options?: RequestOptions): Promise<unknown> {
		return this.request('GET', path, undefined, options);
	}

	public async post(path: string, body: unknown, options?: RequestOptions): Promise<unknown> {
		return this.request('POST', path, body, options);
	}

	private async request(
		method: 'GET' | 'POST',
		path: string,
		body: unknown,
		options?: RequestOptions,
	): Promise<unknown> {
		const url = `${this.apiRoot}${path}`;
		const headers: Record<string, string> = {
			'Content-Type': 'application/json; charset=UTF-8',
			'X-Gizwits-Application-Id': APPLICATION_ID,
		};

		if (options?.authenticated ?? true) {
			if (!this.userToken) {
				throw new TransportError(`Bestway ${method} ${path} requires a user token; log in first.`);
			}
			headers['X-Gizwits-User-token'] = this.userToken;
		}

		this.log.debug('Bestway %s %s', method, path);

		let res: Response;
		let text: string;
		try {
			const signal = AbortSignal.timeout(this.timeoutMs);
			res = await this.fetchImpl(url, {
				method,
				headers,
				body: body === undefined ? undefined : JSON.stringify(body),
				signal,
			});
			text = await res.text();
		} catch (err) {
			if (isTimeoutAbort(err)) {
				throw new RequestTimeoutError(url, this.timeoutMs, { cause: err });
			}
			throw new TransportError(
				`Bestway ${method} ${path} failed: ${err instanceof Error ? err.message : String(err)}`,
				{ cause: err },
			);
		}

		// The API answers JSON, but often declares text/html; never trust the content type.
		const json = parseJson(text);

		if (!res.ok) {
			const code = isRecord(json) && typeof json.error_code === 'number'
				? json.error_code
				: undefined;

			this.log.debug(
				'Bestway %s %s failed: HTTP %d %s (error_code=%s)',
				method,
				path,
				res.status,
				res.statusText,
				code === undefined ? 'none' : String(code),
			);

			const known = code === undefined ? undefined : errorForGizwitsCode(code);
			throw known ?? new ApiError(res.status, res.statusText, code);
		}

		if (text.trim().length === 0) {
			return {};
		}

		if (json === undefined) {
			throw new MalformedResponseError(
				`Bestway ${method} ${path} returned non-JSON payload: ${text.slice(0, 200)}`,
			);
		}

		return json;
	}
}

function parseJson(text: string): unknown {
	if (text.trim().length === 0) {
		return undefined;
	}
	try {
		const parsed: unknown = JSON.parse(text);
		return parsed;
	} catch {
		return undefined;
	}
}

function isTimeoutAbort(err: unknown): boolean {
	return typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError';
}
