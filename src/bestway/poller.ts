// src/bestway/poller.ts
import type { BestwayLogger } from './api-client.js';
import type { BestwayClient } from './bestway-client.js';
import { IncorrectPasswordError, TokenInvalidError, UserNotFoundError } from './errors.js';
import type { BestwaySession } from './session.js';
import type { ReconcileOutcome } from './state-cache.js';

export const DEFAULT_STATUS_INTERVAL_MS = 30_000;
export const DEFAULT_BINDINGS_INTERVAL_MS = 10 * 60_000;

export interface PollResult {
	/** True when the device list was fetched during this cycle. */
	bindingsRefreshed: boolean;
	outcomes: Map<string, ReconcileOutcome>;
	error?: unknown;
}

export type PollListener = (result: PollResult) => void;

export interface PollerOptions {
	statusIntervalMs?: number;
	bindingsIntervalMs?: number;
	/** Milliseconds; injectable for tests. */
	now?: () => number;
}

/**
 * Drives the client on a fixed cadence: the device list on the slow interval,
 * statuses on the fast one. A cycle is scheduled only after the previous one
 * finished, and a poll() issued while one is in flight joins it, so fetches
 * never overlap.
 *
 * Rejected credentials halt polling until the next start().
 */
export class BestwayPoller {
	private readonly statusIntervalMs: number;
	private readonly bindingsIntervalMs: number;
	private readonly now: () => number;
	private readonly listeners: PollListener[] = [];

	private timer: NodeJS.Timeout | null = null;
	private running = false;
	private generation = 0;
	private inFlight: Promise<PollResult> | null = null;
	private credentialError: Error | null = null;
	private lastBindingsRefresh: number | null = null;

	public constructor(
		private readonly client: BestwayClient,
		private readonly session: BestwaySession,
		private readonly log: BestwayLogger,
		options: PollerOptions = {},
	) {
		this.statusIntervalMs = options.statusIntervalMs ?? DEFAULT_STATUS_INTERVAL_MS;
		this.bindingsIntervalMs = options.bindingsIntervalMs ?? DEFAULT_BINDINGS_INTERVAL_MS;
		this.now = options.now ?? Date.now;
	}

	public onPoll(listener: PollListener): void {
		this.listeners.push(listener);
	}

	public isRunning(): boolean {
		return this.running;
	}

	/** Run a cycle now, then keep polling until stop(). */
	public start(): void {
		if (this.running) {
			return;
		}
		this.running = true;
		this.generation += 1;
		this.credentialError = null;
		this.log.info(
			'Bestway: polling every %ds (device list every %ds)',
			Math.round(this.statusIntervalMs / 1000),
			Math.round(this.bindingsIntervalMs / 1000),
		);
		void this.loop(this.generation);
	}

	public stop(): void {
		this.running = false;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
	}

	/** Force the device list to be fetched on the next cycle. */
	public requestBindingsRefresh(): void {
		this.lastBindingsRefresh = null;
	}

	/**
	 * One polling cycle. Never throws: failures are logged and returned in the result.
	 */
	public poll(): Promise<PollResult> {
		if (!this.inFlight) {
			this.inFlight = this.runCycle().finally(() => {
				this.inFlight = null;
			});
		}
		return this.inFlight;
	}

	private async runCycle(): Promise<PollResult> {
		const result: PollResult = { bindingsRefreshed: false, outcomes: new Map() };

		if (this.credentialError) {
			result.error = this.credentialError;
			return result;
		}

		try {
			await this.session.ensureToken();

			if (this.bindingsDue()) {
				await this.client.refreshBindings();
				this.lastBindingsRefresh = this.now();
				result.bindingsRefreshed = true;
			}

			result.outcomes = await this.client.fetchStatuses();
		} catch (err) {
			result.error = err;
			await this.handleError(err);
		}

		for (const listener of this.listeners) {
			try {
				listener(result);
			} catch (err) {
				this.log.error('Bestway: poll listener failed: %s', String(err));
			}
		}

		return result;
	}

	private bindingsDue(): boolean {
		return this.lastBindingsRefresh === null || this.now() - this.lastBindingsRefresh >= this.bindingsIntervalMs;
	}

	private async handleError(err: unknown): Promise<void> {
		const message = err instanceof Error ? err.message : String(err);

		if (err instanceof TokenInvalidError) {
			this.log.warn('Bestway: %s; discarding token', message);
			try {
				await this.session.invalidate();
			} catch (clearErr) {
				this.log.error('Bestway: failed to discard stored token: %s', String(clearErr));
			}
			return;
		}

		if (err instanceof IncorrectPasswordError || err instanceof UserNotFoundError) {
			this.credentialError = err;
			this.log.error('Bestway: %s; check username and password in config.json. Polling stopped.', message);
			this.stop();
			return;
		}

		this.log.warn('Bestway: polling failed: %s', message);
	}

	private async loop(generation: number): Promise<void> {
		await this.poll();
		if (!this.running || generation !== this.generation) {
			return;
		}
		this.timer = setTimeout(() => {
			this.timer = null;
			void this.loop(generation);
		}, this.statusIntervalMs);
	}
}
