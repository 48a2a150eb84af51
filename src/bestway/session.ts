// src/bestway/session.ts
import type { ApiClient, BestwayLogger } from './api-client.js';
import { isTokenUsable, login } from './auth.js';
import { epochSeconds, type UserToken } from './model.js';
import type { StoredToken } from './token-store.js';

export interface Credentials {
	username: string;
	password: string;
}

/** What the session needs from a token store; TokenStore implements it. */
export interface TokenPersistence {
	load(): Promise<StoredToken | null>;
	save(data: StoredToken): Promise<void>;
	clear(): Promise<void>;
}

export interface SessionOptions {
	now?: () => number;
	refreshMarginSeconds?: number;
}

/**
 * Owns the user token:
 * 1) reuse the in-memory token,
 * 2) else a stored token issued for the same account and region,
 * 3) else log in and persist the result.
 * A token is only reused while it is further than the refresh margin from expiry.
 */
export class BestwaySession {
	private token: UserToken | null = null;
	private pending: Promise<UserToken> | null = null;
	private readonly now: () => number;
	private readonly refreshMarginSeconds?: number;

	public constructor(
		private readonly api: ApiClient,
		private readonly store: TokenPersistence,
		private readonly credentials: Credentials,
		private readonly log: BestwayLogger,
		options: SessionOptions = {},
	) {
		this.now = options.now ?? epochSeconds;
		this.refreshMarginSeconds = options.refreshMarginSeconds;
	}

	public getToken(): UserToken | null {
		return this.token;
	}

	/**
	 * The token in memory is used until it actually expires or the server
	 * rejects it. The refresh margin only decides whether a stored token is
	 * worth picking up at start.
	 */
	public async ensureToken(): Promise<UserToken> {
		if (this.token && this.token.expiry > this.now()) {
			return this.token;
		}

		// Concurrent callers share one login; the endpoint is rate limited.
		if (!this.pending) {
			this.pending = this.obtainToken().finally(() => {
				this.pending = null;
			});
		}
		return this.pending;
	}

	/** Forget the current token, e.g. after the server rejected it. */
	public async invalidate(): Promise<void> {
		this.token = null;
		this.api.setUserToken(null);
		await this.store.clear();
		this.log.info('Bestway: stored token discarded; will log in again on next use');
	}

	private async obtainToken(): Promise<UserToken> {
		const stored = await this.store.load();
		if (
			stored &&
			stored.username === this.credentials.username &&
			stored.apiRoot === this.api.apiRoot &&
			isTokenUsable(stored, this.now(), this.refreshMarginSeconds)
		) {
			this.log.info(
				'Bestway: reusing stored token for userId=%s (expires %s)',
				stored.userId,
				new Date(stored.expiry * 1000).toISOString(),
			);
			return this.apply(stored);
		}

		this.log.info('Bestway: requesting a new auth token for %s', this.credentials.username);
		const token = await login(this.api, this.credentials.username, this.credentials.password);

		await this.store.save({
			...token,
			username: this.credentials.username,
			apiRoot: this.api.apiRoot,
		});

		this.log.info(
			'Bestway: login successful; userId=%s (expires %s)',
			token.userId,
			new Date(token.expiry * 1000).toISOString(),
		);
		return this.apply(token);
	}

	private apply(token: UserToken): UserToken {
		const { userId, token: value, expiry } = token;
		this.token = { userId, token: value, expiry };
		this.api.setUserToken(value);
		return this.token;
	}
}
