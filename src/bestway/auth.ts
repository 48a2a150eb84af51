// src/bestway/auth.ts

import { isRecord, type ApiClient } from './api-client.js';
import { MalformedResponseError } from './errors.js';
import type { UserToken } from './model.js';

/** Tokens closer than this to expiry are replaced rather than reused. */
export const TOKEN_REFRESH_MARGIN_SECONDS = 30 * 24 * 60 * 60;

/**
 * Log in and obtain a user token. The server rate-limits this fairly
 * aggressively, so callers should persist the result and reuse it.
 */
export async function login(api: ApiClient, username: string, password: string): Promise<UserToken> {
	const json = await api.post(
		'/app/login',
		{ username, password, lang: 'en' },
		{ authenticated: false },
	);

	if (!isRecord(json)) {
		throw new MalformedResponseError('Bestway login response is not an object');
	}

	const { uid, token, expire_at: expireAt } = json;
	if ((typeof uid !== 'string' && typeof uid !== 'number') || typeof token !== 'string' || token.length === 0) {
		throw new MalformedResponseError('Bestway login response missing uid or token');
	}
	if (typeof expireAt !== 'number' || !Number.isFinite(expireAt)) {
		throw new MalformedResponseError('Bestway login response missing expire_at');
	}

	return { userId: String(uid), token, expiry: expireAt };
}

export function isTokenUsable(
	token: UserToken,
	nowSeconds: number,
	marginSeconds = TOKEN_REFRESH_MARGIN_SECONDS,
): boolean {
	return token.expiry > nowSeconds + marginSeconds;
}
