// src/bestway/token-store.ts
import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import { isRecord, type BestwayLogger } from './api-client.js';
import type { UserToken } from './model.js';

export interface StoredToken extends UserToken {
	/** Account and region the token was issued for. */
	username: string;
	apiRoot: string;
}

/**
 * Simple JSON token store under the Homebridge storage path.
 *
 * Files are stored at:
 *   <storagePath>/homebridge-bestway/bestway-token.json
 */
export class TokenStore {
	private readonly dirPath: string;
	private readonly filePath: string;

	public constructor(storagePath: string, private readonly log: BestwayLogger) {
		this.dirPath = path.join(storagePath, 'homebridge-bestway');
		this.filePath = path.join(this.dirPath, 'bestway-token.json');
	}

	public async load(): Promise<StoredToken | null> {
		let raw: string;
		try {
			raw = await fs.readFile(this.filePath, 'utf8');
		} catch (err) {
			if (isMissingFile(err)) {
				return null;
			}
			throw err;
		}

		let data: unknown;
		try {
			data = JSON.parse(raw);
		} catch (err) {
			this.log.warn('Bestway: token file %s is not valid JSON; ignoring it (%s)', this.filePath, String(err));
			return null;
		}

		if (
			!isRecord(data) ||
			typeof data.userId !== 'string' ||
			typeof data.token !== 'string' ||
			typeof data.expiry !== 'number' ||
			typeof data.username !== 'string' ||
			typeof data.apiRoot !== 'string'
		) {
			this.log.warn('Bestway: token file %s has an unexpected shape; ignoring it', this.filePath);
			return null;
		}

		return {
			userId: data.userId,
			token: data.token,
			expiry: data.expiry,
			username: data.username,
			apiRoot: data.apiRoot,
		};
	}

	public async save(data: StoredToken): Promise<void> {
		const json = JSON.stringify(data, null, 2);

		await fs.mkdir(this.dirPath, { recursive: true });
		await fs.writeFile(this.filePath, json, { encoding: 'utf8', mode: 0o600 });
	}

	public async clear(): Promise<void> {
		try {
			await fs.unlink(this.filePath);
		} catch (err) {
			if (!isMissingFile(err)) {
				throw err;
			}
		}
	}
}

function isMissingFile(err: unknown): boolean {
	return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
