// src/bestway/state-cache.ts
//
// Last-known status per device.
//
// The cloud API keeps serving the pre-command state for a while after a
// control POST. Commands therefore write an optimistic entry stamped with the
// local time, and a server read only replaces it once its own timestamp has
// caught up. Entries are only ever replaced whole, never patched in place.

import type { AttributeBag, AttributeValue, DeviceStatus } from './model.js';

export type ReconcileOutcome =
	/** Server timestamp was zero: the API has no data for the device. Cache untouched. */
	| 'no-data'
	/** Server timestamp older than the cached one. Cache untouched. */
	| 'stale'
	/** Cache entry replaced by the server snapshot. */
	| 'updated';

export class StateCache {
	private readonly entries = new Map<string, DeviceStatus>();

	public get(deviceId: string): DeviceStatus | undefined {
		return this.entries.get(deviceId);
	}

	public has(deviceId: string): boolean {
		return this.entries.has(deviceId);
	}

	public deviceIds(): string[] {
		return [...this.entries.keys()];
	}

	public snapshot(): ReadonlyMap<string, DeviceStatus> {
		return new Map(this.entries);
	}

	/**
	 * Merge a server status report. Equal timestamps favour the server: a
	 * local write is stamped with the write instant, and a read taken at or
	 * after it is authoritative.
	 */
	public reconcile(deviceId: string, serverTimestamp: number, serverAttrs: AttributeBag): ReconcileOutcome {
		if (serverTimestamp === 0) {
			return 'no-data';
		}

		const localTimestamp = this.entries.get(deviceId)?.timestamp ?? 0;
		if (serverTimestamp < localTimestamp) {
			return 'stale';
		}

		this.entries.set(deviceId, freeze(serverTimestamp, { ...serverAttrs }));
		return 'updated';
	}

	/**
	 * Apply a local change after a successful control POST. The timestamp never
	 * moves backwards, even if the local clock is behind the server's.
	 *
	 * Returns undefined when there is no entry to update.
	 */
	public applyOptimistic(
		deviceId: string,
		patch: Readonly<Record<string, AttributeValue>>,
		nowSeconds: number,
	): DeviceStatus | undefined {
		const current = this.entries.get(deviceId);
		if (!current) {
			return undefined;
		}

		const next = freeze(Math.max(nowSeconds, current.timestamp), { ...current.attrs, ...patch });
		this.entries.set(deviceId, next);
		return next;
	}

	/** Drop every entry whose device is not in `deviceIds`. Returns the dropped ids. */
	public retain(deviceIds: Iterable<string>): string[] {
		const keep = new Set(deviceIds);
		const dropped: string[] = [];
		for (const deviceId of this.entries.keys()) {
			if (!keep.has(deviceId)) {
				dropped.push(deviceId);
			}
		}
		for (const deviceId of dropped) {
			this.entries.delete(deviceId);
		}
		return dropped;
	}

	public clear(): void {
		this.entries.clear();
	}
}

function freeze(timestamp: number, attrs: Record<string, AttributeValue>): DeviceStatus {
	return Object.freeze({ timestamp, attrs: Object.freeze(attrs) });
}
