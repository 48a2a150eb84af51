// src/bestway/errors.ts
// Error taxonomy for the Bestway cloud client.

/** Base class for everything the Bestway client throws. */
export class BestwayError extends Error {
	public constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

// ----- Transport -----

/** Connection-level failure (DNS, refused, reset). Subclasses narrow the cause. */
export class TransportError extends BestwayError {}

export class RequestTimeoutError extends TransportError {
	public readonly timeoutMs: number;

	public constructor(url: string, timeoutMs: number, options?: { cause?: unknown }) {
		super(`Bestway request to ${url} timed out after ${timeoutMs}ms`, options);
		this.timeoutMs = timeoutMs;
	}
}

/** Non-2xx response that did not carry a recognised Bestway error code. */
export class ApiError extends TransportError {
	public readonly status: number;
	public readonly errorCode?: number;

	public constructor(status: number, statusText: string, errorCode?: number) {
		super(
			errorCode !== undefined
				? `Bestway API returned HTTP ${status} ${statusText} (error_code=${errorCode})`
				: `Bestway API returned HTTP ${status} ${statusText}`,
		);
		this.status = status;
		this.errorCode = errorCode;
	}
}

/** Body was not JSON, or the JSON did not have the expected shape. */
export class MalformedResponseError extends TransportError {}

// ----- Authentication -----

export class AuthError extends BestwayError {}

export class TokenInvalidError extends AuthError {
	public constructor() {
		super('Server reports auth token is invalid or expired');
	}
}

export class UserNotFoundError extends AuthError {
	public constructor() {
		super('Server reports user does not exist');
	}
}

export class IncorrectPasswordError extends AuthError {
	public constructor() {
		super('Server reports password is incorrect');
	}
}

// ----- Devices & commands -----

export class DeviceOfflineError extends BestwayError {
	public constructor() {
		super('Server reports device is offline');
	}
}

export class DeviceNotRecognizedError extends BestwayError {
	public readonly deviceId: string;

	public constructor(deviceId: string) {
		super(`Device '${deviceId}' is not recognised`);
		this.deviceId = deviceId;
	}
}

export class UnsupportedCommandError extends BestwayError {
	public constructor(deviceType: string, command: string) {
		super(`Command '${command}' is not supported by device type ${deviceType}`);
	}
}

export class InvalidCommandValueError extends BestwayError {}

/**
 * Gizwits error codes carried in the `{ error_code }` envelope of non-2xx responses.
 */
export const GIZWITS_ERROR_CODES = {
	tokenInvalid: 9004,
	userNotFound: 9005,
	incorrectPassword: 9020,
	deviceOffline: 9042,
} as const;

/**
 * Map a Gizwits error code onto a typed error, or undefined when the code is not one we know.
 */
export function errorForGizwitsCode(code: number): BestwayError | undefined {
	switch (code) {
	case GIZWITS_ERROR_CODES.tokenInvalid:
		return new TokenInvalidError();
	case GIZWITS_ERROR_CODES.userNotFound:
		return new UserNotFoundError();
	case GIZWITS_ERROR_CODES.incorrectPassword:
		return new IncorrectPasswordError();
	case GIZWITS_ERROR_CODES.deviceOffline:
		return new DeviceOfflineError();
	default:
		return undefined;
	}
}
