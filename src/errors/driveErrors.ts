import { RoverError } from './RoverError';

/**
 * Error codes raised by the drive, stream and joystick pipeline.
 */
export type RoverErrorCode =
	| 'OUT_OF_RANGE'
	| 'UNKNOWN_COMMAND'
	| 'INVALID_MESSAGE'
	| 'UNKNOWN_MESSAGE_TYPE'
	| 'DEVICE_UNAVAILABLE'
	| 'DECODE_ERROR'
	| 'TRANSIENT_IO'
	| 'SHUTDOWN'
	| 'INTERNAL';

/**
 * Recommended operator action for recovery.
 */
export type RoverRecoveryAction =
	| 'retry'
	| 'fix-input'
	| 'check-device'
	| 'check-permissions'
	| 'none';

export type DeviceKind = 'joystick' | 'actuator' | 'camera';

export type DeviceUnavailableReason = 'not-found' | 'permission-denied' | 'io-error';

/**
 * Out-of-range speed/direction/duration or an unknown command name.
 * The command is rejected and nothing reaches the actuator.
 */
export class ValidationError extends RoverError {
	public readonly field?: string;

	public constructor(message: string, options: { code?: 'OUT_OF_RANGE' | 'UNKNOWN_COMMAND' | 'INVALID_MESSAGE'; field?: string } = {}) {
		super(options.code ?? 'OUT_OF_RANGE', message);
		this.name = 'ValidationError';
		this.field = options.field;
	}
}

/**
 * A joystick, actuator or camera is missing or not accessible.
 * The owning subsystem degrades; the rest keeps running.
 */
export class DeviceUnavailableError extends RoverError {
	public readonly device: DeviceKind;
	public readonly reason: DeviceUnavailableReason;
	public readonly path?: string;

	public constructor(options: {
		device: DeviceKind;
		reason: DeviceUnavailableReason;
		message: string;
		path?: string;
		cause?: unknown;
	}) {
		super('DEVICE_UNAVAILABLE', options.message, options.cause);
		this.name = 'DeviceUnavailableError';
		this.device = options.device;
		this.reason = options.reason;
		this.path = options.path;
	}
}

export class DecodeError extends RoverError {
	public readonly byteLength: number;

	public constructor(message: string, byteLength: number) {
		super('DECODE_ERROR', message);
		this.name = 'DecodeError';
		this.byteLength = byteLength;
	}
}

export class TransientIOError extends RoverError {
	public readonly op: string;

	public constructor(op: string, message: string, cause?: unknown) {
		super('TRANSIENT_IO', message, cause);
		this.name = 'TransientIOError';
		this.op = op;
	}
}

/**
 * Settles in-flight batched commands during teardown.
 */
export class ShutdownError extends RoverError {
	public constructor(message = 'Command pipeline is shutting down.') {
		super('SHUTDOWN', message);
		this.name = 'ShutdownError';
	}
}

/**
 * Recommended operator action per error code, sent with every error reply.
 */
export const ROVER_ERROR_ACTIONS: Record<RoverErrorCode, RoverRecoveryAction> = {
	OUT_OF_RANGE: 'fix-input',
	UNKNOWN_COMMAND: 'fix-input',
	INVALID_MESSAGE: 'fix-input',
	UNKNOWN_MESSAGE_TYPE: 'fix-input',
	DEVICE_UNAVAILABLE: 'check-device',
	DECODE_ERROR: 'none',
	TRANSIENT_IO: 'retry',
	SHUTDOWN: 'none',
	INTERNAL: 'retry'
};

export function isRoverErrorCode(value: string): value is RoverErrorCode {
	return Object.prototype.hasOwnProperty.call(ROVER_ERROR_ACTIONS, value);
}

export function recoveryActionForCode(code: string): RoverRecoveryAction {
	return isRoverErrorCode(code) ? ROVER_ERROR_ACTIONS[code] : 'none';
}

export function deviceReasonFromErrno(code: string | undefined): DeviceUnavailableReason {
	switch (code) {
		case 'ENOENT':
		case 'ENODEV':
			return 'not-found';
		case 'EACCES':
		case 'EPERM':
			return 'permission-denied';
		default:
			return 'io-error';
	}
}

export function recoveryActionFor(error: DeviceUnavailableError): RoverRecoveryAction {
	return error.reason === 'permission-denied' ? 'check-permissions' : 'check-device';
}
