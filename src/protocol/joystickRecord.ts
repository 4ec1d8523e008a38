import { DecodeError } from '../errors/driveErrors';

/** Size of one Linux joystick API record: u32 time, i16 value, u8 type, u8 number. */
export const JOYSTICK_RECORD_SIZE = 8;

export const JS_EVENT_BUTTON = 0x01;
export const JS_EVENT_AXIS = 0x02;
export const JS_EVENT_INIT = 0x80;

/** Largest magnitude of a raw axis value. */
export const JOYSTICK_AXIS_MAX = 32767;

export type JoystickEventKind = 'axis' | 'button' | 'init';

export interface JoystickRecord {
	/** Driver timestamp in milliseconds (wraps at 2^32). */
	timestamp: number;
	value: number;
	type: number;
	index: number;
}

export function decodeJoystickRecord(bytes: Uint8Array): JoystickRecord {
	if (bytes.length !== JOYSTICK_RECORD_SIZE) {
		throw new DecodeError(
			`Joystick record must be ${JOYSTICK_RECORD_SIZE} bytes, got ${bytes.length}.`,
			bytes.length
		);
	}

	const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
	return {
		timestamp: view.getUint32(0, true),
		value: view.getInt16(4, true),
		type: view.getUint8(6),
		index: view.getUint8(7)
	};
}

export function encodeJoystickRecord(record: JoystickRecord): Uint8Array {
	const bytes = new Uint8Array(JOYSTICK_RECORD_SIZE);
	const view = new DataView(bytes.buffer);
	view.setUint32(0, record.timestamp >>> 0, true);
	view.setInt16(4, record.value, true);
	view.setUint8(6, record.type);
	view.setUint8(7, record.index);
	return bytes;
}

/**
 * Init-flagged records are reported as `init` whatever their base type;
 * `undefined` means the type carries neither the button nor the axis bit.
 */
export function classifyJoystickType(type: number): JoystickEventKind | undefined {
	if ((type & JS_EVENT_INIT) !== 0) {
		return 'init';
	}
	if ((type & JS_EVENT_BUTTON) !== 0) {
		return 'button';
	}
	if ((type & JS_EVENT_AXIS) !== 0) {
		return 'axis';
	}
	return undefined;
}
