import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { DeviceUnavailableError, deviceReasonFromErrno } from '../errors/driveErrors';
import { toErrorMessage } from '../errors/RoverError';
import { JOYSTICK_RECORD_SIZE } from '../protocol/joystickRecord';

export const DEFAULT_JOYSTICK_DIR = '/dev/input';
export const DEFAULT_JOYSTICK_PATH = '/dev/input/js0';

/**
 * An open joystick device. Each `read()` returns one raw record (normally
 * 8 bytes) or `undefined` at end of stream.
 */
export interface JoystickDeviceHandle {
	readonly path: string;
	read(): Promise<Uint8Array | undefined>;
	close(): Promise<void>;
}

export type JoystickDeviceOpener = (devicePath: string) => Promise<JoystickDeviceHandle>;

export interface JoystickDeviceInfo {
	path: string;
	name: string;
}

export function errnoCode(error: unknown): string | undefined {
	if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
		return error.code;
	}
	return undefined;
}

function toDeviceError(devicePath: string, error: unknown): DeviceUnavailableError {
	const reason = deviceReasonFromErrno(errnoCode(error));
	const hint = reason === 'permission-denied' ? ' Add the user to the "input" group or adjust udev rules.' : '';
	return new DeviceUnavailableError({
		device: 'joystick',
		reason,
		path: devicePath,
		message: `Cannot open joystick ${devicePath}: ${toErrorMessage(error)}.${hint}`,
		cause: error
	});
}

export const openJoystickDevice: JoystickDeviceOpener = async (devicePath) => {
	let handle: fs.FileHandle;
	try {
		handle = await fs.open(devicePath, 'r');
	} catch (error) {
		throw toDeviceError(devicePath, error);
	}

	return {
		path: devicePath,
		read: async () => {
			const buffer = Buffer.alloc(JOYSTICK_RECORD_SIZE);
			const { bytesRead } = await handle.read(buffer, 0, JOYSTICK_RECORD_SIZE, null);
			if (bytesRead === 0) {
				return undefined;
			}
			return buffer.subarray(0, bytesRead);
		},
		close: async () => {
			await handle.close();
		}
	};
};

/**
 * Lists `js<N>` entries, lowest index first. A missing directory yields an
 * empty list.
 */
export async function listJoystickDevices(dir: string = DEFAULT_JOYSTICK_DIR): Promise<JoystickDeviceInfo[]> {
	let entries: string[];
	try {
		entries = await fs.readdir(dir);
	} catch (error) {
		if (errnoCode(error) === 'ENOENT') {
			return [];
		}
		throw toDeviceError(dir, error);
	}

	return entries
		.filter((name) => /^js\d+$/.test(name))
		.sort((a, b) => Number(a.slice(2)) - Number(b.slice(2)))
		.map((name) => ({ path: path.join(dir, name), name }));
}

export async function detectJoystickDevice(dir: string = DEFAULT_JOYSTICK_DIR): Promise<JoystickDeviceInfo | undefined> {
	const devices = await listJoystickDevices(dir);
	return devices[0];
}
