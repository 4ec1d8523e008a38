import { Logger, NoopLogger } from '../diagnostics/logger';
import type { MotorActuator } from '../device/motorActuator';
import type { MotorSide } from '../drive/motionTypes';
import { DeviceUnavailableError, TransientIOError, deviceReasonFromErrno } from '../errors/driveErrors';
import { toErrorMessage } from '../errors/RoverError';
import { errnoCode } from './joystickDevice';

export interface SerialPortLike {
	open(callback: (error: Error | null) => void): void;
	close(callback: (error: Error | null) => void): void;
	write(data: Buffer, callback: (error: Error | null | undefined) => void): void;
	on(event: 'error' | 'close', listener: (error?: Error) => void): void;
	removeAllListeners(): void;
}

export type SerialPortFactory = (options: { path: string; baudRate: number }) => Promise<SerialPortLike>;

export interface SerialMotorActuatorOptions {
	path: string;
	baudRate?: number;
	portFactory?: SerialPortFactory;
	logger?: Logger;
}

export const DEFAULT_SERIAL_BAUD_RATE = 115_200;

async function createSerialPort(options: { path: string; baudRate: number }): Promise<SerialPortLike> {
	let mod: typeof import('serialport');
	try {
		mod = await import('serialport');
	} catch (error) {
		throw new Error(`Serial motor actuator requires package "serialport". (${toErrorMessage(error)})`);
	}

	const port = new mod.SerialPort({ path: options.path, baudRate: options.baudRate, autoOpen: false });
	return {
		open: (callback) => port.open(callback),
		close: (callback) => port.close(callback),
		write: (data, callback) => {
			port.write(data, callback);
		},
		on: (event, listener) => {
			port.on(event, listener);
		},
		removeAllListeners: () => {
			port.removeAllListeners();
		}
	};
}

function formatThrottle(value: number): string {
	// Avoid "-0.000" for values that round to zero.
	return (Math.abs(value) < 0.0005 ? 0 : value).toFixed(3);
}

export function formatThrottleLine(left: number, right: number): string {
	return `T ${formatThrottle(left)} ${formatThrottle(right)}\n`;
}

export const STOP_LINE = 'S\n';

/**
 * Motor controller on a serial line. Every throttle change sends both sides
 * as `T <left> <right>`; `S` stops both motors.
 */
export class SerialMotorActuator implements MotorActuator {
	public readonly description: string;

	private readonly portPath: string;
	private readonly baudRate: number;
	private readonly portFactory: SerialPortFactory;
	private readonly logger: Logger;
	private readonly throttle: Record<MotorSide, number> = { left: 0, right: 0 };

	private port?: SerialPortLike;
	private opened = false;
	private closing = false;

	public constructor(options: SerialMotorActuatorOptions) {
		this.portPath = options.path;
		this.baudRate = options.baudRate ?? DEFAULT_SERIAL_BAUD_RATE;
		this.portFactory = options.portFactory ?? createSerialPort;
		this.logger = options.logger ?? new NoopLogger();
		this.description = `serial:${this.portPath}`;
	}

	public get available(): boolean {
		return this.opened;
	}

	public async open(): Promise<void> {
		if (this.opened) {
			return;
		}
		if (!this.portPath) {
			throw new DeviceUnavailableError({
				device: 'actuator',
				reason: 'not-found',
				message: 'Serial motor actuator requires a non-empty port path (for example /dev/ttyUSB0).'
			});
		}

		let port: SerialPortLike;
		try {
			port = await this.portFactory({ path: this.portPath, baudRate: this.baudRate });
			await new Promise<void>((resolve, reject) => {
				port.open((error) => {
					if (error) {
						reject(error);
						return;
					}
					resolve();
				});
			});
		} catch (error) {
			throw new DeviceUnavailableError({
				device: 'actuator',
				reason: deviceReasonFromErrno(errnoCode(error)),
				path: this.portPath,
				message: `Cannot open motor controller on ${this.portPath}: ${toErrorMessage(error)}`,
				cause: error
			});
		}

		this.port = port;
		this.opened = true;
		port.on('error', (error) => this.handleFailure(error ?? new Error('Serial port error.')));
		port.on('close', () => this.handleFailure(new Error('Serial port closed.')));
		this.logger.info('Motor controller connected', { path: this.portPath, baudRate: this.baudRate });
	}

	public async setThrottle(side: MotorSide, value: number): Promise<void> {
		this.throttle[side] = value;
		await this.writeLine(formatThrottleLine(this.throttle.left, this.throttle.right));
	}

	public async stop(): Promise<void> {
		this.throttle.left = 0;
		this.throttle.right = 0;
		if (!this.opened) {
			return;
		}
		await this.writeLine(STOP_LINE);
	}

	public async close(): Promise<void> {
		this.opened = false;
		this.closing = true;

		const port = this.port;
		this.port = undefined;
		if (!port) {
			this.closing = false;
			return;
		}

		await new Promise<void>((resolve) => {
			port.close((error) => {
				if (error) {
					this.logger.debug('Serial port close reported an error', { error: error.message });
				}
				resolve();
			});
		});
		port.removeAllListeners();
		this.closing = false;
	}

	private writeLine(line: string): Promise<void> {
		const port = this.port;
		if (!port || !this.opened) {
			return Promise.reject(new TransientIOError('serial.write', 'Motor controller serial port is not open.'));
		}

		return new Promise<void>((resolve, reject) => {
			port.write(Buffer.from(line, 'ascii'), (error) => {
				if (error) {
					reject(new TransientIOError('serial.write', `Motor controller write failed: ${error.message}`, error));
					return;
				}
				resolve();
			});
		});
	}

	private handleFailure(error: Error): void {
		if (this.closing) {
			return;
		}
		if (this.opened) {
			this.logger.warn('Motor controller link lost; continuing without hardware', { error: error.message });
		}
		this.opened = false;
	}
}
