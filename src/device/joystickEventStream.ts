import { Logger, NoopLogger } from '../diagnostics/logger';
import { DecodeError, DeviceUnavailableError, TransientIOError, deviceReasonFromErrno } from '../errors/driveErrors';
import { toErrorMessage } from '../errors/RoverError';
import {
	JOYSTICK_AXIS_MAX,
	JoystickEventKind,
	JoystickRecord,
	classifyJoystickType,
	decodeJoystickRecord
} from '../protocol/joystickRecord';
import {
	DEFAULT_JOYSTICK_PATH,
	JoystickDeviceHandle,
	JoystickDeviceOpener,
	errnoCode,
	openJoystickDevice
} from '../transport/joystickDevice';

export interface JoystickEvent {
	timestamp: number;
	kind: JoystickEventKind;
	index: number;
	rawValue: number;
	rawType: number;
	/** Axis: dead-zoned, scaled and clamped to [-1, 1]. Button/init: the raw value. */
	normalizedValue: number;
}

export type JoystickEventHandler = (event: JoystickEvent) => void;

export type JoystickStreamState = 'closed' | 'reading';

export interface JoystickEventStreamOptions {
	devicePath?: string;
	opener?: JoystickDeviceOpener;
	deadzone?: number;
	axisScale?: number;
	emitInitEvents?: boolean;
	logger?: Logger;
}

export interface JoystickStreamStats {
	state: JoystickStreamState;
	devicePath: string;
	eventCount: number;
	decodeErrors: number;
	skipped: number;
	handlerErrors: number;
	deadzone: number;
	axisScale: number;
	emitInitEvents: boolean;
}

export const DEFAULT_DEADZONE = 0.1;
export const DEFAULT_AXIS_SCALE = 1;

export function normalizeAxisValue(rawValue: number, deadzone: number, axisScale: number): number {
	let value = rawValue / JOYSTICK_AXIS_MAX;
	if (Math.abs(value) < deadzone) {
		value = 0;
	}
	value *= axisScale;
	return Math.max(-1, Math.min(1, value)) + 0;
}

/**
 * Reads records from a Linux joystick device, decodes them into events and
 * dispatches them to per-kind handlers before returning them to the caller.
 */
export class JoystickEventStream {
	private readonly devicePath: string;
	private readonly opener: JoystickDeviceOpener;
	private readonly deadzone: number;
	private readonly axisScale: number;
	private readonly emitInitEvents: boolean;
	private readonly logger: Logger;
	private readonly handlers = new Map<JoystickEventKind, JoystickEventHandler[]>();

	private state: JoystickStreamState = 'closed';
	private device?: JoystickDeviceHandle;
	private stopSignal?: Promise<undefined>;
	private resolveStop?: () => void;
	private eventCount = 0;
	private decodeErrors = 0;
	private skipped = 0;
	private handlerErrors = 0;

	public constructor(options: JoystickEventStreamOptions = {}) {
		this.devicePath = options.devicePath ?? DEFAULT_JOYSTICK_PATH;
		this.opener = options.opener ?? openJoystickDevice;
		this.deadzone = Math.min(1, Math.max(0, options.deadzone ?? DEFAULT_DEADZONE));
		this.axisScale = options.axisScale ?? DEFAULT_AXIS_SCALE;
		this.emitInitEvents = options.emitInitEvents ?? false;
		this.logger = options.logger ?? new NoopLogger();
	}

	public getState(): JoystickStreamState {
		return this.state;
	}

	public async start(): Promise<void> {
		if (this.state === 'reading') {
			return;
		}

		let device: JoystickDeviceHandle;
		try {
			device = await this.opener(this.devicePath);
		} catch (error) {
			if (error instanceof DeviceUnavailableError) {
				throw error;
			}
			throw new DeviceUnavailableError({
				device: 'joystick',
				reason: deviceReasonFromErrno(errnoCode(error)),
				path: this.devicePath,
				message: `Cannot open joystick ${this.devicePath}: ${toErrorMessage(error)}`,
				cause: error
			});
		}

		this.device = device;
		this.stopSignal = new Promise<undefined>((resolve) => {
			this.resolveStop = () => resolve(undefined);
		});
		this.state = 'reading';
		this.logger.info('Joystick stream started', { devicePath: this.devicePath });
	}

	public async readNext(): Promise<JoystickEvent | undefined> {
		while (this.state === 'reading' && this.device && this.stopSignal) {
			const device = this.device;
			let raw: Uint8Array | undefined;
			try {
				raw = await Promise.race([device.read(), this.stopSignal]);
			} catch (error) {
				if (this.state !== 'reading') {
					return undefined;
				}
				this.stop();
				throw new TransientIOError('joystick.read', `Joystick read failed: ${toErrorMessage(error)}`, error);
			}

			if (this.state !== 'reading') {
				return undefined;
			}
			if (raw === undefined) {
				this.logger.info('Joystick device reached end of stream', { devicePath: this.devicePath });
				this.stop();
				return undefined;
			}

			const event = this.decode(raw);
			if (!event) {
				continue;
			}

			this.eventCount += 1;
			this.dispatch(event);
			return event;
		}

		return undefined;
	}

	public async *events(): AsyncGenerator<JoystickEvent> {
		while (true) {
			const event = await this.readNext();
			if (!event) {
				return;
			}
			yield event;
		}
	}

	public on(kind: JoystickEventKind, handler: JoystickEventHandler): () => void {
		const list = this.handlers.get(kind) ?? [];
		list.push(handler);
		this.handlers.set(kind, list);
		return () => {
			this.off(kind, handler);
		};
	}

	public off(kind: JoystickEventKind, handler: JoystickEventHandler): boolean {
		const list = this.handlers.get(kind);
		if (!list) {
			return false;
		}
		const index = list.indexOf(handler);
		if (index < 0) {
			return false;
		}
		list.splice(index, 1);
		return true;
	}

	/**
	 * Ends reading at once. A pending `readNext()` resolves `undefined`; the
	 * device handle closes in the background.
	 */
	public stop(): void {
		if (this.state === 'closed') {
			return;
		}

		this.state = 'closed';
		this.resolveStop?.();
		this.resolveStop = undefined;
		this.stopSignal = undefined;

		const device = this.device;
		this.device = undefined;
		if (device) {
			void this.closeDevice(device);
		}
		this.logger.info('Joystick stream stopped', { events: this.eventCount, decodeErrors: this.decodeErrors });
	}

	public getStats(): JoystickStreamStats {
		return {
			state: this.state,
			devicePath: this.devicePath,
			eventCount: this.eventCount,
			decodeErrors: this.decodeErrors,
			skipped: this.skipped,
			handlerErrors: this.handlerErrors,
			deadzone: this.deadzone,
			axisScale: this.axisScale,
			emitInitEvents: this.emitInitEvents
		};
	}

	private decode(raw: Uint8Array): JoystickEvent | undefined {
		let record: JoystickRecord;
		try {
			record = decodeJoystickRecord(raw);
		} catch (error) {
			if (error instanceof DecodeError) {
				this.decodeErrors += 1;
				this.logger.debug('Skipping malformed joystick record', { byteLength: error.byteLength });
				return undefined;
			}
			throw error;
		}

		const kind = classifyJoystickType(record.type);
		if (!kind || (kind === 'init' && !this.emitInitEvents)) {
			this.skipped += 1;
			return undefined;
		}

		return {
			timestamp: record.timestamp,
			kind,
			index: record.index,
			rawValue: record.value,
			rawType: record.type,
			normalizedValue: kind === 'axis' ? normalizeAxisValue(record.value, this.deadzone, this.axisScale) : record.value
		};
	}

	private dispatch(event: JoystickEvent): void {
		const list = this.handlers.get(event.kind);
		if (!list) {
			return;
		}
		for (const handler of [...list]) {
			try {
				handler(event);
			} catch (error) {
				this.handlerErrors += 1;
				this.logger.warn('Joystick handler failed', { kind: event.kind, error: toErrorMessage(error) });
			}
		}
	}

	private async closeDevice(device: JoystickDeviceHandle): Promise<void> {
		try {
			await device.close();
		} catch (error) {
			this.logger.debug('Joystick device close failed', { error: toErrorMessage(error) });
		}
	}
}
