import { Logger, NoopLogger } from '../diagnostics/logger';
import { toErrorMessage } from '../errors/RoverError';
import type { RobotController } from '../drive/robotController';
import type { JoystickEvent, JoystickEventStream } from './joystickEventStream';

export type DriveTarget = Pick<RobotController, 'execute' | 'emergencyStop'>;

export interface JoystickDriveOptions {
	stream: JoystickEventStream;
	target: DriveTarget;
	throttleAxis?: number;
	steeringAxis?: number;
	stopButton?: number;
	/** Called with the stick and button state after input changes. */
	onState?: (state: JoystickDriveState) => void;
	/** Minimum spacing between axis-driven `onState` calls; button changes are never held back. */
	stateIntervalMs?: number;
	now?: () => number;
	logger?: Logger;
}

export interface JoystickDriveState {
	connected: boolean;
	axes: { x: number; y: number };
	/** Button index to pressed; only buttons seen since attach. */
	buttons: Record<number, boolean>;
}

export interface JoystickDriveStats {
	axes: { x: number; y: number };
	submitted: number;
	coalesced: number;
	failures: number;
	emergencyStops: number;
}

export const DEFAULT_THROTTLE_AXIS = 1;
export const DEFAULT_STEERING_AXIS = 0;
export const DEFAULT_STOP_BUTTON = 0;
export const DEFAULT_STATE_INTERVAL_MS = 5;

/**
 * Turns stick movement into real-time steer commands. While one submission
 * is in flight only the newest axis state is kept; intermediate positions
 * are dropped.
 */
export class JoystickDrive {
	private readonly stream: JoystickEventStream;
	private readonly target: DriveTarget;
	private readonly throttleAxis: number;
	private readonly steeringAxis: number;
	private readonly stopButton: number;
	private readonly onState?: (state: JoystickDriveState) => void;
	private readonly stateIntervalMs: number;
	private readonly now: () => number;
	private readonly logger: Logger;

	private readonly axes = { x: 0, y: 0 };
	private readonly buttons = new Map<number, boolean>();
	private lastStateAt?: number;
	private stateTimer?: NodeJS.Timeout;
	private unsubscribers: Array<() => void> = [];
	private dirty = false;
	private flushing?: Promise<void>;
	private submitted = 0;
	private coalesced = 0;
	private failures = 0;
	private emergencyStops = 0;

	public constructor(options: JoystickDriveOptions) {
		this.stream = options.stream;
		this.target = options.target;
		this.throttleAxis = options.throttleAxis ?? DEFAULT_THROTTLE_AXIS;
		this.steeringAxis = options.steeringAxis ?? DEFAULT_STEERING_AXIS;
		this.stopButton = options.stopButton ?? DEFAULT_STOP_BUTTON;
		this.onState = options.onState;
		this.stateIntervalMs = Math.max(0, options.stateIntervalMs ?? DEFAULT_STATE_INTERVAL_MS);
		this.now = options.now ?? Date.now;
		this.logger = options.logger ?? new NoopLogger();
	}

	public attach(): void {
		if (this.unsubscribers.length > 0) {
			return;
		}
		this.unsubscribers = [
			this.stream.on('axis', (event) => this.handleAxis(event)),
			this.stream.on('button', (event) => this.handleButton(event))
		];
	}

	public detach(): void {
		for (const unsubscribe of this.unsubscribers) {
			unsubscribe();
		}
		this.unsubscribers = [];
		this.dirty = false;
		this.cancelStateTimer();
	}

	/** Resolves once no submission is in flight. */
	public async whenIdle(): Promise<void> {
		while (this.flushing) {
			await this.flushing;
		}
	}

	public getStats(): JoystickDriveStats {
		return {
			axes: { ...this.axes },
			submitted: this.submitted,
			coalesced: this.coalesced,
			failures: this.failures,
			emergencyStops: this.emergencyStops
		};
	}

	public getState(): JoystickDriveState {
		return {
			connected: this.stream.getStats().state === 'reading',
			axes: { ...this.axes },
			buttons: Object.fromEntries(this.buttons)
		};
	}

	private handleAxis(event: JoystickEvent): void {
		if (event.index === this.steeringAxis) {
			this.axes.x = event.normalizedValue;
		} else if (event.index === this.throttleAxis) {
			this.axes.y = event.normalizedValue;
		} else {
			return;
		}

		this.publishState(false);
		if (this.dirty) {
			this.coalesced += 1;
		}
		this.dirty = true;
		if (!this.flushing) {
			this.flushing = this.flush().finally(() => {
				this.flushing = undefined;
			});
		}
	}

	private handleButton(event: JoystickEvent): void {
		const pressed = event.rawValue === 1;
		if (this.buttons.get(event.index) !== pressed) {
			this.buttons.set(event.index, pressed);
			this.publishState(true);
		}
		if (event.index !== this.stopButton || !pressed) {
			return;
		}

		this.dirty = false;
		this.emergencyStops += 1;
		this.logger.info('Joystick stop button pressed');
		void this.triggerEmergencyStop();
	}

	/**
	 * Axis updates inside the interval are held back; the newest one goes out
	 * when the interval ends.
	 */
	private publishState(immediate: boolean): void {
		if (!this.onState) {
			return;
		}
		const elapsed = this.lastStateAt === undefined ? Number.POSITIVE_INFINITY : this.now() - this.lastStateAt;
		if (immediate || elapsed >= this.stateIntervalMs) {
			this.emitState();
			return;
		}
		if (!this.stateTimer) {
			this.stateTimer = setTimeout(() => {
				this.stateTimer = undefined;
				this.emitState();
			}, this.stateIntervalMs - elapsed);
		}
	}

	private emitState(): void {
		this.cancelStateTimer();
		this.lastStateAt = this.now();
		try {
			this.onState?.(this.getState());
		} catch (error) {
			this.logger.warn('Joystick state listener failed', { error: toErrorMessage(error) });
		}
	}

	private cancelStateTimer(): void {
		if (this.stateTimer) {
			clearTimeout(this.stateTimer);
			this.stateTimer = undefined;
		}
	}

	private async flush(): Promise<void> {
		while (this.dirty) {
			this.dirty = false;
			// Pushing the stick forward reports a negative value.
			const speed = -this.axes.y;
			const direction = this.axes.x;
			try {
				await this.target.execute({ kind: 'steer', speed, direction });
				this.submitted += 1;
			} catch (error) {
				this.failures += 1;
				this.logger.warn('Joystick steer command failed', { error: toErrorMessage(error) });
			}
		}
	}

	private async triggerEmergencyStop(): Promise<void> {
		const result = await this.target.emergencyStop();
		if (result.errors.length > 0) {
			this.logger.error('Joystick emergency stop reported actuator errors', { errors: result.errors });
		}
	}
}
