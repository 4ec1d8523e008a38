import type { MotorSide } from '../drive/motionTypes';

/**
 * Per-side throttle sink. Values are already calibrated and clamped to [-1, 1].
 * Only the robot controller writes to an actuator.
 */
export interface MotorActuator {
	/** `false` means no hardware: the controller runs in dummy mode. */
	readonly available: boolean;
	readonly description: string;
	open(): Promise<void>;
	setThrottle(side: MotorSide, value: number): Promise<void>;
	/** Zero both sides. Called unconditionally on shutdown. */
	stop(): Promise<void>;
	close(): Promise<void>;
}

/**
 * Stand-in used when no motor hardware is present.
 */
export class NullMotorActuator implements MotorActuator {
	public readonly available = false;
	public readonly description: string;

	public constructor(description = 'dummy') {
		this.description = description;
	}

	public async open(): Promise<void> {
		return;
	}

	public async setThrottle(_side: MotorSide, _value: number): Promise<void> {
		return;
	}

	public async stop(): Promise<void> {
		return;
	}

	public async close(): Promise<void> {
		return;
	}
}
