import type { MotorActuator } from '../device/motorActuator';
import type { MotorSide } from '../drive/motionTypes';

export interface MockActuatorWrite {
	side: MotorSide;
	value: number;
}

export interface MockMotorActuatorOptions {
	available?: boolean;
	/** Artificial latency applied to every throttle write. */
	writeDelayMs?: number;
	/** Runs before a write is recorded; throwing fails that write. */
	beforeWrite?: (write: MockActuatorWrite) => Promise<void> | void;
}

/**
 * In-memory actuator that records every write. Used by tests and by the
 * runtime's simulation mode.
 */
export class MockMotorActuator implements MotorActuator {
	public readonly available: boolean;
	public readonly description = 'mock';
	public readonly writes: MockActuatorWrite[] = [];
	public stopCalls = 0;
	public opened = false;

	private readonly throttle: Record<MotorSide, number> = { left: 0, right: 0 };
	private readonly writeDelayMs: number;
	private readonly beforeWrite?: (write: MockActuatorWrite) => Promise<void> | void;
	private failingSides = new Set<MotorSide>();

	public constructor(options: MockMotorActuatorOptions = {}) {
		this.available = options.available ?? true;
		this.writeDelayMs = Math.max(0, options.writeDelayMs ?? 0);
		this.beforeWrite = options.beforeWrite;
	}

	public async open(): Promise<void> {
		this.opened = true;
	}

	public async setThrottle(side: MotorSide, value: number): Promise<void> {
		const write = { side, value };
		if (this.writeDelayMs > 0) {
			await new Promise<void>((resolve) => setTimeout(resolve, this.writeDelayMs));
		}
		if (this.beforeWrite) {
			await this.beforeWrite(write);
		}
		if (this.failingSides.has(side)) {
			throw new Error(`Mock ${side} motor write failed.`);
		}
		this.throttle[side] = value;
		this.writes.push(write);
	}

	public async stop(): Promise<void> {
		this.stopCalls += 1;
		this.throttle.left = 0;
		this.throttle.right = 0;
	}

	public async close(): Promise<void> {
		this.opened = false;
	}

	public getThrottle(side: MotorSide): number {
		return this.throttle[side];
	}

	/** Make writes to the given sides throw until cleared. */
	public failWrites(...sides: MotorSide[]): void {
		this.failingSides = new Set(sides);
	}

	public clearFailures(): void {
		this.failingSides.clear();
	}
}
