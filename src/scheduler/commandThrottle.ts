import { performance } from 'node:perf_hooks';
import { Logger, NoopLogger } from '../diagnostics/logger';

export interface CommandThrottleOptions {
	minIntervalMs?: number;
	/** Monotonic clock in milliseconds. */
	now?: () => number;
	sleep?: (ms: number) => Promise<void>;
	logger?: Logger;
}

export interface CommandThrottleStats {
	accepted: number;
	delayed: number;
	pending: number;
	minIntervalMs: number;
}

/** Default spacing between actuator writes (ms). */
export const DEFAULT_MIN_INTERVAL_MS = 50;

function defaultSleep(ms: number): Promise<void> {
	return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Rate limiter in front of the actuator. Calls that arrive inside the
 * interval are delayed, not rejected, and run strictly in arrival order.
 */
export class CommandThrottle {
	private readonly minIntervalMs: number;
	private readonly now: () => number;
	private readonly sleep: (ms: number) => Promise<void>;
	private readonly logger: Logger;

	private tail: Promise<void> = Promise.resolve();
	private lastAcceptedAt?: number;
	private accepted = 0;
	private delayed = 0;
	private pending = 0;

	public constructor(options: CommandThrottleOptions = {}) {
		this.minIntervalMs = Math.max(0, options.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS);
		this.now = options.now ?? (() => performance.now());
		this.sleep = options.sleep ?? defaultSleep;
		this.logger = options.logger ?? new NoopLogger();
	}

	public run<T>(send: () => Promise<T>): Promise<T> {
		this.pending += 1;
		const result = this.tail.then(async () => {
			await this.waitForSlot();
			this.lastAcceptedAt = this.now();
			this.accepted += 1;
			return send();
		});

		// The chain only orders callers; each caller still sees its own outcome.
		this.tail = result.then(
			() => undefined,
			() => undefined
		);

		return result.finally(() => {
			this.pending -= 1;
		});
	}

	public getStats(): CommandThrottleStats {
		return {
			accepted: this.accepted,
			delayed: this.delayed,
			pending: this.pending,
			minIntervalMs: this.minIntervalMs
		};
	}

	private async waitForSlot(): Promise<void> {
		if (this.lastAcceptedAt === undefined || this.minIntervalMs === 0) {
			return;
		}

		const waitMs = this.lastAcceptedAt + this.minIntervalMs - this.now();
		if (waitMs <= 0) {
			return;
		}

		this.delayed += 1;
		this.logger.trace('Throttling actuator command', { waitMs: Number(waitMs.toFixed(1)) });
		await this.sleep(waitMs);
	}
}
