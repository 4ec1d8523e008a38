import { Logger, NoopLogger } from '../diagnostics/logger';
import { ShutdownError } from '../errors/driveErrors';
import { toErrorMessage } from '../errors/RoverError';

export type BatcherState = 'idle' | 'running' | 'draining' | 'disposed';

/**
 * `flush` applies whatever is still queued before stopping;
 * `discard` settles every pending handle with a ShutdownError.
 */
export type BatcherShutdownMode = 'flush' | 'discard';

export const BATCHER_SHUTDOWN_MODES: readonly BatcherShutdownMode[] = ['flush', 'discard'];

export interface CommandBatcherOptions<TCommand, TResult> {
	apply: (command: TCommand) => Promise<TResult>;
	batchSize?: number;
	batchTimeoutMs?: number;
	logger?: Logger;
}

export interface CommandBatcherStats {
	state: BatcherState;
	queued: number;
	batchesApplied: number;
	failedBatches: number;
	commandsSuperseded: number;
}

interface BatchedCommand<TCommand, TResult> {
	command: TCommand;
	enqueuedAt: number;
	resolve: (value: TResult) => void;
	reject: (reason: unknown) => void;
}

/** Default number of queued commands drained per window. */
export const DEFAULT_BATCH_SIZE = 3;
/** Default batching window (ms). */
export const DEFAULT_BATCH_TIMEOUT_MS = 100;

/**
 * Coalesces bursts of commands: each window drains up to `batchSize`
 * entries, applies only the newest, and settles every handle of the batch
 * with that single outcome.
 */
export class CommandBatcher<TCommand, TResult> {
	private readonly apply: (command: TCommand) => Promise<TResult>;
	private readonly batchSize: number;
	private readonly batchTimeoutMs: number;
	private readonly logger: Logger;
	private readonly queue: BatchedCommand<TCommand, TResult>[] = [];

	private state: BatcherState = 'idle';
	private timer?: NodeJS.Timeout;
	private inFlight?: Promise<void>;
	private batchesApplied = 0;
	private failedBatches = 0;
	private commandsSuperseded = 0;

	public constructor(options: CommandBatcherOptions<TCommand, TResult>) {
		this.apply = options.apply;
		this.batchSize = Math.max(1, Math.floor(options.batchSize ?? DEFAULT_BATCH_SIZE));
		this.batchTimeoutMs = Math.max(1, options.batchTimeoutMs ?? DEFAULT_BATCH_TIMEOUT_MS);
		this.logger = options.logger ?? new NoopLogger();
	}

	public getState(): BatcherState {
		return this.state;
	}

	public getQueueSize(): number {
		return this.queue.length;
	}

	public stats(): CommandBatcherStats {
		return {
			state: this.state,
			queued: this.queue.length,
			batchesApplied: this.batchesApplied,
			failedBatches: this.failedBatches,
			commandsSuperseded: this.commandsSuperseded
		};
	}

	public start(): void {
		if (this.state !== 'idle') {
			return;
		}

		this.state = 'running';
		this.scheduleTick();
		this.logger.debug('Command batcher started', {
			batchSize: this.batchSize,
			batchTimeoutMs: this.batchTimeoutMs
		});
	}

	public enqueue(command: TCommand): Promise<TResult> {
		if (this.state === 'draining' || this.state === 'disposed') {
			return Promise.reject(new ShutdownError('Command batcher is shut down; command was not queued.'));
		}

		return new Promise<TResult>((resolve, reject) => {
			this.queue.push({
				command,
				enqueuedAt: Date.now(),
				resolve,
				reject
			});
			this.logger.trace('Command queued for batching', { queueSize: this.queue.length });
		});
	}

	public async shutdown(mode: BatcherShutdownMode = 'discard'): Promise<void> {
		if (this.state === 'draining' || this.state === 'disposed') {
			return;
		}

		this.state = 'draining';
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = undefined;
		}

		if (this.inFlight) {
			await this.inFlight;
		}

		if (mode === 'flush') {
			while (this.queue.length > 0) {
				await this.drainBatch();
			}
		} else {
			const pending = this.queue.splice(0, this.queue.length);
			for (const entry of pending) {
				entry.reject(new ShutdownError());
			}
			if (pending.length > 0) {
				this.logger.info('Discarded queued commands on shutdown', { discarded: pending.length });
			}
		}

		this.state = 'disposed';
	}

	private scheduleTick(): void {
		if (this.state !== 'running') {
			return;
		}

		this.timer = setTimeout(() => {
			this.timer = undefined;
			void this.tick();
		}, this.batchTimeoutMs);
	}

	private async tick(): Promise<void> {
		if (this.state !== 'running') {
			return;
		}

		await this.drainBatch();
		this.scheduleTick();
	}

	private async drainBatch(): Promise<void> {
		const batch = this.queue.splice(0, this.batchSize);
		if (batch.length === 0) {
			return;
		}

		const latest = batch[batch.length - 1];
		this.commandsSuperseded += batch.length - 1;

		this.inFlight = this.applyBatch(batch, latest);
		try {
			await this.inFlight;
		} finally {
			this.inFlight = undefined;
		}
	}

	private async applyBatch(
		batch: BatchedCommand<TCommand, TResult>[],
		latest: BatchedCommand<TCommand, TResult>
	): Promise<void> {
		try {
			const result = await this.apply(latest.command);
			this.batchesApplied += 1;
			for (const entry of batch) {
				entry.resolve(result);
			}
			this.logger.debug('Command batch applied', {
				size: batch.length,
				waitedMs: Date.now() - batch[0].enqueuedAt
			});
		} catch (error) {
			this.failedBatches += 1;
			for (const entry of batch) {
				entry.reject(error);
			}
			this.logger.warn('Command batch failed', {
				size: batch.length,
				error: toErrorMessage(error)
			});
		}
	}
}
