import { Logger, NoopLogger } from '../diagnostics/logger';
import { toErrorMessage } from '../errors/RoverError';
import type { FrameBuffer } from './frameBuffer';
import type { FrameCache } from './frameCache';

/**
 * Pull-based camera binding. Resolves `undefined` at end of stream; sources
 * must settle promptly once `signal` aborts.
 */
export interface FrameSource {
	readonly description: string;
	readFrame(signal: AbortSignal): Promise<Uint8Array | undefined>;
	close?(): Promise<void>;
}

export interface FrameRetryPolicy {
	initialBackoffMs: number;
	backoffFactor: number;
	maxBackoffMs: number;
}

export type FramePumpState = 'idle' | 'running' | 'ended' | 'stopped';

export interface FramePumpOptions {
	source: FrameSource;
	buffer: FrameBuffer;
	cache?: FrameCache;
	/** How long the cache filler waits for a frame before polling again. */
	cacheWaitMs?: number;
	retry?: Partial<FrameRetryPolicy>;
	logger?: Logger;
}

export interface FramePumpStats {
	state: FramePumpState;
	framesRead: number;
	readErrors: number;
	consecutiveErrors: number;
	framesCached: number;
}

const DEFAULT_RETRY_POLICY: FrameRetryPolicy = {
	initialBackoffMs: 100,
	backoffFactor: 2,
	maxBackoffMs: 5000
};

const DEFAULT_CACHE_WAIT_MS = 1000;

export function computeRetryDelay(policy: FrameRetryPolicy, attempt: number): number {
	const scaled = policy.initialBackoffMs * Math.pow(policy.backoffFactor, attempt);
	const bounded = Math.min(policy.maxBackoffMs, scaled);
	return Math.max(0, Math.floor(bounded));
}

function abortableDelay(ms: number, signal: AbortSignal): Promise<void> {
	if (ms <= 0 || signal.aborted) {
		return Promise.resolve();
	}
	return new Promise<void>((resolve) => {
		const onAbort = (): void => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal.removeEventListener('abort', onAbort);
			resolve();
		}, ms);
		signal.addEventListener('abort', onAbort, { once: true });
	});
}

/**
 * Moves frames from a source into the frame buffer, retrying read failures
 * with exponential backoff, and samples the buffer into the frame cache.
 */
export class FramePump {
	private readonly source: FrameSource;
	private readonly buffer: FrameBuffer;
	private readonly cache?: FrameCache;
	private readonly cacheWaitMs: number;
	private readonly retry: FrameRetryPolicy;
	private readonly logger: Logger;
	private readonly controller = new AbortController();

	private state: FramePumpState = 'idle';
	private pumpLoop?: Promise<void>;
	private cacheLoop?: Promise<void>;
	private framesRead = 0;
	private readErrors = 0;
	private consecutiveErrors = 0;
	private framesCached = 0;

	public constructor(options: FramePumpOptions) {
		this.source = options.source;
		this.buffer = options.buffer;
		this.cache = options.cache;
		this.cacheWaitMs = Math.max(1, options.cacheWaitMs ?? DEFAULT_CACHE_WAIT_MS);
		const initialBackoffMs = Math.max(0, options.retry?.initialBackoffMs ?? DEFAULT_RETRY_POLICY.initialBackoffMs);
		this.retry = {
			initialBackoffMs,
			backoffFactor: Math.max(1, options.retry?.backoffFactor ?? DEFAULT_RETRY_POLICY.backoffFactor),
			maxBackoffMs: Math.max(initialBackoffMs, options.retry?.maxBackoffMs ?? DEFAULT_RETRY_POLICY.maxBackoffMs)
		};
		this.logger = options.logger ?? new NoopLogger();
	}

	public start(): void {
		if (this.state !== 'idle') {
			return;
		}

		this.state = 'running';
		this.logger.info('Frame pump started', { source: this.source.description });
		this.pumpLoop = this.pump();
		if (this.cache) {
			this.cacheLoop = this.fillCache(this.cache);
		}
	}

	public async stop(): Promise<void> {
		if (this.state === 'stopped') {
			return;
		}

		this.state = 'stopped';
		this.controller.abort();
		await Promise.all([this.pumpLoop, this.cacheLoop]);

		if (this.source.close) {
			try {
				await this.source.close();
			} catch (error) {
				this.logger.warn('Frame source close failed', { error: toErrorMessage(error) });
			}
		}
	}

	public stats(): FramePumpStats {
		return {
			state: this.state,
			framesRead: this.framesRead,
			readErrors: this.readErrors,
			consecutiveErrors: this.consecutiveErrors,
			framesCached: this.framesCached
		};
	}

	private async pump(): Promise<void> {
		const signal = this.controller.signal;
		while (!signal.aborted && !this.buffer.isClosed()) {
			try {
				const data = await this.source.readFrame(signal);
				if (signal.aborted) {
					break;
				}
				if (data === undefined) {
					this.logger.info('Frame source reached end of stream');
					if (this.state === 'running') {
						this.state = 'ended';
					}
					break;
				}
				this.buffer.publish(data);
				this.framesRead += 1;
				this.consecutiveErrors = 0;
			} catch (error) {
				if (signal.aborted || this.buffer.isClosed()) {
					break;
				}
				const delayMs = computeRetryDelay(this.retry, this.consecutiveErrors);
				this.readErrors += 1;
				this.consecutiveErrors += 1;
				this.logger.warn('Frame read failed, retrying', {
					error: toErrorMessage(error),
					attempt: this.consecutiveErrors,
					delayMs
				});
				await abortableDelay(delayMs, signal);
			}
		}
	}

	private async fillCache(cache: FrameCache): Promise<void> {
		const signal = this.controller.signal;
		const reader = this.buffer.createReader();
		while (!signal.aborted) {
			const result = await reader.next(this.cacheWaitMs, signal);
			if (result.status === 'closed') {
				break;
			}
			if (result.status === 'frame') {
				cache.record(result.frame);
				this.framesCached += 1;
			}
		}
	}
}
