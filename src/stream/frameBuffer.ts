import { TransientIOError } from '../errors/driveErrors';

export interface Frame {
	readonly sequence: number;
	/** Wall-clock capture time (ms since epoch). */
	readonly capturedAt: number;
	readonly data: Uint8Array;
}

export type FrameWaitResult =
	| { status: 'frame'; frame: Frame }
	| { status: 'timeout' }
	| { status: 'closed' };

export interface FrameBufferStats {
	published: number;
	overwrittenUnread: number;
	waiters: number;
	latestSequence: number;
	closed: boolean;
}

export interface FrameReader {
	/** Highest sequence this reader has returned, 0 before the first frame. */
	readonly lastSequence: number;
	next(timeoutMs: number, signal?: AbortSignal): Promise<FrameWaitResult>;
}

interface FrameWaiter {
	afterSequence: number;
	settle: (result: FrameWaitResult) => void;
}

/**
 * Single-slot, latest-wins hand-off between one producer and any number of
 * consumers. Publishing never blocks; consumers always see the newest frame.
 */
export class FrameBuffer {
	private slot?: Frame;
	private slotTaken = false;
	private sequence = 0;
	private published = 0;
	private overwrittenUnread = 0;
	private closed = false;
	private readonly waiters = new Set<FrameWaiter>();

	public publish(data: Uint8Array, capturedAt: number = Date.now()): Frame {
		if (this.closed) {
			throw new TransientIOError('publish', 'FRAME_BUFFER_CLOSED: frame buffer is closed.');
		}

		if (this.slot && !this.slotTaken) {
			this.overwrittenUnread += 1;
		}

		this.sequence += 1;
		const frame: Frame = Object.freeze({
			sequence: this.sequence,
			capturedAt,
			data: Uint8Array.from(data)
		});
		this.slot = frame;
		this.slotTaken = false;
		this.published += 1;

		for (const waiter of [...this.waiters]) {
			if (frame.sequence > waiter.afterSequence) {
				this.slotTaken = true;
				waiter.settle({ status: 'frame', frame });
			}
		}

		return frame;
	}

	public latest(): Frame | undefined {
		return this.slot;
	}

	public isClosed(): boolean {
		return this.closed;
	}

	public awaitFrame(afterSequence: number, timeoutMs: number, signal?: AbortSignal): Promise<FrameWaitResult> {
		if (this.closed || signal?.aborted) {
			return Promise.resolve({ status: 'closed' });
		}
		if (this.slot && this.slot.sequence > afterSequence) {
			this.slotTaken = true;
			return Promise.resolve({ status: 'frame', frame: this.slot });
		}

		return new Promise<FrameWaitResult>((resolve) => {
			let timer: NodeJS.Timeout | undefined;
			const waiter: FrameWaiter = {
				afterSequence,
				settle: (result) => {
					if (!this.waiters.delete(waiter)) {
						return;
					}
					if (timer) {
						clearTimeout(timer);
					}
					signal?.removeEventListener('abort', onAbort);
					resolve(result);
				}
			};
			const onAbort = (): void => {
				waiter.settle({ status: 'closed' });
			};

			this.waiters.add(waiter);
			timer = setTimeout(() => {
				waiter.settle({ status: 'timeout' });
			}, Math.max(0, timeoutMs));
			signal?.addEventListener('abort', onAbort, { once: true });
		});
	}

	public createReader(): FrameReader {
		let lastSequence = 0;
		return {
			get lastSequence(): number {
				return lastSequence;
			},
			next: async (timeoutMs: number, signal?: AbortSignal): Promise<FrameWaitResult> => {
				const result = await this.awaitFrame(lastSequence, timeoutMs, signal);
				if (result.status === 'frame') {
					lastSequence = result.frame.sequence;
				}
				return result;
			}
		};
	}

	/** Wakes every blocked consumer with `closed`; later waits also return `closed`. */
	public close(): void {
		if (this.closed) {
			return;
		}

		this.closed = true;
		for (const waiter of [...this.waiters]) {
			waiter.settle({ status: 'closed' });
		}
	}

	public stats(): FrameBufferStats {
		return {
			published: this.published,
			overwrittenUnread: this.overwrittenUnread,
			waiters: this.waiters.size,
			latestSequence: this.sequence,
			closed: this.closed
		};
	}
}
