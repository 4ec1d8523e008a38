import * as fs from 'node:fs';
import type { Readable } from 'node:stream';
import { TransientIOError } from '../errors/driveErrors';
import { toErrorMessage } from '../errors/RoverError';
import type { FrameSource } from './framePump';

const SOI = Buffer.from([0xff, 0xd8]);
const EOI = Buffer.from([0xff, 0xd9]);

export const DEFAULT_MAX_FRAME_BYTES = 4 * 1024 * 1024;

export interface JpegStreamSourceOptions {
	/** Opens the byte stream. Called lazily, and again after a stream error when `reopen` holds. */
	open: () => Readable;
	description: string;
	maxFrameBytes?: number;
	/** Default true. A source that cannot reopen reports end of stream after its first failure. */
	reopen?: boolean;
}

/**
 * Splits a concatenated MJPEG byte stream (camera tool stdout, a FIFO) into
 * individual JPEG images at the start/end-of-image markers. Bytes outside a
 * marker pair are discarded.
 */
export class JpegStreamSource implements FrameSource {
	public readonly description: string;

	private readonly open: () => Readable;
	private readonly reopen: boolean;
	private readonly maxFrameBytes: number;
	private stream?: Readable;
	private iterator?: AsyncIterator<unknown>;
	private pending: Buffer = Buffer.alloc(0);
	private failed = false;
	private closed = false;

	public constructor(options: JpegStreamSourceOptions) {
		this.open = options.open;
		this.description = options.description;
		this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
		this.reopen = options.reopen ?? true;
	}

	public async readFrame(signal: AbortSignal): Promise<Uint8Array | undefined> {
		while (!signal.aborted) {
			const frame = this.extractFrame();
			if (frame) {
				return frame;
			}
			if (this.pending.length > this.maxFrameBytes) {
				this.pending = Buffer.alloc(0);
				throw new TransientIOError('frame.read', `No end-of-image marker within ${this.maxFrameBytes} bytes.`);
			}

			const iterator = this.currentIterator();
			if (!iterator) {
				return undefined;
			}
			let next: IteratorResult<unknown> | undefined;
			try {
				next = await raceAbort(iterator.next(), signal);
			} catch (error) {
				// The next read opens a fresh stream (when allowed).
				this.discardStream();
				throw new TransientIOError('frame.read', `Frame stream failed: ${toErrorMessage(error)}`, error);
			}
			if (!next || next.done) {
				return undefined;
			}
			const chunk = next.value;
			if (Buffer.isBuffer(chunk)) {
				this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
			}
		}
		return undefined;
	}

	public async close(): Promise<void> {
		this.closed = true;
		this.stream?.destroy();
	}

	private currentIterator(): AsyncIterator<unknown> | undefined {
		if (this.iterator) {
			return this.iterator;
		}
		if (this.closed || (this.failed && !this.reopen)) {
			return undefined;
		}
		this.stream = this.open();
		this.iterator = this.stream[Symbol.asyncIterator]();
		return this.iterator;
	}

	private discardStream(): void {
		this.stream?.destroy();
		this.stream = undefined;
		this.iterator = undefined;
		this.pending = Buffer.alloc(0);
		this.failed = true;
	}

	private extractFrame(): Uint8Array | undefined {
		const start = this.pending.indexOf(SOI);
		if (start < 0) {
			// Keep a trailing 0xff in case the marker straddles two chunks.
			this.pending = this.pending.subarray(Math.max(0, this.pending.length - 1));
			return undefined;
		}

		const end = this.pending.indexOf(EOI, start + SOI.length);
		if (end < 0) {
			this.pending = this.pending.subarray(start);
			return undefined;
		}

		const frame = this.pending.subarray(start, end + EOI.length);
		this.pending = this.pending.subarray(end + EOI.length);
		return frame;
	}
}

function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T | undefined> {
	if (signal.aborted) {
		return Promise.resolve(undefined);
	}
	return new Promise<T | undefined>((resolve, reject) => {
		const onAbort = (): void => resolve(undefined);
		signal.addEventListener('abort', onAbort, { once: true });
		promise.then(
			(value) => {
				signal.removeEventListener('abort', onAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener('abort', onAbort);
				reject(error);
			}
		);
	});
}

export function createStdinFrameSource(maxFrameBytes?: number): JpegStreamSource {
	return new JpegStreamSource({ open: () => process.stdin, description: 'stdin', maxFrameBytes, reopen: false });
}

export function createFileFrameSource(filePath: string, maxFrameBytes?: number): JpegStreamSource {
	return new JpegStreamSource({
		open: () => fs.createReadStream(filePath),
		description: `file:${filePath}`,
		maxFrameBytes
	});
}
