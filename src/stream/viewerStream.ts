import type { Frame, FrameBuffer } from './frameBuffer';
import type { FrameCache } from './frameCache';

export const MJPEG_BOUNDARY = 'frame';

export interface ViewerStreamOptions {
	/** Per-wait timeout; a timeout only re-arms the wait. */
	waitTimeoutMs?: number;
	signal?: AbortSignal;
	/** Serve the newest cached frame first so late joiners see a picture at once. */
	cache?: FrameCache;
}

const DEFAULT_VIEWER_WAIT_MS = 1000;

/**
 * Yields frames with nondecreasing sequence numbers until the buffer closes
 * or the signal aborts. Frames published while the viewer is busy are skipped.
 */
export async function* viewerFrames(buffer: FrameBuffer, options: ViewerStreamOptions = {}): AsyncGenerator<Frame> {
	const waitTimeoutMs = options.waitTimeoutMs ?? DEFAULT_VIEWER_WAIT_MS;
	let lastSequence = 0;

	const cached = options.cache?.latest();
	if (cached && !buffer.isClosed()) {
		lastSequence = cached.frame.sequence;
		yield cached.frame;
	}

	while (true) {
		const result = await buffer.awaitFrame(lastSequence, waitTimeoutMs, options.signal);
		if (result.status === 'closed') {
			return;
		}
		if (result.status === 'timeout') {
			continue;
		}
		lastSequence = result.frame.sequence;
		yield result.frame;
	}
}

export function mjpegContentType(boundary: string = MJPEG_BOUNDARY): string {
	return `multipart/x-mixed-replace; boundary=${boundary}`;
}

export function encodeMjpegPart(frame: Frame, boundary: string = MJPEG_BOUNDARY): Buffer {
	const header = Buffer.from(`--${boundary}\r\nContent-Type: image/jpeg\r\n\r\n`, 'ascii');
	return Buffer.concat([header, frame.data, Buffer.from('\r\n', 'ascii')]);
}

export async function* mjpegParts(buffer: FrameBuffer, options: ViewerStreamOptions = {}): AsyncGenerator<Buffer> {
	for await (const frame of viewerFrames(buffer, options)) {
		yield encodeMjpegPart(frame);
	}
}
