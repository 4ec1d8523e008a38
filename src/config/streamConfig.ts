import { DEFAULT_FRAME_TTL_MS, DEFAULT_MAX_CACHED_FRAMES } from '../stream/frameCache';
import { DEFAULT_MAX_FRAME_BYTES } from '../stream/jpegStreamSource';
import type { ConfigSource } from './configSource';
import { sanitizeEnum, sanitizeNumber, sanitizeString } from './sanitizers';

export type FrameSourceKind = 'none' | 'stdin' | 'file';

export const FRAME_SOURCE_KINDS: readonly FrameSourceKind[] = ['none', 'stdin', 'file'];

export interface StreamConfigSnapshot {
	source: FrameSourceKind;
	/** Path read when `source` is `file` (a FIFO fed by the camera tool, typically). */
	sourcePath: string;
	maxFrameBytes: number;
	maxCachedFrames: number;
	frameTtlMs: number;
	viewerWaitMs: number;
	retryInitialBackoffMs: number;
	retryMaxBackoffMs: number;
}

export function readStreamConfig(cfg: ConfigSource): StreamConfigSnapshot {
	const retryInitialBackoffMs = sanitizeNumber(cfg.get('stream.retryInitialBackoffMs'), 100, 0, 60_000);
	return {
		source: sanitizeEnum(cfg.get('stream.source'), FRAME_SOURCE_KINDS, 'none'),
		sourcePath: sanitizeString(cfg.get('stream.sourcePath'), ''),
		maxFrameBytes: sanitizeNumber(cfg.get('stream.maxFrameBytes'), DEFAULT_MAX_FRAME_BYTES, 1024),
		maxCachedFrames: sanitizeNumber(cfg.get('stream.maxCachedFrames'), DEFAULT_MAX_CACHED_FRAMES, 1, 1000),
		frameTtlMs: sanitizeNumber(cfg.get('stream.frameTtlMs'), DEFAULT_FRAME_TTL_MS, 0),
		viewerWaitMs: sanitizeNumber(cfg.get('stream.viewerWaitMs'), 1000, 10, 60_000),
		retryInitialBackoffMs,
		retryMaxBackoffMs: sanitizeNumber(cfg.get('stream.retryMaxBackoffMs'), 5000, retryInitialBackoffMs, 600_000)
	};
}
