import type { Frame } from './frameBuffer';

export interface CachedFrame {
	readonly frame: Frame;
	readonly cachedAt: number;
	readonly expiresAt: number;
}

export interface FrameCacheOptions {
	maxFrames?: number;
	ttlMs?: number;
	now?: () => number;
}

export interface FrameCacheStats {
	size: number;
	capacity: number;
	ttlMs: number;
	totalRecorded: number;
	/** Age of the newest entry, or null when the cache is empty. */
	newestAgeMs: number | null;
}

export const DEFAULT_MAX_CACHED_FRAMES = 5;
export const DEFAULT_FRAME_TTL_MS = 2000;

/**
 * Bounded FIFO of recent frames for late joiners. Age is measured from the
 * moment a frame entered the cache; stale entries stay until evicted by size,
 * but `latest` never returns one past its `expiresAt`.
 */
export class FrameCache {
	private readonly capacity: number;
	private readonly ttlMs: number;
	private readonly now: () => number;
	private readonly frames: CachedFrame[] = [];
	private totalRecorded = 0;

	public constructor(options: FrameCacheOptions = {}) {
		this.capacity = Math.max(1, Math.floor(options.maxFrames ?? DEFAULT_MAX_CACHED_FRAMES));
		this.ttlMs = Math.max(0, options.ttlMs ?? DEFAULT_FRAME_TTL_MS);
		this.now = options.now ?? (() => Date.now());
	}

	public get size(): number {
		return this.frames.length;
	}

	public record(frame: Frame): CachedFrame {
		const cachedAt = this.now();
		const entry: CachedFrame = { frame, cachedAt, expiresAt: cachedAt + this.ttlMs };
		this.frames.push(entry);
		this.totalRecorded += 1;
		while (this.frames.length > this.capacity) {
			this.frames.shift();
		}
		return entry;
	}

	/** Newest entry no older than `maxAgeMs`, capped by the cache TTL. */
	public latest(maxAgeMs: number = this.ttlMs): CachedFrame | undefined {
		const newest = this.newest();
		if (!newest) {
			return undefined;
		}
		const now = this.now();
		if (now > newest.expiresAt || now - newest.cachedAt > maxAgeMs) {
			return undefined;
		}
		return newest;
	}

	public newest(): CachedFrame | undefined {
		return this.frames.length > 0 ? this.frames[this.frames.length - 1] : undefined;
	}

	/** Oldest first. */
	public entries(): readonly CachedFrame[] {
		return [...this.frames];
	}

	public stats(): FrameCacheStats {
		const newest = this.newest();
		return {
			size: this.frames.length,
			capacity: this.capacity,
			ttlMs: this.ttlMs,
			totalRecorded: this.totalRecorded,
			newestAgeMs: newest ? this.now() - newest.cachedAt : null
		};
	}
}
