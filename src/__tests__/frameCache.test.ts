import assert from 'node:assert/strict';
import test from 'node:test';
import type { Frame } from '../stream/frameBuffer';
import { DEFAULT_MAX_CACHED_FRAMES, FrameCache } from '../stream/frameCache';

function frame(sequence: number): Frame {
	return { sequence, capturedAt: 0, data: new Uint8Array([sequence]) };
}

function createClock(start = 0) {
	let now = start;
	return {
		now: () => now,
		set: (value: number) => {
			now = value;
		}
	};
}

test('FrameCache evicts the oldest entries beyond capacity', () => {
	const cache = new FrameCache({ maxFrames: 2 });

	cache.record(frame(1));
	cache.record(frame(2));
	cache.record(frame(3));

	assert.equal(cache.size, 2);
	assert.equal(cache.newest()?.frame.sequence, 3);
	assert.equal(cache.stats().totalRecorded, 3);
});

test('FrameCache keeps the default capacity and drops the oldest frame first', () => {
	const cache = new FrameCache();

	for (let sequence = 1; sequence <= DEFAULT_MAX_CACHED_FRAMES + 1; sequence += 1) {
		cache.record(frame(sequence));
	}

	assert.equal(cache.size, 5);
	assert.deepEqual(
		cache.entries().map((entry) => entry.frame.sequence),
		[2, 3, 4, 5, 6]
	);
});

test('FrameCache latest hides entries older than the TTL', () => {
	const clock = createClock(1000);
	const cache = new FrameCache({ ttlMs: 100, now: clock.now });
	const entry = cache.record(frame(1));
	assert.equal(entry.expiresAt, 1100);

	clock.set(1050);
	assert.equal(cache.latest()?.frame.sequence, 1);
	assert.equal(cache.latest(30), undefined);

	clock.set(1150);
	assert.equal(cache.latest(), undefined);
	assert.equal(cache.newest()?.frame.sequence, 1);
	assert.equal(cache.size, 1);
});

test('FrameCache latest never returns an expired entry even with a larger max age', () => {
	const clock = createClock(0);
	const cache = new FrameCache({ ttlMs: 2000, now: clock.now });
	cache.record(frame(1));

	clock.set(2000);
	assert.equal(cache.latest(120_000)?.frame.sequence, 1);

	clock.set(60_000);
	assert.equal(cache.latest(120_000), undefined);
	assert.equal(cache.newest()?.frame.sequence, 1);
});

test('FrameCache measures age from when the frame was cached', () => {
	const clock = createClock(5000);
	const cache = new FrameCache({ ttlMs: 100, now: clock.now });
	cache.record({ sequence: 1, capturedAt: 0, data: new Uint8Array() });

	clock.set(5040);

	assert.equal(cache.latest()?.frame.sequence, 1);
	assert.equal(cache.stats().newestAgeMs, 40);
});

test('FrameCache stats report an empty cache', () => {
	const cache = new FrameCache({ maxFrames: 3, ttlMs: 250 });

	assert.deepEqual(cache.stats(), {
		size: 0,
		capacity: 3,
		ttlMs: 250,
		totalRecorded: 0,
		newestAgeMs: null
	});
	assert.equal(cache.latest(), undefined);
});
