import assert from 'node:assert/strict';
import test from 'node:test';
import { FrameBuffer } from '../stream/frameBuffer';
import { FrameCache } from '../stream/frameCache';
import { FramePump, FrameSource, computeRetryDelay } from '../stream/framePump';
import { waitFor } from './testHelpers';

type ScriptStep = Uint8Array | Error | 'end';

/** Replays scripted reads, then blocks until the pump aborts. */
class ScriptedFrameSource implements FrameSource {
	public readonly description = 'scripted';
	public reads = 0;
	public closed = false;

	public constructor(private readonly steps: ScriptStep[]) {}

	public async readFrame(signal: AbortSignal): Promise<Uint8Array | undefined> {
		this.reads += 1;
		const step = this.steps.shift();
		if (step === undefined) {
			return new Promise<undefined>((resolve) => {
				signal.addEventListener('abort', () => resolve(undefined), { once: true });
			});
		}
		if (step === 'end') {
			return undefined;
		}
		if (step instanceof Error) {
			throw step;
		}
		return step;
	}

	public async close(): Promise<void> {
		this.closed = true;
	}
}

test('computeRetryDelay grows exponentially and caps at the maximum', () => {
	const policy = { initialBackoffMs: 100, backoffFactor: 2, maxBackoffMs: 5000 };

	assert.equal(computeRetryDelay(policy, 0), 100);
	assert.equal(computeRetryDelay(policy, 3), 800);
	assert.equal(computeRetryDelay(policy, 10), 5000);
});

test('FramePump retries failed reads and publishes the next good frame', async () => {
	const buffer = new FrameBuffer();
	const source = new ScriptedFrameSource([new Error('camera busy'), new Error('camera busy'), Uint8Array.from([1]), 'end']);
	const pump = new FramePump({ source, buffer, retry: { initialBackoffMs: 1, maxBackoffMs: 4 } });

	pump.start();
	await waitFor(() => pump.stats().state === 'ended');

	assert.deepEqual(pump.stats(), {
		state: 'ended',
		framesRead: 1,
		readErrors: 2,
		consecutiveErrors: 0,
		framesCached: 0
	});
	assert.deepEqual([...(buffer.latest()?.data ?? [])], [1]);

	await pump.stop();
	assert.equal(source.closed, true);
	assert.equal(pump.stats().state, 'stopped');
});

test('FramePump samples published frames into the cache', async () => {
	const buffer = new FrameBuffer();
	const cache = new FrameCache({ maxFrames: 3 });
	const source = new ScriptedFrameSource([Uint8Array.from([5])]);
	const pump = new FramePump({ source, buffer, cache, cacheWaitMs: 20 });

	pump.start();
	await waitFor(() => cache.size === 1);
	await pump.stop();

	assert.equal(cache.newest()?.frame.sequence, 1);
	assert.equal(pump.stats().framesCached, 1);
});

test('FramePump stop releases a blocked read', async () => {
	const buffer = new FrameBuffer();
	const source = new ScriptedFrameSource([]);
	const pump = new FramePump({ source, buffer });

	pump.start();
	await waitFor(() => source.reads === 1);
	await pump.stop();

	assert.equal(pump.stats().framesRead, 0);
	assert.equal(source.closed, true);
});
