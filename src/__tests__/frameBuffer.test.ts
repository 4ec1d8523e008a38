import assert from 'node:assert/strict';
import test from 'node:test';
import { TransientIOError } from '../errors/driveErrors';
import { FrameBuffer } from '../stream/frameBuffer';

const bytes = (...values: number[]): Uint8Array => Uint8Array.from(values);

test('FrameBuffer keeps only the newest frame and counts unread overwrites', async () => {
	const buffer = new FrameBuffer();
	buffer.publish(bytes(1), 100);
	buffer.publish(bytes(2), 200);

	const result = await buffer.awaitFrame(0, 100);

	assert.equal(result.status, 'frame');
	assert.ok(result.status === 'frame');
	assert.equal(result.frame.sequence, 2);
	assert.equal(result.frame.capturedAt, 200);
	assert.deepEqual([...result.frame.data], [2]);
	assert.deepEqual(buffer.stats(), {
		published: 2,
		overwrittenUnread: 1,
		waiters: 0,
		latestSequence: 2,
		closed: false
	});
});

test('FrameBuffer does not count an overwrite once the frame was read', async () => {
	const buffer = new FrameBuffer();
	buffer.publish(bytes(1));
	await buffer.awaitFrame(0, 100);
	buffer.publish(bytes(2));

	assert.equal(buffer.stats().overwrittenUnread, 0);
});

test('FrameBuffer copies and freezes published frames', () => {
	const buffer = new FrameBuffer();
	const source = bytes(9, 9);
	const frame = buffer.publish(source);
	source[0] = 0;

	assert.deepEqual([...frame.data], [9, 9]);
	assert.ok(Object.isFrozen(frame));
	assert.equal(buffer.latest(), frame);
});

test('FrameBuffer wakes every blocked consumer on publish', async () => {
	const buffer = new FrameBuffer();
	const first = buffer.awaitFrame(0, 1000);
	const second = buffer.awaitFrame(0, 1000);
	assert.equal(buffer.stats().waiters, 2);

	buffer.publish(bytes(7));

	const results = await Promise.all([first, second]);
	assert.deepEqual(
		results.map((result) => (result.status === 'frame' ? result.frame.sequence : result.status)),
		[1, 1]
	);
	assert.equal(buffer.stats().waiters, 0);
});

test('FrameBuffer reports timeout when nothing newer arrives', async () => {
	const buffer = new FrameBuffer();
	buffer.publish(bytes(1));

	const result = await buffer.awaitFrame(1, 10);

	assert.deepEqual(result, { status: 'timeout' });
	assert.equal(buffer.stats().waiters, 0);
});

test('FrameBuffer close wakes waiters and rejects later publishes', async () => {
	const buffer = new FrameBuffer();
	buffer.publish(bytes(1));
	const pending = buffer.awaitFrame(1, 1000);

	buffer.close();

	assert.deepEqual(await pending, { status: 'closed' });
	assert.deepEqual(await buffer.awaitFrame(0, 1000), { status: 'closed' });
	assert.throws(() => buffer.publish(bytes(2)), TransientIOError);
	assert.equal(buffer.isClosed(), true);
});

test('FrameBuffer releases a waiter when its signal aborts', async () => {
	const buffer = new FrameBuffer();
	const controller = new AbortController();
	const pending = buffer.awaitFrame(0, 1000, controller.signal);

	controller.abort();

	assert.deepEqual(await pending, { status: 'closed' });
	assert.equal(buffer.stats().waiters, 0);
});

test('FrameBuffer readers never see the same or an older frame twice', async () => {
	const buffer = new FrameBuffer();
	const reader = buffer.createReader();
	buffer.publish(bytes(1));

	const first = await reader.next(100);
	assert.ok(first.status === 'frame');
	assert.equal(first.frame.sequence, 1);

	assert.deepEqual(await reader.next(10), { status: 'timeout' });

	buffer.publish(bytes(2));
	buffer.publish(bytes(3));
	const latest = await reader.next(100);
	assert.ok(latest.status === 'frame');
	assert.equal(latest.frame.sequence, 3);
	assert.equal(reader.lastSequence, 3);
});
