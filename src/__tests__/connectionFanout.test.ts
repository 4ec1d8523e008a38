import assert from 'node:assert/strict';
import test from 'node:test';
import { ConnectionFanout, FanoutSubscriber } from '../telemetry/connectionFanout';
import { createSocketSubscriber } from '../transport/wsGateway';
import { FakeSocket } from './testHelpers';

function recordingSubscriber(id: string, send?: (message: string) => Promise<void>) {
	const received: string[] = [];
	const closes: Array<string | undefined> = [];
	const subscriber: FanoutSubscriber = {
		id,
		send:
			send ??
			(async (message) => {
				received.push(message);
			}),
		close: (reason) => {
			closes.push(reason);
		}
	};
	return { subscriber, received, closes };
}

test('ConnectionFanout delivers one serialized payload to every subscriber', async () => {
	const fanout = new ConnectionFanout();
	const a = recordingSubscriber('a');
	const b = recordingSubscriber('b');
	fanout.subscribe(a.subscriber);
	fanout.subscribe(b.subscriber);

	const result = await fanout.broadcast({ type: 'status', value: 1 });

	assert.deepEqual(result, { delivered: 2, dropped: 0 });
	assert.deepEqual(a.received, ['{"type":"status","value":1}']);
	assert.deepEqual(b.received, ['{"type":"status","value":1}']);
	assert.deepEqual(fanout.stats(), { subscribers: 2, broadcasts: 1, delivered: 2, dropped: 0 });
});

test('ConnectionFanout drops and closes a failing subscriber without affecting others', async () => {
	const fanout = new ConnectionFanout();
	const healthy = recordingSubscriber('healthy');
	const broken = recordingSubscriber('broken', async () => {
		throw new Error('connection reset');
	});
	fanout.subscribe(healthy.subscriber);
	fanout.subscribe(broken.subscriber);

	const result = await fanout.broadcast('tick');

	assert.deepEqual(result, { delivered: 1, dropped: 1 });
	assert.deepEqual(broken.closes, ['connection reset']);
	assert.equal(fanout.has('broken'), false);
	assert.equal(fanout.size, 1);
	assert.deepEqual(healthy.received, ['tick']);
});

test('ConnectionFanout drops a subscriber whose send times out', async () => {
	const fanout = new ConnectionFanout({ sendTimeoutMs: 10 });
	const stuck = recordingSubscriber('stuck', () => new Promise<void>(() => undefined));
	fanout.subscribe(stuck.subscriber);

	const result = await fanout.broadcast('tick');

	assert.deepEqual(result, { delivered: 0, dropped: 1 });
	assert.deepEqual(stuck.closes, ['send timed out after 10ms']);
	assert.equal(fanout.size, 0);
});

test('ConnectionFanout drops a subscriber that falls behind on pending sends', async () => {
	const fanout = new ConnectionFanout({ maxPendingSends: 1 });
	const socket = new FakeSocket();
	socket.hold = true;
	fanout.subscribe(createSocketSubscriber('slow', socket));

	const first = fanout.broadcast('one');
	const second = await fanout.broadcast('two');

	assert.deepEqual(second, { delivered: 0, dropped: 1 });
	assert.deepEqual(socket.closeCalls, [{ code: 1001, reason: 'too many pending sends' }]);
	socket.flush();
	await first;
	assert.equal(fanout.size, 0);
});

test('ConnectionFanout sendTo reaches only the named subscriber', async () => {
	const fanout = new ConnectionFanout();
	const a = recordingSubscriber('a');
	const b = recordingSubscriber('b');
	fanout.subscribe(a.subscriber);
	fanout.subscribe(b.subscriber);

	assert.equal(await fanout.sendTo('a', { ok: true }), true);
	assert.equal(await fanout.sendTo('missing', { ok: true }), false);

	assert.deepEqual(a.received, ['{"ok":true}']);
	assert.deepEqual(b.received, []);
});

test('ConnectionFanout unsubscribe and closeAll remove subscribers', async () => {
	const fanout = new ConnectionFanout();
	const a = recordingSubscriber('a');
	const b = recordingSubscriber('b');
	const unsubscribeA = fanout.subscribe(a.subscriber);
	fanout.subscribe(b.subscriber);

	unsubscribeA();
	assert.equal(fanout.has('a'), false);
	assert.deepEqual(await fanout.broadcast('x'), { delivered: 1, dropped: 0 });

	fanout.closeAll('bye');
	assert.equal(fanout.size, 0);
	assert.deepEqual(b.closes, ['bye']);
	assert.deepEqual(a.closes, []);
});

test('createSocketSubscriber refuses closed and backlogged sockets', async () => {
	const closed = new FakeSocket();
	closed.readyState = 3;
	await assert.rejects(createSocketSubscriber('c', closed).send('x'), /socket is not open/);

	const backlogged = new FakeSocket();
	backlogged.bufferedAmount = 2048;
	await assert.rejects(createSocketSubscriber('b', backlogged, 1024).send('x'), /socket backlog 2048 bytes exceeds 1024/);

	const open = new FakeSocket();
	await createSocketSubscriber('o', open).send('hello');
	assert.deepEqual(open.sent, ['hello']);
});

test('createSocketSubscriber closes open sockets with a bounded reason', () => {
	const socket = new FakeSocket();
	const subscriber = createSocketSubscriber('s', socket);

	subscriber.close('x'.repeat(200));
	subscriber.close('again');

	assert.equal(socket.closeCalls.length, 1);
	assert.equal(socket.closeCalls[0].code, 1001);
	assert.equal(socket.closeCalls[0].reason?.length, 120);
});
