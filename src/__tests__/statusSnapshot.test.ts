import assert from 'node:assert/strict';
import test from 'node:test';
import { NullMotorActuator } from '../device/motorActuator';
import { RobotController } from '../drive/robotController';
import { CommandBatcher } from '../scheduler/commandBatcher';
import { FrameBuffer } from '../stream/frameBuffer';
import { FrameCache } from '../stream/frameCache';
import { ConnectionFanout } from '../telemetry/connectionFanout';
import { buildStatusSnapshot, toJoystickStateMessage, toStatusMessage } from '../telemetry/statusSnapshot';

test('buildStatusSnapshot gathers robot, video, queue and subscriber state', async () => {
	const controller = new RobotController({ actuator: new NullMotorActuator(), now: () => 3500 });
	await controller.execute({ kind: 'forward', magnitude: 0.6 });
	const buffer = new FrameBuffer();
	const cache = new FrameCache();
	cache.record(buffer.publish(Uint8Array.from([1])));
	cache.record(buffer.publish(Uint8Array.from([2])));
	buffer.publish(Uint8Array.from([3]));
	const batcher = new CommandBatcher<string, string>({ apply: async (command) => command });
	const queued = [batcher.enqueue('a'), batcher.enqueue('b')];
	const fanout = new ConnectionFanout();
	fanout.subscribe({ id: 'viewer', send: async () => undefined, close: () => undefined });

	const status = buildStatusSnapshot({
		controller,
		cache,
		batcher,
		buffer,
		fanout,
		startedAt: 1000,
		now: () => 4000
	});

	assert.deepEqual(status, {
		motionState: 'movingForward',
		isActuatorAvailable: false,
		dummyMode: true,
		left: 0.6,
		right: 0.6,
		lastCommand: 'forward',
		lastCommandAt: 3500,
		cachedFrameCount: 2,
		queuedCommandCount: 2,
		latestFrameSequence: 3,
		subscribers: 1,
		joystick: { connected: false, stats: undefined },
		uptimeMs: 3000
	});

	await batcher.shutdown('flush');
	assert.deepEqual(await Promise.all(queued), ['b', 'b']);
});

test('toStatusMessage wraps a snapshot with its timestamp', () => {
	const controller = new RobotController({ actuator: new NullMotorActuator() });
	const status = buildStatusSnapshot({ controller, startedAt: 0, now: () => 0 });

	assert.deepEqual(toStatusMessage(status, 99), { type: 'status', data: status, timestamp: 99 });
	assert.equal(status.cachedFrameCount, 0);
	assert.equal(status.latestFrameSequence, 0);
});

test('toJoystickStateMessage wraps stick and button state', () => {
	const state = { connected: true, axes: { x: 0.5, y: -1 }, buttons: { 0: false, 3: true } };

	assert.deepEqual(toJoystickStateMessage(state, 42), { type: 'joystickState', data: state, timestamp: 42 });
});
