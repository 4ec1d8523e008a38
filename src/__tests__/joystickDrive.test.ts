import assert from 'node:assert/strict';
import test from 'node:test';
import { NullMotorActuator } from '../device/motorActuator';
import { DriveTarget, JoystickDrive, JoystickDriveOptions, JoystickDriveState } from '../device/joystickDrive';
import { JoystickEventStream } from '../device/joystickEventStream';
import type { MotionCommand } from '../drive/motionTypes';
import { RobotController } from '../drive/robotController';
import { FakeJoystickDevice, axisRecord, buttonRecord, sleep, waitFor } from './testHelpers';

function createTarget() {
	const status = new RobotController({ actuator: new NullMotorActuator() }).getStatus();
	const commands: MotionCommand[] = [];
	let release: () => void = () => undefined;
	let gate = new Promise<void>((resolve) => {
		release = resolve;
	});
	const state = { stops: 0, fail: false };
	const target: DriveTarget = {
		execute: async (command) => {
			commands.push(command);
			await gate;
			if (state.fail) {
				throw new Error('actuator offline');
			}
			return status;
		},
		emergencyStop: async () => {
			state.stops += 1;
			return { status, errors: [] };
		}
	};
	return {
		target,
		commands,
		state,
		release: () => release(),
		openGate: () => {
			gate = Promise.resolve();
		}
	};
}

async function createDrive(
	device: FakeJoystickDevice,
	target: DriveTarget,
	extra: Partial<Omit<JoystickDriveOptions, 'stream' | 'target'>> = {}
) {
	const stream = new JoystickEventStream({ devicePath: device.path, opener: async () => device });
	await stream.start();
	const drive = new JoystickDrive({ stream, target, throttleAxis: 1, steeringAxis: 0, stopButton: 0, ...extra });
	drive.attach();
	return { stream, drive };
}

test('JoystickDrive keeps only the newest stick position while a command is in flight', async () => {
	const device = new FakeJoystickDevice();
	const fake = createTarget();
	const { stream, drive } = await createDrive(device, fake.target);
	device.push(axisRecord(1, -32767), axisRecord(0, 16384), axisRecord(0, 32767));

	await stream.readNext();
	await stream.readNext();
	await stream.readNext();
	fake.release();
	await drive.whenIdle();

	assert.deepEqual(fake.commands, [
		{ kind: 'steer', speed: 1, direction: 0 },
		{ kind: 'steer', speed: 1, direction: 1 }
	]);
	assert.deepEqual(drive.getStats(), {
		axes: { x: 1, y: -1 },
		submitted: 2,
		coalesced: 1,
		failures: 0,
		emergencyStops: 0
	});
});

test('JoystickDrive triggers an emergency stop on the stop button press only', async () => {
	const device = new FakeJoystickDevice();
	const fake = createTarget();
	const { stream, drive } = await createDrive(device, fake.target);
	device.push(buttonRecord(3, 1), buttonRecord(0, 1), buttonRecord(0, 0));

	await stream.readNext();
	await stream.readNext();
	await stream.readNext();

	assert.equal(fake.state.stops, 1);
	assert.equal(drive.getStats().emergencyStops, 1);
	assert.deepEqual(fake.commands, []);
});

test('JoystickDrive counts failed submissions and keeps going', async () => {
	const device = new FakeJoystickDevice();
	const fake = createTarget();
	fake.openGate();
	fake.state.fail = true;
	const { stream, drive } = await createDrive(device, fake.target);
	device.push(axisRecord(1, 32767));

	await stream.readNext();
	await drive.whenIdle();

	assert.equal(drive.getStats().failures, 1);
	assert.equal(drive.getStats().submitted, 0);
});

test('JoystickDrive ignores events after detach', async () => {
	const device = new FakeJoystickDevice();
	const fake = createTarget();
	fake.openGate();
	const { stream, drive } = await createDrive(device, fake.target);
	drive.detach();
	device.push(axisRecord(1, 32767), buttonRecord(0, 1));

	await stream.readNext();
	await stream.readNext();
	await drive.whenIdle();

	assert.deepEqual(fake.commands, []);
	assert.equal(fake.state.stops, 0);
});

test('JoystickDrive reports button changes at once and holds back axis updates inside the interval', async () => {
	const device = new FakeJoystickDevice();
	const fake = createTarget();
	fake.openGate();
	const states: JoystickDriveState[] = [];
	let now = 0;
	const { stream, drive } = await createDrive(device, fake.target, {
		stateIntervalMs: 100,
		now: () => now,
		onState: (state) => states.push(state)
	});
	device.push(axisRecord(1, -32767), buttonRecord(2, 1), axisRecord(0, 32767), axisRecord(0, 0), buttonRecord(2, 1));

	await stream.readNext();
	now = 10;
	await stream.readNext();
	now = 20;
	await stream.readNext();
	now = 30;
	await stream.readNext();
	await stream.readNext();

	assert.deepEqual(states, [
		{ connected: true, axes: { x: 0, y: -1 }, buttons: {} },
		{ connected: true, axes: { x: 0, y: -1 }, buttons: { 2: true } }
	]);

	await waitFor(() => states.length === 3);
	assert.deepEqual(states[2], { connected: true, axes: { x: 0, y: -1 }, buttons: { 2: true } });

	device.push(buttonRecord(2, 0));
	await stream.readNext();
	assert.deepEqual(states[3], { connected: true, axes: { x: 0, y: -1 }, buttons: { 2: false } });
	assert.equal(states.length, 4);
	assert.deepEqual(drive.getState(), states[3]);
	drive.detach();
	await drive.whenIdle();
});

test('JoystickDrive drops a held-back state update on detach', async () => {
	const device = new FakeJoystickDevice();
	const fake = createTarget();
	fake.openGate();
	const states: JoystickDriveState[] = [];
	const { stream, drive } = await createDrive(device, fake.target, {
		stateIntervalMs: 30,
		now: () => 0,
		onState: (state) => states.push(state)
	});
	device.push(axisRecord(1, 32767), axisRecord(0, 32767));

	await stream.readNext();
	await stream.readNext();
	drive.detach();
	await sleep(60);
	await drive.whenIdle();

	assert.deepEqual(states, [{ connected: true, axes: { x: 0, y: 1 }, buttons: {} }]);
});
