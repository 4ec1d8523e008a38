import type { JoystickDriveState } from '../device/joystickDrive';
import type { JoystickEventStream, JoystickStreamStats } from '../device/joystickEventStream';
import type { RobotController } from '../drive/robotController';
import type { RobotMotionState } from '../drive/motionTypes';
import type { CommandBatcher } from '../scheduler/commandBatcher';
import type { FrameBuffer } from '../stream/frameBuffer';
import type { FrameCache } from '../stream/frameCache';
import type { ConnectionFanout } from './connectionFanout';

export interface RoverStatus {
	motionState: RobotMotionState;
	isActuatorAvailable: boolean;
	dummyMode: boolean;
	left: number;
	right: number;
	lastCommand?: string;
	lastCommandAt?: number;
	cachedFrameCount: number;
	queuedCommandCount: number;
	latestFrameSequence: number;
	subscribers: number;
	joystick: {
		connected: boolean;
		stats?: JoystickStreamStats;
	};
	uptimeMs: number;
}

export interface StatusMessage {
	type: 'status';
	data: RoverStatus;
	timestamp: number;
}

export interface JoystickStateMessage {
	type: 'joystickState';
	data: JoystickDriveState;
	timestamp: number;
}

export interface StatusSources {
	controller: Pick<RobotController, 'getStatus'>;
	cache?: Pick<FrameCache, 'size'>;
	// The snapshot only reads queue depth, so any command/result types fit.
	batcher?: Pick<CommandBatcher<unknown, unknown>, 'getQueueSize'>;
	buffer?: Pick<FrameBuffer, 'stats'>;
	joystick?: Pick<JoystickEventStream, 'getStats'>;
	fanout?: Pick<ConnectionFanout, 'size'>;
	startedAt: number;
	now?: () => number;
}

export function buildStatusSnapshot(sources: StatusSources): RoverStatus {
	const robot = sources.controller.getStatus();
	const now = sources.now ?? Date.now;
	const joystickStats = sources.joystick?.getStats();

	return {
		motionState: robot.motionState,
		isActuatorAvailable: robot.isActuatorAvailable,
		dummyMode: robot.dummyMode,
		left: robot.left,
		right: robot.right,
		lastCommand: robot.lastCommand,
		lastCommandAt: robot.lastCommandAt,
		cachedFrameCount: sources.cache?.size ?? 0,
		queuedCommandCount: sources.batcher?.getQueueSize() ?? 0,
		latestFrameSequence: sources.buffer?.stats().latestSequence ?? 0,
		subscribers: sources.fanout?.size ?? 0,
		joystick: {
			connected: joystickStats?.state === 'reading',
			stats: joystickStats
		},
		uptimeMs: Math.max(0, now() - sources.startedAt)
	};
}

export function toStatusMessage(status: RoverStatus, timestamp: number = Date.now()): StatusMessage {
	return { type: 'status', data: status, timestamp };
}

export function toJoystickStateMessage(state: JoystickDriveState, timestamp: number = Date.now()): JoystickStateMessage {
	return { type: 'joystickState', data: state, timestamp };
}
