import type { BatcherShutdownMode } from '../scheduler/commandBatcher';
import { BATCHER_SHUTDOWN_MODES, DEFAULT_BATCH_SIZE, DEFAULT_BATCH_TIMEOUT_MS } from '../scheduler/commandBatcher';
import { DEFAULT_MIN_INTERVAL_MS } from '../scheduler/commandThrottle';
import { DEFAULT_SETTLE_TIMEOUT_MS, DEFAULT_SPEED, DEFAULT_TURN_SPEED } from '../drive/robotController';
import { DEFAULT_SERIAL_BAUD_RATE } from '../transport/serialMotorActuator';
import type { ConfigSource } from './configSource';
import { sanitizeBoolean, sanitizeEnum, sanitizeFloat, sanitizeNumber, sanitizeString } from './sanitizers';

export type ActuatorKind = 'serial' | 'mock' | 'none';

export const ACTUATOR_KINDS: readonly ActuatorKind[] = ['serial', 'mock', 'none'];

export interface DriveConfigSnapshot {
	defaultSpeed: number;
	turnSpeed: number;
	leftTrim: number;
	rightTrim: number;
	leftInverted: boolean;
	rightInverted: boolean;
	/** Minimum spacing between actuator writes (ms). */
	throttleIntervalMs: number;
	/** Longest emergency stop or shutdown wait for a stalled write (ms). */
	settleTimeoutMs: number;
	actuator: ActuatorKind;
	serialPath: string;
	baudRate: number;
}

export interface BatchingConfigSnapshot {
	enabled: boolean;
	batchSize: number;
	batchTimeoutMs: number;
	shutdownMode: BatcherShutdownMode;
}

export const DEFAULT_SERIAL_PATH = '/dev/ttyUSB0';

export function readDriveConfig(cfg: ConfigSource): DriveConfigSnapshot {
	return {
		defaultSpeed: sanitizeFloat(cfg.get('drive.defaultSpeed'), DEFAULT_SPEED, 0, 1),
		turnSpeed: sanitizeFloat(cfg.get('drive.turnSpeed'), DEFAULT_TURN_SPEED, 0, 1),
		leftTrim: sanitizeFloat(cfg.get('drive.leftTrim'), 0, -1, 1),
		rightTrim: sanitizeFloat(cfg.get('drive.rightTrim'), 0, -1, 1),
		leftInverted: sanitizeBoolean(cfg.get('drive.leftInverted'), false),
		rightInverted: sanitizeBoolean(cfg.get('drive.rightInverted'), false),
		throttleIntervalMs: sanitizeNumber(cfg.get('drive.throttleIntervalMs'), DEFAULT_MIN_INTERVAL_MS, 0, 1000),
		settleTimeoutMs: sanitizeNumber(cfg.get('drive.settleTimeoutMs'), DEFAULT_SETTLE_TIMEOUT_MS, 1, 10_000),
		actuator: sanitizeEnum(cfg.get('drive.actuator'), ACTUATOR_KINDS, 'serial'),
		serialPath: sanitizeString(cfg.get('drive.serialPath'), DEFAULT_SERIAL_PATH),
		baudRate: sanitizeNumber(cfg.get('drive.baudRate'), DEFAULT_SERIAL_BAUD_RATE, 1200)
	};
}

export function readBatchingConfig(cfg: ConfigSource): BatchingConfigSnapshot {
	return {
		enabled: sanitizeBoolean(cfg.get('batching.enabled'), true),
		batchSize: sanitizeNumber(cfg.get('batching.batchSize'), DEFAULT_BATCH_SIZE, 1, 100),
		batchTimeoutMs: sanitizeNumber(cfg.get('batching.batchTimeoutMs'), DEFAULT_BATCH_TIMEOUT_MS, 1, 10_000),
		shutdownMode: sanitizeEnum(cfg.get('batching.shutdownMode'), BATCHER_SHUTDOWN_MODES, 'flush')
	};
}
