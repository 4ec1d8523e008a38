import {
	DEFAULT_STATE_INTERVAL_MS,
	DEFAULT_STEERING_AXIS,
	DEFAULT_STOP_BUTTON,
	DEFAULT_THROTTLE_AXIS
} from '../device/joystickDrive';
import { DEFAULT_AXIS_SCALE, DEFAULT_DEADZONE } from '../device/joystickEventStream';
import { DEFAULT_JOYSTICK_DIR } from '../transport/joystickDevice';
import type { ConfigSource } from './configSource';
import { sanitizeBoolean, sanitizeFloat, sanitizeNumber, sanitizeString } from './sanitizers';

export interface JoystickConfigSnapshot {
	enabled: boolean;
	/** Empty means auto-detect the first `js<N>` entry in `deviceDir`. */
	devicePath: string;
	deviceDir: string;
	deadzone: number;
	axisScale: number;
	emitInitEvents: boolean;
	throttleAxis: number;
	steeringAxis: number;
	stopButton: number;
	/** Minimum spacing of joystick state pushes to viewers. */
	stateIntervalMs: number;
}

export function readJoystickConfig(cfg: ConfigSource): JoystickConfigSnapshot {
	return {
		enabled: sanitizeBoolean(cfg.get('joystick.enabled'), true),
		devicePath: sanitizeString(cfg.get('joystick.devicePath'), ''),
		deviceDir: sanitizeString(cfg.get('joystick.deviceDir'), DEFAULT_JOYSTICK_DIR),
		deadzone: sanitizeFloat(cfg.get('joystick.deadzone'), DEFAULT_DEADZONE, 0, 0.9),
		axisScale: sanitizeFloat(cfg.get('joystick.axisScale'), DEFAULT_AXIS_SCALE, 0, 10),
		emitInitEvents: sanitizeBoolean(cfg.get('joystick.emitInitEvents'), false),
		throttleAxis: sanitizeNumber(cfg.get('joystick.throttleAxis'), DEFAULT_THROTTLE_AXIS, 0, 255),
		steeringAxis: sanitizeNumber(cfg.get('joystick.steeringAxis'), DEFAULT_STEERING_AXIS, 0, 255),
		stopButton: sanitizeNumber(cfg.get('joystick.stopButton'), DEFAULT_STOP_BUTTON, 0, 255),
		stateIntervalMs: sanitizeNumber(cfg.get('joystick.stateIntervalMs'), DEFAULT_STATE_INTERVAL_MS, 0, 1000)
	};
}
