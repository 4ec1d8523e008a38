/**
 * Motion commands accepted by the robot controller.
 */
export type DirectionalCommandKind =
	| 'forward'
	| 'backward'
	| 'turnLeft'
	| 'turnRight'
	| 'spinLeft'
	| 'spinRight';

export interface DirectionalCommand {
	kind: DirectionalCommandKind;
	/** Speed in [-1, 1]; the controller default applies when omitted. */
	magnitude?: number;
	/** Schedules an automatic stop after this many seconds. */
	durationSeconds?: number;
}

export interface SteerCommand {
	kind: 'steer';
	speed: number;
	/** Negative steers left, positive steers right. */
	direction: number;
	durationSeconds?: number;
}

export interface StopCommand {
	kind: 'stop';
}

export interface EmergencyStopCommand {
	kind: 'emergencyStop';
}

export type MotionCommand = DirectionalCommand | SteerCommand | StopCommand | EmergencyStopCommand;

export type MotionCommandKind = MotionCommand['kind'];

export type RobotMotionState =
	| 'stopped'
	| 'movingForward'
	| 'movingBackward'
	| 'turningLeft'
	| 'turningRight'
	| 'spinningLeft'
	| 'spinningRight'
	| 'steering'
	| 'emergencyStopped';

export const MOTION_STATE_BY_COMMAND: Record<Exclude<MotionCommandKind, 'emergencyStop'>, RobotMotionState> = {
	forward: 'movingForward',
	backward: 'movingBackward',
	turnLeft: 'turningLeft',
	turnRight: 'turningRight',
	spinLeft: 'spinningLeft',
	spinRight: 'spinningRight',
	steer: 'steering',
	stop: 'stopped'
};

export type MotorSide = 'left' | 'right';

export interface ThrottlePair {
	left: number;
	right: number;
}
