import { Logger, NoopLogger } from '../diagnostics/logger';
import { DEFAULT_TURN_SPEED, RobotController, RobotStatus, validateMotionCommand } from '../drive/robotController';
import type { DirectionalCommandKind, MotionCommand } from '../drive/motionTypes';
import {
	DeviceUnavailableError,
	RoverRecoveryAction,
	ShutdownError,
	ValidationError,
	recoveryActionFor,
	recoveryActionForCode
} from '../errors/driveErrors';
import { RoverError, toErrorMessage } from '../errors/RoverError';
import type { CommandBatcher } from '../scheduler/commandBatcher';

export type IntakeError = {
	code: string;
	message: string;
	action: RoverRecoveryAction;
};

export type IntakeResult = { ok: true; status: RobotStatus } | { ok: false; error: IntakeError };

export interface SubmitOptions {
	durationSeconds?: number;
	/** Skip the batcher and apply as soon as the throttle allows. */
	realtime?: boolean;
}

export type NamedCommandKind = DirectionalCommandKind | 'stop' | 'emergencyStop';

export interface CommandIntakeOptions {
	controller: RobotController;
	batcher?: CommandBatcher<MotionCommand, RobotStatus>;
	/** Dead-zone for the virtual joystick. */
	deadzone?: number;
	turnSpeed?: number;
	logger?: Logger;
}

const COMMAND_ALIASES: Record<string, NamedCommandKind> = {
	forward: 'forward',
	backward: 'backward',
	left: 'turnLeft',
	turnleft: 'turnLeft',
	right: 'turnRight',
	turnright: 'turnRight',
	spinleft: 'spinLeft',
	spinright: 'spinRight',
	stop: 'stop',
	emergencystop: 'emergencyStop'
};

/**
 * Case-insensitive; `-` and `_` are ignored, so `turn_left` and `Turn-Left`
 * both name `turnLeft`.
 */
export function parseCommandKind(name: string): NamedCommandKind | undefined {
	const key = name.trim().toLowerCase().replace(/[-_]/g, '');
	return Object.prototype.hasOwnProperty.call(COMMAND_ALIASES, key) ? COMMAND_ALIASES[key] : undefined;
}

/**
 * Maps virtual joystick coordinates (y up is negative) to a discrete command.
 */
export function axesToCommand(x: number, y: number, deadzone: number, turnSpeed: number): MotionCommand {
	if (Math.abs(x) < deadzone && Math.abs(y) < deadzone) {
		return { kind: 'stop' };
	}
	if (Math.abs(y) > Math.abs(x)) {
		return { kind: y < 0 ? 'forward' : 'backward', magnitude: Math.abs(y) };
	}
	return { kind: x < 0 ? 'turnLeft' : 'turnRight', magnitude: Math.abs(x) * turnSpeed };
}

export function toIntakeError(error: unknown): IntakeError {
	if (error instanceof DeviceUnavailableError) {
		return { code: error.code, message: error.message, action: recoveryActionFor(error) };
	}
	if (error instanceof RoverError) {
		return { code: error.code, message: error.message, action: recoveryActionForCode(error.code) };
	}
	return { code: 'INTERNAL', message: toErrorMessage(error), action: recoveryActionForCode('INTERNAL') };
}

/**
 * Shared entry point for every command source except the physical joystick.
 * Validation happens here, before a command is queued.
 */
export class CommandIntake {
	private readonly controller: RobotController;
	private readonly batcher?: CommandBatcher<MotionCommand, RobotStatus>;
	private readonly deadzone: number;
	private readonly turnSpeed: number;
	private readonly logger: Logger;
	private closed = false;

	public constructor(options: CommandIntakeOptions) {
		this.controller = options.controller;
		this.batcher = options.batcher;
		this.deadzone = options.deadzone ?? 0.1;
		this.turnSpeed = options.turnSpeed ?? DEFAULT_TURN_SPEED;
		this.logger = options.logger ?? new NoopLogger();
	}

	/** Refuses every later command except emergency stop. */
	public close(): void {
		this.closed = true;
	}

	public async submitCommand(kind: string, magnitude?: number, options: SubmitOptions = {}): Promise<IntakeResult> {
		const parsed = parseCommandKind(kind);
		if (!parsed) {
			return this.failure(new ValidationError(`Unknown command "${kind}".`, { code: 'UNKNOWN_COMMAND', field: 'command' }));
		}

		let command: MotionCommand;
		if (parsed === 'stop') {
			command = { kind: 'stop' };
		} else if (parsed === 'emergencyStop') {
			command = { kind: 'emergencyStop' };
		} else {
			command = { kind: parsed, magnitude, durationSeconds: options.durationSeconds };
		}

		return this.submit(command, options.realtime ?? false);
	}

	public async submitSteer(speed: number, direction: number, options: SubmitOptions = {}): Promise<IntakeResult> {
		return this.submit({ kind: 'steer', speed, direction, durationSeconds: options.durationSeconds }, options.realtime ?? false);
	}

	/** Virtual joystick input; always real-time. */
	public async submitAxes(x: number, y: number): Promise<IntakeResult> {
		if (!Number.isFinite(x) || !Number.isFinite(y) || Math.abs(x) > 1 || Math.abs(y) > 1) {
			return this.failure(new ValidationError(`Joystick axes must be within [-1, 1], got (${x}, ${y}).`, { field: 'axes' }));
		}
		return this.submit(axesToCommand(x, y, this.deadzone, this.turnSpeed), true);
	}

	public async emergencyStop(): Promise<IntakeResult> {
		return this.submit({ kind: 'emergencyStop' }, true);
	}

	private async submit(command: MotionCommand, realtime: boolean): Promise<IntakeResult> {
		try {
			if (command.kind === 'emergencyStop') {
				const result = await this.controller.emergencyStop();
				return { ok: true, status: result.status };
			}

			validateMotionCommand(command);
			if (this.closed) {
				throw new ShutdownError('Command intake is closed.');
			}
			const batcherState = this.batcher?.getState();
			// Once the queue is draining the pipeline is going down; only emergency stop gets through.
			if (batcherState === 'draining' || batcherState === 'disposed') {
				throw new ShutdownError('Command queue is shut down.');
			}
			const status =
				!realtime && this.batcher && batcherState === 'running'
					? await this.batcher.enqueue(command)
					: await this.controller.execute(command);
			return { ok: true, status };
		} catch (error) {
			return this.failure(error);
		}
	}

	private failure(error: unknown): IntakeResult {
		const mapped = toIntakeError(error);
		this.logger.info('Command rejected', mapped);
		return { ok: false, error: mapped };
	}
}
