import { Logger, NoopLogger } from '../diagnostics/logger';
import type { MotorActuator } from '../device/motorActuator';
import { ShutdownError, TransientIOError, ValidationError } from '../errors/driveErrors';
import { toErrorMessage } from '../errors/RoverError';
import { CommandThrottle } from '../scheduler/commandThrottle';
import {
	DirectionalCommand,
	MOTION_STATE_BY_COMMAND,
	MotionCommand,
	MotionCommandKind,
	MotorSide,
	RobotMotionState,
	ThrottlePair
} from './motionTypes';
import {
	MotorCalibration,
	NEUTRAL_CALIBRATION,
	applyMotorCalibration,
	computeDifferential,
	isThrottleInRange
} from './steering';

export const DEFAULT_SPEED = 0.5;
export const DEFAULT_TURN_SPEED = 0.8;
export const DEFAULT_SETTLE_TIMEOUT_MS = 500;

export interface RobotStatus {
	motionState: RobotMotionState;
	/** Throttles last written (after calibration). */
	left: number;
	right: number;
	lastCommand?: MotionCommandKind;
	lastCommandAt?: number;
	isActuatorAvailable: boolean;
	dummyMode: boolean;
	autoStopPending: boolean;
	commandsApplied: number;
}

export interface EmergencyStopResult {
	status: RobotStatus;
	/** Actuator failures seen while zeroing; the state is emergencyStopped regardless. */
	errors: string[];
}

export type RobotStateListener = (status: RobotStatus) => void;

export interface RobotControllerOptions {
	actuator: MotorActuator;
	throttle?: CommandThrottle;
	calibration?: Partial<MotorCalibration>;
	defaultSpeed?: number;
	turnSpeed?: number;
	/** Wall clock used for `lastCommandAt`. */
	now?: () => number;
	/** Longest emergency stop and shutdown wait for a stalled actuator write. */
	settleTimeoutMs?: number;
	logger?: Logger;
}

/**
 * Single owner of the motor actuator. Commands apply one at a time through a
 * promise chain; emergency stop is the only path that skips the chain.
 */
export class RobotController {
	private readonly actuator: MotorActuator;
	private readonly throttle: CommandThrottle;
	private readonly calibration: Readonly<MotorCalibration>;
	private readonly defaultSpeed: number;
	private readonly turnSpeed: number;
	private readonly now: () => number;
	private readonly settleTimeoutMs: number;
	private readonly logger: Logger;
	private readonly listeners = new Set<RobotStateListener>();

	private chain: Promise<void> = Promise.resolve();
	private motionState: RobotMotionState = 'stopped';
	private current: ThrottlePair = { left: 0, right: 0 };
	private lastCommand?: MotionCommandKind;
	private lastCommandAt?: number;
	private commandsApplied = 0;
	// Bumped by emergency stop and shutdown; commands issued under an older
	// generation are dropped instead of applied.
	private generation = 0;
	private autoStopTimer?: NodeJS.Timeout;
	private autoStopToken = 0;
	private closed = false;

	public constructor(options: RobotControllerOptions) {
		this.actuator = options.actuator;
		this.throttle = options.throttle ?? new CommandThrottle({ logger: options.logger });
		this.calibration = { ...NEUTRAL_CALIBRATION, ...options.calibration };
		this.defaultSpeed = options.defaultSpeed ?? DEFAULT_SPEED;
		this.turnSpeed = options.turnSpeed ?? DEFAULT_TURN_SPEED;
		this.now = options.now ?? (() => Date.now());
		this.settleTimeoutMs = Math.max(1, options.settleTimeoutMs ?? DEFAULT_SETTLE_TIMEOUT_MS);
		this.logger = options.logger ?? new NoopLogger();
	}

	public get isActuatorAvailable(): boolean {
		return this.actuator.available;
	}

	public getStatus(): RobotStatus {
		return {
			motionState: this.motionState,
			left: this.current.left,
			right: this.current.right,
			lastCommand: this.lastCommand,
			lastCommandAt: this.lastCommandAt,
			isActuatorAvailable: this.actuator.available,
			dummyMode: !this.actuator.available,
			autoStopPending: this.autoStopTimer !== undefined,
			commandsApplied: this.commandsApplied
		};
	}

	public onStateChange(listener: RobotStateListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	public async execute(command: MotionCommand): Promise<RobotStatus> {
		if (command.kind === 'emergencyStop') {
			const result = await this.emergencyStop();
			return result.status;
		}
		if (this.closed) {
			throw new ShutdownError('Robot controller is shut down.');
		}

		validateMotionCommand(command);
		const issuedGeneration = this.generation;
		return this.withLock(() => this.applyCommand(command, issuedGeneration));
	}

	public async emergencyStop(): Promise<EmergencyStopResult> {
		this.generation += 1;
		this.cancelAutoStop();

		const errors = await this.zeroBothSides();
		this.current = { left: 0, right: 0 };
		this.lastCommand = 'emergencyStop';
		this.lastCommandAt = this.now();
		this.setMotionState('emergencyStopped', true);

		// A command that was mid-write may land after the first zeroing, so zero
		// again behind it. The queued zeroing still runs if the deadline passes.
		const rezero = this.withLock(() => this.zeroBothSides());
		const settled = await settleWithin(rezero, this.settleTimeoutMs);
		if (settled.status === 'done') {
			errors.push(...settled.value);
		} else if (settled.status === 'failed') {
			errors.push(toErrorMessage(settled.error));
		} else {
			errors.push(`in-flight command did not settle within ${this.settleTimeoutMs} ms`);
		}

		if (errors.length > 0) {
			this.logger.error('Emergency stop hit actuator errors', { errors });
		} else {
			this.logger.warn('Emergency stop applied');
		}

		return { status: this.getStatus(), errors };
	}

	public async shutdown(): Promise<void> {
		if (this.closed) {
			return;
		}

		this.closed = true;
		this.generation += 1;
		this.cancelAutoStop();
		const settled = await settleWithin(this.chain, this.settleTimeoutMs);
		if (settled.status === 'timeout') {
			this.logger.warn('In-flight command still pending at shutdown', { waitedMs: this.settleTimeoutMs });
		}

		try {
			await this.actuator.stop();
		} catch (error) {
			this.logger.warn('Actuator stop failed during shutdown', { error: toErrorMessage(error) });
		}

		this.current = { left: 0, right: 0 };
		this.setMotionState('stopped', true);
		this.listeners.clear();
	}

	private withLock<T>(task: () => Promise<T>): Promise<T> {
		const result = this.chain.then(task);
		this.chain = result.then(
			() => undefined,
			() => undefined
		);
		return result;
	}

	private async applyCommand(command: Exclude<MotionCommand, { kind: 'emergencyStop' }>, issuedGeneration: number): Promise<RobotStatus> {
		if (issuedGeneration !== this.generation) {
			this.logger.debug('Dropping command superseded by emergency stop', { kind: command.kind });
			return this.getStatus();
		}

		this.cancelAutoStop();
		const pair = applyMotorCalibration(this.toThrottlePair(command), this.calibration);
		await this.writePair(pair);

		if (issuedGeneration !== this.generation) {
			return this.getStatus();
		}

		const changed = pair.left !== this.current.left || pair.right !== this.current.right;
		this.current = pair;
		this.lastCommand = command.kind;
		this.lastCommandAt = this.now();
		this.commandsApplied += 1;

		if (command.kind !== 'stop' && command.durationSeconds !== undefined && command.durationSeconds > 0) {
			this.scheduleAutoStop(command.durationSeconds * 1000);
		}

		this.setMotionState(MOTION_STATE_BY_COMMAND[command.kind], changed);
		this.logger.debug('Motion command applied', {
			kind: command.kind,
			left: pair.left,
			right: pair.right,
			dummy: !this.actuator.available
		});
		return this.getStatus();
	}

	private async writePair(pair: ThrottlePair): Promise<void> {
		if (!this.actuator.available) {
			return;
		}

		try {
			await this.throttle.run(async () => {
				await this.actuator.setThrottle('left', pair.left);
				await this.actuator.setThrottle('right', pair.right);
			});
		} catch (error) {
			throw new TransientIOError('setThrottle', `Actuator write failed: ${toErrorMessage(error)}`, error);
		}
	}

	private async zeroBothSides(): Promise<string[]> {
		if (!this.actuator.available) {
			return [];
		}

		const sides: MotorSide[] = ['left', 'right'];
		const outcomes = await Promise.allSettled(sides.map((side) => this.zeroSide(side)));
		const errors: string[] = [];
		outcomes.forEach((outcome, index) => {
			if (outcome.status === 'rejected') {
				errors.push(`${sides[index]}: ${toErrorMessage(outcome.reason)}`);
			}
		});
		return errors;
	}

	private async zeroSide(side: MotorSide): Promise<void> {
		const settled = await settleWithin(this.actuator.setThrottle(side, 0), this.settleTimeoutMs);
		if (settled.status === 'failed') {
			throw settled.error;
		}
		if (settled.status === 'timeout') {
			throw new TransientIOError('setThrottle', `zero write timed out after ${this.settleTimeoutMs} ms`);
		}
	}

	private toThrottlePair(command: Exclude<MotionCommand, { kind: 'emergencyStop' }>): ThrottlePair {
		switch (command.kind) {
			case 'stop':
				return { left: 0, right: 0 };
			case 'steer':
				return computeDifferential(command.speed, command.direction);
			case 'forward': {
				const m = command.magnitude ?? this.defaultSpeed;
				return { left: m, right: m };
			}
			case 'backward': {
				const m = command.magnitude ?? this.defaultSpeed;
				return { left: -m, right: -m };
			}
			case 'turnLeft':
				return { left: 0, right: this.turnMagnitude(command) };
			case 'turnRight':
				return { left: this.turnMagnitude(command), right: 0 };
			case 'spinLeft': {
				const m = this.turnMagnitude(command);
				return { left: -m, right: m };
			}
			case 'spinRight': {
				const m = this.turnMagnitude(command);
				return { left: m, right: -m };
			}
		}
	}

	private turnMagnitude(command: DirectionalCommand): number {
		return command.magnitude ?? this.turnSpeed;
	}

	private scheduleAutoStop(delayMs: number): void {
		const token = ++this.autoStopToken;
		this.autoStopTimer = setTimeout(() => {
			void this.runAutoStop(token);
		}, delayMs);
	}

	private cancelAutoStop(): void {
		this.autoStopToken += 1;
		if (this.autoStopTimer) {
			clearTimeout(this.autoStopTimer);
			this.autoStopTimer = undefined;
		}
	}

	private async runAutoStop(token: number): Promise<void> {
		const issuedGeneration = this.generation;
		try {
			await this.withLock(async () => {
				// A command applied after the timer fired owns the motors now.
				if (token !== this.autoStopToken) {
					return;
				}
				this.logger.debug('Auto-stop timer elapsed');
				await this.applyCommand({ kind: 'stop' }, issuedGeneration);
			});
		} catch (error) {
			this.logger.warn('Auto-stop failed', { error: toErrorMessage(error) });
		}
	}

	private setMotionState(next: RobotMotionState, throttleChanged: boolean): void {
		const previous = this.motionState;
		this.motionState = next;
		if (previous === next && !throttleChanged) {
			return;
		}

		const status = this.getStatus();
		for (const listener of [...this.listeners]) {
			try {
				listener(status);
			} catch (error) {
				this.logger.warn('Robot state listener failed', { error: toErrorMessage(error) });
			}
		}
	}
}

type Settled<T> = { status: 'done'; value: T } | { status: 'failed'; error: unknown } | { status: 'timeout' };

async function settleWithin<T>(promise: Promise<T>, timeoutMs: number): Promise<Settled<T>> {
	let timer: NodeJS.Timeout | undefined;
	const deadline = new Promise<Settled<T>>((resolve) => {
		timer = setTimeout(() => resolve({ status: 'timeout' }), timeoutMs);
	});
	const outcome = promise.then(
		(value): Settled<T> => ({ status: 'done', value }),
		(error: unknown): Settled<T> => ({ status: 'failed', error })
	);
	try {
		return await Promise.race([outcome, deadline]);
	} finally {
		clearTimeout(timer);
	}
}

/**
 * Range checks applied before a command is queued or executed; nothing
 * reaches the actuator when this throws.
 */
export function validateMotionCommand(command: MotionCommand): void {
	if (command.kind === 'stop' || command.kind === 'emergencyStop') {
		return;
	}

	if (command.kind === 'steer') {
		assertThrottle('speed', command.speed);
		assertThrottle('direction', command.direction);
	} else if (command.magnitude !== undefined) {
		assertThrottle('magnitude', command.magnitude);
	}

	if (command.durationSeconds !== undefined) {
		if (!Number.isFinite(command.durationSeconds) || command.durationSeconds < 0) {
			throw new ValidationError(`durationSeconds must be a finite number >= 0, got ${command.durationSeconds}.`, {
				field: 'durationSeconds'
			});
		}
	}
}

function assertThrottle(field: string, value: number): void {
	if (!isThrottleInRange(value)) {
		throw new ValidationError(`${field} must be within [-1, 1], got ${value}.`, { field });
	}
}
