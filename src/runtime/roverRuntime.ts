import { CommandIntake } from '../commands/commandIntake';
import type { RoverConfig } from '../config/ConfigService';
import { Logger, NoopLogger, ScopedLogger } from '../diagnostics/logger';
import { JoystickDrive, JoystickDriveState } from '../device/joystickDrive';
import { JoystickEventStream } from '../device/joystickEventStream';
import { MotorActuator, NullMotorActuator } from '../device/motorActuator';
import type { MotionCommand } from '../drive/motionTypes';
import { RobotController, RobotStatus } from '../drive/robotController';
import { DeviceUnavailableError, recoveryActionFor } from '../errors/driveErrors';
import { toErrorMessage } from '../errors/RoverError';
import { MockMotorActuator } from '../mock/mockMotorActuator';
import { CommandBatcher } from '../scheduler/commandBatcher';
import { CommandThrottle } from '../scheduler/commandThrottle';
import { FrameBuffer } from '../stream/frameBuffer';
import { FrameCache } from '../stream/frameCache';
import { FramePump, FrameSource } from '../stream/framePump';
import { createFileFrameSource, createStdinFrameSource } from '../stream/jpegStreamSource';
import { ConnectionFanout } from '../telemetry/connectionFanout';
import { RoverStatus, buildStatusSnapshot, toJoystickStateMessage, toStatusMessage } from '../telemetry/statusSnapshot';
import { JoystickDeviceOpener, detectJoystickDevice } from '../transport/joystickDevice';
import { SerialMotorActuator, SerialPortFactory } from '../transport/serialMotorActuator';
import { WsGateway } from '../transport/wsGateway';

export interface RoverRuntimeOptions {
	config: RoverConfig;
	logger?: Logger;
	/** Replaces the actuator chosen by `drive.actuator`. */
	actuator?: MotorActuator;
	serialPortFactory?: SerialPortFactory;
	/** Replaces the source chosen by `stream.source`; `null` disables the pump. */
	frameSource?: FrameSource | null;
	joystickOpener?: JoystickDeviceOpener;
}

export type RuntimeState = 'created' | 'running' | 'stopping' | 'stopped';

/**
 * Opens the configured actuator. A serial controller that cannot be opened
 * degrades to the dummy actuator so the rest of the rover keeps working.
 */
export async function openActuator(
	config: RoverConfig['drive'],
	logger: Logger,
	serialPortFactory?: SerialPortFactory
): Promise<MotorActuator> {
	if (config.actuator === 'none') {
		return new NullMotorActuator('disabled');
	}
	if (config.actuator === 'mock') {
		const mock = new MockMotorActuator();
		await mock.open();
		return mock;
	}

	const serial = new SerialMotorActuator({
		path: config.serialPath,
		baudRate: config.baudRate,
		portFactory: serialPortFactory,
		logger
	});
	try {
		await serial.open();
		return serial;
	} catch (error) {
		if (!(error instanceof DeviceUnavailableError)) {
			throw error;
		}
		logger.warn('Motor controller unavailable; running in dummy mode', {
			path: config.serialPath,
			reason: error.reason,
			action: recoveryActionFor(error),
			error: error.message
		});
		return new NullMotorActuator('dummy');
	}
}

function createFrameSource(config: RoverConfig['stream']): FrameSource | undefined {
	switch (config.source) {
		case 'stdin':
			return createStdinFrameSource(config.maxFrameBytes);
		case 'file':
			return config.sourcePath ? createFileFrameSource(config.sourcePath, config.maxFrameBytes) : undefined;
		case 'none':
			return undefined;
	}
}

/**
 * Composition root. Owns every long-lived component and tears them down in
 * dependency order.
 */
export class RoverRuntime {
	public readonly buffer: FrameBuffer;
	public readonly cache: FrameCache;
	public readonly controller: RobotController;
	public readonly intake: CommandIntake;
	public readonly fanout: ConnectionFanout;
	public readonly batcher?: CommandBatcher<MotionCommand, RobotStatus>;

	private readonly config: RoverConfig;
	private readonly logger: Logger;
	private readonly actuator: MotorActuator;
	private readonly frameSource?: FrameSource;
	private readonly joystickOpener?: JoystickDeviceOpener;
	private readonly startedAt = Date.now();

	private state: RuntimeState = 'created';
	private pump?: FramePump;
	private joystick?: JoystickEventStream;
	private joystickDrive?: JoystickDrive;
	private joystickLoop?: Promise<void>;
	private gateway?: WsGateway;
	private unsubscribeState?: () => void;

	private constructor(options: RoverRuntimeOptions, actuator: MotorActuator) {
		const { config } = options;
		this.config = config;
		this.logger = options.logger ?? new NoopLogger();
		this.actuator = actuator;
		this.frameSource = options.frameSource === undefined ? createFrameSource(config.stream) : options.frameSource ?? undefined;
		this.joystickOpener = options.joystickOpener;
		const driveLogger = new ScopedLogger(this.logger, 'drive');

		this.buffer = new FrameBuffer();
		this.cache = new FrameCache({ maxFrames: config.stream.maxCachedFrames, ttlMs: config.stream.frameTtlMs });
		this.controller = new RobotController({
			actuator,
			throttle: new CommandThrottle({ minIntervalMs: config.drive.throttleIntervalMs, logger: driveLogger }),
			calibration: {
				leftTrim: config.drive.leftTrim,
				rightTrim: config.drive.rightTrim,
				leftInverted: config.drive.leftInverted,
				rightInverted: config.drive.rightInverted
			},
			defaultSpeed: config.drive.defaultSpeed,
			turnSpeed: config.drive.turnSpeed,
			settleTimeoutMs: config.drive.settleTimeoutMs,
			logger: driveLogger
		});
		if (config.batching.enabled) {
			this.batcher = new CommandBatcher<MotionCommand, RobotStatus>({
				apply: (command) => this.controller.execute(command),
				batchSize: config.batching.batchSize,
				batchTimeoutMs: config.batching.batchTimeoutMs,
				logger: driveLogger
			});
		}
		this.intake = new CommandIntake({
			controller: this.controller,
			batcher: this.batcher,
			deadzone: config.joystick.deadzone,
			turnSpeed: config.drive.turnSpeed,
			logger: new ScopedLogger(this.logger, 'intake')
		});
		this.fanout = new ConnectionFanout({
			sendTimeoutMs: config.fanout.sendTimeoutMs,
			maxPendingSends: config.fanout.maxPendingSends,
			logger: new ScopedLogger(this.logger, 'fanout')
		});
	}

	public static async create(options: RoverRuntimeOptions): Promise<RoverRuntime> {
		const logger = options.logger ?? new NoopLogger();
		const actuator = options.actuator ?? (await openActuator(options.config.drive, logger, options.serialPortFactory));
		return new RoverRuntime(options, actuator);
	}

	public getState(): RuntimeState {
		return this.state;
	}

	public get gatewayPort(): number | undefined {
		return this.gateway?.address?.port;
	}

	public getStatus(): RoverStatus {
		return buildStatusSnapshot({
			controller: this.controller,
			cache: this.cache,
			batcher: this.batcher,
			buffer: this.buffer,
			joystick: this.joystick,
			fanout: this.fanout,
			startedAt: this.startedAt
		});
	}

	public async start(): Promise<void> {
		if (this.state !== 'created') {
			return;
		}
		this.state = 'running';

		this.unsubscribeState = this.controller.onStateChange(() => {
			void this.broadcastStatus();
		});
		this.batcher?.start();

		if (this.frameSource) {
			this.pump = new FramePump({
				source: this.frameSource,
				buffer: this.buffer,
				cache: this.cache,
				retry: {
					initialBackoffMs: this.config.stream.retryInitialBackoffMs,
					maxBackoffMs: this.config.stream.retryMaxBackoffMs
				},
				logger: new ScopedLogger(this.logger, 'stream')
			});
			this.pump.start();
		} else {
			this.logger.info('No frame source configured; video stream idle');
		}

		if (this.config.joystick.enabled) {
			await this.startJoystick();
		}

		if (this.config.server.enabled) {
			this.gateway = new WsGateway({
				host: this.config.server.host,
				port: this.config.server.port,
				wsPath: this.config.server.wsPath,
				maxBufferedBytes: this.config.server.maxBufferedBytes,
				viewerWaitMs: this.config.stream.viewerWaitMs,
				intake: this.intake,
				getStatus: () => this.getStatus(),
				fanout: this.fanout,
				buffer: this.buffer,
				cache: this.cache,
				logger: new ScopedLogger(this.logger, 'gateway')
			});
			await this.gateway.start();
		}

		this.logger.info('Rover runtime started', {
			actuator: this.actuator.description,
			dummyMode: !this.actuator.available,
			batching: this.batcher !== undefined
		});
	}

	/**
	 * Stops input first, then video, then the command path, and stops the
	 * motors last.
	 */
	public async shutdown(): Promise<void> {
		if (this.state === 'stopping' || this.state === 'stopped') {
			return;
		}
		this.state = 'stopping';
		this.logger.info('Rover runtime shutting down');
		this.intake.close();

		this.joystickDrive?.detach();
		this.joystick?.stop();
		await this.joystickLoop;

		this.buffer.close();
		await this.pump?.stop();

		await this.batcher?.shutdown(this.config.batching.shutdownMode);

		this.fanout.closeAll();
		await this.stopGateway();

		this.unsubscribeState?.();
		await this.controller.shutdown();
		try {
			await this.actuator.close();
		} catch (error) {
			this.logger.warn('Actuator close failed', { error: toErrorMessage(error) });
		}

		this.state = 'stopped';
		this.logger.info('Rover runtime stopped');
	}

	private async startJoystick(): Promise<void> {
		const joystickConfig = this.config.joystick;
		let devicePath = joystickConfig.devicePath;
		if (!devicePath) {
			try {
				devicePath = (await detectJoystickDevice(joystickConfig.deviceDir))?.path ?? '';
			} catch (error) {
				this.logger.warn('Joystick auto-detection failed', { error: toErrorMessage(error) });
			}
		}
		if (!devicePath) {
			this.logger.warn('No joystick device found; joystick control disabled', { dir: joystickConfig.deviceDir });
			return;
		}

		const stream = new JoystickEventStream({
			devicePath,
			opener: this.joystickOpener,
			deadzone: joystickConfig.deadzone,
			axisScale: joystickConfig.axisScale,
			emitInitEvents: joystickConfig.emitInitEvents,
			logger: new ScopedLogger(this.logger, 'joystick')
		});
		try {
			await stream.start();
		} catch (error) {
			if (error instanceof DeviceUnavailableError) {
				this.logger.warn('Joystick unavailable; joystick control disabled', {
					path: devicePath,
					reason: error.reason,
					action: recoveryActionFor(error)
				});
				return;
			}
			throw error;
		}

		this.joystick = stream;
		this.joystickDrive = new JoystickDrive({
			stream,
			target: this.controller,
			throttleAxis: joystickConfig.throttleAxis,
			steeringAxis: joystickConfig.steeringAxis,
			stopButton: joystickConfig.stopButton,
			stateIntervalMs: joystickConfig.stateIntervalMs,
			onState: (state) => {
				void this.broadcastJoystickState(state);
			},
			logger: new ScopedLogger(this.logger, 'joystick')
		});
		this.joystickDrive.attach();
		this.joystickLoop = this.readJoystick(stream);
	}

	private async readJoystick(stream: JoystickEventStream): Promise<void> {
		try {
			let event = await stream.readNext();
			while (event) {
				event = await stream.readNext();
			}
		} catch (error) {
			this.logger.error('Joystick read loop failed', { error: toErrorMessage(error) });
		}
	}

	private async broadcastStatus(): Promise<void> {
		try {
			await this.fanout.broadcast(toStatusMessage(this.getStatus()));
		} catch (error) {
			this.logger.warn('Status broadcast failed', { error: toErrorMessage(error) });
		}
	}

	private async broadcastJoystickState(state: JoystickDriveState): Promise<void> {
		try {
			await this.fanout.broadcast(toJoystickStateMessage(state));
		} catch (error) {
			this.logger.warn('Joystick state broadcast failed', { error: toErrorMessage(error) });
		}
	}

	private async stopGateway(): Promise<void> {
		if (!this.gateway) {
			return;
		}
		try {
			await this.gateway.stop();
		} catch (error) {
			this.logger.warn('Gateway stop failed', { error: toErrorMessage(error) });
		}
		this.gateway = undefined;
	}
}
