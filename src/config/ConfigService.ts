import type { ConfigSource } from './configSource';
import { BatchingConfigSnapshot, DriveConfigSnapshot, readBatchingConfig, readDriveConfig } from './driveConfig';
import { JoystickConfigSnapshot, readJoystickConfig } from './joystickConfig';
import {
	FanoutConfigSnapshot,
	LoggingConfigSnapshot,
	ServerConfigSnapshot,
	readFanoutConfig,
	readLoggingConfig,
	readServerConfig
} from './serverConfig';
import { StreamConfigSnapshot, readStreamConfig } from './streamConfig';

/**
 * Snapshot of every configuration section.
 */
export interface RoverConfig {
	drive: DriveConfigSnapshot;
	batching: BatchingConfigSnapshot;
	joystick: JoystickConfigSnapshot;
	stream: StreamConfigSnapshot;
	server: ServerConfigSnapshot;
	fanout: FanoutConfigSnapshot;
	logging: LoggingConfigSnapshot;
}

/**
 * Reads all sections at once by delegating to the section readers.
 */
export function readRoverConfig(cfg: ConfigSource): RoverConfig {
	return {
		drive: readDriveConfig(cfg),
		batching: readBatchingConfig(cfg),
		joystick: readJoystickConfig(cfg),
		stream: readStreamConfig(cfg),
		server: readServerConfig(cfg),
		fanout: readFanoutConfig(cfg),
		logging: readLoggingConfig(cfg)
	};
}
