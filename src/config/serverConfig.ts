import { LOG_LEVELS, LogLevel } from '../diagnostics/logger';
import { DEFAULT_MAX_PENDING_SENDS, DEFAULT_SEND_TIMEOUT_MS } from '../telemetry/connectionFanout';
import { DEFAULT_MAX_BUFFERED_BYTES, DEFAULT_WS_PATH } from '../transport/wsGateway';
import type { ConfigSource } from './configSource';
import { sanitizeBoolean, sanitizeEnum, sanitizeNumber, sanitizeString } from './sanitizers';

export interface ServerConfigSnapshot {
	enabled: boolean;
	host: string;
	port: number;
	wsPath: string;
	maxBufferedBytes: number;
}

export interface FanoutConfigSnapshot {
	sendTimeoutMs: number;
	maxPendingSends: number;
}

export interface LoggingConfigSnapshot {
	level: LogLevel;
}

/** Default HTTP/WebSocket port. */
export const DEFAULT_SERVER_PORT = 8080;

export function readServerConfig(cfg: ConfigSource): ServerConfigSnapshot {
	const wsPath = sanitizeString(cfg.get('server.wsPath'), DEFAULT_WS_PATH);
	return {
		enabled: sanitizeBoolean(cfg.get('server.enabled'), true),
		host: sanitizeString(cfg.get('server.host'), '0.0.0.0'),
		port: sanitizeNumber(cfg.get('server.port'), DEFAULT_SERVER_PORT, 0, 65_535),
		wsPath: wsPath.startsWith('/') ? wsPath : `/${wsPath}`,
		maxBufferedBytes: sanitizeNumber(cfg.get('server.maxBufferedBytes'), DEFAULT_MAX_BUFFERED_BYTES, 1024)
	};
}

export function readFanoutConfig(cfg: ConfigSource): FanoutConfigSnapshot {
	return {
		sendTimeoutMs: sanitizeNumber(cfg.get('fanout.sendTimeoutMs'), DEFAULT_SEND_TIMEOUT_MS, 10, 60_000),
		maxPendingSends: sanitizeNumber(cfg.get('fanout.maxPendingSends'), DEFAULT_MAX_PENDING_SENDS, 1, 1000)
	};
}

export function readLoggingConfig(cfg: ConfigSource): LoggingConfigSnapshot {
	return {
		level: sanitizeEnum(cfg.get('logging.level'), LOG_LEVELS, 'info')
	};
}
