export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

export type LogMeta = Record<string, unknown>;

export interface Logger {
	error(message: string, meta?: LogMeta): void;
	warn(message: string, meta?: LogMeta): void;
	info(message: string, meta?: LogMeta): void;
	debug(message: string, meta?: LogMeta): void;
	trace(message: string, meta?: LogMeta): void;
}

function rankOf(level: LogLevel): number {
	return LOG_LEVELS.indexOf(level);
}

// Error instances stringify to {}; log their message instead.
function metaReplacer(_key: string, value: unknown): unknown {
	return value instanceof Error ? `${value.name}: ${value.message}` : value;
}

export function formatLogLine(timestamp: Date, level: LogLevel, message: string, meta?: LogMeta): string {
	const head = `[${timestamp.toISOString()}] [${level}] ${message}`;
	if (meta === undefined || Object.keys(meta).length === 0) {
		return head;
	}

	let rendered: string;
	try {
		rendered = JSON.stringify(meta, metaReplacer);
	} catch {
		rendered = '{"meta":"unserializable"}';
	}
	return `${head} ${rendered}`;
}

export class NoopLogger implements Logger {
	public error(_message: string, _meta?: LogMeta): void {}
	public warn(_message: string, _meta?: LogMeta): void {}
	public info(_message: string, _meta?: LogMeta): void {}
	public debug(_message: string, _meta?: LogMeta): void {}
	public trace(_message: string, _meta?: LogMeta): void {}
}

/**
 * Writes records at or above `level` to a line sink
 * (stderr in the process entry, an array in tests).
 */
export class LineLogger implements Logger {
	private readonly sink: (line: string) => void;
	private readonly threshold: number;
	private readonly clock: () => Date;

	public constructor(sink: (line: string) => void, level: LogLevel = 'info', clock: () => Date = () => new Date()) {
		this.sink = sink;
		this.threshold = rankOf(level);
		this.clock = clock;
	}

	public error(message: string, meta?: LogMeta): void {
		this.emit('error', message, meta);
	}

	public warn(message: string, meta?: LogMeta): void {
		this.emit('warn', message, meta);
	}

	public info(message: string, meta?: LogMeta): void {
		this.emit('info', message, meta);
	}

	public debug(message: string, meta?: LogMeta): void {
		this.emit('debug', message, meta);
	}

	public trace(message: string, meta?: LogMeta): void {
		this.emit('trace', message, meta);
	}

	private emit(level: LogLevel, message: string, meta?: LogMeta): void {
		if (rankOf(level) <= this.threshold) {
			this.sink(formatLogLine(this.clock(), level, message, meta));
		}
	}
}

/** Prefixes every message with `[scope]`; nested scopes join with `/`. */
export class ScopedLogger implements Logger {
	private readonly base: Logger;
	public readonly scope: string;

	public constructor(base: Logger, scope: string) {
		if (base instanceof ScopedLogger) {
			this.base = base.base;
			this.scope = `${base.scope}/${scope}`;
		} else {
			this.base = base;
			this.scope = scope;
		}
	}

	public error(message: string, meta?: LogMeta): void {
		this.base.error(this.prefix(message), meta);
	}

	public warn(message: string, meta?: LogMeta): void {
		this.base.warn(this.prefix(message), meta);
	}

	public info(message: string, meta?: LogMeta): void {
		this.base.info(this.prefix(message), meta);
	}

	public debug(message: string, meta?: LogMeta): void {
		this.base.debug(this.prefix(message), meta);
	}

	public trace(message: string, meta?: LogMeta): void {
		this.base.trace(this.prefix(message), meta);
	}

	private prefix(message: string): string {
		return `[${this.scope}] ${message}`;
	}
}

export function createStderrLogger(level: LogLevel = 'info'): LineLogger {
	return new LineLogger((line) => {
		process.stderr.write(`${line}\n`);
	}, level);
}
