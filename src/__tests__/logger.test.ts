import assert from 'node:assert/strict';
import test from 'node:test';
import { LineLogger, NoopLogger, ScopedLogger, formatLogLine } from '../diagnostics/logger';

const fixedClock = () => new Date('2024-05-01T10:00:00.000Z');

function createLineLogger(level: 'warn' | 'info' | 'trace') {
	const lines: string[] = [];
	const logger = new LineLogger((line) => lines.push(line), level, fixedClock);
	return { logger, lines };
}

test('LineLogger drops records below the configured level', () => {
	const { logger, lines } = createLineLogger('warn');

	logger.error('motor fault');
	logger.warn('slow viewer');
	logger.info('ignored');
	logger.debug('ignored');

	assert.deepEqual(lines, [
		'[2024-05-01T10:00:00.000Z] [error] motor fault',
		'[2024-05-01T10:00:00.000Z] [warn] slow viewer'
	]);
});

test('LineLogger appends metadata as JSON', () => {
	const { logger, lines } = createLineLogger('trace');

	logger.debug('throttle', { left: 0.5, right: -0.25 });
	logger.trace('empty meta', {});

	assert.deepEqual(lines, [
		'[2024-05-01T10:00:00.000Z] [debug] throttle {"left":0.5,"right":-0.25}',
		'[2024-05-01T10:00:00.000Z] [trace] empty meta'
	]);
});

test('formatLogLine renders Error values by name and message', () => {
	const line = formatLogLine(fixedClock(), 'error', 'write failed', { error: new TypeError('port closed') });

	assert.equal(line, '[2024-05-01T10:00:00.000Z] [error] write failed {"error":"TypeError: port closed"}');
});

test('formatLogLine falls back for unserializable metadata', () => {
	const circular: Record<string, unknown> = {};
	circular.self = circular;

	const line = formatLogLine(fixedClock(), 'info', 'circular', circular);

	assert.equal(line, '[2024-05-01T10:00:00.000Z] [info] circular {"meta":"unserializable"}');
});

test('ScopedLogger prefixes messages and flattens nested scopes', () => {
	const { logger, lines } = createLineLogger('info');
	const scoped = new ScopedLogger(new ScopedLogger(logger, 'drive'), 'serial');

	scoped.debug('hidden');
	scoped.info('connected', { path: '/dev/ttyTEST0' });

	assert.equal(scoped.scope, 'drive/serial');
	assert.deepEqual(lines, ['[2024-05-01T10:00:00.000Z] [info] [drive/serial] connected {"path":"/dev/ttyTEST0"}']);
});

test('NoopLogger accepts every level', () => {
	const logger = new NoopLogger();
	logger.error('e');
	logger.warn('w');
	logger.info('i');
	logger.debug('d');
	logger.trace('t');
	assert.ok(true);
});
