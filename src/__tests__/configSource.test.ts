import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import test from 'node:test';
import { coerceEnvValue, createConfigSource, createObjectConfigSource, envNameForKey } from '../config/configSource';

test('envNameForKey derives prefixed upper snake case names', () => {
	assert.equal(envNameForKey('drive.defaultSpeed'), 'ROVER_DRIVE_DEFAULT_SPEED');
	assert.equal(envNameForKey('server.wsPath'), 'ROVER_SERVER_WS_PATH');
	assert.equal(envNameForKey('fanout.maxPendingSends'), 'ROVER_FANOUT_MAX_PENDING_SENDS');
});

test('coerceEnvValue turns booleans and numbers into typed values', () => {
	assert.equal(coerceEnvValue('TRUE'), true);
	assert.equal(coerceEnvValue('false'), false);
	assert.equal(coerceEnvValue(' 0.25 '), 0.25);
	assert.equal(coerceEnvValue('-3'), -3);
	assert.equal(coerceEnvValue('1e3'), 1000);
	assert.equal(coerceEnvValue('/dev/ttyACM0'), '/dev/ttyACM0');
});

test('createObjectConfigSource prefers non-empty environment values over the tree', () => {
	const source = createObjectConfigSource(
		{ drive: { defaultSpeed: 0.3, turnSpeed: 0.9 } },
		{ ROVER_DRIVE_TURN_SPEED: '0.6', ROVER_DRIVE_DEFAULT_SPEED: '  ' }
	);

	assert.equal(source.get('drive.defaultSpeed'), 0.3);
	assert.equal(source.get('drive.turnSpeed'), 0.6);
	assert.equal(source.get('drive.leftTrim'), undefined);
	assert.equal(source.get('drive.defaultSpeed.nested'), undefined);
});

test('createConfigSource reads a JSON file', () => {
	const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rover-config-'));
	try {
		const file = path.join(dir, 'rover.json');
		fs.writeFileSync(file, JSON.stringify({ server: { port: 9090 } }));

		const source = createConfigSource({ filePath: file, env: {} });

		assert.equal(source.get('server.port'), 9090);
	} finally {
		fs.rmSync(dir, { recursive: true, force: true });
	}
});

test('createConfigSource rejects a file that is not JSON', () => {
	const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rover-config-'));
	try {
		const file = path.join(dir, 'rover.json');
		fs.writeFileSync(file, '{ port: ');

		assert.throws(() => createConfigSource({ filePath: file, env: {} }), /is not valid JSON/);
	} finally {
		fs.rmSync(dir, { recursive: true, force: true });
	}
});
