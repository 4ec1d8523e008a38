import assert from 'node:assert/strict';
import test from 'node:test';
import { sanitizeBoolean, sanitizeEnum, sanitizeFloat, sanitizeNumber, sanitizeString } from '../config/sanitizers';

const ACTUATOR_KINDS = ['serial', 'mock', 'none'] as const;

test('sanitizeBoolean accepts only real booleans', () => {
	assert.equal(sanitizeBoolean(false, true), false);
	assert.equal(sanitizeBoolean('false', true), true);
	assert.equal(sanitizeBoolean(0, true), true);
	assert.equal(sanitizeBoolean(undefined, false), false);
});

test('sanitizeNumber floors and clamps integer settings', () => {
	assert.equal(sanitizeNumber(49.9, 50, 0), 49);
	assert.equal(sanitizeNumber(-10, 50, 0), 0);
	assert.equal(sanitizeNumber(70_000, 8080, 1, 65_535), 65_535);
});

test('sanitizeNumber falls back on non-finite or non-numeric input', () => {
	assert.equal(sanitizeNumber(Number.NaN, 50, 0), 50);
	assert.equal(sanitizeNumber(Number.POSITIVE_INFINITY, 50, 0), 50);
	assert.equal(sanitizeNumber('20', 50, 0), 50);
});

test('sanitizeFloat keeps fractions inside the range', () => {
	assert.equal(sanitizeFloat(0.15, 0.1, 0, 1), 0.15);
	assert.equal(sanitizeFloat(1.4, 0.1, 0, 1), 1);
	assert.equal(sanitizeFloat(-0.3, 0, -0.2, 0.2), -0.2);
	assert.equal(sanitizeFloat(Number.NaN, 0.1, 0, 1), 0.1);
	assert.equal(sanitizeFloat('0.3', 0.1, 0, 1), 0.1);
});

test('sanitizeEnum keeps allowed values and falls back otherwise', () => {
	assert.equal(sanitizeEnum('mock', ACTUATOR_KINDS, 'serial'), 'mock');
	assert.equal(sanitizeEnum('usb', ACTUATOR_KINDS, 'serial'), 'serial');
	assert.equal(sanitizeEnum(1, ACTUATOR_KINDS, 'none'), 'none');
});

test('sanitizeString trims and falls back on blank input', () => {
	assert.equal(sanitizeString('  /dev/ttyACM0 ', '/dev/ttyUSB0'), '/dev/ttyACM0');
	assert.equal(sanitizeString('   ', '/dev/ttyUSB0'), '/dev/ttyUSB0');
	assert.equal(sanitizeString(7, '/dev/ttyUSB0'), '/dev/ttyUSB0');
});
