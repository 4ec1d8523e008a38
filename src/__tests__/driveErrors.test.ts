import assert from 'node:assert/strict';
import test from 'node:test';
import {
	DeviceUnavailableError,
	ShutdownError,
	ValidationError,
	deviceReasonFromErrno,
	isRoverErrorCode,
	recoveryActionFor,
	recoveryActionForCode
} from '../errors/driveErrors';
import { RoverError, toErrorMessage } from '../errors/RoverError';

test('ValidationError defaults to OUT_OF_RANGE and keeps the field', () => {
	const error = new ValidationError('speed must be within [-1, 1], got 2.', { field: 'speed' });

	assert.ok(error instanceof RoverError);
	assert.equal(error.code, 'OUT_OF_RANGE');
	assert.equal(error.field, 'speed');
	assert.equal(error.name, 'ValidationError');
});

test('deviceReasonFromErrno groups errno codes', () => {
	assert.equal(deviceReasonFromErrno('ENOENT'), 'not-found');
	assert.equal(deviceReasonFromErrno('ENODEV'), 'not-found');
	assert.equal(deviceReasonFromErrno('EACCES'), 'permission-denied');
	assert.equal(deviceReasonFromErrno('EPERM'), 'permission-denied');
	assert.equal(deviceReasonFromErrno('EBUSY'), 'io-error');
	assert.equal(deviceReasonFromErrno(undefined), 'io-error');
});

test('recoveryActionFor points permission problems at permissions', () => {
	const denied = new DeviceUnavailableError({ device: 'joystick', reason: 'permission-denied', message: 'denied' });
	const missing = new DeviceUnavailableError({ device: 'actuator', reason: 'not-found', message: 'missing' });

	assert.equal(recoveryActionFor(denied), 'check-permissions');
	assert.equal(recoveryActionFor(missing), 'check-device');
});

test('recoveryActionForCode looks codes up in the catalogue', () => {
	assert.equal(isRoverErrorCode('SHUTDOWN'), true);
	assert.equal(isRoverErrorCode('toString'), false);
	assert.equal(recoveryActionForCode(new ShutdownError().code), 'none');
	assert.equal(recoveryActionForCode('TRANSIENT_IO'), 'retry');
	assert.equal(recoveryActionForCode('UNKNOWN_MESSAGE_TYPE'), 'fix-input');
	assert.equal(recoveryActionForCode('toString'), 'none');
});

test('toErrorMessage accepts non-Error values', () => {
	assert.equal(toErrorMessage(new Error('boom')), 'boom');
	assert.equal(toErrorMessage('plain'), 'plain');
	assert.equal(toErrorMessage(7), '7');
});
