import type { ThrottlePair } from './motionTypes';

export const MIN_THROTTLE = -1;
export const MAX_THROTTLE = 1;

export interface MotorCalibration {
	leftTrim: number;
	rightTrim: number;
	leftInverted: boolean;
	rightInverted: boolean;
}

export const NEUTRAL_CALIBRATION: Readonly<MotorCalibration> = {
	leftTrim: 0,
	rightTrim: 0,
	leftInverted: false,
	rightInverted: false
};

export function clampThrottle(value: number): number {
	return Math.max(MIN_THROTTLE, Math.min(MAX_THROTTLE, value));
}

export function isThrottleInRange(value: number): boolean {
	return Number.isFinite(value) && value >= MIN_THROTTLE && value <= MAX_THROTTLE;
}

/**
 * Differential steering: half of `direction` is added to the left side and
 * removed from the right. When either side saturates, both are scaled by the
 * same factor so the larger one lands on ±1 and the turn ratio is kept.
 */
export function computeDifferential(speed: number, direction: number): ThrottlePair {
	let left = speed + direction / 2;
	let right = speed - direction / 2;

	const peak = Math.max(Math.abs(left), Math.abs(right));
	if (peak > MAX_THROTTLE) {
		left /= peak;
		right /= peak;
	}

	return { left, right };
}

/**
 * Trim, then inversion, then the final clamp to [-1, 1].
 */
export function applyMotorCalibration(pair: ThrottlePair, calibration: Readonly<MotorCalibration>): ThrottlePair {
	let left = pair.left + calibration.leftTrim;
	let right = pair.right + calibration.rightTrim;

	if (calibration.leftInverted) {
		left = -left;
	}
	if (calibration.rightInverted) {
		right = -right;
	}

	// `+ 0` folds -0 into 0 so stopped sides compare equal to zero.
	return {
		left: clampThrottle(left) + 0,
		right: clampThrottle(right) + 0
	};
}
