import { z } from 'zod';
import { recoveryActionForCode } from '../errors/driveErrors';
import { RoverStatus, StatusMessage, toStatusMessage } from '../telemetry/statusSnapshot';
import type { CommandIntake, IntakeError, IntakeResult } from './commandIntake';

// Ranges are checked by the intake so out-of-range values report OUT_OF_RANGE.
const throttleValue = z.number();

const CommandMessageSchema = z.object({
	type: z.literal('command'),
	command: z.string().trim().min(1),
	magnitude: throttleValue.optional(),
	durationSeconds: z.number().optional(),
	realtime: z.boolean().optional()
});

const SteerMessageSchema = z.object({
	type: z.literal('steer'),
	speed: throttleValue,
	direction: throttleValue,
	durationSeconds: z.number().optional(),
	realtime: z.boolean().optional()
});

const JoystickMessageSchema = z.object({
	type: z.literal('joystick'),
	x: throttleValue,
	y: throttleValue
});

const EmergencyStopMessageSchema = z.object({
	type: z.literal('emergencyStop')
});

const GetStatusMessageSchema = z.object({
	type: z.literal('getStatus')
});

export const ControlMessageSchema = z.discriminatedUnion('type', [
	CommandMessageSchema,
	SteerMessageSchema,
	JoystickMessageSchema,
	EmergencyStopMessageSchema,
	GetStatusMessageSchema
]);

export type ControlMessage = z.infer<typeof ControlMessageSchema>;

export const CONTROL_MESSAGE_TYPES: readonly ControlMessage['type'][] = [
	'command',
	'steer',
	'joystick',
	'emergencyStop',
	'getStatus'
];

export interface CommandResultMessage {
	type: 'commandResult';
	request: ControlMessage['type'];
	command?: string;
	result: IntakeResult;
	timestamp: number;
}

export interface ErrorMessage {
	type: 'error';
	error: IntakeError;
	timestamp: number;
}

export type OutboundMessage = CommandResultMessage | StatusMessage | ErrorMessage;

export interface ControlHandlerDeps {
	intake: Pick<CommandIntake, 'submitCommand' | 'submitSteer' | 'submitAxes' | 'emergencyStop'>;
	getStatus: () => RoverStatus;
	now?: () => number;
}

export function errorMessage(code: string, message: string, timestamp: number = Date.now()): ErrorMessage {
	return { type: 'error', error: { code, message, action: recoveryActionForCode(code) }, timestamp };
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses one inbound text frame and runs it. Always produces exactly one
 * reply; malformed input becomes an `error` message, never an exception.
 */
export async function handleControlMessage(raw: string, deps: ControlHandlerDeps): Promise<OutboundMessage> {
	const now = deps.now ?? Date.now;

	let payload: unknown;
	try {
		payload = JSON.parse(raw);
	} catch {
		return errorMessage('INVALID_MESSAGE', 'Message is not valid JSON.', now());
	}

	if (!isRecord(payload)) {
		return errorMessage('INVALID_MESSAGE', 'Expected a JSON object.', now());
	}
	const type = payload.type;
	if (!CONTROL_MESSAGE_TYPES.some((known) => known === type)) {
		return errorMessage('UNKNOWN_MESSAGE_TYPE', `Unknown message type: ${String(type)}.`, now());
	}

	const parsed = ControlMessageSchema.safeParse(payload);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
		return errorMessage('INVALID_MESSAGE', `${where}${issue?.message ?? 'invalid payload'}`, now());
	}

	const message = parsed.data;
	switch (message.type) {
		case 'getStatus':
			return toStatusMessage(deps.getStatus(), now());
		case 'command': {
			const result = await deps.intake.submitCommand(message.command, message.magnitude, {
				durationSeconds: message.durationSeconds,
				realtime: message.realtime
			});
			return { type: 'commandResult', request: 'command', command: message.command, result, timestamp: now() };
		}
		case 'steer': {
			const result = await deps.intake.submitSteer(message.speed, message.direction, {
				durationSeconds: message.durationSeconds,
				realtime: message.realtime
			});
			return { type: 'commandResult', request: 'steer', result, timestamp: now() };
		}
		case 'joystick': {
			const result = await deps.intake.submitAxes(message.x, message.y);
			return { type: 'commandResult', request: 'joystick', result, timestamp: now() };
		}
		case 'emergencyStop': {
			const result = await deps.intake.emergencyStop();
			return { type: 'commandResult', request: 'emergencyStop', command: 'emergencyStop', result, timestamp: now() };
		}
	}
}
