#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { readRoverConfig } from './config/ConfigService';
import { createConfigSource } from './config/configSource';
import { createStderrLogger } from './diagnostics/logger';
import { toErrorMessage } from './errors/RoverError';
import { RoverRuntime } from './runtime/roverRuntime';

async function main(): Promise<void> {
	const { values } = parseArgs({
		options: {
			config: { type: 'string', short: 'c' }
		}
	});

	const config = readRoverConfig(createConfigSource({ filePath: values.config, env: process.env }));
	const logger = createStderrLogger(config.logging.level);
	const runtime = await RoverRuntime.create({ config, logger });

	let stopping = false;
	const stop = (signal: string): void => {
		if (stopping) {
			return;
		}
		stopping = true;
		logger.info('Received signal, shutting down', { signal });
		runtime.shutdown().then(
			() => process.exit(0),
			(error: unknown) => {
				logger.error('Shutdown failed', { error: toErrorMessage(error) });
				process.exit(1);
			}
		);
	};
	process.on('SIGINT', () => stop('SIGINT'));
	process.on('SIGTERM', () => stop('SIGTERM'));

	await runtime.start();
}

main().catch((error: unknown) => {
	process.stderr.write(`rover-relay failed to start: ${toErrorMessage(error)}\n`);
	process.exit(1);
});
