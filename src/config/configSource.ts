import * as fs from 'node:fs';

/**
 * Read-only key/value view over the layered configuration. Keys are dotted
 * section paths such as `drive.defaultSpeed`.
 */
export interface ConfigSource {
	get(key: string): unknown;
}

export interface ConfigSourceOptions {
	/** Optional JSON file with nested sections. */
	filePath?: string;
	env?: NodeJS.ProcessEnv;
}

export const ENV_PREFIX = 'ROVER_';

/** `drive.defaultSpeed` → `ROVER_DRIVE_DEFAULT_SPEED`. */
export function envNameForKey(key: string): string {
	const snake = key
		.split('.')
		.map((part) => part.replace(/([a-z0-9])([A-Z])/g, '$1_$2'))
		.join('_');
	return `${ENV_PREFIX}${snake.toUpperCase()}`;
}

/**
 * Environment values arrive as strings: `true`/`false` become booleans and
 * numeric text becomes a number so the sanitizers see typed values.
 */
export function coerceEnvValue(raw: string): unknown {
	const value = raw.trim();
	if (/^(true|false)$/i.test(value)) {
		return value.toLowerCase() === 'true';
	}
	if (/^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i.test(value)) {
		return Number(value);
	}
	return value;
}

function lookup(tree: unknown, key: string): unknown {
	let node: unknown = tree;
	for (const part of key.split('.')) {
		if (typeof node !== 'object' || node === null || Array.isArray(node)) {
			return undefined;
		}
		node = Object.prototype.hasOwnProperty.call(node, part) ? Reflect.get(node, part) : undefined;
	}
	return node;
}

export function readConfigFile(filePath: string): unknown {
	const text = fs.readFileSync(filePath, 'utf8');
	try {
		return JSON.parse(text);
	} catch (error) {
		const detail = error instanceof Error ? error.message : String(error);
		throw new Error(`Configuration file ${filePath} is not valid JSON. (${detail})`);
	}
}

export function createObjectConfigSource(tree: unknown, env: NodeJS.ProcessEnv = {}): ConfigSource {
	return {
		get: (key) => {
			const fromEnv = env[envNameForKey(key)];
			if (fromEnv !== undefined && fromEnv.trim().length > 0) {
				return coerceEnvValue(fromEnv);
			}
			return lookup(tree, key);
		}
	};
}

/** Environment overrides win over the file; missing keys read as `undefined`. */
export function createConfigSource(options: ConfigSourceOptions = {}): ConfigSource {
	const tree = options.filePath ? readConfigFile(options.filePath) : {};
	return createObjectConfigSource(tree, options.env ?? process.env);
}
