import { once } from 'node:events';
import { IncomingMessage, Server, ServerResponse, createServer } from 'node:http';
import type { AddressInfo } from 'node:net';
import WebSocket, { RawData, WebSocketServer } from 'ws';
import type { CommandIntake } from '../commands/commandIntake';
import { errorMessage, handleControlMessage } from '../commands/controlProtocol';
import { Logger, NoopLogger } from '../diagnostics/logger';
import { toErrorMessage } from '../errors/RoverError';
import type { FrameBuffer } from '../stream/frameBuffer';
import type { FrameCache } from '../stream/frameCache';
import { mjpegContentType, mjpegParts } from '../stream/viewerStream';
import type { ConnectionFanout, FanoutSubscriber } from '../telemetry/connectionFanout';
import { RoverStatus, toStatusMessage } from '../telemetry/statusSnapshot';

/** The parts of a ws socket the subscriber adapter touches. */
export interface SocketLike {
	readonly readyState: number;
	readonly bufferedAmount: number;
	send(data: string, callback: (error?: Error) => void): void;
	close(code?: number, reason?: string): void;
}

export interface WsGatewayOptions {
	host?: string;
	port: number;
	wsPath?: string;
	intake: Pick<CommandIntake, 'submitCommand' | 'submitSteer' | 'submitAxes' | 'emergencyStop'>;
	getStatus: () => RoverStatus;
	fanout: ConnectionFanout;
	buffer?: FrameBuffer;
	cache?: FrameCache;
	/** Outbound bytes a socket may have queued before it is treated as slow. */
	maxBufferedBytes?: number;
	/** Per-wait timeout of an MJPEG viewer. */
	viewerWaitMs?: number;
	logger?: Logger;
}

export const DEFAULT_WS_PATH = '/ws';
export const DEFAULT_MAX_BUFFERED_BYTES = 1024 * 1024;

const CLOSE_GOING_AWAY = 1001;

function rawDataToString(data: RawData): string {
	if (Buffer.isBuffer(data)) {
		return data.toString('utf8');
	}
	if (Array.isArray(data)) {
		return Buffer.concat(data).toString('utf8');
	}
	return Buffer.from(data).toString('utf8');
}

export function createSocketSubscriber(id: string, socket: SocketLike, maxBufferedBytes: number = DEFAULT_MAX_BUFFERED_BYTES): FanoutSubscriber {
	return {
		id,
		send: (message) => {
			if (socket.readyState !== WebSocket.OPEN) {
				return Promise.reject(new Error('socket is not open'));
			}
			if (socket.bufferedAmount > maxBufferedBytes) {
				return Promise.reject(new Error(`socket backlog ${socket.bufferedAmount} bytes exceeds ${maxBufferedBytes}`));
			}
			return new Promise<void>((resolve, reject) => {
				socket.send(message, (error) => {
					if (error) {
						reject(error);
						return;
					}
					resolve();
				});
			});
		},
		close: (reason) => {
			if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
				// Close reasons are limited to 123 bytes.
				socket.close(CLOSE_GOING_AWAY, (reason ?? '').slice(0, 120));
			}
		}
	};
}

/**
 * HTTP + WebSocket front door: control messages and status pushes on the
 * WebSocket path, the MJPEG feed on `/stream`, the status document on `/status`.
 */
export class WsGateway {
	private readonly host?: string;
	private readonly port: number;
	private readonly wsPath: string;
	private readonly options: WsGatewayOptions;
	private readonly maxBufferedBytes: number;
	private readonly logger: Logger;
	private readonly viewers = new Set<AbortController>();

	private server?: Server;
	private wss?: WebSocketServer;
	private connectionCounter = 0;

	public constructor(options: WsGatewayOptions) {
		this.options = options;
		this.host = options.host;
		this.port = options.port;
		this.wsPath = options.wsPath ?? DEFAULT_WS_PATH;
		this.maxBufferedBytes = options.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
		this.logger = options.logger ?? new NoopLogger();
	}

	public get address(): AddressInfo | undefined {
		const address = this.server?.address();
		return address && typeof address === 'object' ? address : undefined;
	}

	public async start(): Promise<void> {
		if (this.server) {
			return;
		}

		const server = createServer((req, res) => {
			void this.handleHttp(req, res);
		});
		const wss = new WebSocketServer({ server, path: this.wsPath });
		wss.on('connection', (socket) => this.handleConnection(socket));
		wss.on('error', (error) => this.logger.warn('WebSocket server error', { error: error.message }));

		server.listen(this.port, this.host);
		await once(server, 'listening');
		this.server = server;
		this.wss = wss;
		this.logger.info('Gateway listening', { port: this.address?.port ?? this.port, wsPath: this.wsPath });
	}

	public async stop(): Promise<void> {
		for (const viewer of this.viewers) {
			viewer.abort();
		}
		this.viewers.clear();

		const wss = this.wss;
		const server = this.server;
		this.wss = undefined;
		this.server = undefined;

		if (wss) {
			for (const client of wss.clients) {
				client.terminate();
			}
			await new Promise<void>((resolve) => wss.close(() => resolve()));
		}
		if (server) {
			await new Promise<void>((resolve, reject) => {
				server.close((error) => (error ? reject(error) : resolve()));
			});
		}
	}

	private handleConnection(socket: WebSocket): void {
		this.connectionCounter += 1;
		const id = `ws-${this.connectionCounter}`;
		const { fanout } = this.options;
		fanout.subscribe(createSocketSubscriber(id, socket, this.maxBufferedBytes));
		this.logger.info('Client connected', { id, subscribers: fanout.size });

		void this.reply(id, toStatusMessage(this.options.getStatus()));

		socket.on('message', (data, isBinary) => {
			if (isBinary) {
				void this.reply(id, errorMessage('INVALID_MESSAGE', 'Binary messages are not supported.'));
				return;
			}
			void this.handleText(id, rawDataToString(data));
		});
		socket.on('close', () => {
			fanout.unsubscribe(id);
			this.logger.info('Client disconnected', { id, subscribers: fanout.size });
		});
		socket.on('error', (error) => {
			this.logger.warn('Client socket error', { id, error: error.message });
			fanout.unsubscribe(id);
		});
	}

	private async handleText(id: string, raw: string): Promise<void> {
		try {
			const response = await handleControlMessage(raw, {
				intake: this.options.intake,
				getStatus: this.options.getStatus
			});
			await this.reply(id, response);
		} catch (error) {
			this.logger.error('Control message handling failed', { id, error: toErrorMessage(error) });
			await this.reply(id, errorMessage('INTERNAL', toErrorMessage(error)));
		}
	}

	private async reply(id: string, message: unknown): Promise<void> {
		const delivered = await this.options.fanout.sendTo(id, message);
		if (!delivered) {
			this.logger.debug('Reply not delivered', { id });
		}
	}

	private async handleHttp(req: IncomingMessage, res: ServerResponse): Promise<void> {
		const url = new URL(req.url ?? '/', 'http://localhost');
		try {
			if (req.method === 'GET' && url.pathname === '/status') {
				const body = JSON.stringify(this.options.getStatus());
				res.writeHead(200, { 'Content-Type': 'application/json' });
				res.end(body);
				return;
			}
			if (req.method === 'GET' && url.pathname === '/stream' && this.options.buffer) {
				await this.serveStream(req, res, this.options.buffer);
				return;
			}
			res.writeHead(404, { 'Content-Type': 'text/plain' });
			res.end('Not found');
		} catch (error) {
			this.logger.warn('HTTP request failed', { path: url.pathname, error: toErrorMessage(error) });
			if (!res.headersSent) {
				res.writeHead(500, { 'Content-Type': 'text/plain' });
			}
			res.end();
		}
	}

	private async serveStream(req: IncomingMessage, res: ServerResponse, buffer: FrameBuffer): Promise<void> {
		const controller = new AbortController();
		this.viewers.add(controller);
		req.on('close', () => controller.abort());

		res.writeHead(200, {
			'Content-Type': mjpegContentType(),
			'Cache-Control': 'no-cache, private',
			Pragma: 'no-cache',
			Connection: 'close'
		});

		this.logger.debug('Viewer attached', { viewers: this.viewers.size });
		try {
			const parts = mjpegParts(buffer, {
				signal: controller.signal,
				cache: this.options.cache,
				waitTimeoutMs: this.options.viewerWaitMs
			});
			for await (const part of parts) {
				if (!res.write(part)) {
					await once(res, 'drain', { signal: controller.signal });
				}
			}
		} catch (error) {
			if (!controller.signal.aborted) {
				throw error;
			}
		} finally {
			this.viewers.delete(controller);
			res.end();
			this.logger.debug('Viewer detached', { viewers: this.viewers.size });
		}
	}
}
