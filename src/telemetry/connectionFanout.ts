import { Logger, NoopLogger } from '../diagnostics/logger';
import { toErrorMessage } from '../errors/RoverError';

/**
 * One live push connection. `send` settles once the message is handed to
 * the transport; `close` must not throw for an already-closed connection.
 */
export interface FanoutSubscriber {
	readonly id: string;
	send(message: string): Promise<void>;
	close(reason?: string): void;
}

export interface ConnectionFanoutOptions {
	sendTimeoutMs?: number;
	/** Unsettled sends a subscriber may have before it counts as slow. */
	maxPendingSends?: number;
	logger?: Logger;
}

export interface BroadcastResult {
	delivered: number;
	dropped: number;
}

export interface ConnectionFanoutStats {
	subscribers: number;
	broadcasts: number;
	delivered: number;
	dropped: number;
}

interface SubscriberEntry {
	subscriber: FanoutSubscriber;
	pendingSends: number;
}

export const DEFAULT_SEND_TIMEOUT_MS = 1000;
export const DEFAULT_MAX_PENDING_SENDS = 8;

/**
 * Broadcasts serialized messages to every live subscriber. A subscriber that
 * fails, times out or falls behind is removed and closed; the others are
 * unaffected.
 */
export class ConnectionFanout {
	private readonly sendTimeoutMs: number;
	private readonly maxPendingSends: number;
	private readonly logger: Logger;
	private readonly entries = new Map<string, SubscriberEntry>();

	private broadcasts = 0;
	private delivered = 0;
	private dropped = 0;

	public constructor(options: ConnectionFanoutOptions = {}) {
		this.sendTimeoutMs = Math.max(1, options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS);
		this.maxPendingSends = Math.max(1, options.maxPendingSends ?? DEFAULT_MAX_PENDING_SENDS);
		this.logger = options.logger ?? new NoopLogger();
	}

	public get size(): number {
		return this.entries.size;
	}

	public has(id: string): boolean {
		return this.entries.has(id);
	}

	public subscribe(subscriber: FanoutSubscriber): () => void {
		this.entries.set(subscriber.id, { subscriber, pendingSends: 0 });
		this.logger.debug('Subscriber added', { id: subscriber.id, subscribers: this.entries.size });
		return () => {
			this.unsubscribe(subscriber.id);
		};
	}

	public unsubscribe(id: string): boolean {
		const removed = this.entries.delete(id);
		if (removed) {
			this.logger.debug('Subscriber removed', { id, subscribers: this.entries.size });
		}
		return removed;
	}

	/** Sends to one subscriber under the same timeout and drop rules as a broadcast. */
	public async sendTo(id: string, message: unknown): Promise<boolean> {
		const entry = this.entries.get(id);
		if (!entry) {
			return false;
		}
		return this.deliver(entry, serialize(message));
	}

	public async broadcast(message: unknown): Promise<BroadcastResult> {
		const payload = serialize(message);
		// Subscribers added while this broadcast is running get the next one.
		const snapshot = [...this.entries.values()];
		this.broadcasts += 1;

		const outcomes = await Promise.all(snapshot.map((entry) => this.deliver(entry, payload)));
		const delivered = outcomes.filter(Boolean).length;
		return { delivered, dropped: outcomes.length - delivered };
	}

	public closeAll(reason = 'server shutting down'): void {
		const entries = [...this.entries.values()];
		this.entries.clear();
		for (const entry of entries) {
			this.closeQuietly(entry.subscriber, reason);
		}
		if (entries.length > 0) {
			this.logger.info('Closed all subscribers', { count: entries.length, reason });
		}
	}

	public stats(): ConnectionFanoutStats {
		return {
			subscribers: this.entries.size,
			broadcasts: this.broadcasts,
			delivered: this.delivered,
			dropped: this.dropped
		};
	}

	private async deliver(entry: SubscriberEntry, payload: string): Promise<boolean> {
		if (this.entries.get(entry.subscriber.id) !== entry) {
			return false;
		}
		if (entry.pendingSends >= this.maxPendingSends) {
			this.drop(entry, 'too many pending sends');
			return false;
		}

		entry.pendingSends += 1;
		let timer: NodeJS.Timeout | undefined;
		try {
			await Promise.race([
				entry.subscriber.send(payload),
				new Promise<never>((_, reject) => {
					timer = setTimeout(() => reject(new Error(`send timed out after ${this.sendTimeoutMs}ms`)), this.sendTimeoutMs);
				})
			]);
			this.delivered += 1;
			return true;
		} catch (error) {
			this.drop(entry, toErrorMessage(error));
			return false;
		} finally {
			if (timer) {
				clearTimeout(timer);
			}
			entry.pendingSends -= 1;
		}
	}

	private drop(entry: SubscriberEntry, reason: string): void {
		const id = entry.subscriber.id;
		if (this.entries.get(id) !== entry) {
			return;
		}
		this.entries.delete(id);
		this.dropped += 1;
		this.logger.warn('Dropping subscriber', { id, reason });
		this.closeQuietly(entry.subscriber, reason);
	}

	private closeQuietly(subscriber: FanoutSubscriber, reason: string): void {
		try {
			subscriber.close(reason);
		} catch (error) {
			this.logger.debug('Subscriber close failed', { id: subscriber.id, error: toErrorMessage(error) });
		}
	}
}

function serialize(message: unknown): string {
	return typeof message === 'string' ? message : JSON.stringify(message);
}
