import WebSocket, { WebSocketServer } from 'ws';
import { MalformedMessageError, describeError } from '../lib/errors';
import { createLogger } from '../lib/logger';

const log = createLogger('hub');

export type ConsumerId = number;

/**
 * Topic of a consumer's `{"subscribe": "<topic>"}` request.
 *
 * @returns the topic, or null for JSON objects without a `subscribe` field
 * @throws MalformedMessageError for non-JSON payloads and non-string topics
 */
export function parseSubscribeRequest(raw: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new MalformedMessageError('Consumer message is not valid JSON', raw, error);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  if (!('subscribe' in parsed)) {
    return null;
  }

  const topic = parsed.subscribe;
  if (typeof topic !== 'string' || topic.length === 0) {
    throw new MalformedMessageError('subscribe must be a non-empty string', raw);
  }
  return topic;
}

/**
 * Local fan-out of streamed updates.
 *
 * Consumers are tracked by a generated id; topic sets hold ids only and the
 * registry owns the sockets. All mutations happen inside event-loop
 * callbacks, so a broadcast never observes a half-removed consumer.
 */
export class BroadcastHub {
  private server: WebSocketServer | null = null;
  private nextConsumerId: ConsumerId = 1;
  private consumers = new Map<ConsumerId, WebSocket>();
  private topics = new Map<string, Set<ConsumerId>>();

  /**
   * Starts listening. Resolves with the bound port, which differs from
   * `port` only when 0 was requested.
   */
  start(port: number, host?: string): Promise<number> {
    if (this.server) {
      return Promise.reject(new Error('Broadcast hub is already running'));
    }

    return new Promise((resolve, reject) => {
      const server = new WebSocketServer({ port, host });

      const onStartupError = (error: Error) => {
        this.server = null;
        reject(error);
      };

      server.once('error', onStartupError);
      server.once('listening', () => {
        server.off('error', onStartupError);
        server.on('error', (error) => {
          log.error({ error: describeError(error) }, 'Broadcast hub server error');
        });

        const address = server.address();
        const boundPort = typeof address === 'object' && address !== null ? address.port : port;
        log.info({ port: boundPort, host }, 'Broadcast hub listening');
        resolve(boundPort);
      });

      server.on('connection', (ws) => this.onOpen(ws));
      this.server = server;
    });
  }

  private onOpen(ws: WebSocket): void {
    const id = this.nextConsumerId++;
    this.consumers.set(id, ws);
    log.info({ consumer: id, consumers: this.consumers.size }, 'Consumer connected');

    ws.on('message', (data: WebSocket.RawData) => this.onMessage(id, data.toString()));
    ws.on('close', () => this.onClose(id));
    ws.on('error', (error) => {
      log.warn({ consumer: id, error: describeError(error) }, 'Consumer socket error');
    });
  }

  private onMessage(id: ConsumerId, raw: string): void {
    if (!this.consumers.has(id)) {
      return;
    }

    let topic: string | null;
    try {
      topic = parseSubscribeRequest(raw);
    } catch (error) {
      log.warn({ consumer: id, error: describeError(error) }, 'Discarding malformed consumer message');
      return;
    }

    if (topic === null) {
      log.debug({ consumer: id }, 'Ignoring consumer message without subscribe');
      return;
    }

    let members = this.topics.get(topic);
    if (!members) {
      members = new Set();
      this.topics.set(topic, members);
    }
    members.add(id);
    log.info({ consumer: id, topic }, 'Consumer subscribed');
  }

  private onClose(id: ConsumerId): void {
    if (!this.consumers.delete(id)) {
      return;
    }

    for (const [topic, members] of this.topics) {
      members.delete(id);
      if (members.size === 0) {
        this.topics.delete(topic);
      }
    }
    log.info({ consumer: id, consumers: this.consumers.size }, 'Consumer disconnected');
  }

  /**
   * Sends `message` verbatim to every consumer subscribed to `topic`.
   * Best effort per consumer.
   *
   * @returns how many consumers the message was handed to
   */
  broadcast(topic: string, message: string): number {
    const members = this.topics.get(topic);
    if (!members) {
      return 0;
    }

    let delivered = 0;
    for (const id of members) {
      const ws = this.consumers.get(id);
      if (!ws || ws.readyState !== WebSocket.OPEN) {
        log.debug({ consumer: id, topic }, 'Skipping consumer that is not open');
        continue;
      }
      try {
        ws.send(message, (error) => {
          if (error) {
            log.warn({ consumer: id, topic, error: describeError(error) }, 'Broadcast send failed');
          }
        });
        delivered++;
      } catch (error) {
        log.warn({ consumer: id, topic, error: describeError(error) }, 'Broadcast send failed');
      }
    }
    return delivered;
  }

  consumerCount(): number {
    return this.consumers.size;
  }

  subscriberCount(topic: string): number {
    return this.topics.get(topic)?.size ?? 0;
  }

  topicsOf(id: ConsumerId): string[] {
    const result: string[] = [];
    for (const [topic, members] of this.topics) {
      if (members.has(id)) {
        result.push(topic);
      }
    }
    return result;
  }

  /** Closes every consumer and the listener. */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    for (const ws of server.clients) {
      ws.terminate();
    }
    this.consumers.clear();
    this.topics.clear();

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    log.info('Broadcast hub stopped');
  }
}
