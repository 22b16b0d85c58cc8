import { describeError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import type { ConnectionState } from '../types';
import type { StreamClient } from './streamClient';
import { bookTopic, buildSubscribeCommand, buildUnsubscribeCommand, channelOf } from './topics';

const log = createLogger('session');

export interface Broadcaster {
  broadcast(topic: string, message: string): number;
}

export interface SessionStatus {
  running: boolean;
  topic: string | null;
  state: ConnectionState;
  lastError: string | undefined;
  framesReceived: number;
}

/**
 * Drives one StreamClient: connect, subscribe, then receive until stopped.
 * Subscription notifications are relayed to the broadcaster under their
 * channel; replies and other frames are only logged.
 */
export class StreamSession {
  private client: StreamClient;
  private broadcaster: Broadcaster;
  private loop: Promise<void> | null = null;
  private starting = false;
  private stopRequested = false;
  private topic: string | null = null;
  private framesReceived = 0;
  private requestId = 1;

  constructor(client: StreamClient, broadcaster: Broadcaster) {
    this.client = client;
    this.broadcaster = broadcaster;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  /**
   * Connects and subscribes to the order book of `instrument`. Resolves once
   * the subscription has been sent; frames are then pumped in the background.
   */
  async start(instrument: string, cadence: string): Promise<string> {
    if (this.loop) {
      throw new Error(`Stream already running for ${this.topic}`);
    }
    if (this.starting) {
      throw new Error('Stream is already starting');
    }

    const topic = bookTopic(instrument, cadence);
    const command = buildSubscribeCommand([topic], this.requestId++);

    this.starting = true;
    try {
      await this.client.connect();
      await this.client.send(JSON.stringify(command));
    } catch (error) {
      await this.client.disconnect();
      throw error;
    } finally {
      this.starting = false;
    }

    log.info({ topic }, 'Subscribed to order book');
    this.topic = topic;
    this.framesReceived = 0;
    this.stopRequested = false;
    this.loop = this.pump(topic);
    return topic;
  }

  private async pump(topic: string): Promise<void> {
    const relay = (payload: string) => {
      this.framesReceived++;
      const channel = channelOf(payload);
      if (channel === undefined) {
        log.debug({ topic, bytes: payload.length }, 'Skipping non-notification frame');
        return;
      }
      const delivered = this.broadcaster.broadcast(channel, payload);
      log.debug({ channel, delivered, bytes: payload.length }, 'Frame received');
    };

    while (!this.stopRequested) {
      try {
        await this.client.receive(relay);
      } catch (error) {
        if (!this.stopRequested) {
          log.error({ topic, error: describeError(error) }, 'Receive loop ended');
        }
        break;
      }
    }

    if (this.stopRequested && this.client.isConnected()) {
      const command = buildUnsubscribeCommand([topic], this.requestId++);
      try {
        await this.client.send(JSON.stringify(command));
      } catch (error) {
        log.warn({ topic, error: describeError(error) }, 'Unsubscribe failed');
      }
    }

    await this.client.disconnect();
    this.loop = null;
  }

  /**
   * Asks the loop to stop after the in-flight receive settles, waits for it,
   * then disconnects.
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    this.stopRequested = true;
    if (loop) {
      await loop;
    }
    this.loop = null;
    await this.client.disconnect();
    if (this.topic) {
      log.info({ topic: this.topic, frames: this.framesReceived }, 'Stream stopped');
    }
  }

  status(): SessionStatus {
    return {
      running: this.isRunning(),
      topic: this.topic,
      state: this.client.getState(),
      lastError: this.client.getLastError(),
      framesReceived: this.framesReceived,
    };
  }
}
