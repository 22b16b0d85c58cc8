import {
  ConnectionError,
  NotConnectedError,
  ReceiveError,
  SendError,
  describeError,
} from '../lib/errors';
import { AsyncLock } from '../lib/lock';
import { createLogger } from '../lib/logger';
import { ConnectionState, type ConnectionConfig } from '../types';
import { WsTransport, streamUrl, type StreamTransport, type TransportFactory } from './transport';

const log = createLogger('stream');

export type FrameCallback = (payload: string) => void;

const defaultTransport: TransportFactory = (config) => new WsTransport(config);

/**
 * Client for the exchange's streaming endpoint.
 *
 * Owns one connection and its state machine. Every operation runs under a
 * single lock, so send/receive never overlap a connect or disconnect.
 * Failures are surfaced to the caller and recorded as the last error; the
 * client never reconnects on its own.
 */
export class StreamClient {
  private readonly config: ConnectionConfig;
  private readonly createTransport: TransportFactory;
  private readonly lock = new AsyncLock();
  private transport: StreamTransport | null = null;
  private state = ConnectionState.Disconnected;
  private lastError: string | undefined;

  constructor(config: ConnectionConfig, createTransport: TransportFactory = defaultTransport) {
    this.config = Object.freeze({ ...config });
    this.createTransport = createTransport;
  }

  async connect(): Promise<void> {
    await this.lock.runExclusive(() => this.connectLocked());
  }

  private async connectLocked(): Promise<void> {
    if (this.state === ConnectionState.Connected) {
      return;
    }

    this.state = ConnectionState.Connecting;
    this.lastError = undefined;

    const url = streamUrl(this.config);
    const { connectTimeoutMs } = this.config;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), connectTimeoutMs);
    // Bounds the attempt even when a step (e.g. name resolution) ignores the signal
    const deadline = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(new Error(`Connect to ${this.config.host} timed out after ${connectTimeoutMs}ms`)),
        { once: true },
      );
    });

    log.info({ url }, 'Connecting stream');

    let transport: StreamTransport;
    try {
      transport = this.createTransport(this.config);
      await Promise.race([transport.open(controller.signal), deadline]);
    } catch (error) {
      this.state = ConnectionState.Disconnected;
      this.lastError = describeError(error);
      log.error({ url, error: this.lastError }, 'Stream connection failed');
      throw new ConnectionError(this.lastError, error, { url });
    } finally {
      clearTimeout(timer);
    }

    this.transport = transport;
    this.state = ConnectionState.Connected;
    log.info({ url }, 'Stream connected');
  }

  /**
   * Never fails: a failed close handshake is recorded as the last error and
   * the client still ends up disconnected.
   */
  async disconnect(): Promise<void> {
    await this.lock.runExclusive(() => this.disconnectLocked());
  }

  private async disconnectLocked(): Promise<void> {
    const transport = this.transport;
    const wasConnected = this.state === ConnectionState.Connected;
    this.transport = null;

    if (wasConnected && transport) {
      try {
        await transport.close();
        log.info({ host: this.config.host }, 'Stream disconnected');
      } catch (error) {
        this.lastError = describeError(error);
        log.warn({ error: this.lastError }, 'Stream close handshake failed');
      }
    }

    this.state = ConnectionState.Disconnected;
  }

  async reconnect(): Promise<void> {
    await this.lock.runExclusive(async () => {
      await this.disconnectLocked();
      await this.connectLocked();
    });
  }

  async send(message: string): Promise<void> {
    await this.lock.runExclusive(async () => {
      const transport = this.connectedTransport('send');
      try {
        await transport.write(message);
      } catch (error) {
        this.lastError = describeError(error);
        log.error({ error: this.lastError }, 'Stream send failed');
        throw new SendError(this.lastError, error);
      }
    });
  }

  /**
   * Waits for exactly one inbound frame and hands it to `callback`. Call it
   * in a loop to consume the stream.
   */
  async receive(callback: FrameCallback): Promise<void> {
    await this.lock.runExclusive(async () => {
      const transport = this.connectedTransport('receive');
      let frame: string;
      try {
        frame = await transport.read(this.config.readTimeoutMs);
      } catch (error) {
        this.lastError = describeError(error);
        log.error({ error: this.lastError }, 'Stream receive failed');
        throw new ReceiveError(this.lastError, error);
      }
      callback(frame);
    });
  }

  private connectedTransport(operation: string): StreamTransport {
    if (this.state !== ConnectionState.Connected || !this.transport) {
      throw new NotConnectedError(operation);
    }
    return this.transport;
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === ConnectionState.Connected;
  }

  getLastError(): string | undefined {
    return this.lastError;
  }
}
