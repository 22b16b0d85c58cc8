import { lookup } from 'dns/promises';
import WebSocket from 'ws';
import { describeError } from '../lib/errors';
import type { ConnectionConfig } from '../types';

/**
 * One framed, bidirectional connection. Implementations deliver whole
 * frames only; the StreamClient owns all state and locking.
 */
export interface StreamTransport {
  /** Resolve, connect, secure and upgrade. Aborting the signal cancels the attempt. */
  open(signal: AbortSignal): Promise<void>;
  write(message: string): Promise<void>;
  /** Next inbound frame as text. `timeoutMs` of 0 waits indefinitely. */
  read(timeoutMs: number): Promise<string>;
  close(): Promise<void>;
}

export type TransportFactory = (config: ConnectionConfig) => StreamTransport;

interface PendingRead {
  resolve: (frame: string) => void;
  reject: (error: Error) => void;
}

export function streamUrl(config: ConnectionConfig): string {
  const scheme = config.secure ? 'wss' : 'ws';
  return `${scheme}://${config.host}:${config.port}${config.path}`;
}

export class WsTransport implements StreamTransport {
  private ws: WebSocket | null = null;
  private inbox: string[] = [];
  private pending: PendingRead | null = null;
  private failure: Error | null = null;

  constructor(private readonly config: ConnectionConfig) {}

  async open(signal: AbortSignal): Promise<void> {
    const { host, connectTimeoutMs } = this.config;
    const timedOut = () => new Error(`Connect to ${host} timed out after ${connectTimeoutMs}ms`);

    try {
      await lookup(host);
    } catch (error) {
      throw new Error(`Name resolution failed for ${host}: ${describeError(error)}`);
    }
    if (signal.aborted) {
      throw timedOut();
    }

    const ws = new WebSocket(streamUrl(this.config), {
      rejectUnauthorized: this.config.verifySsl,
      perMessageDeflate: false,
    });

    await new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        signal.removeEventListener('abort', onAbort);
        ws.off('open', onOpen);
        ws.off('error', onError);
      };
      const onOpen = () => {
        cleanup();
        resolve();
      };
      const onError = (error: Error) => {
        cleanup();
        reject(error);
      };
      const onAbort = () => {
        cleanup();
        // terminate() before open still emits 'error'; swallow it here
        ws.once('error', () => undefined);
        ws.terminate();
        reject(timedOut());
      };

      signal.addEventListener('abort', onAbort, { once: true });
      ws.once('open', onOpen);
      ws.once('error', onError);
    });

    this.attach(ws);
  }

  private attach(ws: WebSocket): void {
    this.ws = ws;
    this.inbox = [];
    this.failure = null;

    ws.on('message', (data: WebSocket.RawData) => {
      this.deliver(data.toString());
    });

    ws.on('error', (error) => {
      this.fail(error);
    });

    ws.on('close', (code, reason) => {
      const text = reason.length > 0 ? `: ${reason.toString()}` : '';
      this.fail(new Error(`Connection closed with code ${code}${text}`));
    });
  }

  private deliver(frame: string): void {
    if (this.pending) {
      const { resolve } = this.pending;
      this.pending = null;
      resolve(frame);
      return;
    }
    this.inbox.push(frame);
  }

  private fail(error: Error): void {
    if (!this.failure) {
      this.failure = error;
    }
    if (this.pending) {
      const { reject } = this.pending;
      this.pending = null;
      reject(error);
    }
  }

  async write(message: string): Promise<void> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      throw this.failure ?? new Error('Socket is not open');
    }

    await new Promise<void>((resolve, reject) => {
      ws.send(message, (error) => (error ? reject(error) : resolve()));
    });
  }

  read(timeoutMs: number): Promise<string> {
    const queued = this.inbox.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (!this.ws) {
      return Promise.reject(new Error('Socket is not open'));
    }

    return new Promise<string>((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null;

      this.pending = {
        resolve: (frame) => {
          if (timer) clearTimeout(timer);
          resolve(frame);
        },
        reject: (error) => {
          if (timer) clearTimeout(timer);
          reject(error);
        },
      };

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          this.pending = null;
          reject(new Error(`Read timed out after ${timeoutMs}ms`));
        }, timeoutMs);
      }
    });
  }

  async close(): Promise<void> {
    const ws = this.ws;
    this.ws = null;
    if (!ws || ws.readyState === WebSocket.CLOSED) {
      return;
    }

    const closeTimeoutMs = this.config.connectTimeoutMs;

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        ws.terminate();
        reject(new Error(`Close handshake timed out after ${closeTimeoutMs}ms`));
      }, closeTimeoutMs);

      ws.once('close', () => {
        clearTimeout(timer);
        resolve();
      });

      ws.close(1000, 'client disconnect');
    });
  }
}
