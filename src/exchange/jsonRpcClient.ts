import { z } from 'zod';
import { RpcError, describeError } from '../lib/errors';
import { createLogger } from '../lib/logger';

const log = createLogger('rpc');

const ReplySchema = z.union([
  z.object({
    jsonrpc: z.literal('2.0'),
    id: z.number().optional(),
    error: z.object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    }),
  }),
  z.object({
    jsonrpc: z.literal('2.0'),
    id: z.number().optional(),
    result: z.unknown(),
  }),
]);

export interface JsonRpcClientOptions {
  baseUrl: string;
  timeoutMs: number;
}

export interface CallOptions {
  /** Bearer token for private methods */
  accessToken?: string;
}

export type RpcParams = Record<string, string | number | boolean | undefined>;

/**
 * Stateless JSON-RPC 2.0 over HTTPS: one POST per call to
 * `<baseUrl>/<method>`, one JSON reply.
 */
export class JsonRpcClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private nextId = 1;

  constructor(options: JsonRpcClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
  }

  async call<T>(
    method: string,
    params: RpcParams,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: CallOptions = {},
  ): Promise<T> {
    const id = this.nextId++;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (options.accessToken) {
      headers.Authorization = `Bearer ${options.accessToken}`;
    }

    log.debug({ method, id }, 'RPC request');

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/${method}`, {
        method: 'POST',
        headers,
        body: JSON.stringify({ jsonrpc: '2.0', id, method, params }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new RpcError(method, `request failed: ${describeError(error)}`, undefined, error);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new RpcError(method, `reading reply failed: ${describeError(error)}`, response.status, error);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new RpcError(method, `HTTP ${response.status} with non-JSON body`, response.status, error);
    }

    const reply = ReplySchema.safeParse(body);
    if (!reply.success) {
      throw new RpcError(method, `unexpected reply shape (HTTP ${response.status})`, response.status);
    }
    if ('error' in reply.data) {
      const { code, message } = reply.data.error;
      log.warn({ method, id, code }, 'RPC error reply');
      throw new RpcError(method, message, code);
    }

    const result = schema.safeParse(reply.data.result);
    if (!result.success) {
      throw new RpcError(method, `unexpected result: ${result.error.issues[0]?.message ?? 'invalid'}`);
    }
    return result.data;
  }
}
