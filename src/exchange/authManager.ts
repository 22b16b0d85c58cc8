import { z } from 'zod';
import { AuthenticationError, describeError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import type { JsonRpcClient } from './jsonRpcClient';

const log = createLogger('auth');

const AuthResultSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
});

export interface Credentials {
  clientId: string;
  clientSecret: string;
  scope: string;
}

/**
 * Client-credentials login. The token is obtained once at startup and
 * carried by every private call.
 */
export class AuthManager {
  private rpc: JsonRpcClient;
  private credentials: Credentials;
  private accessToken: string | null = null;

  constructor(rpc: JsonRpcClient, credentials: Credentials) {
    this.rpc = rpc;
    this.credentials = credentials;
  }

  async authenticate(): Promise<string> {
    const { clientId, clientSecret, scope } = this.credentials;
    if (!clientId || !clientSecret) {
      throw new AuthenticationError('Client id and secret are required');
    }

    try {
      const result = await this.rpc.call(
        'public/auth',
        {
          grant_type: 'client_credentials',
          client_id: clientId,
          client_secret: clientSecret,
          scope,
        },
        AuthResultSchema,
      );
      this.accessToken = result.access_token;
      log.info({ clientId, scope: result.scope ?? scope, expiresIn: result.expires_in }, 'Authenticated');
      return result.access_token;
    } catch (error) {
      throw new AuthenticationError(`Authentication failed: ${describeError(error)}`, error);
    }
  }

  getAccessToken(): string {
    if (!this.accessToken) {
      throw new AuthenticationError('Not authenticated');
    }
    return this.accessToken;
  }
}
