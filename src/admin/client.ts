/**
 * Admin RPC Client
 *
 * Operator-side wrapper for the admin listener's two procedures.
 * RPC errors are thrown as RpcError; a failed blacklist never reads as
 * `false`.
 */

import { Value } from '@sinclair/typebox/value';
import { Type } from '@sinclair/typebox';
import { RpcResponseSchema } from '../api/schemas';
import { RpcError, RPC_INTERNAL_ERROR } from '../errors';
import { BLACKLIST_METHOD, TRIGGER_METHOD } from './procedures';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface AdminClientOptions {
  url: string;
  fetch?: FetchLike;
}

export class AdminClient {
  private readonly url: string;
  private readonly fetchImpl: FetchLike;
  private requestId = 0;

  constructor(options: AdminClientOptions) {
    this.url = options.url;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Report a blacklisted key. Resolves to whether a new key was generated.
   */
  async blacklist(keyname: string): Promise<boolean> {
    const result = await this.call(BLACKLIST_METHOD, [keyname]);
    if (!Value.Check(Type.Boolean(), result)) {
      throw new RpcError(RPC_INTERNAL_ERROR, `Unexpected ${BLACKLIST_METHOD} result: ${JSON.stringify(result)}`);
    }
    return result;
  }

  /**
   * Trigger key generation. Resolves once the server has acknowledged.
   */
  async trigger(): Promise<void> {
    await this.call(TRIGGER_METHOD, []);
  }

  private async call(method: string, params: unknown[]): Promise<unknown> {
    const response = await this.fetchImpl(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        jsonrpc: '2.0',
        id: ++this.requestId,
        method,
        params,
      }),
    });

    const payload: unknown = await response.json();

    if (!Value.Check(RpcResponseSchema, payload)) {
      throw new RpcError(RPC_INTERNAL_ERROR, `Malformed RPC response (HTTP ${response.status})`);
    }

    if (payload.error) {
      throw new RpcError(payload.error.code, payload.error.message);
    }

    return payload.result;
  }
}
