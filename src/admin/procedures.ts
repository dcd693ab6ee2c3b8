/**
 * Admin Procedures
 *
 * The two calls operators can make. Names keep the service.Method shape
 * existing callers already use.
 */

import { FastifyBaseLogger } from 'fastify';
import { Value } from '@sinclair/typebox/value';
import { BlacklistParamsSchema, TriggerParamsSchema } from '../api/schemas';
import { RpcError, RPC_INVALID_PARAMS, RPC_SERVER_ERROR } from '../errors';
import { AdminCollaborators } from '../types/collaborators';

export const BLACKLIST_METHOD = 'blacklister.Blacklist';
export const TRIGGER_METHOD = 'trigger.Trigger';

export type Procedure = (params: unknown, log: FastifyBaseLogger) => Promise<unknown>;

export function createProcedures(collaborators: AdminCollaborators): Map<string, Procedure> {
  const procedures = new Map<string, Procedure>();

  /**
   * blacklister.Blacklist([keyname]) → generated
   *
   * A collaborator failure is returned as an RPC error, never as
   * `false`: the caller cannot tell whether the key was blacklisted.
   */
  procedures.set(BLACKLIST_METHOD, async (params, log) => {
    if (!Value.Check(BlacklistParamsSchema, params)) {
      throw new RpcError(RPC_INVALID_PARAMS, `${BLACKLIST_METHOD} expects params [keyname: string]`);
    }

    const [keyname] = params;

    try {
      return await collaborators.reportBlacklist(keyname);
    } catch (err) {
      log.error({ err, op: 'reportBlacklist', keyname }, 'Error reporting blacklisted key');
      throw new RpcError(RPC_SERVER_ERROR, err instanceof Error ? err.message : String(err));
    }
  });

  /**
   * trigger.Trigger() → {}
   */
  procedures.set(TRIGGER_METHOD, async (params) => {
    if (params !== undefined && !Value.Check(TriggerParamsSchema, params)) {
      throw new RpcError(RPC_INVALID_PARAMS, `${TRIGGER_METHOD} takes no params`);
    }

    collaborators.triggerGeneration();
    return {};
  });

  return procedures;
}
