/**
 * Admin RPC Server
 *
 * JSON-RPC 2.0 over HTTP (POST /rpc) on its own listener. Trusted by
 * network placement only: bind it to an address untrusted clients
 * cannot reach. Operators get raw collaborator error messages.
 */

import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import { Value } from '@sinclair/typebox/value';
import { createProcedures } from './procedures';
import { RpcId, RpcRequestSchema, RpcResponse } from '../api/schemas';
import {
  RpcError,
  RPC_INTERNAL_ERROR,
  RPC_INVALID_REQUEST,
  RPC_METHOD_NOT_FOUND,
  RPC_PARSE_ERROR,
} from '../errors';
import { formatListenAddress, ListenAddress, ServerConfig } from '../config/server';
import { AdminCollaborators } from '../types/collaborators';

export const RPC_PATH = '/rpc';

export interface AdminServerOptions {
  collaborators: AdminCollaborators;
  config: Pick<ServerConfig, 'logLevel'>;
  logger?: FastifyServerOptions['logger'];
}

export interface AdminServerHandle {
  app: FastifyInstance;
  address: string;
  close: () => Promise<void>;
}

function errorResponse(id: RpcId, code: number, message: string): RpcResponse {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

export function buildAdminServer(options: AdminServerOptions): FastifyInstance {
  const app = Fastify({
    logger: options.logger ?? { level: options.config.logLevel },
  });

  const procedures = createProcedures(options.collaborators);

  app.setErrorHandler((error, request, reply) => {
    if (error.statusCode === 400) {
      request.log.warn({ err: error }, 'Unparseable RPC request');
      return reply.status(400).send(errorResponse(null, RPC_PARSE_ERROR, 'Parse error'));
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send(errorResponse(null, RPC_INVALID_REQUEST, error.message));
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send(errorResponse(null, RPC_INTERNAL_ERROR, 'Internal error'));
  });

  app.post(RPC_PATH, async (request, reply) => {
    const body = request.body;

    if (!Value.Check(RpcRequestSchema, body)) {
      return reply.send(errorResponse(null, RPC_INVALID_REQUEST, 'Invalid JSON-RPC 2.0 request'));
    }

    const id = body.id ?? null;
    const procedure = procedures.get(body.method);

    if (!procedure) {
      return reply.send(errorResponse(id, RPC_METHOD_NOT_FOUND, `Method not found: ${body.method}`));
    }

    try {
      const result = await procedure(body.params, request.log);
      const response: RpcResponse = { jsonrpc: '2.0', id, result };
      return reply.send(response);
    } catch (err) {
      if (err instanceof RpcError) {
        return reply.send(errorResponse(id, err.code, err.message));
      }

      request.log.error({ err, method: body.method }, 'RPC procedure failed');
      const message = err instanceof Error ? err.message : String(err);
      return reply.send(errorResponse(id, RPC_INTERNAL_ERROR, message));
    }
  });

  return app;
}

/**
 * Bind the admin listener. The returned close() stops it deterministically
 * and may be called more than once.
 */
export async function startAdminServer(
  options: AdminServerOptions & { listenAddr: ListenAddress }
): Promise<AdminServerHandle> {
  const app = buildAdminServer(options);
  const address = await app.listen({
    host: options.listenAddr.host,
    port: options.listenAddr.port,
  });

  app.log.info(`Admin RPC server serving on ${formatListenAddress(options.listenAddr)}`);

  let closing: Promise<void> | undefined;

  return {
    app,
    address,
    close: () => {
      closing ??= app.close().then(() => undefined);
      return closing;
    },
  };
}
