/**
 * Process Supervisor
 *
 * Starts both listeners and owns their lifetimes. The two are independent:
 * there is no drain protocol between them, and one closing does not stop
 * the other.
 */

import { FastifyBaseLogger, FastifyServerOptions } from 'fastify';
import { buildPublicServer, PublicServer } from './api/server';
import { AdminServerHandle, startAdminServer } from './admin/server';
import { GcraRateLimiter } from './utils/ratelimit';
import { DEFAULT_RATE_LIMIT_QUOTA, RATE_LIMIT_STORE_CAPACITY } from './config/ratelimit';
import { formatListenAddress, ServerConfig } from './config/server';
import { Collaborators } from './types/collaborators';
import { RateLimiter } from './types/ratelimit';

export interface ServeOptions {
  collaborators: Collaborators;
  config: ServerConfig;
  rateLimiter?: RateLimiter;
  logger?: FastifyServerOptions['logger'];
}

export interface RunningServers {
  publicApp: PublicServer;
  admin: AdminServerHandle;
  closeAdmin: () => Promise<void>;
  /** Resolves once the public listener has closed */
  done: Promise<void>;
  close: () => Promise<void>;
}

export function createDefaultRateLimiter(): GcraRateLimiter {
  return new GcraRateLimiter({
    quota: DEFAULT_RATE_LIMIT_QUOTA,
    capacity: RATE_LIMIT_STORE_CAPACITY,
  });
}

export async function serve(options: ServeOptions): Promise<RunningServers> {
  const { collaborators, config } = options;

  // Quota errors throw here, before anything binds
  const rateLimiter = options.rateLimiter ?? createDefaultRateLimiter();

  const admin = await startAdminServer({
    collaborators,
    config,
    listenAddr: config.localAddr,
    logger: options.logger,
  });

  const publicApp = buildPublicServer({
    collaborators,
    rateLimiter,
    config,
    logger: options.logger,
  });

  const done = new Promise<void>((resolve) => {
    publicApp.addHook('onClose', async (instance) => {
      instance.log.info('HTTP server exiting: listener closed');
      resolve();
    });
  });

  try {
    await publicApp.listen({ host: config.listenAddr.host, port: config.listenAddr.port });
  } catch (err) {
    await admin.close();
    throw err;
  }

  publicApp.log.info(`HTTP server serving on ${formatListenAddress(config.listenAddr)}`);

  let closingPublic: Promise<void> | undefined;
  const closePublic = () => {
    closingPublic ??= publicApp.close().then(() => undefined);
    return closingPublic;
  };

  return {
    publicApp,
    admin,
    closeAdmin: admin.close,
    done,
    close: async () => {
      await Promise.all([admin.close(), closePublic()]);
    },
  };
}

/**
 * Close both listeners on SIGINT/SIGTERM. Returns a function that removes
 * the handlers again.
 */
export function shutdownOnSignals(
  servers: Pick<RunningServers, 'close'>,
  log: FastifyBaseLogger
): () => void {
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  const handler = (signal: NodeJS.Signals) => {
    log.info({ signal }, 'Shutting down');
    servers.close().catch((err: unknown) => {
      log.error({ err }, 'Error during shutdown');
      process.exitCode = 1;
    });
  };

  for (const signal of signals) {
    process.once(signal, handler);
  }

  return () => {
    for (const signal of signals) {
      process.off(signal, handler);
    }
  };
}
