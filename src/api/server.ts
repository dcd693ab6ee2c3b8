import Fastify, {
  FastifyBaseLogger,
  FastifyInstance,
  FastifyServerOptions,
  RawReplyDefaultExpression,
  RawRequestDefaultExpression,
  RawServerDefault,
} from 'fastify';
import { TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import { CertQuerySchema } from './schemas';
import { createRateLimitHook } from './hooks/ratelimit';
import { encodeCertificateChainPem } from '../utils/pem';
import { RATE_LIMIT_VARY_BY } from '../config/ratelimit';
import { ServerConfig } from '../config/server';
import { PublicCollaborators } from '../types/collaborators';
import { RateLimiter, VaryBy } from '../types/ratelimit';

/**
 * `config.readTimeoutMs` bounds the time to receive a whole request.
 * `config.writeTimeoutMs` is a socket inactivity timeout: it closes a
 * connection that stalls, but does not cap the total time spent writing a
 * response that keeps making progress.
 */
export interface PublicServerOptions {
  collaborators: PublicCollaborators;
  rateLimiter: RateLimiter;
  config: Pick<ServerConfig, 'readTimeoutMs' | 'writeTimeoutMs' | 'bodyLimit' | 'logLevel'>;
  varyBy?: VaryBy;
  logger?: FastifyServerOptions['logger'];
}

export type PublicServer = FastifyInstance<
  RawServerDefault,
  RawRequestDefaultExpression,
  RawReplyDefaultExpression,
  FastifyBaseLogger,
  TypeBoxTypeProvider
>;

const TEXT_PLAIN = 'text/plain; charset=utf-8';
const INTERNAL_ERROR_BODY = 'Internal error\n';

function payloadOf(body: unknown): Buffer {
  return Buffer.isBuffer(body) ? body : Buffer.alloc(0);
}

/**
 * Public, unauthenticated HTTP surface.
 *
 * Every request body is taken as opaque bytes, whatever its content type.
 * Collaborator errors are logged with the failing operation and answered
 * with a generic body; no detail reaches the client.
 */
export function buildPublicServer(options: PublicServerOptions): PublicServer {
  const { collaborators, rateLimiter, config } = options;

  const app = Fastify({
    logger: options.logger ?? { level: config.logLevel },
    bodyLimit: config.bodyLimit,
    requestTimeout: config.readTimeoutMs,
    connectionTimeout: config.writeTimeoutMs,
  }).withTypeProvider<TypeBoxTypeProvider>();

  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  // Unreadable bodies and bad query strings fail before any handler runs
  app.setErrorHandler((error, request, reply) => {
    if (error.statusCode !== undefined && error.statusCode < 500) {
      request.log.warn({ err: error, url: request.url }, 'Bad request');
      return reply.status(400).send();
    }

    request.log.error({ err: error, url: request.url }, 'Unhandled error');
    return reply.status(500).type(TEXT_PLAIN).send(INTERNAL_ERROR_BODY);
  });

  /**
   * GET /healthz - Liveness probe, never fails
   */
  app.get('/healthz', async (_request, reply) => {
    return reply.type(TEXT_PLAIN).send('ok\n');
  });

  /**
   * POST /v1/verify - Check a secret
   *
   * Rate limited per path + X-Forwarded-For.
   * 200 valid, 409 not valid, 500 if the checker fails.
   */
  app.register(async (scope) => {
    scope.addHook('onRequest', createRateLimitHook(rateLimiter, options.varyBy ?? RATE_LIMIT_VARY_BY));

    scope.post('/v1/verify', async (request, reply) => {
      let valid: boolean;
      try {
        valid = await collaborators.checkSecret(payloadOf(request.body));
      } catch (err) {
        request.log.error({ err, op: 'checkSecret' }, 'Error validating secret');
        return reply.status(500).send();
      }

      return reply.status(valid ? 200 : 409).send();
    });
  });

  /**
   * POST /v1/rotate - Exchange a secret for a new one
   *
   * The new secret is returned verbatim; it is declared as JSON but never
   * inspected here.
   */
  app.post('/v1/rotate', async (request, reply) => {
    let newSecret: Buffer | Uint8Array;
    try {
      newSecret = await collaborators.rotateSecret(payloadOf(request.body));
    } catch (err) {
      request.log.error({ err, op: 'rotateSecret' }, 'Error rotating secret');
      return reply.status(500).send();
    }

    return reply.status(200).header('Content-Type', 'application/json').send(Buffer.from(newSecret));
  });

  /**
   * GET /v1/cert.pem - Certificate chain for a key, PEM encoded
   *
   * Without a keyname (or with an empty one) the active key is used.
   */
  app.get(
    '/v1/cert.pem',
    {
      schema: {
        querystring: CertQuerySchema,
      },
    },
    async (request, reply) => {
      const requested = request.query.keyname;
      let keyname = (Array.isArray(requested) ? requested[0] : requested) ?? '';

      if (keyname === '') {
        try {
          keyname = await collaborators.activeKeyName();
        } catch (err) {
          request.log.error({ err, op: 'activeKeyName' }, 'Error handling /v1/cert.pem request');
          return reply.status(500).type(TEXT_PLAIN).send(INTERNAL_ERROR_BODY);
        }
      }

      let pem: string;
      try {
        const certs = await collaborators.lookupCertificates(keyname);
        pem = encodeCertificateChainPem(certs);
      } catch (err) {
        request.log.error({ err, op: 'lookupCertificates', keyname }, 'Error handling /v1/cert.pem request');
        return reply.status(500).type(TEXT_PLAIN).send(INTERNAL_ERROR_BODY);
      }

      return reply.type('application/x-pem-file').send(pem);
    }
  );

  /**
   * GET /v1/keyname - Name of the currently active key
   */
  app.get('/v1/keyname', async (request, reply) => {
    let keyname: string;
    try {
      keyname = await collaborators.activeKeyName();
    } catch (err) {
      request.log.error({ err, op: 'activeKeyName' }, 'Error handling /v1/keyname request');
      return reply.status(500).type(TEXT_PLAIN).send(INTERNAL_ERROR_BODY);
    }

    return reply.type('text/plain;charset=utf-8').send(keyname);
  });

  return app;
}
