export { buildPublicServer } from './api/server';
export type { PublicServer, PublicServerOptions } from './api/server';
export { createRateLimitHook } from './api/hooks/ratelimit';
export { buildAdminServer, startAdminServer, RPC_PATH } from './admin/server';
export type { AdminServerHandle, AdminServerOptions } from './admin/server';
export { AdminClient } from './admin/client';
export type { AdminClientOptions, FetchLike } from './admin/client';
export { BLACKLIST_METHOD, TRIGGER_METHOD } from './admin/procedures';
export { serve, shutdownOnSignals, createDefaultRateLimiter } from './supervisor';
export type { ServeOptions, RunningServers } from './supervisor';
export { GcraRateLimiter, rateLimitKey } from './utils/ratelimit';
export { BucketStore } from './utils/lru';
export { encodePem, encodeCertificatePem, encodeCertificateChainPem } from './utils/pem';
export { loadServerConfig, parseDuration, parseListenAddress } from './config/server';
export type { ServerConfig, ListenAddress } from './config/server';
export { DEFAULT_RATE_LIMIT_QUOTA, RATE_LIMIT_STORE_CAPACITY, RATE_LIMIT_VARY_BY } from './config/ratelimit';
export * from './errors';
export type * from './types/collaborators';
export type * from './types/ratelimit';
