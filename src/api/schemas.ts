import { Type, Static } from '@sinclair/typebox';

/**
 * GET /v1/cert.pem query string. A repeated keyname arrives as an array;
 * the first value wins.
 */
export const CertQuerySchema = Type.Object({
  keyname: Type.Optional(Type.Union([Type.String(), Type.Array(Type.String())])),
});

export type CertQuery = Static<typeof CertQuerySchema>;

/**
 * 429 body sent by the rate limit hook
 */
export const RateLimitExceededSchema = Type.Object({
  error: Type.String(),
  retry_after_seconds: Type.Number(),
});

export type RateLimitExceeded = Static<typeof RateLimitExceededSchema>;

/**
 * JSON-RPC 2.0 request envelope (admin listener)
 */
export const RpcIdSchema = Type.Union([Type.String(), Type.Number(), Type.Null()]);

export type RpcId = Static<typeof RpcIdSchema>;

export const RpcRequestSchema = Type.Object({
  jsonrpc: Type.Literal('2.0'),
  id: Type.Optional(RpcIdSchema),
  method: Type.String({ minLength: 1 }),
  params: Type.Optional(Type.Union([Type.Array(Type.Unknown()), Type.Record(Type.String(), Type.Unknown())])),
});

export type RpcRequest = Static<typeof RpcRequestSchema>;

/**
 * blacklister.Blacklist params: [keyname]
 */
export const BlacklistParamsSchema = Type.Tuple([Type.String()]);

/**
 * trigger.Trigger params: none, [] or [{}]
 */
export const TriggerParamsSchema = Type.Union([
  Type.Tuple([]),
  Type.Tuple([Type.Object({}, { additionalProperties: false })]),
]);

export const RpcErrorObjectSchema = Type.Object({
  code: Type.Integer(),
  message: Type.String(),
});

/**
 * JSON-RPC 2.0 response envelope
 */
export const RpcResponseSchema = Type.Object({
  jsonrpc: Type.Literal('2.0'),
  id: RpcIdSchema,
  result: Type.Optional(Type.Unknown()),
  error: Type.Optional(RpcErrorObjectSchema),
});

export type RpcResponse = Static<typeof RpcResponseSchema>;
