/**
 * Error types
 */

/** Invalid configuration or rate-limit quota. Fatal at startup. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** JSON-RPC 2.0 error codes used by the admin listener */
export const RPC_PARSE_ERROR = -32700;
export const RPC_INVALID_REQUEST = -32600;
export const RPC_METHOD_NOT_FOUND = -32601;
export const RPC_INVALID_PARAMS = -32602;
export const RPC_INTERNAL_ERROR = -32603;
/** A collaborator call failed; the message is passed through to the operator */
export const RPC_SERVER_ERROR = -32000;

/** Error object returned by the admin listener, raised client-side by AdminClient */
export class RpcError extends Error {
  readonly code: number;

  constructor(code: number, message: string) {
    super(message);
    this.name = 'RpcError';
    this.code = code;
  }
}
