/**
 * Listener Configuration
 *
 * Read once from the environment at startup, immutable afterwards.
 * Addresses use host:port form; an empty host (":8080") binds every
 * interface. Durations accept ms/s/m/h units, combinable ("1m30s").
 */

import { Type, Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ConfigError } from '../errors';

export const ListenAddressSchema = Type.Object({
  host: Type.String({ minLength: 1 }),
  port: Type.Integer({ minimum: 0, maximum: 65535 }),
});

export type ListenAddress = Static<typeof ListenAddressSchema>;

export const ServerConfigSchema = Type.Object({
  listenAddr: ListenAddressSchema,
  localAddr: ListenAddressSchema,
  readTimeoutMs: Type.Integer({ minimum: 0 }),
  writeTimeoutMs: Type.Integer({ minimum: 0 }),
  bodyLimit: Type.Integer({ minimum: 1 }),
  logLevel: Type.Union([
    Type.Literal('fatal'),
    Type.Literal('error'),
    Type.Literal('warn'),
    Type.Literal('info'),
    Type.Literal('debug'),
    Type.Literal('trace'),
    Type.Literal('silent'),
  ]),
});

export type ServerConfig = Static<typeof ServerConfigSchema>;

export const DEFAULT_LISTEN_ADDR = ':8080';
export const DEFAULT_LOCAL_ADDR = ':8081';
export const DEFAULT_TIMEOUT = '2m';
export const DEFAULT_BODY_LIMIT = 1024 * 1024;

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

export function parseDuration(input: string): number {
  const text = input.trim();
  if (/^\d+$/.test(text)) {
    return parseInt(text, 10);
  }

  const pattern = /(\d+(?:\.\d+)?)(ms|s|m|h)/g;
  let total = 0;
  let consumed = 0;

  for (const match of text.matchAll(pattern)) {
    if (match.index !== consumed) break;
    total += parseFloat(match[1]) * DURATION_UNITS[match[2]];
    consumed += match[0].length;
  }

  if (consumed === 0 || consumed !== text.length) {
    throw new ConfigError(`Invalid duration: "${input}"`);
  }

  return Math.round(total);
}

export function parseListenAddress(input: string): ListenAddress {
  const text = input.trim();
  const separator = text.lastIndexOf(':');
  if (separator === -1) {
    throw new ConfigError(`Invalid listen address (expected host:port): "${input}"`);
  }

  let host = text.slice(0, separator);
  const portText = text.slice(separator + 1);

  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  }
  if (host === '') {
    host = '0.0.0.0';
  }

  if (!/^\d+$/.test(portText)) {
    throw new ConfigError(`Invalid port in listen address: "${input}"`);
  }

  const address = { host, port: parseInt(portText, 10) };
  if (!Value.Check(ListenAddressSchema, address)) {
    throw new ConfigError(`Invalid listen address: "${input}"`);
  }
  return address;
}

export function formatListenAddress(address: ListenAddress): string {
  return address.host.includes(':')
    ? `[${address.host}]:${address.port}`
    : `${address.host}:${address.port}`;
}

/**
 * Load listener settings from environment variables
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const config = {
    listenAddr: parseListenAddress(env.LISTEN_ADDR || DEFAULT_LISTEN_ADDR),
    localAddr: parseListenAddress(env.LOCAL_ADDR || DEFAULT_LOCAL_ADDR),
    readTimeoutMs: parseDuration(env.READ_TIMEOUT || DEFAULT_TIMEOUT),
    writeTimeoutMs: parseDuration(env.WRITE_TIMEOUT || DEFAULT_TIMEOUT),
    bodyLimit: parseInt(env.BODY_LIMIT || String(DEFAULT_BODY_LIMIT), 10),
    logLevel: env.LOG_LEVEL || 'info',
  };

  if (!Value.Check(ServerConfigSchema, config)) {
    const issues = [...Value.Errors(ServerConfigSchema, config)]
      .map((e) => `${e.path}: ${e.message}`)
      .join('; ');
    throw new ConfigError(`Invalid server configuration: ${issues}`);
  }

  return config;
}
