import { describe, it, expect } from 'vitest';
import {
  formatListenAddress,
  loadServerConfig,
  parseDuration,
  parseListenAddress,
} from '../../src/config/server';
import { ConfigError } from '../../src/errors';

describe('parseDuration', () => {
  it.each([
    ['2m', 120_000],
    ['1m30s', 90_000],
    ['500ms', 500],
    ['1.5s', 1_500],
    ['1h', 3_600_000],
    ['250', 250],
    [' 45s ', 45_000],
  ])('parses %s', (input, expected) => {
    expect(parseDuration(input)).toBe(expected);
  });

  it.each(['', 'abc', '5x', '1m junk', 'x1m'])('rejects %j', (input) => {
    expect(() => parseDuration(input)).toThrow(ConfigError);
  });
});

describe('parseListenAddress', () => {
  it('binds every interface when the host is empty', () => {
    expect(parseListenAddress(':8080')).toEqual({ host: '0.0.0.0', port: 8080 });
  });

  it('keeps an explicit host', () => {
    expect(parseListenAddress('127.0.0.1:9000')).toEqual({ host: '127.0.0.1', port: 9000 });
  });

  it('unwraps bracketed IPv6 hosts', () => {
    expect(parseListenAddress('[::1]:8081')).toEqual({ host: '::1', port: 8081 });
  });

  it.each(['8080', ':abc', ':99999', 'localhost:'])('rejects %j', (input) => {
    expect(() => parseListenAddress(input)).toThrow(ConfigError);
  });
});

describe('formatListenAddress', () => {
  it('brackets IPv6 hosts', () => {
    expect(formatListenAddress({ host: '::1', port: 8081 })).toBe('[::1]:8081');
    expect(formatListenAddress({ host: '0.0.0.0', port: 8080 })).toBe('0.0.0.0:8080');
  });
});

describe('loadServerConfig', () => {
  it('applies defaults', () => {
    expect(loadServerConfig({})).toEqual({
      listenAddr: { host: '0.0.0.0', port: 8080 },
      localAddr: { host: '0.0.0.0', port: 8081 },
      readTimeoutMs: 120_000,
      writeTimeoutMs: 120_000,
      bodyLimit: 1_048_576,
      logLevel: 'info',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadServerConfig({
      LISTEN_ADDR: '127.0.0.1:9080',
      LOCAL_ADDR: '127.0.0.1:9081',
      READ_TIMEOUT: '30s',
      WRITE_TIMEOUT: '1m',
      BODY_LIMIT: '4096',
      LOG_LEVEL: 'debug',
    });

    expect(config).toEqual({
      listenAddr: { host: '127.0.0.1', port: 9080 },
      localAddr: { host: '127.0.0.1', port: 9081 },
      readTimeoutMs: 30_000,
      writeTimeoutMs: 60_000,
      bodyLimit: 4096,
      logLevel: 'debug',
    });
  });

  it('rejects an unknown log level', () => {
    expect(() => loadServerConfig({ LOG_LEVEL: 'loud' })).toThrow(ConfigError);
  });

  it('rejects a non-numeric body limit', () => {
    expect(() => loadServerConfig({ BODY_LIMIT: 'lots' })).toThrow(ConfigError);
  });
});
