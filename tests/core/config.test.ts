import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/core/config.js';
import { ConfigError } from '../../src/utils/errors.js';
import { TEST_ENV } from '../utils/braintree-mocks.js';

function configError(env: Record<string, string | undefined>): ConfigError {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected loadConfig to throw');
}

describe('loadConfig', () => {
  it('should apply defaults when only credentials are set', () => {
    const config = loadConfig({ ...TEST_ENV });

    expect(config).toEqual({
      merchantId: 'test-merchant',
      publicKey: 'test-public-key',
      privateKey: 'test-private-key',
      environment: 'sandbox',
      apiVersion: '2025-04-01',
      timeoutMs: 30000,
      transport: 'stdio',
      host: '127.0.0.1',
      port: 8001,
      logLevel: 'info',
    });
  });

  it('should read every optional variable', () => {
    const config = loadConfig({
      ...TEST_ENV,
      BRAINTREE_ENVIRONMENT: 'production',
      BRAINTREE_API_VERSION: '2024-07-01',
      BRAINTREE_TIMEOUT_MS: '5000',
      MCP_TRANSPORT: 'http',
      MCP_HOST: '0.0.0.0',
      MCP_PORT: '9100',
      LOG_LEVEL: 'debug',
    });

    expect(config.environment).toBe('production');
    expect(config.apiVersion).toBe('2024-07-01');
    expect(config.timeoutMs).toBe(5000);
    expect(config.transport).toBe('http');
    expect(config.host).toBe('0.0.0.0');
    expect(config.port).toBe(9100);
    expect(config.logLevel).toBe('debug');
  });

  it('should return a frozen object', () => {
    const config = loadConfig({ ...TEST_ENV });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should trim surrounding whitespace from values', () => {
    const config = loadConfig({ ...TEST_ENV, BRAINTREE_PUBLIC_KEY: '  test-public-key\n' });
    expect(config.publicKey).toBe('test-public-key');
  });

  it('should ignore unrelated variables', () => {
    const config = loadConfig({ ...TEST_ENV, PATH: '/usr/bin', HOME: undefined });
    expect(config.merchantId).toBe('test-merchant');
  });

  it('should report every missing credential at once', () => {
    const err = configError({});

    expect(err.issues).toEqual([
      'BRAINTREE_MERCHANT_ID: Required',
      'BRAINTREE_PUBLIC_KEY: Required',
      'BRAINTREE_PRIVATE_KEY: Required',
    ]);
    expect(err.message).toBe(
      'Invalid configuration: BRAINTREE_MERCHANT_ID: Required; BRAINTREE_PUBLIC_KEY: Required; BRAINTREE_PRIVATE_KEY: Required'
    );
  });

  it('should treat blank values as unset', () => {
    const err = configError({ ...TEST_ENV, BRAINTREE_PRIVATE_KEY: '   ' });
    expect(err.issues).toEqual(['BRAINTREE_PRIVATE_KEY: Required']);

    const config = loadConfig({ ...TEST_ENV, BRAINTREE_ENVIRONMENT: '' });
    expect(config.environment).toBe('sandbox');
  });

  it('should reject an unknown environment', () => {
    const err = configError({ ...TEST_ENV, BRAINTREE_ENVIRONMENT: 'staging' });
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]).toMatch(/^BRAINTREE_ENVIRONMENT: /);
  });

  it('should reject a malformed API version', () => {
    const err = configError({ ...TEST_ENV, BRAINTREE_API_VERSION: 'latest' });
    expect(err.issues).toEqual(['BRAINTREE_API_VERSION: must be a date in YYYY-MM-DD form']);
  });

  it('should reject non-numeric and out-of-range ports', () => {
    expect(configError({ ...TEST_ENV, MCP_PORT: 'eighty' }).issues[0]).toMatch(/^MCP_PORT: /);
    expect(configError({ ...TEST_ENV, MCP_PORT: '70000' }).issues[0]).toMatch(/^MCP_PORT: /);
  });

  it('should reject a non-positive timeout', () => {
    const err = configError({ ...TEST_ENV, BRAINTREE_TIMEOUT_MS: '0' });
    expect(err.issues[0]).toMatch(/^BRAINTREE_TIMEOUT_MS: /);
  });

  it('should reject an unknown transport', () => {
    const err = configError({ ...TEST_ENV, MCP_TRANSPORT: 'websocket' });
    expect(err.issues[0]).toMatch(/^MCP_TRANSPORT: /);
  });
});
