import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  loadSmartPayCredentials,
  maskSecret,
  resolveGatewayEnvironment,
  SecretReader,
  usesTestCredentials
} from '../src/utils/credentials-loader';

class InMemorySecretReader implements SecretReader {
  readonly requested: string[] = [];

  constructor(private readonly secrets: Record<string, string | undefined>) {}

  async getSecretString(secretId: string): Promise<string | undefined> {
    this.requested.push(secretId);
    return this.secrets[secretId];
  }
}

const storedSecret = JSON.stringify({
  'smartpay-main': {
    refreshTokenLive: 'test-live-refresh-token',
    refreshTokenTest: 'test-sandbox-refresh-token',
    signingKeyLive: 'dGVzdC1saXZlLWtleQ==',
    signingKeyTest: 'dGVzdC1zYW5kYm94LWtleQ=='
  },
  'smartpay-partial': {
    refreshTokenLive: 'test-live-refresh-token'
  }
});

describe('loadSmartPayCredentials', () => {
  describe('from Secrets Manager', () => {
    beforeEach(() => {
      vi.stubEnv('PAYMENT_CREDENTIALS_SECRET', 'test/smartpay-credentials');
    });

    it.each(['development', 'test'] as const)('should use the test fields for %s', async (environment) => {
      const reader = new InMemorySecretReader({ 'test/smartpay-credentials': storedSecret });

      const credentials = await loadSmartPayCredentials('smartpay-main', environment, reader);

      expect(credentials).toEqual({
        refreshToken: 'test-sandbox-refresh-token',
        signingKey: 'dGVzdC1zYW5kYm94LWtleQ=='
      });
      expect(reader.requested).toEqual(['test/smartpay-credentials']);
    });

    it.each(['acceptance', 'live'] as const)('should use the live fields for %s', async (environment) => {
      const reader = new InMemorySecretReader({ 'test/smartpay-credentials': storedSecret });

      const credentials = await loadSmartPayCredentials('smartpay-main', environment, reader);

      expect(credentials).toEqual({
        refreshToken: 'test-live-refresh-token',
        signingKey: 'dGVzdC1saXZlLWtleQ=='
      });
    });

    it('should resolve null when the settings ID has no entry', async () => {
      const reader = new InMemorySecretReader({ 'test/smartpay-credentials': storedSecret });

      await expect(loadSmartPayCredentials('smartpay-other', 'live', reader)).resolves.toBeNull();
    });

    it('should resolve null when the entry lacks a signing key', async () => {
      const reader = new InMemorySecretReader({ 'test/smartpay-credentials': storedSecret });

      await expect(loadSmartPayCredentials('smartpay-partial', 'live', reader)).resolves.toBeNull();
    });

    it('should reject a secret without a string value', async () => {
      const reader = new InMemorySecretReader({});

      await expect(loadSmartPayCredentials('smartpay-main', 'live', reader))
        .rejects.toThrow('Secret test/smartpay-credentials exists but has no SecretString value');
    });

    it('should reject a secret that is not JSON', async () => {
      const reader = new InMemorySecretReader({ 'test/smartpay-credentials': 'not-json' });

      await expect(loadSmartPayCredentials('smartpay-main', 'live', reader))
        .rejects.toThrow('Secret test/smartpay-credentials contains invalid JSON');
    });

    it('should reject a secret with the wrong structure', async () => {
      const reader = new InMemorySecretReader({
        'test/smartpay-credentials': JSON.stringify({ 'smartpay-main': { refreshTokenLive: 42 } })
      });

      await expect(loadSmartPayCredentials('smartpay-main', 'live', reader))
        .rejects.toThrow('Secret test/smartpay-credentials does not match the expected credentials structure');
    });

    it('should describe a missing secret', async () => {
      const notFound = new Error('Secrets Manager can not find the specified secret.');
      notFound.name = 'ResourceNotFoundException';
      const reader: SecretReader = { getSecretString: vi.fn(async () => { throw notFound; }) };

      await expect(loadSmartPayCredentials('smartpay-main', 'live', reader))
        .rejects.toThrow("Secret 'test/smartpay-credentials' does not exist in AWS Secrets Manager");
    });
  });

  describe('from environment variables', () => {
    beforeEach(() => {
      vi.stubEnv('PAYMENT_CREDENTIALS_SECRET', '');
    });

    it('should read SMARTPAY_REFRESH_TOKEN and SMARTPAY_SIGNING_KEY', async () => {
      vi.stubEnv('SMARTPAY_REFRESH_TOKEN', 'test-refresh-token');
      vi.stubEnv('SMARTPAY_SIGNING_KEY', 'dGVzdC1rZXk=');
      const reader = new InMemorySecretReader({});

      const credentials = await loadSmartPayCredentials('smartpay-main', 'live', reader);

      expect(credentials).toEqual({ refreshToken: 'test-refresh-token', signingKey: 'dGVzdC1rZXk=' });
      expect(reader.requested).toEqual([]);
    });

    it('should resolve null when they are not set', async () => {
      vi.stubEnv('SMARTPAY_REFRESH_TOKEN', '');
      vi.stubEnv('SMARTPAY_SIGNING_KEY', '');

      await expect(loadSmartPayCredentials('smartpay-main', 'live', new InMemorySecretReader({}))).resolves.toBeNull();
    });
  });
});

describe('usesTestCredentials', () => {
  it('should use test credentials only outside acceptance and live', () => {
    expect(usesTestCredentials('development')).toBe(true);
    expect(usesTestCredentials('test')).toBe(true);
    expect(usesTestCredentials('acceptance')).toBe(false);
    expect(usesTestCredentials('live')).toBe(false);
  });
});

describe('resolveGatewayEnvironment', () => {
  it('should use the production endpoint for acceptance and live', () => {
    expect(resolveGatewayEnvironment('development')).toBe('sandbox');
    expect(resolveGatewayEnvironment('test')).toBe('sandbox');
    expect(resolveGatewayEnvironment('acceptance')).toBe('production');
    expect(resolveGatewayEnvironment('live')).toBe('production');
  });
});

describe('maskSecret', () => {
  it('should keep the first and last four characters of long values', () => {
    expect(maskSecret('test-refresh-token')).toBe('test...oken');
  });

  it('should hide short values entirely', () => {
    expect(maskSecret('short')).toBe('****');
  });
});
