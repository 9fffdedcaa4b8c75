import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { CachetCredentials } from '../../src/cachet/credentials';
import { mockSecretsManagerClient, resetAllMocks, setupSecretsManagerMocks } from '../utils/aws-mocks';

describe('CachetCredentials', () => {
  const secrets = new SecretsManagerClient({ region: 'us-east-1' });

  beforeEach(() => {
    resetAllMocks();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should prefer a token from the environment', async () => {
    const credentials = new CachetCredentials('test-token', 'cachet/api', secrets);

    expect(await credentials.getToken()).toBe('test-token');
    expect(mockSecretsManagerClient.commandCalls(GetSecretValueCommand)).toHaveLength(0);
  });

  it('should read the token from Secrets Manager and cache it', async () => {
    setupSecretsManagerMocks('secret-test-token');
    const credentials = new CachetCredentials(undefined, 'cachet/api', secrets);
    const provider = credentials.asProvider();

    expect(await provider()).toBe('secret-test-token');
    expect(await provider()).toBe('secret-test-token');

    const calls = mockSecretsManagerClient.commandCalls(GetSecretValueCommand);
    expect(calls).toHaveLength(1);
    expect(calls[0].args[0].input).toEqual({ SecretId: 'cachet/api' });
  });

  it('should fetch the secret again after five minutes', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    setupSecretsManagerMocks();
    const credentials = new CachetCredentials(undefined, 'cachet/api', secrets);

    await credentials.getToken();
    vi.setSystemTime(new Date('2026-01-01T00:05:01Z'));
    await credentials.getToken();

    expect(mockSecretsManagerClient.commandCalls(GetSecretValueCommand)).toHaveLength(2);
  });

  it('should fail without a token or a secret id', async () => {
    const credentials = new CachetCredentials(undefined, undefined, secrets);

    await expect(credentials.getToken()).rejects.toThrow('Neither CACHET_API_TOKEN nor CACHET_SECRET_ID is set');
  });

  it('should reject a secret without the token field', async () => {
    mockSecretsManagerClient.on(GetSecretValueCommand).resolves({ SecretString: JSON.stringify({ token: 'x' }) });
    const credentials = new CachetCredentials(undefined, 'cachet/api', secrets);

    await expect(credentials.getToken()).rejects.toThrow('Cachet secret missing required field (cachet_api_token)');
  });

  it('should reject an empty secret', async () => {
    mockSecretsManagerClient.on(GetSecretValueCommand).resolves({});
    const credentials = new CachetCredentials(undefined, 'cachet/api', secrets);

    await expect(credentials.getToken()).rejects.toThrow('SecretString empty for Cachet secret');
  });
});
