import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  createDefaultNamedProviderRegistry,
  ENVIRONMENT_SOURCE,
  EC2_INSTANCE_METADATA_SOURCE,
  ECS_CONTAINER_SOURCE,
} from './default-registry.js';
import { createMockCredentialsProvider } from '../test/mocks.js';
import { TEST_ACCESS_KEY_ID, TEST_SECRET_ACCESS_KEY } from '../test/fixtures.js';

describe('createDefaultNamedProviderRegistry', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('registers the three credential sources a profile may name', () => {
    const registry = createDefaultNamedProviderRegistry();

    expect(registry.names()).toEqual([
      ENVIRONMENT_SOURCE,
      EC2_INSTANCE_METADATA_SOURCE,
      ECS_CONTAINER_SOURCE,
    ]);
    expect(registry.lookup('Ec2InstanceMetadata')?.name).toBe('Ec2InstanceMetadata');
    expect(registry.lookup('EcsContainer')?.name).toBe('EcsContainer');
  });

  describe('given additional providers', () => {
    it('adds new names and overrides defaults on a clash', () => {
      const custom = createMockCredentialsProvider('CustomEnvironment');
      const vault = createMockCredentialsProvider('Vault');

      const registry = createDefaultNamedProviderRegistry({
        additional: { Environment: custom, Vault: vault },
      });

      expect(registry.lookup('Environment')).toBe(custom);
      expect(registry.lookup('Vault')).toBe(vault);
    });
  });

  describe('Environment source', () => {
    const environmentProvider = () => {
      const provider = createDefaultNamedProviderRegistry().lookup(ENVIRONMENT_SOURCE);
      if (provider === undefined) {
        throw new Error('Environment provider not registered');
      }
      return provider;
    };

    it('reads keys from the environment when asked', async () => {
      vi.stubEnv('AWS_ACCESS_KEY_ID', TEST_ACCESS_KEY_ID);
      vi.stubEnv('AWS_SECRET_ACCESS_KEY', TEST_SECRET_ACCESS_KEY);
      vi.stubEnv('AWS_SESSION_TOKEN', undefined);
      vi.stubEnv('AWS_CREDENTIAL_EXPIRATION', undefined);

      const result = await environmentProvider().provideCredentials();

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.accessKeyId).toBe(TEST_ACCESS_KEY_ID);
        expect(result.value.secretAccessKey).toBe(TEST_SECRET_ACCESS_KEY);
        expect(result.value.providerName).toBe('Environment');
      }
    });

    it('reports CREDENTIALS_NOT_LOADED when the keys are missing', async () => {
      vi.stubEnv('AWS_ACCESS_KEY_ID', undefined);
      vi.stubEnv('AWS_SECRET_ACCESS_KEY', undefined);

      const result = await environmentProvider().provideCredentials();

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('CREDENTIALS_NOT_LOADED');
        expect(result.error.providerName).toBe('Environment');
      }
    });
  });
});
