import { describe, it, expect } from 'vitest';
import { createStaticCredentialsProvider } from './static-provider.js';
import {
  TEST_ACCESS_KEY_ID,
  TEST_SECRET_ACCESS_KEY,
  TEST_SESSION_TOKEN,
} from '../test/fixtures.js';

describe('createStaticCredentialsProvider', () => {
  describe('given a key pair without session token', () => {
    it('returns exactly the key pair with no token or expiration', async () => {
      // Arrange
      const provider = createStaticCredentialsProvider({
        accessKeyId: TEST_ACCESS_KEY_ID,
        secretAccessKey: TEST_SECRET_ACCESS_KEY,
      });

      // Act
      const result = await provider.provideCredentials();

      // Assert
      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toStrictEqual({
          accessKeyId: TEST_ACCESS_KEY_ID,
          secretAccessKey: TEST_SECRET_ACCESS_KEY,
          providerName: 'StaticKeyPair',
        });
      }
    });
  });

  describe('given a key pair with session token', () => {
    it('includes the session token', async () => {
      const provider = createStaticCredentialsProvider({
        accessKeyId: TEST_ACCESS_KEY_ID,
        secretAccessKey: TEST_SECRET_ACCESS_KEY,
        sessionToken: TEST_SESSION_TOKEN,
      });

      const result = await provider.provideCredentials();

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.sessionToken).toBe(TEST_SESSION_TOKEN);
      }
    });
  });

  it('createStaticCredentialsProvider_RepeatedCalls_ReturnSameValue', async () => {
    const provider = createStaticCredentialsProvider({
      accessKeyId: TEST_ACCESS_KEY_ID,
      secretAccessKey: TEST_SECRET_ACCESS_KEY,
    });

    const first = await provider.provideCredentials();
    const second = await provider.provideCredentials();

    expect(first._unsafeUnwrap()).toBe(second._unsafeUnwrap());
    expect(provider.name).toBe('StaticKeyPair');
  });
});
