import { describe, it, expect, vi } from 'vitest';
import type { AccessToken, TokenCredential } from '@azure/identity';
import { AuthenticationError } from '@scan-harvest/shared';
import { CredentialTokenProvider, StaticTokenProvider } from '../src/auth.js';

function fakeCredential(getToken: TokenCredential['getToken']): TokenCredential {
  return { getToken };
}

describe('StaticTokenProvider', () => {
  it('should return the trimmed token', async () => {
    await expect(new StaticTokenProvider('  test-token ').getToken()).resolves.toBe('test-token');
  });

  it('should reject an empty token', () => {
    expect(() => new StaticTokenProvider('   ')).toThrow(AuthenticationError);
  });
});

describe('CredentialTokenProvider', () => {
  const now = 1_700_000_000_000;

  it('should cache the token until shortly before expiry', async () => {
    const token: AccessToken = { token: 'test-token', expiresOnTimestamp: now + 60 * 60 * 1000 };
    const getToken = vi.fn<TokenCredential['getToken']>().mockResolvedValue(token);
    const provider = new CredentialTokenProvider(fakeCredential(getToken), { now: () => now });

    await provider.getToken();
    await provider.getToken();

    expect(getToken).toHaveBeenCalledTimes(1);
    expect(getToken).toHaveBeenCalledWith('https://analysis.windows.net/powerbi/api/.default');
  });

  it('should acquire a new token inside the expiry buffer', async () => {
    const getToken = vi
      .fn<TokenCredential['getToken']>()
      .mockResolvedValueOnce({ token: 'first', expiresOnTimestamp: now + 60_000 })
      .mockResolvedValueOnce({ token: 'second', expiresOnTimestamp: now + 60 * 60 * 1000 });
    const provider = new CredentialTokenProvider(fakeCredential(getToken), { now: () => now });

    await expect(provider.getToken()).resolves.toBe('first');
    await expect(provider.getToken()).resolves.toBe('second');
  });

  it('should wrap sign-in failures in AuthenticationError', async () => {
    const getToken = vi.fn<TokenCredential['getToken']>().mockRejectedValue(new Error('user cancelled'));
    const provider = new CredentialTokenProvider(fakeCredential(getToken));

    await expect(provider.getToken()).rejects.toThrow('Sign-in failed: user cancelled');
  });

  it('should fail when the credential yields no token', async () => {
    const getToken = vi.fn<TokenCredential['getToken']>().mockResolvedValue(null);
    const provider = new CredentialTokenProvider(fakeCredential(getToken));

    await expect(provider.getToken()).rejects.toBeInstanceOf(AuthenticationError);
  });
});
