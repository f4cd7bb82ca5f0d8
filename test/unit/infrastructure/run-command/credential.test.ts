import { describe, it, expect, jest } from '@jest/globals';
import type { AccessToken, GetTokenOptions, TokenCredential } from '@azure/identity';
import { acquireCredential } from '../../../../src/infrastructure/run-command';
import { CredentialError } from '../../../../src/errors';
import { createMockLogger } from '../../../__support__/utilities/mock-infrastructure';

function credentialReturning(result: AccessToken | null | Error) {
  const getToken = jest.fn(async (_scopes: string | string[], _options?: GetTokenOptions) => {
    if (result instanceof Error) {
      throw result;
    }
    return result;
  });
  const credential: TokenCredential = { getToken };
  return { credential, getToken };
}

describe('acquireCredential', () => {
  it('should request an ARM token and hand back the same credential', async () => {
    const { credential, getToken } = credentialReturning({ token: 'test-token', expiresOnTimestamp: 0 });

    await expect(acquireCredential(createMockLogger(), credential)).resolves.toBe(credential);
    expect(getToken).toHaveBeenCalledWith('https://management.azure.com/.default');
  });

  it('should fail when the credential chain cannot issue a token', async () => {
    const { credential } = credentialReturning(new Error('no credential available'));

    const acquiring = acquireCredential(createMockLogger(), credential);

    await expect(acquiring).rejects.toBeInstanceOf(CredentialError);
    await expect(acquiring).rejects.toThrow('getting az credentials: no credential available');
  });

  it('should fail when no token is issued', async () => {
    const { credential } = credentialReturning(null);

    await expect(acquireCredential(createMockLogger(), credential)).rejects.toThrow(
      'getting az credentials: no token issued',
    );
  });
});
