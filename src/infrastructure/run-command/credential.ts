import { DefaultAzureCredential, type TokenCredential } from '@azure/identity';
import type { Logger } from 'pino';
import { ARM_SCOPE } from '../../config/defaults';
import { CredentialError, toError } from '../../errors';

/**
 * Build a credential and prove it can reach ARM before anything uses it.
 * The returned credential lives as long as the channel it is handed to.
 */
export async function acquireCredential(
  logger: Logger,
  credential: TokenCredential = new DefaultAzureCredential(),
): Promise<TokenCredential> {
  let token: Awaited<ReturnType<TokenCredential['getToken']>>;
  try {
    token = await credential.getToken(ARM_SCOPE);
  } catch (error) {
    throw new CredentialError(`getting az credentials: ${toError(error).message}`, toError(error));
  }

  if (!token) {
    throw new CredentialError('getting az credentials: no token issued');
  }

  logger.debug({ expiresOn: new Date(token.expiresOnTimestamp).toISOString() }, 'Acquired credential');
  return credential;
}
