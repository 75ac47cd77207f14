import { AuthError } from '../shared/errors.js';
import type { PublishTarget, RegistryCredential } from './types.js';

/**
 * Reads the registry credential from the environment the CI secret store
 * injected. Called at the start of the publish stage and nowhere else.
 */
export function readRegistryCredential(
  target: Pick<PublishTarget, 'registry' | 'username_env' | 'token_env'>,
  env: NodeJS.ProcessEnv,
): RegistryCredential {
  const username = env[target.username_env]?.trim();
  const token = env[target.token_env];
  const missing = [
    ...(username ? [] : [target.username_env]),
    ...(token ? [] : [target.token_env]),
  ];
  if (!username || !token) {
    throw new AuthError(`Registry credential for ${target.registry} missing: set ${missing.join(' and ')}`);
  }
  return { username, token };
}
