import { AuthError, PushError, errorMessage } from '../../shared/errors.js';
import { redactValues } from '../../shared/redact.js';
import { tail, type CommandResult } from '../process.js';
import type { PublishTarget, RegistryCredential, RuntimeImage } from '../types.js';
import type { StageContext } from './context.js';

export function publishRef(target: Pick<PublishTarget, 'registry' | 'repository' | 'tag'>): string {
  return `${target.registry}/${target.repository}:${target.tag}`;
}

export interface PublishStageOptions {
  dryRun?: boolean;
}

/**
 * Logs in, tags, pushes, and logs out. Pushing an existing tag replaces it;
 * a failed push leaves whatever the registry held before.
 */
export async function runPublishStage(
  image: RuntimeImage,
  target: PublishTarget,
  credential: RegistryCredential | null,
  ctx: StageContext,
  opts: PublishStageOptions = {},
): Promise<string> {
  const ref = publishRef(target);

  if (opts.dryRun) {
    ctx.log.info('[DRY RUN] Would push image', { image: image.ref, ref });
    return ref;
  }
  if (!credential) {
    throw new AuthError(`No registry credential for ${target.registry}`);
  }

  const scrub = (text: string) => redactValues(text, [credential.token]);

  let login: CommandResult;
  try {
    login = await ctx.docker.login(target.registry, credential.username, credential.token);
  } catch (err) {
    throw new AuthError(`Failed to run docker login: ${scrub(errorMessage(err))}`);
  }
  if (login.code !== 0) {
    throw new AuthError(`Registry ${target.registry} rejected the credential`, scrub(tail(login.stderr)));
  }

  try {
    if (image.ref !== ref) {
      const tagged = await ctx.docker.tag(image.ref, ref);
      if (tagged.code !== 0) {
        throw new PushError(`Failed to tag ${image.ref} as ${ref}`, tail(tagged.stderr));
      }
    }

    ctx.log.info('Pushing image', { ref, slimmed: image.slimmed });
    let pushed: CommandResult;
    try {
      pushed = await ctx.docker.push(ref);
    } catch (err) {
      throw new PushError(`Failed to run docker push: ${errorMessage(err)}`);
    }
    if (pushed.code !== 0) {
      throw new PushError(`Push of ${ref} failed with exit code ${pushed.code}`, scrub(tail(pushed.stderr)));
    }
    ctx.log.info('Image published', { ref });
    return ref;
  } finally {
    await logout(target.registry, ctx);
  }
}

async function logout(registry: string, ctx: StageContext): Promise<void> {
  try {
    const result = await ctx.docker.logout(registry);
    if (result.code !== 0) {
      ctx.log.warn('docker logout failed', { registry, stderr: tail(result.stderr, 3) });
    }
  } catch (err) {
    ctx.log.warn('docker logout failed', { registry, error: errorMessage(err) });
  }
}
