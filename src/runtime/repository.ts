import { declaredRepository, parseRecipe, readRecipeFile } from '../recipe/load.js';
import type { PublishSpec, Recipe } from '../recipe/types.js';
import { RecipeError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { referencesVariable } from '../shared/template.js';
import type { CommandRunner } from './process.js';
import type { PublishTarget } from './types.js';

const REPOSITORY_PATH = /^[a-z0-9]+(?:[._-][a-z0-9]+)*(?:\/[a-z0-9]+(?:[._-][a-z0-9]+)*)*$/;

/**
 * owner/repo from a git remote URL:
 *   git@github.com:Owner/Repo.git, https://github.com/Owner/Repo(.git), ssh://git@host/owner/repo
 */
export function parseRemoteRepository(url: string): string | null {
  const trimmed = url.trim();
  const scp = /^[^@/\s]+@[^:/\s]+:(.+)$/.exec(trimmed);
  let path: string | null = scp?.[1] ?? null;
  if (path === null) {
    try {
      path = new URL(trimmed).pathname;
    } catch {
      return null;
    }
  }
  const cleaned = path.replace(/^\/+/, '').replace(/\/+$/, '').replace(/\.git$/, '');
  return cleaned.includes('/') ? cleaned : null;
}

export function normalizeRepository(repository: string): string {
  const normalized = repository.trim().toLowerCase();
  if (!REPOSITORY_PATH.test(normalized)) {
    throw new RecipeError(`Invalid repository path: ${repository}`);
  }
  return normalized;
}

export interface RepositoryResolveOptions {
  env: NodeJS.ProcessEnv;
  runner: CommandRunner;
  cwd: string;
}

/** The CI's GITHUB_REPOSITORY, else the origin remote of the source checkout. */
export async function detectRepository(opts: RepositoryResolveOptions): Promise<string | null> {
  const fromEnv = opts.env['GITHUB_REPOSITORY'];
  if (fromEnv) return normalizeRepository(fromEnv);

  try {
    const remote = await opts.runner.run('git', ['config', '--get', 'remote.origin.url'], { cwd: opts.cwd });
    const parsed = remote.code === 0 ? parseRemoteRepository(remote.stdout) : null;
    if (parsed) return normalizeRepository(parsed);
  } catch (err) {
    logger.debug('git remote lookup failed', { error: errorMessage(err) });
  }
  return null;
}

/**
 * Repository path for the publish target: the recipe's, else the one
 * detected from the CI environment or the checkout.
 */
export async function resolveRepository(
  spec: PublishSpec,
  opts: RepositoryResolveOptions,
): Promise<string> {
  if (spec.repository) return normalizeRepository(spec.repository);

  const detected = await detectRepository(opts);
  if (detected) return detected;
  throw new RecipeError(
    'Cannot determine the repository path: set publish.repository, GITHUB_REPOSITORY, or a git origin remote',
  );
}

/**
 * Loads a recipe with {{repository}} available. The repository is only
 * detected when the recipe uses it without declaring publish.repository.
 */
export async function loadRecipeWithRepository(
  recipePath: string,
  opts: RepositoryResolveOptions,
): Promise<Recipe> {
  const raw = readRecipeFile(recipePath);
  const vars: Record<string, string> = {};
  if (referencesVariable(raw, 'repository') && declaredRepository(raw, opts.env) === undefined) {
    const detected = await detectRepository(opts);
    if (detected) vars['repository'] = detected;
  }
  return parseRecipe(raw, { env: opts.env, vars });
}

export function buildPublishTarget(spec: PublishSpec, repository: string): PublishTarget {
  return {
    registry: spec.registry,
    repository,
    tag: spec.tag,
    username_env: spec.username_env,
    token_env: spec.token_env,
  };
}
