import { existsSync, readFileSync } from 'node:fs';
import { load } from 'js-yaml';
import { RecipeSchema } from '../shared/schemas.js';
import { RecipeError, errorMessage } from '../shared/errors.js';
import { findUnresolved, resolveTemplate } from '../shared/template.js';
import type { Recipe } from './types.js';

export interface RecipeLoadOptions {
  /** Environment used for {{env.NAME}} expressions. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  vars?: Record<string, string>;
}

/** The recipe as parsed YAML, before templates and validation. */
export function readRecipeFile(recipePath: string): unknown {
  if (!existsSync(recipePath)) {
    throw new RecipeError(`Recipe not found: ${recipePath}`);
  }
  try {
    return load(readFileSync(recipePath, 'utf8'));
  } catch (err) {
    throw new RecipeError(`Recipe is not valid YAML: ${errorMessage(err)}`);
  }
}

export function loadRecipe(recipePath: string, opts: RecipeLoadOptions = {}): Recipe {
  return parseRecipe(readRecipeFile(recipePath), opts);
}

/**
 * publish.repository as written in the recipe, lowercased, once its own
 * {{env.NAME}} expressions resolve. Undefined when absent or unresolvable.
 */
export function declaredRepository(raw: unknown, env: NodeJS.ProcessEnv): string | undefined {
  if (raw === null || typeof raw !== 'object' || !('publish' in raw)) return undefined;
  const publish = raw.publish;
  if (publish === null || typeof publish !== 'object' || !('repository' in publish)) return undefined;
  if (typeof publish.repository !== 'string') return undefined;

  const resolved = resolveTemplate(publish.repository, {}, env);
  if (typeof resolved !== 'string' || findUnresolved(resolved).length > 0) return undefined;
  return resolved.trim().toLowerCase();
}

export function parseRecipe(raw: unknown, opts: RecipeLoadOptions = {}): Recipe {
  const env = opts.env ?? process.env;
  const vars: Record<string, string> = { ...opts.vars };
  if (raw !== null && typeof raw === 'object' && 'name' in raw && typeof raw.name === 'string') {
    vars['name'] ??= raw.name;
  }
  const repository = declaredRepository(raw, env);
  if (repository !== undefined) vars['repository'] = repository;

  const resolved = resolveTemplate(raw, vars, env);
  const unresolved = findUnresolved(resolved);
  if (unresolved.length > 0) {
    throw new RecipeError(
      'Recipe has unresolved template expressions',
      unresolved.map((path) => `${path}: unresolved template`),
    );
  }

  const parsed = RecipeSchema.safeParse(resolved);
  if (!parsed.success) {
    throw new RecipeError(
      'Invalid recipe',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}
