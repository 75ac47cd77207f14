import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { dump } from 'js-yaml';
import { loadRecipe, parseRecipe } from '../recipe/load.js';
import { DEFAULT_RECIPE } from '../recipe/defaults.js';
import { RecipeError } from '../shared/errors.js';
import { createTempDir, type TempDir } from './test-helpers.js';

const MINIMAL = {
  name: 'tool',
  build: {
    image: 'rust:1.79-bookworm',
    command: ['cargo', 'build', '--release'],
    output: '/app/target/release/tool',
  },
  runtime: { base: 'debian:bookworm-slim', user: 'app', artifact_name: 'tool' },
};

function captureRecipeError(fn: () => unknown): RecipeError {
  try {
    fn();
  } catch (err) {
    if (err instanceof RecipeError) return err;
    throw err;
  }
  throw new Error('expected a RecipeError');
}

describe('parseRecipe', () => {
  it('fills in defaults', () => {
    const recipe = parseRecipe(MINIMAL, { env: {} });
    expect(recipe.build.workdir).toBe('/app');
    expect(recipe.build.context).toBe('.');
    expect(recipe.build.packages).toEqual([]);
    expect(recipe.runtime.home).toBe('/home/app');
    expect(recipe.runtime.command).toEqual(['./tool']);
    expect(recipe.slim).toEqual({
      enabled: true,
      tool: 'docker-slim',
      http_probe: false,
      continue_after: 30,
      grace_seconds: 120,
      fallback_to_unslimmed: false,
    });
    expect(recipe.publish.registry).toBe('ghcr.io');
    expect(recipe.publish.tag).toBe('latest');
    expect(recipe.publish.repository).toBeUndefined();
    expect(recipe.triggers).toEqual({ push: { branches: ['main'] }, manual: true });
  });

  it('resolves {{name}} and {{env.*}} before validation', () => {
    const recipe = parseRecipe(
      {
        ...MINIMAL,
        build: { ...MINIMAL.build, output: '/app/target/release/{{name}}' },
        publish: { repository: '{{env.GITHUB_REPOSITORY}}', tag: '{{env.TAG}}' },
      },
      { env: { GITHUB_REPOSITORY: 'acme/tool', TAG: 'v1.2.0' } },
    );
    expect(recipe.build.output).toBe('/app/target/release/tool');
    expect(recipe.publish.repository).toBe('acme/tool');
    expect(recipe.publish.tag).toBe('v1.2.0');
  });

  it('resolves {{repository}} from the declared publish repository', () => {
    const recipe = parseRecipe(
      {
        ...MINIMAL,
        build: { ...MINIMAL.build, env: { IMAGE_REPO: '{{repository}}' } },
        publish: { repository: 'Acme/Tool' },
      },
      { env: {} },
    );
    expect(recipe.build.env).toEqual({ IMAGE_REPO: 'acme/tool' });
    expect(recipe.publish.repository).toBe('Acme/Tool');
  });

  it('resolves {{repository}} through an env-templated publish repository', () => {
    const recipe = parseRecipe(
      {
        ...MINIMAL,
        build: { ...MINIMAL.build, env: { IMAGE_REPO: '{{repository}}' } },
        publish: { repository: '{{env.REPO}}' },
      },
      { env: { REPO: 'acme/from-env' } },
    );
    expect(recipe.build.env).toEqual({ IMAGE_REPO: 'acme/from-env' });
  });

  it('takes {{repository}} from the caller when the recipe declares none', () => {
    const raw = { ...MINIMAL, build: { ...MINIMAL.build, env: { IMAGE_REPO: '{{repository}}' } } };
    expect(parseRecipe(raw, { env: {}, vars: { repository: 'acme/detected' } }).build.env).toEqual({
      IMAGE_REPO: 'acme/detected',
    });

    const err = captureRecipeError(() => parseRecipe(raw, { env: {} }));
    expect(err.issues).toEqual(['build.env.IMAGE_REPO: unresolved template']);
  });

  it('rejects unresolved template expressions with their paths', () => {
    const err = captureRecipeError(() =>
      parseRecipe({ ...MINIMAL, publish: { repository: '{{env.NOPE}}' } }, { env: {} }),
    );
    expect(err.issues).toEqual(['publish.repository: unresolved template']);
  });

  it('rejects an invalid runtime user name', () => {
    const err = captureRecipeError(() =>
      parseRecipe({ ...MINIMAL, runtime: { ...MINIMAL.runtime, user: 'Root User' } }, { env: {} }),
    );
    expect(err.issues).toEqual(['runtime.user: must be a valid unix user name']);
  });

  it('rejects relative output paths and empty commands', () => {
    const err = captureRecipeError(() =>
      parseRecipe(
        { ...MINIMAL, build: { ...MINIMAL.build, output: 'target/release/tool', command: [] } },
        { env: {} },
      ),
    );
    expect(err.issues).toEqual(
      expect.arrayContaining(['build.output: must be an absolute path', 'build.command: Array must contain at least 1 element(s)']),
    );
  });

  it('requires the entry command to invoke the artifact directly', () => {
    const err = captureRecipeError(() =>
      parseRecipe({ ...MINIMAL, runtime: { ...MINIMAL.runtime, command: ['sh', '-c', './tool'] } }, { env: {} }),
    );
    expect(err.issues).toEqual([
      'runtime.command: must start with the artifact (./tool or /home/app/tool), not a shell or another program',
    ]);

    const absolute = parseRecipe(
      { ...MINIMAL, runtime: { ...MINIMAL.runtime, command: ['/home/app/tool', '--serve'] } },
      { env: {} },
    );
    expect(absolute.runtime.command).toEqual(['/home/app/tool', '--serve']);
  });

  it('accepts the default recipe', () => {
    const recipe = parseRecipe(DEFAULT_RECIPE, { env: {} });
    expect(recipe.name).toBe('app');
    expect(recipe.runtime.user).toBe('app');
    expect(recipe.build.env['PATH']).toBe('/root/.cargo/bin:${PATH}');
  });
});

describe('loadRecipe', () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    dir.cleanup();
  });

  it('loads a YAML recipe', () => {
    const path = join(dir.path, 'imagesmith.yaml');
    writeFileSync(path, dump(MINIMAL), 'utf8');
    expect(loadRecipe(path, { env: {} }).name).toBe('tool');
  });

  it('reports a missing file', () => {
    const path = join(dir.path, 'missing.yaml');
    expect(() => loadRecipe(path)).toThrow(`Recipe not found: ${path}`);
  });

  it('reports invalid YAML', () => {
    const path = join(dir.path, 'broken.yaml');
    writeFileSync(path, 'name: [unterminated', 'utf8');
    expect(() => loadRecipe(path)).toThrow(/^Recipe is not valid YAML/);
  });
});
