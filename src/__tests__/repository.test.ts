import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  buildPublishTarget,
  loadRecipeWithRepository,
  normalizeRepository,
  parseRemoteRepository,
  resolveRepository,
} from '../runtime/repository.js';
import { readRegistryCredential } from '../runtime/credentials.js';
import { AuthError, RecipeError } from '../shared/errors.js';
import { FakeRunner, createTempDir, makeRecipe, type TempDir } from './test-helpers.js';

describe('parseRemoteRepository', () => {
  it.each([
    ['git@github.com:Acme/Tool.git', 'Acme/Tool'],
    ['https://github.com/acme/tool.git', 'acme/tool'],
    ['https://github.com/acme/tool/', 'acme/tool'],
    ['ssh://git@gitlab.example.com/group/sub/tool.git', 'group/sub/tool'],
  ])('parses %s', (url, expected) => {
    expect(parseRemoteRepository(url)).toBe(expected);
  });

  it('rejects remotes without an owner', () => {
    expect(parseRemoteRepository('https://example.com/tool')).toBeNull();
    expect(parseRemoteRepository('not a url')).toBeNull();
  });
});

describe('normalizeRepository', () => {
  it('lowercases for the registry', () => {
    expect(normalizeRepository('Acme/Tool')).toBe('acme/tool');
  });

  it('rejects invalid paths', () => {
    expect(() => normalizeRepository('acme/to ol')).toThrow(RecipeError);
  });
});

describe('resolveRepository', () => {
  const runner = () =>
    new FakeRunner((call) =>
      call.bin === 'git' ? { stdout: 'git@github.com:Acme/From-Git.git\n' } : undefined,
    );

  it('prefers the recipe', async () => {
    const spec = makeRecipe({ publish: { repository: 'acme/tool' } }).publish;
    const fake = runner();
    await expect(
      resolveRepository(spec, { env: { GITHUB_REPOSITORY: 'acme/other' }, runner: fake, cwd: '/src' }),
    ).resolves.toBe('acme/tool');
    expect(fake.calls).toHaveLength(0);
  });

  it('falls back to GITHUB_REPOSITORY, then the origin remote', async () => {
    const spec = makeRecipe({ publish: {} }).publish;
    await expect(
      resolveRepository(spec, { env: { GITHUB_REPOSITORY: 'Acme/CI' }, runner: runner(), cwd: '/src' }),
    ).resolves.toBe('acme/ci');

    const fake = runner();
    await expect(resolveRepository(spec, { env: {}, runner: fake, cwd: '/src' })).resolves.toBe('acme/from-git');
    expect(fake.calls[0]).toMatchObject({ bin: 'git', args: ['config', '--get', 'remote.origin.url'], cwd: '/src' });
  });

  it('fails when nothing names the repository', async () => {
    const spec = makeRecipe({ publish: {} }).publish;
    const fake = new FakeRunner(() => ({ code: 1 }));
    await expect(resolveRepository(spec, { env: {}, runner: fake, cwd: '/src' })).rejects.toThrow(
      /Cannot determine the repository path/,
    );
  });

  it('builds the publish target', () => {
    const spec = makeRecipe({ publish: { registry: 'registry.example.com', tag: 'v1' } }).publish;
    expect(buildPublishTarget(spec, 'acme/tool')).toEqual({
      registry: 'registry.example.com',
      repository: 'acme/tool',
      tag: 'v1',
      username_env: 'REGISTRY_USERNAME',
      token_env: 'REGISTRY_TOKEN',
    });
  });
});

describe('loadRecipeWithRepository', () => {
  let dir: TempDir;
  const recipeFile = (publish: string) =>
    writeFileSync(
      join(dir.path, 'imagesmith.yaml'),
      `name: tool
build:
  image: rust:1.79-bookworm
  command: [cargo, build, --release]
  output: /app/target/release/tool
  env:
    IMAGE_REPO: "{{repository}}"
runtime:
  base: debian:bookworm-slim
  user: app
  artifact_name: tool
${publish}`,
    );

  beforeEach(() => {
    dir = createTempDir('imagesmith-repo-');
  });

  afterEach(() => {
    dir.cleanup();
  });

  it('detects the repository when the recipe uses it without declaring one', async () => {
    recipeFile('');
    const fake = new FakeRunner();
    const recipe = await loadRecipeWithRepository(join(dir.path, 'imagesmith.yaml'), {
      env: { GITHUB_REPOSITORY: 'Acme/CI' },
      runner: fake,
      cwd: dir.path,
    });
    expect(recipe.build.env).toEqual({ IMAGE_REPO: 'acme/ci' });
    expect(fake.calls).toHaveLength(0);
  });

  it('falls back to the origin remote', async () => {
    recipeFile('');
    const fake = new FakeRunner((call) =>
      call.bin === 'git' ? { stdout: 'https://github.com/Acme/Remote.git\n' } : undefined,
    );
    const recipe = await loadRecipeWithRepository(join(dir.path, 'imagesmith.yaml'), {
      env: {},
      runner: fake,
      cwd: dir.path,
    });
    expect(recipe.build.env).toEqual({ IMAGE_REPO: 'acme/remote' });
  });

  it('uses the declared repository without looking elsewhere', async () => {
    recipeFile('publish:\n  repository: acme/declared\n');
    const fake = new FakeRunner();
    const recipe = await loadRecipeWithRepository(join(dir.path, 'imagesmith.yaml'), {
      env: { GITHUB_REPOSITORY: 'acme/ci' },
      runner: fake,
      cwd: dir.path,
    });
    expect(recipe.build.env).toEqual({ IMAGE_REPO: 'acme/declared' });
    expect(fake.calls).toHaveLength(0);
  });
});

describe('readRegistryCredential', () => {
  const target = { registry: 'ghcr.io', username_env: 'REGISTRY_USERNAME', token_env: 'REGISTRY_TOKEN' };

  it('reads and trims the injected credential', () => {
    expect(readRegistryCredential(target, { REGISTRY_USERNAME: ' ci-bot\n', REGISTRY_TOKEN: 'test-secret' })).toEqual({
      username: 'ci-bot',
      token: 'test-secret',
    });
  });

  it('names the missing variables without echoing values', () => {
    let caught: unknown;
    try {
      readRegistryCredential(target, { REGISTRY_USERNAME: 'ci-bot' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(AuthError);
    expect(caught).toHaveProperty('message', 'Registry credential for ghcr.io missing: set REGISTRY_TOKEN');
  });
});
