import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { join } from 'node:path';
import { renderBuilderDockerfile } from '../recipe/dockerfile.js';
import { runBuildStage } from '../runtime/stages/build.js';
import { CompileError } from '../shared/errors.js';
import { sha256 } from '../shared/redact.js';
import { FakeRunner, createTempDir, dockerWorld, makeRecipe, makeStageContext, type TempDir } from './test-helpers.js';

async function captureCompileError(promise: Promise<unknown>): Promise<CompileError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof CompileError) return err;
    throw err;
  }
  throw new Error('expected a CompileError');
}

describe('runBuildStage', () => {
  let scratch: TempDir;
  const recipe = makeRecipe();
  const opts = { contextDir: '/src/project', artifactName: 'tool' };

  beforeEach(() => {
    scratch = createTempDir();
  });

  afterEach(() => {
    scratch.cleanup();
  });

  it('compiles in the builder and extracts the artifact', async () => {
    const runner = new FakeRunner(dockerWorld());
    const { artifact, env } = await runBuildStage(recipe.build, opts, makeStageContext(runner, scratch.path));

    expect(runner.calls[0]).toMatchObject({
      bin: 'docker',
      args: ['build', '-f', '-', '-t', 'imagesmith-build:run0001', '--target', 'builder', '/src/project'],
      input: renderBuilderDockerfile(recipe.build),
    });
    expect(runner.commands().slice(1)).toEqual([
      'docker create --name imagesmith-extract-run0001 imagesmith-build:run0001',
      `docker cp -L imagesmith-extract-run0001:/app/target/release/tool ${join(scratch.path, 'artifact', 'tool')}`,
    ]);

    const contents = 'bytes of /app/target/release/tool';
    expect(artifact).toEqual({
      name: 'tool',
      build_path: '/app/target/release/tool',
      host_path: join(scratch.path, 'artifact', 'tool'),
      sha256: sha256(contents),
      size: Buffer.byteLength(contents),
      dependencies: [],
    });
    expect(env).toMatchObject({ image: 'imagesmith-build:run0001', container: 'imagesmith-extract-run0001' });
  });

  it('disposes the builder container and image', async () => {
    const runner = new FakeRunner(dockerWorld());
    const { env } = await runBuildStage(recipe.build, opts, makeStageContext(runner, scratch.path));
    runner.calls.length = 0;

    await env.dispose();

    expect(runner.commands()).toEqual([
      'docker rm -f imagesmith-extract-run0001',
      'docker rmi -f imagesmith-build:run0001',
    ]);
  });

  it('fails with the compiler exit code and output', async () => {
    const runner = new FakeRunner(dockerWorld()).on((call) =>
      call.args[0] === 'build' ? { code: 101, stderr: 'error[E0425]: cannot find value `x` in this scope\n' } : undefined,
    );

    const err = await captureCompileError(
      runBuildStage(recipe.build, opts, makeStageContext(runner, scratch.path)),
    );

    expect(err.message).toBe('Compile step failed with exit code 101');
    expect(err.exitCode).toBe(101);
    expect(err.detail).toBe('error[E0425]: cannot find value `x` in this scope');
    expect(runner.find('docker create')).toHaveLength(0);
  });

  it('fails when the build leaves no artifact, and cleans up', async () => {
    const runner = new FakeRunner(dockerWorld()).on((call) =>
      call.args[0] === 'cp' ? { code: 1, stderr: 'Error: Could not find the file /app/target/release/tool\n' } : undefined,
    );

    const err = await captureCompileError(
      runBuildStage(recipe.build, opts, makeStageContext(runner, scratch.path)),
    );

    expect(err.message).toBe('Build produced no artifact at /app/target/release/tool');
    expect(runner.commands().slice(-2)).toEqual([
      'docker rm -f imagesmith-extract-run0001',
      'docker rmi -f imagesmith-build:run0001',
    ]);
  });

  it('reports a docker that cannot be started', async () => {
    const runner = new FakeRunner(() => {
      throw new Error('spawn docker ENOENT');
    });

    const err = await captureCompileError(
      runBuildStage(recipe.build, opts, makeStageContext(runner, scratch.path)),
    );

    expect(err.message).toBe('Failed to start docker build: spawn docker ENOENT');
    expect(err.exitCode).toBeNull();
  });
});
