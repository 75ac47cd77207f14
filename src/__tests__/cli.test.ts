import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { Command } from 'commander';
import { registerInitCommand } from '../cli/commands/init.js';
import { registerRunCommand } from '../cli/commands/run.js';
import { registerRenderCommand } from '../cli/commands/render.js';
import { registerRunsCommand } from '../cli/commands/runs.js';
import { registerAuditCommand } from '../cli/commands/audit.js';
import { registerDoctorCommand } from '../cli/commands/doctor.js';
import type { CliDeps } from '../cli/cli-shared.js';
import { closeDb } from '../workspace/db.js';
import { FakeRunner, TEST_CREDENTIAL_ENV, createTempDir, dockerWorld, type TempDir } from './test-helpers.js';

const RECIPE = `name: tool
build:
  image: rust:1.79-bookworm
  command: [cargo, build, --release]
  output: /app/target/release/tool
runtime:
  base: debian:bookworm-slim
  user: app
  artifact_name: tool
publish:
  repository: acme/tool
`;

function cli(deps: CliDeps = {}): Command {
  const program = new Command().exitOverride();
  registerInitCommand(program);
  registerRunCommand(program, deps);
  registerRenderCommand(program, deps);
  registerRunsCommand(program);
  registerAuditCommand(program);
  registerDoctorCommand(program, deps);
  return program;
}

describe('imagesmith CLI', () => {
  let dir: TempDir;
  let output: string[];

  const exec = (args: string[], deps: CliDeps = {}) =>
    cli(deps).parseAsync([...args, '--cwd', dir.path], { from: 'user' });

  beforeEach(() => {
    dir = createTempDir('imagesmith-cli-');
    writeFileSync(join(dir.path, 'imagesmith.yaml'), RECIPE);
    output = [];
    jest.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      output.push(args.join(' '));
    });
    jest.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      output.push(args.join(' '));
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
    closeDb();
    dir.cleanup();
    process.exitCode = undefined;
  });

  const docker = () => ({ runner: new FakeRunner(dockerWorld()), env: { ...TEST_CREDENTIAL_ENV } });

  it('init keeps an existing recipe', async () => {
    await exec(['init']);

    expect(output).toContain(`  Recipe:       ${join(dir.path, 'imagesmith.yaml')} (existing, left unchanged)`);
  });

  it('refuses to run outside a workspace', async () => {
    await expect(exec(['run'], docker())).rejects.toThrow(
      `Workspace not initialized in ${dir.path}. Run: imagesmith init`,
    );
  });

  it('runs the pipeline and records the run', async () => {
    await exec(['init']);
    const deps = docker();

    await exec(['run'], deps);

    expect(output).toContain('Running tool (manual dispatch)');
    expect(output).toContain('  [ok] publishing -> done');
    expect(output).toContain('\nPublished: ghcr.io/acme/tool:latest (slimmed)');
    expect(deps.runner.find('docker push')).toHaveLength(1);
    expect(process.exitCode).toBeUndefined();

    output = [];
    await exec(['audit', 'verify']);
    expect(output).toEqual(['Audit chain intact (5 entries)']);
  });

  it('skips the slimming stage with --no-slim', async () => {
    await exec(['init']);
    const deps = docker();

    await exec(['run', '--no-slim', '--dry-run'], deps);

    expect(output).toContain('[DRY RUN] – the image will not be pushed');
    expect(output).toContain('\nPublished: ghcr.io/acme/tool:latest');
    expect(output).not.toContain('  [ok] assembling -> slimming');
    expect(deps.runner.calls.some((c) => c.bin === 'docker-slim')).toBe(false);
    expect(deps.runner.find('docker push')).toHaveLength(0);
  });

  it('sets a failing exit code when the run fails', async () => {
    await exec(['init']);

    await exec(['run'], { runner: new FakeRunner(dockerWorld()), env: {} });

    expect(output).toContain(
      '\nError (auth): Registry credential for ghcr.io missing: set REGISTRY_USERNAME and REGISTRY_TOKEN',
    );
    expect(process.exitCode).toBe(1);
  });

  it('skips a push to a branch that is not configured', async () => {
    await exec(['init']);
    const deps = docker();

    await exec(['run', '--event', 'push', '--ref', 'refs/heads/feature/x'], deps);

    expect(output).toEqual(
      expect.arrayContaining(['Skipped: branch feature/x is not a release branch']),
    );
    expect(deps.runner.calls).toHaveLength(0);
  });

  it('needs a ref for a push event', async () => {
    await exec(['init']);

    await expect(exec(['run', '--event', 'push'], docker())).rejects.toThrow('--event push needs --ref');
  });

  it('lists runs and shows one with its transitions', async () => {
    await exec(['init']);
    await exec(['run', '--json'], docker());
    const printed = output.find((line) => line.startsWith('{')) ?? '{}';
    const runId: unknown = JSON.parse(printed).run_id;
    expect(typeof runId).toBe('string');

    output = [];
    await exec(['runs']);
    expect(output).toHaveLength(1);
    expect(output[0]).toMatch(new RegExp(`^${String(runId)}  \\S+  manual  done$`));

    output = [];
    await exec(['runs', String(runId)]);
    expect(output).toContain('  Image:    ghcr.io/acme/tool:latest (slimmed)');
    expect(output.filter((line) => line.includes(' -> '))).toHaveLength(5);
  });

  it('reports an unknown run', async () => {
    await exec(['init']);

    await expect(exec(['runs', 'nope'])).rejects.toThrow('Run not found: nope');
  });

  it('renders both Dockerfiles', async () => {
    await exec(['render']);

    expect(output[0]).toBe('# Build stage');
    expect(output[1]).toContain('FROM rust:1.79-bookworm AS builder');
    expect(output[2]).toBe('# Runtime stage (shared libraries are added after dependency resolution)');
    expect(output[3]).toContain('COPY --chown=app:app artifact /home/app/tool');
    expect(output[3]).toContain('USER app');
  });

  it('renders the recipe the workspace points at', async () => {
    writeFileSync(join(dir.path, 'build.yaml'), RECIPE.replace('rust:1.79-bookworm', 'golang:1.22-bookworm'));
    await exec(['init', '--recipe', 'build.yaml']);
    output = [];

    await exec(['render', '--stage', 'build']);

    expect(output[0]).toBe('# Build stage');
    expect(output[1]).toContain('FROM golang:1.22-bookworm AS builder');
  });

  it('doctor exits non-zero on a failed check', async () => {
    const runner = new FakeRunner(() => ({ code: 1 }));

    await exec(['doctor'], { runner, env: {} });

    expect(output.at(-1)).toContain('Overall: FAIL');
    expect(process.exitCode).toBe(1);
  });
});
