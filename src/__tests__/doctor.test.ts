import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { runDoctorChecks, type DoctorReport } from '../runtime/doctor.js';
import { initWorkspace } from '../workspace/init.js';
import { closeDb } from '../workspace/db.js';
import { FakeRunner, TEST_CREDENTIAL_ENV, createTempDir, type TempDir } from './test-helpers.js';

function healthyRunner(): FakeRunner {
  return new FakeRunner((call) => {
    if (call.bin === 'docker' && call.args[0] === 'version') return { stdout: '27.1.1\n' };
    if (call.bin === 'docker-slim') return { stdout: 'mint version linux|Transformer|1.41.1\n' };
    return undefined;
  });
}

function statusOf(report: DoctorReport, name: string): string | undefined {
  return report.checks.find((c) => c.name === name)?.status;
}

describe('runDoctorChecks', () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir('imagesmith-doctor-');
  });

  afterEach(() => {
    closeDb();
    dir.cleanup();
  });

  it('passes on an initialized workspace with tools and credential present', async () => {
    initWorkspace({ cwd: dir.path });

    const report = await runDoctorChecks({ cwd: dir.path, runner: healthyRunner(), env: { ...TEST_CREDENTIAL_ENV } });

    expect(report.checks.map((c) => c.name)).toEqual([
      'Node.js >= 20',
      'Workspace initialized (.imagesmith/)',
      'Recipe valid',
      'Docker engine reachable',
      'Slimming tool available',
      'Registry credential variables',
    ]);
    expect(report.overall).toBe('pass');
    expect(report.summary).toBe('All checks passed');
    expect(report.checks.find((c) => c.name === 'Docker engine reachable')?.message).toBe('Docker server 27.1.1');
    expect(report.checks.find((c) => c.name === 'Slimming tool available')?.message).toBe(
      'mint version linux|Transformer|1.41.1',
    );
  });

  it('never shows credential values', async () => {
    initWorkspace({ cwd: dir.path });

    const report = await runDoctorChecks({ cwd: dir.path, runner: healthyRunner(), env: { ...TEST_CREDENTIAL_ENV } });

    expect(report.checks.find((c) => c.name === 'Registry credential variables')?.message).toBe(
      'REGISTRY_USERNAME, REGISTRY_TOKEN set (values not shown)',
    );
  });

  it('fails outside a workspace and points at init', async () => {
    const report = await runDoctorChecks({ cwd: dir.path, runner: healthyRunner(), env: {} });

    const workspace = report.checks.find((c) => c.name === 'Workspace initialized (.imagesmith/)');
    expect(workspace).toMatchObject({ status: 'fail', fix: 'Run: imagesmith init' });
    expect(statusOf(report, 'Recipe valid')).toBe('fail');
    expect(statusOf(report, 'Registry credential variables')).toBe('warn');
    expect(report.overall).toBe('fail');
    expect(report.summary).toBe('2 check(s) failed, 1 warning(s)');
  });

  it('fails when the docker daemon is unreachable', async () => {
    initWorkspace({ cwd: dir.path });
    const runner = healthyRunner().on((call) =>
      call.bin === 'docker' ? { code: 1, stderr: 'Cannot connect to the Docker daemon\n' } : undefined,
    );

    const report = await runDoctorChecks({ cwd: dir.path, runner, env: { ...TEST_CREDENTIAL_ENV } });

    expect(report.checks.find((c) => c.name === 'Docker engine reachable')).toMatchObject({
      status: 'fail',
      message: 'docker is not installed or the daemon is not reachable',
    });
    expect(report.overall).toBe('fail');
  });

  it('warns when the slimming tool cannot be started', async () => {
    initWorkspace({ cwd: dir.path });
    const runner = healthyRunner().on((call) => {
      if (call.bin === 'docker-slim') throw new Error('spawn docker-slim ENOENT');
      return undefined;
    });

    const report = await runDoctorChecks({ cwd: dir.path, runner, env: { ...TEST_CREDENTIAL_ENV } });

    expect(report.checks.find((c) => c.name === 'Slimming tool available')).toMatchObject({
      status: 'warn',
      message: 'docker-slim not found; runs will fail at the slimming stage',
    });
    expect(report.overall).toBe('warn');
    expect(report.summary).toBe('All critical checks passed, 1 warning(s)');
  });

  it('warns about a missing credential variable by name', async () => {
    initWorkspace({ cwd: dir.path });

    const report = await runDoctorChecks({
      cwd: dir.path,
      runner: healthyRunner(),
      env: { REGISTRY_USERNAME: 'ci-bot' },
    });

    expect(report.checks.find((c) => c.name === 'Registry credential variables')?.message).toBe(
      'REGISTRY_TOKEN not set; publishing will fail with an auth error',
    );
  });
});
