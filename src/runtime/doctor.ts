import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { getWorkspacePaths } from '../workspace/paths.js';
import { readWorkspaceConfig } from '../workspace/config.js';
import type { WorkspaceConfig } from '../workspace/types.js';
import type { Recipe } from '../recipe/types.js';
import { errorMessage } from '../shared/errors.js';
import { ProcessRunner, type CommandRunner } from './process.js';
import { recipePathFor } from './dispatch.js';
import { loadRecipeWithRepository } from './repository.js';

export type CheckStatus = 'pass' | 'fail' | 'warn';

export interface DoctorCheck {
  name: string;
  status: CheckStatus;
  message: string;
  fix?: string;
}

export interface DoctorReport {
  overall: CheckStatus;
  checks: DoctorCheck[];
  summary: string;
}

type CheckOutcome = Omit<DoctorCheck, 'name'>;

async function check(
  name: string,
  fn: () => Promise<CheckOutcome> | CheckOutcome,
): Promise<DoctorCheck> {
  try {
    const result = await fn();
    return { name, ...result };
  } catch (err) {
    return {
      name,
      status: 'fail',
      message: `Check threw: ${errorMessage(err)}`,
    };
  }
}

async function commandWorks(runner: CommandRunner, bin: string, args: string[]): Promise<string | null> {
  try {
    const result = await runner.run(bin, args, { timeoutMs: 10_000 });
    return result.code === 0 ? result.stdout.trim() : null;
  } catch {
    return null;
  }
}

export interface DoctorOptions {
  cwd?: string;
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
}

export async function runDoctorChecks(opts: DoctorOptions = {}): Promise<DoctorReport> {
  const cwd = opts.cwd ?? process.cwd();
  const runner = opts.runner ?? new ProcessRunner();
  const env = opts.env ?? process.env;
  const paths = getWorkspacePaths(cwd);
  const checks: DoctorCheck[] = [];

  // Filled in by earlier checks, read by later ones
  const found: { config: WorkspaceConfig | null; recipe: Recipe | null } = {
    config: null,
    recipe: null,
  };

  // ── Environment ──────────────────────────────────────────────────────────
  checks.push(
    await check('Node.js >= 20', () => {
      const v = process.version.replace(/^v/, '');
      const major = parseInt(v.split('.')[0] ?? '0', 10);
      if (major >= 20) return { status: 'pass', message: `Node.js ${v}` };
      return {
        status: 'fail',
        message: `Node.js ${v} is below required v20`,
        fix: 'Upgrade Node.js to v20 or later',
      };
    }),
  );

  // ── Workspace ─────────────────────────────────────────────────────────────
  checks.push(
    await check('Workspace initialized (.imagesmith/)', () => {
      if (!existsSync(paths.root)) {
        return { status: 'fail', message: 'Workspace not initialized', fix: 'Run: imagesmith init' };
      }
      const config = readWorkspaceConfig(paths.config);
      found.config = config;
      return { status: 'pass', message: `Workspace ${config.workspace_id} at ${paths.root}` };
    }),
  );

  checks.push(
    await check('Recipe valid', async () => {
      const recipePath = found.config ? recipePathFor({ config: found.config, cwd }) : join(cwd, 'imagesmith.yaml');
      const recipe = await loadRecipeWithRepository(recipePath, { env, runner, cwd });
      found.recipe = recipe;
      return { status: 'pass', message: `${recipePath} (${recipe.name})` };
    }),
  );

  // ── External tools ───────────────────────────────────────────────────────
  const dockerBin = found.config?.docker_bin ?? env['IMAGESMITH_DOCKER_BIN'] ?? 'docker';
  checks.push(
    await check('Docker engine reachable', async () => {
      const version = await commandWorks(runner, dockerBin, ['version', '--format', '{{.Server.Version}}']);
      if (version) return { status: 'pass', message: `Docker server ${version}` };
      return {
        status: 'fail',
        message: `${dockerBin} is not installed or the daemon is not reachable`,
        fix: 'Install Docker and make sure the current user can reach the daemon',
      };
    }),
  );

  checks.push(
    await check('Slimming tool available', async () => {
      const current = found.recipe;
      const tool = current?.slim.tool ?? 'docker-slim';
      const enabled = current?.slim.enabled ?? true;
      const version = await commandWorks(runner, tool, ['--version']);
      if (version) return { status: 'pass', message: version.split('\n')[0] ?? tool };
      return {
        status: enabled ? 'warn' : 'pass',
        message: enabled
          ? `${tool} not found; runs will fail at the slimming stage`
          : `${tool} not found (slimming disabled)`,
        ...(enabled ? { fix: 'Install slimtoolkit, or run with --no-slim' } : {}),
      };
    }),
  );

  // ── Credentials ──────────────────────────────────────────────────────────
  checks.push(
    await check('Registry credential variables', () => {
      const current = found.recipe;
      if (!current) return { status: 'warn', message: 'No valid recipe – skipping credential check' };
      const names = [current.publish.username_env, current.publish.token_env];
      const missing = names.filter((name) => !env[name]);
      if (missing.length === 0) {
        return { status: 'pass', message: `${names.join(', ')} set (values not shown)` };
      }
      return {
        status: 'warn',
        message: `${missing.join(', ')} not set; publishing will fail with an auth error`,
        fix: 'Inject the registry credential from your CI secret store',
      };
    }),
  );

  const failures = checks.filter((c) => c.status === 'fail').length;
  const warnings = checks.filter((c) => c.status === 'warn').length;
  const overall: CheckStatus = failures > 0 ? 'fail' : warnings > 0 ? 'warn' : 'pass';
  const summary =
    failures > 0
      ? `${failures} check(s) failed, ${warnings} warning(s)`
      : warnings > 0
        ? `All critical checks passed, ${warnings} warning(s)`
        : 'All checks passed';

  return { overall, checks, summary };
}
