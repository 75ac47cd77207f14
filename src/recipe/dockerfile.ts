import type { AssemblyPlan } from '../runtime/types.js';
import type { BuildSpec } from './types.js';

export const BUILDER_STAGE = 'builder';

// Exec form: JSON array, no shell expansion
function execForm(args: string[]): string {
  return JSON.stringify(args);
}

function quoteEnv(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Builder stage: toolchain image, compile-time packages, setup commands, and
 * the build command. Everything here is discarded once the artifact is out.
 */
export function renderBuilderDockerfile(spec: BuildSpec): string {
  const lines = [`FROM ${spec.image} AS ${BUILDER_STAGE}`, ''];

  if (spec.packages.length > 0) {
    lines.push(
      'RUN apt-get update && apt-get install -y --no-install-recommends \\',
      ...spec.packages.map((pkg) => `    ${pkg} \\`),
      '    && apt-get clean && rm -rf /var/lib/apt/lists/*',
      '',
    );
  }

  for (const cmd of spec.setup) {
    lines.push(`RUN ${cmd}`);
  }
  if (spec.setup.length > 0) lines.push('');

  const envEntries = Object.entries(spec.env);
  for (const [key, value] of envEntries) {
    lines.push(`ENV ${key}=${quoteEnv(value)}`);
  }
  if (envEntries.length > 0) lines.push('');

  lines.push(
    `COPY . ${spec.workdir}`,
    `WORKDIR ${spec.workdir}`,
    '',
    `RUN ${execForm(spec.command)}`,
  );
  return lines.join('\n') + '\n';
}

/**
 * Runtime stage: minimal base, dedicated unprivileged user with a private
 * home, resolved libraries, and the artifact owned by that user only.
 * Sources are relative to the assembly build context.
 */
export function renderRuntimeDockerfile(plan: AssemblyPlan): string {
  const useradd = ['useradd', '--create-home', '--home-dir', plan.home, '--shell', '/usr/sbin/nologin'];
  if (plan.uid !== undefined) useradd.push('--uid', String(plan.uid));
  useradd.push(plan.user);

  const lines = [`FROM ${plan.base}`, '', `RUN ${execForm(useradd)}`, ''];

  for (const lib of plan.libraries) {
    lines.push(`COPY ${lib.source} ${lib.dest}`);
  }
  lines.push(
    `COPY --chown=${plan.user}:${plan.user} ${plan.artifact.source} ${plan.artifact.dest}`,
    '',
    `USER ${plan.user}`,
    `WORKDIR ${plan.home}`,
    '',
    `CMD ${execForm(plan.command)}`,
  );
  return lines.join('\n') + '\n';
}
