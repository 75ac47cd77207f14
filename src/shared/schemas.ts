import { z } from 'zod';

export const WorkspaceConfigSchema = z.object({
  workspace_id: z.string(),
  created_at: z.string(),
  version: z.string(),
  recipe: z.string().default('imagesmith.yaml'),
  docker_bin: z.string().default('docker'),
  scratch_dir: z.string().optional(),
  api: z
    .object({
      host: z.string().optional(),
      port: z.number().int().positive().optional(),
      webhook_secret_env: z.string().default('IMAGESMITH_WEBHOOK_SECRET'),
    })
    .optional(),
});

const AbsolutePath = z.string().startsWith('/', 'must be an absolute path');

// Exec-form argument list; never passed through a shell
const CommandSchema = z.array(z.string().min(1)).min(1);

/** Ways the entry command may name the artifact: relative to the home workdir, or absolute. */
export function directEntryPaths(home: string, artifactName: string): string[] {
  return [`./${artifactName}`, `${home.replace(/\/+$/, '')}/${artifactName}`];
}

const UserName = z
  .string()
  .regex(/^[a-z_][a-z0-9_-]{0,31}$/, 'must be a valid unix user name');

export const BuildSpecSchema = z.object({
  image: z.string().min(1),
  packages: z.array(z.string().regex(/^[a-z0-9][a-z0-9+.:=~-]*$/, 'invalid package name')).default([]),
  setup: z.array(z.string().min(1)).default([]),
  env: z.record(z.string()).default({}),
  context: z.string().default('.'),
  workdir: AbsolutePath.default('/app'),
  command: CommandSchema,
  output: AbsolutePath,
});

export const RuntimeSpecSchema = z
  .object({
    base: z.string().min(1),
    user: UserName,
    uid: z.number().int().optional(),
    home: AbsolutePath.optional(),
    artifact_name: z.string().regex(/^[A-Za-z0-9._-]+$/, 'must be a plain file name').default('app'),
    command: CommandSchema.optional(),
    smoke: CommandSchema.optional(),
    base_provides: z.array(z.string().min(1)).default([]),
  })
  .transform((runtime) => ({
    ...runtime,
    home: runtime.home ?? `/home/${runtime.user}`,
    command: runtime.command ?? [`./${runtime.artifact_name}`],
  }))
  .superRefine((runtime, ctx) => {
    const allowed = directEntryPaths(runtime.home, runtime.artifact_name);
    const entry = runtime.command[0];
    if (entry === undefined || !allowed.includes(entry)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['command'],
        message: `must start with the artifact (${allowed.join(' or ')}), not a shell or another program`,
      });
    }
  });

export const SlimmingPolicySchema = z.object({
  enabled: z.boolean().default(true),
  tool: z.string().default('docker-slim'),
  http_probe: z.boolean().default(false),
  continue_after: z.number().int().positive().default(30),
  grace_seconds: z.number().int().nonnegative().default(120),
  fallback_to_unslimmed: z.boolean().default(false),
});

export const PublishSpecSchema = z.object({
  registry: z.string().min(1).default('ghcr.io'),
  repository: z.string().optional(),
  tag: z.string().regex(/^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/, 'invalid image tag').default('latest'),
  username_env: z.string().default('REGISTRY_USERNAME'),
  token_env: z.string().default('REGISTRY_TOKEN'),
});

export const TriggerSpecSchema = z.object({
  push: z
    .object({
      branches: z.array(z.string().min(1)).default(['main']),
    })
    .default({}),
  manual: z.boolean().default(true),
});

export const RecipeSchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9._-]*$/, 'must be lowercase letters, digits, ".", "_" or "-"'),
  build: BuildSpecSchema,
  runtime: RuntimeSpecSchema,
  slim: SlimmingPolicySchema.default({}),
  publish: PublishSpecSchema.default({}),
  triggers: TriggerSpecSchema.default({}),
});
