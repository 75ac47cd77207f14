import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { RouteOpts } from '../types.js';
import { listRunEvents } from '../../audit/audit.js';
import { planDispatch, type Dispatch } from '../../runtime/dispatch.js';
import { runPipeline } from '../../runtime/runner.js';
import { getRun, listRuns } from '../../runtime/run-store.js';
import type { TriggerEvent } from '../../runtime/triggers.js';
import { RecipeError } from '../../shared/errors.js';
import { generateRunId } from '../../shared/ids.js';

const ListQuery = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const ManualRunBody = z
  .object({
    dry_run: z.boolean().optional(),
    slim: z.boolean().optional(),
  })
  .strict();

export interface StartRunOptions {
  dryRun?: boolean;
  slim?: boolean;
  actor: string;
}

/**
 * Plans a run for the event and starts it in the background. Replies 202 with
 * the run ID, 200 when the trigger does not apply, 422 for a bad recipe.
 */
export async function startRun(
  reply: FastifyReply,
  event: TriggerEvent,
  opts: RouteOpts,
  start: StartRunOptions,
) {
  const runId = generateRunId();
  let dispatch: Dispatch;
  try {
    dispatch = await planDispatch(event, {
      db: opts.db,
      config: opts.config,
      paths: opts.paths,
      cwd: opts.cwd,
      runner: opts.runner,
      env: opts.env,
      slim: start.slim,
      dryRun: start.dryRun,
      actor: start.actor,
      runId,
    });
  } catch (err) {
    if (err instanceof RecipeError) {
      return reply.status(422).send({ error: err.message, issues: err.issues });
    }
    throw err;
  }

  if (!dispatch.run) {
    return reply.status(200).send({ run: false, reason: dispatch.decision.reason });
  }

  opts.track(runPipeline(dispatch.recipe, dispatch.context));
  return reply.status(202).send({
    run: true,
    run_id: runId,
    recipe: dispatch.recipe.name,
    trigger: dispatch.decision.trigger,
    state: 'pending',
    dry_run: start.dryRun ?? false,
  });
}

export async function registerRunRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  const ws = opts.config.workspace_id;

  fastify.get('/v1/runs', async (req, reply) => {
    const query = ListQuery.safeParse(req.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'Invalid query', issues: query.error.issues });
    }
    const { limit, offset } = query.data;
    return { runs: listRuns(opts.db, ws, limit, offset), limit, offset };
  });

  fastify.get<{ Params: { id: string } }>('/v1/runs/:id', async (req, reply) => {
    const run = getRun(opts.db, ws, req.params.id);
    if (!run) return reply.status(404).send({ error: 'Run not found' });
    return { run, events: listRunEvents(opts.db, run.id) };
  });

  fastify.post(
    '/v1/runs',
    { config: { rateLimit: { max: 10, timeWindow: '1 minute' } } },
    async (req, reply) => {
      const body = ManualRunBody.safeParse(req.body ?? {});
      if (!body.success) {
        return reply.status(400).send({ error: 'Invalid body', issues: body.error.issues });
      }
      return startRun(reply, { kind: 'manual' }, opts, {
        dryRun: body.data.dry_run,
        slim: body.data.slim,
        actor: 'api',
      });
    },
  );
}
