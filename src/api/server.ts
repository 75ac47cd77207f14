import Fastify from 'fastify';
import rateLimit from '@fastify/rate-limit';
import type Database from 'better-sqlite3';
import { getWorkspacePaths } from '../workspace/paths.js';
import { openDb } from '../workspace/db.js';
import { readWorkspaceConfig } from '../workspace/config.js';
import { ProcessRunner, type CommandRunner } from '../runtime/process.js';
import type { RunResult } from '../runtime/types.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { RouteOpts } from './types.js';
import { registerRunRoutes } from './routes/runs.js';
import { registerHookRoutes } from './routes/hooks.js';
import { registerDoctorRoutes } from './routes/doctor.js';

export interface ServerOptions {
  host?: string;
  port?: number;
  cwd?: string;
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
  db?: Database.Database;
}

export async function createServer(opts: ServerOptions = {}) {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;
  const paths = getWorkspacePaths(cwd);
  const config = readWorkspaceConfig(paths.config);

  const host = opts.host ?? env['IMAGESMITH_API_HOST'] ?? config.api?.host ?? '127.0.0.1';
  const port = opts.port ?? parseInt(env['IMAGESMITH_API_PORT'] ?? String(config.api?.port ?? 7800), 10);

  const isLoopback = host === '127.0.0.1' || host === 'localhost' || host === '::1';
  if (!isLoopback) {
    logger.warn('Non-loopback bind requested. Only the push hook is authenticated.', { host });
  }

  const db = opts.db ?? openDb(paths.stateDb);

  const fastify = Fastify({
    logger: false,
    trustProxy: false,
  });

  await fastify.register(rateLimit, {
    global: false,
    max: 100,
    timeWindow: '1 minute',
  });

  fastify.addHook('onSend', async (_req, reply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Referrer-Policy', 'no-referrer');
  });

  // Background runs: the server does not close until they settle
  const inFlight = new Set<Promise<void>>();
  const track = (run: Promise<RunResult>) => {
    const settled = run.then(
      (result) => {
        logger.info('Background run finished', { run_id: result.run_id, state: result.state });
      },
      (err: unknown) => {
        logger.error('Background run crashed', { error: errorMessage(err) });
      },
    );
    inFlight.add(settled);
    void settled.finally(() => inFlight.delete(settled));
  };
  const idle = async (): Promise<void> => {
    await Promise.all(Array.from(inFlight));
  };
  fastify.addHook('onClose', async () => {
    await idle();
  });

  fastify.get('/v1/health', async () => ({ status: 'ok', workspace_id: config.workspace_id }));

  const routeOpts: RouteOpts = {
    db,
    config,
    paths,
    cwd,
    runner: opts.runner ?? new ProcessRunner(),
    env,
    track,
  };
  await registerRunRoutes(fastify, routeOpts);
  await registerHookRoutes(fastify, routeOpts);
  await registerDoctorRoutes(fastify, routeOpts);

  return { fastify, host, port, idle };
}

export async function startServer(opts: ServerOptions = {}): Promise<void> {
  const { fastify, host, port } = await createServer(opts);

  try {
    await fastify.listen({ host, port });
    logger.info('imagesmith API server listening', { host, port, url: `http://${host}:${port}/v1` });
  } catch (err) {
    logger.error('Failed to start server', { error: errorMessage(err) });
    process.exit(1);
  }
}
