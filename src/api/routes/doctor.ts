import type { FastifyInstance } from 'fastify';
import type { RouteOpts } from '../types.js';
import { runDoctorChecks } from '../../runtime/doctor.js';

export async function registerDoctorRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get('/v1/doctor', async () => {
    return runDoctorChecks({ cwd: opts.cwd, runner: opts.runner, env: opts.env });
  });
}
