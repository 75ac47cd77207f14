import { createHmac, timingSafeEqual } from 'node:crypto';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { RouteOpts } from '../types.js';
import { startRun } from './runs.js';
import { errorMessage } from '../../shared/errors.js';

const SIGNATURE_HEADER = 'x-hub-signature-256';
const EVENT_HEADER = 'x-github-event';

const ParsedBody = z.object({ raw: z.string(), payload: z.unknown() });
const PushPayload = z.object({ ref: z.string() });

/** Checks a `sha256=<hex>` HMAC header against the raw request body. */
export function verifySignature(secret: string, rawBody: string, header: string | undefined): boolean {
  if (!header?.startsWith('sha256=')) return false;
  const expected = Buffer.from(createHmac('sha256', secret).update(rawBody).digest('hex'), 'utf8');
  const given = Buffer.from(header.slice('sha256='.length), 'utf8');
  return given.length === expected.length && timingSafeEqual(given, expected);
}

function header(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export async function registerHookRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  const secretEnv = opts.config.api?.webhook_secret_env ?? 'IMAGESMITH_WEBHOOK_SECRET';

  // Scoped plugin: the signature is computed over the exact bytes received
  await fastify.register(async (scope) => {
    const parseJson = (
      _req: FastifyRequest,
      body: string | Buffer,
      done: (err: Error | null, parsed?: unknown) => void,
    ) => {
      const raw = typeof body === 'string' ? body : body.toString('utf8');
      try {
        const payload: unknown = JSON.parse(raw);
        done(null, { raw, payload });
      } catch (err) {
        done(Object.assign(new Error(`Invalid JSON body: ${errorMessage(err)}`), { statusCode: 400 }));
      }
    };
    scope.removeContentTypeParser('application/json');
    scope.addContentTypeParser('application/json', { parseAs: 'string' }, parseJson);

    scope.post(
      '/v1/hooks/push',
      { config: { rateLimit: { max: 30, timeWindow: '1 minute' } } },
      async (req, reply) => {
        const secret = opts.env[secretEnv];
        if (!secret) {
          return reply.status(503).send({ error: `Webhook secret not configured: set ${secretEnv}` });
        }
        const body = ParsedBody.safeParse(req.body);
        if (!body.success) return reply.status(400).send({ error: 'Expected a JSON body' });
        if (!verifySignature(secret, body.data.raw, header(req.headers[SIGNATURE_HEADER]))) {
          return reply.status(401).send({ error: 'Invalid signature' });
        }

        const event = header(req.headers[EVENT_HEADER]) ?? 'push';
        if (event === 'ping') return { ok: true };
        if (event !== 'push') {
          return reply.status(200).send({ run: false, reason: `ignored event: ${event}` });
        }

        const push = PushPayload.safeParse(body.data.payload);
        if (!push.success) return reply.status(400).send({ error: 'Push payload has no ref' });

        return startRun(reply, { kind: 'push', ref: push.data.ref }, opts, { actor: 'webhook' });
      },
    );
  });
}
