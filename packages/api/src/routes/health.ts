import { FastifyPluginAsync } from 'fastify';

export type ReadinessCheck = () => Promise<boolean>;

export interface HealthRoutesOptions {
  checks: Record<string, ReadinessCheck>;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, opts) => {
  fastify.get('/', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'groundwork-api',
      version: '0.1.0',
    };
  });

  fastify.get('/ready', async (request, reply) => {
    const entries = await Promise.all(
      Object.entries(opts.checks).map(async ([name, check]) => [name, (await check()) ? 'ok' : 'error'] as const)
    );
    const checks = Object.fromEntries(entries);
    const ready = entries.every(([, status]) => status === 'ok');

    return reply.code(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      checks,
    });
  });
};
