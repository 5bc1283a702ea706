import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ResolverManager } from '../apply/manager.js';
import { isHostname, normalizeDomain } from '../settings/validators.js';

export async function registerCacheRoutes(app: FastifyInstance, manager: ResolverManager): Promise<void> {
  app.post(
    '/api/cache/flush',
    {
      config: {
        rateLimit: {
          max: 10,
          timeWindow: '1 minute'
        }
      }
    },
    async () => {
      await manager.flushCache();
      return { status: 'flushed' };
    }
  );

  app.post(
    '/api/cache/flush-domain',
    {
      config: {
        rateLimit: {
          max: 60,
          timeWindow: '1 minute'
        }
      },
      schema: {
        body: {
          type: 'object',
          required: ['domain'],
          additionalProperties: false,
          properties: {
            domain: { type: 'string', minLength: 1, maxLength: 254 }
          }
        }
      }
    },
    async (request: FastifyRequest<{ Body: { domain: string } }>, reply: FastifyReply) => {
      const domain = normalizeDomain(request.body.domain);
      if (!isHostname(domain)) {
        reply.code(400);
        return { error: 'INVALID_DOMAIN' };
      }
      await manager.flushDomain(domain);
      return { status: 'flushed', domain };
    }
  );
}
