import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ResolverManager } from '../apply/manager.js';
import { isHostname, normalizeDomain } from '../settings/validators.js';
import { applyHttpStatus, parseIndex } from './applyResult.js';

export async function registerWhitelistRoutes(app: FastifyInstance, manager: ResolverManager): Promise<void> {
  app.get('/api/whitelist', async () => {
    return { items: await manager.listWhitelist() };
  });

  app.post(
    '/api/whitelist',
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

      const change = await manager.addWhitelist(domain);
      if (change.item === null) {
        reply.code(409);
        return { error: 'ALREADY_WHITELISTED' };
      }

      reply.code(applyHttpStatus(change.result, 201));
      return { domain: change.item, apply: change.result };
    }
  );

  app.delete(
    '/api/whitelist/:idx',
    {
      config: {
        rateLimit: {
          max: 60,
          timeWindow: '1 minute'
        }
      }
    },
    async (request: FastifyRequest<{ Params: { idx: string } }>, reply: FastifyReply) => {
      const idx = parseIndex(request.params.idx);
      if (idx === null) {
        reply.code(400);
        return { error: 'INVALID_INDEX' };
      }

      const change = await manager.removeWhitelistAt(idx);
      if (change.item === null) {
        reply.code(404);
        return { error: 'NOT_FOUND' };
      }

      reply.code(applyHttpStatus(change.result));
      return { removed: change.item, apply: change.result };
    }
  );
}
