import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ResolverManager } from '../apply/manager.js';
import { applyHttpStatus, ifBusyQuerySchema, parseIndex, type IfBusyQuery } from './applyResult.js';

function isHttpUrl(raw: string): boolean {
  try {
    const u = new URL(raw);
    return u.protocol === 'http:' || u.protocol === 'https:';
  } catch {
    return false;
  }
}

export async function registerBlocklistsRoutes(app: FastifyInstance, manager: ResolverManager): Promise<void> {
  app.get(
    '/api/blocklists',
    {
      config: {
        rateLimit: {
          max: 120,
          timeWindow: '1 minute'
        }
      }
    },
    async () => {
      return { items: await manager.listBlocklists(), domainsBlocked: manager.blockedCount };
    }
  );

  app.post(
    '/api/blocklists',
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
          required: ['url'],
          additionalProperties: false,
          properties: {
            url: { type: 'string', minLength: 8, maxLength: 2048 }
          }
        }
      }
    },
    async (request: FastifyRequest<{ Body: { url: string } }>, reply: FastifyReply) => {
      const url = request.body.url.trim();
      if (!isHttpUrl(url)) {
        reply.code(400);
        return { error: 'INVALID_URL', message: 'Blocklist URL must be http:// or https://' };
      }

      const added = await manager.addBlocklist(url);
      if (!added) {
        reply.code(409);
        return { error: 'BLOCKLIST_EXISTS', message: 'This blocklist is already configured.' };
      }

      reply.code(201);
      return { url };
    }
  );

  app.delete(
    '/api/blocklists/:idx',
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

      const removed = await manager.removeBlocklistAt(idx);
      if (removed === null) {
        reply.code(404);
        return { error: 'NOT_FOUND' };
      }
      return { removed };
    }
  );

  app.post(
    '/api/blocklists/refresh',
    {
      config: {
        rateLimit: {
          // Refresh can be expensive and triggers network IO.
          max: 10,
          timeWindow: '1 minute'
        }
      },
      schema: {
        querystring: ifBusyQuerySchema
      }
    },
    async (request: FastifyRequest<{ Querystring: IfBusyQuery }>, reply: FastifyReply) => {
      const outcome = await manager.refreshBlocklists({ ifBusy: request.query.ifBusy });
      reply.code(applyHttpStatus(outcome.result));
      return {
        domains_blocked: outcome.domainsBlocked,
        union_size: outcome.unionSize,
        errors: outcome.failures,
        sources: outcome.sources,
        apply: outcome.result
      };
    }
  );
}
