import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ResolverManager } from '../apply/manager.js';
import { isHostname, isIPv4, normalizeDomain } from '../settings/validators.js';
import { applyHttpStatus, parseIndex } from './applyResult.js';

export async function registerLocalRecordsRoutes(app: FastifyInstance, manager: ResolverManager): Promise<void> {
  app.get('/api/local-records', async () => {
    return { items: await manager.listLocalRecords() };
  });

  app.post(
    '/api/local-records',
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
          required: ['hostname', 'ip'],
          additionalProperties: false,
          properties: {
            hostname: { type: 'string', minLength: 1, maxLength: 254 },
            ip: { type: 'string', minLength: 7, maxLength: 15 }
          }
        }
      }
    },
    async (request: FastifyRequest<{ Body: { hostname: string; ip: string } }>, reply: FastifyReply) => {
      const hostname = normalizeDomain(request.body.hostname);
      const ip = request.body.ip.trim();
      if (!isHostname(hostname)) {
        reply.code(400);
        return { error: 'INVALID_HOSTNAME' };
      }
      if (!isIPv4(ip)) {
        reply.code(400);
        return { error: 'INVALID_IP', message: 'Local records take a dotted-quad IPv4 address.' };
      }

      const change = await manager.addLocalRecord({ hostname, ip });
      if (change.item === null) {
        reply.code(409);
        return { error: 'RECORD_EXISTS', message: `A record for ${hostname} already exists.` };
      }

      reply.code(applyHttpStatus(change.result, 201));
      return { record: change.item, apply: change.result };
    }
  );

  app.delete(
    '/api/local-records/:idx',
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

      const change = await manager.removeLocalRecordAt(idx);
      if (change.item === null) {
        reply.code(404);
        return { error: 'NOT_FOUND' };
      }

      reply.code(applyHttpStatus(change.result));
      return { removed: change.item, apply: change.result };
    }
  );
}
