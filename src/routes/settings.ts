import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ResolverManager } from '../apply/manager.js';
import { SettingsValidationError } from '../errors.js';
import { describeSettings } from '../settings/schema.js';
import { applyHttpStatus, ifBusyQuerySchema, type IfBusyQuery } from './applyResult.js';

export async function registerSettingsRoutes(app: FastifyInstance, manager: ResolverManager): Promise<void> {
  app.get(
    '/api/config',
    {
      config: {
        rateLimit: {
          max: 120,
          timeWindow: '1 minute'
        }
      }
    },
    async () => {
      return { config: await manager.getSettings(), schema: describeSettings() };
    }
  );

  app.put(
    '/api/config',
    {
      config: {
        rateLimit: {
          // Every accepted edit runs the validator and reloads the resolver.
          max: 30,
          timeWindow: '1 minute'
        }
      },
      schema: {
        querystring: ifBusyQuerySchema,
        body: {
          type: 'object'
        }
      }
    },
    async (request: FastifyRequest<{ Querystring: IfBusyQuery; Body: unknown }>, reply: FastifyReply) => {
      try {
        const update = await manager.updateSettings(request.body, { ifBusy: request.query.ifBusy });
        reply.code(applyHttpStatus(update.result));
        return {
          ok: update.result.status === 'live' || update.result.status === 'unchanged',
          apply: update.result,
          config: update.settings,
          restart_required: update.restartRequired
        };
      } catch (err) {
        if (err instanceof SettingsValidationError) {
          reply.code(400);
          return { ok: false, error: 'VALIDATION_FAILED', issues: err.issues };
        }
        throw err;
      }
    }
  );

  app.get('/api/apply/status', async () => {
    return manager.applyStatus;
  });
}
