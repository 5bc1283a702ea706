import type { FastifyInstance } from 'fastify';
import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);

function versionOf(pkg: unknown): string {
  if (!pkg || typeof pkg !== 'object' || !('version' in pkg)) return '';
  return String(pkg.version ?? '').trim();
}

const readAppVersion = (): string => {
  const envVersion = String(process.env.APP_VERSION || '').trim();
  if (envVersion) return envVersion;

  try {
    // src/routes and dist/routes are both two levels below the package root.
    const pkg: unknown = require('../../package.json');
    return versionOf(pkg) || '0.0.0';
  } catch {
    return '0.0.0';
  }
};

export async function registerVersionRoutes(app: FastifyInstance): Promise<void> {
  app.get('/api/version', async () => {
    return { version: readAppVersion() };
  });
}
