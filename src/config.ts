import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'node:path';

dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || undefined });

const schema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).optional().default('development'),
  HOST: z.string().optional().default('0.0.0.0'),
  // Home Assistant ingress talks to this port.
  PORT: z.coerce.number().int().positive().optional().default(2137),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Persisted settings, lists and refresh status.
  DATA_DIR: z.string().optional().default('/data'),

  // Where the live unbound.conf and its include fragments are installed.
  UNBOUND_DIR: z.string().optional().default('/etc/unbound'),
  // Trust anchor location (written by unbound-anchor in the container image).
  UNBOUND_KEY_DIR: z.string().optional().default('/var/lib/unbound'),

  // Add-on options written by the supervisor; only read once to seed config.json.
  OPTIONS_PATH: z.string().optional().default(''),

  // Custom config mode. When empty, the file is looked up under ADDON_CONFIGS_DIR.
  CUSTOM_CONFIG_PATH: z.string().optional().default(''),
  ADDON_CONFIGS_DIR: z.string().optional().default('/addon_configs'),
  HOSTNAME: z.string().optional().default(''),

  UNBOUND_CHECKCONF_BIN: z.string().optional().default('unbound-checkconf'),
  UNBOUND_CONTROL_BIN: z.string().optional().default('unbound-control'),
  CHECKCONF_TIMEOUT_MS: z.coerce.number().int().min(500).optional().default(10_000),
  CONTROL_TIMEOUT_MS: z.coerce.number().int().min(500).optional().default(5_000),

  // Blocklist ingestion. A hung feed never blocks the others past the timeout.
  BLOCKLIST_FETCH_TIMEOUT_MS: z.coerce.number().int().min(250).optional().default(30_000),
  BLOCKLIST_FETCH_CONCURRENCY: z.coerce.number().int().min(1).max(32).optional().default(4),
  BLOCKLIST_MAX_BYTES: z.coerce.number().int().positive().optional().default(50 * 1024 * 1024),
  BLOCKLIST_REFRESH_INTERVAL_HOURS: z.coerce.number().positive().optional().default(24),

  ROOT_HINTS_URL: z.string().optional().default('https://www.internic.net/domain/named.root'),

  QUERY_LOG_PATH: z.string().optional().default(''),
  QUERY_LOG_MAX_BYTES: z.coerce.number().int().positive().optional().default(50 * 1024 * 1024)
});

export type AppConfig = z.infer<typeof schema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cfg = schema.parse(env);

  if (!cfg.OPTIONS_PATH) cfg.OPTIONS_PATH = path.join(cfg.DATA_DIR, 'options.json');
  if (!cfg.QUERY_LOG_PATH) cfg.QUERY_LOG_PATH = path.join(cfg.DATA_DIR, 'unbound_queries.log');

  return cfg;
}
