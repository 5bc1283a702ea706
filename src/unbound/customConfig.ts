import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../config.js';

type CustomConfigLookup = Pick<AppConfig, 'CUSTOM_CONFIG_PATH' | 'ADDON_CONFIGS_DIR' | 'HOSTNAME'>;

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

async function firstUnboundDir(root: string): Promise<string | null> {
  let names: string[];
  try {
    names = (await fs.readdir(root, { withFileTypes: true }))
      .filter((d) => d.isDirectory() && d.name.includes('unbound'))
      .map((d) => d.name)
      .sort();
  } catch {
    return null;
  }
  return names.length ? path.join(root, names[0]) : null;
}

/**
 * Where the user's own unbound.conf lives in custom mode. The add-on directory
 * is named after the container hostname, with either hyphens or underscores.
 */
export async function resolveCustomConfigPath(config: CustomConfigLookup): Promise<string> {
  if (config.CUSTOM_CONFIG_PATH) return config.CUSTOM_CONFIG_PATH;

  const root = config.ADDON_CONFIGS_DIR;
  const host = config.HOSTNAME;
  if (host) {
    for (const candidate of [path.join(root, host), path.join(root, host.replaceAll('-', '_'))]) {
      if (await isDirectory(candidate)) return path.join(candidate, 'unbound.conf');
    }
  }

  const found = await firstUnboundDir(root);
  if (found) return path.join(found, 'unbound.conf');
  return path.join(root, host, 'unbound.conf');
}

