import { z } from 'zod';
import { isCidr, isForwardAddress } from './validators.js';

const INT_BOUNDS = {
  num_threads: { min: 1, max: 16 },
  fast_server_permil: { min: 0, max: 1000 },
  fast_server_num: { min: 1, max: 20 },
  cache_min_ttl: { min: 0, max: 86_400 },
  cache_max_ttl: { min: 60, max: 604_800 },
  verbosity: { min: 0, max: 5 }
} as const;

type IntKey = keyof typeof INT_BOUNDS;

// Changing these only takes effect after the daemon restarts; a reload is not enough.
const RESTART_REQUIRED: ReadonlySet<string> = new Set(['num_threads']);

const bool = () => z.boolean({ invalid_type_error: 'expected bool' });

function boundedInt(key: IntKey) {
  const { min, max } = INT_BOUNDS[key];
  return z
    .number({ invalid_type_error: 'expected int' })
    .int({ message: 'expected int' })
    .min(min, { message: `minimum is ${min}` })
    .max(max, { message: `maximum is ${max}` });
}

function list<T extends z.ZodTypeAny>(item: T) {
  return z.array(item, { invalid_type_error: 'expected list' });
}

const cidr = z
  .string({ invalid_type_error: 'expected string' })
  .trim()
  .refine(isCidr, { message: 'expected a CIDR range such as 192.168.0.0/16' });

const forwardAddress = z
  .string({ invalid_type_error: 'expected string' })
  .trim()
  .refine(isForwardAddress, { message: 'expected IP[@port][#tls-name]' });

export const settingsSchema = z.object({
  custom_config: bool(),
  access_control: list(cidr),
  num_threads: boundedInt('num_threads'),
  prefetch: bool(),
  fast_server_permil: boundedInt('fast_server_permil'),
  fast_server_num: boundedInt('fast_server_num'),
  prefer_ip4: bool(),
  do_ip4: bool(),
  do_ip6: bool(),
  cache_min_ttl: boundedInt('cache_min_ttl'),
  cache_max_ttl: boundedInt('cache_max_ttl'),
  enable_dnssec: bool(),
  qname_minimisation: bool(),
  hide_identity: bool(),
  hide_version: bool(),
  forward_servers: list(forwardAddress),
  forward_tls: bool(),
  verbosity: boundedInt('verbosity'),
  log_queries: bool()
});

export type Settings = z.infer<typeof settingsSchema>;
export type SettingsKey = keyof Settings;

export const settingsPatchSchema = settingsSchema.partial().strict();
export type SettingsPatch = z.infer<typeof settingsPatchSchema>;

export const SETTINGS_KEYS: readonly SettingsKey[] = settingsSchema.keyof().options;

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  custom_config: false,
  access_control: ['127.0.0.0/8', '10.0.0.0/8', '172.16.0.0/12', '192.168.0.0/16'],
  num_threads: 2,
  prefetch: true,
  fast_server_permil: 500,
  fast_server_num: 5,
  prefer_ip4: true,
  do_ip4: true,
  do_ip6: true,
  cache_min_ttl: 60,
  cache_max_ttl: 86_400,
  enable_dnssec: true,
  qname_minimisation: true,
  hide_identity: true,
  hide_version: true,
  forward_servers: [],
  forward_tls: false,
  verbosity: 1,
  log_queries: false
});

export function defaultSettings(): Settings {
  return {
    ...DEFAULT_SETTINGS,
    access_control: [...DEFAULT_SETTINGS.access_control],
    forward_servers: [...DEFAULT_SETTINGS.forward_servers]
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const key = issue.path.length ? issue.path.join('.') : '(body)';
    return `${key}: ${issue.message}`;
  });
}

/** Rules spanning several fields; run on the merged document. */
export function crossFieldIssues(settings: Settings): string[] {
  const issues: string[] = [];
  if (settings.cache_min_ttl > settings.cache_max_ttl) {
    issues.push('cache_min_ttl: must not exceed cache_max_ttl');
  }
  return issues;
}

export type PatchResult = { ok: true; patch: SettingsPatch } | { ok: false; issues: string[] };

export function parseSettingsPatch(input: unknown): PatchResult {
  const res = settingsPatchSchema.safeParse(input);
  if (!res.success) return { ok: false, issues: formatIssues(res.error) };
  return { ok: true, patch: res.data };
}

/**
 * Reads a stored document field by field: missing keys take their default,
 * unknown keys are dropped, and a field that no longer validates is reset.
 */
export function normalizeStoredSettings(raw: unknown): { settings: Settings; resetKeys: SettingsKey[] } {
  const defaults = defaultSettings();
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    return { settings: defaults, resetKeys: [] };
  }

  const stored = new Map<string, unknown>(Object.entries(raw));
  const candidate: Record<string, unknown> = { ...defaults };
  const resetKeys: SettingsKey[] = [];

  for (const key of SETTINGS_KEYS) {
    if (!stored.has(key)) continue;
    const value = stored.get(key);
    if (settingsSchema.shape[key].safeParse(value).success) {
      candidate[key] = value;
    } else {
      resetKeys.push(key);
    }
  }

  const parsed = settingsSchema.safeParse(candidate);
  return parsed.success ? { settings: parsed.data, resetKeys } : { settings: defaults, resetKeys: [...SETTINGS_KEYS] };
}

export type SettingDescriptor = {
  type: 'bool' | 'int' | 'list';
  default: boolean | number | string[];
  min?: number;
  max?: number;
  restart_required?: boolean;
};

function isIntKey(key: string): key is IntKey {
  return key in INT_BOUNDS;
}

/** Field metadata for the settings form. */
export function describeSettings(): Record<string, SettingDescriptor> {
  const defaults = defaultSettings();
  const out: Record<string, SettingDescriptor> = {};

  for (const key of SETTINGS_KEYS) {
    const value = defaults[key];
    const descriptor: SettingDescriptor = {
      type: typeof value === 'boolean' ? 'bool' : typeof value === 'number' ? 'int' : 'list',
      default: value
    };
    if (isIntKey(key)) {
      descriptor.min = INT_BOUNDS[key].min;
      descriptor.max = INT_BOUNDS[key].max;
    }
    if (RESTART_REQUIRED.has(key)) descriptor.restart_required = true;
    out[key] = descriptor;
  }

  return out;
}

export function restartRequiredChanges(before: Settings, after: Settings): SettingsKey[] {
  return SETTINGS_KEYS.filter((key) => RESTART_REQUIRED.has(key) && before[key] !== after[key]);
}
