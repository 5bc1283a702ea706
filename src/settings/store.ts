import path from 'node:path';
import { z } from 'zod';
import type { Logger } from '../logger.js';
import { SettingsValidationError } from '../errors.js';
import { fileExists, readTextOrNull, writeJsonAtomic } from '../persistedFile.js';
import { SerialQueue } from '../serialQueue.js';
import {
  crossFieldIssues,
  defaultSettings,
  normalizeStoredSettings,
  parseSettingsPatch,
  type Settings
} from './schema.js';

export type LocalRecord = {
  hostname: string;
  ip: string;
};

export type BlocklistStatusEntry = {
  domains: number;
  /** Unix seconds. */
  last_refresh: number;
  error: string | null;
};

export type BlocklistStatus = Record<string, BlocklistStatusEntry>;

export type StorePaths = {
  settings: string;
  options: string;
  blocklists: string;
  whitelist: string;
  localRecords: string;
  blocklistStatus: string;
};

export function storePaths(dataDir: string, optionsPath?: string): StorePaths {
  return {
    settings: path.join(dataDir, 'config.json'),
    options: optionsPath || path.join(dataDir, 'options.json'),
    blocklists: path.join(dataDir, 'blocklists.json'),
    whitelist: path.join(dataDir, 'whitelist.json'),
    localRecords: path.join(dataDir, 'local_records.json'),
    blocklistStatus: path.join(dataDir, 'blocklist_status.json')
  };
}

const stringList = z.array(z.string());
const localRecordList = z.array(z.object({ hostname: z.string(), ip: z.string() }));
const blocklistStatusDoc = z.record(
  z.object({
    domains: z.number(),
    last_refresh: z.number(),
    error: z.string().nullable()
  })
);

export type SettingsChange = {
  before: Settings;
  after: Settings;
};

/**
 * Owner of every persisted document. All writes go through one queue, so a
 * read-modify-write never interleaves with another.
 */
export class SettingsStore {
  private readonly writes = new SerialQueue();
  private cached: Settings | null = null;

  constructor(
    readonly paths: StorePaths,
    private readonly log: Logger
  ) {}

  private async readJson(filePath: string): Promise<{ found: boolean; value: unknown; corrupt: boolean }> {
    const text = await readTextOrNull(filePath);
    if (text === null) return { found: false, value: undefined, corrupt: false };
    try {
      return { found: true, value: JSON.parse(text), corrupt: false };
    } catch {
      return { found: true, value: undefined, corrupt: true };
    }
  }

  private async readDocument<T>(filePath: string, schema: z.ZodType<T>, fallback: T): Promise<T> {
    const doc = await this.readJson(filePath);
    if (!doc.found) return fallback;
    const parsed = schema.safeParse(doc.value);
    if (!parsed.success) {
      this.log.error({ file: filePath }, 'stored document is malformed; treating it as empty');
      return fallback;
    }
    return parsed.data;
  }

  async get(): Promise<Settings> {
    if (this.cached) return structuredClone(this.cached);

    const doc = await this.readJson(this.paths.settings);
    if (doc.corrupt) {
      this.log.error({ file: this.paths.settings }, 'settings document is not valid JSON; falling back to defaults');
    }
    const { settings, resetKeys } = normalizeStoredSettings(doc.value);
    if (resetKeys.length) {
      this.log.warn({ keys: resetKeys }, 'stored settings failed validation; using defaults for these keys');
    }

    this.cached = settings;
    return structuredClone(settings);
  }

  /** Validates `patch` against the current document without persisting anything. */
  async prepareUpdate(patch: unknown): Promise<SettingsChange> {
    const parsed = parseSettingsPatch(patch);
    if (!parsed.ok) throw new SettingsValidationError(parsed.issues);

    const before = await this.get();
    const after: Settings = { ...before, ...parsed.patch };
    const issues = crossFieldIssues(after);
    if (issues.length) throw new SettingsValidationError(issues);
    return { before, after };
  }

  async save(settings: Settings): Promise<void> {
    await this.writes.run(async () => {
      await writeJsonAtomic(this.paths.settings, settings);
      this.cached = structuredClone(settings);
    });
  }

  async update(patch: unknown): Promise<Settings> {
    const { after } = await this.prepareUpdate(patch);
    await this.save(after);
    return after;
  }

  /**
   * First run only: writes the defaults, overlaid with any matching keys from
   * the add-on options file. Returns false when a document already exists.
   */
  async seedIfMissing(): Promise<boolean> {
    return this.writes.run(async () => {
      if (await fileExists(this.paths.settings)) return false;

      const options = await this.readJson(this.paths.options);
      if (options.corrupt) this.log.warn({ file: this.paths.options }, 'add-on options are not valid JSON; ignoring');

      const seed = options.found ? { ...defaultSettings(), ...pickObject(options.value) } : defaultSettings();
      const { settings, resetKeys } = normalizeStoredSettings(seed);
      if (resetKeys.length) this.log.warn({ keys: resetKeys }, 'ignoring invalid add-on options');

      await writeJsonAtomic(this.paths.settings, settings);
      this.cached = settings;
      this.log.info({ file: this.paths.settings }, 'seeded settings document');
      return true;
    });
  }

  async ensureListDocuments(): Promise<void> {
    await this.writes.run(async () => {
      for (const file of [this.paths.blocklists, this.paths.whitelist, this.paths.localRecords]) {
        if (await fileExists(file)) continue;
        await writeJsonAtomic(file, []);
        this.log.info({ file }, 'initialized empty list');
      }
    });
  }

  // --- blocklist sources ---

  async listBlocklists(): Promise<string[]> {
    return this.readDocument(this.paths.blocklists, stringList, []);
  }

  async addBlocklist(url: string): Promise<boolean> {
    return this.writes.run(async () => {
      const urls = await this.listBlocklists();
      if (urls.includes(url)) return false;
      await writeJsonAtomic(this.paths.blocklists, [...urls, url]);
      return true;
    });
  }

  async removeBlocklistAt(index: number): Promise<string | null> {
    return this.writes.run(async () => {
      const urls = await this.listBlocklists();
      if (!Number.isInteger(index) || index < 0 || index >= urls.length) return null;
      const [removed] = urls.splice(index, 1);
      await writeJsonAtomic(this.paths.blocklists, urls);

      const status = await this.getBlocklistStatus();
      if (removed in status) {
        delete status[removed];
        await writeJsonAtomic(this.paths.blocklistStatus, status);
      }
      return removed;
    });
  }

  async getBlocklistStatus(): Promise<BlocklistStatus> {
    return this.readDocument(this.paths.blocklistStatus, blocklistStatusDoc, {});
  }

  async mergeBlocklistStatus(updates: BlocklistStatus): Promise<void> {
    await this.writes.run(async () => {
      const status = await this.getBlocklistStatus();
      await writeJsonAtomic(this.paths.blocklistStatus, { ...status, ...updates });
    });
  }

  // --- whitelist ---

  async listWhitelist(): Promise<string[]> {
    return this.readDocument(this.paths.whitelist, stringList, []);
  }

  async addWhitelist(domain: string): Promise<boolean> {
    return this.writes.run(async () => {
      const domains = await this.listWhitelist();
      if (domains.includes(domain)) return false;
      await writeJsonAtomic(this.paths.whitelist, [...domains, domain]);
      return true;
    });
  }

  async removeWhitelistAt(index: number): Promise<string | null> {
    return this.writes.run(async () => {
      const domains = await this.listWhitelist();
      if (!Number.isInteger(index) || index < 0 || index >= domains.length) return null;
      const [removed] = domains.splice(index, 1);
      await writeJsonAtomic(this.paths.whitelist, domains);
      return removed;
    });
  }

  // --- local records ---

  async listLocalRecords(): Promise<LocalRecord[]> {
    return this.readDocument(this.paths.localRecords, localRecordList, []);
  }

  async saveLocalRecords(records: LocalRecord[]): Promise<void> {
    await this.writes.run(async () => {
      await writeJsonAtomic(this.paths.localRecords, records);
    });
  }
}

function pickObject(value: unknown): Record<string, unknown> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}
