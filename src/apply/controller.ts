import fs from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from '../logger.js';
import { describeError } from '../errors.js';
import { ensureDir, readTextOrNull, writeFileAtomic } from '../persistedFile.js';
import { SerialQueue } from '../serialQueue.js';
import type { ResolverControl } from '../unbound/control.js';
import type { ResolverLayout } from '../unbound/layout.js';
import type { GeneratedConfig } from '../unbound/synthesize.js';

export type ApplyState = 'idle' | 'validating' | 'accepted' | 'rejected' | 'reloading' | 'live';

export type ApplyResult =
  | { status: 'live'; output: string }
  | { status: 'unchanged' }
  | { status: 'rejected'; diagnostics: string }
  | { status: 'reload-failed'; output: string }
  | { status: 'busy' };

export type ApplyStatus = ApplyResult['status'];

export type ApplyOptions = {
  /** 'queue' waits for a running apply to finish; 'reject' returns `busy` instead. */
  ifBusy?: 'queue' | 'reject';
  /** Free text for the logs, e.g. "settings" or "blocklist refresh". */
  reason?: string;
};

export type ControllerStatus = {
  state: ApplyState;
  pendingReload: boolean;
  lastResult: ApplyResult | null;
  /** Unix milliseconds of the last finished apply. */
  lastFinishedAt: number | null;
  lastReason: string | null;
};

type StateListener = (state: ApplyState, previous: ApplyState) => void;

type InstallTarget = {
  filePath: string;
  content: string;
  previous: string | null;
};

const INCLUDE_LINE = /^(\s*include:\s*)("?)([^"\s]+)\2(.*)$/;

/** Points `include:` lines that reference one of `targets` at its replacement. */
export function retargetIncludes(main: string, targets: ReadonlyMap<string, string>): string {
  return main
    .split('\n')
    .map((line) => {
      const m = INCLUDE_LINE.exec(line);
      if (!m) return line;
      const replacement = targets.get(m[3]);
      return replacement ? `${m[1]}"${replacement}"${m[4]}` : line;
    })
    .join('\n');
}

/**
 * Validates, installs and reloads resolver configurations, one at a time.
 *
 * idle -> validating -> rejected -> idle
 * idle -> validating -> accepted -> reloading -> live -> idle
 *
 * The live files are only written after the validator accepted the staged copy.
 */
export class ApplyController {
  private readonly queue = new SerialQueue();
  private readonly listeners = new Set<StateListener>();
  private state: ApplyState = 'idle';
  private pendingReload = false;
  private lastResult: ApplyResult | null = null;
  private lastFinishedAt: number | null = null;
  private lastReason: string | null = null;

  constructor(
    private readonly layout: ResolverLayout,
    private readonly control: ResolverControl,
    private readonly log: Logger,
    private readonly now: () => number = Date.now
  ) {}

  getStatus(): ControllerStatus {
    return {
      state: this.state,
      pendingReload: this.pendingReload,
      lastResult: this.lastResult,
      lastFinishedAt: this.lastFinishedAt,
      lastReason: this.lastReason
    };
  }

  get busy(): boolean {
    return this.queue.busy;
  }

  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Serializes `fn` with applies, e.g. to read state and apply without another apply in between. */
  exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.queue.run(fn);
  }

  async apply(candidate: GeneratedConfig, opts: ApplyOptions = {}): Promise<ApplyResult> {
    if (opts.ifBusy === 'reject' && this.queue.busy) {
      this.log.info({ reason: opts.reason }, 'apply skipped: another apply is running');
      return { status: 'busy' };
    }
    return this.queue.run(() => this.applyNow(candidate, opts.reason ?? null));
  }

  /** For callers already inside `exclusive()`. */
  async applyLocked(candidate: GeneratedConfig, reason?: string): Promise<ApplyResult> {
    return this.applyNow(candidate, reason ?? null);
  }

  private setState(next: ApplyState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    this.log.debug({ from: previous, to: next }, 'apply state changed');
    for (const listener of this.listeners) listener(next, previous);
  }

  private finish(result: ApplyResult, reason: string | null): ApplyResult {
    this.lastResult = result;
    this.lastFinishedAt = this.now();
    this.lastReason = reason;
    this.setState('idle');
    return result;
  }

  private async applyNow(candidate: GeneratedConfig, reason: string | null): Promise<ApplyResult> {
    const targets: InstallTarget[] = [
      { filePath: this.layout.blocklistPath, content: candidate.blocklist, previous: null },
      { filePath: this.layout.localRecordsPath, content: candidate.localRecords, previous: null },
      { filePath: this.layout.configPath, content: candidate.main, previous: null }
    ];
    for (const t of targets) t.previous = await readTextOrNull(t.filePath);

    const identical = targets.every((t) => t.previous === t.content);
    if (identical && !this.pendingReload) {
      this.log.debug({ reason }, 'configuration unchanged');
      return this.finish({ status: 'unchanged' }, reason);
    }

    if (!identical) {
      this.setState('validating');
      let check: { ok: boolean; output: string };
      try {
        check = await this.validate(candidate);
      } catch (err) {
        this.setState('idle');
        throw err;
      }
      if (!check.ok) {
        this.log.warn({ reason, diagnostics: check.output }, 'configuration rejected by validator');
        this.setState('rejected');
        return this.finish({ status: 'rejected', diagnostics: check.output }, reason);
      }

      this.setState('accepted');
      try {
        await this.install(targets);
      } catch (err) {
        this.setState('idle');
        throw err;
      }
      this.log.info({ reason, mode: candidate.mode }, 'configuration installed');
    }

    this.setState('reloading');
    const reload = await this.control.reload();
    if (!reload.ok) {
      this.pendingReload = true;
      this.log.error({ reason, output: reload.output }, 'resolver reload failed; new configuration is installed but not active');
      return this.finish({ status: 'reload-failed', output: reload.output }, reason);
    }

    this.pendingReload = false;
    this.setState('live');
    this.log.info({ reason }, 'resolver reloaded');
    return this.finish({ status: 'live', output: reload.output }, reason);
  }

  private async validate(candidate: GeneratedConfig): Promise<{ ok: boolean; output: string }> {
    const dir = this.layout.stagingDir;
    const stagedBlocklist = path.join(dir, path.basename(this.layout.blocklistPath));
    const stagedLocal = path.join(dir, path.basename(this.layout.localRecordsPath));
    const stagedMain = path.join(dir, path.basename(this.layout.configPath));

    const main = retargetIncludes(
      candidate.main,
      new Map([
        [this.layout.blocklistPath, stagedBlocklist],
        [this.layout.localRecordsPath, stagedLocal]
      ])
    );

    await ensureDir(dir);
    try {
      await writeFileAtomic(stagedBlocklist, candidate.blocklist);
      await writeFileAtomic(stagedLocal, candidate.localRecords);
      await writeFileAtomic(stagedMain, main);
      return await this.control.checkConf(stagedMain);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }

  /** Fragments first, main last. On failure everything already replaced is put back. */
  private async install(targets: InstallTarget[]): Promise<void> {
    const written: InstallTarget[] = [];
    try {
      for (const t of targets) {
        if (t.previous === t.content) continue;
        await writeFileAtomic(t.filePath, t.content);
        written.push(t);
      }
    } catch (err) {
      for (const t of written.reverse()) {
        try {
          if (t.previous === null) await fs.rm(t.filePath, { force: true });
          else await writeFileAtomic(t.filePath, t.previous);
        } catch (restoreErr) {
          this.log.error({ file: t.filePath, err: describeError(restoreErr) }, 'failed to restore previous file');
        }
      }
      this.log.error({ err: describeError(err) }, 'install failed; previous configuration restored');
      throw err;
    }
  }
}
