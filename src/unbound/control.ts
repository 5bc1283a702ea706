import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export type CommandResult = {
  ok: boolean;
  /** stdout and stderr combined, trimmed. */
  output: string;
};

/** The resolver daemon as seen from here: a validator plus the remote-control channel. */
export interface ResolverControl {
  checkConf(configPath: string): Promise<CommandResult>;
  reload(): Promise<CommandResult>;
  flushZone(zone: string): Promise<CommandResult>;
  flushDomain(domain: string): Promise<CommandResult>;
  stats(): Promise<CommandResult>;
}

export type UnboundControlOptions = {
  checkconfBin: string;
  controlBin: string;
  /** Live unbound.conf; unbound-control reads the control keys from it. */
  configPath: string;
  checkconfTimeoutMs: number;
  controlTimeoutMs: number;
};

function joinOutput(stdout: unknown, stderr: unknown): string {
  return `${String(stdout ?? '')}${String(stderr ?? '')}`.trim();
}

function describeExecFailure(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const stdout = 'stdout' in err ? err.stdout : '';
  const stderr = 'stderr' in err ? err.stderr : '';
  return joinOutput(stdout, stderr) || err.message;
}

async function run(bin: string, args: string[], timeoutMs: number): Promise<CommandResult> {
  if (process.platform === 'win32') return { ok: false, output: 'NOT_SUPPORTED_ON_WINDOWS' };
  try {
    const res = await execFileAsync(bin, args, { timeout: timeoutMs, maxBuffer: 8 * 1024 * 1024 });
    return { ok: true, output: joinOutput(res.stdout, res.stderr) };
  } catch (e) {
    return { ok: false, output: describeExecFailure(e) };
  }
}

export class UnboundControl implements ResolverControl {
  constructor(private readonly opts: UnboundControlOptions) {}

  checkConf(configPath: string): Promise<CommandResult> {
    return run(this.opts.checkconfBin, [configPath], this.opts.checkconfTimeoutMs);
  }

  private control(args: string[]): Promise<CommandResult> {
    return run(this.opts.controlBin, ['-c', this.opts.configPath, ...args], this.opts.controlTimeoutMs);
  }

  reload(): Promise<CommandResult> {
    return this.control(['reload']);
  }

  flushZone(zone: string): Promise<CommandResult> {
    return this.control(['flush_zone', zone]);
  }

  flushDomain(domain: string): Promise<CommandResult> {
    return this.control(['flush', domain]);
  }

  stats(): Promise<CommandResult> {
    return this.control(['stats_noreset']);
  }
}
