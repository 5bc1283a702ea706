import { SourceFetchError, describeError } from '../errors.js';

const USER_AGENT = 'unbound-steward/0.4';

export type FetchSourceOptions = {
  timeoutMs: number;
  maxBytes: number;
};

function describeFetchFailure(err: unknown): string {
  const base = describeError(err);
  if (err instanceof Error && err.cause instanceof Error) return `${base}: ${err.cause.message}`;
  return base;
}

/**
 * Streams a remote listing line by line. The timeout covers the whole download,
 * so a feed that trickles bytes cannot hold a refresh open.
 */
export async function* fetchSourceLines(url: string, opts: FetchSourceOptions): AsyncGenerator<string> {
  const ac = new AbortController();
  const timer = setTimeout(() => ac.abort(), opts.timeoutMs);
  let completed = false;

  try {
    const res = await fetch(url, {
      method: 'GET',
      headers: { 'user-agent': USER_AGENT },
      signal: ac.signal
    });
    if (!res.ok) throw new SourceFetchError(url, `HTTP ${res.status}`);

    if (res.body) {
      const reader = res.body.getReader();
      const decoder = new TextDecoder('utf-8');
      let buffered = '';
      let seenBytes = 0;

      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;

        seenBytes += value.byteLength;
        if (seenBytes > opts.maxBytes) throw new SourceFetchError(url, `response exceeds ${opts.maxBytes} bytes`);

        buffered += decoder.decode(value, { stream: true });
        let idx: number;
        while ((idx = buffered.indexOf('\n')) >= 0) {
          yield buffered.slice(0, idx);
          buffered = buffered.slice(idx + 1);
        }
      }

      buffered += decoder.decode();
      if (buffered.length) yield buffered;
    }

    completed = true;
  } catch (err) {
    if (err instanceof SourceFetchError) throw err;
    if (ac.signal.aborted) throw new SourceFetchError(url, `timed out after ${opts.timeoutMs}ms`);
    throw new SourceFetchError(url, describeFetchFailure(err));
  } finally {
    clearTimeout(timer);
    // Cancels the body when the download stopped early.
    if (!completed) ac.abort();
  }
}

/** Whole-body download for small files such as root hints. */
export async function fetchText(url: string, opts: FetchSourceOptions): Promise<string> {
  const lines: string[] = [];
  for await (const line of fetchSourceLines(url, opts)) lines.push(line);
  return lines.join('\n');
}
