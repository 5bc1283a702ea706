import type { Logger } from '../logger.js';
import { describeError } from '../errors.js';
import { writeFileAtomic } from '../persistedFile.js';
import { fetchText } from '../blocklists/fetch.js';

const ROOT_HINTS_TIMEOUT_MS = 15_000;
const ROOT_HINTS_MAX_BYTES = 1024 * 1024;

/**
 * Downloads a fresh root hints file. On any failure the existing file (the
 * copy bundled in the image) stays in place and false is returned.
 */
export async function updateRootHints(url: string, targetPath: string, log: Logger): Promise<boolean> {
  try {
    const text = await fetchText(url, { timeoutMs: ROOT_HINTS_TIMEOUT_MS, maxBytes: ROOT_HINTS_MAX_BYTES });
    if (!text.includes('ROOT-SERVERS.NET')) {
      log.warn({ url }, 'root hints download did not look like a hints file; keeping existing copy');
      return false;
    }
    await writeFileAtomic(targetPath, `${text}\n`);
    log.info({ file: targetPath }, 'root hints updated');
    return true;
  } catch (err) {
    log.warn({ url, err: describeError(err) }, 'failed to update root hints; keeping existing copy');
    return false;
  }
}
