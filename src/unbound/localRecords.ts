import type { LocalRecord } from '../settings/store.js';

/**
 * Two directives per record, in input order. Duplicate hostnames are emitted
 * as-is; Unbound keeps the last `local-data` it reads.
 */
export function compileLocalRecords(records: readonly LocalRecord[]): string {
  let out = '';
  for (const { hostname, ip } of records) {
    out += `local-zone: "${hostname}." redirect\n`;
    out += `local-data: "${hostname}. A ${ip}"\n`;
  }
  return out;
}
