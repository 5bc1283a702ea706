import { isHostname } from '../settings/validators.js';

/** Only hosts entries pointing at one of these sink addresses are blocking entries. */
const BLOCKING_ADDRESSES: ReadonlySet<string> = new Set(['0.0.0.0', '127.0.0.1']);

/** Names every hosts file carries for the machine itself; blocking them breaks the resolver. */
export const INFRASTRUCTURE_HOSTNAMES: ReadonlySet<string> = new Set([
  'localhost',
  'localhost.localdomain',
  'local',
  'broadcasthost',
  'ip6-localhost',
  'ip6-loopback',
  'ip6-localnet',
  'ip6-mcastprefix',
  'ip6-allnodes',
  'ip6-allrouters',
  'ip6-allhosts'
]);

/**
 * Extracts the blocked domain from one hosts-format line, or null when the line
 * is a comment, malformed, not a blocking entry, or names the host itself.
 */
export function parseHostsLine(raw: string): string | null {
  const hash = raw.indexOf('#');
  const line = (hash >= 0 ? raw.slice(0, hash) : raw).replace(/\r/g, '');

  const fields = line.split(/\s+/).filter(Boolean);
  if (fields.length < 2) return null;
  if (!BLOCKING_ADDRESSES.has(fields[0])) return null;

  const domain = fields[1].toLowerCase();
  if (INFRASTRUCTURE_HOSTNAMES.has(domain)) return null;
  // Anything that is not a plain DNS name would break the generated directive.
  if (!isHostname(domain)) return null;
  return domain;
}

export function parseHostsListing(text: string): Set<string> {
  const out = new Set<string>();
  for (const line of text.split('\n')) {
    const domain = parseHostsLine(line);
    if (domain) out.add(domain);
  }
  return out;
}

export function unionDomains(sets: Iterable<Iterable<string>>): Set<string> {
  const out = new Set<string>();
  for (const set of sets) {
    for (const domain of set) out.add(domain);
  }
  return out;
}

/** Exact-match subtraction; a whitelisted parent does not exempt its subdomains. Output is sorted. */
export function subtractWhitelist(domains: Iterable<string>, whitelist: Iterable<string>): string[] {
  const exempt = new Set(whitelist);
  const out: string[] = [];
  for (const domain of domains) {
    if (!exempt.has(domain)) out.push(domain);
  }
  return out.sort();
}
