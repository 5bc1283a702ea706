import ipaddr from 'ipaddr.js';

const DOTTED_QUAD = /^\d{1,3}(?:\.\d{1,3}){3}$/;
const HOSTNAME = /^(?=.{1,253}$)[a-z0-9_](?:[a-z0-9_-]{0,61}[a-z0-9_])?(?:\.[a-z0-9_](?:[a-z0-9_-]{0,61}[a-z0-9_])?)*$/;
const TLS_NAME = /^[A-Za-z0-9.-]{1,253}$/;

/** Strict dotted-quad IPv4; ipaddr.js alone also accepts hex and short forms. */
export function isIPv4(value: string): boolean {
  return DOTTED_QUAD.test(value) && ipaddr.IPv4.isValid(value);
}

export function isIP(value: string): boolean {
  return isIPv4(value) || ipaddr.IPv6.isValid(value);
}

export function isCidr(value: string): boolean {
  const slash = value.indexOf('/');
  if (slash < 0) return false;
  if (!isIP(value.slice(0, slash))) return false;
  try {
    ipaddr.parseCIDR(value);
    return true;
  } catch {
    return false;
  }
}

/** Unbound forward-addr syntax: `IP[@port][#tls-auth-name]`. */
export function isForwardAddress(value: string): boolean {
  const [addrPort, tlsName, ...rest] = value.split('#');
  if (rest.length > 0) return false;
  if (tlsName !== undefined && !TLS_NAME.test(tlsName)) return false;

  const at = addrPort.lastIndexOf('@');
  const ip = at >= 0 ? addrPort.slice(0, at) : addrPort;
  if (at >= 0) {
    const port = Number(addrPort.slice(at + 1));
    if (!Number.isInteger(port) || port < 1 || port > 65535) return false;
  }
  return isIP(ip);
}

/** Lower-case DNS name without a trailing dot; quotes and whitespace never pass. */
export function isHostname(value: string): boolean {
  return HOSTNAME.test(value);
}

export function normalizeDomain(input: string): string {
  const d = input.trim().toLowerCase();
  return d.endsWith('.') ? d.slice(0, -1) : d;
}
