import type { Settings } from '../settings/schema.js';
import type { ResolverLayout } from './layout.js';

export type GeneratedConfig = {
  mode: 'generated' | 'custom';
  /** unbound.conf */
  main: string;
  /** blocklist.conf */
  blocklist: string;
  /** local_records.conf */
  localRecords: string;
};

const yesNo = (value: boolean): string => (value ? 'yes' : 'no');

const quote = (value: string): string => `"${value}"`;

export function renderBlocklistFragment(domains: readonly string[]): string {
  let out = '';
  for (const domain of domains) out += `local-zone: "${domain}." always_refuse\n`;
  return out;
}

const BLOCKLIST_LINE = /^local-zone: "(.+)\." always_refuse$/;

/** Inverse of renderBlocklistFragment; lets a restart reuse the installed list without refetching. */
export function parseBlocklistFragment(text: string): string[] {
  const out: string[] = [];
  for (const line of text.split('\n')) {
    const m = BLOCKLIST_LINE.exec(line);
    if (m) out.push(m[1]);
  }
  return out;
}

function serverSection(settings: Settings, layout: ResolverLayout): string[] {
  const logfile = settings.log_queries ? layout.queryLogPath : '';
  const useTlsUpstream = settings.forward_tls && settings.forward_servers.length > 0;

  const lines = [
    'server:',
    '    # Daemon settings',
    '    do-daemonize: no',
    '    chroot: ""',
    '',
    '    # Network settings',
    '    interface: 0.0.0.0',
    '    port: 53',
    `    do-ip4: ${yesNo(settings.do_ip4)}`,
    `    do-ip6: ${yesNo(settings.do_ip6)}`,
    `    prefer-ip4: ${yesNo(settings.prefer_ip4)}`,
    '    do-udp: yes',
    '    do-tcp: yes',
    '    do-not-query-localhost: no',
    '',
    '    # Performance settings',
    `    num-threads: ${settings.num_threads}`,
    `    prefetch: ${yesNo(settings.prefetch)}`,
    `    fast-server-permil: ${settings.fast_server_permil}`,
    `    fast-server-num: ${settings.fast_server_num}`,
    '    msg-cache-slabs: 4',
    '    rrset-cache-slabs: 4',
    '    infra-cache-slabs: 4',
    '    key-cache-slabs: 4',
    '',
    '    # Cache settings',
    `    cache-min-ttl: ${settings.cache_min_ttl}`,
    `    cache-max-ttl: ${settings.cache_max_ttl}`,
    '',
    '    # Privacy settings',
    `    qname-minimisation: ${yesNo(settings.qname_minimisation)}`,
    `    hide-identity: ${yesNo(settings.hide_identity)}`,
    `    hide-version: ${yesNo(settings.hide_version)}`,
    '',
    '    # Root hints for recursive resolution',
    `    root-hints: ${quote(layout.rootHintsPath)}`,
    '',
    '    # Hardening',
    '    harden-glue: yes',
    '    harden-referral-path: yes',
    ''
  ];

  // Disabled DNSSEC drops the validator module outright instead of leaving it unconfigured.
  if (settings.enable_dnssec) {
    lines.push(
      '    # DNSSEC validation',
      '    module-config: "validator iterator"',
      `    auto-trust-anchor-file: ${quote(layout.trustAnchorPath)}`,
      '    harden-dnssec-stripped: yes',
      '    val-clean-additional: yes'
    );
  } else {
    lines.push('    # DNSSEC validation disabled', '    module-config: "iterator"');
  }
  lines.push('');

  if (useTlsUpstream) {
    lines.push('    # Certificates for DNS-over-TLS upstreams', `    tls-cert-bundle: ${quote(layout.tlsCertBundlePath)}`, '');
  }

  lines.push(
    '    # Log settings',
    `    verbosity: ${settings.verbosity}`,
    `    logfile: ${quote(logfile)}`,
    `    log-queries: ${yesNo(settings.log_queries)}`,
    `    log-replies: ${yesNo(settings.log_queries)}`,
    '    log-servfail: yes',
    ''
  );

  lines.push(
    '    # Blocklist and local records',
    `    include: ${quote(layout.blocklistPath)}`,
    `    include: ${quote(layout.localRecordsPath)}`
  );

  if (settings.access_control.length) {
    lines.push('', '    # Access control');
    for (const network of settings.access_control) lines.push(`    access-control: ${network} allow`);
  }

  return lines;
}

function remoteControlSection(layout: ResolverLayout): string[] {
  return [
    'remote-control:',
    '    control-enable: yes',
    '    control-interface: 127.0.0.1',
    `    server-key-file: ${quote(layout.serverKeyPath)}`,
    `    server-cert-file: ${quote(layout.serverCertPath)}`,
    `    control-key-file: ${quote(layout.controlKeyPath)}`,
    `    control-cert-file: ${quote(layout.controlCertPath)}`
  ];
}

function forwardZoneSection(settings: Settings): string[] {
  // No forwarders: Unbound resolves from the root hints itself.
  if (!settings.forward_servers.length) return [];
  return [
    '',
    'forward-zone:',
    '    name: "."',
    `    forward-tls-upstream: ${yesNo(settings.forward_tls)}`,
    ...settings.forward_servers.map((server) => `    forward-addr: ${server}`)
  ];
}

/**
 * Renders the complete resolver configuration. Pure: the same inputs always
 * produce the same bytes, which is what makes "unchanged" detection and diffing work.
 */
export function synthesize(
  settings: Settings,
  blockedDomains: readonly string[],
  localFragment: string,
  layout: ResolverLayout
): GeneratedConfig {
  const lines = [
    '# Generated by unbound-steward. Manual edits are overwritten; enable custom_config instead.',
    ...serverSection(settings, layout),
    '',
    ...remoteControlSection(layout),
    ...forwardZoneSection(settings)
  ];

  return {
    mode: 'generated',
    main: `${lines.join('\n')}\n`,
    blocklist: renderBlocklistFragment(blockedDomains),
    localRecords: localFragment
  };
}

/** Custom mode: the user's file goes in verbatim and every other setting is ignored. */
export function customConfig(customText: string, blockedDomains: readonly string[], localFragment: string): GeneratedConfig {
  return {
    mode: 'custom',
    main: customText,
    blocklist: renderBlocklistFragment(blockedDomains),
    localRecords: localFragment
  };
}
