import path from 'node:path';
import type { AppConfig } from '../config.js';

/** Every filesystem path the generated configuration references or the apply step writes. */
export type ResolverLayout = {
  configPath: string;
  blocklistPath: string;
  localRecordsPath: string;
  /** Candidate files are validated here before anything live is touched. */
  stagingDir: string;
  rootHintsPath: string;
  trustAnchorPath: string;
  tlsCertBundlePath: string;
  serverKeyPath: string;
  serverCertPath: string;
  controlKeyPath: string;
  controlCertPath: string;
  queryLogPath: string;
};

export function resolverLayout(
  config: Pick<AppConfig, 'UNBOUND_DIR' | 'UNBOUND_KEY_DIR' | 'QUERY_LOG_PATH'>
): ResolverLayout {
  const dir = config.UNBOUND_DIR;
  return {
    configPath: path.join(dir, 'unbound.conf'),
    blocklistPath: path.join(dir, 'blocklist.conf'),
    localRecordsPath: path.join(dir, 'local_records.conf'),
    stagingDir: path.join(dir, '.staging'),
    rootHintsPath: path.join(dir, 'root.hints'),
    trustAnchorPath: path.join(config.UNBOUND_KEY_DIR, 'root.key'),
    tlsCertBundlePath: '/etc/ssl/certs/ca-certificates.crt',
    serverKeyPath: path.join(dir, 'unbound_server.key'),
    serverCertPath: path.join(dir, 'unbound_server.pem'),
    controlKeyPath: path.join(dir, 'unbound_control.key'),
    controlCertPath: path.join(dir, 'unbound_control.pem'),
    queryLogPath: config.QUERY_LOG_PATH
  };
}
