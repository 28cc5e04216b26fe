import fs from 'fs';
import path from 'path';
import { promises as fsPromises } from 'fs';
import {
  ConfigRecord,
  ParsedWireGuardConfig,
  Region,
  Registration,
} from '../types/index.js';
import { WriteError } from '../utils/errors.js';
import { toBase64 } from './keyPair.js';
import logger from '../utils/logger.js';

export const DEFAULT_ALLOWED_IPS = ['0.0.0.0/0', '::/0'];

const FILE_MODE = 0o600;
const DIR_MODE = 0o700;

export interface RecordOptions {
  allowedIPs?: string[];
  persistentKeepalive?: number;
  latencyMillis?: number;
}

/**
 * Build the config record for one registration. Key and grant both come
 * from the same registration, so they cannot be mixed across endpoints.
 */
export function buildConfigRecord(
  region: Region,
  registration: Registration,
  options: RecordOptions = {}
): ConfigRecord {
  const { endpoint, keyPair, grant } = registration;

  return {
    region,
    endpoint,
    privateKey: toBase64(keyPair.privateKey),
    address: grant.assignedClientAddress,
    dnsServers: [...grant.dnsServers],
    serverPublicKey: grant.serverPublicKey,
    serverPort: grant.serverPort,
    allowedIPs: options.allowedIPs ?? DEFAULT_ALLOWED_IPS,
    persistentKeepalive: options.persistentKeepalive ?? 25,
    latencyMillis: options.latencyMillis,
  };
}

/**
 * Render a record in wg-quick syntax
 */
export function renderConfig(record: ConfigRecord): string {
  return [
    '[Interface]',
    `PrivateKey = ${record.privateKey}`,
    `Address = ${record.address}/32`,
    `DNS = ${record.dnsServers.join(', ')}`,
    '',
    '[Peer]',
    `PublicKey = ${record.serverPublicKey}`,
    `Endpoint = ${record.endpoint.ip}:${record.serverPort}`,
    `AllowedIPs = ${record.allowedIPs.join(', ')}`,
    `PersistentKeepalive = ${record.persistentKeepalive}`,
    '',
  ].join('\n');
}

// Region ids and hostnames end up in file names
function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]/g, '_');
}

export type Destined = Pick<ConfigRecord, 'region' | 'endpoint' | 'latencyMillis'>;

/**
 * File path for a record. The measured latency is embedded when there is one;
 * `qualifyByIp` adds the endpoint address for hosts that share a name.
 */
export function destinationFor(
  record: Destined,
  outputDir: string,
  prefix: string = 'pia',
  qualifyByIp: boolean = false
): string {
  const host = qualifyByIp ? `${record.endpoint.hostname}_${record.endpoint.ip}` : record.endpoint.hostname;
  const latency = record.latencyMillis !== undefined ? `_${record.latencyMillis}ms` : '';
  const fileName = `${safeSegment(prefix)}-${safeSegment(record.region.id)}-${safeSegment(host)}${latency}.conf`;
  return path.join(outputDir, fileName);
}

/**
 * Destinations for one run, unique per (region, hostname, ip).
 * Endpoints whose names clash within a region carry their IP in the
 * file name; anything still clashing gets a numeric suffix.
 */
export function planDestinations(records: Destined[], outputDir: string, prefix: string = 'pia'): string[] {
  const hostKey = (record: Destined) => `${safeSegment(record.region.id)}/${safeSegment(record.endpoint.hostname)}`;

  const addressesByHost = new Map<string, Set<string>>();
  for (const record of records) {
    const addresses = addressesByHost.get(hostKey(record)) ?? new Set<string>();
    addresses.add(record.endpoint.ip);
    addressesByHost.set(hostKey(record), addresses);
  }

  const taken = new Set<string>();
  return records.map(record => {
    const shared = (addressesByHost.get(hostKey(record))?.size ?? 0) > 1;
    const base = destinationFor(record, outputDir, prefix, shared);

    let destination = base;
    for (let copy = 2; taken.has(destination); copy++) {
      destination = base.replace(/\.conf$/, `-${copy}.conf`);
    }
    taken.add(destination);
    return destination;
  });
}

/**
 * Write a record to disk, readable and writable by the owner only.
 * The mode is set on the open handle before any key material is written.
 */
export async function emitConfig(record: ConfigRecord, destinationPath: string): Promise<void> {
  try {
    const dir = path.dirname(destinationPath);
    if (!fs.existsSync(dir)) {
      await fsPromises.mkdir(dir, { recursive: true, mode: DIR_MODE });
      logger.debug(`Created config directory: ${dir}`);
    }

    const handle = await fsPromises.open(destinationPath, 'w', FILE_MODE);
    try {
      await handle.chmod(FILE_MODE);
      await handle.writeFile(renderConfig(record), 'utf8');
    } finally {
      await handle.close();
    }
  } catch (error) {
    throw new WriteError(destinationPath, error);
  }

  logger.debug(`Saved WireGuard config to ${destinationPath}`);
}

/**
 * Parse a WireGuard configuration string into a structured object
 * @param configText Raw WireGuard configuration text
 */
export function parseConfig(configText: string): ParsedWireGuardConfig {
  const config: ParsedWireGuardConfig = {
    privateKey: '',
    address: '',
    dns: [],
    publicKey: '',
    endpoint: '',
    allowedIPs: [],
  };

  let currentSection = '';

  for (const line of configText.split('\n')) {
    const trimmedLine = line.trim();
    if (!trimmedLine || trimmedLine.startsWith('#')) continue;

    if (trimmedLine.startsWith('[') && trimmedLine.endsWith(']')) {
      currentSection = trimmedLine.slice(1, -1);
      continue;
    }

    const match = trimmedLine.match(/^(\w+)\s*=\s*(.+)$/);
    if (!match) continue;

    const [, key, value] = match;
    const list = () => value.split(',').map(item => item.trim()).filter(Boolean);

    switch (currentSection) {
      case 'Interface':
        if (key === 'PrivateKey') config.privateKey = value;
        if (key === 'Address') config.address = value;
        if (key === 'DNS') config.dns = list();
        break;
      case 'Peer':
        if (key === 'PublicKey') config.publicKey = value;
        if (key === 'Endpoint') config.endpoint = value;
        if (key === 'AllowedIPs') config.allowedIPs = list();
        if (key === 'PersistentKeepalive') config.persistentKeepalive = parseInt(value, 10);
        break;
    }
  }

  return config;
}

export interface SavedConfig {
  path: string;
  config: ParsedWireGuardConfig;
}

/**
 * Read back every generated config file in a directory
 */
export async function listConfigs(outputDir: string): Promise<SavedConfig[]> {
  if (!fs.existsSync(outputDir)) return [];

  const names = (await fsPromises.readdir(outputDir))
    .filter(name => name.endsWith('.conf'))
    .sort();

  const saved: SavedConfig[] = [];
  for (const name of names) {
    const filePath = path.join(outputDir, name);
    const text = await fsPromises.readFile(filePath, 'utf8');
    saved.push({ path: filePath, config: parseConfig(text) });
  }
  return saved;
}
