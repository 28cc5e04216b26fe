import fs from 'fs';
import Conf from 'conf';
import { AppConfig } from '../types/index.js';
import logger from './logger.js';

// Default application configuration
export const DEFAULT_CONFIG: AppConfig = {
  tokenUrl: 'https://www.privateinternetaccess.com/api/client/v2/token',
  serverListUrl: 'https://serverlist.piaservers.net/vpninfo/servers/v6',
  registrationPort: 1337,
  requestTimeout: 10000, // 10 seconds
  probeTimeout: 2000, // 2 seconds per connect attempt
  probeSamples: 3,
  concurrency: 8,
  outputDir: './configs',
  caCertPath: './ca/ca.rsa.4096.crt',
  filePrefix: 'pia',
  defaultMode: 'lowest-latency',
  preferredRegions: [], // No preference by default
  persistentKeepalive: 25,
  logLevel: 'info',
};

let configStore: Conf<AppConfig> | null = null;

// Created on first use so that importing this module never touches the disk
function store(): Conf<AppConfig> {
  if (!configStore) {
    configStore = new Conf<AppConfig>({
      projectName: 'wg-provisioner',
      defaults: DEFAULT_CONFIG,
    });
  }
  return configStore;
}

/**
 * Get the current application configuration
 */
export function getConfig(): AppConfig {
  return { ...DEFAULT_CONFIG, ...store().store };
}

/**
 * Update the application configuration
 */
export function updateConfig(partialConfig: Partial<AppConfig>): AppConfig {
  const updatedConfig = { ...getConfig(), ...partialConfig };
  store().store = updatedConfig;
  return updatedConfig;
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  store().clear();
}

/**
 * A named place a setting can come from, e.g. a flag, the environment or a file
 */
export interface ConfigSource<T> {
  name: string;
  load: () => T | undefined | Promise<T | undefined>;
}

function isEmpty(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

/**
 * Walk the sources in order and return the first non-empty value.
 * Later sources are never loaded once one has produced a value.
 */
export async function resolveFirst<T>(
  sources: ConfigSource<T>[]
): Promise<{ value: T; source: string } | undefined> {
  for (const source of sources) {
    const value = await source.load();
    if (value !== undefined && !isEmpty(value)) {
      logger.debug(`Using ${source.name}`);
      return { value, source: source.name };
    }
  }
  return undefined;
}

export interface Credentials {
  username: string;
  password: string;
}

/**
 * Read PIA_USER / PIA_PASS lines from a properties file.
 * Returns undefined when the file is missing, empty or incomplete.
 */
export function readCredentialsFile(filePath: string): Credentials | undefined {
  if (!fs.existsSync(filePath)) return undefined;

  const values = new Map<string, string>();
  for (const line of fs.readFileSync(filePath, 'utf8').split('\n')) {
    const match = line.match(/^\s*(PIA_USER|PIA_PASS)\s*=(.*)$/);
    if (match) {
      values.set(match[1], match[2].replace(/\s/g, ''));
    }
  }

  const username = values.get('PIA_USER');
  const password = values.get('PIA_PASS');
  if (!username || !password) return undefined;

  return { username, password };
}

/**
 * Read region ids from a file, whitespace or newline separated
 */
export function readRegionsFile(filePath: string): string[] | undefined {
  if (!fs.existsSync(filePath)) return undefined;

  const ids = fs.readFileSync(filePath, 'utf8')
    .split(/\s+/)
    .filter(Boolean);

  return ids.length > 0 ? ids : undefined;
}

/**
 * Split a comma separated option value
 */
export function parseList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(',').map(item => item.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}
