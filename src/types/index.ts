/**
 * Server directory types
 */
export interface Region {
  id: string;
  displayName: string;
}

export interface Endpoint {
  hostname: string;
  ip: string;
  regionId: string;
}

export interface ServerDirectory {
  regions: Region[];
  endpoints: Map<string, Endpoint[]>;
}

/**
 * Probing and selection types
 */
export type ProbeMode = 'presence' | 'latency';

export interface ProbeResult {
  endpoint: Endpoint;
  reachable: boolean;
  latencyMillis?: number;
}

export const SELECTION_MODES = [
  'manual',
  'first-responsive',
  'lowest-latency',
  'all',
  'all-responsive',
] as const;

export type SelectionMode = (typeof SELECTION_MODES)[number];

export interface SelectionInput {
  indices?: number[];
}

/**
 * Key registration types
 */
export type SessionToken = string;

export interface KeyPair {
  privateKey: Uint8Array;
  publicKey: Uint8Array;
}

export interface TunnelGrant {
  serverPublicKey: string;
  serverPort: number;
  assignedClientAddress: string;
  dnsServers: string[];
}

// A grant only ever travels with the key pair it was issued for
export interface Registration {
  endpoint: Endpoint;
  keyPair: KeyPair;
  grant: TunnelGrant;
}

/**
 * WireGuard configuration types
 */
export interface ConfigRecord {
  region: Region;
  endpoint: Endpoint;
  privateKey: string;
  address: string;
  dnsServers: string[];
  serverPublicKey: string;
  serverPort: number;
  allowedIPs: string[];
  persistentKeepalive: number;
  latencyMillis?: number;
}

export interface ParsedWireGuardConfig {
  privateKey: string;
  address: string;
  dns: string[];
  publicKey: string;
  endpoint: string;
  allowedIPs: string[];
  persistentKeepalive?: number;
}

/**
 * Run reporting types
 */
export interface ProvisionedConfig {
  region: Region;
  endpoint: Endpoint;
  path: string;
  latencyMillis?: number;
}

export interface SkippedItem {
  regionId: string;
  endpoint?: Endpoint;
  kind: string;
  reason: string;
}

export interface RunSummary {
  runId: string;
  provisioned: ProvisionedConfig[];
  skipped: SkippedItem[];
}

/**
 * Application configuration
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AppConfig {
  tokenUrl: string;
  serverListUrl: string;
  registrationPort: number;
  requestTimeout: number;
  probeTimeout: number;
  probeSamples: number;
  concurrency: number;
  outputDir: string;
  caCertPath: string;
  filePrefix: string;
  defaultMode: SelectionMode;
  preferredRegions: string[];
  persistentKeepalive: number;
  logLevel: LogLevel;
}
