import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import {
  ConfigRecord,
  Endpoint,
  ProbeMode,
  ProbeResult,
  ProvisionedConfig,
  Region,
  Registration,
  RunSummary,
  SelectionInput,
  SelectionMode,
  ServerDirectory,
  SessionToken,
  SkippedItem,
} from '../types/index.js';
import { TrustAnchor } from '../api/keyRegistrar.js';
import { findRegion } from '../api/directoryParser.js';
import { probeModeFor, sameEndpoint, select } from './selectionStrategy.js';
import { buildConfigRecord, emitConfig, planDestinations } from '../vpn/wireguardManager.js';
import { discardKeyPair } from '../vpn/keyPair.js';
import { settleWithConcurrency } from '../utils/pool.js';
import { NoReachableCandidate, SelectionError, isProvisioningError, toMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';

export interface Prober {
  probe(endpoints: Endpoint[], mode: ProbeMode, timeoutMs: number): Promise<ProbeResult[]>;
}

export interface Registrar {
  register(endpoint: Endpoint, token: SessionToken, trustAnchor: TrustAnchor): Promise<Registration>;
}

export type Emitter = (record: ConfigRecord, destinationPath: string) => Promise<void>;

export interface ProvisionerOptions {
  outputDir: string;
  filePrefix: string;
  probeTimeout: number;
  concurrency: number;
  persistentKeepalive: number;
  allowedIPs?: string[];
}

export interface ProvisionRequest {
  directory: ServerDirectory;
  regionIds: string[];
  mode: SelectionMode;
  selection?: SelectionInput;
  token: SessionToken;
  trustAnchor: TrustAnchor;
}

/**
 * The numbered candidate list manual selection indexes into:
 * endpoints of the known regions, in the order the regions were requested.
 */
export function enumerateCandidates(directory: ServerDirectory, regionIds: string[]): Endpoint[] {
  return [...new Set(regionIds)]
    .filter(regionId => findRegion(directory, regionId) !== undefined)
    .flatMap(regionId => directory.endpoints.get(regionId) ?? []);
}

interface Target {
  region: Region;
  endpoint: Endpoint;
  latencyMillis?: number;
}

/**
 * Drives a provisioning run: select endpoints per region, register a key
 * with each and write its config. A failure for one region or endpoint
 * becomes a skip in the run summary and the run carries on.
 */
export class Provisioner extends EventEmitter {
  constructor(
    private readonly prober: Prober,
    private readonly registrar: Registrar,
    private readonly options: ProvisionerOptions,
    private readonly writeConfig: Emitter = emitConfig
  ) {
    super();
  }

  async provision(request: ProvisionRequest): Promise<RunSummary> {
    const summary: RunSummary = { runId: uuidv4(), provisioned: [], skipped: [] };
    logger.debug(`Starting provisioning run ${summary.runId} (${request.mode})`);

    const regions = this.resolveRegions(request, summary);
    const targets = request.mode === 'manual'
      ? this.selectManually(request, regions, summary)
      : await this.selectPerRegion(request, regions, summary);

    if (targets.length > 0) {
      logger.info(`Registering keys with ${targets.length} server(s)...`);
    }

    const destinations = planDestinations(targets, this.options.outputDir, this.options.filePrefix);
    const settled = await settleWithConcurrency(targets, this.options.concurrency, (target, index) =>
      this.provisionEndpoint(target, destinations[index], request.token, request.trustAnchor)
    );

    settled.forEach((result, index) => {
      const target = targets[index];
      if (result.status === 'fulfilled') {
        summary.provisioned.push(result.value);
        logger.success(`Config generated: ${result.value.path}`);
        this.emit('endpoint:provisioned', result.value);
      } else {
        this.skip(summary, target.region.id, result.reason, target.endpoint);
      }
    });

    logger.info(`Run ${summary.runId}: ${summary.provisioned.length} provisioned, ${summary.skipped.length} skipped`);
    return summary;
  }

  private resolveRegions(request: ProvisionRequest, summary: RunSummary): Region[] {
    const regions: Region[] = [];
    for (const regionId of new Set(request.regionIds)) {
      const region = findRegion(request.directory, regionId);
      if (!region) {
        this.skip(summary, regionId, new SelectionError(`Invalid region ID: ${regionId}`));
        continue;
      }
      regions.push(region);
    }
    return regions;
  }

  /**
   * One enumerated list across all requested regions, indexed by the caller
   */
  private selectManually(request: ProvisionRequest, regions: Region[], summary: RunSummary): Target[] {
    const candidates = enumerateCandidates(request.directory, regions.map(region => region.id));

    let chosen: Endpoint[];
    try {
      chosen = select(candidates, undefined, 'manual', request.selection);
    } catch (error) {
      this.skip(summary, regions.map(region => region.id).join(','), error);
      return [];
    }

    return chosen.flatMap(endpoint => {
      const region = regions.find(candidate => candidate.id === endpoint.regionId);
      return region ? [{ region, endpoint }] : [];
    });
  }

  private async selectPerRegion(request: ProvisionRequest, regions: Region[], summary: RunSummary): Promise<Target[]> {
    const targets: Target[] = [];

    for (const region of regions) {
      const candidates = request.directory.endpoints.get(region.id) ?? [];
      logger.info(`Selecting server for region: ${region.displayName} (${region.id}), ${candidates.length} candidate(s)`);

      if (candidates.length === 0) {
        this.skip(summary, region.id, new NoReachableCandidate(region.id));
        continue;
      }

      const probeMode = probeModeFor(request.mode);
      const results = probeMode
        ? await this.prober.probe(candidates, probeMode, this.options.probeTimeout)
        : undefined;

      try {
        for (const endpoint of select(candidates, results, request.mode, request.selection)) {
          const latencyMillis = request.mode === 'lowest-latency'
            ? results?.find(result => sameEndpoint(result.endpoint, endpoint))?.latencyMillis
            : undefined;
          if (latencyMillis !== undefined) {
            logger.info(`Best server: ${endpoint.hostname} (${endpoint.ip}) with ${latencyMillis}ms latency`);
          }
          targets.push({ region, endpoint, latencyMillis });
        }
      } catch (error) {
        this.skip(summary, region.id, error);
      }
    }

    return targets;
  }

  private async provisionEndpoint(
    target: Target,
    destination: string,
    token: SessionToken,
    trustAnchor: TrustAnchor
  ): Promise<ProvisionedConfig> {
    const { region, endpoint, latencyMillis } = target;
    logger.info(`Generating config for: ${endpoint.hostname} (${endpoint.ip})`);

    const registration = await this.registrar.register(endpoint, token, trustAnchor);
    try {
      const record = buildConfigRecord(region, registration, {
        allowedIPs: this.options.allowedIPs,
        persistentKeepalive: this.options.persistentKeepalive,
        latencyMillis,
      });
      await this.writeConfig(record, destination);
      return { region, endpoint, path: destination, latencyMillis };
    } finally {
      discardKeyPair(registration.keyPair);
    }
  }

  private skip(summary: RunSummary, regionId: string, error: unknown, endpoint?: Endpoint): void {
    const kind = isProvisioningError(error)
      ? error.kind
      : error instanceof Error ? error.name : 'Error';
    const item: SkippedItem = { regionId, endpoint, kind, reason: toMessage(error) };
    summary.skipped.push(item);

    const subject = endpoint ? `${endpoint.hostname} (${endpoint.ip}) in ${regionId}` : `region ${regionId}`;
    if (isProvisioningError(error)) {
      logger.warn(`Skipping ${subject} [${kind}]: ${item.reason}`);
    } else {
      logger.error(`Skipping ${subject} after unexpected ${kind}: ${item.reason}`);
    }

    this.emit(endpoint ? 'endpoint:skipped' : 'region:skipped', item);
  }
}

export default Provisioner;
