import { z } from 'zod';
import { Endpoint, Region, ServerDirectory } from '../types/index.js';
import { MalformedDirectory, toMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';

const serverSchema = z.object({
  ip: z.string().ip({ version: 'v4' }),
  cn: z.string().min(1),
});

const regionSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  servers: z
    .object({
      wg: z.array(serverSchema).optional(),
    })
    .optional(),
});

const directorySchema = z.object({
  regions: z.array(regionSchema),
});

/**
 * The server list is served as one line of JSON followed by a signature
 * block; only the first line is the document.
 */
function decode(rawDocument: string): unknown {
  const firstLine = rawDocument.trimStart().split('\n', 1)[0];
  try {
    return JSON.parse(firstLine);
  } catch (error) {
    throw new MalformedDirectory(`Server list is not valid JSON: ${toMessage(error)}`, { cause: error });
  }
}

function compare(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function describeIssue(issue: z.ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : 'document';
  return `${location}: ${issue.message}`;
}

/**
 * Parse the provider's server directory into regions and their WireGuard endpoints.
 * Regions come back sorted by display name (then id); endpoints keep document order.
 */
export function parseDirectory(rawDocument: unknown): ServerDirectory {
  const data = typeof rawDocument === 'string' ? decode(rawDocument) : rawDocument;

  const parsed = directorySchema.safeParse(data);
  if (!parsed.success) {
    throw new MalformedDirectory(`Unexpected server list layout (${describeIssue(parsed.error.issues[0])})`);
  }

  const regions: Region[] = [];
  const endpoints = new Map<string, Endpoint[]>();

  for (const entry of parsed.data.regions) {
    if (endpoints.has(entry.id)) {
      logger.debug(`Ignoring duplicate region entry: ${entry.id}`);
      continue;
    }

    const seen = new Set<string>();
    const regionEndpoints: Endpoint[] = [];
    for (const server of entry.servers?.wg ?? []) {
      const key = `${server.cn}@${server.ip}`;
      if (seen.has(key)) {
        logger.debug(`Ignoring duplicate server entry in ${entry.id}: ${server.cn} (${server.ip})`);
        continue;
      }
      seen.add(key);
      regionEndpoints.push({ hostname: server.cn, ip: server.ip, regionId: entry.id });
    }

    regions.push({ id: entry.id, displayName: entry.name });
    endpoints.set(entry.id, regionEndpoints);
  }

  regions.sort((a, b) => compare(a.displayName, b.displayName) || compare(a.id, b.id));

  logger.debug(`Parsed ${regions.length} regions from server list`);
  return { regions, endpoints };
}

/**
 * Look up a region by id
 */
export function findRegion(directory: ServerDirectory, regionId: string): Region | undefined {
  return directory.regions.find(region => region.id === regionId);
}

/**
 * Number of WireGuard endpoints across all regions
 */
export function countEndpoints(directory: ServerDirectory): number {
  let total = 0;
  for (const list of directory.endpoints.values()) {
    total += list.length;
  }
  return total;
}
