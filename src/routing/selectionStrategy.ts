import {
  Endpoint,
  ProbeMode,
  ProbeResult,
  SelectionInput,
  SelectionMode,
} from '../types/index.js';
import { NoReachableCandidate, SelectionOutOfRange } from '../utils/errors.js';

/**
 * Which probe a mode needs before it can choose, if any
 */
export function probeModeFor(mode: SelectionMode): ProbeMode | undefined {
  switch (mode) {
    case 'lowest-latency':
      return 'latency';
    case 'first-responsive':
    case 'all-responsive':
      return 'presence';
    case 'manual':
    case 'all':
      return undefined;
  }
}

export function sameEndpoint(a: Endpoint, b: Endpoint): boolean {
  return a.hostname === b.hostname && a.ip === b.ip;
}

function resultFor(endpoint: Endpoint, results: ProbeResult[] | undefined): ProbeResult | undefined {
  return results?.find(result => sameEndpoint(result.endpoint, endpoint));
}

function regionOf(candidates: Endpoint[]): string {
  return candidates.length > 0 ? candidates[0].regionId : 'unknown';
}

/**
 * Pick the candidates at the given positions of the enumerated list
 */
export function selectManual(candidates: Endpoint[], indices: number[]): Endpoint[] {
  const chosen: number[] = [];
  for (const index of indices) {
    if (!Number.isInteger(index) || index < 0 || index >= candidates.length) {
      throw new SelectionOutOfRange(index, candidates.length);
    }
    if (!chosen.includes(index)) {
      chosen.push(index);
    }
  }
  return chosen.map(index => candidates[index]);
}

/**
 * First candidate, in list order, that answered its probe
 */
export function selectFirstResponsive(candidates: Endpoint[], results: ProbeResult[] | undefined): Endpoint {
  const found = candidates.find(candidate => resultFor(candidate, results)?.reachable === true);
  if (!found) {
    throw new NoReachableCandidate(regionOf(candidates));
  }
  return found;
}

/**
 * Reachable candidate with the strictly smallest latency.
 * Equal latencies keep the earlier-listed candidate.
 */
export function selectLowestLatency(candidates: Endpoint[], results: ProbeResult[] | undefined): Endpoint {
  let best: Endpoint | undefined;
  let bestLatency = Number.POSITIVE_INFINITY;

  for (const candidate of candidates) {
    const result = resultFor(candidate, results);
    if (!result?.reachable || result.latencyMillis === undefined) continue;

    if (result.latencyMillis < bestLatency) {
      best = candidate;
      bestLatency = result.latencyMillis;
    }
  }

  if (!best) {
    throw new NoReachableCandidate(regionOf(candidates));
  }
  return best;
}

/**
 * Every candidate that answered its probe, in list order
 */
export function selectAllResponsive(candidates: Endpoint[], results: ProbeResult[] | undefined): Endpoint[] {
  const responsive = candidates.filter(candidate => resultFor(candidate, results)?.reachable === true);
  if (responsive.length === 0) {
    throw new NoReachableCandidate(regionOf(candidates));
  }
  return responsive;
}

/**
 * Choose the endpoints to provision.
 * Automatic modes are applied to one region's candidates at a time;
 * manual selection may be given a list spanning several regions.
 */
export function select(
  candidates: Endpoint[],
  results: ProbeResult[] | undefined,
  mode: SelectionMode,
  selectionInput: SelectionInput = {}
): Endpoint[] {
  switch (mode) {
    case 'manual':
      return selectManual(candidates, selectionInput.indices ?? []);
    case 'first-responsive':
      return [selectFirstResponsive(candidates, results)];
    case 'lowest-latency':
      return [selectLowestLatency(candidates, results)];
    case 'all':
      if (candidates.length === 0) {
        throw new NoReachableCandidate(regionOf(candidates));
      }
      return [...candidates];
    case 'all-responsive':
      return selectAllResponsive(candidates, results);
  }
}
