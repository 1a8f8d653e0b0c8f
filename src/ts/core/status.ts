/**
 * Pure status builder
 * No side effects - the fused Status is derived from the view alone
 */

import { FailureKind, LastOutcome, PingTarget, ResolvedAddress, Status, StatusView, TopologyState } from './types';

/**
 * Short codes shown in place of a round-trip time
 */
export const STATUS_CODES = {
  pending: '--',
  failed: 'X',
  error: '!',
  noGateway: 'GW?',
  networkOff: 'OFF',
  hostNetworkOff: 'NET',
  unresolvable: 'DNS?',
  initError: 'INIT!'
} as const;

export const DISCONNECTED_TEXT = 'Not Connected';

const FAILURE_TEXT: Record<FailureKind, string> = {
  timeout: 'Timed out',
  unreachable: 'Unreachable',
  dnsError: 'DNS error',
  other: 'Failed'
};

/**
 * Label for the probed target, e.g. "Gateway 192.168.1.1" or "example.com (93.184.216.34)"
 */
export function formatTargetLabel(target: PingTarget, resolved: ResolvedAddress): string {
  if (target.kind === 'defaultGateway') {
    return `Gateway ${resolved.address ?? 'unknown'}`;
  }
  if (resolved.address === null || resolved.address === target.userInput) {
    return target.userInput;
  }
  return `${target.userInput} (${resolved.address})`;
}

function describeOutcome(view: StatusView): { displayText: string; line: string; isError: boolean } {
  const label = formatTargetLabel(view.target, view.resolved);

  if (!view.gateway.networkAvailable) {
    return {
      displayText: view.target.kind === 'defaultGateway' ? STATUS_CODES.networkOff : STATUS_CODES.hostNetworkOff,
      line: 'Error: network unavailable',
      isError: true
    };
  }

  const outcome: LastOutcome = view.outcome;
  switch (outcome.kind) {
    case 'pending':
      return { displayText: STATUS_CODES.pending, line: 'Initializing...', isError: false };
    case 'success':
      return { displayText: String(outcome.roundTripMs), line: `${label}: ${outcome.roundTripMs}ms`, isError: false };
    case 'failed':
      if (view.resolved.resolutionError) {
        return unresolvable(view.target);
      }
      return { displayText: STATUS_CODES.failed, line: `${label}: ${FAILURE_TEXT[outcome.failureKind]}`, isError: true };
    case 'error':
      if (view.resolved.resolutionError) {
        return unresolvable(view.target);
      }
      return { displayText: STATUS_CODES.error, line: `${label}: Ping error (${outcome.message})`, isError: true };
    case 'noGateway':
      return { displayText: STATUS_CODES.noGateway, line: 'Error: no gateway', isError: true };
    case 'unresolvable':
      return unresolvable(view.target);
    case 'initError':
      return { displayText: STATUS_CODES.initError, line: 'Error: initialization failed', isError: true };
  }
}

function unresolvable(target: PingTarget): { displayText: string; line: string; isError: boolean } {
  const host = target.kind === 'customHost' ? target.userInput : 'target';
  return { displayText: STATUS_CODES.unresolvable, line: `${host}: unresolvable (DNS)`, isError: true };
}

function topologyLines(topology: TopologyState, apName: string | null, previousApName: string | null): string[] {
  const lines: string[] = [];

  if (!topology.adapterPresent) {
    return lines;
  }
  if (!topology.capabilityEnabled) {
    lines.push('Wi-Fi: location permission required');
    return lines;
  }
  if (topology.bssid !== null) {
    lines.push(`AP: ${apName ?? topology.bssid}`);
    if (topology.signalPercent > 0) {
      lines.push(`Signal: ${topology.signalPercent}%`);
    }
  }
  if (topology.inTransition) {
    lines.push(`Roaming: ${previousApName ?? DISCONNECTED_TEXT} -> ${apName ?? DISCONNECTED_TEXT}`);
  }
  return lines;
}

/**
 * Core status function: fuse target, gateway, topology and last outcome
 * This is a pure function with no side effects
 */
export function buildStatus(view: StatusView): Status {
  const { displayText, line, isError } = describeOutcome(view);
  const tooltipLines = [line];

  if (view.target.kind === 'customHost') {
    tooltipLines.push(`Gateway: ${view.gateway.address ?? 'none'}`);
  }

  // Topology display is cleared while the network is down
  const networkUp = view.gateway.networkAvailable;
  if (networkUp) {
    tooltipLines.push(...topologyLines(view.topology, view.apName, view.previousApName));
  }

  const isTransition = networkUp && view.topology.inTransition;

  return {
    displayText,
    tooltipLines,
    isError,
    isTransition,
    useDarkText: isTransition && !isError
  };
}

export function statusEquals(a: Status, b: Status): boolean {
  return (
    a.displayText === b.displayText &&
    a.isError === b.isError &&
    a.isTransition === b.isTransition &&
    a.useDarkText === b.useDarkText &&
    a.tooltipLines.length === b.tooltipLines.length &&
    a.tooltipLines.every((line, i) => line === b.tooltipLines[i])
  );
}

/**
 * Empty topology, as at monitor start
 */
export function createEmptyTopology(): TopologyState {
  return {
    bssid: null,
    previousBssid: null,
    ssid: null,
    band: null,
    channel: 0,
    radioType: null,
    signalPercent: 0,
    inTransition: false,
    capabilityEnabled: true,
    adapterPresent: true
  };
}
