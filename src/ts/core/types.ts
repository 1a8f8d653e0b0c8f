/**
 * Core types for the linkwatch engine
 */

import type { NetworkInterfaceInfo as OsInterfaceAddress } from 'os';
import type { Logger } from 'pino';

/**
 * Gateway facts published by the gateway tracker
 */
export interface GatewayState {
  /** Default gateway address, null while unknown or while the network is down */
  address: string | null;
  /** Whether the OS reports any usable network */
  networkAvailable: boolean;
}

/**
 * Wireless association as seen by the topology tracker
 */
export interface TopologyState {
  bssid: string | null;
  previousBssid: string | null;
  ssid: string | null;
  band: string | null;
  channel: number;
  radioType: string | null;
  /** Signal quality, 0-100 */
  signalPercent: number;
  /** True for the transition window after a BSSID change */
  inTransition: boolean;
  /** False while the platform denies wireless queries */
  capabilityEnabled: boolean;
  /** False once the session has seen that no wireless adapter exists */
  adapterPresent: boolean;
}

/**
 * Target the coordinator probes
 */
export type PingTarget =
  | { kind: 'defaultGateway' }
  | { kind: 'customHost'; userInput: string };

/**
 * Literal address actually probed for the active target
 */
export interface ResolvedAddress {
  address: string | null;
  /** Set when a custom host could not be resolved and the raw name is probed */
  resolutionError: boolean;
}

export type FailureKind = 'timeout' | 'unreachable' | 'dnsError' | 'other';

export interface ProbeOutcome {
  /** Address the probe was sent to */
  address: string;
  success: boolean;
  roundTripMs?: number;
  failureKind?: FailureKind;
}

/**
 * Fused status handed to the presentation layer
 */
export interface Status {
  displayText: string;
  tooltipLines: string[];
  isError: boolean;
  isTransition: boolean;
  useDarkText: boolean;
}

/**
 * Last thing the coordinator learned about the target
 */
export type LastOutcome =
  | { kind: 'pending' }
  | { kind: 'success'; roundTripMs: number }
  | { kind: 'failed'; failureKind: FailureKind }
  | { kind: 'error'; message: string }
  | { kind: 'noGateway' }
  | { kind: 'unresolvable' }
  | { kind: 'initError' };

/**
 * Everything the status builder needs (pure data, no side effects)
 */
export interface StatusView {
  target: PingTarget;
  resolved: ResolvedAddress;
  gateway: GatewayState;
  topology: TopologyState;
  outcome: LastOutcome;
  /** Display name of the current AP, null when not associated */
  apName: string | null;
  /** Display name of the AP before the last transition */
  previousApName: string | null;
}

/**
 * Tunables, all in milliseconds unless named otherwise
 */
export interface Config {
  probeIntervalMs: number;
  probeTimeoutMs: number;
  /** Extra time a probe gets past its own timeout before the hard deadline */
  probeDeadlineGraceMs: number;
  transitionWindowMs: number;
  gatewayPollIntervalMs: number;
  /** Delay between "network available" and the gateway refresh */
  gatewayStabilizationDelayMs: number;
  topologyPollIntervalMs: number;
  /** Consecutive failed probes before gateway re-discovery kicks in */
  failureThreshold: number;
  failureRetryIntervalMs: number;
  /** Signal movement, in percentage points, that counts as a change */
  signalChangeThreshold: number;
  networkChangePollIntervalMs: number;
}

// ─── Collaborators ──────────────────────────────────────────────

/**
 * The slice of a pino logger the engine uses
 */
export type LogSink = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Receives the fused status; must not block
 */
export interface StatusSink {
  onStatusChanged(status: Status): void;
}

export interface ApDetails {
  band?: string;
  ssid?: string;
}

/**
 * Naming and persistence of access points and the user's custom target
 */
export interface NamedApStore {
  getDisplayName(bssid: string | null): string;
  recordSeen(bssid: string, details?: ApDetails): Promise<void>;
  getLastCustomTarget(): string | null;
  setLastCustomTarget(value: string | null): Promise<void>;
}

/**
 * One network interface as reported by the platform
 */
export interface NetworkInterfaceInfo {
  name: string;
  /** Stable ordering key (OS interface index) */
  index: number;
  up: boolean;
  loopback: boolean;
  ipv4: boolean;
  gateways: string[];
  /** Link speed in Mbit/s, null when the platform does not say */
  speedMbps: number | null;
}

export interface InterfaceSource {
  list(): Promise<NetworkInterfaceInfo[]>;
}

export interface NetworkChangeListener {
  onAvailabilityChanged(available: boolean): void;
  onAddressChanged(): void;
}

/**
 * OS network change notifications
 */
export interface NetworkChangeSource {
  isNetworkAvailable(): boolean;
  /** Returns the unsubscribe function */
  subscribe(listener: NetworkChangeListener): () => void;
}

export type WirelessQueryResult =
  | { kind: 'ok'; output: string }
  | { kind: 'denied'; detail: string }
  | { kind: 'noAdapter' }
  | { kind: 'failed'; detail: string };

export interface WirelessInfoSource {
  query(): Promise<WirelessQueryResult>;
}

export type PingReply =
  | { status: 'success'; roundTripMs: number }
  | { status: 'timeout' }
  | { status: 'unreachable' };

/**
 * Sends one echo request; throws ProbeError when it cannot be sent at all
 */
export interface Pinger {
  ping(address: string, timeoutMs: number): Promise<PingReply>;
}

/**
 * Returns every address the host name resolves to
 */
export type HostResolver = (host: string) => Promise<string[]>;

/**
 * Result of running an external command
 */
export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Dependencies injected into the platform collaborators (for testing)
 */
export interface Dependencies {
  /** Run a command without a shell */
  exec: (file: string, args: string[]) => Promise<ExecResult>;
  /** Read a file */
  readFile: (path: string) => Promise<string>;
  /** Write a file */
  writeFile: (path: string, content: string) => Promise<void>;
  /** Local interfaces, as in os.networkInterfaces() */
  networkInterfaces: () => NodeJS.Dict<OsInterfaceAddress[]>;
  /** Host platform, as in process.platform */
  platform: NodeJS.Platform;
}
