/**
 * Status coordinator: the single owner of the fused network state.
 *
 * Gateway, topology and probe events arrive from independent timers and
 * notifications. Each handler mutates state synchronously, then rebuilds the
 * whole Status and hands it to the sink only once the mutation is complete.
 */

import { isIP } from 'net';
import { ContractError, DisposedError, errorMessage, ProbeError } from './errors';
import type { GatewayTracker } from './gatewayTracker';
import { log } from './logger';
import type { ProbeEngine } from './probeEngine';
import { buildStatus, statusEquals } from './status';
import type { TopologyTracker } from './topologyTracker';
import {
  Config,
  HostResolver,
  LastOutcome,
  LogSink,
  NamedApStore,
  PingTarget,
  ProbeOutcome,
  ResolvedAddress,
  Status,
  StatusSink,
  StatusView,
  TopologyState
} from './types';

export interface CoordinatorOptions {
  config: Config;
  gateway: GatewayTracker;
  topology: TopologyTracker;
  probe: ProbeEngine;
  store: NamedApStore;
  sink: StatusSink;
  resolveHost: HostResolver;
  logger?: LogSink;
}

export class StatusCoordinator {
  private readonly config: Config;
  private readonly gateway: GatewayTracker;
  private readonly topology: TopologyTracker;
  private readonly probe: ProbeEngine;
  private readonly store: NamedApStore;
  private readonly sink: StatusSink;
  private readonly resolveHost: HostResolver;
  private readonly logger: LogSink;

  private target: PingTarget = { kind: 'defaultGateway' };
  private resolved: ResolvedAddress = { address: null, resolutionError: false };
  private outcome: LastOutcome = { kind: 'pending' };
  private inTransition = false;
  /** Bumped on every target switch; late DNS answers for older targets are dropped */
  private targetGeneration = 0;

  private started = false;
  /** Set once the gateway tracker is up; no probes before that */
  private ready = false;
  private stopped = false;
  private probeTimer: NodeJS.Timeout | null = null;
  private transitionTimer: NodeJS.Timeout | null = null;
  private readonly subscriptions: Array<() => void> = [];
  private lastStatus: Status | null = null;

  constructor(options: CoordinatorOptions) {
    this.config = options.config;
    this.gateway = options.gateway;
    this.topology = options.topology;
    this.probe = options.probe;
    this.store = options.store;
    this.sink = options.sink;
    this.resolveHost = options.resolveHost;
    this.logger = options.logger ?? log.coordinator;

    this.subscriptions.push(
      this.gateway.events.on('gatewayChanged', (address) => this.onGatewayChanged(address)),
      this.gateway.events.on('networkAvailabilityChanged', (available) => this.onNetworkAvailabilityChanged(available)),
      this.topology.events.on('bssidChanged', (oldBssid, newBssid, initial) => this.onBssidChanged(oldBssid, newBssid, initial)),
      this.topology.events.on('signalStrengthChanged', () => this.publish()),
      this.topology.events.on('capabilityChanged', (enabled) => this.onCapabilityChanged(enabled)),
      this.probe.events.on('probeCompleted', (outcome) => this.onProbeCompleted(outcome)),
      this.probe.events.on('probeFailed', (error) => this.onProbeFailed(error))
    );
  }

  /**
   * Bring the gateway tracker up, restore the saved target, start polling and
   * probing. A gateway initialization failure is shown as INIT! and rethrown.
   */
  async start(): Promise<void> {
    this.throwIfStopped();
    if (this.started) return;
    this.started = true;
    this.logger.info('starting');

    const savedTarget = this.store.getLastCustomTarget();
    if (savedTarget) {
      this.target = { kind: 'customHost', userInput: savedTarget };
    }

    try {
      await this.gateway.initialize();
    } catch (error) {
      this.logger.error({ err: errorMessage(error) }, 'initialization failed');
      this.outcome = { kind: 'initError' };
      this.publish();
      throw error;
    }
    if (this.stopped) return;
    this.ready = true;

    if (this.target.kind === 'customHost') {
      this.logger.info({ host: this.target.userInput }, 'restoring custom target');
      await this.applyCustomHost(this.target.userInput, this.targetGeneration);
    } else {
      this.applyGatewayAddress(this.gateway.currentGateway());
      this.publish();
    }
    if (this.stopped) return;

    await this.topology.start();
    if (this.stopped) return;

    this.probeTimer = setInterval(() => this.requestProbe(), this.config.probeIntervalMs);
    this.requestProbe();
  }

  /**
   * Stop timers first, then release subscriptions and components in reverse
   * dependency order. Safe to call more than once.
   */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;

    if (this.probeTimer) clearInterval(this.probeTimer);
    if (this.transitionTimer) clearTimeout(this.transitionTimer);
    this.probeTimer = null;
    this.transitionTimer = null;

    for (const unsubscribe of this.subscriptions.splice(0)) {
      unsubscribe();
    }

    this.probe.dispose();
    this.topology.stop();
    this.gateway.dispose();
    this.logger.info('stopped');
  }

  useDefaultGateway(): void {
    this.throwIfStopped();
    this.targetGeneration++;
    this.target = { kind: 'defaultGateway' };
    this.outcome = { kind: 'pending' };
    this.applyGatewayAddress(this.gateway.currentGateway());
    this.logger.info({ gateway: this.resolved.address }, 'target switched to default gateway');
    this.publish();
    this.persistTarget(null);
    this.requestProbe();
  }

  /**
   * Switch to a user-chosen host. Resolves it (IPv4 first); an unresolvable
   * name is still probed as typed and reported as DNS?.
   */
  useCustomHost(input: string): Promise<void> {
    this.throwIfStopped();
    const host = input.trim();
    if (!host) {
      throw new ContractError('custom host must not be empty');
    }

    const generation = ++this.targetGeneration;
    this.target = { kind: 'customHost', userInput: host };
    this.resolved = { address: null, resolutionError: false };
    this.outcome = { kind: 'pending' };
    this.logger.info({ host }, 'target switched to custom host');
    this.publish();
    this.persistTarget(host);
    return this.applyCustomHost(host, generation);
  }

  currentTarget(): PingTarget {
    return { ...this.target };
  }

  resolvedAddress(): ResolvedAddress {
    return { ...this.resolved };
  }

  topologyState(): TopologyState {
    return { ...this.topology.current(), inTransition: this.inTransition };
  }

  status(): Status {
    return this.lastStatus ?? buildStatus(this.view());
  }

  // ─── Event handlers ───────────────────────────────────────────

  private onGatewayChanged(address: string | null): void {
    if (this.stopped) return;

    if (this.target.kind === 'customHost') {
      // Only the tooltip's gateway line depends on it
      this.publish();
      return;
    }

    this.applyGatewayAddress(address);
    if (address === null) {
      this.logger.info('gateway became unavailable');
    }
    this.publish();
    this.requestProbe();
  }

  private onNetworkAvailabilityChanged(available: boolean): void {
    if (this.stopped) return;

    if (available) {
      this.logger.info('network became available');
      if (this.outcome.kind !== 'unresolvable') {
        this.outcome = { kind: 'pending' };
      }
    } else {
      this.logger.info('network became unavailable');
    }
    this.publish();
  }

  private onBssidChanged(oldBssid: string | null, newBssid: string | null, initial: boolean): void {
    if (this.stopped) return;

    if (newBssid !== null) {
      const snapshot = this.topology.current();
      this.store
        .recordSeen(newBssid, { band: snapshot.band ?? undefined, ssid: snapshot.ssid ?? undefined })
        .catch((error) => this.logger.error({ err: errorMessage(error), bssid: newBssid }, 'failed to record access point'));
    }

    if (!initial) {
      this.logger.info({ from: oldBssid, to: newBssid }, 'entering transition window');
      this.inTransition = true;
      if (this.transitionTimer) clearTimeout(this.transitionTimer);
      this.transitionTimer = setTimeout(() => this.onTransitionElapsed(), this.config.transitionWindowMs);
    }

    // No probe here; the regular cadence rides the transition out
    this.publish();
  }

  private onTransitionElapsed(): void {
    this.transitionTimer = null;
    if (this.stopped) return;
    this.inTransition = false;
    this.publish();
    this.requestProbe();
  }

  private onCapabilityChanged(enabled: boolean): void {
    if (this.stopped) return;
    this.logger.info({ enabled }, 'wireless capability changed');
    this.publish();
  }

  private onProbeCompleted(outcome: ProbeOutcome): void {
    if (this.stopped) return;
    if (outcome.address !== this.resolved.address) {
      this.logger.debug({ address: outcome.address }, 'discarding result for previous target');
      return;
    }

    if (outcome.success) {
      this.outcome = { kind: 'success', roundTripMs: outcome.roundTripMs ?? 0 };
      if (!this.inTransition) {
        this.logger.debug({ address: outcome.address, rtt: outcome.roundTripMs }, 'probe ok');
      }
    } else {
      this.outcome = { kind: 'failed', failureKind: outcome.failureKind ?? 'other' };
      if (!this.inTransition) {
        this.logger.info({ address: outcome.address, failure: outcome.failureKind }, 'probe failed');
      }
    }
    this.publish();
  }

  private onProbeFailed(error: ProbeError): void {
    if (this.stopped) return;
    if (error.address !== this.resolved.address) {
      this.logger.debug({ address: error.address }, 'discarding error for previous target');
      return;
    }

    this.outcome =
      error.kind === 'dnsError' ? { kind: 'failed', failureKind: 'dnsError' } : { kind: 'error', message: error.message };
    if (!this.inTransition) {
      this.logger.error({ address: error.address, kind: error.kind, err: error.message }, 'probe error');
    }
    this.publish();
  }

  // ─── Internals ────────────────────────────────────────────────

  private applyGatewayAddress(address: string | null): void {
    this.resolved = { address, resolutionError: false };
    if (address === null) {
      this.outcome = { kind: 'noGateway' };
    } else if (this.outcome.kind === 'noGateway' || this.outcome.kind === 'unresolvable') {
      this.outcome = { kind: 'pending' };
    }
  }

  private async applyCustomHost(host: string, generation: number): Promise<void> {
    const resolved = await this.resolve(host);
    if (this.stopped || generation !== this.targetGeneration) return;

    this.resolved = resolved;
    this.outcome = resolved.resolutionError ? { kind: 'unresolvable' } : { kind: 'pending' };
    if (resolved.resolutionError) {
      this.logger.warn({ host }, 'custom host is unresolvable, probing it as typed');
    } else {
      this.logger.info({ host, address: resolved.address }, 'custom host resolved');
    }
    this.publish();
    this.requestProbe();
  }

  private async resolve(host: string): Promise<ResolvedAddress> {
    if (isIP(host) !== 0) {
      return { address: host, resolutionError: false };
    }
    try {
      const addresses = await this.resolveHost(host);
      const address = addresses.find((a) => isIP(a) === 4) ?? addresses.find((a) => isIP(a) === 6);
      if (address) {
        return { address, resolutionError: false };
      }
    } catch (error) {
      this.logger.debug({ host, err: errorMessage(error) }, 'dns lookup failed');
    }
    return { address: host, resolutionError: true };
  }

  private requestProbe(): void {
    if (this.stopped || !this.ready) return;
    const address = this.resolved.address;
    if (!address || !this.gateway.isNetworkAvailable()) return;

    try {
      this.probe.probe(address, this.config.probeTimeoutMs).catch((error) => {
        this.logger.error({ err: errorMessage(error) }, 'probe rejected');
      });
    } catch (error) {
      this.logger.error({ err: errorMessage(error) }, 'probe refused');
    }
  }

  private persistTarget(host: string | null): void {
    this.store
      .setLastCustomTarget(host)
      .catch((error) => this.logger.error({ err: errorMessage(error) }, 'failed to persist target'));
  }

  private displayName(bssid: string | null): string | null {
    if (bssid === null) return null;
    try {
      return this.store.getDisplayName(bssid);
    } catch (error) {
      this.logger.error({ err: errorMessage(error), bssid }, 'display name lookup failed');
      return bssid;
    }
  }

  private view(): StatusView {
    const topology = this.topologyState();
    return {
      target: this.target,
      resolved: this.resolved,
      // The tracker has not read availability yet
      gateway: this.ready ? this.gateway.state() : { address: null, networkAvailable: true },
      topology,
      outcome: this.outcome,
      apName: this.displayName(topology.bssid),
      previousApName: this.displayName(topology.previousBssid)
    };
  }

  private publish(): void {
    if (this.stopped) return;
    const status = buildStatus(this.view());
    if (this.lastStatus !== null && statusEquals(status, this.lastStatus)) return;
    this.lastStatus = status;

    try {
      this.sink.onStatusChanged(status);
    } catch (error) {
      this.logger.error({ err: errorMessage(error) }, 'status sink failed');
    }
  }

  private throwIfStopped(): void {
    if (this.stopped) {
      throw new DisposedError('StatusCoordinator');
    }
  }
}
