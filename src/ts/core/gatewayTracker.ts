/**
 * Default gateway discovery and network availability tracking
 */

import { TypedEmitter } from './emitter';
import { DisposedError, errorMessage } from './errors';
import { log } from './logger';
import {
  Config,
  GatewayState,
  InterfaceSource,
  LogSink,
  NetworkChangeSource,
  NetworkInterfaceInfo
} from './types';

export type GatewayEvents = {
  gatewayChanged: [address: string | null];
  networkAvailabilityChanged: [available: boolean];
};

const UNSPECIFIED_IPV4 = '0.0.0.0';
const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

function isUsableGateway(address: string): boolean {
  const match = IPV4_PATTERN.exec(address);
  if (!match) return false;
  if (match.slice(1).some((octet) => Number(octet) > 255)) return false;
  return address !== UNSPECIFIED_IPV4;
}

/**
 * Pick the default gateway: up, non-loopback, IPv4 interfaces with a real
 * gateway, fastest link first, interface index breaking ties
 */
export function selectDefaultGateway(interfaces: NetworkInterfaceInfo[]): string | null {
  const candidates = interfaces
    .filter((ni) => ni.up && !ni.loopback && ni.ipv4 && ni.gateways.some(isUsableGateway))
    .sort((a, b) => (b.speedMbps ?? 0) - (a.speedMbps ?? 0) || a.index - b.index);

  for (const candidate of candidates) {
    const gateway = candidate.gateways.find(isUsableGateway);
    if (gateway) {
      return gateway;
    }
  }
  return null;
}

/**
 * Anything that can be asked to re-discover the gateway
 */
export interface GatewayRefresher {
  forceRefresh(): Promise<boolean>;
}

export class GatewayTracker implements GatewayRefresher {
  readonly events: TypedEmitter<GatewayEvents>;

  private address: string | null = null;
  private networkAvailable = false;
  private initialized = false;
  private disposed = false;
  private unsubscribe: (() => void) | null = null;
  private pollTimer: NodeJS.Timeout | null = null;
  private stabilizationTimer: NodeJS.Timeout | null = null;
  /** Serializes discoveries so results land in request order */
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly interfaces: InterfaceSource,
    private readonly changes: NetworkChangeSource,
    private readonly config: Pick<Config, 'gatewayPollIntervalMs' | 'gatewayStabilizationDelayMs'>,
    private readonly logger: LogSink = log.gateway
  ) {
    this.events = new TypedEmitter<GatewayEvents>(logger);
  }

  /**
   * One discovery, then start listening and polling.
   * Only a failure to subscribe to change notifications propagates.
   */
  async initialize(): Promise<void> {
    this.throwIfDisposed();
    if (this.initialized) return;
    this.initialized = true;

    this.networkAvailable = this.changes.isNetworkAvailable();
    await this.refresh(false);
    if (this.disposed) return;

    this.unsubscribe = this.changes.subscribe({
      onAvailabilityChanged: (available) => this.handleAvailabilityChanged(available),
      onAddressChanged: () => {
        if (this.disposed) return;
        this.refresh(false).catch((error) => this.logFailure(error));
      }
    });

    this.pollTimer = setInterval(() => {
      if (this.disposed) return;
      this.refresh(false).catch((error) => this.logFailure(error));
    }, this.config.gatewayPollIntervalMs);

    this.logger.info({ gateway: this.address, networkAvailable: this.networkAvailable }, 'gateway monitoring started');
  }

  currentGateway(): string | null {
    return this.address;
  }

  isNetworkAvailable(): boolean {
    return this.networkAvailable;
  }

  state(): GatewayState {
    return { address: this.address, networkAvailable: this.networkAvailable };
  }

  /**
   * Re-discover now; always re-emits gatewayChanged. Resolves to whether the address changed.
   */
  forceRefresh(): Promise<boolean> {
    this.throwIfDisposed();
    return this.refresh(true);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    if (this.pollTimer) clearInterval(this.pollTimer);
    if (this.stabilizationTimer) clearTimeout(this.stabilizationTimer);
    this.pollTimer = null;
    this.stabilizationTimer = null;

    this.unsubscribe?.();
    this.unsubscribe = null;
    this.events.removeAllListeners();
    this.logger.info('gateway monitoring stopped');
  }

  private refresh(force: boolean): Promise<boolean> {
    const run = this.queue.then(() => this.discoverAndApply(force));
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async discoverAndApply(force: boolean): Promise<boolean> {
    if (this.disposed) return false;

    let discovered: string | null = null;
    try {
      discovered = selectDefaultGateway(await this.interfaces.list());
    } catch (error) {
      this.logger.warn({ err: errorMessage(error) }, 'gateway discovery failed, treating as no gateway');
    }
    if (this.disposed) return false;

    // A down network never has a gateway
    const next = this.networkAvailable ? discovered : null;
    const changed = next !== this.address;
    this.address = next;

    if (changed) {
      this.logger.info({ gateway: next }, 'gateway changed');
    }
    if (changed || force) {
      this.events.emit('gatewayChanged', next);
    }
    return changed;
  }

  private handleAvailabilityChanged(available: boolean): void {
    if (this.disposed || available === this.networkAvailable) return;
    this.networkAvailable = available;
    this.logger.info({ available }, 'network availability changed');

    if (!available) {
      if (this.stabilizationTimer) clearTimeout(this.stabilizationTimer);
      this.stabilizationTimer = null;
      const hadGateway = this.address !== null;
      this.address = null;
      this.events.emit('networkAvailabilityChanged', false);
      if (hadGateway) {
        this.events.emit('gatewayChanged', null);
      }
      return;
    }

    this.events.emit('networkAvailabilityChanged', true);
    // Interfaces can report "up" before their gateway is configured
    if (this.stabilizationTimer) clearTimeout(this.stabilizationTimer);
    this.stabilizationTimer = setTimeout(() => {
      this.stabilizationTimer = null;
      if (this.disposed) return;
      this.refresh(true).catch((error) => this.logFailure(error));
    }, this.config.gatewayStabilizationDelayMs);
  }

  private logFailure(error: unknown): void {
    this.logger.error({ err: errorMessage(error) }, 'gateway refresh failed');
  }

  private throwIfDisposed(): void {
    if (this.disposed) {
      throw new DisposedError('GatewayTracker');
    }
  }
}
