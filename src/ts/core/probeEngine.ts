/**
 * Single-flight liveness probe with failure escalation.
 *
 * Repeated failures usually mean the gateway moved rather than that the
 * destination is down, so once `failureThreshold` consecutive probes fail a
 * retry timer starts asking the gateway layer to re-discover every
 * `failureRetryIntervalMs`. A reported change resets the counter.
 */

import { assertPositiveInteger } from './config';
import { TypedEmitter } from './emitter';
import { ContractError, DisposedError, errorMessage, ProbeError } from './errors';
import type { GatewayRefresher } from './gatewayTracker';
import { log } from './logger';
import { Config, LogSink, Pinger, PingReply, ProbeOutcome } from './types';

export type ProbeEvents = {
  probeCompleted: [outcome: ProbeOutcome];
  probeFailed: [error: ProbeError];
};

type ProbeConfig = Pick<Config, 'probeDeadlineGraceMs' | 'failureThreshold' | 'failureRetryIntervalMs'>;

const DEADLINE = Symbol('deadline');

export class ProbeEngine {
  readonly events: TypedEmitter<ProbeEvents>;

  private inFlight = false;
  private disposed = false;
  private consecutiveFailures = 0;
  private retryTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly pinger: Pinger,
    private readonly gateway: GatewayRefresher,
    private readonly config: ProbeConfig,
    private readonly logger: LogSink = log.probe
  ) {
    this.events = new TypedEmitter<ProbeEvents>(logger);
  }

  get isProbing(): boolean {
    return this.inFlight;
  }

  get failureCount(): number {
    return this.consecutiveFailures;
  }

  get isEscalating(): boolean {
    return this.retryTimer !== null;
  }

  /**
   * Probe `address` once. A call made while another probe is outstanding is
   * dropped; the next scheduled probe supersedes it. Argument errors throw
   * synchronously.
   */
  probe(address: string, timeoutMs: number): Promise<void> {
    if (this.disposed) throw new DisposedError('ProbeEngine');
    if (!address || !address.trim()) throw new ContractError('address must not be empty');
    assertPositiveInteger('timeoutMs', timeoutMs);

    if (this.inFlight) return Promise.resolve();
    this.inFlight = true;
    return this.run(address, timeoutMs);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.stopRetryTimer();
    this.events.removeAllListeners();
  }

  private async run(address: string, timeoutMs: number): Promise<void> {
    try {
      const reply = await this.sendWithDeadline(address, timeoutMs);
      if (this.disposed) return;
      this.handleReply(address, reply);
    } catch (error) {
      if (this.disposed) return;
      this.handleError(address, error);
    } finally {
      this.inFlight = false;
    }
  }

  private async sendWithDeadline(address: string, timeoutMs: number): Promise<PingReply> {
    let deadline: NodeJS.Timeout | undefined;
    const expired = new Promise<typeof DEADLINE>((resolve) => {
      deadline = setTimeout(() => resolve(DEADLINE), timeoutMs + this.config.probeDeadlineGraceMs);
    });

    try {
      const result = await Promise.race([this.pinger.ping(address, timeoutMs), expired]);
      return result === DEADLINE ? { status: 'timeout' } : result;
    } finally {
      clearTimeout(deadline);
    }
  }

  private handleReply(address: string, reply: PingReply): void {
    if (reply.status === 'success') {
      this.consecutiveFailures = 0;
      this.stopRetryTimer();
      this.events.emit('probeCompleted', { address, success: true, roundTripMs: reply.roundTripMs });
      return;
    }

    this.recordFailure();
    this.events.emit('probeCompleted', { address, success: false, failureKind: reply.status });
  }

  private handleError(address: string, error: unknown): void {
    const probeError =
      error instanceof ProbeError ? error : new ProbeError('other', address, errorMessage(error));
    this.recordFailure();
    this.events.emit('probeFailed', probeError);
  }

  private recordFailure(): void {
    this.consecutiveFailures++;
    if (this.consecutiveFailures >= this.config.failureThreshold && this.retryTimer === null) {
      this.logger.warn({ failures: this.consecutiveFailures }, 'probe failures reached threshold, escalating to gateway refresh');
      this.retryTimer = setInterval(() => {
        this.onRetryTick().catch((err) => {
          this.logger.error({ err: errorMessage(err) }, 'gateway refresh after probe failures failed');
        });
      }, this.config.failureRetryIntervalMs);
    }
  }

  private async onRetryTick(): Promise<void> {
    if (this.disposed || this.consecutiveFailures < this.config.failureThreshold) return;

    const changed = await this.gateway.forceRefresh();
    if (this.disposed) return;
    if (changed) {
      this.logger.info('gateway changed after repeated failures, resetting failure count');
      this.consecutiveFailures = 0;
      this.stopRetryTimer();
    }
  }

  private stopRetryTimer(): void {
    if (this.retryTimer) clearInterval(this.retryTimer);
    this.retryTimer = null;
  }
}
