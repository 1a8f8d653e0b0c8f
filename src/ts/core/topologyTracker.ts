/**
 * Wireless association polling: BSSID, SSID, band, signal
 */

import { TypedEmitter } from './emitter';
import { errorMessage } from './errors';
import { log } from './logger';
import { createEmptyTopology } from './status';
import { Config, LogSink, TopologyState, WirelessInfoSource, WirelessQueryResult } from './types';
import { parseWirelessOutput, WirelessReading } from './wirelessParser';

export type TopologyEvents = {
  /** `initial` is set for the first association seen since start() */
  bssidChanged: [oldBssid: string | null, newBssid: string | null, initial: boolean];
  signalStrengthChanged: [signalPercent: number];
  capabilityChanged: [enabled: boolean];
};

export class TopologyTracker {
  readonly events: TypedEmitter<TopologyEvents>;

  private state: TopologyState = createEmptyTopology();
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private checking = false;
  private seenAssociation = false;

  constructor(
    private readonly source: WirelessInfoSource,
    private readonly config: Pick<Config, 'topologyPollIntervalMs' | 'signalChangeThreshold'>,
    private readonly logger: LogSink = log.topology
  ) {
    this.events = new TypedEmitter<TopologyEvents>(logger);
  }

  /**
   * Check once now, then every topologyPollIntervalMs. Calling it again is a no-op.
   */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.state = createEmptyTopology();
    this.seenAssociation = false;
    this.logger.info('starting wireless monitoring');

    await this.check();
    if (!this.running || !this.state.adapterPresent) return;

    this.timer = setInterval(() => {
      this.check().catch((error) => {
        this.logger.error({ err: errorMessage(error) }, 'wireless check failed');
      });
    }, this.config.topologyPollIntervalMs);
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.clearTimer();
    this.logger.info('wireless monitoring stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  current(): TopologyState {
    return { ...this.state };
  }

  /**
   * One poll. Overlapping ticks are skipped while a query is outstanding.
   */
  async check(): Promise<void> {
    if (!this.running || this.checking || !this.state.adapterPresent) return;
    this.checking = true;
    try {
      let result: WirelessQueryResult;
      try {
        result = await this.source.query();
      } catch (error) {
        this.logger.error({ err: errorMessage(error) }, 'wireless query threw');
        return;
      }
      if (!this.running) return;
      this.apply(result);
    } finally {
      this.checking = false;
    }
  }

  private apply(result: WirelessQueryResult): void {
    switch (result.kind) {
      case 'denied':
        if (this.state.capabilityEnabled) {
          this.state = { ...this.state, capabilityEnabled: false };
          this.logger.warn({ detail: result.detail }, 'wireless query denied, location permission or elevation required');
          this.events.emit('capabilityChanged', false);
        }
        return;
      case 'noAdapter':
        this.state = { ...this.state, adapterPresent: false, capabilityEnabled: false };
        this.clearTimer();
        this.logger.info('no wireless interface, topology tracking disabled for this session');
        this.events.emit('capabilityChanged', false);
        return;
      case 'failed':
        this.logger.error({ detail: result.detail }, 'wireless query failed');
        return;
      case 'ok':
        break;
    }

    if (!this.state.capabilityEnabled) {
      this.state = { ...this.state, capabilityEnabled: true };
      this.logger.info('wireless query allowed again');
      this.events.emit('capabilityChanged', true);
    }

    let reading: WirelessReading;
    try {
      reading = parseWirelessOutput(result.output);
    } catch (error) {
      this.logger.error({ err: errorMessage(error) }, 'failed to parse wireless output');
      return;
    }
    this.applyReading(reading);
  }

  private applyReading(reading: WirelessReading): void {
    const current = this.state;

    if (reading.bssid !== current.bssid) {
      const initial = reading.bssid !== null && !this.seenAssociation;
      if (reading.bssid !== null) this.seenAssociation = true;

      this.state = {
        ...current,
        ...reading,
        previousBssid: current.bssid
      };
      if (reading.bssid === null) {
        this.logger.info({ from: current.bssid }, 'wifi connection lost');
      } else if (initial) {
        this.logger.info(
          { bssid: reading.bssid, ssid: reading.ssid, band: reading.band, channel: reading.channel },
          'initial association'
        );
      } else {
        this.logger.info(
          {
            from: { bssid: current.bssid, ssid: current.ssid, band: current.band, channel: current.channel },
            to: { bssid: reading.bssid, ssid: reading.ssid, band: reading.band, channel: reading.channel }
          },
          'access point transition'
        );
      }
      this.events.emit('bssidChanged', current.bssid, reading.bssid, initial);
      return;
    }

    if (reading.bssid === null) return;

    if (Math.abs(reading.signalPercent - current.signalPercent) > this.config.signalChangeThreshold) {
      this.state = { ...current, ...reading, previousBssid: current.previousBssid };
      this.logger.info({ from: current.signalPercent, to: reading.signalPercent }, 'signal strength changed');
      this.events.emit('signalStrengthChanged', reading.signalPercent);
      return;
    }

    if (
      reading.channel !== current.channel ||
      reading.band !== current.band ||
      reading.ssid !== current.ssid ||
      reading.radioType !== current.radioType
    ) {
      this.logger.info(
        { bssid: reading.bssid, channel: reading.channel, band: reading.band, ssid: reading.ssid },
        'network details changed'
      );
      // Signal jitter inside the threshold is not surfaced
      this.state = { ...current, ...reading, signalPercent: current.signalPercent, previousBssid: current.previousBssid };
    }
  }

  private clearTimer(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }
}
