/**
 * Network change notifications derived from polling os.networkInterfaces().
 * Node has no OS-level change event, so availability and address changes are
 * detected by comparing successive snapshots.
 */

import { Dependencies, NetworkChangeListener, NetworkChangeSource } from '../core/types';

interface Snapshot {
  available: boolean;
  /** Sorted "name/address" pairs of every external address */
  signature: string;
}

function isUsableAddress(address: { address: string; family: string; internal: boolean }): boolean {
  if (address.internal) return false;
  // Link-local IPv6 exists on interfaces without any real connectivity
  return !(address.family === 'IPv6' && address.address.toLowerCase().startsWith('fe80:'));
}

export function takeSnapshot(interfaces: ReturnType<Dependencies['networkInterfaces']>): Snapshot {
  const entries: string[] = [];
  for (const [name, addresses] of Object.entries(interfaces)) {
    for (const address of addresses ?? []) {
      if (isUsableAddress(address)) {
        entries.push(`${name}/${address.address}`);
      }
    }
  }
  entries.sort();
  return { available: entries.length > 0, signature: entries.join(',') };
}

export class PollingNetworkChangeSource implements NetworkChangeSource {
  private readonly listeners = new Set<NetworkChangeListener>();
  private timer: NodeJS.Timeout | null = null;
  private last: Snapshot;

  constructor(
    private readonly deps: Pick<Dependencies, 'networkInterfaces'>,
    private readonly intervalMs: number
  ) {
    this.last = takeSnapshot(deps.networkInterfaces());
  }

  /** Reads the live interface list; the polled snapshot is left alone */
  isNetworkAvailable(): boolean {
    return takeSnapshot(this.deps.networkInterfaces()).available;
  }

  subscribe(listener: NetworkChangeListener): () => void {
    this.listeners.add(listener);
    if (this.timer === null) {
      this.timer = setInterval(() => this.poll(), this.intervalMs);
    }
    return () => {
      this.listeners.delete(listener);
      if (this.listeners.size === 0 && this.timer !== null) {
        clearInterval(this.timer);
        this.timer = null;
      }
    };
  }

  poll(): void {
    const next = takeSnapshot(this.deps.networkInterfaces());
    const previous = this.last;
    this.last = next;

    if (next.available !== previous.available) {
      for (const listener of [...this.listeners]) listener.onAvailabilityChanged(next.available);
    } else if (next.signature !== previous.signature) {
      for (const listener of [...this.listeners]) listener.onAddressChanged();
    }
  }
}
