/**
 * Known access points: friendly names, band/SSID details and the last
 * custom ping target, persisted as JSON
 */

import { errorMessage } from '../core/errors';
import { log } from '../core/logger';
import { DISCONNECTED_TEXT } from '../core/status';
import { ApDetails, Dependencies, LogSink, NamedApStore } from '../core/types';

export interface StoreData {
  bssidToName: Record<string, string>;
  bssidToDetails: Record<string, ApDetails>;
  lastCustomTarget: string | null;
}

export function createEmptyStoreData(): StoreData {
  return { bssidToName: {}, bssidToDetails: {}, lastCustomTarget: null };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accepts whatever is on disk and keeps only well-formed entries
 */
export function normalizeStoreData(raw: unknown): StoreData {
  const data = createEmptyStoreData();
  if (!isRecord(raw)) return data;

  if (isRecord(raw.bssidToName)) {
    for (const [bssid, name] of Object.entries(raw.bssidToName)) {
      if (typeof name === 'string' && name) data.bssidToName[bssid] = name;
    }
  }
  if (isRecord(raw.bssidToDetails)) {
    for (const [bssid, details] of Object.entries(raw.bssidToDetails)) {
      if (!isRecord(details)) continue;
      const entry: ApDetails = {};
      if (typeof details.band === 'string' && details.band) entry.band = details.band;
      if (typeof details.ssid === 'string' && details.ssid) entry.ssid = details.ssid;
      data.bssidToDetails[bssid] = entry;
    }
  }
  if (typeof raw.lastCustomTarget === 'string' && raw.lastCustomTarget.trim()) {
    data.lastCustomTarget = raw.lastCustomTarget.trim();
  }
  return data;
}

/**
 * "<name> (<band> - <ssid>)", or just the name when no details are known
 */
export function formatDisplayName(baseName: string, details: ApDetails | undefined): string {
  const parts = [details?.band, details?.ssid].filter((part): part is string => Boolean(part));
  return parts.length > 0 ? `${baseName} (${parts.join(' - ')})` : baseName;
}

export class KnownApStore implements NamedApStore {
  private data: StoreData = createEmptyStoreData();
  private writes: Promise<void> = Promise.resolve();

  constructor(
    private readonly file: string,
    private readonly deps: Pick<Dependencies, 'readFile' | 'writeFile'>,
    private readonly logger: LogSink = log.store
  ) {}

  /**
   * Load from disk; a missing or unreadable file starts an empty store
   */
  async load(): Promise<void> {
    let content: string;
    try {
      content = await this.deps.readFile(this.file);
    } catch (error) {
      this.logger.info({ file: this.file, err: errorMessage(error) }, 'no known access points file, starting empty');
      this.data = createEmptyStoreData();
      return;
    }

    try {
      this.data = normalizeStoreData(JSON.parse(content));
      this.logger.info({ file: this.file, count: Object.keys(this.data.bssidToName).length }, 'known access points loaded');
    } catch (error) {
      this.logger.error({ file: this.file, err: errorMessage(error) }, 'known access points file is invalid, using defaults');
      this.data = createEmptyStoreData();
    }
  }

  getDisplayName(bssid: string | null, includeDetails = true): string {
    if (!bssid) return DISCONNECTED_TEXT;
    const name = this.data.bssidToName[bssid] ?? bssid;
    return includeDetails ? formatDisplayName(name, this.data.bssidToDetails[bssid]) : name;
  }

  knownBssids(): string[] {
    return Object.keys(this.data.bssidToName);
  }

  /**
   * Remember a BSSID, filling in band/SSID details that are known
   */
  recordSeen(bssid: string, details: ApDetails = {}): Promise<void> {
    let changed = false;
    if (!(bssid in this.data.bssidToName)) {
      this.data.bssidToName[bssid] = bssid;
      this.logger.info({ bssid }, 'new access point');
      changed = true;
    }

    const current = this.data.bssidToDetails[bssid] ?? {};
    const next: ApDetails = {
      ...current,
      ...(details.band ? { band: details.band } : {}),
      ...(details.ssid ? { ssid: details.ssid } : {})
    };
    if (next.band !== current.band || next.ssid !== current.ssid || !(bssid in this.data.bssidToDetails)) {
      this.data.bssidToDetails[bssid] = next;
      changed = true;
    }

    return changed ? this.save() : Promise.resolve();
  }

  rename(bssid: string, name: string): Promise<void> {
    const trimmed = name.trim();
    if (!trimmed) {
      return Promise.reject(new Error('name must not be empty'));
    }
    if (!(bssid in this.data.bssidToName)) {
      return Promise.reject(new Error(`unknown access point: ${bssid}`));
    }
    this.data.bssidToName[bssid] = trimmed;
    this.logger.info({ bssid, name: trimmed }, 'access point renamed');
    return this.save();
  }

  forget(bssid: string): Promise<void> {
    if (!(bssid in this.data.bssidToName)) return Promise.resolve();
    delete this.data.bssidToName[bssid];
    delete this.data.bssidToDetails[bssid];
    this.logger.info({ bssid }, 'access point forgotten');
    return this.save();
  }

  getLastCustomTarget(): string | null {
    return this.data.lastCustomTarget;
  }

  setLastCustomTarget(value: string | null): Promise<void> {
    const next = value?.trim() || null;
    if (next === this.data.lastCustomTarget) return Promise.resolve();
    this.data.lastCustomTarget = next;
    return this.save();
  }

  /**
   * Writes are chained so the file always ends with the latest state
   */
  private save(): Promise<void> {
    const write = this.writes.then(() => this.deps.writeFile(this.file, JSON.stringify(this.data, null, 2)));
    this.writes = write.catch(() => undefined);
    return write;
  }
}
