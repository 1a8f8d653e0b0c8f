/**
 * Parser for `netsh wlan show interfaces` style output.
 * Every field is matched on its own; a field that is missing or malformed
 * falls back to null/0 without affecting the others.
 */

export interface WirelessReading {
  bssid: string | null;
  ssid: string | null;
  band: string | null;
  channel: number;
  radioType: string | null;
  signalPercent: number;
}

const BSSID_PATTERN = /^\s*(?:AP\s+)?BSSID\s*:\s*([0-9A-Fa-f]{2}(?:[:-][0-9A-Fa-f]{2}){5})\s*$/im;
const SSID_PATTERN = /^\s*SSID\s*:\s*(.+?)\s*$/im;
const SIGNAL_PATTERN = /^\s*Signal\s*:\s*(\d+)\s*%/im;
const CHANNEL_PATTERN = /^\s*Channel\s*:\s*(\d+)/im;
const BAND_PATTERN = /^\s*Band\s*:\s*(.+?)\s*$/im;
const RADIO_PATTERN = /^\s*Radio type\s*:\s*(.+?)\s*$/im;
const STATE_PATTERN = /^\s*State\s*:\s*(.+?)\s*$/im;

function matchText(output: string, pattern: RegExp): string | null {
  const match = pattern.exec(output);
  const value = match?.[1]?.trim();
  return value ? value : null;
}

function matchInt(output: string, pattern: RegExp): number {
  const text = matchText(output, pattern);
  if (text === null) return 0;
  const value = parseInt(text, 10);
  return Number.isFinite(value) ? value : 0;
}

export function normalizeBssid(raw: string): string {
  return raw.replace(/-/g, ':').toUpperCase();
}

/**
 * Band as reported, otherwise derived from the channel number
 */
export function bandForChannel(channel: number): string | null {
  if (channel <= 0) return null;
  return channel <= 14 ? '2.4 GHz' : '5 GHz';
}

export function parseWirelessOutput(output: string): WirelessReading {
  const state = matchText(output, STATE_PATTERN);
  const rawBssid = matchText(output, BSSID_PATTERN);
  // "State : disconnected" can still carry a stale BSSID line on some drivers
  const associated = state === null || state.toLowerCase() === 'connected';
  const bssid = associated && rawBssid !== null ? normalizeBssid(rawBssid) : null;
  const channel = matchInt(output, CHANNEL_PATTERN);

  return {
    bssid,
    ssid: bssid ? matchText(output, SSID_PATTERN) : null,
    band: bssid ? matchText(output, BAND_PATTERN) ?? bandForChannel(channel) : null,
    channel: bssid ? channel : 0,
    radioType: bssid ? matchText(output, RADIO_PATTERN) : null,
    signalPercent: bssid ? Math.min(100, matchInt(output, SIGNAL_PATTERN)) : 0
  };
}
