/**
 * Wireless association info from `netsh wlan show interfaces`
 */

import { errorMessage } from '../core/errors';
import { Dependencies, ExecResult, WirelessInfoSource, WirelessQueryResult } from '../core/types';

const LOCATION_DENIED = /location permission/i;
const ELEVATION_ERROR = /error 5\b/i;
const ELEVATION_REQUIRED = /requires elevation/i;
const NO_ADAPTER = /there is no wireless interface|wireless autoconfig service \(wlansvc\) is not running/i;

/**
 * Classify netsh output: permission problems and a missing adapter are
 * reported as such rather than as failures
 */
export function classifyNetshResult(result: ExecResult): WirelessQueryResult {
  const text = `${result.stdout}\n${result.stderr}`;

  if (LOCATION_DENIED.test(text) || (ELEVATION_ERROR.test(text) && ELEVATION_REQUIRED.test(text))) {
    return { kind: 'denied', detail: text.trim().split(/\r?\n/)[0] };
  }
  if (NO_ADAPTER.test(text)) {
    return { kind: 'noAdapter' };
  }
  if (result.exitCode !== 0) {
    return { kind: 'failed', detail: `netsh exited with code ${result.exitCode}` };
  }
  return { kind: 'ok', output: result.stdout };
}

export class NetshWirelessSource implements WirelessInfoSource {
  constructor(private readonly deps: Pick<Dependencies, 'exec' | 'platform'>) {}

  async query(): Promise<WirelessQueryResult> {
    // TODO: read iw/nmcli on Linux and the airport utility on macOS
    if (this.deps.platform !== 'win32') {
      return { kind: 'noAdapter' };
    }
    try {
      return classifyNetshResult(await this.deps.exec('netsh', ['wlan', 'show', 'interfaces']));
    } catch (error) {
      return { kind: 'failed', detail: errorMessage(error) };
    }
  }
}
