/**
 * Liveness probe through the system `ping` command
 */

import { ProbeError, errorMessage } from '../core/errors';
import { Dependencies, ExecResult, Pinger, PingReply } from '../core/types';

const DNS_FAILURE = /unknown host|could not find host|name or service not known|cannot resolve|temporary failure in name resolution|nodename nor servname/i;
const UNREACHABLE = /destination (?:host|net|network|port) unreachable|host unreachable|network is unreachable/i;
const ROUND_TRIP = /time\s*([=<])\s*([\d.]+)\s*ms/i;

/**
 * Arguments for a single echo request with the given timeout
 */
export function buildPingArgs(platform: NodeJS.Platform, address: string, timeoutMs: number): string[] {
  switch (platform) {
    case 'win32':
      return ['-n', '1', '-w', String(timeoutMs), address];
    case 'darwin':
      return ['-c', '1', '-W', String(timeoutMs), address];
    default:
      // iputils only takes whole seconds
      return ['-c', '1', '-W', String(Math.max(1, Math.ceil(timeoutMs / 1000))), address];
  }
}

/**
 * Turn ping output into a reply; name-resolution failures throw
 */
export function interpretPingOutput(address: string, result: ExecResult): PingReply {
  const output = `${result.stdout}\n${result.stderr}`;

  if (DNS_FAILURE.test(output)) {
    throw new ProbeError('dnsError', address, `cannot resolve ${address}`);
  }
  // Windows answers "Destination host unreachable" with exit code 0
  if (UNREACHABLE.test(output)) {
    return { status: 'unreachable' };
  }

  const match = ROUND_TRIP.exec(output);
  if (result.exitCode === 0 && match) {
    const value = parseFloat(match[2]);
    const roundTripMs = match[1] === '<' ? Math.max(0, Math.ceil(value) - 1) : Math.round(value);
    return { status: 'success', roundTripMs };
  }

  return { status: 'timeout' };
}

export class SystemPinger implements Pinger {
  constructor(private readonly deps: Pick<Dependencies, 'exec' | 'platform'>) {}

  async ping(address: string, timeoutMs: number): Promise<PingReply> {
    let result: ExecResult;
    try {
      result = await this.deps.exec('ping', buildPingArgs(this.deps.platform, address, timeoutMs));
    } catch (error) {
      throw new ProbeError('other', address, `ping could not run: ${errorMessage(error)}`);
    }
    return interpretPingOutput(address, result);
  }
}
