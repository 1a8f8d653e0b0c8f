/**
 * Interface and default-route discovery from the OS routing table
 */

import { errorMessage } from '../core/errors';
import { log } from '../core/logger';
import { Dependencies, InterfaceSource, LogSink, NetworkInterfaceInfo } from '../core/types';

export interface DefaultRoute {
  gateway: string;
  /** Interface name (Linux, macOS) or local address (Windows) */
  device: string;
  metric: number;
}

/**
 * Parse `ip -4 route show default`
 */
export function parseLinuxDefaultRoutes(output: string): DefaultRoute[] {
  const routes: DefaultRoute[] = [];
  for (const line of output.split(/\r?\n/)) {
    const match = /^default\s+via\s+(\S+)\s+dev\s+(\S+)/.exec(line.trim());
    if (!match) continue;
    const metric = /\bmetric\s+(\d+)/.exec(line);
    routes.push({ gateway: match[1], device: match[2], metric: metric ? parseInt(metric[1], 10) : 0 });
  }
  return routes;
}

/**
 * Parse `route -n get default`
 */
export function parseDarwinDefaultRoute(output: string): DefaultRoute | null {
  const gateway = /^\s*gateway:\s*(\S+)/m.exec(output);
  const device = /^\s*interface:\s*(\S+)/m.exec(output);
  if (!gateway || !device) return null;
  return { gateway: gateway[1], device: device[1], metric: 0 };
}

/**
 * Parse the IPv4 "Active Routes" table of `route print -4 0.0.0.0`
 */
export function parseWindowsDefaultRoutes(output: string): DefaultRoute[] {
  const routes: DefaultRoute[] = [];
  const activeStart = output.search(/Active Routes:/i);
  if (activeStart < 0) return routes;
  const persistentStart = output.search(/Persistent Routes:/i);
  const section = output.slice(activeStart, persistentStart > activeStart ? persistentStart : undefined);

  for (const line of section.split(/\r?\n/)) {
    const match = /^\s*0\.0\.0\.0\s+0\.0\.0\.0\s+(\d{1,3}(?:\.\d{1,3}){3})\s+(\d{1,3}(?:\.\d{1,3}){3})\s+(\d+)/.exec(line);
    if (match) {
      routes.push({ gateway: match[1], device: match[2], metric: parseInt(match[3], 10) });
    }
  }
  return routes;
}

type Deps = Pick<Dependencies, 'exec' | 'readFile' | 'networkInterfaces' | 'platform'>;

/**
 * Builds interface records by joining default routes with os.networkInterfaces()
 */
export class RouteTableInterfaceSource implements InterfaceSource {
  constructor(
    private readonly deps: Deps,
    private readonly logger: LogSink = log.gateway
  ) {}

  async list(): Promise<NetworkInterfaceInfo[]> {
    switch (this.deps.platform) {
      case 'win32':
        return this.listWindows();
      case 'darwin':
        return this.listDarwin();
      default:
        return this.listLinux();
    }
  }

  private async listLinux(): Promise<NetworkInterfaceInfo[]> {
    const result = await this.deps.exec('ip', ['-4', 'route', 'show', 'default']);
    if (result.exitCode !== 0) {
      throw new Error(`ip route exited with ${result.exitCode}: ${result.stderr.trim()}`);
    }

    const records: NetworkInterfaceInfo[] = [];
    for (const route of parseLinuxDefaultRoutes(result.stdout)) {
      const sys = `/sys/class/net/${route.device}`;
      const operstate = (await this.readOptional(`${sys}/operstate`))?.trim();
      const speed = parseInt((await this.readOptional(`${sys}/speed`)) ?? '', 10);
      const ifindex = parseInt((await this.readOptional(`${sys}/ifindex`)) ?? '', 10);

      records.push({
        ...this.describeLocal(route.device),
        // "unknown" is what many virtual and wireless drivers report while working
        up: operstate === 'up' || operstate === 'unknown',
        index: Number.isFinite(ifindex) ? ifindex : route.metric,
        gateways: [route.gateway],
        speedMbps: Number.isFinite(speed) && speed > 0 ? speed : null
      });
    }
    return records;
  }

  private async listDarwin(): Promise<NetworkInterfaceInfo[]> {
    const result = await this.deps.exec('route', ['-n', 'get', 'default']);
    const route = result.exitCode === 0 ? parseDarwinDefaultRoute(result.stdout) : null;
    if (!route) return [];
    const up = /flags:\s*<[^>]*\bUP\b/.test(result.stdout);
    return [{ ...this.describeLocal(route.device), up, index: 0, gateways: [route.gateway], speedMbps: null }];
  }

  private async listWindows(): Promise<NetworkInterfaceInfo[]> {
    const result = await this.deps.exec('route', ['print', '-4', '0.0.0.0']);
    if (result.exitCode !== 0) {
      throw new Error(`route print exited with ${result.exitCode}`);
    }

    return parseWindowsDefaultRoutes(result.stdout).map((route) => {
      const name = this.interfaceForAddress(route.device) ?? route.device;
      return {
        ...this.describeLocal(name),
        up: true,
        // Lower metric is the preferred route
        index: route.metric,
        gateways: [route.gateway],
        speedMbps: null
      };
    });
  }

  private describeLocal(name: string): Pick<NetworkInterfaceInfo, 'name' | 'loopback' | 'ipv4'> {
    const addresses = this.deps.networkInterfaces()[name] ?? [];
    return {
      name,
      loopback: addresses.length > 0 && addresses.every((a) => a.internal),
      ipv4: addresses.length === 0 || addresses.some((a) => a.family === 'IPv4')
    };
  }

  private interfaceForAddress(address: string): string | null {
    for (const [name, addresses] of Object.entries(this.deps.networkInterfaces())) {
      if (addresses?.some((a) => a.address === address)) {
        return name;
      }
    }
    return null;
  }

  private async readOptional(file: string): Promise<string | null> {
    try {
      return await this.deps.readFile(file);
    } catch (error) {
      this.logger.debug({ file, err: errorMessage(error) }, 'interface attribute unavailable');
      return null;
    }
  }
}
