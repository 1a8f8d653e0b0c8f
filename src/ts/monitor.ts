/**
 * Wires the engine to the real platform collaborators
 */

import * as os from 'os';
import * as path from 'path';
import { createDefaultConfig, validateConfig } from './core/config';
import { GatewayTracker } from './core/gatewayTracker';
import { ProbeEngine } from './core/probeEngine';
import { StatusCoordinator } from './core/statusCoordinator';
import { TopologyTracker } from './core/topologyTracker';
import { Config, Dependencies, HostResolver, StatusSink } from './core/types';
import { RouteTableInterfaceSource } from './platform/interfaces';
import { PollingNetworkChangeSource } from './platform/networkChanges';
import { createNodeDependencies } from './platform/nodeDependencies';
import { SystemPinger } from './platform/pinger';
import { resolveHost as dnsResolveHost } from './platform/resolver';
import { NetshWirelessSource } from './platform/wireless';
import { KnownApStore } from './store/knownApStore';

export interface MonitorOptions {
  sink: StatusSink;
  config?: Config;
  /** Known access points file (default: ~/.linkwatch/known_aps.json) */
  storeFile?: string;
  deps?: Dependencies;
  resolveHost?: HostResolver;
}

export interface Monitor {
  coordinator: StatusCoordinator;
  store: KnownApStore;
}

export function defaultStoreFile(): string {
  return path.join(os.homedir(), '.linkwatch', 'known_aps.json');
}

/**
 * Build and wire every component; nothing runs until coordinator.start()
 */
export async function createMonitor(options: MonitorOptions): Promise<Monitor> {
  const config = validateConfig(options.config ?? createDefaultConfig());
  const deps = options.deps ?? createNodeDependencies();

  const store = new KnownApStore(options.storeFile ?? defaultStoreFile(), deps);
  await store.load();

  const gateway = new GatewayTracker(
    new RouteTableInterfaceSource(deps),
    new PollingNetworkChangeSource(deps, config.networkChangePollIntervalMs),
    config
  );
  const topology = new TopologyTracker(new NetshWirelessSource(deps), config);
  const probe = new ProbeEngine(new SystemPinger(deps), gateway, config);

  const coordinator = new StatusCoordinator({
    config,
    gateway,
    topology,
    probe,
    store,
    sink: options.sink,
    resolveHost: options.resolveHost ?? dnsResolveHost
  });

  return { coordinator, store };
}
