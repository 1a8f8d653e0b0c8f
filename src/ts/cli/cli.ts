#!/usr/bin/env node
/**
 * CLI entry point for linkwatch
 * Runs the monitor and prints one line per status change
 */

import * as fs from 'fs/promises';
import { createDefaultConfig, mergeConfig } from '../core/config';
import { ContractError } from '../core/errors';
import { log } from '../core/logger';
import { Config, Status } from '../core/types';
import { createMonitor } from '../monitor';

interface CliArgs {
  json: boolean;
  target?: string;
  useGateway: boolean;
  configFile?: string;
  storeFile?: string;
  help: boolean;
}

const ENV_KEYS: Record<keyof Config, string> = {
  probeIntervalMs: 'LINKWATCH_PROBE_INTERVAL_MS',
  probeTimeoutMs: 'LINKWATCH_PROBE_TIMEOUT_MS',
  probeDeadlineGraceMs: 'LINKWATCH_PROBE_DEADLINE_GRACE_MS',
  transitionWindowMs: 'LINKWATCH_TRANSITION_WINDOW_MS',
  gatewayPollIntervalMs: 'LINKWATCH_GATEWAY_POLL_INTERVAL_MS',
  gatewayStabilizationDelayMs: 'LINKWATCH_GATEWAY_STABILIZATION_DELAY_MS',
  topologyPollIntervalMs: 'LINKWATCH_TOPOLOGY_POLL_INTERVAL_MS',
  failureThreshold: 'LINKWATCH_FAILURE_THRESHOLD',
  failureRetryIntervalMs: 'LINKWATCH_FAILURE_RETRY_INTERVAL_MS',
  signalChangeThreshold: 'LINKWATCH_SIGNAL_CHANGE_THRESHOLD',
  networkChangePollIntervalMs: 'LINKWATCH_NETWORK_CHANGE_POLL_INTERVAL_MS'
};

function parseArgs(argv: string[] = process.argv): CliArgs {
  const args: CliArgs = {
    json: process.env.LINKWATCH_JSON === '1',
    useGateway: false,
    storeFile: process.env.LINKWATCH_STORE_FILE || undefined,
    help: false
  };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--json' || arg === '-j') {
      args.json = true;
    } else if (arg === '--target' || arg === '-t') {
      args.target = argv[++i];
    } else if (arg === '--gateway' || arg === '-g') {
      args.useGateway = true;
    } else if (arg === '--config-file' || arg === '-c') {
      args.configFile = argv[++i];
    } else if (arg === '--store-file' || arg === '-s') {
      args.storeFile = argv[++i];
    } else if (arg === '--help' || arg === '-h') {
      args.help = true;
    }
  }

  return args;
}

function showHelp(): void {
  console.log(`
linkwatch CLI

Usage: linkwatch [options]

Options:
  --target, -t HOST       Probe HOST instead of the default gateway (remembered)
  --gateway, -g           Switch back to probing the default gateway
  --json, -j              Print each status as a JSON line
  --config-file, -c PATH  Load config overrides from a JSON file
  --store-file, -s PATH   Known access points file (default: ~/.linkwatch/known_aps.json)
  --help, -h              Show this help

Environment Variables (used if no config file is given):
  LINKWATCH_PROBE_INTERVAL_MS              Probe cadence (default: 1000)
  LINKWATCH_PROBE_TIMEOUT_MS               Probe timeout (default: 1000)
  LINKWATCH_PROBE_DEADLINE_GRACE_MS        Hard deadline past the timeout (default: 500)
  LINKWATCH_TRANSITION_WINDOW_MS           Roaming window after a BSSID change (default: 10000)
  LINKWATCH_GATEWAY_POLL_INTERVAL_MS       Gateway re-poll (default: 30000)
  LINKWATCH_GATEWAY_STABILIZATION_DELAY_MS Wait after network-up (default: 1000)
  LINKWATCH_TOPOLOGY_POLL_INTERVAL_MS      Wireless poll (default: 1000)
  LINKWATCH_FAILURE_THRESHOLD              Failures before gateway re-discovery (default: 5)
  LINKWATCH_FAILURE_RETRY_INTERVAL_MS      Re-discovery cadence (default: 10000)
  LINKWATCH_SIGNAL_CHANGE_THRESHOLD        Signal points that count as a change (default: 5)
  LINKWATCH_NETWORK_CHANGE_POLL_INTERVAL_MS Interface change poll (default: 2000)
  LINKWATCH_STORE_FILE                     Known access points file
  LINKWATCH_JSON                           '1' for JSON output
  LINKWATCH_LOG_LEVEL                      Log level (logs go to stderr)

Output Format:
  STATUS: <display> [ERROR,ROAMING] | <tooltip line> | <tooltip line> ...

Examples:
  # Watch the default gateway
  linkwatch

  # Watch a remote host
  linkwatch --target example.com
`);
}

async function loadConfig(configFile?: string, env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  const defaults = createDefaultConfig();

  if (configFile) {
    const content = await fs.readFile(configFile, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ContractError(`${configFile} must contain a JSON object`);
    }
    return mergeConfig(defaults, Object.fromEntries(Object.entries(parsed)));
  }

  // Load from environment variables
  const overrides: Record<string, unknown> = {};
  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const raw = env[name];
    if (raw !== undefined && raw !== '') {
      overrides[key] = Number(raw);
    }
  }
  return mergeConfig(defaults, overrides);
}

function formatStatusLine(status: Status): string {
  const flags: string[] = [];
  if (status.isError) flags.push('ERROR');
  if (status.isTransition) flags.push('ROAMING');

  const head = flags.length > 0 ? `STATUS: ${status.displayText} [${flags.join(',')}]` : `STATUS: ${status.displayText}`;
  return [head, ...status.tooltipLines].join(' | ');
}

async function main(): Promise<void> {
  const args = parseArgs();

  if (args.help) {
    showHelp();
    return;
  }

  const config = await loadConfig(args.configFile);
  const { coordinator } = await createMonitor({
    config,
    storeFile: args.storeFile,
    sink: {
      onStatusChanged: (status) => {
        console.log(args.json ? JSON.stringify(status) : formatStatusLine(status));
      }
    }
  });

  const shutdown = (signal: string) => {
    log.cli.info({ signal }, 'shutting down');
    coordinator.stop();
    process.exit(0);
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await coordinator.start();

  if (args.target) {
    await coordinator.useCustomHost(args.target);
  } else if (args.useGateway) {
    coordinator.useDefaultGateway();
  }
}

// Only run if this is the main module
if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}

export { main, parseArgs, loadConfig, formatStatusLine };
