/**
 * Structured logging for linkwatch, built on pino.
 *
 * Configuration:
 *   LINKWATCH_LOG_LEVEL   Minimum log level (default: "info", dev: "debug")
 *   LINKWATCH_LOG_PRETTY  Force pretty-print (auto-detected from NODE_ENV)
 *   LINKWATCH_DEBUG       "true" sets level to "debug"
 *
 * Logs go to stderr so the CLI can keep stdout for status lines.
 *
 * Usage:
 *   import { log } from "./logger";
 *   log.gateway.info({ gateway }, "gateway changed");
 */

import pino from 'pino';
import type { Logger } from 'pino';

const IS_TEST = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
const IS_DEV = process.env.NODE_ENV !== 'production' && !IS_TEST;

export function resolveLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LINKWATCH_LOG_LEVEL) {
    return env.LINKWATCH_LOG_LEVEL;
  }
  const debugEnv = (env.LINKWATCH_DEBUG || '').trim().toLowerCase();
  if (debugEnv && debugEnv !== 'false' && debugEnv !== '0') {
    return 'debug';
  }
  if (IS_TEST) return 'silent';
  if (IS_DEV) return 'debug';
  return 'info';
}

export function wantsPretty(env: NodeJS.ProcessEnv = process.env): boolean {
  if (IS_TEST) return false;
  return env.LINKWATCH_LOG_PRETTY === 'true' || (env.LINKWATCH_LOG_PRETTY !== 'false' && IS_DEV);
}

function createRootLogger(): Logger {
  const options: pino.LoggerOptions = {
    level: resolveLevel(),
    base: { service: 'linkwatch' },
    timestamp: pino.stdTimeFunctions.isoTime
  };

  if (wantsPretty()) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2
        }
      }
    });
  }

  return pino(options, pino.destination(2));
}

export const rootLogger: Logger = createRootLogger();

/**
 * Subsystem loggers; each adds a `subsystem` field to every line
 */
export const log = {
  /** Default gateway discovery */
  gateway: rootLogger.child({ subsystem: 'gateway' }),
  /** Wireless association polling */
  topology: rootLogger.child({ subsystem: 'topology' }),
  /** Liveness probes and failure escalation */
  probe: rootLogger.child({ subsystem: 'probe' }),
  /** Status fusion and target selection */
  coordinator: rootLogger.child({ subsystem: 'coordinator' }),
  /** Known access point store */
  store: rootLogger.child({ subsystem: 'store' }),
  cli: rootLogger.child({ subsystem: 'cli' }),
  root: rootLogger
};

export type { Logger };
