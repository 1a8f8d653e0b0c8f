/**
 * Error taxonomy for the engine
 */

import type { FailureKind } from './types';

export class LinkwatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Caller bug: invalid argument at an API boundary
 */
export class ContractError extends LinkwatchError {}

/**
 * Call into a component after it was torn down
 */
export class DisposedError extends LinkwatchError {
  constructor(readonly component: string) {
    super(`${component} has been disposed`);
  }
}

/**
 * A probe that could not be carried out (as opposed to one that got no reply)
 */
export class ProbeError extends LinkwatchError {
  constructor(
    readonly kind: FailureKind,
    readonly address: string,
    message: string
  ) {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
