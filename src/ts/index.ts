/**
 * Main entry point - exports the engine, platform collaborators and CLI
 */

export * from './core/types';
export * from './core/errors';
export * from './core/config';
export * from './core/status';
export * from './core/emitter';
export * from './core/logger';
export * from './core/wirelessParser';
export * from './core/gatewayTracker';
export * from './core/topologyTracker';
export * from './core/probeEngine';
export * from './core/statusCoordinator';
export * from './platform/exec';
export * from './platform/interfaces';
export * from './platform/networkChanges';
export * from './platform/nodeDependencies';
export * from './platform/pinger';
export * from './platform/resolver';
export * from './platform/wireless';
export * from './store/knownApStore';
export * from './monitor';
export * from './cli/cli';
