/**
 * Models layer exports.
 */

export * from './alarm';
export * from './bms';
export * from './commands';
export * from './config';
export * from './connection-state';
export * from './enums';
export * from './telemetry';
export * from './wheel-state';
