/**
 * euc-link - decoding and connection core for electric unicycles
 *
 * Main entry point exporting the public API.
 */

// Connection
export { WheelConnectionManager, type WheelConnectionManagerOptions } from './service/wheel-connection-manager';
export { AutoConnectManager, type AutoConnectOptions } from './service/auto-connect-manager';
export { KeepAliveTimer, type KeepAliveStatus, type TickCallback } from './service/keep-alive-timer';
export { DataTimeoutTracker, type TimeoutCallback } from './service/data-timeout-tracker';
export { CommandScheduler } from './service/command-scheduler';

// Ride helpers
export { AlarmChecker } from './service/alarm-checker';
export { EnergyCalculator } from './service/energy-calculator';
export { TelemetryBuffer, type MetricStats } from './service/telemetry-buffer';
export { DemoDataProvider } from './service/demo-data-provider';

// Transport
export * from './transport/transport';
export * from './transport/uuids';
export * from './transport/wheel-type-detector';

// Models and types
export * from './models';

// Decoders
export * from './protocol';

// Byte helpers
export * from './utils/bytes';

// Exceptions
export * from './exceptions';
