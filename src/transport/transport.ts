/**
 * Boundary between the connection manager and a BLE stack.
 *
 * The core never touches platform Bluetooth types. A host application wraps
 * its stack in a WheelTransport, pushes notifications into
 * `WheelConnectionManager.onDataReceived`, and reports discovered services
 * through `onServicesDiscovered`.
 */

import type { WheelType } from '../models/enums';
import { CLIENT_CHARACTERISTIC_CONFIG, uuidMatches } from './uuids';

/** Outcome of a connect attempt. */
export type ConnectResult = { readonly ok: true } | { readonly ok: false; readonly error: string };

export const ConnectResult = {
  success: (): ConnectResult => ({ ok: true }),
  failure: (error: string): ConnectResult => ({ ok: false, error }),
} as const;

/** Device seen during a scan. */
export interface BleDevice {
  address: string;
  name: string | null;
  rssi?: number;
}

export interface WheelTransport {
  connect(address: string): Promise<ConnectResult>;
  disconnect(): Promise<void>;
  /** @returns false when the write was not accepted */
  write(data: Uint8Array): Promise<boolean>;
  startScan(onDeviceFound: (device: BleDevice) => void): Promise<void>;
  stopScan(): Promise<void>;
}

export interface DiscoveredService {
  uuid: string;
  characteristics: string[];
}

/** Services reported by the peripheral after discovery. */
export class DiscoveredServices {
  constructor(readonly services: readonly DiscoveredService[]) {}

  findService(uuid: string): DiscoveredService | undefined {
    return this.services.find((s) => uuidMatches(s.uuid, uuid));
  }

  hasService(uuid: string): boolean {
    return this.findService(uuid) !== undefined;
  }

  hasCharacteristic(serviceUuid: string, characteristicUuid: string): boolean {
    return this.findService(serviceUuid)?.characteristics.some((c) => uuidMatches(c, characteristicUuid)) ?? false;
  }

  serviceUuids(): string[] {
    return this.services.map((s) => s.uuid);
  }
}

/**
 * Endpoints to subscribe to and write through for one wheel.
 */
export interface WheelConnectionInfo {
  wheelType: WheelType;
  readServiceUuid: string;
  readCharacteristicUuid: string;
  writeServiceUuid: string;
  writeCharacteristicUuid: string;
  descriptorUuid: string;
}

export function connectionInfo(
  wheelType: WheelType,
  read: { service: string; characteristic: string },
  write: { service: string; characteristic: string } = read
): WheelConnectionInfo {
  return {
    wheelType,
    readServiceUuid: read.service,
    readCharacteristicUuid: read.characteristic,
    writeServiceUuid: write.service,
    writeCharacteristicUuid: write.characteristic,
    descriptorUuid: CLIENT_CHARACTERISTIC_CONFIG,
  };
}
