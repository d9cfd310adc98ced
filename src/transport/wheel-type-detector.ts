/**
 * Resolve a wheel type from discovered BLE services and the device name.
 *
 * Order of evidence:
 * 1. a device name matching the keyword table
 * 2. a service combination only one family exposes
 * 3. the shared `ffe0/ffe1` profile, which is ambiguous between Gotway and
 *    Veteran
 * 4. nothing recognised
 */

import { DetectionConfidence, WheelType } from '../models/enums';
import { connectionInfo, type DiscoveredServices, type WheelConnectionInfo } from './transport';
import { INMOTION_UUIDS, KINGSONG_SERVICE, NORDIC_UART, STANDARD_SERIAL } from './uuids';

export type DetectionResult =
  | {
      readonly kind: 'Detected';
      readonly wheelType: WheelType;
      readonly info: WheelConnectionInfo;
      readonly confidence: DetectionConfidence;
    }
  | { readonly kind: 'Ambiguous'; readonly candidates: readonly WheelType[]; readonly reason: string }
  | { readonly kind: 'Unknown'; readonly reason: string };

interface NameRule {
  wheelType: WheelType;
  contains: readonly string[];
  startsWith?: readonly string[];
}

/** Checked in order; Veteran names come first because they embed Gotway-like words. */
const NAME_RULES: readonly NameRule[] = [
  { wheelType: WheelType.VETERAN, contains: ['VETERAN', 'SHERMAN', 'LYNX', 'PATTON', 'ABRAMS', 'LEAPERKIM'] },
  {
    wheelType: WheelType.GOTWAY,
    contains: ['GOTWAY', 'BEGODE', 'MCMASTER', 'NIKOLA', 'MONSTER', 'MSP', 'RSHS', 'EX.N', 'HERO', 'MASTER', 'GW'],
  },
  { wheelType: WheelType.KINGSONG, contains: ['KS-', 'KINGSONG'], startsWith: ['KS'] },
  { wheelType: WheelType.NINEBOT, contains: ['NINEBOT', 'NB-'] },
  { wheelType: WheelType.INMOTION, contains: ['INMOTION'] },
];

function matchName(name: string): WheelType | null {
  const upper = name.toUpperCase();
  for (const rule of NAME_RULES) {
    if (rule.contains.some((k) => upper.includes(k)) || rule.startsWith?.some((k) => upper.startsWith(k))) {
      return rule.wheelType;
    }
  }
  return null;
}

/**
 * Endpoints for a known wheel type, or null for UNKNOWN.
 */
export function getUuidsForType(wheelType: WheelType): WheelConnectionInfo | null {
  const serial = { service: STANDARD_SERIAL.SERVICE, characteristic: STANDARD_SERIAL.CHARACTERISTIC };
  const uart = {
    read: { service: NORDIC_UART.SERVICE, characteristic: NORDIC_UART.READ_CHARACTERISTIC },
    write: { service: NORDIC_UART.SERVICE, characteristic: NORDIC_UART.WRITE_CHARACTERISTIC },
  };

  switch (wheelType) {
    case WheelType.KINGSONG:
    case WheelType.GOTWAY:
    case WheelType.GOTWAY_VIRTUAL:
    case WheelType.VETERAN:
    case WheelType.NINEBOT:
      return connectionInfo(wheelType, serial);
    case WheelType.INMOTION:
      return connectionInfo(
        wheelType,
        { service: INMOTION_UUIDS.READ_SERVICE, characteristic: INMOTION_UUIDS.READ_CHARACTERISTIC },
        { service: INMOTION_UUIDS.WRITE_SERVICE, characteristic: INMOTION_UUIDS.WRITE_CHARACTERISTIC }
      );
    case WheelType.INMOTION_V2:
    case WheelType.NINEBOT_Z:
      return connectionInfo(wheelType, uart.read, uart.write);
    default:
      return null;
  }
}

export class WheelTypeDetector {
  detect(services: DiscoveredServices, deviceName: string | null = null): DetectionResult {
    const hasNordicUart = services.hasService(NORDIC_UART.SERVICE);
    const hasInmotionRead = services.hasCharacteristic(INMOTION_UUIDS.READ_SERVICE, INMOTION_UUIDS.READ_CHARACTERISTIC);
    const hasInmotionWrite = services.hasCharacteristic(
      INMOTION_UUIDS.WRITE_SERVICE,
      INMOTION_UUIDS.WRITE_CHARACTERISTIC
    );

    const named = deviceName ? matchName(deviceName) : null;
    if (named) {
      // The name picks the family; the services pick the generation within it.
      let wheelType = named;
      if (named === WheelType.NINEBOT && hasNordicUart) {
        wheelType = WheelType.NINEBOT_Z;
      } else if (named === WheelType.INMOTION && hasNordicUart) {
        wheelType = WheelType.INMOTION_V2;
      }
      return this.detected(wheelType, DetectionConfidence.MEDIUM);
    }

    if (hasNordicUart) {
      return this.detected(hasInmotionRead ? WheelType.INMOTION_V2 : WheelType.NINEBOT_Z, DetectionConfidence.HIGH);
    }
    if (hasInmotionRead && hasInmotionWrite) {
      return this.detected(WheelType.INMOTION, DetectionConfidence.HIGH);
    }
    if (services.hasService(KINGSONG_SERVICE)) {
      return this.detected(WheelType.KINGSONG, DetectionConfidence.HIGH);
    }
    if (services.hasService(STANDARD_SERIAL.SERVICE)) {
      return {
        kind: 'Ambiguous',
        candidates: [WheelType.GOTWAY, WheelType.VETERAN],
        reason: `Standard serial profile; device name '${deviceName ?? ''}' does not identify the wheel`,
      };
    }

    return {
      kind: 'Unknown',
      reason: `No recognized wheel services found. Services: [${services.serviceUuids().join(', ')}]`,
    };
  }

  getUuidsForType(wheelType: WheelType): WheelConnectionInfo | null {
    return getUuidsForType(wheelType);
  }

  private detected(wheelType: WheelType, confidence: DetectionConfidence): DetectionResult {
    const info = getUuidsForType(wheelType);
    if (!info) {
      return { kind: 'Unknown', reason: `No endpoints for ${wheelType}` };
    }
    return { kind: 'Detected', wheelType, info, confidence };
  }
}
