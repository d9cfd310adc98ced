import { describe, expect, it } from 'vitest';
import { DetectionConfidence, WheelType } from '../models/enums';
import { DiscoveredServices, type DiscoveredService } from './transport';
import { INMOTION_UUIDS, KINGSONG_SERVICE, NORDIC_UART, STANDARD_SERIAL } from './uuids';
import { getUuidsForType, WheelTypeDetector } from './wheel-type-detector';

const SERIAL: DiscoveredService = { uuid: STANDARD_SERIAL.SERVICE, characteristics: [STANDARD_SERIAL.CHARACTERISTIC] };
const UART: DiscoveredService = {
  uuid: NORDIC_UART.SERVICE,
  characteristics: [NORDIC_UART.WRITE_CHARACTERISTIC, NORDIC_UART.READ_CHARACTERISTIC],
};
const INMOTION_READ: DiscoveredService = {
  uuid: INMOTION_UUIDS.READ_SERVICE,
  characteristics: [INMOTION_UUIDS.READ_CHARACTERISTIC],
};
const INMOTION_WRITE: DiscoveredService = {
  uuid: INMOTION_UUIDS.WRITE_SERVICE,
  characteristics: [INMOTION_UUIDS.WRITE_CHARACTERISTIC],
};

const detector = new WheelTypeDetector();

function detectedType(services: DiscoveredService[], name: string | null = null): WheelType | null {
  const result = detector.detect(new DiscoveredServices(services), name);
  return result.kind === 'Detected' ? result.wheelType : null;
}

describe('WheelTypeDetector', () => {
  it('lets the name resolve the shared serial profile', () => {
    const result = detector.detect(new DiscoveredServices([SERIAL]), 'LK1234 Sherman');
    expect(result).toMatchObject({
      kind: 'Detected',
      wheelType: WheelType.VETERAN,
      confidence: DetectionConfidence.MEDIUM,
    });
  });

  it('matches names case-insensitively', () => {
    expect(detectedType([SERIAL], 'begode master')).toBe(WheelType.GOTWAY);
    expect(detectedType([SERIAL], 'KS16X')).toBe(WheelType.KINGSONG);
  });

  it('uses the services to pick the generation of a named family', () => {
    expect(detectedType([UART], 'Ninebot Z10')).toBe(WheelType.NINEBOT_Z);
    expect(detectedType([SERIAL], 'Ninebot One')).toBe(WheelType.NINEBOT);
    expect(detectedType([UART, INMOTION_READ], 'Inmotion V12')).toBe(WheelType.INMOTION_V2);
  });

  it('detects unique service sets with high confidence', () => {
    const kingsong = detector.detect(new DiscoveredServices([{ uuid: KINGSONG_SERVICE, characteristics: [] }, SERIAL]));
    expect(kingsong).toMatchObject({ kind: 'Detected', wheelType: WheelType.KINGSONG, confidence: DetectionConfidence.HIGH });

    expect(detectedType([UART])).toBe(WheelType.NINEBOT_Z);
    expect(detectedType([UART, INMOTION_READ])).toBe(WheelType.INMOTION_V2);
    expect(detectedType([INMOTION_READ, INMOTION_WRITE])).toBe(WheelType.INMOTION);
  });

  it('reports the serial profile alone as ambiguous', () => {
    const result = detector.detect(new DiscoveredServices([SERIAL]), 'Wheel-01');
    expect(result).toEqual({
      kind: 'Ambiguous',
      candidates: [WheelType.GOTWAY, WheelType.VETERAN],
      reason: "Standard serial profile; device name 'Wheel-01' does not identify the wheel",
    });
  });

  it('gives up without known services', () => {
    const result = detector.detect(new DiscoveredServices([{ uuid: '1234', characteristics: [] }]));
    expect(result).toEqual({ kind: 'Unknown', reason: 'No recognized wheel services found. Services: [1234]' });
  });

  it('returns the endpoints with the detection', () => {
    const result = detector.detect(new DiscoveredServices([INMOTION_READ, INMOTION_WRITE]));
    if (result.kind !== 'Detected') throw new Error('expected a detection');
    expect(result.info.readCharacteristicUuid).toBe(INMOTION_UUIDS.READ_CHARACTERISTIC);
    expect(result.info.writeServiceUuid).toBe(INMOTION_UUIDS.WRITE_SERVICE);
  });
});

describe('getUuidsForType', () => {
  it('uses Nordic UART for the newer families', () => {
    expect(getUuidsForType(WheelType.NINEBOT_Z)?.writeCharacteristicUuid).toBe(NORDIC_UART.WRITE_CHARACTERISTIC);
    expect(getUuidsForType(WheelType.INMOTION_V2)?.readCharacteristicUuid).toBe(NORDIC_UART.READ_CHARACTERISTIC);
  });

  it('shares the serial profile across the older families', () => {
    expect(getUuidsForType(WheelType.GOTWAY_VIRTUAL)?.readServiceUuid).toBe(STANDARD_SERIAL.SERVICE);
  });

  it('has nothing for UNKNOWN', () => {
    expect(getUuidsForType(WheelType.UNKNOWN)).toBeNull();
  });
});
