import { describe, expect, it } from 'vitest';
import { WheelType } from '../models/enums';
import { ConnectResult, connectionInfo, DiscoveredServices } from './transport';
import { CLIENT_CHARACTERISTIC_CONFIG, STANDARD_SERIAL, uuidMatches } from './uuids';

describe('DiscoveredServices', () => {
  const services = new DiscoveredServices([
    { uuid: '0000FFE0-0000-1000-8000-00805F9B34FB', characteristics: ['0000FFE1-0000-1000-8000-00805F9B34FB'] },
    { uuid: '0000180a-0000-1000-8000-00805f9b34fb', characteristics: [] },
  ]);

  it('matches UUIDs regardless of case', () => {
    expect(services.hasService(STANDARD_SERIAL.SERVICE)).toBe(true);
    expect(services.hasCharacteristic(STANDARD_SERIAL.SERVICE, STANDARD_SERIAL.CHARACTERISTIC)).toBe(true);
  });

  it('reports missing services and characteristics', () => {
    expect(services.hasService('0000fff0-0000-1000-8000-00805f9b34fb')).toBe(false);
    expect(services.hasCharacteristic('0000fff0-0000-1000-8000-00805f9b34fb', STANDARD_SERIAL.CHARACTERISTIC)).toBe(
      false
    );
  });

  it('lists the service UUIDs as reported', () => {
    expect(services.serviceUuids()).toEqual([
      '0000FFE0-0000-1000-8000-00805F9B34FB',
      '0000180a-0000-1000-8000-00805f9b34fb',
    ]);
  });
});

describe('connectionInfo', () => {
  it('writes through the read endpoint unless told otherwise', () => {
    const serial = { service: STANDARD_SERIAL.SERVICE, characteristic: STANDARD_SERIAL.CHARACTERISTIC };
    expect(connectionInfo(WheelType.GOTWAY, serial)).toEqual({
      wheelType: WheelType.GOTWAY,
      readServiceUuid: '0000ffe0-0000-1000-8000-00805f9b34fb',
      readCharacteristicUuid: '0000ffe1-0000-1000-8000-00805f9b34fb',
      writeServiceUuid: '0000ffe0-0000-1000-8000-00805f9b34fb',
      writeCharacteristicUuid: '0000ffe1-0000-1000-8000-00805f9b34fb',
      descriptorUuid: CLIENT_CHARACTERISTIC_CONFIG,
    });
  });
});

describe('ConnectResult', () => {
  it('builds both outcomes', () => {
    expect(ConnectResult.success()).toEqual({ ok: true });
    expect(ConnectResult.failure('timeout')).toEqual({ ok: false, error: 'timeout' });
  });
});

describe('uuidMatches', () => {
  it('ignores case only', () => {
    expect(uuidMatches('ABC', 'abc')).toBe(true);
    expect(uuidMatches('abc', 'abd')).toBe(false);
  });
});
