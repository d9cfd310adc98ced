/**
 * BLE service and characteristic UUIDs for every supported wheel family.
 */

const BLE_UUID_SUFFIX = '-0000-1000-8000-00805f9b34fb';

function shortUuid(id: string): string {
  return `0000${id}${BLE_UUID_SUFFIX}`;
}

/** Descriptor written to enable notifications. */
export const CLIENT_CHARACTERISTIC_CONFIG = shortUuid('2902');

/** Nordic UART service used by Ninebot Z and Inmotion V2. */
export const NORDIC_UART = {
  SERVICE: '6e400001-b5a3-f393-e0a9-e50e24dcca9e',
  WRITE_CHARACTERISTIC: '6e400002-b5a3-f393-e0a9-e50e24dcca9e',
  READ_CHARACTERISTIC: '6e400003-b5a3-f393-e0a9-e50e24dcca9e',
} as const;

/** Single-characteristic profile shared by Kingsong, Gotway, Veteran and Ninebot. */
export const STANDARD_SERIAL = {
  SERVICE: shortUuid('ffe0'),
  CHARACTERISTIC: shortUuid('ffe1'),
} as const;

export const KINGSONG_SERVICE = shortUuid('fff0');

export const INMOTION_UUIDS = {
  READ_SERVICE: shortUuid('ffe0'),
  READ_CHARACTERISTIC: shortUuid('ffe4'),
  WRITE_SERVICE: shortUuid('ffe5'),
  WRITE_CHARACTERISTIC: shortUuid('ffe9'),
} as const;

export const STANDARD_SERVICES = {
  GENERIC_ACCESS: shortUuid('1800'),
  GENERIC_ATTRIBUTE: shortUuid('1801'),
  DEVICE_INFORMATION: shortUuid('180a'),
  BATTERY_SERVICE: shortUuid('180f'),
} as const;

/** Case-insensitive UUID comparison. */
export function uuidMatches(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
