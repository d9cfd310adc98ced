/**
 * Smart battery management system (BMS) snapshot.
 */

/** Fixed number of cell slots; packs with fewer cells leave the tail at zero. */
export const BMS_CELL_SLOTS = 56;

export interface SmartBms {
  serialNumber: string;
  versionNumber: string;
  factoryCap: number;
  actualCap: number;
  fullCycles: number;
  chargeCount: number;
  mfgDateStr: string;
  status: number;
  remCap: number;
  remPerc: number;
  current: number;
  voltage: number;
  semiVoltage1: number;
  semiVoltage2: number;
  temp1: number;
  temp2: number;
  temp3: number;
  temp4: number;
  temp5: number;
  temp6: number;
  tempMos: number;
  tempMosEnv: number;
  temp1Env: number;
  temp2Env: number;
  humidity1Env: number;
  humidity2Env: number;
  balanceMap: number;
  health: number;
  minCell: number;
  maxCell: number;
  cellDiff: number;
  avgCell: number;
  minCellNum: number;
  maxCellNum: number;
  cellNum: number;
  /** Cell voltages in volts. */
  cells: number[];
}

export function createSmartBms(): SmartBms {
  return {
    serialNumber: '',
    versionNumber: '',
    factoryCap: 0,
    actualCap: 0,
    fullCycles: 0,
    chargeCount: 0,
    mfgDateStr: '',
    status: 0,
    remCap: 0,
    remPerc: 0,
    current: 0,
    voltage: 0,
    semiVoltage1: 0,
    semiVoltage2: 0,
    temp1: 0,
    temp2: 0,
    temp3: 0,
    temp4: 0,
    temp5: 0,
    temp6: 0,
    tempMos: 0,
    tempMosEnv: 0,
    temp1Env: 0,
    temp2Env: 0,
    humidity1Env: 0,
    humidity2Env: 0,
    balanceMap: 0,
    health: 0,
    minCell: 0,
    maxCell: 0,
    cellDiff: 0,
    avgCell: 0,
    minCellNum: 0,
    maxCellNum: 0,
    cellNum: 0,
    cells: new Array<number>(BMS_CELL_SLOTS).fill(0),
  };
}

/** Deep copy, so a published snapshot is not affected by later page writes. */
export function cloneSmartBms(bms: SmartBms): SmartBms {
  return { ...bms, cells: [...bms.cells] };
}

/**
 * Write a cell voltage if the index is inside the fixed slot range.
 *
 * @returns true when the value was stored
 */
export function setCell(bms: SmartBms, index: number, value: number): boolean {
  if (!Number.isInteger(index) || index < 0 || index >= bms.cells.length) {
    return false;
  }
  bms.cells[index] = value;
  return true;
}

/**
 * Recompute min/max/avg/diff over the first `cellCount` slots.
 *
 * Cell numbers are 1-based. Zero slots are skipped for min/max.
 */
export function updateCellStats(bms: SmartBms, cellCount: number): void {
  const count = Math.max(0, Math.min(cellCount, bms.cells.length));
  bms.cellNum = count;
  if (count === 0) {
    return;
  }

  let min = bms.cells[0];
  let max = bms.cells[0];
  let minNum = 1;
  let maxNum = 1;
  let total = 0;

  for (let i = 0; i < count; i++) {
    const cell = bms.cells[i];
    if (cell > 0) {
      total += cell;
      if (cell > max) {
        max = cell;
        maxNum = i + 1;
      }
      if (cell < min) {
        min = cell;
        minNum = i + 1;
      }
    }
  }

  bms.minCell = min;
  bms.maxCell = max;
  bms.minCellNum = minNum;
  bms.maxCellNum = maxNum;
  bms.cellDiff = max - min;
  bms.avgCell = total / count;
}

/** Sum of the first `cellCount` cell voltages. */
export function sumCells(bms: SmartBms, cellCount: number): number {
  let total = 0;
  const count = Math.min(cellCount, bms.cells.length);
  for (let i = 0; i < count; i++) {
    total += bms.cells[i];
  }
  return total;
}
