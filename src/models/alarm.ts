/**
 * Alarm thresholds and check results.
 *
 * Speeds are km/h, temperatures degrees C and currents A. A threshold of 0
 * disables its alarm.
 */

import { ConfigurationError } from '../exceptions';

export enum AlarmType {
  SPEED1 = 1,
  SPEED2 = 2,
  SPEED3 = 3,
  CURRENT = 4,
  TEMPERATURE = 5,
  PWM = 6,
  BATTERY = 7,
  WHEEL = 8,
}

export const ALARM_TYPE_LABELS: Readonly<Record<AlarmType, string>> = {
  [AlarmType.SPEED1]: 'Speed 1',
  [AlarmType.SPEED2]: 'Speed 2',
  [AlarmType.SPEED3]: 'Speed 3',
  [AlarmType.CURRENT]: 'Current',
  [AlarmType.TEMPERATURE]: 'Temp',
  [AlarmType.PWM]: 'PWM',
  [AlarmType.BATTERY]: 'Battery',
  [AlarmType.WHEEL]: 'Wheel',
};

export interface AlarmConfig {
  /** Alarm on PWM instead of the speed/battery pairs. */
  readonly pwmBasedAlarms: boolean;
  /** PWM percent where the alarm starts. */
  readonly alarmFactor1: number;
  /** PWM percent of full alarm intensity. */
  readonly alarmFactor2: number;

  readonly warningPwm: number;
  readonly warningSpeed: number;
  /** Seconds between pre-warnings; 0 turns them off. */
  readonly warningSpeedPeriod: number;

  // Speed alarm N fires at alarmNSpeed or faster once the battery is at or below alarmNBattery
  readonly alarm1Speed: number;
  readonly alarm1Battery: number;
  readonly alarm2Speed: number;
  readonly alarm2Battery: number;
  readonly alarm3Speed: number;
  readonly alarm3Battery: number;

  readonly alarmCurrent: number;
  readonly alarmPhaseCurrent: number;
  readonly alarmTemperature: number;
  readonly alarmMotorTemperature: number;
  readonly alarmBattery: number;
  /** React to the alarm flag the wheel reports itself. */
  readonly alarmWheel: boolean;
}

export const DEFAULT_ALARM_CONFIG: AlarmConfig = Object.freeze({
  pwmBasedAlarms: false,
  alarmFactor1: 80,
  alarmFactor2: 95,
  warningPwm: 0,
  warningSpeed: 0,
  warningSpeedPeriod: 0,
  alarm1Speed: 0,
  alarm1Battery: 0,
  alarm2Speed: 0,
  alarm2Battery: 0,
  alarm3Speed: 0,
  alarm3Battery: 0,
  alarmCurrent: 0,
  alarmPhaseCurrent: 0,
  alarmTemperature: 0,
  alarmMotorTemperature: 0,
  alarmBattery: 0,
  alarmWheel: false,
});

/**
 * Build an alarm config from defaults plus overrides.
 *
 * @throws {ConfigurationError} If a PWM factor is outside 0..100 or the
 *   factors are out of order
 */
export function createAlarmConfig(overrides: Partial<AlarmConfig> = {}): AlarmConfig {
  const config: AlarmConfig = { ...DEFAULT_ALARM_CONFIG, ...overrides };

  for (const [key, value] of [
    ['alarmFactor1', config.alarmFactor1],
    ['alarmFactor2', config.alarmFactor2],
  ] as const) {
    if (value < 0 || value > 100) {
      throw new ConfigurationError(`${key} must be 0..100, got ${value}`);
    }
  }
  if (config.alarmFactor2 <= config.alarmFactor1) {
    throw new ConfigurationError(
      `alarmFactor2 (${config.alarmFactor2}) must be above alarmFactor1 (${config.alarmFactor1})`
    );
  }

  return config;
}

export interface TriggeredAlarm {
  readonly type: AlarmType;
  /** Value that tripped the alarm, in the unit of its threshold. */
  readonly triggerValue: number;
  readonly threshold: number;
  /** Suggested tone length in ms. */
  readonly toneDurationMs: number;
}

export enum PreWarningType {
  PWM = 'PWM',
  SPEED = 'SPEED',
}

/** Advisory, below any alarm. */
export interface PreWarning {
  readonly type: PreWarningType;
  readonly value: number;
}

export interface AlarmResult {
  readonly triggeredAlarms: readonly TriggeredAlarm[];
  readonly preWarning: PreWarning | null;
}

export const ALARM_BIT = {
  SPEED: 0x01,
  CURRENT: 0x02,
  TEMPERATURE: 0x04,
  BATTERY: 0x08,
  WHEEL: 0x10,
} as const;

const SPEED_ALARMS: readonly AlarmType[] = [AlarmType.SPEED1, AlarmType.SPEED2, AlarmType.SPEED3, AlarmType.PWM];

export function alarmBit(type: AlarmType): number {
  switch (type) {
    case AlarmType.SPEED1:
    case AlarmType.SPEED2:
    case AlarmType.SPEED3:
    case AlarmType.PWM:
      return ALARM_BIT.SPEED;
    case AlarmType.CURRENT:
      return ALARM_BIT.CURRENT;
    case AlarmType.TEMPERATURE:
      return ALARM_BIT.TEMPERATURE;
    case AlarmType.BATTERY:
      return ALARM_BIT.BATTERY;
    case AlarmType.WHEEL:
      return ALARM_BIT.WHEEL;
  }
}

export function hasAlarm(result: AlarmResult): boolean {
  return result.triggeredAlarms.length > 0;
}

export function alarmBitmask(result: AlarmResult): number {
  return result.triggeredAlarms.reduce((mask, alarm) => mask | alarmBit(alarm.type), 0);
}

/** PWM outranks SPEED3, then SPEED2, then SPEED1. */
export function mostSevereSpeedAlarm(result: AlarmResult): TriggeredAlarm | null {
  let worst: TriggeredAlarm | null = null;
  for (const alarm of result.triggeredAlarms) {
    if (SPEED_ALARMS.includes(alarm.type) && (!worst || alarm.type > worst.type)) {
      worst = alarm;
    }
  }
  return worst;
}
