import { describe, expect, it } from 'vitest';
import {
  AlarmType,
  alarmBitmask,
  createAlarmConfig,
  hasAlarm,
  mostSevereSpeedAlarm,
  PreWarningType,
} from '../models/alarm';
import { ConfigurationError } from '../exceptions';
import { createWheelState } from '../models/wheel-state';
import { AlarmChecker } from './alarm-checker';

describe('AlarmChecker', () => {
  describe('PWM alarms', () => {
    const config = createAlarmConfig({ pwmBasedAlarms: true, alarmFactor1: 80, alarmFactor2: 95 });

    it('stays quiet below the first factor', () => {
      const result = new AlarmChecker().check(createWheelState({ calculatedPwm: 0.75 }), config, 1000);
      expect(hasAlarm(result)).toBe(false);
      expect(result.preWarning).toBeNull();
    });

    it('scales the tone with how far PWM is into the alarm zone', () => {
      const result = new AlarmChecker().check(createWheelState({ calculatedPwm: 0.9 }), config, 1000);
      expect(result.triggeredAlarms).toEqual([
        { type: AlarmType.PWM, triggerValue: 90, threshold: 80, toneDurationMs: 133 },
      ]);
    });

    it('clamps the tone to 20..200 ms', () => {
      const checker = new AlarmChecker();
      expect(checker.check(createWheelState({ calculatedPwm: 0.81 }), config, 1000).triggeredAlarms[0]?.toneDurationMs).toBe(20);
      expect(checker.check(createWheelState({ calculatedPwm: 0.99 }), config, 1010).triggeredAlarms[0]?.toneDurationMs).toBe(200);
    });

    it('fires on every call while PWM stays high', () => {
      const checker = new AlarmChecker();
      const state = createWheelState({ calculatedPwm: 0.9 });
      expect(hasAlarm(checker.check(state, config, 1000))).toBe(true);
      expect(hasAlarm(checker.check(state, config, 1001))).toBe(true);
    });
  });

  describe('pre-warnings', () => {
    const config = createAlarmConfig({
      pwmBasedAlarms: true,
      warningPwm: 70,
      warningSpeed: 30,
      warningSpeedPeriod: 5,
    });

    it('warns on PWM before speed and then waits out the period', () => {
      const checker = new AlarmChecker();
      const state = createWheelState({ calculatedPwm: 0.75, speed: 3500 });
      expect(checker.check(state, config, 10_000).preWarning).toEqual({ type: PreWarningType.PWM, value: 75 });
      expect(checker.check(state, config, 14_999).preWarning).toBeNull();
      expect(checker.check(state, config, 15_000).preWarning).toEqual({ type: PreWarningType.PWM, value: 75 });
    });

    it('warns on speed when PWM is low', () => {
      const checker = new AlarmChecker();
      const result = checker.check(createWheelState({ calculatedPwm: 0.5, speed: 3200 }), config, 10_000);
      expect(result.preWarning).toEqual({ type: PreWarningType.SPEED, value: 32 });
      expect(hasAlarm(result)).toBe(false);
    });

    it('is off when the period is zero', () => {
      const result = new AlarmChecker().check(
        createWheelState({ calculatedPwm: 0.75 }),
        { ...config, warningSpeedPeriod: 0 },
        10_000
      );
      expect(result.preWarning).toBeNull();
    });
  });

  describe('speed and battery alarms', () => {
    const config = createAlarmConfig({
      alarm1Speed: 20,
      alarm1Battery: 100,
      alarm2Speed: 30,
      alarm2Battery: 50,
      alarm3Speed: 40,
      alarm3Battery: 20,
    });

    it('picks the most severe tier that matches', () => {
      const checker = new AlarmChecker();
      expect(checker.check(createWheelState({ speed: 3500, batteryLevel: 40 }), config, 0).triggeredAlarms).toEqual([
        { type: AlarmType.SPEED2, triggerValue: 35, threshold: 30, toneDurationMs: 100 },
      ]);
      expect(checker.check(createWheelState({ speed: 4000, batteryLevel: 20 }), config, 1).triggeredAlarms).toEqual([
        { type: AlarmType.SPEED3, triggerValue: 40, threshold: 40, toneDurationMs: 180 },
      ]);
      expect(checker.check(createWheelState({ speed: 2500, batteryLevel: 90 }), config, 2).triggeredAlarms).toEqual([
        { type: AlarmType.SPEED1, triggerValue: 25, threshold: 20, toneDurationMs: 50 },
      ]);
    });

    it('needs the battery at or below the tier level', () => {
      const result = new AlarmChecker().check(createWheelState({ speed: 4500, batteryLevel: 100 }), config, 0);
      expect(result.triggeredAlarms.map((a) => a.type)).toEqual([AlarmType.SPEED1]);
    });

    it('skips tiers with a zero threshold', () => {
      const result = new AlarmChecker().check(
        createWheelState({ speed: 5000, batteryLevel: 10 }),
        createAlarmConfig({ alarm1Speed: 20 }),
        0
      );
      expect(hasAlarm(result)).toBe(false);
    });
  });

  describe('current, temperature, battery and wheel alarms', () => {
    it('checks battery current before phase current, by magnitude', () => {
      const config = createAlarmConfig({ alarmCurrent: 50, alarmPhaseCurrent: 100 });
      const checker = new AlarmChecker();
      expect(checker.check(createWheelState({ current: -6000 }), config, 0).triggeredAlarms).toEqual([
        { type: AlarmType.CURRENT, triggerValue: -60, threshold: 50, toneDurationMs: 100 },
      ]);
      expect(checker.check(createWheelState({ phaseCurrent: 12000 }), config, 170).triggeredAlarms).toEqual([
        { type: AlarmType.CURRENT, triggerValue: 120, threshold: 100, toneDurationMs: 100 },
      ]);
    });

    it('holds the current alarm for its cooldown', () => {
      const config = createAlarmConfig({ alarmCurrent: 50 });
      const checker = new AlarmChecker();
      const state = createWheelState({ current: 6000 });
      expect(hasAlarm(checker.check(state, config, 1000))).toBe(true);
      expect(hasAlarm(checker.check(state, config, 1169))).toBe(false);
      expect(hasAlarm(checker.check(state, config, 1170))).toBe(true);
    });

    it('checks the board temperature before the motor', () => {
      const config = createAlarmConfig({ alarmTemperature: 60, alarmMotorTemperature: 80 });
      const checker = new AlarmChecker();
      const result = checker.check(createWheelState({ temperature: 5000, temperature2: 8500 }), config, 0);
      expect(result.triggeredAlarms).toEqual([
        { type: AlarmType.TEMPERATURE, triggerValue: 85, threshold: 80, toneDurationMs: 100 },
      ]);
      expect(hasAlarm(checker.check(createWheelState({ temperature: 6500 }), config, 569))).toBe(false);
      expect(checker.check(createWheelState({ temperature: 6500 }), config, 570).triggeredAlarms[0]?.triggerValue).toBe(65);
    });

    it('alarms on a low battery', () => {
      const result = new AlarmChecker().check(
        createWheelState({ batteryLevel: 10 }),
        createAlarmConfig({ alarmBattery: 15 }),
        0
      );
      expect(result.triggeredAlarms).toEqual([
        { type: AlarmType.BATTERY, triggerValue: 10, threshold: 15, toneDurationMs: 100 },
      ]);
    });

    it('passes the wheel alarm flag through only when enabled', () => {
      const state = createWheelState({ wheelAlarm: true, calculatedPwm: 0.85 });
      expect(hasAlarm(new AlarmChecker().check(state, createAlarmConfig(), 0))).toBe(false);
      expect(new AlarmChecker().check(state, createAlarmConfig({ alarmWheel: true }), 0).triggeredAlarms).toEqual([
        { type: AlarmType.WHEEL, triggerValue: 85, threshold: 0, toneDurationMs: 100 },
      ]);
    });
  });

  describe('results', () => {
    it('combines alarms into a bitmask and tracks what is still sounding', () => {
      const config = createAlarmConfig({ alarm1Speed: 20, alarm1Battery: 100, alarmBattery: 15, alarmWheel: true });
      const checker = new AlarmChecker();
      const result = checker.check(createWheelState({ speed: 3000, batteryLevel: 10, wheelAlarm: true }), config, 1000);

      expect(alarmBitmask(result)).toBe(0x01 | 0x08 | 0x10);
      expect(mostSevereSpeedAlarm(result)?.type).toBe(AlarmType.SPEED1);
      expect(checker.activeBitmask(1100)).toBe(0x19);
      expect(checker.activeBitmask(1500)).toBe(0x08);
      expect(checker.activeBitmask(1970)).toBe(0);
    });

    it('forgets cooldowns on reset', () => {
      const config = createAlarmConfig({ alarmBattery: 15 });
      const checker = new AlarmChecker();
      const state = createWheelState({ batteryLevel: 10 });
      checker.check(state, config, 1000);
      checker.reset();
      expect(checker.activeBitmask(1000)).toBe(0);
      expect(hasAlarm(checker.check(state, config, 1001))).toBe(true);
    });

    it('reports no speed alarm when none fired', () => {
      const result = new AlarmChecker().check(createWheelState(), createAlarmConfig(), 0);
      expect(mostSevereSpeedAlarm(result)).toBeNull();
      expect(alarmBitmask(result)).toBe(0);
    });
  });

  describe('createAlarmConfig', () => {
    it('rejects factors out of range or out of order', () => {
      expect(() => createAlarmConfig({ alarmFactor1: 120 })).toThrow(ConfigurationError);
      expect(() => createAlarmConfig({ alarmFactor1: 90, alarmFactor2: 85 })).toThrow(
        'alarmFactor2 (85) must be above alarmFactor1 (90)'
      );
    });
  });
});
