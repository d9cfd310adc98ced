/**
 * Decides which rider alarms a state snapshot triggers.
 *
 * Only the decision is made here; sounds, vibration and notifications belong
 * to the caller. Each alarm kind has a cooldown so a held condition does not
 * fire on every packet.
 *
 * @example
 * ```typescript
 * const checker = new AlarmChecker();
 * manager.wheelState.subscribe((state) => {
 *   const result = checker.check(state, alarmConfig);
 *   for (const alarm of result.triggeredAlarms) play(alarm.toneDurationMs);
 * });
 * ```
 */

import {
  ALARM_BIT,
  AlarmType,
  PreWarningType,
  type AlarmConfig,
  type AlarmResult,
  type PreWarning,
  type TriggeredAlarm,
} from '../models/alarm';
import {
  currentA,
  phaseCurrentA,
  speedKmh,
  temperature2C,
  temperatureC,
  type WheelState,
} from '../models/wheel-state';

interface SpeedCheck {
  alarm: TriggeredAlarm | null;
  preWarning: PreWarning | null;
}

const NO_SPEED_ALARM: SpeedCheck = { alarm: null, preWarning: null };

// Speed alarms are ordered most severe first.
const SPEED_TIERS = [
  { type: AlarmType.SPEED3, speed: 'alarm3Speed', battery: 'alarm3Battery', toneDurationMs: 180 },
  { type: AlarmType.SPEED2, speed: 'alarm2Speed', battery: 'alarm2Battery', toneDurationMs: 100 },
  { type: AlarmType.SPEED1, speed: 'alarm1Speed', battery: 'alarm1Battery', toneDurationMs: 50 },
] as const;

export class AlarmChecker {
  static readonly SPEED_COOLDOWN_MS = 170;
  static readonly CURRENT_COOLDOWN_MS = 170;
  static readonly TEMPERATURE_COOLDOWN_MS = 570;
  static readonly BATTERY_COOLDOWN_MS = 970;
  static readonly WHEEL_COOLDOWN_MS = 170;

  private speedUntil = 0;
  private currentUntil = 0;
  private temperatureUntil = 0;
  private batteryUntil = 0;
  private wheelUntil = 0;
  private lastPreWarningAt = 0;

  /**
   * Check one snapshot.
   *
   * Speed alarms are re-evaluated on every call; the other kinds stay quiet
   * until their cooldown has passed.
   */
  check(state: WheelState, config: AlarmConfig, nowMs: number = Date.now()): AlarmResult {
    const speed = config.pwmBasedAlarms
      ? this.checkPwm(state, config, nowMs)
      : this.checkSpeedTiers(state, config, nowMs);

    const triggeredAlarms = [
      speed.alarm,
      this.checkCurrent(state, config, nowMs),
      this.checkTemperature(state, config, nowMs),
      this.checkBattery(state, config, nowMs),
      this.checkWheel(state, config, nowMs),
    ].filter((alarm): alarm is TriggeredAlarm => alarm !== null);

    return { triggeredAlarms, preWarning: speed.preWarning };
  }

  /** Clear cooldowns; call on disconnect. */
  reset(): void {
    this.speedUntil = 0;
    this.currentUntil = 0;
    this.temperatureUntil = 0;
    this.batteryUntil = 0;
    this.wheelUntil = 0;
    this.lastPreWarningAt = 0;
  }

  /** Bits of the alarm kinds still sounding at `nowMs`. */
  activeBitmask(nowMs: number = Date.now()): number {
    let mask = 0;
    if (nowMs < this.speedUntil) mask |= ALARM_BIT.SPEED;
    if (nowMs < this.currentUntil) mask |= ALARM_BIT.CURRENT;
    if (nowMs < this.temperatureUntil) mask |= ALARM_BIT.TEMPERATURE;
    if (nowMs < this.batteryUntil) mask |= ALARM_BIT.BATTERY;
    if (nowMs < this.wheelUntil) mask |= ALARM_BIT.WHEEL;
    return mask;
  }

  private checkPwm(state: WheelState, config: AlarmConfig, nowMs: number): SpeedCheck {
    const pwm = state.calculatedPwm;
    const factor1 = config.alarmFactor1 / 100;
    const factor2 = config.alarmFactor2 / 100;

    if (pwm > factor1) {
      const tone = Math.round((200 * (pwm - factor1)) / (factor2 - factor1));
      this.speedUntil = nowMs + AlarmChecker.SPEED_COOLDOWN_MS;
      return {
        alarm: {
          type: AlarmType.PWM,
          triggerValue: pwm * 100,
          threshold: config.alarmFactor1,
          toneDurationMs: Math.min(200, Math.max(20, tone)),
        },
        preWarning: null,
      };
    }

    this.speedUntil = 0;
    return { alarm: null, preWarning: this.checkPreWarning(state, config, nowMs) };
  }

  private checkPreWarning(state: WheelState, config: AlarmConfig, nowMs: number): PreWarning | null {
    const periodMs = config.warningSpeedPeriod * 1000;
    if (periodMs === 0 || nowMs - this.lastPreWarningAt < periodMs) return null;

    const pwm = state.calculatedPwm;
    if (config.warningPwm > 0 && pwm >= config.warningPwm / 100) {
      this.lastPreWarningAt = nowMs;
      return { type: PreWarningType.PWM, value: pwm * 100 };
    }

    const speed = speedKmh(state);
    if (config.warningSpeed > 0 && speed >= config.warningSpeed) {
      this.lastPreWarningAt = nowMs;
      return { type: PreWarningType.SPEED, value: speed };
    }

    return null;
  }

  private checkSpeedTiers(state: WheelState, config: AlarmConfig, nowMs: number): SpeedCheck {
    const speed = speedKmh(state);

    for (const tier of SPEED_TIERS) {
      const alarmSpeed = config[tier.speed];
      const alarmBattery = config[tier.battery];
      if (alarmSpeed > 0 && alarmBattery > 0 && state.batteryLevel <= alarmBattery && speed >= alarmSpeed) {
        this.speedUntil = nowMs + AlarmChecker.SPEED_COOLDOWN_MS;
        return {
          alarm: { type: tier.type, triggerValue: speed, threshold: alarmSpeed, toneDurationMs: tier.toneDurationMs },
          preWarning: null,
        };
      }
    }

    this.speedUntil = 0;
    return NO_SPEED_ALARM;
  }

  private checkCurrent(state: WheelState, config: AlarmConfig, nowMs: number): TriggeredAlarm | null {
    if (nowMs < this.currentUntil) return null;

    // Battery current first, then phase current.
    for (const [value, threshold] of [
      [currentA(state), config.alarmCurrent],
      [phaseCurrentA(state), config.alarmPhaseCurrent],
    ] as const) {
      if (threshold > 0 && Math.abs(value) >= threshold) {
        this.currentUntil = nowMs + AlarmChecker.CURRENT_COOLDOWN_MS;
        return { type: AlarmType.CURRENT, triggerValue: value, threshold, toneDurationMs: 100 };
      }
    }
    return null;
  }

  private checkTemperature(state: WheelState, config: AlarmConfig, nowMs: number): TriggeredAlarm | null {
    if (nowMs < this.temperatureUntil) return null;

    // Board, then motor.
    for (const [value, threshold] of [
      [temperatureC(state), config.alarmTemperature],
      [temperature2C(state), config.alarmMotorTemperature],
    ] as const) {
      if (threshold > 0 && value >= threshold) {
        this.temperatureUntil = nowMs + AlarmChecker.TEMPERATURE_COOLDOWN_MS;
        return { type: AlarmType.TEMPERATURE, triggerValue: value, threshold, toneDurationMs: 100 };
      }
    }
    return null;
  }

  private checkBattery(state: WheelState, config: AlarmConfig, nowMs: number): TriggeredAlarm | null {
    if (nowMs < this.batteryUntil) return null;
    if (config.alarmBattery <= 0 || state.batteryLevel > config.alarmBattery) return null;

    this.batteryUntil = nowMs + AlarmChecker.BATTERY_COOLDOWN_MS;
    return {
      type: AlarmType.BATTERY,
      triggerValue: state.batteryLevel,
      threshold: config.alarmBattery,
      toneDurationMs: 100,
    };
  }

  private checkWheel(state: WheelState, config: AlarmConfig, nowMs: number): TriggeredAlarm | null {
    if (nowMs < this.wheelUntil) return null;
    if (!config.alarmWheel || !state.wheelAlarm) return null;

    this.wheelUntil = nowMs + AlarmChecker.WHEEL_COOLDOWN_MS;
    // The wheel gives no threshold; report the PWM it alarmed at.
    return {
      type: AlarmType.WHEEL,
      triggerValue: state.calculatedPwm * 100,
      threshold: 0,
      toneDurationMs: 100,
    };
  }
}
