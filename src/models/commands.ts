/**
 * Commands sent to a wheel.
 *
 * Two kinds exist: raw writes (SendBytes, SendDelayed), which go straight to
 * the transport, and semantic commands, which the active decoder translates
 * into zero or more raw writes.
 */

export type WheelCommand =
  | { readonly type: 'SendBytes'; readonly data: Uint8Array }
  | { readonly type: 'SendDelayed'; readonly data: Uint8Array; readonly delayMs: number }
  | { readonly type: 'Beep' }
  | { readonly type: 'SetLight'; readonly enabled: boolean }
  | { readonly type: 'SetLed'; readonly enabled: boolean }
  | { readonly type: 'SetLightMode'; readonly mode: number }
  | { readonly type: 'SetLedMode'; readonly mode: number }
  | { readonly type: 'SetStrobeMode'; readonly mode: number }
  | { readonly type: 'SetPedalsMode'; readonly mode: number }
  | { readonly type: 'SetAlarmMode'; readonly mode: number }
  | { readonly type: 'Calibrate' }
  | { readonly type: 'PowerOff' }
  | { readonly type: 'SetLock'; readonly locked: boolean }
  | { readonly type: 'ResetTrip' }
  | { readonly type: 'SetMaxSpeed'; readonly speed: number }
  | { readonly type: 'SetAlarmSpeed'; readonly speed: number; readonly num: number }
  | { readonly type: 'SetAlarmEnabled'; readonly enabled: boolean; readonly num: number }
  | { readonly type: 'SetLimitedMode'; readonly enabled: boolean }
  | { readonly type: 'SetLimitedSpeed'; readonly speed: number }
  | { readonly type: 'SetTailLight'; readonly enabled: boolean }
  | { readonly type: 'SetDrl'; readonly enabled: boolean }
  | { readonly type: 'SetLedColor'; readonly value: number; readonly ledNum: number }
  | { readonly type: 'SetLightBrightness'; readonly brightness: number }
  | { readonly type: 'SetHandleButton'; readonly enabled: boolean }
  | { readonly type: 'SetBrakeAssist'; readonly enabled: boolean }
  | { readonly type: 'SetTransportMode'; readonly enabled: boolean }
  | { readonly type: 'SetRideMode'; readonly enabled: boolean }
  | { readonly type: 'SetGoHomeMode'; readonly enabled: boolean }
  | { readonly type: 'SetFancierMode'; readonly enabled: boolean }
  | { readonly type: 'SetRollAngleMode'; readonly mode: number }
  | { readonly type: 'SetMute'; readonly enabled: boolean }
  | { readonly type: 'SetSpeakerVolume'; readonly volume: number }
  | { readonly type: 'SetBeeperVolume'; readonly volume: number }
  | { readonly type: 'SetFanQuiet'; readonly enabled: boolean }
  | { readonly type: 'SetFan'; readonly enabled: boolean }
  | { readonly type: 'SetPedalTilt'; readonly angle: number }
  | { readonly type: 'SetPedalSensitivity'; readonly sensitivity: number }
  | { readonly type: 'SetMilesMode'; readonly enabled: boolean }
  | { readonly type: 'RequestBmsData'; readonly bmsNum: number; readonly dataType: number }
  | {
      readonly type: 'SetKingsongAlarms';
      readonly alarm1: number;
      readonly alarm2: number;
      readonly alarm3: number;
      readonly maxSpeed: number;
    }
  | { readonly type: 'RequestAlarmSettings' }
  | { readonly type: 'SetCutoutAngle'; readonly angle: number };

export type WheelCommandType = WheelCommand['type'];

/** Raw writes that bypass decoder translation. */
export type RawCommand = Extract<WheelCommand, { type: 'SendBytes' | 'SendDelayed' }>;

export function sendBytes(data: Uint8Array): RawCommand {
  return { type: 'SendBytes', data };
}

export function sendDelayed(data: Uint8Array, delayMs: number): RawCommand {
  return { type: 'SendDelayed', data, delayMs };
}

export function isRawCommand(command: WheelCommand): command is RawCommand {
  return command.type === 'SendBytes' || command.type === 'SendDelayed';
}
