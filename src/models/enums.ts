/**
 * Enums shared across the protocol and connection layers.
 */

/**
 * Wheel protocol families a decoder exists for.
 *
 * GOTWAY_VIRTUAL is used when the transport cannot tell Gotway from Veteran;
 * the auto-detecting decoder resolves it from the byte stream.
 */
export enum WheelType {
  UNKNOWN = 'UNKNOWN',
  KINGSONG = 'KINGSONG',
  GOTWAY = 'GOTWAY',
  GOTWAY_VIRTUAL = 'GOTWAY_VIRTUAL',
  VETERAN = 'VETERAN',
  NINEBOT = 'NINEBOT',
  NINEBOT_Z = 'NINEBOT_Z',
  INMOTION = 'INMOTION',
  INMOTION_V2 = 'INMOTION_V2',
}

/**
 * How sure the detector is about a wheel type.
 */
export enum DetectionConfidence {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
}

/**
 * Semantic setting identifiers accepted by WheelConnectionManager.executeCommand.
 */
export enum SettingsCommandId {
  LIGHT_MODE = 'LIGHT_MODE',
  LED = 'LED',
  LED_MODE = 'LED_MODE',
  STROBE_MODE = 'STROBE_MODE',
  TAIL_LIGHT = 'TAIL_LIGHT',
  DRL = 'DRL',
  LIGHT_BRIGHTNESS = 'LIGHT_BRIGHTNESS',
  PEDALS_MODE = 'PEDALS_MODE',
  ROLL_ANGLE_MODE = 'ROLL_ANGLE_MODE',
  HANDLE_BUTTON = 'HANDLE_BUTTON',
  BRAKE_ASSIST = 'BRAKE_ASSIST',
  RIDE_MODE = 'RIDE_MODE',
  GO_HOME_MODE = 'GO_HOME_MODE',
  FANCIER_MODE = 'FANCIER_MODE',
  TRANSPORT_MODE = 'TRANSPORT_MODE',
  PEDAL_TILT = 'PEDAL_TILT',
  PEDAL_SENSITIVITY = 'PEDAL_SENSITIVITY',
  MAX_SPEED = 'MAX_SPEED',
  LIMITED_MODE = 'LIMITED_MODE',
  LIMITED_SPEED = 'LIMITED_SPEED',
  ALARM_ENABLED_1 = 'ALARM_ENABLED_1',
  ALARM_ENABLED_2 = 'ALARM_ENABLED_2',
  ALARM_ENABLED_3 = 'ALARM_ENABLED_3',
  ALARM_SPEED_1 = 'ALARM_SPEED_1',
  ALARM_SPEED_2 = 'ALARM_SPEED_2',
  ALARM_SPEED_3 = 'ALARM_SPEED_3',
  SPEAKER_VOLUME = 'SPEAKER_VOLUME',
  BEEPER_VOLUME = 'BEEPER_VOLUME',
  MUTE = 'MUTE',
  FAN = 'FAN',
  FAN_QUIET = 'FAN_QUIET',
  CALIBRATE = 'CALIBRATE',
  POWER_OFF = 'POWER_OFF',
  LOCK = 'LOCK',
  RESET_TRIP = 'RESET_TRIP',
}
