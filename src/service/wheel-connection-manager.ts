/**
 * Entry point for talking to a wheel.
 *
 * Owns the active decoder, the current state snapshot and the connection
 * state machine. The platform transport pushes notifications into
 * {@link WheelConnectionManager.onDataReceived} and service lists into
 * {@link WheelConnectionManager.onServicesDiscovered}; everything the UI
 * observes comes out of the zustand stores.
 *
 * @example
 * ```typescript
 * const manager = new WheelConnectionManager(transport);
 * manager.connectionState.subscribe((s) => console.log(connectionStatusText(s)));
 *
 * await manager.connect('AA:BB:CC:DD:EE:FF', WheelType.KINGSONG);
 * await manager.beep();
 * await manager.disconnect();
 * ```
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { errorMessage, TransportError } from '../exceptions';
import type { WheelCommand } from '../models/commands';
import { createDecoderConfig, type DecoderConfig } from '../models/config';
import { connectionAddress, ConnectionState } from '../models/connection-state';
import { SettingsCommandId, WheelType } from '../models/enums';
import { createWheelState, displayName, type WheelState } from '../models/wheel-state';
import type { WheelDecoder } from '../protocol/decoder';
import { DefaultWheelDecoderFactory, type WheelDecoderFactory } from '../protocol/factory';
import type { BleDevice, DiscoveredServices, WheelConnectionInfo, WheelTransport } from '../transport/transport';
import { WheelTypeDetector } from '../transport/wheel-type-detector';
import { CommandScheduler } from './command-scheduler';
import { DataTimeoutTracker } from './data-timeout-tracker';
import { KeepAliveTimer } from './keep-alive-timer';

const TAG = 'WheelConnectionManager';

export interface WheelConnectionManagerOptions {
  /** Silence after which the link counts as lost. */
  dataTimeoutMs?: number;
  /** How often the silence check runs. */
  timeoutCheckIntervalMs?: number;
  config?: Partial<DecoderConfig>;
}

export class WheelConnectionManager {
  readonly wheelState: StoreApi<WheelState> = createStore<WheelState>()(() => createWheelState());
  readonly connectionState: StoreApi<ConnectionState> = createStore<ConnectionState>()(() =>
    ConnectionState.disconnected()
  );
  readonly isKeepAliveRunning: StoreApi<boolean>;

  private decoder: WheelDecoder | null = null;
  private decoderConfig: DecoderConfig;
  private connectionInfo: WheelConnectionInfo | null = null;

  private readonly detector = new WheelTypeDetector();
  private readonly keepAliveTimer = new KeepAliveTimer();
  private readonly dataTimeoutTracker: DataTimeoutTracker;
  private readonly commandScheduler = new CommandScheduler();
  private readonly dataTimeoutMs: number;

  // Serializes transport writes.
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly transport: WheelTransport,
    private readonly decoderFactory: WheelDecoderFactory = new DefaultWheelDecoderFactory(),
    options: WheelConnectionManagerOptions = {}
  ) {
    this.dataTimeoutMs = options.dataTimeoutMs ?? DataTimeoutTracker.DEFAULT_TIMEOUT_MS;
    this.dataTimeoutTracker = new DataTimeoutTracker(
      options.timeoutCheckIntervalMs ?? DataTimeoutTracker.DEFAULT_CHECK_INTERVAL_MS
    );
    this.decoderConfig = createDecoderConfig(options.config);

    const keepAliveStatus = this.keepAliveTimer.status;
    const running = createStore<boolean>()(() => keepAliveStatus.getState().isRunning);
    keepAliveStatus.subscribe((s) => {
      if (running.getState() !== s.isRunning) running.setState(s.isRunning);
    });
    this.isKeepAliveRunning = running;
  }

  /**
   * Replace the decoder config; takes effect on the next notification.
   *
   * @throws {ConfigurationError} If a value is out of range; the previous
   * config stays in place
   */
  updateConfig(config: Partial<DecoderConfig>): void {
    this.decoderConfig = createDecoderConfig(config);
  }

  getConfig(): DecoderConfig {
    return this.decoderConfig;
  }

  getConnectionInfo(): WheelConnectionInfo | null {
    return this.connectionInfo;
  }

  getCurrentDecoder(): WheelDecoder | null {
    return this.decoder;
  }

  /**
   * Open the link to a wheel.
   *
   * @param address - MAC address or platform peripheral id
   * @param wheelType - Known type; omit to detect it from the services
   */
  async connect(address: string, wheelType?: WheelType): Promise<void> {
    this.setConnectionState(ConnectionState.connecting(address));

    try {
      const result = await this.transport.connect(address);
      if (!result.ok) {
        console.warn(`[${TAG}] Connect to ${address} failed: ${result.error}`);
        this.setConnectionState(ConnectionState.failed(result.error || 'Unknown error', address));
        return;
      }

      this.setConnectionState(ConnectionState.discoveringServices(address));
      if (wheelType !== undefined) {
        this.setupDecoder(wheelType);
      }
      this.startDataTimeoutMonitor(address);
    } catch (error) {
      console.warn(`[${TAG}] Connect to ${address} threw: ${errorMessage(error)}`);
      this.setConnectionState(ConnectionState.failed(errorMessage(error) || 'Connection failed', address));
    }
  }

  /**
   * Tear down timers, pending writes and the decoder, then release the link.
   */
  async disconnect(): Promise<void> {
    this.stopTimers();
    this.commandScheduler.cancelAll();

    this.decoder?.reset();
    this.decoder = null;
    this.connectionInfo = null;

    try {
      await this.transport.disconnect();
    } catch (error) {
      console.warn(`[${TAG}] Transport disconnect failed: ${errorMessage(error)}`);
    }

    this.wheelState.setState(createWheelState(), true);
    this.setConnectionState(ConnectionState.disconnected());
    console.log(`[${TAG}] Disconnected`);
  }

  /**
   * Feed one notification from the wheel. Payloads must be passed in arrival
   * order.
   */
  onDataReceived(data: Uint8Array): void {
    this.dataTimeoutTracker.onDataReceived();

    const decoder = this.decoder;
    if (!decoder) {
      console.warn(`[${TAG}] Data received (${data.length} bytes) but no decoder set`);
      return;
    }

    const result = decoder.decode(data, this.wheelState.getState(), this.decoderConfig);
    if (!result) {
      console.debug(`[${TAG}] decode() returned null for ${data.length} bytes (decoder=${decoder.wheelType})`);
      return;
    }

    this.wheelState.setState(result.newState, true);

    if (result.commands.length > 0) {
      void this.dispatch(result.commands);
    }

    if (!decoder.isReady()) {
      console.debug(`[${TAG}] Decoded OK but not ready yet (decoder=${decoder.wheelType})`);
      return;
    }
    if (this.connectionState.getState().status !== 'Connected') {
      const address = this.currentAddress() ?? '';
      const wheelName = displayName(result.newState);
      console.log(`[${TAG}] Connected to ${wheelName || address}`);
      this.setConnectionState(ConnectionState.connected(address, wheelName));
    }
  }

  /**
   * Pick a decoder from the services the transport found.
   */
  onServicesDiscovered(services: DiscoveredServices, deviceName: string | null): void {
    console.debug(`[${TAG}] Services discovered for '${deviceName ?? ''}': ${services.serviceUuids().join(', ')}`);
    const result = this.detector.detect(services, deviceName);

    switch (result.kind) {
      case 'Detected':
        console.log(`[${TAG}] Detected ${result.wheelType} (${result.confidence} confidence)`);
        this.connectionInfo = result.info;
        this.setupDecoder(result.wheelType);
        break;
      case 'Ambiguous':
        console.log(`[${TAG}] Ambiguous wheel (${result.candidates.join('/')}), probing frames`);
        this.connectionInfo = this.detector.getUuidsForType(WheelType.GOTWAY_VIRTUAL);
        this.setupDecoder(WheelType.GOTWAY_VIRTUAL);
        break;
      case 'Unknown':
        console.warn(`[${TAG}] Unknown wheel: ${result.reason}`);
        this.setConnectionState(ConnectionState.failed(`Unknown wheel type: ${result.reason}`, this.currentAddress()));
        break;
    }
  }

  /**
   * Switch to a decoder chosen outside the detector, e.g. a remembered type.
   */
  onWheelTypeDetected(wheelType: WheelType, deviceName?: string): void {
    this.setupDecoder(wheelType);
    if (deviceName && !this.wheelState.getState().name) {
      this.wheelState.setState({ name: deviceName });
    }
    if (!this.connectionInfo) {
      this.connectionInfo = this.detector.getUuidsForType(wheelType);
    }
  }

  /**
   * The transport dropped the link on its own.
   */
  onTransportDisconnected(reason: string): void {
    const address = this.currentAddress();
    if (address === undefined) return;
    console.warn(`[${TAG}] Link to ${address} lost: ${reason}`);
    this.stopTimers();
    this.commandScheduler.cancelAll();
    this.setConnectionState(ConnectionState.connectionLost(address, reason));
  }

  /**
   * @throws {TransportError} If the transport cannot start scanning
   */
  async startScan(onDeviceFound: (device: BleDevice) => void): Promise<void> {
    try {
      await this.transport.startScan(onDeviceFound);
    } catch (error) {
      throw new TransportError(`Scan failed: ${errorMessage(error)}`);
    }
  }

  async stopScan(): Promise<void> {
    await this.transport.stopScan();
  }

  /**
   * Send a command. Raw writes go straight out; semantic commands are
   * translated by the active decoder and dropped when it has no encoding.
   */
  async sendCommand(command: WheelCommand): Promise<void> {
    if (command.type === 'SendBytes' || command.type === 'SendDelayed') {
      await this.dispatch([command]);
      return;
    }

    const decoder = this.decoder;
    if (!decoder) {
      console.warn(`[${TAG}] ${command.type} dropped: no decoder`);
      return;
    }

    const raw = decoder.buildCommand(command);
    if (raw.length === 0) {
      console.debug(`[${TAG}] ${command.type} not supported by ${decoder.wheelType}`);
      return;
    }
    await this.dispatch(raw);
  }

  /**
   * Run a settings action by id.
   *
   * @param intValue - Used by numeric settings
   * @param boolValue - Used by toggles
   */
  async executeCommand(commandId: SettingsCommandId, intValue = 0, boolValue = false): Promise<void> {
    switch (commandId) {
      case SettingsCommandId.LIGHT_MODE:
        return this.setLightMode(intValue);
      case SettingsCommandId.LED:
        return this.setLed(boolValue);
      case SettingsCommandId.LED_MODE:
        return this.setLedMode(intValue);
      case SettingsCommandId.STROBE_MODE:
        return this.setStrobeMode(intValue);
      case SettingsCommandId.TAIL_LIGHT:
        return this.setTailLight(boolValue);
      case SettingsCommandId.DRL:
        return this.setDrl(boolValue);
      case SettingsCommandId.LIGHT_BRIGHTNESS:
        return this.setLightBrightness(intValue);
      case SettingsCommandId.PEDALS_MODE:
        return this.setPedalsMode(intValue);
      case SettingsCommandId.ROLL_ANGLE_MODE:
        return this.setRollAngleMode(intValue);
      case SettingsCommandId.HANDLE_BUTTON:
        return this.setHandleButton(boolValue);
      case SettingsCommandId.BRAKE_ASSIST:
        return this.setBrakeAssist(boolValue);
      case SettingsCommandId.RIDE_MODE:
        return this.setRideMode(boolValue);
      case SettingsCommandId.GO_HOME_MODE:
        return this.setGoHomeMode(boolValue);
      case SettingsCommandId.FANCIER_MODE:
        return this.setFancierMode(boolValue);
      case SettingsCommandId.TRANSPORT_MODE:
        return this.setTransportMode(boolValue);
      case SettingsCommandId.PEDAL_TILT:
        return this.setPedalTilt(intValue);
      case SettingsCommandId.PEDAL_SENSITIVITY:
        return this.setPedalSensitivity(intValue);
      case SettingsCommandId.MAX_SPEED:
        return this.setMaxSpeed(intValue);
      case SettingsCommandId.LIMITED_MODE:
        return this.setLimitedMode(boolValue);
      case SettingsCommandId.LIMITED_SPEED:
        return this.setLimitedSpeed(intValue);
      case SettingsCommandId.ALARM_ENABLED_1:
        return this.setAlarmEnabled(boolValue, 1);
      case SettingsCommandId.ALARM_ENABLED_2:
        return this.setAlarmEnabled(boolValue, 2);
      case SettingsCommandId.ALARM_ENABLED_3:
        return this.setAlarmEnabled(boolValue, 3);
      case SettingsCommandId.ALARM_SPEED_1:
        return this.setAlarmSpeed(intValue, 1);
      case SettingsCommandId.ALARM_SPEED_2:
        return this.setAlarmSpeed(intValue, 2);
      case SettingsCommandId.ALARM_SPEED_3:
        return this.setAlarmSpeed(intValue, 3);
      case SettingsCommandId.SPEAKER_VOLUME:
        return this.setSpeakerVolume(intValue);
      case SettingsCommandId.BEEPER_VOLUME:
        return this.setBeeperVolume(intValue);
      case SettingsCommandId.MUTE:
        return this.setMute(boolValue);
      case SettingsCommandId.FAN:
        return this.setFan(boolValue);
      case SettingsCommandId.FAN_QUIET:
        return this.setFanQuiet(boolValue);
      case SettingsCommandId.CALIBRATE:
        return this.calibrate();
      case SettingsCommandId.POWER_OFF:
        return this.powerOff();
      case SettingsCommandId.LOCK:
        return this.setLock(boolValue);
      case SettingsCommandId.RESET_TRIP:
        return this.resetTrip();
    }
  }

  // Convenience commands

  beep(): Promise<void> {
    return this.sendCommand({ type: 'Beep' });
  }

  /** Alias of {@link beep}. */
  wheelBeep(): Promise<void> {
    return this.beep();
  }

  toggleLight(enabled: boolean): Promise<void> {
    return this.setLight(enabled);
  }

  setLight(enabled: boolean): Promise<void> {
    return this.sendCommand({ type: 'SetLight', enabled });
  }

  setLed(enabled: boolean): Promise<void> {
    return this.sendCommand({ type: 'SetLed', enabled });
  }

  setLightMode(mode: number): Promise<void> {
    return this.sendCommand({ type: 'SetLightMode', mode });
  }

  setLedMode(mode: number): Promise<void> {
    return this.sendCommand({ type: 'SetLedMode', mode });
  }

  setStrobeMode(mode: number): Promise<void> {
    return this.sendCommand({ type: 'SetStrobeMode', mode });
  }

  /** 0 = hard, 1 = medium, 2 = soft. */
  setPedalsMode(mode: number): Promise<void> {
    return this.sendCommand({ type: 'SetPedalsMode', mode });
  }

  setAlarmMode(mode: number): Promise<void> {
    return this.sendCommand({ type: 'SetAlarmMode', mode });
  }

  calibrate(): Promise<void> {
    return this.sendCommand({ type: 'Calibrate' });
  }

  powerOff(): Promise<void> {
    return this.sendCommand({ type: 'PowerOff' });
  }

  setLock(locked: boolean): Promise<void> {
    return this.sendCommand({ type: 'SetLock', locked });
  }

  resetTrip(): Promise<void> {
    return this.sendCommand({ type: 'ResetTrip' });
  }

  setMaxSpeed(speed: number): Promise<void> {
    return this.sendCommand({ type: 'SetMaxSpeed', speed });
  }

  setAlarmSpeed(speed: number, num: number): Promise<void> {
    return this.sendCommand({ type: 'SetAlarmSpeed', speed, num });
  }

  setAlarmEnabled(enabled: boolean, num: number): Promise<void> {
    return this.sendCommand({ type: 'SetAlarmEnabled', enabled, num });
  }

  setLimitedMode(enabled: boolean): Promise<void> {
    return this.sendCommand({ type: 'SetLimitedMode', enabled });
  }

  setLimitedSpeed(speed: number): Promise<void> {
    return this.sendCommand({ type: 'SetLimitedSpeed', speed });
  }

  setTailLight(enabled: boolean): Promise<void> {
    return this.sendCommand({ type: 'SetTailLight', enabled });
  }

  setDrl(enabled: boolean): Promise<void> {
    return this.sendCommand({ type: 'SetDrl', enabled });
  }

  setLedColor(value: number, ledNum: number): Promise<void> {
    return this.sendCommand({ type: 'SetLedColor', value, ledNum });
  }

  setLightBrightness(brightness: number): Promise<void> {
    return this.sendCommand({ type: 'SetLightBrightness', brightness });
  }

  setHandleButton(enabled: boolean): Promise<void> {
    return this.sendCommand({ type: 'SetHandleButton', enabled });
  }

  setBrakeAssist(enabled: boolean): Promise<void> {
    return this.sendCommand({ type: 'SetBrakeAssist', enabled });
  }

  setTransportMode(enabled: boolean): Promise<void> {
    return this.sendCommand({ type: 'SetTransportMode', enabled });
  }

  setRideMode(enabled: boolean): Promise<void> {
    return this.sendCommand({ type: 'SetRideMode', enabled });
  }

  setGoHomeMode(enabled: boolean): Promise<void> {
    return this.sendCommand({ type: 'SetGoHomeMode', enabled });
  }

  setFancierMode(enabled: boolean): Promise<void> {
    return this.sendCommand({ type: 'SetFancierMode', enabled });
  }

  setRollAngleMode(mode: number): Promise<void> {
    return this.sendCommand({ type: 'SetRollAngleMode', mode });
  }

  setMute(enabled: boolean): Promise<void> {
    return this.sendCommand({ type: 'SetMute', enabled });
  }

  setSpeakerVolume(volume: number): Promise<void> {
    return this.sendCommand({ type: 'SetSpeakerVolume', volume });
  }

  setBeeperVolume(volume: number): Promise<void> {
    return this.sendCommand({ type: 'SetBeeperVolume', volume });
  }

  setFanQuiet(enabled: boolean): Promise<void> {
    return this.sendCommand({ type: 'SetFanQuiet', enabled });
  }

  setFan(enabled: boolean): Promise<void> {
    return this.sendCommand({ type: 'SetFan', enabled });
  }

  setPedalTilt(angle: number): Promise<void> {
    return this.sendCommand({ type: 'SetPedalTilt', angle });
  }

  setPedalSensitivity(sensitivity: number): Promise<void> {
    return this.sendCommand({ type: 'SetPedalSensitivity', sensitivity });
  }

  setMilesMode(enabled: boolean): Promise<void> {
    return this.sendCommand({ type: 'SetMilesMode', enabled });
  }

  requestBmsData(bmsNum: number, dataType: number): Promise<void> {
    return this.sendCommand({ type: 'RequestBmsData', bmsNum, dataType });
  }

  setKingsongAlarms(alarm1: number, alarm2: number, alarm3: number, maxSpeed: number): Promise<void> {
    return this.sendCommand({ type: 'SetKingsongAlarms', alarm1, alarm2, alarm3, maxSpeed });
  }

  requestAlarmSettings(): Promise<void> {
    return this.sendCommand({ type: 'RequestAlarmSettings' });
  }

  setCutoutAngle(angle: number): Promise<void> {
    return this.sendCommand({ type: 'SetCutoutAngle', angle });
  }

  // Internals

  private setConnectionState(state: ConnectionState): void {
    this.connectionState.setState(state, true);
  }

  private setupDecoder(wheelType: WheelType): void {
    this.decoder?.reset();
    this.decoder = this.decoderFactory.createDecoder(wheelType);
    this.wheelState.setState({ wheelType });

    if (!this.decoder) {
      console.warn(`[${TAG}] No decoder for ${wheelType}`);
      this.keepAliveTimer.stop();
      return;
    }
    console.log(`[${TAG}] Using ${wheelType} decoder`);

    const init = this.decoder.getInitCommands();
    if (init.length > 0) {
      void this.dispatch(init);
    }
    // Polled families walk their handshake from keep-alive ticks.
    this.startKeepAliveTimer(this.decoder);
  }

  /**
   * Write raw commands in order. Each SendDelayed waits relative to the
   * previous command of the same batch; anything after a delay is scheduled
   * too. Semantic commands inside a batch are dropped.
   */
  private async dispatch(commands: readonly WheelCommand[]): Promise<void> {
    let offsetMs = 0;
    for (const command of commands) {
      switch (command.type) {
        case 'SendBytes':
          if (offsetMs > 0) {
            this.scheduleWrite(command.data, offsetMs);
          } else {
            await this.write(command.data);
          }
          break;
        case 'SendDelayed':
          offsetMs += command.delayMs;
          this.scheduleWrite(command.data, offsetMs);
          break;
        default:
          console.debug(`[${TAG}] Nested ${command.type} ignored`);
      }
    }
  }

  private scheduleWrite(data: Uint8Array, delayMs: number): void {
    this.commandScheduler.schedule(delayMs, async () => {
      await this.write(data);
    });
  }

  private write(data: Uint8Array): Promise<boolean> {
    const result = this.writeChain
      .then(() => this.transport.write(data))
      .then(
        (ok) => {
          if (!ok) console.warn(`[${TAG}] Write of ${data.length} bytes failed`);
          return ok;
        },
        (error: unknown) => {
          console.warn(`[${TAG}] Write of ${data.length} bytes threw: ${errorMessage(error)}`);
          return false;
        }
      );
    this.writeChain = result.then(() => undefined);
    return result;
  }

  private startKeepAliveTimer(decoder: WheelDecoder): void {
    // A zero interval leaves the timer stopped.
    this.keepAliveTimer.start(decoder.keepAliveIntervalMs, async () => {
      if (this.decoder !== decoder) return;
      const command = decoder.getKeepAliveCommand();
      if (command) {
        await this.sendCommand(command);
      }
    });
  }

  private startDataTimeoutMonitor(address: string): void {
    const seconds = Math.round(this.dataTimeoutMs / 1000);
    this.dataTimeoutTracker.start(() => {
      console.warn(`[${TAG}] No data from ${address} for ${seconds} s`);
      this.setConnectionState(ConnectionState.connectionLost(address, `No data received for ${seconds} seconds`));
      this.stopTimers();
    }, this.dataTimeoutMs);
  }

  private stopTimers(): void {
    this.keepAliveTimer.stop();
    this.dataTimeoutTracker.stop();
  }

  private currentAddress(): string | undefined {
    const state = this.connectionState.getState();
    return state.status === 'Failed' ? undefined : connectionAddress(state);
  }
}
