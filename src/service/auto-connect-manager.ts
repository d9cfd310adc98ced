/**
 * Startup auto-connect and reconnect-after-loss with backoff.
 *
 * The manager watches the connection state store:
 * - Connected clears the startup flag and ends a waiting reconnect loop
 * - Failed clears the startup flag
 *
 * A reconnect attempt is followed by a settle window. If the link comes up
 * during that window the loop ends when the window closes.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { errorMessage } from '../exceptions';
import { isConnected, ReconnectState, type ConnectionState } from '../models/connection-state';

const TAG = 'AutoConnectManager';

export interface AutoConnectOptions {
  /** How long the startup flag stays set without a connection. */
  startupTimeoutMs?: number;
  /** Wait before each attempt; the last value repeats. */
  backoffMs?: readonly number[];
  /** Wait after each attempt before the next backoff starts. */
  settleMs?: number;
}

export class AutoConnectManager {
  static readonly DEFAULT_STARTUP_TIMEOUT_MS = 10_000;
  static readonly DEFAULT_BACKOFF_MS: readonly number[] = [2_000, 4_000, 8_000, 16_000, 30_000];
  static readonly DEFAULT_SETTLE_MS = 3_000;

  readonly isAutoConnecting: StoreApi<boolean> = createStore<boolean>()(() => false);
  readonly reconnectState: StoreApi<ReconnectState> = createStore<ReconnectState>()(() => ReconnectState.idle());

  private readonly startupTimeoutMs: number;
  private readonly backoffMs: readonly number[];
  private readonly settleMs: number;

  private startupHandle: ReturnType<typeof setTimeout> | null = null;
  private reconnectHandle: ReturnType<typeof setTimeout> | null = null;
  // Bumped whenever the reconnect loop is stopped or restarted.
  private loopId = 0;
  private settling = false;
  private connectedWhileSettling = false;
  private unsubscribe: (() => void) | null;

  constructor(
    connectionState: StoreApi<ConnectionState>,
    private readonly connect: (address: string) => Promise<void>,
    options: AutoConnectOptions = {}
  ) {
    this.startupTimeoutMs = options.startupTimeoutMs ?? AutoConnectManager.DEFAULT_STARTUP_TIMEOUT_MS;
    const backoff = options.backoffMs ?? AutoConnectManager.DEFAULT_BACKOFF_MS;
    this.backoffMs = backoff.length > 0 ? backoff : AutoConnectManager.DEFAULT_BACKOFF_MS;
    this.settleMs = options.settleMs ?? AutoConnectManager.DEFAULT_SETTLE_MS;

    this.unsubscribe = connectionState.subscribe((state) => this.onConnectionState(state));
  }

  private onConnectionState(state: ConnectionState): void {
    if (isConnected(state)) {
      this.clearAutoConnect();
      if (this.settling) {
        this.connectedWhileSettling = true;
      } else {
        this.stopReconnecting();
      }
    } else if (state.status === 'Failed') {
      this.clearAutoConnect();
    }
  }

  /**
   * One connect attempt to a remembered address. The auto-connecting flag
   * clears on its own after the startup timeout. Blank addresses are ignored.
   */
  attemptStartupConnect(address: string, timeoutMs: number = this.startupTimeoutMs): void {
    if (address.trim() === '') return;

    this.clearAutoConnect();
    this.isAutoConnecting.setState(true);
    this.startupHandle = setTimeout(() => {
      this.startupHandle = null;
      if (this.isAutoConnecting.getState()) {
        console.log(`[${TAG}] Startup connect to ${address} timed out`);
        this.isAutoConnecting.setState(false);
      }
    }, timeoutMs);

    this.connect(address).catch((error: unknown) => {
      console.warn(`[${TAG}] Startup connect failed: ${errorMessage(error)}`);
    });
  }

  /**
   * Retry connecting to `address` until a connection is observed or the loop
   * is stopped. Restarting replaces a running loop.
   */
  startReconnecting(address: string, backoffMs: readonly number[] = this.backoffMs): void {
    if (address.trim() === '') return;
    this.stopReconnecting();

    const schedule = backoffMs.length > 0 ? backoffMs : this.backoffMs;
    const id = this.loopId;
    console.log(`[${TAG}] Reconnecting to ${address}`);
    this.waitForAttempt(id, address, schedule, 1);
  }

  private waitForAttempt(id: number, address: string, schedule: readonly number[], attempt: number): void {
    const delayMs = schedule[Math.min(attempt - 1, schedule.length - 1)];
    this.reconnectState.setState(ReconnectState.waiting(attempt, delayMs), true);
    this.reconnectHandle = setTimeout(() => {
      this.reconnectHandle = null;
      void this.runAttempt(id, address, schedule, attempt);
    }, delayMs);
  }

  private async runAttempt(id: number, address: string, schedule: readonly number[], attempt: number): Promise<void> {
    if (id !== this.loopId) return;
    this.reconnectState.setState(ReconnectState.attempting(attempt), true);
    this.settling = true;
    this.connectedWhileSettling = false;

    this.reconnectHandle = setTimeout(() => {
      this.reconnectHandle = null;
      this.settling = false;
      if (id !== this.loopId) return;
      if (this.connectedWhileSettling) {
        console.log(`[${TAG}] Reconnected after ${attempt} attempt(s)`);
        this.stopReconnecting();
        return;
      }
      this.waitForAttempt(id, address, schedule, attempt + 1);
    }, this.settleMs);

    try {
      await this.connect(address);
    } catch (error) {
      console.warn(`[${TAG}] Reconnect attempt ${attempt} failed: ${errorMessage(error)}`);
    }
  }

  stopReconnecting(): void {
    this.loopId++;
    this.settling = false;
    this.connectedWhileSettling = false;
    if (this.reconnectHandle !== null) {
      clearTimeout(this.reconnectHandle);
      this.reconnectHandle = null;
    }
    if (this.reconnectState.getState().status !== 'Idle') {
      this.reconnectState.setState(ReconnectState.idle(), true);
    }
  }

  /** Stop both loops, e.g. on an explicit user disconnect. */
  stop(): void {
    this.clearAutoConnect();
    this.stopReconnecting();
  }

  destroy(): void {
    this.stop();
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  private clearAutoConnect(): void {
    if (this.startupHandle !== null) {
      clearTimeout(this.startupHandle);
      this.startupHandle = null;
    }
    if (this.isAutoConnecting.getState()) {
      this.isAutoConnecting.setState(false);
    }
  }
}
