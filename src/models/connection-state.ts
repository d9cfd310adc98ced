/**
 * Connection and reconnect state machines, as tagged unions.
 */

export type ConnectionState =
  | { readonly status: 'Disconnected' }
  | { readonly status: 'Scanning' }
  | { readonly status: 'Connecting'; readonly address: string }
  | { readonly status: 'DiscoveringServices'; readonly address: string }
  | { readonly status: 'Connected'; readonly address: string; readonly wheelName: string }
  | { readonly status: 'ConnectionLost'; readonly address: string; readonly reason: string }
  | { readonly status: 'Failed'; readonly error: string; readonly address?: string };

export type ConnectionStatus = ConnectionState['status'];

/**
 * Constructors for each connection state.
 */
export const ConnectionState = {
  disconnected: (): ConnectionState => ({ status: 'Disconnected' }),
  scanning: (): ConnectionState => ({ status: 'Scanning' }),
  connecting: (address: string): ConnectionState => ({ status: 'Connecting', address }),
  discoveringServices: (address: string): ConnectionState => ({
    status: 'DiscoveringServices',
    address,
  }),
  connected: (address: string, wheelName: string): ConnectionState => ({
    status: 'Connected',
    address,
    wheelName,
  }),
  connectionLost: (address: string, reason: string): ConnectionState => ({
    status: 'ConnectionLost',
    address,
    reason,
  }),
  failed: (error: string, address?: string): ConnectionState =>
    address === undefined ? { status: 'Failed', error } : { status: 'Failed', error, address },
} as const;

export function isConnected(state: ConnectionState): boolean {
  return state.status === 'Connected';
}

/** True while a connection is being set up. */
export function isConnecting(state: ConnectionState): boolean {
  return state.status === 'Connecting' || state.status === 'DiscoveringServices';
}

/** Address the state refers to, if any. */
export function connectionAddress(state: ConnectionState): string | undefined {
  switch (state.status) {
    case 'Disconnected':
    case 'Scanning':
      return undefined;
    default:
      return state.address;
  }
}

/** Short human-readable status line. */
export function connectionStatusText(state: ConnectionState): string {
  switch (state.status) {
    case 'Disconnected':
      return 'Disconnected';
    case 'Scanning':
      return 'Scanning...';
    case 'Connecting':
      return 'Connecting...';
    case 'DiscoveringServices':
      return 'Discovering services...';
    case 'Connected':
      return `Connected to ${state.wheelName}`;
    case 'ConnectionLost':
      return `Connection lost: ${state.reason}`;
    case 'Failed':
      return `Failed: ${state.error}`;
  }
}

export type ReconnectState =
  | { readonly status: 'Idle' }
  | { readonly status: 'Waiting'; readonly attempt: number; readonly nextRetryMs: number }
  | { readonly status: 'Attempting'; readonly attempt: number };

export const ReconnectState = {
  idle: (): ReconnectState => ({ status: 'Idle' }),
  waiting: (attempt: number, nextRetryMs: number): ReconnectState => ({
    status: 'Waiting',
    attempt,
    nextRetryMs,
  }),
  attempting: (attempt: number): ReconnectState => ({ status: 'Attempting', attempt }),
} as const;
