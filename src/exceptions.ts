/**
 * Exception classes for the EUC communication core.
 */

export class EucError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EucError';
  }
}

export class TransportError extends EucError {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

export class ConfigurationError extends EucError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
