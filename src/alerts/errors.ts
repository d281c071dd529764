// ── Error Classes ────────────────────────────────────────────────────────────

export type AlertConsoleErrorCode =
  | 'NORMALIZATION_FAILED'
  | 'INVALID_RESPONSE_SHAPE'
  | 'TRANSPORT_ERROR'
  | 'PRECONDITION_FAILED'
  | 'CONFIG_INVALID';

export class AlertConsoleError extends Error {
  constructor(
    message: string,
    public readonly code: AlertConsoleErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AlertConsoleError';
  }
}

/** A single payload that cannot be turned into an alert at all. */
export class NormalizationFailure extends AlertConsoleError {
  constructor(message: string) {
    super(message, 'NORMALIZATION_FAILED');
    this.name = 'NormalizationFailure';
  }
}

export class InvalidResponseShapeError extends AlertConsoleError {
  constructor(
    public readonly alertId: string,
    public readonly keys: string[]
  ) {
    super('Invalid alert response format', 'INVALID_RESPONSE_SHAPE');
    this.name = 'InvalidResponseShapeError';
  }
}

export class TransportError extends AlertConsoleError {
  constructor(
    message: string,
    public readonly method: string,
    public readonly path: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'TRANSPORT_ERROR', options);
    this.name = 'TransportError';
  }
}

/** Raised locally before any remote call: no selection, action already pending. */
export class PreconditionError extends AlertConsoleError {
  constructor(message: string) {
    super(message, 'PRECONDITION_FAILED');
    this.name = 'PreconditionError';
  }
}

export class ConfigError extends AlertConsoleError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}
