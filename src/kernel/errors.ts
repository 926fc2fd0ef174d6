// ── Error Classes ────────────────────────────────────────────────────────────

export class OfferDeskError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'OfferDeskError';
  }
}

/** Malformed operator input. Nothing was written. */
export class ValidationError extends OfferDeskError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/** The classification call failed or answered with something other than the expected object. */
export class InterpretationError extends OfferDeskError {
  constructor(
    message: string,
    public readonly rawContent?: string,
    cause?: unknown,
  ) {
    super(message, 'INTERPRETATION_ERROR', cause);
    this.name = 'InterpretationError';
  }
}

export class StorageFault extends OfferDeskError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown,
  ) {
    super(message, 'STORAGE_FAULT', cause);
    this.name = 'StorageFault';
  }
}

export class ConfigError extends OfferDeskError {
  constructor(
    message: string,
    public readonly missing: string[] = [],
  ) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
