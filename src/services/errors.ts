export type SpotlightErrorCode = 'INVALID_CONFIG' | 'TARGET_NOT_READY';

export class SpotlightError extends Error {
  code: SpotlightErrorCode;

  constructor(message: string, code: SpotlightErrorCode) {
    super(message);
    this.name = 'SpotlightError';
    this.code = code;
  }
}

export class ConfigurationError extends SpotlightError {
  field: string;
  value: unknown;

  constructor(field: string, value: unknown, expectation: string) {
    super(`Invalid ${field}: ${String(value)} (${expectation})`, 'INVALID_CONFIG');
    this.name = 'ConfigurationError';
    this.field = field;
    this.value = value;
  }
}

/** The host layout has not measured the target yet. */
export class NotReadyError extends SpotlightError {
  constructor(message = 'Target has not been laid out yet') {
    super(message, 'TARGET_NOT_READY');
    this.name = 'NotReadyError';
  }
}
