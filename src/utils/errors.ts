/**
 * Error Taxonomy
 *
 * Failures the bot tells apart:
 * - InvalidArgumentError: programmer error, fails fast and is never retried
 * - DataUnavailableError: transient price provider failure, retried with backoff
 * - DispatchError: delivery to one recipient failed
 * - ConfigError: startup configuration is missing or malformed
 *
 * Invalid price data is not thrown: validatePriceData() returns false and the
 * cycle is skipped.
 */

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class DataUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DataUnavailableError';
  }
}

export class DispatchError extends Error {
  constructor(
    public readonly chatId: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DispatchError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
