import type { FetchFailureKind } from './types.js';

export class FetchFailure extends Error {
  constructor(
    readonly kind: FetchFailureKind,
    readonly url: string,
    message: string,
  ) {
    super(`${kind} for ${url}: ${message}`);
    this.name = 'FetchFailure';
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastFailure: FetchFailure,
  ) {
    super(`Gave up after ${attempts} attempt(s): ${lastFailure.message}`);
    this.name = 'RetryExhaustedError';
  }
}

export class BrowserLaunchError extends Error {
  constructor(cause: unknown) {
    super(`Browser could not be started: ${String(cause)}`);
    this.name = 'BrowserLaunchError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
