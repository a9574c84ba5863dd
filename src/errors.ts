export type ErrorCode = 'ERR_CONFIG_INVALID' | 'ERR_INPUT_EMPTY' | 'ERR_PROVIDER' | 'ERR_TIMEOUT';

export class PriceCompareError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends PriceCompareError {
  constructor(message: string) {
    super('ERR_CONFIG_INVALID', message);
  }
}

export class InputError extends PriceCompareError {
  constructor(message: string) {
    super('ERR_INPUT_EMPTY', message);
  }
}

export class ProviderError extends PriceCompareError {
  constructor(
    readonly provider: string,
    message: string
  ) {
    super('ERR_PROVIDER', `${provider}: ${message}`);
  }
}

export class TimeoutError extends PriceCompareError {
  constructor(readonly timeoutMs: number) {
    super('ERR_TIMEOUT', `timed out after ${timeoutMs}ms`);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
