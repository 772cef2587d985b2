export type ErrorCode = 'DATA_ERROR' | 'CONFIG_ERROR';

export class BacktestError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Malformed or insufficient bar data. Raised before any computation starts.
 */
export class DataError extends BacktestError {
  constructor(message: string) {
    super('DATA_ERROR', message);
  }
}

/**
 * Invalid engine configuration (unknown strategy, unknown tie-break, bad period...).
 */
export class ConfigError extends BacktestError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIG_ERROR', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}
