/**
 * Custom Error Classes for plugkit
 */

/**
 * Error thrown when a span is closed but only the synthetic root is open
 */
export class StackUnderflowError extends Error {
  public readonly rootName: string;

  constructor(rootName: string) {
    super(
      `Cannot exit profile span: only the root "${rootName}" is open. ` +
      `Every exit() must be paired with an earlier enter().`
    );
    this.name = 'StackUnderflowError';
    this.rootName = rootName;

    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StackUnderflowError);
    }
  }
}

/**
 * Error thrown when a pre-measured span carries an unusable duration
 */
export class InvalidDurationError extends Error {
  public readonly spanName: string;
  public readonly elapsed: number;

  constructor(spanName: string, elapsed: number) {
    super(`Invalid duration ${elapsed} for span "${spanName}": expected a finite, non-negative number of nanoseconds`);
    this.name = 'InvalidDurationError';
    this.spanName = spanName;
    this.elapsed = elapsed;
  }
}

/**
 * Error thrown when dump() meets a value it cannot write as a table literal
 */
export class UnsupportedValueError extends Error {
  public readonly valueType: string;

  constructor(valueType: string, reason?: string) {
    super(reason ? `Unsupported type ${valueType}: ${reason}` : `Unsupported type ${valueType}`);
    this.name = 'UnsupportedValueError';
    this.valueType = valueType;
  }
}

/**
 * Error thrown when an environment setting cannot be parsed
 */
export class ConfigurationError extends Error {
  public readonly key: string;
  public readonly value: string;

  constructor(key: string, value: string, expected: string) {
    super(`Invalid value "${value}" for ${key}: expected ${expected}`);
    this.name = 'ConfigurationError';
    this.key = key;
    this.value = value;
  }
}
