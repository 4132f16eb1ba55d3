/** A persistence operation failed; the triggering call must fail with it. */
export class StoreError extends Error {
  constructor(
    message: string,
    public operation: string,
    public cause?: unknown,
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

/** A serialized record could not be decoded into a typed entity. */
export class CodecError extends Error {
  constructor(
    message: string,
    public field: string,
  ) {
    super(message);
    this.name = 'CodecError';
  }
}

/** `recordEvent` was given input that cannot become a TraceEvent. */
export class InvalidEventError extends Error {
  constructor(
    message: string,
    public errors: Array<{ field: string; message: string }>,
  ) {
    super(message);
    this.name = 'InvalidEventError';
  }
}

/** config.json is unreadable or holds a value of the wrong type. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public key: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
