export class FilterParseError extends Error {
  override readonly name = 'FilterParseError';

  constructor(
    readonly position: number,
    readonly expected: readonly string[],
    readonly found: string,
    message?: string,
  ) {
    super(message ?? FilterParseError.describe(position, expected, found));
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  private static describe(position: number, expected: readonly string[], found: string): string {
    const what = found === '' ? 'end of input' : `'${found}'`;
    return `Unexpected ${what} at offset ${position}; expected ${expected.join(', ')}`;
  }
}

export class FilterValidationError extends Error {
  override readonly name = 'FilterValidationError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DimensionMismatchError extends Error {
  override readonly name = 'DimensionMismatchError';

  constructor(
    readonly expected: number,
    readonly actual: number,
    message?: string,
  ) {
    super(message ?? `Embedding dimension mismatch: expected ${expected}, got ${actual}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SchemaValidationError extends Error {
  override readonly name = 'SchemaValidationError';

  constructor(
    readonly identifier: string,
    message: string,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class VectorStoreError extends Error {
  override readonly name = 'VectorStoreError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
