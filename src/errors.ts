export class CompositionError extends Error {
  override readonly name = 'CompositionError';

  constructor(message: string) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SchemaError extends Error {
  override readonly name = 'SchemaError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NonUniqueResultError extends Error {
  override readonly name = 'NonUniqueResultError';

  constructor(
    readonly rowCount: number,
    message?: string,
  ) {
    super(message ?? `Expected at most one result but the query matched ${rowCount} or more rows`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
