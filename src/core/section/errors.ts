/**
 * Error types raised while building section geometry.
 */

/** Values that must be zero or larger, reported by field name */
export class NegativeValueError extends Error {
  readonly values: Readonly<Record<string, number>>;

  constructor(values: Record<string, number>) {
    super(`Negative values are not allowed: ${formatValues(values)}`);
    this.name = 'NegativeValueError';
    this.values = { ...values };
  }
}

/** Values that must be strictly larger than zero */
export class NotPositiveValueError extends Error {
  readonly values: Readonly<Record<string, number>>;

  constructor(values: Record<string, number>) {
    super(`Values must be greater than zero: ${formatValues(values)}`);
    this.name = 'NotPositiveValueError';
    this.values = { ...values };
  }
}

/** Dimension combinations that cannot describe a profile */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

export class InvalidPolygonError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPolygonError';
  }
}

export class FullyCorrodedError extends Error {
  constructor(message = 'The profile has fully corroded.') {
    super(message);
    this.name = 'FullyCorrodedError';
  }
}

export class ProfileNotFoundError extends Error {
  constructor(readonly family: string, readonly key: string) {
    super(`Profile "${key}" not found in the ${family.toUpperCase()} catalog`);
    this.name = 'ProfileNotFoundError';
  }
}

function formatValues(values: Record<string, number>): string {
  return Object.entries(values).map(([key, value]) => `${key}=${value}`).join(', ');
}
