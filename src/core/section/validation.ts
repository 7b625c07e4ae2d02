/**
 * Eager argument checks used by profile constructors and the path builder.
 */

import { NegativeValueError, NotPositiveValueError, PreconditionError } from './errors';

/** Throws for every named value below zero (NaN counts as invalid) */
export function raiseIfNegative(values: Record<string, number>): void {
  const offending: Record<string, number> = {};
  for (const [key, value] of Object.entries(values)) {
    if (!(value >= 0)) offending[key] = value;
  }
  if (Object.keys(offending).length > 0) {
    throw new NegativeValueError(offending);
  }
}

export function raiseIfNotPositive(values: Record<string, number>): void {
  const offending: Record<string, number> = {};
  for (const [key, value] of Object.entries(values)) {
    if (!(value > 0)) offending[key] = value;
  }
  if (Object.keys(offending).length > 0) {
    throw new NotPositiveValueError(offending);
  }
}

export function raiseIfNotFinite(values: Record<string, number>): void {
  for (const [key, value] of Object.entries(values)) {
    if (!Number.isFinite(value)) {
      throw new PreconditionError(`Value must be a finite number: ${key}=${value}`);
    }
  }
}
