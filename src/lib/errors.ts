// src/lib/errors.ts
import type { DateTime } from 'luxon';
import type { Body } from '@/lib/ephemeris/port';

function isoOrInvalid(instant: DateTime): string {
  return instant.toISO() ?? `invalid(${instant.invalidReason ?? 'unknown'})`;
}

/** Static gate data is malformed. Raised while building the table, never at lookup time. */
export class ConfigurationError extends Error {
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

/** A longitude outside [0, 360) reached the table: the caller forgot to normalize. */
export class OutOfRangeError extends Error {
  readonly longitude: number;

  constructor(longitude: number) {
    super(`Longitude ${longitude} is outside [0, 360)`);
    this.name = 'OutOfRangeError';
    this.longitude = longitude;
  }
}

export class EphemerisError extends Error {
  readonly body: Body;
  readonly instant: DateTime;

  constructor(body: Body, instant: DateTime, message: string, options?: { cause?: unknown }) {
    super(`${body} @ ${isoOrInvalid(instant)}: ${message}`, options);
    this.name = 'EphemerisError';
    this.body = body;
    this.instant = instant;
  }
}

/** One body of an activation set could not be computed; the whole set is discarded. */
export class ComputationError extends Error {
  readonly body: Body;
  readonly instant: DateTime;

  constructor(body: Body, instant: DateTime, message: string, options?: { cause?: unknown }) {
    super(`Cannot compute activation for ${body} @ ${isoOrInvalid(instant)}: ${message}`, options);
    this.name = 'ComputationError';
    this.body = body;
    this.instant = instant;
  }
}

export type SolverBracket = { lo: DateTime; hi: DateTime };

export type SolverDiagnostics = {
  birth: DateTime;
  targetLongitude: number;
  toleranceDegrees: number;
  bracket: SolverBracket;
  /** Signed residual in degrees at the last evaluated instant. */
  residual: number;
  iterations: number;
};

function describeBracket(b: SolverBracket): string {
  return `[${isoOrInvalid(b.lo)}, ${isoOrInvalid(b.hi)}]`;
}

export class SolverDivergenceError extends Error {
  readonly diagnostics: SolverDiagnostics;

  constructor(diagnostics: SolverDiagnostics) {
    super(
      `Design time did not converge after ${diagnostics.iterations} iterations ` +
      `(target ${diagnostics.targetLongitude.toFixed(6)}°, residual ${diagnostics.residual.toExponential(3)}°, ` +
      `tolerance ${diagnostics.toleranceDegrees.toExponential(3)}°, bracket ${describeBracket(diagnostics.bracket)})`
    );
    this.name = 'SolverDivergenceError';
    this.diagnostics = diagnostics;
  }
}

export class NoBracketError extends Error {
  readonly diagnostics: SolverDiagnostics;

  constructor(diagnostics: SolverDiagnostics) {
    super(
      `No sign change of the solar residual inside ${describeBracket(diagnostics.bracket)} ` +
      `(target ${diagnostics.targetLongitude.toFixed(6)}°)`
    );
    this.name = 'NoBracketError';
    this.diagnostics = diagnostics;
  }
}

/** Bad local birth data (date, time, zone or coordinates). */
export class BirthInputError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = 'BirthInputError';
    this.field = field;
  }
}

export const CHART_UNAVAILABLE_MESSAGE = 'Unable to compute chart for the given birth data.';

/**
 * Message safe to show an end user. Computation and solver failures collapse to
 * one sentence; input errors keep their own text.
 */
export function describeFailure(err: unknown): string {
  if (err instanceof BirthInputError) return err.message;
  if (
    err instanceof ComputationError ||
    err instanceof EphemerisError ||
    err instanceof SolverDivergenceError ||
    err instanceof NoBracketError
  ) {
    return CHART_UNAVAILABLE_MESSAGE;
  }
  return 'Unexpected error.';
}
