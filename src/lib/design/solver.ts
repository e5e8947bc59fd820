// src/lib/design/solver.ts
// Finds the design instant: the moment before birth when the Sun stood
// `arcDegrees` (88°) behind its birth longitude. Solar motion is not uniform,
// so the offset is searched rather than computed.
import { DateTime } from 'luxon';
import { getConfig } from '@/lib/config';
import type { EphemerisPort } from '@/lib/ephemeris/port';
import {
  NoBracketError,
  SolverDivergenceError,
  type SolverBracket,
  type SolverDiagnostics,
} from '@/lib/errors';
import { createLogger } from '@/lib/log';
import { midpoint, shiftDays, toUtcInstant } from '@/lib/time';

const log = createLogger('design/solver');

export const DESIGN_ARC_DEG = 88;

export type DesignSolverOptions = {
  arcDegrees?: number;
  /** Stop once |sun(t) - target| is within this many degrees. Default 1″. */
  toleranceDegrees?: number;
  maxIterations?: number;
  /** Days before birth, [far, near]. */
  bracketDays?: readonly [number, number];
  /** Tried once when bracketDays holds no sign change. */
  widenedBracketDays?: readonly [number, number];
};

export type SolveSuccess = {
  ok: true;
  instant: DateTime;
  iterations: number;
  residual: number;
  widened: boolean;
};

export type SolveFailure = {
  ok: false;
  reason: 'no-bracket' | 'divergence';
  diagnostics: SolverDiagnostics;
};

export type SolveResult = SolveSuccess | SolveFailure;

/** (a − b) folded into (−180, +180]. */
export function signedDelta(a: number, b: number): number {
  let d = (a - b) % 360;
  if (d > 180) d -= 360;
  if (d <= -180) d += 360;
  return d;
}

export function normalizeDegrees(x: number): number {
  const d = ((x % 360) + 360) % 360;
  return d === 360 ? 0 : d;
}

type Sample = { t: DateTime; f: number };

export class DesignTimeSolver {
  private readonly arc: number;
  private readonly tolerance: number;
  private readonly maxIterations: number;
  private readonly bracket: readonly [number, number];
  private readonly widened: readonly [number, number];

  constructor(private readonly ephemeris: EphemerisPort, options: DesignSolverOptions = {}) {
    const cfg = getConfig().design;
    this.arc = options.arcDegrees ?? DESIGN_ARC_DEG;
    this.tolerance = options.toleranceDegrees ?? cfg.toleranceDegrees;
    this.maxIterations = options.maxIterations ?? cfg.maxIterations;
    this.bracket = options.bracketDays ?? [92, 84];
    this.widened = options.widenedBracketDays ?? [96, 80];

    for (const [far, near] of [this.bracket, this.widened]) {
      if (!(far > near && near > 0)) {
        throw new RangeError(`Bracket [${far}, ${near}] days must satisfy far > near > 0`);
      }
    }
    if (!(this.tolerance > 0)) throw new RangeError(`toleranceDegrees must be > 0, got ${this.tolerance}`);
    if (!Number.isInteger(this.maxIterations) || this.maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${this.maxIterations}`);
    }
  }

  /** Throws NoBracketError / SolverDivergenceError instead of returning a failure. */
  async solve(birth: DateTime): Promise<DateTime> {
    const res = await this.trySolve(birth);
    if (res.ok) return res.instant;
    throw res.reason === 'no-bracket'
      ? new NoBracketError(res.diagnostics)
      : new SolverDivergenceError(res.diagnostics);
  }

  /**
   * Ephemeris failures still throw: only the expected numerical outcomes
   * (no sign change, budget exhausted) come back as a failure result.
   */
  async trySolve(birth: DateTime): Promise<SolveResult> {
    const utc = toUtcInstant(birth);
    if (!utc) throw new RangeError('Birth instant is not a valid luxon DateTime');

    const sunAtBirth = await this.ephemeris.longitudeOf('Sun', utc);
    const target = normalizeDegrees(sunAtBirth - this.arc);
    const f = async (t: DateTime): Promise<Sample> => ({
      t,
      f: signedDelta(await this.ephemeris.longitudeOf('Sun', t), target),
    });

    const diag = (b: SolverBracket, residual: number, iterations: number): SolverDiagnostics => ({
      birth: utc,
      targetLongitude: target,
      toleranceDegrees: this.tolerance,
      bracket: b,
      residual,
      iterations,
    });

    let widened = false;
    let lo = await f(shiftDays(utc, -this.bracket[0]));
    let hi = await f(shiftDays(utc, -this.bracket[1]));

    if (!straddles(lo, hi, this.tolerance)) {
      log.warn('no sign change in primary bracket, widening', {
        birth: utc.toISO(), target, fLo: lo.f, fHi: hi.f,
      });
      widened = true;
      lo = await f(shiftDays(utc, -this.widened[0]));
      hi = await f(shiftDays(utc, -this.widened[1]));
      if (!straddles(lo, hi, this.tolerance)) {
        const nearest = Math.abs(lo.f) < Math.abs(hi.f) ? lo.f : hi.f;
        return { ok: false, reason: 'no-bracket', diagnostics: diag({ lo: lo.t, hi: hi.t }, nearest, 0) };
      }
    }

    if (Math.abs(lo.f) <= this.tolerance) return { ok: true, instant: lo.t, iterations: 0, residual: lo.f, widened };
    if (Math.abs(hi.f) <= this.tolerance) return { ok: true, instant: hi.t, iterations: 0, residual: hi.f, widened };

    // Odd iterations bisect, even ones take a false-position step.
    // f(lo) and f(hi) keep opposite signs throughout.
    let last: Sample = Math.abs(lo.f) < Math.abs(hi.f) ? lo : hi;

    for (let i = 1; i <= this.maxIterations; i++) {
      const t = i % 2 === 1 ? midpoint(lo.t, hi.t) : falsePosition(lo, hi);
      const s = await f(t);
      last = s;

      if (Math.abs(s.f) <= this.tolerance) {
        log.debug('converged', { iterations: i, residual: s.f, instant: s.t.toISO() });
        return { ok: true, instant: s.t, iterations: i, residual: s.f, widened };
      }

      if (Math.sign(s.f) === Math.sign(lo.f)) lo = s;
      else hi = s;
    }

    return {
      ok: false,
      reason: 'divergence',
      diagnostics: diag({ lo: lo.t, hi: hi.t }, last.f, this.maxIterations),
    };
  }
}

function falsePosition(lo: Sample, hi: Sample): DateTime {
  const a = lo.t.toMillis();
  const b = hi.t.toMillis();
  const ms = Math.round(b - (hi.f * (b - a)) / (hi.f - lo.f));
  if (!Number.isFinite(ms) || ms <= a || ms >= b) return midpoint(lo.t, hi.t);
  return DateTime.fromMillis(ms, { zone: 'utc' });
}

// A root lies in [lo, hi] if the residual changes sign or an end already meets tolerance.
function straddles(lo: Sample, hi: Sample, tolerance: number): boolean {
  if (Math.abs(lo.f) <= tolerance || Math.abs(hi.f) <= tolerance) return true;
  return Math.sign(lo.f) !== Math.sign(hi.f);
}
