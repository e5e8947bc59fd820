// src/lib/activations/mapper.ts
import type { DateTime } from 'luxon';
import { ComputationError } from '@/lib/errors';
import type { Body, EphemerisPort } from '@/lib/ephemeris/port';
import type { GateRangeTable, LinePosition } from '@/lib/gates/table';
import { toUtcInstant } from '@/lib/time';

export type Activation = {
  readonly body: Body;
  readonly longitude: number; // deg [0,360), as returned by the ephemeris
  readonly position: LinePosition;
};

/** One activation per requested body, in request order. */
export type ActivationSet = readonly Activation[];

export function findActivation(set: ActivationSet, body: Body): Activation | undefined {
  return set.find((a) => a.body === body);
}

/** "gate.line", e.g. "4.3". */
export function formatGateLine(p: LinePosition): string {
  return `${p.gate}.${p.line}`;
}

type Outcome =
  | { ok: true; activation: Activation }
  | { ok: false; error: ComputationError };

export class ActivationMapper {
  constructor(
    private readonly ephemeris: EphemerisPort,
    private readonly table: GateRangeTable,
  ) {}

  /**
   * Queries every body (concurrently) and maps each longitude to gate/line.
   * All or nothing: the first failing body in request order fails the call.
   */
  async compute(instant: DateTime, bodies: readonly Body[]): Promise<ActivationSet> {
    const seen = new Set<Body>();
    for (const b of bodies) {
      if (seen.has(b)) throw new ComputationError(b, instant, 'body requested twice');
      seen.add(b);
    }
    const utc = toUtcInstant(instant);
    if (!utc) {
      const first = bodies[0] ?? 'Sun';
      throw new ComputationError(first, instant, 'instant is not a valid luxon DateTime');
    }

    const outcomes = await Promise.all(bodies.map((b) => this.one(b, utc)));

    const activations: Activation[] = [];
    for (const o of outcomes) {
      if (!o.ok) throw o.error;
      activations.push(o.activation);
    }
    return Object.freeze(activations);
  }

  private async one(body: Body, instant: DateTime): Promise<Outcome> {
    let longitude: number;
    try {
      longitude = await this.ephemeris.longitudeOf(body, instant);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      return { ok: false, error: new ComputationError(body, instant, `ephemeris failed: ${msg}`, { cause: e }) };
    }

    if (typeof longitude !== 'number' || !Number.isFinite(longitude) || longitude < 0 || longitude >= 360) {
      return {
        ok: false,
        error: new ComputationError(body, instant, `ephemeris returned out-of-domain longitude ${String(longitude)}`),
      };
    }

    const position = this.table.lookup(longitude);
    return { ok: true, activation: Object.freeze({ body, longitude, position: Object.freeze(position) }) };
  }
}
