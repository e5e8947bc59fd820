import { describe, expect, it } from 'vitest';

import { ActivationMapper, findActivation, formatGateLine } from '@/lib/activations/mapper';
import { ALL_BODIES } from '@/lib/ephemeris/port';
import { ComputationError, EphemerisError } from '@/lib/errors';
import { defaultGateTable } from '@/lib/gates/load';
import { DateTime } from 'luxon';
import { CHART_FNS, PERSONALITY_GATE_LINES } from './helpers/chart';
import { BIRTH, stubEphemeris } from './helpers/stubs';

const table = defaultGateTable();

describe('ActivationMapper', () => {
  it('maps every body to gate and line in request order', async () => {
    const mapper = new ActivationMapper(stubEphemeris(CHART_FNS), table);

    const set = await mapper.compute(BIRTH, ALL_BODIES);

    expect(set.map((a) => a.body)).toEqual([...ALL_BODIES]);
    expect(set.map((a) => formatGateLine(a.position))).toEqual(PERSONALITY_GATE_LINES);
    expect(findActivation(set, 'Sun')).toEqual({ body: 'Sun', longitude: 10, position: { gate: 21, line: 1 } });
    expect(Object.isFrozen(set)).toBe(true);
  });

  it('keeps the caller order for a subset', async () => {
    const mapper = new ActivationMapper(stubEphemeris(CHART_FNS), table);
    const set = await mapper.compute(BIRTH, ['Mars', 'Sun']);
    expect(set.map((a) => a.body)).toEqual(['Mars', 'Sun']);
    expect(findActivation(set, 'Moon')).toBeUndefined();
  });

  it('queries in UTC', async () => {
    const eph = stubEphemeris(CHART_FNS);
    const local = BIRTH.setZone('Asia/Tokyo');
    await new ActivationMapper(eph, table).compute(local, ['Sun']);
    expect(eph.calls).toEqual([{ body: 'Sun', iso: '1990-05-15T12:30:00.000Z' }]);
  });

  it('fails the whole call when one body fails', async () => {
    const eph = stubEphemeris({ ...CHART_FNS, Pluto: undefined });
    const mapper = new ActivationMapper(eph, table);

    const err = await mapper.compute(BIRTH, ALL_BODIES).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ComputationError);
    if (!(err instanceof ComputationError)) return;
    expect(err.body).toBe('Pluto');
    expect(err.cause).toBeInstanceOf(EphemerisError);
    expect(err.message).toBe(
      'Cannot compute activation for Pluto @ 1990-05-15T12:30:00.000Z: ephemeris failed: Pluto @ 1990-05-15T12:30:00.000Z: unsupported body',
    );
  });

  it('reports the first failing body in request order', async () => {
    const eph = stubEphemeris({ ...CHART_FNS, Mercury: undefined, Venus: undefined });
    const mapper = new ActivationMapper(eph, table);
    await expect(mapper.compute(BIRTH, ['Venus', 'Sun', 'Mercury'])).rejects.toMatchObject({ body: 'Venus' });
    await expect(mapper.compute(BIRTH, ALL_BODIES)).rejects.toMatchObject({ body: 'Mercury' });
  });

  it('rejects longitudes outside [0, 360)', async () => {
    const mapper = new ActivationMapper(stubEphemeris({ Sun: () => 360 }), table);
    await expect(mapper.compute(BIRTH, ['Sun'])).rejects.toThrow(/out-of-domain longitude 360/);

    const nan = new ActivationMapper(stubEphemeris({ Sun: () => Number.NaN }), table);
    await expect(nan.compute(BIRTH, ['Sun'])).rejects.toBeInstanceOf(ComputationError);
  });

  it('rejects duplicate bodies and invalid instants', async () => {
    const mapper = new ActivationMapper(stubEphemeris(CHART_FNS), table);
    await expect(mapper.compute(BIRTH, ['Sun', 'Sun'])).rejects.toThrow(/body requested twice/);
    await expect(mapper.compute(DateTime.invalid('test'), ['Sun'])).rejects.toThrow(/not a valid luxon DateTime/);
  });

  it('returns the same result for the same input', async () => {
    const mapper = new ActivationMapper(stubEphemeris(CHART_FNS), table);
    const a = await mapper.compute(BIRTH, ALL_BODIES);
    const b = await mapper.compute(BIRTH, ALL_BODIES);
    expect(a).toEqual(b);
  });
});
