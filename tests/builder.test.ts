import { describe, expect, it } from 'vitest';

import { formatGateLine } from '@/lib/activations/mapper';
import { activatedGates, BodyGraphBuilder } from '@/lib/bodygraph/builder';
import { RawBodyGraphJsonSchema, serializeBodyGraph } from '@/lib/bodygraph/serialize';
import { ComputationError, NoBracketError } from '@/lib/errors';
import { defaultGateTable } from '@/lib/gates/load';
import { CHART_FNS, DESIGN_GATE_LINES, PERSONALITY_GATE_LINES } from './helpers/chart';
import { BIRTH, stubEphemeris } from './helpers/stubs';

describe('BodyGraphBuilder', () => {
  it('builds both sides from birth and the design instant', async () => {
    const builder = new BodyGraphBuilder({ ephemeris: stubEphemeris(CHART_FNS), table: defaultGateTable() });

    const graph = await builder.build(BIRTH);

    expect(graph.birthInstant.toISO()).toBe('1990-05-15T12:30:00.000Z');
    expect(graph.designInstant.toISO()).toBe('1990-02-16T12:30:00.000Z');
    expect(graph.personality.map((a) => formatGateLine(a.position))).toEqual(PERSONALITY_GATE_LINES);
    expect(graph.design.map((a) => formatGateLine(a.position))).toEqual(DESIGN_GATE_LINES);
    expect(Object.isFrozen(graph)).toBe(true);
  });

  it('lists activated gates once, ascending', async () => {
    const graph = await new BodyGraphBuilder({ ephemeris: stubEphemeris(CHART_FNS) }).build(BIRTH);
    expect(activatedGates(graph)).toEqual([1, 2, 5, 11, 21, 23, 27, 31, 38, 39, 43, 48, 57, 58, 60, 62]);
  });

  it('is idempotent', async () => {
    const builder = new BodyGraphBuilder({ ephemeris: stubEphemeris(CHART_FNS) });
    const a = serializeBodyGraph(await builder.build(BIRTH));
    const b = serializeBodyGraph(await builder.build(BIRTH.setZone('America/New_York')));
    expect(b).toEqual(a);
  });

  it('restricts both sides to the configured bodies', async () => {
    const graph = await new BodyGraphBuilder({
      ephemeris: stubEphemeris({ Sun: CHART_FNS.Sun, Earth: CHART_FNS.Earth }),
      bodies: ['Sun', 'Earth'],
    }).build(BIRTH);

    expect(graph.personality.map((a) => a.body)).toEqual(['Sun', 'Earth']);
    expect(graph.design.map((a) => formatGateLine(a.position))).toEqual(['38.3', '39.3']);
  });

  it('fails when a design-side body fails', async () => {
    const eph = stubEphemeris({
      ...CHART_FNS,
      Pluto: (d) => {
        if (d < -1) throw new Error('kernel gap');
        return CHART_FNS.Pluto(d);
      },
    });

    const err = await new BodyGraphBuilder({ ephemeris: eph }).build(BIRTH).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ComputationError);
    if (!(err instanceof ComputationError)) return;
    expect(err.body).toBe('Pluto');
    expect(err.instant.toISO()).toBe('1990-02-16T12:30:00.000Z');
    expect(err.message).toMatch(/ephemeris failed: kernel gap$/);
  });

  it('passes solver failures through', async () => {
    const eph = stubEphemeris({ ...CHART_FNS, Sun: () => 10 });
    await expect(new BodyGraphBuilder({ ephemeris: eph }).build(BIRTH)).rejects.toBeInstanceOf(NoBracketError);
  });
});

describe('serializeBodyGraph', () => {
  it('emits bare numbers and body tags', async () => {
    const graph = await new BodyGraphBuilder({ ephemeris: stubEphemeris(CHART_FNS) }).build(BIRTH);

    const json = serializeBodyGraph(graph);

    expect(RawBodyGraphJsonSchema.safeParse(json).success).toBe(true);
    expect(json.birth_instant).toBe('1990-05-15T12:30:00.000Z');
    expect(json.design_instant).toBe('1990-02-16T12:30:00.000Z');
    expect(json.personality[0]).toEqual({ body: 'Sun', longitude: 10, gate: 21, line: 1, gate_line: '21.1' });
    expect(json.design[2]).toEqual({ body: 'Moon', longitude: 36, gate: 27, line: 5, gate_line: '27.5' });
    expect(JSON.parse(JSON.stringify(json))).toEqual(json);
  });
});
