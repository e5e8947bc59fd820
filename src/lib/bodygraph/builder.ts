// src/lib/bodygraph/builder.ts
import type { DateTime } from 'luxon';
import { ActivationMapper, type ActivationSet } from '@/lib/activations/mapper';
import { DesignTimeSolver, type DesignSolverOptions } from '@/lib/design/solver';
import { ALL_BODIES, type Body, type EphemerisPort } from '@/lib/ephemeris/port';
import { defaultGateTable } from '@/lib/gates/load';
import type { GateRangeTable } from '@/lib/gates/table';
import { createLogger } from '@/lib/log';
import { toUtcInstant } from '@/lib/time';

const log = createLogger('bodygraph');

export type RawBodyGraph = {
  readonly birthInstant: DateTime;
  readonly designInstant: DateTime;
  /** Conscious side: positions at birth. */
  readonly personality: ActivationSet;
  /** Unconscious side: positions at the design instant. */
  readonly design: ActivationSet;
};

export type BodyGraphBuilderDeps = {
  ephemeris: EphemerisPort;
  table?: GateRangeTable;
  bodies?: readonly Body[];
  solver?: DesignSolverOptions;
};

export class BodyGraphBuilder {
  private readonly mapper: ActivationMapper;
  private readonly solver: DesignTimeSolver;
  private readonly bodies: readonly Body[];

  constructor(deps: BodyGraphBuilderDeps) {
    this.mapper = new ActivationMapper(deps.ephemeris, deps.table ?? defaultGateTable());
    this.solver = new DesignTimeSolver(deps.ephemeris, deps.solver);
    this.bodies = deps.bodies ?? ALL_BODIES;
  }

  /** Both sides or nothing: any failure aborts the build. */
  async build(birthInstant: DateTime): Promise<RawBodyGraph> {
    const birth = toUtcInstant(birthInstant);
    if (!birth) throw new RangeError('Birth instant is not a valid luxon DateTime');

    try {
      const personality = await this.mapper.compute(birth, this.bodies);
      const designInstant = await this.solver.solve(birth);
      const design = await this.mapper.compute(designInstant, this.bodies);

      return Object.freeze({ birthInstant: birth, designInstant, personality, design });
    } catch (err) {
      log.error(err instanceof Error ? err.message : String(err), { birth: birth.toISO() });
      throw err;
    }
  }
}

/** Unique gates across both sides, ascending. */
export function activatedGates(graph: RawBodyGraph): number[] {
  const gates = new Set<number>();
  for (const a of graph.personality) gates.add(a.position.gate);
  for (const a of graph.design) gates.add(a.position.gate);
  return [...gates].sort((a, b) => a - b);
}
