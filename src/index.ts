// src/index.ts
export { ActivationMapper, findActivation, formatGateLine } from '@/lib/activations/mapper';
export type { Activation, ActivationSet } from '@/lib/activations/mapper';
export { BodyGraphBuilder, activatedGates } from '@/lib/bodygraph/builder';
export type { BodyGraphBuilderDeps, RawBodyGraph } from '@/lib/bodygraph/builder';
export { RawBodyGraphJsonSchema, serializeBodyGraph } from '@/lib/bodygraph/serialize';
export type { RawBodyGraphJson } from '@/lib/bodygraph/serialize';
export { getConfig, loadConfig } from '@/lib/config';
export type { AppConfig } from '@/lib/config';
export { DESIGN_ARC_DEG, DesignTimeSolver, normalizeDegrees, signedDelta } from '@/lib/design/solver';
export type { DesignSolverOptions, SolveResult } from '@/lib/design/solver';
export { createAstronomyEphemeris } from '@/lib/ephemeris/astronomy';
export { ALL_BODIES, BODY_NAMES, isBody } from '@/lib/ephemeris/port';
export type { Body, EphemerisPort } from '@/lib/ephemeris/port';
export * from '@/lib/errors';
export { DEFAULT_GATE_TABLE_PATH, defaultGateTable, loadGateRangeTable } from '@/lib/gates/load';
export { GateRangeTable, createUniformGateTable, GATE_WIDTH_DEG, LINE_WIDTH_DEG } from '@/lib/gates/table';
export type { GateRangeEntry, LinePosition, LineNumber, SeamLineMode } from '@/lib/gates/table';
export { resolveBirthInstant } from '@/lib/time/birth';
