// src/lib/bodygraph/serialize.ts
import { z } from 'zod';
import { formatGateLine, type ActivationSet } from '@/lib/activations/mapper';
import { BODY_NAMES } from '@/lib/ephemeris/port';
import { activatedGates, type RawBodyGraph } from '@/lib/bodygraph/builder';
import { isoString } from '@/lib/time';

const ActivationJsonSchema = z.object({
  body: z.enum(BODY_NAMES),
  longitude: z.number().min(0).lt(360),
  gate: z.number().int().min(1).max(64),
  line: z.number().int().min(1).max(6),
  gate_line: z.string().regex(/^\d{1,2}\.[1-6]$/),
});

export const RawBodyGraphJsonSchema = z.object({
  birth_instant: z.string().datetime({ offset: true }),
  design_instant: z.string().datetime({ offset: true }),
  personality: z.array(ActivationJsonSchema),
  design: z.array(ActivationJsonSchema),
  activated_gates: z.array(z.number().int().min(1).max(64)),
});

export type RawBodyGraphJson = z.infer<typeof RawBodyGraphJsonSchema>;

function side(set: ActivationSet): RawBodyGraphJson['personality'] {
  return set.map((a) => ({
    body: a.body,
    longitude: a.longitude,
    gate: a.position.gate,
    line: a.position.line,
    gate_line: formatGateLine(a.position),
  }));
}

/** Plain JSON for the presentation layer: bare numbers and body tags, no names. */
export function serializeBodyGraph(graph: RawBodyGraph): RawBodyGraphJson {
  return {
    birth_instant: isoString(graph.birthInstant),
    design_instant: isoString(graph.designInstant),
    personality: side(graph.personality),
    design: side(graph.design),
    activated_gates: activatedGates(graph),
  };
}
