// src/lib/gates/load.ts
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { getConfig } from '@/lib/config';
import { ConfigurationError } from '@/lib/errors';
import { GateRangeTable, type GateRangeEntry, type GateTableOptions } from '@/lib/gates/table';
import { SIGN_NAMES, toDecimalDegrees } from '@/lib/gates/zodiac';

export const DEFAULT_GATE_TABLE_PATH = fileURLToPath(new URL('../../data/gate-ranges.json', import.meta.url));

const ZodiacCoordinateSchema = z.object({
  sign: z.enum(SIGN_NAMES),
  degree: z.number().int().min(0).max(30),
  minute: z.number().int().min(0).max(59),
  second: z.number().min(0).lt(60),
});

export const GateRangeRowSchema = z.object({
  gate: z.number().int(),
  start: ZodiacCoordinateSchema,
  end: ZodiacCoordinateSchema,
});
export type GateRangeRow = z.infer<typeof GateRangeRowSchema>;

export const GateRangeFileSchema = z.array(GateRangeRowSchema).min(1);

/** Sign-relative rows → absolute-degree entries. Pisces 30°00'00" is 360. */
export function rowsToEntries(rows: readonly GateRangeRow[]): GateRangeEntry[] {
  return rows.map((r) => ({
    gate: r.gate,
    start: toDecimalDegrees(r.start),
    end: toDecimalDegrees(r.end),
  }));
}

export function parseGateRangeRows(raw: unknown, source = 'gate table'): GateRangeRow[] {
  const parsed = GateRangeFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`${source} does not match the row schema`, parsed.error.flatten());
  }
  return parsed.data;
}

export function loadGateRangeTable(path: string, options?: GateTableOptions): GateRangeTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (e) {
    throw new ConfigurationError(`Cannot read gate table ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return GateRangeTable.build(rowsToEntries(parseGateRangeRows(raw, path)), options);
}

let shared: GateRangeTable | null = null;

/**
 * Process-wide table, built on first use from GATE_TABLE_PATH or the bundled data.
 * Read-only after construction.
 */
export function defaultGateTable(): GateRangeTable {
  if (!shared) shared = loadGateRangeTable(getConfig().gateTablePath ?? DEFAULT_GATE_TABLE_PATH);
  return shared;
}
