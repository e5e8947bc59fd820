// src/lib/gates/table.ts
import { ConfigurationError, OutOfRangeError } from '@/lib/errors';

export const GATE_COUNT = 64;
export const LINES_PER_GATE = 6;
export const GATE_WIDTH_DEG = 360 / GATE_COUNT;             // 5.625° = 5°37'30"
export const LINE_WIDTH_DEG = GATE_WIDTH_DEG / LINES_PER_GATE; // 0.9375° = 56'15"

const EPS = 1e-9;

export type LineNumber = 1 | 2 | 3 | 4 | 5 | 6;

export type LinePosition = {
  readonly gate: number;  // 1..64
  readonly line: LineNumber;
};

export type GateRangeEntry = {
  readonly gate: number;
  readonly start: number; // deg, inclusive
  readonly end: number;   // deg, exclusive
};

/**
 * How lines are laid out on the two rows of the gate that crosses 0°.
 * - 'per-range': each row is divided into six lines of its own, so the row
 *   ending at 360° finishes on line 6 and the row starting at 0° opens on line 1.
 * - 'continuous': lines are 0.9375° wide and counted from the gate's true start,
 *   running on across the seam.
 * Every other gate is unaffected.
 */
export type SeamLineMode = 'per-range' | 'continuous';

export type GateTableOptions = {
  seamLines?: SeamLineMode;
};

type IndexedEntry = GateRangeEntry & {
  readonly lineBase: number;  // arc of the same gate lying before `start`
  readonly lineWidth: number;
};

export class GateRangeTable {
  readonly entries: readonly GateRangeEntry[];
  /** Gate split across the 0°/360° seam, if any. */
  readonly seamGate: number | null;
  readonly seamLines: SeamLineMode;
  private readonly indexed: readonly IndexedEntry[];
  private readonly starts: Float64Array;

  private constructor(indexed: IndexedEntry[], seamGate: number | null, seamLines: SeamLineMode) {
    this.indexed = Object.freeze(indexed.map((e) => Object.freeze(e)));
    this.entries = Object.freeze(
      indexed.map(({ gate, start, end }) => Object.freeze({ gate, start, end }))
    );
    this.starts = Float64Array.from(indexed, (e) => e.start);
    this.seamGate = seamGate;
    this.seamLines = seamLines;
    Object.freeze(this);
  }

  /** Validates the rows and builds the table; any defect is a ConfigurationError. */
  static build(rows: readonly GateRangeEntry[], options: GateTableOptions = {}): GateRangeTable {
    const seamLines = options.seamLines ?? 'per-range';
    const sorted = validateRows(rows);
    const seamGate = findSeamGate(sorted);

    const indexed = sorted.map((e): IndexedEntry => {
      if (e.gate !== seamGate) {
        return { ...e, lineBase: 0, lineWidth: LINE_WIDTH_DEG };
      }
      if (seamLines === 'per-range') {
        return { ...e, lineBase: 0, lineWidth: (e.end - e.start) / LINES_PER_GATE };
      }
      // continuous: the row at 0° continues the row ending at 360°
      const head = sorted[sorted.length - 1];
      const lineBase = e.start === 0 ? 360 - head.start : 0;
      return { ...e, lineBase, lineWidth: LINE_WIDTH_DEG };
    });

    return new GateRangeTable(indexed, seamGate, seamLines);
  }

  /**
   * Gate and line for a longitude already normalized to [0, 360).
   * A boundary belongs to the range that starts there.
   */
  lookup(longitude: number): LinePosition {
    if (!Number.isFinite(longitude) || longitude < 0 || longitude >= 360) {
      throw new OutOfRangeError(longitude);
    }
    const e = this.indexed[this.indexOf(longitude)];
    const raw = Math.floor((e.lineBase + longitude - e.start) / e.lineWidth) + 1;
    return { gate: e.gate, line: clampLine(raw) };
  }

  /** Same as lookup, for longitudes that may still need normalizing. */
  lookupLenient(longitude: number): LinePosition {
    if (!Number.isFinite(longitude)) throw new OutOfRangeError(longitude);
    let d = longitude % 360;
    if (d < 0) d += 360;
    if (d >= 360) d = 0; // -1e-20 % 360 + 360 rounds up to 360
    return this.lookup(d);
  }

  /** All rows of one gate, in circle order. */
  spansOf(gate: number): GateRangeEntry[] {
    return this.entries.filter((e) => e.gate === gate);
  }

  // last entry whose start <= longitude
  private indexOf(longitude: number): number {
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.starts[mid] <= longitude) lo = mid;
      else hi = mid - 1;
    }
    return lo;
  }
}

function clampLine(n: number): LineNumber {
  if (n <= 1) return 1;
  if (n >= 6) return 6;
  switch (n) {
    case 2: return 2;
    case 3: return 3;
    case 4: return 4;
    default: return 5;
  }
}

function fmt(x: number): string {
  return `${Number(x.toFixed(9))}°`;
}

function validateRows(rows: readonly GateRangeEntry[]): GateRangeEntry[] {
  if (rows.length < GATE_COUNT) {
    throw new ConfigurationError(`Gate table has ${rows.length} rows, expected at least ${GATE_COUNT}`);
  }

  for (const [i, r] of rows.entries()) {
    if (!Number.isInteger(r.gate) || r.gate < 1 || r.gate > GATE_COUNT) {
      throw new ConfigurationError(`Row ${i}: gate ${r.gate} is not an integer in 1..${GATE_COUNT}`, r);
    }
    if (!Number.isFinite(r.start) || r.start < 0 || r.start >= 360) {
      throw new ConfigurationError(`Row ${i} (gate ${r.gate}): start ${r.start} outside [0, 360)`, r);
    }
    if (!Number.isFinite(r.end) || r.end <= 0 || r.end > 360) {
      throw new ConfigurationError(`Row ${i} (gate ${r.gate}): end ${r.end} outside (0, 360]`, r);
    }
    if (r.end <= r.start) {
      throw new ConfigurationError(`Row ${i} (gate ${r.gate}): end ${fmt(r.end)} is not after start ${fmt(r.start)}`, r);
    }
  }

  const sorted = [...rows].map(({ gate, start, end }) => ({ gate, start, end }))
    .sort((a, b) => a.start - b.start);

  if (sorted[0].start !== 0) {
    throw new ConfigurationError(`Gap: nothing covers [0°, ${fmt(sorted[0].start)})`);
  }
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1];
    const cur = sorted[i];
    const delta = cur.start - prev.end;
    if (delta > EPS) {
      throw new ConfigurationError(
        `Gap between gate ${prev.gate} (ends ${fmt(prev.end)}) and gate ${cur.gate} (starts ${fmt(cur.start)})`
      );
    }
    if (delta < -EPS) {
      throw new ConfigurationError(
        `Overlap between gate ${prev.gate} (ends ${fmt(prev.end)}) and gate ${cur.gate} (starts ${fmt(cur.start)})`
      );
    }
  }
  const last = sorted[sorted.length - 1];
  if (Math.abs(last.end - 360) > EPS) {
    throw new ConfigurationError(`Gap: nothing covers [${fmt(last.end)}, 360°)`);
  }

  const total = sorted.reduce((acc, r) => acc + (r.end - r.start), 0);
  if (Math.abs(total - 360) > EPS * sorted.length) {
    throw new ConfigurationError(`Total span is ${fmt(total)}, expected 360°`);
  }

  const arcByGate = new Map<number, number>();
  for (const r of sorted) arcByGate.set(r.gate, (arcByGate.get(r.gate) ?? 0) + (r.end - r.start));
  for (let g = 1; g <= GATE_COUNT; g++) {
    const arc = arcByGate.get(g);
    if (arc === undefined) throw new ConfigurationError(`Gate ${g} is missing from the table`);
    if (Math.abs(arc - GATE_WIDTH_DEG) > EPS) {
      throw new ConfigurationError(`Gate ${g} spans ${fmt(arc)}, expected ${fmt(GATE_WIDTH_DEG)}`);
    }
  }

  return sorted;
}

// A gate may own two rows only when they meet across 0°: [X, 360) and [0, Y).
function findSeamGate(sorted: readonly GateRangeEntry[]): number | null {
  const counts = new Map<number, number>();
  for (const r of sorted) counts.set(r.gate, (counts.get(r.gate) ?? 0) + 1);

  let seam: number | null = null;
  for (const [gate, n] of counts) {
    if (n === 1) continue;
    const first = sorted[0];
    const last = sorted[sorted.length - 1];
    if (n !== 2 || first.gate !== gate || last.gate !== gate) {
      throw new ConfigurationError(
        `Gate ${gate} has ${n} disjoint rows; only the gate crossing 0° may be split, into [X, 360) and [0, Y)`
      );
    }
    seam = gate;
  }
  return seam;
}

/** 64 equal rows laid end to end from 0°, in the given gate order. */
export function createUniformGateTable(
  order: readonly number[] = Array.from({ length: GATE_COUNT }, (_, i) => i + 1),
  options?: GateTableOptions,
): GateRangeTable {
  const rows = order.map((gate, i) => ({
    gate,
    start: i * GATE_WIDTH_DEG,
    end: (i + 1) * GATE_WIDTH_DEG,
  }));
  return GateRangeTable.build(rows, options);
}
