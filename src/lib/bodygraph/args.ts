// src/lib/bodygraph/args.ts
export type BodygraphArgs = {
  date: string | null;
  time: string | null;
  tz?: string;
  lat?: number;
  lon?: number;
  seamLines: 'per-range' | 'continuous';
  pretty: boolean;
};

function toNumber(raw: string, flag: string): number {
  const n = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(n)) throw new Error(`${flag} expects a number, got "${raw}"`);
  return n;
}

/** --date YYYY-MM-DD --time HH:MM [--tz Zone | --lat N --lon N] [--continuous-seam] [--pretty] */
export function parseBodygraphArgs(args: readonly string[]): BodygraphArgs {
  const out: BodygraphArgs = { date: null, time: null, seamLines: 'per-range', pretty: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = i + 1 < args.length ? args[i + 1] : undefined;
    if (arg === '--date' && next !== undefined) { out.date = next; i++; }
    else if (arg === '--time' && next !== undefined) { out.time = next; i++; }
    else if (arg === '--tz' && next !== undefined) { out.tz = next; i++; }
    else if (arg === '--lat' && next !== undefined) { out.lat = toNumber(next, '--lat'); i++; }
    else if (arg === '--lon' && next !== undefined) { out.lon = toNumber(next, '--lon'); i++; }
    else if (arg === '--continuous-seam') out.seamLines = 'continuous';
    else if (arg === '--pretty') out.pretty = true;
    else throw new Error(`Unknown or incomplete argument: ${arg}`);
  }
  return out;
}
