// scripts/compute-bodygraph.ts
/* Prints the raw bodygraph (both sides, gate.line per body) for one birth moment.

   npm run bodygraph -- --date 1990-05-15 --time 14:30 --tz Europe/Rome
   npm run bodygraph -- --date 1990-05-15 --time 14:30 --lat 41.9 --lon 12.5

   Env (optional, .env is loaded): GATE_TABLE_PATH, DESIGN_TOLERANCE_ARCSEC,
   DESIGN_MAX_ITERATIONS, LOG_LEVEL
*/

import 'dotenv/config';
import { parseBodygraphArgs } from '@/lib/bodygraph/args';
import { BodyGraphBuilder } from '@/lib/bodygraph/builder';
import { serializeBodyGraph } from '@/lib/bodygraph/serialize';
import { getConfig } from '@/lib/config';
import { createAstronomyEphemeris } from '@/lib/ephemeris/astronomy';
import { describeFailure } from '@/lib/errors';
import { DEFAULT_GATE_TABLE_PATH, loadGateRangeTable } from '@/lib/gates/load';
import { createLogger } from '@/lib/log';
import { resolveBirthInstant } from '@/lib/time/birth';

const log = createLogger('compute-bodygraph');

async function main() {
  const args = parseBodygraphArgs(process.argv.slice(2));
  const birth = resolveBirthInstant({
    date: args.date ?? undefined,
    time: args.time ?? undefined,
    tz: args.tz,
    lat: args.lat,
    lon: args.lon,
  });

  const table = loadGateRangeTable(getConfig().gateTablePath ?? DEFAULT_GATE_TABLE_PATH, {
    seamLines: args.seamLines,
  });
  const builder = new BodyGraphBuilder({ ephemeris: createAstronomyEphemeris(), table });

  log.debug(`birth ${birth.toISO()}`);
  const graph = await builder.build(birth);
  console.log(JSON.stringify(serializeBodyGraph(graph), null, args.pretty ? 2 : undefined));
}

main().catch((err: unknown) => {
  log.error(describeFailure(err), err instanceof Error ? err.message : err);
  process.exit(1);
});
