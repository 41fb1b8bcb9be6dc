/**
 * Backfill one series from a chosen period, outside the schedule, then
 * synthesize its change-set.
 *
 * Run: npm run backfill -- --series GDP --from 1990-Q1
 */

import { parseArgs } from 'node:util';
import { bootstrap } from '../bootstrap.js';
import { getEnv } from '../config/env.js';
import { moduleLogger } from '../core/logger.js';

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      series: { type: 'string', short: 's' },
      from: { type: 'string', short: 'f' },
    },
  });

  if (!values.series) {
    throw new Error('Usage: backfill --series <KEY> [--from <PERIOD>]');
  }

  const runtime = await bootstrap(getEnv());
  const log = moduleLogger('backfill');
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  try {
    const result = await runtime.core.orchestrator.backfill(values.series, values.from, controller.signal);
    const newCount = result.changeSet.entries.filter((e) => e.changeKind === 'new').length;
    log.info(
      {
        seriesKey: values.series,
        changeSetId: result.changeSet.id,
        new: newCount,
        revised: result.changeSet.entries.length - newCount,
        unchanged: result.changeSet.unchangedCount,
        synthesis: result.synthesis.status,
      },
      'backfill complete',
    );
  } finally {
    await runtime.close();
  }
}

main().catch((err) => {
  moduleLogger('backfill').fatal({ err }, 'backfill failed');
  process.exit(1);
});
