/**
 * Label logged predictions with actual home runs from box scores
 *
 * Usage: tsx pipeline/src/cli/update-results.ts [--date YYYY-MM-DD]
 *
 * Without --date every past date that still has unlabeled predictions is
 * processed.
 */

import dotenv from 'dotenv';
import { createClients } from '../clients.js';
import { loadAppConfig } from '../config.js';
import { logStep } from '../log.js';
import { updateResults } from '../results.js';
import { PredictionLog } from '../store/prediction-log.js';
import { parseDateArg, runCli, today } from './args.js';

async function main(): Promise<void> {
  dotenv.config();
  const args = process.argv.slice(2);
  const config = loadAppConfig();
  const date = parseDateArg(args, '--date');

  const log = await PredictionLog.open(config.dbPath);
  try {
    const current = today();
    const dates = date ? [date] : log.pendingDates().filter((pending) => pending < current);
    if (dates.length === 0) {
      console.log('✅ Nothing to update');
      return;
    }

    const { mlb } = createClients(config);
    logStep(`📦 Recording results for ${dates.length} date(s)`);
    let rows = 0;
    for (const pending of dates) {
      rows += (await updateResults(log, mlb, pending)).rowsUpdated;
    }
    console.log(`\n✅ Labeled ${rows} predictions`);
  } finally {
    log.close();
  }
}

runCli(main);
