/**
 * Daily home run picks
 *
 * Usage: tsx pipeline/src/cli/run-daily.ts [--test] [--date YYYY-MM-DD] [--top N]
 */

import dotenv from 'dotenv';
import { createClients } from '../clients.js';
import { createScorer, loadAppConfig, loadScoringConfig, requireLiveCredentials } from '../config.js';
import { formatRunSummary, runDaily } from '../daily-run.js';
import { describeError } from '../errors.js';
import { loadSampleSlate } from '../inputs.js';
import { LiveMatchupSource, SampleMatchupSource } from '../matchup-source.js';
import { formatErrorAlert } from '../notify/format.js';
import { TelegramNotifier } from '../notify/telegram.js';
import { PredictionLog } from '../store/prediction-log.js';
import { hasFlag, parseDateArg, parseIntArg, runCli, today } from './args.js';

let crashNotifier: TelegramNotifier | null = null;
let runDate = today();

async function main(): Promise<void> {
  dotenv.config();
  const args = process.argv.slice(2);
  const config = loadAppConfig(process.env, hasFlag(args, '--test') ? { mode: 'test' } : {});
  runDate = parseDateArg(args, '--date') ?? runDate;
  const topN = parseIntArg(args, '--top') ?? config.topN;
  const scorer = createScorer(config, loadScoringConfig(config));

  console.log(`🚀 Starting HR picks for ${runDate} (${config.mode} mode)\n`);

  if (config.mode === 'test') {
    // Sample inputs only: no network, no log, nothing sent
    const summary = await runDaily({
      date: runDate,
      topN,
      source: new SampleMatchupSource(loadSampleSlate()),
      scorer,
    });
    console.log(formatRunSummary(summary));
    return;
  }

  const credentials = requireLiveCredentials(config);
  const clients = createClients(config);
  const notifier = new TelegramNotifier({
    botToken: credentials.telegramBotToken,
    chatId: credentials.telegramChatId,
    http: clients.http,
    retry: { maxAttempts: config.fetch.maxAttempts, baseDelayMs: config.fetch.baseDelayMs },
  });
  crashNotifier = notifier;

  const log = await PredictionLog.open(config.dbPath);
  try {
    const summary = await runDaily({
      date: runDate,
      topN,
      source: new LiveMatchupSource(clients.mlb, clients.profiles),
      scorer,
      log,
      notifier,
    });
    console.log(formatRunSummary(summary));
  } finally {
    log.close();
  }
}

runCli(main, async (error) => {
  if (crashNotifier) {
    await crashNotifier.send(formatErrorAlert(describeError(error), runDate));
    console.log('📨 Error notification sent');
  }
});
