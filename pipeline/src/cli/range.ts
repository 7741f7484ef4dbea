/**
 * Date-range arguments and historical sources for backtest and fit
 */

import { createClients } from '../clients.js';
import type { AppConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';
import { MlbHistoricalSource, PredictionLogSource, type HistoricalSource } from '../backtest/sources.js';
import { PredictionLog } from '../store/prediction-log.js';
import { parseArg, parseDateArg } from './args.js';

export interface RangeArgs {
  start: string;
  end: string;
  source: 'log' | 'mlb';
}

export function parseRangeArgs(args: string[], usage: string): RangeArgs {
  const start = parseDateArg(args, '--start');
  const end = parseDateArg(args, '--end');
  const source = parseArg(args, '--source') ?? 'log';
  if (!start || !end) {
    throw new ConfigurationError(`--start and --end are required. Usage: ${usage}`);
  }
  if (source !== 'log' && source !== 'mlb') {
    throw new ConfigurationError(`--source must be log or mlb, got "${source}"`);
  }
  return { start, end, source };
}

/**
 * Open the historical source; the returned close() releases the log
 */
export async function openSource(
  config: AppConfig,
  kind: 'log' | 'mlb'
): Promise<{ source: HistoricalSource; close: () => void }> {
  if (kind === 'mlb') {
    const { mlb, ballparks } = createClients(config);
    return { source: new MlbHistoricalSource(mlb, ballparks), close: () => undefined };
  }
  const log = await PredictionLog.open(config.dbPath);
  return { source: new PredictionLogSource(log), close: () => log.close() };
}
