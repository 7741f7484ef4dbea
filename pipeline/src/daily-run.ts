/**
 * Daily run: slate → profiles → scores → prediction log → alert
 *
 * Matchups are scored one at a time. A matchup that fails is counted and
 * skipped; the rest of the slate still runs and is still delivered.
 */

import type { HrScorer, ScoreResult, Tier } from '@hrcast/model';
import { rankResults } from '@hrcast/model';
import { describeError, MalformedInputError } from './errors.js';
import { formatDuration, logStep } from './log.js';
import type { MatchupSource } from './matchup-source.js';
import { formatPlainText, formatTierMessages } from './notify/format.js';
import type { DeliveryReport } from './notify/telegram.js';
import type { PredictionLog, PredictionRecord } from './store/prediction-log.js';
import { validateMatchup } from './validate.js';

export interface Notifier {
  sendAll(messages: string[]): Promise<DeliveryReport>;
}

export interface DailyRunOptions {
  date: string;
  topN: number;
  source: MatchupSource;
  scorer: HrScorer;
  log?: PredictionLog | null;
  /** No notifier means the alert is printed instead of sent */
  notifier?: Notifier | null;
  now?: () => number;
}

export interface RunSummary {
  date: string;
  source: string;
  scorer: string;
  matchups: number;
  scored: number;
  malformed: number;
  failed: number;
  skippedSides: string[];
  degradedSources: string[];
  tierCounts: Record<Tier, number>;
  top: ScoreResult[];
  logged: number;
  delivery: DeliveryReport | null;
  durationMs: number;
}

export async function runDaily(options: DailyRunOptions): Promise<RunSummary> {
  const now = options.now ?? Date.now;
  const started = now();
  const { source, scorer } = options;

  logStep(`📅 Building slate for ${options.date} (${source.name})`);
  const slate = await source.slate(options.date);
  const degraded = new Set(slate.degradedSources);
  console.log(`  ✓ ${slate.matchups.length} matchups, ${slate.skipped.length} sides skipped`);

  const records: PredictionRecord[] = [];
  let malformed = 0;
  let failed = 0;

  logStep(`🧮 Scoring with ${scorer.name}`);
  for (const matchup of slate.matchups) {
    try {
      validateMatchup(matchup);
      const { input, degradedSources } = await source.inputFor(matchup);
      for (const label of degradedSources) degraded.add(label);
      records.push({ input, result: scorer.score(input) });
    } catch (error) {
      if (error instanceof MalformedInputError) {
        malformed++;
        console.warn(`  ⚠️ [Validate] ${error.message}; skipped`);
      } else {
        failed++;
        console.error(`  ❌ [Score] ${matchup.id}: ${describeError(error)}`);
      }
    }
  }

  const ranked = rankResults(records.map((record) => record.result));
  const tierCounts: Record<Tier, number> = { Lock: 0, Sleeper: 0, Risky: 0 };
  for (const result of ranked) tierCounts[result.tier]++;
  console.log(
    `  ✓ Scored ${ranked.length}: ${tierCounts.Lock} Lock, ${tierCounts.Sleeper} Sleeper, ${tierCounts.Risky} Risky`
  );
  if (degraded.size > 0) {
    console.warn(`  ⚠️ ${degraded.size} sources degraded; affected predictions carry lower confidence`);
  }

  let logged = 0;
  if (options.log) {
    logged = options.log.record(records, new Date(now()));
    console.log(`  ✓ Logged ${logged} predictions`);
  }

  let delivery: DeliveryReport | null = null;
  if (options.notifier) {
    logStep('📨 Sending alerts');
    delivery = await options.notifier.sendAll(formatTierMessages(ranked, options.topN));
    console.log(`  ✓ Sent ${delivery.sent} messages, ${delivery.failed} failed`);
  } else {
    console.log('\n' + formatPlainText(ranked, options.topN, slate.date) + '\n');
  }

  const summary: RunSummary = {
    date: slate.date,
    source: source.name,
    scorer: scorer.name,
    matchups: slate.matchups.length,
    scored: ranked.length,
    malformed,
    failed,
    skippedSides: slate.skipped,
    degradedSources: [...degraded].sort(),
    tierCounts,
    top: ranked.slice(0, options.topN),
    logged,
    delivery,
    durationMs: now() - started,
  };

  logStep(`✅ Run complete in ${formatDuration(summary.durationMs)}`);
  return summary;
}

export function formatRunSummary(summary: RunSummary): string {
  const lines = [
    '='.repeat(50),
    `📅 ${summary.date} (${summary.source}, ${summary.scorer})`,
    `✅ Scored: ${summary.scored} of ${summary.matchups}`,
    `⏭️  Malformed: ${summary.malformed}, failed: ${summary.failed}, sides skipped: ${summary.skippedSides.length}`,
    `🔒 ${summary.tierCounts.Lock} Lock  🌙 ${summary.tierCounts.Sleeper} Sleeper  ⚠️ ${summary.tierCounts.Risky} Risky`,
    `💾 Logged: ${summary.logged}`,
  ];
  if (summary.delivery) {
    lines.push(`📨 Alerts sent: ${summary.delivery.sent}, failed: ${summary.delivery.failed}`);
  }
  if (summary.degradedSources.length > 0) {
    lines.push(`⚠️  Degraded sources: ${summary.degradedSources.length}`);
  }
  lines.push('='.repeat(50));
  return lines.join('\n');
}
