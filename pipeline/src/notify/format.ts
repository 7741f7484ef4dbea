/**
 * Alert formatting: plain text and Telegram MarkdownV2
 */

import { rankResults, type ScoreResult, type Tier } from '@hrcast/model';

export const TELEGRAM_MESSAGE_LIMIT = 4096;

export const TIER_HEADINGS: Readonly<Record<Tier, string>> = {
  Lock: 'Locks 🔒',
  Sleeper: 'Sleepers 🌙',
  Risky: 'Risky ⚠️',
};

const TIER_ORDER: Tier[] = ['Lock', 'Sleeper', 'Risky'];

export const NO_PICKS_MARKDOWN = "*No strong home run picks today\\.* Stay tuned for tomorrow's predictions\\. ⚾️";
export const NO_PICKS_TEXT = "No strong home run picks today. Stay tuned for tomorrow's predictions. ⚾️";

/**
 * Escape every character MarkdownV2 reserves, backslash included
 */
export function escapeMarkdownV2(text: string): string {
  return text.replace(/[_*[\]()~`>#+=|{}.!\\-]/g, '\\$&');
}

/** Inside `code` spans only backtick and backslash are special */
function codeSpan(text: string): string {
  return '`' + text.replace(/[`\\]/g, '\\$&') + '`';
}

function percent(probability: number): string {
  return `${(probability * 100).toFixed(1)}%`;
}

export function topPicks(results: readonly ScoreResult[], topN: number): ScoreResult[] {
  return rankResults(results).slice(0, Math.max(0, topN));
}

export function formatPickMarkdown(result: ScoreResult): string {
  const { matchup } = result;
  const lines = [
    `*${escapeMarkdownV2(matchup.batter.name)}* vs *${escapeMarkdownV2(matchup.pitcher.name)}*`,
    `📍 Ballpark: ${escapeMarkdownV2(matchup.venue.name)} 🏟️`,
    `🔥 HR Score: ${codeSpan(result.score.toFixed(3))}`,
    `📈 HR Chance: ${codeSpan(percent(result.probability))}`,
    `🎯 Pitch Matchup: ${codeSpan(result.components.pitchMatchup.toFixed(3))}`,
    `🌬️ Weather Boost: ${codeSpan(result.multipliers.weather.toFixed(2))}`,
    `🏞️ Park Factor: ${codeSpan(result.multipliers.park.toFixed(2))}`,
  ];
  if (result.confidence !== 'high') {
    lines.push(`📝 _${escapeMarkdownV2(`${result.confidence} confidence`)}_`);
  }
  return lines.join('\n');
}

/**
 * One MarkdownV2 message per non-empty tier, best tier first. With no
 * picks at all the list holds the single no-picks message.
 */
export function formatTierMessages(results: readonly ScoreResult[], topN: number): string[] {
  const picks = topPicks(results, topN);
  const messages: string[] = [];

  for (const tier of TIER_ORDER) {
    const group = picks.filter((result) => result.tier === tier);
    if (group.length === 0) continue;
    const heading = `*${escapeMarkdownV2(TIER_HEADINGS[tier])}*`;
    messages.push(`${heading}\n\n${group.map(formatPickMarkdown).join('\n\n')}`);
  }

  return messages.length > 0 ? messages : [NO_PICKS_MARKDOWN];
}

export function formatPlainText(results: readonly ScoreResult[], topN: number, date: string): string {
  const picks = topPicks(results, topN);
  if (picks.length === 0) return NO_PICKS_TEXT;

  const lines = [`⚾ Top home run picks for ${date}`, ''];
  picks.forEach((result, index) => {
    const { matchup } = result;
    lines.push(
      `${index + 1}. ${matchup.batter.name} vs ${matchup.pitcher.name} @ ${matchup.venue.name}` +
        ` | ${result.tier} | score ${result.score.toFixed(3)} | ${percent(result.probability)} | ${result.confidence}`
    );
  });
  return lines.join('\n');
}

/**
 * Longest error text kept in an alert. Escaping at most doubles it, so the
 * alert stays one message and its code span is never split.
 */
export const ERROR_ALERT_MAX_CHARS = 2000;

export function formatErrorAlert(error: string, date: string): string {
  const text = error.length > ERROR_ALERT_MAX_CHARS ? `${error.slice(0, ERROR_ALERT_MAX_CHARS)}…` : error;
  return `❌ *HR picks failed for ${escapeMarkdownV2(date)}*\n${codeSpan(text)}`;
}

/**
 * Split a message into pieces no longer than `limit`, preferring blank
 * lines, then line breaks. A hard cut never strands an escape backslash.
 */
export function chunkMessage(text: string, limit: number = TELEGRAM_MESSAGE_LIMIT): string[] {
  if (text.length <= limit) return [text];

  const chunks: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    let cut = rest.lastIndexOf('\n\n', limit);
    let skip = 2;
    if (cut <= 0) {
      cut = rest.lastIndexOf('\n', limit);
      skip = 1;
    }
    if (cut <= 0) {
      cut = limit;
      skip = 0;
      let backslashes = 0;
      while (backslashes < cut && rest[cut - 1 - backslashes] === '\\') backslashes++;
      if (backslashes % 2 === 1) cut--;
    }
    chunks.push(rest.slice(0, cut));
    rest = rest.slice(cut + skip);
  }
  if (rest.length > 0) chunks.push(rest);
  return chunks;
}
