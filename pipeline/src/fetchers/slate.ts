/**
 * Slate assembly: turn a day's schedule into batter-vs-starter matchups
 */

import type { LineupStatus, Matchup, PitcherStatus } from '@hrcast/model';
import type { MlbStatsClient, RosterResponse, ScheduleGame } from './mlb-stats.js';

export const LINEUP_SIZE = 9;

export interface SlateResult {
  date: string;
  matchups: Matchup[];
  /** One line per side that produced no matchups */
  skipped: string[];
  degradedSources: string[];
}

export function matchupId(batterId: string, pitcherId: string, gameDate: string): string {
  return `${batterId}-vs-${pitcherId}-${gameDate}`;
}

/**
 * First nine position players on the active roster stand in for a lineup
 * that has not been posted yet.
 */
export function projectLineup(roster: RosterResponse): { id: number; fullName: string }[] {
  return roster.roster
    .filter((entry) => entry.position.type !== 'Pitcher' && entry.position.abbreviation !== 'P')
    .slice(0, LINEUP_SIZE)
    .map((entry) => entry.person);
}

export async function buildSlate(date: string, mlb: MlbStatsClient): Promise<SlateResult> {
  const result: SlateResult = { date, matchups: [], skipped: [], degradedSources: [] };

  const schedule = await mlb.schedule(date);
  if (schedule.degraded) {
    result.degradedSources.push(`mlb-stats:schedule:${date}`);
  }

  const games = schedule.value.dates.filter((d) => d.date === date).flatMap((d) => d.games);

  for (const game of games) {
    for (const side of ['away', 'home'] as const) {
      const opposing = side === 'away' ? 'home' : 'away';
      const built = await sideMatchups(game, side, opposing, date, mlb, result);
      result.matchups.push(...built);
    }
  }

  return result;
}

async function sideMatchups(
  game: ScheduleGame,
  side: 'away' | 'home',
  opposing: 'away' | 'home',
  date: string,
  mlb: MlbStatsClient,
  result: SlateResult
): Promise<Matchup[]> {
  const battingTeam = game.teams[side].team;
  const pitcher = game.teams[opposing].probablePitcher;
  if (!pitcher) {
    const note = `${battingTeam.name} (game ${game.gamePk}): no probable pitcher listed for ${game.teams[opposing].team.name}`;
    console.warn(`  ⚠️ [Slate] ${note}`);
    result.skipped.push(note);
    return [];
  }

  const posted = side === 'away' ? game.lineups?.awayPlayers : game.lineups?.homePlayers;
  const opposingPosted = opposing === 'away' ? game.lineups?.awayPlayers : game.lineups?.homePlayers;

  let batters = posted ?? [];
  let lineupStatus: LineupStatus = 'confirmed';
  if (batters.length === 0) {
    const roster = await mlb.activeRoster(String(battingTeam.id));
    if (roster.degraded) {
      result.degradedSources.push(`mlb-stats:roster:${battingTeam.id}`);
    }
    batters = projectLineup(roster.value);
    lineupStatus = 'projected';
  }

  if (batters.length === 0) {
    const note = `${battingTeam.name} (game ${game.gamePk}): no lineup or roster available`;
    console.warn(`  ⚠️ [Slate] ${note}`);
    result.skipped.push(note);
    return [];
  }

  // A posted card for the pitching side names its starter
  const pitcherStatus: PitcherStatus = opposingPosted && opposingPosted.length > 0 ? 'confirmed' : 'probable';
  const gameDate = game.officialDate ?? date;

  return batters.map((batter) => ({
    id: matchupId(String(batter.id), String(pitcher.id), gameDate),
    gameId: String(game.gamePk),
    gameDate,
    gameTime: game.gameDate,
    venue: { id: String(game.venue.id), name: game.venue.name },
    batter: { id: String(batter.id), name: batter.fullName, teamId: String(battingTeam.id) },
    pitcher: {
      id: String(pitcher.id),
      name: pitcher.fullName,
      teamId: String(game.teams[opposing].team.id),
    },
    pitcherStatus,
    lineupStatus,
  }));
}
