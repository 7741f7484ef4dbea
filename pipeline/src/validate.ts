import type { Matchup } from '@hrcast/model';
import { MalformedInputError } from './errors.js';

function blank(value: string | undefined | null): boolean {
  return value === undefined || value === null || value.trim() === '';
}

/**
 * Check the identity fields every later stage keys on.
 * Throws MalformedInputError listing every missing field.
 */
export function validateMatchup(matchup: Matchup): Matchup {
  const missing: string[] = [];
  if (blank(matchup.id)) missing.push('id');
  if (blank(matchup.gameId)) missing.push('gameId');
  if (blank(matchup.gameDate) || !/^\d{4}-\d{2}-\d{2}$/.test(matchup.gameDate)) missing.push('gameDate');
  if (blank(matchup.batter?.id)) missing.push('batter.id');
  if (blank(matchup.batter?.name)) missing.push('batter.name');
  if (blank(matchup.pitcher?.id)) missing.push('pitcher.id');
  if (blank(matchup.pitcher?.name)) missing.push('pitcher.name');
  if (blank(matchup.venue?.name)) missing.push('venue.name');

  if (missing.length > 0) {
    throw new MalformedInputError(matchup.id ?? '', missing);
  }
  return matchup;
}
