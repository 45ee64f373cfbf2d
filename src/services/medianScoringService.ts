import { createRecord } from '../lib/record';
import { EspnAPIError, WeekNotAvailableError } from './espnClient';
import type {
  LeagueDataSource,
  MedianTally,
  WeeklyMatchup,
  WinLossRecord,
} from '../../shared/types/standings';

/**
 * Median of an unsorted list of scores. Returns null for an empty list.
 */
export function computeWeeklyMedian(scores: number[]): number | null {
  if (scores.length === 0) {
    return null;
  }

  const sorted = [...scores].sort((a, b) => a - b);
  const length = sorted.length;
  if (length % 2 === 0) {
    return (sorted[length / 2 - 1] + sorted[length / 2]) / 2;
  }
  return sorted[Math.floor(length / 2)];
}

function creditSide(tally: MedianTally, teamId: string, score: number, median: number): void {
  const current: WinLossRecord = tally.get(teamId) ?? createRecord();
  tally.set(
    teamId,
    score >= median
      ? { ...current, wins: current.wins + 1 }
      : { ...current, losses: current.losses + 1 }
  );
}

/**
 * Tally median wins and losses across weeks, in order. A side without a score
 * that week is neither credited nor penalized; ties are never counted.
 */
export function computeMedianRecords(weeks: WeeklyMatchup[][], teamIds: string[]): MedianTally {
  const tally: MedianTally = new Map(teamIds.map(teamId => [teamId, createRecord()]));

  for (const matchups of weeks) {
    const scores: number[] = [];
    for (const matchup of matchups) {
      if (matchup.homeScore !== null) scores.push(matchup.homeScore);
      if (matchup.awayScore !== null) scores.push(matchup.awayScore);
    }

    const median = computeWeeklyMedian(scores);
    if (median === null) {
      continue;
    }

    for (const matchup of matchups) {
      if (matchup.homeScore !== null) {
        creditSide(tally, matchup.home.teamId, matchup.homeScore, median);
      }
      if (matchup.away && matchup.awayScore !== null) {
        creditSide(tally, matchup.away.teamId, matchup.awayScore, median);
      }
    }
  }

  return tally;
}

/**
 * Fetch weeks 1..min(currentWeek, maxWeeks). An unpublished week or a failed
 * ESPN request skips that week; the next run picks it up. Anything else is rethrown.
 */
export async function collectSeasonWeeks(
  source: LeagueDataSource,
  currentWeek: number,
  maxWeeks: number
): Promise<WeeklyMatchup[][]> {
  const lastWeek = Math.min(currentWeek, maxWeeks);
  const weeks: WeeklyMatchup[][] = [];

  for (let week = 1; week <= lastWeek; week++) {
    try {
      weeks.push(await source.getWeekMatchups(week));
    } catch (error) {
      if (!(error instanceof WeekNotAvailableError || error instanceof EspnAPIError)) {
        throw error;
      }
      console.warn(`⏭️  Skipping week ${week}: ${error.message}`);
    }
  }

  return weeks;
}
