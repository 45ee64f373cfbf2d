import {
  combineRecords,
  createRecord,
  roundTo,
  winPct,
} from '../lib/record';
import type {
  LeagueTeam,
  MedianTally,
  TeamSnapshot,
  WinLossRecord,
} from '../../shared/types/standings';

export const DEFAULT_ACQUISITION_BUDGET = 100;

export function buildTeamSnapshot(
  team: LeagueTeam,
  medianRecord: WinLossRecord,
  acquisitionBudget: number = DEFAULT_ACQUISITION_BUDGET
): TeamSnapshot {
  const matchupRecord = createRecord(team.wins, team.losses, team.ties);
  const median = createRecord(medianRecord.wins, medianRecord.losses, 0);
  const overallRecord = combineRecords(matchupRecord, median);

  return {
    teamId: team.teamId,
    teamName: team.teamName,
    logo: team.logo,
    rank: null,
    matchupRecord,
    medianRecord: median,
    overallRecord,
    winPct: winPct(overallRecord),
    pointsFor: roundTo(team.pointsFor, 2),
    pointsAgainst: roundTo(team.pointsAgainst, 2),
    gamesBehind: null,
    // Overspending is passed through as a negative balance
    acquisitionBudget: acquisitionBudget - team.acquisitionBudgetSpent,
  };
}

export function buildTeamSnapshots(
  teams: LeagueTeam[],
  medianTally: MedianTally,
  acquisitionBudget: number = DEFAULT_ACQUISITION_BUDGET
): TeamSnapshot[] {
  return teams.map(team =>
    buildTeamSnapshot(team, medianTally.get(team.teamId) ?? createRecord(), acquisitionBudget)
  );
}

/**
 * Most overall wins, then most points for, then fewest overall losses.
 * The earliest row wins a complete tie.
 */
export function findLeader(rows: TeamSnapshot[]): TeamSnapshot | null {
  let leader: TeamSnapshot | null = null;

  for (const row of rows) {
    if (!leader) {
      leader = row;
      continue;
    }

    const a = row.overallRecord;
    const b = leader.overallRecord;
    if (a.wins !== b.wins) {
      if (a.wins > b.wins) leader = row;
    } else if (row.pointsFor !== leader.pointsFor) {
      if (row.pointsFor > leader.pointsFor) leader = row;
    } else if (a.losses < b.losses) {
      leader = row;
    }
  }

  return leader;
}

export function computeGamesBehind(row: TeamSnapshot, leader: TeamSnapshot): number {
  if (row === leader) {
    return 0;
  }

  const winGap = leader.overallRecord.wins - row.overallRecord.wins;
  const lossGap = row.overallRecord.losses - leader.overallRecord.losses;
  return roundTo((winGap + lossGap) / 2, 1);
}

/**
 * Recompute win %, games behind and rank on the merged rows. Output keeps the
 * input order; only the rank reflects the sorted position.
 */
export function finalizeStandings(rows: TeamSnapshot[]): TeamSnapshot[] {
  const rescored = rows.map(row => ({ ...row, winPct: winPct(row.overallRecord) }));

  const leader = findLeader(rescored);
  if (!leader) {
    return [];
  }

  const order = rescored
    .map((row, index) => ({ row, index }))
    .sort((a, b) => {
      if (a.row.overallRecord.wins !== b.row.overallRecord.wins) {
        return b.row.overallRecord.wins - a.row.overallRecord.wins;
      }
      return b.row.pointsFor - a.row.pointsFor;
    });

  const ranks = new Array<number>(rescored.length);
  order.forEach(({ index }, position) => {
    ranks[index] = position + 1;
  });

  return rescored.map((row, index) => ({
    ...row,
    gamesBehind: computeGamesBehind(row, leader),
    rank: ranks[index],
  }));
}
