export interface WinLossRecord {
  wins: number;
  losses: number;
  ties: number;
}

export interface TeamRef {
  teamId: string;
}

export interface WeeklyMatchup {
  home: TeamRef;
  homeScore: number | null;
  away: TeamRef | null; // null on a bye
  awayScore: number | null;
}

export type MedianTally = Map<string, WinLossRecord>;

export interface LeagueTeam {
  teamId: string;
  teamName: string;
  logo: string | null;
  wins: number;
  losses: number;
  ties: number;
  pointsFor: number;
  pointsAgainst: number;
  acquisitionBudgetSpent: number;
}

export interface TeamSnapshot {
  teamId: string | null;
  teamName: string;
  logo: string | null;
  rank: number | null;
  matchupRecord: WinLossRecord;
  medianRecord: WinLossRecord;
  overallRecord: WinLossRecord;
  winPct: number;
  pointsFor: number;
  pointsAgainst: number;
  gamesBehind: number | null;
  acquisitionBudget: number;
}

export interface ExternalResultRow {
  team: string | null;
  teamId: string | null;
  overallRecord: WinLossRecord | null;
  matchupRecord: WinLossRecord | null;
  medianRecord: WinLossRecord | null;
  pointsFor: number;
  pointsAgainst: number;
  acquisitionBudget: number | null;
  logo: string | null;
}

export interface StandingsReportRow {
  Rank: number;
  Team: string;
  'Overall Record': string;
  'Win %': number;
  'Matchup Record': string;
  'Median Score Record': string;
  GB: number;
  PF: number;
  PA: number;
  'Acquisition Budget': number;
  'Team Logo'?: string;
}

/**
 * Capability the standings pipeline needs from a league host.
 * getWeekMatchups rejects with WeekNotAvailableError for weeks not yet published.
 */
export interface LeagueDataSource {
  getTeams(): Promise<LeagueTeam[]>;
  getCurrentWeek(): Promise<number>;
  getWeekMatchups(week: number): Promise<WeeklyMatchup[]>;
}
