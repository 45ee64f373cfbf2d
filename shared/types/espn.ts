export interface EspnRecordSplit {
  wins: number;
  losses: number;
  ties: number;
  pointsFor: number;
  pointsAgainst: number;
  percentage?: number;
  gamesBack?: number;
  streakLength?: number;
  streakType?: string;
}

export interface EspnTeam {
  id: number;
  abbrev?: string;
  name?: string;
  location?: string;
  nickname?: string;
  logo?: string;
  playoffSeed?: number;
  record?: {
    overall?: EspnRecordSplit;
    home?: EspnRecordSplit;
    away?: EspnRecordSplit;
    division?: EspnRecordSplit;
  };
  transactionCounter?: {
    acquisitionBudgetSpent?: number;
    acquisitions?: number;
    drops?: number;
    trades?: number;
  };
}

export interface EspnScheduleSide {
  teamId: number;
  totalPoints?: number | null;
  totalPointsLive?: number | null;
}

export interface EspnScheduleEntry {
  id: number;
  matchupPeriodId: number;
  home?: EspnScheduleSide;
  away?: EspnScheduleSide;
  winner?: 'HOME' | 'AWAY' | 'TIE' | 'UNDECIDED';
}

export interface EspnLeague {
  id: number;
  seasonId: number;
  scoringPeriodId?: number;
  status?: {
    currentMatchupPeriod?: number;
    latestScoringPeriod?: number;
    finalScoringPeriod?: number;
    isActive?: boolean;
  };
  teams?: EspnTeam[];
  schedule?: EspnScheduleEntry[];
}
