import NodeCache from 'node-cache';
import type { StandingsConfig } from '../config';
import type {
  EspnLeague,
  EspnScheduleSide,
  EspnTeam,
} from '../../shared/types/espn';
import type {
  LeagueDataSource,
  LeagueTeam,
  WeeklyMatchup,
} from '../../shared/types/standings';

export class EspnAPIError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public endpoint?: string
  ) {
    super(message);
    this.name = 'EspnAPIError';
  }
}

export class WeekNotAvailableError extends Error {
  constructor(public week: number) {
    super(`No scores published for week ${week} yet`);
    this.name = 'WeekNotAvailableError';
  }
}

export type EspnClientOptions = Pick<
  StandingsConfig,
  'leagueId' | 'season' | 'swid' | 'espnS2' | 'espnApiBaseUrl' | 'apiRateLimitDelayMs'
>;

export function teamDisplayName(team: EspnTeam): string {
  if (team.name && team.name.trim()) {
    return team.name.trim();
  }
  const composed = [team.location, team.nickname].filter(Boolean).join(' ').trim();
  return composed || `Team ${team.id}`;
}

function sideScore(side: EspnScheduleSide): number | null {
  const score = side.totalPointsLive ?? side.totalPoints;
  return typeof score === 'number' && Number.isFinite(score) ? score : null;
}

export class EspnClient implements LeagueDataSource {
  private cache: NodeCache;
  private lastRequestTime = 0;

  constructor(private options: EspnClientOptions) {
    this.cache = new NodeCache({
      stdTTL: 600,
      useClones: false,
      checkperiod: 120
    });
  }

  /**
   * Rate limiting: enforce minimum delay between requests
   */
  private async enforceRateLimit(): Promise<void> {
    const now = Date.now();
    const timeSinceLastRequest = now - this.lastRequestTime;
    const minDelay = this.options.apiRateLimitDelayMs;

    if (timeSinceLastRequest < minDelay) {
      const waitTime = minDelay - timeSinceLastRequest;
      await new Promise(resolve => setTimeout(resolve, waitTime));
    }

    this.lastRequestTime = Date.now();
  }

  private get leaguePath(): string {
    return `/seasons/${this.options.season}/segments/0/leagues/${this.options.leagueId}`;
  }

  /**
   * GET a league view with the private-league cookies, cached under cacheKey
   */
  private async request<T>(
    query: string,
    cacheKey: string,
    cacheTTL: number
  ): Promise<T> {
    const cached = this.cache.get<T>(cacheKey);
    if (cached !== undefined) {
      return cached;
    }

    await this.enforceRateLimit();

    const endpoint = `${this.leaguePath}?${query}`;
    const url = `${this.options.espnApiBaseUrl}${endpoint}`;

    try {
      const response = await fetch(url, {
        headers: {
          accept: 'application/json',
          cookie: `SWID=${this.options.swid}; espn_s2=${this.options.espnS2}`,
        },
      });

      if (!response.ok) {
        throw new EspnAPIError(
          `API request failed: ${response.status} ${response.statusText}`,
          response.status,
          endpoint
        );
      }

      const data = await response.json() as T;
      this.cache.set(cacheKey, data, cacheTTL);
      return data;
    } catch (error) {
      if (error instanceof EspnAPIError) {
        throw error;
      }
      throw new EspnAPIError(
        `Network error: ${error instanceof Error ? error.message : 'Unknown error'}`,
        undefined,
        endpoint
      );
    }
  }

  private async getLeague(): Promise<EspnLeague> {
    return this.request<EspnLeague>(
      'view=mTeam&view=mStatus',
      'league',
      600 // Cache for 10 minutes
    );
  }

  async getTeams(): Promise<LeagueTeam[]> {
    const league = await this.getLeague();

    return (league.teams ?? []).map(team => {
      const overall = team.record?.overall;
      return {
        teamId: String(team.id),
        teamName: teamDisplayName(team),
        logo: team.logo ?? null,
        wins: overall?.wins ?? 0,
        losses: overall?.losses ?? 0,
        ties: overall?.ties ?? 0,
        pointsFor: overall?.pointsFor ?? 0,
        pointsAgainst: overall?.pointsAgainst ?? 0,
        acquisitionBudgetSpent: team.transactionCounter?.acquisitionBudgetSpent ?? 0,
      };
    });
  }

  async getCurrentWeek(): Promise<number> {
    const status = await this.request<Pick<EspnLeague, 'status' | 'scoringPeriodId'>>(
      'view=mStatus',
      'current-week',
      300 // Cache for 5 minutes
    );
    return status.status?.currentMatchupPeriod ?? status.scoringPeriodId ?? 1;
  }

  /**
   * Scored matchups for one matchup period. Rejects with WeekNotAvailableError
   * when ESPN has not published the week.
   */
  async getWeekMatchups(week: number): Promise<WeeklyMatchup[]> {
    const currentWeek = await this.getCurrentWeek();
    const cacheTTL = week >= currentWeek ? 300 : 86400; // 5 min for current week, 24h for past weeks

    const league = await this.request<EspnLeague>(
      `view=mMatchupScore&view=mScoreboard&scoringPeriodId=${week}`,
      `matchups-${week}`,
      cacheTTL
    );

    const matchups: WeeklyMatchup[] = [];
    for (const entry of league.schedule ?? []) {
      if (entry.matchupPeriodId !== week || !entry.home) continue;
      matchups.push({
        home: { teamId: String(entry.home.teamId) },
        homeScore: sideScore(entry.home),
        away: entry.away ? { teamId: String(entry.away.teamId) } : null,
        awayScore: entry.away ? sideScore(entry.away) : null,
      });
    }

    const hasScores = matchups.some(m => m.homeScore !== null || m.awayScore !== null);
    if (!hasScores) {
      throw new WeekNotAvailableError(week);
    }

    return matchups;
  }

  /**
   * Clear all cached data (useful for testing or manual refresh)
   */
  clearCache(): void {
    this.cache.flushAll();
  }
}
