import { z } from 'zod';

const configSchema = z.object({
  leagueId: z.string({ required_error: 'ESPN_LEAGUE_ID is required' }).min(1, 'ESPN_LEAGUE_ID is required'),
  swid: z.string({ required_error: 'SWID is required' }).min(1, 'SWID is required'),
  espnS2: z.string({ required_error: 'ESPN_S2 is required' }).min(1, 'ESPN_S2 is required'),
  season: z.number().int().min(2000).default(new Date().getFullYear()),
  espnApiBaseUrl: z.string().url().default('https://lm-api-reads.fantasy.espn.com/apis/v3/games/ffl'),
  apiRateLimitDelayMs: z.number().int().nonnegative().default(100),
  outputFile: z.string().min(1).default('LeagueData.json'),
  externalResultsFile: z.string().min(1).default('ExternalResults.json'),
  medianWeekLimit: z.number().int().positive().default(14),
  acquisitionBudget: z.number().nonnegative().default(100),
});

export type StandingsConfig = Readonly<z.infer<typeof configSchema>>;

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

function toInt(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function toNumber(value: string | undefined): number | undefined {
  return value ? Number(value) : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): StandingsConfig {
  const raw = {
    leagueId: env.ESPN_LEAGUE_ID,
    swid: env.SWID,
    espnS2: env.ESPN_S2,
    season: toInt(env.SEASON),
    espnApiBaseUrl: env.ESPN_API_BASE_URL,
    apiRateLimitDelayMs: toInt(env.API_RATE_LIMIT_DELAY_MS),
    outputFile: env.OUTPUT_FILE,
    externalResultsFile: env.EXTERNAL_RESULTS_FILE,
    medianWeekLimit: toInt(env.MEDIAN_WEEK_LIMIT),
    acquisitionBudget: toNumber(env.ACQUISITION_BUDGET),
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration - ${issues.join('; ')}`, issues);
  }

  return Object.freeze(parsed.data);
}
