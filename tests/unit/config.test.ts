import { ConfigurationError, loadConfig } from '../../src/config';

const baseEnv = {
  ESPN_LEAGUE_ID: '123456',
  SWID: '{test-swid}',
  ESPN_S2: 'test-s2',
};

describe('loadConfig', () => {
  it('should apply defaults around the required settings', () => {
    const config = loadConfig(baseEnv);

    expect(config).toEqual({
      leagueId: '123456',
      swid: '{test-swid}',
      espnS2: 'test-s2',
      season: new Date().getFullYear(),
      espnApiBaseUrl: 'https://lm-api-reads.fantasy.espn.com/apis/v3/games/ffl',
      apiRateLimitDelayMs: 100,
      outputFile: 'LeagueData.json',
      externalResultsFile: 'ExternalResults.json',
      medianWeekLimit: 14,
      acquisitionBudget: 100,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      ...baseEnv,
      SEASON: '2024',
      OUTPUT_FILE: 'out/standings.json',
      MEDIAN_WEEK_LIMIT: '13',
      ACQUISITION_BUDGET: '200',
    });

    expect(config.season).toBe(2024);
    expect(config.outputFile).toBe('out/standings.json');
    expect(config.medianWeekLimit).toBe(13);
    expect(config.acquisitionBudget).toBe(200);
  });

  it('should fail on missing credentials before anything runs', () => {
    expect.assertions(3);
    expect(() => loadConfig({ ESPN_LEAGUE_ID: '123456' })).toThrow(ConfigurationError);

    try {
      loadConfig({ ESPN_LEAGUE_ID: '123456', SWID: '' });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        issues: ['swid: SWID is required', 'espnS2: ESPN_S2 is required'],
      });
    }
  });

  it('should reject malformed numeric settings', () => {
    expect(() => loadConfig({ ...baseEnv, MEDIAN_WEEK_LIMIT: 'many' })).toThrow(ConfigurationError);
  });
});
