import { access, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { generateStandingsReport, type PipelineConfig } from '../../src/services/standingsPipeline';
import { FakeLeagueDataSource } from '../mocks/leagueDataSource.mock';
import { mockTeams, mockWeeks } from '../fixtures/mockData';

describe('Standings pipeline', () => {
  let dir: string;
  let config: PipelineConfig;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'standings-'));
    config = {
      outputFile: path.join(dir, 'out', 'LeagueData.json'),
      externalResultsFile: path.join(dir, 'ExternalResults.json'),
      medianWeekLimit: 14,
      acquisitionBudget: 100,
    };
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('should score, merge, finalize and write the report', async () => {
    await writeFile(config.externalResultsFile, JSON.stringify([
      { Team: 'bench warmers', 'W/L Record': '1-0', 'Median Score Record': '1-0', PF: 130.5, PA: '100' },
      { Team: 'Expansion Crew', 'Overall Record': '2-0-0', PF: 240, 'Acquisition Budget': 75 },
    ]));
    const source = new FakeLeagueDataSource(mockTeams, mockWeeks, 3);

    const result = await generateStandingsReport(config, source);

    expect(result.weeksScored).toBe(2);
    expect(result.lastWeek).toBe(3);
    expect(result.externalRows).toBe(2);
    expect(result.outputFile).toBe(config.outputFile);

    const written = JSON.parse(await readFile(config.outputFile, 'utf8'));
    expect(written).toEqual(result.rows);
    expect(written).toEqual([
      {
        Rank: 2,
        Team: 'Gridiron Gurus',
        'Overall Record': '3-1-0',
        'Win %': 0.75,
        'Matchup Record': '1-1-0',
        'Median Score Record': '2-0-0',
        GB: 1,
        PF: 230.46,
        PA: 210.2,
        'Acquisition Budget': 88,
        'Team Logo': 'https://example.test/logos/1.png',
      },
      {
        Rank: 1,
        Team: 'Taco Tuesday',
        'Overall Record': '4-0-0',
        'Win %': 1,
        'Matchup Record': '2-0-0',
        'Median Score Record': '2-0-0',
        GB: 0,
        PF: 250,
        PA: 190,
        'Acquisition Budget': 100,
      },
      {
        Rank: 3,
        Team: 'Bench Warmers',
        'Overall Record': '2-4-0',
        'Win %': 0.33,
        'Matchup Record': '1-2-0',
        'Median Score Record': '1-2-0',
        GB: 3,
        PF: 300.5,
        PA: 340,
        'Acquisition Budget': 60,
      },
      {
        Rank: 5,
        Team: 'Hail Marys',
        'Overall Record': '1-3-0',
        'Win %': 0.25,
        'Matchup Record': '1-1-0',
        'Median Score Record': '0-2-0',
        GB: 3,
        PF: 200,
        PA: 210.25,
        'Acquisition Budget': -5,
      },
      {
        Rank: 4,
        Team: 'Expansion Crew',
        'Overall Record': '2-0-0',
        'Win %': 1,
        'Matchup Record': '0-0-0',
        'Median Score Record': '0-0-0',
        GB: 1,
        PF: 240,
        PA: 0,
        'Acquisition Budget': 75,
      },
    ]);
  });

  it('should run on league data alone when there is no external file', async () => {
    const source = new FakeLeagueDataSource(mockTeams, mockWeeks, 2);

    const result = await generateStandingsReport(config, source);

    expect(result.externalRows).toBe(0);
    expect(result.rows.map(r => [r.Team, r.Rank, r.GB])).toEqual([
      ['Gridiron Gurus', 2, 1],
      ['Taco Tuesday', 1, 0],
      ['Bench Warmers', 4, 4],
      ['Hail Marys', 3, 3],
    ]);
  });

  it('should honor a current week override', async () => {
    const source = new FakeLeagueDataSource(mockTeams, mockWeeks, 2);

    const result = await generateStandingsReport(config, source, { currentWeek: 1, write: false });

    expect(source.getCurrentWeek).not.toHaveBeenCalled();
    expect(source.getWeekMatchups.mock.calls).toEqual([[1]]);
    expect(result.weeksScored).toBe(1);
    expect(result.outputFile).toBeNull();
    await expect(access(config.outputFile)).rejects.toThrow();
  });

  it('should write nothing when the league cannot be loaded', async () => {
    const source = new FakeLeagueDataSource(mockTeams, mockWeeks, 2);
    source.getTeams.mockRejectedValue(new Error('league unavailable'));

    await expect(generateStandingsReport(config, source)).rejects.toThrow('league unavailable');
    await expect(access(config.outputFile)).rejects.toThrow();
  });
});
