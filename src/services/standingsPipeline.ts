import type { StandingsConfig } from '../config';
import { computeMedianRecords, collectSeasonWeeks } from './medianScoringService';
import { buildTeamSnapshots, finalizeStandings } from './standingsService';
import { loadExternalResults } from './externalResultsService';
import { mergeExternalResults } from './externalMergeService';
import { toReportRow, writeStandingsReport } from './reportService';
import type { LeagueDataSource, StandingsReportRow } from '../../shared/types/standings';

export type PipelineConfig = Pick<
  StandingsConfig,
  'outputFile' | 'externalResultsFile' | 'medianWeekLimit' | 'acquisitionBudget'
>;

export interface PipelineOptions {
  currentWeek?: number; // overrides the week reported by the data source
  write?: boolean;
}

export interface StandingsRunResult {
  rows: StandingsReportRow[];
  weeksScored: number;
  lastWeek: number;
  externalRows: number;
  outputFile: string | null;
}

/**
 * One full pass: median records, snapshots, external merge, finalize, write.
 * Nothing is written unless every step before it succeeds.
 */
export async function generateStandingsReport(
  config: PipelineConfig,
  source: LeagueDataSource,
  options: PipelineOptions = {}
): Promise<StandingsRunResult> {
  const teams = await source.getTeams();
  const currentWeek = options.currentWeek ?? await source.getCurrentWeek();
  const lastWeek = Math.min(currentWeek, config.medianWeekLimit);

  console.log(`📅 Scoring median games for weeks 1-${lastWeek} across ${teams.length} teams`);
  const weeks = await collectSeasonWeeks(source, currentWeek, config.medianWeekLimit);
  const medianTally = computeMedianRecords(weeks, teams.map(team => team.teamId));

  const snapshots = buildTeamSnapshots(teams, medianTally, config.acquisitionBudget);
  const externalRows = await loadExternalResults(config.externalResultsFile);
  const merged = mergeExternalResults(snapshots, externalRows);
  const rows = finalizeStandings(merged).map(toReportRow);

  const write = options.write ?? true;
  if (write) {
    await writeStandingsReport(config.outputFile, rows);
  }

  return {
    rows,
    weeksScored: weeks.length,
    lastWeek,
    externalRows: externalRows.length,
    outputFile: write ? config.outputFile : null,
  };
}
