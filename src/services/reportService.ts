import { mkdir, rename, writeFile } from 'fs/promises';
import path from 'path';
import { formatRecord } from '../lib/record';
import type { StandingsReportRow, TeamSnapshot } from '../../shared/types/standings';

export function toReportRow(snapshot: TeamSnapshot): StandingsReportRow {
  if (snapshot.rank === null || snapshot.gamesBehind === null) {
    throw new Error(`Standings for ${snapshot.teamName} have not been finalized`);
  }

  const row: StandingsReportRow = {
    Rank: snapshot.rank,
    Team: snapshot.teamName,
    'Overall Record': formatRecord(snapshot.overallRecord),
    'Win %': snapshot.winPct,
    'Matchup Record': formatRecord(snapshot.matchupRecord),
    'Median Score Record': formatRecord(snapshot.medianRecord),
    GB: snapshot.gamesBehind,
    PF: snapshot.pointsFor,
    PA: snapshot.pointsAgainst,
    'Acquisition Budget': snapshot.acquisitionBudget,
  };

  if (snapshot.logo) {
    row['Team Logo'] = snapshot.logo;
  }
  return row;
}

/**
 * Write the report next to its destination first and rename it into place, so
 * a failed run never leaves a half-written file behind.
 */
export async function writeStandingsReport(
  filePath: string,
  rows: StandingsReportRow[]
): Promise<void> {
  const target = path.resolve(filePath);
  const tempFile = `${target}.${process.pid}.tmp`;

  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(tempFile, `${JSON.stringify(rows, null, 2)}\n`, 'utf8');
  await rename(tempFile, target);
}
