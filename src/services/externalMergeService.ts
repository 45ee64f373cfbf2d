import {
  combineRecords,
  createRecord,
  roundTo,
  winPct,
} from '../lib/record';
import { DEFAULT_ACQUISITION_BUDGET } from './standingsService';
import type {
  ExternalResultRow,
  TeamSnapshot,
  WinLossRecord,
} from '../../shared/types/standings';

/**
 * Lower-case, trim and keep only ASCII letters and digits.
 */
export function normalizeKey(value: string | null | undefined): string {
  return (value ?? '').trim().toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Name and id keys live in separate namespaces so a team called "7" never
 * collides with team id 7.
 */
export function candidateKeys(name: string | null, id: string | null): string[] {
  const keys: string[] = [];
  const nameKey = normalizeKey(name);
  const idKey = normalizeKey(id);
  if (nameKey) keys.push(`name:${nameKey}`);
  if (idKey) keys.push(`id:${idKey}`);
  return keys;
}

interface ExternalRecords {
  matchup: WinLossRecord;
  median: WinLossRecord;
  overall: WinLossRecord;
}

function resolveExternalRecords(row: ExternalResultRow): ExternalRecords {
  const matchup = row.matchupRecord ?? createRecord();
  const median = row.medianRecord ?? createRecord();
  // Without an explicit overall record, derive it so overall = matchup + median still holds
  const overall = row.overallRecord ?? combineRecords(matchup, median);
  return { matchup, median, overall };
}

function applyExternalRow(snapshot: TeamSnapshot, row: ExternalResultRow): TeamSnapshot {
  const records = resolveExternalRecords(row);
  const overallRecord = combineRecords(snapshot.overallRecord, records.overall);

  return {
    ...snapshot,
    matchupRecord: combineRecords(snapshot.matchupRecord, records.matchup),
    medianRecord: combineRecords(snapshot.medianRecord, records.median),
    overallRecord,
    winPct: winPct(overallRecord),
    pointsFor: roundTo(snapshot.pointsFor + row.pointsFor, 2),
    pointsAgainst: roundTo(snapshot.pointsAgainst + row.pointsAgainst, 2),
  };
}

export function snapshotFromExternalRow(row: ExternalResultRow): TeamSnapshot {
  const records = resolveExternalRecords(row);

  return {
    teamId: row.teamId,
    teamName: row.team ?? row.teamId ?? 'Unknown Team',
    logo: row.logo,
    rank: null,
    matchupRecord: records.matchup,
    medianRecord: records.median,
    overallRecord: records.overall,
    winPct: winPct(records.overall),
    pointsFor: roundTo(row.pointsFor, 2),
    pointsAgainst: roundTo(row.pointsAgainst, 2),
    gamesBehind: null,
    acquisitionBudget: row.acquisitionBudget ?? DEFAULT_ACQUISITION_BUDGET,
  };
}

/**
 * Add external partial-season results onto the snapshots. Records and points are
 * summed; identity, logo and budget stay as they are. A row's name key is tried
 * against every remaining snapshot before its id key. Each snapshot is matched at
 * most once per call, and external rows with no match are appended in file order.
 *
 * Not idempotent: merging the output again with the same rows counts them twice.
 */
export function mergeExternalResults(
  snapshots: TeamSnapshot[],
  externalRows: ExternalResultRow[]
): TeamSnapshot[] {
  const merged = [...snapshots];
  const available = new Set(merged.map((_, index) => index));
  const snapshotKeys = merged.map(s => candidateKeys(s.teamName, s.teamId));
  const appended: TeamSnapshot[] = [];

  for (const row of externalRows) {
    // Keys are tried in order, so a name match anywhere beats an id match
    let matchIndex: number | undefined;

    for (const key of candidateKeys(row.team, row.teamId)) {
      matchIndex = [...available].find(index => snapshotKeys[index].includes(key));
      if (matchIndex !== undefined) break;
    }

    if (matchIndex === undefined) {
      appended.push(snapshotFromExternalRow(row));
      continue;
    }

    available.delete(matchIndex);
    merged[matchIndex] = applyExternalRow(merged[matchIndex], row);
  }

  return [...merged, ...appended];
}
