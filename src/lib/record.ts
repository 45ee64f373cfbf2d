import type { WinLossRecord } from '../../shared/types/standings';

export function createRecord(wins = 0, losses = 0, ties = 0): WinLossRecord {
  return { wins, losses, ties };
}

/**
 * Round half-up to a fixed number of decimals.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

/**
 * Parse a "W-L-T" style string. Takes the first three integers found; missing
 * components are 0 and anything unreadable gives 0-0-0.
 */
export function parseRecord(text: unknown): WinLossRecord {
  if (typeof text !== 'string') {
    return createRecord();
  }

  const parts = (text.match(/\d+/g) ?? []).slice(0, 3).map(part => parseInt(part, 10));
  const [wins = 0, losses = 0, ties = 0] = parts;
  return createRecord(wins, losses, ties);
}

export function combineRecords(a: WinLossRecord, b: WinLossRecord): WinLossRecord {
  return {
    wins: a.wins + b.wins,
    losses: a.losses + b.losses,
    ties: a.ties + b.ties,
  };
}

export function formatRecord(record: WinLossRecord): string {
  return `${record.wins}-${record.losses}-${record.ties}`;
}

export function totalGames(record: WinLossRecord): number {
  return record.wins + record.losses + record.ties;
}

export function winPct(record: WinLossRecord): number {
  const games = totalGames(record);
  if (games === 0) {
    return 0;
  }
  return roundTo((record.wins + 0.5 * record.ties) / games, 2);
}
