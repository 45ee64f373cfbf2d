import { readFile } from 'fs/promises';
import { z } from 'zod';
import aliasTableJson from '../../config/external-field-aliases.json';
import { parseRecord } from '../lib/record';
import type { ExternalResultRow } from '../../shared/types/standings';

const aliasList = z.array(z.string().min(1)).min(1);

const aliasTableSchema = z.object({
  version: z.number().int().positive(),
  fields: z.object({
    team: aliasList,
    teamId: aliasList,
    overallRecord: aliasList,
    matchupRecord: aliasList,
    medianRecord: aliasList,
    pointsFor: aliasList,
    pointsAgainst: aliasList,
    acquisitionBudget: aliasList,
    logo: aliasList,
  }),
});

export type ExternalAliasTable = z.infer<typeof aliasTableSchema>;
export type ExternalField = keyof ExternalAliasTable['fields'];

export function parseAliasTable(input: unknown): ExternalAliasTable {
  return aliasTableSchema.parse(input);
}

export const EXTERNAL_FIELD_ALIASES: ExternalAliasTable = parseAliasTable(aliasTableJson);

type RawRow = Record<string, unknown>;

const rawRowSchema = z.record(z.unknown());
const rawDocumentSchema = z.array(z.unknown());

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'string') return value.trim() !== '';
  return true;
}

/**
 * First alias (in table order) holding a non-empty value. Headers are matched
 * trimmed and case-insensitively.
 */
export function readAliasedValue(raw: RawRow, aliases: string[]): unknown {
  const byHeader = new Map<string, unknown>();
  for (const [key, value] of Object.entries(raw)) {
    const header = key.trim().toLowerCase();
    if (!byHeader.has(header) || !isPresent(byHeader.get(header))) {
      byHeader.set(header, value);
    }
  }

  for (const alias of aliases) {
    const value = byHeader.get(alias.trim().toLowerCase());
    if (isPresent(value)) {
      return value;
    }
  }
  return undefined;
}

function toText(value: unknown): string | null {
  if (typeof value === 'string') return value.trim() || null;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

function toNumberOrNull(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function normalizeExternalRow(
  raw: RawRow,
  table: ExternalAliasTable = EXTERNAL_FIELD_ALIASES
): ExternalResultRow {
  const read = (field: ExternalField) => readAliasedValue(raw, table.fields[field]);
  const readRecord = (field: ExternalField) => {
    const value = read(field);
    return value === undefined ? null : parseRecord(value);
  };

  return {
    team: toText(read('team')),
    teamId: toText(read('teamId')),
    overallRecord: readRecord('overallRecord'),
    matchupRecord: readRecord('matchupRecord'),
    medianRecord: readRecord('medianRecord'),
    pointsFor: toNumberOrNull(read('pointsFor')) ?? 0,
    pointsAgainst: toNumberOrNull(read('pointsAgainst')) ?? 0,
    acquisitionBudget: toNumberOrNull(read('acquisitionBudget')),
    logo: toText(read('logo')),
  };
}

function isMissingFile(error: unknown): boolean {
  // fs errors may come from another realm, so check the shape rather than the class
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load the external results file. A missing, unreadable or malformed file is
 * treated as an empty dataset so the run continues on league data alone.
 */
export async function loadExternalResults(
  filePath: string,
  table: ExternalAliasTable = EXTERNAL_FIELD_ALIASES
): Promise<ExternalResultRow[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      console.log(`ℹ️  No external results at ${filePath}, using league data only`);
    } else {
      console.warn(`⚠️  Could not read external results ${filePath}:`, error);
    }
    return [];
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    console.warn(`⚠️  External results ${filePath} is not valid JSON, ignoring it:`, error);
    return [];
  }

  const parsed = rawDocumentSchema.safeParse(document);
  if (!parsed.success) {
    console.warn(`⚠️  External results ${filePath} is not a JSON array, ignoring it`);
    return [];
  }

  const rows: ExternalResultRow[] = [];
  parsed.data.forEach((entry, index) => {
    const row = rawRowSchema.safeParse(entry);
    if (!row.success) {
      console.warn(`⚠️  Dropping external results entry ${index + 1}: not an object`);
      return;
    }
    rows.push(normalizeExternalRow(row.data, table));
  });

  return rows;
}
