import columnAliases from '../config/columnAliases.json';
import { SchemaError } from '../utils/errors';
import { REQUIRED_COLUMNS } from './orderSchema';

/** Normalized header text → canonical column name. */
export type AliasTable = Readonly<Record<string, string>>;

export const DEFAULT_COLUMN_ALIASES: AliasTable = columnAliases;

export interface ColumnResolution {
  // Output order: required columns first, then extras in source order
  columns: string[];
  // Output column → position of the source cell in a raw row
  sourceIndex: Map<string, number>;
}

export function cleanHeader(header: unknown): string {
  return String(header ?? '').trim().replace(/\s+/g, ' ').toLowerCase();
}

function buildLookup(aliases: AliasTable): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const [alias, canonical] of Object.entries(aliases)) {
    lookup.set(cleanHeader(alias), canonical);
  }
  return lookup;
}

// Keeps every output name unique the way spreadsheet readers mangle repeated headers.
function claimName(name: string, taken: Set<string>): string {
  if (!taken.has(name)) return name;
  let n = 1;
  while (taken.has(`${name}.${n}`)) n++;
  return `${name}.${n}`;
}

/**
 * Renames raw headers through the alias table and checks that every required
 * column is present. Throws {@link SchemaError} before any row is read.
 *
 * When two headers resolve to the same canonical column the first one wins
 * and the later one is kept as an extra column under its own header.
 */
export function resolveColumns(
  headers: readonly unknown[],
  aliases: AliasTable = DEFAULT_COLUMN_ALIASES,
  required: readonly string[] = REQUIRED_COLUMNS,
): ColumnResolution {
  const lookup = buildLookup(aliases);
  const taken = new Set<string>();
  const found: string[] = [];
  const sourceIndex = new Map<string, number>();

  headers.forEach((header, index) => {
    const trimmed = String(header ?? '').trim() || `Unnamed: ${index}`;
    const aliased = lookup.get(cleanHeader(header));
    const name = aliased && !taken.has(aliased) ? aliased : claimName(trimmed, taken);
    taken.add(name);
    found.push(name);
    sourceIndex.set(name, index);
  });

  const missing = required.filter((c) => !sourceIndex.has(c));
  if (missing.length > 0) {
    throw new SchemaError(missing, found);
  }

  const requiredSet = new Set(required);
  const columns = [...required, ...found.filter((c) => !requiredSet.has(c))];
  return { columns, sourceIndex };
}
