/**
 * Maps lowercase CSV headers to canonical column names through an alias table.
 */

export interface ColumnResolution {
  /** canonical name → header found in the file */
  mapping: Record<string, string>;
  missing: string[];
}

export function resolveColumns(
  headers: readonly string[],
  aliases: Record<string, string[]>,
  required: readonly string[]
): ColumnResolution {
  const present = new Set(headers);
  const mapping: Record<string, string> = {};
  for (const [canonical, candidates] of Object.entries(aliases)) {
    const found = candidates.find((c) => present.has(c));
    if (found) mapping[canonical] = found;
  }
  const missing = required.filter((name) => !(name in mapping));
  return { mapping, missing };
}

/** Re-keys a raw CSV record by canonical names; unmapped columns are dropped */
export function pickColumns(record: Record<string, string>, mapping: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [canonical, header] of Object.entries(mapping)) {
    out[canonical] = record[header] ?? '';
  }
  return out;
}
