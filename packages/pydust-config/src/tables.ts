import { InvalidConfigurationError } from './errors';
import type { ManifestTable } from './validation';

export function assertKnownKeys(
  table: ManifestTable,
  known: readonly string[],
  section: string
): void {
  const unknown = Object.keys(table).filter((key) => !known.includes(key));
  if (unknown.length === 0) {
    return;
  }
  const listed = unknown.map((key) => `'${key}'`).join(', ');
  const accepted = known.map((key) => `'${key}'`).join(', ');
  throw new InvalidConfigurationError(
    `Unknown key(s) ${listed} in ${section}. Accepted keys: ${accepted}`
  );
}

export function readKey(table: ManifestTable, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}
