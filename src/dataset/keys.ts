import type { AliasTable } from '../matching/aliases.js';
import { canonicalTokens, parseBedrooms } from '../matching/normalize.js';
import { fieldValue, type RegistrationRecord } from '../matching/types.js';

/** Derived lookup keys stored beside each record so candidate queries stay exact-token lookups. */
export type RecordKeys = {
  readonly projectTokens: readonly string[];
  readonly areaTokens: readonly string[];
  readonly rooms: number | null;
};

function distinct(values: string[]): string[] {
  return Array.from(new Set(values));
}

export function recordKeys(record: RegistrationRecord, aliases: AliasTable): RecordKeys {
  const projectTokens = distinct([
    ...canonicalTokens(fieldValue(record, 'project_name_en'), aliases),
    ...canonicalTokens(fieldValue(record, 'project_name_ar'), aliases),
    ...canonicalTokens(fieldValue(record, 'master_project_en'), aliases),
    ...canonicalTokens(fieldValue(record, 'master_project_ar'), aliases),
  ]);
  const areaTokens = distinct([
    ...canonicalTokens(fieldValue(record, 'area_name_en'), aliases),
    ...canonicalTokens(fieldValue(record, 'area_name_ar'), aliases),
  ]);
  const rooms = parseBedrooms(fieldValue(record, 'rooms')) ?? parseBedrooms(fieldValue(record, 'rooms_en'));
  return { projectTokens, areaTokens, rooms };
}
