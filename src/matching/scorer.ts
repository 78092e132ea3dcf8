import type { ScoringConfig } from '../lib/config.js';
import { type AliasTable, defaultAliasTable } from './aliases.js';
import { canonicalText, canonicalTokens, parseBedrooms, parseSize } from './normalize.js';
import { nameSimilarity, sizeCloseness } from './similarity.js';
import {
  fieldValue,
  MATCH_FIELDS,
  type CandidateSet,
  type MatchField,
  type NormalizedAttributes,
  type RegistrationRecord,
  type ScoredMatch,
} from './types.js';

export const SQM_TO_SQFT = 10.7639;

/** Per-field similarity in [0, 1]; null when either side lacks a usable value. */
export type FieldScores = Record<MatchField, number | null>;

function bestName(listing: readonly string[], values: string[], aliases: AliasTable): number {
  let best = 0;
  for (const value of values) {
    best = Math.max(best, nameSimilarity(listing, canonicalTokens(value, aliases)));
  }
  return best;
}

function present(...values: string[]): boolean {
  return values.some((v) => v.trim() !== '');
}

export function fieldScores(
  attrs: NormalizedAttributes,
  record: RegistrationRecord,
  cfg: ScoringConfig,
  aliases: AliasTable,
): FieldScores {
  const projectEn = fieldValue(record, 'project_name_en');
  const projectAr = fieldValue(record, 'project_name_ar');
  const masterEn = fieldValue(record, 'master_project_en');
  const masterAr = fieldValue(record, 'master_project_ar');
  let project: number | null = null;
  if (attrs.projectTokens.length && present(projectEn, projectAr, masterEn, masterAr)) {
    project = Math.max(
      bestName(attrs.projectTokens, [projectEn, projectAr], aliases),
      cfg.masterProjectFactor * bestName(attrs.projectTokens, [masterEn, masterAr], aliases),
    );
  }

  const areaEn = fieldValue(record, 'area_name_en');
  const areaAr = fieldValue(record, 'area_name_ar');
  const area = attrs.areaTokens.length && present(areaEn, areaAr)
    ? bestName(attrs.areaTokens, [areaEn, areaAr], aliases)
    : null;

  const rooms = parseBedrooms(fieldValue(record, 'rooms')) ?? parseBedrooms(fieldValue(record, 'rooms_en'));
  const bedrooms = attrs.bedrooms !== null && rooms !== null ? (attrs.bedrooms === rooms ? 1 : 0) : null;

  // actual_area is published in sqm but listings quote sqft; take whichever reading fits.
  const recordSize = parseSize(fieldValue(record, 'actual_area'));
  const size = attrs.sizeSqft !== null && recordSize !== null
    ? Math.max(
      sizeCloseness(attrs.sizeSqft, recordSize, cfg.sizeTolerance, cfg.sizeDecay),
      sizeCloseness(attrs.sizeSqft, recordSize * SQM_TO_SQFT, cfg.sizeTolerance, cfg.sizeDecay),
    )
    : null;

  const types = [fieldValue(record, 'property_sub_type_en'), fieldValue(record, 'property_type_en')]
    .map((v) => canonicalText(v, aliases))
    .filter(Boolean);
  let propertyType: number | null = null;
  if (attrs.propertyType && types.length) {
    const wanted = attrs.propertyType;
    propertyType = types.some((t) => t.split(' ').includes(wanted) || t === wanted) ? 1 : 0;
  }

  return { project, area, bedrooms, size, propertyType };
}

/**
 * Weighted mean of the fields both sides have. A field missing on either side
 * is left out of numerator and denominator alike.
 */
export function combineScores(scores: FieldScores, cfg: ScoringConfig): { score: number; matchedFields: MatchField[] } {
  let numerator = 0;
  let denominator = 0;
  const matchedFields: MatchField[] = [];
  for (const field of MATCH_FIELDS) {
    const s = scores[field];
    const w = cfg.weights[field];
    if (s === null || w <= 0) continue;
    numerator += w * s;
    denominator += w;
    if (s > 0) matchedFields.push(field);
  }
  const score = denominator > 0 ? Math.min(1, Math.max(0, numerator / denominator)) : 0;
  return { score, matchedFields };
}

function identityKey(record: RegistrationRecord): string {
  return [
    fieldValue(record, 'property_id'),
    fieldValue(record, 'unit_number'),
    fieldValue(record, 'building_number'),
    fieldValue(record, 'land_number'),
    fieldValue(record, 'land_sub_number'),
    fieldValue(record, 'project_name_en'),
  ].join('|');
}

export function compareMatches(a: ScoredMatch, b: ScoredMatch): number {
  return b.score - a.score || a.record.rowId - b.record.rowId;
}

export function score(
  attrs: NormalizedAttributes,
  candidates: CandidateSet,
  cfg: ScoringConfig,
  aliases: AliasTable = defaultAliasTable(),
): ScoredMatch[] {
  const scored: ScoredMatch[] = candidates.records.map((record) => {
    const { score: value, matchedFields } = combineScores(fieldScores(attrs, record, cfg, aliases), cfg);
    return { record, score: value, matchedFields };
  });
  scored.sort(compareMatches);

  // The register repeats some rows verbatim; keep the first of each.
  const seen = new Set<string>();
  return scored.filter((m) => {
    const key = identityKey(m.record);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
