import type { ResolverConfig, ScoringConfig } from '../lib/config.js';
import { buildAliasTable } from '../matching/aliases.js';
import { makeRecord, type ListingAttributes, type RegistrationRecord } from '../matching/types.js';

export const TEST_ALIASES = buildAliasTable({
  aliases: {
    dubai: ['دبي'],
    marina: ['marsa', 'مارينا', 'مرسى'],
    heights: ['هايتس'],
    apartment: ['apartments', 'flat'],
  },
});

export const SCORING: ScoringConfig = {
  weights: { project: 0.35, area: 0.25, bedrooms: 0.15, size: 0.15, propertyType: 0.1 },
  masterProjectFactor: 0.6,
  sizeTolerance: 0.15,
  sizeDecay: 0.15,
};

export const RESOLVER: ResolverConfig = { minScore: 0.5, margin: 0.15, maxResults: 20 };

export const LISTING_URL = 'https://www.propertyfinder.ae/en/plp/buy/apartment-for-sale-dubai-dubai-marina-marina-heights-1234567.html';

export function listing(overrides: Partial<ListingAttributes> = {}): ListingAttributes {
  return {
    projectName: 'Marina Heights',
    areaName: 'Dubai Marina',
    bedrooms: 2,
    sizeSqft: 1200,
    sourceUrl: LISTING_URL,
    ...overrides,
  };
}

export function marinaHeightsUnit(rowId: number, overrides: Record<string, string> = {}): RegistrationRecord {
  return makeRecord(rowId, {
    property_id: String(1000 + rowId),
    project_name_en: 'Marina Heights',
    area_name_en: 'Dubai Marina',
    rooms: '2',
    actual_area: '1180',
    unit_number: '1204',
    building_number: 'B1',
    ...overrides,
  });
}

/** Records that share no project token with Marina Heights. */
export function unrelatedUnits(startRowId: number): RegistrationRecord[] {
  return [
    makeRecord(startRowId, { project_name_en: 'Burj Vista', area_name_en: 'Burj Khalifa', rooms: '1', actual_area: '75' }),
    makeRecord(startRowId + 1, { project_name_en: 'Golf Promenade', area_name_en: 'Damac Hills', rooms: '2', actual_area: '110' }),
    makeRecord(startRowId + 2, { project_name_en: 'Shoreline Apartments', area_name_en: 'Palm Jumeirah', rooms: '2', actual_area: '140' }),
  ];
}
