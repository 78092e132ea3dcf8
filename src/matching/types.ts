/** Columns of the DLD units register, in the order the open-data CSV ships them. */
export const REGISTRATION_COLUMNS = [
  'property_id',
  'area_id',
  'zone_id',
  'area_name_ar',
  'area_name_en',
  'land_number',
  'land_sub_number',
  'building_number',
  'unit_number',
  'unit_balcony_area',
  'unit_parking_number',
  'parking_allocation_type',
  'parking_allocation_type_ar',
  'parking_allocation_type_en',
  'common_area',
  'actual_common_area',
  'floor',
  'rooms',
  'rooms_ar',
  'rooms_en',
  'actual_area',
  'property_type_id',
  'property_type_ar',
  'property_type_en',
  'property_sub_type_id',
  'property_sub_type_ar',
  'property_sub_type_en',
  'parent_property_id',
  'grandparent_property_id',
  'creation_date',
  'munc_zip_code',
  'munc_number',
  'parcel_id',
  'is_free_hold',
  'is_lease_hold',
  'is_registered',
  'pre_registration_number',
  'master_project_id',
  'master_project_en',
  'master_project_ar',
  'project_id',
  'project_name_ar',
  'project_name_en',
  'land_type_id',
  'land_type_ar',
  'land_type_en',
] as const;

export type RegistrationField = typeof REGISTRATION_COLUMNS[number];

export type RegistrationFields = { readonly [K in RegistrationField]?: string };

/**
 * One row of a snapshot. Values are kept exactly as published; `rowId` is the
 * row's position in the source file and orders otherwise-equal matches.
 */
export type RegistrationRecord = {
  readonly rowId: number;
  readonly fields: RegistrationFields;
};

/** Scraped listing attributes. Numeric fields may still be free text. */
export type ListingAttributes = {
  readonly projectName: string;
  readonly areaName: string;
  readonly bedrooms?: number | string | null;
  readonly sizeSqft?: number | string | null;
  readonly propertyType?: string | null;
  readonly masterProject?: string | null;
  readonly sourceUrl: string;
};

export type NormalizedAttributes = {
  readonly projectName: string;
  readonly areaName: string;
  readonly masterProject: string | null;
  readonly propertyType: string | null;
  readonly bedrooms: number | null;
  readonly sizeSqft: number | null;
  readonly sourceUrl: string;
  readonly projectTokens: readonly string[];
  readonly areaTokens: readonly string[];
  readonly masterProjectTokens: readonly string[];
};

export type MatchField = 'project' | 'area' | 'bedrooms' | 'size' | 'propertyType';

export const MATCH_FIELDS: readonly MatchField[] = ['project', 'area', 'bedrooms', 'size', 'propertyType'];

export type RelaxationStep = 'none' | 'drop-rooms' | 'drop-area';

export type CandidateSet = {
  readonly records: readonly RegistrationRecord[];
  /** Last relaxation step applied before candidates were found. */
  readonly stage: RelaxationStep;
};

export type ScoredMatch = {
  readonly record: RegistrationRecord;
  readonly score: number;
  readonly matchedFields: readonly MatchField[];
};

export type MatchStatus = 'UNIQUE' | 'AMBIGUOUS' | 'NONE';

export type MatchResult = {
  readonly status: MatchStatus;
  readonly matches: readonly ScoredMatch[];
};

/** Builds a frozen record holding all 46 columns; absent columns become ''. */
export function makeRecord(rowId: number, values: Readonly<Record<string, string | undefined>>): RegistrationRecord {
  const fields: { [K in RegistrationField]?: string } = {};
  for (const col of REGISTRATION_COLUMNS) {
    fields[col] = values[col] ?? '';
  }
  return Object.freeze({ rowId, fields: Object.freeze(fields) });
}

export function fieldValue(record: RegistrationRecord, col: RegistrationField): string {
  return record.fields[col] ?? '';
}
