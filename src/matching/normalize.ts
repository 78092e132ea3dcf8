import { type AliasTable, defaultAliasTable } from './aliases.js';
import { tokenize } from './text.js';
import type { ListingAttributes, NormalizedAttributes } from './types.js';

export function canonicalTokens(value: string | null | undefined, aliases: AliasTable): string[] {
  return tokenize(value).map((token) => aliases.get(token) ?? token);
}

export function canonicalText(value: string | null | undefined, aliases: AliasTable): string {
  return canonicalTokens(value, aliases).join(' ');
}

const STUDIO_RE = /\bstudio\b|ستوديو|استوديو/;
const BEDROOM_RE = /(\d+)\s*(?:b\s*\/\s*r|br|bhk|bed(?:room)?s?)\b/;
const WHOLE_NUMBER_RE = /^(\d+)(?:\.0+)?$/;

/** "Studio" is 0, "2 BR" / "2 Bedrooms" / "2 B/R" / "2" are 2; anything else is unknown. */
export function parseBedrooms(value: number | string | null | undefined): number | null {
  if (value == null) return null;
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : null;
  }
  const text = value.toLowerCase().trim();
  if (!text) return null;
  const whole = text.match(WHOLE_NUMBER_RE);
  if (whole) return parseInt(whole[1], 10);
  if (STUDIO_RE.test(text)) return 0;
  const beds = text.match(BEDROOM_RE);
  return beds ? parseInt(beds[1], 10) : null;
}

/** First number in the text, thousands separators ignored. Units are not interpreted. */
export function parseSize(value: number | string | null | undefined): number | null {
  if (value == null) return null;
  if (typeof value === 'number') {
    return Number.isFinite(value) && value > 0 ? value : null;
  }
  const m = value.replace(/(\d),(?=\d{3}\b)/g, '$1').match(/\d+(?:\.\d+)?/);
  if (!m) return null;
  const n = parseFloat(m[0]);
  return Number.isFinite(n) && n > 0 ? n : null;
}

export function normalize(attrs: ListingAttributes, aliases: AliasTable = defaultAliasTable()): NormalizedAttributes {
  const projectTokens = canonicalTokens(attrs.projectName, aliases);
  const areaTokens = canonicalTokens(attrs.areaName, aliases);
  const masterProjectTokens = canonicalTokens(attrs.masterProject, aliases);
  const propertyType = canonicalText(attrs.propertyType, aliases);

  return Object.freeze({
    projectName: projectTokens.join(' '),
    areaName: areaTokens.join(' '),
    masterProject: masterProjectTokens.length ? masterProjectTokens.join(' ') : null,
    propertyType: propertyType || null,
    bedrooms: parseBedrooms(attrs.bedrooms),
    sizeSqft: parseSize(attrs.sizeSqft),
    sourceUrl: attrs.sourceUrl.trim(),
    projectTokens: Object.freeze(projectTokens),
    areaTokens: Object.freeze(areaTokens),
    masterProjectTokens: Object.freeze(masterProjectTokens),
  });
}
