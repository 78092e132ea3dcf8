import * as cheerio from 'cheerio';
import { z } from 'zod';
import { config } from '../lib/config.js';
import { InvalidListingUrl, ScrapeFailure } from '../lib/errors.js';
import { HttpError, httpGetText } from '../lib/http.js';
import { logger } from '../lib/logger.js';
import type { ListingAttributes } from '../matching/types.js';

const log = logger.child({ module: 'scraper' });

const ALLOWED_HOSTS = ['propertyfinder.ae', 'www.propertyfinder.ae'];
const PROPERTY_TYPES = ['villa', 'apartment', 'townhouse', 'penthouse', 'duplex', 'studio'];

// Browser-like headers; the site serves a challenge page to bare clients.
const BROWSER_HEADERS: Record<string, string> = {
  'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'Upgrade-Insecure-Requests': '1',
  Referer: 'https://www.google.com/',
};

const TITLE_STOPWORDS = new Set([
  'for', 'sale', 'rent', 'in', 'at', 'a', 'an', 'bed', 'bedroom', 'bedrooms', 'bathroom', 'bathrooms',
  'with', 'and', 'buy', 'aed', 'sqft', 'sq', 'ft', 'br', 'of', 'on', 'by', 'to', 'from', 'dubai', 'uae',
  'property', 'elegant', 'luxury', 'luxurious', 'beautiful', 'stunning', 'spacious', 'brand', 'new',
  'modern', 'exclusive', 'premium', 'amazing', 'gorgeous', 'vacant', 'furnished', 'unfurnished',
]);

const jsonLdItem = z.object({
  name: z.string().optional(),
  address: z.object({
    streetAddress: z.string().optional(),
    addressLocality: z.string().optional(),
  }).partial().optional(),
  numberOfRooms: z.union([z.number(), z.string()]).optional(),
  floorSize: z.object({ value: z.union([z.number(), z.string()]).optional() }).optional(),
});

type JsonLdItem = z.infer<typeof jsonLdItem>;

export function validateListingUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    throw new InvalidListingUrl(raw, 'not a URL');
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new InvalidListingUrl(raw, `unsupported protocol ${url.protocol}`);
  }
  if (!ALLOWED_HOSTS.includes(url.hostname.toLowerCase())) {
    throw new InvalidListingUrl(raw, 'only Property Finder listings are supported');
  }
  return url;
}

/** Property type and location words from a listing slug such as `apartment-for-sale-dubai-dubai-marina-marina-heights-123.html`. */
export function parseListingSlug(url: string): { propertyType?: string; location?: string } {
  const slug = url.replace(/[?#].*$/, '').replace(/\/+$/, '').split('/').pop() ?? '';
  const parts = slug.replace(/\.html$/, '').toLowerCase().split('-').filter(Boolean);
  const propertyType = PROPERTY_TYPES.find((t) => parts.includes(t));
  const at = parts.indexOf('dubai');
  const tail = at >= 0 ? parts.slice(at + 1) : [];
  // The last segment is the listing id.
  const words = tail.length && /^\d+$/.test(tail[tail.length - 1]) ? tail.slice(0, -1) : tail;
  return { propertyType, location: words.length ? words.join(' ') : undefined };
}

export function titlePhrase(title: string): string | undefined {
  const words = title
    .split(/[\s,\-/|]+/)
    .filter((w) => w.length > 1 && !TITLE_STOPWORDS.has(w.toLowerCase()) && !/^\d+$/.test(w));
  return words.length ? words.join(' ') : undefined;
}

function readJsonLd($: cheerio.CheerioAPI): JsonLdItem[] {
  const items: JsonLdItem[] = [];
  $('script[type="application/ld+json"]').each((_, el) => {
    let data: unknown;
    try {
      data = JSON.parse($(el).text());
    } catch (err) {
      log.debug({ err: String(err) }, 'Skipping unparseable JSON-LD block');
      return;
    }
    const candidates: unknown[] = Array.isArray(data) ? data : [data];
    for (const candidate of candidates) {
      const graph = z.object({ '@graph': z.array(z.unknown()) }).safeParse(candidate);
      for (const node of graph.success ? graph.data['@graph'] : [candidate]) {
        const parsed = jsonLdItem.safeParse(node);
        if (parsed.success) items.push(parsed.data);
      }
    }
  });
  return items;
}

/** Visible text, one entry per leaf element, whitespace collapsed. */
function textLines($: cheerio.CheerioAPI): string[] {
  const lines: string[] = [];
  $('body *').each((_, el) => {
    const node = $(el);
    if (node.children().length || node.is('script, style, noscript')) return;
    const text = node.text().replace(/\s+/g, ' ').trim();
    if (text) lines.push(text);
  });
  return lines;
}

function zoneName(lines: string[]): string | undefined {
  for (let i = 0; i < lines.length; i++) {
    const inline = lines[i].match(/^zone\s*name\s*:?\s*(.+)$/i);
    if (inline) return inline[1].trim();
    if (/^zone\s*name\s*:?$/i.test(lines[i]) && lines[i + 1]) return lines[i + 1];
  }
  return undefined;
}

function addressParts(lines: string[]): string[] | undefined {
  for (const line of lines) {
    const m = line.match(/^([^,]+(?:,\s*[^,]+){1,3}),\s*Dubai$/i);
    if (m) return m[1].split(',').map((p) => p.trim()).filter(Boolean);
  }
  return undefined;
}

function firstMatch(lines: string[], re: RegExp): string | undefined {
  for (const line of lines) {
    const m = line.match(re);
    if (m) return m[1];
  }
  return undefined;
}

/**
 * Pulls matchable attributes from a listing page. Structured data wins over
 * page text, and page text over the URL slug.
 */
export function parseListingHtml(html: string, sourceUrl: string): ListingAttributes {
  const $ = cheerio.load(html);
  const ld = readJsonLd($);
  const lines = textLines($);
  const slug = parseListingSlug(sourceUrl);

  const pick = <T>(get: (item: JsonLdItem) => T | undefined): T | undefined => {
    for (const item of ld) {
      const v = get(item);
      if (v !== undefined && v !== '') return v;
    }
    return undefined;
  };

  const title = $('h1').first().text().trim()
    || $('meta[property="og:title"]').attr('content')?.replace(/\s*\|\s*Property Finder.*$/i, '').trim()
    || $('title').text().replace(/\s*\|\s*Property Finder.*$/i, '').trim()
    || pick((i) => i.name);

  const address = addressParts(lines);
  const zone = zoneName(lines);

  const projectName = address?.[0]
    ?? pick((i) => i.address?.streetAddress)
    ?? (title ? titlePhrase(title) : undefined)
    ?? slug.location
    ?? '';
  const areaName = zone
    ?? pick((i) => i.address?.addressLocality)
    ?? address?.[1]
    ?? slug.location
    ?? '';
  const masterProject = address && address.length >= 3 ? address[address.length - 1] : undefined;

  const bedrooms = pick((i) => i.numberOfRooms)
    ?? (lines.some((l) => /^studio$/i.test(l)) ? 'Studio' : undefined)
    ?? firstMatch(lines, /(\d+\s*(?:bed(?:room)?s?|br)\b)/i)
    ?? firstMatch(lines, /^bedrooms?\s*:?\s*(\d+)$/i);
  const sizeSqft = pick((i) => i.floorSize?.value)
    ?? firstMatch(lines, /([\d,]+(?:\.\d+)?)\s*sq\.?\s*ft\b/i)
    ?? firstMatch(lines, /([\d,]+(?:\.\d+)?)\s*sqft\b/i);

  return {
    projectName,
    areaName,
    bedrooms: bedrooms ?? null,
    sizeSqft: sizeSqft ?? null,
    propertyType: slug.propertyType ?? null,
    masterProject: masterProject ?? null,
    sourceUrl,
  };
}

export async function fetchListing(raw: string): Promise<ListingAttributes> {
  const url = validateListingUrl(raw).toString();
  let html: string;
  try {
    ({ text: html } = await httpGetText(url, {
      headers: BROWSER_HEADERS,
      retries: config.scrape.retries,
      timeoutMs: config.scrape.timeoutMs,
    }));
  } catch (err) {
    const status = err instanceof HttpError ? err.status : undefined;
    throw new ScrapeFailure(url, `Failed to fetch listing: ${err instanceof Error ? err.message : String(err)}`, { status, cause: err });
  }

  const attrs = parseListingHtml(html, url);
  if (!attrs.projectName && !attrs.areaName) {
    throw new ScrapeFailure(url, 'Listing page did not expose a project or area name');
  }
  log.debug({ url, attrs }, 'Listing scraped');
  return attrs;
}
