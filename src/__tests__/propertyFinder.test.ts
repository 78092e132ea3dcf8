import { describe, it, expect } from '@jest/globals';
import { InvalidListingUrl } from '../lib/errors.js';
import { parseListingHtml, parseListingSlug, titlePhrase, validateListingUrl } from '../scraper/propertyFinder.js';

const SALE_URL = 'https://www.propertyfinder.ae/en/plp/buy/apartment-for-sale-dubai-dubai-marina-marina-heights-1234567.html';
const RENT_URL = 'https://www.propertyfinder.ae/en/plp/rent/apartment-for-rent-dubai-downtown-dubai-burj-vista-987.html';
const VILLA_URL = 'https://www.propertyfinder.ae/en/plp/buy/villa-for-sale-dubai-arabian-ranches-555.html';

describe('validateListingUrl', () => {
  it('should accept Property Finder listing URLs', () => {
    expect(validateListingUrl(`  ${SALE_URL} `).hostname).toBe('www.propertyfinder.ae');
  });

  it('should reject other hosts, protocols and text', () => {
    expect(() => validateListingUrl('https://example.com/listing')).toThrow(
      'Invalid listing URL: only Property Finder listings are supported',
    );
    expect(() => validateListingUrl('ftp://propertyfinder.ae/x')).toThrow('Invalid listing URL: unsupported protocol ftp:');
    expect(() => validateListingUrl('not a url')).toThrow(InvalidListingUrl);
  });
});

describe('parseListingSlug', () => {
  it('should read the property type and location words', () => {
    expect(parseListingSlug(SALE_URL)).toEqual({ propertyType: 'apartment', location: 'dubai marina marina heights' });
  });

  it('should ignore query strings', () => {
    expect(parseListingSlug(`${VILLA_URL}?utm_source=share`)).toEqual({ propertyType: 'villa', location: 'arabian ranches' });
  });

  it('should return nothing for a slug without a location', () => {
    expect(parseListingSlug('https://www.propertyfinder.ae/en/search')).toEqual({ propertyType: undefined, location: undefined });
  });
});

describe('titlePhrase', () => {
  it('should drop listing boilerplate from a title', () => {
    expect(titlePhrase('2 Bedroom Apartment for Sale in Marina Heights')).toBe('Apartment Marina Heights');
  });
});

describe('parseListingHtml', () => {
  it('should prefer the address line and zone name, and structured data for numbers', () => {
    const html = `<html><head>
      <title>2 Bedroom Apartment for Sale in Marina Heights | Property Finder</title>
      <script type="application/ld+json">{"@context":"https://schema.org","@graph":[{"@type":"Apartment","name":"Spacious 2BR","numberOfRooms":2,"floorSize":{"@type":"QuantitativeValue","value":1200,"unitCode":"FTK"},"address":{"@type":"PostalAddress","addressLocality":"Dubai Marina"}}]}</script>
      </head><body>
      <h1>Spacious 2BR with sea view</h1>
      <div><p>Marina Heights, Dubai Marina, Dubai</p></div>
      <ul><li><span>Bedrooms</span><span>2</span></li><li><span>1,200 sqft</span></li></ul>
      <div><span>Zone name</span><span>Marsa Dubai</span></div>
      </body></html>`;

    expect(parseListingHtml(html, SALE_URL)).toEqual({
      projectName: 'Marina Heights',
      areaName: 'Marsa Dubai',
      bedrooms: 2,
      sizeSqft: 1200,
      propertyType: 'apartment',
      masterProject: null,
      sourceUrl: SALE_URL,
    });
  });

  it('should fall back to page text without structured data', () => {
    const html = `<html><body>
      <h1>Studio for rent</h1>
      <div><span>Studio</span><span>450 sq. ft</span></div>
      <p>Burj Vista 1, Burj Vista, Downtown Dubai, Dubai</p>
      </body></html>`;

    expect(parseListingHtml(html, RENT_URL)).toEqual({
      projectName: 'Burj Vista 1',
      areaName: 'Burj Vista',
      bedrooms: 'Studio',
      sizeSqft: '450',
      propertyType: 'apartment',
      masterProject: 'Downtown Dubai',
      sourceUrl: RENT_URL,
    });
  });

  it('should fall back to the URL slug when the page names nothing', () => {
    const parsed = parseListingHtml('<html><body><p>Nothing here</p></body></html>', VILLA_URL);
    expect(parsed).toEqual({
      projectName: 'arabian ranches',
      areaName: 'arabian ranches',
      bedrooms: null,
      sizeSqft: null,
      propertyType: 'villa',
      masterProject: null,
      sourceUrl: VILLA_URL,
    });
  });

  it('should skip malformed structured data', () => {
    const html = `<html><head><script type="application/ld+json">{not json</script></head>
      <body><p>Marina Heights, Dubai Marina, Dubai</p><span>3 Beds</span></body></html>`;
    const parsed = parseListingHtml(html, SALE_URL);
    expect(parsed.projectName).toBe('Marina Heights');
    expect(parsed.areaName).toBe('Dubai Marina');
    expect(parsed.bedrooms).toBe('3 Beds');
  });
});
