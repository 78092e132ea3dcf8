const ARABIC_INDIC_DIGITS = /[٠-٩]/g;

/**
 * Case-folds and strips marks (latin accents, arabic harakat and hamza
 * seats), folds alef maksura and teh marbuta, and turns everything that is not
 * a letter or digit into single spaces.
 */
export function cleanText(value: string | null | undefined): string {
  return (value || '')
    .toLowerCase()
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/ـ/g, '')
    .replace(/ى/g, 'ي')
    .replace(/ة/g, 'ه')
    .replace(ARABIC_INDIC_DIGITS, (d) => String(d.charCodeAt(0) - 0x0660))
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

export function tokenize(value: string | null | undefined): string[] {
  const cleaned = cleanText(value);
  return cleaned ? cleaned.split(' ') : [];
}
