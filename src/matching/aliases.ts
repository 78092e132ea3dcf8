import fs from 'fs';
import { z } from 'zod';
import { config } from '../lib/config.js';
import { logger } from '../lib/logger.js';
import { cleanText } from './text.js';

/** Canonical token per known spelling, English or Arabic. */
export type AliasTable = ReadonlyMap<string, string>;

const CANONICAL_RE = /^[a-z0-9]+$/;

const aliasFileSchema = z.object({
  aliases: z.record(z.string(), z.array(z.string().min(1))),
});

export type AliasFile = z.infer<typeof aliasFileSchema>;

/**
 * Builds the lookup from a parsed alias file. Spellings are cleaned the same
 * way listing text is, so the file can hold them in their natural form.
 * Canonical tokens must map to themselves; otherwise normalizing twice could
 * move a token again.
 */
export function buildAliasTable(input: unknown): AliasTable {
  const parsed = aliasFileSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid alias table: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }

  const table = new Map<string, string>();
  const canonicals = Object.keys(parsed.data.aliases);

  for (const canonical of canonicals) {
    if (!CANONICAL_RE.test(canonical)) {
      throw new Error(`Invalid alias table: canonical token "${canonical}" must be a single lowercase latin token`);
    }
    table.set(canonical, canonical);
  }

  for (const canonical of canonicals) {
    for (const spelling of parsed.data.aliases[canonical]) {
      const cleaned = cleanText(spelling);
      if (!cleaned || cleaned.includes(' ')) {
        throw new Error(`Invalid alias table: "${spelling}" must be a single token`);
      }
      const existing = table.get(cleaned);
      if (existing && existing !== canonical) {
        throw new Error(`Invalid alias table: "${spelling}" maps to both "${existing}" and "${canonical}"`);
      }
      table.set(cleaned, canonical);
    }
  }

  return table;
}

export function loadAliasTable(filePath: string): AliasTable {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const table = buildAliasTable(raw);
  logger.debug({ filePath, entries: table.size }, 'Alias table loaded');
  return table;
}

let defaultTable: AliasTable | null = null;

/** Process-wide table, read from ALIAS_TABLE_PATH on first use. */
export function defaultAliasTable(): AliasTable {
  if (!defaultTable) defaultTable = loadAliasTable(config.aliasTablePath);
  return defaultTable;
}
