import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { env } from '../env';
import { log } from '../log';
import type { ContentValidator, ContentVerdict } from './types';

export const DEFAULT_BLOCKED_TERMS_PATH = path.resolve(process.cwd(), 'config/blocked-terms.json');

const BlockedTermsFileSchema = z.object({
  terms: z.array(z.string().min(1)),
});

export function loadBlockedTerms(filePath: string = DEFAULT_BLOCKED_TERMS_PATH): string[] {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    log.warn({ err: error, event: 'blocked_terms_missing', path: filePath }, 'blocked terms file not readable');
    return [];
  }

  const parsed = BlockedTermsFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid blocked terms file ${filePath}: ${parsed.error.message}`);
  }
  return parsed.data.terms;
}

function normalize(text: string): string {
  return text
    .toLowerCase()
    .normalize('NFKC')
    .replace(/[^\p{L}\p{N}\s]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Rejects transcripts containing any blocked term as a whole word or phrase.
 */
export class KeywordContentValidator implements ContentValidator {
  private readonly terms: string[];

  constructor(terms: readonly string[]) {
    const normalized = terms.map(normalize).filter((term) => term !== '');
    this.terms = Array.from(new Set(normalized));
  }

  public async validate(text: string): Promise<ContentVerdict> {
    const padded = ` ${normalize(text)} `;
    const matched = this.terms.filter((term) => padded.includes(` ${term} `));
    return { safe: matched.length === 0, matched };
  }
}

export function createContentValidator(): ContentValidator {
  const terms = [...loadBlockedTerms(), ...env.CONTENT_BLOCKLIST];
  log.info({ event: 'content_validator_ready', term_count: terms.length }, 'content validator ready');
  return new KeywordContentValidator(terms);
}
