import { createHash } from 'node:crypto';

/**
 * Canonical form of a question: Unicode-normalized, case-folded, with runs
 * of whitespace collapsed to one space and the ends trimmed.
 */
export function normalizeQuestion(question: string): string {
  return question.normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim();
}

export function fingerprint(question: string): string {
  return createHash('sha256').update(normalizeQuestion(question), 'utf8').digest('hex');
}
