import { createHash } from 'node:crypto';

/** Content-addressed id: identical uploads map to the same document. */
export function documentIdFor(payload: Buffer): string {
  return createHash('sha256').update(payload).digest('hex');
}
