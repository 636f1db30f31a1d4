import { createHash } from 'crypto';
import { Fingerprint } from '../types';
import { ValidationError } from '../utils/errors';
import { normalizeContextRefs, normalizeText } from '../utils/normalizer';

const SEPARATOR = '\0';

/**
 * Builds the cache/dedup identity of a query.
 * Attachment order never changes the result.
 */
export function fingerprint(rawText: string, contextRefs: readonly string[]): Fingerprint {
  const normalizedText = normalizeText(rawText);
  if (normalizedText === '') {
    throw new ValidationError(['Query text is empty after normalization']);
  }

  const sortedRefs = normalizeContextRefs(contextRefs);
  const value = createHash('sha256')
    .update(normalizedText + SEPARATOR + sortedRefs.join(SEPARATOR))
    .digest('hex');

  return {
    value,
    normalizedText,
    contextRefs: sortedRefs,
  };
}
