import type { Handler } from 'hono';
import { memorySource, type MediaType } from '@servefs/content';
import { writeContent, INLINE } from './response-writer';

/**
 * Serve fixed in-memory bytes for every request
 */
export function staticContentHandler(bytes: Uint8Array, mediaType: MediaType): Handler {
  const source = memorySource(bytes);
  return (c) => writeContent(c, { source, mediaType, disposition: INLINE });
}
