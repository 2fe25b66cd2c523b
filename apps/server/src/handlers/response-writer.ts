/**
 * Response Writer
 *
 * Turns a resolved ResponseSpec into a complete 200 response. Read failures
 * propagate as ContentUnavailableError; status selection for failures
 * belongs to the handlers.
 */

import type { Context } from 'hono';
import {
  nodeFileSystem,
  readContentSource,
  withCharset,
  type ContentFileSystem,
  type ContentSource,
  type MediaType,
} from '@servefs/content';

export type Disposition = { type: 'inline' } | { type: 'attachment'; filename: string };

export const INLINE: Disposition = { type: 'inline' };

export function attachment(filename: string): Disposition {
  return { type: 'attachment', filename };
}

// Visible ASCII and space; anything else cannot travel in a plain filename=
const PLAIN_FILENAME = /^[\x20-\x7e]+$/;

function encodeRfc5987(value: string): string {
  return encodeURIComponent(value).replace(
    /['()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * `Content-Disposition` value for a download
 *
 * Names outside printable ASCII get an RFC 5987 `filename*` parameter, with
 * an ASCII stand-in in `filename` for clients that ignore it.
 *
 * @example
 * contentDisposition('first.zip') // => 'attachment;filename=first.zip'
 * contentDisposition('报告.pdf')   // => "attachment;filename=__.pdf;filename*=UTF-8''%E6%8A%A5%E5%91%8A.pdf"
 */
export function contentDisposition(filename: string): string {
  if (PLAIN_FILENAME.test(filename)) {
    return `attachment;filename=${filename}`;
  }
  const fallback = Array.from(filename, (ch) => (PLAIN_FILENAME.test(ch) ? ch : '_')).join('');
  return `attachment;filename=${fallback};filename*=UTF-8''${encodeRfc5987(filename)}`;
}

export interface ResponseSpec {
  source: ContentSource;
  mediaType: MediaType;
  disposition: Disposition;
}

export async function writeContent(
  c: Context,
  spec: ResponseSpec,
  fileSystem: ContentFileSystem = nodeFileSystem
): Promise<Response> {
  const bytes = await readContentSource(spec.source, fileSystem);

  const headers: Record<string, string> = {
    'Content-Type': withCharset(spec.mediaType),
    'Content-Length': String(bytes.byteLength),
  };
  if (spec.disposition.type === 'attachment') {
    headers['Content-Disposition'] = contentDisposition(spec.disposition.filename);
  }

  // Copy into a plain Uint8Array; Hono's body type does not take Buffer
  return c.newResponse(new Uint8Array(bytes), 200, headers);
}
