/**
 * Media Type Resolution
 *
 * Maps a filename to the media type sent in `Content-Type`. The host registry
 * is consulted first; a small built-in table covers extensions the registry
 * misses, and everything else is `application/octet-stream`.
 *
 * Case policy: the registry receives the extension exactly as it appears in
 * the filename. The built-in table and the `.js` correction compare the
 * lowercased extension.
 */

import mime from 'mime-types';

/**
 * A media type string, e.g. "image/png" or "text/plain; charset=utf-8"
 */
export type MediaType = string;

export const DEFAULT_MEDIA_TYPE: MediaType = 'application/octet-stream';

/**
 * Host-provided mapping of extensions to media types
 */
export interface HostMimeRegistry {
  /**
   * @param extension - Extension with its leading dot (".html"), or '' for none
   * @returns The registered type, or undefined when the extension is unknown
   */
  lookup(extension: string): MediaType | undefined;
}

/**
 * Registry backed by mime-db through the `mime-types` package
 */
export const mimeTypesRegistry: HostMimeRegistry = {
  lookup(extension: string): MediaType | undefined {
    if (!extension) {
      return undefined;
    }
    const found = mime.lookup(extension);
    return found === false ? undefined : found;
  },
};

/**
 * In-memory registry with fixed entries. Keys are matched exactly.
 */
export function createStaticRegistry(entries: Record<string, MediaType>): HostMimeRegistry {
  const table = new Map(Object.entries(entries));
  return {
    lookup: (extension) => table.get(extension),
  };
}

/**
 * Registry that consults `primary` and falls through to `secondary` on a miss
 */
export function layerRegistries(primary: HostMimeRegistry, secondary: HostMimeRegistry): HostMimeRegistry {
  return {
    lookup: (extension) => primary.lookup(extension) ?? secondary.lookup(extension),
  };
}

/**
 * Types for extensions some host registries do not know
 */
const FALLBACK_MEDIA_TYPES: Readonly<Record<string, MediaType>> = Object.freeze({
  '.json': 'application/json',
  '.js': 'application/javascript',
  '.zip': 'application/zip',
  '.3gp': 'video/3gpp',
  '.7z': 'application/x-7z-compressed',
  '.ace': 'application/x-ace-compressed',
  '.aac': 'audio/x-aac',
  '.ico': 'image/x-icon',
  '.png': 'image/png',
});

const JAVASCRIPT_MEDIA_TYPE: MediaType = 'application/javascript';

// Registries that classify .js as generic text
const PLAIN_TEXT_TYPES = new Set(['text/plain', 'text/plain; charset=utf-8']);

/**
 * Extension of the final path element, from its last dot
 *
 * @example
 * extractExtension('archive.tar.gz') // => '.gz'
 * extractExtension('/srv/LICENSE')   // => ''
 */
export function extractExtension(filename: string): string {
  for (let i = filename.length - 1; i >= 0; i--) {
    const ch = filename[i];
    if (ch === '/' || ch === '\\') {
      return '';
    }
    if (ch === '.') {
      return filename.slice(i);
    }
  }
  return '';
}

/**
 * Resolve the media type of a filename. Never throws.
 *
 * @example
 * resolveMediaType('bundle.zip')   // => 'application/zip'
 * resolveMediaType('data.xyzabc')  // => 'application/octet-stream'
 */
export function resolveMediaType(
  filename: string,
  registry: HostMimeRegistry = mimeTypesRegistry
): MediaType {
  const extension = extractExtension(filename);
  const folded = extension.toLowerCase();
  const registered = registry.lookup(extension);

  if (registered === undefined || registered === '') {
    return FALLBACK_MEDIA_TYPES[folded] ?? DEFAULT_MEDIA_TYPE;
  }

  if (folded === '.js' && PLAIN_TEXT_TYPES.has(registered)) {
    return JAVASCRIPT_MEDIA_TYPE;
  }

  return registered;
}

/**
 * Whether a type is textual and should be served with a charset
 */
export function isTextLike(mediaType: MediaType): boolean {
  const base = (mediaType.split(';')[0] ?? '').trim().toLowerCase();
  return (
    base.startsWith('text/') ||
    base === 'application/json' ||
    base === 'application/javascript' ||
    base === 'application/xml' ||
    base.endsWith('+json') ||
    base.endsWith('+xml')
  );
}

/**
 * Append `; charset=utf-8` to a text-like type that has no charset yet
 */
export function withCharset(mediaType: MediaType): MediaType {
  if (!isTextLike(mediaType) || /;\s*charset=/i.test(mediaType)) {
    return mediaType;
  }
  return `${mediaType}; charset=utf-8`;
}
