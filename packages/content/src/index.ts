/**
 * @servefs/content
 *
 * Media type resolution and content loading for served files.
 * Framework-independent: nothing here knows about HTTP.
 */

// Media types
export {
  resolveMediaType,
  extractExtension,
  isTextLike,
  withCharset,
  createStaticRegistry,
  layerRegistries,
  mimeTypesRegistry,
  DEFAULT_MEDIA_TYPE,
  type MediaType,
  type HostMimeRegistry
} from './media-types';

// Content sources
export {
  readContentSource,
  assertServableFile,
  memorySource,
  fileSource,
  nodeFileSystem,
  type ContentSource,
  type ContentFileSystem,
  type FileStats
} from './content-source';

// Path confinement
export { resolveWithinRoot } from './path-guard';
