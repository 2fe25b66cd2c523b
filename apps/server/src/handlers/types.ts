import type { ContentFileSystem, HostMimeRegistry } from '@servefs/content';

/**
 * Collaborators a content handler reads through. Defaults are the
 * mime-types registry and node:fs.
 */
export interface HandlerDeps {
  registry?: HostMimeRegistry;
  fileSystem?: ContentFileSystem;
}
