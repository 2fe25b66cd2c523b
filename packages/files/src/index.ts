/**
 * @servefs/files
 *
 * Filesystem utilities: tree copy, archive extraction and path helpers.
 */

export { copyTree, copyFile, removeFile, renameDir } from './tree';
export { extractArchive } from './archive';
export { directoryExists, getHomePath, getParentDir, pathSeparator } from './paths';

export const VERSION = '0.1.0';
