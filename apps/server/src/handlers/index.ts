export { staticContentHandler } from './static-content';
export { dirHandler, type DirHandlerOptions } from './directory';
export { faviconHandler, sendFileHandler } from './file';
export { writeContent, attachment, contentDisposition, INLINE, type Disposition, type ResponseSpec } from './response-writer';
export { toHttpException } from './http-errors';
export type { HandlerDeps } from './types';
