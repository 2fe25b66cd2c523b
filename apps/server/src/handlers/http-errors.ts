import { HTTPException } from 'hono/http-exception';
import {
  InvalidPathError,
  NotFoundError,
  PathTraversalError,
} from '@servefs/utils';

/**
 * Map a content failure to the HTTP status the client sees
 *
 * Bodies are generic; the original error travels as `cause` for logging.
 */
export function toHttpException(error: unknown): HTTPException {
  if (error instanceof HTTPException) {
    return error;
  }
  if (error instanceof NotFoundError) {
    return new HTTPException(404, { message: 'Not Found', cause: error });
  }
  if (error instanceof PathTraversalError) {
    return new HTTPException(403, { message: 'Forbidden', cause: error });
  }
  if (error instanceof InvalidPathError) {
    return new HTTPException(400, { message: 'Bad Request', cause: error });
  }
  return new HTTPException(500, { message: 'Internal Server Error', cause: error });
}
