// =============================================================================
// Centralized Error Handling Middleware
// =============================================================================

import { Request, Response, NextFunction } from 'express';
import { DatabaseError, isCatalogError, wrapError } from '../../lib/errors';

/** body-parser marks rejected bodies with a `type` such as `entity.parse.failed`. */
function bodyParserFailure(err: Error): { status: number; message: string } | null {
  const type: unknown = Reflect.get(err, 'type');
  if (type === 'entity.parse.failed') return { status: 400, message: 'Malformed JSON body' };
  if (type === 'entity.too.large') return { status: 413, message: 'Request body too large' };
  return null;
}

// -----------------------------------------------------------------------------
// Error Handler Middleware
// -----------------------------------------------------------------------------

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  console.error(`[Error] ${err.name}: ${err.message}`);

  if (isCatalogError(err)) {
    // Driver details stay in the server log
    if (err instanceof DatabaseError && err.cause !== undefined) {
      console.error('[Error] Caused by:', err.cause);
    }
    res.status(err.statusCode).json(err.toJSON());
    return;
  }

  const bodyError = bodyParserFailure(err);
  if (bodyError) {
    res.status(bodyError.status).json({
      error: bodyError.message,
      code: 'INVALID_INPUT',
      status: bodyError.status,
    });
    return;
  }

  const internal = wrapError(err, 'Unhandled error');
  res.status(internal.statusCode).json(internal.toJSON());
}

// -----------------------------------------------------------------------------
// 404 Handler
// -----------------------------------------------------------------------------

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found' });
}
