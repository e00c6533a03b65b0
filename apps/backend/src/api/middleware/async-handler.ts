import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Async handler wrapper for Express route handlers.
 *
 * Express 4 does not observe returned promises, so a rejected handler would
 * never reach the error middleware. The wrapper forwards the rejection to next().
 *
 * @example
 * router.post('/endpoint', asyncHandler(async (req, res) => {
 *   const data = await someAsyncOperation();
 *   res.json(data);
 * }));
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
    return (req, res, next) => {
        fn(req, res, next).catch(next);
    };
}
