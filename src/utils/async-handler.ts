import { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Async handler wrapper
 *
 * Forwards a rejected handler promise to the Express error middleware
 *
 * Usage:
 * ```typescript
 * router.get('/items/:id', asyncHandler(async (req, res) => {
 *   const item = await itemService.getItem(req.params.id);
 *   res.json(createSuccessResponse(serializeItem(item)));
 * }));
 * ```
 */
export const asyncHandler = (fn: AsyncRequestHandler): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
};
