import { Request, Response, NextFunction } from 'express';
import { AnyZodObject, z, ZodError } from 'zod';
import { createErrorResponse } from '../utils/response-factory';
import { ErrorCode } from '../types/error.types';

const requestParts = (req: Request) => ({
  body: req.body,
  params: req.params,
  query: req.query,
});

/**
 * Validation middleware factory
 *
 * Validates request data (body, params, query) against a Zod schema
 *
 * Usage:
 * ```typescript
 * router.post('/items', validate(createItemSchema), itemController.addItem);
 * ```
 */
export const validate = (schema: AnyZodObject) => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await schema.parseAsync(requestParts(req));
      next();
      return;
    } catch (error) {
      if (error instanceof ZodError) {
        const errorDetails = error.errors.map((err) => ({
          field: err.path.join('.'),
          message: err.message,
        }));

        res.status(400).json(
          createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Validation failed', {
            errors: errorDetails,
          })
        );
        return;
      }
      next(error);
      return;
    }
  };
};

/**
 * Typed, coerced view of a request that already passed `validate(schema)`
 */
export const parseRequest = <S extends AnyZodObject>(schema: S, req: Request): z.output<S> =>
  schema.parse(requestParts(req));
