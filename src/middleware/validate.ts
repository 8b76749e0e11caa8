import { Request, Response, NextFunction } from 'express';
import { z, ZodError, ZodType } from 'zod';
import { sendError } from '../lib/apiResponse';

export const formatZodIssues = (error: ZodError): string[] =>
    error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);

export const validate =
    (schema: ZodType) =>
    async (req: Request, res: Response, next: NextFunction) => {
        try {
            await schema.parseAsync({
                body: req.body,
                query: req.query,
                params: req.params,
            });
            next();
        } catch (error) {
            if (error instanceof ZodError) {
                return sendError(
                    req,
                    res,
                    400,
                    'VALIDATION_ERROR',
                    'Validation failed',
                    {
                        errors: formatZodIssues(error),
                    }
                );
            }
            next(error);
        }
    };

/**
 * Typed, coerced view of what `validate(schema)` already accepted
 */
export const requestInput = <S extends ZodType>(schema: S, req: Request): z.output<S> =>
    schema.parse({
        body: req.body,
        query: req.query,
        params: req.params,
    });
