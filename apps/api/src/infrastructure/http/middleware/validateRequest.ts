import { Request, Response, NextFunction } from 'express';
import { ZodType } from 'zod';

/**
 * Validates the JSON body and replaces it with the parsed (trimmed, defaulted) value.
 */
export const validateRequest = (schema: ZodType) => {
    return async (req: Request, res: Response, next: NextFunction) => {
        try {
            req.body = await schema.parseAsync(req.body);
            next();
        } catch (error) {
            next(error);
        }
    };
};
