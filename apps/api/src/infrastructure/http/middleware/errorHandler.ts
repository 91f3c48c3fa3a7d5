import { Request, Response, NextFunction } from 'express';
import { AppError } from '../../../domain/errors/AppError';
import { ZodError } from 'zod';
import logger from '../../logger';

export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction
) => {
    if (res.headersSent) {
        logger.error('Error after response started', { path: req.path, error: err.message });
        return next(err);
    }

    if (err instanceof AppError) {
        logger.log(err.statusCode >= 500 ? 'error' : 'warn', err.message, {
            path: req.path,
            statusCode: err.statusCode,
            error: err.name,
        });
        return res.status(err.statusCode).json({
            status: 'error',
            message: err.message,
        });
    }

    if (err instanceof ZodError) {
        logger.warn('Validation error', { path: req.path, issues: err.issues.length });
        return res.status(400).json({
            status: 'fail',
            message: 'Validation Error',
            errors: err.issues,
        });
    }

    logger.error('Unhandled request error', { path: req.path, error: err.message, stack: err.stack });
    return res.status(500).json({
        status: 'error',
        message: 'Internal Server Error',
    });
};
