import { Request, Response, NextFunction } from 'express';
import { AppError } from '../../../domain/errors/AppError';
import { ZodError } from 'zod';
import logger from '../../logger';

export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    // Express recognises error middleware by its four parameters.
    next: NextFunction
) => {
    if (err instanceof ZodError) {
        return res.status(400).json({
            status: 'fail',
            message: 'Validation Error',
            errors: err.issues,
        });
    }

    logger.error(err.message, { name: err.name, path: req.path, stack: err.stack });

    if (err instanceof AppError) {
        return res.status(err.statusCode).json({
            status: 'error',
            code: err.code,
            message: err.message,
        });
    }

    // Fallback for unhandled errors
    return res.status(500).json({
        status: 'error',
        message: 'Internal Server Error',
    });
};
