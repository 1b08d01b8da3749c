import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import type { ErrorResponse } from '@docent/types';
import { AppError } from '../../../domain/errors/AppError';
import logger from '../../logger';

function isBodyParseError(err: Error): boolean {
    return 'type' in err && err.type === 'entity.parse.failed';
}

// body-parser marks errors safe to show the client (413, 415, bad charset) with expose
function exposedClientStatus(err: Error): number | undefined {
    if (!('status' in err) || typeof err.status !== 'number') return undefined;
    if (!('expose' in err) || err.expose !== true) return undefined;
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
}

export const errorHandler = (
    err: Error,
    req: Request,
    res: Response<ErrorResponse>,
    // Express only treats four-argument middleware as an error handler
    next: NextFunction
) => {
    if (err instanceof AppError) {
        const log = err.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
        log(err.message, { name: err.name, statusCode: err.statusCode, path: req.path });

        return res.status(err.statusCode).json({
            status: 'error',
            message: err.message,
        });
    }

    if (err instanceof ZodError) {
        logger.warn('Request validation failed', { path: req.path, issues: err.issues.length });
        return res.status(422).json({
            status: 'fail',
            message: 'Validation Error',
            errors: err.issues,
        });
    }

    if (isBodyParseError(err)) {
        logger.warn('Malformed request body', { path: req.path });
        return res.status(400).json({
            status: 'fail',
            message: 'Malformed JSON body',
        });
    }

    const clientStatus = exposedClientStatus(err);
    if (clientStatus !== undefined) {
        logger.warn('Rejected request body', { path: req.path, statusCode: clientStatus, reason: err.message });
        return res.status(clientStatus).json({
            status: 'fail',
            message: err.message,
        });
    }

    logger.error(err);

    // Fallback for unhandled errors
    return res.status(500).json({
        status: 'error',
        message: 'Internal Server Error',
    });
};
