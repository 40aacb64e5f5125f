import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../config/logger';
import { ErrorResponse } from '../types/api';

export interface AppError extends Error {
    statusCode?: number;
    status?: string;
    isOperational?: boolean;
}

export const errorHandler = (
    err: AppError,
    req: Request,
    res: Response,
    // express recognises error middleware by its arity
    next: NextFunction
): void => {
    const statusCode = err.statusCode || 500;
    const status = err.status || 'error';

    logger.error('API error occurred', {
        message: err.message,
        stack: err.stack,
        statusCode,
        path: req.path,
        method: req.method,
        ip: req.ip
    });

    const errorResponse: ErrorResponse = {
        success: false,
        status,
        message: err.isOperational ? err.message : 'Internal Server Error',
        timestamp: new Date().toISOString(),
        path: req.path,
        method: req.method
    };

    if (process.env.NODE_ENV === 'development') {
        errorResponse.stack = err.stack;
    }

    res.status(statusCode).json(errorResponse);
};

export class ValidationError extends Error {
    statusCode = 400;
    status = 'fail';
    isOperational = true;

    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends Error {
    statusCode = 404;
    status = 'fail';
    isOperational = true;

    constructor(message: string) {
        super(message);
        this.name = 'NotFoundError';
    }
}

/**
 * Raised by adapters when an external backend cannot be reached: missing
 * credentials, transport failures, timeouts or non-2xx responses.
 * Adapters absorb it and substitute their degraded value.
 */
export class CollaboratorUnavailableError extends Error {
    statusCode = 503;
    status = 'error';
    isOperational = true;

    constructor(readonly collaborator: string, message: string) {
        super(`${collaborator}: ${message}`);
        this.name = 'CollaboratorUnavailableError';
    }
}

export class AllModelsUnavailableError extends Error {
    statusCode = 503;
    status = 'error';
    isOperational = true;

    constructor(readonly failures: { model: string; error: string }[]) {
        super(`All ${failures.length} ensemble models failed`);
        this.name = 'AllModelsUnavailableError';
    }
}

export class RequestCancelledError extends Error {
    statusCode = 499;
    status = 'fail';
    isOperational = true;

    constructor(message: string = 'Request cancelled by client') {
        super(message);
        this.name = 'RequestCancelledError';
    }
}

export const asyncHandler = (
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
    return (req, res, next) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
};
