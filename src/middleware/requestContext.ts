import { Request, Response } from 'express';
import Joi from 'joi';
import { logger } from '../config/logger';
import { ValidationError } from './errorHandler';

/**
 * Aborted when the client goes away before the response is written, so pending
 * collaborator calls for the request are abandoned.
 */
export const requestSignal = (req: Request, res: Response): AbortSignal => {
    const controller = new AbortController();

    res.on('close', () => {
        if (!res.writableFinished) {
            logger.warn('Client disconnected, cancelling request', { method: req.method, path: req.path });
            controller.abort();
        }
    });

    return controller.signal;
};

export const validateInput = <T>(schema: Joi.ObjectSchema<T>, input: unknown): T => {
    const { error, value } = schema.validate(input, { stripUnknown: true });

    if (error) {
        throw new ValidationError(`Invalid request data: ${error.details[0].message}`);
    }
    return value;
};
