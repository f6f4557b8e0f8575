import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../config/logger';
import { ErrorResponse } from '../types/api';

export class AppError extends Error {
    statusCode = 500;
    status = 'error';
    isOperational = true;

    constructor(message: string) {
        super(message);
        this.name = 'AppError';
    }
}

export class InvalidInputError extends AppError {
    statusCode = 400;
    status = 'fail';

    constructor(message: string) {
        super(message);
        this.name = 'InvalidInputError';
    }
}

export class CheckAbortedError extends AppError {
    statusCode = 499;
    status = 'fail';

    constructor(message: string = 'Fraud check aborted') {
        super(message);
        this.name = 'CheckAbortedError';
    }
}

// Raised for span nesting violations; a programming defect, never an operational condition.
export class SpanLifecycleError extends AppError {
    isOperational = false;

    constructor(message: string) {
        super(message);
        this.name = 'SpanLifecycleError';
    }
}

export class EmissionError extends AppError {
    constructor(message: string, public readonly origin?: unknown) {
        super(message);
        this.name = 'EmissionError';
    }
}

export class ConfigurationError extends AppError {
    isOperational = false;

    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const statusCode = err instanceof AppError ? err.statusCode : 500;
    const status = err instanceof AppError ? err.status : 'error';

    const meta = {
        message: err.message,
        statusCode,
        path: req.path,
        method: req.method,
        ip: req.ip
    };

    if (statusCode >= 500) {
        logger.error('API error occurred', { ...meta, stack: err.stack });
    } else {
        logger.warn('API request rejected', meta);
    }

    const errorResponse: ErrorResponse = {
        success: false,
        status,
        error: err.name,
        message: err.message || 'Internal Server Error',
        timestamp: new Date().toISOString(),
        path: req.path,
        method: req.method
    };

    if (process.env.NODE_ENV === 'development') {
        errorResponse.stack = err.stack;
    }

    if (res.headersSent) {
        return;
    }

    res.status(statusCode).json(errorResponse);
};

export const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler => {
    return (req, res, next) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
};
