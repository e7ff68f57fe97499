import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../config/logger';
import type { ErrorResponse } from '../types/api';

export interface AppError extends Error {
    statusCode?: number;
    status?: string;
    isOperational?: boolean;
}

export const errorHandler = (
    err: AppError,
    req: Request,
    res: Response,
    // express only treats four-argument middleware as an error handler
    _next: NextFunction
): void => {
    const statusCode = err.statusCode || 500;

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
        error: err.name || 'Error',
        message: err.message || 'Internal Server Error',
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

export class DatabaseError extends Error {
    statusCode = 500;
    status = 'error';
    isOperational = true;

    constructor(message: string) {
        super(message);
        this.name = 'DatabaseError';
    }
}

export class ExternalServiceError extends Error {
    statusCode = 502;
    status = 'error';
    isOperational = true;

    constructor(readonly service: string, message: string) {
        super(message);
        this.name = 'ExternalServiceError';
    }
}

export class TimeoutError extends Error {
    statusCode = 504;
    status = 'error';
    isOperational = true;

    constructor(readonly operation: string, readonly timeoutMs: number) {
        super(`${operation} timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

/**
 * Raised by the workflow runtime when a non-sink stage fails. Carries the
 * HTTP status of the underlying cause so a missing transaction still maps to 404.
 */
export class StageFailureError extends Error {
    statusCode: number;
    status = 'fail';
    isOperational = true;

    constructor(readonly stage: string, readonly cause: unknown) {
        super(`Stage '${stage}' failed: ${errorMessage(cause)}`);
        this.name = 'StageFailureError';
        this.statusCode = statusCodeOf(cause) ?? 500;
    }
}

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

const statusCodeOf = (error: unknown): number | undefined => {
    if (typeof error === 'object' && error !== null && 'statusCode' in error) {
        const { statusCode } = error;
        return typeof statusCode === 'number' ? statusCode : undefined;
    }
    return undefined;
};

export const asyncHandler = (
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
    return (req, res, next) => {
        fn(req, res, next).catch(next);
    };
};
