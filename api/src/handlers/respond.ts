import type { Response } from 'express';
import type { ZodError } from 'zod';
import type { ServiceError, ServiceErrorCode } from '../lib/errors.js';

const STATUS_BY_CODE: Record<ServiceErrorCode, number> = {
    NOT_FOUND: 404,
    CONFLICT: 409,
    INACTIVE: 409,
};

export const sendServiceError = (res: Response, error: ServiceError) =>
    res.status(STATUS_BY_CODE[error.code]).json({ message: error.message });

export const sendValidationError = (res: Response, error: ZodError) =>
    res.status(400).json({ message: 'Invalid request', details: error.flatten() });
