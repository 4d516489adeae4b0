import type { RequestHandler } from 'express';
import { z } from 'zod';
import { createLogger } from '../lib/logger.js';
import type { UserService } from '../services/userService.js';
import { UserParams } from './params.js';
import { sendServiceError, sendValidationError } from './respond.js';

const CreateUserSchema = z.object({
    username: z.string().trim().min(3).max(255),
    email: z.string().email().max(255).nullish(),
});

const logger = createLogger('http:users');

export function createUserHandlers(service: UserService) {
    const handleCreateUser: RequestHandler = async (req, res) => {
        const parse = CreateUserSchema.safeParse(req.body);
        if (!parse.success) {
            return sendValidationError(res, parse.error);
        }

        try {
            const result = await service.createUser(parse.data);
            if (result.error) {
                return sendServiceError(res, result.error);
            }
            res.status(201).json(result.data);
        } catch (error) {
            logger.error('Error creating user:', error);
            res.status(500).json({ message: 'Failed to create user.' });
        }
    };

    const handleListUsers: RequestHandler = async (_req, res) => {
        try {
            res.status(200).json(await service.listUsers());
        } catch (error) {
            logger.error('Error listing users:', error);
            res.status(500).json({ message: 'Failed to list users.' });
        }
    };

    const handleGetUser: RequestHandler = async (req, res) => {
        const params = UserParams.safeParse(req.params);
        if (!params.success) {
            return sendValidationError(res, params.error);
        }
        const { userId } = params.data;

        try {
            const result = await service.getUser(userId);
            if (result.error) {
                return sendServiceError(res, result.error);
            }
            res.status(200).json(result.data);
        } catch (error) {
            logger.error(`Error getting user ${userId}:`, error);
            res.status(500).json({ message: 'Failed to get user.' });
        }
    };

    return { handleCreateUser, handleListUsers, handleGetUser };
}
