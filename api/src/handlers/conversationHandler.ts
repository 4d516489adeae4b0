import type { RequestHandler } from 'express';
import { z } from 'zod';
import { createLogger } from '../lib/logger.js';
import type { ConversationService } from '../services/conversationService.js';
import { ConversationParams, RecordId } from './params.js';
import { sendServiceError, sendValidationError } from './respond.js';

const CreateConversationSchema = z.object({
    userId: RecordId,
    firstMessage: z.string().min(1).max(10_000),
    mode: z.enum(['open_chat', 'grounded_rag']).default('open_chat'),
    documentIds: z.array(RecordId).optional(),
    title: z.string().max(500).nullish(),
});

const AddMessageSchema = z.object({
    content: z.string().min(1).max(10_000),
});

const UpdateConversationSchema = z
    .object({
        title: z.string().max(500).nullable().optional(),
        isActive: z.boolean().optional(),
    })
    .refine(patch => patch.title !== undefined || patch.isActive !== undefined, {
        message: 'Provide title or isActive',
    });

const ListConversationsQuery = z.object({
    userId: RecordId,
    page: z.coerce.number().int().min(1).default(1),
    pageSize: z.coerce.number().int().min(1).max(100).default(20),
});

const logger = createLogger('http:conversations');

export function createConversationHandlers(service: ConversationService) {
    const handleCreateConversation: RequestHandler = async (req, res) => {
        const parse = CreateConversationSchema.safeParse(req.body);
        if (!parse.success) {
            return sendValidationError(res, parse.error);
        }

        try {
            const result = await service.createConversation(parse.data);
            if (result.error) {
                return sendServiceError(res, result.error);
            }
            res.status(201).json(result.data);
        } catch (error) {
            logger.error('Error creating conversation:', error);
            res.status(500).json({ message: 'Failed to create conversation.' });
        }
    };

    const handleListConversations: RequestHandler = async (req, res) => {
        const parse = ListConversationsQuery.safeParse(req.query);
        if (!parse.success) {
            return sendValidationError(res, parse.error);
        }
        const { userId, page, pageSize } = parse.data;

        try {
            res.status(200).json(await service.listConversations(userId, page, pageSize));
        } catch (error) {
            logger.error(`Error listing conversations for user ${userId}:`, error);
            res.status(500).json({ message: 'Failed to list conversations.' });
        }
    };

    const handleGetConversation: RequestHandler = async (req, res) => {
        const params = ConversationParams.safeParse(req.params);
        if (!params.success) {
            return sendValidationError(res, params.error);
        }
        const { conversationId } = params.data;

        try {
            const result = await service.getConversationDetail(conversationId);
            if (result.error) {
                return sendServiceError(res, result.error);
            }
            res.status(200).json(result.data);
        } catch (error) {
            logger.error(`Error getting conversation ${conversationId}:`, error);
            res.status(500).json({ message: 'Failed to get conversation.' });
        }
    };

    const handleUpdateConversation: RequestHandler = async (req, res) => {
        const params = ConversationParams.safeParse(req.params);
        if (!params.success) {
            return sendValidationError(res, params.error);
        }
        const { conversationId } = params.data;
        const parse = UpdateConversationSchema.safeParse(req.body);
        if (!parse.success) {
            return sendValidationError(res, parse.error);
        }

        try {
            const result = await service.updateConversation(conversationId, parse.data);
            if (result.error) {
                return sendServiceError(res, result.error);
            }
            res.status(200).json(result.data);
        } catch (error) {
            logger.error(`Error updating conversation ${conversationId}:`, error);
            res.status(500).json({ message: 'Failed to update conversation.' });
        }
    };

    const handleAddMessage: RequestHandler = async (req, res) => {
        const params = ConversationParams.safeParse(req.params);
        if (!params.success) {
            return sendValidationError(res, params.error);
        }
        const { conversationId } = params.data;
        const parse = AddMessageSchema.safeParse(req.body);
        if (!parse.success) {
            return sendValidationError(res, parse.error);
        }

        try {
            const result = await service.addMessage(conversationId, parse.data.content);
            if (result.error) {
                return sendServiceError(res, result.error);
            }
            res.status(200).json(result.data);
        } catch (error) {
            logger.error(`Error adding message to conversation ${conversationId}:`, error);
            res.status(500).json({ message: 'Failed to add message.' });
        }
    };

    const handleDeleteConversation: RequestHandler = async (req, res) => {
        const params = ConversationParams.safeParse(req.params);
        if (!params.success) {
            return sendValidationError(res, params.error);
        }
        const { conversationId } = params.data;

        try {
            const result = await service.deleteConversation(conversationId);
            if (result.error) {
                return sendServiceError(res, result.error);
            }
            res.status(204).end();
        } catch (error) {
            logger.error(`Error deleting conversation ${conversationId}:`, error);
            res.status(500).json({ message: 'Failed to delete conversation.' });
        }
    };

    return {
        handleCreateConversation,
        handleListConversations,
        handleGetConversation,
        handleUpdateConversation,
        handleAddMessage,
        handleDeleteConversation,
    };
}
