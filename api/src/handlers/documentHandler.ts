import type { RequestHandler } from 'express';
import { z } from 'zod';
import { createLogger } from '../lib/logger.js';
import type { DocumentService } from '../services/documentService.js';
import { DocumentParams, RecordId } from './params.js';
import { sendServiceError, sendValidationError } from './respond.js';

const UploadDocumentSchema = z.object({
    userId: RecordId,
    filename: z.string().min(1).max(500),
    content: z.string().min(1),
    mimeType: z.string().max(100).default('text/plain'),
});

const ReplaceContentSchema = z.object({
    content: z.string().min(1),
});

const ListDocumentsQuery = z.object({
    userId: RecordId,
});

const logger = createLogger('http:documents');

export function createDocumentHandlers(service: DocumentService) {
    /**
     * Stores the document text and chunks it before responding, so the
     * document can be used for grounded conversations as soon as this returns.
     */
    const handleUploadDocument: RequestHandler = async (req, res) => {
        const parse = UploadDocumentSchema.safeParse(req.body);
        if (!parse.success) {
            return sendValidationError(res, parse.error);
        }

        try {
            const result = await service.uploadDocument(parse.data);
            if (result.error) {
                return sendServiceError(res, result.error);
            }
            res.status(201).json(result.data);
        } catch (error) {
            logger.error(`Error uploading document ${parse.data.filename}:`, error);
            res.status(500).json({ message: 'Failed to upload document.' });
        }
    };

    const handleListDocuments: RequestHandler = async (req, res) => {
        const parse = ListDocumentsQuery.safeParse(req.query);
        if (!parse.success) {
            return sendValidationError(res, parse.error);
        }

        try {
            res.status(200).json(await service.listDocuments(parse.data.userId));
        } catch (error) {
            logger.error(`Error listing documents for user ${parse.data.userId}:`, error);
            res.status(500).json({ message: 'Failed to list documents.' });
        }
    };

    const handleGetDocument: RequestHandler = async (req, res) => {
        const params = DocumentParams.safeParse(req.params);
        if (!params.success) {
            return sendValidationError(res, params.error);
        }
        const { documentId } = params.data;

        try {
            const result = await service.getDocument(documentId);
            if (result.error) {
                return sendServiceError(res, result.error);
            }
            res.status(200).json(result.data);
        } catch (error) {
            logger.error(`Error getting document ${documentId}:`, error);
            res.status(500).json({ message: 'Failed to get document.' });
        }
    };

    const handleReplaceContent: RequestHandler = async (req, res) => {
        const params = DocumentParams.safeParse(req.params);
        if (!params.success) {
            return sendValidationError(res, params.error);
        }
        const { documentId } = params.data;
        const parse = ReplaceContentSchema.safeParse(req.body);
        if (!parse.success) {
            return sendValidationError(res, parse.error);
        }

        try {
            const result = await service.replaceContent(documentId, parse.data.content);
            if (result.error) {
                return sendServiceError(res, result.error);
            }
            res.status(200).json(result.data);
        } catch (error) {
            logger.error(`[${documentId}] Error replacing document content:`, error);
            res.status(500).json({ message: 'Failed to update document.' });
        }
    };

    const handleDeleteDocument: RequestHandler = async (req, res) => {
        const params = DocumentParams.safeParse(req.params);
        if (!params.success) {
            return sendValidationError(res, params.error);
        }
        const { documentId } = params.data;

        try {
            const result = await service.deleteDocument(documentId);
            if (result.error) {
                return sendServiceError(res, result.error);
            }
            res.status(204).end();
        } catch (error) {
            logger.error(`[${documentId}] Error deleting document:`, error);
            res.status(500).json({ message: 'Failed to delete document.' });
        }
    };

    return {
        handleUploadDocument,
        handleListDocuments,
        handleGetDocument,
        handleReplaceContent,
        handleDeleteDocument,
    };
}
