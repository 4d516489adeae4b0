import express, { type ErrorRequestHandler, type NextFunction, type Request, type Response, type RequestHandler } from 'express';
import cors from 'cors';
import { createConversationHandlers } from './handlers/conversationHandler.js';
import { createDocumentHandlers } from './handlers/documentHandler.js';
import { createHealthHandlers } from './handlers/healthHandler.js';
import { createUserHandlers } from './handlers/userHandler.js';
import { createLogger } from './lib/logger.js';
import type { ConversationService } from './services/conversationService.js';
import type { DocumentService } from './services/documentService.js';
import type { UserService } from './services/userService.js';

export const APP_NAME = 'bot-gpt-backend';
export const APP_VERSION = '1.0.0';

export interface AppDependencies {
    users: UserService;
    documents: DocumentService;
    conversations: ConversationService;
    llmProvider: string;
    checkDatabase: () => Promise<boolean>;
    jsonBodyLimit?: string;
}

const logger = createLogger('http');

const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => unknown): RequestHandler => (
    req,
    res,
    next,
) => {
    Promise.resolve(fn(req, res, next)).catch(next);
};

function hasStatus(error: unknown): error is { status: number; type?: string } {
    return typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number';
}

const errorHandler: ErrorRequestHandler = (error, _req, res, next) => {
    if (res.headersSent) {
        return next(error);
    }
    // body-parser reports malformed or oversized bodies with a 4xx status.
    if (hasStatus(error) && error.status >= 400 && error.status < 500) {
        return res.status(error.status).json({ message: error.type === 'entity.parse.failed' ? 'Malformed JSON body.' : 'Invalid request body.' });
    }
    logger.error('Unhandled error while serving request:', error);
    res.status(500).json({ message: 'Internal server error.' });
};

export function createApp(deps: AppDependencies) {
    const app = express();

    const health = createHealthHandlers({
        appName: APP_NAME,
        version: APP_VERSION,
        llmProvider: deps.llmProvider,
        checkDatabase: deps.checkDatabase,
    });
    const users = createUserHandlers(deps.users);
    const documents = createDocumentHandlers(deps.documents);
    const conversations = createConversationHandlers(deps.conversations);

    app.use(cors());
    app.use(express.json({ limit: deps.jsonBodyLimit ?? '10mb' })); // Documents arrive inline as text

    app.get('/', health.handleRoot);
    app.get('/health', asyncHandler(health.handleHealth));
    app.get('/api/v1/operations/ping', health.handlePing);

    // Users
    app.post('/api/v1/users', asyncHandler(users.handleCreateUser));
    app.get('/api/v1/users', asyncHandler(users.handleListUsers));
    app.get('/api/v1/users/:userId', asyncHandler(users.handleGetUser));

    // Documents
    app.post('/api/v1/documents', asyncHandler(documents.handleUploadDocument));
    app.get('/api/v1/documents', asyncHandler(documents.handleListDocuments));
    app.get('/api/v1/documents/:documentId', asyncHandler(documents.handleGetDocument));
    app.put('/api/v1/documents/:documentId', asyncHandler(documents.handleReplaceContent));
    app.delete('/api/v1/documents/:documentId', asyncHandler(documents.handleDeleteDocument));

    // Conversations
    app.post('/api/v1/conversations', asyncHandler(conversations.handleCreateConversation));
    app.get('/api/v1/conversations', asyncHandler(conversations.handleListConversations));
    app.get('/api/v1/conversations/:conversationId', asyncHandler(conversations.handleGetConversation));
    app.patch('/api/v1/conversations/:conversationId', asyncHandler(conversations.handleUpdateConversation));
    app.post('/api/v1/conversations/:conversationId/messages', asyncHandler(conversations.handleAddMessage));
    app.delete('/api/v1/conversations/:conversationId', asyncHandler(conversations.handleDeleteConversation));

    app.use((req, res) => {
        res.status(404).json({ message: `Route not found: ${req.method} ${req.path}` });
    });
    app.use(errorHandler);

    return app;
}
