import dotenv from 'dotenv';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { KeywordRetriever } from './lib/keywordSearch.js';
import { configureLogging, createLogger } from './lib/logger.js';
import { createSupabaseClient } from './lib/supabase.js';
import { DocumentChunker } from './lib/textChunker.js';
import { createSupabaseHealthCheck, createSupabaseRepositories } from './repositories/supabase/index.js';
import { ConversationService } from './services/conversationService.js';
import { DocumentService } from './services/documentService.js';
import { createLLMProvider } from './services/llmProviders.js';
import { LLMService } from './services/llmService.js';
import { RAGService } from './services/ragService.js';
import { UserService } from './services/userService.js';
import type { DocumentChunk } from './types.js';

dotenv.config();

const config = loadConfig();
configureLogging(config.logLevel);
const logger = createLogger('server');

const supabase = createSupabaseClient(config.supabaseUrl, config.supabaseServiceKey);
const repositories = createSupabaseRepositories(supabase);

const llm = new LLMService(createLLMProvider(config.llm), {
    maxTokens: config.llm.maxTokens,
    assistantName: config.llm.assistantName,
});
const rag = new RAGService(
    new DocumentChunker(config.chunking),
    new KeywordRetriever<DocumentChunk>(chunk => chunk.content),
    repositories.chunks,
    { topK: config.ragTopK },
);

const app = createApp({
    users: new UserService(repositories.users),
    documents: new DocumentService(repositories.users, repositories.documents, repositories.chunks, rag),
    conversations: new ConversationService(repositories, llm, rag),
    llmProvider: llm.providerName,
    checkDatabase: createSupabaseHealthCheck(supabase),
    jsonBodyLimit: config.jsonBodyLimit,
});

const server = app.listen(config.port, () => {
    logger.info(`Server is running on http://localhost:${config.port}`);
});

const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down...`);
    server.close(error => {
        if (error) {
            logger.error('Error while closing the server:', error);
            process.exit(1);
        }
        process.exit(0);
    });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export default app;
