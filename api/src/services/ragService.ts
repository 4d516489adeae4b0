import type { KeywordRetriever } from '../lib/keywordSearch.js';
import { createLogger, type Logger } from '../lib/logger.js';
import type { Chunk, DocumentChunker } from '../lib/textChunker.js';
import type { ChunkRepository } from '../repositories/types.js';
import type { Document, DocumentChunk } from '../types.js';

export interface RAGServiceOptions {
    topK?: number;
    logger?: Logger;
}

export class RAGService {
    private readonly topK: number;
    private readonly logger: Logger;

    constructor(
        private readonly chunker: DocumentChunker,
        private readonly retriever: KeywordRetriever<DocumentChunk>,
        private readonly chunks: ChunkRepository,
        options: RAGServiceOptions = {},
    ) {
        this.topK = options.topK ?? 3;
        this.logger = options.logger ?? createLogger('rag');
        const { maxChunkSize, overlap } = chunker.options;
        this.logger.info(`RAG Service initialized (chunk_size=${maxChunkSize}, overlap=${overlap})`);
    }

    /** Splits content with the configured chunker without storing anything. */
    chunk(content: string): Chunk[] {
        return this.chunker.chunk(content);
    }

    /**
     * Re-chunks the document and replaces every chunk stored for it.
     * @returns The number of chunks now stored.
     */
    async processDocument(document: Pick<Document, 'id' | 'content'>): Promise<number> {
        const chunks = this.chunk(document.content);
        const count = await this.chunks.replaceForDocument(document.id, chunks);
        this.logger.info(`Created ${count} chunks for document ${document.id}`);
        return count;
    }

    keywordSearch(query: string, candidates: readonly DocumentChunk[], topK: number = this.topK): DocumentChunk[] {
        const ranked = this.retriever.search(query, candidates, topK);
        this.logger.debug(`Retrieved ${ranked.length} chunks for query: '${query.slice(0, 50)}...'`);
        return ranked;
    }

    /**
     * Finds the chunks across `documentIds` that best match `query` and
     * assembles them into a prompt context. Returns an empty string when
     * nothing matches.
     */
    async retrieveContext(documentIds: readonly string[], query: string, topK: number = this.topK): Promise<string> {
        if (documentIds.length === 0) {
            return '';
        }

        const candidates = await this.chunks.listByDocuments(documentIds);
        if (candidates.length === 0) {
            this.logger.warn(`No chunks found for documents: ${documentIds.join(', ')}`);
            return '';
        }

        const ranked = this.keywordSearch(query, candidates, topK);
        if (ranked.length === 0) {
            return '';
        }

        const context = this.retriever.buildContext(ranked);
        this.logger.info(`Retrieved ${ranked.length} chunks (${context.length} chars) for query`);
        return context;
    }
}
