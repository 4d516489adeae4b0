import { fail, ok, type ServiceResult } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';
import type { ChunkRepository, DocumentRepository, UserRepository } from '../repositories/types.js';
import type { Document, DocumentSummary } from '../types.js';
import type { RAGService } from './ragService.js';

export interface UploadDocumentInput {
    userId: string;
    filename: string;
    content: string;
    mimeType?: string | null;
}

const summarize = (document: Document, chunkCount: number): DocumentSummary => ({
    id: document.id,
    userId: document.userId,
    filename: document.filename,
    fileSize: document.fileSize,
    mimeType: document.mimeType,
    chunkCount,
    createdAt: document.createdAt,
});

export class DocumentService {
    constructor(
        private readonly users: UserRepository,
        private readonly documents: DocumentRepository,
        private readonly chunks: ChunkRepository,
        private readonly rag: RAGService,
        private readonly logger: Logger = createLogger('documents'),
    ) {}

    /** Stores the document and chunks it straight away. */
    async uploadDocument(input: UploadDocumentInput): Promise<ServiceResult<DocumentSummary>> {
        const user = await this.users.findById(input.userId);
        if (!user) {
            return fail('NOT_FOUND', 'User not found');
        }

        const document = await this.documents.create({
            userId: input.userId,
            filename: input.filename,
            content: input.content,
            mimeType: input.mimeType ?? 'text/plain',
        });
        let chunkCount: number;
        try {
            chunkCount = await this.rag.processDocument(document);
        } catch (error) {
            await this.discard(document.id);
            throw error;
        }

        this.logger.info(`[${document.id}] Uploaded ${document.filename} (${document.fileSize} chars, ${chunkCount} chunks)`);
        return ok(summarize(document, chunkCount));
    }

    async listDocuments(userId: string): Promise<DocumentSummary[]> {
        const documents = await this.documents.listByUser(userId);
        return Promise.all(
            documents.map(async document => summarize(document, await this.chunks.countByDocument(document.id))),
        );
    }

    async getDocument(documentId: string): Promise<ServiceResult<DocumentSummary>> {
        const document = await this.documents.findById(documentId);
        if (!document) {
            return fail('NOT_FOUND', 'Document not found');
        }
        return ok(summarize(document, await this.chunks.countByDocument(document.id)));
    }

    /** Replaces the text and its chunks together; either both change or neither does. */
    async replaceContent(documentId: string, content: string): Promise<ServiceResult<DocumentSummary>> {
        const existing = await this.documents.findById(documentId);
        if (!existing) {
            return fail('NOT_FOUND', 'Document not found');
        }

        const chunks = this.rag.chunk(content);
        const document = await this.documents.replaceContent(documentId, content, chunks);

        this.logger.info(`[${document.id}] Content replaced (${document.fileSize} chars, ${chunks.length} chunks)`);
        return ok(summarize(document, chunks.length));
    }

    async deleteDocument(documentId: string): Promise<ServiceResult<boolean>> {
        const document = await this.documents.findById(documentId);
        if (!document) {
            return fail('NOT_FOUND', 'Document not found');
        }

        await this.documents.delete(documentId);
        this.logger.info(`[${documentId}] Deleted document`);
        return ok(true);
    }

    /** Removes a document whose chunks could not be stored. */
    private async discard(documentId: string): Promise<void> {
        try {
            await this.documents.delete(documentId);
        } catch (cleanupError) {
            this.logger.error(`[${documentId}] Could not remove document after failed chunking:`, cleanupError);
        }
    }
}
