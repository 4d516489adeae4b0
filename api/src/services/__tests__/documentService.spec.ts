import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createInMemoryRepositories } from '../../__tests__/helpers/inMemoryRepositories.js';
import { DatabaseError } from '../../lib/errors.js';
import { KeywordRetriever } from '../../lib/keywordSearch.js';
import { DocumentChunker } from '../../lib/textChunker.js';
import type { DocumentChunk } from '../../types.js';
import { DocumentService } from '../documentService.js';
import { RAGService } from '../ragService.js';

const NOTES = 'Cats purr softly.\n\nDogs bark loudly.';

describe('DocumentService', () => {
    let repositories: ReturnType<typeof createInMemoryRepositories>;
    let service: DocumentService;

    beforeEach(async () => {
        repositories = createInMemoryRepositories();
        const rag = new RAGService(
            new DocumentChunker({ maxChunkSize: 20, overlap: 0 }),
            new KeywordRetriever<DocumentChunk>(chunk => chunk.content),
            repositories.chunks,
        );
        service = new DocumentService(repositories.users, repositories.documents, repositories.chunks, rag);
        await repositories.users.create({ username: 'alice', email: null });
    });

    it('stores and chunks an uploaded document', async () => {
        const result = await service.uploadDocument({ userId: 'user-1', filename: 'pets.txt', content: NOTES });

        expect(result.data).toEqual({
            id: 'doc-1',
            userId: 'user-1',
            filename: 'pets.txt',
            fileSize: NOTES.length,
            mimeType: 'text/plain',
            chunkCount: 2,
            createdAt: repositories.db.documents[0].createdAt,
        });
        expect(repositories.db.chunks.map(chunk => chunk.content)).toEqual(['Cats purr softly.', 'Dogs bark loudly.']);
    });

    it('removes the document when its chunks cannot be stored', async () => {
        vi.spyOn(repositories.chunks, 'replaceForDocument').mockRejectedValue(new DatabaseError('Could not store chunks.'));

        await expect(service.uploadDocument({ userId: 'user-1', filename: 'pets.txt', content: NOTES })).rejects.toThrow(
            'Could not store chunks.',
        );
        expect(repositories.db.documents).toEqual([]);
        expect(repositories.db.chunks).toEqual([]);
    });

    it('keeps a supplied mime type', async () => {
        const result = await service.uploadDocument({
            userId: 'user-1',
            filename: 'pets.md',
            content: NOTES,
            mimeType: 'text/markdown',
        });

        expect(result.data?.mimeType).toBe('text/markdown');
    });

    it('rejects uploads for unknown users', async () => {
        expect(await service.uploadDocument({ userId: 'ghost', filename: 'x.txt', content: 'x' })).toEqual({
            data: null,
            error: { code: 'NOT_FOUND', message: 'User not found' },
        });
        expect(repositories.db.documents).toEqual([]);
    });

    it('lists documents newest first with their chunk counts', async () => {
        await service.uploadDocument({ userId: 'user-1', filename: 'a.txt', content: 'Short.' });
        await service.uploadDocument({ userId: 'user-1', filename: 'b.txt', content: NOTES });

        const documents = await service.listDocuments('user-1');

        expect(documents.map(document => [document.filename, document.chunkCount])).toEqual([
            ['b.txt', 2],
            ['a.txt', 1],
        ]);
        expect(await service.listDocuments('user-2')).toEqual([]);
    });

    it('re-chunks replaced content', async () => {
        await service.uploadDocument({ userId: 'user-1', filename: 'pets.txt', content: NOTES });

        const result = await service.replaceContent('doc-1', 'Fish swim.');

        expect(result.data).toMatchObject({ fileSize: 10, chunkCount: 1 });
        expect(repositories.db.chunks.map(chunk => chunk.content)).toEqual(['Fish swim.']);
        expect((await service.getDocument('doc-1')).data?.chunkCount).toBe(1);
    });

    it('swaps content and chunks in a single repository call', async () => {
        await service.uploadDocument({ userId: 'user-1', filename: 'pets.txt', content: NOTES });
        const replaceContent = vi.spyOn(repositories.documents, 'replaceContent');
        const replaceChunks = vi.spyOn(repositories.chunks, 'replaceForDocument');

        await service.replaceContent('doc-1', 'Fish swim.');

        expect(replaceContent).toHaveBeenCalledTimes(1);
        expect(replaceContent).toHaveBeenCalledWith('doc-1', 'Fish swim.', [
            { text: 'Fish swim.', index: 0, startOffset: 0, endOffset: 10 },
        ]);
        expect(replaceChunks).not.toHaveBeenCalled();
    });

    it('leaves the old content in place when the swap fails', async () => {
        await service.uploadDocument({ userId: 'user-1', filename: 'pets.txt', content: NOTES });
        vi.spyOn(repositories.documents, 'replaceContent').mockRejectedValue(new DatabaseError('Could not replace content.'));

        await expect(service.replaceContent('doc-1', 'Fish swim.')).rejects.toThrow('Could not replace content.');
        expect(repositories.db.documents[0].content).toBe(NOTES);
        expect(repositories.db.chunks.map(chunk => chunk.content)).toEqual(['Cats purr softly.', 'Dogs bark loudly.']);
    });

    it('deletes a document together with its chunks', async () => {
        await service.uploadDocument({ userId: 'user-1', filename: 'pets.txt', content: NOTES });

        expect(await service.deleteDocument('doc-1')).toEqual({ data: true, error: null });
        expect(repositories.db.chunks).toEqual([]);
        expect((await service.getDocument('doc-1')).error).toEqual({ code: 'NOT_FOUND', message: 'Document not found' });
    });

    it('reports missing documents', async () => {
        expect((await service.replaceContent('doc-404', 'x')).error?.code).toBe('NOT_FOUND');
        expect((await service.deleteDocument('doc-404')).error?.code).toBe('NOT_FOUND');
    });
});
