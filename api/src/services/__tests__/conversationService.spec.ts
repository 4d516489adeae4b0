import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createInMemoryRepositories } from '../../__tests__/helpers/inMemoryRepositories.js';
import { DatabaseError } from '../../lib/errors.js';
import { estimateTokens } from '../../lib/historyTruncator.js';
import { KeywordRetriever } from '../../lib/keywordSearch.js';
import { DocumentChunker } from '../../lib/textChunker.js';
import type { DocumentChunk } from '../../types.js';
import { ConversationService, FALLBACK_REPLY, generateTitle } from '../conversationService.js';
import { type LLMProvider, MockProvider } from '../llmProviders.js';
import { LLMService } from '../llmService.js';
import { RAGService } from '../ragService.js';

function setup(provider: LLMProvider = new MockProvider('Test Bot')) {
    const repositories = createInMemoryRepositories();
    const rag = new RAGService(
        new DocumentChunker({ maxChunkSize: 20, overlap: 0 }),
        new KeywordRetriever<DocumentChunk>(chunk => chunk.content),
        repositories.chunks,
    );
    const service = new ConversationService(repositories, new LLMService(provider), rag);
    return { repositories, rag, service };
}

function scriptedProvider(content = 'Scripted reply', tokensUsed = 7) {
    const complete = vi.fn<LLMProvider['complete']>().mockResolvedValue({ content, tokensUsed, model: 'scripted' });
    const provider: LLMProvider = { name: 'scripted', complete };
    return { provider, complete };
}

describe('generateTitle', () => {
    it('keeps short messages as they are', () => {
        expect(generateTitle('Quick question')).toBe('Quick question');
        expect(generateTitle('x'.repeat(50))).toBe('x'.repeat(50));
    });

    it('cuts long messages at fifty characters', () => {
        expect(generateTitle('x'.repeat(60))).toBe(`${'x'.repeat(50)}...`);
    });
});

describe('ConversationService', () => {
    let ctx: ReturnType<typeof setup>;

    beforeEach(async () => {
        ctx = setup();
        await ctx.repositories.users.create({ username: 'alice', email: null });
        await ctx.repositories.users.create({ username: 'bob', email: null });
    });

    describe('createConversation', () => {
        it('stores the first exchange and counts its tokens', async () => {
            const result = await ctx.service.createConversation({ userId: 'user-1', firstMessage: 'hello there' });

            expect(result.error).toBeNull();
            expect(result.data?.conversationId).toBe('conv-1');
            expect(result.data?.message).toMatchObject({
                role: 'assistant',
                content: "Hello! I'm Test Bot, your AI assistant. How can I help you today?",
                sequenceNumber: 2,
            });
            const assistantTokens = result.data?.message.tokens ?? 0;
            expect(assistantTokens).toBe(
                estimateTokens('hello there') + estimateTokens("Hello! I'm Test Bot, your AI assistant. How can I help you today?"),
            );
            expect(result.data?.totalTokens).toBe(estimateTokens('hello there') + assistantTokens);

            const [conversation] = ctx.repositories.db.conversations;
            expect(conversation).toMatchObject({ title: 'hello there', mode: 'open_chat', isActive: true });
            expect(ctx.repositories.db.messages.map(message => [message.role, message.sequenceNumber])).toEqual([
                ['user', 1],
                ['assistant', 2],
            ]);
        });

        it('prefers an explicit title', async () => {
            await ctx.service.createConversation({ userId: 'user-1', firstMessage: 'hello', title: 'Greetings' });

            expect(ctx.repositories.db.conversations[0].title).toBe('Greetings');
        });

        it('rejects unknown users', async () => {
            expect(await ctx.service.createConversation({ userId: 'ghost', firstMessage: 'hello' })).toEqual({
                data: null,
                error: { code: 'NOT_FOUND', message: 'User not found: ghost' },
            });
        });

        it("rejects documents that belong to someone else", async () => {
            const doc = await ctx.repositories.documents.create({
                userId: 'user-2',
                filename: 'bob.txt',
                content: 'Private notes.',
                mimeType: 'text/plain',
            });

            const result = await ctx.service.createConversation({
                userId: 'user-1',
                firstMessage: 'What is in it?',
                mode: 'grounded_rag',
                documentIds: [doc.id],
            });

            expect(result.error).toEqual({
                code: 'NOT_FOUND',
                message: "One or more documents not found or don't belong to user",
            });
            expect(ctx.repositories.db.conversations).toHaveLength(0);
        });

        it('grounds the prompt in the linked documents', async () => {
            const { provider, complete } = scriptedProvider('Because they are dogs.', 7);
            ctx = setup(provider);
            await ctx.repositories.users.create({ username: 'alice', email: null });
            const doc = await ctx.repositories.documents.create({
                userId: 'user-1',
                filename: 'pets.txt',
                content: 'Cats purr softly.\n\nDogs bark loudly.',
                mimeType: 'text/plain',
            });
            await ctx.rag.processDocument(doc);

            const result = await ctx.service.createConversation({
                userId: 'user-1',
                firstMessage: 'Why do dogs bark?',
                mode: 'grounded_rag',
                documentIds: [doc.id, doc.id],
            });

            expect(result.data?.totalTokens).toBe(estimateTokens('Why do dogs bark?') + 7);
            expect(ctx.repositories.db.conversationDocuments).toEqual([{ conversationId: 'conv-1', documentId: 'doc-1' }]);

            const [prompt] = complete.mock.calls[0];
            expect(prompt).toHaveLength(2);
            expect(prompt[0].role).toBe('system');
            expect(prompt[0].content).toContain('Context:\n[Context 1]\nDogs bark loudly.');
            expect(prompt[1]).toEqual({ role: 'user', content: 'Why do dogs bark?' });
        });

        it('ignores document ids in open chat', async () => {
            await ctx.service.createConversation({
                userId: 'user-1',
                firstMessage: 'hello',
                documentIds: ['doc-404'],
            });

            expect(ctx.repositories.db.conversationDocuments).toEqual([]);
        });

        it('stores a fallback reply when the model fails', async () => {
            const failing: LLMProvider = { name: 'failing', complete: vi.fn().mockRejectedValue(new Error('down')) };
            ctx = setup(failing);
            await ctx.repositories.users.create({ username: 'alice', email: null });

            const result = await ctx.service.createConversation({ userId: 'user-1', firstMessage: 'hello' });

            expect(result.data?.message.content).toBe(FALLBACK_REPLY);
            expect(result.data?.message.tokens).toBe(estimateTokens(FALLBACK_REPLY));
        });

        it('removes the conversation when the first message cannot be stored', async () => {
            vi.spyOn(ctx.repositories.messages, 'append').mockRejectedValueOnce(new DatabaseError('Could not store message.'));

            await expect(ctx.service.createConversation({ userId: 'user-1', firstMessage: 'hello' })).rejects.toThrow(
                'Could not store message.',
            );
            expect(ctx.repositories.db.conversations).toEqual([]);
            expect(ctx.repositories.db.messages).toEqual([]);
        });

        it('removes the conversation and its links when the reply cannot be stored', async () => {
            const doc = await ctx.repositories.documents.create({
                userId: 'user-1',
                filename: 'pets.txt',
                content: 'Dogs bark loudly.',
                mimeType: 'text/plain',
            });
            const append = ctx.repositories.messages.append.bind(ctx.repositories.messages);
            vi.spyOn(ctx.repositories.messages, 'append')
                .mockImplementationOnce(append)
                .mockRejectedValueOnce(new DatabaseError('Could not store message.'));

            await expect(
                ctx.service.createConversation({
                    userId: 'user-1',
                    firstMessage: 'Why do dogs bark?',
                    mode: 'grounded_rag',
                    documentIds: [doc.id],
                }),
            ).rejects.toThrow('Could not store message.');
            expect(ctx.repositories.db.conversations).toEqual([]);
            expect(ctx.repositories.db.messages).toEqual([]);
            expect(ctx.repositories.db.conversationDocuments).toEqual([]);
        });
    });

    describe('addMessage', () => {
        it('continues the sequence and accumulates tokens', async () => {
            const { provider, complete } = scriptedProvider('Sure.', 5);
            ctx = setup(provider);
            await ctx.repositories.users.create({ username: 'alice', email: null });
            const created = await ctx.service.createConversation({ userId: 'user-1', firstMessage: 'First question' });

            const result = await ctx.service.addMessage('conv-1', 'Any more?');

            expect(result.data?.message).toMatchObject({ role: 'assistant', content: 'Sure.', sequenceNumber: 4, tokens: 5 });
            expect(result.data?.totalTokens).toBe((created.data?.totalTokens ?? 0) + estimateTokens('Any more?') + 5);
            expect(ctx.repositories.db.conversations[0].totalTokens).toBe(result.data?.totalTokens);

            const [prompt] = complete.mock.calls[1];
            expect(prompt.map(message => message.role)).toEqual(['system', 'user', 'assistant', 'user']);
            expect(prompt[3].content).toBe('Any more?');
        });

        it('numbers and counts concurrent messages without gaps or double counting', async () => {
            await ctx.service.createConversation({ userId: 'user-1', firstMessage: 'hello' });

            const [sunny, raining] = await Promise.all([
                ctx.service.addMessage('conv-1', 'Is it sunny?'),
                ctx.service.addMessage('conv-1', 'Is it raining?'),
            ]);

            expect(sunny.error).toBeNull();
            expect(raining.error).toBeNull();
            const stored = ctx.repositories.db.messages;
            expect(stored.map(message => message.sequenceNumber).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6]);
            expect(ctx.repositories.db.conversations[0].totalTokens).toBe(
                stored.reduce((sum, message) => sum + message.tokens, 0),
            );
        });

        it('rejects unknown conversations', async () => {
            expect((await ctx.service.addMessage('conv-404', 'hello')).error).toEqual({
                code: 'NOT_FOUND',
                message: 'Conversation not found: conv-404',
            });
        });

        it('rejects archived conversations', async () => {
            await ctx.service.createConversation({ userId: 'user-1', firstMessage: 'hello' });
            await ctx.service.updateConversation('conv-1', { isActive: false });

            expect((await ctx.service.addMessage('conv-1', 'still there?')).error).toEqual({
                code: 'INACTIVE',
                message: 'Conversation is inactive',
            });
            expect(ctx.repositories.db.messages).toHaveLength(2);
        });
    });

    describe('listConversations', () => {
        it('pages through conversations, most recently updated first', async () => {
            for (const firstMessage of ['one', 'two', 'three']) {
                await ctx.service.createConversation({ userId: 'user-1', firstMessage });
            }
            await ctx.service.createConversation({ userId: 'user-2', firstMessage: 'not mine' });

            const firstPage = await ctx.service.listConversations('user-1', 1, 2);
            const secondPage = await ctx.service.listConversations('user-1', 2, 2);

            expect(firstPage).toMatchObject({ total: 3, page: 1, pageSize: 2, totalPages: 2 });
            expect(firstPage.items.map(item => item.title)).toEqual(['three', 'two']);
            expect(secondPage.items.map(item => item.title)).toEqual(['one']);
            expect(firstPage.items[0]).toMatchObject({ messageCount: 2, isActive: true, mode: 'open_chat' });
            expect(firstPage.items[0].lastMessage).toBe(ctx.repositories.db.messages[5].content.slice(0, 100));
        });

        it('returns an empty page for a user without conversations', async () => {
            expect(await ctx.service.listConversations('user-2')).toEqual({
                items: [],
                total: 0,
                page: 1,
                pageSize: 20,
                totalPages: 0,
            });
        });
    });

    describe('getConversationDetail', () => {
        it('returns the messages in order with the linked documents', async () => {
            await ctx.service.createConversation({ userId: 'user-1', firstMessage: 'hello' });

            const result = await ctx.service.getConversationDetail('conv-1');

            expect(result.data).toMatchObject({ id: 'conv-1', userId: 'user-1', documentIds: [] });
            expect(result.data?.messages.map(message => message.sequenceNumber)).toEqual([1, 2]);
        });

        it('reports a missing conversation', async () => {
            expect((await ctx.service.getConversationDetail('conv-404')).error?.code).toBe('NOT_FOUND');
        });
    });

    describe('updateConversation', () => {
        it('renames a conversation', async () => {
            await ctx.service.createConversation({ userId: 'user-1', firstMessage: 'hello' });

            const result = await ctx.service.updateConversation('conv-1', { title: 'Renamed' });

            expect(result.data).toMatchObject({ title: 'Renamed', isActive: true });
        });

        it('reports a missing conversation', async () => {
            expect((await ctx.service.updateConversation('conv-404', { title: 'x' })).error?.code).toBe('NOT_FOUND');
        });
    });

    describe('deleteConversation', () => {
        it('removes the conversation and its messages', async () => {
            await ctx.service.createConversation({ userId: 'user-1', firstMessage: 'hello' });

            expect(await ctx.service.deleteConversation('conv-1')).toEqual({ data: true, error: null });
            expect(ctx.repositories.db.conversations).toEqual([]);
            expect(ctx.repositories.db.messages).toEqual([]);
            expect((await ctx.service.getConversationDetail('conv-1')).error?.code).toBe('NOT_FOUND');
        });

        it('reports a missing conversation', async () => {
            expect((await ctx.service.deleteConversation('conv-404')).error).toEqual({
                code: 'NOT_FOUND',
                message: 'Conversation not found: conv-404',
            });
        });
    });
});
