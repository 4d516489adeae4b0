import { describe, expect, it } from 'vitest';
import { createStubSupabase, failureReply } from '../../../__tests__/helpers/stubSupabase.js';
import { DatabaseError } from '../../../lib/errors.js';
import { SupabaseMessageRepository } from '../messageRepository.js';

const messageRow = (sequenceNumber: number, role: string, content: string) => ({
    id: `m-${sequenceNumber}`,
    conversation_id: 'c-1',
    role,
    content,
    tokens: 1,
    sequence_number: sequenceNumber,
    created_at: '2024-01-01T00:00:00Z',
});

describe('SupabaseMessageRepository', () => {
    it('appends through the database function that numbers messages and adds up tokens', async () => {
        const { client, requests } = createStubSupabase(() => ({ body: messageRow(3, 'user', 'hello') }));

        const message = await new SupabaseMessageRepository(client).append({
            conversationId: 'c-1',
            role: 'user',
            content: 'hello',
            tokens: 1,
        });

        expect(message).toEqual({
            id: 'm-3',
            conversationId: 'c-1',
            role: 'user',
            content: 'hello',
            tokens: 1,
            sequenceNumber: 3,
            createdAt: '2024-01-01T00:00:00Z',
        });
        expect(requests).toHaveLength(1);
        expect(requests[0]).toMatchObject({ method: 'POST', path: '/rpc/append_message' });
        expect(requests[0].body).toEqual({
            p_id: expect.any(String),
            p_conversation_id: 'c-1',
            p_role: 'user',
            p_content: 'hello',
            p_tokens: 1,
        });
    });

    it('raises a DatabaseError when the conversation is gone', async () => {
        const { client } = createStubSupabase(() => failureReply('P0002', 'conversation c-1 not found'));

        const error = await new SupabaseMessageRepository(client)
            .append({ conversationId: 'c-1', role: 'user', content: 'hello', tokens: 1 })
            .catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(DatabaseError);
        expect(error).toHaveProperty('message', 'Could not store message in conversation c-1.');
        expect(error).toHaveProperty('cause.code', 'P0002');
    });

    it('lists messages in sequence order', async () => {
        const { client, requests } = createStubSupabase(() => ({
            body: [messageRow(1, 'user', 'hello'), messageRow(2, 'assistant', 'Hi!')],
        }));

        const history = await new SupabaseMessageRepository(client).listByConversation('c-1');

        expect(history.map(message => [message.sequenceNumber, message.role])).toEqual([
            [1, 'user'],
            [2, 'assistant'],
        ]);
        expect(requests[0].query.get('conversation_id')).toBe('eq.c-1');
        expect(requests[0].query.get('order')).toBe('sequence_number.asc');
    });
});
