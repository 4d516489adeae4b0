import type { SupabaseClient } from '@supabase/supabase-js';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { Conversation } from '../../types.js';
import type {
    ConversationPatch,
    ConversationRepository,
    NewConversation,
    PageRequest,
} from '../types.js';
import {
    CONVERSATION_DOCUMENTS_TABLE,
    ConversationRow,
    CONVERSATIONS_TABLE,
    databaseError,
    NO_ROWS_CODE,
} from './rows.js';

const DocumentLinkRow = z.object({ document_id: z.string() });

export class SupabaseConversationRepository implements ConversationRepository {
    constructor(private readonly client: SupabaseClient) {}

    async create(input: NewConversation): Promise<Conversation> {
        const { data, error } = await this.client
            .from(CONVERSATIONS_TABLE)
            .insert({
                id: uuidv4(),
                user_id: input.userId,
                title: input.title,
                mode: input.mode,
                is_active: true,
                total_tokens: 0,
            })
            .select()
            .single();

        if (error) throw databaseError('create conversation', error);
        const conversation = ConversationRow.parse(data);

        if (input.documentIds.length > 0) {
            const { error: linkError } = await this.client
                .from(CONVERSATION_DOCUMENTS_TABLE)
                .insert(input.documentIds.map(documentId => ({
                    conversation_id: conversation.id,
                    document_id: documentId,
                })));

            if (linkError) {
                // No transactions over PostgREST: undo the half-created conversation.
                await this.delete(conversation.id);
                throw databaseError(`link documents to conversation ${conversation.id}`, linkError);
            }
        }

        return conversation;
    }

    async findById(id: string): Promise<Conversation | null> {
        const { data, error } = await this.client
            .from(CONVERSATIONS_TABLE)
            .select('*')
            .eq('id', id)
            .single();

        if (error) {
            if (error.code === NO_ROWS_CODE) return null;
            throw databaseError(`retrieve conversation ${id}`, error);
        }
        return ConversationRow.parse(data);
    }

    async listByUser(userId: string, page: PageRequest): Promise<{ items: Conversation[]; total: number }> {
        const { data, error, count } = await this.client
            .from(CONVERSATIONS_TABLE)
            .select('*', { count: 'exact' })
            .eq('user_id', userId)
            .order('updated_at', { ascending: false })
            .range(page.offset, page.offset + page.limit - 1);

        if (error) throw databaseError(`list conversations for user ${userId}`, error);
        return { items: ConversationRow.array().parse(data ?? []), total: count ?? 0 };
    }

    async listDocumentIds(conversationId: string): Promise<string[]> {
        const { data, error } = await this.client
            .from(CONVERSATION_DOCUMENTS_TABLE)
            .select('document_id')
            .eq('conversation_id', conversationId);

        if (error) throw databaseError(`list documents of conversation ${conversationId}`, error);
        return DocumentLinkRow.array().parse(data ?? []).map(row => row.document_id);
    }

    async update(id: string, patch: ConversationPatch): Promise<Conversation> {
        const row: Record<string, string | boolean | null> = {
            updated_at: new Date().toISOString(),
        };
        if (patch.title !== undefined) row.title = patch.title;
        if (patch.isActive !== undefined) row.is_active = patch.isActive;

        const { data, error } = await this.client
            .from(CONVERSATIONS_TABLE)
            .update(row)
            .eq('id', id)
            .select()
            .single();

        if (error) throw databaseError(`update conversation ${id}`, error);
        return ConversationRow.parse(data);
    }

    async delete(id: string): Promise<void> {
        const { error } = await this.client
            .from(CONVERSATIONS_TABLE)
            .delete()
            .eq('id', id);

        if (error) throw databaseError(`delete conversation ${id}`, error);
    }
}
