import type { SupabaseClient } from '@supabase/supabase-js';
import { v4 as uuidv4 } from 'uuid';
import type { StoredMessage } from '../../types.js';
import type { MessageRepository, NewMessage } from '../types.js';
import { databaseError, MessageRow, MESSAGES_TABLE } from './rows.js';

export class SupabaseMessageRepository implements MessageRepository {
    constructor(private readonly client: SupabaseClient) {}

    async append(input: NewMessage): Promise<StoredMessage> {
        const { data, error } = await this.client
            .rpc('append_message', {
                p_id: uuidv4(),
                p_conversation_id: input.conversationId,
                p_role: input.role,
                p_content: input.content,
                p_tokens: input.tokens,
            })
            .single();

        if (error) throw databaseError(`store message in conversation ${input.conversationId}`, error);
        return MessageRow.parse(data);
    }

    async listByConversation(conversationId: string): Promise<StoredMessage[]> {
        const { data, error } = await this.client
            .from(MESSAGES_TABLE)
            .select('*')
            .eq('conversation_id', conversationId)
            .order('sequence_number', { ascending: true });

        if (error) throw databaseError(`list messages of conversation ${conversationId}`, error);
        return MessageRow.array().parse(data ?? []);
    }
}
