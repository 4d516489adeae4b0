import type { SupabaseClient } from '@supabase/supabase-js';
import type { Repositories } from '../types.js';
import { SupabaseChunkRepository } from './chunkRepository.js';
import { SupabaseConversationRepository } from './conversationRepository.js';
import { SupabaseDocumentRepository } from './documentRepository.js';
import { SupabaseMessageRepository } from './messageRepository.js';
import { USERS_TABLE } from './rows.js';
import { SupabaseUserRepository } from './userRepository.js';

export function createSupabaseRepositories(client: SupabaseClient): Repositories {
    return {
        users: new SupabaseUserRepository(client),
        documents: new SupabaseDocumentRepository(client),
        chunks: new SupabaseChunkRepository(client),
        conversations: new SupabaseConversationRepository(client),
        messages: new SupabaseMessageRepository(client),
    };
}

export function createSupabaseHealthCheck(client: SupabaseClient): () => Promise<boolean> {
    return async () => {
        const { error } = await client
            .from(USERS_TABLE)
            .select('id', { count: 'exact', head: true })
            .limit(1);
        return !error;
    };
}
