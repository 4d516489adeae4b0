import { z } from 'zod';
import type { PostgrestError } from '@supabase/supabase-js';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseError } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';
import type { Chunk } from '../../lib/textChunker.js';
import type { Conversation, Document, DocumentChunk, StoredMessage, User } from '../../types.js';

export const USERS_TABLE = 'users';
export const DOCUMENTS_TABLE = 'documents';
export const CHUNKS_TABLE = 'document_chunks';
export const CONVERSATIONS_TABLE = 'conversations';
export const CONVERSATION_DOCUMENTS_TABLE = 'conversation_documents';
export const MESSAGES_TABLE = 'messages';

// "PGRST116" is the PostgREST code for "0 rows returned" when using .single()
export const NO_ROWS_CODE = 'PGRST116';

const logger = createLogger('supabase');

export function databaseError(action: string, error: PostgrestError): DatabaseError {
    logger.error(`Failed to ${action}:`, error);
    return new DatabaseError(`Could not ${action}.`, { cause: error });
}

/** Chunk payload for the `replace_document_chunks` / `replace_document_content` functions. */
export const toChunkRows = (chunks: readonly Chunk[]) =>
    chunks.map(chunk => ({
        id: uuidv4(),
        content: chunk.text,
        chunk_index: chunk.index,
        start_char: chunk.startOffset,
        end_char: chunk.endOffset,
    }));

export const UserRow = z
    .object({
        id: z.string(),
        username: z.string(),
        email: z.string().nullable(),
        created_at: z.string(),
    })
    .transform((row): User => ({
        id: row.id,
        username: row.username,
        email: row.email,
        createdAt: row.created_at,
    }));

export const DocumentRow = z
    .object({
        id: z.string(),
        user_id: z.string(),
        filename: z.string(),
        content: z.string(),
        file_size: z.number().int(),
        mime_type: z.string().nullable(),
        created_at: z.string(),
    })
    .transform((row): Document => ({
        id: row.id,
        userId: row.user_id,
        filename: row.filename,
        content: row.content,
        fileSize: row.file_size,
        mimeType: row.mime_type,
        createdAt: row.created_at,
    }));

export const ChunkRow = z
    .object({
        id: z.string(),
        document_id: z.string(),
        content: z.string(),
        chunk_index: z.number().int(),
        start_char: z.number().int(),
        end_char: z.number().int(),
    })
    .transform((row): DocumentChunk => ({
        id: row.id,
        documentId: row.document_id,
        content: row.content,
        chunkIndex: row.chunk_index,
        startChar: row.start_char,
        endChar: row.end_char,
    }));

export const ConversationRow = z
    .object({
        id: z.string(),
        user_id: z.string(),
        title: z.string().nullable(),
        mode: z.enum(['open_chat', 'grounded_rag']),
        is_active: z.boolean(),
        total_tokens: z.number().int(),
        created_at: z.string(),
        updated_at: z.string(),
    })
    .transform((row): Conversation => ({
        id: row.id,
        userId: row.user_id,
        title: row.title,
        mode: row.mode,
        isActive: row.is_active,
        totalTokens: row.total_tokens,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    }));

export const MessageRow = z
    .object({
        id: z.string(),
        conversation_id: z.string(),
        role: z.enum(['system', 'user', 'assistant']),
        content: z.string(),
        tokens: z.number().int(),
        sequence_number: z.number().int(),
        created_at: z.string(),
    })
    .transform((row): StoredMessage => ({
        id: row.id,
        conversationId: row.conversation_id,
        role: row.role,
        content: row.content,
        tokens: row.tokens,
        sequenceNumber: row.sequence_number,
        createdAt: row.created_at,
    }));
