import type { SupabaseClient } from '@supabase/supabase-js';
import { v4 as uuidv4 } from 'uuid';
import type { Chunk } from '../../lib/textChunker.js';
import type { Document } from '../../types.js';
import type { DocumentRepository, NewDocument } from '../types.js';
import { databaseError, DocumentRow, DOCUMENTS_TABLE, NO_ROWS_CODE, toChunkRows } from './rows.js';

export class SupabaseDocumentRepository implements DocumentRepository {
    constructor(private readonly client: SupabaseClient) {}

    async create(input: NewDocument): Promise<Document> {
        const { data, error } = await this.client
            .from(DOCUMENTS_TABLE)
            .insert({
                id: uuidv4(),
                user_id: input.userId,
                filename: input.filename,
                content: input.content,
                file_size: input.content.length,
                mime_type: input.mimeType,
            })
            .select()
            .single();

        if (error) throw databaseError('store document', error);
        return DocumentRow.parse(data);
    }

    async findById(id: string): Promise<Document | null> {
        const { data, error } = await this.client
            .from(DOCUMENTS_TABLE)
            .select('*')
            .eq('id', id)
            .single();

        if (error) {
            if (error.code === NO_ROWS_CODE) return null;
            throw databaseError(`retrieve document ${id}`, error);
        }
        return DocumentRow.parse(data);
    }

    async listByUser(userId: string): Promise<Document[]> {
        const { data, error } = await this.client
            .from(DOCUMENTS_TABLE)
            .select('*')
            .eq('user_id', userId)
            .order('created_at', { ascending: false });

        if (error) throw databaseError(`list documents for user ${userId}`, error);
        return DocumentRow.array().parse(data ?? []);
    }

    async countOwnedBy(userId: string, documentIds: readonly string[]): Promise<number> {
        if (documentIds.length === 0) return 0;

        const { count, error } = await this.client
            .from(DOCUMENTS_TABLE)
            .select('id', { count: 'exact', head: true })
            .eq('user_id', userId)
            .in('id', [...documentIds]);

        if (error) throw databaseError('count documents', error);
        return count ?? 0;
    }

    async replaceContent(id: string, content: string, chunks: readonly Chunk[]): Promise<Document> {
        const { data, error } = await this.client
            .rpc('replace_document_content', {
                p_document_id: id,
                p_content: content,
                p_file_size: content.length,
                p_chunks: toChunkRows(chunks),
            })
            .single();

        if (error) throw databaseError(`update document ${id}`, error);
        return DocumentRow.parse(data);
    }

    async delete(id: string): Promise<void> {
        const { error } = await this.client
            .from(DOCUMENTS_TABLE)
            .delete()
            .eq('id', id);

        if (error) throw databaseError(`delete document ${id}`, error);
    }
}
