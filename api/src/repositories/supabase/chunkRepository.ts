import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { Chunk } from '../../lib/textChunker.js';
import type { DocumentChunk } from '../../types.js';
import type { ChunkRepository } from '../types.js';
import { ChunkRow, CHUNKS_TABLE, databaseError, toChunkRows } from './rows.js';

const InsertedCount = z.number().int();

export class SupabaseChunkRepository implements ChunkRepository {
    constructor(private readonly client: SupabaseClient) {}

    async replaceForDocument(documentId: string, chunks: readonly Chunk[]): Promise<number> {
        // Delete and insert run inside one Postgres function so a failure leaves the old chunks in place.
        const { data, error } = await this.client.rpc('replace_document_chunks', {
            p_document_id: documentId,
            p_chunks: toChunkRows(chunks),
        });

        if (error) throw databaseError(`replace chunks of document ${documentId}`, error);
        return InsertedCount.parse(data);
    }

    async listByDocuments(documentIds: readonly string[]): Promise<DocumentChunk[]> {
        if (documentIds.length === 0) return [];

        const { data, error } = await this.client
            .from(CHUNKS_TABLE)
            .select('*')
            .in('document_id', [...documentIds])
            .order('document_id', { ascending: true })
            .order('chunk_index', { ascending: true });

        if (error) throw databaseError('fetch document chunks', error);
        return ChunkRow.array().parse(data ?? []);
    }

    async countByDocument(documentId: string): Promise<number> {
        const { count, error } = await this.client
            .from(CHUNKS_TABLE)
            .select('id', { count: 'exact', head: true })
            .eq('document_id', documentId);

        if (error) throw databaseError(`count chunks of document ${documentId}`, error);
        return count ?? 0;
    }
}
