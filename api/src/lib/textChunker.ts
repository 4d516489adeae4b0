import { ConfigurationError } from './errors.js';

export interface Chunk {
    text: string;
    /** Half-open character range into the source text. */
    startOffset: number;
    endOffset: number;
    index: number;
}

export interface ChunkerOptions {
    maxChunkSize: number;
    overlap: number;
}

export const DEFAULT_CHUNKER_OPTIONS: ChunkerOptions = { maxChunkSize: 500, overlap: 50 };

const PARAGRAPH_BREAK = /\n\s*\n/;

export function validateChunkerOptions({ maxChunkSize, overlap }: ChunkerOptions): void {
    if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
        throw new ConfigurationError(`maxChunkSize must be a positive integer, got ${maxChunkSize}.`);
    }
    if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxChunkSize) {
        throw new ConfigurationError(
            `overlap must be an integer in [0, ${maxChunkSize}), got ${overlap}.`,
        );
    }
}

function splitParagraphs(content: string): string[] {
    return content
        .split(PARAGRAPH_BREAK)
        .map(paragraph => paragraph.trim())
        .filter(paragraph => paragraph.length > 0);
}

function trailingOverlap(text: string, overlap: number): string {
    if (overlap === 0 || text.length < overlap) return '';
    return text.slice(text.length - overlap);
}

/**
 * Packs blank-line separated paragraphs into chunks of roughly `maxChunkSize`
 * characters. Each new chunk starts with the last `overlap` characters of the
 * previous one. A paragraph longer than `maxChunkSize` is kept whole.
 *
 * Offsets are computed from buffer lengths rather than searched in the
 * source, so they can drift from the exact source positions once paragraphs
 * are joined or seeded with overlap text.
 */
export function chunkDocument(
    content: string,
    maxChunkSize: number = DEFAULT_CHUNKER_OPTIONS.maxChunkSize,
    overlap: number = DEFAULT_CHUNKER_OPTIONS.overlap,
): Chunk[] {
    validateChunkerOptions({ maxChunkSize, overlap });

    const chunks: Chunk[] = [];
    let buffer = '';
    let start = 0;

    for (const paragraph of splitParagraphs(content)) {
        if (buffer && buffer.length + paragraph.length > maxChunkSize) {
            const end = start + buffer.length;
            chunks.push({ text: buffer, startOffset: start, endOffset: end, index: chunks.length });

            const seed = trailingOverlap(buffer, overlap);
            buffer = seed ? `${seed} ${paragraph}` : paragraph;
            start = end - seed.length;
        } else {
            buffer = buffer ? `${buffer}\n\n${paragraph}` : paragraph;
        }
    }

    if (buffer) {
        chunks.push({ text: buffer, startOffset: start, endOffset: start + buffer.length, index: chunks.length });
    }

    return chunks;
}

export class DocumentChunker {
    readonly options: ChunkerOptions;

    constructor(options: ChunkerOptions = DEFAULT_CHUNKER_OPTIONS) {
        validateChunkerOptions(options);
        this.options = { ...options };
    }

    chunk(content: string): Chunk[] {
        return chunkDocument(content, this.options.maxChunkSize, this.options.overlap);
    }
}
