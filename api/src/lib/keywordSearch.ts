export const STOP_WORDS: ReadonlySet<string> = new Set([
    'a', 'an', 'the', 'is', 'are', 'was', 'were', 'in', 'on', 'at', 'to', 'for', 'of', 'with', 'by',
]);

const WORD = /\w+/g;

const PHRASE_MATCH_WEIGHT = 0.5;

export interface ScoredChunk<T> {
    candidate: T;
    score: number;
}

export function tokenize(text: string): Set<string> {
    return new Set(text.toLowerCase().match(WORD) ?? []);
}

export function extractKeywords(query: string): Set<string> {
    const keywords = tokenize(query);
    for (const stopWord of STOP_WORDS) {
        keywords.delete(stopWord);
    }
    return keywords;
}

/**
 * One point per keyword present as a whole token, plus half a point per
 * keyword present anywhere in the text (so "apple" still scores against
 * "pineapple").
 */
export function scoreText(keywords: ReadonlySet<string>, text: string): number {
    const lowered = text.toLowerCase();
    const tokens = tokenize(lowered);

    let overlap = 0;
    let phraseMatches = 0;
    for (const keyword of keywords) {
        if (tokens.has(keyword)) overlap++;
        if (lowered.includes(keyword)) phraseMatches++;
    }
    return overlap + phraseMatches * PHRASE_MATCH_WEIGHT;
}

/** Candidates with a positive score, best first. Ties keep input order. */
export function scoreCandidates<T>(
    query: string,
    candidates: readonly T[],
    getText: (candidate: T) => string,
): ScoredChunk<T>[] {
    const keywords = extractKeywords(query);
    if (keywords.size === 0) return [];

    return candidates
        .map(candidate => ({ candidate, score: scoreText(keywords, getText(candidate)) }))
        .filter(scored => scored.score > 0)
        .sort((a, b) => b.score - a.score);
}

export function keywordSearch<T>(
    query: string,
    candidates: readonly T[],
    topK: number,
    getText: (candidate: T) => string,
): T[] {
    if (topK <= 0 || candidates.length === 0) return [];
    return scoreCandidates(query, candidates, getText)
        .slice(0, topK)
        .map(scored => scored.candidate);
}

export function buildContext(texts: readonly string[]): string {
    return texts.map((text, i) => `[Context ${i + 1}]\n${text}`).join('\n\n');
}

/** Keyword search bound to one record type. */
export class KeywordRetriever<T> {
    constructor(private readonly getText: (candidate: T) => string) {}

    search(query: string, candidates: readonly T[], topK: number): T[] {
        return keywordSearch(query, candidates, topK, this.getText);
    }

    buildContext(ranked: readonly T[]): string {
        return buildContext(ranked.map(this.getText));
    }
}
