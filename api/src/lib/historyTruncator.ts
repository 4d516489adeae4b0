import type { ChatMessage } from '../types.js';

export const CHARS_PER_TOKEN = 4;

/** Rough length proxy, not a real tokenizer. */
export function estimateTokens(text: string): number {
    return Math.floor(text.length / CHARS_PER_TOKEN);
}

export type TokenEstimator = (text: string) => number;

/**
 * Drops the oldest non-system messages until the rest fits in `maxTokens`.
 * System messages are always kept and come first in the result; messages are
 * never cut in half.
 */
export function truncateHistory<T extends ChatMessage>(
    messages: readonly T[],
    maxTokens: number,
    estimate: TokenEstimator = estimateTokens,
): T[] {
    const systemMessages = messages.filter(message => message.role === 'system');
    const conversation = messages.filter(message => message.role !== 'system');

    const systemTokens = systemMessages.reduce((sum, message) => sum + estimate(message.content), 0);
    const available = maxTokens - systemTokens;
    if (available < 0) return systemMessages;

    const kept: T[] = [];
    let used = 0;
    for (let i = conversation.length - 1; i >= 0; i--) {
        const tokens = estimate(conversation[i].content);
        if (used + tokens > available) break;
        kept.push(conversation[i]);
        used += tokens;
    }

    return [...systemMessages, ...kept.reverse()];
}
