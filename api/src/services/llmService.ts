import { estimateTokens, truncateHistory } from '../lib/historyTruncator.js';
import { createLogger, type Logger } from '../lib/logger.js';
import type { ChatMessage, ConversationMode } from '../types.js';
import type { GenerationOptions, LLMProvider, LLMResponse } from './llmProviders.js';

export const DEFAULT_GENERATION_OPTIONS: GenerationOptions = {
    temperature: 0.7,
    maxResponseTokens: 1000,
};

export interface LLMServiceOptions {
    /** Context window shared by the prompt and the response. */
    maxTokens?: number;
    assistantName?: string;
    logger?: Logger;
}

export class LLMService {
    private readonly maxTokens: number;
    private readonly assistantName: string;
    private readonly logger: Logger;

    constructor(private readonly provider: LLMProvider, options: LLMServiceOptions = {}) {
        this.maxTokens = options.maxTokens ?? 8000;
        this.assistantName = options.assistantName ?? 'BOT GPT';
        this.logger = options.logger ?? createLogger('llm');
        this.logger.info(`LLM Service initialized with provider: ${provider.name}`);
    }

    get providerName(): string {
        return this.provider.name;
    }

    estimateTokens(text: string): number {
        return estimateTokens(text);
    }

    truncateHistory<T extends ChatMessage>(messages: readonly T[], maxContextTokens = 6000): T[] {
        const truncated = truncateHistory(messages, maxContextTokens, estimateTokens);
        const tokens = truncated.reduce((sum, message) => sum + estimateTokens(message.content), 0);
        this.logger.debug(`Truncated history: ${messages.length} -> ${truncated.length} messages (${tokens} tokens)`);
        return truncated;
    }

    /**
     * Trims `messages` so prompt and response fit the context window, then asks
     * the provider. Provider failures propagate; callers decide on a fallback.
     */
    async generateResponse(
        messages: readonly ChatMessage[],
        options: Partial<GenerationOptions> = {},
    ): Promise<LLMResponse> {
        const resolved: GenerationOptions = { ...DEFAULT_GENERATION_OPTIONS, ...options };
        const truncated = this.truncateHistory(messages, this.maxTokens - resolved.maxResponseTokens);
        return this.provider.complete(truncated, resolved);
    }

    createSystemPrompt(mode: ConversationMode, context?: string | null): string {
        if (mode === 'grounded_rag' && context) {
            return `You are ${this.assistantName}, a helpful AI assistant. You are having a conversation that is grounded in specific documents.

Use the following context from the documents to answer the user's questions. If the answer cannot be found in the context, say so clearly.

Context:
${context}

Answer the user's questions based on this context.`;
        }

        return `You are ${this.assistantName}, a helpful and knowledgeable AI assistant. Provide clear, accurate, and helpful responses to the user's questions.`;
    }
}
