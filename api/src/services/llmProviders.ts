import type { Content, GoogleGenAI } from '@google/genai';
import type { AppConfig } from '../config.js';
import { createGeminiClient } from '../lib/gemini.js';
import { describeError, ServiceCallError } from '../lib/errors.js';
import { estimateTokens } from '../lib/historyTruncator.js';
import { createLogger, type Logger } from '../lib/logger.js';
import type { ChatMessage } from '../types.js';

export interface GenerationOptions {
    temperature: number;
    maxResponseTokens: number;
}

export interface LLMResponse {
    content: string;
    tokensUsed: number;
    model: string;
}

export interface LLMProvider {
    readonly name: string;
    complete(messages: readonly ChatMessage[], options: GenerationOptions): Promise<LLMResponse>;
}

export type GenerateContentClient = Pick<GoogleGenAI['models'], 'generateContent'>;

function statusOf(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

export class GeminiProvider implements LLMProvider {
    readonly name = 'gemini';

    constructor(
        private readonly models: GenerateContentClient,
        private readonly model: string,
        private readonly logger: Logger = createLogger('llm:gemini'),
    ) {}

    async complete(messages: readonly ChatMessage[], options: GenerationOptions): Promise<LLMResponse> {
        // Gemini takes system turns as a separate instruction and calls the assistant "model".
        const systemInstruction = messages
            .filter(message => message.role === 'system')
            .map(message => message.content)
            .join('\n\n');
        const contents: Content[] = messages
            .filter(message => message.role !== 'system')
            .map(message => ({
                role: message.role === 'assistant' ? 'model' : 'user',
                parts: [{ text: message.content }],
            }));

        if (contents.length === 0) {
            throw new ServiceCallError('No user or assistant turns left to send to the model.');
        }

        const response = await this.models
            .generateContent({
                model: this.model,
                contents,
                config: {
                    systemInstruction: systemInstruction || undefined,
                    temperature: options.temperature,
                    maxOutputTokens: options.maxResponseTokens,
                },
            })
            .catch((error: unknown) => {
                throw this.toServiceCallError(error);
            });

        const text = response.text;
        if (!text) {
            throw new ServiceCallError('Model returned an empty response.');
        }

        return {
            content: text,
            tokensUsed: response.usageMetadata?.totalTokenCount ?? 0,
            model: response.modelVersion ?? this.model,
        };
    }

    private toServiceCallError(error: unknown): ServiceCallError {
        const status = statusOf(error);
        this.logger.error(`Gemini API call failed${status ? ` with status ${status}` : ''}:`, error);
        return new ServiceCallError(
            status ? `LLM API error: ${status}` : `LLM service error: ${describeError(error)}`,
            { cause: error, status },
        );
    }
}

const GREETING = /\b(hello|hi)\b/i;
const EXCERPT_LENGTH = 50;

/** Canned replies for development and tests; never calls out. */
export class MockProvider implements LLMProvider {
    readonly name = 'mock';

    constructor(private readonly assistantName: string = 'BOT GPT') {}

    async complete(messages: readonly ChatMessage[]): Promise<LLMResponse> {
        const lastMessage = messages.length > 0 ? messages[messages.length - 1].content : '';
        const excerpt = lastMessage.slice(0, EXCERPT_LENGTH);

        let content: string;
        if (GREETING.test(lastMessage)) {
            content = `Hello! I'm ${this.assistantName}, your AI assistant. How can I help you today?`;
        } else if (lastMessage.includes('?')) {
            content = `That's an interesting question! Based on your query '${excerpt}...', here's my response: [Mock LLM Response] I would need more context to provide a complete answer.`;
        } else {
            content = `Thank you for your message. I understand you're asking about: '${excerpt}...'. [Mock LLM Response] This is a simulated response for development purposes.`;
        }

        return {
            content,
            tokensUsed: estimateTokens(lastMessage) + estimateTokens(content),
            model: 'mock-model',
        };
    }
}

export function createLLMProvider(
    config: AppConfig['llm'],
    logger: Logger = createLogger('llm'),
): LLMProvider {
    if (config.provider === 'mock') {
        return new MockProvider(config.assistantName);
    }
    if (!config.apiKey) {
        logger.warn('Gemini API key not provided. Falling back to mock mode.');
        return new MockProvider(config.assistantName);
    }
    const ai = createGeminiClient(config.apiKey, config.timeoutMs);
    return new GeminiProvider(ai.models, config.model, logger.child('gemini'));
}
