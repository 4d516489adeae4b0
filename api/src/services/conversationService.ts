import { fail, ok, type ServiceResult } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';
import type { Repositories } from '../repositories/types.js';
import type {
    ChatMessage,
    Conversation,
    ConversationDetail,
    ConversationMode,
    ConversationReply,
    ConversationSummary,
    Page,
    StoredMessage,
} from '../types.js';
import type { LLMService } from './llmService.js';
import type { RAGService } from './ragService.js';

export const FALLBACK_REPLY =
    "I apologize, but I'm having trouble generating a response right now. Please try again.";

const TITLE_LENGTH = 50;
const PREVIEW_LENGTH = 100;

export interface CreateConversationInput {
    userId: string;
    firstMessage: string;
    mode?: ConversationMode;
    documentIds?: readonly string[];
    title?: string | null;
}

export interface UpdateConversationInput {
    title?: string | null;
    isActive?: boolean;
}

export function generateTitle(firstMessage: string, maxLength: number = TITLE_LENGTH): string {
    const title = firstMessage.slice(0, maxLength);
    return firstMessage.length > maxLength ? `${title}...` : title;
}

export class ConversationService {
    constructor(
        private readonly repositories: Pick<Repositories, 'users' | 'documents' | 'conversations' | 'messages'>,
        private readonly llm: LLMService,
        private readonly rag: RAGService,
        private readonly logger: Logger = createLogger('conversations'),
    ) {}

    /** Opens a conversation with the user's first message and the assistant's reply to it. */
    async createConversation(input: CreateConversationInput): Promise<ServiceResult<ConversationReply>> {
        const { users, documents, conversations, messages } = this.repositories;
        const mode = input.mode ?? 'open_chat';

        const user = await users.findById(input.userId);
        if (!user) {
            return fail('NOT_FOUND', `User not found: ${input.userId}`);
        }

        const documentIds = mode === 'grounded_rag' ? [...new Set(input.documentIds ?? [])] : [];
        if (documentIds.length > 0) {
            const owned = await documents.countOwnedBy(input.userId, documentIds);
            if (owned !== documentIds.length) {
                return fail('NOT_FOUND', "One or more documents not found or don't belong to user");
            }
        }

        const conversation = await conversations.create({
            userId: input.userId,
            title: input.title || generateTitle(input.firstMessage),
            mode,
            documentIds,
        });

        let assistantMessage: StoredMessage;
        try {
            await messages.append({
                conversationId: conversation.id,
                role: 'user',
                content: input.firstMessage,
                tokens: this.llm.estimateTokens(input.firstMessage),
            });
            assistantMessage = await this.generateAssistantResponse(conversation, input.firstMessage);
        } catch (error) {
            await this.discard(conversation.id);
            throw error;
        }

        this.logger.info(`Created conversation ${conversation.id} with mode ${mode}`);
        return this.reply(conversation.id, assistantMessage);
    }

    async addMessage(conversationId: string, content: string): Promise<ServiceResult<ConversationReply>> {
        const { conversations, messages } = this.repositories;

        const conversation = await conversations.findById(conversationId);
        if (!conversation) {
            return fail('NOT_FOUND', `Conversation not found: ${conversationId}`);
        }
        if (!conversation.isActive) {
            return fail('INACTIVE', 'Conversation is inactive');
        }

        await messages.append({
            conversationId,
            role: 'user',
            content,
            tokens: this.llm.estimateTokens(content),
        });
        const assistantMessage = await this.generateAssistantResponse(conversation, content);

        this.logger.info(`Added message to conversation ${conversationId}`);
        return this.reply(conversationId, assistantMessage);
    }

    async listConversations(userId: string, page = 1, pageSize = 20): Promise<Page<ConversationSummary>> {
        const { conversations, messages } = this.repositories;

        const { items, total } = await conversations.listByUser(userId, {
            offset: (page - 1) * pageSize,
            limit: pageSize,
        });

        const summaries = await Promise.all(items.map(async (conversation): Promise<ConversationSummary> => {
            const history = await messages.listByConversation(conversation.id);
            const last = history.at(-1);
            return {
                id: conversation.id,
                title: conversation.title,
                mode: conversation.mode,
                isActive: conversation.isActive,
                messageCount: history.length,
                totalTokens: conversation.totalTokens,
                createdAt: conversation.createdAt,
                updatedAt: conversation.updatedAt,
                lastMessage: last ? last.content.slice(0, PREVIEW_LENGTH) : null,
            };
        }));

        return {
            items: summaries,
            total,
            page,
            pageSize,
            totalPages: Math.ceil(total / pageSize),
        };
    }

    async getConversationDetail(conversationId: string): Promise<ServiceResult<ConversationDetail>> {
        const { conversations, messages } = this.repositories;

        const conversation = await conversations.findById(conversationId);
        if (!conversation) {
            return fail('NOT_FOUND', `Conversation not found: ${conversationId}`);
        }

        const [history, documentIds] = await Promise.all([
            messages.listByConversation(conversationId),
            conversations.listDocumentIds(conversationId),
        ]);
        return ok({ ...conversation, messages: history, documentIds });
    }

    async updateConversation(
        conversationId: string,
        input: UpdateConversationInput,
    ): Promise<ServiceResult<Conversation>> {
        const { conversations } = this.repositories;

        if (!(await conversations.findById(conversationId))) {
            return fail('NOT_FOUND', `Conversation not found: ${conversationId}`);
        }

        const updated = await conversations.update(conversationId, input);
        this.logger.info(`Updated conversation ${conversationId}`);
        return ok(updated);
    }

    async deleteConversation(conversationId: string): Promise<ServiceResult<boolean>> {
        const { conversations } = this.repositories;

        if (!(await conversations.findById(conversationId))) {
            return fail('NOT_FOUND', `Conversation not found: ${conversationId}`);
        }

        await conversations.delete(conversationId);
        this.logger.info(`Deleted conversation ${conversationId}`);
        return ok(true);
    }

    /**
     * Builds the prompt from the stored history (plus document context for
     * grounded conversations), asks the model and stores its reply. A model
     * failure is logged and answered with {@link FALLBACK_REPLY}.
     */
    private async generateAssistantResponse(conversation: Conversation, userContent: string): Promise<StoredMessage> {
        const { conversations, messages } = this.repositories;

        const history = await messages.listByConversation(conversation.id);

        let context: string | null = null;
        if (conversation.mode === 'grounded_rag') {
            const documentIds = await conversations.listDocumentIds(conversation.id);
            if (documentIds.length > 0) {
                context = await this.rag.retrieveContext(documentIds, userContent);
            }
        }

        const prompt: ChatMessage[] = [
            { role: 'system', content: this.llm.createSystemPrompt(conversation.mode, context) },
            ...history.map(({ role, content }) => ({ role, content })),
        ];
        const last = history.at(-1);
        if (last?.role !== 'user' || last.content !== userContent) {
            prompt.push({ role: 'user', content: userContent });
        }

        let content: string;
        let tokens: number;
        try {
            const response = await this.llm.generateResponse(prompt, { temperature: 0.7, maxResponseTokens: 1000 });
            content = response.content;
            tokens = response.tokensUsed;
        } catch (error) {
            this.logger.error(`Error generating LLM response for conversation ${conversation.id}:`, error);
            content = FALLBACK_REPLY;
            tokens = this.llm.estimateTokens(FALLBACK_REPLY);
        }

        return messages.append({
            conversationId: conversation.id,
            role: 'assistant',
            content,
            tokens,
        });
    }

    /** Reads the total back after the appends, which update it in storage. */
    private async reply(conversationId: string, message: StoredMessage): Promise<ServiceResult<ConversationReply>> {
        const current = await this.repositories.conversations.findById(conversationId);
        if (!current) {
            return fail('NOT_FOUND', `Conversation not found: ${conversationId}`);
        }
        return ok({ conversationId, message, totalTokens: current.totalTokens });
    }

    private async discard(conversationId: string): Promise<void> {
        try {
            await this.repositories.conversations.delete(conversationId);
        } catch (cleanupError) {
            this.logger.error(`Could not remove conversation ${conversationId} after a failed start:`, cleanupError);
        }
    }
}
