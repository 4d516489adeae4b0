export type MessageRole = 'system' | 'user' | 'assistant';

export type ConversationMode = 'open_chat' | 'grounded_rag';

export interface ChatMessage {
    role: MessageRole;
    content: string;
}

export interface User {
    id: string;
    username: string;
    email: string | null;
    createdAt: string;
}

export interface Document {
    id: string;
    userId: string;
    filename: string;
    content: string;
    fileSize: number;
    mimeType: string | null;
    createdAt: string;
}

export interface DocumentChunk {
    id: string;
    documentId: string;
    content: string;
    chunkIndex: number;
    startChar: number;
    endChar: number;
}

export interface Conversation {
    id: string;
    userId: string;
    title: string | null;
    mode: ConversationMode;
    isActive: boolean;
    totalTokens: number;
    createdAt: string;
    updatedAt: string;
}

export interface StoredMessage extends ChatMessage {
    id: string;
    conversationId: string;
    tokens: number;
    sequenceNumber: number;
    createdAt: string;
}

export interface DocumentSummary {
    id: string;
    userId: string;
    filename: string;
    fileSize: number;
    mimeType: string | null;
    chunkCount: number;
    createdAt: string;
}

export interface ConversationSummary {
    id: string;
    title: string | null;
    mode: ConversationMode;
    isActive: boolean;
    messageCount: number;
    totalTokens: number;
    createdAt: string;
    updatedAt: string;
    lastMessage: string | null;
}

export interface ConversationDetail extends Conversation {
    messages: StoredMessage[];
    documentIds: string[];
}

export interface ConversationReply {
    conversationId: string;
    message: StoredMessage;
    totalTokens: number;
}

export interface Page<T> {
    items: T[];
    total: number;
    page: number;
    pageSize: number;
    totalPages: number;
}
