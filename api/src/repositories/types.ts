import type { Chunk } from '../lib/textChunker.js';
import type {
    Conversation,
    ConversationMode,
    Document,
    DocumentChunk,
    MessageRole,
    StoredMessage,
    User,
} from '../types.js';

export interface NewUser {
    username: string;
    email: string | null;
}

export interface UserRepository {
    create(input: NewUser): Promise<User>;
    findById(id: string): Promise<User | null>;
    findByUsername(username: string): Promise<User | null>;
    findByEmail(email: string): Promise<User | null>;
    /** Newest first. */
    list(): Promise<User[]>;
}

export interface NewDocument {
    userId: string;
    filename: string;
    content: string;
    mimeType: string | null;
}

export interface DocumentRepository {
    create(input: NewDocument): Promise<Document>;
    findById(id: string): Promise<Document | null>;
    /** Newest first. */
    listByUser(userId: string): Promise<Document[]>;
    /** How many of `documentIds` exist and belong to `userId`. */
    countOwnedBy(userId: string, documentIds: readonly string[]): Promise<number>;
    /** Swaps in new text and its chunks in one transaction. */
    replaceContent(id: string, content: string, chunks: readonly Chunk[]): Promise<Document>;
    /** Cascades to the document's chunks. */
    delete(id: string): Promise<void>;
}

export interface ChunkRepository {
    /** Replaces every stored chunk of the document with `chunks` in one transaction. */
    replaceForDocument(documentId: string, chunks: readonly Chunk[]): Promise<number>;
    /** Ordered by document, then chunk index. */
    listByDocuments(documentIds: readonly string[]): Promise<DocumentChunk[]>;
    countByDocument(documentId: string): Promise<number>;
}

export interface NewConversation {
    userId: string;
    title: string | null;
    mode: ConversationMode;
    documentIds: readonly string[];
}

export interface ConversationPatch {
    title?: string | null;
    isActive?: boolean;
}

export interface PageRequest {
    offset: number;
    limit: number;
}

export interface ConversationRepository {
    create(input: NewConversation): Promise<Conversation>;
    findById(id: string): Promise<Conversation | null>;
    /** Most recently updated first. */
    listByUser(userId: string, page: PageRequest): Promise<{ items: Conversation[]; total: number }>;
    listDocumentIds(conversationId: string): Promise<string[]>;
    /** Also bumps `updatedAt`. */
    update(id: string, patch: ConversationPatch): Promise<Conversation>;
    /** Cascades to messages and document links. */
    delete(id: string): Promise<void>;
}

export interface NewMessage {
    conversationId: string;
    role: MessageRole;
    content: string;
    tokens: number;
}

export interface MessageRepository {
    /**
     * Stores the message under the conversation's next sequence number and
     * adds its tokens to the conversation total, atomically.
     */
    append(input: NewMessage): Promise<StoredMessage>;
    /** Ordered by sequence number. */
    listByConversation(conversationId: string): Promise<StoredMessage[]>;
}

export interface Repositories {
    users: UserRepository;
    documents: DocumentRepository;
    chunks: ChunkRepository;
    conversations: ConversationRepository;
    messages: MessageRepository;
}
