import { z } from 'zod';

export const RecordId = z.string().uuid();

export const UserParams = z.object({ userId: RecordId });

export const DocumentParams = z.object({ documentId: RecordId });

export const ConversationParams = z.object({ conversationId: RecordId });
