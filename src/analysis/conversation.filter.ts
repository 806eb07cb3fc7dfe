import type { ConversationDocument, ConversationRecord, JsonValue, UserIdentifier } from '../types';
import { isJsonObject } from '../utils/json.utils';
import { getMessages, isOwnedBy, isSentBy, normaliseUserId } from './field.resolver';

// ============================================================================
// CONVERSATION FILTERING
// ============================================================================

/**
 * Picks the part of a conversation that belongs to the user, or undefined.
 *
 * Priority: conversation owner (kept verbatim), then `messages`, then `chat_messages`.
 * Message matches produce a shallow copy holding only the user's messages; a
 * `chat_messages` match also drops the `messages` key.
 */
export function selectUserConversation(
    conversation: ConversationRecord,
    userId: UserIdentifier
): ConversationRecord | undefined {
    if (isOwnedBy(conversation, userId)) {
        return conversation;
    }

    const userMessages = getMessages(conversation, 'messages').filter(message => isSentBy(message, userId));
    if (userMessages.length > 0) {
        return { ...conversation, messages: userMessages };
    }

    const userChatMessages = getMessages(conversation, 'chat_messages').filter(message => isSentBy(message, userId));
    if (userChatMessages.length > 0) {
        const trimmed: ConversationRecord = { ...conversation, chat_messages: userChatMessages };
        delete trimmed.messages;
        return trimmed;
    }

    return undefined;
}

/**
 * Returns the conversations belonging to a user. Never throws; an unknown user
 * yields an empty list.
 */
export function filterUserConversations(document: ConversationDocument, userId: JsonValue): JsonValue[] {
    const target = normaliseUserId(userId);

    switch (document.kind) {
        case 'conversation-list': {
            const selected: JsonValue[] = [];
            for (const conversation of document.conversations) {
                if (!isJsonObject(conversation)) continue;
                const match = selectUserConversation(conversation, target);
                if (match !== undefined) selected.push(match);
            }
            return selected;
        }
        case 'keyed-by-user': {
            if (!Object.hasOwn(document.users, target)) return [];
            const userData = document.users[target];
            if (Array.isArray(userData)) return userData;
            if (isJsonObject(userData)) return [userData];
            return [];
        }
        case 'unrecognised':
            return [];
    }
}
