import type { ConversationDocument, ConversationRecord, JsonValue, UserIdentifier } from '../types';
import { MESSAGE_CONTAINERS, NESTED_CONVERSATIONS_FIELD } from '../utils/constants';
import { isJsonObject } from '../utils/json.utils';
import { getMessages, isOwnedBy, isSentBy, normaliseUserId } from './field.resolver';

// ============================================================================
// CONVERSATION COUNTING
// ============================================================================

/**
 * True when the user owns the conversation or sent at least one of its messages.
 * Stops at the first match.
 */
export function involvesUser(conversation: ConversationRecord, userId: UserIdentifier): boolean {
    if (isOwnedBy(conversation, userId)) {
        return true;
    }
    return MESSAGE_CONTAINERS.some(container =>
        getMessages(conversation, container).some(message => isSentBy(message, userId))
    );
}

/**
 * Counts the conversations attributable to a user.
 *
 * A listed conversation counts once whether it matched by owner, by `messages` or by
 * `chat_messages`. For documents keyed by user, the size of that user's entry is used.
 */
export function countUserConversations(document: ConversationDocument, userId: JsonValue): number {
    const target = normaliseUserId(userId);

    switch (document.kind) {
        case 'conversation-list':
            return document.conversations.filter(
                conversation => isJsonObject(conversation) && involvesUser(conversation, target)
            ).length;
        case 'keyed-by-user': {
            if (!Object.hasOwn(document.users, target)) return 0;
            return countEntries(document.users[target]);
        }
        case 'unrecognised':
            return 0;
    }
}

function countEntries(userData: JsonValue): number {
    if (Array.isArray(userData)) {
        return userData.length;
    }
    if (isJsonObject(userData) && Object.hasOwn(userData, NESTED_CONVERSATIONS_FIELD)) {
        const nested = userData[NESTED_CONVERSATIONS_FIELD];
        if (Array.isArray(nested)) return nested.length;
        if (isJsonObject(nested)) return Object.keys(nested).length;
    }
    return 0;
}
