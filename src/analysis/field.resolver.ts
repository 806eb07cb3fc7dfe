import type { ConversationRecord, JsonValue, MessageContainer, MessageRecord, UserIdentifier } from '../types';
import {
    ACCOUNT_FIELD,
    ACCOUNT_ID_FIELDS,
    CONVERSATION_OWNER_FIELDS,
    MESSAGE_SENDER_FIELDS
} from '../utils/constants';
import { isJsonObject, isPresent, pickFirstPresent, toIdentifierString } from '../utils/json.utils';

// ============================================================================
// FIELD RESOLUTION
// ============================================================================

/**
 * Resolves the owner of a conversation.
 *
 * Tries `user_id`, `userId`, `user` and `author` in that order. Team exports carry the
 * owner in `account`, either as an object (`uuid`, then `id`) or as a plain value.
 * Returns undefined when the conversation has no owner.
 */
export function resolveConversationOwner(conversation: ConversationRecord): UserIdentifier | undefined {
    const owner = pickFirstPresent(conversation, CONVERSATION_OWNER_FIELDS);
    if (owner !== undefined) {
        return toIdentifierString(owner);
    }

    if (!Object.hasOwn(conversation, ACCOUNT_FIELD)) {
        return undefined;
    }

    const account = conversation[ACCOUNT_FIELD];
    if (isJsonObject(account)) {
        const accountId = pickFirstPresent(account, ACCOUNT_ID_FIELDS);
        return accountId === undefined ? undefined : toIdentifierString(accountId);
    }
    if (isPresent(account) && !Array.isArray(account)) {
        return toIdentifierString(account);
    }
    return undefined;
}

/**
 * Resolves the sender of a single message
 */
export function resolveMessageSender(message: MessageRecord): UserIdentifier | undefined {
    const sender = pickFirstPresent(message, MESSAGE_SENDER_FIELDS);
    return sender === undefined ? undefined : toIdentifierString(sender);
}

/**
 * Message records held in `container`. A missing or non-list container is empty.
 */
export function getMessages(conversation: ConversationRecord, container: MessageContainer): MessageRecord[] {
    const value = Object.hasOwn(conversation, container) ? conversation[container] : undefined;
    if (!Array.isArray(value)) {
        return [];
    }
    return value.filter(isJsonObject);
}

export function isSentBy(message: MessageRecord, userId: UserIdentifier): boolean {
    return resolveMessageSender(message) === userId;
}

export function isOwnedBy(conversation: ConversationRecord, userId: UserIdentifier): boolean {
    return resolveConversationOwner(conversation) === userId;
}

/**
 * Comparisons always happen on the string form of an identifier
 */
export function normaliseUserId(userId: JsonValue): UserIdentifier {
    return toIdentifierString(userId);
}
