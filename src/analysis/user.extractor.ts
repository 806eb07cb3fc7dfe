import type { ConversationDocument, UserIdentifier } from '../types';
import { MESSAGE_CONTAINERS } from '../utils/constants';
import { isJsonObject } from '../utils/json.utils';
import { compareCodePoints } from '../utils/text.utils';
import { getMessages, resolveConversationOwner, resolveMessageSender } from './field.resolver';

// ============================================================================
// USER EXTRACTION
// ============================================================================

/**
 * Collects every distinct user identifier referenced by the document, sorted.
 *
 * For conversation lists this includes conversation owners as well as the senders
 * found in both `messages` and `chat_messages`. For documents keyed by user, the
 * top-level keys are the users.
 */
export function extractUsers(document: ConversationDocument): UserIdentifier[] {
    switch (document.kind) {
        case 'conversation-list': {
            const users = document.conversations.reduce((found, conversation) => {
                if (!isJsonObject(conversation)) return found;

                const owner = resolveConversationOwner(conversation);
                if (owner !== undefined) found.add(owner);

                for (const container of MESSAGE_CONTAINERS) {
                    for (const message of getMessages(conversation, container)) {
                        const sender = resolveMessageSender(message);
                        if (sender !== undefined) found.add(sender);
                    }
                }
                return found;
            }, new Set<UserIdentifier>());

            return Array.from(users).sort(compareCodePoints);
        }
        case 'keyed-by-user':
            return Object.keys(document.users).sort(compareCodePoints);
        case 'unrecognised':
            return [];
    }
}
