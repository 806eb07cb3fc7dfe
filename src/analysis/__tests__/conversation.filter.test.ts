import test from 'node:test';
import assert from 'node:assert/strict';
import type { JsonValue } from '../../types';
import { normaliseDocument } from '../document.normaliser';
import { filterUserConversations, selectUserConversation } from '../conversation.filter';

const filter = (raw: JsonValue, userId: JsonValue) => filterUserConversations(normaliseDocument(raw), userId);

test('owned conversations are returned unchanged', () => {
    const conversation = { user_id: 'u1', messages: [{ sender: 'u1', text: 'hi' }] };
    const result = filter([conversation], 'u1');
    assert.equal(result.length, 1);
    assert.equal(result[0], conversation);
});

test('account ownership wins over message-level trimming', () => {
    const conversation = { account: { uuid: 'u2' }, chat_messages: [{ sender: 'u2' }, { sender: 'u9' }] };
    const result = filter([conversation], 'u2');
    assert.deepEqual(result, [conversation]);
});

test('ownerless conversations are trimmed to the user messages', () => {
    const raw = [{ messages: [{ sender: 'u3' }, { sender: 'u4' }] }];
    assert.deepEqual(filter(raw, 'u3'), [{ messages: [{ sender: 'u3' }] }]);
    assert.deepEqual(filter(raw, 'u4'), [{ messages: [{ sender: 'u4' }] }]);
    assert.deepEqual(filter(raw, 'u5'), []);
});

test('trimming copies the conversation and keeps other fields', () => {
    const conversation = { uuid: 'c1', name: 'Chat', user_id: 'owner', messages: [{ sender: 'u3' }, { sender: 'owner' }] };
    const [result] = filter([conversation], 'u3');
    assert.deepEqual(result, { uuid: 'c1', name: 'Chat', user_id: 'owner', messages: [{ sender: 'u3' }] });
    assert.notEqual(result, conversation);
    assert.equal(conversation.messages.length, 2);
});

test('chat message matches drop the messages key', () => {
    const conversation = {
        name: 'Team chat',
        account: { uuid: 'lead' },
        messages: [{ sender: 'someone-else' }],
        chat_messages: [{ sender: 'member', text: 'a' }, { sender: 'lead', text: 'b' }]
    };
    assert.deepEqual(filter([conversation], 'member'), [{
        name: 'Team chat',
        account: { uuid: 'lead' },
        chat_messages: [{ sender: 'member', text: 'a' }]
    }]);
    assert.equal(Object.hasOwn(conversation, 'messages'), true);
});

test('messages win over chat_messages within one conversation', () => {
    const conversation = { messages: [{ sender: 'u1', text: 'm' }], chat_messages: [{ sender: 'u1', text: 'c' }] };
    assert.deepEqual(filter([conversation], 'u1'), [{
        messages: [{ sender: 'u1', text: 'm' }],
        chat_messages: [{ sender: 'u1', text: 'c' }]
    }]);
});

test('order of conversations is preserved', () => {
    const raw: JsonValue[] = [{ user_id: 'u1', n: 1 }, { user_id: 'u2', n: 2 }, { messages: [{ sender: 'u1' }], n: 3 }];
    assert.deepEqual(filter(raw, 'u1'), [{ user_id: 'u1', n: 1 }, { messages: [{ sender: 'u1' }], n: 3 }]);
});

test('keyed-by-user documents return the user entry', () => {
    const list = [{ a: 1 }, { a: 2 }];
    assert.equal(filter({ u6: list }, 'u6'), list);
    assert.deepEqual(filter({ u6: { title: 'only' } }, 'u6'), [{ title: 'only' }]);
    assert.deepEqual(filter({ u6: 'text' }, 'u6'), []);
    assert.deepEqual(filter({ u6: list }, 'u7'), []);
});

test('non-object entries and scalar documents yield nothing', () => {
    assert.deepEqual(filter([null, 'x', 3], 'u1'), []);
    assert.deepEqual(filter(true, 'u1'), []);
});

test('selectUserConversation returns undefined without a match', () => {
    assert.equal(selectUserConversation({ user_id: 'u1', messages: [{ sender: 'u1' }] }, 'u2'), undefined);
});
