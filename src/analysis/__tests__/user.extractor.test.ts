import test from 'node:test';
import assert from 'node:assert/strict';
import type { JsonValue } from '../../types';
import { normaliseDocument } from '../document.normaliser';
import { extractUsers } from '../user.extractor';

const extract = (raw: JsonValue) => extractUsers(normaliseDocument(raw));

test('individual export: owner and message senders', () => {
    assert.deepEqual(extract([{ user_id: 'u1', messages: [{ sender: 'u1', text: 'hi' }] }]), ['u1']);
});

test('team export: account owner and chat message senders', () => {
    assert.deepEqual(extract([{ account: { uuid: 'u2' }, chat_messages: [{ sender: 'u2' }] }]), ['u2']);
});

test('senders in both containers are collected and sorted', () => {
    const raw: JsonValue[] = [
        { user_id: 'zed', messages: [{ sender: 'mia' }], chat_messages: [{ userId: 'abe' }] },
        { messages: [{ author: 'kai' }, { text: 'no sender' }] },
        'not a conversation',
        { title: 'ownerless' }
    ];
    assert.deepEqual(extract(raw), ['abe', 'kai', 'mia', 'zed']);
});

test('numeric identifiers are stored as strings', () => {
    assert.deepEqual(extract([{ user_id: 10 }, { user_id: 9 }, { user_id: '10' }]), ['10', '9']);
});

test('extraction ignores conversation order', () => {
    const a = { user_id: 'u1', messages: [{ sender: 'u3' }] };
    const b = { account: 'u2' };
    const c = { chat_messages: [{ user: 'u4' }] };
    assert.deepEqual(extract([a, b, c]), extract([c, a, b]));
    assert.deepEqual(extract([a, b, c]), ['u1', 'u2', 'u3', 'u4']);
});

test('extraction is repeatable and leaves the document untouched', () => {
    const raw = [{ user_id: 'u1', messages: [{ sender: 'u2' }] }];
    const before = JSON.stringify(raw);
    const document = normaliseDocument(raw);
    assert.deepEqual(extractUsers(document), extractUsers(document));
    assert.equal(JSON.stringify(raw), before);
});

test('keyed-by-user export: top-level keys', () => {
    assert.deepEqual(extract({ u6: [{ a: 1 }, { a: 2 }] }), ['u6']);
    assert.deepEqual(extract({ b: [], a: {}, c: 5 }), ['a', 'b', 'c']);
});

test('wrapped conversations are unwrapped', () => {
    assert.deepEqual(extract({ conversations: [{ author: 'u9' }] }), ['u9']);
});

test('empty and scalar documents yield no users', () => {
    assert.deepEqual(extract([]), []);
    assert.deepEqual(extract({}), []);
    assert.deepEqual(extract(42), []);
});

test('users sort by code point', () => {
    const astral = '\u{1F600}';
    const halfwidth = '\uFF61';
    assert.deepEqual(extract({ [astral]: [], [halfwidth]: [], b: [] }), ['b', halfwidth, astral]);
    assert.deepEqual(extract([{ user_id: astral }, { user_id: halfwidth }]), [halfwidth, astral]);
});
