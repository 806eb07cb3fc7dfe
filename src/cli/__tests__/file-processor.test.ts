import test, { type TestContext } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { ExportHeader, IdentityRecord } from '../../types';
import { normaliseDocument } from '../../analysis/document.normaliser';
import { ConversationFilterError } from '../../utils/errors';
import {
    exportUserConversations,
    listUsers,
    resolveIdentities,
    selectExportConversations,
    writeUserConversations
} from '../file-processor';

function tempDir(t: TestContext): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'file-processor-'));
    t.after(() => fs.rmSync(dir, { recursive: true, force: true }));
    return dir;
}

function isErrorCode(code: string) {
    return (error: unknown) => error instanceof ConversationFilterError && error.code === code;
}

const document = normaliseDocument([
    { user_id: 'u1', name: 'First', messages: [{ sender: 'u1', text: 'héllo' }] },
    { account: { uuid: 'u2' }, chat_messages: [{ sender: 'u2' }, { sender: 'u1' }] },
    { messages: [{ sender: 'u3' }] }
]);

const identities = new Map<string, IdentityRecord>([
    ['u1', { id: 'u1', name: 'Ada', email: 'ada@example.com' }]
]);

test('listUsers reports display names and counts', () => {
    assert.deepEqual(listUsers(document, identities), [
        { id: 'u1', displayName: 'Ada (ada@example.com)', conversationCount: 2 },
        { id: 'u2', displayName: 'u2', conversationCount: 1 },
        { id: 'u3', displayName: 'u3', conversationCount: 1 }
    ]);
});

test('listUsers throws NO_USERS_FOUND for an empty export', () => {
    assert.throws(() => listUsers(normaliseDocument([]), new Map()), isErrorCode('NO_USERS_FOUND'));
});

test('export with header round-trips', (t) => {
    const outputPath = path.join(tempDir(t), 'ada.json');
    const summary = exportUserConversations({
        document,
        userId: 'u1',
        identities,
        outputPath,
        includeHeader: true,
        exportDate: new Date('2026-01-02T03:04:05.000Z')
    });

    assert.equal(summary.conversationCount, 2);
    assert.equal(summary.includeHeader, true);
    assert.equal(summary.bytesWritten, fs.statSync(outputPath).size);

    const written: ExportHeader = JSON.parse(fs.readFileSync(outputPath, 'utf8'));
    assert.equal(written.user_id, 'u1');
    assert.equal(written.user_display, 'Ada (ada@example.com)');
    assert.equal(written.export_date, '2026-01-02T03:04:05.000Z');
    assert.equal(written.conversation_count, written.conversations.length);
    assert.deepEqual(written.conversations, [
        { user_id: 'u1', name: 'First', messages: [{ sender: 'u1', text: 'héllo' }] },
        { account: { uuid: 'u2' }, chat_messages: [{ sender: 'u1' }] }
    ]);
    assert.match(fs.readFileSync(outputPath, 'utf8'), /"text": "héllo"/);
});

test('export without header writes the bare list', (t) => {
    const outputPath = path.join(tempDir(t), 'u3.json');
    exportUserConversations({ document, userId: 'u3', identities, outputPath, includeHeader: false });

    assert.deepEqual(JSON.parse(fs.readFileSync(outputPath, 'utf8')), [{ messages: [{ sender: 'u3' }] }]);
});

test('export with no matches writes nothing', (t) => {
    const outputPath = path.join(tempDir(t), 'nobody.json');
    assert.throws(
        () => exportUserConversations({ document, userId: 'nobody', identities, outputPath, includeHeader: true }),
        isErrorCode('NO_MATCHING_CONVERSATIONS')
    );
    assert.equal(fs.existsSync(outputPath), false);
});

test('selectExportConversations rejects a keyed entry that holds no conversations', () => {
    assert.throws(
        () => selectExportConversations(normaliseDocument({ u6: 'scalar' }), 'u6'),
        isErrorCode('NO_MATCHING_CONVERSATIONS')
    );
});

test('writeUserConversations writes the list it is given', (t) => {
    const outputPath = path.join(tempDir(t), 'given.json');
    const summary = writeUserConversations({
        conversations: [{ user_id: 'u9' }],
        userId: 'u9',
        identities,
        outputPath,
        includeHeader: false
    });
    assert.equal(summary.conversationCount, 1);
    assert.equal(fs.readFileSync(outputPath, 'utf8'), '[\n  {\n    "user_id": "u9"\n  }\n]');
});

test('export into a missing directory reports WRITE_FAILED', (t) => {
    const outputPath = path.join(tempDir(t), 'missing', 'out.json');
    assert.throws(
        () => exportUserConversations({ document, userId: 'u1', identities, outputPath, includeHeader: true }),
        isErrorCode('WRITE_FAILED')
    );
});

test('resolveIdentities uses an explicit users file', (t) => {
    const dir = tempDir(t);
    const usersPath = path.join(dir, 'people.json');
    fs.writeFileSync(usersPath, JSON.stringify({ u1: { name: 'Ada' } }));

    const source = resolveIdentities(path.join(dir, 'conversations.json'), usersPath);
    assert.equal(source.path, usersPath);
    assert.deepEqual(source.identities.get('u1'), { id: 'u1', name: 'Ada' });
});

test('resolveIdentities finds users.json beside the input', (t) => {
    const dir = tempDir(t);
    fs.writeFileSync(path.join(dir, 'users.json'), JSON.stringify([{ uuid: 'u2', email: 'b@example.com' }]));

    const source = resolveIdentities(path.join(dir, 'conversations.json'));
    assert.equal(source.path, path.join(dir, 'users.json'));
    assert.deepEqual(source.identities.get('u2'), { id: 'u2', email: 'b@example.com' });
});

test('resolveIdentities without any users file is empty and silent', (t) => {
    const source = resolveIdentities(path.join(tempDir(t), 'conversations.json'));
    assert.deepEqual(source, { identities: new Map() });
});
