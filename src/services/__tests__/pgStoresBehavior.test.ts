import assert from 'node:assert/strict';
import type { CanonicalMessage } from '../../shared/types.js';
import { mapAccountRow, PgAccountRepository, type AccountRow } from '../accounts.js';
import { PgMailStore } from '../mailStore.js';
import { PgOAuthStateStore } from '../oauthStates.js';
import { PgLeaseStore } from '../syncLease.js';
import { scriptedSql } from '../../../tests/support/scripted.js';

const ACCOUNT_ID = '00000000-0000-4000-8000-0000000000a1';

const accountRow = (overrides: Partial<AccountRow> = {}): AccountRow => ({
  id: ACCOUNT_ID,
  user_id: '00000000-0000-4000-8000-000000000001',
  provider: 'gmail',
  email_address: 'owner@example.test',
  display_name: null,
  access_token: 'access-current',
  encrypted_refresh_token: 'v1.sealed',
  token_expires_at: '2024-05-01T13:00:00.000Z',
  sync_cursor: { provider: 'gmail', historyId: '100' },
  last_synced_at: null,
  is_active: true,
  sync_error: null,
  deactivated_reason: null,
  ...overrides,
});

const message: CanonicalMessage = {
  providerMessageId: 'm-1',
  providerThreadId: 't-1',
  from: 'sender@example.test',
  to: ['owner@example.test'],
  cc: [],
  bcc: [],
  subject: 'Hello',
  date: new Date('2024-04-01T10:00:00.000Z'),
  bodyText: 'hi',
  bodyHtml: '',
  snippet: 'hi',
  attachments: [],
  hasAttachments: false,
};

let passed = 0;
let failed = 0;

const test = async (name: string, fn: () => Promise<void> | void) => {
  try {
    await fn();
    passed += 1;
  } catch (error) {
    failed += 1;
    console.error(`FAIL: ${name}`);
    console.error(`  ${error}`);
  }
};

await test('account rows map to records with parsed dates and cursor', () => {
  const account = mapAccountRow(accountRow());

  assert.equal(account.provider, 'gmail');
  assert.deepEqual(account.cursor, { provider: 'gmail', historyId: '100' });
  assert.equal(account.tokenExpiresAt?.toISOString(), '2024-05-01T13:00:00.000Z');
  assert.equal(account.lastSyncedAt, null);
  assert.equal(account.active, true);
});

await test('an unreadable stored cursor maps to no cursor', () => {
  assert.equal(mapAccountRow(accountRow({ sync_cursor: { provider: 'gmail' } })).cursor, null);
  assert.equal(mapAccountRow(accountRow({ sync_cursor: 'garbage' })).cursor, null);
});

await test('an unknown provider in a row is an error', () => {
  assert.throws(() => mapAccountRow(accountRow({ provider: 'imap' })), /unknown provider imap/);
});

await test('getAccount returns null for a missing row', async () => {
  const sql = scriptedSql([{
    rows: [],
    check: (call) => assert.deepEqual(call.params, [ACCOUNT_ID]),
  }]);

  assert.equal(await new PgAccountRepository(sql.executor).getAccount(ACCOUNT_ID), null);
  sql.assertDone();
});

await test('updateCredentials keeps the stored refresh ciphertext when none was issued', async () => {
  const expiresAt = new Date('2024-05-01T13:00:00.000Z');
  const sql = scriptedSql([{
    check: (call) => {
      assert.match(call.text, /encrypted_refresh_token = COALESCE\(\$4, encrypted_refresh_token\)/);
      assert.deepEqual(call.params, [ACCOUNT_ID, 'access-new', expiresAt, null]);
    },
  }]);

  await new PgAccountRepository(sql.executor).updateCredentials(ACCOUNT_ID, {
    accessToken: 'access-new',
    tokenExpiresAt: expiresAt,
  });
  sql.assertDone();
});

await test('deactivateAccount clears the active flag and records the reason', async () => {
  const sql = scriptedSql([{
    check: (call) => {
      assert.match(call.text, /SET is_active = FALSE, deactivated_reason = \$2, sync_error = \$2/);
      assert.deepEqual(call.params, [ACCOUNT_ID, 'invalid_grant']);
    },
  }]);

  await new PgAccountRepository(sql.executor).deactivateAccount(ACCOUNT_ID, 'invalid_grant');
  sql.assertDone();
});

await test('deleteAccount reports whether a row was removed', async () => {
  const sql = scriptedSql([{ rowCount: 1 }, { rowCount: 0 }]);
  const repository = new PgAccountRepository(sql.executor);

  assert.equal(await repository.deleteAccount(ACCOUNT_ID), true);
  assert.equal(await repository.deleteAccount(ACCOUNT_ID), false);
});

await test('a unit of work wraps record writes in a savepoint and commits with the cursor', async () => {
  const sql = scriptedSql([
    { check: (call) => assert.equal(call.text, 'BEGIN') },
    { check: (call) => assert.equal(call.text, 'SAVEPOINT record_1') },
    { rows: [], check: (call) => assert.deepEqual(call.params, ['m-1']) },
    { rows: [], check: (call) => assert.deepEqual(call.params, [ACCOUNT_ID, 't-1']) },
    {
      rows: [{
        id: 'thread-1',
        account_id: ACCOUNT_ID,
        provider_thread_id: 't-1',
        subject: 'Hello',
        snippet: 'hi',
        last_message_at: '2024-04-01T10:00:00.000Z',
      }],
    },
    {
      rows: [{ id: 'message-1' }],
      check: (call) => {
        assert.match(call.text, /ON CONFLICT \(provider_message_id\) DO NOTHING RETURNING id/);
        assert.equal(call.params[0], 'thread-1');
      },
    },
    { check: (call) => assert.equal(call.text, 'RELEASE SAVEPOINT record_1') },
    {
      check: (call) => {
        assert.match(call.text, /SET sync_cursor = \$2::jsonb, last_synced_at = \$3, sync_error = NULL/);
        assert.equal(call.params[1], '{"provider":"gmail","historyId":"120"}');
      },
    },
    { check: (call) => assert.equal(call.text, 'COMMIT') },
  ]);

  const messageId = await new PgMailStore(sql.database).unitOfWork(async (tx) => {
    const id = await tx.isolate(async () => {
      assert.equal(await tx.messageExists('m-1'), false);
      assert.equal(await tx.findThread(ACCOUNT_ID, 't-1'), null);
      const thread = await tx.insertThread(ACCOUNT_ID, message);
      assert.equal(thread.lastMessageAt.toISOString(), '2024-04-01T10:00:00.000Z');
      return tx.insertMessage(thread.id, message);
    });
    await tx.saveSyncState(ACCOUNT_ID, { provider: 'gmail', historyId: '120' }, new Date('2024-05-01T12:00:00.000Z'));
    return id;
  });

  assert.equal(messageId, 'message-1');
  sql.assertDone();
});

await test('a failing record rolls back to its savepoint and the error surfaces', async () => {
  const sql = scriptedSql([
    { check: (call) => assert.equal(call.text, 'BEGIN') },
    { check: (call) => assert.equal(call.text, 'SAVEPOINT record_1') },
    { error: Object.assign(new Error('duplicate key value'), { code: '23505' }) },
    { check: (call) => assert.equal(call.text, 'ROLLBACK TO SAVEPOINT record_1') },
    { check: (call) => assert.equal(call.text, 'RELEASE SAVEPOINT record_1') },
    { check: (call) => assert.equal(call.text, 'ROLLBACK') },
  ]);

  await assert.rejects(
    new PgMailStore(sql.database).unitOfWork((tx) => tx.isolate(() => tx.messageExists('m-1'))),
    /duplicate key value/,
  );
  sql.assertDone();
});

await test('insertMessage returns null when another account stored the id first', async () => {
  const sql = scriptedSql([
    { check: (call) => assert.equal(call.text, 'BEGIN') },
    { rows: [] },
    { check: (call) => assert.equal(call.text, 'COMMIT') },
  ]);

  const id = await new PgMailStore(sql.database).unitOfWork((tx) => tx.insertMessage('thread-1', message));

  assert.equal(id, null);
});

await test('thread activity only moves forward and attachments are stored under their message', async () => {
  const later = new Date('2024-04-01T12:00:00.000Z');
  const sql = scriptedSql([
    { rows: [] },
    { rowCount: 1 },
    { rowCount: 1 },
    { rows: [] },
  ]);

  await new PgMailStore(sql.database).unitOfWork(async (tx) => {
    await tx.updateThreadActivity('thread-1', later, 'newest');
    await tx.insertAttachment('message-1', {
      providerAttachmentId: 'att-1',
      filename: 'report.pdf',
      mimeType: 'application/pdf',
      size: 2048,
    });
  });

  assert.deepEqual(sql.calls[1], {
    text: 'UPDATE threads SET snippet = CASE WHEN $2::timestamptz > last_message_at THEN $3 ELSE snippet END, '
      + 'last_message_at = GREATEST(last_message_at, $2::timestamptz) WHERE id = $1',
    params: ['thread-1', later, 'newest'],
  });
  assert.deepEqual(sql.calls[2], {
    text: 'INSERT INTO attachments (message_id, provider_attachment_id, filename, mime_type, size_bytes) '
      + 'VALUES ($1, $2, $3, $4, $5)',
    params: ['message-1', 'att-1', 'report.pdf', 'application/pdf', 2048],
  });
  assert.equal(sql.calls[3]?.text, 'COMMIT');
  sql.assertDone();
});

await test('a lease is granted only when the upsert returns this owner', async () => {
  const sql = scriptedSql([
    { respond: (call) => [{ owner: call.params[1] }] },
    {
      check: (call) => {
        assert.equal(call.text, 'DELETE FROM sync_leases WHERE account_id = $1 AND owner = $2');
        assert.equal(call.params[0], ACCOUNT_ID);
      },
    },
    { rows: [] },
  ]);
  const leases = new PgLeaseStore(sql.executor);

  const lease = await leases.acquire(ACCOUNT_ID, 300_000);
  assert.ok(lease);
  assert.equal(sql.calls[0]?.params[2], 300_000);
  await lease.release();
  assert.equal(sql.calls[1]?.params[1], lease.owner);

  assert.equal(await leases.acquire(ACCOUNT_ID, 300_000), null);
  sql.assertDone();
});

await test('consuming an OAuth state deletes it and maps the row', async () => {
  const sql = scriptedSql([
    {
      rows: [{
        state: 'state-1',
        user_id: '00000000-0000-4000-8000-000000000001',
        provider: 'outlook',
        expires_at: '2024-05-01T12:10:00.000Z',
      }],
      check: (call) => assert.match(call.text, /^DELETE FROM oauth_states WHERE state = \$1 RETURNING/),
    },
    { rows: [] },
  ]);
  const states = new PgOAuthStateStore(sql.executor);

  assert.deepEqual(await states.consume('state-1'), {
    state: 'state-1',
    userId: '00000000-0000-4000-8000-000000000001',
    provider: 'outlook',
    expiresAt: new Date('2024-05-01T12:10:00.000Z'),
  });
  assert.equal(await states.consume('state-1'), null);
  sql.assertDone();
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
